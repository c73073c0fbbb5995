/**
 * Member Resolver
 *
 * Turns a casually written person name ("Sam", "michael huang (lol)",
 * "Micheal Huang") into a single member record or no match.
 *
 * Resolution tiers, first hit wins:
 *   1. exact full name (case-insensitive)
 *   2. unique first name, for single-word queries
 *   3. closest full name by sequence similarity, above a cutoff
 *
 * The name index is loaded from the store once, on first use, and then kept
 * for the life of the process. Members added or renamed afterwards are not
 * visible until `MemberDirectory.invalidate()` is called or the process restarts.
 */

import { getConfig } from '../config/env';
import { MemberRow } from '../types/record.types';
import { closestMatch } from '../utils/similarity';
import { RecordStore, getRecordStore } from './record-store';

export interface MemberMatchOptions {
  /** Minimum similarity (0-1) for the approximate tier */
  fuzzyCutoff: number;
  /** Whether single-word queries may resolve through a unique first name */
  firstNameMatch: boolean;
}

export const DEFAULT_MEMBER_MATCH_OPTIONS: MemberMatchOptions = {
  fuzzyCutoff: 0.6,
  firstNameMatch: true
};

const TRAILING_PUNCTUATION = /[,;.\-]+$/;

/**
 * Reduce raw input to a lookup key: drop parenthetical commentary and
 * trailing punctuation, then case-fold. Returns '' when nothing is left.
 */
export function cleanMemberQuery(raw: string): string {
  const withoutComment = raw.trim().split('(', 1)[0].trim();
  return withoutComment.replace(TRAILING_PUNCTUATION, '').trim().toLowerCase();
}

/**
 * Immutable snapshot of member names
 */
export class MemberIndex {
  private byFullName = new Map<string, MemberRow>();
  private byFirstName = new Map<string, MemberRow[]>();

  constructor(members: readonly MemberRow[]) {
    for (const member of members) {
      const fullName = member.name.trim().toLowerCase();
      if (!fullName) continue;

      // Colliding full names: the later row wins
      this.byFullName.set(fullName, member);

      const firstName = fullName.split(/\s+/)[0];
      const sameFirstName = this.byFirstName.get(firstName);
      if (sameFirstName) {
        sameFirstName.push(member);
      } else {
        this.byFirstName.set(firstName, [member]);
      }
    }
  }

  get size(): number {
    return this.byFullName.size;
  }

  match(raw: string, options: MemberMatchOptions = DEFAULT_MEMBER_MATCH_OPTIONS): MemberRow | null {
    const key = cleanMemberQuery(raw ?? '');
    if (!key) {
      return null;
    }

    const exact = this.byFullName.get(key);
    if (exact) {
      return exact;
    }

    if (options.firstNameMatch && !/\s/.test(key)) {
      const candidates = this.byFirstName.get(key) ?? [];
      if (candidates.length === 1) {
        return candidates[0];
      }
      // None or several share this first name: fall through to the fuzzy tier
    }

    const closest = closestMatch(key, this.byFullName.keys(), options.fuzzyCutoff);
    return closest ? this.byFullName.get(closest) ?? null : null;
  }
}

/**
 * Lazily loaded, process-wide member index.
 * Concurrent first callers share one load; a failed load is retried on the next call.
 */
export class MemberDirectory {
  private snapshot: Promise<MemberIndex> | null = null;

  constructor(private loadMembers: () => Promise<MemberRow[]>) {}

  static fromStore(store: RecordStore): MemberDirectory {
    return new MemberDirectory(() => store.transaction((session) => session.listAll('member')));
  }

  getIndex(): Promise<MemberIndex> {
    if (!this.snapshot) {
      const loading = this.loadMembers().then((members) => new MemberIndex(members));
      this.snapshot = loading;
      loading.catch(() => {
        if (this.snapshot === loading) {
          this.snapshot = null;
        }
      });
    }
    return this.snapshot;
  }

  get isLoaded(): boolean {
    return this.snapshot !== null;
  }

  /**
   * Drop the snapshot so the next lookup reloads from the store
   */
  invalidate(): void {
    this.snapshot = null;
  }
}

export class MemberResolver {
  private directory: MemberDirectory;
  private options: MemberMatchOptions;

  constructor(directory?: MemberDirectory, options?: Partial<MemberMatchOptions>) {
    this.directory = directory || getMemberDirectory();
    const config = getConfig();
    this.options = {
      fuzzyCutoff: options?.fuzzyCutoff ?? config.MEMBER_FUZZY_CUTOFF,
      firstNameMatch: options?.firstNameMatch ?? config.MEMBER_FIRST_NAME_MATCH
    };
  }

  async resolve(raw: string): Promise<MemberRow | null> {
    const index = await this.directory.getIndex();
    return index.match(raw, this.options);
  }

  /**
   * Resolve every name, stopping at the first one that has no match
   */
  async resolveAll(names: readonly string[]): Promise<{ members: MemberRow[] } | { unresolved: string }> {
    const members: MemberRow[] = [];
    for (const name of names) {
      const member = await this.resolve(name);
      if (!member) {
        return { unresolved: name };
      }
      members.push(member);
    }
    return { members };
  }
}

// ============================================
// Singleton Instances
// ============================================

let memberDirectoryInstance: MemberDirectory | null = null;
let memberResolverInstance: MemberResolver | null = null;

export function getMemberDirectory(): MemberDirectory {
  if (!memberDirectoryInstance) {
    memberDirectoryInstance = MemberDirectory.fromStore(getRecordStore());
  }
  return memberDirectoryInstance;
}

export function getMemberResolver(): MemberResolver {
  if (!memberResolverInstance) {
    memberResolverInstance = new MemberResolver();
  }
  return memberResolverInstance;
}

/**
 * Reset the singleton instances (for testing)
 */
export function resetMemberResolver(): void {
  memberDirectoryInstance = null;
  memberResolverInstance = null;
}
