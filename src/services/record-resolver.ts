/**
 * Identifier Resolver
 *
 * Resolves a caller-supplied identifier for a task, meeting, project or topic.
 * A numeric identifier is tried as a primary key first; otherwise (or when no
 * row has that id) it is matched as a case-insensitive name fragment.
 */

import { LookupKind, MatchCandidate, RecordRowMap } from '../types/record.types';
import { RecordSession } from './record-store';

export const MAX_MATCH_CANDIDATES = 5;

/** Upper bound of the SERIAL id columns */
export const MAX_RECORD_ID = 2147483647;

export type Resolution<Row> =
  | { status: 'found'; record: Row }
  | { status: 'not_found' }
  | { status: 'ambiguous'; candidates: MatchCandidate[] };

export interface ResolveOptions {
  /** On several fragment hits, keep the one whose whole name equals the input */
  preferExactName?: boolean;
}

const RECORD_LABELS: Record<LookupKind, string> = {
  task: 'task',
  meeting: 'meeting',
  project: 'project',
  topic: 'topic'
};

/**
 * A primary key candidate, or null when the identifier can only be a name
 */
export function parseRecordId(identifier: string): number | null {
  const trimmed = identifier.trim();
  if (!/^\+?\d+$/.test(trimmed)) {
    return null;
  }
  const id = Number(trimmed);
  return id >= 1 && id <= MAX_RECORD_ID ? id : null;
}

export async function resolveRecord<K extends LookupKind>(
  session: RecordSession,
  kind: K,
  identifier: string,
  options: ResolveOptions = {}
): Promise<Resolution<RecordRowMap[K]>> {
  const id = parseRecordId(identifier);
  if (id !== null) {
    const byId = await session.findById(kind, id);
    if (byId) {
      return { status: 'found', record: byId };
    }
  }

  const matches = await session.findByNameFragment(kind, identifier);
  if (matches.length === 0) {
    return { status: 'not_found' };
  }
  if (matches.length === 1) {
    return { status: 'found', record: matches[0] };
  }

  if (options.preferExactName) {
    const wanted = identifier.toLowerCase();
    const exact = matches.find((row) => row.name.toLowerCase() === wanted);
    if (exact) {
      return { status: 'found', record: exact };
    }
  }

  return {
    status: 'ambiguous',
    candidates: matches.slice(0, MAX_MATCH_CANDIDATES).map((row) => ({ id: row.id, name: row.name }))
  };
}

export interface ResolutionFailure {
  error: string;
  matches?: MatchCandidate[];
}

/**
 * Error payload for an unresolved identifier
 */
export function describeResolutionFailure(
  kind: LookupKind,
  identifier: string,
  resolution: Exclude<Resolution<unknown>, { status: 'found' }>
): ResolutionFailure {
  const label = RECORD_LABELS[kind];
  if (resolution.status === 'ambiguous') {
    return {
      error: `Multiple ${label}s match '${identifier}'. Please be more specific.`,
      matches: resolution.candidates
    };
  }
  return { error: `Could not find a ${label} matching '${identifier}'` };
}
