/**
 * Record type definitions for the meeting and task tracking store
 */

export const TASK_STATUSES = ['complete', 'incomplete'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

/**
 * Status assumed for any task whose stored status is unset or unrecognized
 */
export const DEFAULT_TASK_STATUS: TaskStatus = 'incomplete';

/**
 * A committee member. `chatId` is the linked external chat account, null when unlinked.
 */
export interface MemberRow {
  id: number;
  name: string;
  chatId: string | null;
  role: string | null;
  subgroup: string | null;
  email: string | null;
}

export interface TaskRow {
  id: number;
  name: string;
  description: string | null;
  deadline: string | null;  // YYYY-MM-DD
  status: TaskStatus;
}

export interface MeetingRow {
  id: number;
  name: string;
  type: string | null;
  summary: string | null;
  ingestedAt: Date | null;
}

export interface ProjectRow {
  id: number;
  name: string;
  description: string | null;
}

export interface TopicRow {
  id: number;
  name: string;
  description: string | null;
}

export interface RecordRowMap {
  member: MemberRow;
  task: TaskRow;
  meeting: MeetingRow;
  project: ProjectRow;
  topic: TopicRow;
}

export type RecordKind = keyof RecordRowMap;

/**
 * Kinds looked up by "ID or partial name" identifiers
 */
export type LookupKind = Exclude<RecordKind, 'member'>;

// ============================================
// Junctions
// ============================================

/**
 * Many-to-many relations. Each pair lists the two record kinds joined,
 * in the order their ids are passed to link operations.
 */
export const LINKS = {
  task_member: ['task', 'member'],
  project_member: ['project', 'member'],
  meeting_member: ['meeting', 'member'],
  meeting_topic: ['meeting', 'topic'],
  meeting_task: ['meeting', 'task'],
  meeting_project: ['meeting', 'project'],
  project_task: ['project', 'task'],
} as const satisfies Record<string, readonly [RecordKind, RecordKind]>;

export type LinkKind = keyof typeof LINKS;
export type LinkEnd<L extends LinkKind> = (typeof LINKS)[L][number];

// ============================================
// Inserts
// ============================================

export interface NewTask {
  name: string;
  description: string | null;
  deadline: string | null;
  status: TaskStatus;
}

export interface NewProject {
  name: string;
  description: string | null;
}

export interface NewTopic {
  name: string;
  description: string | null;
}

/**
 * Candidate offered back to the caller when an identifier is ambiguous
 */
export interface MatchCandidate {
  id: number;
  name: string;
}
