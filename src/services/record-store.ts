/**
 * Record Store
 *
 * Data access for members, tasks, meetings, projects, topics and the junction
 * tables between them. Every tool invocation works inside one `transaction()`
 * scope; the Postgres implementation maps that onto BEGIN/COMMIT on a pooled client.
 */

import { Pool, PoolClient, QueryResultRow } from 'pg';
import { getPool, withTransaction } from '../lib/db';
import {
  LINKS,
  LinkEnd,
  LinkKind,
  MemberRow,
  NewProject,
  NewTask,
  NewTopic,
  ProjectRow,
  RecordKind,
  RecordRowMap,
  TaskRow,
  TaskStatus,
  TopicRow
} from '../types/record.types';
import { normalizeTaskStatus } from '../utils/task-status';
import { escapeLikePattern } from '../utils/text';

// ============================================
// Store Interfaces
// ============================================

export interface RecordSession {
  findById<K extends RecordKind>(kind: K, id: number): Promise<RecordRowMap[K] | null>;
  /** Case-insensitive substring match on the record's name, ordered by id */
  findByNameFragment<K extends RecordKind>(kind: K, fragment: string): Promise<RecordRowMap[K][]>;
  /** Case-insensitive whole-name match; lowest id wins if several exist */
  findByExactName<K extends RecordKind>(kind: K, name: string): Promise<RecordRowMap[K] | null>;
  listAll<K extends RecordKind>(kind: K): Promise<RecordRowMap[K][]>;
  search<K extends RecordKind>(kind: K, query: string, limit: number): Promise<RecordRowMap[K][]>;
  findMemberByChatId(chatId: string): Promise<MemberRow | null>;
  /** Records of `kind` joined through `link` to the record `otherId` on the opposite end */
  listLinked<L extends LinkKind, K extends LinkEnd<L>>(link: L, kind: K, otherId: number): Promise<RecordRowMap[K][]>;
  hasLink(link: LinkKind, leftId: number, rightId: number): Promise<boolean>;
  addLink(link: LinkKind, leftId: number, rightId: number): Promise<void>;
  /** @returns number of junction rows removed */
  removeLink(link: LinkKind, leftId: number, rightId: number): Promise<number>;
  insertTask(task: NewTask): Promise<TaskRow>;
  insertProject(project: NewProject): Promise<ProjectRow>;
  insertTopic(topic: NewTopic): Promise<TopicRow>;
  updateTaskStatus(taskId: number, status: TaskStatus): Promise<void>;
}

export interface RecordStore {
  transaction<T>(fn: (session: RecordSession) => Promise<T>): Promise<T>;
}

// ============================================
// Table Metadata
// ============================================

export interface ColumnOrder {
  column: string;
  direction: 'ASC' | 'DESC';
}

export interface RecordTable<Row> {
  table: string;
  idColumn: string;
  nameColumn: string;
  searchColumns: readonly string[];
  order: readonly ColumnOrder[];
  toRow(record: QueryResultRow): Row;
}

function nullableString(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  return String(value);
}

function nullableDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    return new Date(value);
  }
  return null;
}

export const RECORD_TABLES: { [K in RecordKind]: RecordTable<RecordRowMap[K]> } = {
  member: {
    table: 'members',
    idColumn: 'member_id',
    nameColumn: 'member_name',
    searchColumns: ['member_name', 'email', 'role'],
    order: [
      { column: 'member_name', direction: 'ASC' },
      { column: 'member_id', direction: 'ASC' }
    ],
    toRow: (record) => ({
      id: Number(record.member_id),
      name: String(record.member_name ?? ''),
      chatId: nullableString(record.chat_id),
      role: nullableString(record.role),
      subgroup: nullableString(record.subgroup),
      email: nullableString(record.email)
    })
  },
  task: {
    table: 'tasks',
    idColumn: 'task_id',
    nameColumn: 'task_name',
    searchColumns: ['task_name', 'task_description'],
    order: [
      { column: 'task_deadline', direction: 'ASC' },
      { column: 'task_id', direction: 'ASC' }
    ],
    toRow: (record) => ({
      id: Number(record.task_id),
      name: String(record.task_name ?? ''),
      description: nullableString(record.task_description),
      deadline: nullableString(record.task_deadline),
      status: normalizeTaskStatus(record.task_status)
    })
  },
  meeting: {
    table: 'meetings',
    idColumn: 'meeting_id',
    nameColumn: 'meeting_name',
    searchColumns: ['meeting_name', 'meeting_summary'],
    order: [
      { column: 'ingested_at', direction: 'DESC' },
      { column: 'meeting_id', direction: 'DESC' }
    ],
    toRow: (record) => ({
      id: Number(record.meeting_id),
      name: String(record.meeting_name ?? ''),
      type: nullableString(record.meeting_type),
      summary: nullableString(record.meeting_summary),
      ingestedAt: nullableDate(record.ingested_at)
    })
  },
  project: {
    table: 'projects',
    idColumn: 'project_id',
    nameColumn: 'project_name',
    searchColumns: ['project_name', 'project_description'],
    order: [
      { column: 'project_name', direction: 'ASC' },
      { column: 'project_id', direction: 'ASC' }
    ],
    toRow: (record) => ({
      id: Number(record.project_id),
      name: String(record.project_name ?? ''),
      description: nullableString(record.project_description)
    })
  },
  topic: {
    table: 'topics',
    idColumn: 'topic_id',
    nameColumn: 'topic_name',
    searchColumns: ['topic_name', 'topic_description'],
    order: [
      { column: 'topic_name', direction: 'ASC' },
      { column: 'topic_id', direction: 'ASC' }
    ],
    toRow: (record) => ({
      id: Number(record.topic_id),
      name: String(record.topic_name ?? ''),
      description: nullableString(record.topic_description)
    })
  }
};

export const LINK_TABLES: Record<LinkKind, string> = {
  task_member: 'task_members',
  project_member: 'project_members',
  meeting_member: 'meeting_members',
  meeting_topic: 'meeting_topics',
  meeting_task: 'meeting_tasks',
  meeting_project: 'meeting_projects',
  project_task: 'project_tasks'
};

/**
 * Column names of a junction, in the order its ids are passed
 */
export function linkColumns(link: LinkKind): [string, string] {
  const [left, right]: readonly [RecordKind, RecordKind] = LINKS[link];
  return [RECORD_TABLES[left].idColumn, RECORD_TABLES[right].idColumn];
}

/**
 * The record kind at the other end of `link` from `kind`
 */
export function oppositeEnd(link: LinkKind, kind: RecordKind): RecordKind {
  const [left, right]: readonly [RecordKind, RecordKind] = LINKS[link];
  if (kind === left) return right;
  if (kind === right) return left;
  throw new Error(`Link ${link} does not join ${kind} records`);
}

function orderClause(order: readonly ColumnOrder[], alias?: string): string {
  const prefix = alias ? `${alias}.` : '';
  return order.map(({ column, direction }) => `${prefix}${column} ${direction} NULLS LAST`).join(', ');
}

// ============================================
// Postgres Implementation
// ============================================

export class PostgresRecordSession implements RecordSession {
  constructor(private client: Pick<PoolClient, 'query'>) {}

  private async selectRows<K extends RecordKind>(kind: K, sql: string, params: unknown[]): Promise<RecordRowMap[K][]> {
    const result = await this.client.query<QueryResultRow>(sql, params);
    return result.rows.map((record) => RECORD_TABLES[kind].toRow(record));
  }

  async findById<K extends RecordKind>(kind: K, id: number): Promise<RecordRowMap[K] | null> {
    const meta = RECORD_TABLES[kind];
    const rows = await this.selectRows(kind, `SELECT * FROM ${meta.table} WHERE ${meta.idColumn} = $1`, [id]);
    return rows[0] ?? null;
  }

  async findByNameFragment<K extends RecordKind>(kind: K, fragment: string): Promise<RecordRowMap[K][]> {
    const meta = RECORD_TABLES[kind];
    return this.selectRows(
      kind,
      `SELECT * FROM ${meta.table} WHERE ${meta.nameColumn} ILIKE $1 ORDER BY ${meta.idColumn}`,
      [`%${escapeLikePattern(fragment)}%`]
    );
  }

  async findByExactName<K extends RecordKind>(kind: K, name: string): Promise<RecordRowMap[K] | null> {
    const meta = RECORD_TABLES[kind];
    const rows = await this.selectRows(
      kind,
      `SELECT * FROM ${meta.table} WHERE LOWER(${meta.nameColumn}) = LOWER($1) ORDER BY ${meta.idColumn} LIMIT 1`,
      [name]
    );
    return rows[0] ?? null;
  }

  async listAll<K extends RecordKind>(kind: K): Promise<RecordRowMap[K][]> {
    const meta = RECORD_TABLES[kind];
    return this.selectRows(kind, `SELECT * FROM ${meta.table} ORDER BY ${orderClause(meta.order)}`, []);
  }

  async search<K extends RecordKind>(kind: K, query: string, limit: number): Promise<RecordRowMap[K][]> {
    const meta = RECORD_TABLES[kind];
    const conditions = meta.searchColumns.map((column) => `${column} ILIKE $1`).join(' OR ');
    return this.selectRows(
      kind,
      `SELECT * FROM ${meta.table} WHERE ${conditions} ORDER BY ${meta.idColumn} LIMIT $2`,
      [`%${escapeLikePattern(query)}%`, limit]
    );
  }

  async findMemberByChatId(chatId: string): Promise<MemberRow | null> {
    const rows = await this.selectRows(
      'member',
      'SELECT * FROM members WHERE chat_id = $1 ORDER BY member_id LIMIT 1',
      [chatId]
    );
    return rows[0] ?? null;
  }

  async listLinked<L extends LinkKind, K extends LinkEnd<L>>(link: L, kind: K, otherId: number): Promise<RecordRowMap[K][]> {
    const meta = RECORD_TABLES[kind];
    const other = RECORD_TABLES[oppositeEnd(link, kind)];
    return this.selectRows(
      kind,
      `SELECT r.* FROM ${meta.table} r
         JOIN ${LINK_TABLES[link]} l ON l.${meta.idColumn} = r.${meta.idColumn}
        WHERE l.${other.idColumn} = $1
        ORDER BY ${orderClause(meta.order, 'r')}`,
      [otherId]
    );
  }

  async hasLink(link: LinkKind, leftId: number, rightId: number): Promise<boolean> {
    const [leftColumn, rightColumn] = linkColumns(link);
    const result = await this.client.query(
      `SELECT 1 FROM ${LINK_TABLES[link]} WHERE ${leftColumn} = $1 AND ${rightColumn} = $2 LIMIT 1`,
      [leftId, rightId]
    );
    return result.rows.length > 0;
  }

  async addLink(link: LinkKind, leftId: number, rightId: number): Promise<void> {
    const [leftColumn, rightColumn] = linkColumns(link);
    await this.client.query(
      `INSERT INTO ${LINK_TABLES[link]} (${leftColumn}, ${rightColumn}) VALUES ($1, $2)`,
      [leftId, rightId]
    );
  }

  async removeLink(link: LinkKind, leftId: number, rightId: number): Promise<number> {
    const [leftColumn, rightColumn] = linkColumns(link);
    const result = await this.client.query(
      `DELETE FROM ${LINK_TABLES[link]} WHERE ${leftColumn} = $1 AND ${rightColumn} = $2`,
      [leftId, rightId]
    );
    return result.rowCount ?? 0;
  }

  async insertTask(task: NewTask): Promise<TaskRow> {
    const rows = await this.selectRows(
      'task',
      `INSERT INTO tasks (task_name, task_description, task_deadline, task_status)
       VALUES ($1, $2, $3, $4) RETURNING *`,
      [task.name, task.description, task.deadline, task.status]
    );
    return this.requireInserted(rows, 'task');
  }

  async insertProject(project: NewProject): Promise<ProjectRow> {
    const rows = await this.selectRows(
      'project',
      'INSERT INTO projects (project_name, project_description) VALUES ($1, $2) RETURNING *',
      [project.name, project.description]
    );
    return this.requireInserted(rows, 'project');
  }

  async insertTopic(topic: NewTopic): Promise<TopicRow> {
    const rows = await this.selectRows(
      'topic',
      'INSERT INTO topics (topic_name, topic_description) VALUES ($1, $2) RETURNING *',
      [topic.name, topic.description]
    );
    return this.requireInserted(rows, 'topic');
  }

  async updateTaskStatus(taskId: number, status: TaskStatus): Promise<void> {
    await this.client.query('UPDATE tasks SET task_status = $1 WHERE task_id = $2', [status, taskId]);
  }

  private requireInserted<Row>(rows: Row[], kind: RecordKind): Row {
    const row = rows[0];
    if (!row) {
      throw new Error(`Insert into ${RECORD_TABLES[kind].table} returned no row`);
    }
    return row;
  }
}

export class PostgresRecordStore implements RecordStore {
  constructor(private pool?: Pick<Pool, 'connect'>) {}

  async transaction<T>(fn: (session: RecordSession) => Promise<T>): Promise<T> {
    const source = this.pool ?? getPool();
    return withTransaction(source, (client) => fn(new PostgresRecordSession(client)));
  }
}

// ============================================
// Singleton Instance
// ============================================

let recordStoreInstance: RecordStore | null = null;

export function getRecordStore(): RecordStore {
  if (!recordStoreInstance) {
    recordStoreInstance = new PostgresRecordStore();
  }
  return recordStoreInstance;
}

/**
 * Replace the shared store (for testing)
 */
export function setRecordStore(store: RecordStore): void {
  recordStoreInstance = store;
}

/**
 * Reset the singleton instance (for testing)
 */
export function resetRecordStore(): void {
  recordStoreInstance = null;
}
