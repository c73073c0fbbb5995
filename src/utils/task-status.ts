import { DEFAULT_TASK_STATUS, TASK_STATUSES, TaskStatus } from '../types/record.types';

export function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

/**
 * Single read path for stored task status: anything other than a known
 * value (including null) is reported as the default.
 */
export function normalizeTaskStatus(raw: unknown): TaskStatus {
  if (typeof raw !== 'string') {
    return DEFAULT_TASK_STATUS;
  }
  const value = raw.trim().toLowerCase();
  return isTaskStatus(value) ? value : DEFAULT_TASK_STATUS;
}
