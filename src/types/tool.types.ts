/**
 * Tool call types: the closed set of tool names, their typed requests,
 * and the payloads returned to the model integration.
 */

import { MatchCandidate, TaskStatus } from './record.types';

export const TOOL_NAMES = [
  'get_my_tasks',
  'get_current_datetime',
  'get_my_identity',
  'get_all_tasks',
  'get_member_info',
  'get_meeting_info',
  'get_meetings_for_member',
  'get_missed_meetings',
  'get_project_info',
  'get_all_projects',
  'get_all_members',
  'get_topic_info',
  'search_database',
  'update_task_status',
  'assign_member_to_task',
  'remove_member_from_task',
  'create_task',
  'create_project',
  'add_member_to_project',
  'create_topic',
  'add_topic_to_meeting'
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((toolName) => toolName === name);
}

export const STATUS_FILTERS = ['complete', 'incomplete', 'all'] as const;
export type StatusFilter = (typeof STATUS_FILTERS)[number];

export const SEARCH_SCOPES = ['members', 'meetings', 'projects', 'tasks', 'topics', 'all'] as const;
export type SearchScope = (typeof SEARCH_SCOPES)[number];

// ============================================
// Tool Requests
// ============================================

export interface CreateTaskArgs {
  taskName: string;
  description?: string;
  deadline?: string;
  assignedTo: string[];
  assignToCurrentUser: boolean;
}

export interface CreateProjectArgs {
  projectName: string;
  description?: string;
  teamMembers: string[];
}

export type ToolRequest =
  | { tool: 'get_my_tasks' }
  | { tool: 'get_current_datetime' }
  | { tool: 'get_my_identity' }
  | { tool: 'get_all_tasks'; statusFilter: StatusFilter }
  | { tool: 'get_member_info'; memberName: string }
  | { tool: 'get_meeting_info'; meetingIdentifier: string }
  | { tool: 'get_meetings_for_member'; memberName: string }
  | { tool: 'get_missed_meetings' }
  | { tool: 'get_project_info'; projectName: string }
  | { tool: 'get_all_projects' }
  | { tool: 'get_all_members' }
  | { tool: 'get_topic_info'; topicName: string }
  | { tool: 'search_database'; searchQuery: string; searchIn: SearchScope }
  | { tool: 'update_task_status'; taskIdentifier: string; newStatus: string }
  | { tool: 'assign_member_to_task'; taskIdentifier: string; memberName: string }
  | { tool: 'remove_member_from_task'; taskIdentifier: string; memberName: string }
  | ({ tool: 'create_task' } & CreateTaskArgs)
  | ({ tool: 'create_project' } & CreateProjectArgs)
  | { tool: 'add_member_to_project'; projectName: string; memberName: string }
  | { tool: 'create_topic'; topicName: string; description?: string }
  | { tool: 'add_topic_to_meeting'; meetingIdentifier: string; topicName: string };

/**
 * Represents a tool call from the LLM
 */
export interface ToolCall {
  name: string;
  arguments: Record<string, unknown>;
}

// ============================================
// Payloads
// ============================================

export interface ErrorPayload {
  error: string;
  matches?: MatchCandidate[];
}

export interface MemberSummary {
  id: number;
  name: string;
  email: string | null;
  role: string | null;
  subgroup: string | null;
  chat_id: string | null;
}

export interface TaskSummary {
  task_id: number;
  name: string;
  description: string | null;
  deadline: string | null;
  status: TaskStatus;
}

export interface TaskStatusSummary {
  name: string;
  status: TaskStatus;
}

export interface MeetingSummary {
  meeting_id: number;
  name: string;
  type: string | null;
  date: string | null;
}

export interface IdentityPayload {
  message: string;
  member: MemberSummary;
}

export interface MyTasksPayload {
  message: string;
  tasks: TaskSummary[];
}

export interface AllTasksPayload {
  message: string;
  tasks: Array<TaskSummary & { assigned_to: string[] }>;
}

export interface MemberInfoPayload {
  message: string;
  member_id: number;
  name: string;
  email: string | null;
  role: string | null;
  subgroup: string | null;
  chat_id: string | null;
  projects: string[];
  tasks: TaskStatusSummary[];
}

export interface MeetingInfoPayload {
  message: string;
  meeting_id: number;
  name: string;
  type: string | null;
  summary: string | null;
  date: string | null;
  attendees: string[];
  topics: string[];
  tasks: TaskStatusSummary[];
  projects: string[];
}

export interface MemberMeetingsPayload {
  message: string;
  meetings: MeetingSummary[];
}

export interface MissedMeetingsPayload {
  message: string;
  missed_meetings: Array<MeetingSummary & { summary: string | null; topics: string[] }>;
}

export interface ProjectInfoPayload {
  message: string;
  project_id: number;
  name: string;
  description: string | null;
  team_members: Array<{ name: string; role: string | null }>;
  tasks: Array<TaskStatusSummary & { deadline: string | null }>;
}

export interface AllProjectsPayload {
  message: string;
  projects: Array<{ project_id: number; name: string; description: string | null; member_count: number }>;
}

export interface AllMembersPayload {
  message: string;
  members: Array<{ member_id: number; name: string; role: string | null; subgroup: string | null; email: string | null }>;
}

export interface TopicInfoPayload {
  message: string;
  topic_id: number;
  name: string;
  description: string | null;
  discussed_in_meetings: Array<{ name: string; type: string | null }>;
}

export interface SearchResults {
  members?: Array<{ name: string; role: string | null; email: string | null }>;
  meetings?: Array<{ name: string; type: string | null }>;
  projects?: Array<{ name: string; description: string | null }>;
  tasks?: TaskStatusSummary[];
  topics?: Array<{ name: string }>;
}

export interface SearchPayload {
  message: string;
  results?: SearchResults;
}

export interface CurrentDateTimePayload {
  message: string;
  current_datetime_iso: string;
  current_date: string;
  current_time: string;
  timezone: string;
}

export interface MutationPayload {
  success: true;
  message: string;
}

export interface TaskStatusUpdatePayload extends MutationPayload {
  task_id: number;
  task_name: string;
  old_status: TaskStatus;
  new_status: TaskStatus;
}

export interface TaskAssignmentPayload extends MutationPayload {
  task_id: number;
  task_name: string;
  member_name: string;
}

export interface TaskCreatedPayload extends MutationPayload {
  task_id: number;
  task_name: string;
  deadline: string | null;
  assigned_to: string[];
}

export interface ProjectCreatedPayload extends MutationPayload {
  project_id: number;
  project_name: string;
  team_members: string[];
}

export interface ProjectMemberAddedPayload extends MutationPayload {
  project_id: number;
  project_name: string;
  member_name: string;
}

export interface TopicCreatedPayload extends MutationPayload {
  topic_id: number;
  topic_name: string;
}

export interface TopicLinkedPayload extends MutationPayload {
  meeting_id: number;
  topic_id: number;
  topic_created: boolean;
}

export type QueryPayload =
  | IdentityPayload
  | MyTasksPayload
  | AllTasksPayload
  | MemberInfoPayload
  | MeetingInfoPayload
  | MemberMeetingsPayload
  | MissedMeetingsPayload
  | ProjectInfoPayload
  | AllProjectsPayload
  | AllMembersPayload
  | TopicInfoPayload
  | SearchPayload
  | CurrentDateTimePayload;

export type ToolPayload =
  | ErrorPayload
  | QueryPayload
  | MutationPayload
  | TaskStatusUpdatePayload
  | TaskAssignmentPayload
  | TaskCreatedPayload
  | ProjectCreatedPayload
  | ProjectMemberAddedPayload
  | TopicCreatedPayload
  | TopicLinkedPayload;
