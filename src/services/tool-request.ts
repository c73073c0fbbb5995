/**
 * Converts a validated argument bag into the typed request for its tool.
 */

import {
  SEARCH_SCOPES,
  STATUS_FILTERS,
  SearchScope,
  StatusFilter,
  ToolName,
  ToolRequest
} from '../types/tool.types';

export class ToolArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolArgumentError';
  }
}

type ArgumentBag = Record<string, unknown>;

function requireString(args: ArgumentBag, field: string): string {
  const value = args[field];
  if (typeof value !== 'string') {
    throw new ToolArgumentError(`Missing required field: ${field}`);
  }
  return value;
}

function optionalString(args: ArgumentBag, field: string): string | undefined {
  const value = args[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ToolArgumentError(`Field '${field}' must be of type string`);
  }
  return value;
}

function optionalBoolean(args: ArgumentBag, field: string): boolean {
  const value = args[field];
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value !== 'boolean') {
    throw new ToolArgumentError(`Field '${field}' must be of type boolean`);
  }
  return value;
}

function optionalStringList(args: ArgumentBag, field: string): string[] {
  const value = args[field];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ToolArgumentError(`Field '${field}' must be of type array`);
  }
  return value.map((item: unknown, index) => {
    if (typeof item !== 'string') {
      throw new ToolArgumentError(`Field '${field}[${index}]' must be of type string`);
    }
    return item;
  });
}

function optionalChoice<T extends string>(
  args: ArgumentBag,
  field: string,
  choices: readonly T[],
  fallback: T
): T {
  const value = optionalString(args, field);
  if (value === undefined) {
    return fallback;
  }
  const choice = choices.find((candidate) => candidate === value);
  if (!choice) {
    throw new ToolArgumentError(`Field '${field}' must be one of: ${choices.join(', ')}`);
  }
  return choice;
}

export function parseToolRequest(tool: ToolName, args: ArgumentBag): ToolRequest {
  switch (tool) {
    case 'get_my_tasks':
    case 'get_current_datetime':
    case 'get_my_identity':
    case 'get_missed_meetings':
    case 'get_all_projects':
    case 'get_all_members':
      return { tool };
    case 'get_all_tasks':
      return { tool, statusFilter: optionalChoice<StatusFilter>(args, 'status_filter', STATUS_FILTERS, 'all') };
    case 'get_member_info':
    case 'get_meetings_for_member':
      return { tool, memberName: requireString(args, 'member_name') };
    case 'get_meeting_info':
      return { tool, meetingIdentifier: requireString(args, 'meeting_identifier') };
    case 'get_project_info':
      return { tool, projectName: requireString(args, 'project_name') };
    case 'get_topic_info':
      return { tool, topicName: requireString(args, 'topic_name') };
    case 'search_database':
      return {
        tool,
        searchQuery: requireString(args, 'search_query'),
        searchIn: optionalChoice<SearchScope>(args, 'search_in', SEARCH_SCOPES, 'all')
      };
    case 'update_task_status':
      return {
        tool,
        taskIdentifier: requireString(args, 'task_identifier'),
        newStatus: requireString(args, 'new_status')
      };
    case 'assign_member_to_task':
    case 'remove_member_from_task':
      return {
        tool,
        taskIdentifier: requireString(args, 'task_identifier'),
        memberName: requireString(args, 'member_name')
      };
    case 'create_task':
      return {
        tool,
        taskName: requireString(args, 'task_name'),
        description: optionalString(args, 'task_description'),
        deadline: optionalString(args, 'deadline'),
        assignedTo: optionalStringList(args, 'assigned_to'),
        assignToCurrentUser: optionalBoolean(args, 'assign_to_current_user')
      };
    case 'create_project':
      return {
        tool,
        projectName: requireString(args, 'project_name'),
        description: optionalString(args, 'project_description'),
        teamMembers: optionalStringList(args, 'team_members')
      };
    case 'add_member_to_project':
      return {
        tool,
        projectName: requireString(args, 'project_name'),
        memberName: requireString(args, 'member_name')
      };
    case 'create_topic':
      return {
        tool,
        topicName: requireString(args, 'topic_name'),
        description: optionalString(args, 'topic_description')
      };
    case 'add_topic_to_meeting':
      return {
        tool,
        meetingIdentifier: requireString(args, 'meeting_identifier'),
        topicName: requireString(args, 'topic_name')
      };
  }
}
