/**
 * Tool Executor
 *
 * Validates and executes tool calls against the query and mutation services.
 * Every call resolves to a payload: unknown tools, invalid arguments and
 * unexpected failures all come back as `{ error }` records instead of rejections.
 */

import { getConfig } from '../config/env';
import {
  CurrentDateTimePayload,
  ToolCall,
  ToolPayload,
  ToolRequest,
  isToolName
} from '../types/tool.types';
import { formatDateInTimeZone, formatTimeInTimeZone, resolveTimeZone } from '../utils/date';
import { MutationService, getMutationService } from './mutation.service';
import { QueryService, getQueryService } from './query.service';
import { ToolRegistry, getToolRegistry } from './tool-registry';
import { ToolArgumentError, parseToolRequest } from './tool-request';

/**
 * External chat identity of the person making the request
 */
export type CallerId = string | number | null | undefined;

export interface ToolExecutionOptions {
  callerId?: CallerId;
}

export interface ToolExecutorOptions {
  /** Clock used by get_current_datetime */
  now?: () => Date;
  /** Zone for get_current_datetime; defaults to the configured TIMEZONE */
  timeZone?: string;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled tool request: ${JSON.stringify(value)}`);
}

/**
 * Chat ids arrive as numbers or strings; the store keeps them as text.
 * Numbers beyond the safe integer range have already lost digits, so they
 * are treated as no caller. Integrations with 64-bit ids must send strings.
 */
export function normalizeCallerId(callerId: CallerId): string | null {
  if (typeof callerId === 'number') {
    return Number.isSafeInteger(callerId) ? String(callerId) : null;
  }
  const trimmed = callerId?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Executes tool calls by dispatching to the matching service operation
 */
export class ToolExecutor {
  private toolRegistry: ToolRegistry;
  private queryService: QueryService;
  private mutationService: MutationService;
  private now: () => Date;
  private timeZone?: string;

  constructor(
    toolRegistry?: ToolRegistry,
    queryService?: QueryService,
    mutationService?: MutationService,
    options?: ToolExecutorOptions
  ) {
    this.toolRegistry = toolRegistry || getToolRegistry();
    this.queryService = queryService || getQueryService();
    this.mutationService = mutationService || getMutationService();
    this.now = options?.now || (() => new Date());
    this.timeZone = options?.timeZone;
  }

  /**
   * Execute a tool call and return its payload
   */
  async execute(toolCall: ToolCall, options?: ToolExecutionOptions): Promise<ToolPayload> {
    const { name, arguments: args } = toolCall;

    if (!isToolName(name)) {
      return { error: `Unknown tool: ${name}` };
    }

    // Validate arguments against schema
    const validation = this.toolRegistry.validateArguments(name, args);
    if (!validation.valid) {
      return { error: `Invalid arguments: ${validation.errors?.join(', ')}` };
    }

    let request: ToolRequest;
    try {
      request = parseToolRequest(name, args);
    } catch (error) {
      if (error instanceof ToolArgumentError) {
        return { error: `Invalid arguments: ${error.message}` };
      }
      throw error;
    }

    try {
      return await this.dispatch(request, normalizeCallerId(options?.callerId));
    } catch (error) {
      console.error('Tool execution error:', error);
      const errorMessage = error instanceof Error ? error.message : String(error);
      return { error: `Tool execution failed: ${errorMessage}` };
    }
  }

  /**
   * Execute a tool call and return the payload as indented JSON
   */
  async executeSerialized(toolCall: ToolCall, options?: ToolExecutionOptions): Promise<string> {
    const payload = await this.execute(toolCall, options);
    return JSON.stringify(payload, null, 2);
  }

  getCurrentDateTime(): CurrentDateTimePayload {
    const now = this.now();
    const timeZone = resolveTimeZone(this.timeZone || getConfig().TIMEZONE);
    const currentDate = formatDateInTimeZone(now, timeZone);
    const currentTime = formatTimeInTimeZone(now, timeZone);
    return {
      message: `It is ${currentDate} ${currentTime} (${timeZone})`,
      current_datetime_iso: `${currentDate}T${currentTime}`,
      current_date: currentDate,
      current_time: currentTime,
      timezone: timeZone
    };
  }

  private async dispatch(request: ToolRequest, callerId: string | null): Promise<ToolPayload> {
    switch (request.tool) {
      // Caller-scoped
      case 'get_my_tasks':
        return this.queryService.getMyTasks(callerId);
      case 'get_my_identity':
        return this.queryService.getMyIdentity(callerId);
      case 'get_missed_meetings':
        return this.queryService.getMissedMeetings(callerId);

      case 'get_current_datetime':
        return this.getCurrentDateTime();

      // Retrieval
      case 'get_all_tasks':
        return this.queryService.getAllTasks(request.statusFilter);
      case 'get_member_info':
        return this.queryService.getMemberInfo(request.memberName);
      case 'get_meeting_info':
        return this.queryService.getMeetingInfo(request.meetingIdentifier);
      case 'get_meetings_for_member':
        return this.queryService.getMeetingsForMember(request.memberName);
      case 'get_project_info':
        return this.queryService.getProjectInfo(request.projectName);
      case 'get_all_projects':
        return this.queryService.getAllProjects();
      case 'get_all_members':
        return this.queryService.getAllMembers();
      case 'get_topic_info':
        return this.queryService.getTopicInfo(request.topicName);
      case 'search_database':
        return this.queryService.searchDatabase(request.searchQuery, request.searchIn);

      // Edits
      case 'update_task_status':
        return this.mutationService.updateTaskStatus(request.taskIdentifier, request.newStatus);
      case 'assign_member_to_task':
        return this.mutationService.assignMemberToTask(request.taskIdentifier, request.memberName);
      case 'remove_member_from_task':
        return this.mutationService.removeMemberFromTask(request.taskIdentifier, request.memberName);

      // Creation
      case 'create_task':
        return this.mutationService.createTask(request, callerId);
      case 'create_project':
        return this.mutationService.createProject(request);
      case 'add_member_to_project':
        return this.mutationService.addMemberToProject(request.projectName, request.memberName);
      case 'create_topic':
        return this.mutationService.createTopic(request.topicName, request.description);
      case 'add_topic_to_meeting':
        return this.mutationService.addTopicToMeeting(request.meetingIdentifier, request.topicName);

      default:
        return assertNever(request);
    }
  }
}

// ============================================
// Singleton Instance
// ============================================

let toolExecutorInstance: ToolExecutor | null = null;

/**
 * Get the singleton ToolExecutor instance
 */
export function getToolExecutor(): ToolExecutor {
  if (!toolExecutorInstance) {
    toolExecutorInstance = new ToolExecutor();
  }
  return toolExecutorInstance;
}

/**
 * Reset the singleton instance (for testing)
 */
export function resetToolExecutor(): void {
  toolExecutorInstance = null;
}
