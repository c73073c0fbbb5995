/**
 * Query Service
 *
 * Read-only tool operations. Each call runs in its own store transaction and
 * returns either a payload or an `{ error }` record; nothing is thrown for
 * not-found, ambiguous or unlinked-caller cases.
 */

import {
  AllMembersPayload,
  AllProjectsPayload,
  AllTasksPayload,
  ErrorPayload,
  IdentityPayload,
  MeetingInfoPayload,
  MeetingSummary,
  MemberInfoPayload,
  MemberMeetingsPayload,
  MissedMeetingsPayload,
  MyTasksPayload,
  ProjectInfoPayload,
  SearchPayload,
  SearchResults,
  SearchScope,
  StatusFilter,
  TaskSummary,
  TopicInfoPayload
} from '../types/tool.types';
import { MeetingRow, MemberRow, TaskRow } from '../types/record.types';
import { formatDateInTimeZone } from '../utils/date';
import { truncateWithEllipsis } from '../utils/text';
import { MemberResolver, getMemberResolver } from './member-resolver.service';
import { describeResolutionFailure, resolveRecord } from './record-resolver';
import { RecordSession, RecordStore, getRecordStore } from './record-store';

export const IDENTITY_UNLINKED_ERROR =
  'Could not find your member record. Your chat account may not be linked to a member.';

export const SUMMARY_PREVIEW_CHARS = 200;
export const DESCRIPTION_PREVIEW_CHARS = 100;
export const SEARCH_RESULT_LIMIT = 10;

/**
 * The member linked to the caller's chat identity, if any
 */
export async function findCallerMember(
  session: RecordSession,
  callerId: string | null | undefined
): Promise<MemberRow | null> {
  if (!callerId) {
    return null;
  }
  return session.findMemberByChatId(callerId);
}

export function memberNotFound(memberName: string): ErrorPayload {
  return { error: `Could not find a member matching '${memberName}'` };
}

function toTaskSummary(task: TaskRow): TaskSummary {
  return {
    task_id: task.id,
    name: task.name,
    description: task.description,
    deadline: task.deadline,
    status: task.status
  };
}

export interface QueryServiceOptions {
  timeZone?: string;
}

export class QueryService {
  private store: RecordStore;
  private memberResolver: MemberResolver;
  private timeZone?: string;

  constructor(store?: RecordStore, memberResolver?: MemberResolver, options?: QueryServiceOptions) {
    this.store = store || getRecordStore();
    this.memberResolver = memberResolver || getMemberResolver();
    this.timeZone = options?.timeZone;
  }

  // ============================================
  // Caller-scoped queries
  // ============================================

  async getMyIdentity(callerId: string | null | undefined): Promise<IdentityPayload | ErrorPayload> {
    return this.store.transaction(async (session) => {
      const member = await findCallerMember(session, callerId);
      if (!member) {
        return { error: IDENTITY_UNLINKED_ERROR };
      }
      return {
        message: `You are ${member.name}.`,
        member: {
          id: member.id,
          name: member.name,
          email: member.email,
          role: member.role,
          subgroup: member.subgroup,
          chat_id: member.chatId
        }
      };
    });
  }

  async getMyTasks(callerId: string | null | undefined): Promise<MyTasksPayload | ErrorPayload> {
    return this.store.transaction(async (session) => {
      const member = await findCallerMember(session, callerId);
      if (!member) {
        return { error: IDENTITY_UNLINKED_ERROR };
      }

      const tasks = (await session.listLinked('task_member', 'task', member.id)).map(toTaskSummary);
      if (tasks.length === 0) {
        return { message: `You (${member.name}) have no tasks assigned.`, tasks: [] };
      }
      return { message: `Found ${tasks.length} task(s) for ${member.name}`, tasks };
    });
  }

  async getMissedMeetings(callerId: string | null | undefined): Promise<MissedMeetingsPayload | ErrorPayload> {
    return this.store.transaction(async (session) => {
      const member = await findCallerMember(session, callerId);
      if (!member) {
        return { error: IDENTITY_UNLINKED_ERROR };
      }

      const allMeetings = await session.listAll('meeting');
      const attended = new Set(
        (await session.listLinked('meeting_member', 'meeting', member.id)).map((meeting) => meeting.id)
      );

      const missed: MissedMeetingsPayload['missed_meetings'] = [];
      for (const meeting of allMeetings) {
        if (attended.has(meeting.id)) continue;
        const topics = await session.listLinked('meeting_topic', 'topic', meeting.id);
        missed.push({
          ...this.toMeetingSummary(meeting),
          summary: truncateWithEllipsis(meeting.summary, SUMMARY_PREVIEW_CHARS),
          topics: topics.map((topic) => topic.name)
        });
      }

      if (missed.length === 0) {
        return { message: `You (${member.name}) have attended all meetings!`, missed_meetings: [] };
      }
      return { message: `You missed ${missed.length} meeting(s)`, missed_meetings: missed };
    });
  }

  // ============================================
  // Lookups
  // ============================================

  async getAllTasks(statusFilter: StatusFilter = 'all'): Promise<AllTasksPayload> {
    return this.store.transaction(async (session) => {
      const tasks = (await session.listAll('task')).filter(
        (task) => statusFilter === 'all' || task.status === statusFilter
      );

      const payloadTasks: AllTasksPayload['tasks'] = [];
      for (const task of tasks) {
        const assignees = await session.listLinked('task_member', 'member', task.id);
        payloadTasks.push({ ...toTaskSummary(task), assigned_to: assignees.map((member) => member.name) });
      }

      const filterNote = statusFilter !== 'all' ? ` with status '${statusFilter}'` : '';
      return { message: `Found ${payloadTasks.length} task(s)${filterNote}`, tasks: payloadTasks };
    });
  }

  async getMemberInfo(memberName: string): Promise<MemberInfoPayload | ErrorPayload> {
    const matched = await this.memberResolver.resolve(memberName);
    if (!matched) {
      return memberNotFound(memberName);
    }

    return this.store.transaction(async (session) => {
      // The name index may predate deletions, so confirm the row still exists
      const member = await session.findById('member', matched.id);
      if (!member) {
        return { error: 'Member record not found' };
      }

      // One client per transaction: queries run one at a time
      const projects = await session.listLinked('project_member', 'project', member.id);
      const tasks = await session.listLinked('task_member', 'task', member.id);

      return {
        message: `Found member ${member.name}`,
        member_id: member.id,
        name: member.name,
        email: member.email,
        role: member.role,
        subgroup: member.subgroup,
        chat_id: member.chatId,
        projects: projects.map((project) => project.name),
        tasks: tasks.map((task) => ({ name: task.name, status: task.status }))
      };
    });
  }

  async getMeetingInfo(meetingIdentifier: string): Promise<MeetingInfoPayload | ErrorPayload> {
    return this.store.transaction(async (session) => {
      const resolution = await resolveRecord(session, 'meeting', meetingIdentifier);
      if (resolution.status !== 'found') {
        return describeResolutionFailure('meeting', meetingIdentifier, resolution);
      }
      const meeting = resolution.record;

      const attendees = await session.listLinked('meeting_member', 'member', meeting.id);
      const topics = await session.listLinked('meeting_topic', 'topic', meeting.id);
      const tasks = await session.listLinked('meeting_task', 'task', meeting.id);
      const projects = await session.listLinked('meeting_project', 'project', meeting.id);

      return {
        message: `Found meeting '${meeting.name}'`,
        meeting_id: meeting.id,
        name: meeting.name,
        type: meeting.type,
        summary: meeting.summary,
        date: this.formatMeetingDate(meeting),
        attendees: attendees.map((member) => member.name),
        topics: topics.map((topic) => topic.name),
        tasks: tasks.map((task) => ({ name: task.name, status: task.status })),
        projects: projects.map((project) => project.name)
      };
    });
  }

  async getMeetingsForMember(memberName: string): Promise<MemberMeetingsPayload | ErrorPayload> {
    const member = await this.memberResolver.resolve(memberName);
    if (!member) {
      return memberNotFound(memberName);
    }

    return this.store.transaction(async (session) => {
      const meetings = await session.listLinked('meeting_member', 'meeting', member.id);
      return {
        message: `Found ${meetings.length} meeting(s) for ${member.name}`,
        meetings: meetings.map((meeting) => this.toMeetingSummary(meeting))
      };
    });
  }

  async getProjectInfo(projectName: string): Promise<ProjectInfoPayload | ErrorPayload> {
    return this.store.transaction(async (session) => {
      const resolution = await resolveRecord(session, 'project', projectName, { preferExactName: true });
      if (resolution.status !== 'found') {
        return describeResolutionFailure('project', projectName, resolution);
      }
      const project = resolution.record;

      const members = await session.listLinked('project_member', 'member', project.id);
      const tasks = await session.listLinked('project_task', 'task', project.id);

      return {
        message: `Found project '${project.name}'`,
        project_id: project.id,
        name: project.name,
        description: project.description,
        team_members: members.map((member) => ({ name: member.name, role: member.role })),
        tasks: tasks.map((task) => ({ name: task.name, status: task.status, deadline: task.deadline }))
      };
    });
  }

  async getAllProjects(): Promise<AllProjectsPayload> {
    return this.store.transaction(async (session) => {
      const projects: AllProjectsPayload['projects'] = [];
      for (const project of await session.listAll('project')) {
        const members = await session.listLinked('project_member', 'member', project.id);
        projects.push({
          project_id: project.id,
          name: project.name,
          description: truncateWithEllipsis(project.description, DESCRIPTION_PREVIEW_CHARS),
          member_count: members.length
        });
      }
      return { message: `Found ${projects.length} project(s)`, projects };
    });
  }

  async getAllMembers(): Promise<AllMembersPayload> {
    return this.store.transaction(async (session) => {
      const members = (await session.listAll('member')).map((member) => ({
        member_id: member.id,
        name: member.name,
        role: member.role,
        subgroup: member.subgroup,
        email: member.email
      }));
      return { message: `Found ${members.length} member(s)`, members };
    });
  }

  async getTopicInfo(topicName: string): Promise<TopicInfoPayload | ErrorPayload> {
    return this.store.transaction(async (session) => {
      const resolution = await resolveRecord(session, 'topic', topicName);
      if (resolution.status !== 'found') {
        return describeResolutionFailure('topic', topicName, resolution);
      }
      const topic = resolution.record;
      const meetings = await session.listLinked('meeting_topic', 'meeting', topic.id);

      return {
        message: `Found topic '${topic.name}'`,
        topic_id: topic.id,
        name: topic.name,
        description: topic.description,
        discussed_in_meetings: meetings.map((meeting) => ({ name: meeting.name, type: meeting.type }))
      };
    });
  }

  // ============================================
  // Free-text search
  // ============================================

  async searchDatabase(searchQuery: string, searchIn: SearchScope = 'all'): Promise<SearchPayload | ErrorPayload> {
    if (!searchQuery.trim()) {
      return { error: 'Search query cannot be empty' };
    }
    const includes = (scope: Exclude<SearchScope, 'all'>) => searchIn === 'all' || searchIn === scope;

    return this.store.transaction(async (session) => {
      const results: SearchResults = {};

      if (includes('members')) {
        const members = await session.search('member', searchQuery, SEARCH_RESULT_LIMIT);
        if (members.length > 0) {
          results.members = members.map((member) => ({ name: member.name, role: member.role, email: member.email }));
        }
      }

      if (includes('meetings')) {
        const meetings = await session.search('meeting', searchQuery, SEARCH_RESULT_LIMIT);
        if (meetings.length > 0) {
          results.meetings = meetings.map((meeting) => ({ name: meeting.name, type: meeting.type }));
        }
      }

      if (includes('projects')) {
        const projects = await session.search('project', searchQuery, SEARCH_RESULT_LIMIT);
        if (projects.length > 0) {
          results.projects = projects.map((project) => ({
            name: project.name,
            description: project.description ? project.description.slice(0, DESCRIPTION_PREVIEW_CHARS) : null
          }));
        }
      }

      if (includes('tasks')) {
        const tasks = await session.search('task', searchQuery, SEARCH_RESULT_LIMIT);
        if (tasks.length > 0) {
          results.tasks = tasks.map((task) => ({ name: task.name, status: task.status }));
        }
      }

      if (includes('topics')) {
        const topics = await session.search('topic', searchQuery, SEARCH_RESULT_LIMIT);
        if (topics.length > 0) {
          results.topics = topics.map((topic) => ({ name: topic.name }));
        }
      }

      if (Object.keys(results).length === 0) {
        return { message: `No results found for '${searchQuery}'` };
      }
      return { message: `Search results for '${searchQuery}'`, results };
    });
  }

  private formatMeetingDate(meeting: MeetingRow): string | null {
    return meeting.ingestedAt ? formatDateInTimeZone(meeting.ingestedAt, this.timeZone) : null;
  }

  private toMeetingSummary(meeting: MeetingRow): MeetingSummary {
    return {
      meeting_id: meeting.id,
      name: meeting.name,
      type: meeting.type,
      date: this.formatMeetingDate(meeting)
    };
  }
}

// ============================================
// Singleton Instance
// ============================================

let queryServiceInstance: QueryService | null = null;

export function getQueryService(): QueryService {
  if (!queryServiceInstance) {
    queryServiceInstance = new QueryService();
  }
  return queryServiceInstance;
}

/**
 * Reset the singleton instance (for testing)
 */
export function resetQueryService(): void {
  queryServiceInstance = null;
}
