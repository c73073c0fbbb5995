/**
 * Mutation Service
 *
 * Write operations behind the tool catalog. Every operation resolves its
 * targets and runs its guard checks before the first write, and all writes of
 * one call share a single store transaction.
 */

import {
  CreateProjectArgs,
  CreateTaskArgs,
  ErrorPayload,
  ProjectCreatedPayload,
  ProjectMemberAddedPayload,
  TaskAssignmentPayload,
  TaskCreatedPayload,
  TaskStatusUpdatePayload,
  TopicCreatedPayload,
  TopicLinkedPayload
} from '../types/tool.types';
import { DEFAULT_TASK_STATUS, MemberRow, TopicRow } from '../types/record.types';
import { parseDeadline } from '../utils/date';
import { isTaskStatus } from '../utils/task-status';
import { MemberResolver, getMemberResolver } from './member-resolver.service';
import { IDENTITY_UNLINKED_ERROR, findCallerMember, memberNotFound } from './query.service';
import { describeResolutionFailure, resolveRecord } from './record-resolver';
import { RecordStore, getRecordStore } from './record-store';

export const INVALID_STATUS_ERROR = "Status must be 'complete' or 'incomplete'";
export const INVALID_DEADLINE_ERROR = 'Invalid deadline format. Please use YYYY-MM-DD';

function blankName(label: string): ErrorPayload {
  return { error: `${label} name cannot be empty` };
}

function optionalText(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export class MutationService {
  private store: RecordStore;
  private memberResolver: MemberResolver;

  constructor(store?: RecordStore, memberResolver?: MemberResolver) {
    this.store = store || getRecordStore();
    this.memberResolver = memberResolver || getMemberResolver();
  }

  // ============================================
  // Tasks
  // ============================================

  async updateTaskStatus(taskIdentifier: string, newStatus: string): Promise<TaskStatusUpdatePayload | ErrorPayload> {
    const status = newStatus.trim().toLowerCase();
    if (!isTaskStatus(status)) {
      return { error: INVALID_STATUS_ERROR };
    }

    return this.store.transaction<TaskStatusUpdatePayload | ErrorPayload>(async (session) => {
      const resolution = await resolveRecord(session, 'task', taskIdentifier);
      if (resolution.status !== 'found') {
        return describeResolutionFailure('task', taskIdentifier, resolution);
      }
      const task = resolution.record;

      await session.updateTaskStatus(task.id, status);
      return {
        success: true,
        message: `Task '${task.name}' status updated from '${task.status}' to '${status}'`,
        task_id: task.id,
        task_name: task.name,
        old_status: task.status,
        new_status: status
      };
    });
  }

  async assignMemberToTask(taskIdentifier: string, memberName: string): Promise<TaskAssignmentPayload | ErrorPayload> {
    const member = await this.memberResolver.resolve(memberName);
    if (!member) {
      return memberNotFound(memberName);
    }

    return this.store.transaction<TaskAssignmentPayload | ErrorPayload>(async (session) => {
      const resolution = await resolveRecord(session, 'task', taskIdentifier);
      if (resolution.status !== 'found') {
        return describeResolutionFailure('task', taskIdentifier, resolution);
      }
      const task = resolution.record;

      if (await session.hasLink('task_member', task.id, member.id)) {
        return { error: `${member.name} is already assigned to '${task.name}'` };
      }

      await session.addLink('task_member', task.id, member.id);
      return {
        success: true,
        message: `Assigned ${member.name} to task '${task.name}'`,
        task_id: task.id,
        task_name: task.name,
        member_name: member.name
      };
    });
  }

  async removeMemberFromTask(taskIdentifier: string, memberName: string): Promise<TaskAssignmentPayload | ErrorPayload> {
    const member = await this.memberResolver.resolve(memberName);
    if (!member) {
      return memberNotFound(memberName);
    }

    return this.store.transaction<TaskAssignmentPayload | ErrorPayload>(async (session) => {
      const resolution = await resolveRecord(session, 'task', taskIdentifier);
      if (resolution.status !== 'found') {
        return describeResolutionFailure('task', taskIdentifier, resolution);
      }
      const task = resolution.record;

      const removed = await session.removeLink('task_member', task.id, member.id);
      if (removed === 0) {
        return { error: `${member.name} was not assigned to '${task.name}'` };
      }

      return {
        success: true,
        message: `Removed ${member.name} from task '${task.name}'`,
        task_id: task.id,
        task_name: task.name,
        member_name: member.name
      };
    });
  }

  /**
   * Create a task, assigning every listed member (and optionally the caller).
   * Nothing is written unless every assignee resolves.
   */
  async createTask(args: CreateTaskArgs, callerId?: string | null): Promise<TaskCreatedPayload | ErrorPayload> {
    const taskName = args.taskName.trim();
    if (!taskName) {
      return blankName('Task');
    }

    const deadline = parseDeadline(args.deadline);
    if (!deadline.valid) {
      return { error: INVALID_DEADLINE_ERROR };
    }

    const resolved = await this.memberResolver.resolveAll(args.assignedTo);
    if ('unresolved' in resolved) {
      return memberNotFound(resolved.unresolved);
    }

    return this.store.transaction<TaskCreatedPayload | ErrorPayload>(async (session) => {
      const assignees = [...resolved.members];
      if (args.assignToCurrentUser) {
        const caller = await findCallerMember(session, callerId);
        if (!caller) {
          return { error: IDENTITY_UNLINKED_ERROR };
        }
        assignees.push(caller);
      }
      const members = uniqueMembers(assignees);

      const task = await session.insertTask({
        name: taskName,
        description: optionalText(args.description),
        deadline: deadline.deadline,
        status: DEFAULT_TASK_STATUS
      });
      for (const member of members) {
        await session.addLink('task_member', task.id, member.id);
      }

      const names = members.map((member) => member.name);
      return {
        success: true,
        message: `Created task '${task.name}'` + (names.length > 0 ? ` and assigned to ${names.join(', ')}` : ''),
        task_id: task.id,
        task_name: task.name,
        deadline: task.deadline,
        assigned_to: names
      };
    });
  }

  // ============================================
  // Projects
  // ============================================

  async createProject(args: CreateProjectArgs): Promise<ProjectCreatedPayload | ErrorPayload> {
    const projectName = args.projectName.trim();
    if (!projectName) {
      return blankName('Project');
    }

    const resolved = await this.memberResolver.resolveAll(args.teamMembers);
    if ('unresolved' in resolved) {
      return memberNotFound(resolved.unresolved);
    }
    const members = uniqueMembers(resolved.members);

    return this.store.transaction<ProjectCreatedPayload | ErrorPayload>(async (session) => {
      if (await session.findByExactName('project', projectName)) {
        return { error: `A project named '${projectName}' already exists` };
      }

      const project = await session.insertProject({
        name: projectName,
        description: optionalText(args.description)
      });
      for (const member of members) {
        await session.addLink('project_member', project.id, member.id);
      }

      const names = members.map((member) => member.name);
      return {
        success: true,
        message: `Created project '${project.name}'` + (names.length > 0 ? ` with team: ${names.join(', ')}` : ''),
        project_id: project.id,
        project_name: project.name,
        team_members: names
      };
    });
  }

  async addMemberToProject(projectName: string, memberName: string): Promise<ProjectMemberAddedPayload | ErrorPayload> {
    const member = await this.memberResolver.resolve(memberName);
    if (!member) {
      return memberNotFound(memberName);
    }

    return this.store.transaction<ProjectMemberAddedPayload | ErrorPayload>(async (session) => {
      const resolution = await resolveRecord(session, 'project', projectName, { preferExactName: true });
      if (resolution.status !== 'found') {
        return describeResolutionFailure('project', projectName, resolution);
      }
      const project = resolution.record;

      if (await session.hasLink('project_member', project.id, member.id)) {
        return { error: `${member.name} is already a member of '${project.name}'` };
      }

      await session.addLink('project_member', project.id, member.id);
      return {
        success: true,
        message: `Added ${member.name} to project '${project.name}'`,
        project_id: project.id,
        project_name: project.name,
        member_name: member.name
      };
    });
  }

  // ============================================
  // Topics
  // ============================================

  async createTopic(topicName: string, description?: string): Promise<TopicCreatedPayload | ErrorPayload> {
    const name = topicName.trim();
    if (!name) {
      return blankName('Topic');
    }

    return this.store.transaction<TopicCreatedPayload | ErrorPayload>(async (session) => {
      if (await session.findByExactName('topic', name)) {
        return { error: `A topic named '${name}' already exists` };
      }

      const topic = await session.insertTopic({ name, description: optionalText(description) });
      return {
        success: true,
        message: `Created topic '${topic.name}'`,
        topic_id: topic.id,
        topic_name: topic.name
      };
    });
  }

  /**
   * Link a topic to a meeting, creating the topic when no existing one matches
   */
  async addTopicToMeeting(meetingIdentifier: string, topicName: string): Promise<TopicLinkedPayload | ErrorPayload> {
    const name = topicName.trim();
    if (!name) {
      return blankName('Topic');
    }

    return this.store.transaction<TopicLinkedPayload | ErrorPayload>(async (session) => {
      const meetingResolution = await resolveRecord(session, 'meeting', meetingIdentifier);
      if (meetingResolution.status !== 'found') {
        return describeResolutionFailure('meeting', meetingIdentifier, meetingResolution);
      }
      const meeting = meetingResolution.record;

      const topicResolution = await resolveRecord(session, 'topic', name);
      if (topicResolution.status === 'ambiguous') {
        return describeResolutionFailure('topic', name, topicResolution);
      }

      let topicCreated = false;
      let topic: TopicRow;
      if (topicResolution.status === 'found') {
        topic = topicResolution.record;
        if (await session.hasLink('meeting_topic', meeting.id, topic.id)) {
          return { error: `Topic '${topic.name}' is already linked to meeting '${meeting.name}'` };
        }
      } else {
        topic = await session.insertTopic({ name, description: null });
        topicCreated = true;
      }

      await session.addLink('meeting_topic', meeting.id, topic.id);
      return {
        success: true,
        message: `Linked topic '${topic.name}' to meeting '${meeting.name}'`,
        meeting_id: meeting.id,
        topic_id: topic.id,
        topic_created: topicCreated
      };
    });
  }
}

/**
 * Drop repeated members, keeping first occurrence order
 */
function uniqueMembers(members: readonly MemberRow[]): MemberRow[] {
  const seen = new Set<number>();
  return members.filter((member) => {
    if (seen.has(member.id)) return false;
    seen.add(member.id);
    return true;
  });
}

// ============================================
// Singleton Instance
// ============================================

let mutationServiceInstance: MutationService | null = null;

export function getMutationService(): MutationService {
  if (!mutationServiceInstance) {
    mutationServiceInstance = new MutationService();
  }
  return mutationServiceInstance;
}

/**
 * Reset the singleton instance (for testing)
 */
export function resetMutationService(): void {
  mutationServiceInstance = null;
}
