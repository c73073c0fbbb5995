import { InMemoryRecordStore } from './in-memory-store';

export const MICHAEL_CHAT_ID = '1001';
export const SAM_CHAT_ID = '1002';
export const ALEX_CHAT_ID = '1003';

export const LONG_SUMMARY = 'B'.repeat(250);
export const LONG_DESCRIPTION = 'G'.repeat(120);

/**
 * A small organisation:
 *
 *   members   1 Michael Huang, 2 Sam Lee, 3 Alex Kim (linked, but no tasks or meetings)
 *   tasks     1 Book venue (2024-03-01), 2 Draft budget (no deadline, no status),
 *             3 Send invites (2024-01-15, stored as "Complete")
 *   meetings  1 Kickoff (2024-01-10), 2 Budget sync (2024-02-05 23:30 UTC), 3 Design review (2024-02-20)
 *   projects  1 Spring Gala, 2 Website
 *   topics    1 Venue options, 2 Sponsorship
 *
 * Michael attended meetings 1 and 3; Sam attended 1 and 2.
 */
export function seedOrganization(store: InMemoryRecordStore): void {
  store.addMember({ name: 'Michael Huang', chatId: MICHAEL_CHAT_ID, role: 'President', subgroup: 'Exec', email: 'michael@example.org' });
  store.addMember({ name: 'Sam Lee', chatId: SAM_CHAT_ID, role: 'Treasurer', subgroup: 'Finance', email: 'sam@example.org' });
  store.addMember({ name: 'Alex Kim', chatId: ALEX_CHAT_ID, role: 'Designer', subgroup: 'Marketing', email: 'alex@example.org' });

  store.addTask({ name: 'Book venue', description: 'Reserve the hall', deadline: '2024-03-01', status: 'incomplete' });
  store.addTask({ name: 'Draft budget', status: null });
  store.addTask({ name: 'Send invites', deadline: '2024-01-15', status: 'Complete' });

  store.addMeeting({
    name: 'Kickoff',
    type: 'General',
    summary: 'Planned the gala venue and invites.',
    ingestedAt: new Date('2024-01-10T09:00:00Z')
  });
  store.addMeeting({
    name: 'Budget sync',
    type: 'Finance',
    summary: LONG_SUMMARY,
    ingestedAt: new Date('2024-02-05T23:30:00Z')
  });
  store.addMeeting({
    name: 'Design review',
    type: 'Marketing',
    summary: null,
    ingestedAt: new Date('2024-02-20T15:00:00Z')
  });

  store.addProject({ name: 'Spring Gala', description: LONG_DESCRIPTION });
  store.addProject({ name: 'Website' });

  store.addTopic({ name: 'Venue options', description: 'Where to host' });
  store.addTopic({ name: 'Sponsorship' });

  store.link('task_member', 1, 1);
  store.link('task_member', 2, 1);
  store.link('task_member', 3, 1);
  store.link('task_member', 3, 2);

  store.link('meeting_member', 1, 1);
  store.link('meeting_member', 3, 1);
  store.link('meeting_member', 1, 2);
  store.link('meeting_member', 2, 2);

  store.link('meeting_topic', 1, 1);
  store.link('meeting_topic', 2, 2);
  store.link('meeting_task', 1, 1);
  store.link('meeting_project', 1, 1);

  store.link('project_member', 1, 1);
  store.link('project_member', 1, 2);
  store.link('project_task', 1, 1);
  store.link('project_task', 1, 2);
}
