/**
 * Unit tests for ToolExecutor
 * Tests validation, dispatch and the error envelope
 */

import { MemberDirectory, MemberResolver } from '../../../src/services/member-resolver.service';
import { MutationService } from '../../../src/services/mutation.service';
import { QueryService } from '../../../src/services/query.service';
import { RecordStore } from '../../../src/services/record-store';
import { ToolExecutor, normalizeCallerId } from '../../../src/services/tool-executor';
import { ToolRegistry } from '../../../src/services/tool-registry';
import { InMemoryRecordStore } from '../../helpers/in-memory-store';
import { MICHAEL_CHAT_ID, seedOrganization } from '../../helpers/fixtures';

function buildExecutor(store: RecordStore, now?: () => Date): ToolExecutor {
  const resolver = new MemberResolver(MemberDirectory.fromStore(store), { fuzzyCutoff: 0.6, firstNameMatch: true });
  return new ToolExecutor(
    new ToolRegistry(),
    new QueryService(store, resolver, { timeZone: 'UTC' }),
    new MutationService(store, resolver),
    { now, timeZone: 'UTC' }
  );
}

describe('ToolExecutor', () => {
  let store: InMemoryRecordStore;
  let executor: ToolExecutor;

  beforeEach(() => {
    store = new InMemoryRecordStore();
    seedOrganization(store);
    executor = buildExecutor(store, () => new Date('2024-03-10T14:05:09Z'));
  });

  // ============================================
  // Validation
  // ============================================

  describe('validation', () => {
    it('should reject unknown tools without touching storage', async () => {
      const result = await executor.execute({ name: 'delete_everything', arguments: {} });

      expect(result).toEqual({ error: 'Unknown tool: delete_everything' });
      expect(store.transactionCount).toBe(0);
    });

    it('should report schema violations as invalid arguments', async () => {
      expect(await executor.execute({ name: 'get_member_info', arguments: {} })).toEqual({
        error: 'Invalid arguments: Missing required field: member_name'
      });
      expect(await executor.execute({ name: 'update_task_status', arguments: { task_identifier: '1', new_status: 'done' } })).toEqual({
        error: "Invalid arguments: Field 'new_status' must be one of: complete, incomplete"
      });
      expect(store.transactionCount).toBe(0);
    });
  });

  // ============================================
  // Dispatch
  // ============================================

  describe('dispatch', () => {
    it('should route lookups to the query service', async () => {
      expect(await executor.execute({ name: 'get_topic_info', arguments: { topic_name: 'sponsor' } })).toEqual({
        message: "Found topic 'Sponsorship'",
        topic_id: 2,
        name: 'Sponsorship',
        description: null,
        discussed_in_meetings: [{ name: 'Budget sync', type: 'Finance' }]
      });
    });

    it('should route edits to the mutation service', async () => {
      const result = await executor.execute({
        name: 'update_task_status',
        arguments: { task_identifier: 'Draft budget', new_status: 'complete' }
      });

      expect(result).toEqual({
        success: true,
        message: "Task 'Draft budget' status updated from 'incomplete' to 'complete'",
        task_id: 2,
        task_name: 'Draft budget',
        old_status: 'incomplete',
        new_status: 'complete'
      });
    });

    it('should pass a numeric caller id as text', async () => {
      const result = await executor.execute({ name: 'get_my_identity', arguments: {} }, { callerId: 1001 });
      expect('message' in result && result.message).toBe('You are Michael Huang.');
    });

    it('should assign a created task to the caller', async () => {
      const result = await executor.execute(
        { name: 'create_task', arguments: { task_name: 'Order banners', assign_to_current_user: true } },
        { callerId: MICHAEL_CHAT_ID }
      );

      expect(result).toEqual({
        success: true,
        message: "Created task 'Order banners' and assigned to Michael Huang",
        task_id: 4,
        task_name: 'Order banners',
        deadline: null,
        assigned_to: ['Michael Huang']
      });
    });

    it('should report the current date and time in the configured zone', async () => {
      expect(await executor.execute({ name: 'get_current_datetime', arguments: {} })).toEqual({
        message: 'It is 2024-03-10 14:05:09 (UTC)',
        current_datetime_iso: '2024-03-10T14:05:09',
        current_date: '2024-03-10',
        current_time: '14:05:09',
        timezone: 'UTC'
      });
    });
  });

  // ============================================
  // Error envelope
  // ============================================

  describe('error envelope', () => {
    it('should turn a thrown error into an error payload', async () => {
      const consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      const failingStore: RecordStore = {
        transaction: jest.fn().mockRejectedValue(new Error('connection refused'))
      };
      const failing = buildExecutor(failingStore);

      const result = await failing.execute({ name: 'get_all_members', arguments: {} });

      expect(result).toEqual({ error: 'Tool execution failed: connection refused' });
      expect(consoleSpy).toHaveBeenCalledWith('Tool execution error:', expect.any(Error));
      consoleSpy.mockRestore();
    });
  });

  describe('getCurrentDateTime', () => {
    it('should report the zone it actually rendered in', () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const resolver = new MemberResolver(MemberDirectory.fromStore(store), { fuzzyCutoff: 0.6, firstNameMatch: true });
      const misconfigured = new ToolExecutor(
        new ToolRegistry(),
        new QueryService(store, resolver, { timeZone: 'UTC' }),
        new MutationService(store, resolver),
        { now: () => new Date('2024-03-10T14:05:09Z'), timeZone: 'Mars/Olympus' }
      );

      expect(misconfigured.getCurrentDateTime()).toEqual({
        message: 'It is 2024-03-10 14:05:09 (UTC)',
        current_datetime_iso: '2024-03-10T14:05:09',
        current_date: '2024-03-10',
        current_time: '14:05:09',
        timezone: 'UTC'
      });
      warn.mockRestore();
    });
  });

  describe('executeSerialized', () => {
    it('should return the payload as indented JSON', async () => {
      const text = await executor.executeSerialized({ name: 'delete_everything', arguments: {} });
      expect(text).toBe('{\n  "error": "Unknown tool: delete_everything"\n}');
    });
  });
});

describe('normalizeCallerId', () => {
  it('should convert numbers and trim strings', () => {
    expect(normalizeCallerId(1001)).toBe('1001');
    expect(normalizeCallerId(' 1002 ')).toBe('1002');
  });

  it('should map empty and missing ids to null', () => {
    expect(normalizeCallerId('   ')).toBeNull();
    expect(normalizeCallerId(undefined)).toBeNull();
    expect(normalizeCallerId(null)).toBeNull();
    expect(normalizeCallerId(Number.NaN)).toBeNull();
  });

  it('should refuse numbers that cannot hold the id exactly', () => {
    expect(normalizeCallerId(123456789012345678)).toBeNull();
    expect(normalizeCallerId(1001.5)).toBeNull();
    expect(normalizeCallerId('123456789012345678')).toBe('123456789012345678');
  });
});
