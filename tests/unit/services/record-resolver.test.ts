/**
 * Unit tests for ID-or-name identifier resolution
 */

import {
  MAX_MATCH_CANDIDATES,
  describeResolutionFailure,
  parseRecordId,
  resolveRecord
} from '../../../src/services/record-resolver';
import { InMemoryRecordStore } from '../../helpers/in-memory-store';

describe('parseRecordId', () => {
  it('parses integer strings', () => {
    expect(parseRecordId('42')).toBe(42);
    expect(parseRecordId(' 7 ')).toBe(7);
    expect(parseRecordId('+3')).toBe(3);
    expect(parseRecordId('2147483647')).toBe(2147483647);
  });

  it('rejects anything else', () => {
    expect(parseRecordId('4.5')).toBeNull();
    expect(parseRecordId('12abc')).toBeNull();
    expect(parseRecordId('')).toBeNull();
    expect(parseRecordId('99999999999999999999')).toBeNull();
  });

  it('rejects numbers outside the id column range', () => {
    expect(parseRecordId('0')).toBeNull();
    expect(parseRecordId('-3')).toBeNull();
    expect(parseRecordId('2147483648')).toBeNull();
    expect(parseRecordId('3000000000')).toBeNull();
  });
});

describe('resolveRecord', () => {
  let store: InMemoryRecordStore;

  beforeEach(() => {
    store = new InMemoryRecordStore();
    store.addTask({ name: 'Budget review' });
    store.addTask({ name: 'Budget draft' });
    store.addTask({ name: 'Website launch' });
    store.addTask({ name: '2024 plan' });
  });

  it('looks up numeric identifiers by primary key first', async () => {
    const resolution = await store.transaction((session) => resolveRecord(session, 'task', '3'));
    expect(resolution).toEqual({
      status: 'found',
      record: { id: 3, name: 'Website launch', description: null, deadline: null, status: 'incomplete' }
    });
  });

  it('falls back to a name search when no row has that id', async () => {
    const resolution = await store.transaction((session) => resolveRecord(session, 'task', '2024'));
    expect(resolution.status === 'found' && resolution.record.id).toBe(4);
  });

  it('searches names without a key lookup for numbers past the id range', async () => {
    store.addTask({ name: 'Invoice 3000000000' });

    const resolution = await store.transaction(async (session) => {
      const findById = jest.spyOn(session, 'findById');
      const result = await resolveRecord(session, 'task', '3000000000');
      expect(findById).not.toHaveBeenCalled();
      return result;
    });

    expect(resolution.status === 'found' && resolution.record.name).toBe('Invoice 3000000000');
  });

  it('matches a case-insensitive name fragment', async () => {
    const resolution = await store.transaction((session) => resolveRecord(session, 'task', 'WEBSITE'));
    expect(resolution.status === 'found' && resolution.record.name).toBe('Website launch');
  });

  it('reports no match', async () => {
    const resolution = await store.transaction((session) => resolveRecord(session, 'task', 'payroll'));
    expect(resolution).toEqual({ status: 'not_found' });
  });

  it('reports several matches as ambiguous candidates', async () => {
    const resolution = await store.transaction((session) => resolveRecord(session, 'task', 'budget'));
    expect(resolution).toEqual({
      status: 'ambiguous',
      candidates: [
        { id: 1, name: 'Budget review' },
        { id: 2, name: 'Budget draft' }
      ]
    });
  });

  it('caps the candidate list', async () => {
    for (let i = 1; i <= 7; i++) {
      store.addTopic({ name: `Recruiting ${i}` });
    }
    const resolution = await store.transaction((session) => resolveRecord(session, 'topic', 'recruiting'));

    expect(resolution.status).toBe('ambiguous');
    if (resolution.status === 'ambiguous') {
      expect(resolution.candidates).toHaveLength(MAX_MATCH_CANDIDATES);
      expect(resolution.candidates.map((candidate) => candidate.id)).toEqual([1, 2, 3, 4, 5]);
    }
  });

  it('narrows to an exact name when asked', async () => {
    store.addProject({ name: 'Outreach' });
    store.addProject({ name: 'Outreach Phase 2' });

    const narrowed = await store.transaction((session) =>
      resolveRecord(session, 'project', 'outreach', { preferExactName: true })
    );
    expect(narrowed.status === 'found' && narrowed.record.id).toBe(1);

    const plain = await store.transaction((session) => resolveRecord(session, 'project', 'outreach'));
    expect(plain.status).toBe('ambiguous');
  });
});

describe('describeResolutionFailure', () => {
  it('describes a missing record', () => {
    expect(describeResolutionFailure('meeting', 'kickoff', { status: 'not_found' })).toEqual({
      error: "Could not find a meeting matching 'kickoff'"
    });
  });

  it('lists candidates for an ambiguous identifier', () => {
    const candidates = [{ id: 1, name: 'Budget review' }, { id: 2, name: 'Budget draft' }];
    expect(describeResolutionFailure('task', 'budget', { status: 'ambiguous', candidates })).toEqual({
      error: "Multiple tasks match 'budget'. Please be more specific.",
      matches: candidates
    });
  });
});
