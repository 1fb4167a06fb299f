import { describe, it, expect, beforeEach } from '@jest/globals';
import { TestServerHarness } from './helpers/TestServerHarness.js';

const TICKETS = [
  {
    id: 'T-1',
    status: 'open',
    priority: 3,
    created: '2024-03-01T09:00:00Z',
    tags: ['backend'],
  },
  {
    id: 'T-2',
    status: 'closed',
    priority: 1,
    created: '2024-03-02T09:00:00Z',
    tags: [],
  },
  {
    status: 'open',
    priority: 2,
    created: '2024-03-03T09:00:00Z',
    tags: ['frontend', 'backend'],
    assignee: 'sam',
  },
];

describe('Record Tools Integration Tests', () => {
  let harness: TestServerHarness;

  beforeEach(async () => {
    harness = new TestServerHarness();
    await harness.callPutRecords({ collection: 'tickets', records: TICKETS });
  });

  const searchIds = async (args: Record<string, unknown>) =>
    (await harness.callSearchRecords({ collection: 'tickets', ...args })).records.map(
      (record) => record.id
    );

  describe('put_records', () => {
    it('should return ids in input order, generating missing ones', async () => {
      const fresh = new TestServerHarness();
      const response = await fresh.controller.handlePutRecordsTool({
        collection: 'tickets',
        records: TICKETS,
      });

      expect(fresh.summaryOf(response)).toBe('Stored 3 records in "tickets".');
      expect(fresh.parseJsonResponse(response)).toEqual({
        collection: 'tickets',
        ids: ['T-1', 'T-2', 'tickets-1'],
      });
    });

    it('should replace records that share an id', async () => {
      await harness.callPutRecords({
        collection: 'tickets',
        records: [{ id: 'T-1', status: 'closed', priority: 3 }],
      });

      expect(await searchIds({ query: "status = 'closed'" })).toEqual(['T-1', 'T-2']);
      expect((await harness.callListCollections()).collections[0].recordCount).toBe(3);
    });

    it('should reject ids that are not strings or numbers', async () => {
      const payload = await harness.expectToolError(
        harness.controller.handlePutRecordsTool({ collection: 'tickets', records: [{ id: true }] })
      );

      expect(payload.error).toEqual({
        name: 'StoreError',
        code: 'invalid_record',
        message: 'Record 0 has a boolean in "id"; ids must be strings or numbers',
        details: { index: 0, idField: 'id' },
      });
    });

    it('should report malformed arguments', async () => {
      const response = await harness.controller.handlePutRecordsTool({ collection: 'tickets' });

      expect(response.isError).toBe(true);
      expect(harness.summaryOf(response)).toBe('Error: "records" must be an array of objects');
    });
  });

  describe('search_records', () => {
    it('should combine conditions with AND', async () => {
      const response = await harness.controller.handleSearchRecordsTool({
        collection: 'tickets',
        query: "status = 'open' AND priority >= '2'",
      });

      expect(harness.summaryOf(response)).toBe('Found 2 matching records; returning 2.');
      expect(harness.parseJsonResponse(response)).toMatchObject({
        collection: 'tickets',
        total: 2,
        offset: 0,
        records: [{ id: 'T-1' }, { id: 'tickets-1' }],
      });
    });

    it('should negate grouped conditions', async () => {
      expect(await searchIds({ query: "NOT (status = 'closed' OR priority > '2')" })).toEqual([
        'tickets-1',
      ]);
    });

    it('should test membership and emptiness', async () => {
      expect(await searchIds({ query: "'backend' in tags" })).toEqual(['T-1', 'tickets-1']);
      expect(await searchIds({ query: 'assignee IS EMPTY' })).toEqual(['T-1', 'T-2']);
    });

    it('should sort by a trailing ORDER BY clause', async () => {
      expect(await searchIds({ query: "status = 'open' ORDER BY created DESC" })).toEqual([
        'tickets-1',
        'T-1',
      ]);
    });

    it('should let orderBy override the query ordering', async () => {
      expect(await searchIds({ query: 'ORDER BY created DESC', orderBy: 'priority' })).toEqual([
        'T-2',
        'tickets-1',
        'T-1',
      ]);
    });

    it('should page after sorting and report the full total', async () => {
      const result = await harness.callSearchRecords({
        collection: 'tickets',
        orderBy: 'priority desc',
        offset: 1,
        limit: 1,
      });

      expect(result.total).toBe(3);
      expect(result.offset).toBe(1);
      expect(result.limit).toBe(1);
      expect(result.records.map((record) => record.id)).toEqual(['tickets-1']);
    });

    it('should parse with an explicit dialect', async () => {
      const payload = await harness.expectToolError(
        harness.controller.handleSearchRecordsTool({
          collection: 'tickets',
          dialect: 'jql',
          query: "status = 'open' and priority = '3'",
        })
      );

      expect(payload.error).toMatchObject({
        name: 'TokenizeError',
        stage: 'tokenizer',
        message: "Expected operator after field 'and' at position 20",
        position: 20,
      });
      expect(await searchIds({ dialect: 'jql', query: "status = 'open' AND priority = '3'" })).toEqual([
        'T-1',
      ]);
    });

    it('should report unknown collections with the available names', async () => {
      const payload = await harness.expectToolError(
        harness.controller.handleSearchRecordsTool({ collection: 'nope' })
      );

      expect(payload.error).toEqual({
        name: 'StoreError',
        code: 'not_found',
        message: 'Collection "nope" does not exist',
        details: { collection: 'nope', available: ['tickets'] },
      });
    });

    it('should reject negative offsets', async () => {
      const payload = await harness.expectToolError(
        harness.controller.handleSearchRecordsTool({ collection: 'tickets', offset: -1 })
      );

      expect(payload.error).toMatchObject({
        name: 'QueryOptionsError',
        stage: 'driver',
        message: 'offset must be a non-negative integer, got -1',
      });
    });

    it('should treat type mismatches as non-matches by default', async () => {
      expect(await searchIds({ query: "status > '2'" })).toEqual([]);
    });

    it('should raise type mismatches under the throw policy', async () => {
      const strict = new TestServerHarness({ mismatch: 'throw' });
      await strict.callPutRecords({ collection: 'tickets', records: TICKETS });

      const payload = await strict.expectToolError(
        strict.controller.handleSearchRecordsTool({ collection: 'tickets', query: "status > '2'" })
      );

      expect(payload.error).toMatchObject({
        name: 'EvaluationTypeMismatch',
        stage: 'evaluator',
        message: 'Cannot apply > to field "status": field is neither numeric nor date-like',
      });
    });
  });

  describe('list_collections', () => {
    it('should describe each collection', async () => {
      await harness.callPutRecords({
        collection: 'issues',
        dialect: 'jql',
        idField: 'key',
        records: [{ key: 'DEMO-1' }],
      });

      const response = await harness.controller.handleListCollectionsTool();

      expect(harness.summaryOf(response)).toBe('Found 2 collections.');
      expect(harness.parseJsonResponse(response)).toEqual({
        collections: [
          { name: 'tickets', recordCount: 3, dialect: 'generic', idField: 'id' },
          { name: 'issues', recordCount: 1, dialect: 'jql', idField: 'key' },
        ],
      });
    });
  });
});
