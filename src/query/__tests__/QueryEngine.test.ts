import { describe, it, expect } from '@jest/globals';
import {
  EvaluationTypeMismatch,
  ParseError,
  QueryEngine,
  TokenizeError,
  type QueryRecord,
} from '../index.js';

const issues: QueryRecord[] = [
  { key: 'D-1', status: 'Open', created: '2024-01-03', points: 5 },
  { key: 'D-2', status: 'Done', created: '2024-01-01', points: 3 },
  { key: 'D-3', status: 'Open', created: '2024-01-02', points: 8 },
];

const keys = (records: readonly QueryRecord[]) => records.map((record) => record.key);

describe('QueryEngine', () => {
  describe('compile', () => {
    it('should split ORDER BY and freeze the result', () => {
      const engine = new QueryEngine({ dialect: 'jql' });
      const compiled = engine.compile("status = 'Open' ORDER BY created DESC");

      expect(compiled.source).toBe("status = 'Open' ORDER BY created DESC");
      expect(compiled.orderBy).toEqual([{ field: 'created', direction: 'DESC' }]);
      expect(compiled.expression).toEqual({
        type: 'condition',
        field: 'status',
        operator: '=',
        value: { kind: 'text', text: 'Open' },
      });
      expect(Object.isFrozen(compiled)).toBe(true);
      expect(Object.isFrozen(compiled.orderBy)).toBe(true);
      expect(Object.isFrozen(compiled.orderBy[0])).toBe(true);
    });

    it('should reuse cached compilations', () => {
      const engine = new QueryEngine();
      const first = engine.compile("a = '1'");

      expect(engine.compile("a = '1'")).toBe(first);
      expect(engine.cachedQueryCount).toBe(1);
    });

    it('should evict the least recently used entry', () => {
      const engine = new QueryEngine({ cacheSize: 2 });
      const one = engine.compile("a = '1'");
      const two = engine.compile("a = '2'");
      engine.compile("a = '1'");
      engine.compile("a = '3'");

      expect(engine.cachedQueryCount).toBe(2);
      expect(engine.compile("a = '1'")).toBe(one);
      expect(engine.compile("a = '2'")).not.toBe(two);
    });

    it('should not cache when the cache size is 0', () => {
      const engine = new QueryEngine({ cacheSize: 0 });
      const first = engine.compile("a = '1'");

      expect(engine.compile("a = '1'")).not.toBe(first);
      expect(engine.cachedQueryCount).toBe(0);
    });

    it('should empty the cache on request', () => {
      const engine = new QueryEngine();
      engine.compile("a = '1'");
      engine.clearCache();
      expect(engine.cachedQueryCount).toBe(0);
    });

    it('should not cache failures', () => {
      const engine = new QueryEngine();
      expect(() => engine.compile("a = '1' AND")).toThrow(ParseError);
      expect(engine.cachedQueryCount).toBe(0);
    });

    it('should count the ORDER BY clause against the length cap', () => {
      const engine = new QueryEngine({ dialect: 'jql', maxQueryLength: 50 });
      const keyList = Array.from({ length: 20 }, (_, i) => `f${i}`).join(', ');
      const source = `status = 'Open' ORDER BY ${keyList}`;

      expect(() => engine.compile(source)).toThrow(
        `Query is ${source.length} characters long; the limit is 50`
      );
      expect(engine.cachedQueryCount).toBe(0);
    });

    it('should report a dangling keyword at the end of the condition text', () => {
      let caught: unknown;
      try {
        new QueryEngine().compile("a = '1' AND ORDER BY b");
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ParseError);
      expect(caught).toMatchObject({ position: 11, tokenIndex: 2 });
    });

    it('should apply the configured length and depth caps', () => {
      expect(() => new QueryEngine({ maxQueryLength: 5 }).compile("a = '1'")).toThrow(TokenizeError);
      expect(() => new QueryEngine({ maxDepth: 1 }).compile("NOT NOT a = '1'")).toThrow(
        'Query nests deeper than 1 levels at token 2. Got condition on \'a\''
      );
    });
  });

  describe('search', () => {
    it('should filter and order by the clause in the query', () => {
      const engine = new QueryEngine({ dialect: 'jql' });
      const page = engine.search(issues, "status = 'Open' ORDER BY created ASC");

      expect(keys(page.items)).toEqual(['D-3', 'D-1']);
      expect(page.total).toBe(2);
    });

    it('should let an explicit ordering replace the clause', () => {
      const engine = new QueryEngine({ dialect: 'jql' });
      const page = engine.search(issues, "status = 'Open' ORDER BY created ASC", {
        orderBy: [{ field: 'points', direction: 'DESC' }],
      });

      expect(keys(page.items)).toEqual(['D-3', 'D-1']);
      expect(
        keys(
          engine.search(issues, "status = 'Open' ORDER BY points DESC", {
            orderBy: [{ field: 'created', direction: 'DESC' }],
          }).items
        )
      ).toEqual(['D-1', 'D-3']);
    });

    it('should page the ordered matches', () => {
      const engine = new QueryEngine({ dialect: 'jql' });
      const page = engine.search(issues, 'ORDER BY created ASC', { offset: 1, limit: 1 });

      expect(keys(page.items)).toEqual(['D-3']);
      expect(page.total).toBe(3);
    });

    it('should raise type mismatches under the throw policy', () => {
      const permissive = new QueryEngine();
      const strict = new QueryEngine({ mismatch: 'throw' });

      expect(permissive.search(issues, "status > 'A'").total).toBe(0);
      expect(() => strict.search(issues, "status > 'A'")).toThrow(EvaluationTypeMismatch);
    });

    it('should use a custom date allow-list', () => {
      const engine = new QueryEngine({ dateFields: ['due'] });
      const records: QueryRecord[] = [{ due: '2024-02-01' }, { due: '2024-04-01' }];

      expect(engine.search(records, "due < '2024-03-01'").items).toEqual([{ due: '2024-02-01' }]);
    });
  });

  describe('matches', () => {
    it('should evaluate a single record', () => {
      const engine = new QueryEngine({ dialect: 'cql' });

      expect(engine.matches("status = 'Open' and points > '4'", issues[0])).toBe(true);
      expect(engine.matches("status = 'Open' and points > '4'", issues[1])).toBe(false);
    });

    it('should use a field resolver', () => {
      const engine = new QueryEngine();
      const record = { fields: { status: 'Open' } };

      expect(
        engine.matches("status = 'Open'", record, (item, field) =>
          field === 'status' ? item.fields.status : undefined
        )
      ).toBe(true);
    });
  });
});
