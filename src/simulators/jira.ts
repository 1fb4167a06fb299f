import { resolveFieldPath } from '../query/Evaluator.js';
import type { FieldValue } from '../query/types.js';
import type { IRecordStore, StoredRecord } from '../store/IRecordStore.js';

export const JIRA_COLLECTION = 'issues';

export interface SearchIssuesParams {
  jql?: string;
  startAt?: number;
  maxResults?: number;
}

export interface SearchIssuesResult {
  issues: StoredRecord[];
  startAt: number;
  maxResults: number;
  total: number;
}

/**
 * Issues keep most of their data under `fields`; top-level names such as
 * `key` and `id` still resolve when `fields` lacks them.
 */
export function resolveIssueField(issue: StoredRecord, field: string): FieldValue | undefined {
  const fromFields = resolveFieldPath(issue.fields, field);
  return fromFields === undefined ? resolveFieldPath(issue, field) : fromFields;
}

export async function searchIssues(
  store: IRecordStore,
  { jql = '', startAt = 0, maxResults = 50 }: SearchIssuesParams = {}
): Promise<SearchIssuesResult> {
  const page = await store.search(JIRA_COLLECTION, jql, {
    dialect: 'jql',
    allowMissing: true,
    offset: startAt,
    limit: maxResults,
    resolveField: resolveIssueField,
  });

  return {
    issues: page.items,
    startAt,
    maxResults,
    total: page.total,
  };
}
