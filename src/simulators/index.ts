export { searchContent, CONFLUENCE_COLLECTION } from './confluence.js';
export type { SearchContentParams } from './confluence.js';
export { searchIssues, resolveIssueField, JIRA_COLLECTION } from './jira.js';
export type { SearchIssuesParams, SearchIssuesResult } from './jira.js';
export { listFiles, DRIVE_COLLECTION } from './drive.js';
export type { FileList, ListFilesParams } from './drive.js';
export { queryRecords, parseSoql } from './salesforce.js';
export type { QueryResult, SoqlStatement } from './salesforce.js';
