/**
 * agents/index.ts: Barrel export for the console workflow layer.
 *
 * `core/` holds the session and shared types; `agents/` holds the modules that
 * act on the console through that session:
 *   • SessionManager      : form login
 *   • FolderUploadLocator : names → ids
 *   • UploadManager       : folders, uploads, licenses
 *   • AgentOrchestrator   : start agents, find and poll their jobs
 *   • ReportRetriever     : gated report download
 *   • BulkTextMatcher     : bulk license reclassification
 */

export { SessionManager, readLoginState, AUTH_ENDPOINT } from './sessionManager';

export {
  FolderUploadLocator,
  browseEndpoint,
  UPLOAD_PAGE_ENDPOINT,
  UPLOADS_PER_PAGE,
} from './folderUploadLocator';

export { UploadManager, licenseListEndpoint, FOLDER_CREATE_ENDPOINT } from './uploadManager';

export {
  AgentOrchestrator,
  isTerminalStatus,
  jobDetailEndpoint,
  reportGeneratorEndpoint,
  AGENTS,
  AGENT_ADD_ENDPOINT,
  JOB_LIST_ENDPOINT,
  DEFAULT_REUSE_GROUP_ID,
} from './agentOrchestrator';
export type { OrchestratorDefaults } from './agentOrchestrator';

export { ReportRetriever, downloadEndpoint } from './reportRetriever';

export {
  BulkTextMatcher,
  buildBulkTextMatchRequest,
  makeBulkTextMatchAction,
  actionForLicense,
  findConflictingLicenses,
  isBulkAction,
  BULK_TEXT_MATCH_ENDPOINT,
} from './bulkTextMatch';
