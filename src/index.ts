export { ConsoleClient } from './consoleClient';
export type { ClientOptions } from './consoleClient';
export { ScanPipeline, JOB_AGENTS } from './scanPipeline';
export type { ScanRequest, ScanSummary, BulkMatchRequest } from './scanPipeline';

export { ConsoleSession } from './core/consoleSession';
export type { RequestOptions, SessionOptions, SessionSettings } from './core/consoleSession';
export { CookieJar } from './core/cookieJar';
export { Logger } from './core/logger';
export { isLogLevel } from './core/logger';
export type { LogLevel } from './core/logger';
export { guessMimeType } from './core/mimeTypes';
export {
  ConfigError,
  InvalidBulkActionError,
  UploadError,
  PipelineError,
  AgentWaitError,
  isConnectionFailure,
  getErrorMessage,
} from './core/errors';
export { loadDriverConfig } from './core/types';
export type {
  AgentCheck,
  BulkAction,
  BulkTextMatchAction,
  ConsoleResponse,
  DriverConfig,
  FilePart,
  FolderEntry,
  FormFields,
  JobDetail,
  JobRow,
  LicenseEntry,
  MultipartFields,
  ReportFormat,
  SessionState,
  UploadEntry,
  UploadPage,
  WaitOptions,
  WaitOutcome,
} from './core/types';

export { FossologyConsoleParser } from './parsers/fossologyParser';
export { BaseParser } from './parsers/baseParser';
export type { ConsoleParser } from './parsers/baseParser';

export * from './agents';
export * from './middleware';
