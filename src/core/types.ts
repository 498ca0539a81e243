/**
 * types.ts: Shared type definitions for the console driver.
 *
 * Every layer (session, parser, locators, orchestrator, pipeline) agrees on the
 * shapes declared here.  Identifiers handed out by the server are opaque
 * numbers; a lookup that finds nothing yields `null`, never a magic `-1`.
 */

import dotenv from 'dotenv';
import { ConfigError } from './errors';

// ─── Server-side records ───────────────────────────────────

/** A folder grouping uploads.  Names are not unique on the server. */
export interface FolderEntry {
  id: number;
  name: string;
}

/** A file or archive previously submitted for scanning. */
export interface UploadEntry {
  id: number;
  name: string;
  folderId: number;
  /** Top-level tree item of the upload, when the listing exposes it. */
  itemId: number | null;
}

/** One page of the folder browse listing. */
export interface UploadPage {
  uploads: UploadEntry[];
  /** Total row count reported by the server, if present. */
  totalRecords: number | null;
}

/** A license known to the server. */
export interface LicenseEntry {
  id: number;
  name: string;
}

/** One row of the job list for an upload (server order: newest first). */
export interface JobRow {
  id: number;
  agent: string;
}

/** The detail record of a single job. */
export interface JobDetail {
  id: number;
  agent: string;
  /** Free-form status reported by the server, e.g. "Completed", "Processing". */
  status: string;
  /** Generated report id; only report-producing agents have one. */
  reportId: number | null;
}

// ─── Agents ────────────────────────────────────────────────

/** Report formats the SPDX export page understands; also the job's agent name. */
export type ReportFormat = 'spdx2' | 'spdx2tv' | 'dep5';

export type AgentCheck = 'done' | 'running' | 'unknown';

export interface WaitOptions {
  /** Delay between status checks. */
  pollIntervalMs?: number;
  /** Give up after this long and report `pending`.  0 disables the deadline. */
  timeoutMs?: number;
  /** Abort the wait; the call resolves with `cancelled`. */
  signal?: AbortSignal;
  /**
   * Ignore jobs with an id at or below this one: the run started before the
   * agent was (re)started.  Job ids grow monotonically on the server.
   */
  afterJobId?: number | null;
}

export type WaitOutcome =
  | { state: 'done'; job: JobDetail }
  | { state: 'pending'; job: JobDetail | null }
  | { state: 'cancelled'; job: JobDetail | null };

// ─── Bulk text match ───────────────────────────────────────

export type BulkAction = 'add' | 'remove';

export interface BulkTextMatchAction {
  readonly licenseId: number;
  readonly licenseName: string;
  readonly action: BulkAction;
}

// ─── Transport ─────────────────────────────────────────────

/** Form values; arrays are sent as repeated keys (`agents[]=a&agents[]=b`). */
export type FormFields = Record<string, string | readonly string[]>;

export interface FilePart {
  filename: string;
  content: Uint8Array;
  contentType: string;
}

/** Multipart fields in submission order. */
export type MultipartFields = ReadonlyArray<readonly [string, string | FilePart]>;

export interface ConsoleResponse {
  statusCode: number;
  body: string;
  headers: Record<string, string | string[] | undefined>;
}

// ─── Session state ─────────────────────────────────────────

export type SessionState = 'logged-in' | 'logged-out' | 'unknown';

// ─── Driver configuration ──────────────────────────────────

export interface DriverConfig {
  /** Server root, e.g. "http://localhost:8081".  Endpoints start with "/repo/". */
  serverUrl: string;
  username: string;
  password: string;
  /** Minimum spacing between two requests of one session. */
  requestSpacingMs: number;
  requestTimeoutMs: number;
  /** Total attempts for a request that fails at the connection level. */
  retryAttempts: number;
  retryDelayMs: number;
  pollIntervalMs: number;
  /** Default deadline for agent waits; 0 means none. */
  agentTimeoutMs: number;
  /** Upper bound on pages walked when enumerating uploads or jobs. */
  maxListPages: number;
}

type Env = Record<string, string | undefined>;

function readCount(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

/**
 * Build a DriverConfig from the environment (and `.env`, when present).
 *
 * @param env - Defaults to `process.env`; tests pass a plain object.
 */
export function loadDriverConfig(env: Env = loadDotEnv()): DriverConfig {
  const serverUrl = env.FOSSOLOGY_URL?.trim();
  if (!serverUrl) {
    throw new ConfigError('FOSSOLOGY_URL must be set in the environment.  See .env.example.');
  }

  const retryAttempts = readCount(env, 'RETRY_ATTEMPTS', 5);
  if (retryAttempts < 1) {
    throw new ConfigError('RETRY_ATTEMPTS must be at least 1');
  }

  return {
    serverUrl: serverUrl.replace(/\/+$/, ''),
    username: env.FOSSOLOGY_USERNAME ?? 'fossy',
    password: env.FOSSOLOGY_PASSWORD ?? 'fossy',
    requestSpacingMs: readCount(env, 'REQUEST_SPACING_MS', 0),
    requestTimeoutMs: readCount(env, 'REQUEST_TIMEOUT_MS', 30_000),
    retryAttempts,
    retryDelayMs: readCount(env, 'RETRY_DELAY_MS', 1_000),
    pollIntervalMs: readCount(env, 'POLL_INTERVAL_MS', 10_000),
    agentTimeoutMs: readCount(env, 'AGENT_TIMEOUT_MS', 0),
    maxListPages: Math.max(1, readCount(env, 'MAX_LIST_PAGES', 50)),
  };
}

function loadDotEnv(): Env {
  dotenv.config();
  return process.env;
}
