/**
 * agentOrchestrator.ts: Start scanning agents and follow their jobs.
 *
 * STARTING
 * ────────
 * Agents are started with a form POST to `agent_add` (or, for reports, a GET
 * of the export page).  The console does not hand back a job id, so the job
 * is found afterwards in the upload's job list: that list comes newest first,
 * and the first row for an agent is the run we just started.
 *
 * JOB STATES
 * ──────────
 * Status strings are whatever the server reports.  Two kinds are terminal:
 *   • "Completed"               : the agent finished.
 *   • anything containing "killed": the agent was terminated.
 * Everything else counts as still running.
 *
 * WAITING
 * ───────
 * `waitUntilDone()` polls until the job is terminal, the optional deadline
 * passes (`pending`) or the AbortSignal fires (`cancelled`).  While the new
 * job is not listed yet, each poll looks it up again.  Both the caller's signal
 * and the deadline abort in-flight requests as well as the pause between polls.
 */

import { setTimeout as sleep } from 'timers/promises';
import type { ConsoleSession } from '../core/consoleSession';
import type { ConsoleParser } from '../parsers/baseParser';
import type {
  AgentCheck,
  FormFields,
  JobDetail,
  JobRow,
  ReportFormat,
  WaitOptions,
  WaitOutcome,
} from '../core/types';
import { Logger } from '../core/logger';

const logger = new Logger('AgentOrchestrator');

export const AGENT_ADD_ENDPOINT = '/repo/?mod=agent_add';
export const JOB_LIST_ENDPOINT = '/repo/?mod=ajaxShowJobs&do=showjb';

export function jobDetailEndpoint(jobId: number): string {
  return `/repo/?mod=ajaxShowJobs&do=showSingleJob&jobId=${jobId}`;
}

export function reportGeneratorEndpoint(uploadId: number, format: ReportFormat): string {
  return `/repo/?mod=ui_spdx2&outputFormat=${format}&upload=${uploadId}`;
}

/** Agent identifiers understood by `agent_add`. */
export const AGENTS = {
  reuser: 'agent_reuser',
  monk: 'agent_monk',
  nomos: 'agent_nomos',
  copyright: 'agent_copyright',
} as const;

/** Group id the console appends to the reused upload ("<upload>,<group>"). */
export const DEFAULT_REUSE_GROUP_ID = 3;

export function isTerminalStatus(status: string): boolean {
  return status === 'Completed' || status.includes('killed');
}

export interface OrchestratorDefaults {
  pollIntervalMs: number;
  /** 0 disables the default deadline. */
  agentTimeoutMs: number;
  maxListPages: number;
}

const FALLBACK_DEFAULTS: OrchestratorDefaults = {
  pollIntervalMs: 10_000,
  agentTimeoutMs: 0,
  maxListPages: 50,
};

export class AgentOrchestrator {
  private readonly defaults: OrchestratorDefaults;

  constructor(
    private readonly session: ConsoleSession,
    private readonly parser: ConsoleParser,
    defaults: Partial<OrchestratorDefaults> = {},
  ) {
    this.defaults = { ...FALLBACK_DEFAULTS, ...defaults };
  }

  // ── Starting agents ────────────────────────────────────

  /** Fire-and-forget: the job id is discovered later via `findMostRecentJob()`. */
  async startAgent(
    uploadId: number,
    agentNames: string | readonly string[],
    extraFields: FormFields = {},
  ): Promise<void> {
    const agents = typeof agentNames === 'string' ? [agentNames] : agentNames;
    logger.info(`Starting ${agents.join(' + ')} on upload ${uploadId}`);

    await this.session.post(AGENT_ADD_ENDPOINT, {
      'agents[]': agents,
      upload: String(uploadId),
      ...extraFields,
    });
  }

  async startReuserAgent(
    uploadId: number,
    reusedUploadId: number,
    reuseGroupId: number = DEFAULT_REUSE_GROUP_ID,
  ): Promise<void> {
    await this.startAgent(uploadId, AGENTS.reuser, {
      uploadToReuse: `${reusedUploadId},${reuseGroupId}`,
    });
  }

  /** monk and nomos in a single request. */
  async startLicenseScanAgents(uploadId: number): Promise<void> {
    await this.startAgent(uploadId, [AGENTS.monk, AGENTS.nomos]);
  }

  async startCopyrightAgent(uploadId: number): Promise<void> {
    await this.startAgent(uploadId, AGENTS.copyright);
  }

  /** Opening the export page queues the generator; its job's agent is named after `format`. */
  async startReportGeneratorAgent(
    uploadId: number,
    format: ReportFormat = 'spdx2tv',
  ): Promise<void> {
    logger.info(`Starting ${format} report generation for upload ${uploadId}`);
    await this.session.get(reportGeneratorEndpoint(uploadId, format));
  }

  // ── Finding jobs ───────────────────────────────────────

  async listJobs(uploadId: number, page: number = 0, signal?: AbortSignal): Promise<JobRow[]> {
    const response = await this.session.post(
      JOB_LIST_ENDPOINT,
      { upload: String(uploadId), allusers: '0', page: String(page) },
      { signal },
    );
    return this.parser.parseJobList(response.body);
  }

  /**
   * Id of the newest job `agentName` ran on the upload, or `null`.
   * Later pages are only read when the current one has no row for the agent.
   */
  async findMostRecentJob(
    uploadId: number,
    agentName: string,
    signal?: AbortSignal,
  ): Promise<number | null> {
    let previousKey = '';

    for (let page = 0; page < this.defaults.maxListPages; page++) {
      const jobs = await this.listJobs(uploadId, page, signal);
      if (jobs.length === 0) break;

      const match = jobs.find((job) => job.agent === agentName);
      if (match) return match.id;

      // A server that ignores `page` keeps sending the same rows.
      const key = jobs.map((job) => job.id).join(',');
      if (key === previousKey) break;
      previousKey = key;
    }

    logger.debug(`No ${agentName} job found for upload ${uploadId}`);
    return null;
  }

  async getJob(jobId: number, signal?: AbortSignal): Promise<JobDetail | null> {
    const response = await this.session.get(jobDetailEndpoint(jobId), { signal });
    const job = this.parser.parseJobDetail(response.body);
    if (!job) logger.warn(`Job ${jobId} detail could not be read`);
    return job;
  }

  /** The newest job's detail for the agent, or `null` when there is none. */
  async getMostRecentJob(uploadId: number, agentName: string): Promise<JobDetail | null> {
    const jobId = await this.findMostRecentJob(uploadId, agentName);
    return jobId === null ? null : this.getJob(jobId);
  }

  // ── Status ─────────────────────────────────────────────

  /** `unknown` when no job for the agent is listed (or its detail is unreadable). */
  async checkAgent(uploadId: number, agentName: string): Promise<AgentCheck> {
    const job = await this.getMostRecentJob(uploadId, agentName);
    if (!job) return 'unknown';
    return isTerminalStatus(job.status) ? 'done' : 'running';
  }

  async isDone(uploadId: number, agentName: string): Promise<boolean> {
    return (await this.checkAgent(uploadId, agentName)) === 'done';
  }

  async waitUntilDone(
    uploadId: number,
    agentName: string,
    options: WaitOptions = {},
  ): Promise<WaitOutcome> {
    const pollIntervalMs = options.pollIntervalMs ?? this.defaults.pollIntervalMs;
    const timeoutMs = options.timeoutMs ?? this.defaults.agentTimeoutMs;
    const deadline = timeoutMs > 0 ? Date.now() + timeoutMs : Number.POSITIVE_INFINITY;
    const afterJobId = options.afterJobId ?? null;

    const { signal } = options;
    const deadlineSignal = timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined;
    const waitSignal = combineSignals(signal, deadlineSignal);

    let jobId: number | null = null;
    let job: JobDetail | null = null;

    logger.info(`Waiting for ${agentName} on upload ${uploadId}…`);

    try {
      for (;;) {
        waitSignal?.throwIfAborted();

        if (jobId === null) {
          const newest = await this.findMostRecentJob(uploadId, agentName, waitSignal);
          jobId = newest !== null && (afterJobId === null || newest > afterJobId) ? newest : null;
        }
        if (jobId !== null) {
          job = (await this.getJob(jobId, waitSignal)) ?? job;
          if (job && isTerminalStatus(job.status)) {
            logger.info(`Job ${job.id} (${agentName}) is ${job.status}`);
            return { state: 'done', job };
          }
        }

        const remaining = deadline - Date.now();
        if (remaining <= 0) return this.expired(uploadId, agentName, timeoutMs, job);

        logger.debug(
          job ? `Job ${job.id} (${agentName}) is "${job.status}"` : `No ${agentName} job listed yet`,
        );
        await sleep(Math.min(pollIntervalMs, remaining), undefined, { signal: waitSignal });
      }
    } catch (err) {
      // The caller's signal wins over a deadline that fired at the same time.
      if (signal?.aborted) return this.cancelled(agentName, job);
      if (deadlineSignal?.aborted) return this.expired(uploadId, agentName, timeoutMs, job);
      throw err;
    }
  }

  private expired(
    uploadId: number,
    agentName: string,
    timeoutMs: number,
    job: JobDetail | null,
  ): WaitOutcome {
    logger.warn(
      `Gave up waiting for ${agentName} on upload ${uploadId} after ${timeoutMs} ms` +
        (job ? ` (job ${job.id} is "${job.status}")` : ''),
    );
    return { state: 'pending', job };
  }

  private cancelled(agentName: string, job: JobDetail | null): WaitOutcome {
    logger.warn(`Wait for ${agentName} cancelled`);
    return { state: 'cancelled', job };
  }
}

function combineSignals(
  ...signals: Array<AbortSignal | undefined>
): AbortSignal | undefined {
  const present = signals.filter((s): s is AbortSignal => s !== undefined);
  if (present.length <= 1) return present[0];
  return AbortSignal.any(present);
}
