/**
 * scanPipeline.ts: End-to-end scan of one file.
 *
 *   1. LOGIN    → SessionManager
 *   2. LOCATE   → FolderUploadLocator resolves the target (and reuse) upload
 *   3. UPLOAD   → UploadManager, no agents ticked
 *   4. SCAN     → reuser (optional), monk + nomos, copyright; each awaited
 *   5. DECIDE   → bulk text matches (optional), awaited
 *   6. REPORT   → report generator, awaited, then downloaded (optional)
 *
 * A wait that ends without the job finishing raises AgentWaitError; a lookup
 * the run cannot continue without raises PipelineError.
 */

import { basename } from 'path';
import type { ConsoleClient } from './consoleClient';
import type { BulkAction, ReportFormat, WaitOptions } from './core/types';
import { AgentWaitError, PipelineError, getErrorMessage } from './core/errors';
import { actionForLicense } from './agents/bulkTextMatch';
import { Logger } from './core/logger';

const logger = new Logger('ScanPipeline');

/** Agent names as they appear in the job list. */
export const JOB_AGENTS = {
  reuser: 'reuser',
  monk: 'monk',
  nomos: 'nomos',
  copyright: 'copyright',
  monkbulk: 'monkbulk',
} as const;

export interface BulkMatchRequest {
  referenceText: string;
  actions: ReadonlyArray<{ license: string; action: BulkAction }>;
}

export interface ScanRequest {
  filePath: string;
  folderName: string;
  /** Upload (in the same folder) whose clearing decisions are reused. */
  reuseUploadName?: string;
  bulkMatches?: readonly BulkMatchRequest[];
  /** Where to write the report; no report is generated when omitted. */
  reportPath?: string;
  reportFormat?: ReportFormat;
  wait?: WaitOptions;
}

export interface ScanSummary {
  uploadId: number;
  reusedUploadId: number | null;
  bulkMatchesRun: number;
  reportWritten: boolean;
}

export class ScanPipeline {
  constructor(private readonly client: ConsoleClient) {}

  async run(request: ScanRequest): Promise<ScanSummary> {
    try {
      return await this.runStages(request);
    } catch (err) {
      logger.error(`Scan of ${basename(request.filePath)} failed: ${getErrorMessage(err)}`, err);
      throw err;
    }
  }

  private async runStages(request: ScanRequest): Promise<ScanSummary> {
    const { locator, uploads, agents } = this.client;
    const uploadName = basename(request.filePath);

    // ── Stage 1: LOGIN ─────────────────────────────────────
    logger.info(`Starting scan of ${uploadName} into "${request.folderName}"`);
    await this.client.login();

    // ── Stage 2: LOCATE ────────────────────────────────────
    const folderId = await locator.resolveFolder(request.folderName);
    if (folderId === null) {
      throw new PipelineError(`Folder "${request.folderName}" does not exist`);
    }

    let reusedUploadId: number | null = null;
    if (request.reuseUploadName) {
      reusedUploadId = await locator.resolveUpload(folderId, request.reuseUploadName, true);
      if (reusedUploadId === null) {
        throw new PipelineError(`Upload to reuse "${request.reuseUploadName}" not found`);
      }
    }

    // ── Stage 3: UPLOAD ────────────────────────────────────
    const uploadId = await uploads.uploadFile(request.filePath, folderId);
    if (uploadId === null) {
      throw new PipelineError(`Upload of ${uploadName} did not return an upload id`);
    }

    // ── Stage 4: SCAN ──────────────────────────────────────
    if (reusedUploadId !== null) {
      await agents.startReuserAgent(uploadId, reusedUploadId);
      await this.awaitAgent(uploadId, JOB_AGENTS.reuser, request.wait);
    }

    await agents.startLicenseScanAgents(uploadId);
    await this.awaitAgent(uploadId, JOB_AGENTS.monk, request.wait);
    await this.awaitAgent(uploadId, JOB_AGENTS.nomos, request.wait);

    await agents.startCopyrightAgent(uploadId);
    await this.awaitAgent(uploadId, JOB_AGENTS.copyright, request.wait);

    // ── Stage 5: DECIDE ────────────────────────────────────
    const bulkMatches = request.bulkMatches ?? [];
    if (bulkMatches.length > 0) {
      await this.runBulkMatches(folderId, uploadId, bulkMatches, request.wait);
    }

    // ── Stage 6: REPORT ────────────────────────────────────
    let reportWritten = false;
    if (request.reportPath) {
      const format = request.reportFormat ?? 'spdx2tv';
      const previousReportJob = await this.lastJob(uploadId, format);
      await agents.startReportGeneratorAgent(uploadId, format);
      await this.awaitAgent(uploadId, format, request.wait, previousReportJob);
      reportWritten = await this.client.reports.fetchGeneratedReport(
        uploadId,
        request.reportPath,
        format,
      );
    }

    logger.info(
      `Scan complete for ${uploadName}: upload ${uploadId}` +
        (request.reportPath ? `, report ${reportWritten ? 'written' : 'not available'}` : ''),
    );

    return {
      uploadId,
      reusedUploadId,
      bulkMatchesRun: bulkMatches.length,
      reportWritten,
    };
  }

  // ── Helpers ──────────────────────────────────────────────

  /** Newest job id of `agent` before it is started again. */
  private async lastJob(uploadId: number, agent: string): Promise<number | null> {
    return this.client.agents.findMostRecentJob(uploadId, agent);
  }

  private async awaitAgent(
    uploadId: number,
    agent: string,
    wait: WaitOptions = {},
    afterJobId: number | null = null,
  ): Promise<void> {
    const outcome = await this.client.agents.waitUntilDone(uploadId, agent, {
      ...wait,
      afterJobId,
    });
    if (outcome.state !== 'done') {
      throw new AgentWaitError(agent, outcome);
    }
  }

  /** Bulk matches need the upload's top tree item and the server's license ids. */
  private async runBulkMatches(
    folderId: number,
    uploadId: number,
    bulkMatches: readonly BulkMatchRequest[],
    wait?: WaitOptions,
  ): Promise<void> {
    const { locator, uploads, bulk } = this.client;

    const upload = await locator.getUpload(folderId, uploadId);
    const itemId = upload ? upload.itemId : null;
    if (itemId === null) {
      throw new PipelineError(`No tree item found for upload ${uploadId}`);
    }

    const licenses = await uploads.getLicenses(uploadId, itemId);

    for (const match of bulkMatches) {
      const actions = match.actions.map(({ license, action }) => {
        const entry = uploads.findLicense(licenses, license);
        if (!entry) {
          throw new PipelineError(`License "${license}" is not known to the server`);
        }
        return actionForLicense(entry, action);
      });

      const previousBulkJob = await this.lastJob(uploadId, JOB_AGENTS.monkbulk);
      await bulk.startBulkTextMatch(match.referenceText, itemId, actions);
      await this.awaitAgent(uploadId, JOB_AGENTS.monkbulk, wait, previousBulkJob);
    }
  }
}
