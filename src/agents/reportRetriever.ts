/**
 * reportRetriever.ts: Download the report of the newest generator job.
 *
 * The download is gated: the newest job for the format's agent must be that
 * agent and must be exactly "Completed".  A killed or still-running job, or
 * no job at all, is an ordinary outcome and yields `false` without touching
 * the output file.
 */

import { writeFile } from 'fs/promises';
import type { ConsoleSession } from '../core/consoleSession';
import type { ReportFormat } from '../core/types';
import type { AgentOrchestrator } from './agentOrchestrator';
import { Logger } from '../core/logger';

const logger = new Logger('ReportRetriever');

export function downloadEndpoint(reportId: number): string {
  return `/repo/?mod=download&report=${reportId}`;
}

export class ReportRetriever {
  constructor(
    private readonly session: ConsoleSession,
    private readonly orchestrator: AgentOrchestrator,
  ) {}

  async fetchGeneratedReport(
    uploadId: number,
    outputPath: string,
    format: ReportFormat = 'spdx2tv',
  ): Promise<boolean> {
    const job = await this.orchestrator.getMostRecentJob(uploadId, format);

    if (!job) {
      logger.warn(`No ${format} job for upload ${uploadId}`);
      return false;
    }
    if (job.agent !== format || job.status !== 'Completed') {
      logger.warn(`Newest ${format} job ${job.id} is "${job.status}", no report to fetch`);
      return false;
    }
    if (job.reportId === null) {
      logger.warn(`Job ${job.id} completed but lists no report id`);
      return false;
    }

    const response = await this.session.get(downloadEndpoint(job.reportId));
    await writeFile(outputPath, response.body, 'utf-8');

    logger.info(`Wrote ${format} report ${job.reportId} for upload ${uploadId} to ${outputPath}`);
    return true;
  }
}
