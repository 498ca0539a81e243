/**
 * fossologyParser.ts: ConsoleParser for the Fossology web console.
 *
 * Page shapes it understands:
 *
 *   upload_file           <select name="folder"><option value="1">Software Repository</option>…
 *                         <input type="hidden" name="uploadformbuild" value="…">
 *   browse-processPost    {"aaData": [["<a href='?mod=license&upload=12&item=345'><b>name</b></a>", …], …],
 *                          "iTotalDisplayRecords": 130}
 *   view-license          <select id="bulkLicense"><option value="7">MIT</option>…
 *   ajaxShowJobs showjb   {"showJobsData": "<table><tr><td><a href='…jobId=9'>9</a></td><td class='agentName'>monk</td>…"}
 *   showSingleJob         <table><tr><th>jq_pk</th><td>9</td></tr><tr><th>jq_type</th><td>monk</td></tr>…
 */

import { BaseParser } from './baseParser';
import { Logger } from '../core/logger';
import type {
  FolderEntry,
  JobDetail,
  JobRow,
  LicenseEntry,
  UploadEntry,
  UploadPage,
} from '../core/types';

const logger = new Logger('FossologyParser');

export class FossologyConsoleParser extends BaseParser {
  // ── Folders & upload form ──────────────────────────────

  parseFolders(html: string): FolderEntry[] {
    const $ = this.load(html);
    const folders: FolderEntry[] = [];

    $('select[name="folder"] option').each((_, el) => {
      const id = this.toId($(el).attr('value'));
      if (id === null) return;
      folders.push({ id, name: this.cleanText($(el).text()) });
    });

    return folders;
  }

  parseUploadFormToken(html: string): string | null {
    const $ = this.load(html);
    const token = $('input[name="uploadformbuild"]').first().attr('value');
    return token ? token : null;
  }

  parseNewUploadId(html: string): number | null {
    const $ = this.load(html);
    let uploadId: number | null = null;

    $('a[href]').each((_, el) => {
      const id = this.numericParam($(el).attr('href'), 'upload');
      if (id !== null) {
        uploadId = id;
        return false; // first match wins
      }
      return undefined;
    });

    return uploadId;
  }

  // ── Upload listing ─────────────────────────────────────

  parseUploadPage(body: string, folderId: number): UploadPage | null {
    const data = this.tryParseJson(body);
    if (!this.isRecord(data) || !Array.isArray(data.aaData)) {
      logger.warn(`Upload listing for folder ${folderId} has no aaData rows`);
      return null;
    }

    const uploads: UploadEntry[] = [];
    for (const row of data.aaData) {
      const entry = this.parseUploadRow(row, folderId);
      if (entry) uploads.push(entry);
    }

    const total = Number(data.iTotalDisplayRecords ?? data.iTotalRecords);
    return {
      uploads,
      totalRecords: Number.isFinite(total) ? total : null,
    };
  }

  private parseUploadRow(row: unknown, folderId: number): UploadEntry | null {
    if (!Array.isArray(row) || typeof row[0] !== 'string') return null;

    const $ = this.load(row[0]);
    const link = $('a[href*="upload="]').first();
    const href = link.attr('href');
    const id = this.numericParam(href, 'upload');
    if (id === null) return null;

    const bold = this.cleanText($('b').first().text());
    const name = bold || this.cleanText(link.text());

    return {
      id,
      name,
      folderId,
      itemId: this.numericParam(href, 'item'),
    };
  }

  // ── Licenses ───────────────────────────────────────────

  parseLicenses(html: string): LicenseEntry[] {
    const $ = this.load(html);
    const licenses: LicenseEntry[] = [];

    $('select#bulkLicense option').each((_, el) => {
      const id = this.toId($(el).attr('value'));
      const name = this.cleanText($(el).text());
      if (id === null || !name) return;
      licenses.push({ id, name });
    });

    return licenses;
  }

  // ── Jobs ───────────────────────────────────────────────

  parseJobList(body: string): JobRow[] {
    const $ = this.load(this.unwrapJobsHtml(body));
    const jobs: JobRow[] = [];

    $('tr').each((_, tr) => {
      const row = $(tr);
      const href = row.find('a[href*="jobId="]').first().attr('href');
      const id = this.numericParam(href, 'jobId');
      if (id === null) return;

      const agentCell = row.find('.agentName').first();
      const agent = this.cleanText(
        agentCell.length > 0 ? agentCell.text() : row.find('td').eq(1).text(),
      );
      if (agent) jobs.push({ id, agent });
    });

    return jobs;
  }

  parseJobDetail(body: string): JobDetail | null {
    const $ = this.load(this.unwrapJobsHtml(body));
    const fields = new Map<string, string>();

    $('tr').each((_, tr) => {
      const cells = $(tr).find('th, td');
      if (cells.length < 2) return;
      fields.set(this.cleanText(cells.eq(0).text()), this.cleanText(cells.eq(1).text()));
    });

    const id = this.toId(fields.get('jq_pk'));
    const agent = fields.get('jq_type');
    if (id === null || !agent) return null;

    let reportId: number | null = null;
    $('a[href*="report="]').each((_, el) => {
      reportId = this.numericParam($(el).attr('href'), 'report');
      return reportId === null ? undefined : false;
    });

    return {
      id,
      agent,
      status: fields.get('jq_endtext') ?? '',
      reportId,
    };
  }

  /** ajaxShowJobs wraps its HTML in `{"showJobsData": "…"}`; plain HTML passes through. */
  private unwrapJobsHtml(body: string): string {
    const data = this.tryParseJson(body);
    if (this.isRecord(data) && typeof data.showJobsData === 'string') {
      return data.showJobsData;
    }
    return body;
  }
}
