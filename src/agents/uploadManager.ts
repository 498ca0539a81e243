/**
 * uploadManager.ts: Folder creation, file uploads and license lookups.
 *
 * Uploads go through the same form a browser uses: the page carries a hidden
 * one-time `uploadformbuild` token that must be echoed back, and every
 * scan-agent checkbox is sent unchecked so that agents are started explicitly
 * by the orchestrator.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import type { ConsoleSession } from '../core/consoleSession';
import type { ConsoleParser } from '../parsers/baseParser';
import type { LicenseEntry, MultipartFields } from '../core/types';
import { guessMimeType } from '../core/mimeTypes';
import { UploadError } from '../core/errors';
import { Logger } from '../core/logger';
import { UPLOAD_PAGE_ENDPOINT } from './folderUploadLocator';

const logger = new Logger('UploadManager');

export const FOLDER_CREATE_ENDPOINT = '/repo/?mod=folder_create';

export function licenseListEndpoint(uploadId: number, itemId: number): string {
  return `/repo/?mod=view-license&upload=${uploadId}&item=${itemId}`;
}

const DISABLED_AGENT_CHECKBOXES = [
  'Check_agent_bucket',
  'Check_agent_copyright',
  'Check_agent_ecc',
  'Check_agent_mimetype',
  'Check_agent_nomos',
  'Check_agent_monk',
  'Check_agent_pkgagent',
] as const;

export class UploadManager {
  constructor(
    private readonly session: ConsoleSession,
    private readonly parser: ConsoleParser,
  ) {}

  // ── Folders ────────────────────────────────────────────

  async createFolder(
    parentFolderId: number,
    folderName: string,
    description: string = '',
  ): Promise<void> {
    logger.info(`Creating folder "${folderName}" under folder ${parentFolderId}`);
    await this.session.post(FOLDER_CREATE_ENDPOINT, {
      parentid: String(parentFolderId),
      newname: folderName,
      description,
    });
  }

  // ── Uploads ────────────────────────────────────────────

  /**
   * Upload a local file into `folderId` without starting any agent.
   *
   * @returns The new upload's id, or `null` when the response page does not
   *   announce one.
   */
  async uploadFile(filePath: string, folderId: number): Promise<number | null> {
    const filename = basename(filePath);
    const content = await readFile(filePath);
    const token = await this.getUploadFormToken();

    const fields: MultipartFields = [
      ['uploadformbuild', token],
      ['folder', String(folderId)],
      ['fileInput', { filename, content, contentType: guessMimeType(filePath) }],
      ['descriptionInputName', filename],
      ['public', 'private'],
      ...DISABLED_AGENT_CHECKBOXES.map((name) => [name, '0'] as const),
      ['deciderRules[]', ''],
    ];

    logger.info(`Uploading ${filename} (${content.length} bytes) to folder ${folderId}…`);
    const response = await this.session.postMultipart(UPLOAD_PAGE_ENDPOINT, fields);

    const uploadId = this.parser.parseNewUploadId(response.body);
    if (uploadId === null) {
      logger.warn(`Upload of ${filename} returned no upload id (HTTP ${response.statusCode})`);
    } else {
      logger.info(`Uploaded ${filename} as upload ${uploadId}`);
    }
    return uploadId;
  }

  private async getUploadFormToken(): Promise<string> {
    const response = await this.session.get(UPLOAD_PAGE_ENDPOINT);
    const token = this.parser.parseUploadFormToken(response.body);
    if (!token) {
      throw new UploadError('Upload form has no uploadformbuild token (is the session logged in?)');
    }
    return token;
  }

  // ── Licenses ───────────────────────────────────────────

  /** Licenses the server offers for an upload; needs a tree item of that upload. */
  async getLicenses(uploadId: number, itemId: number): Promise<LicenseEntry[]> {
    const response = await this.session.get(licenseListEndpoint(uploadId, itemId));
    return this.parser.parseLicenses(response.body);
  }

  findLicense(licenses: readonly LicenseEntry[], name: string): LicenseEntry | null {
    return licenses.find((license) => license.name === name) ?? null;
  }
}
