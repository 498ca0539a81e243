/**
 * folderUploadLocator.ts: Turn folder and upload names into server ids.
 *
 * Names are not unique on the server; the first match in server order wins
 * and no secondary sort is applied.  A name that matches nothing yields
 * `null`.
 */

import type { ConsoleSession } from '../core/consoleSession';
import type { ConsoleParser } from '../parsers/baseParser';
import type { FolderEntry, UploadEntry } from '../core/types';
import { Logger } from '../core/logger';

const logger = new Logger('FolderUploadLocator');

export const UPLOAD_PAGE_ENDPOINT = '/repo/?mod=upload_file';
export const UPLOADS_PER_PAGE = 100;

export function browseEndpoint(folderId: number, start: number): string {
  return (
    `/repo/?mod=browse-processPost&folder=${folderId}` +
    `&iDisplayStart=${start}&iDisplayLength=${UPLOADS_PER_PAGE}`
  );
}

export class FolderUploadLocator {
  constructor(
    private readonly session: ConsoleSession,
    private readonly parser: ConsoleParser,
    private readonly maxListPages: number = 50,
  ) {}

  // ── Folders ────────────────────────────────────────────

  /** Every folder visible to the logged-in user (from the upload page's selector). */
  async listFolders(): Promise<FolderEntry[]> {
    const response = await this.session.get(UPLOAD_PAGE_ENDPOINT);
    return this.parser.parseFolders(response.body);
  }

  async resolveFolder(name: string): Promise<number | null> {
    const folders = await this.listFolders();
    const folder = folders.find((f) => f.name === name);

    if (!folder) {
      logger.warn(`Folder "${name}" not found among ${folders.length} folder(s)`);
      return null;
    }
    logger.debug(`Folder "${name}" → ${folder.id}`);
    return folder.id;
  }

  // ── Uploads ────────────────────────────────────────────

  async resolveUpload(
    folderId: number,
    name: string,
    exactMatch: boolean = true,
  ): Promise<number | null> {
    const upload = await this.findUpload(folderId, name, exactMatch);
    return upload ? upload.id : null;
  }

  /**
   * First upload whose name equals `name` (exact) or contains it, walking the
   * folder's listing page by page.
   */
  async findUpload(
    folderId: number,
    name: string,
    exactMatch: boolean = true,
  ): Promise<UploadEntry | null> {
    const found = await this.scanUploads(folderId, (upload) =>
      exactMatch ? upload.name === name : upload.name.includes(name),
    );

    if (found) {
      logger.debug(`Upload "${name}" → ${found.id} (folder ${folderId})`);
    } else {
      logger.warn(`Upload "${name}" not found in folder ${folderId}`);
    }
    return found;
  }

  /** The listing entry of a known upload (carries its top tree item). */
  async getUpload(folderId: number, uploadId: number): Promise<UploadEntry | null> {
    return this.scanUploads(folderId, (upload) => upload.id === uploadId);
  }

  /**
   * Request pages of 100 rows until a row matches, a page comes back empty,
   * the server's total is reached or `maxListPages` pages were read.
   */
  private async scanUploads(
    folderId: number,
    matches: (upload: UploadEntry) => boolean,
  ): Promise<UploadEntry | null> {
    for (let pageIndex = 0; pageIndex < this.maxListPages; pageIndex++) {
      const start = pageIndex * UPLOADS_PER_PAGE;
      const response = await this.session.get(browseEndpoint(folderId, start));
      const page = this.parser.parseUploadPage(response.body, folderId);
      if (!page || page.uploads.length === 0) return null;

      const found = page.uploads.find(matches);
      if (found) return found;

      const seen = start + page.uploads.length;
      if (page.totalRecords === null || seen >= page.totalRecords) return null;
    }
    return null;
  }
}
