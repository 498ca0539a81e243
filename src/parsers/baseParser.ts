/**
 * baseParser.ts: Parser contract + shared cheerio helpers.
 *
 * The console answers with server-rendered HTML, JSON wrapping HTML
 * fragments, or plain JSON.  Components never read a body themselves; they
 * hand it to a ConsoleParser and get typed records back.  A parser never
 * throws on malformed input: it yields an empty list or `null`.
 */

import * as cheerio from 'cheerio';
import type {
  FolderEntry,
  JobDetail,
  JobRow,
  LicenseEntry,
  UploadPage,
} from '../core/types';

export interface ConsoleParser {
  /** Folder selector of the upload page. */
  parseFolders(html: string): FolderEntry[];
  /** Hidden one-time token of the upload form. */
  parseUploadFormToken(html: string): string | null;
  /** Id of the upload announced by the page returned after an upload. */
  parseNewUploadId(html: string): number | null;
  /** One page of the folder browse listing; `null` when the body has no rows array. */
  parseUploadPage(body: string, folderId: number): UploadPage | null;
  parseLicenses(html: string): LicenseEntry[];
  /** Job rows in server order (newest first). */
  parseJobList(body: string): JobRow[];
  parseJobDetail(body: string): JobDetail | null;
}

export abstract class BaseParser implements ConsoleParser {
  abstract parseFolders(html: string): FolderEntry[];
  abstract parseUploadFormToken(html: string): string | null;
  abstract parseNewUploadId(html: string): number | null;
  abstract parseUploadPage(body: string, folderId: number): UploadPage | null;
  abstract parseLicenses(html: string): LicenseEntry[];
  abstract parseJobList(body: string): JobRow[];
  abstract parseJobDetail(body: string): JobDetail | null;

  // ── Shared helpers ─────────────────────────────────────

  protected load(html: string): cheerio.CheerioAPI {
    return cheerio.load(html);
  }

  /**
   * Read an integer query parameter from an href such as
   * "?mod=license&upload=12&item=345".
   */
  protected numericParam(href: string | undefined, name: string): number | null {
    if (!href) return null;
    const match = href.match(new RegExp(`[?&;]${name}=(\\d+)`));
    return match ? Number(match[1]) : null;
  }

  /**
   * Strip surrounding whitespace, including the &nbsp; indentation of nested
   * folders.  Inner spacing is part of the name and is kept.
   */
  protected cleanText(text: string): string {
    return text.trim();
  }

  protected toId(value: string | undefined): number | null {
    if (value === undefined || !/^\d+$/.test(value.trim())) return null;
    return Number(value.trim());
  }

  /** JSON.parse that yields `undefined` instead of throwing. */
  protected tryParseJson(body: string): unknown {
    try {
      return JSON.parse(body);
    } catch {
      return undefined;
    }
  }

  protected isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}
