/**
 * bulkTextMatch.ts: Bulk license reclassification ("monkbulk").
 *
 * A bulk text match tells the server: wherever this reference text occurs in
 * the upload, add and/or remove these licenses.  Actions are validated when
 * they are made; the request keeps them in the given order, one indexed
 * triple per action, and leaves conflict resolution to the server.
 */

import type { ConsoleSession } from '../core/consoleSession';
import type { BulkAction, BulkTextMatchAction, LicenseEntry } from '../core/types';
import { InvalidBulkActionError } from '../core/errors';
import { Logger } from '../core/logger';

const logger = new Logger('BulkTextMatch');

export const BULK_TEXT_MATCH_ENDPOINT = '/repo/?mod=change-license-bulk';

const BULK_ACTIONS: readonly BulkAction[] = ['add', 'remove'];

export function isBulkAction(value: string): value is BulkAction {
  return BULK_ACTIONS.some((action) => action === value);
}

export function makeBulkTextMatchAction(
  licenseId: number,
  licenseName: string,
  action: string,
): BulkTextMatchAction {
  if (!Number.isInteger(licenseId) || licenseId <= 0) {
    throw new InvalidBulkActionError(`License id must be a positive integer, got ${licenseId}`);
  }
  if (licenseName.trim() === '') {
    throw new InvalidBulkActionError('License name must not be empty');
  }
  if (!isBulkAction(action)) {
    throw new InvalidBulkActionError(`Bulk action must be "add" or "remove", got "${action}"`);
  }
  return { licenseId, licenseName, action };
}

/** Shorthand for a license already looked up with `UploadManager.getLicenses()`. */
export function actionForLicense(license: LicenseEntry, action: BulkAction): BulkTextMatchAction {
  return makeBulkTextMatchAction(license.id, license.name, action);
}

/**
 * Form fields for an upload-wide bulk match on tree item `itemId`.
 * Index `i` in `bulkAction[i][…]` is the action's position in `actions`.
 */
export function buildBulkTextMatchRequest(
  referenceText: string,
  itemId: number,
  actions: readonly BulkTextMatchAction[],
): Record<string, string> {
  const fields: Record<string, string> = {
    refText: referenceText,
    bulkScope: 'u',
    uploadTreeId: String(itemId),
    forceDecision: '0',
  };

  actions.forEach((entry, row) => {
    const prefix = `bulkAction[${row}]`;
    fields[`${prefix}[licenseId]`] = String(entry.licenseId);
    fields[`${prefix}[licenseName]`] = entry.licenseName;
    fields[`${prefix}[action]`] = entry.action;
  });

  return fields;
}

/** License ids that are both added and removed in one request. */
export function findConflictingLicenses(actions: readonly BulkTextMatchAction[]): number[] {
  const added = new Set<number>();
  const removed = new Set<number>();
  for (const entry of actions) {
    (entry.action === 'add' ? added : removed).add(entry.licenseId);
  }
  return [...added].filter((id) => removed.has(id));
}

export class BulkTextMatcher {
  constructor(private readonly session: ConsoleSession) {}

  async startBulkTextMatch(
    referenceText: string,
    itemId: number,
    actions: readonly BulkTextMatchAction[],
  ): Promise<void> {
    const conflicts = findConflictingLicenses(actions);
    if (conflicts.length > 0) {
      logger.warn(
        `License(s) ${conflicts.join(', ')} are both added and removed; ` +
          `the server decides which wins`,
      );
    }

    logger.info(`Starting bulk text match on item ${itemId} with ${actions.length} action(s)`);
    await this.session.post(
      BULK_TEXT_MATCH_ENDPOINT,
      buildBulkTextMatchRequest(referenceText, itemId, actions),
    );
  }
}
