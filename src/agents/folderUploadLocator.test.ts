import { describe, expect, it } from 'vitest';
import { FolderUploadLocator } from './folderUploadLocator';
import { ConsoleSession } from '../core/consoleSession';
import { FossologyConsoleParser } from '../parsers/fossologyParser';
import {
  fakeConsole,
  testSettings,
  uploadFormPage,
  uploadListBody,
  type FakeReply,
  type RecordedCall,
} from '../testing/fakeConsole';

function locatorFor(handler: (call: RecordedCall, index: number) => FakeReply, maxListPages = 50) {
  const fake = fakeConsole(handler);
  const session = new ConsoleSession(testSettings, { request: fake.request });
  return { fake, locator: new FolderUploadLocator(session, new FossologyConsoleParser(), maxListPages) };
}

function startOf(call: RecordedCall): number {
  const match = call.endpoint.match(/iDisplayStart=(\d+)/);
  return match ? Number(match[1]) : -1;
}

describe('FolderUploadLocator folders', () => {
  const folders = [
    { id: 1, name: 'Software Repository' },
    { id: 2, name: 'Releases' },
    { id: 3, name: 'Releases' },
  ];

  it('resolves a folder name to its id, first match winning', async () => {
    const { locator, fake } = locatorFor(() => uploadFormPage(folders));

    expect(await locator.resolveFolder('Releases')).toBe(2);
    expect(fake.calls[0].endpoint).toBe('/repo/?mod=upload_file');
  });

  it('matches names with inner runs of spaces exactly', async () => {
    const { locator } = locatorFor(() =>
      uploadFormPage([
        { id: 5, name: '&nbsp;&nbsp;a b' },
        { id: 6, name: '&nbsp;&nbsp;a  b' },
      ]),
    );

    expect(await locator.resolveFolder('a  b')).toBe(6);
    expect(await locator.resolveFolder('a b')).toBe(5);
  });

  it('returns null for an unknown folder', async () => {
    const { locator } = locatorFor(() => uploadFormPage(folders));
    expect(await locator.resolveFolder('releases')).toBeNull();
  });
});

describe('FolderUploadLocator uploads', () => {
  const rows = [
    { id: 21, name: 'lib-1.0' },
    { id: 22, name: 'lib-1.0-old' },
    { id: 23, name: 'lib-1.0' },
  ];

  it('returns the first exact match', async () => {
    const { locator, fake } = locatorFor(() => uploadListBody(rows));

    expect(await locator.resolveUpload(2, 'lib-1.0')).toBe(21);
    expect(fake.calls[0].endpoint).toBe(
      '/repo/?mod=browse-processPost&folder=2&iDisplayStart=0&iDisplayLength=100',
    );
  });

  it('matches substrings when exactMatch is false', async () => {
    const { locator } = locatorFor(() => uploadListBody(rows));

    expect(await locator.resolveUpload(2, '1.0-old', false)).toBe(22);
    expect(await locator.resolveUpload(2, '1.0-old', true)).toBeNull();
  });

  it('returns null when nothing matches', async () => {
    const { locator } = locatorFor(() => uploadListBody(rows));
    expect(await locator.resolveUpload(2, 'missing')).toBeNull();
  });

  it('walks later pages until it finds the upload', async () => {
    const firstPage = Array.from({ length: 100 }, (_, i) => ({ id: i + 1, name: `pkg-${i + 1}` }));
    const { locator, fake } = locatorFor((call) =>
      startOf(call) === 0
        ? uploadListBody(firstPage, 130)
        : uploadListBody([{ id: 500, name: 'late-arrival', itemId: 5000 }], 130),
    );

    expect(await locator.findUpload(2, 'late-arrival')).toEqual({
      id: 500,
      name: 'late-arrival',
      folderId: 2,
      itemId: 5000,
    });
    expect(fake.calls.map(startOf)).toEqual([0, 100]);
  });

  it('stops once the server total is reached', async () => {
    const { locator, fake } = locatorFor(() => uploadListBody(rows, 3));

    expect(await locator.resolveUpload(2, 'missing')).toBeNull();
    expect(fake.calls).toHaveLength(1);
  });

  it('stops after the page limit', async () => {
    const page = Array.from({ length: 100 }, (_, i) => ({ id: i + 1, name: `pkg-${i + 1}` }));
    const { locator, fake } = locatorFor(() => uploadListBody(page, 10_000), 3);

    expect(await locator.resolveUpload(2, 'missing')).toBeNull();
    expect(fake.calls.map(startOf)).toEqual([0, 100, 200]);
  });

  it('returns null when the listing is not JSON', async () => {
    const { locator } = locatorFor(() => '<html>Please log in</html>');
    expect(await locator.resolveUpload(2, 'lib-1.0')).toBeNull();
  });

  it('looks an upload up by id to get its tree item', async () => {
    const { locator } = locatorFor(() =>
      uploadListBody([
        { id: 21, name: 'lib-1.0', itemId: 210 },
        { id: 23, name: 'lib-1.0', itemId: 230 },
      ]),
    );

    expect(await locator.getUpload(2, 23)).toEqual({ id: 23, name: 'lib-1.0', folderId: 2, itemId: 230 });
  });
});
