/**
 * mimeTypes.ts: Content type for uploaded files, guessed from the extension.
 *
 * The upload handler only needs a plausible type; unpacking is decided by the
 * server from the file contents, so anything unknown is sent as a byte stream.
 */

import { extname } from 'path';

const DEFAULT_MIME_TYPE = 'application/octet-stream';

// Compound extensions first so ".tar.gz" wins over ".gz".
const COMPOUND_TYPES: ReadonlyArray<readonly [string, string]> = [
  ['.tar.gz', 'application/x-tar'],
  ['.tar.bz2', 'application/x-tar'],
  ['.tar.xz', 'application/x-tar'],
];

const MIME_TYPES: Record<string, string> = {
  '.tar': 'application/x-tar',
  '.tgz': 'application/x-tar',
  '.gz': 'application/gzip',
  '.bz2': 'application/x-bzip2',
  '.xz': 'application/x-xz',
  '.zip': 'application/zip',
  '.jar': 'application/java-archive',
  '.7z': 'application/x-7z-compressed',
  '.rpm': 'application/x-rpm',
  '.deb': 'application/vnd.debian.binary-package',
  '.txt': 'text/plain',
  '.c': 'text/x-c',
  '.h': 'text/x-c',
  '.py': 'text/x-python',
  '.js': 'text/javascript',
  '.json': 'application/json',
  '.xml': 'application/xml',
};

export function guessMimeType(filePath: string): string {
  const lower = filePath.toLowerCase();
  for (const [suffix, type] of COMPOUND_TYPES) {
    if (lower.endsWith(suffix)) return type;
  }
  return MIME_TYPES[extname(lower)] ?? DEFAULT_MIME_TYPE;
}
