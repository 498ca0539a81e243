import { describe, expect, it } from 'vitest';
import { guessMimeType } from './mimeTypes';

describe('guessMimeType', () => {
  it('maps known extensions, case-insensitively', () => {
    expect(guessMimeType('/tmp/lib-1.0.zip')).toBe('application/zip');
    expect(guessMimeType('README.TXT')).toBe('text/plain');
  });

  it('prefers compound archive suffixes', () => {
    expect(guessMimeType('lib-1.0.tar.gz')).toBe('application/x-tar');
    expect(guessMimeType('notes.gz')).toBe('application/gzip');
  });

  it('falls back to a byte stream', () => {
    expect(guessMimeType('blob.unknownext')).toBe('application/octet-stream');
    expect(guessMimeType('Makefile')).toBe('application/octet-stream');
  });
});
