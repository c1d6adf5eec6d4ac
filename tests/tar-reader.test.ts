/**
 * Tar reader unit tests
 * Header decoding, long names, checksums and truncation
 */
import { describe, expect, it } from 'vitest';
import { readTarEntries } from '../src/converters/shared/tar-reader';
import { ERROR_MESSAGES } from '../src/constants';
import { ExtractionError } from '../src/errors';
import { buildTar } from './helpers/archive-builder';

const decoder = new TextDecoder();

describe('readTarEntries', () => {
  it('returns regular files and skips directories', () => {
    const tar = buildTar([
      { name: 'folder/', type: '5' },
      { name: 'folder/notes.txt', content: 'hello' },
    ]);

    const entries = readTarEntries(tar);

    expect(entries).toHaveLength(1);
    expect(entries[0].name).toBe('folder/notes.txt');
    expect(entries[0].size).toBe(5);
    expect(decoder.decode(entries[0].data)).toBe('hello');
  });

  it('reads empty files', () => {
    const entries = readTarEntries(buildTar([{ name: 'empty', content: '' }]));
    expect(entries).toHaveLength(1);
    expect(entries[0].data.length).toBe(0);
  });

  it('keeps entries spanning several blocks intact', () => {
    const content = 'x'.repeat(1300);
    const entries = readTarEntries(buildTar([
      { name: 'big.bin', content },
      { name: 'after.txt', content: 'tail' },
    ]));

    expect(entries.map(entry => entry.name)).toEqual(['big.bin', 'after.txt']);
    expect(decoder.decode(entries[0].data)).toBe(content);
    expect(decoder.decode(entries[1].data)).toBe('tail');
  });

  it.each(['gnu', 'pax'] as const)('restores names longer than 100 bytes (%s)', longName => {
    const name = `${'d'.repeat(110)}/file.txt`;
    const entries = readTarEntries(buildTar([
      { name, content: 'long', longName },
      { name: 'short.txt', content: 'short' },
    ]));

    expect(entries.map(entry => entry.name)).toEqual([name, 'short.txt']);
    expect(decoder.decode(entries[0].data)).toBe('long');
  });

  it('joins the ustar prefix field with the name', () => {
    const entries = readTarEntries(buildTar([
      { name: 'some/deep/dir/file.txt', content: 'x', longName: 'prefix' },
    ]));
    expect(entries[0].name).toBe('some/deep/dir/file.txt');
  });

  it('rejects a header whose checksum does not match', () => {
    const tar = buildTar([{ name: 'data.txt', content: 'abc' }]);
    tar[0] = 'z'.charCodeAt(0);

    expect(() => readTarEntries(tar)).toThrow(ExtractionError);
    expect(() => readTarEntries(tar)).toThrow(ERROR_MESSAGES.TAR_CHECKSUM);
  });

  it('accepts a bad checksum when verification is off', () => {
    const tar = buildTar([{ name: 'data.txt', content: 'abc' }]);
    tar[0] = 'z'.charCodeAt(0);

    const entries = readTarEntries(tar, { verifyChecksums: false });
    expect(entries[0].name).toBe('zata.txt');
  });

  it('rejects an entry that runs past the end of the stream', () => {
    const tar = buildTar([{ name: 'data.bin', content: 'y'.repeat(1000) }]);
    expect(() => readTarEntries(tar.subarray(0, 612))).toThrow(ERROR_MESSAGES.TAR_TRUNCATED);
  });

  it('rejects a partial trailing header', () => {
    const bytes = new TextEncoder().encode('not an archive');
    expect(() => readTarEntries(bytes)).toThrow(ExtractionError);
  });

  it('rejects entries above the size limit', () => {
    const tar = buildTar([{ name: 'data.txt', content: 'abcdef' }]);
    expect(() => readTarEntries(tar, { maxEntryBytes: 4 })).toThrow('Tar entry has an invalid size');
  });
});
