/**
 * Tar Reader
 *
 * Reads ustar archives held in memory, including GNU long names and pax
 * path records. Only regular file entries are returned; directories and
 * link entries are skipped.
 */

import {
  TarEntrySchema,
  TarReaderOptionsSchema,
  type TarEntry,
  type TarReaderOptions
} from '../../schemas/tar-reader';
import { ERROR_MESSAGES, TAR_CONSTANTS } from '../../constants';
import { BridgeErrorFactory } from '../../errors';

const FILE_TYPES: readonly string[] = [
  TAR_CONSTANTS.TYPE_FILE,
  TAR_CONSTANTS.TYPE_FILE_LEGACY,
  TAR_CONSTANTS.TYPE_CONTIGUOUS,
];

/**
 * Sequential reader over one tar stream
 */
export class TarReader {
  private verifyChecksums: boolean;
  private maxEntryBytes: number;
  private decoder = new TextDecoder('utf-8');

  constructor(options: Partial<TarReaderOptions> = {}) {
    const validatedOptions = TarReaderOptionsSchema.parse(options);

    this.verifyChecksums = validatedOptions.verifyChecksums;
    this.maxEntryBytes = validatedOptions.maxEntryBytes;
  }

  /**
   * Read every regular file entry
   */
  read(data: Uint8Array): TarEntry[] {
    const { BLOCK_SIZE } = TAR_CONSTANTS;
    const entries: TarEntry[] = [];
    let offset = 0;
    let longName: string | undefined;
    let paxPath: string | undefined;
    let reachedEnd = false;

    while (offset + BLOCK_SIZE <= data.length) {
      const header = data.subarray(offset, offset + BLOCK_SIZE);

      // Two zero blocks close the archive; one is enough to stop
      if (isZeroBlock(header)) {
        reachedEnd = true;
        break;
      }

      if (this.verifyChecksums) {
        this.verifyChecksum(header, offset);
      }

      const size = this.readSize(header, offset);
      const type = String.fromCharCode(header[TAR_CONSTANTS.TYPE_OFFSET]);
      const dataStart = offset + BLOCK_SIZE;
      const dataEnd = dataStart + size;

      if (dataEnd > data.length) {
        throw BridgeErrorFactory.extractionError(ERROR_MESSAGES.TAR_TRUNCATED, 'tar', { offset, size });
      }

      const body = data.subarray(dataStart, dataEnd);
      offset = dataStart + Math.ceil(size / BLOCK_SIZE) * BLOCK_SIZE;

      if (type === TAR_CONSTANTS.TYPE_GNU_LONG_NAME) {
        longName = this.readString(body, 0, body.length);
        continue;
      }
      if (type === TAR_CONSTANTS.TYPE_PAX_HEADER) {
        paxPath = this.readPaxRecords(body).get('path') ?? paxPath;
        continue;
      }
      if (type === TAR_CONSTANTS.TYPE_PAX_GLOBAL) {
        continue;
      }

      const name = paxPath ?? longName ?? this.readHeaderName(header);
      longName = undefined;
      paxPath = undefined;

      if (!FILE_TYPES.includes(type) || name.length === 0) {
        continue;
      }

      entries.push(TarEntrySchema.parse({ name, type, size, data: body }));
    }

    if (!reachedEnd && offset < data.length && !isZeroBlock(data.subarray(offset))) {
      throw BridgeErrorFactory.extractionError(ERROR_MESSAGES.TAR_TRUNCATED, 'tar', { offset });
    }

    return entries;
  }

  /**
   * Header checksum: byte sum with the checksum field read as spaces.
   * Some writers sum signed bytes, so both sums are accepted.
   */
  private verifyChecksum(header: Uint8Array, offset: number): void {
    const start = TAR_CONSTANTS.CHECKSUM_OFFSET;
    const end = start + TAR_CONSTANTS.CHECKSUM_LENGTH;
    const stored = parseOctal(this.readString(header, start, TAR_CONSTANTS.CHECKSUM_LENGTH));

    let unsigned = 0;
    let signed = 0;
    for (let i = 0; i < header.length; i++) {
      const byte = i >= start && i < end ? TAR_CONSTANTS.CHECKSUM_SPACE : header[i];
      unsigned += byte;
      signed += byte > 127 ? byte - 256 : byte;
    }

    if (stored === undefined || (stored !== unsigned && stored !== signed)) {
      throw BridgeErrorFactory.extractionError(ERROR_MESSAGES.TAR_CHECKSUM, 'tar', { offset, stored, computed: unsigned });
    }
  }

  private readSize(header: Uint8Array, offset: number): number {
    const size = parseOctal(this.readString(header, TAR_CONSTANTS.SIZE_OFFSET, TAR_CONSTANTS.SIZE_LENGTH));
    if (size === undefined || size > this.maxEntryBytes) {
      throw BridgeErrorFactory.extractionError('Tar entry has an invalid size', 'tar', { offset, size });
    }
    return size;
  }

  private readHeaderName(header: Uint8Array): string {
    const name = this.readString(header, TAR_CONSTANTS.NAME_OFFSET, TAR_CONSTANTS.NAME_LENGTH);
    const magic = this.readString(header, TAR_CONSTANTS.MAGIC_OFFSET, TAR_CONSTANTS.MAGIC_LENGTH);
    if (!magic.startsWith(TAR_CONSTANTS.USTAR_MAGIC)) {
      return name;
    }
    const prefix = this.readString(header, TAR_CONSTANTS.PREFIX_OFFSET, TAR_CONSTANTS.PREFIX_LENGTH);
    return prefix ? `${prefix}/${name}` : name;
  }

  /**
   * NUL-terminated field
   */
  private readString(bytes: Uint8Array, start: number, length: number): string {
    const field = bytes.subarray(start, start + length);
    const nul = field.indexOf(0);
    return this.decoder.decode(nul === -1 ? field : field.subarray(0, nul));
  }

  /**
   * Pax records: "<length> <key>=<value>\n", length counting the whole record
   */
  private readPaxRecords(body: Uint8Array): Map<string, string> {
    const records = new Map<string, string>();
    let pos = 0;

    while (pos < body.length) {
      const space = body.indexOf(0x20, pos);
      if (space === -1) break;
      const length = Number.parseInt(this.decoder.decode(body.subarray(pos, space)), 10);
      if (!Number.isFinite(length) || length <= 0 || pos + length > body.length) break;

      const record = this.decoder.decode(body.subarray(space + 1, pos + length)).replace(/\n$/, '');
      const separator = record.indexOf('=');
      if (separator > 0) {
        records.set(record.slice(0, separator), record.slice(separator + 1));
      }
      pos += length;
    }

    return records;
  }
}

function isZeroBlock(block: Uint8Array): boolean {
  for (let i = 0; i < block.length; i++) {
    if (block[i] !== 0) return false;
  }
  return true;
}

/**
 * Octal numeric field, padded with spaces or NULs
 */
function parseOctal(field: string): number | undefined {
  const trimmed = field.trim();
  if (!/^[0-7]+$/.test(trimmed)) {
    return trimmed.length === 0 ? 0 : undefined;
  }
  return Number.parseInt(trimmed, 8);
}

/**
 * Read all regular file entries from a tar stream
 */
export function readTarEntries(data: Uint8Array, options: Partial<TarReaderOptions> = {}): TarEntry[] {
  return new TarReader(options).read(data);
}
