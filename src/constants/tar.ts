/**
 * Tar Format Constants
 *
 * POSIX ustar header layout plus the GNU and pax extensions seen in
 * exported asset bundles.
 */

export const TAR_CONSTANTS = {
  BLOCK_SIZE: 512,

  NAME_OFFSET: 0,
  NAME_LENGTH: 100,
  SIZE_OFFSET: 124,
  SIZE_LENGTH: 12,
  CHECKSUM_OFFSET: 148,
  CHECKSUM_LENGTH: 8,
  TYPE_OFFSET: 156,
  MAGIC_OFFSET: 257,
  MAGIC_LENGTH: 6,
  PREFIX_OFFSET: 345,
  PREFIX_LENGTH: 155,

  TYPE_FILE: '0',
  TYPE_FILE_LEGACY: '\0',
  TYPE_CONTIGUOUS: '7',
  TYPE_GNU_LONG_NAME: 'L',
  TYPE_PAX_HEADER: 'x',
  TYPE_PAX_GLOBAL: 'g',

  USTAR_MAGIC: 'ustar',
  CHECKSUM_SPACE: 0x20,
} as const;

export const GZIP_MAGIC = [0x1f, 0x8b] as const;
