/**
 * Zod Schemas for Tar Reader Validation
 */

import { z } from 'zod';

/**
 * Tar Reader Options Schema
 */
export const TarReaderOptionsSchema = z.object({
  // Reject headers whose checksum does not match
  verifyChecksums: z.boolean().optional().default(true),
  // Upper bound on a single entry, guards against corrupt size fields
  maxEntryBytes: z.number().int().positive().optional().default(512 * 1024 * 1024),
});

/**
 * Tar Entry Schema
 */
export const TarEntrySchema = z.object({
  name: z.string().min(1),
  type: z.string().length(1),
  size: z.number().int().min(0),
  data: z.instanceof(Uint8Array),
});

export type TarReaderOptions = z.infer<typeof TarReaderOptionsSchema>;
export type TarEntry = z.infer<typeof TarEntrySchema>;
