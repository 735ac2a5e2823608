/**
 * Entry record definitions
 *
 * One file per entry, named by the SHA-256 of the key. The record carries the
 * key itself so listings can recover it without reversing the hash.
 *
 * File format (JSON):
 *   { "Expiry": "<RFC 3339>", "Key": "<string>", "Value": "<base64 | null>" }
 */

import { z } from 'zod';

export const ENTRY_FILE_EXTENSION = '.json';

export const TEMP_FILE_SUFFIX = '.tmp';

export const EntryRecordSchema = z.object({
  Expiry: z.string().datetime({ offset: true }),
  Key: z.string().min(1),
  Value: z.string().base64().nullable(),
});

export type EntryRecord = z.infer<typeof EntryRecordSchema>;
