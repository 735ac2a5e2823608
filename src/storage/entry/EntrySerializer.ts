import { createHash } from 'crypto';
import type { ZodError } from 'zod';
import type { Entry } from '../../common/Types';
import { CorruptEntryError } from '../../common/Errors';
import { ENTRY_FILE_EXTENSION, EntryRecordSchema } from './EntryTypes';
import type { EntryRecord } from './EntryTypes';

export class EntrySerializer {

  public static hashKey(key: string): string {
    return createHash('sha256').update(key, 'utf8').digest('hex');
  }

  public static filenameFor(key: string): string {
    return `${EntrySerializer.hashKey(key)}${ENTRY_FILE_EXTENSION}`;
  }

  public static serialize(entry: Entry): string {
    const record: EntryRecord = {
      Expiry: entry.expiry.toISOString(),
      Key: entry.key,
      Value: entry.value.toString('base64'),
    };
    return JSON.stringify(record);
  }

  /**
   * @param source - file or key the content came from, used in error messages
   */
  public static deserialize(content: string, source: string): Entry {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new CorruptEntryError(source, 'invalid JSON', err);
    }

    const parsed = EntryRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CorruptEntryError(source, EntrySerializer.describe(parsed.error), parsed.error);
    }

    const expiry = new Date(parsed.data.Expiry);
    if (Number.isNaN(expiry.getTime())) {
      throw new CorruptEntryError(source, `invalid expiry ${parsed.data.Expiry}`);
    }

    return {
      key: parsed.data.Key,
      value: parsed.data.Value === null ? Buffer.alloc(0) : Buffer.from(parsed.data.Value, 'base64'),
      expiry,
    };
  }

  private static describe(error: ZodError): string {
    return error.issues
      .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'record'}: ${issue.message}`)
      .join('; ');
  }
}
