export type { EntryRecord } from './EntryTypes';
export {
  ENTRY_FILE_EXTENSION,
  TEMP_FILE_SUFFIX,
  EntryRecordSchema,
} from './EntryTypes';

export { EntrySerializer } from './EntrySerializer';
