import { pack, unpack } from 'msgpackr';
import { StoredRecordSchema } from './schemas';
import { DataCorruptionError } from './errors';
import type { RecordData, StoredRecord } from './types';

/**
 * Serializes a record to MessagePack for the key-value store.
 */
export function encodeRecord<T extends object>(record: StoredRecord<T>): Uint8Array {
  return pack(record);
}

/**
 * Decodes and validates a stored value.
 * @throws DataCorruptionError when the bytes do not unpack or do not match the record schema
 */
export function decodeRecord<T extends object = RecordData>(
  store: string,
  key: string,
  value: Uint8Array
): StoredRecord<T> {
  let raw: unknown;
  try {
    raw = unpack(value);
  } catch (err) {
    throw new DataCorruptionError(store, key, `undecodable payload (${err instanceof Error ? err.message : String(err)})`);
  }

  const result = StoredRecordSchema.safeParse(raw);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new DataCorruptionError(store, key, reason);
  }
  // The payload shape is owned by the application template; the schema only guarantees a plain object.
  return result.data as StoredRecord<T>;
}
