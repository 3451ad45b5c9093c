import type { RecordId } from '../types';

export const KEY_BYTES = 8;

/** Big-endian so that byte order of keys matches numeric order of ids. */
export function encodeId(id: RecordId): Buffer {
  const key = Buffer.alloc(KEY_BYTES);
  key.writeBigUInt64BE(id);
  return key;
}

export function decodeId(key: Uint8Array): RecordId {
  if (key.length !== KEY_BYTES) {
    throw new RangeError(`expected ${KEY_BYTES}-byte key, got ${key.length} bytes`);
  }
  return Buffer.from(key.buffer, key.byteOffset, key.length).readBigUInt64BE();
}
