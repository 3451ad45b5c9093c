import type { EntriesDb, KvEnv } from './client';
import { decodeId, encodeId } from './keys';

/**
 * A named, key-ordered collection inside the store. Writes must run inside
 * `KvEnv.update`; none of these methods opens a transaction.
 */
export class Bucket {
  private readonly db: EntriesDb;

  constructor(
    private readonly env: KvEnv,
    readonly name: string,
  ) {
    this.db = env.entries(name);
  }

  /** Increments and returns the bucket's counter. The first value is 1. */
  nextSequence(): bigint {
    const current = this.env.catalog.get(this.name);
    if (!current) {
      throw new Error(`bucket ${JSON.stringify(this.name)} does not exist`);
    }
    const next = decodeId(current) + 1n;
    this.env.catalog.putSync(this.name, encodeId(next));
    return next;
  }

  get(key: Buffer): Buffer | undefined {
    return this.db.get(key);
  }

  put(key: Buffer, value: Buffer): void {
    this.db.putSync(key, value);
  }

  delete(key: Buffer): void {
    this.db.removeSync(key);
  }

  /** All entries in ascending byte order of their keys. */
  entries(): Array<[Buffer, Buffer]> {
    return Array.from(this.db.getRange(), ({ key, value }): [Buffer, Buffer] => [key, value]);
  }
}

/** The bucket named `name`, or `null` when it was never created. */
export function getBucket(env: KvEnv, name: string): Bucket | null {
  return env.catalog.get(name) ? new Bucket(env, name) : null;
}

export function createBucketIfNotExists(env: KvEnv, name: string): Bucket {
  if (!env.catalog.get(name)) {
    env.catalog.putSync(name, encodeId(0n));
  }
  return new Bucket(env, name);
}
