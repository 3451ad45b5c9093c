import { StorageError, errorMessage } from '../errors';
import { createBucketIfNotExists, getBucket } from '../lmdb/bucket';
import { openDatabase, type KvEnv, type OpenOptions } from '../lmdb/client';
import { decodeId, encodeId } from '../lmdb/keys';
import type { RecordStore } from '../contracts/recordStore';
import type { BacklogRecord, RecordId } from '../types';

export const RECORD_BUCKET = 'icecream';

/**
 * Implements `RecordStore` on a single bucket of the embedded LMDB store.
 * LMDB admits one write transaction at a time, so concurrent writers are serialized by the engine.
 */
export class LmdbRecordStore implements RecordStore {
  constructor(
    private readonly env: KvEnv,
    private readonly bucketName: string = RECORD_BUCKET,
  ) {}

  static async open(path: string, opts?: OpenOptions): Promise<LmdbRecordStore> {
    return new LmdbRecordStore(await openDatabase(path, opts));
  }

  add(name: string): RecordId {
    return this.run('add', () =>
      this.env.update(() => {
        const bucket = createBucketIfNotExists(this.env, this.bucketName);
        const id = bucket.nextSequence();
        bucket.put(encodeId(id), Buffer.from(name, 'utf8'));
        return id;
      }),
    );
  }

  delete(id: RecordId): string {
    return this.run('delete', () =>
      this.env.update(() => {
        const bucket = createBucketIfNotExists(this.env, this.bucketName);
        const key = encodeId(id);
        const name = bucket.get(key)?.toString('utf8') ?? '';
        bucket.delete(key);
        return name;
      }),
    );
  }

  list(): BacklogRecord[] {
    return this.run('list', () =>
      this.env.view(() => {
        const bucket = getBucket(this.env, this.bucketName);
        if (!bucket) {
          throw new StorageError(`bucket ${JSON.stringify(this.bucketName)} does not exist`);
        }
        return bucket.entries().map(([key, value]) => ({
          id: decodeId(key),
          name: value.toString('utf8'),
        }));
      }),
    );
  }

  ping(): void {
    this.run('ping', () => this.env.view(() => getBucket(this.env, this.bucketName)));
  }

  async close(): Promise<void> {
    await this.env.close();
  }

  private run<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw toStorageError(op, err);
    }
  }
}

function toStorageError(op: string, err: unknown): StorageError {
  if (err instanceof StorageError) return err;
  return new StorageError(`${op} failed: ${errorMessage(err)}`, { cause: err });
}
