import { open, type Database, type RootDatabase } from 'lmdb';
import { lock } from 'proper-lockfile';
import { StorageError, errorMessage } from '../errors';

export const DEFAULT_LOCK_TIMEOUT_MS = 3000;
const LOCK_RETRY_MS = 100;
const CATALOG_DB = '__buckets';

export interface OpenOptions {
  /** How long to wait for another holder of the file lock before giving up. */
  timeoutMs?: number;
}

export type EntriesDb = Database<Buffer, Buffer>;

/**
 * Handle on the store file. The catalog maps bucket names to their 8-byte sequence;
 * each bucket's entries live in a named database with binary keys, which LMDB keeps
 * in lexicographic byte order.
 */
export class KvEnv {
  private readonly entryDbs = new Map<string, EntriesDb>();
  private closed = false;
  private lockLost: Error | null = null;

  constructor(
    private readonly root: RootDatabase<Buffer, string>,
    readonly catalog: Database<Buffer, string>,
    private readonly releaseLock: () => Promise<void>,
  ) {}

  get isOpen(): boolean {
    return !this.closed;
  }

  entries(bucket: string): EntriesDb {
    let db = this.entryDbs.get(bucket);
    if (!db) {
      db = this.root.openDB<Buffer, Buffer>({ name: bucket, keyEncoding: 'binary', encoding: 'binary' });
      this.entryDbs.set(bucket, db);
    }
    return db;
  }

  /** Runs `fn` in one synchronous read-write transaction. */
  update<T>(fn: () => T): T {
    this.assertUsable();
    return this.root.transactionSync(fn);
  }

  /** Runs `fn` against committed data; never blocks on writers. */
  view<T>(fn: () => T): T {
    this.assertUsable();
    return fn();
  }

  lockCompromised(err: Error): void {
    this.lockLost = err;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.root.close();
    await this.releaseLock();
  }

  private assertUsable(): void {
    if (this.closed) throw new StorageError('store is closed');
    if (this.lockLost) throw new StorageError(`store lock lost: ${this.lockLost.message}`, { cause: this.lockLost });
  }
}

/**
 * Takes an exclusive lock on `path`, waiting at most `timeoutMs` for a competing
 * holder, then opens (or creates) the store file.
 */
export async function openDatabase(path: string, opts: OpenOptions = {}): Promise<KvEnv> {
  const timeoutMs = Math.max(0, opts.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS);
  const interval = Math.min(LOCK_RETRY_MS, timeoutMs);

  let env: KvEnv | null = null;
  let release: () => Promise<void>;
  try {
    release = await lock(path, {
      realpath: false,
      retries:
        interval > 0
          ? { retries: Math.floor(timeoutMs / interval), factor: 1, minTimeout: interval, maxTimeout: interval }
          : 0,
      onCompromised: (err) => env?.lockCompromised(err),
    });
  } catch (err) {
    throw new StorageError(`lock ${path}: ${errorMessage(err)}`, { cause: err });
  }

  try {
    const root = open<Buffer, string>({ path, encoding: 'binary' });
    const catalog = root.openDB<Buffer, string>({ name: CATALOG_DB, encoding: 'binary' });
    env = new KvEnv(root, catalog, release);
    return env;
  } catch (err) {
    await release();
    throw new StorageError(`open ${path}: ${errorMessage(err)}`, { cause: err });
  }
}
