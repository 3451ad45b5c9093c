import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StorageError } from '../src/errors';
import { createBucketIfNotExists, getBucket } from '../src/lmdb/bucket';
import { openDatabase, type KvEnv } from '../src/lmdb/client';
import { decodeId, encodeId } from '../src/lmdb/keys';

let dir: string;
let dbPath: string;
let env: KvEnv;

beforeEach(async () => {
  dir = mkdtempSync(join(tmpdir(), 'backlog-bucket-'));
  dbPath = join(dir, 'bucket.db');
  env = await openDatabase(dbPath);
});

afterEach(async () => {
  await env.close();
  rmSync(dir, { recursive: true, force: true });
});

describe('id keys', () => {
  it('encodes ids as 8-byte big-endian', () => {
    expect(encodeId(1n).toString('hex')).toBe('0000000000000001');
    expect(encodeId(258n).toString('hex')).toBe('0000000000000102');
    expect(encodeId(2n ** 64n - 1n).toString('hex')).toBe('ffffffffffffffff');
  });

  it('keeps byte order in step with numeric order', () => {
    expect(Buffer.compare(encodeId(255n), encodeId(256n))).toBe(-1);
    expect(Buffer.compare(encodeId(2n ** 32n), encodeId(9n))).toBe(1);
  });

  it('decodes keys handed back as plain byte arrays', () => {
    expect(decodeId(new Uint8Array([0, 0, 0, 0, 0, 0, 1, 2]))).toBe(258n);
  });

  it('rejects keys of the wrong width', () => {
    expect(() => decodeId(Buffer.from([1, 2, 3]))).toThrow(RangeError);
  });
});

describe('buckets', () => {
  it('does not exist until created', () => {
    expect(getBucket(env, 'icecream')).toBeNull();
    env.update(() => createBucketIfNotExists(env, 'icecream'));
    expect(getBucket(env, 'icecream')?.name).toBe('icecream');
  });

  it('creating twice keeps the sequence', () => {
    const first = env.update(() => createBucketIfNotExists(env, 'icecream').nextSequence());
    const again = env.update(() => createBucketIfNotExists(env, 'icecream').nextSequence());
    expect([first, again]).toEqual([1n, 2n]);
  });

  it('keeps one sequence per bucket', () => {
    const seqs = env.update(() => {
      const a = createBucketIfNotExists(env, 'a');
      const b = createBucketIfNotExists(env, 'b');
      return [a.nextSequence(), a.nextSequence(), b.nextSequence()];
    });
    expect(seqs).toEqual([1n, 2n, 1n]);
  });

  it('iterates entries in key byte order, not insertion order', () => {
    env.update(() => {
      const bucket = createBucketIfNotExists(env, 'icecream');
      bucket.put(encodeId(256n), Buffer.from('c'));
      bucket.put(encodeId(1n), Buffer.from('a'));
      bucket.put(encodeId(2n), Buffer.from('b'));
    });

    const keys = getBucket(env, 'icecream')
      ?.entries()
      .map(([key]) => decodeId(key));
    expect(keys).toEqual([1n, 2n, 256n]);
  });

  it('get, put and delete a single key', () => {
    const key = encodeId(7n);
    const bucket = env.update(() => createBucketIfNotExists(env, 'icecream'));
    expect(bucket.get(key)).toBeUndefined();

    env.update(() => {
      bucket.put(key, Buffer.from('first'));
      bucket.put(key, Buffer.from('second'));
    });
    expect(bucket.get(key)?.toString('utf8')).toBe('second');

    env.update(() => bucket.delete(key));
    expect(bucket.get(key)).toBeUndefined();
    expect(bucket.entries()).toEqual([]);
  });

  it('does not mix entries of different buckets', () => {
    env.update(() => {
      createBucketIfNotExists(env, 'a').put(encodeId(1n), Buffer.from('in a'));
      createBucketIfNotExists(env, 'b').put(encodeId(1n), Buffer.from('in b'));
    });
    expect(getBucket(env, 'a')?.get(encodeId(1n))?.toString('utf8')).toBe('in a');
    expect(getBucket(env, 'b')?.entries()).toHaveLength(1);
  });

  it('rolls back every write of a failed transaction', () => {
    expect(() =>
      env.update(() => {
        createBucketIfNotExists(env, 'icecream').put(encodeId(1n), Buffer.from('lost'));
        throw new Error('abort');
      }),
    ).toThrow('abort');
    expect(getBucket(env, 'icecream')).toBeNull();
  });
});

describe('openDatabase', () => {
  it('persists the sequence across reopen', async () => {
    env.update(() => createBucketIfNotExists(env, 'icecream').nextSequence());
    await env.close();

    env = await openDatabase(dbPath);
    expect(env.update(() => getBucket(env, 'icecream')?.nextSequence())).toBe(2n);
  });

  it('gives up on a locked file after the timeout', async () => {
    await expect(openDatabase(dbPath, { timeoutMs: 50 })).rejects.toBeInstanceOf(StorageError);
  });

  it('opens again once the holder closes', async () => {
    await env.close();
    env = await openDatabase(dbPath, { timeoutMs: 50 });
    expect(env.isOpen).toBe(true);
  });

  it('refuses work once closed', async () => {
    await env.close();
    expect(() => env.view(() => getBucket(env, 'icecream'))).toThrow('store is closed');
  });
});
