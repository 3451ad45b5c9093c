import type { BacklogRecord, RecordId } from '../types';

/**
 * Durable id -> name collection the command dispatcher relies on.
 * Each call is one atomic transaction; none of them yields to the event loop.
 */
export interface RecordStore {
  /** Reserves the next id, stores `name` under it, and returns the id. */
  add(name: string): RecordId;
  /** Removes `id` and returns the name it held, or `''` when it was absent. */
  delete(id: RecordId): string;
  /** Every record in ascending id order. Fails when nothing was ever written. */
  list(): BacklogRecord[];
  /** Runs a trivial read transaction; throws when the store is unusable. */
  ping(): void;
  close(): Promise<void>;
}
