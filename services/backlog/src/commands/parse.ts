import { InvalidArgumentError } from '../errors';
import type { RecordId } from '../types';

const MAX_UINT64 = 2n ** 64n - 1n;

export type Command =
  | { kind: 'help' }
  | { kind: 'list' }
  | { kind: 'add'; name: string }
  | { kind: 'del'; id: RecordId }
  | { kind: 'unknown' };

export type CommandKind = Command['kind'];

/**
 * Maps the slash-command text onto a command. `text` is trimmed first; the argument of
 * `add`/`del` is whatever follows the four-character prefix, taken verbatim.
 */
export function parseCommand(text: string): Command {
  const trimmed = text.trim();

  if (trimmed === 'help') return { kind: 'help' };
  if (trimmed === 'list') return { kind: 'list' };
  if (trimmed.startsWith('add ')) return { kind: 'add', name: trimmed.slice(4) };
  if (trimmed.startsWith('del ')) return { kind: 'del', id: parseRecordId(trimmed.slice(4)) };

  return { kind: 'unknown' };
}

/** Base-10 unsigned 64-bit integer: digits only, no sign, no surrounding space. */
export function parseRecordId(raw: string): RecordId {
  if (!/^[0-9]+$/.test(raw)) {
    throw new InvalidArgumentError(`invalid id ${JSON.stringify(raw)}: not an unsigned integer`);
  }
  const id = BigInt(raw);
  if (id > MAX_UINT64) {
    throw new InvalidArgumentError(`invalid id ${JSON.stringify(raw)}: out of range`);
  }
  return id;
}
