import type { RecordStore } from '../contracts/recordStore';
import type { SlackMessage } from '../types';
import type { Command } from './parse';
import {
  addedText,
  backlogText,
  deletedText,
  helpText,
  privateMessage,
  publicMessage,
} from './messages';

export interface DispatcherOptions {
  store: RecordStore;
  slashCommand?: string;
}

/**
 * Runs one parsed command against the store and renders its reply.
 * Store errors propagate to the caller untouched.
 */
export class CommandDispatcher {
  private readonly store: RecordStore;
  private readonly slashCommand: string;

  constructor(opts: DispatcherOptions) {
    this.store = opts.store;
    this.slashCommand = opts.slashCommand ?? '/icecream';
  }

  /** Returns `null` for text that is not a command; the webhook then answers with an empty body. */
  execute(command: Command): SlackMessage | null {
    switch (command.kind) {
      case 'help':
        return privateMessage(helpText(this.slashCommand));
      case 'list':
        return publicMessage(backlogText(this.store.list()));
      case 'add':
        this.store.add(command.name);
        return publicMessage(addedText(command.name));
      case 'del': {
        const name = this.store.delete(command.id);
        return publicMessage(deletedText(name, command.id));
      }
      case 'unknown':
        return null;
    }
  }
}
