import type { BacklogRecord, RecordId, SlackMessage } from '../types';

export const EMPTY_BACKLOG_TEXT = 'The icecream backlog is empty. Tread lightly.';

/** Broadcast to the whole channel. */
export function publicMessage(text: string): SlackMessage {
  return { response_type: 'in_channel', text };
}

/** Shown only to the user who ran the command. */
export function privateMessage(text: string): SlackMessage {
  return { response_type: 'ephemeral', text };
}

export function helpText(slashCommand: string): string {
  return [
    '*Did someone leave their screen unlocked? Usage:*',
    `\`${slashCommand} add <username>\` to add a user to the owing backlog`,
    `\`${slashCommand} del <id>\` to delete a user by id, use \`list\` to find id`,
    `\`${slashCommand} list\` to list owing users`,
    `\`${slashCommand} help\` to display this usage information`,
  ].join('\n');
}

export function backlogText(records: BacklogRecord[]): string {
  if (records.length === 0) return EMPTY_BACKLOG_TEXT;
  return records.map((r) => `${r.id}. ${r.name}`).join('\n');
}

export function addedText(name: string): string {
  return `Added ${name} to the queue.`;
}

export function deletedText(name: string, id: RecordId): string {
  return `Deleted ${name} (${id}) from the queue.`;
}
