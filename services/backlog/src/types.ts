/** Ids are unsigned 64-bit integers minted by the store. */
export type RecordId = bigint;

export interface BacklogRecord {
  id: RecordId;
  name: string;
}

export type ResponseType = 'in_channel' | 'ephemeral';

/** Reply body understood by the chat platform. */
export interface SlackMessage {
  response_type: ResponseType;
  text: string;
}
