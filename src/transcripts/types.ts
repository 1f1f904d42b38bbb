// Transcript persistence types

import type { ConversationSnapshot, ConversationStatus } from "../types/index.js";

/** One finished conversation as it is persisted. */
export type TranscriptRecord = {
  session_id: string;
  status: ConversationStatus;
  end_reason: string;
  operator_id: string | null;
  /** ISO-8601 */
  ended_at: string;
  conversation: ConversationSnapshot;
};

/**
 * Storage behind the recorder. Implementations may be synchronous or return
 * a promise; the recorder deletes the live session as soon as the call returns.
 */
export interface TranscriptWriter {
  writeConversation(record: TranscriptRecord): void | Promise<void>;
}
