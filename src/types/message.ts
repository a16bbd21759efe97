/**
 * Conversation types
 */

/** Role of a persisted conversation turn */
export type TurnRole = 'user' | 'assistant' | 'tool';

/** Role of a message sent to the completion oracle */
export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * One immutable entry in a user's conversation log.
 *
 * `seq` is assigned by the log and strictly increases with append order.
 * `turnId` groups the user, tool and assistant entries produced by one turn.
 */
export interface ConversationTurn {
  seq: number;
  userId: string;
  turnId: string;
  role: TurnRole;
  content: string;
  /** Set iff role = tool */
  toolName?: string;
  createdAt: number;
}

/** A turn about to be appended (the log assigns seq and createdAt) */
export interface NewTurn {
  turnId: string;
  role: TurnRole;
  content: string;
  toolName?: string;
}

/** Message in oracle format */
export interface ChatMessage {
  role: MessageRole;
  content: string;
}
