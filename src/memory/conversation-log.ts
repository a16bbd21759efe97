/**
 * Conversation log
 *
 * Append-only record of every user, assistant and tool turn. Turns are never
 * mutated; `recent()` reads only the requested tail of the log.
 */

import { randomUUID } from 'node:crypto';
import type { StorageProvider } from '../storage/storage-provider.js';
import type { ConversationTurn, TurnRole } from '../types/message.js';
import { FilmAgentError } from '../core/errors.js';
import { createChildLogger } from '../core/logger.js';

const log = createChildLogger('ConversationLog');

export interface AppendOptions {
  /** Required iff role = tool */
  toolName?: string;
  /** Groups the turns of one exchange; generated when omitted */
  turnId?: string;
}

export class ConversationLog {
  constructor(
    private readonly storage: StorageProvider,
    private readonly now: () => number = Date.now,
  ) {}

  /** Append one turn; throws StoreUnavailableError when persistence fails */
  async append(
    userId: string,
    role: TurnRole,
    content: string,
    options: AppendOptions = {},
  ): Promise<ConversationTurn> {
    if ((role === 'tool') !== (options.toolName !== undefined)) {
      throw new FilmAgentError(
        'toolName must be set exactly when role is tool',
        'INVALID_TURN',
        { userId, role, toolName: options.toolName },
      );
    }

    const turn = await this.storage.appendTurn(
      userId,
      {
        turnId: options.turnId ?? randomUUID(),
        role,
        content,
        toolName: options.toolName,
      },
      this.now(),
    );

    log.debug({ userId, seq: turn.seq, role }, 'turn appended');
    return turn;
  }

  /** The latest `limit` turns in chronological order */
  async recent(userId: string, limit: number): Promise<ConversationTurn[]> {
    if (limit <= 0) return [];
    return this.storage.recentTurns(userId, limit);
  }

  async count(userId: string): Promise<number> {
    return this.storage.countTurns(userId);
  }
}
