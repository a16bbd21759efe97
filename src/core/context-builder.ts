/**
 * Short-term context window
 *
 * Assembles, per turn, the recent conversation turns and the user's current
 * preferences, and turns them into a completion request. Store failures are
 * logged and replaced by empty parts; assembly itself never throws.
 *
 * When the recent turns exceed the token budget (estimated at four characters
 * per token), everything but the last `keepRecentTurns` is folded into a
 * one-line summary.
 */

import type { ConversationTurn, ChatMessage } from '../types/message.js';
import type { Preference } from '../types/preference.js';
import type { User } from '../types/user.js';
import type { ConversationLog } from '../memory/conversation-log.js';
import type { PreferenceStore } from '../memory/preference-store.js';
import type { UserStore } from './user-store.js';
import { toError } from './errors.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('ContextBuilder');

/** Characters per token for budget estimates */
const CHARS_PER_TOKEN = 4;

/** User questions quoted in a summary */
const SUMMARY_MAX_QUERIES = 5;
const SUMMARY_QUERY_LENGTH = 80;

export interface ContextWindow {
  user: User | null;
  /** Recent turns kept verbatim, oldest first */
  turns: ConversationTurn[];
  /** Full preference set, by type then confidence desc */
  preferences: Preference[];
  /** Summary of the turns folded away by compression */
  summary?: string;
  /** One entry per part that could not be loaded */
  warnings: string[];
}

export interface ContextOptions {
  /** Turns read from the log */
  contextTurns: number;
  /** Token budget for the verbatim turns */
  tokenBudget: number;
  /** Turns always kept verbatim when compressing */
  keepRecentTurns: number;
}

export interface CompletionInput {
  systemPrompt: string;
  messages: ChatMessage[];
}

export function estimateTokens(turns: readonly ConversationTurn[]): number {
  const chars = turns.reduce((sum, turn) => sum + turn.content.length, 0);
  return Math.floor(chars / CHARS_PER_TOKEN);
}

/** "User asked about: ... Tools used: ..." for the folded turns */
export function summarizeTurns(turns: readonly ConversationTurn[]): string {
  const queries: string[] = [];
  const tools: string[] = [];

  for (const turn of turns) {
    if (turn.role === 'user') {
      const query = turn.content.trim().replace(/\s+/g, ' ').slice(0, SUMMARY_QUERY_LENGTH);
      if (query && !queries.includes(query) && queries.length < SUMMARY_MAX_QUERIES) {
        queries.push(query);
      }
    } else if (turn.role === 'tool' && turn.toolName && !tools.includes(turn.toolName)) {
      tools.push(turn.toolName);
    }
  }

  const parts: string[] = [];
  if (queries.length > 0) parts.push(`User asked about: ${queries.join(', ')}`);
  if (tools.length > 0) parts.push(`Tools used: ${tools.join(', ')}`);
  return parts.length > 0 ? parts.join('. ') : 'General film discussion';
}

/** Fold older turns into a summary when the window is over budget */
export function compressTurns(
  turns: ConversationTurn[],
  tokenBudget: number,
  keepRecentTurns: number,
): { turns: ConversationTurn[]; summary?: string } {
  if (estimateTokens(turns) <= tokenBudget || turns.length <= keepRecentTurns) {
    return { turns };
  }

  const cut = turns.length - Math.max(0, keepRecentTurns);
  return {
    turns: turns.slice(cut),
    summary: summarizeTurns(turns.slice(0, cut)),
  };
}

/** The user profile block of the system framing */
export function formatProfile(user: User | null, preferences: readonly Preference[]): string {
  const lines: string[] = [];

  if (user?.displayName) {
    lines.push(`User name: ${user.displayName}`);
  }

  if (preferences.length > 0) {
    const byType = new Map<string, string[]>();
    for (const pref of preferences) {
      const values = byType.get(pref.type) ?? [];
      values.push(`${pref.value} (${pref.confidence.toFixed(2)})`);
      byType.set(pref.type, values);
    }

    if (lines.length > 0) lines.push('');
    lines.push('User preferences (confidence):');
    for (const [type, values] of byType) {
      lines.push(`  - ${type}: ${values.join(', ')}`);
    }
  }

  return lines.length > 0 ? lines.join('\n') : 'No user context available.';
}

function toChatMessage(turn: ConversationTurn): ChatMessage {
  switch (turn.role) {
    case 'user':
      return { role: 'user', content: turn.content };
    case 'assistant':
      return { role: 'assistant', content: turn.content };
    case 'tool':
      return { role: 'system', content: `Result of ${turn.toolName ?? 'tool'}:\n${turn.content}` };
  }
}

export class ContextBuilder {
  constructor(
    private readonly conversationLog: ConversationLog,
    private readonly preferenceStore: PreferenceStore,
    private readonly userStore: UserStore,
    private readonly options: ContextOptions,
  ) {}

  /**
   * Load the window for a turn. Each part degrades to empty on failure and
   * records a warning.
   */
  async assemble(userId: string): Promise<ContextWindow> {
    const warnings: string[] = [];

    const load = async <T>(part: string, fallback: T, fn: () => Promise<T>): Promise<T> => {
      try {
        return await fn();
      } catch (err) {
        log.warn({ err: toError(err), userId, part }, 'context part unavailable, using empty');
        warnings.push(`${part} unavailable`);
        return fallback;
      }
    };

    const user = await load<User | null>('user', null, () => this.userStore.touch(userId));
    const recent = await load<ConversationTurn[]>('conversation', [], () =>
      this.conversationLog.recent(userId, this.options.contextTurns),
    );
    const preferences = await load<Preference[]>('preferences', [], () =>
      this.preferenceStore.getPreferences(userId),
    );

    const { turns, summary } = compressTurns(recent, this.options.tokenBudget, this.options.keepRecentTurns);
    if (summary !== undefined) {
      log.debug({ userId, folded: recent.length - turns.length }, 'context compressed');
    }

    return {
      user,
      turns,
      preferences,
      ...(summary !== undefined ? { summary } : {}),
      warnings,
    };
  }

  /**
   * Completion request for a turn: system framing with the profile, the
   * recent turns, the catalog results (if any) and the utterance.
   */
  buildCompletion(
    window: ContextWindow,
    basePrompt: string,
    utterance: string,
    toolResults: string | null,
  ): CompletionInput {
    const sections = [basePrompt, formatProfile(window.user, window.preferences)];
    if (window.summary) {
      sections.push(`Previous conversation summary: ${window.summary}`);
    }

    const messages = window.turns.map(toChatMessage);
    if (toolResults !== null) {
      messages.push({ role: 'system', content: `Catalog results for the next message:\n${toolResults}` });
    }
    messages.push({ role: 'user', content: utterance });

    return { systemPrompt: sections.join('\n\n'), messages };
  }
}
