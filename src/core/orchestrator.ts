/**
 * Agent orchestrator
 *
 * Runs one turn through a fixed state machine:
 *
 *   Received → ContextAssembled → Routed → ToolsExecuted → Completed → Persisted → Replied
 *
 * Any completion-oracle failure moves the turn to Failed, which still returns
 * an apology to the user. Only the oracle call may fail the turn: context
 * assembly, persistence and preference extraction degrade and log instead.
 *
 * Turns for the same user are serialized through a TurnQueue, so a turn never
 * assembles context before the previous one has persisted.
 */

import { randomUUID } from 'node:crypto';
import type { LLMProvider } from '../types/provider.js';
import type { AgentConfig } from '../types/config.js';
import type { ToolPlan, PlanResult } from '../types/tool.js';
import type { ConversationLog } from '../memory/conversation-log.js';
import type { PreferenceStore } from '../memory/preference-store.js';
import { formatOutcome, formatPlanResult, describeCall } from '../tools/format.js';
import type { ToolRegistry } from './tool-registry.js';
import type { IntentRouter } from './intent-router.js';
import type { ContextBuilder, ContextWindow } from './context-builder.js';
import type { PreferenceExtractor, ExtractionResult } from './preference-extractor.js';
import { TurnQueue } from './turn-queue.js';
import {
  FilmAgentError,
  InvalidToolArgsError,
  NoToolMatchError,
  OracleTimeoutError,
  OracleUnavailableError,
  isOracleFailure,
  toError,
} from './errors.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('Orchestrator');

export type TurnState =
  | 'Received'
  | 'ContextAssembled'
  | 'Routed'
  | 'ToolsExecuted'
  | 'Completed'
  | 'Persisted'
  | 'Replied'
  | 'Failed';

/** Reply used when the oracle answers with no text */
const EMPTY_REPLY = "I'm not sure how to help with that.";

export interface TurnResult {
  turnId: string;
  userId: string;
  reply: string;
  /** Terminal state */
  state: 'Replied' | 'Failed';
  /** Every state the turn passed through, in order */
  trace: TurnState[];
  /** Executed plan, or null when no tool matched (kept on Failed, though nothing of it is logged) */
  plan: ToolPlan | null;
  toolResult: PlanResult | null;
  /** Degradations that did not fail the turn */
  warnings: string[];
  /** Set on Failed */
  error?: OracleUnavailableError | OracleTimeoutError;
  /** Unset on Failed */
  extraction?: ExtractionResult;
}

export interface OrchestratorDeps {
  provider: LLMProvider;
  config: AgentConfig;
  toolRegistry: ToolRegistry;
  router: IntentRouter;
  contextBuilder: ContextBuilder;
  conversationLog: ConversationLog;
  preferenceStore: PreferenceStore;
  extractor: PreferenceExtractor;
  /** Shared queue; one is created from config when omitted */
  turnQueue?: TurnQueue;
}

/** Text the user sees when the oracle fails */
export function apologyFor(error: OracleUnavailableError | OracleTimeoutError): string {
  const reason = error instanceof OracleTimeoutError
    ? 'the language model took too long to answer'
    : 'the language model is unavailable right now';
  return `Sorry, I couldn't finish that request because ${reason}. Please try again in a moment.`;
}

export class Orchestrator {
  private readonly provider: LLMProvider;
  private readonly config: AgentConfig;
  private readonly toolRegistry: ToolRegistry;
  private readonly router: IntentRouter;
  private readonly contextBuilder: ContextBuilder;
  private readonly conversationLog: ConversationLog;
  private readonly preferenceStore: PreferenceStore;
  private readonly extractor: PreferenceExtractor;
  private readonly turnQueue: TurnQueue;

  constructor(deps: OrchestratorDeps) {
    this.provider = deps.provider;
    this.config = deps.config;
    this.toolRegistry = deps.toolRegistry;
    this.router = deps.router;
    this.contextBuilder = deps.contextBuilder;
    this.conversationLog = deps.conversationLog;
    this.preferenceStore = deps.preferenceStore;
    this.extractor = deps.extractor;
    this.turnQueue = deps.turnQueue ?? new TurnQueue(deps.config.maxConcurrentTurns);
  }

  /**
   * Handle one user utterance.
   *
   * Resolves with the reply in every case; oracle failures resolve with
   * state 'Failed' and an apology.
   */
  handleTurn(userId: string, utterance: string): Promise<TurnResult> {
    const turnId = randomUUID();
    return this.turnQueue.enqueue(userId, () => this.runTurn(userId, utterance, turnId));
  }

  /** Wait for all queued turns */
  async drain(): Promise<void> {
    await this.turnQueue.drain();
  }

  private async runTurn(userId: string, utterance: string, turnId: string): Promise<TurnResult> {
    const trace: TurnState[] = ['Received'];
    const startTime = Date.now();
    log.info({ userId, turnId, length: utterance.length }, 'turn received');

    // Received → ContextAssembled
    const window = await this.contextBuilder.assemble(userId);
    const warnings = [...window.warnings];
    trace.push('ContextAssembled');

    // ContextAssembled → Routed
    const plan = this.route(utterance, window);
    trace.push('Routed');

    // Routed → ToolsExecuted
    const toolResult = plan ? await this.toolRegistry.executePlan(plan, { userId }) : null;
    if (toolResult?.failure) {
      warnings.push(`tool ${toolResult.failure.call.name} failed`);
    }
    trace.push('ToolsExecuted');

    // ToolsExecuted → Completed
    let reply: string;
    try {
      const toolText = plan && toolResult ? formatPlanResult(toolResult, plan.mode === 'chain') : null;
      reply = await this.complete(window, utterance, toolText);
      trace.push('Completed');
    } catch (err) {
      const error = isOracleFailure(err)
        ? err
        : new OracleUnavailableError(this.provider.name, toError(err).message, undefined, { cause: toError(err) });
      return this.fail({ userId, turnId, utterance, plan, toolResult }, trace, warnings, error);
    }

    // Completed → Persisted
    await this.persist(userId, turnId, utterance, toolResult, reply, warnings);
    const extraction = await this.extractor.extract({
      userId,
      turnId,
      utterance,
      plan,
      preferences: window.preferences,
    });
    if (extraction.error) {
      warnings.push('preference extraction failed');
    }
    await this.decayStale(userId, window);
    trace.push('Persisted');

    // Persisted → Replied
    trace.push('Replied');
    log.info(
      { userId, turnId, tools: plan?.calls.length ?? 0, warnings: warnings.length, duration: Date.now() - startTime },
      'turn replied',
    );

    return {
      turnId,
      userId,
      reply,
      state: 'Replied',
      trace,
      plan,
      toolResult,
      warnings,
      extraction,
    };
  }

  /** Plan for the utterance, or null for a plain completion */
  private route(utterance: string, window: ContextWindow): ToolPlan | null {
    try {
      const plan = this.router.route(utterance, { preferences: window.preferences });
      return this.toolRegistry.validatePlan(plan);
    } catch (err) {
      if (err instanceof NoToolMatchError) {
        return null;
      }
      if (err instanceof InvalidToolArgsError) {
        log.warn({ err, utterance: utterance.slice(0, 80) }, 'router produced invalid tool call, treating as no match');
        return null;
      }
      throw err;
    }
  }

  /** Call the oracle under the configured timeout */
  private async complete(window: ContextWindow, utterance: string, toolText: string | null): Promise<string> {
    const { systemPrompt, messages } = this.contextBuilder.buildCompletion(
      window,
      this.config.systemPrompt,
      utterance,
      toolText,
    );

    const timeoutMs = this.config.oracleTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new OracleTimeoutError(this.provider.name, timeoutMs));
      }, timeoutMs);
    });

    try {
      const response = await Promise.race([
        this.provider.chat({
          model: this.config.model,
          messages,
          systemPrompt,
          temperature: this.config.temperature,
          maxTokens: this.config.maxTokens,
          signal: controller.signal,
        }),
        timeout,
      ]);
      const content = response.content?.trim();
      return content ? content : EMPTY_REPLY;
    } finally {
      clearTimeout(timer);
    }
  }

  /** Failed: log the user turn only, reply with an apology. The executed plan is reported, not persisted */
  private async fail(
    turn: { userId: string; turnId: string; utterance: string; plan: ToolPlan | null; toolResult: PlanResult | null },
    trace: TurnState[],
    warnings: string[],
    error: OracleUnavailableError | OracleTimeoutError,
  ): Promise<TurnResult> {
    const { userId, turnId, utterance, plan, toolResult } = turn;
    trace.push('Failed');
    log.error({ err: error, userId, turnId }, 'completion failed');

    await this.appendQuietly(userId, turnId, 'user', utterance, warnings);

    return {
      turnId,
      userId,
      reply: apologyFor(error),
      state: 'Failed',
      trace,
      plan,
      toolResult,
      warnings,
      error,
    };
  }

  /** Append the user, tool and assistant turns; failures only warn */
  private async persist(
    userId: string,
    turnId: string,
    utterance: string,
    toolResult: PlanResult | null,
    reply: string,
    warnings: string[],
  ): Promise<void> {
    await this.appendQuietly(userId, turnId, 'user', utterance, warnings);

    for (const outcome of toolResult?.outcomes ?? []) {
      await this.appendQuietly(userId, turnId, 'tool', formatOutcome(outcome), warnings, outcome.call.name);
    }
    if (toolResult?.failure) {
      const { call, message } = toolResult.failure;
      await this.appendQuietly(
        userId,
        turnId,
        'tool',
        `Search for ${describeCall(call)} failed: ${message}`,
        warnings,
        call.name,
      );
    }

    await this.appendQuietly(userId, turnId, 'assistant', reply, warnings);
  }

  private async appendQuietly(
    userId: string,
    turnId: string,
    role: 'user' | 'assistant' | 'tool',
    content: string,
    warnings: string[],
    toolName?: string,
  ): Promise<void> {
    try {
      await this.conversationLog.append(userId, role, content, { turnId, toolName });
    } catch (err) {
      const error = toError(err);
      log.warn({ err: error, userId, turnId, role }, 'conversation append failed');
      const code = error instanceof FilmAgentError ? error.code : 'UNKNOWN';
      warnings.push(`${role} turn not logged (${code})`);
    }
  }

  /** Let preferences untouched for a whole horizon fade */
  private async decayStale(userId: string, window: ContextWindow): Promise<void> {
    const types = new Set(window.preferences.map((p) => p.type));
    for (const type of types) {
      try {
        await this.preferenceStore.decay(userId, type);
      } catch (err) {
        log.warn({ err: toError(err), userId, type }, 'preference decay failed');
      }
    }
  }
}
