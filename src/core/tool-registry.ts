/**
 * Tool registry
 *
 * Holds the closed set of catalog tools, validates calls against their schemas
 * and executes plans. Chained plans run each call restricted to the films the
 * previous call returned; a failing call stops the plan and keeps what was
 * gathered so far.
 */

import type {
  Tool,
  ToolCall,
  ToolContext,
  ToolName,
  ToolOutcome,
  ToolPlan,
  PlanResult,
} from '../types/tool.js';
import { isToolName } from '../types/tool.js';
import type { Film } from '../types/film.js';
import {
  InvalidToolArgsError,
  ToolExecutionError,
  ToolNotFoundError,
  toError,
} from './errors.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('ToolRegistry');

/** Catalog order: rating desc, then title asc (binary, as SQLite sorts) */
function compareFilms(a: Film, b: Film): number {
  if (a.rating !== b.rating) return b.rating - a.rating;
  return a.title < b.title ? -1 : a.title > b.title ? 1 : 0;
}

function unionFilms(outcomes: ToolOutcome[]): Film[] {
  const byId = new Map<number, Film>();
  for (const outcome of outcomes) {
    for (const film of outcome.films) {
      byId.set(film.id, film);
    }
  }
  return Array.from(byId.values()).sort(compareFilms);
}

export class ToolRegistry {
  private readonly tools = new Map<ToolName, Tool>();

  constructor(tools: Tool[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      log.warn({ toolName: tool.name }, 'tool already registered, replacing');
    }
    this.tools.set(tool.name, tool);
    log.debug({ toolName: tool.name }, 'tool registered');
  }

  get(name: string): Tool {
    const tool = isToolName(name) ? this.tools.get(name) : undefined;
    if (!tool) {
      throw new ToolNotFoundError(name);
    }
    return tool;
  }

  has(name: string): boolean {
    return isToolName(name) && this.tools.has(name);
  }

  /** Validate a raw (name, arguments) pair; throws InvalidToolArgsError */
  validate(name: string, params: Record<string, unknown>): ToolCall {
    return this.get(name).parse(params);
  }

  /** Validate every call of a plan */
  validatePlan(plan: ToolPlan): ToolPlan {
    return {
      mode: plan.mode,
      calls: plan.calls.map((call) => this.validate(call.name, { ...call.args })),
    };
  }

  /** Run one call */
  async execute(call: ToolCall, context: ToolContext): Promise<Film[]> {
    const tool = this.get(call.name);
    const params: Record<string, unknown> = { ...call.args };

    log.debug({ toolName: call.name, params, restricted: context.candidateIds?.length }, 'executing tool');

    try {
      const films = await tool.execute(params, context);
      log.debug({ toolName: call.name, count: films.length }, 'tool executed');
      return films;
    } catch (err) {
      if (err instanceof ToolExecutionError || err instanceof InvalidToolArgsError) {
        throw err;
      }
      throw new ToolExecutionError(call.name, params, toError(err));
    }
  }

  /**
   * Run a plan in order.
   *
   * - `independent`: every call sees the whole catalog; films are the union.
   * - `chain`: each call after the first only sees the previous call's films;
   *   films are the last call's result. Earlier calls run uncapped so the
   *   result limit cannot drop matches before the intersection.
   *
   * A failing call aborts the rest; the outcomes so far are kept and the
   * failure is reported on the result.
   */
  async executePlan(plan: ToolPlan, context: ToolContext): Promise<PlanResult> {
    const outcomes: ToolOutcome[] = [];
    let candidates: Film[] | undefined;

    for (const [index, call] of plan.calls.entries()) {
      const callContext: ToolContext = { ...context };
      if (plan.mode === 'chain') {
        if (candidates) callContext.candidateIds = candidates.map((f) => f.id);
        // only the last call of a chain is capped
        if (index < plan.calls.length - 1) callContext.uncapped = true;
      }

      try {
        const films = await this.execute(call, callContext);
        outcomes.push({ call, films });
        candidates = films;
      } catch (err) {
        const error = toError(err);
        log.warn({ err: error, toolName: call.name, index }, 'tool failed, aborting remaining plan');
        return {
          outcomes,
          films: plan.mode === 'chain' ? (candidates ?? []) : unionFilms(outcomes),
          failure: {
            call,
            message: error.message,
            skipped: plan.calls.slice(index + 1),
          },
        };
      }
    }

    return {
      outcomes,
      films: plan.mode === 'chain' ? (candidates ?? []) : unionFilms(outcomes),
    };
  }

  listTools(): Tool[] {
    return Array.from(this.tools.values());
  }

  get size(): number {
    return this.tools.size;
  }
}
