/**
 * Configuration types
 */

import { z } from 'zod';

/** Provider config schema */
const ProviderConfigSchema = z.object({
  apiKey: z.string().optional(),
  apiBase: z.string().url().optional(),
  defaultModel: z.string().optional(),
});

/** Agent config schema */
const AgentConfigSchema = z.object({
  provider: z.string().default('openai'),
  model: z.string().default('gpt-4o-mini'),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().positive().default(1024),
  systemPrompt: z.string().default(
    'You are a friendly film assistant. Answer using the catalog results you are given, ' +
      'recommend films that fit what you know about the user, and say so plainly when nothing matches.',
  ),
  /** Timeout for one completion request */
  oracleTimeoutMs: z.number().int().positive().default(30_000),
  /** Turns processed at once across all users */
  maxConcurrentTurns: z.number().int().positive().default(5),
});

/** Memory store config schema */
const MemoryConfigSchema = z.object({
  dbPath: z.string().default('data/memory.db'),
  /** Recent turns fetched per context window */
  contextTurns: z.number().int().positive().default(20),
  /** Estimated token budget for the recent turns (chars / 4) */
  tokenBudget: z.number().int().positive().default(3000),
  /** Turns kept verbatim when the budget is exceeded */
  keepRecentTurns: z.number().int().positive().default(6),
  /** Preferences not updated within this horizon decay */
  decayHorizonDays: z.number().positive().default(30),
  decayFactor: z.number().gt(0).lt(1).default(0.8),
});

/** Catalog config schema */
const CatalogConfigSchema = z.object({
  dbPath: z.string().default('data/films.db'),
  seedFile: z.string().default('data/films.json'),
  resultLimit: z.number().int().positive().default(20),
});

/** Intent router config schema */
const RouterConfigSchema = z.object({
  /** Multi-criteria utterances: one search_films call, or a chain of single-criterion calls */
  compoundStrategy: z.enum(['compound', 'chain']).default('compound'),
});

/** Top-level config schema */
export const ConfigSchema = z.object({
  providers: z.record(ProviderConfigSchema).default({}),
  agent: AgentConfigSchema.default({}),
  memory: MemoryConfigSchema.default({}),
  catalog: CatalogConfigSchema.default({}),
  router: RouterConfigSchema.default({}),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;
export type CatalogConfig = z.infer<typeof CatalogConfigSchema>;
export type RouterConfig = z.infer<typeof RouterConfigSchema>;
