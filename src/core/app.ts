/**
 * Application wiring
 *
 * Builds the stores, tools, router, extractor and orchestrator from config and
 * owns their lifecycle.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Config } from '../types/config.js';
import type { LLMProvider } from '../types/provider.js';
import {
  SqliteStorageProvider,
  SqliteCatalogStore,
  loadSeedFile,
  seedCatalog,
  type CatalogStore,
  type StorageProvider,
} from '../storage/index.js';
import { ConversationLog } from '../memory/conversation-log.js';
import { PreferenceStore } from '../memory/preference-store.js';
import { createFilmTools } from '../tools/index.js';
import { createProvider } from '../providers/provider-factory.js';
import { ToolRegistry } from './tool-registry.js';
import { IntentRouter } from './intent-router.js';
import { PreferenceExtractor } from './preference-extractor.js';
import { ContextBuilder } from './context-builder.js';
import { Orchestrator, type TurnResult } from './orchestrator.js';
import { UserStore } from './user-store.js';
import { setLogLevel, createChildLogger } from './logger.js';

const log = createChildLogger('App');

const DAY_MS = 24 * 60 * 60 * 1000;

/** Replacements for the configured collaborators (tests, embedding) */
export interface FilmAgentAppOverrides {
  provider?: LLMProvider;
  storage?: StorageProvider;
  catalog?: CatalogStore;
  /** Clock for every store */
  now?: () => number;
}

export interface SeedOptions {
  file?: string;
  force?: boolean;
}

export class FilmAgentApp {
  readonly config: Config;
  readonly storage: StorageProvider;
  readonly catalog: CatalogStore;
  readonly provider: LLMProvider;
  readonly userStore: UserStore;
  readonly conversationLog: ConversationLog;
  readonly preferenceStore: PreferenceStore;
  readonly toolRegistry: ToolRegistry;
  readonly router: IntentRouter;
  readonly extractor: PreferenceExtractor;
  readonly contextBuilder: ContextBuilder;
  readonly orchestrator: Orchestrator;

  private started = false;

  constructor(config: Config, overrides: FilmAgentAppOverrides = {}) {
    this.config = config;
    setLogLevel(config.logLevel);

    const now = overrides.now ?? Date.now;

    this.storage = overrides.storage ?? new SqliteStorageProvider({ dbPath: config.memory.dbPath });
    this.catalog = overrides.catalog ?? new SqliteCatalogStore({
      dbPath: config.catalog.dbPath,
      resultLimit: config.catalog.resultLimit,
    });
    this.provider = overrides.provider ?? this.createLLMProvider();

    this.userStore = new UserStore(this.storage, now);
    this.conversationLog = new ConversationLog(this.storage, now);
    this.preferenceStore = new PreferenceStore(this.storage, {
      now,
      decay: {
        horizonMs: config.memory.decayHorizonDays * DAY_MS,
        factor: config.memory.decayFactor,
      },
    });

    this.toolRegistry = new ToolRegistry(createFilmTools(this.catalog));

    // Vocabulary is loaded from the catalog in start()
    const emptyVocabulary = { genres: [], actors: [], titles: [] };
    this.router = new IntentRouter(emptyVocabulary, { compoundStrategy: config.router.compoundStrategy });
    this.extractor = new PreferenceExtractor(this.preferenceStore, this.userStore, emptyVocabulary);

    this.contextBuilder = new ContextBuilder(this.conversationLog, this.preferenceStore, this.userStore, {
      contextTurns: config.memory.contextTurns,
      tokenBudget: config.memory.tokenBudget,
      keepRecentTurns: config.memory.keepRecentTurns,
    });

    this.orchestrator = new Orchestrator({
      provider: this.provider,
      config: config.agent,
      toolRegistry: this.toolRegistry,
      router: this.router,
      contextBuilder: this.contextBuilder,
      conversationLog: this.conversationLog,
      preferenceStore: this.preferenceStore,
      extractor: this.extractor,
    });

    log.debug({ provider: this.provider.name, tools: this.toolRegistry.size }, 'app assembled');
  }

  /** Open both stores, seed an empty catalog and load the vocabulary */
  async start(): Promise<void> {
    if (this.started) return;

    await this.storage.init();
    await this.catalog.init();

    if ((await this.catalog.countFilms()) === 0 && existsSync(resolve(this.config.catalog.seedFile))) {
      await this.seed();
    } else {
      await this.refreshVocabulary();
    }

    this.started = true;
    log.info({ provider: this.provider.name, model: this.config.agent.model }, 'film agent started');
  }

  /** Load films from the seed file; returns the number added */
  async seed(options: SeedOptions = {}): Promise<number> {
    const films = await loadSeedFile(options.file ?? this.config.catalog.seedFile);
    const added = await seedCatalog(this.catalog, films, { force: options.force });
    await this.refreshVocabulary();
    return added;
  }

  /** Re-read catalog names into the router and extractor */
  async refreshVocabulary(): Promise<void> {
    const vocabulary = await this.catalog.vocabulary();
    this.router.setVocabulary(vocabulary);
    this.extractor.setVocabulary(vocabulary);
    log.debug(
      { genres: vocabulary.genres.length, actors: vocabulary.actors.length, titles: vocabulary.titles.length },
      'vocabulary loaded',
    );
  }

  handleTurn(userId: string, utterance: string): Promise<TurnResult> {
    return this.orchestrator.handleTurn(userId, utterance);
  }

  /** Wait for queued turns, then close the stores */
  async stop(): Promise<void> {
    await this.orchestrator.drain();
    await this.storage.close();
    await this.catalog.close();
    this.started = false;
    log.info('film agent stopped');
  }

  private createLLMProvider(): LLMProvider {
    const name = this.config.agent.provider;
    const providerConfig = this.config.providers[name] ?? {};
    log.info({ provider: name }, 'using provider');
    return createProvider(name, providerConfig);
  }
}
