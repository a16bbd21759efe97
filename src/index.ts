#!/usr/bin/env node

/**
 * Film agent
 *
 * Entry point: parses CLI arguments and runs a command.
 */

import { Command } from 'commander';
import { loadConfig } from './config/config-manager.js';
import { FilmAgentApp } from './core/app.js';
import { CLIChannel } from './channels/cli-channel.js';
import { SqliteCatalogStore } from './storage/sqlite-catalog.js';
import { loadSeedFile, seedCatalog } from './storage/catalog-seed.js';
import { logger } from './core/logger.js';

const program = new Command();

program
  .name('film-agent')
  .description('Conversational film assistant with long-term preference memory')
  .version('0.1.0');

program
  .command('chat', { isDefault: true })
  .description('Start an interactive chat')
  .option('-c, --config <path>', 'config file path')
  .option('-u, --user <id>', 'user identity', 'cli:default')
  .option('-m, --model <model>', 'model to use')
  .option('-v, --verbose', 'debug logging')
  .action(async (options: { config?: string; user: string; model?: string; verbose?: boolean }) => {
    try {
      if (options.model) {
        process.env['FILM_AGENT_MODEL'] = options.model;
      }
      if (options.verbose) {
        process.env['FILM_AGENT_LOG_LEVEL'] = 'debug';
      }

      const config = await loadConfig(options.config);
      const app = new FilmAgentApp(config);
      await app.start();

      const channel = new CLIChannel({ app, userId: options.user });

      const shutdown = async (): Promise<void> => {
        logger.info('shutting down...');
        channel.stop();
        await app.stop();
        process.exit(0);
      };
      process.on('SIGINT', () => void shutdown());
      process.on('SIGTERM', () => void shutdown());

      await channel.start();
      await app.stop();
    } catch (err) {
      logger.fatal({ err }, 'startup failed');
      process.exit(1);
    }
  });

program
  .command('seed')
  .description('Load films from a seed file into the catalog')
  .option('-c, --config <path>', 'config file path')
  .option('-f, --file <path>', 'seed file (default: catalog.seedFile)')
  .option('--force', 'add films even if the catalog is not empty')
  .action(async (options: { config?: string; file?: string; force?: boolean }) => {
    try {
      const config = await loadConfig(options.config);
      const catalog = new SqliteCatalogStore({
        dbPath: config.catalog.dbPath,
        resultLimit: config.catalog.resultLimit,
      });
      await catalog.init();
      try {
        const films = await loadSeedFile(options.file ?? config.catalog.seedFile);
        const added = await seedCatalog(catalog, films, { force: options.force });
        console.log(added > 0 ? `Added ${added} film(s).` : 'Catalog already seeded (use --force to add anyway).');
      } finally {
        await catalog.close();
      }
    } catch (err) {
      logger.error({ err }, 'seeding failed');
      process.exit(1);
    }
  });

program
  .command('config')
  .description('Validate and print the effective config')
  .option('-c, --config <path>', 'config file path')
  .action(async (options: { config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const providers = Object.fromEntries(
        Object.entries(config.providers).map(([name, p]) => [name, { ...p, apiKey: p.apiKey ? '***' : undefined }]),
      );
      console.log(JSON.stringify({ ...config, providers }, null, 2));
    } catch (err) {
      logger.error({ err }, 'config validation failed');
      process.exit(1);
    }
  });

program.parse();
