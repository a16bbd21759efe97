/**
 * CLI channel
 *
 * Interactive REPL over the film agent, using node:readline. Lines starting
 * with `/` are local commands; everything else is a turn for the orchestrator.
 */

import { createInterface, type Interface } from 'node:readline';
import type { FilmAgentApp } from '../core/app.js';
import { formatProfile } from '../core/context-builder.js';
import { toError } from '../core/errors.js';
import { createChildLogger } from '../core/logger.js';

const log = createChildLogger('CLIChannel');

/** Turns shown by /history */
const HISTORY_LIMIT = 10;

const HELP_TEXT = [
  'Commands:',
  '  /help     show this help',
  '  /whoami   show your user id and name',
  '  /prefs    show learned preferences',
  '  /history  show recent conversation turns',
  '  /tools    list catalog tools',
  '  /exit     quit',
].join('\n');

interface CLIChannelConfig {
  app: FilmAgentApp;
  userId: string;
  prompt?: string;
}

/** Result of a slash command */
export interface CommandResult {
  output: string;
  exit?: boolean;
}

export class CLIChannel {
  private readonly app: FilmAgentApp;
  private readonly userId: string;
  private readonly prompt: string;
  private rl: Interface | null = null;

  constructor(config: CLIChannelConfig) {
    this.app = config.app;
    this.userId = config.userId;
    this.prompt = config.prompt || 'you> ';
  }

  /** Run the REPL until /exit or end of input */
  async start(): Promise<void> {
    this.rl = createInterface({
      input: process.stdin,
      output: process.stdout,
      terminal: process.stdin.isTTY,
    });

    console.log('\n🎬 Film agent');
    console.log('Ask about films, use /help for commands, /exit to quit\n');
    log.info({ userId: this.userId }, 'CLI channel started');

    const rl = this.rl;
    rl.setPrompt(this.prompt);
    rl.prompt();

    for await (const line of rl) {
      const text = line.trim();
      if (!text) {
        rl.prompt();
        continue;
      }

      if (text.startsWith('/')) {
        const result = await this.handleCommand(text);
        console.log(`${result.output}\n`);
        if (result.exit) break;
      } else {
        const turn = await this.app.handleTurn(this.userId, text);
        console.log(`\n🎬 ${turn.reply}\n`);
      }
      rl.prompt();
    }

    this.stop();
  }

  stop(): void {
    this.rl?.close();
    this.rl = null;
    log.info('CLI channel stopped');
  }

  /** Run a slash command; a store failure becomes a one-line error */
  async handleCommand(text: string): Promise<CommandResult> {
    const command = text.trim().split(/\s+/)[0]?.toLowerCase() ?? '';

    try {
      return await this.runCommand(command);
    } catch (err) {
      const error = toError(err);
      log.warn({ err: error, command, userId: this.userId }, 'command failed');
      return { output: `Could not run ${command}: ${error.message}` };
    }
  }

  private async runCommand(command: string): Promise<CommandResult> {
    switch (command) {
      case '/help':
        return { output: HELP_TEXT };

      case '/whoami': {
        const user = await this.app.userStore.get(this.userId);
        const name = user?.displayName ?? '(not set)';
        return { output: `User: ${this.userId}\nName: ${name}` };
      }

      case '/prefs': {
        const preferences = await this.app.preferenceStore.getPreferences(this.userId);
        if (preferences.length === 0) {
          return { output: 'No preferences learned yet.' };
        }
        return { output: formatProfile(null, preferences) };
      }

      case '/history': {
        const turns = await this.app.conversationLog.recent(this.userId, HISTORY_LIMIT);
        if (turns.length === 0) {
          return { output: 'No conversation yet.' };
        }
        return {
          output: turns
            .map((t) => {
              const label = t.role === 'tool' ? `tool:${t.toolName ?? '?'}` : t.role;
              const firstLine = t.content.split('\n')[0] ?? '';
              return `[${label}] ${firstLine}`;
            })
            .join('\n'),
        };
      }

      case '/tools':
        return {
          output: this.app.toolRegistry
            .listTools()
            .map((tool) => `  ${tool.name}: ${tool.description}`)
            .join('\n'),
        };

      case '/exit':
      case '/quit':
        return { output: 'Goodbye!', exit: true };

      default:
        return { output: `Unknown command: ${command}. Type /help for commands.` };
    }
  }
}
