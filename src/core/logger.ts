/**
 * Structured logging
 *
 * pino JSON logs, pretty-printed through pino-pretty unless logging is silenced.
 */

import pino from 'pino';

function createLogger(level: string = process.env['FILM_AGENT_LOG_LEVEL'] ?? 'info'): pino.Logger {
  if (level === 'silent') {
    return pino({ level });
  }
  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    },
  });
}

const logger = createLogger();

/** Child loggers handed out so far, re-levelled by setLogLevel */
const children: pino.Logger[] = [];

/** Update the level of the root logger and every child logger */
export function setLogLevel(level: string): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}

/** Create a child logger tagged with a module name */
export function createChildLogger(module: string): pino.Logger {
  const child = logger.child({ module });
  children.push(child);
  return child;
}

export { logger };
