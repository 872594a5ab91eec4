import pino, { type Logger } from 'pino';

export type { Logger };

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

// Unknown values fall back to info instead of making pino throw at import.
export function resolveLogLevel(env: Record<string, string | undefined>): string {
  const level = env.LOG_LEVEL?.trim().toLowerCase();
  return level && LOG_LEVELS.includes(level) ? level : 'info';
}

export const logger: Logger = pino({
  name: 'studio-booking',
  level: resolveLogLevel(process.env),
});

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
