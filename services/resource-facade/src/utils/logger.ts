import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  name: string;
  logLevel?: LevelWithSilent;
  bindings?: Record<string, unknown>;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(requested?: LevelWithSilent): LevelWithSilent {
  if (requested) return requested;
  const fromEnv = process.env['LOG_LEVEL'];
  return LEVELS.find((level) => level === fromEnv) ?? 'info';
}

/**
 * Create a component logger. Only shows debug output when LOG_LEVEL asks for it.
 */
export function createLogger(opts: LoggerOptions): Logger {
  return pino({
    name: opts.name,
    level: resolveLevel(opts.logLevel),
    base: { service: 'resource-facade', ...opts.bindings },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
