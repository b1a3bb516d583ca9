import pino, { type Logger } from 'pino';

export type { Logger };

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.VITEST ? 'silent' : 'info';
}

export const rootLogger: Logger = pino({
  level: defaultLevel(),
  base: { app: 'trailstop-bot' },
  timestamp: pino.stdTimeFunctions.isoTime
});

export function setLogLevel(level: string): void {
  rootLogger.level = level;
}

/**
 * Child logger tagged with the component name and any extra bindings (market, venue).
 */
export function createLogger(component: string, bindings: Record<string, string> = {}): Logger {
  return rootLogger.child({ component, ...bindings });
}
