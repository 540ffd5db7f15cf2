import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.has(value);
}

function getLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL'];
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

export const logger = pino({
  name: 'docket',
  level: getLogLevel(),
  redact: ['apiKey', 'headers["x-api-key"]'],
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
});

/** Child logger tagged with `component`; extra bindings ride on every line. */
export function createChildLogger(
  component: string,
  bindings: Readonly<Record<string, unknown>> = {},
): pino.Logger {
  return logger.child({ component, ...bindings });
}
