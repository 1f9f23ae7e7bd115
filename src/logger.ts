import pino from 'pino';

type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent';

const validLevels: readonly string[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

function isLogLevel(value: string): value is LogLevel {
  return validLevels.includes(value);
}

export function resolveLogLevel(value?: string): LogLevel {
  if (!value) {
    return 'info';
  }
  return isLogLevel(value) ? value : 'info';
}

export type Logger = pino.Logger;

export interface CreateLoggerOptions {
  level?: string;
  /** Force JSON lines even on a TTY */
  json?: boolean;
}

// Check if we're running in a TTY (terminal) and if JSON output is explicitly requested
const isTTY = Boolean(process.stdout.isTTY);
const useJsonOutput = process.env.SHOTSORT_LOG_JSON === 'true';

function hasPrettyTransport(): boolean {
  try {
    // Optional dev dependency; fall back to JSON when absent
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = resolveLogLevel(
    options.level ?? process.env.SHOTSORT_LOG_LEVEL
  );
  const base = { app: 'shotsort' };

  if (isTTY && !useJsonOutput && !options.json && hasPrettyTransport()) {
    return pino({
      level,
      base,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname,app',
          singleLine: false,
          messageFormat: '{msg}',
        },
      },
    });
  }

  return pino({ level, base });
}

/** A logger that drops everything; handy for library callers and tests. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

let processLogger: Logger | undefined;

/** Process-wide logger for the CLI and daemon entry points. */
export function getLogger(): Logger {
  if (!processLogger) {
    processLogger = createLogger();
  }
  return processLogger;
}
