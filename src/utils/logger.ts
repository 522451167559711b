import pino from 'pino';
import type {
  Logger,
  LevelWithSilent,
  TransportMultiOptions,
  TransportSingleOptions,
  TransportTargetOptions,
} from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export const DEFAULT_LOG_FILE = './data/logs/etl.log';

const PRETTY_OPTIONS = {
  colorize: true,
  translateTime: 'SYS:standard',
  ignore: 'pid,hostname',
};

export function resolveLevel(requested: string | undefined, nodeEnv: string): LevelWithSilent {
  const match = LEVELS.find((level) => level === requested?.toLowerCase());
  if (match) {
    return match;
  }
  if (nodeEnv === 'test') {
    return 'silent';
  }
  return nodeEnv === 'production' ? 'info' : 'debug';
}

/**
 * Log file path from LOG_FILE: unset means the default, an empty value turns the file off
 */
export function resolveLogFile(value: string | undefined): string | null {
  if (value === undefined) {
    return DEFAULT_LOG_FILE;
  }
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

export interface TransportSettings {
  isDevelopment: boolean;
  level: LevelWithSilent;
  logFile: string | null;
}

/**
 * Development gets pino-pretty on stdout, everything else plain JSON.
 * A log file adds a `pino/file` target beside the console one.
 */
export function buildTransport({
  isDevelopment,
  level,
  logFile,
}: TransportSettings): TransportSingleOptions | TransportMultiOptions | undefined {
  if (!logFile || level === 'silent') {
    return isDevelopment ? { target: 'pino-pretty', options: PRETTY_OPTIONS } : undefined;
  }

  const consoleTarget: TransportTargetOptions = isDevelopment
    ? { target: 'pino-pretty', level, options: PRETTY_OPTIONS }
    : { target: 'pino/file', level, options: { destination: 1 } };
  return {
    targets: [consoleTarget, { target: 'pino/file', level, options: { destination: logFile, mkdir: true } }],
  };
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isDevelopment = nodeEnv !== 'production' && nodeEnv !== 'test';
  const level = resolveLevel(process.env.LOG_LEVEL, nodeEnv);
  const transport = buildTransport({ isDevelopment, level, logFile: resolveLogFile(process.env.LOG_FILE) });

  // pino refuses a custom level formatter alongside transport targets
  const multiTarget = transport !== undefined && 'targets' in transport;

  return pino({
    level,
    base: {
      env: nodeEnv,
      service: 'legislation-etl',
    },
    ...(!multiTarget && {
      formatters: {
        level: (label: string) => {
          return { level: label };
        },
      },
    }),
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(transport && { transport }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context (runId, documentId, stage)
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  return logger.child(additionalContext);
}
