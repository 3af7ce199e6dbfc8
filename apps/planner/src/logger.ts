export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type LogPayload = Record<string, unknown>;

interface LoggerContext {
  runId: string;
  /** Messages below this level are dropped. Defaults to `info`. */
  level?: LogLevel;
}

const writers: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export interface Logger {
  debug: (message: string, meta?: LogPayload) => void;
  info: (message: string, meta?: LogPayload) => void;
  warn: (message: string, meta?: LogPayload) => void;
  error: (message: string, meta?: LogPayload) => void;
}

export function createLogger(context: LoggerContext): Logger {
  const threshold = LOG_LEVELS.indexOf(context.level ?? 'info');
  const prefix = `[planner:${context.runId}]`;

  const log = (level: LogLevel) => (message: string, meta?: LogPayload) => {
    if (LOG_LEVELS.indexOf(level) < threshold) {
      return;
    }
    const payload = meta ? ` ${JSON.stringify(meta)}` : '';
    writers[level](prefix, message, payload);
  };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
