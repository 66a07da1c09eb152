export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

const RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
}

export interface LoggerOptions {
  level: LogLevel;
  write?: (text: string) => void;
  now?: () => Date;
}

function formatData(data: unknown): string {
  if (data === undefined) return '';
  if (data instanceof Error) return ' ' + (data.stack ?? data.message);
  if (typeof data === 'string') return ' ' + data;
  try {
    return ' ' + JSON.stringify(data);
  } catch {
    return ' ' + String(data);
  }
}

/**
 * Diagnostic logger. Lines go to stderr so they never mix with the
 * command output on stdout.
 */
export function createLogger(options: LoggerOptions): Logger {
  const output = options.write ?? ((text: string) => { process.stderr.write(text); });
  const now = options.now ?? (() => new Date());
  const threshold = RANK[options.level];

  function emit(level: Exclude<LogLevel, 'silent'>, message: string, data?: unknown) {
    if (RANK[level] > threshold) return;
    output(`[${now().toISOString()}] ${level.toUpperCase()} ${message}${formatData(data)}\n`);
  }

  return {
    error: (message, data) => emit('error', message, data),
    warn: (message, data) => emit('warn', message, data),
    info: (message, data) => emit('info', message, data),
    debug: (message, data) => emit('debug', message, data),
  };
}
