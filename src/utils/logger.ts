export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Defaults to stderr. */
  sink?: (line: string) => void;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    const configured = this.opts.level ?? 'info';
    if (levelRank[level] < levelRank[configured]) return;

    const timestamp = new Date().toISOString();
    const write = this.opts.sink ?? ((line: string) => process.stderr.write(`${line}\n`));

    if (this.opts.json) {
      write(JSON.stringify({ timestamp, level, message, data }));
      return;
    }

    write(data === undefined ? `${timestamp} ${level} ${message}` : `${timestamp} ${level} ${message} ${safeJson(data)}`);
  }
}

export function isLogLevel(v: unknown): v is LogLevel {
  return v === 'debug' || v === 'info' || v === 'warn' || v === 'error';
}

/** Logger configured from ROSTER_LOG_LEVEL / ROSTER_LOG_JSON. */
export function createLogger(env: NodeJS.ProcessEnv = process.env, sink?: LoggerOptions['sink']): Logger {
  const level = env.ROSTER_LOG_LEVEL?.trim().toLowerCase();
  return new Logger({
    level: isLogLevel(level) ? level : env.ROSTER_VERBOSE === '1' ? 'debug' : 'info',
    json: env.ROSTER_LOG_JSON === '1',
    sink
  });
}

/** Logger that drops everything below `error`; the default for library callers. */
export const quietLogger = new Logger({ level: 'error' });

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
