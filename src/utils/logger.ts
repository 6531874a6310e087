import chalk from 'chalk';

type LogLevel = 'debug' | 'info' | 'success' | 'warn' | 'error';

const levelColor: Record<LogLevel, (message: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  success: chalk.green,
  warn: chalk.yellow,
  error: chalk.red
};

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  success: 20,
  warn: 30,
  error: 40
};

function isLogLevel(value: string): value is LogLevel {
  return value in levelRank;
}

function resolveThreshold(): number {
  if (process.env.DEBUG === '1' || process.env.DEBUG === 'true') {
    return levelRank.debug;
  }
  const configured = (process.env.LOG_LEVEL ?? '').toLowerCase();
  return isLogLevel(configured) ? levelRank[configured] : levelRank.info;
}

const threshold = resolveThreshold();

function log(level: LogLevel, scope: string | undefined, message: string, payload?: unknown) {
  if (levelRank[level] < threshold) {
    return;
  }
  const label = chalk.bold(levelColor[level](`[${level.toUpperCase()}]`));
  const prefix = scope ? `${label} ${chalk.magenta(scope)}` : label;
  const line = `${prefix} ${new Date().toISOString()} ${message}`;
  const write = level === 'error' || level === 'warn' ? console.error : console.log;
  if (payload !== undefined) {
    write(line, payload);
  } else {
    write(line);
  }
}

export interface Logger {
  debug(message: string, payload?: unknown): void;
  info(message: string, payload?: unknown): void;
  success(message: string, payload?: unknown): void;
  warn(message: string, payload?: unknown): void;
  error(message: string, payload?: unknown): void;
}

export function createLogger(scope?: string): Logger {
  return {
    debug: (message, payload) => log('debug', scope, message, payload),
    info: (message, payload) => log('info', scope, message, payload),
    success: (message, payload) => log('success', scope, message, payload),
    warn: (message, payload) => log('warn', scope, message, payload),
    error: (message, payload) => log('error', scope, message, payload)
  };
}

export const logger = createLogger();
