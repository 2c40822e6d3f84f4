import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

let currentLogLevel: LogLevel = 'info';

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Where log lines go. stdout carries results; diagnostics go to stderr so
 * `--json` output stays parseable.
 */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

let sink: LogSink = consoleSink;

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Redirect output, e.g. to capture it in tests. Returns a function that
 * restores the previous sink.
 */
export function setLogSink(next: LogSink): () => void {
  const previous = sink;
  sink = next;
  return () => {
    sink = previous;
  };
}

function shouldLog(level: LogLevel): boolean {
  return levelPriority[level] >= levelPriority[currentLogLevel];
}

/**
 * Logger utility for the switchboard CLI
 */
export const logger = {
  debug(message: string): void {
    if (shouldLog('debug')) {
      sink.err(chalk.gray(`[debug] ${message}`));
    }
  },

  info(message: string): void {
    if (shouldLog('info')) {
      sink.out(message);
    }
  },

  success(message: string): void {
    if (shouldLog('info')) {
      sink.out(chalk.green(`✓ ${message}`));
    }
  },

  warn(message: string): void {
    if (shouldLog('warn')) {
      sink.err(chalk.yellow(`⚠ ${message}`));
    }
  },

  error(message: string): void {
    if (shouldLog('error')) {
      sink.err(chalk.red(`✗ ${message}`));
    }
  },

  section(title: string): void {
    if (shouldLog('info')) {
      sink.out('');
      sink.out(chalk.bold.blue(title));
      sink.out(chalk.blue('─'.repeat(title.length)));
    }
  },

  keyValue(key: string, value: string | number | boolean): void {
    if (shouldLog('info')) {
      sink.out(`  ${chalk.dim(key + ':')} ${value}`);
    }
  },

  listItem(item: string, indent: number = 0): void {
    if (shouldLog('info')) {
      sink.out(`${'  '.repeat(indent)}• ${item}`);
    }
  },

  blank(): void {
    if (shouldLog('info')) {
      sink.out('');
    }
  },

  /**
   * Machine-readable output; printed at every log level
   */
  json(value: unknown): void {
    sink.out(JSON.stringify(value, null, 2));
  },
};
