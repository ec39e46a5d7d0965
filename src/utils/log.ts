import chalk from 'chalk';

export type LogLevel = 'info' | 'success' | 'warn' | 'error';

export type LogEntry = {
  level: LogLevel;
  message: string;
};

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type ConsoleLoggerOptions = {
  quiet?: boolean;
  out?: (line: string) => void;
  err?: (line: string) => void;
};

export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): Logger {
  const out = opts.out ?? ((line: string) => console.log(line));
  const err = opts.err ?? ((line: string) => console.error(line));

  return {
    info(message) {
      if (!opts.quiet) out(message);
    },
    success(message) {
      if (!opts.quiet) out(`${chalk.green('✓')} ${message}`);
    },
    warn(message) {
      err(`${chalk.yellow('⚠')} ${message}`);
    },
    error(message) {
      err(`${chalk.red('✗')} ${message}`);
    },
  };
}

export type MemoryLogger = Logger & {
  entries: LogEntry[];
  messages(level: LogLevel): string[];
};

export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  const push = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };

  return {
    entries,
    messages(level) {
      return entries.filter((e) => e.level === level).map((e) => e.message);
    },
    info: push('info'),
    success: push('success'),
    warn: push('warn'),
    error: push('error'),
  };
}

export const silentLogger: Logger = {
  info() {},
  success() {},
  warn() {},
  error() {},
};

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
