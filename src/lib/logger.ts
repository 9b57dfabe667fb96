export type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  readonly verbose: boolean;
}

const PREFIXES: Record<LogLevel, string> = {
  info: 'ℹ️ ',
  success: '✓',
  warn: '⚠️ ',
  error: '❌',
  debug: '[debug]'
};

export function formatLine(level: LogLevel, message: string): string {
  return message === '' ? '' : `${PREFIXES[level]} ${message}`;
}

/**
 * Diagnostics go to stderr so stdout stays clean for `--list`
 */
export class ConsoleLogger implements Logger {
  constructor(public readonly verbose = false) {}

  info(message: string): void {
    console.error(formatLine('info', message));
  }

  success(message: string): void {
    console.error(formatLine('success', message));
  }

  warn(message: string): void {
    console.error(formatLine('warn', message));
  }

  error(message: string): void {
    console.error(formatLine('error', message));
  }

  debug(message: string): void {
    if (this.verbose) {
      console.error(formatLine('debug', message));
    }
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Keeps every line in memory; used by tests and by callers that want to
 * inspect what a stage reported
 */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  constructor(public readonly verbose = true) {}

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  success(message: string): void {
    this.entries.push({ level: 'success', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  debug(message: string): void {
    if (this.verbose) {
      this.entries.push({ level: 'debug', message });
    }
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter(e => level === undefined || e.level === level).map(e => e.message);
  }
}
