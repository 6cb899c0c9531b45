import { createLogger, type Logger } from '../../src/infrastructure/logging/logger.js';

export interface LogEntry {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export const WARN_LEVEL = 40;

export interface CapturedLogger {
  logger: Logger;
  entries: LogEntry[];
  messages(level: number): string[];
}

/**
 * A pino logger writing parsed entries into memory instead of stderr.
 */
export function createCapturingLogger(debug: boolean = true): CapturedLogger {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    debug,
    destination: {
      write(line: string): void {
        const entry: LogEntry = JSON.parse(line);
        entries.push(entry);
      }
    }
  });

  return {
    logger,
    entries,
    messages: (level: number) => entries.filter(entry => entry.level === level).map(entry => entry.msg)
  };
}
