import type { Logger } from '../src/infra/logger/logger.js';

export const mockLogger: Logger = {
  info: () => {},
  debug: () => {},
  warn: () => {},
  error: () => {},
};

export interface LogLine {
  level: 'info' | 'debug' | 'warn' | 'error';
  context: string;
  message: string;
}

/** Logger that keeps every line for assertions. */
export function createRecordingLogger(): Logger & { lines: LogLine[] } {
  const lines: LogLine[] = [];
  return {
    lines,
    info: (context, message) => lines.push({ level: 'info', context, message }),
    debug: (context, message) => lines.push({ level: 'debug', context, message }),
    warn: (context, message) => lines.push({ level: 'warn', context, message }),
    error: (context, message) => lines.push({ level: 'error', context, message }),
  };
}
