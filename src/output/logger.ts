/**
 * File logging with ANSI stripping
 */

import * as fs from 'fs';
import * as path from 'path';

import { stripAnsi } from './colors.js';

/**
 * Tester event for structured logging
 */
export interface TesterEvent {
  type: 'tester';
  event: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface Logger {
  log(msg: string): void;
  logEvent(event: Omit<TesterEvent, 'type' | 'timestamp'>): void;
  close(): void;
  filePath: string | null;
}

/**
 * Create a logger that writes to a timestamped log file
 */
export function createLogger(
  enabled: boolean,
  logDir: string,
  name: string
): Logger {
  if (!enabled) {
    return {
      log: () => undefined,
      logEvent: () => undefined,
      close: () => undefined,
      filePath: null,
    };
  }

  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  const logFile = path.join(logDir, `${path.basename(name)}-${timestamp}.log`);
  const logStream = fs.createWriteStream(logFile, { flags: 'a' });

  return {
    log(msg: string): void {
      logStream.write(stripAnsi(msg) + '\n');
    },
    logEvent(eventData: Omit<TesterEvent, 'type' | 'timestamp'>): void {
      const fullEvent = {
        type: 'tester' as const,
        timestamp: new Date().toISOString(),
        ...eventData,
      };
      logStream.write(JSON.stringify(fullEvent) + '\n');
    },
    close(): void {
      logStream.end();
    },
    filePath: logFile,
  };
}
