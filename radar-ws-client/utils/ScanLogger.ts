/**
 * Scan Client Logger
 * Console logging with optional mirroring to a file for post-mortem of connection issues
 */

import * as fs from 'fs';
import * as path from 'path';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface LoggerOptions {
  level?: LogLevel;
  directory?: string | null;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export class ScanLogger {
  private logFilePath: string = '';
  private logStream: fs.WriteStream | null = null;
  private minLevel: LogLevel = 'INFO';

  configure(options: LoggerOptions): void {
    if (options.level) {
      this.minLevel = options.level;
    }
    if (options.directory) {
      this.openFile(options.directory);
    }
  }

  private openFile(logDir: string): void {
    this.close();
    try {
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      this.logFilePath = path.join(logDir, `radar-scan-${timestamp}.log`);

      this.logStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
      this.logStream.on('error', (error) => {
        console.warn('Scan Logger: File logging disabled -', error.message);
        this.logStream = null;
        this.logFilePath = '';
      });
      this.info(`Log file: ${this.logFilePath}`, undefined, 'APP');
    } catch (error) {
      // Continue with console-only logging
      console.warn('Scan Logger: File logging disabled -', error instanceof Error ? error.message : String(error));
      this.logFilePath = '';
    }
  }

  private formatMessage(level: LogLevel, category: string, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    let logLine = `[${timestamp}] [${level}] [${category}] ${message}`;

    if (data instanceof Error) {
      const code = 'code' in data ? ` (${String(data.code)})` : '';
      logLine += ` | ${data.name}${code}: ${data.message}`;
    } else if (data !== undefined) {
      try {
        logLine += ` | ${JSON.stringify(data)}`;
      } catch {
        logLine += ' | [Unserializable data]';
      }
    }

    return logLine;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  log(level: LogLevel, message: string, data?: unknown, category: string = 'SCAN'): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const formattedMessage = this.formatMessage(level, category, message, data);

    console.log(formattedMessage);

    if (this.logStream) {
      this.logStream.write(formattedMessage + '\n');
    }
  }

  debug(message: string, data?: unknown, category: string = 'SCAN'): void {
    this.log('DEBUG', message, data, category);
  }

  info(message: string, data?: unknown, category: string = 'SCAN'): void {
    this.log('INFO', message, data, category);
  }

  warn(message: string, data?: unknown, category: string = 'SCAN'): void {
    this.log('WARN', message, data, category);
  }

  error(message: string, data?: unknown, category: string = 'SCAN'): void {
    this.log('ERROR', message, data, category);
  }

  // Session-scoped connection logging
  logSession(sessionId: string, phase: string, details?: unknown): void {
    this.info(`${phase} [session ${sessionId.slice(0, 8)}]`, details, 'CONNECTION');
  }

  logSessionError(sessionId: string, phase: string, error: unknown): void {
    this.warn(`${phase} FAILED [session ${sessionId.slice(0, 8)}]`, error, 'CONNECTION');
  }

  close(): void {
    if (this.logStream) {
      this.logStream.end();
      this.logStream = null;
    }
  }

  getLogPath(): string {
    return this.logFilePath;
  }
}

// Singleton instance
export const scanLogger = new ScanLogger();
