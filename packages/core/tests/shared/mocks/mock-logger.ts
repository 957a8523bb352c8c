import type { LogContext, LoggerLike } from '@calldata-compress/shared';

export interface CapturedLog {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: LogContext;
}

/**
 * Mock logger for unit testing
 * Captures log messages for assertion without console output
 */
export class MockLogger implements LoggerLike {
  private logs: CapturedLog[] = [];

  debug(message: string, context?: LogContext): void {
    this.logs.push({ level: 'debug', message, context });
  }

  info(message: string, context?: LogContext): void {
    this.logs.push({ level: 'info', message, context });
  }

  warn(message: string, context?: LogContext): void {
    this.logs.push({ level: 'warn', message, context });
  }

  error(message: string, context?: LogContext): void {
    this.logs.push({ level: 'error', message, context });
  }

  // Helper methods for testing
  getLogs(): CapturedLog[] {
    return [...this.logs];
  }

  getLogsByLevel(level: CapturedLog['level']): CapturedLog[] {
    return this.logs.filter(log => log.level === level);
  }

  hasLog(level: CapturedLog['level'], message: string): boolean {
    return this.logs.some(
      log => log.level === level && log.message.includes(message)
    );
  }

  clear(): void {
    this.logs = [];
  }
}
