/**
 * Logging-related type definitions
 */

export interface LogContext {
  traceId?: string;
  operation?: string;
  groupId?: string;
  memberId?: string;
  [key: string]: unknown;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'verbose';
