/**
 * @fileoverview Type definitions for the Quotebook logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity that reaches the transports.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/quotebook.log'
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Machine-readable JSON output instead of the pretty console format.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Also write to this file.
   */
  filePath?: string;

  /**
   * @default true
   */
  console?: boolean;
}

/**
 * The logger interface used throughout the code base.
 */
export type Logger = WinstonLogger;
