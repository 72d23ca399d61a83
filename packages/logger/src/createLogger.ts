/**
 * @fileoverview Logger factory.
 * Creates Winston loggers with structured fields, sensitive-field redaction
 * and console / file transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger } from './types.js';
import { redactSensitive, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * The format chain redacts sensitive fields first, then adds the timestamp and
 * request ID, then renders JSON or the pretty console line.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * const cacheLogger = logger.child({ service: 'cache' });
 * cacheLogger.debug('Cache lookup', { cache_key: 'quotebook:prices:AAPL:_:_', cache: 'miss' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  const logFormat = format.combine(
    redactSensitive(),
    standardFields,
    json ? format.json() : prettyPrint
  );

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // File output is always JSON so it can be shipped as-is
        format: format.combine(redactSensitive(), standardFields, format.json()),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  // Winston warns when a logger has no transports at all
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ level, silent: true }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // Global handlers in errorHandler.ts decide when to exit
    exitOnError: false,
  });
}
