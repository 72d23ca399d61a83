#!/usr/bin/env node

/**
 * Main application entry point
 * Wires all services together and starts the HTTP server
 */

// Load environment variables from .env file
import 'dotenv/config';

import {
  createLogger,
  attachGlobalHandlers,
  gracefulExit,
  withRequestContext,
  startTimer,
  type Logger,
} from '@quotebook/logger';
import { createContainer, type AppServices } from './app.js';
import type { Container } from './container/index.js';
import { loadConfig, getConfigSummary } from './config/index.js';
import { HttpServer } from './server/http-server.js';

/**
 * Main startup function
 */
async function start(): Promise<void> {
  let logger: Logger | undefined;
  let container: Container<AppServices> | undefined;

  try {
    const config = loadConfig();

    logger = createLogger({
      level: config.logging.level,
      json: config.logging.format === 'json',
      filePath: config.logging.filePath,
    });
    const rootLogger = logger;

    attachGlobalHandlers(rootLogger);

    const services = createContainer(config, rootLogger);
    container = services;

    // Wrap startup in request context for observability
    const httpServer = await withRequestContext(async () => {
      const startupTimer = startTimer();

      rootLogger.info('Starting Quotebook', {
        ...getConfigSummary(config),
        operation: 'app_startup',
      });

      const initTimer = startTimer();
      await services.initializeAll();
      rootLogger.info('Services initialized', {
        operation: 'service_init',
        duration_ms: initTimer.stop(),
        result: 'success',
      });
      rootLogger.debug(`Service wiring\n${services.getWiringGraph()}`);

      const server = new HttpServer({
        port: config.server.port,
        host: config.server.host,
        logger: rootLogger.child({ service: 'http-server' }),
        dispatcher: services.resolve('dispatcher'),
        directory: services.resolve('directory').store,
        health: services,
      });
      await server.start();

      rootLogger.info('Quotebook startup complete', {
        operation: 'app_startup',
        duration_ms: startupTimer.stop(),
        result: 'success',
      });

      return server;
    });

    const shutdown = async (signal: string): Promise<void> => {
      rootLogger.info('Shutting down...', { signal });
      await httpServer.stop();
      await services.shutdownAll();
      gracefulExit(rootLogger, 0);
    };

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        shutdown(signal).catch((error: unknown) => {
          rootLogger.error('Shutdown failed', { error });
          gracefulExit(rootLogger, 1);
        });
      });
    }
  } catch (error) {
    if (logger) {
      logger.error('Application startup failed', { error });
    } else {
      console.error('Application startup failed:', error);
    }

    if (container) {
      try {
        await container.shutdownAll();
      } catch (shutdownError) {
        console.error('Error during shutdown:', shutdownError);
      }
    }

    if (logger) {
      gracefulExit(logger, 1);
    } else {
      process.exit(1);
    }
  }
}

start().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
