/**
 * HTTP API server for Quotebook
 */

import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type RequestHandler,
} from 'express';
import type { AddressInfo } from 'node:net';
import { requestIdMiddleware, startTimer, type Logger } from '@quotebook/logger';
import type { DirectoryStore } from '@quotebook/symbol-directory';
import type { HealthStatus } from '../container/types.js';
import type { QueryDispatcher } from '../services/query-dispatcher.js';
import { sanitizeError, toErrorResponse } from '../utils/error-sanitizer.js';
import {
  latestPricesQuery,
  marketTypeQuery,
  parseQuery,
  pricesQuery,
  profitsQuery,
  signalTypeQuery,
  tickerQuery,
  tradeHistoryQuery,
} from './params.js';

export interface HealthSource {
  healthCheckAll(): Promise<Map<string, HealthStatus>>;
}

export interface HttpServerConfig {
  port: number;
  host: string;
  logger: Logger;
  dispatcher: QueryDispatcher;
  directory: DirectoryStore;
  health: HealthSource;
  /** Services whose failure makes /health answer 503 */
  criticalServices?: string[];
}

type JsonHandler = (req: Request) => unknown;

/**
 * HTTP server for handling API requests
 */
export class HttpServer {
  readonly app: Express;
  private logger: Logger;
  private server?: ReturnType<Express['listen']>;

  constructor(private config: HttpServerConfig) {
    this.logger = config.logger;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    this.app.disable('x-powered-by');
    this.app.use(requestIdMiddleware());

    // Request logging
    this.app.use((req, res, next) => {
      const timer = startTimer();
      res.on('finish', () => {
        this.logger.debug('HTTP request', {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration_ms: timer.stop(),
        });
      });
      next();
    });
  }

  /**
   * Setup API routes
   */
  private setupRoutes(): void {
    const { dispatcher } = this.config;

    this.app.get('/health', this.handleHealth);

    this.app.post('/update-tables', this.json(() => dispatcher.refreshTables()));

    this.app.get(
      '/prices',
      this.json((req) => dispatcher.getPrices(parseQuery(pricesQuery, req.query)))
    );

    this.app.get('/tables', this.json(() => dispatcher.getTables()));

    this.app.get(
      '/latest_prices_ticker',
      this.json((req) => {
        const { ticker } = parseQuery(tickerQuery, req.query);
        return dispatcher.getLatestPriceForTicker(ticker);
      })
    );

    this.app.get(
      '/latest_prices',
      this.json((req) => {
        const { market_type, date } = parseQuery(latestPricesQuery, req.query);
        return dispatcher.getLatestPrices(market_type, date);
      })
    );

    this.app.get(
      '/latest_signals',
      this.json((req) => {
        const { type, signal_type } = parseQuery(signalTypeQuery, req.query);
        return dispatcher.getLatestSignals(type, signal_type);
      })
    );

    this.app.get(
      '/signals',
      this.json((req) => dispatcher.getSignals(parseQuery(tickerQuery, req.query).ticker))
    );

    this.app.get(
      '/trade_history',
      this.json((req) => {
        const { type, signal_type, start_date, end_date } = parseQuery(tradeHistoryQuery, req.query);
        return dispatcher.getTradeHistory(type, signal_type, start_date, end_date);
      })
    );

    this.app.get(
      '/profits',
      this.json((req) => {
        const { type, signal_type, start_date, uid } = parseQuery(profitsQuery, req.query);
        return dispatcher.getProfits(type, signal_type, start_date, uid);
      })
    );

    this.app.get(
      '/owned',
      this.json((req) => {
        const { type, signal_type } = parseQuery(signalTypeQuery, req.query);
        return dispatcher.getOwned(type, signal_type);
      })
    );

    this.app.get(
      '/latest_update_date',
      this.json((req) => {
        const { market_type } = parseQuery(marketTypeQuery, req.query);
        return dispatcher.getLatestUpdateDate(market_type);
      })
    );

    // 404 handler
    this.app.use((_req, res) => {
      res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
    });

    this.app.use(this.handleError);
  }

  /**
   * Run a handler and send its result as JSON; anything it throws goes to
   * the error middleware.
   */
  private json(handler: JsonHandler): RequestHandler {
    return (req, res, next) => {
      Promise.resolve()
        .then(() => handler(req))
        .then((body) => {
          res.json(body);
        })
        .catch(next);
    };
  }

  private handleHealth: RequestHandler = (_req, res, next) => {
    const critical = new Set(this.config.criticalServices ?? ['database', 'directory']);

    this.config.health
      .healthCheckAll()
      .then((statuses) => {
        const services: Record<string, { healthy: boolean; message?: string }> = {};
        let criticalFailure = false;
        let degraded = false;

        for (const [name, status] of statuses) {
          services[name] = { healthy: status.healthy, message: status.message };
          if (!status.healthy) {
            if (critical.has(name)) criticalFailure = true;
            else degraded = true;
          }
        }

        const snapshot = this.config.directory.getSnapshot();
        if (!snapshot) criticalFailure = true;

        res.status(criticalFailure ? 503 : 200).json({
          status: criticalFailure ? 'unhealthy' : degraded ? 'degraded' : 'ok',
          directory: { loaded: snapshot !== null, loaded_at: snapshot?.loadedAt ?? null },
          services,
        });
      })
      .catch(next);
  };

  private handleError: ErrorRequestHandler = (error: unknown, req, res, _next) => {
    const { status, body } = toErrorResponse(error);

    if (status >= 500) {
      this.logger.error('Request failed', {
        method: req.method,
        path: req.path,
        status,
        error: sanitizeError(error, true),
      });
    } else {
      this.logger.debug('Request rejected', {
        method: req.method,
        path: req.path,
        status,
        error: body.error,
      });
    }

    res.status(status).json(body);
  };

  /**
   * Bound address; the real port when started on port 0
   */
  address(): { host: string; port: number } | null {
    const address = this.server?.address();
    if (!address || typeof address === 'string') return null;
    const info: AddressInfo = address;
    return { host: info.address, port: info.port };
  }

  /**
   * Start the HTTP server
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.info('HTTP server started', {
          host: this.config.host,
          port: this.address()?.port ?? this.config.port,
        });
        resolve();
      });

      server.on('error', (error) => {
        this.logger.error('HTTP server error', { error: sanitizeError(error) });
        reject(error);
      });

      this.server = server;
    });
  }

  /**
   * Stop the HTTP server
   */
  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }

      server.close((error) => {
        if (error) {
          this.logger.error('Error stopping HTTP server', { error: sanitizeError(error) });
          reject(error);
        } else {
          this.server = undefined;
          this.logger.info('HTTP server stopped');
          resolve();
        }
      });
    });
  }
}
