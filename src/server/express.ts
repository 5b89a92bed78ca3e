/**
 * Express REST API Server
 * Hosts the room, machine, user and report resources over one database handle
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import { pinoHttp } from 'pino-http';
import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from 'http';
import { createLogger, type Logger, type LevelWithSilent } from '../logger.js';
import { createStores, type Clock, type DatabaseManager, type Stores } from '../storage/index.js';
import {
  createMachineRouter,
  createReportRouter,
  createRoomRouter,
  createUserRouter,
} from './routes/index.js';

// ============================================
// Types
// ============================================

export interface ServerConfig {
  port: number;
  host: string;
  /** Allowed CORS origins; empty disables CORS headers */
  corsOrigins: string[];
  database: DatabaseManager;
  logger?: Logger;
  /** Clock used to stamp new reports */
  clock?: Clock;
}

function levelForResponse(_req: IncomingMessage, res: ServerResponse, error?: Error): LevelWithSilent {
  if (error || res.statusCode >= 500) return 'error';
  if (res.statusCode >= 400) return 'warn';
  return 'info';
}

function statusOf(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

// ============================================
// API Server
// ============================================

export class ApiServer {
  private app: Express;
  private server: HttpServer;
  private config: Omit<ServerConfig, 'logger'>;
  private logger: Logger;
  private stores: Stores;

  constructor(config: Partial<ServerConfig> & Pick<ServerConfig, 'database'>) {
    this.config = {
      port: 8080,
      host: '127.0.0.1',
      corsOrigins: [],
      ...config,
    };
    this.logger = config.logger ?? createLogger();
    this.stores = createStores(this.config.database, this.config.clock);

    this.app = express();
    this.server = createServer(this.app);

    this.setupMiddleware();
    this.setupRoutes();
  }

  // ----------------------------------------
  // Middleware
  // ----------------------------------------

  private setupMiddleware(): void {
    this.app.use(pinoHttp({
      logger: this.logger,
      customLogLevel: levelForResponse,
    }));

    if (this.config.corsOrigins.length > 0) {
      this.app.use(cors({
        origin: this.config.corsOrigins,
      }));
    }

    this.app.use(express.json());
  }

  // ----------------------------------------
  // Routes
  // ----------------------------------------

  private setupRoutes(): void {
    // Health check
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: Date.now() });
    });

    this.app.use('/room', createRoomRouter(this.stores));
    this.app.use('/machine', createMachineRouter(this.stores));
    this.app.use('/user', createUserRouter(this.stores));
    this.app.use('/report', createReportRouter(this.stores));

    this.app.use((_req: Request, res: Response) => {
      res.status(404).json('Not found.');
    });

    // Error handler: body parser failures carry their own 4xx status
    this.app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
      const status = statusOf(err);
      if (status === 400) {
        res.status(status).json(`Malformed request body: ${err.message}`);
        return;
      }
      if (status !== undefined && status > 400 && status < 500) {
        res.status(status).json(err.message);
        return;
      }

      req.log.error({ err }, 'Unhandled API error');
      res.status(500).json('Internal server error.');
    });
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  getApp(): Express {
    return this.app;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', reject);
        this.logger.info(`API server running at http://${this.config.host}:${this.getPort()}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.server.listening) {
      return;
    }

    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** Bound port once started (resolves port 0), otherwise the configured one */
  getPort(): number {
    const address = this.server.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }
}
