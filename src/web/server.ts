import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { createServer, type Server } from 'http';
import { config } from '../utils/config.js';
import logger from '../utils/logger.js';
import { isoSeconds } from '../utils/time.js';
import { createGitHubClient } from '../api/github.js';
import { outboxStore } from '../jobs/outbox.js';
import { taskRouter } from '../jobs/router.js';
import { isDatabaseInitialized } from '../storage/db.js';
import { getRecentRuns, getRunStats } from '../storage/repositories/jobRuns.js';
import { handleRpc, rpcError, RPC_PARSE_ERROR } from '../mcp/rpc.js';
import { SERVICE_NAME, TOOLS, toolSpecs, type ToolDeps } from '../mcp/tools.js';
import type { SchedulerStatus } from '../runtime/scheduler.js';

export interface GatewayOptions {
  deps?: Partial<ToolDeps>;
  allowedOrigins?: string[];
  schedulerStatus?: () => SchedulerStatus;
}

const DEFAULT_RUNS_LIMIT = 20;
const MAX_RUNS_LIMIT = 200;

function defaultDeps(): ToolDeps {
  return {
    appVersion: config.app.version,
    github: () => createGitHubClient(config.github),
    outbox: outboxStore,
    router: taskRouter,
  };
}

// ═══════════════════════════════════════════════════════════════
//                        CORS ALLOWLIST
// ═══════════════════════════════════════════════════════════════

function corsMiddleware(allowedOrigins: string[]) {
  const allowAll = allowedOrigins.includes('*');

  return (req: Request, res: Response, next: NextFunction): void => {
    const origin = req.headers.origin;

    if (allowAll) {
      res.setHeader('Access-Control-Allow-Origin', '*');
    } else if (origin && allowedOrigins.includes(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Vary', 'Origin');
    } else if (origin) {
      logger.warn(`CORS blockiert Origin: ${origin}`);
    }

    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }
    next();
  };
}

function parseLimit(raw: unknown): number {
  const n = typeof raw === 'string' ? parseInt(raw, 10) : NaN;
  if (!Number.isFinite(n) || n < 1) return DEFAULT_RUNS_LIMIT;
  return Math.min(n, MAX_RUNS_LIMIT);
}

// ═══════════════════════════════════════════════════════════════
//                        APP
// ═══════════════════════════════════════════════════════════════

export function createApp(options: GatewayOptions = {}): Express {
  const deps: ToolDeps = { ...defaultDeps(), ...options.deps };
  const allowedOrigins = options.allowedOrigins ?? config.app.allowedOrigins;
  const now = (): string => isoSeconds(deps.now ? deps.now() : new Date());

  const app = express();
  app.use(corsMiddleware(allowedOrigins));
  app.use(express.json({ limit: '1mb' }));

  // Immer schnell, für Render und Browser
  app.get('/', (_req: Request, res: Response) => {
    res.json({
      message: 'taskrelay gateway alive',
      service: SERVICE_NAME,
      version: deps.appVersion,
      tools_loaded: TOOLS.length,
      ts: now(),
    });
  });

  app.get('/tools', (_req: Request, res: Response) => {
    res.json(toolSpecs());
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      version: deps.appVersion,
      uptime: process.uptime(),
      timestamp: now(),
      checks: {
        server: true,
        database: isDatabaseInitialized(),
        github_token: config.github.token !== '',
      },
      outbox_pending: deps.outbox.countPending(),
      scheduler: options.schedulerStatus ? options.schedulerStatus() : null,
    });
  });

  app.get('/runs', (req: Request, res: Response) => {
    if (!isDatabaseInitialized()) {
      res.status(503).json({ error: 'Run-Ledger nicht initialisiert' });
      return;
    }
    res.json({
      runs: getRecentRuns(parseLimit(req.query.limit)),
      stats: getRunStats(),
    });
  });

  app.post('/mcp', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await handleRpc(req.body, deps));
    } catch (err) {
      next(err);
    }
  });

  // Kaputtes JSON im Body -> JSON-RPC Parse error
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof SyntaxError && req.path === '/mcp') {
      res.status(400).json(rpcError(null, RPC_PARSE_ERROR, 'Parse error', err.message));
      return;
    }
    next(err);
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error(`Server Error: ${err.message}`);
    res.status(500).json({ error: 'Interner Serverfehler' });
  });

  return app;
}

// ═══════════════════════════════════════════════════════════════
//                        SERVER START
// ═══════════════════════════════════════════════════════════════

export function startWebServer(options: GatewayOptions = {}, port: number = config.app.port): Server {
  const httpServer = createServer(createApp(options));
  httpServer.listen(port, () => {
    logger.info(`Gateway läuft auf Port ${port}`);
    logger.info(`MCP-Endpunkt: http://localhost:${port}/mcp`);
    logger.info(`Health Check: http://localhost:${port}/health`);
  });
  return httpServer;
}

export default startWebServer;
