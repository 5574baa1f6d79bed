import express, { Request, Response, NextFunction } from 'express';
import { GuestTokenBroker, createBroker } from '../broker/broker';
import { config, loadBrokerConfig } from '../shared/config';
import { ValidationError } from '../shared/errors';
import { Logger, createLogger } from '../shared/logger';
import { createCorsMiddleware } from './middleware/cors';
import { createRequestIdMiddleware } from './middleware/requestId';
import { createTokenRoutes, sendError } from './routes/tokens';

export interface AppOptions {
  corsAllowedOrigins?: readonly string[];
  logger?: Logger;
}

function isBodyParseError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'type' in error &&
    error.type === 'entity.parse.failed';
}

export function createApp(broker: GuestTokenBroker, options: AppOptions = {}): express.Express {
  const log = options.logger ?? createLogger('Gateway');
  const app = express();

  app.use(createRequestIdMiddleware());
  app.use(createCorsMiddleware(options.corsAllowedOrigins ?? config.gateway.corsAllowedOrigins));
  app.use(express.json({ limit: '100kb' }));

  // Public metadata
  app.get('/', (_req, res) => {
    res.json({
      message: 'Guest Token Broker API',
      version: config.gateway.version,
      health: '/health',
    });
  });

  // Liveness only - never touches upstream
  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', message: 'API is running', session: broker.sessionStatus() });
  });

  app.use(createTokenRoutes(broker, log));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'not_found', detail: `No route for ${req.method} ${req.path}` });
  });

  // Four arguments mark this as Express's error handler
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(error)) {
      sendError(req, res, new ValidationError('Request body is not valid JSON'), log);
      return;
    }
    sendError(req, res, error, log);
  });

  return app;
}

// Initialize and start
async function start() {
  const log = createLogger('Gateway');
  const brokerConfig = loadBrokerConfig();

  if (!brokerConfig.verifySsl) {
    log.warn('VERIFY_SSL is off: upstream TLS certificates will NOT be verified');
  }

  const runtime = createBroker(brokerConfig);
  await runtime.cache.connect();

  const app = createApp(runtime.broker);
  const port = config.gateway.port;
  const server = app.listen(port, () => {
    log.info(`Guest token broker listening on port ${port}, upstream ${brokerConfig.baseUrl}`);
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    server.close(() => {
      runtime.shutdown().then(
        () => process.exit(0),
        (error: unknown) => {
          log.error('Shutdown failed:', error);
          process.exit(1);
        }
      );
    });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  start().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
