import { Router, Request, Response } from 'express';
import { GuestTokenBroker } from '../../broker/broker';
import { isBrokerError } from '../../shared/errors';
import { Logger, createLogger } from '../../shared/logger';
import { parseGenerateTokenBody } from '../schemas';

// Aborts when the client disconnects before we answered
function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

export function sendError(req: Request, res: Response, error: unknown, log: Logger): void {
  if (res.headersSent || res.destroyed) return;

  if (isBrokerError(error)) {
    log.warn(`${req.method} ${req.path} [${req.requestId}] ${error.code}: ${error.message}`);
    res.status(error.httpStatus).json({ error: error.code, detail: error.message });
    return;
  }

  log.error(`${req.method} ${req.path} [${req.requestId}] unhandled error:`, error);
  res.status(500).json({ error: 'internal_error', detail: 'Internal server error' });
}

export function createTokenRoutes(broker: GuestTokenBroker, logger?: Logger): Router {
  const router = Router();
  const log = logger ?? createLogger('Gateway');

  // POST /generate-token - issue a guest token for one dashboard
  router.post('/generate-token', async (req, res) => {
    const signal = requestSignal(res);

    try {
      const request = parseGenerateTokenBody(req.body);
      const result = await broker.issueGuestToken(request, signal);

      res.json({
        token: result.token,
        dashboard_uuid: result.canonicalId,
        message: 'Guest token generated successfully',
      });
    } catch (error) {
      sendError(req, res, error, log);
    }
  });

  // GET /dashboard/:id - resolve a reference without issuing a token
  router.get('/dashboard/:id', async (req, res) => {
    const signal = requestSignal(res);

    try {
      const canonicalId = await broker.resolveDashboard(req.params.id, signal);
      res.json({
        dashboard_id: req.params.id,
        dashboard_uuid: canonicalId,
        message: 'Dashboard UUID resolved successfully',
      });
    } catch (error) {
      sendError(req, res, error, log);
    }
  });

  return router;
}
