import { Request, Response, NextFunction } from 'express';

/**
 * CORS for the embedding frontends.
 *
 * Origins come from an explicit allowlist; a single "*" entry opens the API
 * to any origin but then credentials are not advertised.
 */

const ALLOWED_METHODS = ['GET', 'POST', 'OPTIONS'];
const ALLOWED_HEADERS = ['Content-Type', 'X-Request-Id'];
const EXPOSED_HEADERS = ['X-Request-Id'];
const PREFLIGHT_MAX_AGE = 86400; // 24 hours

export function createCorsMiddleware(allowedOrigins: readonly string[]) {
  const allowAny = allowedOrigins.includes('*');
  const origins = new Set(allowedOrigins);

  return (req: Request, res: Response, next: NextFunction): void => {
    const origin = req.headers.origin;

    res.setHeader('Vary', 'Origin');

    // Same-origin request or non-browser client
    if (!origin) {
      next();
      return;
    }

    if (origin === 'null') {
      res.status(403).json({ error: 'cors_rejected', detail: 'Null origin not allowed' });
      return;
    }

    if (!allowAny && !origins.has(origin)) {
      if (req.method === 'OPTIONS') {
        res.status(403).json({ error: 'cors_rejected', detail: 'Origin not allowed' });
        return;
      }
      // Without CORS headers the browser blocks the response itself
      next();
      return;
    }

    res.setHeader('Access-Control-Allow-Origin', allowAny ? '*' : origin);
    if (!allowAny) {
      res.setHeader('Access-Control-Allow-Credentials', 'true');
    }
    res.setHeader('Access-Control-Allow-Methods', ALLOWED_METHODS.join(', '));
    res.setHeader('Access-Control-Allow-Headers', ALLOWED_HEADERS.join(', '));
    res.setHeader('Access-Control-Expose-Headers', EXPOSED_HEADERS.join(', '));

    if (req.method === 'OPTIONS') {
      res.setHeader('Access-Control-Max-Age', String(PREFLIGHT_MAX_AGE));
      res.status(204).end();
      return;
    }

    next();
  };
}
