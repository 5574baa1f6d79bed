import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

const SAFE_REQUEST_ID = /^[A-Za-z0-9_-]{1,64}$/;

export function createRequestIdMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.header('X-Request-Id');
    const requestId = incoming && SAFE_REQUEST_ID.test(incoming) ? incoming : uuidv4();

    req.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    next();
  };
}
