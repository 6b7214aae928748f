/**
 * Request Correlation ID Middleware
 *
 * Reuses a safe incoming X-Request-ID or mints a UUID, echoes it on the
 * response, and logs one line per finished request carrying the ID, so a
 * visitor's report can be matched to the log lines of their submission.
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../../logging/index.js';

export const REQUEST_ID_HEADER = 'X-Request-ID';

const SAFE_REQUEST_ID = /^[\w-]{1,64}$/;

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export function requestIdMiddleware(logger?: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.get(REQUEST_ID_HEADER);
    const requestId = incoming && SAFE_REQUEST_ID.test(incoming) ? incoming : uuidv4();

    req.requestId = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    if (logger) {
      const startTime = Date.now();
      res.on('finish', () => {
        logger.debug(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
          requestId,
          durationMs: Date.now() - startTime,
        });
      });
    }

    next();
  };
}
