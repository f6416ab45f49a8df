import { NextFunction, Request, Response } from 'express';
import { errorDetails, isGatewayError } from '../../shared/errors';
import { componentLogger } from '../../shared/logger';

const log = componentLogger('http');

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (res.headersSent) {
    // Mid-stream failure: the status line is gone, only the connection can signal it
    log.error('Response failed after headers were sent', { path: req.originalUrl, ...errorDetails(err) });
    res.destroy();
    return;
  }

  if (isGatewayError(err)) {
    if (err.status >= 500) {
      log.error('Gateway request failed', { path: req.originalUrl, code: err.code, message: err.message });
    } else {
      log.debug('Gateway request rejected', { path: req.originalUrl, code: err.code, message: err.message });
    }
    res.status(err.status).json({ error: err.message, code: err.code });
    return;
  }

  // body-parser rejections (malformed JSON, oversized bodies) carry their own 4xx status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    res.status(err.status).json({ error: err.message, code: 'BAD_REQUEST' });
    return;
  }

  log.error('Unhandled request error', { path: req.originalUrl, ...errorDetails(err) });
  res.status(500).json({ error: 'Internal Server Error', code: 'INTERNAL' });
}
