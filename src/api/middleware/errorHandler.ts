import { Request, Response, NextFunction } from 'express';
import { logger } from '../../utils/logger';
import { CheckCancelledError, PhishyCheckError, httpStatusFor } from '../../utils/errors';
import { toErrorResponse } from '../../presentation/api-response';

// express.json() rejects malformed bodies with a 4xx error carrying `status`
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (res.headersSent) {
    next(err);
    return;
  }

  // Nobody is listening for the answer
  if (err instanceof CheckCancelledError) {
    logger.info(`Check cancelled: ${req.method} ${req.originalUrl}`);
    return;
  }

  const clientStatus = clientErrorStatus(err);
  if (!(err instanceof PhishyCheckError) && clientStatus !== undefined) {
    res.status(clientStatus).json({ success: false, error: 'Malformed request body' });
    return;
  }

  const status = httpStatusFor(err);
  if (status >= 500) {
    logger.error('API Error:', { path: req.originalUrl, error: err instanceof Error ? err.message : String(err) });
  }

  res.status(status).json(toErrorResponse(err));
};
