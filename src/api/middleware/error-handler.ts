import type { NextFunction, Request, Response } from 'express';
import type { BackendResponse } from '../../Types/model';
import { EmailAssistantError, errorMessage, httpStatusFor } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger('API');

/**
 * Errors raised by Express middleware (a malformed JSON body, an oversized payload)
 * carry their own 4xx/5xx status.
 */
function statusOf(error: unknown): number {
  if (
    !(error instanceof EmailAssistantError) &&
    typeof error === 'object' && error !== null &&
    'status' in error && typeof error.status === 'number' &&
    error.status >= 400 && error.status < 600
  ) {
    return error.status;
  }
  return httpStatusFor(error);
}

/**
 * Sends an error as a BackendResponse with the status its error code maps to.
 */
export function sendError(res: Response, error: unknown, fallbackMessage: string) {
  const status = statusOf(error);
  if (status >= 500) {
    logger.error(fallbackMessage, error);
  } else {
    logger.warn(`${fallbackMessage}: ${errorMessage(error)}`);
  }

  const body: BackendResponse<never> = {
    error: error instanceof EmailAssistantError ? error.name : fallbackMessage,
    message: errorMessage(error),
    isSuccess: false
  };
  res.status(status).json(body);
}

// Express recognises error middleware by its four parameters
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  sendError(res, err, 'Something went wrong!');
}
