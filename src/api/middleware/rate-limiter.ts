import rateLimit from 'express-rate-limit';
import type { Request, Response } from 'express';
import { createLogger } from '../../utils/logger';

const logger = createLogger('RateLimiter');

function limitExceeded(req: Request, res: Response) {
  logger.warn('Rate limit exceeded for IP:', req.ip);
  res.status(429).json({
    error: 'Too many requests',
    message: 'Rate limit exceeded, please try again later',
    isSuccess: false
  });
}

// Each query costs an embedding call plus a completion
const queryLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 30,
  standardHeaders: true,
  legacyHeaders: false,
  handler: limitExceeded,
});

// Ingestion holds an IMAP session and embeds the whole batch
const ingestLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  max: 5,
  standardHeaders: true,
  legacyHeaders: false,
  handler: limitExceeded,
});

export { queryLimiter, ingestLimiter };
