// src/api/routes/ingestRoutes.ts
import express, { type Request, type Response } from 'express';
import { body, validationResult } from 'express-validator';
import { requireIngestionSettings } from '../../config/environment';
import type { Services } from '../../services';
import type { IngestionResult } from '../../services/Ingestion/IngestionService';
import type { BackendResponse } from '../../Types/model';
import { ingestLimiter } from '../middleware/rate-limiter';
import { sendError } from '../middleware/error-handler';

const DATE_FORMAT = /^\d{4}-\d{2}-\d{2}$/;

export function createIngestRoutes(services: Services) {
  const router = express.Router();

  // Fetch, clean and index the mailbox for a date range (defaults to the configured one)
  router.post('/', ingestLimiter, [
    body('startDate', 'startDate must be YYYY-MM-DD').optional().matches(DATE_FORMAT),
    body('endDate', 'endDate must be YYYY-MM-DD').optional().matches(DATE_FORMAT)
  ], async (req: Request, res: Response) => {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({ error: errors.array().map(e => e.msg).join(', '), isSuccess: false });
      return;
    }

    try {
      const { config } = services;
      const range = {
        startDate: typeof req.body.startDate === 'string' ? req.body.startDate : config.dateRange.startDate,
        endDate: typeof req.body.endDate === 'string' ? req.body.endDate : config.dateRange.endDate,
      };
      requireIngestionSettings(config, range);

      const result = await services.ingestion.ingest(
        { user: config.mailbox.user, password: config.mailbox.password },
        range
      );

      const response: BackendResponse<Omit<IngestionResult, 'ids'>> = {
        data: {
          fetched: result.fetched,
          decoded: result.decoded,
          skipped: result.skipped,
          indexed: result.indexed,
          collection: result.collection,
        },
        isSuccess: true
      };
      res.json(response);
    } catch (error) {
      sendError(res, error, 'Failed to ingest emails');
    }
  });

  return router;
}
