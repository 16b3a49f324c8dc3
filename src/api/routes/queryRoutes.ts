// src/api/routes/queryRoutes.ts
import express, { type Request, type Response } from 'express';
import { body, validationResult } from 'express-validator';
import type { Services } from '../../services';
import type { SessionStore } from '../../services/Query/SessionStore';
import type { BackendResponse } from '../../Types/model';
import { queryLimiter } from '../middleware/rate-limiter';
import { sendError } from '../middleware/error-handler';

interface QueryResponse {
  answer: string;
  retrieved: number;
  sessionId?: string;
}

export function createQueryRoutes(services: Services, sessions: SessionStore) {
  const router = express.Router();

  // Ask a question about the indexed emails, optionally inside a conversation session
  router.post('/query', queryLimiter, [
    body('question', 'Question is required').isString().trim().notEmpty(),
    body('k', 'k must be a non-negative integer').optional().isInt({ min: 0 }).toInt(),
    body('sessionId', 'sessionId must be a string').optional().isString()
  ], async (req: Request, res: Response) => {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({ error: errors.array().map(e => e.msg).join(', '), isSuccess: false });
      return;
    }

    const question: string = req.body.question;
    const k: number | undefined = req.body.k;
    const sessionId: string | undefined = req.body.sessionId;

    // Sessions are only started through POST /sessions
    const history = sessionId === undefined ? undefined : sessions.get(sessionId);
    if (sessionId !== undefined && !history) {
      res.status(404).json({ error: 'Session not found', isSuccess: false });
      return;
    }

    try {
      const handle = await services.indexer.open();
      const result = await services.queryEngine.ask(handle, question, { k, history });

      const response: BackendResponse<QueryResponse> = {
        data: { answer: result.answer, retrieved: result.retrieved, sessionId },
        isSuccess: true
      };
      res.json(response);
    } catch (error) {
      sendError(res, error, 'Failed to query emails');
    }
  });

  // Start a fresh conversation session
  router.post('/sessions', (req: Request, res: Response) => {
    const { sessionId } = sessions.create();
    res.status(201).json({ data: { sessionId }, isSuccess: true });
  });

  // Read a session's turns
  router.get('/sessions/:sessionId', (req: Request, res: Response) => {
    const history = sessions.get(req.params.sessionId);
    if (!history) {
      res.status(404).json({ error: 'Session not found', isSuccess: false });
      return;
    }
    res.json({ data: { turns: history.messages }, isSuccess: true });
  });

  // End a session; its history is discarded
  router.delete('/sessions/:sessionId', (req: Request, res: Response) => {
    if (!sessions.end(req.params.sessionId)) {
      res.status(404).json({ error: 'Session not found', isSuccess: false });
      return;
    }
    res.json({ isSuccess: true });
  });

  return router;
}
