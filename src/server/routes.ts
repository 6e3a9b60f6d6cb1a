/**
 * Query API Routes
 * Express routes for listing collections and answering questions.
 */

import { Router, type Request, type Response } from 'express';
import {
  CollectionNotFoundError,
  ConfigurationError,
  NoIndexLoadedError,
  UnsupportedResponseModeError,
} from '../errors.js';
import type { QueryRequest, QueryService } from './service.js';

function statusFor(error: unknown): number {
  if (error instanceof UnsupportedResponseModeError || error instanceof ConfigurationError) {
    return 400;
  }
  if (error instanceof NoIndexLoadedError || error instanceof CollectionNotFoundError) {
    return 404;
  }
  return 500;
}

function parseQueryRequest(body: unknown): QueryRequest | null {
  if (typeof body !== 'object' || body === null || !('question' in body)) {
    return null;
  }
  const { question } = body;
  if (typeof question !== 'string' || question.trim() === '') {
    return null;
  }

  const request: QueryRequest = { question };
  if ('collection' in body && typeof body.collection === 'string') {
    request.collection = body.collection;
  }
  if ('responseMode' in body && typeof body.responseMode === 'string') {
    request.responseMode = body.responseMode;
  }
  return request;
}

/**
 * Create Express router for query endpoints.
 */
export function createQueryRoutes(queryService: QueryService): Router {
  const router = Router();

  /**
   * GET /api/collections
   * List stored collections.
   */
  router.get('/collections', (_req: Request, res: Response) => {
    try {
      const collections = queryService.listCollections().map((info) => info.name);
      res.json({ success: true, collections });
    } catch (error) {
      console.error('[RAGServer] Failed to list collections:', error);
      res.status(500).json({ success: false, error: 'Failed to list collections' });
    }
  });

  /**
   * POST /api/query
   * Body: { question, collection?, responseMode? }
   */
  router.post('/query', async (req: Request, res: Response) => {
    const request = parseQueryRequest(req.body);
    if (request === null) {
      res.status(400).json({ success: false, error: 'Question is required' });
      return;
    }

    try {
      console.log(`[RAGServer] Processing question: ${request.question}`);
      const response = await queryService.query(request);
      res.json({ success: true, response });
    } catch (error) {
      const status = statusFor(error);
      console.error('[RAGServer] Query failed:', error);
      res.status(status).json({
        success: false,
        error: status === 500 ? 'Internal server error' : error instanceof Error ? error.message : String(error),
      });
    }
  });

  return router;
}
