/**
 * Search API routes
 */

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { CaseQuery, FailureKind } from 'court-playwright';
import type { CaseSearchService } from '../services/search.js';
import type { SearchRun } from '../types/index.js';

// Express v5 types params as string | string[]
function getParam(req: Request, name: string): string {
  const value = req.params[name];
  return Array.isArray(value) ? value[0] ?? '' : value ?? '';
}

/** HTTP status answered for each failure kind */
export function statusForKind(kind: FailureKind): number {
  switch (kind) {
    case 'ValidationError':
      return 400;
    case 'CaseNotFound':
      return 404;
    case 'ChallengeTimeout':
      return 408;
    case 'Cancelled':
      return 409;
    case 'ChallengeExhausted':
      return 422;
    case 'ParseError':
      return 502;
    case 'SiteUnreachable':
    case 'StorageError':
      return 503;
    case 'AttemptTimeout':
      return 504;
  }
}

// ============================================
// Schemas
// ============================================

// Shape only: the engine validates the values and logs rejected requests
const SearchRequestSchema = z.object({
  case_type: z.string(),
  case_number: z.union([z.string(), z.number()]).transform(String),
  year: z.union([z.number(), z.string()]).transform((value) => (typeof value === 'string' ? Number(value.trim()) : value)),
  captcha_code: z.string().nullish(),
  wait: z.boolean().optional(),
});

const ChallengeAnswerSchema = z.object({
  code: z.string().min(1),
  challenge_id: z.string().optional(),
});

const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().optional(),
  offset: z.coerce.number().int().optional(),
  outcome: z.enum(['pending', 'success', 'failure', 'captcha_required', 'timeout']).optional(),
  case_type: z.string().optional(),
  case_number: z.string().optional(),
  year: z.coerce.number().int().optional(),
  since: z.string().datetime().optional(),
});

const CaseLookupSchema = z.object({
  case_type: z.string().min(1),
  case_number: z.string().min(1),
  year: z.coerce.number().int(),
});

const PdfQuerySchema = z.object({
  url: z.string().min(1),
});

function runBody(run: SearchRun) {
  return {
    attemptId: run.attemptId,
    status: run.status,
    state: run.state,
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
    challenge: run.challenge,
    caseId: run.caseId,
    record: run.record,
    failure: run.failure,
  };
}

// ============================================
// Routes
// ============================================

export function initRoutes<S>(service: CaseSearchService<S>): Router {
  const router = Router();

  // ===== SEARCHES =====

  /**
   * POST /searches
   * Starts a search; with `wait: true` answers once it has finished
   */
  router.post('/searches', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = SearchRequestSchema.parse(req.body);
      const query: CaseQuery = {
        caseType: data.case_type,
        caseNumber: data.case_number,
        year: data.year,
        captchaCode: data.captcha_code ?? null,
      };

      if (!data.wait) {
        const run = service.start(query);
        res.status(202).location(`/api/searches/${run.attemptId}`).json(runBody(run));
        return;
      }

      const run = await service.searchAndWait(query);
      res.status(run.failure ? statusForKind(run.failure.kind) : 200).json(runBody(run));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /searches/:id
   * State of a search started by this process
   */
  router.get('/searches/:id', (req: Request, res: Response) => {
    const run = service.status(getParam(req, 'id'));
    if (!run) {
      res.status(404).json({ error: 'Search not found' });
      return;
    }
    res.json(runBody(run));
  });

  /**
   * GET /searches/:id/challenge
   * CAPTCHA waiting for a code
   */
  router.get('/searches/:id/challenge', (req: Request, res: Response) => {
    const challenge = service.challenge(getParam(req, 'id'));
    if (!challenge) {
      res.status(404).json({ error: 'No challenge is pending for this search' });
      return;
    }
    res.json(challenge);
  });

  /**
   * POST /searches/:id/challenge
   * Supplies the code read by a person
   */
  router.post('/searches/:id/challenge', (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = ChallengeAnswerSchema.parse(req.body);
      const answer = service.answerChallenge(getParam(req, 'id'), data.code, data.challenge_id);

      if (answer === 'not_pending') {
        res.status(404).json({ error: 'No challenge is pending for this search' });
        return;
      }
      if (answer === 'stale') {
        res.status(409).json({ error: 'The challenge was replaced; fetch the new one' });
        return;
      }
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /searches/:id
   * Cancels a running search
   */
  router.delete('/searches/:id', (req: Request, res: Response) => {
    if (!service.cancel(getParam(req, 'id'))) {
      res.status(404).json({ error: 'Search not running' });
      return;
    }
    res.status(204).send();
  });

  // ===== HISTORY & CASES =====

  /**
   * GET /history
   * Search attempts, newest first
   */
  router.get('/history', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const q = HistoryQuerySchema.parse(req.query);
      const page = await service.history(
        {
          caseType: q.case_type,
          caseNumber: q.case_number,
          year: q.year,
          outcome: q.outcome,
          since: q.since ? new Date(q.since) : undefined,
        },
        { limit: q.limit, offset: q.offset },
      );
      res.json(page);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /statistics
   */
  router.get('/statistics', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await service.getStatistics());
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /cases?case_type=&case_number=&year=
   * Case by its parts
   */
  router.get('/cases', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const q = CaseLookupSchema.parse(req.query);
      const detail = await service.findCase(q.case_type, q.case_number, q.year);
      if (!detail) {
        res.status(404).json({ error: 'Case not found' });
        return;
      }
      res.json(detail);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /cases/:id
   * Case by its identifier; slashes in the id must be encoded
   */
  router.get('/cases/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const detail = await service.getCase(getParam(req, 'id'));
      if (!detail) {
        res.status(404).json({ error: 'Case not found' });
        return;
      }
      res.json(detail);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /case-types
   */
  router.get('/case-types', (req: Request, res: Response) => {
    res.json(service.catalogue());
  });

  /**
   * GET /orders/pdf?url=
   * Proxies an order PDF from the court website
   */
  router.get('/orders/pdf', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { url } = PdfQuerySchema.parse(req.query);
      const pdf = await service.downloadOrderPdf(url);
      res
        .status(200)
        .type(pdf.contentType)
        .attachment(pdf.filename)
        .send(pdf.body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
