import { Router, type Request, type Response } from 'express';
import { summarizeCalls, type CallLedger } from '../../services/callLedger/index.js';
import type { RateGovernor } from '../../services/rateGovernor/index.js';
import { errorMessage } from '../../utils/errors.js';
import { parseLimit } from './query.js';

const MAX_CALLS = 1000;
const DEFAULT_WINDOW_MS = 300000;

export interface CallsRouterDependencies {
  ledger: CallLedger;
  governor: RateGovernor;
}

export function createCallsRouter(deps: CallsRouterDependencies): Router {
  const router = Router();

  /**
   * GET /api/calls
   * Recent API calls from every process sharing the ledger, newest first
   */
  router.get('/', async (req: Request, res: Response) => {
    try {
      const limit = parseLimit(req.query['limit'], 50, MAX_CALLS);
      const calls = await deps.ledger.recentCalls(DEFAULT_WINDOW_MS, limit);

      res.json({
        count: calls.length,
        calls: calls.map((c) => ({ ...c, startedAt: new Date(c.startedAt).toISOString() })),
      });
    } catch (error) {
      res.status(500).json({
        error: 'Failed to read call ledger',
        message: errorMessage(error),
      });
    }
  });

  /**
   * GET /api/calls/rate
   * Rolling 60s rate, aggregate and per process
   */
  router.get('/rate', async (_req: Request, res: Response) => {
    try {
      res.json(await deps.governor.getRateSnapshot());
    } catch (error) {
      res.status(500).json({
        error: 'Failed to compute rate',
        message: errorMessage(error),
      });
    }
  });

  /**
   * GET /api/calls/stats
   * Summary over the ledger's retention window
   */
  router.get('/stats', async (req: Request, res: Response) => {
    try {
      const windowMs = parseLimit(req.query['windowMs'], DEFAULT_WINDOW_MS, DEFAULT_WINDOW_MS);
      const calls = await deps.ledger.callsSince(windowMs);
      res.json(summarizeCalls(calls, windowMs));
    } catch (error) {
      res.status(500).json({
        error: 'Failed to summarize calls',
        message: errorMessage(error),
      });
    }
  });

  return router;
}
