import { Router, type Request, type Response } from 'express';
import type { ReplicationController } from '../../services/replication/index.js';
import { parseLimit } from './query.js';

const MAX_EVENTS = 500;

export function createReplicationRouter(controller: ReplicationController): Router {
  const router = Router();

  /**
   * GET /api/replication/state
   * Controller state, watermark and mirrored positions
   */
  router.get('/state', (_req: Request, res: Response) => {
    const state = controller.getState();
    res.json({
      ...state,
      watermark: new Date(state.watermark).toISOString(),
      lastCycleAt: state.lastCycleAt ? new Date(state.lastCycleAt).toISOString() : null,
      lastSnapshotAt: state.lastSnapshotAt ? new Date(state.lastSnapshotAt).toISOString() : null,
    });
  });

  /**
   * GET /api/replication/events
   * Recent position change events, newest first
   */
  router.get('/events', (req: Request, res: Response) => {
    const limit = parseLimit(req.query['limit'], 50, MAX_EVENTS);
    const events = controller.getRecentEvents(limit);

    res.json({
      count: events.length,
      events: events.map((e) => ({ ...e, detectedAt: new Date(e.detectedAt).toISOString() })),
    });
  });

  /**
   * GET /api/replication/stats
   */
  router.get('/stats', (_req: Request, res: Response) => {
    res.json(controller.getStats());
  });

  return router;
}
