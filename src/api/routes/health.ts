import { Router, type Request, type Response } from 'express';
import type { ReplicationController } from '../../services/replication/index.js';
import type { RateGovernor } from '../../services/rateGovernor/index.js';
import { errorMessage } from '../../utils/errors.js';

export interface HealthCheckDependencies {
  controller: ReplicationController;
  governor: RateGovernor;
  paperTrading: boolean;
}

export function createHealthRouter(deps: HealthCheckDependencies): Router {
  const router = Router();

  /**
   * GET /health
   * Engine and rate status
   */
  router.get('/', async (_req: Request, res: Response) => {
    try {
      const state = deps.controller.getState();
      const rate = await deps.governor.getRateSnapshot();

      let status: 'healthy' | 'degraded' | 'unhealthy' = 'healthy';
      if (!state.isRunning) {
        status = 'unhealthy';
      } else if (state.lastError !== null || rate.callsPerMinute >= rate.hardLimitPerMinute) {
        status = 'degraded';
      }

      res.status(status === 'unhealthy' ? 503 : 200).json({
        status,
        timestamp: new Date().toISOString(),
        paperTrading: deps.paperTrading,
        components: {
          replication: {
            state: state.state,
            running: state.isRunning,
            cycles: state.cycleCount,
            lastCycleAt: state.lastCycleAt ? new Date(state.lastCycleAt).toISOString() : null,
            lastError: state.lastError,
          },
          rateGovernor: {
            callsPerMinute: rate.callsPerMinute,
            softLimitPerMinute: rate.softLimitPerMinute,
            hardLimitPerMinute: rate.hardLimitPerMinute,
            lastRateLimitAt: rate.lastRateLimit ? new Date(rate.lastRateLimit.startedAt).toISOString() : null,
          },
        },
      });
    } catch (error) {
      res.status(500).json({
        status: 'unhealthy',
        error: errorMessage(error),
      });
    }
  });

  return router;
}
