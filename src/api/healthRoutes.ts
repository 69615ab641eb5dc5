import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { HealthService } from '../services/HealthService.js';

export function createHealthRouter(healthService: HealthService): Router {
  const router = Router();

  /**
   * GET /health - always 200; degraded dependencies show up in the body
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.json(healthService.check());
  });

  /**
   * GET /workers - worker processes with a recent heartbeat
   */
  router.get('/workers', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const workers = healthService.liveWorkers();
      res.json({
        workers: workers.map((worker) => ({
          id: worker.id,
          hostname: worker.hostname,
          pid: worker.pid,
          concurrency: worker.concurrency,
          activeJobs: worker.activeJobs,
          startedAt: worker.startedAt.toISOString(),
          lastSeenAt: worker.lastSeenAt.toISOString(),
        })),
        total: workers.length,
        queue: healthService.queueCounts(),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
