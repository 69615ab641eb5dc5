import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { StatusService } from '../services/StatusService.js';
import type { ImageJobService } from '../services/ImageJobService.js';
import { mapImageJobToResponse, mapStatusToResponse } from './imageJobMapper.js';

/**
 * Status route handlers; every read is point-in-time, clients poll
 */
export function createStatusRouter(statusService: StatusService, jobService: ImageJobService): Router {
  const router = Router();

  /**
   * GET /status/:id - record merged with the live queue status
   */
  router.get('/status/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const merged = await statusService.getStatus(req.params.id);
      res.json(mapStatusToResponse(merged));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /images/:id - the stored job record as written
   */
  router.get('/images/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      const job = jobService.getJob(req.params.id);
      res.json(mapImageJobToResponse(job));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /tasks - every live job with its merged status
   */
  router.get('/tasks', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const statuses = await statusService.listStatuses();
      res.json({ tasks: statuses.map(mapStatusToResponse), total: statuses.length });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
