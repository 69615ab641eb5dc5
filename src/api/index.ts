import { Router } from 'express';
import { createUploadRouter } from './uploadRoutes.js';
import { createStatusRouter } from './statusRoutes.js';
import { createDownloadRouter } from './downloadRoutes.js';
import { createHealthRouter } from './healthRoutes.js';
import type { UploadService } from '../services/UploadService.js';
import type { StatusService } from '../services/StatusService.js';
import type { ImageJobService } from '../services/ImageJobService.js';
import type { ArtifactService } from '../services/ArtifactService.js';
import type { HealthService } from '../services/HealthService.js';

/**
 * Main API router - composes all route handlers
 * Dependencies injected from the container
 */
export function createApiRouter(deps: {
  uploadService: UploadService;
  statusService: StatusService;
  imageJobService: ImageJobService;
  artifactService: ArtifactService;
  healthService: HealthService;
  maxUploadBytes: number;
}): Router {
  const router = Router();

  router.use('/upload', createUploadRouter(deps.uploadService, deps.maxUploadBytes));
  router.use('/download', createDownloadRouter(deps.artifactService));
  router.use(createStatusRouter(deps.statusService, deps.imageJobService));
  router.use(createHealthRouter(deps.healthService));

  return router;
}
