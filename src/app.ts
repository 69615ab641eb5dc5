import express from 'express';
import cors from 'cors';
import type { Express, Request, Response, NextFunction } from 'express';
import type { Container } from './container.js';
import { createApiRouter } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import { logger } from './infra/logger.js';

/**
 * Builds the HTTP application; listening is left to the caller
 */
export function createApp(container: Container): Express {
  const { env } = container;
  const app = express();

  // Middleware
  app.use(cors());

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    next();
  });

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      message: 'Image resize service - upload images to resize and optimize them',
      endpoints: {
        upload: 'POST /upload - multipart field "file"',
        status: 'GET /status/{id}',
        image: 'GET /images/{id}',
        download: 'GET /download/{id}',
        thumbnail: 'GET /download/{id}/thumbnail',
        tasks: 'GET /tasks',
        workers: 'GET /workers',
        health: 'GET /health',
      },
      processing: {
        maxDimension: env.MAX_DIMENSION,
        thumbnailSize: env.THUMBNAILS_ENABLED ? env.THUMBNAIL_SIZE : null,
        outputFormat: 'jpeg',
        quality: env.JPEG_QUALITY,
        ttlSeconds: env.STORE_TTL_SECONDS,
      },
    });
  });

  app.use(
    createApiRouter({
      uploadService: container.uploadService,
      statusService: container.statusService,
      imageJobService: container.imageJobService,
      artifactService: container.artifactService,
      healthService: container.healthService,
      maxUploadBytes: Math.floor(env.MAX_UPLOAD_MB * 1024 * 1024),
    })
  );

  // 404 handler
  app.use(notFoundHandler);

  // Global error handler
  app.use(createErrorHandler(env));

  return app;
}
