import { Router } from 'express';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import type { UploadService } from '../services/UploadService.js';
import { InvalidInputError, PayloadTooLargeError } from '../domain/errors.js';
import { mapImageJobToResponse } from './imageJobMapper.js';

export const UPLOAD_FIELD = 'file';

/**
 * Buffers a single multipart file in memory and turns multer's errors into domain errors
 */
function parseSingleFile(maxUploadBytes: number): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 1 },
  }).single(UPLOAD_FIELD);

  return (req: Request, res: Response, next: NextFunction) => {
    upload(req, res, (error: unknown) => {
      if (!error) {
        next();
        return;
      }
      if (error instanceof multer.MulterError) {
        next(
          error.code === 'LIMIT_FILE_SIZE'
            ? new PayloadTooLargeError(maxUploadBytes)
            : new InvalidInputError(error.message, { field: error.field ?? null })
        );
        return;
      }
      next(error);
    });
  };
}

/**
 * Upload route handler
 * HTTP layer delegates validation, persistence and dispatch to UploadService
 */
export function createUploadRouter(uploadService: UploadService, maxUploadBytes: number): Router {
  const router = Router();

  /**
   * POST /upload - multipart body with the image in field "file"
   */
  router.post('/', parseSingleFile(maxUploadBytes), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const file = req.file;
      if (!file) {
        throw new InvalidInputError(`No file uploaded; send the image in multipart field "${UPLOAD_FIELD}"`);
      }

      const result = await uploadService.ingest({
        bytes: file.buffer,
        contentType: file.mimetype,
        filename: file.originalname,
      });

      res.status(202).json({
        message: 'Image queued for processing',
        data: mapImageJobToResponse(result.job),
        statusUrl: result.statusUrl,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
