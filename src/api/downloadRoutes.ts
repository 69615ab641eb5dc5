import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { ArtifactService } from '../services/ArtifactService.js';
import type { ArtifactKind } from '../infra/repositories/imageKeys.js';

export function createDownloadRouter(artifactService: ArtifactService): Router {
  const router = Router();

  const sendArtifact =
    (kind: ArtifactKind) => (req: Request, res: Response, next: NextFunction) => {
      try {
        const artifact = artifactService.getArtifact(req.params.id, kind);
        res.setHeader('Content-Type', artifact.contentType);
        res.setHeader('Content-Disposition', `inline; filename="${artifact.filename}"`);
        res.send(artifact.data);
      } catch (error) {
        next(error);
      }
    };

  router.get('/:id', sendArtifact('processed'));
  router.get('/:id/thumbnail', sendArtifact('thumbnail'));

  return router;
}
