import type { ArtifactKind } from '../infra/repositories/imageKeys.js';
import type { ImageBlobRepository } from '../infra/repositories/ImageBlobRepository.js';
import type { ImageJobService } from './ImageJobService.js';
import { contentTypeForFormat } from '../infra/ImageCodec.js';
import { NotFoundError } from '../domain/errors.js';

export interface Artifact {
  data: Buffer;
  contentType: string;
  filename: string;
}

const RESOURCE_NAMES: Record<ArtifactKind, string> = {
  processed: 'Processed image',
  thumbnail: 'Thumbnail',
};

function extensionFor(format: string): string {
  return format === 'jpeg' ? 'jpg' : format;
}

/**
 * ArtifactService - hands out artifacts of completed jobs only
 */
export class ArtifactService {
  constructor(
    private jobService: ImageJobService,
    private blobRepo: ImageBlobRepository
  ) {}

  getArtifact(id: string, kind: ArtifactKind): Artifact {
    const job = this.jobService.findJob(id);
    if (!job || job.status !== 'completed' || !job.result) {
      throw new NotFoundError(RESOURCE_NAMES[kind], id);
    }

    const data = this.blobRepo.getArtifact(id, kind);
    if (!data) {
      throw new NotFoundError(RESOURCE_NAMES[kind], id);
    }

    const format = job.result.outputFormat;
    return {
      data,
      contentType: contentTypeForFormat(format),
      filename: `${kind}_${id}.${extensionFor(format)}`,
    };
  }
}
