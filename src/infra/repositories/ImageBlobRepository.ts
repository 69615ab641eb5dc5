import type { KeyValueStore } from '../kv/KeyValueStore.js';
import type { ArtifactKind } from './imageKeys.js';
import { ARTIFACT_KINDS, imageKeys } from './imageKeys.js';

/**
 * Binary entries of an upload: the original payload and the produced artifacts
 */
export class ImageBlobRepository {
  constructor(
    private store: KeyValueStore,
    private ttlSeconds: number
  ) {}

  savePayload(id: string, bytes: Buffer): void {
    this.store.set(imageKeys.payload(id), bytes, this.ttlSeconds);
  }

  getPayload(id: string): Buffer | null {
    return this.store.get(imageKeys.payload(id));
  }

  deletePayload(id: string): boolean {
    return this.store.delete(imageKeys.payload(id));
  }

  saveArtifact(id: string, kind: ArtifactKind, bytes: Buffer): void {
    this.store.set(imageKeys.artifact(kind, id), bytes, this.ttlSeconds);
  }

  getArtifact(id: string, kind: ArtifactKind): Buffer | null {
    return this.store.get(imageKeys.artifact(kind, id));
  }

  deleteArtifacts(id: string): number {
    let removed = 0;
    for (const kind of ARTIFACT_KINDS) {
      if (this.store.delete(imageKeys.artifact(kind, id))) {
        removed += 1;
      }
    }
    return removed;
  }
}
