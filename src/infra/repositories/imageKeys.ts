export type ArtifactKind = 'processed' | 'thumbnail';

export const ARTIFACT_KINDS: readonly ArtifactKind[] = ['processed', 'thumbnail'];

/**
 * Store key layout; every key of one upload is derived from its id
 */
export const imageKeys = {
  metaPrefix: 'meta:',
  meta: (id: string) => `meta:${id}`,
  payload: (id: string) => `payload:${id}`,
  artifact: (kind: ArtifactKind, id: string) => `artifact:${kind}:${id}`,
};
