/**
 * Artifact Validation Port
 *
 * Consulted before a packet may leave SETUP_PENDING. The core treats the
 * verdict as opaque pass/fail.
 *
 * @module packages/core/ports/IArtifactValidator
 */

export type ArtifactVerdict = { ok: true } | { ok: false; reason: string };

export interface IArtifactValidator {
  validateArtifact(bytes: Buffer, declaredType: string): Promise<ArtifactVerdict>;
}
