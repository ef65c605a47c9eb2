/**
 * SharpArtifactValidator - Artifact Validation Adapter
 *
 * Decodes the printed-packet artifact with sharp and checks it against the
 * declared content type before a packet may leave SETUP_PENDING.
 *
 * @module packages/adapters/artifact/SharpArtifactValidator
 */

import sharp from 'sharp';
import type { ArtifactVerdict, IArtifactValidator } from '../../core/ports/IArtifactValidator.js';

/**
 * Declared content type → sharp format name
 */
export const ALLOWED_ARTIFACT_TYPES: Readonly<Record<string, string>> = {
  'image/png': 'png',
  'image/jpeg': 'jpeg',
  'image/webp': 'webp',
};

export interface SharpArtifactValidatorConfig {
  maxBytes: number;
}

export class SharpArtifactValidator implements IArtifactValidator {
  private readonly maxBytes: number;

  constructor(config: SharpArtifactValidatorConfig) {
    this.maxBytes = config.maxBytes;
  }

  async validateArtifact(bytes: Buffer, declaredType: string): Promise<ArtifactVerdict> {
    const expectedFormat = ALLOWED_ARTIFACT_TYPES[declaredType.toLowerCase()];
    if (!expectedFormat) {
      return {
        ok: false,
        reason: `Unsupported artifact type: ${declaredType}. Allowed: ${Object.keys(ALLOWED_ARTIFACT_TYPES).join(', ')}`,
      };
    }

    if (bytes.length === 0) {
      return { ok: false, reason: 'Artifact is empty' };
    }

    if (bytes.length > this.maxBytes) {
      return { ok: false, reason: `Artifact exceeds ${this.maxBytes} bytes` };
    }

    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(bytes).metadata();
    } catch {
      return { ok: false, reason: 'Artifact is not a readable image' };
    }

    if (!metadata.width || !metadata.height) {
      return { ok: false, reason: 'Could not determine artifact dimensions' };
    }

    if (metadata.format !== expectedFormat) {
      return {
        ok: false,
        reason: `Artifact content is ${metadata.format ?? 'unknown'}, declared ${declaredType}`,
      };
    }

    return { ok: true };
  }
}
