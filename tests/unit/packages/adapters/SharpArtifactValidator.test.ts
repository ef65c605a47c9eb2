/**
 * SharpArtifactValidator Tests
 *
 * Images are generated in-process with sharp.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import sharp from 'sharp';
import { SharpArtifactValidator } from '../../../../src/packages/adapters/artifact/SharpArtifactValidator.js';

function solidImage() {
  return sharp({
    create: { width: 8, height: 8, channels: 3, background: { r: 20, g: 120, b: 60 } },
  });
}

describe('SharpArtifactValidator', () => {
  const validator = new SharpArtifactValidator({ maxBytes: 64 * 1024 });
  let png: Buffer;
  let jpeg: Buffer;
  let webp: Buffer;

  beforeAll(async () => {
    png = await solidImage().png().toBuffer();
    jpeg = await solidImage().jpeg().toBuffer();
    webp = await solidImage().webp().toBuffer();
  });

  it('should accept each supported format under its own type', async () => {
    expect(await validator.validateArtifact(png, 'image/png')).toEqual({ ok: true });
    expect(await validator.validateArtifact(jpeg, 'image/jpeg')).toEqual({ ok: true });
    expect(await validator.validateArtifact(webp, 'IMAGE/WEBP')).toEqual({ ok: true });
  });

  it('should reject unsupported declared types', async () => {
    expect(await validator.validateArtifact(png, 'image/gif')).toEqual({
      ok: false,
      reason: 'Unsupported artifact type: image/gif. Allowed: image/png, image/jpeg, image/webp',
    });
  });

  it('should reject empty and oversized payloads', async () => {
    expect(await validator.validateArtifact(Buffer.alloc(0), 'image/png')).toEqual({
      ok: false,
      reason: 'Artifact is empty',
    });

    const small = new SharpArtifactValidator({ maxBytes: 16 });
    expect(await small.validateArtifact(png, 'image/png')).toEqual({
      ok: false,
      reason: 'Artifact exceeds 16 bytes',
    });
  });

  it('should reject bytes that do not decode', async () => {
    expect(await validator.validateArtifact(Buffer.from('definitely not an image'), 'image/png')).toEqual({
      ok: false,
      reason: 'Artifact is not a readable image',
    });
  });

  it('should reject content that disagrees with the declared type', async () => {
    expect(await validator.validateArtifact(jpeg, 'image/png')).toEqual({
      ok: false,
      reason: 'Artifact content is jpeg, declared image/png',
    });
  });
});
