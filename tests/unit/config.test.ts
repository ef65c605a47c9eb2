/**
 * Config Tests
 *
 * Loads the config module from a directory holding a .env file.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

describe('config', () => {
  const originalCwd = process.cwd();
  const originalLevel = process.env.LOG_LEVEL;
  let workDir: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'packet-config-'));
    process.chdir(workDir);
    delete process.env.LOG_LEVEL;
    vi.resetModules();
  });

  afterEach(() => {
    process.chdir(originalCwd);
    rmSync(workDir, { recursive: true, force: true });
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  it('should apply LOG_LEVEL from .env to the shared logger', async () => {
    writeFileSync(join(workDir, '.env'), 'LOG_LEVEL=warn\n');

    const { config } = await import('../../src/config.js');
    const { logger } = await import('../../src/utils/logger.js');

    expect(config.logging.level).toBe('warn');
    expect(logger.level).toBe('warn');
  });

  it('should let .env.local take precedence over .env', async () => {
    writeFileSync(join(workDir, '.env'), 'LOG_LEVEL=warn\n');
    writeFileSync(join(workDir, '.env.local'), 'LOG_LEVEL=error\n');

    const { logger } = await import('../../src/utils/logger.js');
    await import('../../src/config.js');

    expect(logger.level).toBe('error');
  });

  it('should default to info without any LOG_LEVEL', async () => {
    const { config } = await import('../../src/config.js');
    const { logger } = await import('../../src/utils/logger.js');

    expect(config.logging.level).toBe('info');
    expect(logger.level).toBe('info');
  });
});
