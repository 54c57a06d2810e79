import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';

describe('logger', () => {
  const savedLevel = process.env.LOG_LEVEL;
  let dir: string | undefined;

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.resetModules();
    if (savedLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = savedLevel;
    }
    if (dir) {
      await fs.rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it('takes LOG_LEVEL from .env even when loaded before the config module', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'query-firewall-env-'));
    await fs.writeFile(path.join(dir, '.env'), 'LOG_LEVEL=debug\n', 'utf8');
    delete process.env.LOG_LEVEL;
    vi.stubEnv('DOTENV_CONFIG_PATH', path.join(dir, '.env'));
    vi.resetModules();

    const { logger } = await import('../logger.js');

    expect(logger.level).toBe('debug');
  });

  it('keeps an explicit LOG_LEVEL over the .env file', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'query-firewall-env-'));
    await fs.writeFile(path.join(dir, '.env'), 'LOG_LEVEL=debug\n', 'utf8');
    process.env.LOG_LEVEL = 'warn';
    vi.stubEnv('DOTENV_CONFIG_PATH', path.join(dir, '.env'));
    vi.resetModules();

    const { logger } = await import('../logger.js');

    expect(logger.level).toBe('warn');
  });
});
