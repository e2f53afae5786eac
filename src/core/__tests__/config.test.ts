/**
 * Tests for the config engine.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigValidationError, DEFAULTS, deepMerge, loadConfig, validateConfig } from '../config.js';
import { QueryErrorCode } from '../../types/error-codes.js';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'querybus-config-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('returns defaults when no config file exists', async () => {
    const config = await loadConfig({ cwd: tempDir, env: {} });
    expect(config).toEqual(DEFAULTS);
    expect(config.scatterGather.defaultTimeoutMs).toBe(5_000);
    expect(config.updates.overflow).toBe('buffer');
  });

  it('merges the project config file over defaults', async () => {
    await writeFile(
      join(tempDir, 'querybus.config.json'),
      JSON.stringify({ scatterGather: { defaultTimeoutMs: 250 } }),
    );
    const config = await loadConfig({ cwd: tempDir, env: {} });
    expect(config.scatterGather.defaultTimeoutMs).toBe(250);
    // Other defaults preserved
    expect(config.scatterGather.errorPolicy).toBe('log');
  });

  it('reads the file named by QUERYBUS_CONFIG relative to cwd', async () => {
    await mkdir(join(tempDir, 'conf'), { recursive: true });
    await writeFile(join(tempDir, 'conf', 'bus.json'), JSON.stringify({ updates: { bufferSize: 16 } }));
    const config = await loadConfig({ cwd: tempDir, env: { QUERYBUS_CONFIG: 'conf/bus.json' } });
    expect(config.updates.bufferSize).toBe(16);
  });

  it('environment variables override config files', async () => {
    await writeFile(
      join(tempDir, 'querybus.config.json'),
      JSON.stringify({ logging: { level: 'warn' }, updates: { overflow: 'drop' } }),
    );
    const config = await loadConfig({
      cwd: tempDir,
      env: {
        QUERYBUS_LOG_LEVEL: 'debug',
        QUERYBUS_UPDATE_BUFFER_SIZE: '32',
        QUERYBUS_LOG_FILE: '0',
      },
    });
    expect(config.logging.level).toBe('debug');
    expect(config.logging.filePath).toBe('0');
    expect(config.updates.bufferSize).toBe(32);
    expect(config.updates.overflow).toBe('drop');
  });

  it('buffers updates without a limit unless a size is configured', async () => {
    expect((await loadConfig({ cwd: tempDir, env: {} })).updates.bufferSize).toBe('unbounded');

    const bounded = await loadConfig({ cwd: tempDir, env: { QUERYBUS_UPDATE_BUFFER_SIZE: '64' } });
    expect(bounded.updates.bufferSize).toBe(64);

    const unbounded = await loadConfig({
      cwd: tempDir,
      env: { QUERYBUS_UPDATE_BUFFER_SIZE: 'unbounded' },
    });
    expect(unbounded.updates.bufferSize).toBe('unbounded');
  });

  it('overrides win over everything', async () => {
    const config = await loadConfig({
      cwd: tempDir,
      env: { QUERYBUS_ERROR_POLICY: 'ignore' },
      overrides: { scatterGather: { errorPolicy: 'rethrow' } },
    });
    expect(config.scatterGather.errorPolicy).toBe('rethrow');
  });

  it('does not mutate the defaults', async () => {
    await loadConfig({ cwd: tempDir, env: { QUERYBUS_SCATTER_GATHER_TIMEOUT_MS: '10' } });
    expect(DEFAULTS.scatterGather.defaultTimeoutMs).toBe(5_000);
  });

  it('rejects invalid values with the offending paths', async () => {
    const error = await loadConfig({
      cwd: tempDir,
      env: { QUERYBUS_UPDATE_OVERFLOW: 'spill', QUERYBUS_UPDATE_BUFFER_SIZE: '-1' },
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(error).toMatchObject({ code: QueryErrorCode.CONFIG_INVALID });
    const paths = error instanceof ConfigValidationError ? error.issues.map((i) => i.path) : [];
    expect(paths).toEqual(['updates.overflow', 'updates.bufferSize']);
  });

  it('rejects a config file that is not an object', async () => {
    await writeFile(join(tempDir, 'querybus.config.json'), JSON.stringify([1, 2]));
    await expect(loadConfig({ cwd: tempDir, env: {} })).rejects.toBeInstanceOf(ConfigValidationError);
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(DEFAULTS)).toEqual(DEFAULTS);
  });

  it('rejects a missing section', () => {
    expect(() => validateConfig({ logging: DEFAULTS.logging })).toThrow(ConfigValidationError);
  });
});

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays', () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] } }, { a: { c: [3] } })).toEqual({ a: { b: 1, c: [3] } });
  });
});
