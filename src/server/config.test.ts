import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  loadConfig,
  mergeConfigLayers,
  parseServerConfig,
  readConfigFile,
  resolveTimeoutMs,
} from './config.js';
import { ConfigError } from '../types/index.js';
import { MAX_TIMEOUT_MS } from './runtime/timeout.js';

function captureConfigError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ConfigError');
}

describe('parseServerConfig', () => {
  it('should fill in defaults', () => {
    expect(parseServerConfig({})).toEqual({
      defaultTimeoutMs: 300_000,
      perToolTimeoutsMs: {},
      concurrency: { maxConcurrency: 10, perToolLimits: {} },
      sizeLimits: {
        maxMessageBytes: 2_097_152,
        maxParameterBytes: 1_048_576,
        maxResultBytes: 10_485_760,
      },
      security: { enforceConfirmation: true },
      logging: { level: 'info', format: 'text', target: 'console' },
      builtins: true,
    });
  });

  it('should freeze the result', () => {
    const config = parseServerConfig({ perToolTimeoutsMs: { slow: 10 } });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.perToolTimeoutsMs)).toBe(true);
    expect(Object.isFrozen(config.concurrency)).toBe(true);
  });

  it('should reject unknown keys', () => {
    const error = captureConfigError(() => parseServerConfig({ bogus: 1 }));

    expect(error.issues).toEqual(["(root): Unrecognized key(s) in object: 'bogus'"]);
  });

  it('should report the path of invalid values', () => {
    const error = captureConfigError(() =>
      parseServerConfig({ concurrency: { maxConcurrency: -1 } })
    );

    expect(error.issues).toEqual([
      'concurrency.maxConcurrency: Number must be greater than 0',
    ]);
    expect(error.message).toBe(
      'Invalid configuration: concurrency.maxConcurrency: Number must be greater than 0'
    );
  });

  it('should reject timeouts a timer cannot represent', () => {
    const error = captureConfigError(() =>
      parseServerConfig({
        defaultTimeoutMs: 30 * 24 * 3600 * 1000,
        perToolTimeoutsMs: { slow: 2_147_483_648 },
      })
    );

    expect(error.issues).toEqual([
      'defaultTimeoutMs: Number must be less than or equal to 2147483647',
      'perToolTimeoutsMs.slow: Number must be less than or equal to 2147483647',
    ]);
  });

  it('should accept the longest representable timeout', () => {
    expect(parseServerConfig({ defaultTimeoutMs: 2_147_483_647 }).defaultTimeoutMs).toBe(
      2_147_483_647
    );
  });

  it('should reject a parameter limit above the message limit', () => {
    const error = captureConfigError(() =>
      parseServerConfig({ sizeLimits: { maxMessageBytes: 10, maxParameterBytes: 20 } })
    );

    expect(error.issues).toEqual([
      'sizeLimits.maxParameterBytes: maxParameterBytes must not exceed maxMessageBytes',
    ]);
  });
});

describe('mergeConfigLayers', () => {
  it('should merge nested objects and let later layers win', () => {
    expect(
      mergeConfigLayers(
        { concurrency: { maxConcurrency: 2, perToolLimits: { a: 1 } }, builtins: true },
        { concurrency: { maxConcurrency: 5 }, builtins: undefined },
        { builtins: false }
      )
    ).toEqual({
      concurrency: { maxConcurrency: 5, perToolLimits: { a: 1 } },
      builtins: false,
    });
  });

  it('should replace arrays instead of merging them', () => {
    expect(mergeConfigLayers({ list: [1, 2] }, { list: [3] })).toEqual({ list: [3] });
  });
});

describe('config files', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'mcp-config-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should read YAML files', async () => {
    const file = join(tempDir, 'host.yaml');
    await writeFile(file, 'defaultTimeoutMs: 5000\nconcurrency:\n  perToolLimits:\n    sleep: 2\n');

    expect(readConfigFile(file)).toEqual({
      defaultTimeoutMs: 5000,
      concurrency: { perToolLimits: { sleep: 2 } },
    });
  });

  it('should read JSON files', async () => {
    const file = join(tempDir, 'host.json');
    await writeFile(file, JSON.stringify({ builtins: false }));

    expect(readConfigFile(file)).toEqual({ builtins: false });
  });

  it('should treat an empty YAML file as an empty layer', async () => {
    const file = join(tempDir, 'empty.yml');
    await writeFile(file, '');

    expect(readConfigFile(file)).toEqual({});
  });

  it('should reject a file that is not an object', async () => {
    const file = join(tempDir, 'list.yaml');
    await writeFile(file, '- a\n- b\n');

    const error = captureConfigError(() => readConfigFile(file));
    expect(error.message).toBe(`Config file ${file} must contain an object`);
  });

  it('should reject malformed JSON', async () => {
    const file = join(tempDir, 'broken.json');
    await writeFile(file, '{');

    const error = captureConfigError(() => readConfigFile(file));
    expect(error.message.startsWith(`Cannot parse config file ${file}: `)).toBe(true);
  });

  it('should reject a missing file', () => {
    const file = join(tempDir, 'missing.yaml');

    const error = captureConfigError(() => readConfigFile(file));
    expect(error.message.startsWith(`Cannot read config file ${file}: `)).toBe(true);
  });

  describe('loadConfig', () => {
    it('should layer file, environment and overrides in that order', async () => {
      const file = join(tempDir, 'host.yaml');
      await writeFile(
        file,
        'defaultTimeoutMs: 5000\nconcurrency:\n  maxConcurrency: 3\n  perToolLimits:\n    sleep: 2\n'
      );

      const config = loadConfig({
        configPath: file,
        env: {
          MCP_STDIO_HOST_DEFAULT_TIMEOUT_MS: '7000',
          MCP_STDIO_HOST_MAX_CONCURRENCY: '4',
          MCP_STDIO_HOST_LOG_FORMAT: 'json',
        },
        overrides: { concurrency: { maxConcurrency: 6 } },
      });

      expect(config.defaultTimeoutMs).toBe(7000);
      expect(config.concurrency).toEqual({ maxConcurrency: 6, perToolLimits: { sleep: 2 } });
      expect(config.logging.format).toBe('json');
    });

    it('should find the file through the environment', async () => {
      const file = join(tempDir, 'host.json');
      await writeFile(file, JSON.stringify({ security: { enforceConfirmation: false } }));

      const config = loadConfig({ env: { MCP_STDIO_HOST_CONFIG: file } });

      expect(config.security.enforceConfirmation).toBe(false);
    });

    it('should prefer an explicit path over the environment', async () => {
      const explicit = join(tempDir, 'explicit.json');
      await writeFile(explicit, JSON.stringify({ defaultTimeoutMs: 1000 }));

      const config = loadConfig({
        configPath: explicit,
        env: { MCP_STDIO_HOST_CONFIG: join(tempDir, 'missing.json') },
      });

      expect(config.defaultTimeoutMs).toBe(1000);
    });

    it('should parse boolean environment flags', () => {
      const config = loadConfig({
        env: { MCP_STDIO_HOST_BUILTINS: '0', MCP_STDIO_HOST_ENFORCE_CONFIRMATION: 'false' },
      });

      expect(config.builtins).toBe(false);
      expect(config.security.enforceConfirmation).toBe(false);
    });

    it('should reject an environment timeout a timer cannot represent', () => {
      const error = captureConfigError(() =>
        loadConfig({ env: { MCP_STDIO_HOST_DEFAULT_TIMEOUT_MS: '3000000000' } })
      );

      expect(error.issues).toEqual([
        'MCP_STDIO_HOST_DEFAULT_TIMEOUT_MS: Default timeout must not exceed 2147483647',
      ]);
    });

    it('should ignore NODE_ENV whatever its value', () => {
      expect(loadConfig({ env: { NODE_ENV: 'staging' } }).builtins).toBe(true);
    });

    it('should reject a malformed environment variable', () => {
      const error = captureConfigError(() =>
        loadConfig({ env: { MCP_STDIO_HOST_MAX_CONCURRENCY: '0' } })
      );

      expect(error.issues).toEqual([
        'MCP_STDIO_HOST_MAX_CONCURRENCY: Max concurrency must be greater than zero',
      ]);
    });
  });
});

describe('resolveTimeoutMs', () => {
  const config = parseServerConfig({
    defaultTimeoutMs: 1000,
    perToolTimeoutsMs: { configured: 50 },
  });

  it('should prefer the configured per-tool timeout', () => {
    expect(resolveTimeoutMs(config, 'configured', 200)).toBe(50);
  });

  it('should fall back to the definition timeout', () => {
    expect(resolveTimeoutMs(config, 'other', 200)).toBe(200);
  });

  it('should fall back to the default timeout', () => {
    expect(resolveTimeoutMs(config, 'other')).toBe(1000);
  });

  it('should cap a definition timeout at the timer maximum', () => {
    expect(resolveTimeoutMs(config, 'other', 30 * 24 * 3600 * 1000)).toBe(MAX_TIMEOUT_MS);
  });
});
