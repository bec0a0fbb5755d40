/**
 * Configuration Loading Tests
 *
 * Each test works in its own temporary directory with an explicit
 * environment, so the developer's shell never leaks in.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigError, DEFAULT_CONFIG, loadConfig } from '../../../cli/lib/config.js';
import { DEFAULT_BASE_URL } from '../../../retrieval/endpoints.js';
import { DEFAULT_PIPELINE_OPTIONS } from '../../../pipeline/orchestrator.js';
import { createTempDir, removeTempDir } from '../../utils/index.js';

const FULL_CONFIG = `
version: 1
service:
  base_url: https://service.test/api
  timeout: 5000
  retries: 2
output:
  directory: charts
geometry:
  zone_crs: EPSG:32718
heads:
  datasets: [head-delta]
balance:
  metrics: [recharge, pumping]
  inflow: recharge
  outflow: pumping
wells:
  ids: [P1, 42]
  id_property: codigo
`;

async function captureConfigError(promise: Promise<unknown>): Promise<ConfigError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('Expected a ConfigError');
}

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should fall back to defaults without a config file', async () => {
    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config.configPath).toBeNull();
    expect(config.outputDir).toBe(join(dir, 'outputs'));
    expect(config.service).toEqual({ baseUrl: DEFAULT_BASE_URL, timeout: 30000, retries: 0 });
    expect(config.pipeline.headDatasets).toEqual(['head-absoluto', 'head-delta']);
    expect(config.pipeline.balance).toEqual({ inflow: 'step_in', outflow: 'step_out' });
    expect(config.pipeline.zoneCrs).toBe(DEFAULT_CONFIG.pipeline.zoneCrs);
    expect(DEFAULT_CONFIG.pipeline).toBe(DEFAULT_PIPELINE_OPTIONS);
    expect(config.verbose).toBe(false);
    expect(config.json).toBe(false);
  });

  it('should find a config file in a parent directory', async () => {
    await writeFile(join(dir, '.aquifer-watchrc'), FULL_CONFIG);
    const cwd = join(dir, 'nested', 'deeper');
    await mkdir(cwd, { recursive: true });

    const config = await loadConfig({ cwd, env: {} });

    expect(config.configPath).toBe(join(dir, '.aquifer-watchrc'));
    expect(config.outputDir).toBe(join(dir, 'charts'));
    expect(config.service).toEqual({
      baseUrl: 'https://service.test/api',
      timeout: 5000,
      retries: 2,
    });
    expect(config.pipeline).toEqual({
      headDatasets: ['head-delta'],
      balanceMetrics: ['recharge', 'pumping'],
      balance: { inflow: 'recharge', outflow: 'pumping' },
      zoneCrs: 'EPSG:32718',
      wellCrs: 'EPSG:4326',
      wellIds: ['P1', '42'],
      wellProperties: { id: 'codigo', value: 'value' },
    });
  });

  it('should let environment variables override the file', async () => {
    await writeFile(join(dir, '.aquifer-watchrc'), FULL_CONFIG);

    const config = await loadConfig({
      cwd: dir,
      env: {
        AQUIFER_WATCH_TIMEOUT: '1500',
        AQUIFER_WATCH_RETRIES: '0',
        AQUIFER_WATCH_OUTPUT_DIR: 'env-out',
        AQUIFER_WATCH_BASE_URL: 'https://env.test/api',
      },
    });

    expect(config.service).toEqual({ baseUrl: 'https://env.test/api', timeout: 1500, retries: 0 });
    expect(config.outputDir).toBe(join(dir, 'env-out'));
  });

  it('should let command-line flags override the environment', async () => {
    const config = await loadConfig({
      cwd: dir,
      env: { AQUIFER_WATCH_OUTPUT_DIR: 'env-out', AQUIFER_WATCH_BASE_URL: 'https://env.test' },
      overrides: { outputDir: 'flag-out', baseUrl: 'https://flag.test', verbose: true, json: true },
    });

    expect(config.outputDir).toBe(join(dir, 'flag-out'));
    expect(config.service.baseUrl).toBe('https://flag.test');
    expect(config.verbose).toBe(true);
    expect(config.json).toBe(true);
  });

  it('should read an explicit config path from the environment', async () => {
    await writeFile(join(dir, 'custom.yaml'), 'heads:\n  datasets: [head-absoluto]\n');

    const config = await loadConfig({ cwd: dir, env: { AQUIFER_WATCH_CONFIG: 'custom.yaml' } });

    expect(config.configPath).toBe(join(dir, 'custom.yaml'));
    expect(config.pipeline.headDatasets).toEqual(['head-absoluto']);
  });

  it('should accept an empty config file', async () => {
    await writeFile(join(dir, '.aquifer-watchrc'), '');

    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config.configPath).toBe(join(dir, '.aquifer-watchrc'));
    expect(config.service.retries).toBe(0);
  });

  describe('errors', () => {
    it('should reject a missing explicit config file', async () => {
      const error = await captureConfigError(loadConfig({ cwd: dir, configPath: 'nope.yaml', env: {} }));
      expect(error.message).toBe(`Config file not found: ${join(dir, 'nope.yaml')}`);
    });

    it('should reject invalid environment integers', async () => {
      const timeout = await captureConfigError(
        loadConfig({ cwd: dir, env: { AQUIFER_WATCH_TIMEOUT: '0' } })
      );
      expect(timeout.message).toBe('AQUIFER_WATCH_TIMEOUT must be an integer >= 1, got "0"');

      const retries = await captureConfigError(
        loadConfig({ cwd: dir, env: { AQUIFER_WATCH_RETRIES: 'two' } })
      );
      expect(retries.message).toBe('AQUIFER_WATCH_RETRIES must be an integer >= 0, got "two"');
    });

    it('should reject out-of-range and unknown settings', async () => {
      const path = join(dir, '.aquifer-watchrc');
      await writeFile(path, 'service:\n  retries: 11\n');
      const range = await captureConfigError(loadConfig({ cwd: dir, env: {} }));
      expect(range.message).toContain(`Invalid config file ${path}: service.retries:`);
      expect(range.configPath).toBe(path);

      await writeFile(path, 'colour: red\n');
      const unknown = await captureConfigError(loadConfig({ cwd: dir, env: {} }));
      expect(unknown.message).toBe(
        `Invalid config file ${path}: (root): Unrecognized key(s) in object: 'colour'`
      );
    });

    it('should reject an unsupported CRS', async () => {
      const path = join(dir, '.aquifer-watchrc');
      await writeFile(path, 'geometry:\n  zone_crs: EPSG:1234\n');

      const error = await captureConfigError(loadConfig({ cwd: dir, env: {} }));

      expect(error.message).toBe(
        `Invalid config file ${path}: geometry.zone_crs: Unsupported CRS: EPSG:1234`
      );
    });

    it('should reject unparsable YAML', async () => {
      const path = join(dir, '.aquifer-watchrc');
      await writeFile(path, 'service: [\n');

      const error = await captureConfigError(loadConfig({ cwd: dir, env: {} }));

      expect(error.message.startsWith(`Cannot read config file ${path}:`)).toBe(true);
    });

    it('should reject an invalid base URL', async () => {
      const error = await captureConfigError(
        loadConfig({ cwd: dir, env: {}, overrides: { baseUrl: 'not a url' } })
      );
      expect(error.message).toBe('Invalid service base URL: not a url');
    });
  });
});
