/**
 * Aquifer Watch CLI Configuration Management
 *
 * Loads configuration from .aquifer-watchrc (YAML or JSON) with environment
 * variable overrides and defaults. The file content is validated with zod;
 * anything invalid is a ConfigError.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (AQUIFER_WATCH_*)
 * 3. Config file (.aquifer-watchrc, --config path or AQUIFER_WATCH_CONFIG)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { isSupportedCrs } from '../../geometry/crs.js';
import { DEFAULT_BASE_URL } from '../../retrieval/endpoints.js';
import { DEFAULT_PIPELINE_OPTIONS } from '../../pipeline/orchestrator.js';
import type { PipelineOptions } from '../../pipeline/orchestrator.types.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface ServiceConfig {
  readonly baseUrl: string;
  /** Per-request timeout in milliseconds */
  readonly timeout: number;
  /** Retries per request after the first attempt */
  readonly retries: number;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  readonly version: number;
  readonly service: ServiceConfig;
  /** Absolute artifact directory */
  readonly outputDir: string;
  readonly pipeline: PipelineOptions;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Invalid or unreadable configuration
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Config file schema
// ============================================================================

const CrsSchema = z
  .string()
  .min(1)
  .refine(isSupportedCrs, (crs) => ({ message: `Unsupported CRS: ${crs}` }));

const NameListSchema = z.array(z.string().min(1));

/**
 * Config file structure (YAML)
 */
export const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    service: z
      .object({
        base_url: z.string().url().optional(),
        timeout: z.number().int().positive().optional(),
        retries: z.number().int().min(0).max(10).optional(),
      })
      .strict()
      .optional(),
    output: z.object({ directory: z.string().min(1).optional() }).strict().optional(),
    geometry: z
      .object({ zone_crs: CrsSchema.optional(), well_crs: CrsSchema.optional() })
      .strict()
      .optional(),
    heads: z.object({ datasets: NameListSchema.optional() }).strict().optional(),
    balance: z
      .object({
        metrics: NameListSchema.optional(),
        inflow: z.string().min(1).optional(),
        outflow: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    wells: z
      .object({
        ids: z
          .array(z.union([z.string().min(1), z.number().int()]).transform((id) => String(id)))
          .optional(),
        id_property: z.string().min(1).optional(),
        value_property: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG = {
  version: 1,
  service: {
    baseUrl: DEFAULT_BASE_URL,
    timeout: 30000,
    retries: 0,
  },
  outputDir: './outputs',
  pipeline: DEFAULT_PIPELINE_OPTIONS,
} as const satisfies Pick<CLIConfig, 'version' | 'service' | 'outputDir' | 'pipeline'>;

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.aquifer-watchrc',
  '.aquifer-watchrc.yaml',
  '.aquifer-watchrc.yml',
  '.aquifer-watchrc.json',
];

const ENV_PREFIX = 'AQUIFER_WATCH_';

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Read and validate a config file
 *
 * @throws {ConfigError} Unreadable file, invalid YAML/JSON or invalid content
 */
export function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON, so one parser covers every file name
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      { cause: error }
    );
  }

  // An empty file parses to null
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${filePath}: ${issues}`, filePath, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

type Environment = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Environment, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Integer environment variable
 *
 * @throws {ConfigError} Set but not an integer >= min
 */
function getEnvInteger(env: Environment, name: string, min: number): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = Number(value);
  if (!Number.isInteger(num) || num < min) {
    throw new ConfigError(`${ENV_PREFIX}${name} must be an integer >= ${min}, got "${value}"`);
  }
  return num;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory to resolve relative paths and search for a config file from */
  readonly cwd?: string;
  /** Environment to read AQUIFER_WATCH_* from (default: process.env) */
  readonly env?: Environment;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly outputDir?: string;
    readonly baseUrl?: string;
    readonly verbose?: boolean;
    readonly json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * Relative output directories are resolved against the config file's
 * directory when they come from the file, otherwise against `cwd`.
 *
 * @throws {ConfigError} Missing explicit config file or invalid values
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const cwd = resolve(options.cwd ?? process.cwd());
  const env = options.env ?? process.env;

  // Find config file
  let configPath: string | null = null;
  const explicitPath = options.configPath ?? getEnvVar(env, 'CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
  } else {
    configPath = findConfigFile(cwd);
  }

  const fileConfig: ConfigFile = configPath ? parseConfigFile(configPath) : {};
  const fileDir = configPath ? dirname(configPath) : cwd;

  const overrideOutput = options.overrides?.outputDir ?? getEnvVar(env, 'OUTPUT_DIR');
  const outputDir =
    overrideOutput !== undefined
      ? resolve(cwd, overrideOutput)
      : fileConfig.output?.directory !== undefined
        ? resolve(fileDir, fileConfig.output.directory)
        : resolve(cwd, DEFAULT_CONFIG.outputDir);

  const baseUrl =
    options.overrides?.baseUrl ??
    getEnvVar(env, 'BASE_URL') ??
    fileConfig.service?.base_url ??
    DEFAULT_CONFIG.service.baseUrl;
  try {
    new URL(baseUrl);
  } catch (error) {
    throw new ConfigError(`Invalid service base URL: ${baseUrl}`, configPath, { cause: error });
  }

  const defaults = DEFAULT_CONFIG.pipeline;

  return {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    service: {
      baseUrl,
      timeout:
        getEnvInteger(env, 'TIMEOUT', 1) ??
        fileConfig.service?.timeout ??
        DEFAULT_CONFIG.service.timeout,
      retries:
        getEnvInteger(env, 'RETRIES', 0) ??
        fileConfig.service?.retries ??
        DEFAULT_CONFIG.service.retries,
    },

    outputDir,

    pipeline: {
      headDatasets: fileConfig.heads?.datasets ?? defaults.headDatasets,
      balanceMetrics: fileConfig.balance?.metrics ?? defaults.balanceMetrics,
      balance: {
        inflow: fileConfig.balance?.inflow ?? defaults.balance.inflow,
        outflow: fileConfig.balance?.outflow ?? defaults.balance.outflow,
      },
      zoneCrs: fileConfig.geometry?.zone_crs ?? defaults.zoneCrs,
      wellCrs: fileConfig.geometry?.well_crs ?? defaults.wellCrs,
      wellIds: fileConfig.wells?.ids ?? defaults.wellIds,
      wellProperties: {
        id: fileConfig.wells?.id_property ?? defaults.wellProperties.id,
        value: fileConfig.wells?.value_property ?? defaults.wellProperties.value,
      },
    },

    // Runtime flags
    verbose: options.overrides?.verbose ?? false,
    json: options.overrides?.json ?? false,
    configPath,
  };
}
