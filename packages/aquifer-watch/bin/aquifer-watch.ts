#!/usr/bin/env tsx
/**
 * Aquifer Watch CLI Entry Point
 *
 * Retrieves groundwater head, water balance and well level data, reconciles
 * historical and forecast series, classifies wells by percentile and writes
 * SVG charts plus a run manifest.
 *
 * @module aquifer-watch-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { ConfigError, loadConfig, type CLIConfig } from '../src/cli/lib/config.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';
import { registerPipelineCommands } from '../src/cli/commands/index.js';
import { isRecord } from '../src/core/type-guards.js';
import { logger, setLogLevel } from '../src/core/utils/logger.js';

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext {
  config: CLIConfig;
  startTime: number;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return isRecord(packageJson) && typeof packageJson.version === 'string'
      ? packageJson.version
      : '0.0.0';
  } catch (error) {
    logger.debug('Cannot read package version', {
      error: error instanceof Error ? error.message : String(error),
    });
    return '0.0.0';
  }
}

type GlobalOptions = {
  config?: string;
  output?: string;
  baseUrl?: string;
  verbose?: boolean;
  json?: boolean;
};

async function initializeContext(options: GlobalOptions): Promise<GlobalContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      outputDir: options.output,
      baseUrl: options.baseUrl,
      verbose: options.verbose,
      json: options.json,
    },
  });

  // Keep stdout clean for the JSON manifest
  if (config.verbose) {
    setLogLevel('debug');
  } else if (config.json) {
    setLogLevel('warn');
  }

  globalContext = { config, startTime };
  return globalContext;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('aquifer-watch')
    .description('Aquifer Watch - groundwater series reconciliation and well classification')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('--config <path>', 'Path to config file (default: .aquifer-watchrc)')
    .option('--output <dir>', 'Artifact directory (default: ./outputs)')
    .option('--base-url <url>', 'Data service base URL')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Print the manifest as JSON (machine-readable)')
    .hook('preAction', async (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      try {
        await initializeContext(options);
      } catch (error) {
        console.error(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerPipelineCommands(program, () => getGlobalContext().config);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Command failed', {
      error: message,
      ...(globalContext && { durationMs: Date.now() - globalContext.startTime }),
    });
    process.exit(error instanceof ConfigError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.FATAL);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.FATAL);
});
