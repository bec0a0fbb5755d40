/**
 * Pipeline Commands
 *
 * `run` executes every pass; `heads`, `balance` and `wells` execute one.
 * Each prints the manifest, writes `manifest.json` next to the artifacts and
 * sets the process exit code from the outcome.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import type { Command } from 'commander';
import type { CLIConfig } from '../../lib/config.js';
import { exitCodeFor, type ExitCode } from '../../lib/exit-codes.js';
import { formatManifest } from '../../lib/output.js';
import { atomicWriteJSON } from '../../../core/utils/atomic-write.js';
import { PipelineOrchestrator } from '../../../pipeline/orchestrator.js';
import type { RunManifest } from '../../../pipeline/manifest.js';
import { ALL_PASSES, type PassName } from '../../../pipeline/orchestrator.types.js';
import { HydrometRetrievalClient, type RetrievalClient } from '../../../retrieval/client.js';
import { DirectoryOutput } from '../../../rendering/directory-output.js';
import { SvgRenderingSink } from '../../../rendering/svg-sink.js';

export const MANIFEST_FILE_NAME = 'manifest.json';

export interface PipelineCommandResult {
  readonly manifest: RunManifest;
  readonly manifestPath: string;
  readonly exitCode: ExitCode;
}

/**
 * Build the pipeline from configuration, run `passes` and persist the manifest
 *
 * @param client - Retrieval override (tests); defaults to the HTTP client
 */
export async function runPipelineCommand(
  config: CLIConfig,
  passes: readonly PassName[],
  client?: RetrievalClient
): Promise<PipelineCommandResult> {
  const output = new DirectoryOutput(config.outputDir);
  const orchestrator = new PipelineOrchestrator(
    {
      client:
        client ??
        new HydrometRetrievalClient({
          baseUrl: config.service.baseUrl,
          timeoutMs: config.service.timeout,
          retries: config.service.retries,
        }),
      sink: new SvgRenderingSink(output),
      output,
    },
    config.pipeline
  );

  const manifest = await orchestrator.run(passes);
  const manifestPath = output.resolve(MANIFEST_FILE_NAME);
  await atomicWriteJSON(manifestPath, manifest);

  return { manifest, manifestPath, exitCode: exitCodeFor(manifest) };
}

const COMMANDS: readonly { name: string; description: string; passes: readonly PassName[] }[] = [
  { name: 'run', description: 'Run the heads, balance and wells passes', passes: ALL_PASSES },
  { name: 'heads', description: 'Chart hydraulic head per zone and dataset', passes: ['heads'] },
  { name: 'balance', description: 'Chart water balance per zone and system-wide', passes: ['balance'] },
  { name: 'wells', description: 'Classify wells and chart their levels', passes: ['wells'] },
];

/**
 * Register run / heads / balance / wells
 *
 * @param getConfig - Configuration resolved by the program's preAction hook
 */
export function registerPipelineCommands(program: Command, getConfig: () => CLIConfig): void {
  for (const { name, description, passes } of COMMANDS) {
    program
      .command(name)
      .description(description)
      .action(async () => {
        const config = getConfig();
        const result = await runPipelineCommand(config, passes);

        console.log(formatManifest(result.manifest, config.json));
        if (!config.json) {
          console.log(`Manifest written to ${result.manifestPath}`);
        }
        process.exitCode = result.exitCode;
      });
  }
}
