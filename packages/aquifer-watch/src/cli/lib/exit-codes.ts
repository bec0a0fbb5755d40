/**
 * Process exit codes
 *
 * @module cli/lib/exit-codes
 */

import { summarizeManifest, type RunManifest } from '../../pipeline/manifest.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  UNIT_FAILURES: 1,
  FATAL: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * 2 for a fatal run, 1 when any unit failed, 0 otherwise
 */
export function exitCodeFor(manifest: RunManifest): ExitCode {
  if (manifest.fatal) return EXIT_CODES.FATAL;
  return summarizeManifest(manifest).failed > 0 ? EXIT_CODES.UNIT_FAILURES : EXIT_CODES.SUCCESS;
}
