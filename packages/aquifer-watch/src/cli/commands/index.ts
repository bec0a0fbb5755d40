/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

export {
  MANIFEST_FILE_NAME,
  registerPipelineCommands,
  runPipelineCommand,
  type PipelineCommandResult,
} from './pipeline/run.js';
