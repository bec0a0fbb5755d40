/**
 * CLI Library Index
 *
 * @module cli/lib
 */

export {
  ConfigError,
  ConfigFileSchema,
  DEFAULT_CONFIG,
  findConfigFile,
  loadConfig,
  parseConfigFile,
  type CLIConfig,
  type ConfigFile,
  type LoadConfigOptions,
  type ServiceConfig,
} from './config.js';
export { EXIT_CODES, exitCodeFor, type ExitCode } from './exit-codes.js';
export {
  formatJson,
  formatManifest,
  formatSummary,
  formatTable,
  manifestRows,
  type TableColumn,
} from './output.js';
