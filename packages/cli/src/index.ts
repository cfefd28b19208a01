/**
 * @proofmark/cli
 *
 * Configuration, logging, engine plugin loading and the job runner behind the
 * proofmark command.
 */

export { Logger, redactSecrets } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';

export {
  ConfigError,
  configFileSchema,
  expandEnvVars,
  formatZodError,
  loadConfig,
  parseConfig,
} from './config.js';
export type { ConfigFile, EnvExpansionOptions } from './config.js';

export { loadEngineModule, isAnalysisEngine } from './engine-loader.js';
export type { EngineModule, ModuleImporter } from './engine-loader.js';

export { Runner, runModeSchema } from './runner.js';
export type { RunMode, RunInput, RunOverrides, RunnerOptions } from './runner.js';

export { parseArgs, USAGE } from './args.js';
export type { CliArgs } from './args.js';
