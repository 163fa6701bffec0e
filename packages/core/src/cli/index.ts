export { run, parseArgs, VERSION, type ParsedArgs } from './main.js';
export {
  loadCliConfig,
  loadEnvOverrides,
  CliConfigError,
  DEFAULT_CLI_CONFIG,
  LOG_LEVEL_ENV,
  type CliConfig,
} from './config.js';
export { parseBindings, bindingsContext, BindingsError, type Bindings } from './bindings.js';
export { check, type CheckOptions, type CheckResult } from './commands/check.js';
export { evaluateCommand, type EvalOptions, type EvalResult } from './commands/eval.js';
