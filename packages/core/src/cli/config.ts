/**
 * CLI settings: defaults, then environment, then flags.
 *
 * @module cli/config
 */

import { isLogLevel, LOG_LEVELS, type LogLevel } from '../utils/logger.js';

export const LOG_LEVEL_ENV = 'FILTER_DSL_LOG_LEVEL';

export interface CliConfig {
  logLevel: LogLevel;
}

export const DEFAULT_CLI_CONFIG: Readonly<CliConfig> = Object.freeze({
  logLevel: 'warn',
});

export class CliConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliConfigError';
  }
}

export function loadEnvOverrides(env: Record<string, string | undefined>): Partial<CliConfig> {
  const raw = env[LOG_LEVEL_ENV];
  if (raw === undefined || raw === '') {
    return {};
  }
  const level = raw.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new CliConfigError(
      `Invalid ${LOG_LEVEL_ENV} value '${raw}'. Must be one of: ${LOG_LEVELS.join(', ')}`,
    );
  }
  return { logLevel: level };
}

/** `--verbose` wins over the environment. */
export function loadCliConfig(
  env: Record<string, string | undefined>,
  flags: { verbose?: boolean } = {},
): CliConfig {
  const config: CliConfig = { ...DEFAULT_CLI_CONFIG, ...loadEnvOverrides(env) };
  if (flags.verbose) {
    config.logLevel = 'debug';
  }
  return config;
}
