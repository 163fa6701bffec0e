import { check } from './commands/check.js';
import { evaluateCommand } from './commands/eval.js';
import { CliConfigError, LOG_LEVEL_ENV, loadCliConfig } from './config.js';
import { createLogger, type LogLevel } from '../utils/logger.js';

export const VERSION = '0.1.0';

function printHelp(): void {
  console.log(`
filter-dsl - Boolean filter expression toolkit

Usage:
  filter-dsl <command> [options]

Commands:
  check <expression>                Parse an expression and show its canonical form
  eval <expression> <bindings>      Evaluate an expression against a YAML file of booleans
  version                           Show version information
  help                              Show this help message

Global Options:
  --json        Output as JSON
  --verbose, -v Debug logging (overrides ${LOG_LEVEL_ENV})
  --help, -h    Show help

Exit Codes:
  0  Success (eval: expression is true)
  1  Failure (syntax error, unresolved filter, eval: expression is false)
  2  Usage error (invalid arguments)

Examples:
  filter-dsl check "(active | trial) & !banned"
  filter-dsl eval "active & !banned" flags.yaml
  filter-dsl check "a & b" --json
`);
}

function printVersion(): void {
  console.log(`filter-dsl v${VERSION}`);
}

export interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, boolean>;
}

export function parseArgs(args: string[]): ParsedArgs {
  const flags: Record<string, boolean> = {};
  const positionals: string[] = [];
  let command = '';

  for (const arg of args) {
    if (arg.startsWith('--')) {
      flags[arg.slice(2)] = true;
    } else if (arg.startsWith('-') && arg.length > 1) {
      for (const f of arg.slice(1).split('')) {
        switch (f) {
          case 'h': flags['help'] = true; break;
          case 'v': flags['verbose'] = true; break;
        }
      }
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags };
}

/**
 * Run the CLI and resolve to its exit code.
 */
export async function run(
  args: string[],
  env: Record<string, string | undefined> = process.env,
): Promise<number> {
  const { command, positionals, flags } = parseArgs(args);

  if (flags['help'] || command === 'help') {
    printHelp();
    return 0;
  }

  if (flags['version'] || command === 'version') {
    printVersion();
    return 0;
  }

  let logLevel: LogLevel;
  try {
    logLevel = loadCliConfig(env, { verbose: flags['verbose'] }).logLevel;
  } catch (e) {
    if (e instanceof CliConfigError) {
      console.error(e.message);
      return 2;
    }
    throw e;
  }
  const logger = createLogger(logLevel);

  switch (command) {
    case 'check': {
      if (positionals.length < 1) {
        console.error('Usage: filter-dsl check <expression>');
        return 2;
      }
      const result = await check({
        expression: positionals.join(' '),
        json: flags['json'],
        logger,
      });
      return result.valid ? 0 : 1;
    }

    case 'eval': {
      if (positionals.length < 2) {
        console.error('Usage: filter-dsl eval <expression> <bindings.yaml>');
        return 2;
      }
      const result = await evaluateCommand({
        expression: positionals.slice(0, -1).join(' '),
        bindings: positionals[positionals.length - 1],
        json: flags['json'],
        logger,
      });
      return result.success && result.value === true ? 0 : 1;
    }

    case '': {
      console.log('filter-dsl - Boolean filter expression toolkit');
      console.log('');
      console.log('Run "filter-dsl help" for usage information.');
      return 0;
    }

    default: {
      console.error(`Unknown command: ${command}`);
      console.error('Run "filter-dsl help" for usage information.');
      return 2;
    }
  }
}
