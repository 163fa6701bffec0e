import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from '../../compiler/parser.js';
import { FilterDslError } from '../../compiler/errors.js';
import { BindingsError, bindingsContext, parseBindings } from '../bindings.js';
import type { Logger } from '../../utils/logger.js';
import { formatError, reportError, type ReportedError } from './check.js';

export interface EvalOptions {
  expression: string;
  bindings: string;
  json?: boolean;
  logger?: Logger;
}

export interface EvalResult {
  success: boolean;
  expression: string;
  value?: boolean;
  error?: ReportedError;
}

function loadBindingsFile(path: string): string {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new BindingsError(`Bindings file not found: ${path}`);
  }
  try {
    return readFileSync(fullPath, 'utf-8');
  } catch (e) {
    throw new BindingsError(`Cannot read bindings file: ${path}`, { cause: e });
  }
}

function evaluateWith(options: EvalOptions): EvalResult {
  // parse first: a syntax error is reported even when the bindings file is bad
  const tree = parse(options.expression, { logger: options.logger });
  const bindings = parseBindings(loadBindingsFile(options.bindings));
  options.logger?.debug('Loaded bindings', { path: options.bindings, count: bindings.size });
  const condition = tree.generate(bindingsContext(bindings));
  return { success: true, expression: options.expression, value: condition.test() };
}

export async function evaluateCommand(options: EvalOptions): Promise<EvalResult> {
  let result: EvalResult;

  try {
    result = evaluateWith(options);
  } catch (e) {
    if (e instanceof FilterDslError) {
      result = { success: false, expression: options.expression, error: reportError(e) };
    } else if (e instanceof BindingsError) {
      result = {
        success: false,
        expression: options.expression,
        error: { code: 'INVALID_BINDINGS', message: e.message },
      };
    } else {
      throw e;
    }
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else if (result.success) {
    console.log(String(result.value));
  } else if (result.error) {
    console.error(formatError(result.error));
  }

  return result;
}
