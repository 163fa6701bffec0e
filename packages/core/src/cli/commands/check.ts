import { parse } from '../../compiler/parser.js';
import { DslSyntaxError, FilterDslError } from '../../compiler/errors.js';
import type { Logger } from '../../utils/logger.js';

export interface CheckOptions {
  expression: string;
  json?: boolean;
  logger?: Logger;
}

export interface ReportedError {
  code: string;
  message: string;
  pos?: number;
}

export interface CheckResult {
  valid: boolean;
  expression: string;
  canonical?: string;
  identifiers: string[];
  depth?: number;
  error?: ReportedError;
}

export function reportError(error: FilterDslError): ReportedError {
  const reported: ReportedError = { code: error.code, message: error.message };
  if (error instanceof DslSyntaxError && error.pos !== undefined) {
    reported.pos = error.pos;
  }
  return reported;
}

export function formatError(error: ReportedError): string {
  return `ERROR ${error.code}: ${error.message}`;
}

export async function check(options: CheckOptions): Promise<CheckResult> {
  let result: CheckResult;

  try {
    const tree = parse(options.expression, { logger: options.logger });
    result = {
      valid: true,
      expression: options.expression,
      canonical: tree.toString(),
      identifiers: tree.identifiers(),
      depth: tree.depth(),
    };
  } catch (e) {
    if (!(e instanceof FilterDslError)) throw e;
    result = {
      valid: false,
      expression: options.expression,
      identifiers: [],
      error: reportError(e),
    };
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else if (result.valid) {
    console.log(`OK ${result.canonical}`);
    console.log(`identifiers: ${result.identifiers.join(', ')}`);
    console.log(`depth: ${result.depth}`);
  } else if (result.error) {
    console.error(formatError(result.error));
  }

  return result;
}
