/**
 * Error Strategies
 *
 * Fail-fast and collect-errors are the same scan with a different answer
 * to "what happens when a violation is found".
 */

import type { ParameterError } from '../errors/index.js';
import type { ParseResultBuilder } from '../model/parse-result.js';

export interface ErrorStrategy {
  /** True if the scan resumes after a reported error */
  readonly continueOnError: boolean;
  report(error: ParameterError): void;
}

/**
 * Throw the first violation
 */
export class FailFastStrategy implements ErrorStrategy {
  readonly continueOnError = false;

  report(error: ParameterError): never {
    throw error;
  }
}

/**
 * Record violations on the parse result and keep going
 */
export class CollectErrorsStrategy implements ErrorStrategy {
  readonly continueOnError = true;

  constructor(private readonly result: ParseResultBuilder) {}

  report(error: ParameterError): void {
    this.result.addError(error);
  }
}

export function createErrorStrategy(collectErrors: boolean, result: ParseResultBuilder): ErrorStrategy {
  return collectErrors ? new CollectErrorsStrategy(result) : new FailFastStrategy();
}
