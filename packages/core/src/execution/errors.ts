import { SieveError } from '../errors';

/**
 * A unit raised something other than an assertion failure, or the framework
 * itself threw while running it. The unit is reported as errored.
 */
export class ExecutionFault extends SieveError {
  constructor(public readonly unitId: string, cause: Error) {
    super(`Unexpected fault in ${unitId}: ${cause.message}`, 'EXECUTION_FAULT', { cause });
    this.name = "ExecutionFault";
    Object.setPrototypeOf(this, ExecutionFault.prototype);
  }
}

/**
 * A unit's expectation did not hold. The unit is reported as failed.
 */
export class AssertionMismatch extends SieveError {
  constructor(public readonly unitId: string, cause: Error) {
    super(`Assertion failed in ${unitId}: ${cause.message}`, 'ASSERTION_MISMATCH', { cause });
    this.name = "AssertionMismatch";
    Object.setPrototypeOf(this, AssertionMismatch.prototype);
  }
}
