import { ViolationError, isViolationError } from 'arvo-core';

/**
 * InvariantViolation signals that the at-most-once bookkeeping of a run was
 * about to be broken: an outcome recorded twice, an outcome recorded for a task
 * that was never admitted, or a duplicate admission racing an in-flight task.
 *
 * It never occurs in correct operation. When it does, the run is aborted and
 * the error is thrown to the caller instead of being turned into an outcome.
 */
export class InvariantViolation extends ViolationError<'Invariant'> {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super({
      type: 'Invariant',
      message,
      metadata,
    });
  }
}

/**
 * ConfigViolation indicates an orchestrator that cannot be constructed as
 * described, such as duplicate task identifiers, a consumer sharing an
 * identifier with a producer, or a deadline that is not a positive number of
 * milliseconds.
 */
export class ConfigViolation extends ViolationError<'Config'> {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super({
      type: 'Config',
      message,
      metadata,
    });
  }
}

/**
 * ContractViolation indicates caller inputs that do not satisfy the input
 * schema of the workflow. No task is admitted for such a run.
 */
export class ContractViolation extends ViolationError<'Contract'> {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super({
      type: 'Contract',
      message,
      metadata,
    });
  }
}

export type WorkflowViolationType = 'Invariant' | 'Config' | 'Contract';

/**
 * Type guard checking if an error is a violation raised by this library,
 * optionally of a specific type. Matches on the violation `type` rather than
 * the prototype chain.
 */
export const isWorkflowViolation = (error: unknown, type?: WorkflowViolationType): boolean =>
  isViolationError(error) &&
  typeof error === 'object' &&
  error !== null &&
  'type' in error &&
  (type ? error.type === type : error.type === 'Invariant' || error.type === 'Config' || error.type === 'Contract');

/**
 * Type guard checking if an error is an {@link InvariantViolation}.
 */
export const isInvariantViolation = (error: unknown): error is InvariantViolation =>
  isWorkflowViolation(error, 'Invariant');

export const isConfigViolation = (error: unknown): error is ConfigViolation => isWorkflowViolation(error, 'Config');

export const isContractViolation = (error: unknown): error is ContractViolation =>
  isWorkflowViolation(error, 'Contract');
