/**
 * Enumeration of terminal outcome statuses.
 *
 * `success` and `failure` are produced by individual tasks. `timeout` is only
 * ever produced for a whole run, when the deadline expires before the consumer
 * task has completed.
 */
export const TaskOutcomeStatus = {
  /** The task operation resolved with a payload */
  SUCCESS: 'success',
  /** The task operation threw, rejected or was skipped */
  FAILURE: 'failure',
  /** The run deadline expired before the consumer completed */
  TIMEOUT: 'timeout',
} as const;

/** Failure message recorded for a producer whose input was not supplied */
export const NO_INPUT_PROVIDED = 'no input provided';

export type TaskIdentifier = string;

export type TaskSuccess = {
  readonly status: typeof TaskOutcomeStatus.SUCCESS;
  readonly payload: string;
};

export type TaskFailure = {
  readonly status: typeof TaskOutcomeStatus.FAILURE;
  readonly message: string;
};

/**
 * Terminal result of one task. Immutable once recorded in a run.
 */
export type TaskOutcome = TaskSuccess | TaskFailure;

export type WorkflowTimeout = {
  readonly status: typeof TaskOutcomeStatus.TIMEOUT;
  readonly message: string;
  readonly timeoutMs: number;
};

/**
 * Terminal result of one run: the consumer's outcome, or a timeout.
 */
export type WorkflowOutcome = TaskOutcome | WorkflowTimeout;

export const success = (payload: string): TaskSuccess =>
  Object.freeze({ status: TaskOutcomeStatus.SUCCESS, payload });

export const failure = (message: string): TaskFailure =>
  Object.freeze({ status: TaskOutcomeStatus.FAILURE, message });

export const timeout = (timeoutMs: number): WorkflowTimeout =>
  Object.freeze({
    status: TaskOutcomeStatus.TIMEOUT,
    message: `Workflow did not complete within ${timeoutMs}ms`,
    timeoutMs,
  });

export const isSuccess = (outcome: WorkflowOutcome | null | undefined): outcome is TaskSuccess =>
  outcome?.status === TaskOutcomeStatus.SUCCESS;

export const isFailure = (outcome: WorkflowOutcome | null | undefined): outcome is TaskFailure =>
  outcome?.status === TaskOutcomeStatus.FAILURE;

export const isTimeout = (outcome: WorkflowOutcome | null | undefined): outcome is WorkflowTimeout =>
  outcome?.status === TaskOutcomeStatus.TIMEOUT;
