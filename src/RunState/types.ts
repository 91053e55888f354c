import type { TaskIdentifier, TaskOutcome } from '../TaskOutcome';

/**
 * Per-run bookkeeping of task admission and recorded outcomes.
 *
 * Every method is synchronous. A call therefore completes within a single turn
 * of the event loop, which makes the check-and-insert of {@link IRunState.tryAdmit}
 * atomic with respect to every other task of the run.
 */
export interface IRunState {
  /** Identifier of the run that owns this state */
  readonly runId: string;

  /**
   * Grants the single execution slot for `id`.
   *
   * @returns `true` when the caller now owns execution of the task, `false`
   *          when the task was already admitted in this run
   */
  tryAdmit(id: TaskIdentifier): boolean;

  /**
   * Stores the outcome of an admitted task. Outcomes are write-once.
   *
   * @throws {InvariantViolation} When `id` already has an outcome, or was never admitted
   */
  recordOutcome(id: TaskIdentifier, outcome: TaskOutcome): void;

  /** Non-blocking read of the recorded outcome, or null when none is recorded yet */
  getOutcome(id: TaskIdentifier): TaskOutcome | null;

  isAdmitted(id: TaskIdentifier): boolean;

  /** Admitted but without a recorded outcome */
  isInFlight(id: TaskIdentifier): boolean;

  /**
   * Recorded outcome per identifier, `null` for identifiers without one.
   */
  snapshot(ids: readonly TaskIdentifier[]): Record<TaskIdentifier, TaskOutcome | null>;
}
