import { v4 as uuid4 } from 'uuid';
import type { TaskIdentifier, TaskOutcome } from '../TaskOutcome';
import { InvariantViolation } from '../errors';
import type { IRunState } from './types';

/**
 * In-process run state. One instance belongs to exactly one workflow run and is
 * dropped when the run returns; it is never shared between runs.
 *
 * @example
 * ```typescript
 * const state = new RunState();
 * state.tryAdmit('repo-fetch'); // true
 * state.tryAdmit('repo-fetch'); // false
 * state.recordOutcome('repo-fetch', success('{"repos":3}'));
 * state.getOutcome('repo-fetch'); // { status: 'success', payload: '{"repos":3}' }
 * ```
 */
export class RunState implements IRunState {
  readonly runId: string;
  private readonly admitted = new Set<TaskIdentifier>();
  private readonly outcomes = new Map<TaskIdentifier, TaskOutcome>();

  constructor(runId?: string) {
    this.runId = runId ?? uuid4();
  }

  tryAdmit(id: TaskIdentifier): boolean {
    if (this.admitted.has(id)) {
      return false;
    }
    this.admitted.add(id);
    return true;
  }

  recordOutcome(id: TaskIdentifier, outcome: TaskOutcome): void {
    if (!this.admitted.has(id)) {
      throw new InvariantViolation(`Outcome recorded for task '${id}' which was never admitted in run '${this.runId}'`, {
        runId: this.runId,
        taskId: id,
      });
    }
    const existing = this.outcomes.get(id);
    if (existing) {
      throw new InvariantViolation(
        `Outcome for task '${id}' is already recorded as '${existing.status}' in run '${this.runId}' and cannot be overwritten`,
        {
          runId: this.runId,
          taskId: id,
        },
      );
    }
    this.outcomes.set(id, Object.isFrozen(outcome) ? outcome : Object.freeze({ ...outcome }));
  }

  getOutcome(id: TaskIdentifier): TaskOutcome | null {
    return this.outcomes.get(id) ?? null;
  }

  isAdmitted(id: TaskIdentifier): boolean {
    return this.admitted.has(id);
  }

  isInFlight(id: TaskIdentifier): boolean {
    return this.admitted.has(id) && !this.outcomes.has(id);
  }

  snapshot(ids: readonly TaskIdentifier[]): Record<TaskIdentifier, TaskOutcome | null> {
    const result: Record<TaskIdentifier, TaskOutcome | null> = {};
    for (const id of ids) {
      result[id] = this.getOutcome(id);
    }
    return result;
  }
}
