import { logToSpan } from 'arvo-core';
import { GuardedTask } from '../GuardedTask';
import { NO_INPUT_PROVIDED, type TaskOutcome } from '../TaskOutcome';
import { InvariantViolation } from '../errors';
import { resolveInput } from '../utils';
import type { CoordinatorExecutionContext, ProducerSpec, WorkflowInputs } from './types';

/** Failure message recorded for a consumer whose run was abandoned at the deadline */
export const RUN_ABANDONED = 'run abandoned after its deadline';

/**
 * Dispatches one producer through the guard. A producer without input is
 * skipped with a recorded failure instead of being invoked.
 */
const dispatchProducer = <TProducerId extends string, TInputKey extends string>(
  guard: GuardedTask,
  producer: ProducerSpec<TProducerId, TInputKey>,
  inputs: WorkflowInputs<TInputKey>,
  signal: AbortSignal,
): Promise<TaskOutcome> => {
  const input = resolveInput(inputs[producer.inputKey]);
  if (input === null) {
    return Promise.resolve(guard.skip(producer.id, NO_INPUT_PROVIDED));
  }
  return guard.run(producer.id, (span) =>
    producer.operation({
      input,
      runId: guard.runState.runId,
      signal,
      span,
    }),
  );
};

/**
 * Fan-out / fan-in coordination of a single run.
 *
 * 1. Every producer is dispatched through a {@link GuardedTask}, concurrently.
 *    Dispatch order carries no meaning.
 * 2. Join barrier: all producers must reach a terminal outcome, failures
 *    included, before anything else happens.
 * 3. The consumer input is composed from the outcomes recorded in the run state.
 *    Failed producers appear as explicit failure markers.
 * 4. The consumer is executed through the guard and its outcome is returned.
 *    A run whose deadline already expired skips the consumer instead.
 *
 * @throws {InvariantViolation} When the run state bookkeeping is broken. Task
 *         failures never throw; they are outcomes.
 */
export const executeCoordinator = async <TProducerId extends string, TInputKey extends string>({
  producers,
  consumer,
  runState,
  inputs,
  extras,
  signal,
}: CoordinatorExecutionContext<TProducerId, TInputKey>): Promise<TaskOutcome> => {
  const guard = new GuardedTask({ runState });

  logToSpan({
    level: 'INFO',
    message: `Dispatching ${producers.length} producers in run '${runState.runId}'`,
  });

  await Promise.all(producers.map((producer) => dispatchProducer(guard, producer, inputs, signal)));

  const outcomes = new Map<TProducerId, TaskOutcome>();
  for (const producer of producers) {
    const outcome = runState.getOutcome(producer.id);
    if (!outcome) {
      throw new InvariantViolation(
        `Join barrier passed without a recorded outcome for producer '${producer.id}' in run '${runState.runId}'`,
        { runId: runState.runId, taskId: producer.id },
      );
    }
    outcomes.set(producer.id, outcome);
  }

  const failed = Array.from(outcomes.entries()).filter(([, outcome]) => outcome.status === 'failure');
  logToSpan({
    level: failed.length ? 'WARNING' : 'INFO',
    message: failed.length
      ? `Join barrier reached with ${failed.length} failed producers: ${failed.map(([id]) => id).join(', ')}`
      : `Join barrier reached. All ${outcomes.size} producers succeeded`,
  });

  if (signal.aborted) {
    return guard.skip(consumer.id, RUN_ABANDONED);
  }

  return await guard.run(consumer.id, (span) =>
    consumer.operation({
      outcomes,
      extras,
      runId: runState.runId,
      signal,
      span,
    }),
  );
};
