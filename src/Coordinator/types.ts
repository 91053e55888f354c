import type { Span } from '@opentelemetry/api';
import type { IRunState } from '../RunState/types';
import type { TaskOutcome } from '../TaskOutcome';

/**
 * Context handed to a producer operation. `signal` aborts when the run
 * deadline expires; honouring it is optional.
 */
export type ProducerOperationParam = {
  /** The caller-supplied input selected by the producer's `inputKey` */
  input: string;
  runId: string;
  signal: AbortSignal;
  span: Span;
};

/**
 * One independent unit of work fanned out by the coordinator.
 *
 * @template TProducerId - Literal identifier of the producer
 * @template TInputKey - Key of the caller input the producer consumes
 */
export type ProducerSpec<TProducerId extends string = string, TInputKey extends string = string> = {
  id: TProducerId;
  /** Key of the caller input passed to the operation. An absent input skips the producer. */
  inputKey: TInputKey;
  operation: (param: ProducerOperationParam) => Promise<string>;
};

/**
 * Input of the consumer operation, composed after the join barrier.
 */
export type ConsumerOperationParam<TProducerId extends string = string> = {
  /** Recorded outcome of every producer, failures included */
  outcomes: ReadonlyMap<TProducerId, TaskOutcome>;
  /** Free-form caller text passed through untouched */
  extras: Readonly<Record<string, string>>;
  runId: string;
  signal: AbortSignal;
  span: Span;
};

export type ConsumerSpec<TProducerId extends string = string> = {
  id: string;
  operation: (param: ConsumerOperationParam<TProducerId>) => Promise<string>;
};

export type WorkflowInputs<TInputKey extends string = string> = Partial<Record<TInputKey, string | null>>;

export type CoordinatorExecutionContext<TProducerId extends string, TInputKey extends string> = {
  producers: readonly ProducerSpec<TProducerId, TInputKey>[];
  consumer: ConsumerSpec<TProducerId>;
  /** Fresh state owned by the run being coordinated */
  runState: IRunState;
  inputs: WorkflowInputs<TInputKey>;
  extras: Readonly<Record<string, string>>;
  signal: AbortSignal;
};
