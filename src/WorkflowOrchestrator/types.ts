import type { z } from 'zod';
import type { ConsumerSpec, ProducerSpec, WorkflowInputs } from '../Coordinator/types';
import type { TaskIdentifier, TaskOutcome, WorkflowOutcome } from '../TaskOutcome';
import type { WorkflowOtelSpanOptions } from '../types';

export type WorkflowInputSchema<TInputKey extends string> = z.ZodType<WorkflowInputs<TInputKey>, z.ZodTypeDef, unknown>;

/**
 * Parameters for constructing a {@link WorkflowOrchestrator}.
 *
 * @template TProducerId - Literal union of producer identifiers
 * @template TInputKey - Literal union of caller input keys
 */
export type WorkflowOrchestratorParam<TProducerId extends string, TInputKey extends string> = {
  /** Name of the workflow, used in span names and log lines (example: resume.generation) */
  name: string;
  /** Independent tasks fanned out at the start of every run */
  producers: readonly ProducerSpec<TProducerId, TInputKey>[];
  /** Task admitted once every producer has a terminal outcome */
  consumer: ConsumerSpec<TProducerId>;
  /** Deadline for a whole run, in milliseconds */
  timeoutMs: number;
  /** Optional schema the caller inputs are validated against before a run starts */
  inputSchema?: WorkflowInputSchema<TInputKey>;
  spanOptions?: WorkflowOtelSpanOptions;
};

export type CreateWorkflowOrchestratorParam<TProducerId extends string, TInputKey extends string> = Omit<
  WorkflowOrchestratorParam<TProducerId, TInputKey>,
  'timeoutMs'
> & {
  /** Defaults to {@link DEFAULT_WORKFLOW_TIMEOUT_MS} */
  timeoutMs?: number;
};

export type RunWorkflowParam<TInputKey extends string> = {
  /** Raw inputs keyed by the producers' `inputKey` */
  inputs: WorkflowInputs<TInputKey>;
  /** Free-form text handed to the consumer as is (user feedback, manual additions) */
  extras?: Record<string, string | null | undefined>;
};

export type RunWorkflowOptions = {
  /** Overrides the orchestrator's deadline for this run */
  timeoutMs?: number;
};

/**
 * Result of one run. `tasks` holds the outcome recorded for every task of the
 * run, `null` for tasks which had not finished when the deadline expired.
 */
export type WorkflowRunResult = {
  runId: string;
  outcome: WorkflowOutcome;
  tasks: Record<TaskIdentifier, TaskOutcome | null>;
};
