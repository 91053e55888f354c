import { z } from 'zod';
import { WorkflowOrchestrator } from '.';
import type { ProducerSpec } from '../Coordinator/types';
import { ConfigViolation } from '../errors';
import { MAX_DEADLINE_MS } from './deadline';
import type { CreateWorkflowOrchestratorParam } from './types';

/** Deadline applied to a run when neither the orchestrator nor the call sets one */
export const DEFAULT_WORKFLOW_TIMEOUT_MS = 120_000;

// Task identifiers are opaque. Only blank ones are refused
const taskIdentifierSchema = z.string().trim().min(1, 'Must be a non-empty string');

const workflowConfigSchema = z.object({
  name: z
    .string()
    .min(1)
    .regex(/^[a-z0-9]+(\.[a-z0-9]+)*$/, 'Must contain only lowercase alphanumeric characters and dots (example: resume.generation)'),
  timeoutMs: z.number().finite().positive().max(MAX_DEADLINE_MS),
  taskIds: z.array(taskIdentifierSchema),
});

/**
 * Finds the first identifier used by more than one task.
 */
export const findDuplicateTaskId = (ids: readonly string[]): string | null => {
  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) return id;
    seen.add(id);
  }
  return null;
};

/**
 * Validates the task topology of a workflow.
 *
 * @throws {ConfigViolation} When there are no producers, an identifier is invalid or
 *         used twice, or the consumer shares an identifier with a producer
 */
export const workflowTopologyValidation = (param: {
  name: string;
  timeoutMs: number;
  producers: readonly ProducerSpec[];
  consumerId: string;
}) => {
  if (!param.producers.length) {
    throw new ConfigViolation(`Workflow '${param.name}' requires at least one producer`);
  }

  const parsed = workflowConfigSchema.safeParse({
    name: param.name,
    timeoutMs: param.timeoutMs,
    taskIds: [...param.producers.map((item) => item.id), param.consumerId],
  });
  if (!parsed.success) {
    throw new ConfigViolation(
      `Invalid configuration for workflow '${param.name}': ${parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'root'} - ${issue.message}`)
        .join('; ')}`,
    );
  }

  const duplicateProducer = findDuplicateTaskId(param.producers.map((item) => item.id));
  if (duplicateProducer) {
    throw new ConfigViolation(
      `In workflow '${param.name}', the producer identifiers must be unique. The identifier '${duplicateProducer}' is used more than once`,
    );
  }

  if (param.producers.some((item) => item.id === param.consumerId)) {
    throw new ConfigViolation(
      `In workflow '${param.name}', the consumer identifier '${param.consumerId}' is also registered as a producer. A task cannot consume its own outcome`,
    );
  }
};

/**
 * Creates a new {@link WorkflowOrchestrator}.
 *
 * Validates the workflow topology and resolves defaults. The orchestrator is
 * stateless between runs and can be shared by concurrent callers.
 *
 * @throws {ConfigViolation} When the configuration is invalid
 *
 * @example
 * ```typescript
 * const orchestrator = createWorkflowOrchestrator({
 *   name: 'page.digest',
 *   producers: [{ id: 'page-scrape', inputKey: 'url', operation: async ({ input, signal }) => scrape(input, signal) }],
 *   consumer: { id: 'compose', operation: async ({ outcomes }) => digest(outcomes) },
 * });
 * ```
 */
export const createWorkflowOrchestrator = <TProducerId extends string, TInputKey extends string>(
  param: CreateWorkflowOrchestratorParam<TProducerId, TInputKey>,
): WorkflowOrchestrator<TProducerId, TInputKey> => {
  const timeoutMs = param.timeoutMs ?? DEFAULT_WORKFLOW_TIMEOUT_MS;
  workflowTopologyValidation({
    name: param.name,
    timeoutMs,
    producers: param.producers,
    consumerId: param.consumer.id,
  });
  return new WorkflowOrchestrator<TProducerId, TInputKey>({
    ...param,
    timeoutMs,
  });
};
