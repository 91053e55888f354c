import { SpanKind, SpanStatusCode } from '@opentelemetry/api';
import {
  ArvoExecution,
  ArvoExecutionSpanKind,
  ArvoOpenTelemetry,
  OpenInference,
  OpenInferenceSpanKind,
  exceptionToSpan,
  logToSpan,
} from 'arvo-core';
import { executeCoordinator } from '../Coordinator';
import type { ConsumerSpec, ProducerSpec, WorkflowInputs } from '../Coordinator/types';
import { RunState } from '../RunState';
import { type TaskIdentifier, type WorkflowOutcome, timeout } from '../TaskOutcome';
import { ConfigViolation, ContractViolation } from '../errors';
import type { WorkflowOtelSpanOptions } from '../types';
import { createTelemetryConfig, errorMessage, getValueOrDefault, isError, isNullOrUndefined } from '../utils';
import { MAX_DEADLINE_MS, runWithDeadline } from './deadline';
import type {
  RunWorkflowOptions,
  RunWorkflowParam,
  WorkflowInputSchema,
  WorkflowOrchestratorParam,
  WorkflowRunResult,
} from './types';

/**
 * Run driver of the fan-out / fan-in workflow.
 *
 * Each call to {@link WorkflowOrchestrator.runWorkflow} allocates a fresh
 * {@link RunState}, so producers admitted in one run can be admitted again in
 * the next and concurrent runs never see each other's bookkeeping.
 *
 * @example
 * ```typescript
 * const orchestrator = createWorkflowOrchestrator({
 *   name: 'profile.summary',
 *   producers: [
 *     { id: 'repo-fetch', inputKey: 'githubUrl', operation: async ({ input }) => fetchRepos(input) },
 *     { id: 'keyword-extract', inputKey: 'jobDescription', operation: async ({ input }) => keywords(input) },
 *   ],
 *   consumer: {
 *     id: 'compose',
 *     operation: async ({ outcomes, extras }) => compose(outcomes, extras),
 *   },
 *   timeoutMs: 30_000,
 * });
 *
 * const { outcome } = await orchestrator.runWorkflow({ inputs: { githubUrl: 'https://github.com/octocat' } });
 * ```
 */
export class WorkflowOrchestrator<TProducerId extends string = string, TInputKey extends string = string> {
  readonly name: string;
  readonly producers: readonly ProducerSpec<TProducerId, TInputKey>[];
  readonly consumer: ConsumerSpec<TProducerId>;
  /** Default run deadline in milliseconds */
  readonly timeoutMs: number;
  readonly inputSchema: WorkflowInputSchema<TInputKey> | null;
  readonly spanOptions: WorkflowOtelSpanOptions;

  /** Identifiers of every task of a run, producers first */
  get taskIds(): TaskIdentifier[] {
    return [...this.producers.map((item) => item.id), this.consumer.id];
  }

  constructor(param: WorkflowOrchestratorParam<TProducerId, TInputKey>) {
    this.name = param.name;
    this.producers = param.producers;
    this.consumer = param.consumer;
    this.timeoutMs = param.timeoutMs;
    this.inputSchema = param.inputSchema ?? null;
    this.spanOptions = {
      kind: SpanKind.INTERNAL,
      ...param.spanOptions,
      attributes: {
        [ArvoExecution.ATTR_SPAN_KIND]: ArvoExecutionSpanKind.ORCHESTRATOR,
        [OpenInference.ATTR_SPAN_KIND]: OpenInferenceSpanKind.CHAIN,
        ...(param.spanOptions?.attributes ?? {}),
        'workflow.orchestrator.name': this.name,
      },
    };
  }

  /**
   * Validates the caller inputs against the configured schema, if any.
   *
   * @throws {ContractViolation} When the inputs do not satisfy the schema
   */
  protected validateInputs(inputs: WorkflowInputs<TInputKey>): WorkflowInputs<TInputKey> {
    if (!this.inputSchema) return inputs;
    const result = this.inputSchema.safeParse(inputs);
    if (!result.success) {
      throw new ContractViolation(`Input validation failed for workflow '${this.name}': ${result.error.message}`, {
        issues: result.error.issues,
      });
    }
    return result.data;
  }

  /**
   * Executes one run: fan out the producers, wait on the join barrier, run the
   * consumer, all under a single deadline.
   *
   * Task failures never throw. A failed consumer is returned as a `failure`
   * outcome and an expired deadline as a `timeout` outcome. Work still running
   * when the deadline expires is abandoned and its results are discarded with
   * the run state.
   *
   * @throws {ContractViolation} When inputs fail the configured schema
   * @throws {ConfigViolation} When the per-run `timeoutMs` override is not a positive number within the timer range
   * @throws {InvariantViolation} When the at-most-once bookkeeping is broken
   */
  async runWorkflow(param: RunWorkflowParam<TInputKey>, options?: RunWorkflowOptions): Promise<WorkflowRunResult> {
    const timeoutMs = getValueOrDefault(options?.timeoutMs, this.timeoutMs);
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_DEADLINE_MS) {
      throw new ConfigViolation(
        `Invalid timeoutMs '${timeoutMs}' for workflow '${this.name}': Must be a positive number no greater than ${MAX_DEADLINE_MS}`,
      );
    }

    const runState = new RunState();
    const otelConfig = createTelemetryConfig(
      this.spanOptions.spanName?.({ orchestratorName: this.name, runId: runState.runId }) ?? `Workflow<${this.name}>`,
      this.spanOptions,
    );

    return await ArvoOpenTelemetry.getInstance().startActiveSpan({
      ...otelConfig,
      fn: async (span): Promise<WorkflowRunResult> => {
        span.setAttribute('workflow.run.id', runState.runId);
        span.setAttribute('workflow.run.status', 'running');
        span.setAttribute('workflow.run.timeout_ms', timeoutMs);
        span.setStatus({ code: SpanStatusCode.OK });

        try {
          const inputs = this.validateInputs(param.inputs);
          const extras: Record<string, string> = {};
          for (const [key, value] of Object.entries(param.extras ?? {})) {
            if (!isNullOrUndefined(value)) extras[key] = value;
          }

          logToSpan(
            {
              level: 'INFO',
              message: `Starting run '${runState.runId}' of workflow '${this.name}' with ${this.producers.length} producers and a deadline of ${timeoutMs}ms`,
            },
            span,
          );

          const result = await runWithDeadline({
            timeoutMs,
            controller: new AbortController(),
            execute: (signal) =>
              executeCoordinator({
                producers: this.producers,
                consumer: this.consumer,
                runState,
                inputs,
                extras,
                signal,
              }),
            onAbandonedSettle: (settled) => {
              logToSpan({
                level: settled.type === 'rejected' ? 'ERROR' : 'INFO',
                message:
                  settled.type === 'rejected'
                    ? `Abandoned run '${runState.runId}' of workflow '${this.name}' rejected after its deadline: ${errorMessage(settled.error)}`
                    : `Abandoned run '${runState.runId}' of workflow '${this.name}' settled after its deadline. Result discarded`,
              });
            },
          });

          let outcome: WorkflowOutcome;
          if (result.type === 'expired') {
            outcome = timeout(timeoutMs);
            span.setStatus({ code: SpanStatusCode.ERROR, message: outcome.message });
            logToSpan({ level: 'ERROR', message: `Run '${runState.runId}' timed out: ${outcome.message}` }, span);
          } else {
            outcome = result.value;
            if (outcome.status === 'failure') {
              span.setStatus({ code: SpanStatusCode.ERROR, message: outcome.message });
            }
            logToSpan(
              {
                level: outcome.status === 'failure' ? 'ERROR' : 'INFO',
                message: `Run '${runState.runId}' completed with a '${outcome.status}' outcome`,
              },
              span,
            );
          }

          span.setAttribute('workflow.run.status', outcome.status);
          return {
            runId: runState.runId,
            outcome,
            tasks: runState.snapshot(this.taskIds),
          };
        } catch (error: unknown) {
          span.setAttribute('workflow.run.status', 'aborted');
          if (isError(error)) exceptionToSpan(error, span);
          span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(error) });
          logToSpan(
            {
              level: 'CRITICAL',
              message: `Run '${runState.runId}' of workflow '${this.name}' aborted: ${errorMessage(error)}`,
            },
            span,
          );
          throw error;
        } finally {
          span.end();
        }
      },
    });
  }
}
