import { type Span, SpanKind, type SpanOptions, SpanStatusCode } from '@opentelemetry/api';
import {
  ArvoExecution,
  ArvoExecutionSpanKind,
  ArvoOpenTelemetry,
  OpenInference,
  OpenInferenceSpanKind,
  exceptionToSpan,
  logToSpan,
} from 'arvo-core';
import type { IRunState } from '../RunState/types';
import { type TaskIdentifier, type TaskOutcome, failure, success } from '../TaskOutcome';
import { InvariantViolation } from '../errors';
import { createTelemetryConfig, errorMessage, isError } from '../utils';
import type { GuardedOperation, GuardedTaskParam, TaskAdmission } from './types';

/**
 * Sole entry point through which producers and the consumer are executed.
 *
 * The first call for an identifier owns its execution: the operation runs once,
 * any error it raises is captured as a failure outcome, and the outcome is
 * recorded in the run state. Later calls for the same identifier return the
 * recorded outcome without running anything.
 */
export class GuardedTask {
  readonly runState: IRunState;
  readonly spanOptions: SpanOptions;

  constructor(param: GuardedTaskParam) {
    this.runState = param.runState;
    this.spanOptions = {
      kind: SpanKind.INTERNAL,
      ...param.spanOptions,
      attributes: {
        [ArvoExecution.ATTR_SPAN_KIND]: ArvoExecutionSpanKind.EVENT_HANDLER,
        [OpenInference.ATTR_SPAN_KIND]: OpenInferenceSpanKind.CHAIN,
        ...(param.spanOptions?.attributes ?? {}),
        'workflow.run.id': this.runState.runId,
      },
    };
  }

  /**
   * Runs `operation` for `id` unless the task was already admitted in this run.
   *
   * Admission happens synchronously before the first suspension point, so two
   * calls started in the same tick can never both own the task.
   *
   * @returns The outcome recorded for `id`
   * @throws {InvariantViolation} When `id` is admitted but still in flight, which
   *         means two owners raced for the same task
   */
  async run(id: TaskIdentifier, operation: GuardedOperation): Promise<TaskOutcome> {
    return await ArvoOpenTelemetry.getInstance().startActiveSpan({
      ...createTelemetryConfig(`Task<${id}>`, this.spanOptions),
      fn: async (span) => {
        span.setAttribute('workflow.task.id', id);
        span.setStatus({ code: SpanStatusCode.OK });
        try {
          if (!this.runState.tryAdmit(id)) {
            return this.previousOutcome(id, span);
          }
          this.markAdmission(span, 'admitted');
          logToSpan({ level: 'INFO', message: `Task '${id}' admitted in run '${this.runState.runId}'` }, span);

          let outcome: TaskOutcome;
          try {
            outcome = success(await operation(span));
          } catch (error: unknown) {
            outcome = failure(errorMessage(error));
            if (isError(error)) exceptionToSpan(error, span);
            logToSpan({ level: 'ERROR', message: `Task '${id}' failed: ${outcome.message}` }, span);
          }

          this.runState.recordOutcome(id, outcome);
          this.markStatus(span, outcome);
          return outcome;
        } catch (error: unknown) {
          this.markViolation(span, error);
          throw error;
        } finally {
          span.end();
        }
      },
    });
  }

  /**
   * Admits `id` and records `failure(reason)` without invoking anything. A
   * skipped task reaches a terminal state like any other, so the join barrier
   * still sees it.
   *
   * @throws {InvariantViolation} When `id` is admitted but still in flight
   */
  skip(id: TaskIdentifier, reason: string): TaskOutcome {
    return ArvoOpenTelemetry.getInstance().startActiveSpan({
      ...createTelemetryConfig(`Task<${id}>`, this.spanOptions),
      fn: (span) => {
        span.setAttribute('workflow.task.id', id);
        span.setStatus({ code: SpanStatusCode.OK });
        try {
          if (!this.runState.tryAdmit(id)) {
            return this.previousOutcome(id, span);
          }
          this.markAdmission(span, 'skipped');
          const outcome = failure(reason);
          this.runState.recordOutcome(id, outcome);
          this.markStatus(span, outcome);
          logToSpan(
            {
              level: 'WARNING',
              message: `Task '${id}' skipped in run '${this.runState.runId}': ${reason}`,
            },
            span,
          );
          return outcome;
        } catch (error: unknown) {
          this.markViolation(span, error);
          throw error;
        } finally {
          span.end();
        }
      },
    });
  }

  private previousOutcome(id: TaskIdentifier, span: Span): TaskOutcome {
    const recorded = this.runState.getOutcome(id);
    if (!recorded) {
      throw new InvariantViolation(
        `Task '${id}' was admitted twice in run '${this.runState.runId}' while its first execution was still in flight`,
        { runId: this.runState.runId, taskId: id },
      );
    }
    this.markAdmission(span, 'duplicate');
    this.markStatus(span, recorded);
    logToSpan(
      {
        level: 'INFO',
        message: `Task '${id}' already executed in run '${this.runState.runId}'. Returning the recorded '${recorded.status}' outcome`,
      },
      span,
    );
    return recorded;
  }

  private markAdmission(span: Span, admission: TaskAdmission) {
    span.setAttribute('workflow.task.admission', admission);
  }

  private markStatus(span: Span, outcome: TaskOutcome) {
    span.setAttribute('workflow.task.status', outcome.status);
    if (outcome.status === 'failure') {
      span.setStatus({ code: SpanStatusCode.ERROR, message: outcome.message });
    }
  }

  private markViolation(span: Span, error: unknown) {
    const message = errorMessage(error);
    if (isError(error)) exceptionToSpan(error, span);
    span.setStatus({ code: SpanStatusCode.ERROR, message });
    logToSpan({ level: 'CRITICAL', message: `Task execution aborted: ${message}` }, span);
  }
}
