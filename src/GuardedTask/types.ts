import type { Span, SpanOptions } from '@opentelemetry/api';
import type { IRunState } from '../RunState/types';

/**
 * The wrapped unit of work. It receives the task span so it can log
 * against it with `logToSpan`, and resolves with the task payload.
 */
export type GuardedOperation = (span: Span) => Promise<string>;

export type GuardedTaskParam = {
  /** State of the run the task belongs to */
  runState: IRunState;
  /** Span options applied to every task span */
  spanOptions?: SpanOptions;
};

/** How a call to the guarded task was treated */
export type TaskAdmission = 'admitted' | 'duplicate' | 'skipped';
