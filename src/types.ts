import type { SpanOptions } from '@opentelemetry/api';

/**
 * OpenTelemetry span configuration for a workflow run. The span name
 * is derived from the orchestrator name unless `spanName` overrides it.
 */
export type WorkflowOtelSpanOptions = SpanOptions & {
  spanName?: (param: {
    orchestratorName: string;
    runId: string;
  }) => string;
};
