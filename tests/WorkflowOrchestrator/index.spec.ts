import { z } from 'zod';
import {
  type ConsumerOperationParam,
  InvariantViolation,
  type TaskOutcome,
  WorkflowOrchestrator,
  createWorkflowOrchestrator,
} from '../../src';
import * as coordinator from '../../src/Coordinator';
import { captureError, expectViolation, promiseTimeout, spanExporter, telemetrySdkStart, telemetrySdkStop } from '../utils';

type Id = 'producer-a' | 'producer-b' | 'producer-c';
type Key = 'a' | 'b' | 'c';

describe('WorkflowOrchestrator', () => {
  beforeAll(() => {
    telemetrySdkStart();
  });

  afterAll(async () => {
    await telemetrySdkStop();
  });

  const createScenario = () => {
    const received: Record<string, TaskOutcome>[] = [];
    const producerA = jest.fn(async () => 'A1');
    const producerB = jest.fn(async () => 'B1');
    const producerC = jest.fn(async () => 'C1');
    const orchestrator = createWorkflowOrchestrator<Id, Key>({
      name: 'scenario.example',
      timeoutMs: 1000,
      producers: [
        { id: 'producer-a', inputKey: 'a', operation: producerA },
        { id: 'producer-b', inputKey: 'b', operation: producerB },
        { id: 'producer-c', inputKey: 'c', operation: producerC },
      ],
      consumer: {
        id: 'compose',
        operation: async ({ outcomes }: ConsumerOperationParam<Id>) => {
          received.push(Object.fromEntries(outcomes));
          return 'composed';
        },
      },
    });
    return { orchestrator, received, producerA, producerB, producerC };
  };

  it('should compose the joined producer outcomes with a skipped producer marked as failed', async () => {
    const { orchestrator, received, producerB } = createScenario();

    const result = await orchestrator.runWorkflow({ inputs: { a: 'ok', c: 'ok' } });

    expect(result.outcome).toEqual({ status: 'success', payload: 'composed' });
    expect(producerB).not.toHaveBeenCalled();
    expect(received).toEqual([
      {
        'producer-a': { status: 'success', payload: 'A1' },
        'producer-b': { status: 'failure', message: 'no input provided' },
        'producer-c': { status: 'success', payload: 'C1' },
      },
    ]);
    expect(result.tasks).toEqual({
      'producer-a': { status: 'success', payload: 'A1' },
      'producer-b': { status: 'failure', message: 'no input provided' },
      'producer-c': { status: 'success', payload: 'C1' },
      compose: { status: 'success', payload: 'composed' },
    });
  });

  it('should run every invocation on a fresh run state', async () => {
    const { orchestrator, received, producerA, producerC } = createScenario();

    const first = await orchestrator.runWorkflow({ inputs: { a: 'ok', c: 'ok' } });
    const second = await orchestrator.runWorkflow({ inputs: { a: 'ok', c: 'ok' } });

    expect(first.outcome).toEqual({ status: 'success', payload: 'composed' });
    expect(second.outcome).toEqual({ status: 'success', payload: 'composed' });
    expect(first.runId).not.toBe(second.runId);
    expect(producerA).toHaveBeenCalledTimes(2);
    expect(producerC).toHaveBeenCalledTimes(2);
    expect(received).toHaveLength(2);
    expect(received[1]).toEqual(received[0]);
  });

  it('should keep concurrent runs isolated', async () => {
    const calls: string[] = [];
    const orchestrator = createWorkflowOrchestrator<Id, Key>({
      name: 'scenario.concurrent',
      producers: [
        {
          id: 'producer-a',
          inputKey: 'a',
          operation: async ({ input, runId }) => {
            calls.push(runId);
            await promiseTimeout(10);
            return `A:${input}`;
          },
        },
      ],
      consumer: {
        id: 'compose',
        operation: async ({ outcomes }) => {
          const outcome = outcomes.get('producer-a');
          return outcome?.status === 'success' ? outcome.payload : 'missing';
        },
      },
    });

    const [left, right] = await Promise.all([
      orchestrator.runWorkflow({ inputs: { a: 'left' } }),
      orchestrator.runWorkflow({ inputs: { a: 'right' } }),
    ]);

    expect(left.outcome).toEqual({ status: 'success', payload: 'A:left' });
    expect(right.outcome).toEqual({ status: 'success', payload: 'A:right' });
    expect(calls.sort()).toEqual([left.runId, right.runId].sort());
  });

  it('should surface a consumer failure as the run outcome', async () => {
    const orchestrator = createWorkflowOrchestrator<Id, Key>({
      name: 'scenario.failure',
      producers: [{ id: 'producer-a', inputKey: 'a', operation: async () => 'A1' }],
      consumer: {
        id: 'compose',
        operation: async () => {
          throw new Error('compose rejected the inputs');
        },
      },
    });

    const result = await orchestrator.runWorkflow({ inputs: { a: 'ok' } });

    expect(result.outcome).toEqual({ status: 'failure', message: 'compose rejected the inputs' });
    expect(result.tasks['producer-a']).toEqual({ status: 'success', payload: 'A1' });
  });

  it('should return a timeout at the deadline when a producer never completes', async () => {
    const signals: AbortSignal[] = [];
    const compose = jest.fn(async () => 'composed');
    const orchestrator = createWorkflowOrchestrator<Id, Key>({
      name: 'scenario.timeout',
      timeoutMs: 50,
      producers: [
        { id: 'producer-a', inputKey: 'a', operation: async () => 'A1' },
        {
          id: 'producer-b',
          inputKey: 'b',
          operation: ({ signal }) => {
            signals.push(signal);
            return new Promise<string>(() => {});
          },
        },
      ],
      consumer: { id: 'compose', operation: compose },
    });

    const startedAt = Date.now();
    const result = await orchestrator.runWorkflow({ inputs: { a: 'ok', b: 'ok' } });
    const elapsed = Date.now() - startedAt;

    expect(result.outcome).toEqual({
      status: 'timeout',
      message: 'Workflow did not complete within 50ms',
      timeoutMs: 50,
    });
    expect(elapsed).toBeGreaterThanOrEqual(45);
    expect(elapsed).toBeLessThan(1000);
    expect(result.tasks).toEqual({
      'producer-a': { status: 'success', payload: 'A1' },
      'producer-b': null,
      compose: null,
    });
    expect(compose).not.toHaveBeenCalled();
    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
  });

  it('should let abandoned work settle without running the consumer', async () => {
    const compose = jest.fn(async () => 'composed');
    const orchestrator = createWorkflowOrchestrator<Id, Key>({
      name: 'scenario.abandoned',
      timeoutMs: 20,
      producers: [
        {
          id: 'producer-a',
          inputKey: 'a',
          operation: async () => {
            await promiseTimeout(60);
            return 'A1';
          },
        },
      ],
      consumer: { id: 'compose', operation: compose },
    });

    const result = await orchestrator.runWorkflow({ inputs: { a: 'ok' } });
    await promiseTimeout(80);

    expect(result.outcome.status).toBe('timeout');
    expect(result.tasks).toEqual({ 'producer-a': null, compose: null });
    expect(compose).not.toHaveBeenCalled();
  });

  it('should contain an execution rejecting after the deadline', async () => {
    const unhandled = jest.fn();
    process.on('unhandledRejection', unhandled);
    const execute = jest.spyOn(coordinator, 'executeCoordinator').mockImplementationOnce(async () => {
      await promiseTimeout(40);
      throw new InvariantViolation("Task 'producer-a' recorded an outcome twice");
    });
    const orchestrator = createWorkflowOrchestrator<Id, Key>({
      name: 'scenario.late.rejection',
      timeoutMs: 15,
      producers: [{ id: 'producer-a', inputKey: 'a', operation: async () => 'A1' }],
      consumer: { id: 'compose', operation: async () => 'composed' },
    });

    try {
      const result = await orchestrator.runWorkflow({ inputs: { a: 'ok' } });
      await promiseTimeout(60);

      expect(execute).toHaveBeenCalledTimes(1);
      expect(result.outcome).toEqual({
        status: 'timeout',
        message: 'Workflow did not complete within 15ms',
        timeoutMs: 15,
      });
      expect(result.tasks).toEqual({ 'producer-a': null, compose: null });
      expect(unhandled).not.toHaveBeenCalled();
    } finally {
      process.off('unhandledRejection', unhandled);
      execute.mockRestore();
    }
  });

  it('should apply a per-run deadline override', async () => {
    const orchestrator = createWorkflowOrchestrator<Id, Key>({
      name: 'scenario.override',
      timeoutMs: 10_000,
      producers: [{ id: 'producer-a', inputKey: 'a', operation: () => new Promise<string>(() => {}) }],
      consumer: { id: 'compose', operation: async () => 'composed' },
    });

    const result = await orchestrator.runWorkflow({ inputs: { a: 'ok' } }, { timeoutMs: 25 });

    expect(result.outcome).toEqual({
      status: 'timeout',
      message: 'Workflow did not complete within 25ms',
      timeoutMs: 25,
    });
  });

  it('should reject an invalid per-run deadline override', async () => {
    const { orchestrator, producerA } = createScenario();

    for (const timeoutMs of [0, 2_147_483_648, 30 * 24 * 3600 * 1000]) {
      expectViolation(await captureError(() => orchestrator.runWorkflow({ inputs: { a: 'ok' } }, { timeoutMs })), 'Config');
    }
    expect(producerA).not.toHaveBeenCalled();
  });

  it('should drop null extras and pass the rest to the consumer', async () => {
    const seen: Record<string, string>[] = [];
    const orchestrator = createWorkflowOrchestrator<Id, Key>({
      name: 'scenario.extras',
      producers: [{ id: 'producer-a', inputKey: 'a', operation: async () => 'A1' }],
      consumer: {
        id: 'compose',
        operation: async ({ extras }) => {
          seen.push({ ...extras });
          return 'composed';
        },
      },
    });

    await orchestrator.runWorkflow({
      inputs: { a: 'ok' },
      extras: { userFeedback: 'Shorter summary', userAdditions: null, oldResumeText: undefined },
    });

    expect(seen).toEqual([{ userFeedback: 'Shorter summary' }]);
  });

  it('should reject inputs failing the input schema before admitting any task', async () => {
    const producerA = jest.fn(async () => 'A1');
    const orchestrator = createWorkflowOrchestrator<Id, Key>({
      name: 'scenario.schema',
      inputSchema: z.object({ a: z.string().url() }),
      producers: [{ id: 'producer-a', inputKey: 'a', operation: producerA }],
      consumer: { id: 'compose', operation: async () => 'composed' },
    });

    expectViolation(await captureError(() => orchestrator.runWorkflow({ inputs: { a: 'not a url' } })), 'Contract');
    expect(producerA).not.toHaveBeenCalled();
  });

  it('should abort the run with an InvariantViolation when two producers race for one identifier', async () => {
    const compose = jest.fn(async () => 'composed');
    const orchestrator = new WorkflowOrchestrator<Id, Key>({
      name: 'scenario.invariant',
      timeoutMs: 1000,
      producers: [
        { id: 'producer-a', inputKey: 'a', operation: async () => 'A1' },
        { id: 'producer-a', inputKey: 'b', operation: async () => 'A2' },
      ],
      consumer: { id: 'compose', operation: compose },
    });

    expectViolation(await captureError(() => orchestrator.runWorkflow({ inputs: { a: 'ok', b: 'ok' } })), 'Invariant');
    expect(compose).not.toHaveBeenCalled();
  });

  it('should record the run outcome on the run span', async () => {
    const { orchestrator } = createScenario();

    const result = await orchestrator.runWorkflow({ inputs: { a: 'ok', c: 'ok' } });

    const runSpan = spanExporter
      .getFinishedSpans()
      .find((span) => span.name === 'Workflow<scenario.example>' && span.attributes['workflow.run.id'] === result.runId);
    expect(runSpan?.attributes['workflow.run.status']).toBe('success');
    expect(runSpan?.attributes['workflow.orchestrator.name']).toBe('scenario.example');
  });
});
