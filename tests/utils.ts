import { InMemorySpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { isViolationError } from 'arvo-core';

// In-memory exporter so specs can assert on finished spans
export const spanExporter = new InMemorySpanExporter();

const provider = new NodeTracerProvider();
provider.addSpanProcessor(new SimpleSpanProcessor(spanExporter));

export const telemetrySdkStart = () => {
  provider.register();
};

export const telemetrySdkStop = async () => {
  await provider.shutdown();
};

export const promiseTimeout = (timeout = 10) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, timeout);
  });

/** Returns whatever `fn` throws or rejects with; fails when it completes */
export const captureError = async (fn: () => unknown): Promise<unknown> => {
  try {
    await fn();
  } catch (error: unknown) {
    return error;
  }
  throw new Error('Expected the call to throw');
};

export const expectViolation = (error: unknown, type: 'Invariant' | 'Config' | 'Contract') => {
  expect(isViolationError(error)).toBe(true);
  expect(error).toMatchObject({ type });
};
