import { type SpanOptions, context } from '@opentelemetry/api';

/**
 * Checks if the item is null or undefined.
 *
 * @param item - The value to check.
 * @returns True if the item is null or undefined, false otherwise.
 */
export function isNullOrUndefined(item: unknown): item is null | undefined {
  return item === null || item === undefined;
}

/**
 * Returns the provided value if it's not null or undefined; otherwise, returns the default value.
 *
 * @template T - The type of the value and default value.
 * @param value - The value to check.
 * @param defaultValue - The default value to return if the provided value is null or undefined.
 */
export function getValueOrDefault<T>(value: T | null | undefined, defaultValue: NonNullable<T>): NonNullable<T> {
  return value ?? defaultValue;
}

export const isError = (value: unknown): value is Error => value instanceof Error;

/**
 * Extracts a human readable message from anything a task operation may throw.
 * Task operations are external code, so a thrown string or plain object is
 * possible and still has to become a failure message.
 */
export const errorMessage = (value: unknown): string => {
  if (isError(value)) return value.message || value.name;
  if (typeof value === 'string') return value;
  return `Non-Error value thrown: ${typeof value} (${String(value)})`;
};

/**
 * Returns the caller-supplied input, or null when it is missing. Whitespace-only
 * strings count as missing.
 */
export const resolveInput = (value: string | null | undefined): string | null => {
  if (isNullOrUndefined(value) || value.trim().length === 0) return null;
  return value;
};

/**
 * Builds the `startActiveSpan` configuration shared by runs and tasks. Spans
 * inherit the currently active OpenTelemetry context, so a task span nests
 * under the run span that admitted it.
 */
export const createTelemetryConfig = (name: string, options: SpanOptions) => ({
  name: name,
  disableSpanManagement: true,
  spanOptions: options,
  context: {
    inheritFrom: 'CONTEXT' as const,
    context: context.active(),
  },
});
