import { Attributes, Span, SpanStatusCode, trace } from '@opentelemetry/api';
import { errorMessage } from '../common/errors';

type SpanAttributes = Record<string, string | number | boolean | undefined>;

const TRACER_NAME = 'deny-guard';

function toAttributes(attributes: SpanAttributes | undefined): Attributes | undefined {
  return attributes
    ? Object.fromEntries(
        Object.entries(attributes).filter((entry): entry is [string, string | number | boolean] =>
          entry[1] !== undefined,
        ),
      )
    : undefined;
}

function recordFailure(span: Span, error: unknown): void {
  if (error instanceof Error) {
    span.recordException(error);
  }
  span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(error) });
}

export function withSpan<T>(name: string, attributes: SpanAttributes | undefined, fn: () => Promise<T>): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);

  return new Promise<T>((resolve, reject) => {
    tracer.startActiveSpan(name, { attributes: toAttributes(attributes) }, (span) => {
      fn()
        .then((result) => {
          span.setStatus({ code: SpanStatusCode.OK });
          resolve(result);
        })
        .catch((error: unknown) => {
          recordFailure(span, error);
          reject(error);
        })
        .finally(() => {
          span.end();
        });
    });
  });
}

/** Synchronous variant for CPU-bound steps such as compilation. */
export function withSpanSync<T>(name: string, attributes: SpanAttributes | undefined, fn: () => T): T {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes: toAttributes(attributes) }, (span) => {
    try {
      const result = fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      recordFailure(span, error);
      throw error;
    } finally {
      span.end();
    }
  });
}
