import { Attributes, SpanStatusCode, trace } from '@opentelemetry/api';

type SpanAttributes = Record<string, string | number | boolean | undefined>;

const TRACER_NAME = 'git-revision-fs';

function toAttributes(attributes?: SpanAttributes): Attributes | undefined {
  if (!attributes) {
    return undefined;
  }
  return Object.fromEntries(
    Object.entries(attributes).filter((entry): entry is [string, string | number | boolean] =>
      entry[1] !== undefined,
    ),
  );
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
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
          const err = asError(error);
          span.recordException(err);
          span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
          reject(error);
        })
        .finally(() => {
          span.end();
        });
    });
  });
}
