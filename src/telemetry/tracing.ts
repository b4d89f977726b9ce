import { trace, context, SpanStatusCode, SpanKind, type Attributes, type Span, type Tracer } from '@opentelemetry/api';

export const TRACER_NAME = 'photofunia-effects';

let tracer: Tracer | null = null;

/**
 * Get the tracer. Without a registered SDK this is the API's no-op tracer.
 */
export function getTracer(): Tracer {
  if (!tracer) {
    tracer = trace.getTracer(TRACER_NAME, '0.1.0');
  }
  return tracer;
}

/** Forget the cached tracer, e.g. after a provider was registered. */
export function resetTracer() {
  tracer = null;
}

export function startSpan(name: string, attributes?: Attributes, kind: SpanKind = SpanKind.INTERNAL): Span {
  return getTracer().startSpan(name, { kind, attributes });
}

/**
 * Run a function within a span context
 */
export async function withSpan<T>(name: string, fn: (span: Span) => Promise<T>, attributes?: Attributes): Promise<T> {
  const span = startSpan(name, attributes, SpanKind.CLIENT);

  try {
    const result = await context.with(trace.setSpan(context.active(), span), () => fn(span));
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    span.recordException(err);
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: err.message,
    });
    throw error;
  } finally {
    span.end();
  }
}
