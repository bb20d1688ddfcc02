/**
 * Tracing utilities: a thin wrapper around the OpenTelemetry API.
 *
 * No SDK is registered by this project; spans are no-ops unless the host
 * process registers one before the CLI starts.
 */
import { trace, SpanStatusCode, type Span } from '@opentelemetry/api';

const TRACER_NAME = 'taskchat';

/** Get a tracer instance */
export function getTracer() {
  return trace.getTracer(TRACER_NAME);
}

/**
 * Wrap an async function in an OTel span.
 * Records errors and sets span status; the error is rethrown.
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = getTracer();
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      span.recordException(error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      span.end();
    }
  });
}
