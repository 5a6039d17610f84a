/**
 * Span helpers over the OpenTelemetry API
 *
 * Spans are no-ops until the host process registers an SDK, so the
 * server carries no exporter of its own.
 */

import { trace, SpanStatusCode, type Span, type Attributes } from '@opentelemetry/api';

export const TRACER_NAME = 'dice-mcp-server';

/**
 * Run `fn` inside an active span, recording its outcome.
 *
 * @example
 * ```typescript
 * const result = await withSpan('tools/call roll', { 'mcp.tool.name': 'roll' }, async (span) => {
 *   span.setAttribute('dice.total', 17);
 *   return execute();
 * });
 * ```
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : 'Unknown error',
      });
      span.recordException(error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      span.end();
    }
  });
}
