/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Spans are created through the global tracer of `@opentelemetry/api`; the
 * host application registers its own SDK and exporter. Tracing is a no-op
 * unless OTEL_ENABLED=1 (or true).
 */

import { trace, SpanStatusCode, SpanKind } from '@opentelemetry/api';
import type { Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'bleemeo-api-client';

export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Unique id sent as X-Request-ID and used to correlate log lines
 */
export function generateRequestId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      if (error instanceof Error) span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Span around one HTTP send (a logical call may produce several)
 */
export async function withHttpSpan<T>(
  method: string,
  url: string,
  attempt: number,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, {
    'http.method': method,
    'http.url': url,
    'http.retry_count': attempt,
    'span.kind': SpanKind.CLIENT,
  });
}

/**
 * Span around a token endpoint exchange
 */
export async function withOAuthSpan<T>(
  grant: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`OAuth ${grant}`, fn, {
    'oauth.grant_type': grant,
  });
}
