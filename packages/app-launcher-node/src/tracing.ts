import { SpanKind, SpanStatusCode, type Span, type SpanOptions } from '@opentelemetry/api';

export type SpanAttributeValue = string | number | boolean;

export type SpanAttributes = Record<string, SpanAttributeValue>;

export interface RequestSpan {
  setAttribute(key: string, value: SpanAttributeValue): void;
  recordError(message: string): void;
  /** Ends the span; a 5xx status code marks it as failed. */
  end(statusCode?: number): void;
}

export interface TracingProvider {
  startRequestSpan(name: string, attributes?: SpanAttributes): RequestSpan;
}

export type TracerSpan = Pick<Span, 'setAttribute' | 'setStatus' | 'recordException' | 'end'>;

export interface SpanTracer {
  startSpan(name: string, options?: SpanOptions): TracerSpan;
}

export interface OpenTelemetryTracingConfig {
  /** Usually `trace.getTracer(serviceName)`; exporter and SDK setup stay with the caller. */
  tracer: SpanTracer;
}

export function createOpenTelemetryTracingProvider(config: OpenTelemetryTracingConfig): TracingProvider {
  return {
    startRequestSpan(name, attributes = {}) {
      const span = config.tracer.startSpan(name, { kind: SpanKind.SERVER, attributes });
      let failed = false;

      return {
        setAttribute(key, value) {
          span.setAttribute(key, value);
        },

        recordError(message) {
          failed = true;
          span.recordException(message);
          span.setStatus({ code: SpanStatusCode.ERROR, message });
        },

        end(statusCode) {
          if (statusCode !== undefined) {
            span.setAttribute('http.status_code', statusCode);
            if (statusCode >= 500 && !failed) {
              span.setStatus({ code: SpanStatusCode.ERROR });
            }
          }
          span.end();
        },
      };
    },
  };
}
