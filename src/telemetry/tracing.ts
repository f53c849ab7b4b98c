import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { defaultResource, resourceFromAttributes } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { trace, context, SpanStatusCode, SpanKind } from '@opentelemetry/api';
import type { Attributes, Span, Tracer } from '@opentelemetry/api';
import { BatchSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { errorMessage } from '../common/logger.js';

const SERVICE_NAME = 'image-tools-mcp';
const SERVICE_VERSION = '0.1.0';
const DEFAULT_OTLP_ENDPOINT = 'http://localhost:4318/v1/traces';

let sdk: NodeSDK | null = null;
let tracer: Tracer | null = null;

/**
 * Initialize OpenTelemetry with an OTLP/HTTP exporter.
 * Off unless OTEL_ENABLED=true; OTEL_EXPORTER_OTLP_TRACES_ENDPOINT picks the collector,
 * OTEL_DEBUG=true prints diagnostics to stderr. Returns whether tracing started.
 */
export function initTelemetry(env: NodeJS.ProcessEnv = process.env): boolean {
  const otlpEndpoint = env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT || DEFAULT_OTLP_ENDPOINT;
  const debug = env.OTEL_DEBUG === 'true';

  if (env.OTEL_ENABLED !== 'true') {
    if (debug) console.error('[Telemetry] OpenTelemetry disabled. Set OTEL_ENABLED=true to enable.');
    return false;
  }

  try {
    const resource = defaultResource().merge(
      resourceFromAttributes({
        [ATTR_SERVICE_NAME]: SERVICE_NAME,
        [ATTR_SERVICE_VERSION]: SERVICE_VERSION,
        environment: env.NODE_ENV || 'development',
      })
    );

    sdk = new NodeSDK({
      resource,
      spanProcessors: [new BatchSpanProcessor(new OTLPTraceExporter({ url: otlpEndpoint }))],
    });
    sdk.start();

    tracer = trace.getTracer(SERVICE_NAME, SERVICE_VERSION);

    if (debug) {
      console.error(`[Telemetry] OpenTelemetry exporting to ${otlpEndpoint}`);
    }
    return true;
  } catch (error) {
    console.error('[Telemetry] Failed to initialize OpenTelemetry:', error);
    return false;
  }
}

/**
 * Get the global tracer instance
 */
function getTracer(): Tracer {
  if (!tracer) {
    // no-op until initTelemetry registers a provider
    tracer = trace.getTracer(SERVICE_NAME, SERVICE_VERSION);
  }
  return tracer;
}

function startSpan(name: string, attributes?: Attributes, kind: SpanKind = SpanKind.INTERNAL): Span {
  return getTracer().startSpan(name, { kind, attributes });
}

/**
 * Run a function within a span context
 */
export async function withSpan<T>(name: string, fn: (span: Span) => Promise<T>, attributes?: Attributes): Promise<T> {
  const span = startSpan(name, attributes);

  try {
    const result = await context.with(trace.setSpan(context.active(), span), () => fn(span));
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    span.recordException(error instanceof Error ? error : String(error));
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: errorMessage(error),
    });
    throw error;
  } finally {
    span.end();
  }
}

export function addSpanEvent(name: string, attributes?: Attributes) {
  trace.getActiveSpan()?.addEvent(name, attributes);
}

export async function shutdownTelemetry(): Promise<void> {
  if (sdk) {
    await sdk.shutdown();
    sdk = null;
    console.error('[Telemetry] OpenTelemetry shut down');
  }
}
