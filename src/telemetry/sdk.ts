import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { defaultResource, resourceFromAttributes } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { BatchSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { resetTracer } from './tracing';

export interface TelemetryConfig {
  serviceName?: string;
  otlpEndpoint?: string;
  enabled?: boolean;
  debug?: boolean;
}

let sdk: NodeSDK | null = null;

/**
 * Start the OpenTelemetry Node SDK with an OTLP/HTTP exporter. Does nothing
 * unless OTEL_ENABLED=true or `enabled` is set.
 */
export function initTelemetry(config: TelemetryConfig = {}): boolean {
  const {
    serviceName = 'photo-effects',
    otlpEndpoint = process.env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT || 'http://localhost:4318/v1/traces',
    enabled = process.env.OTEL_ENABLED === 'true',
    debug = process.env.OTEL_DEBUG === 'true',
  } = config;

  if (!enabled || sdk) return !!sdk;

  const resource = defaultResource().merge(
    resourceFromAttributes({
      [ATTR_SERVICE_NAME]: serviceName,
      [ATTR_SERVICE_VERSION]: '0.1.0',
      environment: process.env.NODE_ENV || 'development',
    })
  );

  sdk = new NodeSDK({
    resource,
    spanProcessors: [new BatchSpanProcessor(new OTLPTraceExporter({ url: otlpEndpoint }))],
  });
  sdk.start();
  resetTracer();

  if (debug) {
    console.error(`[Telemetry] exporting traces to ${otlpEndpoint}`);
  }
  return true;
}

export async function shutdownTelemetry(): Promise<void> {
  if (sdk) {
    await sdk.shutdown();
    sdk = null;
  }
}
