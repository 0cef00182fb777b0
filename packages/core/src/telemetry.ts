import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-grpc';
import { PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { trace, metrics } from '@opentelemetry/api';
import type { Tracer, Meter } from '@opentelemetry/api';

let sdk: NodeSDK | undefined;

export interface TelemetryOptions {
  serviceName: string;
  /** OTLP gRPC collector URL. Telemetry stays disabled without one. */
  otlpEndpoint?: string;
  /** How often metrics are pushed to the collector. */
  metricExportIntervalMs?: number;
}

/**
 * Initialise the OpenTelemetry SDK with OTLP gRPC exporters.
 *
 * Returns `false` without starting anything when no endpoint is configured;
 * the OTel API then hands out no-op tracers and meters.
 */
export function initTelemetry(opts: TelemetryOptions): boolean {
  if (sdk) {
    throw new Error('initTelemetry() has already been called. Call shutdownTelemetry() first.');
  }
  if (!opts.otlpEndpoint) return false;

  sdk = new NodeSDK({
    serviceName: opts.serviceName,
    traceExporter: new OTLPTraceExporter({ url: opts.otlpEndpoint }),
    metricReader: new PeriodicExportingMetricReader({
      exporter: new OTLPMetricExporter({ url: opts.otlpEndpoint }),
      exportIntervalMillis: opts.metricExportIntervalMs ?? 60_000,
    }),
  });
  sdk.start();
  return true;
}

/**
 * Flush pending spans and metrics and stop the SDK. Resolves immediately if
 * telemetry was never started.
 */
export async function shutdownTelemetry(): Promise<void> {
  const instance = sdk;
  sdk = undefined;
  await instance?.shutdown();
}

/** Obtain a Tracer scoped to the given name (usually the package name). */
export function getTracer(name: string): Tracer {
  return trace.getTracer(name);
}

/** Obtain a Meter scoped to the given name (usually the package name). */
export function getMeter(name: string): Meter {
  return metrics.getMeter(name);
}
