/**
 * OpenTelemetry SDK initialization.
 *
 * Call `initTracing()` once before the daemon starts its HTTP server.
 * Call `shutdownTracing()` during graceful shutdown to flush buffered spans.
 *
 * When tracing is disabled the OTel API falls back to no-op
 * implementations, so `withSpan` call-sites need no guards.
 */

import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http"
import { FastifyInstrumentation } from "@opentelemetry/instrumentation-fastify"
import { HttpInstrumentation } from "@opentelemetry/instrumentation-http"
import { resourceFromAttributes } from "@opentelemetry/resources"
import { NodeSDK } from "@opentelemetry/sdk-node"
import {
  AlwaysOnSampler,
  BatchSpanProcessor,
  ConsoleSpanExporter,
  ParentBasedSampler,
  SimpleSpanProcessor,
  type SpanProcessor,
  TraceIdRatioBasedSampler,
} from "@opentelemetry/sdk-trace-node"
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions"

export type TracingExporterType = "otlp" | "console" | "both" | "none"

export interface TracingConfig {
  /** Enable tracing (default: false) */
  enabled: boolean
  /** OTLP collector traces endpoint (default: http://localhost:4318/v1/traces) */
  endpoint: string
  /** Sampling rate 0.0–1.0 (default: 1.0) */
  sampleRate: number
  /** Service name for resource attribution */
  serviceName: string
  /** Service version for resource attribution */
  serviceVersion: string
  exporterType: TracingExporterType
}

export const DEFAULT_TRACING_CONFIG: TracingConfig = {
  enabled: false,
  endpoint: "http://localhost:4318/v1/traces",
  sampleRate: 1.0,
  serviceName: "webchat-bridge-daemon",
  serviceVersion: "0.1.0",
  exporterType: "otlp",
}

let sdk: NodeSDK | undefined

/**
 * Initialize the OpenTelemetry SDK. Returns true when an SDK was started.
 * Subsequent calls are no-ops until `shutdownTracing()` runs.
 */
export function initTracing(config: Partial<TracingConfig> = {}): boolean {
  if (sdk) return false

  const resolved: TracingConfig = { ...DEFAULT_TRACING_CONFIG, ...config }
  if (!resolved.enabled || resolved.exporterType === "none") {
    return false
  }

  const resource = resourceFromAttributes({
    [ATTR_SERVICE_NAME]: resolved.serviceName,
    [ATTR_SERVICE_VERSION]: resolved.serviceVersion,
  })

  const sampler =
    resolved.sampleRate >= 1.0
      ? new AlwaysOnSampler()
      : new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(resolved.sampleRate) })

  const spanProcessors: SpanProcessor[] = []
  if (resolved.exporterType === "console" || resolved.exporterType === "both") {
    spanProcessors.push(new SimpleSpanProcessor(new ConsoleSpanExporter()))
  }
  if (resolved.exporterType === "otlp" || resolved.exporterType === "both") {
    spanProcessors.push(new BatchSpanProcessor(new OTLPTraceExporter({ url: resolved.endpoint })))
  }

  sdk = new NodeSDK({
    resource,
    sampler,
    spanProcessors,
    instrumentations: [new HttpInstrumentation(), new FastifyInstrumentation()],
  })

  sdk.start()
  return true
}

/** Flush buffered spans and stop the SDK. Safe to call when never started. */
export async function shutdownTracing(): Promise<void> {
  if (!sdk) return
  try {
    await sdk.shutdown()
  } finally {
    sdk = undefined
  }
}
