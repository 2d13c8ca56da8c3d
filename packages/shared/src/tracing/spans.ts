/**
 * Tracing span helpers: typed wrappers around the OpenTelemetry API.
 *
 * These helpers keep instrumentation call-sites concise and ensure
 * consistent attribute naming across the bridge packages.
 */

import { type Attributes, type Span, SpanStatusCode, trace } from "@opentelemetry/api"

// ──────────────────────────────────────────────────
// Semantic Attribute Constants
// ──────────────────────────────────────────────────

export const BridgeAttributes = {
  PROVIDER: "webchat.provider",
  REQUEST_ID: "webchat.request.id",
  INTERACTION_STATE: "webchat.interaction.state",
  INTERACTION_OUTCOME: "webchat.interaction.outcome",
  ERROR_KIND: "webchat.error.kind",
  ERROR_STAGE: "webchat.error.stage",
  WAIT_FOR_RESPONSE: "webchat.wait_for_response",
  TIMEOUT_SECONDS: "webchat.timeout_seconds",
  TOKEN_SENT: "webchat.tokens.sent",
  TOKEN_RESPONSE: "webchat.tokens.response",
  CONTROL_ENDPOINT: "webchat.browser.control_endpoint",
} as const

// ──────────────────────────────────────────────────
// Tracer
// ──────────────────────────────────────────────────

const TRACER_NAME = "webchat-bridge"

function getTracer() {
  return trace.getTracer(TRACER_NAME)
}

// ──────────────────────────────────────────────────
// withSpan
// ──────────────────────────────────────────────────

/**
 * Execute an async function inside a new span.
 *
 * On success the span ends with OK status; on error it records the
 * exception and sets ERROR status before re-throwing.
 *
 * ```ts
 * const result = await withSpan("webchat.transport.send", { [BridgeAttributes.PROVIDER]: "claude" }, async (span) => {
 *   // ... instrumented work
 * })
 * ```
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = getTracer()
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span)
      span.setStatus({ code: SpanStatusCode.OK })
      return result
    } catch (err) {
      span.setStatus({ code: SpanStatusCode.ERROR, message: String(err) })
      if (err instanceof Error) {
        span.recordException(err)
      }
      throw err
    } finally {
      span.end()
    }
  })
}

// ──────────────────────────────────────────────────
// Utility
// ──────────────────────────────────────────────────

/** Add attributes to the current active span. */
export function setSpanAttributes(attributes: Attributes): void {
  const span = trace.getActiveSpan()
  if (span) {
    span.setAttributes(attributes)
  }
}

/** Record an event (log-style annotation) on the current active span. */
export function addSpanEvent(name: string, attributes?: Attributes): void {
  const span = trace.getActiveSpan()
  if (span) {
    span.addEvent(name, attributes)
  }
}
