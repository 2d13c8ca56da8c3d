export { DEFAULT_TRACING_CONFIG, initTracing, shutdownTracing } from "./init.js"
export type { TracingConfig, TracingExporterType } from "./init.js"
export { isLogLevel, TracingLogger } from "./logger.js"
export type { LogLevel, TracingLoggerOptions } from "./logger.js"
export { addSpanEvent, BridgeAttributes, setSpanAttributes, withSpan } from "./spans.js"
