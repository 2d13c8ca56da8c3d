/**
 * Configuration module: validates environment variables at startup.
 *
 * All config is sourced from process.env and validated eagerly.
 * Invalid values throw immediately so the process fails fast.
 */

import * as os from "node:os"
import * as path from "node:path"

import { isLogLevel, type LogLevel, type TracingExporterType } from "@webchat/shared/tracing"

import { BUILTIN_ADAPTERS } from "./adapters/index.js"

export interface TracingConfig {
  /** Whether OpenTelemetry tracing is enabled. */
  enabled: boolean
  /** OTLP collector traces endpoint URL. */
  endpoint: string
  /** Sampling rate: 0.0 to 1.0. */
  sampleRate: number
  /** Service name for the OTel resource. */
  serviceName: string
  exporterType: TracingExporterType
}

export interface BrowserConfig {
  /** Browser command line, e.g. "chromium" or "flatpak run org.chromium.Chromium". */
  command: string
  cdpHost: string
  cdpPort: number
  profileDir: string
  pidFile: string
  startTimeoutMs: number
  stopGraceMs: number
  /** Launch the browser when the daemon starts. */
  autostart: boolean
  /** Stop a browser this daemon launched when it shuts down. */
  stopOnExit: boolean
}

export interface Config {
  /** HTTP server port */
  port: number
  /** HTTP server host (bind address) */
  host: string
  /** Node environment (development, production, test) */
  nodeEnv: string
  logLevel: LogLevel
  browser: BrowserConfig
  /** Providers to serve, in order. */
  providers: string[]
  /** Stabilization poll interval. */
  pollIntervalMs: number
  healthCheckIntervalMs: number
  tracing: TracingConfig
}

const EXPORTER_TYPES: readonly string[] = ["otlp", "console", "both", "none"]

/**
 * Load and validate configuration from environment variables.
 * Throws if a value is present but invalid.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const exporterType = env.OTEL_EXPORTER_TYPE ?? "otlp"
  if (!isExporterType(exporterType)) {
    throw new Error(
      `Invalid OTEL_EXPORTER_TYPE: ${exporterType}. Must be "otlp", "console", "both", or "none".`,
    )
  }

  const logLevel = env.LOG_LEVEL ?? "info"
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${logLevel}. Must be "debug", "info", "warn", or "error".`)
  }

  const home = path.join(os.homedir(), ".webchat-bridge")

  return {
    port: parsePort("PORT", env.PORT, 8000),
    host: env.HOST ?? "127.0.0.1",
    nodeEnv: env.NODE_ENV ?? "development",
    logLevel,
    browser: {
      command: nonEmpty("BROWSER_CMD", env.BROWSER_CMD, "chromium"),
      cdpHost: env.CDP_HOST ?? "127.0.0.1",
      cdpPort: parsePort("CDP_PORT", env.CDP_PORT, 9223),
      profileDir: expandHome(env.BROWSER_PROFILE_DIR ?? path.join(home, "profile")),
      pidFile: expandHome(env.BROWSER_PID_FILE ?? path.join(home, "browser.pid")),
      startTimeoutMs: parsePositiveInt("BROWSER_START_TIMEOUT_MS", env.BROWSER_START_TIMEOUT_MS, 15_000),
      stopGraceMs: parsePositiveInt("BROWSER_STOP_GRACE_MS", env.BROWSER_STOP_GRACE_MS, 5_000),
      autostart: parseBool("BROWSER_AUTOSTART", env.BROWSER_AUTOSTART, true),
      stopOnExit: parseBool("BROWSER_STOP_ON_EXIT", env.BROWSER_STOP_ON_EXIT, true),
    },
    providers: parseProviders(env.BRIDGE_PROVIDERS),
    pollIntervalMs: parsePositiveInt("POLL_INTERVAL_MS", env.POLL_INTERVAL_MS, 200),
    healthCheckIntervalMs: parsePositiveInt(
      "HEALTH_CHECK_INTERVAL_MS",
      env.HEALTH_CHECK_INTERVAL_MS,
      30_000,
    ),
    tracing: {
      enabled: env.OTEL_TRACING_ENABLED === "true",
      endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318/v1/traces",
      sampleRate: parseFloatOr(env.OTEL_SAMPLE_RATE, 1.0),
      serviceName: env.OTEL_SERVICE_NAME ?? "webchat-bridge-daemon",
      exporterType,
    },
  }
}

function isExporterType(value: string): value is TracingExporterType {
  return EXPORTER_TYPES.includes(value)
}

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: ${value}. Must be a positive integer.`)
  }
  return parsed
}

function parsePort(name: string, value: string | undefined, fallback: number): number {
  const port = parsePositiveInt(name, value, fallback)
  if (port > 65_535) {
    throw new Error(`Invalid ${name}: ${value}. Must be a TCP port.`)
  }
  return port
}

function parseFloatOr(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = parseFloat(value)
  if (Number.isNaN(parsed)) return fallback
  return Math.max(0, Math.min(1, parsed))
}

function parseBool(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback
  if (value === "true" || value === "1") return true
  if (value === "false" || value === "0") return false
  throw new Error(`Invalid ${name}: ${value}. Must be "true" or "false".`)
}

function nonEmpty(name: string, value: string | undefined, fallback: string): string {
  if (value === undefined) return fallback
  if (!value.trim()) throw new Error(`${name} must not be empty`)
  return value.trim()
}

function expandHome(p: string): string {
  if (p === "~") return os.homedir()
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2))
  return p
}

function parseProviders(value: string | undefined): string[] {
  const known = Object.keys(BUILTIN_ADAPTERS)
  if (value === undefined || !value.trim()) return known

  const requested = [
    ...new Set(
      value
        .split(",")
        .map((p) => p.trim().toLowerCase())
        .filter(Boolean),
    ),
  ]
  const unknown = requested.filter((p) => !known.includes(p))
  if (unknown.length > 0) {
    throw new Error(
      `Unknown provider(s) in BRIDGE_PROVIDERS: ${unknown.join(", ")}. Known: ${known.join(", ")}.`,
    )
  }
  return requested
}
