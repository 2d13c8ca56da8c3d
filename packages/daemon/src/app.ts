import fastifyCors from "@fastify/cors"
import type { BrowserStatus } from "@webchat/shared/bridge"
import type { LogLevel } from "@webchat/shared/tracing"
import Fastify, { type FastifyInstance } from "fastify"

import type { BridgeService } from "./bridge-service.js"
import type { HealthStatus } from "./health/monitor.js"
import { bridgeRoutes } from "./routes/bridge.js"
import { healthRoutes } from "./routes/health.js"

export const DAEMON_VERSION = "0.1.0"

export interface AppOptions {
  service: BridgeService
  browser: { getStatus(): BrowserStatus }
  health: { getStatus(): HealthStatus }
  logLevel?: LogLevel
  /** Fastify's own logger; off in tests. */
  logger?: boolean
  startedAt?: Date
}

export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger === false ? false : { level: options.logLevel ?? "info" },
  })

  // Local clients only; the daemon binds to loopback by default
  await app.register(fastifyCors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
  })

  const startedAt = options.startedAt ?? new Date()

  await app.register(
    healthRoutes({
      browser: options.browser,
      health: options.health,
      version: DAEMON_VERSION,
      startedAt,
    }),
  )
  await app.register(
    bridgeRoutes({
      service: options.service,
      health: options.health,
      version: DAEMON_VERSION,
      startedAt,
    }),
  )

  return app
}
