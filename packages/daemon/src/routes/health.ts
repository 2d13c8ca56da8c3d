import type { BrowserStatus } from "@webchat/shared/bridge"
import type { FastifyInstance } from "fastify"

import type { HealthStatus } from "../health/monitor.js"

export interface HealthRouteDeps {
  browser: { getStatus(): BrowserStatus }
  health: { getStatus(): HealthStatus }
  version: string
  startedAt: Date
}

export function uptimeSeconds(startedAt: Date, now: Date = new Date()): number {
  return Math.max(0, Math.floor((now.getTime() - startedAt.getTime()) / 1000))
}

export function healthRoutes(deps: HealthRouteDeps) {
  return function register(app: FastifyInstance): void {
    /** Liveness: always 200 while the process is up; degraded when the browser is unreachable. */
    app.get("/healthz", async (_request, reply) => {
      const browser = deps.browser.getStatus()
      const health = deps.health.getStatus()
      const degraded = health.healthy === false || !browser.alive

      return reply.send({
        status: degraded ? "degraded" : "ok",
        version: deps.version,
        uptimeSeconds: uptimeSeconds(deps.startedAt),
        browser,
        cdpHealthy: health.healthy,
        lastCheckAt: health.lastCheckAt,
      })
    })
  }
}
