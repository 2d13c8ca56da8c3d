import { BrowserProcessSupervisor, ConnectionPool } from "@webchat/browser-cdp"
import { toErrorInfo } from "@webchat/shared/bridge"
import { initTracing, shutdownTracing, TracingLogger } from "@webchat/shared/tracing"

import { resolveAdapters } from "./adapters/index.js"
import { buildApp, DAEMON_VERSION } from "./app.js"
import { BridgeService } from "./bridge-service.js"
import { loadConfig } from "./config.js"
import { HealthMonitor } from "./health/monitor.js"
import { registerShutdownHandlers } from "./shutdown.js"

const LAUNCH_POLL_INTERVAL_MS = 500

const config = loadConfig()

// Initialize tracing before anything else
initTracing({
  enabled: config.tracing.enabled,
  serviceName: config.tracing.serviceName,
  serviceVersion: DAEMON_VERSION,
  endpoint: config.tracing.endpoint,
  sampleRate: config.tracing.sampleRate,
  exporterType: config.tracing.exporterType,
})

const logger = new TracingLogger({ level: config.logLevel, serviceName: config.tracing.serviceName })
const adapters = resolveAdapters(config.providers)

const supervisor = new BrowserProcessSupervisor({
  command: config.browser.command,
  host: config.browser.cdpHost,
  port: config.browser.cdpPort,
  profileDir: config.browser.profileDir,
  pidFile: config.browser.pidFile,
  startUrls: adapters.map((a) => a.startUrl),
  launchPollIntervalMs: LAUNCH_POLL_INTERVAL_MS,
  launchMaxAttempts: Math.max(1, Math.ceil(config.browser.startTimeoutMs / LAUNCH_POLL_INTERVAL_MS)),
  stopGraceMs: config.browser.stopGraceMs,
  logger,
})

const pool = new ConnectionPool({
  endpoint: supervisor.controlEndpoint,
  providers: adapters.map((a) => ({ provider: a.provider, urlHint: a.urlHint })),
  logger: logger.child({ component: "connection-pool" }),
})

const service = new BridgeService({
  browser: supervisor,
  pool,
  adapters,
  logger,
  pollIntervalMs: config.pollIntervalMs,
})

if (config.browser.autostart) {
  try {
    const handle = await supervisor.ensureRunning()
    logger.info("Browser ready", { pid: handle.pid, controlEndpoint: handle.controlEndpoint })
    const leases = await service.rediscover()
    if (leases) {
      logger.info("Provider tabs discovered", {
        associated: leases.filter((l) => l.associated).map((l) => l.provider),
      })
    }
  } catch (err) {
    // The daemon still serves status; sends fail until the browser is reachable
    logger.error("Browser did not start", { ...toErrorInfo(err, "launch") })
  }
}

const monitor = new HealthMonitor({
  check: () => supervisor.isEndpointReachable(),
  intervalMs: config.healthCheckIntervalMs,
  logger,
})
monitor.start()

const app = await buildApp({
  service,
  browser: supervisor,
  health: monitor,
  logLevel: config.logLevel,
})

registerShutdownHandlers({
  fastify: app,
  monitor,
  pool,
  stopBrowser: async () => {
    // Only a browser this process launched; an adopted one is left running
    const launchedAt = supervisor.getHandle()?.launchedAt ?? null
    if (!config.browser.stopOnExit || launchedAt === null) return false
    await supervisor.stop()
    return true
  },
  shutdownTracing,
})

try {
  const address = await app.listen({ port: config.port, host: config.host })
  app.log.info(`Bridge daemon listening on ${address}`)
} catch (err) {
  app.log.fatal(err)
  await shutdownTracing()
  process.exit(1)
}
