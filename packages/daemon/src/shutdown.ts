/**
 * Graceful shutdown for the daemon.
 *
 * Sequence:
 * 1. Stop accepting HTTP requests (fastify.close())
 * 2. Stop the health monitor
 * 3. Drop the CDP connection (the browser keeps running)
 * 4. Stop the browser, but only one this daemon launched and only when configured to
 * 5. Flush traces
 */

import type { FastifyInstance } from "fastify"

export interface ShutdownDeps {
  fastify: FastifyInstance
  monitor: { stop(): void }
  pool: { close(): Promise<void> }
  /** Stops the browser when this process owns it; resolves false when it was left running. */
  stopBrowser: () => Promise<boolean>
  shutdownTracing: () => Promise<void>
  exit?: (code: number) => void
}

/** Build the shutdown sequence. Only the first call runs it. */
export function createShutdown(deps: ShutdownDeps): (signal: string, code: number) => Promise<void> {
  let shuttingDown = false
  const exit = deps.exit ?? ((code: number) => process.exit(code))

  return async (signal, code) => {
    if (shuttingDown) return
    shuttingDown = true

    deps.fastify.log.info({ signal }, "Shutdown signal received")

    await deps.fastify.close().catch((err: unknown) => {
      deps.fastify.log.error({ err }, "Error closing Fastify")
    })

    deps.monitor.stop()

    await deps.pool.close().catch((err: unknown) => {
      deps.fastify.log.error({ err }, "Error closing CDP connection")
    })

    await deps
      .stopBrowser()
      .then((stopped) => {
        if (stopped) deps.fastify.log.info("Browser stopped")
      })
      .catch((err: unknown) => {
        deps.fastify.log.error({ err }, "Error stopping browser")
      })

    await deps.shutdownTracing().catch((err: unknown) => {
      deps.fastify.log.error({ err }, "Error flushing traces")
    })

    deps.fastify.log.info("Shutdown complete")
    exit(code)
  }
}

/**
 * Register SIGTERM and SIGINT handlers that perform graceful shutdown.
 * Returns a cleanup function to remove the signal listeners.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): () => void {
  const shutdown = createShutdown(deps)

  const onSigterm = (): void => void shutdown("SIGTERM", 0)
  const onSigint = (): void => void shutdown("SIGINT", 0)

  process.on("SIGTERM", onSigterm)
  process.on("SIGINT", onSigint)

  // Catch unhandled errors so the process doesn't die silently
  const onUnhandledRejection = (err: unknown): void => {
    deps.fastify.log.fatal({ err }, "Unhandled promise rejection, shutting down")
    void shutdown("unhandledRejection", 1)
  }
  const onUncaughtException = (err: unknown): void => {
    deps.fastify.log.fatal({ err }, "Uncaught exception, shutting down")
    void shutdown("uncaughtException", 1)
  }

  process.on("unhandledRejection", onUnhandledRejection)
  process.on("uncaughtException", onUncaughtException)

  return () => {
    process.removeListener("SIGTERM", onSigterm)
    process.removeListener("SIGINT", onSigint)
    process.removeListener("unhandledRejection", onUnhandledRejection)
    process.removeListener("uncaughtException", onUncaughtException)
  }
}
