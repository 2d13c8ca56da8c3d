import type { TracingLogger } from "@webchat/shared/tracing"

export interface HealthMonitorOptions {
  /** Resolves true when the browser's control endpoint answers. */
  check: () => Promise<boolean>
  intervalMs: number
  logger?: TracingLogger
  now?: () => Date
}

export interface HealthStatus {
  /** Null until the first check has run. */
  healthy: boolean | null
  lastCheckAt: string | null
  checkIntervalMs: number
  running: boolean
}

/** Periodic check of the browser's control endpoint. */
export class HealthMonitor {
  private readonly check: () => Promise<boolean>
  private readonly intervalMs: number
  private readonly logger: TracingLogger | undefined
  private readonly now: () => Date

  private timer: ReturnType<typeof setInterval> | null = null
  private healthy: boolean | null = null
  private lastCheckAt: string | null = null

  constructor(options: HealthMonitorOptions) {
    this.check = options.check
    this.intervalMs = options.intervalMs
    this.logger = options.logger?.child({ component: "health-monitor" })
    this.now = options.now ?? (() => new Date())
  }

  /** Check once now, then every interval. No-op when already running. */
  start(): void {
    if (this.timer) return
    this.timer = setInterval(() => {
      this.checkNow().catch((err: unknown) => {
        this.logger?.error("Health check crashed", { error: String(err) })
      })
    }, this.intervalMs)
    this.timer.unref()
    this.checkNow().catch((err: unknown) => {
      this.logger?.error("Health check crashed", { error: String(err) })
    })
  }

  stop(): void {
    if (!this.timer) return
    clearInterval(this.timer)
    this.timer = null
  }

  async checkNow(): Promise<boolean> {
    let healthy: boolean
    try {
      healthy = await this.check()
    } catch (err) {
      this.logger?.warn("Control endpoint check failed", { error: String(err) })
      healthy = false
    }

    if (this.healthy !== null && healthy !== this.healthy) {
      if (healthy) {
        this.logger?.info("Control endpoint recovered")
      } else {
        this.logger?.warn("Control endpoint stopped answering")
      }
    }

    this.healthy = healthy
    this.lastCheckAt = this.now().toISOString()
    return healthy
  }

  getStatus(): HealthStatus {
    return {
      healthy: this.healthy,
      lastCheckAt: this.lastCheckAt,
      checkIntervalMs: this.intervalMs,
      running: this.timer !== null,
    }
  }
}
