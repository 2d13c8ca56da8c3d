import * as fs from "node:fs/promises"

import {
  BridgeError,
  type BrowserHandle,
  type BrowserLifecycleState,
  type BrowserStatus,
} from "@webchat/shared/bridge"
import type { TracingLogger } from "@webchat/shared/tracing"

import { checkEndpoint } from "./endpoint.js"
import { createNodeProcessControl, FilePidRecord } from "./process-control.js"
import type {
  BrowserSupervisorConfig,
  PidRecordStore,
  ProcessControl,
  StopResult,
} from "./types.js"

const DEFAULT_LAUNCH_POLL_INTERVAL_MS = 500
const DEFAULT_LAUNCH_MAX_ATTEMPTS = 30
const DEFAULT_STOP_GRACE_MS = 5_000
const DEFAULT_EXIT_POLL_INTERVAL_MS = 100
const DEFAULT_FORCE_KILL_WINDOW_MS = 2_000
const DEFAULT_CHECK_TIMEOUT_MS = 1_500

/** Flags that keep an automated Chromium quiet and stable. */
export const STABILITY_FLAGS: readonly string[] = [
  "--no-first-run",
  "--no-default-browser-check",
  "--disable-background-networking",
  "--disable-background-timer-throttling",
  "--disable-backgrounding-occluded-windows",
  "--disable-breakpad",
  "--disable-component-extensions-with-background-pages",
  "--disable-dev-shm-usage",
  "--disable-extensions",
  "--disable-features=TranslateUI",
  "--disable-ipc-flooding-protection",
  "--disable-renderer-backgrounding",
  "--force-color-profile=srgb",
  "--metrics-recording-only",
]

/**
 * Owns the lifecycle of the single automated browser process.
 *
 * State lives in memory (`STOPPED → STARTING → RUNNING → STOPPING`); the
 * PID file is only a recovery hint and is checked against process liveness
 * before it is trusted. `ensureRunning()` and `stop()` run one at a time.
 */
export class BrowserProcessSupervisor {
  readonly controlEndpoint: string

  private readonly command: string
  private readonly port: number
  private readonly profileDir: string
  private readonly startUrls: string[]
  private readonly launchPollIntervalMs: number
  private readonly launchMaxAttempts: number
  private readonly stopGraceMs: number
  private readonly exitPollIntervalMs: number
  private readonly forceKillWindowMs: number
  private readonly checkTimeoutMs: number
  private readonly proc: ProcessControl
  private readonly pidStore: PidRecordStore
  private readonly logger: TracingLogger | undefined
  private readonly now: () => Date

  private handle: BrowserHandle | null = null
  private _state: BrowserLifecycleState = "STOPPED"
  private queue: Promise<unknown> = Promise.resolve()

  constructor(config: BrowserSupervisorConfig) {
    this.command = config.command
    this.port = config.port
    this.profileDir = config.profileDir
    this.controlEndpoint = `http://${config.host}:${config.port}`
    this.startUrls = config.startUrls ?? []
    this.launchPollIntervalMs = config.launchPollIntervalMs ?? DEFAULT_LAUNCH_POLL_INTERVAL_MS
    this.launchMaxAttempts = config.launchMaxAttempts ?? DEFAULT_LAUNCH_MAX_ATTEMPTS
    this.stopGraceMs = config.stopGraceMs ?? DEFAULT_STOP_GRACE_MS
    this.exitPollIntervalMs = config.exitPollIntervalMs ?? DEFAULT_EXIT_POLL_INTERVAL_MS
    this.forceKillWindowMs = config.forceKillWindowMs ?? DEFAULT_FORCE_KILL_WINDOW_MS
    this.checkTimeoutMs = config.checkTimeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS
    this.logger = config.logger?.child({ component: "browser-supervisor" })
    this.proc = config.processControl ?? createNodeProcessControl(this.logger)
    this.pidStore = config.pidStore ?? new FilePidRecord(config.pidFile)
    this.now = config.now ?? (() => new Date())
  }

  get state(): BrowserLifecycleState {
    return this._state
  }

  getHandle(): BrowserHandle | null {
    return this.handle ? { ...this.handle } : null
  }

  /** Synchronous liveness view for status snapshots. */
  getStatus(): BrowserStatus {
    const pid = this.handle?.pid ?? null
    const alive = this._state === "RUNNING" && (pid === null || this.proc.isAlive(pid))
    return { state: this._state, alive, pid, controlEndpoint: this.controlEndpoint }
  }

  /** True when the control endpoint answers. */
  isEndpointReachable(): Promise<boolean> {
    return checkEndpoint(this.controlEndpoint, this.checkTimeoutMs)
  }

  /** Start the browser unless a live one already owns the control endpoint. */
  ensureRunning(): Promise<BrowserHandle> {
    return this.serialize(() => this.doEnsureRunning())
  }

  /** SIGTERM, then SIGKILL once `gracePeriodMs` has passed without exit. */
  stop(gracePeriodMs: number = this.stopGraceMs): Promise<StopResult> {
    return this.serialize(() => this.doStop(gracePeriodMs))
  }

  // ---------------------------------------------------------------------------
  // Private: Start
  // ---------------------------------------------------------------------------

  private async doEnsureRunning(): Promise<BrowserHandle> {
    await this.discardStale()

    if (await this.isEndpointReachable()) {
      if (!this.handle) {
        const recorded = await this.pidStore.read()
        this.handle = {
          pid: recorded,
          profileDir: this.profileDir,
          controlEndpoint: this.controlEndpoint,
          state: "RUNNING",
          launchedAt: null,
        }
        this.logger?.info("Control endpoint already up; adopting browser", {
          endpoint: this.controlEndpoint,
          pid: recorded,
        })
      }
      this.setState("RUNNING")
      return { ...this.handle }
    }

    // A live process of ours that no longer answers cannot be reused.
    const unresponsivePid = this.handle?.pid ?? null
    if (unresponsivePid !== null) {
      this.logger?.warn("Browser process alive but endpoint unreachable; restarting", {
        pid: unresponsivePid,
      })
      await this.terminate(unresponsivePid, this.stopGraceMs)
    }

    return this.launch()
  }

  private async launch(): Promise<BrowserHandle> {
    this.setState("STARTING")

    const [bin, ...leading] = this.command.trim().split(/\s+/)
    if (!bin) {
      this.setState("STOPPED")
      throw new BridgeError("BrowserLaunchFailed", "launch", "Browser command is empty")
    }
    const args = [
      ...leading,
      `--remote-debugging-port=${this.port}`,
      `--user-data-dir=${this.profileDir}`,
      ...STABILITY_FLAGS,
      ...this.startUrls,
    ]

    let pid: number
    try {
      await fs.mkdir(this.profileDir, { recursive: true })
      pid = this.proc.spawn(bin, args)
    } catch (err) {
      this.setState("STOPPED")
      throw new BridgeError(
        "BrowserLaunchFailed",
        "launch",
        `Failed to launch '${bin}': ${err instanceof Error ? err.message : String(err)}`,
        { command: this.command },
      )
    }

    try {
      await this.pidStore.write(pid)
    } catch (err) {
      // An unrecorded browser could never be stopped later
      this.proc.signal(pid, "SIGKILL")
      this.setState("STOPPED")
      throw new BridgeError(
        "BrowserLaunchFailed",
        "launch",
        `Failed to record browser PID ${pid}: ${err instanceof Error ? err.message : String(err)}`,
        { pid, command: this.command },
      )
    }

    const handle: BrowserHandle = {
      pid,
      profileDir: this.profileDir,
      controlEndpoint: this.controlEndpoint,
      state: "STARTING",
      launchedAt: this.now().toISOString(),
    }
    this.handle = handle
    this.logger?.info("Browser launched", { pid, endpoint: this.controlEndpoint })

    for (let attempt = 1; attempt <= this.launchMaxAttempts; attempt++) {
      await sleep(this.launchPollIntervalMs)
      if (await this.isEndpointReachable()) {
        this.setState("RUNNING")
        this.logger?.info("Control endpoint reachable", { pid, attempts: attempt })
        return { ...handle }
      }
      if (!this.proc.isAlive(pid)) break
    }

    if (this.proc.isAlive(pid)) {
      this.proc.signal(pid, "SIGKILL")
    }
    await this.pidStore.remove()
    this.handle = null
    this.setState("STOPPED")
    throw new BridgeError(
      "BrowserLaunchFailed",
      "launch",
      `Control endpoint ${this.controlEndpoint} did not become reachable`,
      { pid, attempts: this.launchMaxAttempts, endpoint: this.controlEndpoint },
    )
  }

  // ---------------------------------------------------------------------------
  // Private: Stop
  // ---------------------------------------------------------------------------

  private async doStop(gracePeriodMs: number): Promise<StopResult> {
    await this.discardStale()

    let pid = this.handle?.pid ?? null
    if (pid === null) {
      const recorded = await this.pidStore.read()
      pid = recorded !== null && this.proc.isAlive(recorded) ? recorded : null
    }

    if (pid === null && this.handle) {
      // Adopted from a live endpoint with no PID: nothing to signal, and it is still up
      this.logger?.warn("No browser PID known; leaving the endpoint owner running", {
        endpoint: this.controlEndpoint,
      })
      return { pid: null, forced: false }
    }

    if (pid === null) {
      await this.pidStore.remove()
      this.handle = null
      this.setState("STOPPED")
      return { pid: null, forced: false }
    }

    const forced = await this.terminate(pid, gracePeriodMs)
    return { pid, forced }
  }

  /** Returns true when SIGKILL was needed. Throws StopFailed if the process survives it. */
  private async terminate(pid: number, gracePeriodMs: number): Promise<boolean> {
    const previous = this._state
    this.setState("STOPPING")

    this.proc.signal(pid, "SIGTERM")
    if (await this.waitForExit(pid, gracePeriodMs)) {
      await this.clear()
      this.logger?.info("Browser stopped", { pid })
      return false
    }

    this.logger?.warn("Browser ignored SIGTERM; sending SIGKILL", { pid, gracePeriodMs })
    this.proc.signal(pid, "SIGKILL")
    if (await this.waitForExit(pid, this.forceKillWindowMs)) {
      await this.clear()
      this.logger?.info("Browser killed", { pid })
      return true
    }

    this.setState(previous)
    throw new BridgeError("StopFailed", "stop", `Browser process ${pid} survived SIGKILL`, { pid })
  }

  private async waitForExit(pid: number, windowMs: number): Promise<boolean> {
    for (let waited = 0; ; waited += this.exitPollIntervalMs) {
      if (!this.proc.isAlive(pid)) return true
      if (waited >= windowMs) return false
      await sleep(this.exitPollIntervalMs)
    }
  }

  private async clear(): Promise<void> {
    await this.pidStore.remove()
    this.handle = null
    this.setState("STOPPED")
  }

  /** Drop a handle or PID record whose process has died. */
  private async discardStale(): Promise<void> {
    const handlePid = this.handle?.pid ?? null
    if (handlePid !== null && !this.proc.isAlive(handlePid)) {
      this.logger?.info("Discarding stale browser handle", { pid: handlePid })
      this.handle = null
      this.setState("STOPPED")
    }
    const recorded = await this.pidStore.read()
    if (recorded !== null && !this.proc.isAlive(recorded)) {
      this.logger?.info("Removing stale PID record", { pid: recorded })
      await this.pidStore.remove()
    }
  }

  private setState(state: BrowserLifecycleState): void {
    this._state = state
    if (this.handle) this.handle.state = state
  }

  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn, fn)
    // The queue only orders calls; each caller observes its own outcome via `run`.
    this.queue = run.catch(() => undefined)
    return run
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
