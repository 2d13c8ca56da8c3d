import type { TracingLogger } from "@webchat/shared/tracing"

// ---------------------------------------------------------------------------
// Page command surface
// ---------------------------------------------------------------------------

/** Text and markup of one element, as read from the page. */
export interface ElementSnapshot {
  text: string
  html: string
}

/** One element of a list read with `listItems`. */
export interface ItemSnapshot {
  /** Position among all matches of the item selector. */
  index: number
  /** `href` of the item, or of its first link; null when neither has one. */
  href: string | null
  title: string
  /** Marked `aria-current="page"` or `data-active="true"`. */
  active: boolean
}

/**
 * The commands the transport issues against a leased tab.
 *
 * Implementations throw `ConnectionLostError` when the control channel
 * drops; any other rejection means the command itself failed.
 */
export interface PageHandle {
  readonly tabId: string
  url(): string
  title(): Promise<string>
  /** Number of elements currently matching `selector`. */
  count(selector: string): Promise<number>
  /** True when the first match exists, is visible and is enabled. */
  isInteractable(selector: string): Promise<boolean>
  fill(selector: string, text: string): Promise<void>
  click(selector: string): Promise<void>
  press(selector: string, key: string): Promise<void>
  /**
   * Read the newest (last) element matching `containerSelector`, or the
   * first `contentSelector` match inside it. Null when nothing matches.
   */
  readLast(containerSelector: string, contentSelector?: string): Promise<ElementSnapshot | null>
  /** Inner text of the first match, cut to `maxLength`; null when absent. */
  firstText(selector: string, maxLength: number): Promise<string | null>
  goto(url: string): Promise<void>
  /**
   * Up to `limit` elements matching `itemSelector`. The title is the text
   * of the first `titleSelector` match inside each item, or the item's own.
   */
  listItems(itemSelector: string, titleSelector: string | undefined, limit: number): Promise<ItemSnapshot[]>
  /** Click the `index`-th match of `selector`. */
  clickNth(selector: string, index: number): Promise<void>
}

// ---------------------------------------------------------------------------
// Leasing
// ---------------------------------------------------------------------------

export interface PageLease {
  provider: string
  tabId: string
  url: string
  busy: boolean
  page: PageHandle
}

/** The part of the pool a transport depends on. */
export interface PageLeaser {
  lease(provider: string): PageLease
  release(provider: string): void
  invalidate(provider: string): void
}

export interface ProviderMatcher {
  provider: string
  /** Case-insensitive substring of the tab URL, e.g. "claude.ai". */
  urlHint: string
}

export interface ConnectionPoolConfig {
  /** Control endpoint, e.g. "http://127.0.0.1:9223". */
  endpoint: string
  providers: ProviderMatcher[]
  /** Connection attempts before giving up. Defaults to 3. */
  maxRetries?: number
  /** Base delay (ms) between attempts, doubled each attempt. Defaults to 250. */
  retryBaseDelayMs?: number
  logger?: TracingLogger
}

// ---------------------------------------------------------------------------
// Browser process
// ---------------------------------------------------------------------------

/** OS-level process operations, injectable for tests. */
export interface ProcessControl {
  /** Start a detached process and return its PID. */
  spawn(command: string, args: string[]): number
  isAlive(pid: number): boolean
  signal(pid: number, signal: NodeJS.Signals): void
}

/** The on-disk record of the launched browser's PID. */
export interface PidRecordStore {
  read(): Promise<number | null>
  write(pid: number): Promise<void>
  remove(): Promise<void>
}

export interface BrowserSupervisorConfig {
  /** Browser command line; extra words become leading arguments (e.g. "flatpak run org.chromium.Chromium"). */
  command: string
  host: string
  port: number
  profileDir: string
  pidFile: string
  /** Tabs opened at launch. */
  startUrls?: string[]
  /** Delay between readiness checks after launch. Defaults to 500. */
  launchPollIntervalMs?: number
  /** Readiness checks before the launch is declared failed. Defaults to 30. */
  launchMaxAttempts?: number
  /** Default grace period for `stop()`. Defaults to 5000. */
  stopGraceMs?: number
  /** Poll interval while waiting for the process to exit. Defaults to 100. */
  exitPollIntervalMs?: number
  /** Window after SIGKILL before the stop is declared failed. Defaults to 2000. */
  forceKillWindowMs?: number
  /** Per-request timeout of the endpoint check. Defaults to 1500. */
  checkTimeoutMs?: number
  processControl?: ProcessControl
  pidStore?: PidRecordStore
  logger?: TracingLogger
  now?: () => Date
}

export interface StopResult {
  /** PID that was stopped; null when no process was known. */
  pid: number | null
  /** True when the process only exited after SIGKILL. */
  forced: boolean
}
