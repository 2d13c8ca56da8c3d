import { randomUUID } from "node:crypto"

import { BridgeError, type LeaseState, type PageInfo } from "@webchat/shared/bridge"
import type { TracingLogger } from "@webchat/shared/tracing"
import { chromium, type Browser, type Page } from "playwright-core"

import { discoverWsEndpoint } from "./endpoint.js"
import { PlaywrightPageHandle } from "./page-handle.js"
import type { ConnectionPoolConfig, PageLease, PageLeaser } from "./types.js"

const DEFAULT_MAX_RETRIES = 3
const DEFAULT_RETRY_BASE_DELAY_MS = 250
const DISCOVERY_TIMEOUT_MS = 3_000

interface LeaseEntry {
  provider: string
  hint: string
  handle: PlaywrightPageHandle | null
  busy: boolean
}

/**
 * Leases browser tabs to providers over a single CDP connection.
 *
 * Tabs are matched to providers by URL hint during `discoverPages()`;
 * each provider holds at most one tab and at most one busy lease.
 * A dropped connection invalidates associations; nothing is re-discovered
 * behind a running interaction's back.
 */
export class ConnectionPool implements PageLeaser {
  private readonly endpoint: string
  private readonly maxRetries: number
  private readonly retryBaseDelayMs: number
  private readonly logger: TracingLogger | undefined
  private readonly entries = new Map<string, LeaseEntry>()
  private readonly tabIds = new WeakMap<Page, string>()

  private browser: Browser | null = null
  private connecting: Promise<Browser> | null = null

  constructor(config: ConnectionPoolConfig) {
    this.endpoint = config.endpoint
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS
    this.logger = config.logger?.child({ component: "connection-pool" })
    for (const matcher of config.providers) {
      this.entries.set(matcher.provider, {
        provider: matcher.provider,
        hint: matcher.urlHint.toLowerCase().trim(),
        handle: null,
        busy: false,
      })
    }
  }

  get providers(): string[] {
    return [...this.entries.keys()]
  }

  get connected(): boolean {
    return this.browser?.isConnected() ?? false
  }

  // ---------------------------------------------------------------------------
  // Discovery
  // ---------------------------------------------------------------------------

  /**
   * Enumerate every tab and refresh provider associations. Busy leases are
   * left untouched. Returns the resulting lease state of every provider.
   */
  async discoverPages(): Promise<LeaseState[]> {
    const browser = await this.ensureConnected()

    const matched = new Map<string, Page>()
    for (const page of allPages(browser)) {
      const provider = this.matchProvider(page.url())
      if (provider && !matched.has(provider)) {
        matched.set(provider, page)
      }
    }

    for (const entry of this.entries.values()) {
      if (entry.busy) continue
      const page = matched.get(entry.provider)
      if (!page) {
        if (entry.handle) {
          this.logger?.info("Provider tab gone", { provider: entry.provider })
        }
        entry.handle = null
        continue
      }
      if (entry.handle?.target !== page) {
        entry.handle = new PlaywrightPageHandle(this.tabIdFor(page), page)
        this.logger?.info("Provider tab associated", {
          provider: entry.provider,
          tabId: entry.handle.tabId,
          url: page.url(),
        })
      }
    }

    return this.providers.map((provider) => this.getLeaseState(provider))
  }

  /** Every open tab, matched or not. */
  async listPages(): Promise<PageInfo[]> {
    const browser = await this.ensureConnected()
    return Promise.all(
      allPages(browser).map(async (page) => ({
        tabId: this.tabIdFor(page),
        url: page.url(),
        title: await page.title().catch(() => ""),
        provider: this.matchProvider(page.url()),
      })),
    )
  }

  // ---------------------------------------------------------------------------
  // Leasing
  // ---------------------------------------------------------------------------

  lease(provider: string): PageLease {
    const entry = this.entries.get(provider)
    if (!entry) {
      throw new BridgeError("ProviderUnavailable", "lease", `No pool entry for provider '${provider}'`, {
        provider,
      })
    }
    if (entry.busy) {
      throw new BridgeError("ProviderBusy", "lease", `Provider '${provider}' is busy`, { provider })
    }
    if (!entry.handle || entry.handle.target.isClosed()) {
      entry.handle = null
      throw new BridgeError(
        "ProviderUnavailable",
        "lease",
        `No browser tab is associated with provider '${provider}'`,
        { provider, urlHint: entry.hint },
      )
    }

    entry.busy = true
    return {
      provider,
      tabId: entry.handle.tabId,
      url: entry.handle.url(),
      busy: true,
      page: entry.handle,
    }
  }

  release(provider: string): void {
    const entry = this.entries.get(provider)
    if (entry) entry.busy = false
  }

  invalidate(provider: string): void {
    const entry = this.entries.get(provider)
    if (!entry?.handle) return
    this.logger?.warn("Provider tab invalidated", { provider, tabId: entry.handle.tabId })
    entry.handle = null
  }

  isAssociated(provider: string): boolean {
    const handle = this.entries.get(provider)?.handle
    return handle !== null && handle !== undefined && !handle.target.isClosed()
  }

  getLeaseState(provider: string): LeaseState {
    const entry = this.entries.get(provider)
    const handle = entry?.handle ?? null
    return {
      provider,
      associated: this.isAssociated(provider),
      busy: entry?.busy ?? false,
      tabId: handle?.tabId ?? null,
      url: handle?.url() ?? null,
    }
  }

  /** Disconnect from the browser. The browser process keeps running. */
  async close(): Promise<void> {
    const browser = this.browser
    this.browser = null
    this.dropAssociations()
    if (!browser) return
    try {
      await browser.close()
    } catch (err) {
      this.logger?.warn("Error closing CDP connection", { error: String(err) })
    }
  }

  // ---------------------------------------------------------------------------
  // Private: Connection management
  // ---------------------------------------------------------------------------

  private async ensureConnected(): Promise<Browser> {
    if (this.browser?.isConnected()) {
      return this.browser
    }
    this.connecting ??= this.connectWithRetry().finally(() => {
      this.connecting = null
    })
    return this.connecting
  }

  private async connectWithRetry(): Promise<Browser> {
    let attempt = 0
    for (;;) {
      try {
        const wsEndpoint = await discoverWsEndpoint(this.endpoint, DISCOVERY_TIMEOUT_MS)
        const browser = await chromium.connectOverCDP(wsEndpoint)
        browser.on("disconnected", () => this.onDisconnected(browser))
        this.browser = browser
        this.logger?.info("Connected over CDP", { endpoint: this.endpoint })
        return browser
      } catch (err) {
        attempt++
        if (attempt >= this.maxRetries) {
          throw new BridgeError(
            "TransportUnreachable",
            "lease",
            `Failed to connect to CDP at ${this.endpoint} after ${this.maxRetries} attempts: ${err instanceof Error ? err.message : String(err)}`,
            { endpoint: this.endpoint, attempts: attempt },
          )
        }
        const delay = this.retryBaseDelayMs * 2 ** (attempt - 1)
        await sleep(delay)
      }
    }
  }

  private onDisconnected(browser: Browser): void {
    if (this.browser !== browser) return
    this.logger?.warn("CDP connection lost", { endpoint: this.endpoint })
    this.browser = null
    this.dropAssociations()
  }

  /** Busy entries keep their handle; the running interaction finds out on its next command. */
  private dropAssociations(): void {
    for (const entry of this.entries.values()) {
      if (!entry.busy) entry.handle = null
    }
  }

  private matchProvider(url: string): string | null {
    const lowered = url.toLowerCase()
    for (const entry of this.entries.values()) {
      if (entry.hint && lowered.includes(entry.hint)) return entry.provider
    }
    return null
  }

  private tabIdFor(page: Page): string {
    let id = this.tabIds.get(page)
    if (!id) {
      id = randomUUID()
      this.tabIds.set(page, id)
    }
    return id
  }
}

function allPages(browser: Browser): Page[] {
  return browser.contexts().flatMap((context) => context.pages())
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
