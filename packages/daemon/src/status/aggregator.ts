import type { BrowserStatus, LeaseState, StatusSnapshot, TransportStatus } from "@webchat/shared/bridge"

import type { Adapter } from "../adapters/types.js"
import type { SessionAccountant } from "../session/accountant.js"

export interface StatusTransport {
  readonly adapter: Adapter
  getStatus(): TransportStatus
}

export interface StatusSources {
  browser: { getStatus(): BrowserStatus }
  pool: { getLeaseState(provider: string): LeaseState }
  accountant: SessionAccountant
  transports: ReadonlyMap<string, StatusTransport>
  now?: () => Date
}

/**
 * Composes per-provider status from the browser, the pool, the transport
 * and the accountant. Every read is synchronous, so a snapshot never
 * waits on an in-flight interaction.
 */
export class StatusAggregator {
  private readonly sources: StatusSources
  private readonly now: () => Date

  constructor(sources: StatusSources) {
    this.sources = sources
    this.now = sources.now ?? (() => new Date())
  }

  /** Null for a provider with no transport. */
  snapshot(provider: string): StatusSnapshot | null {
    const transport = this.sources.transports.get(provider)
    if (!transport) return null

    return {
      provider,
      displayName: transport.adapter.displayName,
      browser: this.sources.browser.getStatus(),
      page: this.sources.pool.getLeaseState(provider),
      transport: transport.getStatus(),
      session: this.sources.accountant.stats(provider),
      takenAt: this.now().toISOString(),
    }
  }

  snapshotAll(): Record<string, StatusSnapshot> {
    const all: Record<string, StatusSnapshot> = {}
    for (const provider of this.sources.transports.keys()) {
      const snap = this.snapshot(provider)
      if (snap) all[provider] = snap
    }
    return all
  }
}
