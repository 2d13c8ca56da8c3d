/**
 * BridgeService: the request surface over every configured provider.
 *
 * Routes `send`, `status`, `startNewSession` and the chat operations to
 * the provider's transport and feeds successful turns to the accountant. Failures come
 * back inside results; nothing here throws to the caller.
 */

import { randomUUID } from "node:crypto"

import type { PageLeaser } from "@webchat/browser-cdp"
import {
  BridgeError,
  type BridgeErrorInfo,
  type BridgeErrorStage,
  type BrowserStatus,
  type ChatListResult,
  type ChatResult,
  type LeaseState,
  type NewSessionResult,
  type PageInfo,
  type SendResult,
  type StatusSnapshot,
  toErrorInfo,
} from "@webchat/shared/bridge"
import type { TracingLogger } from "@webchat/shared/tracing"

import type { Adapter } from "./adapters/types.js"
import { SessionAccountant } from "./session/accountant.js"
import { StatusAggregator } from "./status/aggregator.js"
import { WebTransport } from "./transport/web-transport.js"

/** The pool operations the service needs on top of leasing. */
export interface BridgePool extends PageLeaser {
  discoverPages(): Promise<LeaseState[]>
  isAssociated(provider: string): boolean
  getLeaseState(provider: string): LeaseState
  listPages(): Promise<PageInfo[]>
}

export interface BridgeBrowser {
  getStatus(): BrowserStatus
}

export interface BridgeServiceDeps {
  browser: BridgeBrowser
  pool: BridgePool
  adapters: readonly Adapter[]
  logger?: TracingLogger
  pollIntervalMs?: number
  newSessionTimeoutMs?: number
  now?: () => Date
}

export interface SendRequest {
  target: string
  prompt: string
  waitForResponse?: boolean
  timeoutSeconds?: number
}

export class BridgeService {
  readonly accountant: SessionAccountant
  private readonly transports = new Map<string, WebTransport>()
  private readonly aggregator: StatusAggregator
  private readonly browser: BridgeBrowser
  private readonly pool: BridgePool
  private readonly logger: TracingLogger | undefined
  private readonly now: () => Date

  constructor(deps: BridgeServiceDeps) {
    this.browser = deps.browser
    this.pool = deps.pool
    this.logger = deps.logger
    this.now = deps.now ?? (() => new Date())
    this.accountant = new SessionAccountant(this.now)

    for (const adapter of deps.adapters) {
      const transport = new WebTransport(adapter, {
        pool: deps.pool,
        controlEndpoint: () => this.controlEndpoint(),
        logger: deps.logger,
        pollIntervalMs: deps.pollIntervalMs,
        newSessionTimeoutMs: deps.newSessionTimeoutMs,
        now: this.now,
      })
      this.transports.set(adapter.provider, transport)
      this.accountant.register(adapter.provider, adapter.maxContextTokens)
    }

    this.aggregator = new StatusAggregator({
      browser: deps.browser,
      pool: deps.pool,
      accountant: this.accountant,
      transports: this.transports,
      now: this.now,
    })
  }

  get providers(): string[] {
    return [...this.transports.keys()]
  }

  hasProvider(provider: string): boolean {
    return this.transports.has(provider)
  }

  async send(request: SendRequest): Promise<SendResult> {
    const transport = this.transports.get(request.target)
    if (!transport) {
      return this.notAttached(request)
    }

    if (!this.pool.isAssociated(transport.provider)) {
      await this.rediscover()
    }

    const result = await transport.send(request.prompt, {
      waitForResponse: request.waitForResponse ?? true,
      timeoutSeconds: request.timeoutSeconds ?? transport.adapter.defaultTimeoutSeconds,
    })
    if (!result.success) return result

    const session = this.accountant.record(transport.provider, {
      sentText: request.prompt,
      responseText: result.structuredContent?.text ?? "",
      responseElapsedMs: result.metadata.responseElapsedMs,
    })
    return { ...result, metadata: { ...result.metadata, session } }
  }

  status(provider: string): StatusSnapshot | null {
    return this.aggregator.snapshot(provider)
  }

  statusAll(): Record<string, StatusSnapshot> {
    return this.aggregator.snapshotAll()
  }

  async startNewSession(provider: string): Promise<NewSessionResult> {
    const transport = await this.transportFor(provider)
    if (!transport) {
      return { success: false, provider, pageUrl: null, error: this.notAttachedError(provider, "new_session") }
    }

    const result = await transport.startNewSession()
    if (result.success) {
      this.accountant.reset(provider)
    }
    return result
  }

  async listChats(provider: string): Promise<ChatListResult> {
    const transport = await this.transportFor(provider)
    if (!transport) {
      return { success: false, provider, pageUrl: null, chats: [], error: this.notAttachedError(provider, "chats") }
    }
    return transport.listChats()
  }

  async currentChat(provider: string): Promise<ChatResult> {
    const transport = await this.transportFor(provider)
    if (!transport) {
      return { success: false, provider, pageUrl: null, chat: null, error: this.notAttachedError(provider, "chats") }
    }
    return transport.currentChat()
  }

  /** Switching to another conversation starts a fresh stats window. */
  async switchChat(provider: string, chat: string): Promise<ChatResult> {
    const transport = await this.transportFor(provider)
    if (!transport) {
      return { success: false, provider, pageUrl: null, chat: null, error: this.notAttachedError(provider, "chats") }
    }

    const result = await transport.switchChat(chat)
    if (result.success) {
      this.accountant.reset(provider)
    }
    return result
  }

  /** Every open tab in the browser. */
  listPages(): Promise<PageInfo[]> {
    return this.pool.listPages()
  }

  /** Refresh tab associations; failures are logged and left to `lease` to report. */
  async rediscover(): Promise<LeaseState[] | null> {
    try {
      return await this.pool.discoverPages()
    } catch (err) {
      this.logger?.warn("Page discovery failed", { ...toErrorInfo(err, "lease") })
      return null
    }
  }

  /** The provider's transport after refreshing its tab association. */
  private async transportFor(provider: string): Promise<WebTransport | null> {
    const transport = this.transports.get(provider)
    if (!transport) return null
    if (!this.pool.isAssociated(provider)) {
      await this.rediscover()
    }
    return transport
  }

  private notAttachedError(provider: string, stage: BridgeErrorStage): BridgeErrorInfo {
    return new BridgeError("TransportNotAttached", stage, `No transport is attached for '${provider}'`).toInfo()
  }

  private controlEndpoint(): string | null {
    const status = this.browser.getStatus()
    return status.alive ? status.controlEndpoint : null
  }

  private notAttached(request: SendRequest): SendResult {
    const now = this.now()
    return {
      success: false,
      snippet: null,
      structuredContent: null,
      metadata: {
        transportType: "web",
        controlEndpoint: this.controlEndpoint(),
        pageUrl: null,
        requestId: randomUUID(),
        elapsedMs: 0,
        responseElapsedMs: null,
        waited: request.waitForResponse ?? true,
        timeoutSeconds: request.timeoutSeconds ?? 0,
        baselineCount: null,
        timestamp: now.toISOString(),
        stageLog: [
          { stage: "IDLE", at: now.toISOString() },
          { stage: "FAILED", at: now.toISOString() },
        ],
        warnings: [],
        error: new BridgeError(
          "TransportNotAttached",
          "dispatch",
          `No transport is attached for '${request.target}'`,
          { target: request.target, known: this.providers },
        ).toInfo(),
      },
    }
  }
}
