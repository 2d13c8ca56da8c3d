/**
 * WebTransport: drives one provider's chat tab through a single
 * interaction: ensure-ready → send → wait → extract.
 *
 * Chat management (new session, list, current, switch) runs under the
 * same exclusive lease. Nothing here throws to the caller; every failure
 * comes back as a result carrying a `BridgeErrorInfo` and the page URL.
 */

import { randomUUID } from "node:crypto"

import {
  ConnectionLostError,
  type ElementSnapshot,
  type ItemSnapshot,
  type PageHandle,
  type PageLease,
  type PageLeaser,
} from "@webchat/browser-cdp"
import {
  BridgeError,
  type BridgeErrorInfo,
  type BridgeErrorStage,
  type BridgeWarning,
  type ChatInfo,
  type ChatListResult,
  type ChatResult,
  type InteractionState,
  type NewSessionResult,
  type SendResult,
  type TransportStatus,
  toErrorInfo,
} from "@webchat/shared/bridge"
import { addSpanEvent, BridgeAttributes, setSpanAttributes, type TracingLogger, withSpan } from "@webchat/shared/tracing"

import { type Adapter, defineAdapter } from "../adapters/types.js"
import { estimateTokens } from "../session/accountant.js"
import { currentChatInfo, findChat, isChatUrl, toChatInfo } from "./chats.js"
import { inspectPageState } from "./page-state.js"
import { InteractionStateMachine } from "./state-machine.js"
import { makeSnippet, toMarkdown } from "./text.js"

const DEFAULT_POLL_INTERVAL_MS = 200
const DEFAULT_NEW_SESSION_TIMEOUT_MS = 10_000
const MAX_CHATS = 100

export interface WebTransportDeps {
  pool: PageLeaser
  /** Current control endpoint of the browser, if one is known. */
  controlEndpoint: () => string | null
  logger?: TracingLogger
  /** Delay between stabilization polls. Defaults to 200. */
  pollIntervalMs?: number
  /** How long a new session may take to show an input. Defaults to 10000. */
  newSessionTimeoutMs?: number
  now?: () => Date
}

export interface SendOptions {
  waitForResponse: boolean
  timeoutSeconds: number
}

interface InteractionContext {
  requestId: string
  machine: InteractionStateMachine
  options: SendOptions
  startedAt: number
  responseStartedAt: number | null
  baselineCount: number | null
  pageUrl: string | null
  warnings: BridgeWarning[]
}

interface ChatList {
  selector: string | null
  chats: ChatInfo[]
}

interface ResponseCount {
  selector: string | null
  count: number
}

const TIMED_OUT = Symbol("timed-out")

const STAGE_FOR_STATE: Record<InteractionState, BridgeErrorStage> = {
  IDLE: "lease",
  ENSURE_READY: "ensure_ready",
  SENDING: "send",
  WAITING: "wait",
  EXTRACTING: "extract",
  DONE: "extract",
  FAILED: "dispatch",
}

export class WebTransport {
  readonly adapter: Adapter
  private readonly pool: PageLeaser
  private readonly controlEndpoint: () => string | null
  private readonly logger: TracingLogger | undefined
  private readonly pollIntervalMs: number
  private readonly newSessionTimeoutMs: number
  private readonly now: () => Date

  private inFlight = false
  private activePage: PageHandle | null = null
  private state: InteractionState = "IDLE"
  private lastPageUrl: string | null = null
  private lastRequestId: string | null = null
  private lastError: BridgeErrorInfo | null = null

  constructor(adapter: Adapter, deps: WebTransportDeps) {
    this.adapter = defineAdapter(adapter)
    this.pool = deps.pool
    this.controlEndpoint = deps.controlEndpoint
    this.logger = deps.logger?.child({ provider: this.adapter.provider })
    this.pollIntervalMs = deps.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    this.newSessionTimeoutMs = deps.newSessionTimeoutMs ?? DEFAULT_NEW_SESSION_TIMEOUT_MS
    this.now = deps.now ?? (() => new Date())
  }

  get provider(): string {
    return this.adapter.provider
  }

  get name(): string {
    return `web:${this.adapter.provider}`
  }

  // ---------------------------------------------------------------------------
  // send
  // ---------------------------------------------------------------------------

  async send(prompt: string, options: SendOptions): Promise<SendResult> {
    const ctx: InteractionContext = {
      requestId: randomUUID(),
      machine: new InteractionStateMachine(this.now),
      options,
      startedAt: this.nowMs(),
      responseStartedAt: null,
      baselineCount: null,
      pageUrl: null,
      warnings: [],
    }

    if (this.inFlight) {
      ctx.pageUrl = this.activePage?.url() ?? null
      return this.failure(ctx, this.busyError("lease"))
    }

    let lease: PageLease
    try {
      lease = this.pool.lease(this.provider)
    } catch (err) {
      return this.failure(ctx, err)
    }

    this.inFlight = true
    this.activePage = lease.page
    this.lastRequestId = ctx.requestId
    ctx.pageUrl = lease.url
    ctx.machine.onTransition((event) => {
      this.state = event.to
      addSpanEvent("webchat.interaction.transition", {
        [BridgeAttributes.INTERACTION_STATE]: event.to,
      })
    })
    this.state = "IDLE"

    const endpoint = this.controlEndpoint()
    const attributes = {
      [BridgeAttributes.PROVIDER]: this.provider,
      [BridgeAttributes.REQUEST_ID]: ctx.requestId,
      [BridgeAttributes.WAIT_FOR_RESPONSE]: options.waitForResponse,
      [BridgeAttributes.TIMEOUT_SECONDS]: options.timeoutSeconds,
      [BridgeAttributes.TOKEN_SENT]: estimateTokens(prompt),
      ...(endpoint === null ? {} : { [BridgeAttributes.CONTROL_ENDPOINT]: endpoint }),
    }

    try {
      const snapshot = await withSpan("webchat.transport.send", attributes, async () => {
        try {
          const result = await this.run(lease.page, prompt, ctx)
          setSpanAttributes({
            [BridgeAttributes.INTERACTION_OUTCOME]: "success",
            ...(options.waitForResponse
              ? { [BridgeAttributes.TOKEN_RESPONSE]: estimateTokens(result?.text.trim() ?? "") }
              : {}),
          })
          return result
        } catch (err) {
          const error = this.toBridgeError(err, STAGE_FOR_STATE[ctx.machine.state])
          setSpanAttributes({
            [BridgeAttributes.INTERACTION_OUTCOME]: "failure",
            [BridgeAttributes.ERROR_KIND]: error.kind,
            [BridgeAttributes.ERROR_STAGE]: error.stage,
          })
          throw error
        }
      })
      ctx.pageUrl = lease.page.url()
      return this.success(ctx, snapshot)
    } catch (err) {
      ctx.pageUrl = lease.page.url()
      return this.failure(ctx, err)
    } finally {
      this.inFlight = false
      this.activePage = null
      this.pool.release(this.provider)
    }
  }

  private async run(
    page: PageHandle,
    prompt: string,
    ctx: InteractionContext,
  ): Promise<ElementSnapshot | null> {
    const { machine, options } = ctx

    machine.transition("ENSURE_READY")
    const input = await this.resolveInput(page)
    const warning = await inspectPageState(page)
    if (warning) {
      ctx.warnings.push(warning)
      this.logger?.warn("Suspicious page state", { requestId: ctx.requestId, ...warning.details })
    }

    machine.transition("SENDING")
    const baseline = await this.countResponses(page)
    ctx.baselineCount = baseline.count
    const via = await this.submit(page, input, prompt)
    this.logger?.debug("Prompt submitted", {
      requestId: ctx.requestId,
      input,
      via,
      baselineCount: baseline.count,
    })

    if (!options.waitForResponse) {
      machine.transition("DONE")
      return null
    }

    machine.transition("WAITING")
    ctx.responseStartedAt = this.nowMs()
    await this.waitForStableResponse(page, baseline.count, ctx.responseStartedAt, options.timeoutSeconds)

    machine.transition("EXTRACTING")
    const snapshot = await this.extract(page)
    machine.transition("DONE")
    return snapshot
  }

  // ---------------------------------------------------------------------------
  // Stages
  // ---------------------------------------------------------------------------

  private async resolveInput(page: PageHandle): Promise<string> {
    for (const selector of this.adapter.locators.input) {
      if (await this.tryInteractable(page, selector)) return selector
    }
    throw new BridgeError("SelectorMissing", "ensure_ready", "No prompt input is ready on the page", {
      tried: [...this.adapter.locators.input],
    })
  }

  /** Fill the prompt and submit it; returns the send selector used, or "Enter". */
  private async submit(page: PageHandle, input: string, prompt: string): Promise<string> {
    try {
      await page.fill(input, prompt)
    } catch (err) {
      if (err instanceof ConnectionLostError) throw err
      throw new BridgeError("SelectorMissing", "send", `Could not fill the prompt into '${input}'`, {
        selector: input,
        cause: errorMessage(err),
      })
    }

    for (const selector of this.adapter.locators.send) {
      try {
        if (!(await page.isInteractable(selector))) continue
        await page.click(selector)
        return selector
      } catch (err) {
        if (err instanceof ConnectionLostError) throw err
        this.logger?.debug("Send candidate failed", { selector, error: errorMessage(err) })
      }
    }

    try {
      await page.press(input, "Enter")
      return "Enter"
    } catch (err) {
      if (err instanceof ConnectionLostError) throw err
      throw new BridgeError("SelectorMissing", "send", "No send control worked and Enter failed", {
        tried: [...this.adapter.locators.send],
        cause: errorMessage(err),
      })
    }
  }

  /**
   * Poll until exactly one new response container exists and no stop
   * control is shown. Each poll is raced against the time left.
   */
  private async waitForStableResponse(
    page: PageHandle,
    baseline: number,
    startedAt: number,
    timeoutSeconds: number,
  ): Promise<void> {
    const deadline = startedAt + timeoutSeconds * 1000
    let lastCount = baseline
    const timeout = (): BridgeError =>
      new BridgeError(
        "ResponseTimeout",
        "wait",
        `No complete response from ${this.adapter.displayName} within ${timeoutSeconds}s`,
        { baselineCount: baseline, lastCount },
      )

    for (;;) {
      const remaining = deadline - this.nowMs()
      if (remaining <= 0) throw timeout()
      await sleep(Math.min(this.pollIntervalMs, remaining))

      const left = deadline - this.nowMs()
      if (left <= 0) throw timeout()
      const outcome = await raceDeadline(this.checkStable(page, baseline), left)
      if (outcome === TIMED_OUT) throw timeout()

      lastCount = outcome.count
      if (outcome.stable) return
    }
  }

  private async checkStable(page: PageHandle, baseline: number): Promise<{ stable: boolean; count: number }> {
    const { count } = await this.countResponses(page)
    if (count !== baseline + 1) return { stable: false, count }
    for (const selector of this.adapter.locators.stop) {
      if ((await this.tryCount(page, selector)) > 0) return { stable: false, count }
    }
    return { stable: true, count }
  }

  /** Newest container of the first resolving container candidate. */
  private async extract(page: PageHandle): Promise<ElementSnapshot | null> {
    const { selector } = await this.countResponses(page)
    if (selector === null) return null

    for (const content of this.adapter.locators.responseContent) {
      const snapshot = await this.tryRead(page, selector, content)
      if (snapshot && snapshot.text.trim()) return snapshot
    }
    return this.tryRead(page, selector)
  }

  private async countResponses(page: PageHandle): Promise<ResponseCount> {
    for (const selector of this.adapter.locators.responseContainer) {
      const count = await this.tryCount(page, selector)
      if (count > 0) return { selector, count }
    }
    return { selector: null, count: 0 }
  }

  // ---------------------------------------------------------------------------
  // startNewSession
  // ---------------------------------------------------------------------------

  async startNewSession(): Promise<NewSessionResult> {
    return this.exclusive<NewSessionResult>(
      "new_session",
      async (page) => {
        const clicked = await this.clickNewChat(page)
        if (!clicked) {
          await page.goto(this.adapter.startUrl)
        }
        await this.waitForInput(page, "new_session")
        this.logger?.info("New session started", { via: clicked ?? "navigation", pageUrl: page.url() })
        return { success: true, provider: this.provider, pageUrl: page.url() }
      },
      (error, pageUrl) => ({ success: false, provider: this.provider, pageUrl, error }),
    )
  }

  private async clickNewChat(page: PageHandle): Promise<string | null> {
    for (const selector of this.adapter.locators.newChat) {
      try {
        if (!(await page.isInteractable(selector))) continue
        await page.click(selector)
        return selector
      } catch (err) {
        if (err instanceof ConnectionLostError) throw err
        this.logger?.debug("New-chat candidate failed", { selector, error: errorMessage(err) })
      }
    }
    return null
  }

  private async waitForInput(page: PageHandle, stage: BridgeErrorStage): Promise<void> {
    const deadline = this.nowMs() + this.newSessionTimeoutMs
    for (;;) {
      for (const selector of this.adapter.locators.input) {
        if (await this.tryInteractable(page, selector)) return
      }
      if (this.nowMs() >= deadline) {
        throw new BridgeError("SelectorMissing", stage, "No prompt input appeared on the page", {
          tried: [...this.adapter.locators.input],
        })
      }
      await sleep(this.pollIntervalMs)
    }
  }

  // ---------------------------------------------------------------------------
  // Chats
  // ---------------------------------------------------------------------------

  /** Conversations listed in the provider's sidebar, in page order. */
  async listChats(): Promise<ChatListResult> {
    return this.exclusive<ChatListResult>(
      "chats",
      async (page) => {
        const { chats } = await this.readChats(page)
        return { success: true, provider: this.provider, pageUrl: page.url(), chats }
      },
      (error, pageUrl) => ({ success: false, provider: this.provider, pageUrl, chats: [], error }),
    )
  }

  async currentChat(): Promise<ChatResult> {
    return this.exclusive<ChatResult>(
      "chats",
      async (page) => ({
        success: true,
        provider: this.provider,
        pageUrl: page.url(),
        chat: currentChatInfo(page.url(), await page.title()),
      }),
      (error, pageUrl) => ({ success: false, provider: this.provider, pageUrl, chat: null, error }),
    )
  }

  /**
   * Open a conversation by URL, sidebar position, chat id or title
   * fragment, then wait for the prompt input.
   */
  async switchChat(identifier: string): Promise<ChatResult> {
    return this.exclusive<ChatResult>(
      "chats",
      async (page) => {
        if (isChatUrl(identifier)) {
          await page.goto(identifier)
        } else {
          const list = await this.readChats(page)
          const target = findChat(list.chats, identifier)
          if (!target) {
            throw new BridgeError("ChatNotFound", "chats", `No chat matches '${identifier}'`, {
              identifier,
              listed: list.chats.length,
            })
          }
          if (target.url !== null) {
            await page.goto(target.url)
          } else if (list.selector !== null) {
            await page.clickNth(list.selector, list.chats.indexOf(target))
          }
        }

        await this.waitForInput(page, "chats")
        const chat = currentChatInfo(page.url(), await page.title())
        this.logger?.info("Switched chat", { chatId: chat.chatId, pageUrl: page.url() })
        return { success: true, provider: this.provider, pageUrl: page.url(), chat }
      },
      (error, pageUrl) => ({ success: false, provider: this.provider, pageUrl, chat: null, error }),
    )
  }

  /** Entries of the first chat-item candidate that lists any. */
  private async readChats(page: PageHandle): Promise<ChatList> {
    const { chatItem, chatTitle } = this.adapter.locators
    if (chatItem.length === 0) {
      throw new BridgeError("SelectorMissing", "chats", `${this.adapter.displayName} has no chat list locators`)
    }

    const title = chatTitle.length > 0 ? chatTitle.join(", ") : undefined
    for (const selector of chatItem) {
      const items = await this.tryListItems(page, selector, title)
      if (items.length > 0) {
        return { selector, chats: items.map((item) => toChatInfo(item, page.url())) }
      }
    }
    return { selector: null, chats: [] }
  }

  // ---------------------------------------------------------------------------
  // Exclusive page operations
  // ---------------------------------------------------------------------------

  /**
   * Run `operation` on the leased tab with the same busy, status and
   * connection-loss handling as `send`.
   */
  private async exclusive<R>(
    stage: BridgeErrorStage,
    operation: (page: PageHandle) => Promise<R>,
    failed: (error: BridgeErrorInfo, pageUrl: string | null) => R,
  ): Promise<R> {
    if (this.inFlight) {
      return failed(this.busyError(stage).toInfo(), this.activePage?.url() ?? null)
    }

    let lease: PageLease
    try {
      lease = this.pool.lease(this.provider)
    } catch (err) {
      const error = toErrorInfo(err, stage)
      if (error.kind !== "ProviderBusy") this.lastError = error
      return failed(error, null)
    }

    const page = lease.page
    this.inFlight = true
    this.activePage = page
    this.lastRequestId = randomUUID()
    this.state = "ENSURE_READY"
    try {
      const result = await operation(page)
      this.state = "DONE"
      this.lastPageUrl = page.url()
      this.lastError = null
      return result
    } catch (err) {
      const error = this.toBridgeError(err, stage).toInfo()
      this.state = "FAILED"
      this.lastPageUrl = page.url()
      this.lastError = error
      this.logger?.warn("Page operation failed", { requestId: this.lastRequestId, ...error })
      return failed(error, page.url())
    } finally {
      this.inFlight = false
      this.activePage = null
      this.pool.release(this.provider)
    }
  }

  private busyError(stage: BridgeErrorStage): BridgeError {
    return new BridgeError("ProviderBusy", stage, `Provider '${this.provider}' is busy`, {
      provider: this.provider,
    })
  }

  /** A lost connection invalidates the tab and becomes TransportUnreachable. */
  private toBridgeError(err: unknown, stage: BridgeErrorStage): BridgeError {
    if (err instanceof BridgeError) return err
    if (err instanceof ConnectionLostError) {
      this.pool.invalidate(this.provider)
      return new BridgeError("TransportUnreachable", stage, `Lost connection to the browser: ${err.message}`)
    }
    const info = toErrorInfo(err, stage)
    return new BridgeError(info.kind, info.stage, info.message, info.details)
  }

  // ---------------------------------------------------------------------------
  // Status
  // ---------------------------------------------------------------------------

  getStatus(): TransportStatus {
    return {
      attached: true,
      name: this.name,
      kind: "web",
      state: this.state,
      inFlight: this.inFlight,
      lastPageUrl: this.lastPageUrl,
      lastRequestId: this.lastRequestId,
      lastError: this.lastError ? { ...this.lastError } : null,
    }
  }

  // ---------------------------------------------------------------------------
  // Results
  // ---------------------------------------------------------------------------

  private success(ctx: InteractionContext, snapshot: ElementSnapshot | null): SendResult {
    this.lastPageUrl = ctx.pageUrl
    this.lastError = null

    if (!ctx.options.waitForResponse) {
      return { success: true, snippet: null, structuredContent: null, metadata: this.metadata(ctx) }
    }

    const text = snapshot?.text.trim() ?? ""
    if (!text) {
      ctx.warnings.push({ code: "EMPTY_RESPONSE", message: "The response container held no text" })
    }
    const markdown = text ? toMarkdown(snapshot?.html ?? "", text) : ""

    return {
      success: true,
      snippet: makeSnippet(text, this.adapter.snippetLength),
      structuredContent: { text, markdown },
      metadata: this.metadata(ctx),
    }
  }

  private failure(ctx: InteractionContext, err: unknown): SendResult {
    const error = toErrorInfo(err, "lease")
    ctx.machine.fail()

    if (error.kind !== "ProviderBusy") {
      this.lastError = error
      if (ctx.pageUrl !== null) this.lastPageUrl = ctx.pageUrl
    }
    this.logger?.warn("Interaction failed", {
      requestId: ctx.requestId,
      kind: error.kind,
      stage: error.stage,
      error: error.message,
    })

    return {
      success: false,
      snippet: null,
      structuredContent: null,
      metadata: { ...this.metadata(ctx), error },
    }
  }

  private metadata(ctx: InteractionContext): SendResult["metadata"] {
    const finishedAt = this.nowMs()
    return {
      transportType: "web",
      controlEndpoint: this.controlEndpoint(),
      pageUrl: ctx.pageUrl,
      requestId: ctx.requestId,
      elapsedMs: finishedAt - ctx.startedAt,
      responseElapsedMs:
        ctx.responseStartedAt !== null && ctx.machine.state === "DONE"
          ? finishedAt - ctx.responseStartedAt
          : null,
      waited: ctx.options.waitForResponse,
      timeoutSeconds: ctx.options.timeoutSeconds,
      baselineCount: ctx.baselineCount,
      timestamp: new Date(finishedAt).toISOString(),
      stageLog: ctx.machine.stageLog(),
      warnings: ctx.warnings,
    }
  }

  // ---------------------------------------------------------------------------
  // Page queries; a failing query counts as "not there" unless the connection dropped
  // ---------------------------------------------------------------------------

  private async tryInteractable(page: PageHandle, selector: string): Promise<boolean> {
    try {
      return await page.isInteractable(selector)
    } catch (err) {
      if (err instanceof ConnectionLostError) throw err
      return false
    }
  }

  private async tryCount(page: PageHandle, selector: string): Promise<number> {
    try {
      return await page.count(selector)
    } catch (err) {
      if (err instanceof ConnectionLostError) throw err
      return 0
    }
  }

  private async tryListItems(page: PageHandle, selector: string, title: string | undefined): Promise<ItemSnapshot[]> {
    try {
      return await page.listItems(selector, title, MAX_CHATS)
    } catch (err) {
      if (err instanceof ConnectionLostError) throw err
      return []
    }
  }

  private async tryRead(
    page: PageHandle,
    container: string,
    content?: string,
  ): Promise<ElementSnapshot | null> {
    try {
      return await page.readLast(container, content)
    } catch (err) {
      if (err instanceof ConnectionLostError) throw err
      return null
    }
  }

  private nowMs(): number {
    return this.now().getTime()
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/** Settle with `promise`, or with TIMED_OUT once `ms` have passed. */
function raceDeadline<T>(promise: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => resolve(TIMED_OUT), ms)
    promise.then(
      (value) => {
        clearTimeout(timer)
        resolve(value)
      },
      (err: unknown) => {
        clearTimeout(timer)
        reject(err)
      },
    )
  })
}
