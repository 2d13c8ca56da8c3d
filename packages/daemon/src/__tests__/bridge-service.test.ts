import type { BrowserStatus } from "@webchat/shared/bridge"
import { TracingLogger } from "@webchat/shared/tracing"
import { describe, expect, it, vi } from "vitest"

import { BridgeService } from "../bridge-service.js"
import { exampleAdapter, FakePool, readyPage } from "./fakes.js"

interface ServiceOptions {
  page?: ReturnType<typeof readyPage> | null
  alive?: boolean
  logger?: TracingLogger
}

function createService(options: ServiceOptions = {}) {
  const pool = new FakePool(options.page === undefined ? readyPage() : options.page)
  const browser: BrowserStatus = {
    state: options.alive === false ? "STOPPED" : "RUNNING",
    alive: options.alive ?? true,
    pid: 4242,
    controlEndpoint: "http://127.0.0.1:9223",
  }
  const service = new BridgeService({
    browser: { getStatus: () => browser },
    pool,
    adapters: [exampleAdapter],
    logger: options.logger,
    pollIntervalMs: 10,
    newSessionTimeoutMs: 100,
  })
  return { service, pool }
}

describe("BridgeService.send", () => {
  it("reports TransportNotAttached for an unknown target", async () => {
    const { service, pool } = createService()

    const result = await service.send({ target: "nope", prompt: "Hello" })

    expect(result.success).toBe(false)
    expect(result.metadata.error).toEqual({
      kind: "TransportNotAttached",
      stage: "dispatch",
      message: "No transport is attached for 'nope'",
      details: { target: "nope", known: ["example"] },
    })
    expect(result.metadata.stageLog.map((e) => e.stage)).toEqual(["IDLE", "FAILED"])
    expect(pool.lease).not.toHaveBeenCalled()
  })

  it("attaches the turn summary to a successful result", async () => {
    const { service } = createService()

    const result = await service.send({ target: "example", prompt: "Hello" })

    expect(result.success).toBe(true)
    expect(result.metadata.session).toMatchObject({
      turnCount: 1,
      sentTokens: 2,
      responseTokens: 2,
      contextUsagePercent: 0.05,
    })
    expect(service.accountant.stats("example").turnCount).toBe(1)
  })

  it("uses the adapter's default timeout", async () => {
    const { service } = createService()
    const result = await service.send({ target: "example", prompt: "Hello" })
    expect(result.metadata.timeoutSeconds).toBe(120)
  })

  it("does not record failed interactions", async () => {
    const page = readyPage()
    page.interactable.clear()
    const { service } = createService({ page })

    const result = await service.send({ target: "example", prompt: "Hello" })

    expect(result.success).toBe(false)
    expect(result.metadata.session).toBeUndefined()
    expect(service.accountant.stats("example").turnCount).toBe(0)
  })

  it("rediscovers tabs before sending to an unassociated provider", async () => {
    const { service, pool } = createService({ page: null })

    const result = await service.send({ target: "example", prompt: "Hello" })

    expect(pool.discoverPages).toHaveBeenCalledOnce()
    expect(result.metadata.error).toMatchObject({ kind: "ProviderUnavailable", stage: "lease" })
  })

  it("still reports the lease failure when discovery throws", async () => {
    const { service, pool } = createService({ page: null })
    pool.discoverPages.mockRejectedValueOnce(new Error("connect ECONNREFUSED 127.0.0.1:9223"))

    const result = await service.send({ target: "example", prompt: "Hello" })

    expect(result.metadata.error).toMatchObject({ kind: "ProviderUnavailable" })
  })

  it("reports no control endpoint while the browser is down", async () => {
    const { service } = createService({ alive: false })
    const result = await service.send({ target: "example", prompt: "Hello" })
    expect(result.metadata.controlEndpoint).toBeNull()
  })
})

describe("BridgeService.startNewSession", () => {
  it("resets the provider's stats on success", async () => {
    const { service } = createService()
    await service.send({ target: "example", prompt: "Hello" })

    const result = await service.startNewSession("example")

    expect(result.success).toBe(true)
    expect(service.accountant.stats("example").turnCount).toBe(0)
  })

  it("keeps stats when the new session fails", async () => {
    const page = readyPage()
    const { service } = createService({ page })
    await service.send({ target: "example", prompt: "Hello" })
    page.interactable.clear()

    const result = await service.startNewSession("example")

    expect(result.success).toBe(false)
    expect(service.accountant.stats("example").turnCount).toBe(1)
  })

  it("reports TransportNotAttached for an unknown provider", async () => {
    const { service } = createService()
    const result = await service.startNewSession("nope")
    expect(result.error).toMatchObject({ kind: "TransportNotAttached", stage: "new_session" })
  })
})

describe("BridgeService chats", () => {
  function sidebarService() {
    const page = readyPage()
    page.items.set("nav a.chat", [
      { index: 0, href: "/c/1", title: "Trip plans", active: false },
      { index: 1, href: "/c/abc-2", title: "Recipe ideas", active: false },
    ])
    return createService({ page })
  }

  it("lists the provider's chats", async () => {
    const { service } = sidebarService()

    const result = await service.listChats("example")

    expect(result.chats.map((c) => c.chatId)).toEqual(["1", "abc-2"])
  })

  it("resets the provider's stats after switching", async () => {
    const { service } = sidebarService()
    await service.send({ target: "example", prompt: "Hello" })

    const result = await service.switchChat("example", "recipe")

    expect(result).toMatchObject({ success: true, pageUrl: "https://chat.example.com/c/abc-2" })
    expect(service.accountant.stats("example").turnCount).toBe(0)
  })

  it("keeps stats when the switch fails", async () => {
    const { service } = sidebarService()
    await service.send({ target: "example", prompt: "Hello" })

    const result = await service.switchChat("example", "nothing")

    expect(result.error).toMatchObject({ kind: "ChatNotFound" })
    expect(service.accountant.stats("example").turnCount).toBe(1)
  })

  it("reads the current chat", async () => {
    const { service } = sidebarService()
    const result = await service.currentChat("example")
    expect(result.chat).toMatchObject({ chatId: "1", isCurrent: true })
  })

  it("rediscovers tabs for an unassociated provider", async () => {
    const { service, pool } = createService({ page: null })

    const result = await service.listChats("example")

    expect(pool.discoverPages).toHaveBeenCalledOnce()
    expect(result.error).toMatchObject({ kind: "ProviderUnavailable", stage: "lease" })
  })

  it("reports TransportNotAttached for an unknown provider", async () => {
    const { service, pool } = createService()

    const [list, current, switched] = await Promise.all([
      service.listChats("nope"),
      service.currentChat("nope"),
      service.switchChat("nope", "1"),
    ])

    const error = { kind: "TransportNotAttached", stage: "chats", message: "No transport is attached for 'nope'" }
    expect(list).toEqual({ success: false, provider: "nope", pageUrl: null, chats: [], error })
    expect(current).toEqual({ success: false, provider: "nope", pageUrl: null, chat: null, error })
    expect(switched).toEqual({ success: false, provider: "nope", pageUrl: null, chat: null, error })
    expect(pool.lease).not.toHaveBeenCalled()
  })
})

describe("BridgeService status", () => {
  it("returns a snapshot per provider", () => {
    const { service } = createService()

    expect(service.status("example")).toMatchObject({
      provider: "example",
      displayName: "Example Chat",
      page: { associated: true, tabId: "tab-1" },
      transport: { attached: true, name: "web:example" },
      session: { turnCount: 0, contextWindowTokens: 8_000 },
    })
    expect(service.status("nope")).toBeNull()
    expect(Object.keys(service.statusAll())).toEqual(["example"])
  })

  it("lists open pages", async () => {
    const { service } = createService()
    await expect(service.listPages()).resolves.toEqual([
      { tabId: "tab-1", url: "https://chat.example.com/c/1", title: "Example Chat", provider: "example" },
    ])
  })

  it("logs and absorbs discovery failures", async () => {
    const logger = new TracingLogger()
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => undefined)
    const { service, pool } = createService({ logger })
    pool.discoverPages.mockRejectedValueOnce(new Error("boom"))

    await expect(service.rediscover()).resolves.toBeNull()
    expect(warn).toHaveBeenCalledWith("Page discovery failed", {
      kind: "InternalError",
      stage: "lease",
      message: "boom",
      details: { exceptionType: "Error" },
    })
  })
})
