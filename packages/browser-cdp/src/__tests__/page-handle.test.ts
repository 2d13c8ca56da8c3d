import type { Page } from "playwright-core"
import { beforeEach, describe, expect, it, vi } from "vitest"

import { ConnectionLostError, isConnectionError, PlaywrightPageHandle } from "../page-handle.js"

// ---------------------------------------------------------------------------
// A locator tree small enough to script per test
// ---------------------------------------------------------------------------
interface FakeLocator {
  count: ReturnType<typeof vi.fn>
  first: () => FakeLocator
  last: () => FakeLocator
  nth: (index: number) => FakeLocator
  locator: (selector: string) => FakeLocator
  isVisible: ReturnType<typeof vi.fn>
  isEnabled: ReturnType<typeof vi.fn>
  fill: ReturnType<typeof vi.fn>
  click: ReturnType<typeof vi.fn>
  press: ReturnType<typeof vi.fn>
  innerText: ReturnType<typeof vi.fn>
  innerHTML: ReturnType<typeof vi.fn>
  getAttribute: ReturnType<typeof vi.fn>
}

function fakeLocator(count = 1, text = "", html = ""): FakeLocator {
  const loc: FakeLocator = {
    count: vi.fn().mockResolvedValue(count),
    first: () => loc,
    last: () => loc,
    nth: () => loc,
    locator: () => loc,
    isVisible: vi.fn().mockResolvedValue(true),
    isEnabled: vi.fn().mockResolvedValue(true),
    fill: vi.fn().mockResolvedValue(undefined),
    click: vi.fn().mockResolvedValue(undefined),
    press: vi.fn().mockResolvedValue(undefined),
    innerText: vi.fn().mockResolvedValue(text),
    innerHTML: vi.fn().mockResolvedValue(html),
    getAttribute: vi.fn().mockResolvedValue(null),
  }
  return loc
}

function fakeItem(
  attributes: Record<string, string>,
  children: Record<string, FakeLocator>,
  text: string,
): FakeLocator {
  const item = fakeLocator(1, text)
  item.getAttribute.mockImplementation((name: string) => Promise.resolve(attributes[name] ?? null))
  item.locator = (selector) => children[selector] ?? fakeLocator(0)
  return item
}

const mockPage = {
  locator: vi.fn(),
  url: vi.fn(),
  title: vi.fn(),
  goto: vi.fn(),
  isClosed: vi.fn(),
}

function createHandle(): PlaywrightPageHandle {
  return new PlaywrightPageHandle("tab-1", mockPage as unknown as Page)
}

describe("PlaywrightPageHandle", () => {
  beforeEach(() => {
    vi.clearAllMocks()
    mockPage.url.mockReturnValue("https://claude.ai/new")
    mockPage.title.mockResolvedValue("Claude")
    mockPage.goto.mockResolvedValue(null)
    mockPage.isClosed.mockReturnValue(false)
  })

  it("counts matches", async () => {
    mockPage.locator.mockReturnValue(fakeLocator(3))
    await expect(createHandle().count("div.reply")).resolves.toBe(3)
    expect(mockPage.locator).toHaveBeenCalledWith("div.reply")
  })

  it("treats a missing element as not interactable", async () => {
    const loc = fakeLocator(0)
    mockPage.locator.mockReturnValue(loc)

    await expect(createHandle().isInteractable("div.input")).resolves.toBe(false)
    expect(loc.isVisible).not.toHaveBeenCalled()
  })

  it("requires the element to be visible and enabled", async () => {
    const loc = fakeLocator(1)
    loc.isEnabled.mockResolvedValue(false)
    mockPage.locator.mockReturnValue(loc)

    await expect(createHandle().isInteractable("button.send")).resolves.toBe(false)
  })

  it("reads the newest container's text and markup", async () => {
    mockPage.locator.mockReturnValue(fakeLocator(2, "Hello", "<p>Hello</p>"))

    await expect(createHandle().readLast("div.reply", ".markdown")).resolves.toEqual({
      text: "Hello",
      html: "<p>Hello</p>",
    })
  })

  it("returns null when no container matches", async () => {
    mockPage.locator.mockReturnValue(fakeLocator(0))
    await expect(createHandle().readLast("div.reply")).resolves.toBeNull()
  })

  it("cuts first-match text to the requested length", async () => {
    mockPage.locator.mockReturnValue(fakeLocator(1, "  Too many requests, slow down  "))
    await expect(createHandle().firstText("[role='alert']", 8)).resolves.toBe("Too many")
  })

  it("navigates with a DOM-content wait", async () => {
    await createHandle().goto("https://claude.ai/new")
    expect(mockPage.goto).toHaveBeenCalledWith("https://claude.ai/new", {
      waitUntil: "domcontentloaded",
      timeout: 30_000,
    })
  })

  it("maps dropped connections to ConnectionLostError", async () => {
    const loc = fakeLocator(1)
    loc.click.mockRejectedValue(new Error("Protocol error (Runtime.callFunctionOn): Target closed."))
    mockPage.locator.mockReturnValue(loc)

    await expect(createHandle().click("button.send")).rejects.toBeInstanceOf(ConnectionLostError)
  })

  it("maps any failure on a closed page to ConnectionLostError", async () => {
    const loc = fakeLocator(1)
    loc.fill.mockRejectedValue(new Error("element is detached"))
    mockPage.locator.mockReturnValue(loc)
    mockPage.isClosed.mockReturnValue(true)

    await expect(createHandle().fill("div.input", "hi")).rejects.toBeInstanceOf(ConnectionLostError)
  })

  it("lists items with their links, titles and active marker", async () => {
    const link = fakeLocator(1)
    link.getAttribute.mockResolvedValue("/chat/def")
    const items = [
      fakeItem({ href: "/chat/abc", "aria-current": "page" }, { "span.title": fakeLocator(1, " First chat ") }, "ignored"),
      fakeItem({ "data-active": "false" }, { "a[href]": link }, "Second\n"),
      fakeItem({ href: "/chat/ghi" }, {}, "Third"),
    ]
    const list = fakeLocator(3)
    list.nth = (index) => items[index] ?? fakeLocator(0)
    mockPage.locator.mockReturnValue(list)

    const result = await createHandle().listItems("nav a", "span.title", 2)

    expect(result).toEqual([
      { index: 0, href: "/chat/abc", title: "First chat", active: true },
      { index: 1, href: "/chat/def", title: "Second", active: false },
    ])
  })

  it("clicks the n-th match", async () => {
    const second = fakeLocator(1)
    const list = fakeLocator(2)
    list.nth = (index) => (index === 1 ? second : fakeLocator(0))
    mockPage.locator.mockReturnValue(list)

    await createHandle().clickNth("nav a", 1)

    expect(second.click).toHaveBeenCalledWith({ timeout: 10_000 })
  })

  it("passes ordinary command failures through", async () => {
    const loc = fakeLocator(1)
    loc.click.mockRejectedValue(new Error("Timeout 10000ms exceeded."))
    mockPage.locator.mockReturnValue(loc)

    await expect(createHandle().click("button.send")).rejects.toThrow("Timeout 10000ms exceeded.")
  })
})

describe("isConnectionError", () => {
  it("recognises connection failure messages", () => {
    expect(isConnectionError("connect ECONNREFUSED 127.0.0.1:9223")).toBe(true)
    expect(isConnectionError("Target page, context or browser has been closed")).toBe(true)
    expect(isConnectionError("Timeout 10000ms exceeded.")).toBe(false)
  })
})
