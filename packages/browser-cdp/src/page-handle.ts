import type { Page } from "playwright-core"

import type { ElementSnapshot, ItemSnapshot, PageHandle } from "./types.js"

const ACTION_TIMEOUT_MS = 10_000
const NAVIGATION_TIMEOUT_MS = 30_000

/** A page command failed because the control channel went away. */
export class ConnectionLostError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ConnectionLostError"
  }
}

const CONNECTION_ERROR_PATTERNS = [
  "Target closed",
  "target closed",
  "Target page, context or browser has been closed",
  "Browser closed",
  "browser has been closed",
  "Protocol error",
  "Connection refused",
  "Connection closed",
  "ECONNREFUSED",
  "ECONNRESET",
  "WebSocket error",
]

export function isConnectionError(message: string): boolean {
  return CONNECTION_ERROR_PATTERNS.some((p) => message.includes(p))
}

/** `PageHandle` over a Playwright page attached through CDP. */
export class PlaywrightPageHandle implements PageHandle {
  readonly tabId: string
  private readonly page: Page

  constructor(tabId: string, page: Page) {
    this.tabId = tabId
    this.page = page
  }

  /** The Playwright page this handle drives. */
  get target(): Page {
    return this.page
  }

  url(): string {
    return this.page.url()
  }

  title(): Promise<string> {
    return this.guard(() => this.page.title())
  }

  count(selector: string): Promise<number> {
    return this.guard(() => this.page.locator(selector).count())
  }

  isInteractable(selector: string): Promise<boolean> {
    return this.guard(async () => {
      const first = this.page.locator(selector).first()
      if ((await first.count()) === 0) return false
      return (await first.isVisible()) && (await first.isEnabled())
    })
  }

  fill(selector: string, text: string): Promise<void> {
    return this.guard(() =>
      this.page.locator(selector).first().fill(text, { timeout: ACTION_TIMEOUT_MS }),
    )
  }

  click(selector: string): Promise<void> {
    return this.guard(() =>
      this.page.locator(selector).first().click({ timeout: ACTION_TIMEOUT_MS }),
    )
  }

  press(selector: string, key: string): Promise<void> {
    return this.guard(() =>
      this.page.locator(selector).first().press(key, { timeout: ACTION_TIMEOUT_MS }),
    )
  }

  readLast(containerSelector: string, contentSelector?: string): Promise<ElementSnapshot | null> {
    return this.guard(async () => {
      const containers = this.page.locator(containerSelector)
      if ((await containers.count()) === 0) return null

      let target = containers.last()
      if (contentSelector !== undefined) {
        const content = target.locator(contentSelector)
        if ((await content.count()) === 0) return null
        target = content.first()
      }

      const [text, html] = await Promise.all([target.innerText(), target.innerHTML()])
      return { text, html }
    })
  }

  firstText(selector: string, maxLength: number): Promise<string | null> {
    return this.guard(async () => {
      const first = this.page.locator(selector).first()
      if ((await first.count()) === 0) return null
      const text = (await first.innerText()).trim()
      return text.slice(0, maxLength)
    })
  }

  goto(url: string): Promise<void> {
    return this.guard(async () => {
      await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: NAVIGATION_TIMEOUT_MS })
    })
  }

  listItems(itemSelector: string, titleSelector: string | undefined, limit: number): Promise<ItemSnapshot[]> {
    return this.guard(async () => {
      const items = this.page.locator(itemSelector)
      const total = Math.min(await items.count(), limit)
      const snapshots: ItemSnapshot[] = []

      for (let index = 0; index < total; index++) {
        const item = items.nth(index)
        let href = await item.getAttribute("href")
        if (!href) {
          const link = item.locator("a[href]").first()
          href = (await link.count()) > 0 ? await link.getAttribute("href") : null
        }

        let titleSource = item
        if (titleSelector !== undefined) {
          const inner = item.locator(titleSelector).first()
          if ((await inner.count()) > 0) titleSource = inner
        }
        const title = (await titleSource.innerText()).trim()

        const active =
          (await item.getAttribute("aria-current")) === "page" ||
          (await item.getAttribute("data-active")) === "true"

        snapshots.push({ index, href: href || null, title, active })
      }
      return snapshots
    })
  }

  clickNth(selector: string, index: number): Promise<void> {
    return this.guard(() =>
      this.page.locator(selector).nth(index).click({ timeout: ACTION_TIMEOUT_MS }),
    )
  }

  private async guard<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      if (this.page.isClosed() || isConnectionError(message)) {
        throw new ConnectionLostError(message)
      }
      throw err
    }
  }
}
