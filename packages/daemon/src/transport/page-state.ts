import { ConnectionLostError, type PageHandle } from "@webchat/browser-cdp"
import type { BridgeWarning } from "@webchat/shared/bridge"

const MAX_WARNING_TEXT = 300

/** Elements that usually mean the page is not in a state to take a prompt. */
export const SUSPICIOUS_SELECTORS: readonly string[] = [
  "input[type='password']",
  "button:has-text('Sign in')",
  "button:has-text('Log in')",
  "a:has-text('Sign in')",
  "a:has-text('Log in')",
  "iframe[src*='captcha']",
  "div:has-text('verify you are human')",
  "div:has-text('Too many requests')",
  "div:has-text('rate limit')",
  "[role='alert']",
  "div[data-testid='toast']",
  "div[role='status']",
]

/**
 * First suspicious element on the page, as a warning. Query failures
 * other than a dropped connection count as "not found".
 */
export async function inspectPageState(page: PageHandle): Promise<BridgeWarning | null> {
  for (const selector of SUSPICIOUS_SELECTORS) {
    let text: string | null
    try {
      text = await page.firstText(selector, MAX_WARNING_TEXT)
    } catch (err) {
      if (err instanceof ConnectionLostError) throw err
      continue
    }
    if (text === null) continue

    return {
      code: "SUSPICIOUS_PAGE_STATE",
      message: `Page shows '${selector}'; the reply may not arrive`,
      details: { selector, text },
    }
  }
  return null
}
