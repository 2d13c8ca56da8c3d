import TurndownService from "turndown"

const SNIPPET_BREAK_WINDOW = 40
const SNIPPET_ELLIPSIS = " …"

/**
 * Short preview of a reply. Text longer than `maxLength` is cut there and,
 * when a whitespace or sentence break falls within the last 40 characters
 * of the cut, trimmed back to that break.
 */
export function makeSnippet(text: string, maxLength: number): string {
  const clean = text.trim()
  if (clean.length <= maxLength) return clean

  let cut = clean.slice(0, maxLength)
  const floor = Math.max(0, maxLength - SNIPPET_BREAK_WINDOW)
  for (let i = cut.length - 1; i >= floor; i--) {
    const ch = cut.charAt(i)
    if (/\s/.test(ch)) {
      cut = cut.slice(0, i)
      break
    }
    if (ch === "." || ch === "!" || ch === "?") {
      cut = cut.slice(0, i + 1)
      break
    }
  }
  return cut.trimEnd() + SNIPPET_ELLIPSIS
}

const turndown = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
  bulletListMarker: "-",
})

/** Best-effort markdown for a reply's markup; falls back to the plain text. */
export function toMarkdown(html: string, fallbackText: string): string {
  if (!html.trim()) return fallbackText
  try {
    const markdown = turndown.turndown(html).trim()
    return markdown || fallbackText
  } catch {
    return fallbackText
  }
}
