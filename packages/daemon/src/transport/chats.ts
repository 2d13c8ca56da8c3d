/**
 * Chat list helpers: turn sidebar entries into `ChatInfo` and pick the
 * entry a caller names.
 */

import type { ItemSnapshot } from "@webchat/browser-cdp"
import type { ChatInfo } from "@webchat/shared/bridge"

const CHAT_ID_PATTERNS: readonly RegExp[] = [
  /\/chat\/([a-f0-9-]+)/,
  /\/c\/([a-zA-Z0-9-]+)/,
  /\/app\/([a-zA-Z0-9_-]+)/,
  /([a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12})/,
]

const UNTITLED = "Untitled"

/** Conversation id carried by a chat URL, or null for a start page. */
export function chatIdFromUrl(url: string): string | null {
  for (const pattern of CHAT_ID_PATTERNS) {
    const match = pattern.exec(url)
    const id = match?.[1]
    if (!id) continue
    // Gemini sidebar links prefix the conversation id with "c_"
    return url.includes("/app/") && id.startsWith("c_") ? id.slice(2) : id
  }
  return null
}

/** `href` resolved against the page URL; null when either cannot be parsed. */
export function absoluteUrl(href: string, base: string): string | null {
  try {
    return new URL(href, base).toString()
  } catch {
    return null
  }
}

export function toChatInfo(item: ItemSnapshot, pageUrl: string): ChatInfo {
  const url = item.href === null ? null : absoluteUrl(item.href, pageUrl)
  const id = url === null ? null : chatIdFromUrl(url)
  const currentId = chatIdFromUrl(pageUrl)
  const isCurrent =
    item.active || (url !== null && url === pageUrl) || (id !== null && id === currentId)

  return {
    chatId: id ?? url ?? `chat_${item.index}`,
    title: item.title || UNTITLED,
    url,
    isCurrent,
  }
}

/** The chat shown by the page itself. */
export function currentChatInfo(pageUrl: string, title: string): ChatInfo {
  return {
    chatId: chatIdFromUrl(pageUrl) ?? pageUrl,
    title: title.trim() || UNTITLED,
    url: pageUrl,
    isCurrent: true,
  }
}

export function isChatUrl(identifier: string): boolean {
  return /^https?:\/\//i.test(identifier)
}

/**
 * Resolve `identifier` against a chat list: a numeric position first,
 * then an exact chat id, then a case-insensitive title substring.
 */
export function findChat(chats: readonly ChatInfo[], identifier: string): ChatInfo | null {
  const wanted = identifier.trim()
  if (/^\d+$/.test(wanted)) {
    const byIndex = chats[Number(wanted)]
    if (byIndex) return byIndex
  }

  const byId = chats.find((chat) => chat.chatId === wanted)
  if (byId) return byId

  const needle = wanted.toLowerCase()
  return chats.find((chat) => chat.title.toLowerCase().includes(needle)) ?? null
}
