import { defineAdapter } from "./types.js"

export const claudeAdapter = defineAdapter({
  provider: "claude",
  displayName: "Claude",
  urlHint: "claude.ai",
  startUrl: "https://claude.ai/new",
  locators: {
    input: ["div.ProseMirror[contenteditable='true']", "div[contenteditable='true']"],
    send: ["button[aria-label='Send Message']", "button[aria-label='Send message']"],
    stop: ["button[aria-label='Stop response']"],
    responseContainer: ["div.font-claude-response"],
    responseContent: [".standard-markdown"],
    newChat: ["button[aria-label*='New chat']", "a[href='/new']"],
    chatItem: ["a[href^='/chat/']"],
    chatTitle: ["span.truncate"],
  },
  defaultTimeoutSeconds: 120,
  maxContextTokens: 200_000,
  snippetLength: 280,
})
