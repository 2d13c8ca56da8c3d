import { defineAdapter } from "./types.js"

export const geminiAdapter = defineAdapter({
  provider: "gemini",
  displayName: "Gemini",
  urlHint: "gemini.google.com",
  startUrl: "https://gemini.google.com/app",
  locators: {
    input: [
      "div.ql-editor[contenteditable='true'][aria-label*='prompt']",
      "rich-textarea div[contenteditable='true']",
    ],
    send: ["button[aria-label='Send message']"],
    stop: ["mat-icon[fonticon='stop']", "button[aria-label='Stop response']"],
    responseContainer: ["message-content"],
    responseContent: ["div.markdown.markdown-main-panel", "div.markdown"],
    newChat: ["button:has-text('New chat')", "a:has-text('New chat')"],
    chatItem: ["div.conversation-items-container", "a[href^='/app/']"],
    chatTitle: ["div.conversation-title"],
  },
  defaultTimeoutSeconds: 120,
  maxContextTokens: 2_000_000,
  snippetLength: 280,
})
