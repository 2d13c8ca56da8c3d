import { defineAdapter } from "./types.js"

export const chatgptAdapter = defineAdapter({
  provider: "chatgpt",
  displayName: "ChatGPT",
  urlHint: "chatgpt.com",
  startUrl: "https://chatgpt.com/",
  locators: {
    input: ["div#prompt-textarea[contenteditable='true']", "textarea#prompt-textarea"],
    send: ["button[data-testid='send-button']"],
    stop: ["button[data-testid='stop-button']"],
    responseContainer: ["div[data-message-author-role='assistant']"],
    responseContent: ["div.markdown.prose", "div.markdown"],
    newChat: ["button:has-text('New chat')", "a:has-text('New chat')"],
    chatItem: ["#history a[href^='/c/']", "nav a[href^='/c/']"],
    chatTitle: ["span[dir='auto']"],
  },
  defaultTimeoutSeconds: 120,
  maxContextTokens: 128_000,
  snippetLength: 280,
})
