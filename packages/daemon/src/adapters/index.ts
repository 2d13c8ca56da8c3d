import { chatgptAdapter } from "./chatgpt.js"
import { claudeAdapter } from "./claude.js"
import { geminiAdapter } from "./gemini.js"
import type { Adapter } from "./types.js"

export { AdapterSchema, defineAdapter, LocatorSetSchema } from "./types.js"
export type { Adapter, AdapterInput, LocatorSet } from "./types.js"
export { chatgptAdapter, claudeAdapter, geminiAdapter }

/** Built-in descriptors keyed by provider name. */
export const BUILTIN_ADAPTERS: Readonly<Record<string, Adapter>> = Object.freeze({
  claude: claudeAdapter,
  chatgpt: chatgptAdapter,
  gemini: geminiAdapter,
})

/** Descriptors for `providers`, in order. Throws on a name with no built-in. */
export function resolveAdapters(providers: readonly string[]): Adapter[] {
  return providers.map((provider) => {
    const adapter = Object.hasOwn(BUILTIN_ADAPTERS, provider) ? BUILTIN_ADAPTERS[provider] : undefined
    if (!adapter) throw new Error(`No built-in adapter for provider '${provider}'`)
    return adapter
  })
}
