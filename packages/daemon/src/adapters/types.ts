import { BridgeError } from "@webchat/shared/bridge"
import { z } from "zod"

// ──────────────────────────────────────────────────
// Locator candidates, in order; the first that resolves wins
// ──────────────────────────────────────────────────

const CandidateListSchema = z.array(z.string().trim().min(1)).min(1)

export const LocatorSetSchema = z.object({
  input: CandidateListSchema,
  send: CandidateListSchema,
  stop: CandidateListSchema,
  responseContainer: CandidateListSchema,
  responseContent: CandidateListSchema,
  /** May be empty: a new session then navigates to `startUrl`. */
  newChat: z.array(z.string().trim().min(1)).default([]),
  /** Sidebar entries of earlier chats. Empty disables chat listing. */
  chatItem: z.array(z.string().trim().min(1)).default([]),
  /** Title element inside a chat item; the item's own text when empty. */
  chatTitle: z.array(z.string().trim().min(1)).default([]),
})

export type LocatorSet = z.infer<typeof LocatorSetSchema>

// ──────────────────────────────────────────────────
// Adapter descriptor
// ──────────────────────────────────────────────────

export const AdapterSchema = z.object({
  provider: z.string().trim().min(1),
  displayName: z.string().trim().min(1),
  /** Case-insensitive substring of the provider's tab URL. */
  urlHint: z.string().trim().min(1),
  startUrl: z.string().url(),
  locators: LocatorSetSchema,
  defaultTimeoutSeconds: z.number().positive().default(120),
  maxContextTokens: z.number().int().positive(),
  snippetLength: z.number().int().positive().default(280),
})

export type AdapterInput = z.input<typeof AdapterSchema>

/** Immutable per-provider descriptor. Pure data; no behavior. */
export interface Adapter {
  readonly provider: string
  readonly displayName: string
  readonly urlHint: string
  readonly startUrl: string
  readonly locators: {
    readonly input: readonly string[]
    readonly send: readonly string[]
    readonly stop: readonly string[]
    readonly responseContainer: readonly string[]
    readonly responseContent: readonly string[]
    readonly newChat: readonly string[]
    readonly chatItem: readonly string[]
    readonly chatTitle: readonly string[]
  }
  readonly defaultTimeoutSeconds: number
  readonly maxContextTokens: number
  readonly snippetLength: number
}

/**
 * Validate and freeze an adapter descriptor. Any missing or empty role
 * raises `AdapterIncomplete`.
 */
export function defineAdapter(input: unknown): Adapter {
  const parsed = AdapterSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    throw new BridgeError(
      "AdapterIncomplete",
      "config",
      `Adapter descriptor is incomplete: ${issues.join("; ")}`,
      { issues },
    )
  }

  const { locators, ...rest } = parsed.data
  return Object.freeze({
    ...rest,
    locators: Object.freeze({
      input: Object.freeze([...locators.input]),
      send: Object.freeze([...locators.send]),
      stop: Object.freeze([...locators.stop]),
      responseContainer: Object.freeze([...locators.responseContainer]),
      responseContent: Object.freeze([...locators.responseContent]),
      newChat: Object.freeze([...locators.newChat]),
      chatItem: Object.freeze([...locators.chatItem]),
      chatTitle: Object.freeze([...locators.chatTitle]),
    }),
  })
}
