/**
 * Bridge Data Model
 *
 * Shapes shared by the browser layer, the transport engine and the
 * HTTP surface. Everything here is JSON-safe.
 */

import type { BridgeErrorInfo } from "./errors.js"

// ---------------------------------------------------------------------------
// Browser process
// ---------------------------------------------------------------------------

export type BrowserLifecycleState = "STOPPED" | "STARTING" | "RUNNING" | "STOPPING"

export interface BrowserHandle {
  /** Null when the endpoint was already up and no live PID record names its process. */
  pid: number | null
  profileDir: string
  /** e.g. "http://127.0.0.1:9223" */
  controlEndpoint: string
  state: BrowserLifecycleState
  launchedAt: string | null
}

// ---------------------------------------------------------------------------
// Page leases
// ---------------------------------------------------------------------------

export interface LeaseState {
  provider: string
  associated: boolean
  busy: boolean
  tabId: string | null
  url: string | null
}

export interface PageInfo {
  tabId: string
  url: string
  title: string
  /** Provider whose URL hint matched this tab, if any. */
  provider: string | null
}

// ---------------------------------------------------------------------------
// Interaction
// ---------------------------------------------------------------------------

export type InteractionState =
  | "IDLE"
  | "ENSURE_READY"
  | "SENDING"
  | "WAITING"
  | "EXTRACTING"
  | "DONE"
  | "FAILED"

export interface StageLogEntry {
  stage: InteractionState
  /** ISO 8601 */
  at: string
}

export interface BridgeWarning {
  code: string
  message: string
  details?: Record<string, unknown>
}

export interface StructuredContent {
  /** Visible text of the reply, trimmed. */
  text: string
  /** Best-effort markdown rendering of the reply's HTML. */
  markdown: string
}

/** Per-turn accounting summary merged into a successful result. */
export interface SessionTurnSummary {
  turnCount: number
  sentTokens: number
  responseTokens: number
  responseTimeMs: number | null
  tokensPerSec: number | null
  contextUsagePercent: number
}

export interface SendMetadata {
  transportType: "web"
  controlEndpoint: string | null
  pageUrl: string | null
  requestId: string
  /** Wall time of the whole interaction. */
  elapsedMs: number
  /** Wall time of WAITING + EXTRACTING; null when the reply was not awaited. */
  responseElapsedMs: number | null
  waited: boolean
  timeoutSeconds: number
  baselineCount: number | null
  timestamp: string
  stageLog: StageLogEntry[]
  warnings: BridgeWarning[]
  error?: BridgeErrorInfo
  session?: SessionTurnSummary
}

export interface SendResult {
  success: boolean
  snippet: string | null
  structuredContent: StructuredContent | null
  metadata: SendMetadata
}

export interface NewSessionResult {
  success: boolean
  provider: string
  pageUrl: string | null
  error?: BridgeErrorInfo
}

// ---------------------------------------------------------------------------
// Chats
// ---------------------------------------------------------------------------

/** One conversation in the provider's sidebar, or the one on screen. */
export interface ChatInfo {
  /** Id parsed from the chat URL; the URL or a positional id when none parses. */
  chatId: string
  title: string
  /** Absolute URL; null for sidebar entries that carry no link. */
  url: string | null
  isCurrent: boolean
}

export interface ChatListResult {
  success: boolean
  provider: string
  pageUrl: string | null
  chats: ChatInfo[]
  error?: BridgeErrorInfo
}

/** Outcome of reading or switching the current chat. */
export interface ChatResult {
  success: boolean
  provider: string
  pageUrl: string | null
  chat: ChatInfo | null
  error?: BridgeErrorInfo
}

// ---------------------------------------------------------------------------
// Session statistics
// ---------------------------------------------------------------------------

export interface SessionStats {
  turnCount: number
  sentTokens: number
  responseTokens: number
  tokenCount: number
  lastResponseTimeMs: number | null
  lastTokensPerSec: number | null
  avgResponseTimeMs: number | null
  avgTokensPerSec: number | null
  contextWindowTokens: number
  contextUsagePercent: number
  sessionStartedAt: string
  lastInteractionAt: string | null
}

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

export interface TransportStatus {
  attached: boolean
  name: string
  kind: "web"
  state: InteractionState
  inFlight: boolean
  lastPageUrl: string | null
  lastRequestId: string | null
  lastError: BridgeErrorInfo | null
}

export interface BrowserStatus {
  state: BrowserLifecycleState
  alive: boolean
  pid: number | null
  controlEndpoint: string
}

export interface StatusSnapshot {
  provider: string
  displayName: string
  browser: BrowserStatus
  page: LeaseState
  transport: TransportStatus
  session: SessionStats
  takenAt: string
}
