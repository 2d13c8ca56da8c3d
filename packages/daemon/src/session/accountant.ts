/**
 * SessionAccountant: per-provider running statistics.
 *
 * Only successful interactions are recorded. Token counts are estimates
 * (see `estimateTokens`); a turn whose reply was not awaited counts the
 * turn and its sent tokens but contributes no timing.
 */

import type { SessionStats, SessionTurnSummary } from "@webchat/shared/bridge"

/** Below this, a reply is too fast to give a meaningful rate. */
const MIN_RATE_ELAPSED_MS = 50

export interface TurnRecord {
  sentText: string
  responseText: string
  /** WAITING + EXTRACTING duration; null when the reply was not awaited. */
  responseElapsedMs: number | null
}

interface SessionState {
  contextWindowTokens: number
  turnCount: number
  sentTokens: number
  responseTokens: number
  lastResponseTimeMs: number | null
  lastTokensPerSec: number | null
  timedTurns: number
  totalResponseTimeMs: number
  totalTokensPerSec: number
  sessionStartedAt: string
  lastInteractionAt: string | null
}

/** Roughly four characters per token. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4)
}

export function tokensPerSecond(tokens: number, elapsedMs: number): number {
  if (elapsedMs < MIN_RATE_ELAPSED_MS) return 0
  return tokens / (elapsedMs / 1000)
}

export class SessionAccountant {
  private readonly sessions = new Map<string, SessionState>()
  private readonly now: () => Date

  constructor(now: () => Date = () => new Date()) {
    this.now = now
  }

  /** Start tracking `provider`. Re-registering keeps the existing stats. */
  register(provider: string, contextWindowTokens: number): void {
    if (this.sessions.has(provider)) return
    this.sessions.set(provider, this.freshState(contextWindowTokens))
  }

  has(provider: string): boolean {
    return this.sessions.has(provider)
  }

  record(provider: string, turn: TurnRecord): SessionTurnSummary {
    const s = this.require(provider)
    const sentTokens = estimateTokens(turn.sentText)
    const responseTokens = estimateTokens(turn.responseText)

    s.turnCount += 1
    s.sentTokens += sentTokens
    s.responseTokens += responseTokens
    s.lastInteractionAt = this.now().toISOString()

    let responseTimeMs: number | null = null
    let rate: number | null = null
    if (turn.responseElapsedMs !== null) {
      responseTimeMs = Math.max(0, Math.round(turn.responseElapsedMs))
      const rawRate = tokensPerSecond(responseTokens, responseTimeMs)
      rate = round(rawRate, 1)
      s.timedTurns += 1
      s.totalResponseTimeMs += responseTimeMs
      s.totalTokensPerSec += rawRate
      s.lastResponseTimeMs = responseTimeMs
      s.lastTokensPerSec = rate
    }

    return {
      turnCount: s.turnCount,
      sentTokens,
      responseTokens,
      responseTimeMs,
      tokensPerSec: rate,
      contextUsagePercent: usagePercent(s),
    }
  }

  stats(provider: string): SessionStats {
    const s = this.require(provider)
    return {
      turnCount: s.turnCount,
      sentTokens: s.sentTokens,
      responseTokens: s.responseTokens,
      tokenCount: s.sentTokens + s.responseTokens,
      lastResponseTimeMs: s.lastResponseTimeMs,
      lastTokensPerSec: s.lastTokensPerSec,
      avgResponseTimeMs: s.timedTurns > 0 ? Math.round(s.totalResponseTimeMs / s.timedTurns) : null,
      avgTokensPerSec: s.timedTurns > 0 ? round(s.totalTokensPerSec / s.timedTurns, 1) : null,
      contextWindowTokens: s.contextWindowTokens,
      contextUsagePercent: usagePercent(s),
      sessionStartedAt: s.sessionStartedAt,
      lastInteractionAt: s.lastInteractionAt,
    }
  }

  /** Zero `provider`'s statistics; other providers are untouched. */
  reset(provider: string): void {
    const s = this.require(provider)
    this.sessions.set(provider, this.freshState(s.contextWindowTokens))
  }

  private require(provider: string): SessionState {
    const s = this.sessions.get(provider)
    if (!s) throw new Error(`No session registered for provider '${provider}'`)
    return s
  }

  private freshState(contextWindowTokens: number): SessionState {
    return {
      contextWindowTokens,
      turnCount: 0,
      sentTokens: 0,
      responseTokens: 0,
      lastResponseTimeMs: null,
      lastTokensPerSec: null,
      timedTurns: 0,
      totalResponseTimeMs: 0,
      totalTokensPerSec: 0,
      sessionStartedAt: this.now().toISOString(),
      lastInteractionAt: null,
    }
  }
}

function usagePercent(s: SessionState): number {
  if (s.contextWindowTokens <= 0) return 0
  return round(((s.sentTokens + s.responseTokens) / s.contextWindowTokens) * 100, 2)
}

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals
  return Math.round(value * factor) / factor
}
