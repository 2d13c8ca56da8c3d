import { beforeEach, describe, expect, it } from "vitest"

import { estimateTokens, SessionAccountant, tokensPerSecond } from "../session/accountant.js"

const NOW = new Date("2026-01-01T00:00:00.000Z")

describe("estimateTokens", () => {
  it("rounds characters / 4 up", () => {
    expect(estimateTokens("")).toBe(0)
    expect(estimateTokens("abc")).toBe(1)
    expect(estimateTokens("abcd")).toBe(1)
    expect(estimateTokens("abcde")).toBe(2)
  })
})

describe("tokensPerSecond", () => {
  it("is zero below 50 ms", () => {
    expect(tokensPerSecond(100, 49)).toBe(0)
  })

  it("divides by elapsed seconds", () => {
    expect(tokensPerSecond(100, 2_000)).toBe(50)
  })
})

describe("SessionAccountant", () => {
  let accountant: SessionAccountant

  beforeEach(() => {
    accountant = new SessionAccountant(() => NOW)
    accountant.register("claude", 1_000)
    accountant.register("gemini", 3_000)
  })

  it("starts empty", () => {
    expect(accountant.stats("claude")).toEqual({
      turnCount: 0,
      sentTokens: 0,
      responseTokens: 0,
      tokenCount: 0,
      lastResponseTimeMs: null,
      lastTokensPerSec: null,
      avgResponseTimeMs: null,
      avgTokensPerSec: null,
      contextWindowTokens: 1_000,
      contextUsagePercent: 0,
      sessionStartedAt: "2026-01-01T00:00:00.000Z",
      lastInteractionAt: null,
    })
  })

  it("summarizes each turn", () => {
    const summary = accountant.record("claude", {
      sentText: "x".repeat(40),
      responseText: "y".repeat(400),
      responseElapsedMs: 1_000,
    })

    expect(summary).toEqual({
      turnCount: 1,
      sentTokens: 10,
      responseTokens: 100,
      responseTimeMs: 1_000,
      tokensPerSec: 100,
      contextUsagePercent: 11,
    })
  })

  it("keeps running totals and averages", () => {
    accountant.record("claude", {
      sentText: "x".repeat(40),
      responseText: "y".repeat(400),
      responseElapsedMs: 1_000,
    })
    accountant.record("claude", {
      sentText: "x".repeat(8),
      responseText: "y".repeat(40),
      responseElapsedMs: 2_000,
    })

    expect(accountant.stats("claude")).toMatchObject({
      turnCount: 2,
      sentTokens: 12,
      responseTokens: 110,
      tokenCount: 122,
      lastResponseTimeMs: 2_000,
      lastTokensPerSec: 5,
      avgResponseTimeMs: 1_500,
      avgTokensPerSec: 52.5,
      contextUsagePercent: 12.2,
      lastInteractionAt: "2026-01-01T00:00:00.000Z",
    })
  })

  it("rounds the averages", () => {
    accountant.record("claude", { sentText: "a", responseText: "abc", responseElapsedMs: 300 })
    accountant.record("claude", { sentText: "a", responseText: "abc", responseElapsedMs: 700 })

    const stats = accountant.stats("claude")
    expect(stats.avgResponseTimeMs).toBe(500)
    // (3.333… + 1.428…) / 2 = 2.38…
    expect(stats.avgTokensPerSec).toBe(2.4)
    expect(stats.lastTokensPerSec).toBe(1.4)
  })

  it("rounds a half-millisecond average up", () => {
    accountant.record("claude", { sentText: "a", responseText: "b", responseElapsedMs: 1_001 })
    accountant.record("claude", { sentText: "a", responseText: "b", responseElapsedMs: 1_002 })
    expect(accountant.stats("claude").avgResponseTimeMs).toBe(1_002)
  })

  it("reports a zero rate for sub-50 ms replies", () => {
    const summary = accountant.record("claude", {
      sentText: "hi",
      responseText: "hello",
      responseElapsedMs: 20,
    })
    expect(summary.tokensPerSec).toBe(0)
  })

  it("counts an unawaited turn without timing", () => {
    const summary = accountant.record("claude", {
      sentText: "x".repeat(12),
      responseText: "",
      responseElapsedMs: null,
    })

    expect(summary).toEqual({
      turnCount: 1,
      sentTokens: 3,
      responseTokens: 0,
      responseTimeMs: null,
      tokensPerSec: null,
      contextUsagePercent: 0.3,
    })
    expect(accountant.stats("claude").avgResponseTimeMs).toBeNull()
  })

  it("rounds context usage to two decimals", () => {
    accountant.record("gemini", { sentText: "a", responseText: "", responseElapsedMs: null })
    expect(accountant.stats("gemini").contextUsagePercent).toBe(0.03)
  })

  it("resets one provider without touching another", () => {
    accountant.record("claude", { sentText: "hello", responseText: "world", responseElapsedMs: 500 })
    accountant.record("gemini", { sentText: "hello", responseText: "world", responseElapsedMs: 500 })

    accountant.reset("claude")

    expect(accountant.stats("claude")).toMatchObject({ turnCount: 0, tokenCount: 0, avgResponseTimeMs: null })
    expect(accountant.stats("gemini")).toMatchObject({ turnCount: 1, tokenCount: 4, avgResponseTimeMs: 500 })
  })

  it("keeps stats when a provider is registered again", () => {
    accountant.record("claude", { sentText: "hello", responseText: "", responseElapsedMs: null })
    accountant.register("claude", 5_000)
    expect(accountant.stats("claude").turnCount).toBe(1)
    expect(accountant.stats("claude").contextWindowTokens).toBe(1_000)
  })

  it("throws for an unregistered provider", () => {
    expect(() => accountant.stats("chatgpt")).toThrow("No session registered for provider 'chatgpt'")
  })
})
