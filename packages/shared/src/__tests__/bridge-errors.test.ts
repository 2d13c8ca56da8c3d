import { describe, expect, it } from "vitest"

import { BridgeError, isBridgeError, toErrorInfo } from "../bridge/errors.js"

describe("BridgeError", () => {
  it("carries kind, stage and details", () => {
    const err = new BridgeError("SelectorMissing", "ensure_ready", "input not found", {
      selector: "div.input",
    })

    expect(err).toBeInstanceOf(Error)
    expect(err.name).toBe("BridgeError")
    expect(err.toInfo()).toEqual({
      kind: "SelectorMissing",
      stage: "ensure_ready",
      message: "input not found",
      details: { selector: "div.input" },
    })
  })

  it("omits details from the info when none were given", () => {
    const info = new BridgeError("ProviderBusy", "lease", "busy").toInfo()
    expect(info).toEqual({ kind: "ProviderBusy", stage: "lease", message: "busy" })
    expect("details" in info).toBe(false)
  })
})

describe("isBridgeError", () => {
  it("distinguishes bridge errors from foreign ones", () => {
    expect(isBridgeError(new BridgeError("StopFailed", "stop", "x"))).toBe(true)
    expect(isBridgeError(new Error("x"))).toBe(false)
    expect(isBridgeError("x")).toBe(false)
  })
})

describe("toErrorInfo", () => {
  it("passes bridge errors through unchanged", () => {
    const err = new BridgeError("ResponseTimeout", "wait", "timed out", { timeoutSeconds: 5 })
    expect(toErrorInfo(err, "send")).toEqual(err.toInfo())
  })

  it("maps foreign errors to InternalError at the given stage", () => {
    expect(toErrorInfo(new TypeError("bad"), "extract")).toEqual({
      kind: "InternalError",
      stage: "extract",
      message: "bad",
      details: { exceptionType: "TypeError" },
    })
  })

  it("maps thrown non-errors", () => {
    expect(toErrorInfo("oops", "dispatch")).toEqual({
      kind: "InternalError",
      stage: "dispatch",
      message: "oops",
      details: { exceptionType: "string" },
    })
  })
})
