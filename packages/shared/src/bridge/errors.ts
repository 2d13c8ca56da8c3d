/**
 * Bridge error taxonomy.
 *
 * Every failure the engine can report has a `kind` and the `stage` it was
 * detected in. Inside the engine these travel as thrown `BridgeError`s;
 * at the provider boundary they are flattened into `BridgeErrorInfo` and
 * returned in the result metadata.
 */

export type BridgeErrorKind =
  | "SelectorMissing"
  | "ResponseTimeout"
  | "ProviderBusy"
  | "ProviderUnavailable"
  | "TransportUnreachable"
  | "TransportNotAttached"
  | "ChatNotFound"
  | "BrowserLaunchFailed"
  | "StopFailed"
  | "AdapterIncomplete"
  | "InternalError"

export type BridgeErrorStage =
  | "config"
  | "dispatch"
  | "lease"
  | "ensure_ready"
  | "send"
  | "wait"
  | "extract"
  | "new_session"
  | "chats"
  | "launch"
  | "stop"

/** JSON-safe error shape returned to callers. */
export interface BridgeErrorInfo {
  kind: BridgeErrorKind
  stage: BridgeErrorStage
  message: string
  details?: Record<string, unknown>
}

export class BridgeError extends Error {
  readonly kind: BridgeErrorKind
  readonly stage: BridgeErrorStage
  readonly details: Record<string, unknown> | undefined

  constructor(
    kind: BridgeErrorKind,
    stage: BridgeErrorStage,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = "BridgeError"
    this.kind = kind
    this.stage = stage
    this.details = details
  }

  toInfo(): BridgeErrorInfo {
    return this.details
      ? { kind: this.kind, stage: this.stage, message: this.message, details: this.details }
      : { kind: this.kind, stage: this.stage, message: this.message }
  }
}

export function isBridgeError(err: unknown): err is BridgeError {
  return err instanceof BridgeError
}

/**
 * Flatten anything thrown into a `BridgeErrorInfo`. Foreign errors become
 * `InternalError` attributed to `stage`.
 */
export function toErrorInfo(err: unknown, stage: BridgeErrorStage): BridgeErrorInfo {
  if (err instanceof BridgeError) {
    return err.toInfo()
  }
  const message = err instanceof Error ? err.message : String(err)
  const exceptionType = err instanceof Error ? err.name : typeof err
  return { kind: "InternalError", stage, message, details: { exceptionType } }
}
