/**
 * Interaction state machine.
 *
 * One Interaction walks IDLE → ENSURE_READY → SENDING → WAITING →
 * EXTRACTING → DONE. SENDING may finish straight to DONE when the reply
 * is not awaited, and any non-terminal state may fail. Every transition
 * appends a timestamped entry to the stage log.
 */

import type { InteractionState, StageLogEntry } from "@webchat/shared/bridge"

/**
 * Valid state transitions for an interaction.
 * Each key maps to the set of states it can transition to.
 */
export const VALID_TRANSITIONS: Record<InteractionState, InteractionState[]> = {
  IDLE: ["ENSURE_READY", "FAILED"],
  ENSURE_READY: ["SENDING", "FAILED"],
  SENDING: ["WAITING", "DONE", "FAILED"],
  WAITING: ["EXTRACTING", "FAILED"],
  EXTRACTING: ["DONE", "FAILED"],
  DONE: [],
  FAILED: [],
}

export class InvalidTransitionError extends Error {
  readonly from: InteractionState
  readonly to: InteractionState

  constructor(from: InteractionState, to: InteractionState) {
    super(`Invalid interaction transition: ${from} → ${to}`)
    this.name = "InvalidTransitionError"
    this.from = from
    this.to = to
  }
}

export function isValidTransition(from: InteractionState, to: InteractionState): boolean {
  return VALID_TRANSITIONS[from].includes(to)
}

export function assertValidTransition(from: InteractionState, to: InteractionState): void {
  if (!isValidTransition(from, to)) {
    throw new InvalidTransitionError(from, to)
  }
}

export interface InteractionTransitionEvent {
  from: InteractionState
  to: InteractionState
  at: string
}

export type InteractionListener = (event: InteractionTransitionEvent) => void

export class InteractionStateMachine {
  private _state: InteractionState = "IDLE"
  private readonly log: StageLogEntry[]
  private readonly listeners: InteractionListener[] = []
  private readonly now: () => Date

  constructor(now: () => Date = () => new Date()) {
    this.now = now
    this.log = [{ stage: "IDLE", at: now().toISOString() }]
  }

  get state(): InteractionState {
    return this._state
  }

  get isTerminal(): boolean {
    return this._state === "DONE" || this._state === "FAILED"
  }

  /** Throws InvalidTransitionError if the transition is not allowed. */
  transition(to: InteractionState): void {
    assertValidTransition(this._state, to)
    const event: InteractionTransitionEvent = {
      from: this._state,
      to,
      at: this.now().toISOString(),
    }
    this._state = to
    this.log.push({ stage: to, at: event.at })
    for (const listener of this.listeners) {
      listener(event)
    }
  }

  /** Move to FAILED unless already terminal. */
  fail(): void {
    if (!this.isTerminal) this.transition("FAILED")
  }

  onTransition(listener: InteractionListener): void {
    this.listeners.push(listener)
  }

  /** Copy of the stage log so far. */
  stageLog(): StageLogEntry[] {
    return this.log.map((entry) => ({ ...entry }))
  }
}
