/**
 * Gate state — lightweight module to avoid circular deps.
 *
 * Advanced by the gate and exec modules; transitions only move forward:
 * announcing → polling → ready → replaced. The gate runs once per process,
 * so a second wait without resetGateState() is an illegal transition.
 */

export type GateState = "announcing" | "polling" | "ready" | "replaced";

const ORDER: Record<GateState, number> = {
  announcing: 0,
  polling: 1,
  ready: 2,
  replaced: 3,
};

let _state: GateState = "announcing";

export function getGateState(): GateState {
  return _state;
}

export function setGateState(next: GateState): void {
  if (ORDER[next] < ORDER[_state]) {
    throw new Error(`Illegal gate state transition: ${_state} → ${next}`);
  }
  _state = next;
}

/** Reset to the initial state — for testing only */
export function resetGateState(): void {
  _state = "announcing";
}
