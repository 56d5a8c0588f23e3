/**
 * Instance lifecycle state machine. Pure logic, no I/O.
 *
 * States form a total order and the machine only ever moves forward along it.
 * InstanceAuthority consults this graph before every compare-and-swap; no
 * other code may change a record's state.
 *
 * Self-loops on workload_configured and workload_exposed are the re-entrant
 * configure and idempotent expose operations; they rewrite the record without
 * changing its position in the order.
 */

export const LIFECYCLE_STATES = [
  "unregistered",
  "operator_registered",
  "owner_registered",
  "workload_configured",
  "workload_exposed",
] as const;

export type LifecycleState = (typeof LIFECYCLE_STATES)[number];

export const LIFECYCLE_OPERATIONS = [
  "register_operator",
  "register_owner",
  "configure_workload",
  "expose_workload",
] as const;

export type LifecycleOperation = (typeof LIFECYCLE_OPERATIONS)[number];

/**
 * Complete transition graph.
 *
 * ```
 * unregistered        → operator_registered
 * operator_registered → owner_registered
 * owner_registered    → workload_configured
 * workload_configured → workload_configured, workload_exposed
 * workload_exposed    → workload_exposed
 * ```
 */
export const VALID_TRANSITIONS: Record<LifecycleState, readonly LifecycleState[]> = {
  unregistered: ["operator_registered"],
  operator_registered: ["owner_registered"],
  owner_registered: ["workload_configured"],
  workload_configured: ["workload_configured", "workload_exposed"],
  workload_exposed: ["workload_exposed"],
};

/** Position of a state in the forward order (0 = unregistered). */
export function stateRank(state: LifecycleState): number {
  return LIFECYCLE_STATES.indexOf(state);
}

/** True when `state` is `min` or any later state. */
export function isAtLeast(state: LifecycleState, min: LifecycleState): boolean {
  return stateRank(state) >= stateRank(min);
}

/** Check whether a transition from one state to another is allowed. */
export function isValidTransition(from: LifecycleState, to: LifecycleState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isLifecycleState(value: unknown): value is LifecycleState {
  return typeof value === "string" && (LIFECYCLE_STATES as readonly string[]).includes(value);
}

export function isLifecycleOperation(value: unknown): value is LifecycleOperation {
  return typeof value === "string" && (LIFECYCLE_OPERATIONS as readonly string[]).includes(value);
}

/** Thrown when code attempts a transition not in the valid graph. */
export class InvalidTransitionError extends Error {
  readonly name = "InvalidTransitionError" as const;
  constructor(from: LifecycleState, to: LifecycleState) {
    super(`Invalid lifecycle transition: ${from} → ${to}`);
  }
}

/** Throws InvalidTransitionError unless `from → to` is in the graph. */
export function assertTransition(from: LifecycleState, to: LifecycleState): void {
  if (!isValidTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}
