export type PatchState =
  | "pending"
  | "fetched"
  | "verified"
  | "skip-hash-mismatch"
  | "applied"
  | "failed"
  | "skipped";

const TRANSITIONS: Record<PatchState, readonly PatchState[]> = {
  pending: ["fetched", "skipped", "failed"],
  fetched: ["verified", "skip-hash-mismatch"],
  verified: ["applied", "failed", "skipped"],
  "skip-hash-mismatch": [],
  applied: [],
  failed: [],
  skipped: [],
};

export function isTerminal(state: PatchState): boolean {
  return TRANSITIONS[state].length === 0;
}

export function canTransition(from: PatchState, to: PatchState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Tracks one patch through the engine; a terminal state is never left. */
export class PatchLifecycle {
  private current: PatchState = "pending";

  constructor(private readonly listener?: (from: PatchState, to: PatchState) => void) {}

  get state(): PatchState {
    return this.current;
  }

  to(next: PatchState): void {
    if (!canTransition(this.current, next)) {
      throw new Error(`Illegal patch state transition ${this.current} -> ${next}`);
    }
    const from = this.current;
    this.current = next;
    this.listener?.(from, next);
  }
}
