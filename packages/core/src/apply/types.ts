import type { Patch } from "../models/patch.js";
import type { PatchState } from "./state.js";

export type ApplyStatus = "applied" | "skipped" | "failed";

export type SkipReason = "hash-mismatch" | "already-applied" | "blocked-by-prior-failure";

export interface ApplyResult {
  patch: Patch;
  status: ApplyStatus;
  reason?: SkipReason;
  /** Tool diagnostic for failures, explanation for skips. */
  message?: string;
}

export type ApplyOutcome = "completed" | "halted" | "cancelled";

export interface ApplyReport {
  /** One entry per attempted patch, in input order. */
  results: ApplyResult[];
  outcome: ApplyOutcome;
  /** Number of patches handed to the engine. */
  total: number;
}

/**
 * Local tree operations. `apply` throws `ApplyConflictError` carrying the
 * tool's diagnostic when the patch does not go in.
 */
export interface PatchApplier {
  apply(content: Buffer, patch: Patch): Promise<void>;
  /** True when the change is already present in the tree. */
  isApplied?(content: Buffer, patch: Patch): Promise<boolean>;
  /** Clears an interrupted session left by a failed `apply`. */
  abort?(): Promise<void>;
}

export interface ContentSource {
  fetch(patch: Patch): Promise<Buffer>;
}

export type ContentHasher = (content: Buffer) => string;

export interface TransitionEvent {
  patch: Patch;
  from: PatchState;
  to: PatchState;
}

export interface ApplyOptions {
  verifyHash?: boolean;
  continueOnError?: boolean;
  skipApplied?: boolean;
  signal?: AbortSignal;
  onTransition?: (event: TransitionEvent) => void;
}
