import type { AuthGates } from "@patchpull/testkit-utils";
import type { DBSeed, InMemoryStore } from "./store.js";

export type HandlerFn = (ctx: {
  store: InMemoryStore;
  req: { url: URL; method: string; headers: Record<string, string>; body?: unknown };
  params: Record<string, string>;
  auth: AuthGates;
}) => { status: number; json?: unknown; body?: string; headers?: Record<string, string> };

export interface RouteDescriptor {
  method: "GET" | "POST" | "PATCH" | "DELETE";
  path: string; // absolute path starting with '/', `:name` segments are params
  handler: HandlerFn;
}

export interface ScenarioHandlers {
  routes: RouteDescriptor[];
}

export interface ScenarioResult {
  dbSeed: DBSeed;
  store: InMemoryStore;
  handlers: ScenarioHandlers;
  controls: { auth: AuthGates; reset: () => void };
}

export interface ScenarioOptions {
  /** Fills each patch's `hash` from its diff; left `null` when omitted. */
  hashDiff?: (diff: string) => string;
}
