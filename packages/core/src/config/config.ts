import { z } from "zod";
import { ConfigError } from "../errors.js";
import { createConfigLogger } from "../observability/logger.js";

/** Loose key/value input from one settings source; `undefined` means "not set here". */
export type RawSettings = Partial<Record<SettingKey, string | undefined>>;

export const SETTING_KEYS = [
  "server",
  "project",
  "token",
  "username",
  "password",
  "timeoutMs",
  "perPage",
  "states",
] as const;

export type SettingKey = (typeof SETTING_KEYS)[number];

const ENV_KEYS: Record<SettingKey, string> = {
  server: "PW_SERVER",
  project: "PW_PROJECT",
  token: "PW_TOKEN",
  username: "PW_USERNAME",
  password: "PW_PASSWORD",
  timeoutMs: "PW_TIMEOUT_MS",
  perPage: "PW_PER_PAGE",
  states: "PW_STATES",
};

const positiveInt = (fallback: number, max?: number) => {
  const base = z.number().int().positive();
  return z
    .string()
    .optional()
    .transform((v) => (v == null || v === "" ? fallback : Number(v)))
    .pipe(max === undefined ? base : base.max(max));
};

const SettingsSchema = z.object({
  server: z
    .string({ required_error: "server is required" })
    .min(1, "server is required")
    .url("server must be an absolute URL"),
  project: z
    .string({ required_error: "project is required (use '*' for all projects)" })
    .min(1, "project is required (use '*' for all projects)"),
  token: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  timeoutMs: positiveInt(30_000),
  perPage: positiveInt(30, 250),
  states: z
    .string()
    .optional()
    .transform((v) => {
      if (v == null) return null;
      const list = v
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0);
      return list.length > 0 ? list : null;
    }),
});

export type Credentials =
  | { kind: "token"; token: string }
  | { kind: "basic"; username: string; password: string };

export interface Settings {
  /** API root, always ending in `/api` or `/api/<major>.<minor>`. */
  readonly server: string;
  readonly apiVersion: readonly [number, number];
  /** `null` when every project is in scope (`*`). */
  readonly project: string | null;
  readonly credentials: Credentials | null;
  readonly timeoutMs: number;
  readonly perPage: number;
  readonly allowedStates: readonly string[] | null;
}

export interface LoadSettingsInput {
  gitConfig?: RawSettings;
  env?: NodeJS.ProcessEnv;
  overrides?: RawSettings;
}

export function settingsFromEnv(env: NodeJS.ProcessEnv): RawSettings {
  const out: RawSettings = {};
  for (const key of SETTING_KEYS) {
    const value = env[ENV_KEYS[key]];
    if (value !== undefined && value !== "") out[key] = value;
  }
  return out;
}

function merge(...sources: RawSettings[]): RawSettings {
  const out: RawSettings = {};
  for (const source of sources) {
    for (const key of SETTING_KEYS) {
      const value = source[key];
      if (value !== undefined && value !== "") out[key] = value;
    }
  }
  return out;
}

const VERSIONED_API = /\/api\/(\d+)\.(\d+)$/;

/** Strip trailing slashes and make sure the URL points at the API root. */
export function normalizeServer(server: string): string {
  const log = createConfigLogger();
  let url = server.replace(/\/+$/, "");
  if (!VERSIONED_API.test(url)) {
    log.warn(
      { server: url },
      "Server version missing; older API assumed, features may be unavailable. Configure the server as <host>/api/<major>.<minor>",
    );
    if (!/\/api$/.test(url)) url = `${url}/api`;
  }
  return url;
}

export function apiVersionOf(server: string): readonly [number, number] {
  const match = VERSIONED_API.exec(server);
  if (!match) return [1, 0];
  return [Number(match[1]), Number(match[2])];
}

function credentialsOf(token?: string, username?: string, password?: string): Credentials | null {
  if (token) return { kind: "token", token };
  if (username && password) return { kind: "basic", username, password };
  return null;
}

/**
 * Resolve settings from git configuration, environment and explicit overrides,
 * in increasing precedence. All validation problems are reported at once.
 */
export function loadSettings(input: LoadSettingsInput = {}): Settings {
  const raw = merge(input.gitConfig ?? {}, settingsFromEnv(input.env ?? {}), input.overrides ?? {});
  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
    throw new ConfigError(`Invalid settings: ${msg}`, { details: parsed.error.issues });
  }
  const cfg = parsed.data;
  const server = normalizeServer(cfg.server);
  return Object.freeze({
    server,
    apiVersion: apiVersionOf(server),
    project: cfg.project === "*" ? null : cfg.project,
    credentials: credentialsOf(cfg.token, cfg.username, cfg.password),
    timeoutMs: cfg.timeoutMs,
    perPage: cfg.perPage,
    allowedStates: cfg.states === null ? null : Object.freeze([...cfg.states]),
  });
}
