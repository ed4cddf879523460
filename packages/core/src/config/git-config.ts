import { simpleGit, type SimpleGit } from "simple-git";
import { createConfigLogger } from "../observability/logger.js";
import type { RawSettings, SettingKey } from "./config.js";

const GIT_KEYS: Record<string, SettingKey> = {
  "pw.server": "server",
  "pw.project": "project",
  "pw.token": "token",
  "pw.username": "username",
  "pw.password": "password",
  "pw.states": "states",
};

/**
 * Read `pw.*` keys from the git configuration visible from `cwd`.
 * Outside a repository only global and system scopes apply.
 */
export async function readGitSettings(git: SimpleGit = simpleGit()): Promise<RawSettings> {
  const log = createConfigLogger();
  let all: Record<string, string | string[]>;
  try {
    ({ all } = await git.listConfig());
  } catch (err) {
    log.debug({ err }, "git config unavailable; continuing without it");
    return {};
  }

  const out: RawSettings = {};
  for (const [gitKey, key] of Object.entries(GIT_KEYS)) {
    const value = all[gitKey];
    if (value === undefined) continue;
    // Repeated keys: the last (most local) definition wins, as with `git config --get`.
    out[key] = Array.isArray(value) ? value[value.length - 1] : value;
  }
  return out;
}
