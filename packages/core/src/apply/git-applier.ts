import { mkdtemp, rm, stat, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { simpleGit, type SimpleGit } from "simple-git";
import type { Logger } from "pino";
import { ApplyConflictError, errorMessage } from "../errors.js";
import type { Patch } from "../models/patch.js";
import { createApplyLogger } from "../observability/logger.js";
import type { ContentFormat } from "./content.js";
import type { PatchApplier } from "./types.js";

export interface GitApplierOptions {
  /** Working tree, and the base directory of `git`; defaults to the current directory. */
  cwd?: string;
  /** Mailbox content goes through `git am`, bare diffs through `git apply` + `git commit`. */
  format?: ContentFormat;
  /** Extra arguments for `git am`, e.g. `--3way` or `--signoff`. */
  amArgs?: readonly string[];
  git?: SimpleGit;
  logger?: Logger;
}

async function withTempFile<T>(content: Buffer, fn: (file: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "patchpull-"));
  const file = path.join(dir, "patch");
  try {
    await writeFile(file, content);
    return await fn(file);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

async function exists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
}

export function authorOf(patch: Patch): string {
  const { name, email } = patch.submitter;
  return `${name ?? email} <${email}>`;
}

export class GitApplier implements PatchApplier {
  private readonly git: SimpleGit;
  private readonly cwd: string;
  private readonly format: ContentFormat;
  private readonly amArgs: readonly string[];
  private readonly log: Logger;
  /** Diff left in the index by a commit that failed. */
  private staged: Buffer | null = null;

  constructor(opts: GitApplierOptions = {}) {
    this.cwd = opts.cwd ?? process.cwd();
    this.git = opts.git ?? simpleGit(this.cwd);
    this.format = opts.format ?? "mbox";
    this.amArgs = opts.amArgs ?? [];
    this.log = opts.logger ?? createApplyLogger();
  }

  async apply(content: Buffer, patch: Patch): Promise<void> {
    await withTempFile(content, async (file) => {
      if (this.format === "mbox") {
        await this.run(patch, ["am", ...this.amArgs, file]);
        return;
      }
      await this.run(patch, ["apply", "--index", file]);
      try {
        await this.run(patch, ["commit", "--author", authorOf(patch), "-m", patch.name]);
      } catch (err) {
        this.staged = content;
        throw err;
      }
    });
  }

  /** Already applied when the change reverses cleanly. */
  async isApplied(content: Buffer): Promise<boolean> {
    return withTempFile(content, async (file) => {
      try {
        await this.git.raw(["apply", "--check", "--reverse", file]);
        return true;
      } catch (err) {
        this.log.debug({ err: errorMessage(err) }, "reverse check failed; patch not present");
        return false;
      }
    });
  }

  /**
   * Clears what a failed `apply` left behind: the `git am` session, if one was
   * started, or a diff that was staged but never committed.
   */
  async abort(): Promise<void> {
    if (this.format === "mbox") {
      const session = (await this.git.raw(["rev-parse", "--git-path", "rebase-apply"])).trim();
      if (!(await exists(path.resolve(this.cwd, session)))) return;
      this.log.debug({ session }, "aborting git am session");
      await this.git.raw(["am", "--abort"]);
      return;
    }
    const staged = this.staged;
    if (staged === null) return;
    this.log.debug("unstaging diff of failed commit");
    await withTempFile(staged, async (file) => {
      await this.git.raw(["apply", "--index", "--reverse", file]);
    });
    this.staged = null;
  }

  private async run(patch: Patch, args: string[]): Promise<void> {
    this.log.debug({ patch: patch.id, args }, "git");
    try {
      await this.git.raw(args);
    } catch (err) {
      throw new ApplyConflictError(`git ${args[0]} failed for patch ${patch.id}: ${errorMessage(err).trim()}`, {
        cause: err,
      });
    }
  }
}
