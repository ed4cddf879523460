#!/usr/bin/env node
import { GitApplier } from "./apply/git-applier.js";
import { runCli } from "./cli/program.js";
import { readGitSettings } from "./config/git-config.js";
import { logger } from "./observability/logger.js";

async function main(): Promise<number> {
  return runCli(process.argv.slice(2), {
    io: {
      stdout: (text) => process.stdout.write(text),
      stderr: (text) => process.stderr.write(text),
    },
    env: process.env,
    cwd: process.cwd(),
    readGitConfig: () => readGitSettings(),
    createApplier: ({ format, amArgs }) => new GitApplier({ format, amArgs }),
  });
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err) => {
    logger.error({ err }, "patchpull crashed");
    process.exitCode = 1;
  },
);
