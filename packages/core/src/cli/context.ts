import type { AxiosAdapter } from "axios";
import type { Command } from "commander";
import type { Logger } from "pino";
import { loadSettings, type RawSettings, type Settings } from "../config/config.js";
import { Transport } from "../http/transport.js";
import { createCliLogger, setLogLevel } from "../observability/logger.js";
import { ResourceClient } from "../resources/client.js";
import { Selector } from "../selector/selector.js";
import type { ContentFormat } from "../apply/content.js";
import type { PatchApplier } from "../apply/types.js";

export interface GlobalOptions {
  server?: string;
  project?: string;
  token?: string;
  username?: string;
  password?: string;
  debug?: boolean;
}

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface ApplierOptions {
  format: ContentFormat;
  amArgs: readonly string[];
}

/** Everything the commands touch outside the process. */
export interface CliDeps {
  io: CliIO;
  env: NodeJS.ProcessEnv;
  cwd: string;
  readGitConfig(): Promise<RawSettings>;
  createApplier(opts: ApplierOptions): PatchApplier;
  adapter?: AxiosAdapter;
}

export interface Components {
  settings: Settings;
  client: ResourceClient;
  selector: Selector;
  log: Logger;
}

/**
 * Builds settings and clients on first use, after commander has parsed the
 * global flags, so `--debug` reaches every child logger.
 */
export class CliContext {
  readonly deps: CliDeps;
  private readonly program: Command;
  private built: Promise<Components> | undefined;

  constructor(program: Command, deps: CliDeps) {
    this.program = program;
    this.deps = deps;
  }

  get io(): CliIO {
    return this.deps.io;
  }

  components(): Promise<Components> {
    this.built ??= this.build();
    return this.built;
  }

  private async build(): Promise<Components> {
    const globals = this.program.opts<GlobalOptions>();
    if (globals.debug) setLogLevel("debug");

    const settings = loadSettings({
      gitConfig: await this.deps.readGitConfig(),
      env: this.deps.env,
      overrides: {
        server: globals.server,
        project: globals.project,
        token: globals.token,
        username: globals.username,
        password: globals.password,
      },
    });
    const transport = new Transport({ settings, adapter: this.deps.adapter });
    const client = new ResourceClient({ transport, settings });
    return { settings, client, selector: new Selector({ client }), log: createCliLogger() };
  }
}
