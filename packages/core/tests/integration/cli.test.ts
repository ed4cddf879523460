import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { API_ROOT, makeDiff } from "@patchpull/testkit-fixtures";
import { emptyProject, incompleteSeries, seriesOfThree, sharedPatch } from "@patchpull/testkit-scenarios";
import type { ApplierOptions, CliDeps } from "../../src/cli/context.js";
import { runCli } from "../../src/cli/program.js";
import { ApplyConflictError } from "../../src/errors.js";
import { useScenarioServer } from "../helpers/server.js";

const mock = useScenarioServer();

function harness(opts: { env?: NodeJS.ProcessEnv; failing?: string[]; cwd?: string } = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const applied: string[] = [];
  const appliers: ApplierOptions[] = [];
  const deps: CliDeps = {
    io: { stdout: (text) => out.push(text), stderr: (text) => err.push(text) },
    env: opts.env ?? { PW_SERVER: API_ROOT, PW_PROJECT: "demo" },
    cwd: opts.cwd ?? process.cwd(),
    readGitConfig: async () => ({}),
    createApplier: (applierOpts) => {
      appliers.push(applierOpts);
      return {
        async apply(_content, patch) {
          if (opts.failing?.includes(patch.id)) throw new ApplyConflictError("patch does not apply");
          applied.push(patch.id);
        },
      };
    },
  };
  return {
    run: (...argv: string[]) => runCli(argv, deps),
    stdout: () => out.join(""),
    stderr: () => err.join(""),
    lines: () => out.join("").split("\n").filter((l) => l.length > 0),
    applied,
    appliers,
  };
}

const firstColumn = (lines: string[]) => lines.map((l) => l.split("\t")[0]);

describe("patch list", () => {
  it("lists open, unarchived patches newest first by default", async () => {
    const scenario = mock.install(seriesOfThree());
    const cli = harness();
    expect(await cli.run("patch", "list")).toBe(0);
    expect(firstColumn(cli.lines())).toEqual(["4", "3", "2", "1"]);
    expect(cli.lines()[0]).toBe(
      "4\t2024-01-01T12:04:00.000Z\tREADME: fix typo\tAlan Turing (alan@example.com)\tunder-review\tno",
    );
    const query = new URLSearchParams(scenario.store.requests[0].search);
    expect(query.getAll("state")).toEqual(["under-review", "new"]);
    expect(query.get("archived")).toBe("false");
    expect(query.get("order")).toBe("-date");
  });

  it("resolves submitters by name and prints JSON", async () => {
    mock.install(seriesOfThree());
    const cli = harness();
    expect(await cli.run("patch", "list", "--submitter", "alan", "--json")).toBe(0);
    const records: unknown = JSON.parse(cli.stdout());
    expect(records).toEqual([expect.objectContaining({ id: 4, name: "README: fix typo" })]);
  });

  it("fails on an empty result only when asked to", async () => {
    mock.install(seriesOfThree());
    const quiet = harness();
    expect(await quiet.run("patch", "list", "--state", "accepted")).toBe(0);
    expect(quiet.stdout()).toBe("");

    const strict = harness();
    expect(await strict.run("patch", "list", "--state", "accepted", "--fail-on-empty")).toBe(1);
    expect(strict.stderr()).toBe("No patches matched\n");
  });

  it("rejects a bad limit as a usage error", async () => {
    mock.install(seriesOfThree());
    const cli = harness();
    expect(await cli.run("patch", "list", "--limit", "0")).toBe(2);
  });
});

describe("patch show and download", () => {
  it("shows a patch with its series", async () => {
    mock.install(seriesOfThree());
    const cli = harness();
    expect(await cli.run("patch", "show", "1")).toBe(0);
    expect(cli.lines()).toContain("Submitter\tAda Lovelace (ada@example.com)");
    expect(cli.lines()).toContain("Series\t10 Add widget support (v1)");
  });

  it("reports a missing patch", async () => {
    mock.install(seriesOfThree());
    const cli = harness();
    expect(await cli.run("patch", "show", "99")).toBe(1);
    expect(cli.stderr()).toBe("error: No patches resource with id 99\n");
  });

  it("prints the mbox or the bare diff", async () => {
    mock.install(seriesOfThree());
    const mbox = harness();
    expect(await mbox.run("patch", "download", "4")).toBe(0);
    expect(mbox.stdout()).toContain("Subject: [PATCH] README: fix typo\n");

    const diff = harness();
    expect(await diff.run("patch", "download", "4", "--diff")).toBe(0);
    expect(diff.stdout()).toBe(makeDiff({ file: "README", before: "teh", after: "the" }));
  });
});

describe("patch apply", () => {
  it("pulls in earlier series members with --deps", async () => {
    mock.install(seriesOfThree());
    const cli = harness();
    expect(await cli.run("patch", "apply", "3", "--deps")).toBe(0);
    expect(cli.applied).toEqual(["1", "2", "3"]);
    expect(cli.appliers).toEqual([{ format: "mbox", amArgs: [] }]);
    expect(cli.lines()[0]).toBe("1\tapplied\t\twidget: add core type\t");
    expect(cli.stderr()).toBe("3 of 3 applied\n");
  });

  it("exits non-zero and blocks dependents when a patch fails", async () => {
    mock.install(seriesOfThree());
    const cli = harness({ failing: ["2"] });
    expect(await cli.run("patch", "apply", "1", "2", "3", "--continue-on-error")).toBe(1);
    expect(cli.applied).toEqual(["1"]);
    expect(firstColumn(cli.lines())).toEqual(["1", "2", "3"]);
    expect(cli.lines()[2]).toBe(
      "3\tskipped\tblocked-by-prior-failure\twidget: document usage\tdepends on patch 2, which was not applied",
    );
    expect(cli.stderr()).toBe("1 of 3 applied, 1 skipped, failed at patch 2: patch does not apply\n");
  });
});

describe("patches in more than one series", () => {
  it("shows every series a patch belongs to", async () => {
    mock.install(sharedPatch());
    const cli = harness();
    expect(await cli.run("patch", "show", "3")).toBe(0);
    expect(cli.lines().filter((l) => l.startsWith("Series\t"))).toEqual([
      "Series\t10 Add widget support (v1)",
      "Series\t12 Widget follow-ups (v1)",
    ]);
  });

  it("takes dependencies from the latest series by default", async () => {
    mock.install(sharedPatch());
    const cli = harness();
    expect(await cli.run("patch", "apply", "3", "--deps")).toBe(0);
    expect(cli.applied).toEqual(["7", "3"]);
  });

  it("takes dependencies from the series given with --series", async () => {
    mock.install(sharedPatch());
    const cli = harness();
    expect(await cli.run("patch", "apply", "3", "--series", "10")).toBe(0);
    expect(cli.applied).toEqual(["1", "2", "3"]);
  });

  it("refuses a series the patch is not part of", async () => {
    mock.install(sharedPatch());
    const cli = harness();
    expect(await cli.run("patch", "apply", "4", "--series", "10")).toBe(1);
    expect(cli.stderr()).toBe("error: Patch 4 is not part of series 10\n");
    expect(cli.applied).toEqual([]);
  });
});

describe("patch update", () => {
  it("sets state and delegate with a token", async () => {
    mock.install(seriesOfThree());
    const cli = harness();
    const code = await cli.run(
      "--token",
      "test-token",
      "patch",
      "update",
      "4",
      "--state",
      "accepted",
      "--delegate",
      "reviewer",
    );
    expect(code).toBe(0);
    expect(cli.lines()).toContain("State\taccepted");
    expect(cli.lines()).toContain("Delegate\treviewer (rita@example.com)");
  });

  it("surfaces auth failures", async () => {
    mock.install(seriesOfThree());
    const cli = harness();
    expect(await cli.run("patch", "update", "4", "--archived", "true")).toBe(1);
    expect(cli.stderr()).toMatch(/^error: Authentication failed \(401\)/);
  });

  it("needs at least one field", async () => {
    mock.install(seriesOfThree());
    const cli = harness();
    expect(await cli.run("--token", "test-token", "patch", "update", "4")).toBe(2);
    expect(cli.stderr()).toBe("Nothing to update; pass --state, --delegate, --archived or --commit-ref\n");
  });
});

describe("series commands", () => {
  let dir: string;
  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "patchpull-cli-"));
  });
  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies a series as bare diffs with extra am arguments passed through", async () => {
    mock.install(seriesOfThree());
    const cli = harness();
    expect(await cli.run("series", "apply", "10", "--diff", "--am-arg=--3way")).toBe(0);
    expect(cli.applied).toEqual(["1", "2", "3"]);
    expect(cli.appliers).toEqual([{ format: "diff", amArgs: ["--3way"] }]);
  });

  it("lists series and fails on an empty project when asked to", async () => {
    mock.install(seriesOfThree());
    const listing = harness();
    expect(await listing.run("series", "list")).toBe(0);
    expect(listing.lines()).toEqual([
      "10\t2024-01-01T12:10:00.000Z\tAdd widget support\tv1\tAda Lovelace (ada@example.com)\t3/3",
    ]);

    mock.install(emptyProject());
    const empty = harness();
    expect(await empty.run("series", "list", "--fail-on-empty")).toBe(1);
    expect(empty.stderr()).toBe("No series matched\n");
  });

  it("refuses an incomplete series", async () => {
    mock.install(incompleteSeries());
    const cli = harness();
    expect(await cli.run("series", "apply", "30")).toBe(1);
    expect(cli.stderr()).toBe("error: Series 30 is incomplete: received 2 of 3 patches\n");
    expect(cli.applied).toEqual([]);
  });

  it("downloads a series into a directory under the server's file name", async () => {
    mock.install(seriesOfThree());
    const cli = harness();
    expect(await cli.run("series", "download", "10", dir)).toBe(0);
    const target = path.join(dir, "10-add-widget-support.patch");
    expect(cli.stdout()).toBe(`${target}\n`);
    expect(await readFile(target, "utf8")).toContain("Subject: [PATCH] widget: add core type\n");
  });
});

describe("series download --separate", () => {
  let dir: string;
  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "patchpull-cli-"));
  });
  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes each patch to its own file", async () => {
    mock.install(seriesOfThree());
    const cli = harness();
    expect(await cli.run("series", "download", "10", dir, "--separate")).toBe(0);
    const names = ["1-widget-add-core-type.patch", "2-widget-wire-up-parser.patch", "3-widget-document-usage.patch"];
    expect(cli.lines()).toEqual(names.map((name) => path.join(dir, name)));
    expect(await readFile(path.join(dir, names[1]), "utf8")).toContain("Subject: [PATCH] widget: wire up parser\n");
  });

  it("defaults to the working directory", async () => {
    mock.install(seriesOfThree());
    const cli = harness({ cwd: dir });
    expect(await cli.run("series", "download", "10", "--separate")).toBe(0);
    expect(cli.lines()[0]).toBe(path.join(dir, "1-widget-add-core-type.patch"));
  });

  it("needs a directory to write into", async () => {
    mock.install(seriesOfThree());
    const cli = harness();
    expect(await cli.run("series", "download", "10", path.join(dir, "all.mbox"), "--separate")).toBe(2);
    expect(cli.stderr()).toBe("With --separate, OUTPUT must be a directory\n");
  });
});

describe("bundle commands", () => {
  it("shows a bundle by name", async () => {
    mock.install(seriesOfThree());
    const cli = harness();
    expect(await cli.run("bundle", "show", "stable-queue")).toBe(0);
    expect(cli.lines()).toContain("Name\tstable-queue");
    expect(cli.lines().filter((l) => l.startsWith("Patch\t"))).toEqual([
      "Patch\t4 README: fix typo",
      "Patch\t1 widget: add core type",
    ]);
  });

  it("applies a bundle in bundle order", async () => {
    mock.install(seriesOfThree());
    const cli = harness();
    expect(await cli.run("bundle", "apply", "20")).toBe(0);
    expect(cli.applied).toEqual(["4", "1"]);
  });
});

describe("settings and usage errors", () => {
  it("exits with a usage status when no server is configured", async () => {
    const cli = harness({ env: {} });
    expect(await cli.run("patch", "list")).toBe(2);
    expect(cli.stderr()).toMatch(/^error: Invalid settings: server: /);
  });

  it("lets flags override the environment", async () => {
    const scenario = mock.install(seriesOfThree());
    const cli = harness({ env: { PW_SERVER: API_ROOT, PW_PROJECT: "other" } });
    expect(await cli.run("--project", "demo", "patch", "list")).toBe(0);
    expect(new URLSearchParams(scenario.store.requests[0].search).get("project")).toBe("demo");
  });

  it("treats unknown options as usage errors", async () => {
    const cli = harness();
    expect(await cli.run("patch", "list", "--no-such-flag")).toBe(2);
  });
});
