import { stat, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ApplyReport } from "../apply/types.js";
import type { Bundle } from "../models/bundle.js";
import type { Person, SeriesRef, User } from "../models/common.js";
import type { Patch } from "../models/patch.js";
import type { Series } from "../models/series.js";
import type { Download } from "../resources/client.js";
import type { CliIO } from "./context.js";

export type Row = readonly (string | number | null)[];

export function printRows(io: CliIO, rows: readonly Row[]): void {
  for (const row of rows) io.stdout(`${row.map((cell) => (cell === null ? "" : String(cell))).join("\t")}\n`);
}

export function printJson(io: CliIO, value: unknown): void {
  io.stdout(`${JSON.stringify(value, null, 2)}\n`);
}

const yesNo = (value: boolean) => (value ? "yes" : "no");

export function formatPerson(person: Person): string {
  return person.name ? `${person.name} (${person.email})` : person.email;
}

export function formatUser(user: User | null): string | null {
  if (!user) return null;
  return user.email ? `${user.username} (${user.email})` : user.username;
}

export function patchRow(patch: Patch): Row {
  return [patch.id, patch.date, patch.name, formatPerson(patch.submitter), patch.state, yesNo(patch.archived)];
}

const seriesLabel = (s: SeriesRef) => [s.id, s.name, `(v${s.version})`].filter(Boolean).join(" ");

export function patchDetails(patch: Patch): Row[] {
  const series = patch.allSeries.length > 0 ? patch.allSeries.map(seriesLabel) : [null];
  return [
    ["ID", patch.id],
    ["Message ID", patch.msgid],
    ["Date", patch.date],
    ["Name", patch.name],
    ["URL", patch.webUrl],
    ["Submitter", formatPerson(patch.submitter)],
    ["State", patch.state],
    ["Archived", yesNo(patch.archived)],
    ["Delegate", formatUser(patch.delegate)],
    ["Commit Ref", patch.commitRef],
    ...series.map((label): Row => ["Series", label]),
  ];
}

export function seriesRow(series: Series): Row {
  return [
    series.id,
    series.date,
    series.name,
    `v${series.version}`,
    formatPerson(series.submitter),
    `${series.receivedTotal}/${series.total}`,
  ];
}

export function seriesDetails(series: Series): Row[] {
  return [
    ["ID", series.id],
    ["Date", series.date],
    ["Name", series.name],
    ["URL", series.webUrl],
    ["Submitter", formatPerson(series.submitter)],
    ["Version", series.version],
    ["Received", `${series.receivedTotal} of ${series.total}`],
    ["Complete", yesNo(series.complete)],
    ["Cover", series.coverLetter ? `${series.coverLetter.id} ${series.coverLetter.name}` : null],
    ...series.patches.map((ref): Row => ["Patch", `${ref.id} ${ref.name}`]),
  ];
}

export function bundleRow(bundle: Bundle): Row {
  return [bundle.id, bundle.name, formatUser(bundle.owner), yesNo(bundle.public), bundle.patches.length];
}

export function bundleDetails(bundle: Bundle): Row[] {
  return [
    ["ID", bundle.id],
    ["Name", bundle.name],
    ["URL", bundle.webUrl],
    ["Owner", formatUser(bundle.owner)],
    ["Public", yesNo(bundle.public)],
    ...bundle.patches.map((ref): Row => ["Patch", `${ref.id} ${ref.name}`]),
  ];
}

export function reportRows(report: ApplyReport): Row[] {
  return report.results.map((r) => [r.patch.id, r.status, r.reason ?? null, r.patch.name, r.message ?? null]);
}

export function reportJson(report: ApplyReport) {
  return {
    outcome: report.outcome,
    total: report.total,
    results: report.results.map((r) => ({
      id: r.patch.id,
      name: r.patch.name,
      status: r.status,
      reason: r.reason ?? null,
      message: r.message ?? null,
    })),
  };
}

/**
 * Write downloaded content. `-` means stdout; a directory gets the server's
 * file name; no output at all writes that name into `cwd`. Returns the path
 * written, or null for stdout.
 */
export async function saveDownload(
  io: CliIO,
  download: Download,
  fallbackName: string,
  output: string | undefined,
  cwd: string,
): Promise<string | null> {
  if (output === "-") {
    io.stdout(download.content.toString("utf8"));
    return null;
  }
  const name = download.filename ?? fallbackName;
  let target = output === undefined ? path.join(cwd, name) : path.resolve(cwd, output);
  if (output !== undefined && (await isDirectory(target))) target = path.join(target, name);
  await writeFile(target, download.content);
  return target;
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
}
