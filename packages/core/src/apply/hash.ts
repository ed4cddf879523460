import { createHash } from "node:crypto";

const FILENAME = /^(---|\+\+\+) (\S+)/;
const HUNK = /^@@ -\d+(?:,(\d+))? \+\d+(?:,(\d+))? @@/;
const DIFF_LINE_PREFIXES = new Set(["-", "+", " "]);

/**
 * Hash a unified diff the way the patch server does, so a locally fetched
 * diff can be compared with the `hash` field of its record.
 *
 * The diff is normalised first: carriage returns dropped, file names reduced
 * to `a/` or `b/` plus the path without its first component, hunk headers
 * reduced to their line counts, and anything that is not a diff line ignored.
 */
export function hashDiff(diff: string): string {
  const sha = createHash("sha1");
  const text = `${diff.replace(/\r/g, "").trim()}\n`;

  for (const raw of text.split("\n")) {
    if (raw.length === 0) continue;
    let line = raw;
    const file = FILENAME.exec(raw);
    const hunk = file ? null : HUNK.exec(raw);
    if (file) {
      const side = file[1] === "---" ? "a/" : "b/";
      line = `${file[1]} ${side}${file[2].split("/").slice(1).join("/")}`;
    } else if (hunk) {
      const count = (n: string | undefined) => (n === undefined ? 1 : Number(n));
      line = `@@ -${count(hunk[1])} +${count(hunk[2])} @@`;
    } else if (!DIFF_LINE_PREFIXES.has(raw[0])) {
      continue;
    }
    sha.update(`${line}\n`, "utf8");
  }
  return sha.digest("hex");
}

const DIFF_BODY = /^(?:[-+ @\\]|diff )/;

/**
 * The diff part of a mailbox message: from the first diff line up to the
 * last `-- ` signature separator, since a removed "- " line looks the same.
 * Plain diffs come back unchanged.
 */
export function extractDiff(content: string): string {
  const lines = content.replace(/\r/g, "").split("\n");
  const start = lines.findIndex(
    (l) => l.startsWith("diff ") || l.startsWith("--- ") || l.startsWith("Index: "),
  );
  if (start < 0) return "";
  let end = lines.lastIndexOf("-- ");
  if (end < start || lines.slice(end + 1).some((l) => DIFF_BODY.test(l))) end = lines.length;
  return lines.slice(start, end).join("\n");
}

/** Default content hasher: works for mailbox and plain diff content alike. */
export function hashContent(content: Buffer): string {
  return hashDiff(extractDiff(content.toString("utf8")));
}
