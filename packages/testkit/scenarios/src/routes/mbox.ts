import { makeMbox } from "@patchpull/testkit-fixtures";
import type { PatchItem } from "@patchpull/testkit-api-types";
import type { InMemoryStore } from "../store.js";

export function renderPatchMbox(store: InMemoryStore, patch: PatchItem): string {
  const override = store.content.get(new URL(patch.mbox).pathname);
  if (override !== undefined) return override;
  return makeMbox({
    name: patch.name,
    diff: patch.diff ?? "",
    submitter: patch.submitter,
    msgid: patch.msgid,
    date: patch.date,
  });
}

export function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "");
}
