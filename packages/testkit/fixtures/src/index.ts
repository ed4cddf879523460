import type {
  BundleItem,
  PatchItem,
  PatchRefItem,
  PersonItem,
  ProjectItem,
  SeriesItem,
  SeriesRefItem,
  UserItem,
} from "@patchpull/testkit-api-types";

export const SERVER_ORIGIN = "https://pw.test";
export const API_ROOT = `${SERVER_ORIGIN}/api/1.1`;

const iso = (offsetMin = 0) => new Date(Date.UTC(2024, 0, 1, 12, offsetMin)).toISOString();

let counter = 0;
const nextId = () => ++counter;

/** Restart the id sequence so scenarios produce the same ids on every run. */
export function resetIds(start = 0): void {
  counter = start;
}

export function makeProject(overrides: Partial<ProjectItem> = {}): ProjectItem {
  const id = overrides.id ?? 1;
  return {
    id,
    url: overrides.url ?? `${API_ROOT}/projects/${id}/`,
    name: overrides.name ?? "Demo",
    link_name: overrides.link_name ?? "demo",
    list_id: overrides.list_id ?? "demo.lists.pw.test",
  };
}

export function makePerson(overrides: Partial<PersonItem> = {}): PersonItem {
  const id = overrides.id ?? nextId();
  return {
    id,
    url: overrides.url ?? `${API_ROOT}/people/${id}/`,
    name: overrides.name === undefined ? "Ada Lovelace" : overrides.name,
    email: overrides.email ?? "ada@example.com",
  };
}

export function makeUser(overrides: Partial<UserItem> = {}): UserItem {
  const id = overrides.id ?? nextId();
  return {
    id,
    url: overrides.url ?? `${API_ROOT}/users/${id}/`,
    username: overrides.username ?? "maintainer",
    first_name: overrides.first_name ?? "Grace",
    last_name: overrides.last_name ?? "Hopper",
    email: overrides.email ?? "grace@example.com",
  };
}

/** A one-file unified diff replacing `before` with `after` on line 1. */
export function makeDiff(opts: { file?: string; before?: string; after?: string } = {}): string {
  const file = opts.file ?? "README";
  const before = opts.before ?? "old line";
  const after = opts.after ?? "new line";
  return [
    `diff --git a/${file} b/${file}`,
    "index 1111111..2222222 100644",
    `--- a/${file}`,
    `+++ b/${file}`,
    "@@ -1 +1 @@",
    `-${before}`,
    `+${after}`,
    "",
  ].join("\n");
}

export function makeMbox(opts: {
  name: string;
  diff: string;
  submitter?: Pick<PersonItem, "name" | "email">;
  msgid?: string;
  date?: string;
}): string {
  const from = opts.submitter ?? { name: "Ada Lovelace", email: "ada@example.com" };
  return [
    "From git@z Thu Jan  1 00:00:00 1970",
    `From: ${from.name ?? from.email} <${from.email}>`,
    `Date: ${opts.date ?? iso()}`,
    `Subject: [PATCH] ${opts.name}`,
    `Message-Id: ${opts.msgid ?? "<patch@pw.test>"}`,
    "",
    `${opts.name}.`,
    "",
    "---",
    opts.diff.trimEnd(),
    "-- ",
    "2.43.0",
    "",
  ].join("\n");
}

export function makePatch(overrides: Partial<PatchItem> = {}): PatchItem {
  const id = overrides.id ?? nextId();
  const project = overrides.project ?? makeProject();
  return {
    id,
    url: overrides.url ?? `${API_ROOT}/patches/${id}/`,
    web_url: overrides.web_url ?? `${SERVER_ORIGIN}/project/${project.link_name}/patch/${id}/`,
    project,
    msgid: overrides.msgid ?? `<${id}@pw.test>`,
    date: overrides.date ?? iso(id),
    name: overrides.name ?? `Patch ${id}`,
    commit_ref: overrides.commit_ref ?? null,
    state: overrides.state ?? "new",
    archived: overrides.archived ?? false,
    hash: overrides.hash ?? null,
    submitter: overrides.submitter ?? makePerson({ id: 100 }),
    delegate: overrides.delegate ?? null,
    mbox: overrides.mbox ?? `${SERVER_ORIGIN}/project/${project.link_name}/patch/${id}/mbox/`,
    series: overrides.series ?? [],
    diff: overrides.diff ?? makeDiff({ file: `file-${id}.txt` }),
  };
}

export function toPatchRef(patch: PatchItem): PatchRefItem {
  return {
    id: patch.id,
    url: patch.url,
    web_url: patch.web_url,
    msgid: patch.msgid,
    date: patch.date,
    name: patch.name,
    mbox: patch.mbox,
  };
}

export function toSeriesRef(series: SeriesItem): SeriesRefItem {
  return {
    id: series.id,
    url: series.url,
    web_url: series.web_url,
    date: series.date,
    name: series.name,
    version: series.version,
    mbox: series.mbox,
  };
}

export function makeSeries(overrides: Partial<SeriesItem> = {}): SeriesItem {
  const id = overrides.id ?? nextId();
  const project = overrides.project ?? makeProject();
  const patches = overrides.patches ?? [];
  return {
    id,
    url: overrides.url ?? `${API_ROOT}/series/${id}/`,
    web_url: overrides.web_url ?? `${SERVER_ORIGIN}/project/${project.link_name}/list/?series=${id}`,
    project,
    name: overrides.name === undefined ? `Series ${id}` : overrides.name,
    date: overrides.date ?? iso(id),
    submitter: overrides.submitter ?? makePerson({ id: 100 }),
    version: overrides.version ?? 1,
    total: overrides.total ?? patches.length,
    received_total: overrides.received_total ?? patches.length,
    received_all: overrides.received_all ?? true,
    mbox: overrides.mbox ?? `${SERVER_ORIGIN}/series/${id}/mbox/`,
    cover_letter: overrides.cover_letter ?? null,
    patches,
  };
}

export function makeBundle(overrides: Partial<BundleItem> = {}): BundleItem {
  const id = overrides.id ?? nextId();
  const project = overrides.project ?? makeProject();
  return {
    id,
    url: overrides.url ?? `${API_ROOT}/bundles/${id}/`,
    web_url: overrides.web_url ?? `${SERVER_ORIGIN}/bundle/maintainer/bundle-${id}/`,
    project,
    name: overrides.name ?? `bundle-${id}`,
    owner: overrides.owner ?? makeUser({ id: 200 }),
    patches: overrides.patches ?? [],
    public: overrides.public ?? true,
    mbox: overrides.mbox ?? `${SERVER_ORIGIN}/bundle/maintainer/bundle-${id}/mbox/`,
  };
}

export type { BundleItem, PatchItem, PersonItem, SeriesItem, UserItem };
