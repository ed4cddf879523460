import { z } from "zod";
import {
  idSchema,
  parseRecord,
  personSchema,
  seriesRefSchema,
  userSchema,
  type JsonRecord,
  type Person,
  type SeriesRef,
  type User,
} from "./common.js";

const patchSchema = z.object({
  id: idSchema,
  name: z.string(),
  state: z.string(),
  archived: z.boolean().default(false),
  hash: z.string().nullish(),
  mbox: z.string(),
  diff: z.string().nullish(),
  msgid: z.string(),
  date: z.string(),
  submitter: personSchema,
  delegate: userSchema.nullish(),
  commit_ref: z.string().nullish(),
  web_url: z.string().nullish(),
  series: z.array(seriesRefSchema).default([]),
});

export interface Patch {
  readonly kind: "patch";
  readonly id: string;
  readonly name: string;
  /** Open-ended server vocabulary (new, under-review, accepted, ...). */
  readonly state: string;
  readonly archived: boolean;
  /** The most recent series the patch was posted in; dependencies come from here by default. */
  readonly series: SeriesRef | null;
  /** Every series the patch belongs to, as listed by the server. */
  readonly allSeries: readonly SeriesRef[];
  readonly hash: string | null;
  /** Content reference: the mailbox download URL. */
  readonly mbox: string;
  readonly diff?: string;
  readonly msgid: string;
  readonly date: string;
  readonly submitter: Person;
  readonly delegate: User | null;
  readonly commitRef: string | null;
  readonly webUrl: string | null;
  readonly raw: JsonRecord;
}

export function toPatch(input: unknown): Patch {
  const { value: p, raw } = parseRecord(patchSchema, input, "patch");
  return {
    kind: "patch",
    id: p.id,
    name: p.name,
    state: p.state,
    archived: p.archived,
    series: latestSeries(p.series),
    allSeries: p.series,
    hash: p.hash ?? null,
    mbox: p.mbox,
    ...(p.diff != null ? { diff: p.diff } : {}),
    msgid: p.msgid,
    date: p.date,
    submitter: p.submitter,
    delegate: p.delegate ?? null,
    commitRef: p.commit_ref ?? null,
    webUrl: p.web_url ?? null,
    raw,
  };
}

function latestSeries(series: readonly SeriesRef[]): SeriesRef | null {
  return series.reduce<SeriesRef | null>((best, s) => (best === null || Number(s.id) > Number(best.id) ? s : best), null);
}

/** Fields a maintainer may change on a patch. */
export interface PatchUpdate {
  state?: string;
  /** User ID; `null` clears the delegate. */
  delegate?: string | null;
  archived?: boolean;
  commitRef?: string | null;
}

export function toPatchUpdateBody(update: PatchUpdate): JsonRecord {
  const body: JsonRecord = {};
  if (update.state !== undefined) body.state = update.state;
  if (update.delegate !== undefined) body.delegate = update.delegate === null ? null : Number(update.delegate);
  if (update.archived !== undefined) body.archived = update.archived;
  if (update.commitRef !== undefined) body.commit_ref = update.commitRef;
  return body;
}
