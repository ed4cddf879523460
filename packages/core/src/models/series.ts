import { z } from "zod";
import {
  idSchema,
  parseRecord,
  patchRefSchema,
  personSchema,
  type JsonRecord,
  type PatchRef,
  type Person,
} from "./common.js";

const seriesSchema = z.object({
  id: idSchema,
  name: z.string().nullish(),
  date: z.string(),
  version: z.number().int().default(1),
  total: z.number().int().nonnegative(),
  received_total: z.number().int().nonnegative(),
  received_all: z.boolean(),
  mbox: z.string(),
  submitter: personSchema,
  cover_letter: patchRefSchema.nullish(),
  patches: z.array(patchRefSchema),
  web_url: z.string().nullish(),
});

export interface Series {
  readonly kind: "series";
  readonly id: string;
  readonly name: string | null;
  readonly date: string;
  readonly version: number;
  /** True once every patch announced by the cover letter has arrived. */
  readonly complete: boolean;
  readonly total: number;
  readonly receivedTotal: number;
  /** Server-declared application order. */
  readonly patches: readonly PatchRef[];
  readonly mbox: string;
  readonly submitter: Person;
  readonly coverLetter: PatchRef | null;
  readonly webUrl: string | null;
  readonly raw: JsonRecord;
}

export function toSeries(input: unknown): Series {
  const { value: s, raw } = parseRecord(seriesSchema, input, "series");
  return {
    kind: "series",
    id: s.id,
    name: s.name ?? null,
    date: s.date,
    version: s.version,
    complete: s.received_all,
    total: s.total,
    receivedTotal: s.received_total,
    patches: s.patches,
    mbox: s.mbox,
    submitter: s.submitter,
    coverLetter: s.cover_letter ?? null,
    webUrl: s.web_url ?? null,
    raw,
  };
}
