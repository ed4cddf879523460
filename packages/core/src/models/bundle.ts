import { z } from "zod";
import { idSchema, parseRecord, patchRefSchema, userSchema, type JsonRecord, type PatchRef, type User } from "./common.js";

const bundleSchema = z.object({
  id: idSchema,
  name: z.string(),
  public: z.boolean().default(false),
  owner: userSchema.nullish(),
  mbox: z.string(),
  patches: z.array(patchRefSchema),
  web_url: z.string().nullish(),
});

/** An ordered, named collection of patches with no series semantics. */
export interface Bundle {
  readonly kind: "bundle";
  readonly id: string;
  readonly name: string;
  readonly public: boolean;
  readonly owner: User | null;
  readonly mbox: string;
  readonly patches: readonly PatchRef[];
  readonly webUrl: string | null;
  readonly raw: JsonRecord;
}

export function toBundle(input: unknown): Bundle {
  const { value: b, raw } = parseRecord(bundleSchema, input, "bundle");
  return {
    kind: "bundle",
    id: b.id,
    name: b.name,
    public: b.public,
    owner: b.owner ?? null,
    mbox: b.mbox,
    patches: b.patches,
    webUrl: b.web_url ?? null,
    raw,
  };
}
