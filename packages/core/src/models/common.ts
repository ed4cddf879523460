import { z } from "zod";
import { TransportError } from "../errors.js";

export type JsonRecord = Record<string, unknown>;

/** Server IDs are numeric today; models only ever see opaque strings. */
export const idSchema = z.union([z.number().int(), z.string().min(1)]).transform((v) => String(v));

const nullableString = z
  .string()
  .nullish()
  .transform((v) => v ?? null);

export const personSchema = z
  .object({ id: idSchema, name: nullableString, email: z.string() })
  .transform((p) => ({ id: p.id, name: p.name, email: p.email }));

export type Person = z.output<typeof personSchema>;

export const userSchema = z
  .object({
    id: idSchema,
    username: z.string(),
    email: z.string().optional(),
    first_name: z.string().optional(),
    last_name: z.string().optional(),
  })
  .transform((u) => ({
    id: u.id,
    username: u.username,
    email: u.email ?? null,
    firstName: u.first_name ?? null,
    lastName: u.last_name ?? null,
  }));

export type User = z.output<typeof userSchema>;

export const projectSchema = z
  .object({ id: idSchema, name: z.string(), link_name: z.string(), list_id: z.string().optional() })
  .transform((p) => ({ id: p.id, name: p.name, linkName: p.link_name, listId: p.list_id ?? null }));

export type Project = z.output<typeof projectSchema>;

export const patchRefSchema = z
  .object({
    id: idSchema,
    name: z.string(),
    mbox: z.string(),
    msgid: z.string().optional(),
    date: z.string().optional(),
  })
  .transform((p) => ({ id: p.id, name: p.name, mbox: p.mbox, msgid: p.msgid ?? null, date: p.date ?? null }));

export type PatchRef = z.output<typeof patchRefSchema>;

export const seriesRefSchema = z
  .object({ id: idSchema, name: nullableString, version: z.number().int(), mbox: z.string() })
  .transform((s) => ({ id: s.id, name: s.name, version: s.version, mbox: s.mbox }));

export type SeriesRef = z.output<typeof seriesRefSchema>;

const recordSchema = z.record(z.unknown());

export function isJsonRecord(value: unknown): value is JsonRecord {
  return recordSchema.safeParse(value).success;
}

/**
 * Parse one wire record. A record that does not match its schema means the
 * server spoke a dialect we cannot read, which is reported as a transport failure.
 */
export function parseRecord<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  source: string,
): { value: z.output<S>; raw: JsonRecord } {
  const record = recordSchema.safeParse(raw);
  const parsed = schema.safeParse(raw);
  if (!record.success || !parsed.success) {
    const issues: z.ZodIssue[] = parsed.success ? [] : parsed.error.issues;
    const msg = issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join(", ");
    throw new TransportError(`Unparseable ${source} record${msg ? `: ${msg}` : ""}`, {
      details: issues,
    });
  }
  return { value: parsed.data, raw: record.data };
}
