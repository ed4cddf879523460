import { AmbiguousMatchError, InvalidFilterError, NotFoundError } from "../errors.js";
import { toPerson, toUser } from "../models/people.js";
import type { ResourceClient } from "../resources/client.js";

export const MIN_LOOKUP_LENGTH = 3;

const NUMERIC_ID = /^\d+$/;

type LookupResource = "people" | "users";

const WHAT: Record<LookupResource, string> = { people: "person", users: "user" };

/**
 * Turn names or emails into record IDs through the `people`/`users`
 * collections. Numeric values are taken as IDs already.
 */
export async function resolveIds(
  client: ResourceClient,
  resource: LookupResource,
  values: readonly string[],
): Promise<string[]> {
  const ids: string[] = [];
  for (const value of values) {
    ids.push(NUMERIC_ID.test(value) ? value : await lookupOne(client, resource, value));
  }
  return ids;
}

async function lookupOne(client: ResourceClient, resource: LookupResource, query: string): Promise<string> {
  const what = WHAT[resource];
  if (query.length < MIN_LOOKUP_LENGTH) {
    throw new InvalidFilterError(
      `${what} lookups need at least ${MIN_LOOKUP_LENGTH} characters, got "${query}"`,
    );
  }
  // One page is plenty; a query that needs more is ambiguous anyway.
  const page = await client.page(resource, { q: query });
  const parse = resource === "people" ? toPerson : toUser;
  const matches = page.items.map((item) => parse(item));
  if (matches.length === 0) throw new NotFoundError(`No ${what} matching "${query}"`);
  if (matches.length > 1) throw new AmbiguousMatchError(what, query, matches.length);
  return matches[0].id;
}
