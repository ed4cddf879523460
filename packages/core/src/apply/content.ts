import { TransportError } from "../errors.js";
import { toPatch, type Patch } from "../models/patch.js";
import type { ResourceClient } from "../resources/client.js";
import type { ContentSource } from "./types.js";

export type ContentFormat = "mbox" | "diff";

/**
 * Patch content straight from the server: the mailbox download, or the
 * record's `diff` field (fetched in full when a list view left it out).
 */
export function serverContent(client: ResourceClient, format: ContentFormat = "mbox"): ContentSource {
  return {
    async fetch(patch: Patch): Promise<Buffer> {
      if (format === "mbox") return (await client.download(patch.mbox)).content;
      const diff = patch.diff ?? toPatch(await client.get("patches", patch.id)).diff;
      if (diff === undefined) throw new TransportError(`Patch ${patch.id} has no diff`);
      return Buffer.from(diff, "utf8");
    },
  };
}
