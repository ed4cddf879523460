// RFC 8288 `Link` header, the subset the patch server emits:
//   <https://host/api/1.1/patches/?page=2>; rel="next", <...>; rel="prev"

const LINK = /<([^>]*)>\s*;\s*rel="?([^";,]+)"?/g;

export function parseLinkHeader(header: string | undefined): Record<string, string> {
  const links: Record<string, string> = {};
  if (!header) return links;
  for (const match of header.matchAll(LINK)) {
    for (const rel of match[2].trim().split(/\s+/)) {
      links[rel] = match[1];
    }
  }
  return links;
}
