import type { LinkableRecord } from "./types";

/**
 * Records of `current` whose URI is not in `seen`, in `current` order.
 * Identity is the URI alone, so a retitled record is not reported twice.
 */
export function findNewRecords<T extends LinkableRecord>(current: T[], seen: LinkableRecord[]): T[] {
  const seenUris = new Set(seen.map((r) => r.uri));
  return current.filter((r) => !seenUris.has(r.uri));
}
