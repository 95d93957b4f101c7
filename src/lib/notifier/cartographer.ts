import { z } from "zod";
import { MalformedResponseError } from "../errors";
import { DEFAULT_TIMEOUT_MS, fetchWithTimeout, parseJson, requireOk } from "../http";
import { toEpochSeconds } from "./window";
import type { ArrangementMapRecord } from "./types";

export type CartographerConfig = {
  baseUrl: string;
  timeoutMs?: number;
};

export type ArrangementMapSource = {
  fetchUpdatedMaps(since: Date): Promise<ArrangementMapRecord[]>;
};

const SERVICE = "Cartographer";

const mapListSchema = z.object({
  next: z.string().nullish(),
  results: z.array(z.object({ ref: z.string(), title: z.string() }).passthrough()),
});

const mapDetailSchema = z.object({
  children: z.array(z.object({ archivesspace_uri: z.string() }).passthrough()),
});

/**
 * Arrangement maps modified since a point in time. Maps carry their own
 * identifier, so each one is looked up by `ref` to find the archival URI
 * of its first child.
 */
export class CartographerClient implements ArrangementMapSource {
  private baseUrl: string;
  private timeoutMs: number;

  constructor(config: CartographerConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  private async getJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const resp = await fetchWithTimeout(SERVICE, url, { headers: { Accept: "application/json" } }, this.timeoutMs);
    await requireOk(SERVICE, url, resp);
    return parseJson(SERVICE, resp, schema);
  }

  async fetchUpdatedMaps(since: Date): Promise<ArrangementMapRecord[]> {
    const maps: Array<{ ref: string; title: string }> = [];
    let url: string | null = `${this.baseUrl}/api/maps/?modified_since=${toEpochSeconds(since)}`;
    while (url) {
      const page: z.infer<typeof mapListSchema> = await this.getJson(url, mapListSchema);
      maps.push(...page.results);
      url = page.next ?? null;
    }

    // One lookup per map, in order; a single failure aborts the whole fetch
    const resolved: ArrangementMapRecord[] = [];
    for (const map of maps) {
      const detail = await this.getJson(`${this.baseUrl}${map.ref}`, mapDetailSchema);
      const first = detail.children[0];
      if (!first) {
        throw new MalformedResponseError(SERVICE, `map ${map.ref} has no children`);
      }
      resolved.push({ uri: first.archivesspace_uri, title: map.title, ref: map.ref });
    }
    return resolved;
  }
}
