import { z } from "zod";
import { MalformedResponseError } from "../errors";
import { DEFAULT_TIMEOUT_MS, fetchWithTimeout, parseJson, requireOk } from "../http";
import type { PublishedRecord } from "./types";

// ─── Types ────────────────────────────────────────────────────

export type ArchivesSpaceConfig = {
  baseUrl: string;
  username: string;
  password: string;
  timeoutMs?: number;
  pageSize?: number;
};

export type PublishedRecordSource = {
  fetchPublishedResources(): Promise<PublishedRecord[]>;
};

const SERVICE = "ArchivesSpace";
const SESSION_HEADER = "X-ArchivesSpace-Session";
const DEFAULT_PAGE_SIZE = 100;

// Search query for published resource records, projected to title and uri
const PUBLISHED_RESOURCES_QUERY: Array<[string, string]> = [
  ["q", "publish:true"],
  ["type[]", "resource"],
  ["fields[]", "title,uri"],
];

const loginSchema = z.object({ session: z.string().min(1) });

const recordSchema = z.object({ uri: z.string(), title: z.string() }).passthrough();

const pagedSchema = z.object({
  this_page: z.number(),
  last_page: z.number(),
  results: z.array(z.unknown()),
});

// Some endpoints answer with a bare list instead of a page envelope
const pagedOrListSchema = z.union([pagedSchema, z.array(z.unknown())]);

// ─── ArchivesSpaceClient ──────────────────────────────────────

export class ArchivesSpaceClient implements PublishedRecordSource {
  private config: ArchivesSpaceConfig;
  private session: string | null = null;

  constructor(config: ArchivesSpaceConfig) {
    this.config = { ...config, baseUrl: config.baseUrl.replace(/\/+$/, "") };
  }

  private get timeoutMs(): number {
    return this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Authenticate and keep the session token for subsequent requests.
   */
  async login(): Promise<string> {
    const url = `${this.config.baseUrl}/users/${encodeURIComponent(this.config.username)}/login`;
    const resp = await fetchWithTimeout(
      SERVICE,
      url,
      {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({ password: this.config.password }).toString(),
      },
      this.timeoutMs
    );
    await requireOk(SERVICE, url, resp);
    const { session } = await parseJson(SERVICE, resp, loginSchema);
    this.session = session;
    return session;
  }

  private async get(path: string, params: Array<[string, string]>): Promise<Response> {
    const session = this.session ?? (await this.login());
    const query = new URLSearchParams(params).toString();
    const url = `${this.config.baseUrl}${path}${query ? `?${query}` : ""}`;
    const resp = await fetchWithTimeout(
      SERVICE,
      url,
      { headers: { Accept: "application/json", [SESSION_HEADER]: session } },
      this.timeoutMs
    );
    return requireOk(SERVICE, url, resp);
  }

  /**
   * Walk every page of a paged endpoint and return all results in order.
   */
  async getPaged(path: string, params: Array<[string, string]> = []): Promise<unknown[]> {
    const pageSize = String(this.config.pageSize ?? DEFAULT_PAGE_SIZE);
    const all: unknown[] = [];

    for (let page = 1; ; page++) {
      const resp = await this.get(path, [...params, ["page", String(page)], ["page_size", pageSize]]);
      const body = await parseJson(SERVICE, resp, pagedOrListSchema);
      if (Array.isArray(body)) {
        all.push(...body);
        return all;
      }
      all.push(...body.results);
      if (body.this_page >= body.last_page) return all;
    }
  }

  async fetchPublishedResources(): Promise<PublishedRecord[]> {
    const results = await this.getPaged("/search", PUBLISHED_RESOURCES_QUERY);
    const parsed = z.array(recordSchema).safeParse(results);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `results.${issue.path.join(".")}` : "results";
      throw new MalformedResponseError(SERVICE, `search result ${where}: ${issue?.message ?? "invalid shape"}`);
    }
    return parsed.data;
  }
}
