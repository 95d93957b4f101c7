import type { ZodType, ZodTypeDef } from "zod";
import { MalformedResponseError, UpstreamUnavailableError } from "./errors";

export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * fetch() with an abort timer. Network failures and timeouts become
 * UpstreamUnavailableError tagged with the calling service.
 */
export async function fetchWithTimeout(
  service: string,
  url: string,
  init: RequestInit = {},
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
  shownUrl: string = url
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } catch (err) {
    const msg = err instanceof Error ? err.message : "Unknown fetch error";
    throw new UpstreamUnavailableError(service, shownUrl, null, msg);
  } finally {
    clearTimeout(timer);
  }
}

export async function requireOk(service: string, url: string, resp: Response): Promise<Response> {
  if (!resp.ok) {
    const errorText = await resp.text().catch(() => "");
    throw new UpstreamUnavailableError(service, url, resp.status, errorText.slice(0, 500) || undefined);
  }
  return resp;
}

/** Read a JSON body and validate it against `schema`. */
export async function parseJson<T>(service: string, resp: Response, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
  let body: unknown;
  try {
    body = await resp.json();
  } catch {
    throw new MalformedResponseError(service, "response body is not valid JSON");
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new MalformedResponseError(service, `${issue?.message ?? "invalid shape"}${where}`);
  }
  return parsed.data;
}

/** Origin only, for URLs that embed a secret in their path or query. */
export function redactUrl(url: string): string {
  try {
    return `${new URL(url).origin}/…`;
  } catch {
    return "<invalid url>";
  }
}
