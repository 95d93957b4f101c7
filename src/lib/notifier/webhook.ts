import { DEFAULT_TIMEOUT_MS, fetchWithTimeout, redactUrl, requireOk } from "../http";
import type { MessageCard } from "./types";

const SERVICE = "Teams webhook";

export type CardPoster = {
  post(card: MessageCard): Promise<number>;
};

/**
 * Single POST of the card. Returns the HTTP status; any non-2xx status
 * throws UpstreamUnavailableError. The response body is not inspected.
 */
export async function postMessageCard(
  webhookUrl: string,
  card: MessageCard,
  timeoutMs: number = DEFAULT_TIMEOUT_MS
): Promise<number> {
  // The webhook URL is a credential; errors carry only its origin
  const shownUrl = redactUrl(webhookUrl);
  const resp = await fetchWithTimeout(
    SERVICE,
    webhookUrl,
    {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(card),
    },
    timeoutMs,
    shownUrl
  );
  await requireOk(SERVICE, shownUrl, resp);
  return resp.status;
}

export function createWebhookPoster(webhookUrl: string, timeoutMs?: number): CardPoster {
  return {
    post: (card) => postMessageCard(webhookUrl, card, timeoutMs),
  };
}
