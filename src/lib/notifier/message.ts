import { formatSection } from "./format";
import { formatDisplayDate } from "./window";
import type { LinkableRecord, MessageCard, ReportingWindow } from "./types";

export const NO_NEW_COLLECTIONS = "No new collections published during this period.";
export const NO_UPDATED_MAPS = "No updated maps during this period.";

/**
 * Office 365 connector card for a Teams incoming webhook.
 * This is the only card schema the notifier emits.
 */
export function buildMessageCard(
  window: ReportingWindow,
  newCollections: LinkableRecord[],
  updatedMaps: LinkableRecord[],
  discoveryBaseUrl: string
): MessageCard {
  return {
    "@type": "MessageCard",
    "@context": "https://schema.org/extensions",
    title: `New collections and updated arrangement maps from ${formatDisplayDate(window.from)} through ${formatDisplayDate(window.to)}`,
    summary: "The following collections were recently updated or created.",
    sections: [
      {
        title: "## Newly Published Collections",
        text: formatSection(newCollections, discoveryBaseUrl, NO_NEW_COLLECTIONS),
      },
      {
        title: "## Updated Arrangement Maps",
        text: formatSection(updatedMaps, discoveryBaseUrl, NO_UPDATED_MAPS),
      },
    ],
  };
}
