import { describe, expect, it } from "vitest";
import { formatRecord } from "./format";
import { buildMessageCard, NO_NEW_COLLECTIONS, NO_UPDATED_MAPS } from "./message";

const BASE = "https://discovery.example.org";
const window = { from: new Date(2024, 1, 1), to: new Date(2024, 1, 29) };

describe("buildMessageCard", () => {
  it("renders placeholders for both sections when nothing changed", () => {
    expect(buildMessageCard(window, [], [], BASE)).toEqual({
      "@type": "MessageCard",
      "@context": "https://schema.org/extensions",
      title: "New collections and updated arrangement maps from February 1, 2024 through February 29, 2024",
      summary: "The following collections were recently updated or created.",
      sections: [
        { title: "## Newly Published Collections", text: NO_NEW_COLLECTIONS },
        { title: "## Updated Arrangement Maps", text: NO_UPDATED_MAPS },
      ],
    });
  });

  it("uses the exact placeholder wording", () => {
    expect(NO_NEW_COLLECTIONS).toBe("No new collections published during this period.");
    expect(NO_UPDATED_MAPS).toBe("No updated maps during this period.");
  });

  it("renders collections and maps into their own sections", () => {
    const collection = { uri: "/repositories/2/resources/2", title: "B" };
    const map = { uri: "/repositories/2/resources/9", title: "Series map", ref: "/api/maps/5/" };
    const card = buildMessageCard(window, [collection], [map], BASE);
    expect(card.sections[0]?.text).toBe(formatRecord(collection, BASE));
    expect(card.sections[1]?.text).toBe(formatRecord(map, BASE));
  });
});
