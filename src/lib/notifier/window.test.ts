import { describe, expect, it } from "vitest";
import { formatDisplayDate, reportingWindow, toEpochSeconds } from "./window";

describe("reportingWindow", () => {
  it("spans the whole previous month at midnight", () => {
    const { from, to } = reportingWindow(new Date(2024, 6, 15, 13, 45));
    expect(from).toEqual(new Date(2024, 5, 1));
    expect(to).toEqual(new Date(2024, 5, 30));
  });

  it("rolls January back to December of the prior year", () => {
    const { from, to } = reportingWindow(new Date(2025, 0, 1, 9));
    expect(from).toEqual(new Date(2024, 11, 1));
    expect(to).toEqual(new Date(2024, 11, 31));
  });

  it("gives February 29 days in a leap year", () => {
    const { to } = reportingWindow(new Date(2024, 2, 1));
    expect(to).toEqual(new Date(2024, 1, 29));
  });

  it("gives February 28 days otherwise", () => {
    const { to } = reportingWindow(new Date(2023, 2, 31));
    expect(to).toEqual(new Date(2023, 1, 28));
  });

  it("keeps both ends inside the same month for every month of the year", () => {
    for (let month = 0; month < 12; month++) {
      const { from, to } = reportingWindow(new Date(2026, month, 10));
      const expectedMonth = (month + 11) % 12;
      const expectedYear = month === 0 ? 2025 : 2026;
      expect(from.getMonth()).toBe(expectedMonth);
      expect(to.getMonth()).toBe(expectedMonth);
      expect(from.getFullYear()).toBe(expectedYear);
      expect(to.getFullYear()).toBe(expectedYear);
      expect(from.getDate()).toBe(1);
      // the day after `to` is in the next month
      expect(new Date(to.getFullYear(), to.getMonth(), to.getDate() + 1).getDate()).toBe(1);
    }
  });
});

describe("toEpochSeconds", () => {
  it("drops milliseconds", () => {
    expect(toEpochSeconds(new Date(1_700_000_000_999))).toBe(1_700_000_000);
  });
});

describe("formatDisplayDate", () => {
  it("uses the long month name without padding the day", () => {
    expect(formatDisplayDate(new Date(2024, 1, 1))).toBe("February 1, 2024");
    expect(formatDisplayDate(new Date(2024, 1, 29))).toBe("February 29, 2024");
  });
});
