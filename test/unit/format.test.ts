import { describe, it, expect } from "vitest";
import {
  formatCost,
  formatHour,
  formatInteger,
  formatLongDate,
  formatMonth,
  formatNumber,
  formatPercent,
  ordinal,
  prettyModelName,
  weekdayName,
} from "../../src/presenters/format.js";

describe("formatNumber", () => {
  it("abbreviates thousands, millions and billions", () => {
    expect(formatNumber(1500)).toBe("1.50K");
    expect(formatNumber(1_234_567)).toBe("1.23M");
    expect(formatNumber(2_500_000_000)).toBe("2.50B");
  });

  it("shows the integer part below a thousand", () => {
    expect(formatNumber(999)).toBe("999");
    expect(formatNumber(12.7)).toBe("12");
    expect(formatNumber(0)).toBe("0");
  });
});

describe("formatInteger", () => {
  it("groups thousands", () => {
    expect(formatInteger(1_234_567)).toBe("1,234,567");
    expect(formatInteger(42)).toBe("42");
  });
});

describe("formatCost / formatPercent", () => {
  it("formats dollars with two decimals", () => {
    expect(formatCost(2)).toBe("$2.00");
    expect(formatCost(12.5)).toBe("$12.50");
  });

  it("formats fractions as percentages", () => {
    expect(formatPercent(0.25)).toBe("25.0%");
    expect(formatPercent(2 / 3)).toBe("66.7%");
    expect(formatPercent(1, 0)).toBe("100%");
  });
});

describe("formatHour", () => {
  it("uses a 12-hour clock", () => {
    expect(formatHour(0)).toBe("12:00 AM");
    expect(formatHour(9)).toBe("9:00 AM");
    expect(formatHour(12)).toBe("12:00 PM");
    expect(formatHour(23)).toBe("11:00 PM");
  });
});

describe("weekdayName", () => {
  it("counts from Sunday", () => {
    expect(weekdayName(0)).toBe("Sunday");
    expect(weekdayName(1)).toBe("Monday");
    expect(weekdayName(6)).toBe("Saturday");
  });

  it("falls back for out-of-range values", () => {
    expect(weekdayName(7)).toBe("Day 7");
  });
});

describe("formatLongDate / formatMonth", () => {
  it("formats dates and timestamps", () => {
    expect(formatLongDate("2025-12-04")).toBe("December 04, 2025");
    expect(formatLongDate("2025-03-10T23:30:00-05:00")).toBe("March 10, 2025");
  });

  it("returns unparseable values unchanged", () => {
    expect(formatLongDate("someday")).toBe("someday");
    expect(formatMonth("soon")).toBe("soon");
  });

  it("names months", () => {
    expect(formatMonth("2025-03")).toBe("March 2025");
  });
});

describe("ordinal", () => {
  it("picks the English suffix", () => {
    expect([1, 2, 3, 4, 11, 12, 13, 21, 22, 31].map(ordinal)).toEqual([
      "1st", "2nd", "3rd", "4th", "11th", "12th", "13th", "21st", "22nd", "31st",
    ]);
  });
});

describe("prettyModelName", () => {
  it("drops the vendor prefix and title-cases words", () => {
    expect(prettyModelName("claude-4-sonnet-thinking")).toBe("4 Sonnet Thinking");
    expect(prettyModelName("gpt-5")).toBe("Gpt 5");
  });

  it("keeps the raw name when nothing is left", () => {
    expect(prettyModelName("claude-")).toBe("claude-");
  });
});
