import { describe, expect, it } from "vitest";
import { clampToBounds } from "../src/lib/clamp";

const rsiPeriod = { min: 2, max: 50, step: 1 };

describe("clampToBounds", () => {
  it("keeps values inside the range", () => {
    expect(clampToBounds("14", rsiPeriod, 14)).toBe(14);
  });

  it("pins values to the declared bounds", () => {
    expect(clampToBounds("1", rsiPeriod, 14)).toBe(2);
    expect(clampToBounds(75, rsiPeriod, 14)).toBe(50);
  });

  it("rounds to the step", () => {
    expect(clampToBounds("20.6", rsiPeriod, 14)).toBe(21);
    expect(clampToBounds(33, { min: 1, max: 99, step: 5 }, 30)).toBe(31);
  });

  it("falls back on blank or unparseable input", () => {
    expect(clampToBounds("", rsiPeriod, 14)).toBe(14);
    expect(clampToBounds("abc", rsiPeriod, 14)).toBe(14);
  });

  it("leaves unstepped values as typed", () => {
    expect(clampToBounds("42.25", { min: 1, max: 99 }, 30)).toBe(42.25);
  });
});
