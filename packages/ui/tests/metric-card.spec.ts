import { describe, expect, it } from "vitest";
import { toneForValue } from "../src/metric-card";

describe("toneForValue", () => {
  it("colors returns by sign", () => {
    expect(toneForValue(3.2)).toBe("positive");
    expect(toneForValue(-0.5)).toBe("negative");
    expect(toneForValue(0)).toBe("neutral");
  });
});
