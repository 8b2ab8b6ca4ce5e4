import { describe, it, expect } from "vitest";

import { USD, USD2, formatMetric, formatMultiple, formatNumber, formatPct } from "../format";
import { UNDEFINED_METRIC } from "../metrics";

describe("format", () => {
  it("formats currency with and without cents", () => {
    expect(USD(1234.5)).toBe("$1,235");
    expect(USD2(2.658)).toBe("$2.66");
  });

  it("formats counts, percentages and multiples", () => {
    expect(formatNumber(12345.4)).toBe("12,345");
    expect(formatPct(0.0234)).toBe("2.34%");
    expect(formatPct(0.5, 1)).toBe("50.0%");
    expect(formatMultiple(3.966)).toBe("3.97x");
  });

  it("prints a dash for undefined metrics", () => {
    expect(formatMetric(UNDEFINED_METRIC, USD)).toBe("-");
    expect(formatMetric({ value: 4, defined: true }, formatMultiple)).toBe("4.00x");
  });
});
