import { describe, it, expect } from "vitest";

import {
  UNDEFINED_METRIC,
  buildBusinessKpis,
  buildMetricSet,
  campaignMetricSets,
  channelMetricSets,
  cpa,
  overallMetricSet,
  pickTopPerformer,
  rankMetricSets,
  ratio,
  roas,
} from "../metrics";
import { summarize, summarizeBusiness } from "../aggregate";
import type { MetricSet } from "../types";
import { SCENARIO_ROWS, businessRow, channelRow } from "./fixtures";

const byKey = (sets: MetricSet[]) => Object.fromEntries(sets.map((s) => [s.key, s]));

describe("ratio", () => {
  it("flags a zero denominator instead of dividing", () => {
    expect(ratio(5, 0)).toEqual({ value: 0, defined: false });
    expect(ratio(0, 0)).toBe(UNDEFINED_METRIC);
  });

  it("never yields a negative or non-finite defined value", () => {
    const cases: [number, number][] = [
      [1, 3],
      [0, 7],
      [-1, 2],
      [Number.POSITIVE_INFINITY, 1],
      [Number.NaN, 1],
    ];
    for (const [n, d] of cases) {
      const m = ratio(n, d);
      if (m.defined) {
        expect(Number.isFinite(m.value)).toBe(true);
        expect(m.value).toBeGreaterThanOrEqual(0);
      } else {
        expect(m.value).toBe(0);
      }
    }
  });
});

describe("three-channel day", () => {
  const sets = channelMetricSets(SCENARIO_ROWS);

  it("computes per-channel ROAS from summed totals", () => {
    const s = byKey(sets);
    expect(s.Facebook.roas.value).toBeCloseTo(3.97, 2);
    expect(s.Google.roas.value).toBe(4);
    expect(s.TikTok.roas.value).toBe(3);
  });

  it("leaves CPA and efficiency undefined without business data", () => {
    for (const s of sets) {
      expect(s.cpa.defined).toBe(false);
      expect(s.efficiency.defined).toBe(false);
    }
  });

  it("sums the overall spend and revenue and divides business revenue by spend", () => {
    const overall = overallMetricSet(SCENARIO_ROWS, { newCustomers: 98, totalRevenue: 960 });
    expect(overall.spend).toBe(260.5);
    expect(overall.revenue).toBe(960);
    expect(overall.efficiency.value).toBeCloseTo(3.685, 3);
  });

  it("picks Google as the top performer every time", () => {
    expect(pickTopPerformer(sets)?.key).toBe("Google");
    expect(pickTopPerformer(channelMetricSets(SCENARIO_ROWS))?.key).toBe("Google");
  });
});

describe("campaignMetricSets", () => {
  it("groups by campaign name across channels", () => {
    const sets = campaignMetricSets([
      channelRow({ channel: "Google", campaign: "Launch", spend: 10, attributedRevenue: 30 }),
      channelRow({ channel: "TikTok", campaign: "Launch", spend: 10, attributedRevenue: 10 }),
      channelRow({ channel: "TikTok", campaign: "Evergreen", spend: 5, attributedRevenue: 5 }),
    ]);

    expect(sets.map((s) => [s.key, s.spend, s.roas.value])).toEqual([
      ["Launch", 20, 2],
      ["Evergreen", 5, 1],
    ]);
  });
});

describe("CPA", () => {
  it("divides spend by new customers", () => {
    const m = cpa(260.5, 98);
    expect(m.defined).toBe(true);
    expect(m.value).toBeCloseTo(2.658, 3);
  });
});

describe("pickTopPerformer", () => {
  it("ignores zero-spend entries", () => {
    const sets = [
      buildMetricSet("Free", { impressions: 1, clicks: 1, spend: 0, attributedRevenue: 100, rows: 1 }),
      buildMetricSet("Paid", { impressions: 1, clicks: 1, spend: 10, attributedRevenue: 20, rows: 1 }),
    ];
    expect(pickTopPerformer(sets)?.key).toBe("Paid");
  });

  it("breaks ROAS ties by revenue, then by name", () => {
    const t = (spend: number, revenue: number) => ({ impressions: 1, clicks: 1, spend, attributedRevenue: revenue, rows: 1 });

    expect(pickTopPerformer([buildMetricSet("A", t(10, 20)), buildMetricSet("B", t(20, 40))])?.key).toBe("B");
    expect(pickTopPerformer([buildMetricSet("Zed", t(10, 20)), buildMetricSet("Amy", t(10, 20))])?.key).toBe("Amy");
  });

  it("returns null when nothing qualifies", () => {
    expect(pickTopPerformer([])).toBeNull();
  });
});

describe("rankMetricSets", () => {
  const sets = channelMetricSets([
    ...SCENARIO_ROWS,
    channelRow({ channel: "TikTok", spend: 0, attributedRevenue: 0 }),
  ]);

  it("ranks by the chosen metric with a limit", () => {
    expect(rankMetricSets(sets, "roas", 2).map((s) => s.key)).toEqual(["Google", "Facebook"]);
    expect(rankMetricSets(sets, "revenue").map((s) => s.key)).toEqual(["Google", "Facebook", "TikTok"]);
    expect(rankMetricSets(sets, "spend", 1).map((s) => s.key)).toEqual(["Google"]);
  });
});

describe("buildBusinessKpis", () => {
  it("leaves revenue per customer undefined without new customers", () => {
    const business = summarizeBusiness([businessRow({ newCustomers: 0 })]);
    expect(buildBusinessKpis(business, summarize(SCENARIO_ROWS)).revenuePerCustomer.defined).toBe(false);
  });

  it("derives AOV, CAC and daily averages", () => {
    const business = summarizeBusiness([
      businessRow({ orders: 100, newCustomers: 50, totalRevenue: 8000, grossProfit: 3000 }),
      businessRow({ date: "2024-01-02", orders: 50, newCustomers: 48, totalRevenue: 4750, grossProfit: 2100 }),
    ]);
    const kpis = buildBusinessKpis(business, summarize(SCENARIO_ROWS));

    expect(kpis.totalRevenue).toBe(12750);
    expect(kpis.aov.value).toBe(85);
    expect(kpis.cac.value).toBeCloseTo(2.658, 3);
    expect(kpis.grossMargin.value).toBeCloseTo(0.4, 6);
    expect(kpis.avgDailyRevenue.value).toBe(6375);
    expect(kpis.overallRoas.value).toBeCloseTo(960 / 260.5, 10);
    expect(kpis.revenuePerCustomer.value).toBeCloseTo(12750 / 98, 10);
    expect(roas(0, 0).defined).toBe(false);
  });
});
