import { describe, it, expect } from "vitest";

import {
  buildFunnel,
  cacTrend,
  channelEfficiency,
  compareRecentAcquisition,
  correlation,
  dayOfWeekPerformance,
  keyCorrelations,
  rollingAverages,
  weekendVsWeekday,
  weeklyTrend,
} from "../analysis";
import { buildMetricSet, ratio } from "../metrics";
import { UNDEFINED_METRIC } from "../metrics";
import type { DailyCombined } from "../types";

function day(date: string, spend: number, totalRevenue: number, extra: Partial<DailyCombined> = {}): DailyCombined {
  return {
    date,
    impressions: 1000,
    clicks: 10,
    spend,
    attributedRevenue: spend * 2,
    rows: 1,
    orders: 1,
    newOrders: 1,
    newCustomers: 1,
    totalRevenue,
    grossProfit: 0,
    cogs: 0,
    ...extra,
  };
}

// 2024-01-01 = Monday
const week: DailyCombined[] = [
  day("2024-01-01", 10, 100),
  day("2024-01-02", 10, 100),
  day("2024-01-03", 10, 100),
  day("2024-01-04", 10, 100),
  day("2024-01-05", 10, 100),
  day("2024-01-06", 20, 300),
  day("2024-01-07", 20, 500),
  day("2024-01-08", 30, 200),
];

describe("buildFunnel", () => {
  it("estimates conversions from attributed revenue and AOV", () => {
    const sets = [buildMetricSet("Google", { impressions: 1000, clicks: 50, spend: 100, attributedRevenue: 500, rows: 1 })];
    const funnel = buildFunnel(sets, ratio(100, 2));

    expect(funnel.stages.map((s) => [s.stage, s.count])).toEqual([
      ["Impressions", 1000],
      ["Clicks", 50],
      ["Conversions", 10],
    ]);
    expect(funnel.stages[1].rate.value).toBe(0.05);
    expect(funnel.stages[2].rate.value).toBe(0.2);
    expect(funnel.overallConversion.value).toBe(0.01);
    expect(funnel.byChannel[0].cvr.value).toBe(0.2);
  });

  it("leaves conversion rates undefined without an AOV", () => {
    const sets = [buildMetricSet("Google", { impressions: 10, clicks: 1, spend: 1, attributedRevenue: 1, rows: 1 })];
    const funnel = buildFunnel(sets, UNDEFINED_METRIC);

    expect(funnel.stages[2].count).toBe(0);
    expect(funnel.stages[2].rate.defined).toBe(false);
    expect(funnel.overallConversion.defined).toBe(false);
  });
});

describe("day of week", () => {
  it("averages revenue per weekday from Monday", () => {
    const out = dayOfWeekPerformance(week);

    expect(out).toHaveLength(7);
    expect(out[0].weekday).toBe("Monday");
    expect(out[0].days).toBe(2);
    expect(out[0].avgRevenue.value).toBe(150);
    expect(out[6].avgRevenue.value).toBe(500);
  });

  it("splits weekend from weekdays", () => {
    const split = weekendVsWeekday(week);
    expect(split.weekendAvgRevenue.value).toBe(400);
    expect(split.weekdayAvgRevenue.value).toBe(700 / 6);
  });

  it("marks weekdays without data as undefined", () => {
    const out = dayOfWeekPerformance([day("2024-01-01", 1, 1)]);
    expect(out[1].avgRevenue.defined).toBe(false);
  });
});

describe("weeklyTrend", () => {
  it("buckets by Monday week start", () => {
    const out = weeklyTrend(week);

    expect(out.map((w) => [w.weekStart, w.totalRevenue, w.spend])).toEqual([
      ["2024-01-01", 1300, 90],
      ["2024-01-08", 200, 30],
    ]);
    expect(out[1].efficiency.value).toBeCloseTo(200 / 30, 10);
  });
});

describe("rollingAverages", () => {
  it("is null until the window fills, then averages the last rows", () => {
    const out = rollingAverages(week.slice(0, 4), 3);

    expect(out.map((p) => p.revenueAvg)).toEqual([null, null, 100, 100]);
    expect(out[2].spendAvg).toBe(10);
    expect(out[2].roas?.value).toBe(2);
  });

  it("slides the window", () => {
    const out = rollingAverages(week, 2);
    expect(out[6].revenueAvg).toBe(400);
    expect(out[7].revenueAvg).toBe(350);
  });
});

describe("correlation", () => {
  it("is 1 or -1 for perfectly linear series", () => {
    expect(correlation([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
    expect(correlation([1, 2, 3], [6, 4, 2])).toBeCloseTo(-1, 10);
  });

  it("is null for too few points or a constant series", () => {
    expect(correlation([1], [1])).toBeNull();
    expect(correlation([1, 1, 1], [1, 2, 3])).toBeNull();
  });

  it("pairs attributed and actual revenue across days", () => {
    const out = keyCorrelations(week);
    expect(out.spendVsOrders).toBeNull();
    expect(out.attributedVsActualRevenue).toBeCloseTo(out.spendVsRevenue ?? Number.NaN, 10);
  });
});

const dateOf = (i: number) => `2024-01-${String(i + 1).padStart(2, "0")}`;

describe("cacTrend", () => {
  it("leaves days without new customers out of the rolling CAC", () => {
    const out = cacTrend(
      [
        day("2024-01-01", 10, 100, { newCustomers: 1 }),
        day("2024-01-02", 20, 100, { newCustomers: 0 }),
        day("2024-01-03", 30, 100, { newCustomers: 2 }),
      ],
      2
    );

    expect(out.map((p) => p.cac.defined)).toEqual([true, false, true]);
    expect(out.map((p) => p.rollingCac)).toEqual([10, 10, 15]);
  });

  it("averages from the first day", () => {
    const out = cacTrend([day("2024-01-01", 0, 100, { newCustomers: 0 }), day("2024-01-02", 12, 100, { newCustomers: 3 })]);
    expect(out.map((p) => p.rollingCac)).toEqual([null, 4]);
  });
});

describe("compareRecentAcquisition", () => {
  const twoWeeks = Array.from({ length: 14 }, (_, i) =>
    i < 7 ? day(dateOf(i + 1), 10, 100, { newCustomers: 1 }) : day(dateOf(i + 1), 12, 100, { newCustomers: 2 })
  );

  it("needs at least fourteen days", () => {
    expect(compareRecentAcquisition(twoWeeks.slice(1))).toBeNull();
  });

  it("compares summed CAC and new customers of the last two weeks", () => {
    const out = compareRecentAcquisition([day(dateOf(0), 1000, 100, { newCustomers: 1 }), ...twoWeeks]);

    expect(out?.previousCac.value).toBe(10);
    expect(out?.recentCac.value).toBe(6);
    expect(out?.cacChangePct).toBeCloseTo(-40, 10);
    expect(out?.previousNewCustomers).toBe(7);
    expect(out?.recentNewCustomers).toBe(14);
    expect(out?.customerGrowthPct).toBe(100);
  });

  it("has no change when the prior week had no new customers", () => {
    const quiet = twoWeeks.map((d, i) => (i < 7 ? { ...d, newCustomers: 0 } : d));
    const out = compareRecentAcquisition(quiet);

    expect(out?.previousCac.defined).toBe(false);
    expect(out?.cacChangePct).toBeNull();
    expect(out?.customerGrowthPct).toBeNull();
  });
});

describe("channelEfficiency", () => {
  const set = (key: string, spend: number, revenue: number) =>
    buildMetricSet(key, { impressions: 1000, clicks: 10, spend, attributedRevenue: revenue, rows: 1 });

  it("finds the best channel and the weakest one below the median", () => {
    const out = channelEfficiency([set("A", 100, 300), set("B", 100, 500), set("C", 100, 200), set("D", 0, 0)]);

    expect(out.best?.key).toBe("B");
    expect(out.medianRoas).toBe(3);
    expect(out.laggard?.key).toBe("C");
    expect(out.improvementPct).toBe(150);
  });

  it("averages the middle pair for an even count", () => {
    const out = channelEfficiency([set("A", 100, 300), set("B", 100, 500), set("C", 100, 200), set("D", 100, 400)]);

    expect(out.medianRoas).toBe(3.5);
    expect(out.laggard?.key).toBe("C");
  });

  it("is empty without spend", () => {
    expect(channelEfficiency([set("A", 0, 0)])).toEqual({
      best: null,
      medianRoas: null,
      laggard: null,
      improvementPct: null,
    });
  });
});
