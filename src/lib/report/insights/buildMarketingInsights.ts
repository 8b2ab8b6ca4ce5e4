import type { DateKey, Insight, MetricSet, MetricValue } from "../types";
import type { AcquisitionComparison, ChannelEfficiency, WeekdayPerformance } from "../analysis";
import type { RuleTable } from "./rules";
import { evaluate } from "./rules";
import { addDays, daysInclusive, midpointKey, minMaxDate } from "../date";
import { USD, USD2, formatPct } from "../format";
import { aov, cpa, efficiency, pickTopPerformer } from "../metrics";

export type InsightInput = {
  channelSets: readonly MetricSet[];
  totalSpend: number;
  totalRevenue: number; // 비즈니스 매출
  orders: number;
  newCustomers: number;
  dailyRevenue: ReadonlyArray<{ date: DateKey; revenue: number }>;
  // 선택된 기간. null 이면 데이터의 최소~최대 날짜
  range: { start: DateKey; end: DateKey } | null;
};

const FLAT_BAND_PCT = 1;

// 0.1 미만은 0.0x 로 뭉개지지 않게 두 자리
export function formatRatio(v: number) {
  return v < 0.1 ? v.toFixed(2) : v.toFixed(1);
}

function insufficient(category: Insight["category"], title: string, metric: string, what: string): Insight {
  return {
    category,
    title,
    message: `Insufficient data to ${what}.`,
    metric,
    value: null,
  };
}

// =========================
// Performance
// =========================
type PerformanceFacts = { top: MetricSet | null };

export const performanceRules: RuleTable<PerformanceFacts> = {
  rules: [
    {
      id: "performance.insufficient",
      when: (f) => f.top === null,
      build: () =>
        insufficient("performance", "Top Performing Channel", "ROAS", "determine the top performing channel"),
    },
  ],
  fallback: ({ top }) => {
    const name = top?.key ?? "";
    const value = top?.roas.value ?? 0;
    return {
      category: "performance",
      title: `${name} is the Top Performing Channel`,
      message: `${name} delivers the highest ROAS at ${value.toFixed(1)}x`,
      metric: "ROAS",
      value,
    };
  },
};

// =========================
// Efficiency
// =========================
type EfficiencyFacts = { totalRevenue: number; efficiency: MetricValue };

export const efficiencyRules: RuleTable<EfficiencyFacts> = {
  rules: [
    {
      id: "efficiency.insufficient",
      when: (f) => !f.efficiency.defined || f.totalRevenue <= 0,
      build: () =>
        insufficient("efficiency", "Marketing Efficiency", "Revenue per $ spent", "measure marketing efficiency"),
    },
  ],
  fallback: ({ efficiency: e }) => ({
    category: "efficiency",
    title: "Marketing Efficiency",
    message: `${USD2(e.value)} revenue per $1 spent`,
    metric: "Revenue per $ spent",
    value: e.value,
  }),
};

// =========================
// Trend
// =========================
export type TrendFacts = {
  firstAvg: number;
  secondAvg: number;
  changePct: number | null;
};

/**
 * 기간을 중간 날짜로 나눠 일평균 매출 비교
 * - 앞: [start, mid), 뒤: [mid, end]
 * - 하루짜리 기간이거나 앞 절반 매출이 0이면 changePct = null
 */
export function revenueTrend(
  daily: InsightInput["dailyRevenue"],
  range: InsightInput["range"]
): TrendFacts {
  const bounds = range ?? (() => {
    const mm = minMaxDate(daily.map((d) => d.date));
    return mm ? { start: mm.min, end: mm.max } : null;
  })();

  const none: TrendFacts = { firstAvg: 0, secondAvg: 0, changePct: null };
  if (!bounds) return none;

  const { start, end } = bounds;
  const days = daysInclusive(start, end);
  if (days < 2) return none;

  const mid = midpointKey(start, end);
  const firstDays = daysInclusive(start, addDays(mid, -1));
  const secondDays = days - firstDays;

  let firstSum = 0;
  let secondSum = 0;
  for (const d of daily) {
    if (d.date < start || d.date > end) continue;
    if (d.date < mid) firstSum += d.revenue;
    else secondSum += d.revenue;
  }

  const firstAvg = firstSum / firstDays;
  const secondAvg = secondSum / secondDays;
  if (firstAvg <= 0) return { firstAvg, secondAvg, changePct: null };

  return { firstAvg, secondAvg, changePct: ((secondAvg - firstAvg) / firstAvg) * 100 };
}

function signedPct(pct: number) {
  return `${pct > 0 ? "+" : ""}${pct.toFixed(1)}%`;
}

function trendInsight(direction: "Increasing" | "Decreasing" | "Flat", pct: number): Insight {
  const signed = signedPct(pct);
  return {
    category: "trend",
    title: `Revenue Trend is ${direction}`,
    message: `Average daily revenue is ${direction.toLowerCase()} (${signed} from the first to the second half of the period)`,
    metric: "Revenue Growth",
    value: pct,
  };
}

export const trendRules: RuleTable<TrendFacts> = {
  rules: [
    {
      id: "trend.insufficient",
      when: (f) => f.changePct === null,
      build: () => insufficient("trend", "Revenue Trend", "Revenue Growth", "determine a revenue trend"),
    },
    {
      id: "trend.increasing",
      when: (f) => (f.changePct ?? 0) > FLAT_BAND_PCT,
      build: (f) => trendInsight("Increasing", f.changePct ?? 0),
    },
    {
      id: "trend.decreasing",
      when: (f) => (f.changePct ?? 0) < -FLAT_BAND_PCT,
      build: (f) => trendInsight("Decreasing", f.changePct ?? 0),
    },
  ],
  fallback: (f) => trendInsight("Flat", f.changePct ?? 0),
};

// =========================
// Acquisition
// =========================
type AcquisitionFacts = { cpa: MetricValue; aov: MetricValue };

export const acquisitionRules: RuleTable<AcquisitionFacts> = {
  rules: [
    {
      id: "acquisition.insufficient",
      // spend 0 이면 CAC 0 → 비교 의미 없음
      when: (f) => !f.cpa.defined || f.cpa.value <= 0 || !f.aov.defined,
      build: () =>
        insufficient(
          "acquisition",
          "Customer Acquisition Efficiency",
          "CAC to AOV Ratio",
          "compare acquisition cost with order value"
        ),
    },
  ],
  fallback: ({ cpa: c, aov: a }) => {
    const multiple = c.value / a.value;
    return {
      category: "acquisition",
      title: "Customer Acquisition Efficiency",
      message: `Customer acquisition cost (${USD2(c.value)}) is ${formatRatio(multiple)}x the average order value (${USD2(a.value)})`,
      metric: "CAC to AOV Ratio",
      value: multiple,
    };
  },
};

/** 핵심 인사이트 4종: performance → efficiency → trend → acquisition */
export function generateInsights(input: InsightInput): Insight[] {
  return [
    evaluate(performanceRules, { top: pickTopPerformer(input.channelSets) }),
    evaluate(efficiencyRules, {
      totalRevenue: input.totalRevenue,
      efficiency: efficiency(input.totalRevenue, input.totalSpend),
    }),
    evaluate(trendRules, revenueTrend(input.dailyRevenue, input.range)),
    evaluate(acquisitionRules, {
      cpa: cpa(input.totalSpend, input.newCustomers),
      aov: aov(input.totalRevenue, input.orders),
    }),
  ];
}

// =========================
// 고객 획득 카드 (등급 / 주간 CAC / 채널 효율)
// =========================
const EFFICIENCY_STRONG = 5;
const EFFICIENCY_MODERATE = 3;
const ACQUISITION_EXCELLENT = 0.3;
const ACQUISITION_GOOD = 0.5;

type EfficiencyTierFacts = { efficiency: MetricValue };

function efficiencyTier(tier: string, value: number, band: string): Insight {
  return {
    category: "efficiency",
    title: `Efficiency Rating: ${tier}`,
    message: `Each $1 of ad spend returns ${USD2(value)} in total revenue (${band})`,
    metric: "Revenue per $ spent",
    value,
  };
}

export const efficiencyTierRules: RuleTable<EfficiencyTierFacts> = {
  rules: [
    {
      id: "efficiencyTier.insufficient",
      when: (f) => !f.efficiency.defined,
      build: () => insufficient("efficiency", "Efficiency Rating", "Revenue per $ spent", "rate marketing efficiency"),
    },
    {
      id: "efficiencyTier.strong",
      when: (f) => f.efficiency.value > EFFICIENCY_STRONG,
      build: (f) => efficiencyTier("Strong", f.efficiency.value, "above $5.00"),
    },
    {
      id: "efficiencyTier.moderate",
      when: (f) => f.efficiency.value > EFFICIENCY_MODERATE,
      build: (f) => efficiencyTier("Moderate", f.efficiency.value, "above $3.00"),
    },
  ],
  fallback: (f) => efficiencyTier("Needs improvement", f.efficiency.value, "$3.00 or less"),
};

type AcquisitionTierFacts = { cac: MetricValue; aov: MetricValue };

function acquisitionTier(tier: string, share: number): Insight {
  return {
    category: "acquisition",
    title: `Acquisition Rating: ${tier}`,
    message: `Acquiring a customer costs ${formatPct(share, 1)} of the average order value`,
    metric: "CAC to AOV Ratio",
    value: share,
  };
}

const cacShare = (f: AcquisitionTierFacts) => f.cac.value / f.aov.value;

export const acquisitionTierRules: RuleTable<AcquisitionTierFacts> = {
  rules: [
    {
      id: "acquisitionTier.insufficient",
      when: (f) => !f.cac.defined || f.cac.value <= 0 || !f.aov.defined,
      build: () =>
        insufficient("acquisition", "Acquisition Rating", "CAC to AOV Ratio", "rate customer acquisition"),
    },
    {
      id: "acquisitionTier.excellent",
      when: (f) => cacShare(f) < ACQUISITION_EXCELLENT,
      build: (f) => acquisitionTier("Excellent", cacShare(f)),
    },
    {
      id: "acquisitionTier.good",
      when: (f) => cacShare(f) < ACQUISITION_GOOD,
      build: (f) => acquisitionTier("Good", cacShare(f)),
    },
  ],
  fallback: (f) => acquisitionTier("Needs optimization", cacShare(f)),
};

export type CacChangeFacts = {
  recentCac: number;
  changePct: number | null;
  growthPct: number | null;
};

export function cacChangeFacts(c: AcquisitionComparison | null): CacChangeFacts {
  if (!c) return { recentCac: 0, changePct: null, growthPct: null };
  return { recentCac: c.recentCac.value, changePct: c.cacChangePct, growthPct: c.customerGrowthPct };
}

function cacChange(direction: "Falling" | "Rising" | "Stable", f: CacChangeFacts): Insight {
  const pct = f.changePct ?? 0;
  const growth = f.growthPct === null ? "no new customers before" : `${signedPct(f.growthPct)} new customers`;
  return {
    category: "customer",
    title: `CAC is ${direction}`,
    message: `Last 7 days CAC is ${USD2(f.recentCac)} (${signedPct(pct)} vs the prior 7 days, ${growth})`,
    metric: "CAC Change",
    value: pct,
  };
}

export const cacChangeRules: RuleTable<CacChangeFacts> = {
  rules: [
    {
      id: "cacChange.insufficient",
      when: (f) => f.changePct === null,
      build: () => insufficient("customer", "Week-over-Week CAC", "CAC Change", "compare the last two weeks"),
    },
    {
      id: "cacChange.falling",
      when: (f) => (f.changePct ?? 0) < -FLAT_BAND_PCT,
      build: (f) => cacChange("Falling", f),
    },
    {
      id: "cacChange.rising",
      when: (f) => (f.changePct ?? 0) > FLAT_BAND_PCT,
      build: (f) => cacChange("Rising", f),
    },
  ],
  fallback: (f) => cacChange("Stable", f),
};

export const channelEfficiencyRules: RuleTable<ChannelEfficiency> = {
  rules: [
    {
      id: "channelEfficiency.insufficient",
      when: (f) => f.best === null,
      build: () => insufficient("customer", "Most Efficient Channel", "ROAS", "identify the most efficient channel"),
    },
  ],
  fallback: ({ best }) => ({
    category: "customer",
    title: `${best?.key ?? ""} is the Most Efficient Channel`,
    message: `${best?.key ?? ""} returns ${USD2(best?.roas.value ?? 0)} in attributed revenue per $1 spent`,
    metric: "ROAS",
    value: best?.roas.value ?? 0,
  }),
};

export const opportunityRules: RuleTable<ChannelEfficiency> = {
  rules: [
    {
      id: "opportunity.insufficient",
      when: (f) => f.best === null,
      build: () =>
        insufficient("customer", "Improvement Opportunity", "Improvement Potential", "identify an improvement opportunity"),
    },
    {
      id: "opportunity.none",
      when: (f) => f.laggard === null || f.improvementPct === null,
      build: () => ({
        category: "customer",
        title: "Improvement Opportunity",
        message: "No channel falls below the median efficiency",
        metric: "Improvement Potential",
        value: null,
      }),
    },
  ],
  fallback: ({ best, laggard, improvementPct }) => {
    const pct = improvementPct ?? 0;
    return {
      category: "customer",
      title: `Improvement Opportunity in ${laggard?.key ?? ""}`,
      message: `${laggard?.key ?? ""} is below the median efficiency; matching ${best?.key ?? ""} would lift its return by ${pct.toFixed(0)}%`,
      metric: "Improvement Potential",
      value: pct,
    };
  },
};

export type CustomerInsightInput = {
  efficiency: MetricValue;
  cac: MetricValue;
  aov: MetricValue;
  comparison: AcquisitionComparison | null;
  channels: ChannelEfficiency;
};

/** 등급 2종 → 주간 CAC → 최고 효율 채널 → 개선 여지 */
export function generateCustomerInsights(input: CustomerInsightInput): Insight[] {
  return [
    evaluate(efficiencyTierRules, { efficiency: input.efficiency }),
    evaluate(acquisitionTierRules, { cac: input.cac, aov: input.aov }),
    evaluate(cacChangeRules, cacChangeFacts(input.comparison)),
    evaluate(channelEfficiencyRules, input.channels),
    evaluate(opportunityRules, input.channels),
  ];
}

// =========================
// 보조 카드 (funnel / time / geography)
// =========================
type FunnelFacts = { best: MetricSet | null };

export const funnelRules: RuleTable<FunnelFacts> = {
  rules: [
    {
      id: "funnel.insufficient",
      when: (f) => f.best === null,
      build: () => insufficient("funnel", "Funnel Optimization", "CTR", "compare click-through rates"),
    },
  ],
  fallback: ({ best }) => ({
    category: "funnel",
    title: "Funnel Optimization",
    message: `${best?.key ?? ""} has the best CTR at ${formatPct(best?.ctr.value ?? 0)}`,
    metric: "CTR",
    value: best?.ctr.value ?? 0,
  }),
};

type TimeFacts = { days: number; best: WeekdayPerformance | null };

// 요일 비교는 최소 일주일치
const MIN_DAYS_FOR_WEEKDAY = 7;

export const timeRules: RuleTable<TimeFacts> = {
  rules: [
    {
      id: "time.insufficient",
      when: (f) => f.days < MIN_DAYS_FOR_WEEKDAY || f.best === null,
      build: () => insufficient("time", "Best Performance Day", "Avg Revenue", "compare days of the week"),
    },
  ],
  fallback: ({ best }) => ({
    category: "time",
    title: "Best Performance Day",
    message: `${best?.weekday ?? ""} has the highest average daily revenue (${USD(best?.avgRevenue.value ?? 0)})`,
    metric: "Avg Revenue",
    value: best?.avgRevenue.value ?? 0,
  }),
};

type GeographyFacts = { top: MetricSet | null; regions: number };

export const geographyRules: RuleTable<GeographyFacts> = {
  rules: [
    {
      id: "geography.insufficient",
      when: (f) => f.top === null,
      build: () =>
        insufficient("geography", "Geographic Insights", "ROAS", "determine the top performing state"),
    },
  ],
  fallback: ({ top, regions }) => ({
    category: "geography",
    title: "Geographic Insights",
    message: `${top?.key ?? ""} is the top performing state at ${(top?.roas.value ?? 0).toFixed(1)}x ROAS across ${regions} state(s)`,
    metric: "ROAS",
    value: top?.roas.value ?? 0,
  }),
};

export function generateSecondaryInsights(args: {
  channelSets: readonly MetricSet[];
  regionSets: readonly MetricSet[];
  weekdays: readonly WeekdayPerformance[];
}): Insight[] {
  const byCtr = args.channelSets
    .filter((s) => s.ctr.defined)
    .slice()
    .sort((a, b) => b.ctr.value - a.ctr.value || a.key.localeCompare(b.key));

  const days = args.weekdays.reduce((acc, w) => acc + w.days, 0);
  const bestDay =
    args.weekdays
      .filter((w) => w.avgRevenue.defined)
      .slice()
      .sort((a, b) => b.avgRevenue.value - a.avgRevenue.value || a.index - b.index)[0] ?? null;

  return [
    evaluate(funnelRules, { best: byCtr[0] ?? null }),
    evaluate(timeRules, { days, best: bestDay }),
    evaluate(geographyRules, { top: pickTopPerformer(args.regionSets), regions: args.regionSets.length }),
  ];
}
