import type { DailyCombined, DateKey, MetricSet, MetricValue } from "./types";
import type { WeekdayLabel } from "./date";
import { WEEKDAY_LABELS, isWeekend, startOfWeekMonday, weekdayIndex } from "./date";
import { UNDEFINED_METRIC, cpa, ctr, efficiency, pickTopPerformer, ratio, roas } from "./metrics";

// =========================
// Funnel: 노출 → 클릭 → 추정 전환(귀속 매출 / AOV)
// =========================
export type FunnelStage = {
  stage: "Impressions" | "Clicks" | "Conversions";
  count: number;
  rate: MetricValue; // 직전 단계 대비
};

export type ChannelFunnel = {
  channel: string;
  impressions: number;
  clicks: number;
  ctr: MetricValue;
  estimatedConversions: number;
  cvr: MetricValue;
};

export type Funnel = {
  stages: FunnelStage[];
  overallConversion: MetricValue; // 추정 전환 / 노출
  byChannel: ChannelFunnel[];
};

function estimateConversions(revenue: number, aov: MetricValue) {
  return aov.defined ? revenue / aov.value : 0;
}

export function buildFunnel(channelSets: readonly MetricSet[], aov: MetricValue): Funnel {
  let impressions = 0;
  let clicks = 0;
  let revenue = 0;
  for (const s of channelSets) {
    impressions += s.impressions;
    clicks += s.clicks;
    revenue += s.revenue;
  }

  const conversions = estimateConversions(revenue, aov);

  return {
    stages: [
      { stage: "Impressions", count: impressions, rate: impressions > 0 ? ratio(1, 1) : UNDEFINED_METRIC },
      { stage: "Clicks", count: clicks, rate: ctr(clicks, impressions) },
      {
        stage: "Conversions",
        count: conversions,
        rate: aov.defined ? ratio(conversions, clicks) : UNDEFINED_METRIC,
      },
    ],
    overallConversion: aov.defined ? ratio(conversions, impressions) : UNDEFINED_METRIC,
    byChannel: channelSets.map((s) => {
      const est = estimateConversions(s.revenue, aov);
      return {
        channel: s.key,
        impressions: s.impressions,
        clicks: s.clicks,
        ctr: s.ctr,
        estimatedConversions: est,
        cvr: aov.defined ? ratio(est, s.clicks) : UNDEFINED_METRIC,
      };
    }),
  };
}

// =========================
// 요일별
// =========================
export type WeekdayPerformance = {
  weekday: WeekdayLabel;
  index: number; // 0=Mon
  days: number;
  avgRevenue: MetricValue;
  avgSpend: MetricValue;
  avgNewCustomers: MetricValue;
};

export function dayOfWeekPerformance(daily: readonly DailyCombined[]): WeekdayPerformance[] {
  const acc = WEEKDAY_LABELS.map(() => ({ days: 0, revenue: 0, spend: 0, newCustomers: 0 }));

  for (const d of daily) {
    const a = acc[weekdayIndex(d.date)];
    a.days += 1;
    a.revenue += d.totalRevenue;
    a.spend += d.spend;
    a.newCustomers += d.newCustomers;
  }

  return acc.map((a, index) => ({
    weekday: WEEKDAY_LABELS[index],
    index,
    days: a.days,
    avgRevenue: ratio(a.revenue, a.days),
    avgSpend: ratio(a.spend, a.days),
    avgNewCustomers: ratio(a.newCustomers, a.days),
  }));
}

export type WeekendSplit = {
  weekendAvgRevenue: MetricValue;
  weekdayAvgRevenue: MetricValue;
};

export function weekendVsWeekday(daily: readonly DailyCombined[]): WeekendSplit {
  let weDays = 0;
  let weRev = 0;
  let wdDays = 0;
  let wdRev = 0;

  for (const d of daily) {
    if (isWeekend(d.date)) {
      weDays += 1;
      weRev += d.totalRevenue;
    } else {
      wdDays += 1;
      wdRev += d.totalRevenue;
    }
  }

  return {
    weekendAvgRevenue: ratio(weRev, weDays),
    weekdayAvgRevenue: ratio(wdRev, wdDays),
  };
}

// =========================
// 주차별 (월요일 시작)
// =========================
export type WeeklyPoint = {
  weekStart: DateKey;
  totalRevenue: number;
  spend: number;
  attributedRevenue: number;
  efficiency: MetricValue;
};

export function weeklyTrend(daily: readonly DailyCombined[]): WeeklyPoint[] {
  const map = new Map<DateKey, { totalRevenue: number; spend: number; attributedRevenue: number }>();

  for (const d of daily) {
    const wk = startOfWeekMonday(d.date);
    const cur = map.get(wk) ?? { totalRevenue: 0, spend: 0, attributedRevenue: 0 };
    cur.totalRevenue += d.totalRevenue;
    cur.spend += d.spend;
    cur.attributedRevenue += d.attributedRevenue;
    map.set(wk, cur);
  }

  return Array.from(map.entries())
    .map(([weekStart, w]) => ({ weekStart, ...w, efficiency: efficiency(w.totalRevenue, w.spend) }))
    .sort((a, b) => a.weekStart.localeCompare(b.weekStart));
}

// =========================
// 이동평균 (행 기준 window, 창이 다 차기 전에는 null)
// =========================
export type RollingPoint = {
  date: DateKey;
  revenueAvg: number | null;
  spendAvg: number | null;
  roas: MetricValue | null;
};

export function rollingAverages(daily: readonly DailyCombined[], window = 7): RollingPoint[] {
  let rev = 0;
  let spend = 0;
  let attributed = 0;

  return daily.map((d, i) => {
    rev += d.totalRevenue;
    spend += d.spend;
    attributed += d.attributedRevenue;

    if (i >= window) {
      const old = daily[i - window];
      rev -= old.totalRevenue;
      spend -= old.spend;
      attributed -= old.attributedRevenue;
    }

    if (i < window - 1) return { date: d.date, revenueAvg: null, spendAvg: null, roas: null };

    return {
      date: d.date,
      revenueAvg: rev / window,
      spendAvg: spend / window,
      roas: roas(attributed, spend),
    };
  });
}

// =========================
// 고객 획득 (CAC)
// =========================
export type CacPoint = {
  date: DateKey;
  cac: MetricValue;
  rollingCac: number | null; // 최근 window 행 중 CAC가 정의된 날의 평균
};

/** 신규 고객 0명인 날은 CAC undefined, 이동평균에서도 빠짐 */
export function cacTrend(daily: readonly DailyCombined[], window = 7): CacPoint[] {
  const points = daily.map((d) => ({ date: d.date, cac: cpa(d.spend, d.newCustomers) }));

  return points.map((p, i) => {
    const defined = points
      .slice(Math.max(0, i - window + 1), i + 1)
      .filter((x) => x.cac.defined)
      .map((x) => x.cac.value);
    const rollingCac = defined.length ? defined.reduce((a, b) => a + b, 0) / defined.length : null;
    return { ...p, rollingCac };
  });
}

export type AcquisitionComparison = {
  recentCac: MetricValue;
  previousCac: MetricValue;
  cacChangePct: number | null;
  recentNewCustomers: number;
  previousNewCustomers: number;
  customerGrowthPct: number | null;
};

function pctChange(current: number, previous: number): number | null {
  return previous > 0 ? ((current - previous) / previous) * 100 : null;
}

/**
 * 마지막 window 행 vs 그 직전 window 행
 * - 행이 window * 2 보다 적으면 null
 * - CAC는 합계 spend / 합계 신규 고객
 */
export function compareRecentAcquisition(
  daily: readonly DailyCombined[],
  window = 7
): AcquisitionComparison | null {
  if (daily.length < window * 2) return null;

  const sum = (rows: readonly DailyCombined[]) =>
    rows.reduce(
      (acc, d) => ({ spend: acc.spend + d.spend, newCustomers: acc.newCustomers + d.newCustomers }),
      { spend: 0, newCustomers: 0 }
    );

  const recent = sum(daily.slice(-window));
  const previous = sum(daily.slice(-window * 2, -window));
  const recentCac = cpa(recent.spend, recent.newCustomers);
  const previousCac = cpa(previous.spend, previous.newCustomers);

  return {
    recentCac,
    previousCac,
    cacChangePct: recentCac.defined && previousCac.defined ? pctChange(recentCac.value, previousCac.value) : null,
    recentNewCustomers: recent.newCustomers,
    previousNewCustomers: previous.newCustomers,
    customerGrowthPct: pctChange(recent.newCustomers, previous.newCustomers),
  };
}

// =========================
// 채널 효율 (귀속 매출 / spend)
// =========================
export type ChannelEfficiency = {
  best: MetricSet | null;
  medianRoas: number | null;
  laggard: MetricSet | null; // 중앙값 미만 중 최저
  improvementPct: number | null; // (best - laggard) / laggard
};

function median(values: readonly number[]): number | null {
  if (!values.length) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function channelEfficiency(channelSets: readonly MetricSet[]): ChannelEfficiency {
  const candidates = channelSets.filter((s) => s.spend > 0 && s.roas.defined);
  const best = pickTopPerformer(candidates);
  const medianRoas = median(candidates.map((s) => s.roas.value));

  const laggard =
    medianRoas === null
      ? null
      : candidates
          .filter((s) => s.roas.value < medianRoas)
          .sort((a, b) => a.roas.value - b.roas.value || a.key.localeCompare(b.key))[0] ?? null;

  const improvementPct =
    best && laggard && laggard.roas.value > 0
      ? ((best.roas.value - laggard.roas.value) / laggard.roas.value) * 100
      : null;

  return { best, medianRoas, laggard, improvementPct };
}

// =========================
// 상관계수 (Pearson)
// =========================
export function correlation(xs: readonly number[], ys: readonly number[]): number | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return null;

  let mx = 0;
  let my = 0;
  for (let i = 0; i < n; i++) {
    mx += xs[i];
    my += ys[i];
  }
  mx /= n;
  my /= n;

  let cov = 0;
  let vx = 0;
  let vy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx;
    const dy = ys[i] - my;
    cov += dx * dy;
    vx += dx * dx;
    vy += dy * dy;
  }

  if (vx === 0 || vy === 0) return null;
  return cov / Math.sqrt(vx * vy);
}

export type KeyCorrelations = {
  spendVsRevenue: number | null;
  spendVsOrders: number | null;
  impressionsVsRevenue: number | null;
  attributedVsActualRevenue: number | null;
};

export function keyCorrelations(daily: readonly DailyCombined[]): KeyCorrelations {
  const col = (f: (d: DailyCombined) => number) => daily.map(f);
  const spend = col((d) => d.spend);
  const revenue = col((d) => d.totalRevenue);

  return {
    spendVsRevenue: correlation(spend, revenue),
    spendVsOrders: correlation(spend, col((d) => d.orders)),
    impressionsVsRevenue: correlation(col((d) => d.impressions), revenue),
    attributedVsActualRevenue: correlation(col((d) => d.attributedRevenue), revenue),
  };
}
