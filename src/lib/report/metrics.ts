import type {
  BusinessTotals,
  ChannelTotals,
  MetricSet,
  MetricValue,
  UnifiedChannelTable,
} from "./types";
import { groupBy, summarize } from "./aggregate";

export const UNDEFINED_METRIC: MetricValue = Object.freeze({ value: 0, defined: false });

/**
 * 분모가 0(또는 결과가 유한수가 아님)이면 { value: 0, defined: false }
 * - 합계끼리 나눔. 행 단위 비율의 평균은 쓰지 않음
 */
export function ratio(numerator: number, denominator: number): MetricValue {
  if (!(denominator > 0)) return UNDEFINED_METRIC;
  const value = numerator / denominator;
  if (!Number.isFinite(value) || value < 0) return UNDEFINED_METRIC;
  return { value, defined: true };
}

export const roas = (attributedRevenue: number, spend: number) => ratio(attributedRevenue, spend);
export const cpa = (spend: number, newCustomers: number) => ratio(spend, newCustomers);
export const ctr = (clicks: number, impressions: number) => ratio(clicks, impressions);
export const cpc = (spend: number, clicks: number) => ratio(spend, clicks);
export const efficiency = (totalRevenue: number, spend: number) => ratio(totalRevenue, spend);
export const aov = (totalRevenue: number, orders: number) => ratio(totalRevenue, orders);
export const revenuePerCustomer = (totalRevenue: number, newCustomers: number) => ratio(totalRevenue, newCustomers);
export const grossMargin = (grossProfit: number, totalRevenue: number) => ratio(grossProfit, totalRevenue);

type BusinessSide = Pick<BusinessTotals, "newCustomers" | "totalRevenue">;

/** business 없이 만들면 (채널/캠페인 단위) cpa, efficiency는 undefined */
export function buildMetricSet(key: string, t: ChannelTotals, business?: BusinessSide): MetricSet {
  return {
    key,
    impressions: t.impressions,
    clicks: t.clicks,
    spend: t.spend,
    revenue: t.attributedRevenue,
    roas: roas(t.attributedRevenue, t.spend),
    ctr: ctr(t.clicks, t.impressions),
    cpc: cpc(t.spend, t.clicks),
    cpa: business ? cpa(t.spend, business.newCustomers) : UNDEFINED_METRIC,
    efficiency: business ? efficiency(business.totalRevenue, t.spend) : UNDEFINED_METRIC,
  };
}

export function overallMetricSet(rows: UnifiedChannelTable, business: BusinessSide): MetricSet {
  return buildMetricSet("overall", summarize(rows), business);
}

export function channelMetricSets(rows: UnifiedChannelTable): MetricSet[] {
  return Array.from(groupBy(rows, "channel").entries()).map(([k, t]) => buildMetricSet(k, t));
}

export function campaignMetricSets(rows: UnifiedChannelTable): MetricSet[] {
  return Array.from(groupBy(rows, "campaign").entries()).map(([k, t]) => buildMetricSet(k, t));
}

export function regionMetricSets(rows: UnifiedChannelTable): MetricSet[] {
  return Array.from(groupBy(rows, "region").entries()).map(([k, t]) => buildMetricSet(k, t));
}

/**
 * spend > 0 인 것 중 ROAS 최대
 * - 동률: attributed revenue 큰 쪽 → 이름 알파벳순
 */
export function pickTopPerformer(sets: readonly MetricSet[]): MetricSet | null {
  const candidates = sets.filter((s) => s.spend > 0 && s.roas.defined);
  if (!candidates.length) return null;

  return [...candidates].sort(
    (a, b) => b.roas.value - a.roas.value || b.revenue - a.revenue || a.key.localeCompare(b.key)
  )[0];
}

export type RankBy = "roas" | "revenue" | "spend";

const rankValue: Record<RankBy, (s: MetricSet) => number> = {
  roas: (s) => s.roas.value,
  revenue: (s) => s.revenue,
  spend: (s) => s.spend,
};

// 상위 N개 (ROAS 기준이면 spend 0인 항목은 제외)
export function rankMetricSets<T extends MetricSet>(sets: readonly T[], by: RankBy, limit = 5): T[] {
  const value = rankValue[by];
  return sets
    .filter((s) => by !== "roas" || s.roas.defined)
    .slice()
    .sort((a, b) => value(b) - value(a) || a.key.localeCompare(b.key))
    .slice(0, limit);
}

export type BusinessKpis = {
  totalRevenue: number;
  totalOrders: number;
  totalNewCustomers: number;
  totalGrossProfit: number;
  totalSpend: number;
  totalAttributedRevenue: number;
  aov: MetricValue;
  grossMargin: MetricValue;
  avgDailyRevenue: MetricValue;
  avgDailyOrders: MetricValue;
  avgDailySpend: MetricValue;
  overallRoas: MetricValue;
  efficiency: MetricValue;
  cac: MetricValue;
  revenuePerCustomer: MetricValue;
};

export function buildBusinessKpis(business: BusinessTotals, channels: ChannelTotals): BusinessKpis {
  return {
    totalRevenue: business.totalRevenue,
    totalOrders: business.orders,
    totalNewCustomers: business.newCustomers,
    totalGrossProfit: business.grossProfit,
    totalSpend: channels.spend,
    totalAttributedRevenue: channels.attributedRevenue,
    aov: aov(business.totalRevenue, business.orders),
    grossMargin: grossMargin(business.grossProfit, business.totalRevenue),
    avgDailyRevenue: ratio(business.totalRevenue, business.days),
    avgDailyOrders: ratio(business.orders, business.days),
    avgDailySpend: ratio(channels.spend, business.days),
    overallRoas: roas(channels.attributedRevenue, channels.spend),
    efficiency: efficiency(business.totalRevenue, channels.spend),
    cac: cpa(channels.spend, business.newCustomers),
    revenuePerCustomer: revenuePerCustomer(business.totalRevenue, business.newCustomers),
  };
}
