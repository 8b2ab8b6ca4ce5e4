import type {
  BusinessRecord,
  BusinessTotals,
  ChannelName,
  ChannelRecord,
  ChannelTotals,
  DailyCombined,
  Insight,
  MetricSet,
  ReportFilters,
  UnifiedChannelTable,
} from "./types";
import type { BusinessKpis } from "./metrics";
import type {
  AcquisitionComparison,
  CacPoint,
  ChannelEfficiency,
  Funnel,
  KeyCorrelations,
  RollingPoint,
  WeekdayPerformance,
  WeekendSplit,
  WeeklyPoint,
} from "./analysis";
import {
  filterRows,
  groupBusinessByDate,
  groupBy,
  groupByChannelCampaign,
  joinWithBusiness,
  summarize,
  summarizeBusiness,
} from "./aggregate";
import { filterByDateRange } from "./loader";
import {
  buildBusinessKpis,
  buildMetricSet,
  channelMetricSets,
  overallMetricSet,
  pickTopPerformer,
  rankMetricSets,
  regionMetricSets,
} from "./metrics";
import {
  buildFunnel,
  cacTrend,
  channelEfficiency,
  compareRecentAcquisition,
  dayOfWeekPerformance,
  keyCorrelations,
  rollingAverages,
  weekendVsWeekday,
  weeklyTrend,
} from "./analysis";
import {
  generateCustomerInsights,
  generateInsights,
  generateSecondaryInsights,
} from "./insights/buildMarketingInsights";
import { EmptyDataError, requireRows } from "./errors";
import { minMaxDate, periodText } from "./date";
import { createLogger } from "./logger";

const log = createLogger("build");

export type CampaignMetricSet = MetricSet & { channel: ChannelName; campaign: string };

export type ChannelCard = {
  channel: ChannelName;
  spend: number;
  revenue: number;
  roas: MetricSet["roas"];
  campaigns: number;
};

export type ReportModel = {
  filters: ReportFilters;
  period: string;

  rows: ChannelRecord[];
  business: BusinessRecord[];
  totals: ChannelTotals;
  businessTotals: BusinessTotals;
  kpis: BusinessKpis;

  overall: MetricSet;
  byChannel: MetricSet[];
  channelCards: ChannelCard[];
  byCampaign: CampaignMetricSet[];
  byRegion: MetricSet[];
  topCampaignsByRoas: CampaignMetricSet[];
  topCampaignsByRevenue: CampaignMetricSet[];
  topRegions: MetricSet[];
  topPerformer: MetricSet | null;

  daily: DailyCombined[];
  rolling: RollingPoint[];
  weekly: WeeklyPoint[];
  weekdays: WeekdayPerformance[];
  weekendSplit: WeekendSplit;
  funnel: Funnel;
  correlations: KeyCorrelations;

  cacTrend: CacPoint[];
  acquisition: AcquisitionComparison | null;
  channelEfficiency: ChannelEfficiency;

  insights: Insight[];
  secondaryInsights: Insight[];
  customerInsights: Insight[];
};

// 행이 필요한 섹션은 EmptyDataError 시 빈 값으로 대체 (다른 섹션은 계속 렌더)
function section<T>(name: string, build: () => T, empty: T): T {
  try {
    return build();
  } catch (e) {
    if (e instanceof EmptyDataError) {
      log.debug(`${name}: ${e.message}`);
      return empty;
    }
    throw e;
  }
}

function campaignSets(rows: UnifiedChannelTable): CampaignMetricSet[] {
  return groupByChannelCampaign(rows).map((t) => ({
    ...buildMetricSet(`${t.channel} / ${t.campaign}`, t),
    channel: t.channel,
    campaign: t.campaign,
  }));
}

function channelCards(rows: UnifiedChannelTable, sets: readonly MetricSet[]): ChannelCard[] {
  const campaigns = new Map<ChannelName, Set<string>>();
  for (const r of rows) {
    const cur = campaigns.get(r.channel) ?? new Set<string>();
    cur.add(r.campaign);
    campaigns.set(r.channel, cur);
  }

  return Array.from(campaigns.entries()).flatMap(([channel, names]) => {
    const s = sets.find((x) => x.key === channel);
    if (!s) return [];
    return [{ channel, spend: s.spend, revenue: s.revenue, roas: s.roas, campaigns: names.size }];
  });
}

/**
 * 로드된 전체 데이터 + 필터 → 화면 하나 분량의 리포트
 * - 채널/캠페인 필터는 채널 데이터에만 적용 (비즈니스 데이터는 날짜만)
 */
export function buildReport(
  data: { channels: UnifiedChannelTable; business: readonly BusinessRecord[] },
  filters: ReportFilters
): ReportModel {
  const rows = filterRows(data.channels, filters);

  const bounds = minMaxDate(data.business.map((b) => b.date));
  const business =
    filters.start || filters.end
      ? filterByDateRange(
          data.business,
          filters.start ?? bounds?.min ?? "",
          filters.end ?? bounds?.max ?? ""
        )
      : [...data.business];

  const totals = summarize(rows);
  const businessTotals = summarizeBusiness(business);
  const kpis = buildBusinessKpis(businessTotals, totals);

  const overall = overallMetricSet(rows, businessTotals);
  const byChannel = channelMetricSets(rows);
  const byCampaign = campaignSets(rows);
  const byRegion = regionMetricSets(rows);

  const daily = joinWithBusiness(groupBy(rows, "date"), groupBusinessByDate(business));

  const range = filters.start && filters.end ? { start: filters.start, end: filters.end } : null;
  const shownRange = range ?? (() => {
    const mm = minMaxDate([...rows.map((r) => r.date), ...business.map((b) => b.date)]);
    return mm ? { start: mm.min, end: mm.max } : null;
  })();

  const weekdays = dayOfWeekPerformance(daily);
  const acquisition = compareRecentAcquisition(daily);
  const efficiencyByChannel = channelEfficiency(byChannel);

  const report: ReportModel = {
    filters,
    period: periodText(shownRange?.start ?? null, shownRange?.end ?? null),

    rows,
    business,
    totals,
    businessTotals,
    kpis,

    overall,
    byChannel,
    channelCards: channelCards(rows, byChannel),
    byCampaign,
    byRegion,
    topCampaignsByRoas: rankMetricSets(byCampaign, "roas", 5),
    topCampaignsByRevenue: rankMetricSets(byCampaign, "revenue", 5),
    topRegions: rankMetricSets(byRegion, "roas", 5),
    topPerformer: pickTopPerformer(byChannel),

    daily,
    rolling: section("rolling", () => rollingAverages(requireRows(daily, "rolling averages")), []),
    weekly: section("weekly", () => weeklyTrend(requireRows(daily, "weekly trend")), []),
    weekdays,
    weekendSplit: weekendVsWeekday(daily),
    funnel: buildFunnel(byChannel, kpis.aov),
    correlations: section("correlations", () => keyCorrelations(requireRows(daily, "correlations")), {
      spendVsRevenue: null,
      spendVsOrders: null,
      impressionsVsRevenue: null,
      attributedVsActualRevenue: null,
    }),

    cacTrend: cacTrend(daily),
    acquisition,
    channelEfficiency: efficiencyByChannel,

    insights: generateInsights({
      channelSets: byChannel,
      totalSpend: totals.spend,
      totalRevenue: businessTotals.totalRevenue,
      orders: businessTotals.orders,
      newCustomers: businessTotals.newCustomers,
      dailyRevenue: business.map((b) => ({ date: b.date, revenue: b.totalRevenue })),
      range,
    }),
    secondaryInsights: generateSecondaryInsights({ channelSets: byChannel, regionSets: byRegion, weekdays }),
    customerInsights: generateCustomerInsights({
      efficiency: kpis.efficiency,
      cac: kpis.cac,
      aov: kpis.aov,
      comparison: acquisition,
      channels: efficiencyByChannel,
    }),
  };

  log.debug(`built report for ${report.period || "empty range"}`, {
    rows: rows.length,
    business: business.length,
  });

  return report;
}
