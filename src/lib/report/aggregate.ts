import type {
  BusinessRecord,
  BusinessTotals,
  ChannelName,
  ChannelRecord,
  ChannelTable,
  ChannelTotals,
  DailyCombined,
  DateKey,
  GroupDimension,
  ReportFilters,
  UnifiedChannelTable,
} from "./types";
import { CHANNELS } from "./types";
import { minMaxDate } from "./date";

// =========================
// merge
// =========================

/** 소스 순서대로 이어붙이고 각 행에 channel 태그 */
export function merge(tables: readonly ChannelTable[]): UnifiedChannelTable {
  const out: ChannelRecord[] = [];
  for (const t of tables) {
    for (const r of t.rows) out.push({ ...r, channel: t.channel });
  }
  return out;
}

// =========================
// summarize
// =========================
export function emptyTotals(): ChannelTotals {
  return { impressions: 0, clicks: 0, spend: 0, attributedRevenue: 0, rows: 0 };
}

function addInto(acc: ChannelTotals, r: ChannelRecord) {
  acc.impressions += r.impressions;
  acc.clicks += r.clicks;
  acc.spend += r.spend;
  acc.attributedRevenue += r.attributedRevenue;
  acc.rows += 1;
}

export function summarize(rows: UnifiedChannelTable): ChannelTotals {
  const acc = emptyTotals();
  for (const r of rows) addInto(acc, r);
  return acc;
}

export function emptyBusinessTotals(): BusinessTotals {
  return { orders: 0, newOrders: 0, newCustomers: 0, totalRevenue: 0, grossProfit: 0, cogs: 0, days: 0 };
}

function addBusinessInto(acc: BusinessTotals, r: BusinessRecord) {
  acc.orders += r.orders;
  acc.newOrders += r.newOrders;
  acc.newCustomers += r.newCustomers;
  acc.totalRevenue += r.totalRevenue;
  acc.grossProfit += r.grossProfit;
  acc.cogs += r.cogs;
  acc.days += 1;
}

export function summarizeBusiness(rows: readonly BusinessRecord[]): BusinessTotals {
  const acc = emptyBusinessTotals();
  for (const r of rows) addBusinessInto(acc, r);
  return acc;
}

// =========================
// groupBy
// =========================
const keyOf: Record<GroupDimension, (r: ChannelRecord) => string> = {
  date: (r) => r.date,
  channel: (r) => r.channel,
  campaign: (r) => r.campaign,
  region: (r) => r.region,
  tactic: (r) => r.tactic,
};

/** 키 첫 등장 순서 유지. 각 행은 정확히 한 그룹에만 더해짐 */
export function groupBy(rows: UnifiedChannelTable, dimension: GroupDimension): Map<string, ChannelTotals> {
  const key = keyOf[dimension];
  const map = new Map<string, ChannelTotals>();

  for (const r of rows) {
    const k = key(r);
    let cur = map.get(k);
    if (!cur) {
      cur = emptyTotals();
      map.set(k, cur);
    }
    addInto(cur, r);
  }

  return map;
}

export type ChannelCampaignTotals = ChannelTotals & {
  channel: ChannelName;
  campaign: string;
};

// 캠페인 표는 채널+캠페인 단위 (같은 이름이 채널별로 있을 수 있음)
export function groupByChannelCampaign(rows: UnifiedChannelTable): ChannelCampaignTotals[] {
  const map = new Map<string, ChannelCampaignTotals>();

  for (const r of rows) {
    const k = `${r.channel}\u0000${r.campaign}`;
    let cur = map.get(k);
    if (!cur) {
      cur = { channel: r.channel, campaign: r.campaign, ...emptyTotals() };
      map.set(k, cur);
    }
    addInto(cur, r);
  }

  return Array.from(map.values()).sort((a, b) => b.spend - a.spend);
}

export function groupBusinessByDate(rows: readonly BusinessRecord[]): Map<DateKey, BusinessTotals> {
  const map = new Map<DateKey, BusinessTotals>();
  for (const r of rows) {
    let cur = map.get(r.date);
    if (!cur) {
      cur = emptyBusinessTotals();
      map.set(r.date, cur);
    }
    addBusinessInto(cur, r);
  }
  return map;
}

// =========================
// join
// =========================

/**
 * 채널 쪽 날짜 기준 left join
 * - 비즈니스 데이터가 없는 날은 비즈니스 필드 0 (데이터 지연 가능)
 */
export function joinWithBusiness(
  channelByDate: ReadonlyMap<DateKey, ChannelTotals>,
  businessByDate: ReadonlyMap<DateKey, BusinessTotals>
): DailyCombined[] {
  const out: DailyCombined[] = [];

  for (const [date, ch] of channelByDate) {
    const b = businessByDate.get(date) ?? emptyBusinessTotals();
    out.push({
      date,
      impressions: ch.impressions,
      clicks: ch.clicks,
      spend: ch.spend,
      attributedRevenue: ch.attributedRevenue,
      rows: ch.rows,
      orders: b.orders,
      newOrders: b.newOrders,
      newCustomers: b.newCustomers,
      totalRevenue: b.totalRevenue,
      grossProfit: b.grossProfit,
      cogs: b.cogs,
    });
  }

  return out.sort((a, b) => a.date.localeCompare(b.date));
}

// =========================
// filters / options
// =========================
export function filterRows(rows: UnifiedChannelTable, filters: ReportFilters): ChannelRecord[] {
  const { start, end, channel, campaign } = filters;

  return rows.filter((r) => {
    if (start && r.date < start) return false;
    if (end && r.date > end) return false;
    if (channel !== "all" && r.channel !== channel) return false;
    if (campaign !== "all" && r.campaign !== campaign) return false;
    return true;
  });
}

export type ReportOptions = {
  channelOptions: ChannelName[];
  campaignOptions: string[];
  minDate: DateKey | null;
  maxDate: DateKey | null;
};

/** 캠페인 목록은 선택된 채널 안에서만 */
export function buildOptions(
  rows: UnifiedChannelTable,
  business: readonly BusinessRecord[],
  selectedChannel: ReportFilters["channel"]
): ReportOptions {
  const channelSet = new Set<ChannelName>();
  const campaignSet = new Set<string>();

  for (const r of rows) {
    channelSet.add(r.channel);
    if (selectedChannel === "all" || r.channel === selectedChannel) campaignSet.add(r.campaign);
  }

  const range = minMaxDate([...rows.map((r) => r.date), ...business.map((b) => b.date)]);

  return {
    channelOptions: CHANNELS.filter((c) => channelSet.has(c)),
    campaignOptions: Array.from(campaignSet).sort((a, b) => a.localeCompare(b)),
    minDate: range?.min ?? null,
    maxDate: range?.max ?? null,
  };
}
