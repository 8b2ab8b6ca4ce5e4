// src/lib/report/types.ts

// ===== Channels =====
export const CHANNELS = ["Facebook", "Google", "TikTok"] as const;
export type ChannelName = (typeof CHANNELS)[number];

// ===== Filter keys =====
// "all" = 필터 미적용
export type ChannelKey = "all" | ChannelName;
export type CampaignKey = "all" | string;

// YYYY-MM-DD (zero-padded). 문자열 비교 = 날짜 비교
export type DateKey = string;

// ===== Rows =====

// 채널 CSV 한 줄 (channel은 merge 시점에 붙음)
export type ChannelRow = {
  date: DateKey;
  tactic: string;
  region: string; // CSV의 state 컬럼
  campaign: string;
  impressions: number;
  clicks: number;
  spend: number;
  attributedRevenue: number;
};

export type ChannelRecord = Readonly<ChannelRow & { channel: ChannelName }>;

export type UnifiedChannelTable = readonly ChannelRecord[];

export type ChannelTable = {
  channel: ChannelName;
  rows: readonly ChannelRow[];
};

export type BusinessRecord = Readonly<{
  date: DateKey;
  orders: number;
  newOrders: number;
  newCustomers: number;
  totalRevenue: number;
  grossProfit: number;
  cogs: number;
}>;

// ===== Summaries =====
export type ChannelTotals = {
  impressions: number;
  clicks: number;
  spend: number;
  attributedRevenue: number;
  rows: number;
};

export type BusinessTotals = {
  orders: number;
  newOrders: number;
  newCustomers: number;
  totalRevenue: number;
  grossProfit: number;
  cogs: number;
  days: number;
};

export type GroupDimension = "date" | "channel" | "campaign" | "region" | "tactic";

export type DailyCombined = ChannelTotals &
  Omit<BusinessTotals, "days"> & {
    date: DateKey;
  };

// ===== Metrics =====

/** defined === false 이면 분모가 0이었다는 뜻 (value는 0) */
export type MetricValue = {
  value: number;
  defined: boolean;
};

export type MetricSet = {
  key: string;
  impressions: number;
  clicks: number;
  spend: number;
  revenue: number;
  roas: MetricValue;
  cpa: MetricValue;
  ctr: MetricValue;
  cpc: MetricValue;
  efficiency: MetricValue;
};

export type ReportFilters = {
  start: DateKey | null;
  end: DateKey | null;
  channel: ChannelKey;
  campaign: CampaignKey;
};

// ===== Insights =====
export type InsightCategory =
  | "performance"
  | "efficiency"
  | "trend"
  | "acquisition"
  | "customer"
  | "funnel"
  | "time"
  | "geography";

export type Insight = {
  category: InsightCategory;
  title: string;
  message: string;
  metric: string;
  value: number | null;
};
