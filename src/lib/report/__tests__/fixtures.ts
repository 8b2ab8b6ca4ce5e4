import type { BusinessRecord, ChannelName, ChannelRecord } from "../types";

export const CHANNEL_HEADER = "date,tactic,state,campaign,impressions,clicks,spend,attributed_revenue";
export const BUSINESS_HEADER = "date,orders,new_orders,new_customers,total_revenue,gross_profit,cogs";

export function csv(header: string, lines: string[]): string {
  return [header, ...lines].join("\n") + "\n";
}

export function channelRow(overrides: Partial<ChannelRecord> & { channel: ChannelName }): ChannelRecord {
  return {
    date: "2024-01-01",
    tactic: "Prospecting",
    region: "CA",
    campaign: "Always On",
    impressions: 1000,
    clicks: 20,
    spend: 10,
    attributedRevenue: 30,
    ...overrides,
  };
}

export function businessRow(overrides: Partial<BusinessRecord> = {}): BusinessRecord {
  return {
    date: "2024-01-01",
    orders: 10,
    newOrders: 5,
    newCustomers: 4,
    totalRevenue: 1000,
    grossProfit: 600,
    cogs: 400,
    ...overrides,
  };
}

// 채널 3개, 하루치 (ROAS: Facebook 3.97 / Google 4.00 / TikTok 3.00)
export const SCENARIO_ROWS: ChannelRecord[] = [
  channelRow({ channel: "Facebook", spend: 60.5, attributedRevenue: 240, impressions: 5000, clicks: 100 }),
  channelRow({ channel: "Google", spend: 120, attributedRevenue: 480, impressions: 4000, clicks: 160 }),
  channelRow({ channel: "TikTok", spend: 80, attributedRevenue: 240, impressions: 8000, clicks: 120 }),
];
