import { describe, it, expect } from "vitest";

import { buildReport } from "../buildReport";
import { load } from "../loader";
import type { LoadSources } from "../loader";
import type { ReportFilters } from "../types";
import { BUSINESS_HEADER, CHANNEL_HEADER, csv } from "./fixtures";

const sources: LoadSources = {
  channels: [
    {
      channel: "Facebook",
      name: "Facebook.csv",
      text: csv(CHANNEL_HEADER, [
        "2024-01-01,Prospecting,CA,Spring Sale,5000,100,60.50,240.00",
        "2024-01-02,Prospecting,NY,Spring Sale,4000,80,40.00,100.00",
      ]),
    },
    {
      channel: "Google",
      name: "Google.csv",
      text: csv(CHANNEL_HEADER, [
        "2024-01-01,Search,CA,Brand,4000,160,120.00,480.00",
        "2024-01-02,Search,TX,Brand,3000,90,N/A,300.00",
      ]),
    },
    {
      channel: "TikTok",
      name: "TikTok.csv",
      text: csv(CHANNEL_HEADER, ["2024-01-01,Spark,CA,Creators,8000,120,80.00,240.00"]),
    },
  ],
  business: {
    name: "Business.csv",
    text: csv(BUSINESS_HEADER, ["2024-01-01,12,8,10,960.00,500.00,460.00", "2024-01-02,6,3,4,400.00,200.00,200.00"]),
  },
};

const data = load(sources);
const all: ReportFilters = { start: null, end: null, channel: "all", campaign: "all" };

describe("buildReport", () => {
  it("renders the valid rows and keeps the parse error aside", () => {
    expect(data.errors).toHaveLength(1);
    expect(data.channels).toHaveLength(4);

    const report = buildReport(data, all);
    expect(report.totals.spend).toBe(300.5);
    expect(report.period).toBe("2024.01.01 ~ 2024.01.02");
    expect(report.topPerformer?.key).toBe("Google");
    expect(report.byChannel.map((s) => s.key)).toEqual(["Facebook", "Google", "TikTok"]);
  });

  it("ranks campaigns by ROAS and by attributed revenue", () => {
    const report = buildReport(data, all);
    const names = ["Google / Brand", "Facebook / Spring Sale", "TikTok / Creators"];

    expect(report.topCampaignsByRoas.map((c) => c.key)).toEqual(names);
    expect(report.topCampaignsByRevenue.map((c) => c.key)).toEqual(names);
  });

  it("adds customer acquisition cards", () => {
    const report = buildReport(data, all);

    expect(report.kpis.revenuePerCustomer.value).toBeCloseTo(1360 / 14, 10);
    expect(report.cacTrend.map((p) => p.date)).toEqual(["2024-01-01", "2024-01-02"]);
    expect(report.acquisition).toBeNull();
    expect(report.channelEfficiency.laggard?.key).toBe("TikTok");
    expect(report.customerInsights.map((i) => i.title)).toEqual([
      "Efficiency Rating: Moderate",
      "Acquisition Rating: Excellent",
      "Week-over-Week CAC",
      "Google is the Most Efficient Channel",
      "Improvement Opportunity in TikTok",
    ]);
  });

  it("scopes a single day to the three-channel figures", () => {
    const report = buildReport(data, { ...all, start: "2024-01-01", end: "2024-01-01" });

    expect(report.totals.spend).toBe(260.5);
    expect(report.businessTotals.totalRevenue).toBe(960);
    expect(report.overall.efficiency.value).toBeCloseTo(3.685, 3);
    expect(report.insights[0].title).toBe("Google is the Top Performing Channel");
    expect(report.insights[1].message).toBe("$3.69 revenue per $1 spent");
  });

  it("applies channel and campaign filters to channel rows only", () => {
    const report = buildReport(data, { ...all, channel: "Facebook", campaign: "Spring Sale" });

    expect(report.rows.every((r) => r.channel === "Facebook")).toBe(true);
    expect(report.totals.spend).toBe(100.5);
    expect(report.businessTotals.days).toBe(2);
    expect(report.byCampaign.map((c) => c.key)).toEqual(["Facebook / Spring Sale"]);
  });

  it("returns empty sections and insufficient-data insights for an empty range", () => {
    const report = buildReport(data, { ...all, start: "2030-01-01", end: "2030-01-31" });

    expect(report.rows).toEqual([]);
    expect(report.daily).toEqual([]);
    expect(report.rolling).toEqual([]);
    expect(report.weekly).toEqual([]);
    expect(report.topPerformer).toBeNull();
    expect(report.correlations.spendVsRevenue).toBeNull();
    expect(report.insights.every((i) => i.message.startsWith("Insufficient data to"))).toBe(true);
    expect(report.period).toBe("2030.01.01 ~ 2030.01.31");
  });
});
