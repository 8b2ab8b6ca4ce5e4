import { describe, it, expect } from "vitest";

import {
  buildOptions,
  filterRows,
  groupBusinessByDate,
  groupBy,
  groupByChannelCampaign,
  joinWithBusiness,
  merge,
  summarize,
  summarizeBusiness,
} from "../aggregate";
import type { ChannelRecord, ChannelRow } from "../types";
import { businessRow, channelRow } from "./fixtures";

const rows: ChannelRecord[] = [
  channelRow({ channel: "Google", date: "2024-01-02", campaign: "Search", region: "NY", spend: 20, attributedRevenue: 50 }),
  channelRow({ channel: "Facebook", date: "2024-01-01", campaign: "Retarget", region: "CA", spend: 10, attributedRevenue: 40 }),
  channelRow({ channel: "Google", date: "2024-01-01", campaign: "Shopping", region: "CA", spend: 30, attributedRevenue: 60 }),
  channelRow({ channel: "TikTok", date: "2024-01-03", campaign: "Spark", region: "TX", spend: 5, attributedRevenue: 5 }),
];

describe("merge", () => {
  it("tags rows with their channel in source order", () => {
    const base: ChannelRow = {
      date: "2024-01-01",
      tactic: "Search",
      region: "CA",
      campaign: "Brand",
      impressions: 1,
      clicks: 1,
      spend: 1,
      attributedRevenue: 1,
    };
    const merged = merge([
      { channel: "TikTok", rows: [base] },
      { channel: "Facebook", rows: [base, base] },
    ]);
    expect(merged.map((r) => r.channel)).toEqual(["TikTok", "Facebook", "Facebook"]);
  });
});

describe("groupBy", () => {
  it("keeps first-seen key order", () => {
    expect(Array.from(groupBy(rows, "channel").keys())).toEqual(["Google", "Facebook", "TikTok"]);
    expect(Array.from(groupBy(rows, "region").keys())).toEqual(["NY", "CA", "TX"]);
  });

  it("sums per group to the overall total for every dimension", () => {
    const overall = summarize(rows);
    for (const dim of ["date", "channel", "campaign", "region", "tactic"] as const) {
      let spend = 0;
      let revenue = 0;
      let count = 0;
      for (const t of groupBy(rows, dim).values()) {
        spend += t.spend;
        revenue += t.attributedRevenue;
        count += t.rows;
      }
      expect(spend).toBe(overall.spend);
      expect(revenue).toBe(overall.attributedRevenue);
      expect(count).toBe(rows.length);
    }
  });
});

describe("groupByChannelCampaign", () => {
  it("splits same-named campaigns by channel and sorts by spend", () => {
    const data = [
      ...rows,
      channelRow({ channel: "Facebook", campaign: "Search", spend: 1, attributedRevenue: 1 }),
    ];
    const out = groupByChannelCampaign(data);

    expect(out.map((t) => `${t.channel}/${t.campaign}`)).toEqual([
      "Google/Shopping",
      "Google/Search",
      "Facebook/Retarget",
      "TikTok/Spark",
      "Facebook/Search",
    ]);
  });
});

describe("joinWithBusiness", () => {
  it("left-joins on the channel dates and zero-fills missing business days", () => {
    const daily = joinWithBusiness(
      groupBy(rows, "date"),
      groupBusinessByDate([businessRow({ date: "2024-01-01", orders: 7 }), businessRow({ date: "2024-01-09" })])
    );

    expect(daily.map((d) => d.date)).toEqual(["2024-01-01", "2024-01-02", "2024-01-03"]);
    expect(daily[0].spend).toBe(40);
    expect(daily[0].orders).toBe(7);
    expect(daily[1].orders).toBe(0);
    expect(daily[1].totalRevenue).toBe(0);
  });
});

describe("summarizeBusiness", () => {
  it("counts days alongside the sums", () => {
    const t = summarizeBusiness([businessRow(), businessRow({ date: "2024-01-02", orders: 5 })]);
    expect(t.orders).toBe(15);
    expect(t.days).toBe(2);
  });
});

describe("filterRows", () => {
  it("applies date bounds, channel and campaign together", () => {
    const out = filterRows(rows, { start: "2024-01-01", end: "2024-01-02", channel: "Google", campaign: "all" });
    expect(out.map((r) => r.campaign)).toEqual(["Search", "Shopping"]);

    const one = filterRows(rows, { start: null, end: null, channel: "all", campaign: "Spark" });
    expect(one.map((r) => r.channel)).toEqual(["TikTok"]);
  });
});

describe("buildOptions", () => {
  it("lists channels in fixed order and campaigns within the selected channel", () => {
    const opts = buildOptions(rows, [businessRow({ date: "2023-12-31" })], "Google");

    expect(opts.channelOptions).toEqual(["Facebook", "Google", "TikTok"]);
    expect(opts.campaignOptions).toEqual(["Search", "Shopping"]);
    expect(opts.minDate).toBe("2023-12-31");
    expect(opts.maxDate).toBe("2024-01-03");
  });

  it("returns null bounds for no data", () => {
    const opts = buildOptions([], [], "all");
    expect(opts).toEqual({ channelOptions: [], campaignOptions: [], minDate: null, maxDate: null });
  });
});
