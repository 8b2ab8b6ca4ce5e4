"use client";

import type { CampaignMetricSet } from "../../../../src/lib/report/buildReport";
import { USD, formatMetric, formatMultiple } from "../../../../src/lib/report/format";

type Props = {
  byRoas: CampaignMetricSet[];
  byRevenue: CampaignMetricSet[];
};

function RankList({ title, items, value }: { title: string; items: CampaignMetricSet[]; value: (c: CampaignMetricSet) => string }) {
  return (
    <div className="border rounded-xl p-4">
      <div className="text-sm font-semibold mb-2">{title}</div>
      {items.length === 0 ? (
        <div className="text-sm text-gray-500">No campaigns in this range.</div>
      ) : (
        <ol className="space-y-1 text-sm">
          {items.map((c, i) => (
            <li key={c.key} className="flex justify-between gap-3">
              <span className="truncate">
                {i + 1}. {c.campaign} <span className="text-gray-500">({c.channel})</span>
              </span>
              <span className="font-semibold whitespace-nowrap">{value(c)}</span>
            </li>
          ))}
        </ol>
      )}
    </div>
  );
}

// 상위 캠페인 (ROAS / 귀속 매출)
export default function TopCampaigns({ byRoas, byRevenue }: Props) {
  return (
    <div className="mt-6 grid grid-cols-1 lg:grid-cols-2 gap-6">
      <RankList title="Top Campaigns by ROAS" items={byRoas} value={(c) => formatMetric(c.roas, formatMultiple)} />
      <RankList title="Top Campaigns by Revenue" items={byRevenue} value={(c) => USD(c.revenue)} />
    </div>
  );
}
