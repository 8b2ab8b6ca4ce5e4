"use client";

import type { CampaignMetricSet } from "../../../../src/lib/report/buildReport";
import { USD, USD2, formatMetric, formatMultiple, formatNumber, formatPct } from "../../../../src/lib/report/format";

import DataBarCell from "../../ui/DataBarCell";

type Props = {
  campaigns: CampaignMetricSet[];
  limit?: number;
};

// 채널×캠페인 표 (spend 내림차순으로 들어옴)
export default function SummaryTable({ campaigns, limit = 20 }: Props) {
  const rows = campaigns.slice(0, limit);

  const maxSpend = Math.max(0, ...rows.map((r) => r.spend));
  const maxRev = Math.max(0, ...rows.map((r) => r.revenue));

  return (
    <section className="mt-10">
      <h2 className="text-lg font-semibold mb-3">Campaign Performance</h2>

      <div className="overflow-auto border rounded-xl">
        <table className="w-full text-sm">
          <thead className="bg-gray-50 text-gray-600">
            <tr>
              <th className="text-left p-3">Channel</th>
              <th className="text-left p-3">Campaign</th>
              <th className="text-right p-3">Impr</th>
              <th className="text-right p-3">Clicks</th>
              <th className="text-right p-3">CTR</th>
              <th className="text-right p-3">CPC</th>
              <th className="text-left p-3 w-[180px]">Spend</th>
              <th className="text-left p-3 w-[180px]">Revenue</th>
              <th className="text-right p-3">ROAS</th>
            </tr>
          </thead>

          <tbody>
            {rows.length === 0 && (
              <tr>
                <td className="p-3 text-gray-500" colSpan={9}>
                  No campaigns in this range.
                </td>
              </tr>
            )}

            {rows.map((r) => (
              <tr key={r.key} className="border-t">
                <td className="p-3">{r.channel}</td>
                <td className="p-3">{r.campaign}</td>
                <td className="p-3 text-right">{formatNumber(r.impressions)}</td>
                <td className="p-3 text-right">{formatNumber(r.clicks)}</td>
                <td className="p-3 text-right">{formatMetric(r.ctr, (n) => formatPct(n))}</td>
                <td className="p-3 text-right">{formatMetric(r.cpc, USD2)}</td>
                <td className="p-3">
                  <DataBarCell value={r.spend} max={maxSpend} label={USD(r.spend)} />
                </td>
                <td className="p-3">
                  <DataBarCell value={r.revenue} max={maxRev} label={USD(r.revenue)} />
                </td>
                <td className="p-3 text-right font-semibold">{formatMetric(r.roas, formatMultiple)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>

      {campaigns.length > rows.length && (
        <div className="mt-2 text-xs text-gray-500">
          Showing top {rows.length} of {campaigns.length} campaigns by spend.
        </div>
      )}
    </section>
  );
}
