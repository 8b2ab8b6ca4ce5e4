"use client";

import type { Funnel } from "../../../src/lib/report/analysis";
import { formatMetric, formatNumber, formatPct } from "../../../src/lib/report/format";

import DataBarCell from "../ui/DataBarCell";

type Props = {
  funnel: Funnel;
};

// 전환수는 귀속 매출 / AOV 로 추정한 값
export default function FunnelSection({ funnel }: Props) {
  const top = funnel.stages[0]?.count ?? 0;

  return (
    <section className="mt-12">
      <h2 className="text-xl font-semibold mb-4">Conversion Funnel</h2>

      <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
        <div className="border rounded-xl p-4 space-y-3">
          {funnel.stages.map((s) => (
            <div key={s.stage}>
              <div className="flex justify-between text-sm mb-1">
                <span className="font-semibold">{s.stage}</span>
                <span className="text-gray-500">{formatMetric(s.rate, (n) => formatPct(n))}</span>
              </div>
              <DataBarCell value={s.count} max={top} label={formatNumber(s.count)} />
            </div>
          ))}
          <div className="pt-2 text-xs text-gray-500">
            Impression to conversion rate {formatMetric(funnel.overallConversion, (n) => formatPct(n, 3))}
            {" · "}conversions estimated from attributed revenue and AOV
          </div>
        </div>

        <div className="overflow-auto border rounded-xl">
          <table className="w-full text-sm">
            <thead className="bg-gray-50 text-gray-600">
              <tr>
                <th className="text-left p-3">Channel</th>
                <th className="text-right p-3">Impr</th>
                <th className="text-right p-3">Clicks</th>
                <th className="text-right p-3">CTR</th>
                <th className="text-right p-3">Est. Conv</th>
                <th className="text-right p-3">CVR</th>
              </tr>
            </thead>
            <tbody>
              {funnel.byChannel.map((c) => (
                <tr key={c.channel} className="border-t">
                  <td className="p-3">{c.channel}</td>
                  <td className="p-3 text-right">{formatNumber(c.impressions)}</td>
                  <td className="p-3 text-right">{formatNumber(c.clicks)}</td>
                  <td className="p-3 text-right">{formatMetric(c.ctr, (n) => formatPct(n))}</td>
                  <td className="p-3 text-right">{formatNumber(c.estimatedConversions)}</td>
                  <td className="p-3 text-right">{formatMetric(c.cvr, (n) => formatPct(n))}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      </div>
    </section>
  );
}
