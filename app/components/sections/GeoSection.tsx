"use client";

import { Bar, BarChart, CartesianGrid, ResponsiveContainer, Tooltip, XAxis, YAxis } from "recharts";

import type { MetricSet } from "../../../src/lib/report/types";
import { USD, formatMetric, formatMultiple } from "../../../src/lib/report/format";
import { rankMetricSets } from "../../../src/lib/report/metrics";

type Props = {
  byRegion: MetricSet[];
  topRegions: MetricSet[];
};

export default function GeoSection({ byRegion, topRegions }: Props) {
  const byRevenue = rankMetricSets(byRegion, "revenue", 10).map((s) => ({ state: s.key, revenue: s.revenue }));

  return (
    <section className="mt-12">
      <h2 className="text-xl font-semibold mb-4">Geographic Performance</h2>

      {byRegion.length === 0 ? (
        <div className="border rounded-xl p-6 text-sm text-gray-500">No state data in this range.</div>
      ) : (
        <div className="grid grid-cols-1 lg:grid-cols-3 gap-6">
          <div className="lg:col-span-2 h-[360px] border rounded-xl p-4">
            <div className="text-sm font-semibold mb-2">Top States by Attributed Revenue</div>
            <ResponsiveContainer width="100%" height="90%">
              <BarChart data={byRevenue} layout="vertical" margin={{ left: 20 }}>
                <CartesianGrid strokeDasharray="3 3" />
                <XAxis type="number" tickFormatter={(v: number) => USD(v)} tick={{ fontSize: 10 }} />
                <YAxis type="category" dataKey="state" width={80} tick={{ fontSize: 11 }} />
                <Tooltip formatter={(value) => [USD(Number(value)), "Revenue"]} />
                <Bar dataKey="revenue" fill="#f97316" />
              </BarChart>
            </ResponsiveContainer>
          </div>

          <div className="border rounded-xl p-4">
            <div className="text-sm font-semibold mb-3">Highest ROAS States</div>
            <ol className="space-y-2 text-sm">
              {topRegions.map((s, i) => (
                <li key={s.key} className="flex items-center justify-between">
                  <span>
                    {i + 1}. {s.key}
                  </span>
                  <span className="font-semibold">{formatMetric(s.roas, formatMultiple)}</span>
                </li>
              ))}
            </ol>
          </div>
        </div>
      )}
    </section>
  );
}
