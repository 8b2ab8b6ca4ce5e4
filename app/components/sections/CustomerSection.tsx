"use client";

import { CartesianGrid, Legend, Line, LineChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from "recharts";

import type { ReportModel } from "../../../src/lib/report/buildReport";
import type { CacPoint } from "../../../src/lib/report/analysis";
import { USD2, formatMetric, formatMultiple } from "../../../src/lib/report/format";

import KPI from "../ui/KPI";
import TrendCell from "../ui/TrendCell";
import SummaryInsight from "./summary/SummaryInsight";

type Props = {
  report: ReportModel;
};

export type CacChartPoint = {
  date: string; // MM-DD
  cac: number | null;
  rollingCac: number | null;
};

// CAC 정의 안 된 날은 선을 끊음
export function toCacChartPoints(points: readonly CacPoint[]): CacChartPoint[] {
  return points.map((p) => ({
    date: p.date.slice(5),
    cac: p.cac.defined ? p.cac.value : null,
    rollingCac: p.rollingCac,
  }));
}

const pctOrNull = (v: number | null) => (v === null ? null : v / 100);

export default function CustomerSection({ report }: Props) {
  const { kpis, acquisition } = report;
  const data = toCacChartPoints(report.cacTrend);

  return (
    <section className="mt-12">
      <h2 className="text-xl font-semibold mb-4">Customer Acquisition</h2>

      <div className="flex flex-wrap gap-4 mb-6">
        <KPI title="CAC" value={formatMetric(kpis.cac, USD2)} sub="spend / new customers" />
        <KPI title="Revenue per Customer" value={formatMetric(kpis.revenuePerCustomer, USD2)} />
        <KPI title="AOV" value={formatMetric(kpis.aov, USD2)} />
        <KPI title="Marketing Efficiency" value={formatMetric(kpis.efficiency, formatMultiple)} />
        <div className="border rounded-xl p-4 min-w-[160px]">
          <div className="text-sm text-gray-500 whitespace-nowrap">Last 7 days vs prior 7</div>
          {acquisition ? (
            <div className="mt-1 space-y-1 text-sm">
              <div>
                CAC {formatMetric(acquisition.recentCac, USD2)} <TrendCell v={pctOrNull(acquisition.cacChangePct)} />
              </div>
              <div>
                New customers {acquisition.recentNewCustomers}{" "}
                <TrendCell v={pctOrNull(acquisition.customerGrowthPct)} />
              </div>
            </div>
          ) : (
            <div className="mt-1 text-sm text-gray-500">Needs 14 days of data.</div>
          )}
        </div>
      </div>

      <div className="grid grid-cols-1 lg:grid-cols-3 gap-6">
        <div className="lg:col-span-2 h-[320px] border rounded-xl p-4">
          <div className="text-sm font-semibold mb-2">Daily CAC and 7-day Average</div>
          {data.length === 0 ? (
            <div className="text-sm text-gray-500">No daily data in this range.</div>
          ) : (
            <ResponsiveContainer width="100%" height="90%">
              <LineChart data={data}>
                <CartesianGrid strokeDasharray="3 3" />
                <XAxis dataKey="date" />
                <YAxis tickFormatter={(v: number) => USD2(v)} tick={{ fontSize: 10 }} width={70} />
                <Tooltip formatter={(value, name) => [USD2(Number(value)), String(name)]} />
                <Legend />
                <Line type="monotone" dataKey="cac" name="CAC" stroke="#A78BFA" dot={false} connectNulls={false} />
                <Line type="monotone" dataKey="rollingCac" name="7-day avg" stroke="#6D28D9" strokeWidth={2} dot={false} />
              </LineChart>
            </ResponsiveContainer>
          )}
        </div>

        <SummaryInsight title="Customer Insights" insights={report.customerInsights} />
      </div>
    </section>
  );
}
