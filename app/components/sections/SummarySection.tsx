"use client";

import type { ReportModel } from "../../../src/lib/report/buildReport";
import { USD, formatMetric, formatPct } from "../../../src/lib/report/format";

import SummaryChart from "./summary/SummaryChart";
import SummaryInsight from "./summary/SummaryInsight";
import SummaryKPI from "./summary/SummaryKPI";
import TrendCell from "../ui/TrendCell";

type Props = {
  report: ReportModel;
};

// 전반 → 후반 평균 일매출 변화 (trend 인사이트 값 재사용)
function trendChange(report: ReportModel): number | null {
  const trend = report.insights.find((i) => i.category === "trend");
  return trend?.value == null ? null : trend.value / 100;
}

export default function SummarySection({ report }: Props) {
  const { kpis, daily, rolling, weekendSplit } = report;

  return (
    <section className="mt-8">
      <h2 className="text-xl font-semibold mb-4">Executive Summary</h2>

      <SummaryKPI kpis={kpis} />

      <div className="grid grid-cols-1 lg:grid-cols-3 gap-6">
        <div className="lg:col-span-2">
          <div className="flex items-center justify-between mb-2">
            <h3 className="text-base font-semibold">Revenue vs Spend</h3>
            <div className="text-sm text-gray-600">
              Revenue trend <TrendCell v={trendChange(report)} />
            </div>
          </div>
          <SummaryChart daily={daily} rolling={rolling} />
          <div className="mt-2 text-xs text-gray-500">
            Weekend avg revenue {formatMetric(weekendSplit.weekendAvgRevenue, USD)}
            {" · "}
            Weekday avg revenue {formatMetric(weekendSplit.weekdayAvgRevenue, USD)}
            {" · "}
            Overall CTR {formatMetric(report.overall.ctr, (n) => formatPct(n))}
          </div>
        </div>

        <SummaryInsight title="Key Insights" insights={report.insights} />
      </div>
    </section>
  );
}
