"use client";

import type { DailyCombined } from "../../../../src/lib/report/types";
import type { RollingPoint } from "../../../../src/lib/report/analysis";
import { USD } from "../../../../src/lib/report/format";
import {
  ResponsiveContainer,
  ComposedChart,
  CartesianGrid,
  XAxis,
  YAxis,
  Tooltip,
  Legend,
  Bar,
  Line,
} from "recharts";

type Props = {
  daily: DailyCombined[];
  rolling: RollingPoint[];
};

type ChartPoint = {
  label: string;
  revenue: number;
  spend: number;
  revenueAvg: number | null;
  spendAvg: number | null;
};

const SERIES_NAMES: Record<string, string> = {
  revenue: "Revenue",
  spend: "Spend",
  revenueAvg: "Revenue (7d avg)",
  spendAvg: "Spend (7d avg)",
};

export function toChartPoints(daily: readonly DailyCombined[], rolling: readonly RollingPoint[]): ChartPoint[] {
  const byDate = new Map(rolling.map((r) => [r.date, r]));
  return daily.map((d) => {
    const r = byDate.get(d.date);
    return {
      label: d.date.slice(5),
      revenue: d.totalRevenue,
      spend: d.spend,
      revenueAvg: r?.revenueAvg ?? null,
      spendAvg: r?.spendAvg ?? null,
    };
  });
}

export default function SummaryChart({ daily, rolling }: Props) {
  const data = toChartPoints(daily, rolling);

  if (!data.length) {
    return <div className="border rounded-xl p-6 text-sm text-gray-500">No daily data in this range.</div>;
  }

  return (
    <div className="w-full h-[420px] border rounded-xl p-4">
      <ResponsiveContainer width="100%" height="100%">
        <ComposedChart data={data} margin={{ top: 10, right: 30, left: 10, bottom: 0 }}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis dataKey="label" tick={{ fontSize: 10 }} />
          <YAxis tick={{ fontSize: 10 }} width={80} tickFormatter={(v: number) => USD(v)} />

          <Tooltip
            formatter={(value, name) => [USD(Number(value)), SERIES_NAMES[String(name)] ?? String(name)]}
          />
          <Legend formatter={(value: string) => SERIES_NAMES[value] ?? value} />

          <Bar dataKey="spend" fill="#F59E0B" />
          <Bar dataKey="revenue" fill="#38BDF8" />

          <Line type="monotone" dataKey="revenueAvg" stroke="#0369A1" strokeWidth={3} dot={false} connectNulls={false} />
          <Line type="monotone" dataKey="spendAvg" stroke="#EF4444" strokeWidth={2} dot={false} connectNulls={false} />
        </ComposedChart>
      </ResponsiveContainer>
    </div>
  );
}
