"use client";

import {
  Bar,
  BarChart,
  CartesianGrid,
  Legend,
  Line,
  LineChart,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";

import type { KeyCorrelations, WeekdayPerformance, WeeklyPoint } from "../../../src/lib/report/analysis";
import { USD, formatMetric, formatMultiple } from "../../../src/lib/report/format";

type Props = {
  weekdays: WeekdayPerformance[];
  weekly: WeeklyPoint[];
  correlations: KeyCorrelations;
};

const CORRELATION_LABELS: Record<keyof KeyCorrelations, string> = {
  spendVsRevenue: "Spend vs revenue",
  spendVsOrders: "Spend vs orders",
  impressionsVsRevenue: "Impressions vs revenue",
  attributedVsActualRevenue: "Attributed vs actual revenue",
};

const CORRELATION_KEYS: (keyof KeyCorrelations)[] = [
  "spendVsRevenue",
  "spendVsOrders",
  "impressionsVsRevenue",
  "attributedVsActualRevenue",
];

export default function TimeSection({ weekdays, weekly, correlations }: Props) {
  const weekdayData = weekdays.map((w) => ({
    day: w.weekday.slice(0, 3),
    revenue: w.avgRevenue.defined ? w.avgRevenue.value : 0,
    spend: w.avgSpend.defined ? w.avgSpend.value : 0,
  }));

  const weeklyData = weekly.map((w) => ({
    week: w.weekStart.slice(5),
    revenue: w.totalRevenue,
    spend: w.spend,
  }));

  return (
    <section className="mt-12">
      <h2 className="text-xl font-semibold mb-4">Time Analysis</h2>

      <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
        <div className="h-[320px] border rounded-xl p-4">
          <div className="text-sm font-semibold mb-2">Average Daily Revenue by Day of Week</div>
          <ResponsiveContainer width="100%" height="90%">
            <BarChart data={weekdayData}>
              <CartesianGrid strokeDasharray="3 3" />
              <XAxis dataKey="day" />
              <YAxis tickFormatter={(v: number) => USD(v)} tick={{ fontSize: 10 }} width={70} />
              <Tooltip formatter={(value, name) => [USD(Number(value)), String(name)]} />
              <Legend />
              <Bar dataKey="revenue" name="Revenue" fill="#38BDF8" />
              <Bar dataKey="spend" name="Spend" fill="#F59E0B" />
            </BarChart>
          </ResponsiveContainer>
        </div>

        <div className="h-[320px] border rounded-xl p-4">
          <div className="text-sm font-semibold mb-2">Weekly Revenue and Spend</div>
          {weeklyData.length === 0 ? (
            <div className="text-sm text-gray-500">No weekly data in this range.</div>
          ) : (
            <ResponsiveContainer width="100%" height="90%">
              <LineChart data={weeklyData}>
                <CartesianGrid strokeDasharray="3 3" />
                <XAxis dataKey="week" />
                <YAxis tickFormatter={(v: number) => USD(v)} tick={{ fontSize: 10 }} width={70} />
                <Tooltip formatter={(value, name) => [USD(Number(value)), String(name)]} />
                <Legend />
                <Line type="monotone" dataKey="revenue" name="Revenue" stroke="#0369A1" strokeWidth={2} />
                <Line type="monotone" dataKey="spend" name="Spend" stroke="#EF4444" strokeWidth={2} />
              </LineChart>
            </ResponsiveContainer>
          )}
        </div>
      </div>

      <div className="mt-6 grid grid-cols-1 lg:grid-cols-2 gap-6">
        <div className="overflow-auto border rounded-xl">
          <table className="w-full text-sm">
            <thead className="bg-gray-50 text-gray-600">
              <tr>
                <th className="text-left p-3">Week of</th>
                <th className="text-right p-3">Revenue</th>
                <th className="text-right p-3">Spend</th>
                <th className="text-right p-3">Efficiency</th>
              </tr>
            </thead>
            <tbody>
              {weekly.map((w) => (
                <tr key={w.weekStart} className="border-t">
                  <td className="p-3">{w.weekStart}</td>
                  <td className="p-3 text-right">{USD(w.totalRevenue)}</td>
                  <td className="p-3 text-right">{USD(w.spend)}</td>
                  <td className="p-3 text-right">{formatMetric(w.efficiency, formatMultiple)}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>

        <div className="border rounded-xl p-4">
          <div className="text-sm font-semibold mb-3">Daily Correlations</div>
          <dl className="grid grid-cols-2 gap-y-2 text-sm">
            {CORRELATION_KEYS.map((k) => {
              const v = correlations[k];
              return (
                <div key={k} className="contents">
                  <dt className="text-gray-500">{CORRELATION_LABELS[k]}</dt>
                  <dd className="text-right font-semibold">{v === null ? "-" : v.toFixed(2)}</dd>
                </div>
              );
            })}
          </dl>
        </div>
      </div>
    </section>
  );
}
