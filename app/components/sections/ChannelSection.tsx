"use client";

import { Bar, BarChart, CartesianGrid, Cell, Legend, Pie, PieChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from "recharts";

import type { ChannelCard } from "../../../src/lib/report/buildReport";
import type { ChannelName, MetricSet } from "../../../src/lib/report/types";
import { USD, USD2, formatMetric, formatMultiple, formatPct } from "../../../src/lib/report/format";

type Props = {
  byChannel: MetricSet[];
  cards: ChannelCard[];
  topPerformer: MetricSet | null;
};

export const CHANNEL_COLORS: Record<ChannelName, string> = {
  Facebook: "#1877F2",
  Google: "#F59E0B",
  TikTok: "#111827",
};

const colorOf = (key: string) =>
  key === "Facebook" || key === "Google" || key === "TikTok" ? CHANNEL_COLORS[key] : "#9CA3AF";

export default function ChannelSection({ byChannel, cards, topPerformer }: Props) {
  const roasData = byChannel.map((s) => ({ channel: s.key, roas: s.roas.defined ? s.roas.value : 0 }));
  const spendData = byChannel.filter((s) => s.spend > 0).map((s) => ({ channel: s.key, spend: s.spend }));
  const totalSpend = spendData.reduce((n, s) => n + s.spend, 0);

  return (
    <section className="mt-12">
      <h2 className="text-xl font-semibold mb-4">Channel Performance</h2>

      {byChannel.length === 0 ? (
        <div className="border rounded-xl p-6 text-sm text-gray-500">No channel data in this range.</div>
      ) : (
        <>
          <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
            <div className="h-[320px] border rounded-xl p-4">
              <div className="text-sm font-semibold mb-2">ROAS by Channel</div>
              <ResponsiveContainer width="100%" height="90%">
                <BarChart data={roasData}>
                  <CartesianGrid strokeDasharray="3 3" />
                  <XAxis dataKey="channel" />
                  <YAxis tickFormatter={(v: number) => `${v}x`} />
                  <Tooltip formatter={(value) => [formatMultiple(Number(value)), "ROAS"]} />
                  <Bar dataKey="roas">
                    {roasData.map((d) => (
                      <Cell key={d.channel} fill={colorOf(d.channel)} />
                    ))}
                  </Bar>
                </BarChart>
              </ResponsiveContainer>
            </div>

            <div className="h-[320px] border rounded-xl p-4">
              <div className="text-sm font-semibold mb-2">Spend Distribution</div>
              <ResponsiveContainer width="100%" height="90%">
                <PieChart>
                  <Pie data={spendData} dataKey="spend" nameKey="channel" outerRadius={100} label={false}>
                    {spendData.map((d) => (
                      <Cell key={d.channel} fill={colorOf(d.channel)} />
                    ))}
                  </Pie>
                  <Tooltip
                    formatter={(value, name) => [
                      `${USD(Number(value))} (${totalSpend > 0 ? formatPct(Number(value) / totalSpend, 1) : "-"})`,
                      String(name),
                    ]}
                  />
                  <Legend />
                </PieChart>
              </ResponsiveContainer>
            </div>
          </div>

          <div className="mt-6 grid grid-cols-1 md:grid-cols-3 gap-4">
            {cards.map((c) => {
              const set = byChannel.find((s) => s.key === c.channel);
              const isTop = topPerformer?.key === c.channel;
              return (
                <div
                  key={c.channel}
                  className={["border rounded-xl p-4", isTop ? "border-orange-500 shadow" : ""].join(" ")}
                >
                  <div className="flex items-center justify-between">
                    <div className="font-semibold" style={{ color: colorOf(c.channel) }}>
                      {c.channel}
                    </div>
                    {isTop && <span className="text-[11px] font-semibold text-orange-700">TOP ROAS</span>}
                  </div>
                  <dl className="mt-3 grid grid-cols-2 gap-y-1 text-sm">
                    <dt className="text-gray-500">Spend</dt>
                    <dd className="text-right">{USD(c.spend)}</dd>
                    <dt className="text-gray-500">Revenue</dt>
                    <dd className="text-right">{USD(c.revenue)}</dd>
                    <dt className="text-gray-500">ROAS</dt>
                    <dd className="text-right font-semibold">{formatMetric(c.roas, formatMultiple)}</dd>
                    <dt className="text-gray-500">CTR</dt>
                    <dd className="text-right">{set ? formatMetric(set.ctr, (n) => formatPct(n)) : "-"}</dd>
                    <dt className="text-gray-500">CPC</dt>
                    <dd className="text-right">{set ? formatMetric(set.cpc, USD2) : "-"}</dd>
                    <dt className="text-gray-500">Campaigns</dt>
                    <dd className="text-right">{c.campaigns}</dd>
                  </dl>
                </div>
              );
            })}
          </div>
        </>
      )}
    </section>
  );
}
