"use client";

import type { Insight, InsightCategory } from "../../../../src/lib/report/types";

import InsightBox from "../../ui/InsightBox";

type Props = {
  title: string;
  insights: Insight[];
};

const BADGE: Record<InsightCategory, string> = {
  performance: "bg-orange-100 text-orange-800",
  efficiency: "bg-sky-100 text-sky-800",
  trend: "bg-emerald-100 text-emerald-800",
  acquisition: "bg-violet-100 text-violet-800",
  customer: "bg-teal-100 text-teal-800",
  funnel: "bg-amber-100 text-amber-800",
  time: "bg-gray-100 text-gray-800",
  geography: "bg-rose-100 text-rose-800",
};

export default function SummaryInsight({ title, insights }: Props) {
  return (
    <InsightBox title={title}>
      {insights.length > 0 ? (
        <ul className="space-y-3">
          {insights.map((it) => (
            <li key={`${it.category}-${it.title}`} className="flex items-start gap-3">
              <span className={`mt-0.5 rounded-md px-2 py-0.5 text-[11px] font-semibold uppercase ${BADGE[it.category]}`}>
                {it.category}
              </span>
              <div>
                <div className="font-semibold text-gray-900">{it.title}</div>
                <div className="text-gray-700">{it.message}</div>
              </div>
            </li>
          ))}
        </ul>
      ) : null}
    </InsightBox>
  );
}
