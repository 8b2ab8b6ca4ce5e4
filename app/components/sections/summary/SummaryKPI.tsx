"use client";

import type { BusinessKpis } from "../../../../src/lib/report/metrics";
import { USD, USD2, formatMetric, formatMultiple, formatNumber, formatPct } from "../../../../src/lib/report/format";

import KPI from "../../ui/KPI";

type Props = {
  kpis: BusinessKpis;
};

export default function SummaryKPI({ kpis }: Props) {
  return (
    <div className="grid grid-cols-1 sm:grid-cols-2 lg:grid-cols-4 gap-4 mb-8">
      <KPI
        title="Total Revenue"
        value={USD(kpis.totalRevenue)}
        sub={`${formatMetric(kpis.avgDailyRevenue, USD)} / day`}
      />
      <KPI title="Marketing Spend" value={USD(kpis.totalSpend)} sub={`${formatMetric(kpis.avgDailySpend, USD)} / day`} />
      <KPI title="Attributed Revenue" value={USD(kpis.totalAttributedRevenue)} />
      <KPI title="ROAS" value={formatMetric(kpis.overallRoas, formatMultiple)} sub="attributed revenue / spend" />

      <KPI title="Marketing Efficiency" value={formatMetric(kpis.efficiency, formatMultiple)} sub="total revenue / spend" />
      <KPI
        title="Orders"
        value={formatNumber(kpis.totalOrders)}
        sub={`${formatMetric(kpis.avgDailyOrders, (n) => n.toFixed(1))} / day`}
      />
      <KPI title="New Customers" value={formatNumber(kpis.totalNewCustomers)} sub={`CAC ${formatMetric(kpis.cac, USD2)}`} />
      <KPI
        title="AOV"
        value={formatMetric(kpis.aov, USD2)}
        sub={`Gross margin ${formatMetric(kpis.grossMargin, (n) => formatPct(n, 1))}`}
      />
    </div>
  );
}
