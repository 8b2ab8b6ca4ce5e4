"use client";

import { useCallback, useState } from "react";

import type { ReportFilters } from "../src/lib/report/types";
import { useMarketingData } from "../src/lib/report/useMarketingData";
import { useReportAggregates } from "../src/lib/report/useReportAggregates";

import HeaderBar from "./components/sections/HeaderBar";
import SummarySection from "./components/sections/SummarySection";
import ChannelSection from "./components/sections/ChannelSection";
import SummaryTable from "./components/sections/summary/SummaryTable";
import SummaryInsight from "./components/sections/summary/SummaryInsight";
import TopCampaigns from "./components/sections/summary/TopCampaigns";
import CustomerSection from "./components/sections/CustomerSection";
import GeoSection from "./components/sections/GeoSection";
import FunnelSection from "./components/sections/FunnelSection";
import TimeSection from "./components/sections/TimeSection";
import { ParseWarnings, SchemaErrorPanel } from "./components/sections/DataIssues";

const INITIAL_FILTERS: ReportFilters = { start: null, end: null, channel: "all", campaign: "all" };

export default function Page() {
  const { data, sourceId, isLoading, error, schema, reload } = useMarketingData();

  const [filters, setFilters] = useState<ReportFilters>(INITIAL_FILTERS);
  const patch = useCallback((p: Partial<ReportFilters>) => setFilters((f) => ({ ...f, ...p })), []);

  const resetCampaign = useCallback(() => patch({ campaign: "all" }), [patch]);

  const { options, report } = useReportAggregates({
    data,
    sourceId,
    filters,
    onInvalidCampaign: resetCampaign,
  });

  return (
    <main className="min-h-screen bg-white text-gray-900">
      <HeaderBar
        start={filters.start}
        end={filters.end}
        setStart={(start) => patch({ start })}
        setEnd={(end) => patch({ end })}
        selectedChannel={filters.channel}
        setSelectedChannel={(channel) => patch({ channel, campaign: "all" })}
        selectedCampaign={filters.campaign}
        setSelectedCampaign={(campaign) => patch({ campaign })}
        channelOptions={options.channelOptions}
        campaignOptions={options.campaignOptions}
        minDate={options.minDate}
        maxDate={options.maxDate}
        period={report?.period ?? ""}
        onReset={() => setFilters(INITIAL_FILTERS)}
      />

      <div className="p-8 pt-6">
        <div className="mx-auto w-full max-w-[1400px]">
          {isLoading && <div className="text-sm text-gray-500">Loading data…</div>}

          {!isLoading && error && (
            <div className="space-y-3">
              <SchemaErrorPanel schema={schema} message={error} />
              <button
                type="button"
                onClick={reload}
                className="px-4 py-2 rounded-lg border text-sm hover:bg-gray-50"
              >
                Retry
              </button>
            </div>
          )}

          {!isLoading && data && <ParseWarnings errors={data.errors} />}

          {!isLoading && report && (
            <>
              <SummarySection report={report} />
              <ChannelSection byChannel={report.byChannel} cards={report.channelCards} topPerformer={report.topPerformer} />
              <SummaryTable campaigns={report.byCampaign} />
              <TopCampaigns byRoas={report.topCampaignsByRoas} byRevenue={report.topCampaignsByRevenue} />
              <CustomerSection report={report} />
              <GeoSection byRegion={report.byRegion} topRegions={report.topRegions} />
              <FunnelSection funnel={report.funnel} />
              <TimeSection weekdays={report.weekdays} weekly={report.weekly} correlations={report.correlations} />

              <section className="mt-12 mb-16">
                <SummaryInsight title="More Insights" insights={report.secondaryInsights} />
              </section>
            </>
          )}
        </div>
      </div>
    </main>
  );
}
