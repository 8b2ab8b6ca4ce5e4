"use client";

import type { ChannelKey, ChannelName, DateKey } from "../../../src/lib/report/types";
import { parseDateKey } from "../../../src/lib/report/date";

import FilterBtn from "../ui/FilterBtn";

type Props = {
  start: DateKey | null;
  end: DateKey | null;
  setStart: (d: DateKey | null) => void;
  setEnd: (d: DateKey | null) => void;

  selectedChannel: ChannelKey;
  setSelectedChannel: (c: ChannelKey) => void;

  selectedCampaign: string;
  setSelectedCampaign: (c: string) => void;

  channelOptions: ChannelName[];
  campaignOptions: string[];

  minDate: DateKey | null;
  maxDate: DateKey | null;

  period: string;
  onReset: () => void;
};

// <input type="date"> 는 비우면 "" 를 넘김
const toKey = (v: string) => (v ? parseDateKey(v) : null);

export default function HeaderBar(props: Props) {
  const {
    start,
    end,
    setStart,
    setEnd,
    selectedChannel,
    setSelectedChannel,
    selectedCampaign,
    setSelectedCampaign,
    channelOptions,
    campaignOptions,
    minDate,
    maxDate,
    period,
    onReset,
  } = props;

  return (
    <header className="sticky top-0 z-50 bg-white/95 backdrop-blur border-b">
      <div className="p-8 pb-4">
        <div className="mx-auto w-full max-w-[1400px]">
          <div className="mb-6 text-center pt-4">
            <h1 className="text-3xl font-semibold tracking-tight">Marketing Performance Report</h1>
            <div className="mt-4 border-t border-gray-400" />
            <div className="mt-1 border-t border-gray-300" />
          </div>

          <div className="flex flex-wrap items-end justify-between gap-4 mb-2">
            <div className="flex flex-wrap items-end gap-3">
              <label className="flex flex-col text-xs text-gray-600">
                Start
                <input
                  type="date"
                  aria-label="Start date"
                  className="mt-1 rounded-lg border px-3 py-2 text-sm text-gray-900"
                  value={start ?? ""}
                  min={minDate ?? undefined}
                  max={maxDate ?? undefined}
                  onChange={(e) => setStart(toKey(e.target.value))}
                />
              </label>

              <label className="flex flex-col text-xs text-gray-600">
                End
                <input
                  type="date"
                  aria-label="End date"
                  className="mt-1 rounded-lg border px-3 py-2 text-sm text-gray-900"
                  value={end ?? ""}
                  min={minDate ?? undefined}
                  max={maxDate ?? undefined}
                  onChange={(e) => setEnd(toKey(e.target.value))}
                />
              </label>

              <label className="flex flex-col text-xs text-gray-600">
                Campaign
                <select
                  aria-label="Campaign"
                  className="mt-1 min-w-[200px] rounded-lg border px-3 py-2 text-sm text-gray-900"
                  value={selectedCampaign}
                  onChange={(e) => setSelectedCampaign(e.target.value)}
                >
                  <option value="all">All campaigns</option>
                  {campaignOptions.map((c) => (
                    <option key={c} value={c}>
                      {c}
                    </option>
                  ))}
                </select>
              </label>

              <button
                type="button"
                onClick={onReset}
                className="px-3 py-2 rounded-lg border text-sm text-gray-700 hover:bg-gray-50"
              >
                Reset
              </button>
            </div>

            <div className="flex gap-2">
              <FilterBtn active={selectedChannel === "all"} onClick={() => setSelectedChannel("all")}>
                All
              </FilterBtn>
              {channelOptions.map((c) => (
                <FilterBtn key={c} active={selectedChannel === c} onClick={() => setSelectedChannel(c)}>
                  {c}
                </FilterBtn>
              ))}
            </div>
          </div>

          {period && (
            <div className="mt-3 text-sm text-gray-600">
              Period: <span className="font-semibold text-gray-900">{period}</span>
            </div>
          )}
        </div>
      </div>
    </header>
  );
}
