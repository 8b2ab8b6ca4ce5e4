"use client";

import { useEffect, useMemo, useRef } from "react";

import type { ReportFilters } from "./types";
import type { LoadedData } from "./loader";
import type { ReportModel } from "./buildReport";
import { buildOptions } from "./aggregate";
import { buildReport } from "./buildReport";
import { ReportCache } from "./cache";

type Args = {
  data: LoadedData | null;
  sourceId: string;
  filters: ReportFilters;

  // 채널 변경으로 선택된 캠페인이 목록에서 사라지면 page 쪽에서 "all"로 리셋
  onInvalidCampaign?: () => void;
};

export function useReportAggregates({ data, sourceId, filters, onInvalidCampaign }: Args) {
  const cacheRef = useRef<ReportCache<ReportModel> | null>(null);
  if (!cacheRef.current) cacheRef.current = new ReportCache<ReportModel>();

  const lastSourceRef = useRef("");

  // 소스 내용이 바뀌면 이전 소스의 결과는 버림
  useEffect(() => {
    const prev = lastSourceRef.current;
    if (prev && prev !== sourceId) cacheRef.current?.invalidateSource(prev);
    lastSourceRef.current = sourceId;
  }, [sourceId]);

  const options = useMemo(
    () => buildOptions(data?.channels ?? [], data?.business ?? [], filters.channel),
    [data, filters.channel]
  );

  useEffect(() => {
    if (!onInvalidCampaign || !data) return;
    if (filters.campaign === "all") return;
    if (!options.campaignOptions.includes(filters.campaign)) onInvalidCampaign();
  }, [onInvalidCampaign, data, filters.campaign, options.campaignOptions]);

  const { start, end, channel, campaign } = filters;

  const report = useMemo(() => {
    if (!data) return null;
    const f: ReportFilters = { start, end, channel, campaign };
    const cache = cacheRef.current ?? new ReportCache<ReportModel>();
    return cache.getOrCompute(sourceId, f, () => buildReport(data, f));
  }, [data, sourceId, start, end, channel, campaign]);

  return { options, report };
}
