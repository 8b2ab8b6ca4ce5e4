"use client";

import { useCallback, useEffect, useState } from "react";

import type { ReportConfig } from "./config";
import type { LoadedData, LoadSources } from "./loader";
import { dataUrl, reportConfig } from "./config";
import { load } from "./loader";
import { fingerprint } from "./cache";
import { SchemaError, errorMessage } from "./errors";
import { createLogger } from "./logger";
import { CHANNELS } from "./types";

const log = createLogger("fetch");

export type SchemaProblem = { file: string; missing: readonly string[] };

export type LoadOutcome =
  | { ok: true; data: LoadedData; sourceId: string }
  | { ok: false; error: string; schema: SchemaProblem | null };

type UseMarketingDataResult = {
  data: LoadedData | null;
  sourceId: string; // 내용 fingerprint (캐시 키)
  isLoading: boolean;
  error: string | null;
  schema: SchemaProblem | null;
  reload: () => void;
};

async function fetchText(url: string, name: string): Promise<string> {
  const res = await fetch(`${url}?ts=${Date.now()}`);
  if (!res.ok) throw new Error(`CSV fetch failed: ${name} ${res.status} ${res.statusText}`);
  return res.text();
}

export async function fetchSources(config: ReportConfig): Promise<LoadSources> {
  const channelTexts = await Promise.all(
    CHANNELS.map((channel) => {
      const name = config.channelFiles[channel];
      return fetchText(dataUrl(config, name), name).then((text) => ({ channel, name, text }));
    })
  );

  const businessText = await fetchText(dataUrl(config, config.businessFile), config.businessFile);

  return {
    channels: channelTexts,
    business: { name: config.businessFile, text: businessText },
  };
}

/** 읽은 CSV 텍스트 → {ok} 결과 (throw 하지 않음) */
export function loadOutcome(sources: LoadSources): LoadOutcome {
  try {
    const data = load(sources);
    const sourceId = fingerprint([...sources.channels.map((c) => c.text), sources.business.text]);
    return { ok: true, data, sourceId };
  } catch (e) {
    const schema = e instanceof SchemaError ? { file: e.file, missing: e.missing } : null;
    return { ok: false, error: errorMessage(e), schema };
  }
}

/**
 * 정적 CSV 4개(public/data) → LoadedData
 * - SchemaError / fetch 실패는 error 로 (렌더만 실패, 앱은 유지)
 * - ParseError는 data.errors 로 (부분 성공)
 */
export function useMarketingData(config: ReportConfig = reportConfig): UseMarketingDataResult {
  const [data, setData] = useState<LoadedData | null>(null);
  const [sourceId, setSourceId] = useState("");
  const [isLoading, setIsLoading] = useState<boolean>(true);
  const [error, setError] = useState<string | null>(null);
  const [schema, setSchema] = useState<SchemaProblem | null>(null);
  const [nonce, setNonce] = useState(0);

  const reload = useCallback(() => setNonce((n) => n + 1), []);

  useEffect(() => {
    let alive = true;

    async function run() {
      try {
        setIsLoading(true);
        setError(null);
        setSchema(null);

        const outcome = loadOutcome(await fetchSources(config));
        if (!alive) return;

        if (outcome.ok) {
          setData(outcome.data);
          setSourceId(outcome.sourceId);
        } else {
          log.error("load failed", outcome.error);
          setData(null);
          setSourceId("");
          setError(outcome.error);
          setSchema(outcome.schema);
        }
      } catch (e) {
        if (!alive) return;
        log.error("fetch failed", e);
        setData(null);
        setSourceId("");
        setError(errorMessage(e));
      } finally {
        if (alive) setIsLoading(false);
      }
    }

    void run();
    return () => {
      alive = false;
    };
  }, [config, nonce]);

  return { data, sourceId, isLoading, error, schema, reload };
}
