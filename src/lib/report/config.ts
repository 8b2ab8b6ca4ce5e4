import type { ChannelName } from "./types";

export type ReportConfig = {
  dataBasePath: string;
  channelFiles: Record<ChannelName, string>;
  businessFile: string;
  debug: boolean;
};

// NEXT_PUBLIC_* 는 빌드 시점에 인라인되므로 process.env.X 형태로 직접 읽어야 함
export function readReportConfig(
  env: Record<string, string | undefined> = {
    NEXT_PUBLIC_DATA_BASE_PATH: process.env.NEXT_PUBLIC_DATA_BASE_PATH,
    NEXT_PUBLIC_REPORT_DEBUG: process.env.NEXT_PUBLIC_REPORT_DEBUG,
  }
): ReportConfig {
  const base = (env.NEXT_PUBLIC_DATA_BASE_PATH ?? "").trim() || "/data";

  return {
    dataBasePath: base.replace(/\/+$/, ""),
    channelFiles: {
      Facebook: "Facebook.csv",
      Google: "Google.csv",
      TikTok: "TikTok.csv",
    },
    businessFile: "Business.csv",
    debug: env.NEXT_PUBLIC_REPORT_DEBUG === "1",
  };
}

export const reportConfig = readReportConfig();

export function dataUrl(config: ReportConfig, file: string) {
  return `${config.dataBasePath}/${file}`;
}
