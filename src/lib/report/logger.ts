import { reportConfig } from "./config";

type Level = "debug" | "info" | "warn" | "error";

export type Logger = Record<Level, (message: string, extra?: unknown) => void>;

/**
 * "[report:load] ..." 형태로 태그를 붙여 console로 출력
 * - debug는 NEXT_PUBLIC_REPORT_DEBUG=1 일 때만
 */
export function createLogger(scope: string, debug = reportConfig.debug): Logger {
  const tag = `[report:${scope}]`;

  const emit = (level: Level, message: string, extra?: unknown) => {
    if (level === "debug" && !debug) return;
    const fn = level === "debug" ? console.log : console[level];
    if (extra === undefined) fn(`${tag} ${message}`);
    else fn(`${tag} ${message}`, extra);
  };

  return {
    debug: (m, e) => emit("debug", m, e),
    info: (m, e) => emit("info", m, e),
    warn: (m, e) => emit("warn", m, e),
    error: (m, e) => emit("error", m, e),
  };
}
