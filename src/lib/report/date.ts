import type { DateKey } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

export const WEEKDAY_LABELS = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

export type WeekdayLabel = (typeof WEEKDAY_LABELS)[number];

/**
 * YYYY-MM-DD (월/일 한 자리 허용) → zero-padded DateKey
 * - 실제 달력에 없는 날짜(2024-02-30 등)는 null
 */
export function parseDateKey(s: string): DateKey | null {
  const m = s.trim().match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
  if (!m) return null;

  const yy = Number(m[1]);
  const mm = Number(m[2]);
  const dd = Number(m[3]);

  const d = new Date(Date.UTC(yy, mm - 1, dd));
  if (d.getUTCFullYear() !== yy || d.getUTCMonth() !== mm - 1 || d.getUTCDate() !== dd) return null;

  return toDateKey(d);
}

// UTC 기준 (DST로 하루 길이가 흔들리지 않게)
export function toDateKey(d: Date): DateKey {
  const y = d.getUTCFullYear();
  const m = String(d.getUTCMonth() + 1).padStart(2, "0");
  const day = String(d.getUTCDate()).padStart(2, "0");
  return `${y}-${m}-${day}`;
}

function keyToUtc(key: DateKey): Date {
  const [yy, mm, dd] = key.split("-").map(Number);
  return new Date(Date.UTC(yy, mm - 1, dd));
}

export function addDays(key: DateKey, days: number): DateKey {
  const x = keyToUtc(key);
  x.setUTCDate(x.getUTCDate() + days);
  return toDateKey(x);
}

/** start~end 양끝 포함 일수. start > end 이면 0 */
export function daysInclusive(start: DateKey, end: DateKey): number {
  if (start > end) return 0;
  return Math.round((keyToUtc(end).getTime() - keyToUtc(start).getTime()) / DAY_MS) + 1;
}

/** 구간 중간 날짜: start + floor(days / 2). 앞 절반은 [start, mid), 뒤 절반은 [mid, end] */
export function midpointKey(start: DateKey, end: DateKey): DateKey {
  return addDays(start, Math.floor(daysInclusive(start, end) / 2));
}

// 0=Mon ... 6=Sun
export function weekdayIndex(key: DateKey): number {
  return (keyToUtc(key).getUTCDay() + 6) % 7;
}

export function isWeekend(key: DateKey): boolean {
  return weekdayIndex(key) >= 5;
}

// Monday 기준 주 시작
export function startOfWeekMonday(key: DateKey): DateKey {
  return addDays(key, -weekdayIndex(key));
}

export function minMaxDate(keys: Iterable<DateKey>): { min: DateKey; max: DateKey } | null {
  let min: DateKey | null = null;
  let max: DateKey | null = null;
  for (const k of keys) {
    if (min === null || k < min) min = k;
    if (max === null || k > max) max = k;
  }
  if (min === null || max === null) return null;
  return { min, max };
}

export function periodText(start: DateKey | null, end: DateKey | null): string {
  if (!start || !end) return "";
  const fmt = (k: DateKey) => k.replace(/-/g, ".");
  return `${fmt(start)} ~ ${fmt(end)}`;
}
