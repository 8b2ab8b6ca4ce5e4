// src/lib/report/format.ts
import type { MetricValue } from "./types";

const usd0 = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  maximumFractionDigits: 0,
});

const usd2 = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function USD(n: number) {
  return usd0.format(Math.round(n));
}

export function USD2(n: number) {
  return usd2.format(n);
}

// 표시용: 1234 -> "1,234"
export function formatNumber(n: number) {
  return Math.round(n).toLocaleString("en-US");
}

// 0.0234 -> "2.34%"
export function formatPct(ratio: number, digits = 2) {
  return `${(ratio * 100).toFixed(digits)}%`;
}

// 3.966 -> "3.97x"
export function formatMultiple(n: number, digits = 2) {
  return `${n.toFixed(digits)}x`;
}

// 정의되지 않은 지표는 "-"
export function formatMetric(m: MetricValue, fmt: (n: number) => string) {
  return m.defined ? fmt(m.value) : "-";
}
