import type { ReportFilters } from "./types";

// FNV-1a 32bit. 소스 내용이 바뀌면 identity도 바뀜
export function fingerprint(texts: readonly string[]): string {
  let h = 0x811c9dc5;
  for (const t of texts) {
    for (let i = 0; i < t.length; i++) {
      h ^= t.charCodeAt(i);
      h = Math.imul(h, 0x01000193);
    }
    h ^= 0x1f; // 파일 경계
    h = Math.imul(h, 0x01000193);
  }
  return `${(h >>> 0).toString(16).padStart(8, "0")}:${texts.reduce((n, t) => n + t.length, 0)}`;
}

export function filterKey(f: ReportFilters): string {
  return [f.start ?? "", f.end ?? "", f.channel, f.campaign].join("|");
}

/**
 * (source identity, filter) → 계산 결과
 * - 무효화는 invalidateSource / clear 로만
 */
export class ReportCache<T> {
  private readonly entries = new Map<string, Map<string, { value: T }>>();

  get(source: string, filters: ReportFilters): T | undefined {
    return this.entries.get(source)?.get(filterKey(filters))?.value;
  }

  set(source: string, filters: ReportFilters, value: T): void {
    let bySource = this.entries.get(source);
    if (!bySource) {
      bySource = new Map();
      this.entries.set(source, bySource);
    }
    bySource.set(filterKey(filters), { value });
  }

  getOrCompute(source: string, filters: ReportFilters, compute: () => T): T {
    const hit = this.entries.get(source)?.get(filterKey(filters));
    if (hit) return hit.value;

    const value = compute();
    this.set(source, filters, value);
    return value;
  }

  invalidateSource(source: string): void {
    this.entries.delete(source);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    let n = 0;
    for (const m of this.entries.values()) n += m.size;
    return n;
  }
}
