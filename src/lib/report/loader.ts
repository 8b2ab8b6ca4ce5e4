import Papa from "papaparse";

import type {
  BusinessRecord,
  ChannelName,
  ChannelRow,
  DateKey,
  UnifiedChannelTable,
} from "./types";
import { ParseError, SchemaError } from "./errors";
import { parseDateKey } from "./date";
import { merge } from "./aggregate";
import { createLogger } from "./logger";

const log = createLogger("load");

export const CHANNEL_COLUMNS = [
  "date",
  "tactic",
  "state",
  "campaign",
  "impressions",
  "clicks",
  "spend",
  "attributed_revenue",
] as const;

export const BUSINESS_COLUMNS = [
  "date",
  "orders",
  "new_orders",
  "new_customers",
  "total_revenue",
  "gross_profit",
  "cogs",
] as const;

export type LoadResult<T> = {
  rows: T[];
  errors: ParseError[];
};

export type CsvSource = {
  name: string; // 에러 메시지에 쓰일 파일명
  text: string;
};

export type LoadSources = {
  channels: ReadonlyArray<CsvSource & { channel: ChannelName }>;
  business: CsvSource;
};

export type LoadedData = {
  channels: UnifiedChannelTable;
  business: BusinessRecord[];
  errors: ParseError[];
};

type RawRow = Record<string, string | undefined>;

// 내보내기 도구마다 다른 헤더 이름 → 표준 컬럼명
export const HEADER_ALIASES: Readonly<Record<string, string>> = {
  impression: "impressions",
  "attributed revenue": "attributed_revenue",
  "# of orders": "orders",
  "# of new orders": "new_orders",
  "new customers": "new_customers",
  "total revenue": "total_revenue",
  "gross profit": "gross_profit",
  COGS: "cogs",
};

export function normalizeHeader(h: string): string {
  const s = h.trim();
  return HEADER_ALIASES[s] ?? s;
}

// 실패 시 ParseError를 기록하고 자리표시 값("" / 0)을 돌려줌. 그 행은 결과에서 빠짐
type CellReader = {
  date: (column: string) => DateKey;
  num: (column: string) => number;
};

// 12 / 12.5 / .5 만 허용 (음수, 지수, 빈칸, N/A 등은 거부)
const AMOUNT_RE = /^(\d+(\.\d*)?|\.\d+)$/;

export function parseAmount(raw: string): number | null {
  const s = raw.trim();
  if (!AMOUNT_RE.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

function textOr(raw: string | undefined, fallback: string) {
  const s = (raw ?? "").trim();
  return s || fallback;
}

// greedy: 공백/쉼표뿐인 줄도 빈 줄
const isBlank = (cells: readonly string[]) => cells.every((c) => !c.trim());

// 따옴표 안 줄바꿈까지 세야 다음 레코드의 줄 번호가 맞음
const newlinesIn = (cells: readonly string[]) =>
  cells.reduce((n, c) => n + (c.match(/\n/g)?.length ?? 0), 0);

type SourceRecord = { line: number; raw: RawRow };

/**
 * 레코드 단위로 읽으면서 각 레코드가 시작하는 줄 번호를 기록
 * - 첫 번째 비어있지 않은 레코드 = 헤더
 */
function readRecords(source: CsvSource): { fields: string[]; records: SourceRecord[] } {
  const parsed = Papa.parse<string[]>(source.text, { delimiter: ",", skipEmptyLines: false });

  for (const e of parsed.errors) {
    log.warn(`${source.name}: ${e.code} at row ${e.row ?? "?"}`, e.message);
  }

  let line = 1;
  let fields: string[] | null = null;
  const records: SourceRecord[] = [];

  for (const cells of parsed.data) {
    const start = line;
    line += 1 + newlinesIn(cells);
    if (isBlank(cells)) continue;

    if (!fields) {
      fields = cells.map(normalizeHeader);
      continue;
    }

    if (cells.length !== fields.length) {
      log.warn(`${source.name} line ${start}: expected ${fields.length} fields, got ${cells.length}`);
    }

    const raw: RawRow = {};
    fields.forEach((f, i) => {
      raw[f] = cells[i];
    });
    records.push({ line: start, raw });
  }

  return { fields: fields ?? [], records };
}

/**
 * 헤더 검증 + 행 단위 변환 공통 루틴
 * - 필수 컬럼이 하나라도 없으면 SchemaError (파일 전체 거부)
 * - 행 안에서 변환 실패한 셀은 ParseError로 모으고 그 행만 제외
 */
function parseTable<T>(
  source: CsvSource,
  required: readonly string[],
  toRow: (cells: CellReader, raw: RawRow) => T
): LoadResult<T> {
  const { fields, records } = readRecords(source);

  const missing = required.filter((c) => !fields.includes(c));
  if (missing.length) throw new SchemaError(source.name, missing);

  const rows: T[] = [];
  const errors: ParseError[] = [];

  for (const { line, raw } of records) {
    let rejected = false;

    const reject = (column: string, value: string, reason: string) => {
      rejected = true;
      errors.push(new ParseError({ file: source.name, line, column, raw: value, reason }));
    };

    const cells: CellReader = {
      date: (column) => {
        const value = raw[column] ?? "";
        const out = parseDateKey(value);
        if (out === null) reject(column, value, "expected a YYYY-MM-DD date");
        return out ?? "";
      },
      num: (column) => {
        const value = raw[column] ?? "";
        const out = parseAmount(value);
        if (out === null) reject(column, value, "expected a non-negative number");
        return out ?? 0;
      },
    };

    const row = toRow(cells, raw);
    if (!rejected) rows.push(row);
  }

  log.debug(`${source.name}: ${rows.length} rows, ${errors.length} errors`);
  return { rows, errors };
}

export function parseChannelCsv(source: CsvSource): LoadResult<ChannelRow> {
  return parseTable(source, CHANNEL_COLUMNS, (cells, raw) => ({
    date: cells.date("date"),
    tactic: textOr(raw.tactic, "Unknown"),
    region: textOr(raw.state, "Unknown"),
    campaign: textOr(raw.campaign, "Unknown"),
    impressions: cells.num("impressions"),
    clicks: cells.num("clicks"),
    spend: cells.num("spend"),
    attributedRevenue: cells.num("attributed_revenue"),
  }));
}

export function parseBusinessCsv(source: CsvSource): LoadResult<BusinessRecord> {
  return parseTable(source, BUSINESS_COLUMNS, (cells) => ({
    date: cells.date("date"),
    orders: cells.num("orders"),
    newOrders: cells.num("new_orders"),
    newCustomers: cells.num("new_customers"),
    totalRevenue: cells.num("total_revenue"),
    grossProfit: cells.num("gross_profit"),
    cogs: cells.num("cogs"),
  }));
}

/** 채널 3종 + 비즈니스 CSV 로드. SchemaError는 그대로 throw */
export function load(sources: LoadSources): LoadedData {
  const errors: ParseError[] = [];

  const tables = sources.channels.map((src) => {
    const res = parseChannelCsv(src);
    errors.push(...res.errors);
    return { channel: src.channel, rows: res.rows };
  });

  const business = parseBusinessCsv(sources.business);
  errors.push(...business.errors);

  const channels = merge(tables);
  log.info(`loaded ${channels.length} channel rows, ${business.rows.length} business rows`);
  if (errors.length) log.warn(`${errors.length} cell(s) rejected`);

  return { channels, business: business.rows, errors };
}

/** 양끝 포함. 매칭 0건이면 빈 배열 */
export function filterByDateRange<T extends { date: DateKey }>(
  table: readonly T[],
  start: DateKey,
  end: DateKey
): T[] {
  if (start > end) return [];
  return table.filter((r) => r.date >= start && r.date <= end);
}
