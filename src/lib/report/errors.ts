// src/lib/report/errors.ts

/** 필수 컬럼 누락. 로드 전체를 중단시킴 */
export class SchemaError extends Error {
  readonly file: string;
  readonly missing: readonly string[];

  constructor(file: string, missing: readonly string[]) {
    super(`${file}: missing required column(s): ${missing.join(", ")}`);
    this.name = "SchemaError";
    this.file = file;
    this.missing = missing;
  }
}

/**
 * 날짜/숫자 변환 실패. 해당 행만 제외되고 나머지는 계속 로드됨
 * - line: 헤더를 1번째 줄로 센 CSV 줄 번호
 */
export class ParseError extends Error {
  readonly file: string;
  readonly line: number;
  readonly column: string;
  readonly raw: string;

  constructor(args: { file: string; line: number; column: string; raw: string; reason: string }) {
    super(`${args.file} line ${args.line}, column "${args.column}": ${args.reason} (got "${args.raw}")`);
    this.name = "ParseError";
    this.file = args.file;
    this.line = args.line;
    this.column = args.column;
    this.raw = args.raw;
  }
}

/** 계산에 꼭 필요한 행이 0건 */
export class EmptyDataError extends Error {
  readonly what: string;

  constructor(what: string) {
    super(`No rows available for ${what}`);
    this.name = "EmptyDataError";
    this.what = what;
  }
}

export function requireRows<T>(rows: readonly T[], what: string): readonly T[] {
  if (!rows.length) throw new EmptyDataError(what);
  return rows;
}

// UI 경계에서 쓰는 메시지 추출
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return typeof e === "string" ? e : "Unknown error";
}
