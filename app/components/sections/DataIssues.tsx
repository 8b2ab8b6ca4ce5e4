"use client";

import type { ParseError } from "../../../src/lib/report/errors";
import type { SchemaProblem } from "../../../src/lib/report/useMarketingData";

const MAX_LISTED = 20;

export function SchemaErrorPanel({ schema, message }: { schema: SchemaProblem | null; message: string }) {
  return (
    <div role="alert" className="border border-red-300 bg-red-50 rounded-xl p-5 text-sm text-red-800">
      <div className="font-semibold mb-1">Data could not be loaded</div>
      {schema ? (
        <div>
          <span className="font-mono">{schema.file}</span> is missing required column(s):{" "}
          <span className="font-mono">{schema.missing.join(", ")}</span>
        </div>
      ) : (
        <div>{message}</div>
      )}
    </div>
  );
}

export function ParseWarnings({ errors }: { errors: ParseError[] }) {
  if (!errors.length) return null;

  const shown = errors.slice(0, MAX_LISTED);
  const rows = new Set(errors.map((e) => `${e.file}:${e.line}`)).size;

  return (
    <div role="status" className="border border-amber-300 bg-amber-50 rounded-xl p-4 text-sm text-amber-900">
      <div className="font-semibold mb-2">
        {rows} row{rows === 1 ? "" : "s"} skipped because of unreadable values
      </div>
      <ul className="list-disc pl-5 space-y-0.5">
        {shown.map((e, i) => (
          <li key={`${e.file}-${e.line}-${e.column}-${i}`}>{e.message}</li>
        ))}
      </ul>
      {errors.length > shown.length && (
        <div className="mt-2 text-xs">and {errors.length - shown.length} more</div>
      )}
    </div>
  );
}
