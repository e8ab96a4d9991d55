import { parseCsv, serializeCsv, type Table } from "../tabular/csv.js";
import { emptyCounts, redactText } from "./redactor.js";
import type { PiiCategory, RedactOptions } from "./types.js";

export type TableRedactionResult = {
  table: Table;
  counts: Record<PiiCategory, number>;
  cellsChanged: number;
};

/**
 * Redact every data cell independently. Headers, row order and column order
 * are untouched; empty cells are passed through without scanning.
 */
export function redactTable(table: Table, opts?: RedactOptions): TableRedactionResult {
  const counts = emptyCounts();
  let cellsChanged = 0;

  const rows = table.rows.map((row) =>
    row.map((cell) => {
      if (cell === "") {
        return cell;
      }
      const result = redactText(cell, opts);
      for (const m of result.matches) {
        counts[m.category] += 1;
      }
      if (result.redacted !== cell) {
        cellsChanged += 1;
      }
      return result.redacted;
    }),
  );

  return { table: { headers: [...table.headers], rows }, counts, cellsChanged };
}

export function redactCsv(
  csvText: string,
  opts?: RedactOptions,
): { csv: string; counts: Record<PiiCategory, number>; cellsChanged: number } {
  const { table, counts, cellsChanged } = redactTable(parseCsv(csvText), opts);
  return { csv: serializeCsv(table), counts, cellsChanged };
}
