export type Table = {
  headers: string[];
  rows: string[][];
};

/**
 * Parse RFC 4180 CSV. The first record is the header row. Cell text is kept
 * exactly as written (no trimming); short rows are padded with empty cells.
 */
export function parseCsv(text: string): Table {
  const records: string[][] = [];
  let current: string[] = [];
  let value = "";
  let insideQuote = false;
  let fieldStarted = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    const next = text[i + 1];

    if (insideQuote) {
      if (char === '"' && next === '"') {
        value += '"';
        i++;
      } else if (char === '"') {
        insideQuote = false;
      } else {
        value += char;
      }
    } else if (char === '"') {
      insideQuote = true;
      fieldStarted = true;
    } else if (char === ",") {
      current.push(value);
      value = "";
      fieldStarted = true;
    } else if (char === "\n" || char === "\r") {
      if (fieldStarted || value || current.length > 0) {
        current.push(value);
        records.push(current);
      }
      current = [];
      value = "";
      fieldStarted = false;
      if (char === "\r" && next === "\n") i++;
    } else {
      value += char;
      fieldStarted = true;
    }
  }
  if (fieldStarted || value || current.length > 0) {
    current.push(value);
    records.push(current);
  }

  const [headers = [], ...rows] = records;
  return {
    headers,
    rows: rows.map((row) =>
      row.length < headers.length ? [...row, ...Array<string>(headers.length - row.length).fill("")] : row,
    ),
  };
}

function quoteField(field: string): string {
  return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

export function serializeCsv(table: Table): string {
  if (table.headers.length === 0 && table.rows.length === 0) {
    return "";
  }
  const lines = [table.headers, ...table.rows].map((row) => row.map(quoteField).join(","));
  return `${lines.join("\n")}\n`;
}
