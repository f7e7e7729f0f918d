export type CsvRow = Record<string, string>;

function escapeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function stringifyCsv(columns: readonly string[], rows: readonly CsvRow[]): string {
  const lines = [columns.map(escapeField).join(",")];
  for (const row of rows) {
    lines.push(columns.map((c) => escapeField(row[c] ?? "")).join(","));
  }
  return lines.join("\n") + "\n";
}

function splitRecords(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      record.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      record.push(field);
      records.push(record);
      record = [];
      field = "";
    } else {
      field += ch;
    }
  }

  if (field !== "" || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  // blank lines carry no data
  return records.filter((r) => !(r.length === 1 && r[0] === ""));
}

export function parseCsv(text: string): { header: string[]; rows: CsvRow[] } {
  const [header = [], ...records] = splitRecords(text.replace(/^\uFEFF/, ""));
  const columns = header.map((h) => h.trim());

  const rows = records.map((record) => {
    const row: CsvRow = {};
    columns.forEach((column, i) => {
      row[column] = record[i] ?? "";
    });
    return row;
  });

  return { header: columns, rows };
}
