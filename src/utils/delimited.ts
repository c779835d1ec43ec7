/**
 * Delimited text (TSV/CSV) parsing
 *
 * Quoted fields may contain the delimiter, newlines and doubled quotes.
 * The first non-blank row is the header.
 *
 * @module
 */

export type DelimitedRow = Record<string, string>;

/**
 * "," for .csv files, tab for everything else
 */
export function delimiterFor(filePath: string): string {
  return filePath.toLowerCase().endsWith(".csv") ? "," : "\t";
}

/**
 * Split text into rows of raw cells
 */
export function parseRecords(text: string, delimiter: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let quoted = false;
  let i = 0;

  const endField = (): void => {
    record.push(field);
    field = "";
  };
  const endRecord = (): void => {
    endField();
    records.push(record);
    record = [];
  };

  while (i < text.length) {
    const ch = text.charAt(i);
    if (quoted) {
      if (ch === '"') {
        if (text.charAt(i + 1) === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field === "") {
      quoted = true;
    } else if (ch === delimiter) {
      endField();
    } else if (ch === "\n") {
      endRecord();
    } else if (ch === "\r") {
      if (text.charAt(i + 1) !== "\n") endRecord();
    } else {
      field += ch;
    }
    i++;
  }

  if (field !== "" || record.length > 0) endRecord();
  return records.filter((cells) => cells.some((cell) => cell !== ""));
}

/**
 * Parse text into header-keyed rows. Missing trailing cells are empty
 * strings; cells beyond the header are dropped.
 */
export function parseDelimited(text: string, delimiter: string): DelimitedRow[] {
  const [header, ...body] = parseRecords(text, delimiter);
  if (!header) return [];
  const columns = header.map((name) => name.trim());

  return body.map((cells) => {
    const row: DelimitedRow = {};
    columns.forEach((column, index) => {
      row[column] = cells[index] ?? "";
    });
    return row;
  });
}
