/**
 * CSV Codec
 *
 * Splits CSV text into a header row and data rows, and writes rows back out.
 * Handles quoted fields, doubled quotes and line breaks inside quotes.
 */

const FIELD_SEPARATOR = ',';

export interface CsvTable {
  headers: string[];
  rows: string[][];
  /** File line (1-based) on which each data row starts */
  lines: number[];
}

interface CsvRow {
  fields: string[];
  line: number;
}

/**
 * Tokenize CSV content into rows of fields. Blank lines are dropped.
 * Unquoted fields are trimmed; quoted fields keep their content as written.
 */
function tokenize(content: string): CsvRow[] {
  const rows: CsvRow[] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;
  let inQuotes = false;
  let line = 1;
  let rowStart = 1;

  const endField = () => {
    row.push(quoted ? field : field.trim());
    field = '';
    quoted = false;
  };

  const endRow = () => {
    endField();
    if (row.some(value => value.length > 0)) {
      rows.push({ fields: row, line: rowStart });
    }
    row = [];
    rowStart = line + 1;
  };

  for (let i = 0; i < content.length; i++) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"') {
        if (content[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') line++;
        field += char;
      }
      continue;
    }

    if (char === '"') {
      // Whitespace before an opening quote is not part of the value
      if (!quoted && field.trim() === '') field = '';
      quoted = true;
      inQuotes = true;
    } else if (char === FIELD_SEPARATOR) {
      endField();
    } else if (char === '\n') {
      endRow();
      line++;
    } else if (char === '\r') {
      if (content[i + 1] !== '\n') {
        endRow();
        line++;
      }
    } else if (!(quoted && (char === ' ' || char === '\t'))) {
      field += char;
    }
  }

  if (field.length > 0 || row.length > 0 || quoted) {
    endRow();
  }

  return rows;
}

/**
 * Parse CSV text. The first non-blank line is the header row.
 */
export function parseCsv(content: string): CsvTable {
  // Strip a UTF-8 BOM left by spreadsheet exports
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const [header, ...rows] = tokenize(text);
  return {
    headers: header?.fields ?? [],
    rows: rows.map(r => r.fields),
    lines: rows.map(r => r.line),
  };
}

export function csvEscape(value: string): string {
  if (
    value !== value.trim() ||
    value.includes('"') ||
    value.includes(FIELD_SEPARATOR) ||
    value.includes('\n') ||
    value.includes('\r')
  ) {
    return `"${value.replaceAll('"', '""')}"`;
  }
  return value;
}

/**
 * Serialize a header row and data rows. Always ends with a newline.
 */
export function stringifyCsv(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const lines = [headers, ...rows].map(fields => fields.map(csvEscape).join(FIELD_SEPARATOR));
  return lines.join('\n') + '\n';
}
