/**
 * Minimal CSV codec for the history file and CSV downloads.
 * Fields containing commas, quotes or line breaks are quoted, quotes are doubled.
 */

function escape(value: unknown): string {
  const text = value === null || value === undefined ? '' : String(value);
  if (/[",\r\n]/.test(text)) return `"${text.replace(/"/g, '""')}"`;
  return text;
}

/**
 * Serialize rows under a fixed header. Missing cells are written empty.
 * Output always ends with a newline.
 */
export function toCsv(headers: readonly string[], rows: ReadonlyArray<Record<string, unknown>>): string {
  const lines = [headers.map(escape).join(',')];
  for (const row of rows) {
    lines.push(headers.map(h => escape(row[h])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Parse CSV text into rows of cells.
 *
 * @throws Error on an unterminated quoted field or stray characters after a closing quote
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldWasQuoted = false;
  let i = 0;

  const endField = () => {
    row.push(field);
    field = '';
    fieldWasQuoted = false;
  };
  const endRow = () => {
    endField();
    rows.push(row);
    row = [];
  };

  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      field += ch;
      i++;
      continue;
    }

    if (ch === '"') {
      if (field.length > 0 || fieldWasQuoted) {
        throw new Error(`Unexpected quote at offset ${i}`);
      }
      inQuotes = true;
      fieldWasQuoted = true;
      i++;
    } else if (ch === ',') {
      endField();
      i++;
    } else if (ch === '\r' || ch === '\n') {
      endRow();
      i += ch === '\r' && text[i + 1] === '\n' ? 2 : 1;
    } else {
      if (fieldWasQuoted) {
        throw new Error(`Unexpected character after closing quote at offset ${i}`);
      }
      field += ch;
      i++;
    }
  }

  if (inQuotes) {
    throw new Error('Unterminated quoted field');
  }
  if (field.length > 0 || fieldWasQuoted || row.length > 0) {
    endRow();
  }

  return rows;
}
