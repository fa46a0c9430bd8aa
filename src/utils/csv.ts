import type { SObjectRecord } from '../types/salesforce.js';

/**
 * Cell text for a record value, before quoting: null and undefined become
 * empty, objects and arrays are written as JSON
 */
export function cellValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function quote(text: string): string {
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Sorted union of the keys of every record */
export function csvHeader(records: readonly SObjectRecord[]): string[] {
  const fields = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      fields.add(key);
    }
  }
  return Array.from(fields).sort();
}

/**
 * Serialize records as LF-terminated CSV for a Bulk API 2.0 upload
 */
export function toCsv(records: readonly SObjectRecord[]): string {
  const header = csvHeader(records);
  const lines = [header.map(quote).join(',')];
  for (const record of records) {
    lines.push(header.map((field) => quote(cellValue(record[field]))).join(','));
  }
  return lines.join('\n') + '\n';
}

/**
 * Split CSV text into rows of cells. Handles quoted cells with embedded
 * commas, doubled quotes and line breaks, and both LF and CRLF endings.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let inQuotes = false;
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        cell += char;
      }
      i++;
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(cell);
      cell = '';
    } else if (char === '\n' || char === '\r') {
      row.push(cell);
      rows.push(row);
      row = [];
      cell = '';
      if (char === '\r' && text[i + 1] === '\n') {
        i++;
      }
    } else {
      cell += char;
    }
    i++;
  }

  if (cell !== '' || row.length > 0) {
    row.push(cell);
    rows.push(row);
  }
  return rows;
}

/**
 * Parse CSV with a header line into one object per data row
 */
export function parseCsvRecords(text: string): Array<Record<string, string>> {
  const [header, ...rows] = parseCsv(text);
  if (!header) {
    return [];
  }
  return rows
    .filter((cells) => !(cells.length === 1 && cells[0] === ''))
    .map((cells) => {
      const record: Record<string, string> = {};
      header.forEach((field, index) => {
        record[field] = cells[index] ?? '';
      });
      return record;
    });
}
