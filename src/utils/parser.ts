/**
 * CSV parsing for scraped comment exports
 */

import type { RawRecord } from '@/types';

export interface ParsedCSV {
  /** Column names from the first row */
  header: string[];
  /** Data rows, empty cells as undefined */
  records: RawRecord[];
  warnings: string[];
}

/**
 * Parse a comments CSV
 *
 * Handles quoted fields, doubled quotes, CRLF line endings and line breaks
 * inside quoted cells. Cells are kept verbatim (no trimming) because
 * duplicate detection compares exact values.
 */
export function parseCommentsCSV(csvText: string): ParsedCSV {
  const warnings: string[] = [];
  const text = csvText.startsWith('\uFEFF') ? csvText.slice(1) : csvText;
  const rows = splitRows(text, warnings);

  if (rows.length === 0) {
    warnings.push('CSV is empty');
    return { header: [], records: [], warnings };
  }

  const [header, ...data] = rows;
  const records: RawRecord[] = data.map(cells => cells.map(cell => (cell === '' ? undefined : cell)));

  if (records.length === 0) {
    warnings.push('CSV has a header row but no data rows');
  }

  return { header, records, warnings };
}

/**
 * Split CSV text into rows of raw cell strings
 */
function splitRows(text: string, warnings: string[]): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;
  let rowHasContent = false;

  const endRow = () => {
    row.push(current);
    // A bare blank line is not a record
    if (rowHasContent || row.length > 1) {
      rows.push(row);
    }
    row = [];
    current = '';
    rowHasContent = false;
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
      rowHasContent = true;
    } else if (char === ',') {
      row.push(current);
      current = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') {
        i++;
      }
      endRow();
    } else {
      current += char;
      rowHasContent = true;
    }
  }

  if (inQuotes) {
    warnings.push('Unterminated quoted field at end of file');
  }
  if (current.length > 0 || row.length > 0 || rowHasContent) {
    endRow();
  }

  return rows;
}
