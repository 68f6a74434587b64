import path from 'path';
import * as XLSX from 'xlsx';
import { ValidationError } from '@cbt/shared';

export const SPREADSHEET_EXTENSIONS = ['.csv', '.xlsx', '.xls'];

export type SheetRow = Record<string, string>;

/**
 * Read the first sheet of a CSV/XLSX upload into header-keyed rows of strings.
 * Header names are trimmed and lower-cased; empty cells become ''.
 */
export function readSpreadsheetRows(fileName: string, buffer: Buffer): SheetRow[] {
  const extension = path.extname(fileName).toLowerCase();
  if (!SPREADSHEET_EXTENSIONS.includes(extension)) {
    throw new ValidationError('File must be CSV or Excel format');
  }

  const workbook = XLSX.read(buffer, { type: 'buffer', raw: extension === '.csv' });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) {
    throw new ValidationError('Uploaded file contains no sheets');
  }

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[sheetName], {
    defval: '',
    raw: false,
  });

  return rows.map((row) => {
    const normalized: SheetRow = {};
    for (const [key, value] of Object.entries(row)) {
      normalized[key.trim().toLowerCase()] = String(value ?? '').trim();
    }
    return normalized;
  });
}
