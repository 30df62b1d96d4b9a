import { existsSync } from 'node:fs';
import { google } from 'googleapis';
import type { sheets_v4 } from 'googleapis';
import { SetupError } from '../errors.js';
import { REQUIRED_HEADERS, columnLetter } from './tabular.js';
import type { TabularStore } from './tabular.js';
import type { CellValue } from '../types/index.js';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];
const NEW_SHEET_ROWS = 1000;

/** Quote a worksheet title for A1 notation: `Raw Reviews` → `'Raw Reviews'`. */
export function quoteSheetName(name: string): string {
  return `'${name.replace(/'/g, "''")}'`;
}

export function cellRange(sheet: string, row: number, col: number): string {
  return `${quoteSheetName(sheet)}!${columnLetter(col)}${row}`;
}

export function columnRange(sheet: string, col: number): string {
  const letter = columnLetter(col);
  return `${quoteSheetName(sheet)}!${letter}:${letter}`;
}

export function toStrings(values: unknown[][] | null | undefined): string[][] {
  return (values ?? []).map(row => row.map(cell => (cell == null ? '' : String(cell))));
}

export interface GoogleSheetOptions {
  spreadsheetId: string;
  sheetName: string;
  credentialsPath: string;
}

/** One worksheet of a Google spreadsheet, authorised with a service-account key file. */
export class GoogleSheetStore implements TabularStore {
  readonly location: string;

  constructor(
    private readonly api: sheets_v4.Sheets,
    private readonly spreadsheetId: string,
    private readonly sheetName: string,
  ) {
    this.location = `sheet:${spreadsheetId}/${sheetName}`;
  }

  static connect(opts: GoogleSheetOptions): GoogleSheetStore {
    if (!existsSync(opts.credentialsPath)) {
      throw new SetupError(`Service account file not found at ${opts.credentialsPath}`);
    }
    const auth = new google.auth.GoogleAuth({ keyFile: opts.credentialsPath, scopes: SCOPES });
    const api = google.sheets({ version: 'v4', auth });
    return new GoogleSheetStore(api, opts.spreadsheetId, opts.sheetName);
  }

  async exists(): Promise<boolean> {
    return (await this.sheetProperties()) !== undefined;
  }

  async create(): Promise<void> {
    await this.api.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [{
          addSheet: {
            properties: {
              title: this.sheetName,
              gridProperties: { rowCount: NEW_SHEET_ROWS, columnCount: REQUIRED_HEADERS.length },
            },
          },
        }],
      },
    });
  }

  async readAllValues(): Promise<string[][]> {
    const res = await this.api.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: quoteSheetName(this.sheetName),
    });
    return toStrings(res.data.values);
  }

  async readColumn(col: number): Promise<string[]> {
    const res = await this.api.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: columnRange(this.sheetName, col),
    });
    return toStrings(res.data.values).map(row => row[0] ?? '');
  }

  async appendRows(rows: CellValue[][]): Promise<void> {
    if (rows.length === 0) return;
    await this.api.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range: `${quoteSheetName(this.sheetName)}!A1`,
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: { values: rows },
    });
  }

  async updateCell(row: number, col: number, value: CellValue): Promise<void> {
    await this.ensureColumns(col);
    await this.api.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range: cellRange(this.sheetName, row, col),
      valueInputOption: 'RAW',
      requestBody: { values: [[value]] },
    });
  }

  async close(): Promise<void> {
    // HTTP client holds no connection to release
  }

  private async sheetProperties(): Promise<sheets_v4.Schema$SheetProperties | undefined> {
    const res = await this.api.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: 'sheets.properties',
    });
    return res.data.sheets
      ?.map(s => s.properties)
      .find(p => p?.title === this.sheetName) ?? undefined;
  }

  // Writing past the grid is rejected by the API, so widen it first.
  private async ensureColumns(col: number): Promise<void> {
    const props = await this.sheetProperties();
    if (!props || props.sheetId == null) {
      throw new Error(`Worksheet ${this.sheetName} not found in ${this.spreadsheetId}`);
    }
    const current = props.gridProperties?.columnCount ?? 0;
    if (current >= col) return;
    await this.api.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [{
          appendDimension: { sheetId: props.sheetId, dimension: 'COLUMNS', length: col - current },
        }],
      },
    });
  }
}
