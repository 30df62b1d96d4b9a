import type { Logger } from 'pino';
import type { CellValue, ReviewRecord } from '../types/index.js';

export const REQUIRED_HEADERS = [
  'Review_Id', 'App_Name', 'Review_Date',
  'Rating', 'Inserted_On', 'Review_Text',
] as const;

/**
 * Spreadsheet-shaped, append-only store. Rows and columns are 1-based and
 * row 1 is the header.
 */
export interface TabularStore {
  /** Human-readable location for messages, e.g. `sheet:<id>/Raw_Reviews`. */
  readonly location: string;
  exists(): Promise<boolean>;
  create(): Promise<void>;
  readAllValues(): Promise<string[][]>;
  readColumn(col: number): Promise<string[]>;
  appendRows(rows: CellValue[][]): Promise<void>;
  updateCell(row: number, col: number, value: CellValue): Promise<void>;
  close(): Promise<void>;
}

export interface SetupResult {
  created: boolean;
  addedHeaders: string[];
}

/**
 * Make sure the store exists and carries every required header. Missing
 * headers go after the last existing one; data rows are never touched.
 */
export async function setupStore(store: TabularStore, logger?: Logger): Promise<SetupResult> {
  if (!(await store.exists())) {
    await store.create();
    await store.appendRows([[...REQUIRED_HEADERS]]);
    logger?.info({ store: store.location }, 'Created review store');
    return { created: true, addedHeaders: [...REQUIRED_HEADERS] };
  }

  const values = await store.readAllValues();
  if (values.length === 0) {
    await store.appendRows([[...REQUIRED_HEADERS]]);
    return { created: false, addedHeaders: [...REQUIRED_HEADERS] };
  }

  const headers = [...values[0]];
  const missing = REQUIRED_HEADERS.filter(h => !headers.includes(h));
  if (missing.length > 0) {
    logger?.warn({ store: store.location, missing }, 'Adding missing headers');
    for (const h of missing) {
      await store.updateCell(1, headers.length + 1, h);
      headers.push(h);
    }
  }
  return { created: false, addedHeaders: missing };
}

/** Fingerprints already stored in column 1, header excluded. */
export async function loadExistingIds(store: TabularStore): Promise<Set<string>> {
  const ids = await store.readColumn(1);
  return new Set(ids.slice(1));
}

/** Used rows, header included. */
export async function countRows(store: TabularStore): Promise<number> {
  return (await store.readAllValues()).length;
}

export function toRow(record: ReviewRecord): CellValue[] {
  return [record.id, record.appName, record.reviewDate, record.rating, record.insertedOn, record.text];
}

/** 1-based column index to A1 letters: 1 → A, 27 → AA. */
export function columnLetter(col: number): string {
  if (!Number.isInteger(col) || col < 1) {
    throw new RangeError(`Invalid column index ${col}`);
  }
  let out = '';
  for (let n = col; n > 0; n = Math.floor((n - 1) / 26)) {
    out = String.fromCharCode(65 + ((n - 1) % 26)) + out;
  }
  return out;
}
