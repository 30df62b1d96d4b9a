import { z } from 'zod';
import type { DbClient } from './driver.js';
import type { TabularStore } from './tabular.js';
import { initSchema } from './schema.js';
import type { CellValue } from '../types/index.js';

const cellsSchema = z.array(z.string());

interface RowRecord {
  row_num: number;
  cells: string;
}

function decodeCells(raw: string, rowNum: number): string[] {
  const parsed = cellsSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Corrupt sheet row ${rowNum}: expected an array of strings`);
  }
  return parsed.data;
}

/**
 * A worksheet kept in SQL: one `sheet_rows` record per row, cells as a JSON
 * array of strings. Values are stored the way a spreadsheet reads them back,
 * so numbers come out as their string form.
 */
export class SqlSheetStore implements TabularStore {
  readonly location: string;

  private constructor(private readonly db: DbClient, private readonly sheet: string) {
    this.location = `${db.dialect}:${sheet}`;
  }

  static async open(db: DbClient, sheet: string): Promise<SqlSheetStore> {
    await initSchema(db);
    return new SqlSheetStore(db, sheet);
  }

  async exists(): Promise<boolean> {
    const row = await this.db.get<{ name: string }>('SELECT name FROM sheets WHERE name = ?', [this.sheet]);
    return row !== undefined;
  }

  async create(): Promise<void> {
    await this.db.run('INSERT INTO sheets (name, created_at) VALUES (?, ?)', [this.sheet, new Date().toISOString()]);
  }

  async readAllValues(): Promise<string[][]> {
    const rows = await this.db.all<RowRecord>(
      'SELECT row_num, cells FROM sheet_rows WHERE sheet = ? ORDER BY row_num',
      [this.sheet],
    );
    return rows.map(r => decodeCells(r.cells, r.row_num));
  }

  async readColumn(col: number): Promise<string[]> {
    const values = await this.readAllValues();
    const column = values.map(cells => cells[col - 1] ?? '');
    // Spreadsheets drop trailing empty cells of a column
    while (column.length > 0 && column[column.length - 1] === '') column.pop();
    return column;
  }

  async appendRows(rows: CellValue[][]): Promise<void> {
    if (rows.length === 0) return;
    await this.db.transaction(async () => {
      let next = (await this.lastRowNum()) + 1;
      for (const row of rows) {
        await this.db.run(
          'INSERT INTO sheet_rows (sheet, row_num, cells) VALUES (?, ?, ?)',
          [this.sheet, next++, JSON.stringify(row.map(String))],
        );
      }
    });
  }

  async updateCell(row: number, col: number, value: CellValue): Promise<void> {
    if (!Number.isInteger(row) || row < 1 || !Number.isInteger(col) || col < 1) {
      throw new RangeError(`Invalid cell R${row}C${col}`);
    }
    await this.db.transaction(async () => {
      const existing = await this.db.get<RowRecord>(
        'SELECT row_num, cells FROM sheet_rows WHERE sheet = ? AND row_num = ?',
        [this.sheet, row],
      );
      const last = await this.lastRowNum();
      if (!existing && row !== last + 1) {
        throw new RangeError(`Row ${row} is past the end of sheet ${this.sheet} (${last} rows)`);
      }

      const cells = existing ? decodeCells(existing.cells, row) : [];
      while (cells.length < col) cells.push('');
      cells[col - 1] = String(value);

      if (existing) {
        await this.db.run(
          'UPDATE sheet_rows SET cells = ? WHERE sheet = ? AND row_num = ?',
          [JSON.stringify(cells), this.sheet, row],
        );
      } else {
        await this.db.run(
          'INSERT INTO sheet_rows (sheet, row_num, cells) VALUES (?, ?, ?)',
          [this.sheet, row, JSON.stringify(cells)],
        );
      }
    });
  }

  async close(): Promise<void> {
    await this.db.close();
  }

  private async lastRowNum(): Promise<number> {
    const row = await this.db.get<{ max_row: number | null }>(
      'SELECT MAX(row_num) AS max_row FROM sheet_rows WHERE sheet = ?',
      [this.sheet],
    );
    return row?.max_row ?? 0;
  }
}
