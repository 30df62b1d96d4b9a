import type { DbClient } from './driver.js';

// Portable between SQLite and PostgreSQL: timestamps are written by the app.
const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS sheets (
    name TEXT PRIMARY KEY,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS sheet_rows (
    sheet TEXT NOT NULL REFERENCES sheets(name),
    row_num INTEGER NOT NULL,
    cells TEXT NOT NULL,
    PRIMARY KEY (sheet, row_num)
  );
`;

export async function initSchema(db: DbClient): Promise<void> {
  await db.exec(SCHEMA_SQL);
}
