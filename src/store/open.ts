import type { Config } from '../config.js';
import type { StoreSettings } from '../types/index.js';
import type { TabularStore } from './tabular.js';

/**
 * Google Sheets when a spreadsheet id is configured, otherwise a SQL-backed
 * sheet (PostgreSQL with `HARVEST_DB_URL`, SQLite at `HARVEST_DB_PATH`).
 */
export async function openStore(
  cfg: Pick<Config, 'dbUrl' | 'dbPath' | 'credentialsPath'>,
  store: StoreSettings,
): Promise<TabularStore> {
  if (store.sheetId) {
    const { GoogleSheetStore } = await import('./google-sheet.js');
    return GoogleSheetStore.connect({
      spreadsheetId: store.sheetId,
      sheetName: store.sheetName,
      credentialsPath: cfg.credentialsPath,
    });
  }
  const { createDbClient } = await import('./driver.js');
  const { SqlSheetStore } = await import('./sql-sheet.js');
  const db = await createDbClient(cfg);
  return SqlSheetStore.open(db, store.sheetName);
}
