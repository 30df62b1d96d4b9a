import { config } from '../config.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { openStore } from '../store/open.js';
import { setupStore } from '../store/tabular.js';
import type { SetupResult, TabularStore } from '../store/tabular.js';
import { loadHarvestSettings } from '../yaml-config.js';
import type { HarvestSettings } from '../types/index.js';

export interface CliContext {
  settings: HarvestSettings;
  store: TabularStore;
  setup: SetupResult;
  logger: Logger;
}

/**
 * Load settings, open the store and make sure its header is complete.
 * Every failure here is fatal and happens before any ingestion.
 */
export async function openContext(
  override?: (settings: HarvestSettings) => HarvestSettings,
): Promise<CliContext> {
  const logger = createLogger();
  const loaded = loadHarvestSettings();
  const settings = override ? override(loaded) : loaded;
  const store = await openStore(config, settings.store);
  try {
    const setup = await setupStore(store, logger);
    return { settings, store, setup, logger };
  } catch (err) {
    await store.close();
    throw err;
  }
}
