import { Command } from 'commander';
import { civilDate } from '../ingest/civil-time.js';
import { planWindow } from '../ingest/window.js';
import { countRows, loadExistingIds } from '../store/tabular.js';
import { openContext } from './context.js';
import { exitOnSetupError, isJsonMode, outputJson, outputTable } from './helpers.js';

async function showStatus(opts: { json?: boolean }): Promise<void> {
  const { settings, store } = await openContext();
  try {
    const rows = await countRows(store);
    const ids = await loadExistingIds(store);
    const window = planWindow(settings.backfill, new Date(), settings.offsetMinutes);
    const lastDay = civilDate(new Date(window.end.getTime() - 1), settings.offsetMinutes);

    if (isJsonMode(opts)) {
      outputJson({
        store: store.location,
        rows,
        max_rows: settings.maxRows,
        known_reviews: ids.size,
        window: { start: window.start.toISOString(), end: window.end.toISOString(), last_day: lastDay },
        apps: settings.apps,
      });
      return;
    }
    console.log(`Store:   ${store.location}`);
    console.log(`Rows:    ${rows} / ${settings.maxRows}`);
    console.log(`Reviews: ${ids.size}`);
    console.log(`Window:  ${window.start.toISOString()} → ${lastDay} (inclusive)`);
    console.log('');
    outputTable(['name', 'app id'], settings.apps.map(a => [a.name, a.id]));
  } finally {
    await store.close();
  }
}

export const statusCommand = new Command('status')
  .description('Show store size, known reviews and the window the next run would use')
  .option('--json', 'Force JSON output')
  .action(async (opts: { json?: boolean }) => {
    await showStatus(opts).catch(exitOnSetupError);
  });
