import { Command } from 'commander';
import { openContext } from './context.js';
import { exitOnSetupError, isJsonMode, outputJson } from './helpers.js';

export const initCommand = new Command('init')
  .description('Create the review store or add any missing header columns')
  .option('--json', 'Force JSON output')
  .action(async (opts: { json?: boolean }) => {
    const ctx = await openContext().catch(exitOnSetupError);
    const { store, setup } = ctx;
    await store.close();

    if (isJsonMode(opts)) {
      outputJson({ store: store.location, ...setup });
      return;
    }
    if (setup.created) {
      console.log(`Created ${store.location} with header row.`);
    } else if (setup.addedHeaders.length > 0) {
      console.log(`Added missing headers to ${store.location}: ${setup.addedHeaders.join(', ')}`);
    } else {
      console.log(`${store.location} is up to date.`);
    }
  });
