import { Command } from 'commander';
import { ConfigError } from '../errors.js';
import { Harvester } from '../ingest/harvester.js';
import { civilDate } from '../ingest/civil-time.js';
import { GooglePlaySource } from '../scraper/google-play.js';
import { parseStartDate } from '../yaml-config.js';
import { openContext } from './context.js';
import { exitOnSetupError, isJsonMode, outputJson, outputTable, parseDays } from './helpers.js';
import type { BackfillStart, HarvestSettings, HarvestSummary } from '../types/index.js';

interface RunCliOptions {
  app?: string;
  since?: string;
  lookback?: string;
  dryRun?: boolean;
  json?: boolean;
}

function backfillOverride(opts: RunCliOptions): BackfillStart | undefined {
  if (opts.since && opts.lookback) {
    throw new ConfigError('Use either --since or --lookback, not both');
  }
  if (opts.since) return { kind: 'fixed', at: parseStartDate(opts.since) };
  if (opts.lookback) return { kind: 'lookback', days: parseDays(opts.lookback) };
  return undefined;
}

function printSummary(summary: HarvestSummary, offsetMinutes: number): void {
  const lastDay = civilDate(new Date(summary.window.end.getTime() - 1), offsetMinutes);
  console.log(`Window: ${summary.window.start.toISOString()} → ${lastDay} (inclusive)`);
  console.log(`Loaded ${summary.existingIds} existing review ids.`);
  console.log('');
  outputTable(
    ['app', 'added', 'pages', 'stop', 'error'],
    summary.apps.map(o => [o.app.name, String(o.added), String(o.pages), o.stop, o.error ?? '']),
  );
  console.log('');
  if (summary.limitReached) {
    console.log('Row limit reached; remaining apps skipped.');
  }
  const verb = summary.dryRun ? 'would be added (dry run)' : 'added';
  console.log(`Total new rows ${verb}: ${summary.totalAdded}`);
}

async function harvest(opts: RunCliOptions): Promise<void> {
  const backfill = backfillOverride(opts);
  const override = backfill
    ? (s: HarvestSettings): HarvestSettings => Object.freeze({ ...s, backfill })
    : undefined;

  const { settings, store, logger } = await openContext(override);
  try {
    const harvester = new Harvester(settings, {
      store,
      source: new GooglePlaySource(settings.source),
      logger,
    });
    const summary = await harvester.run({ dryRun: opts.dryRun, only: opts.app });

    if (isJsonMode(opts)) {
      outputJson(summary);
    } else {
      printSummary(summary, settings.offsetMinutes);
    }
  } finally {
    await store.close();
  }
}

export const runCommand = new Command('run')
  .description('Harvest new reviews for every configured app and append them to the store')
  .option('--app <id>', 'Harvest only this app (id or name)')
  .option('--since <date>', 'Override the backfill start (YYYY-MM-DD)')
  .option('--lookback <days>', 'Override the backfill start with now minus N days')
  .option('--dry-run', 'Fetch and filter but do not write', false)
  .option('--json', 'Force JSON output')
  .action(async (opts: RunCliOptions) => {
    await harvest(opts).catch(exitOnSetupError);
  });
