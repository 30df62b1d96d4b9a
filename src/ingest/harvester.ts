import type { Logger } from 'pino';
import { ConfigError } from '../errors.js';
import { countRows, loadExistingIds, toRow } from '../store/tabular.js';
import type { TabularStore } from '../store/tabular.js';
import { civilDate } from './civil-time.js';
import { walkReviews, sleep } from './walker.js';
import { planWindow } from './window.js';
import type {
  AppOutcome,
  HarvestSettings,
  HarvestSummary,
  ReviewSource,
  TrackedApp,
} from '../types/index.js';

export interface HarvesterDeps {
  store: TabularStore;
  source: ReviewSource;
  logger: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface RunOptions {
  /** Walk and count without writing to the store. */
  dryRun?: boolean;
  /** Restrict the run to one configured app, by id or name. */
  only?: string;
}

export class Harvester {
  constructor(
    private readonly settings: HarvestSettings,
    private readonly deps: HarvesterDeps,
  ) {}

  selectApps(only?: string): readonly TrackedApp[] {
    if (!only) return this.settings.apps;
    const match = this.settings.apps.filter(a => a.id === only || a.name === only);
    if (match.length === 0) {
      throw new ConfigError(`App "${only}" is not in the configured app list`);
    }
    return match;
  }

  async run(opts: RunOptions = {}): Promise<HarvestSummary> {
    const { store, source, logger } = this.deps;
    const { settings } = this;
    const now = this.deps.now ?? (() => new Date());
    const dryRun = opts.dryRun ?? false;
    const apps = this.selectApps(opts.only);

    const window = planWindow(settings.backfill, now(), settings.offsetMinutes);
    const seen = await loadExistingIds(store);
    const existingIds = seen.size;
    logger.info({
      existing_ids: existingIds,
      window_start: window.start.toISOString(),
      window_end: window.end.toISOString(),
      last_day: civilDate(new Date(window.end.getTime() - 1), settings.offsetMinutes),
      dry_run: dryRun,
    }, 'Harvest started');

    const outcomes: AppOutcome[] = [];
    let totalAdded = 0;
    let limitReached = false;

    for (const app of apps) {
      if (limitReached) {
        outcomes.push({ app, added: 0, pages: 0, stop: 'skipped' });
        continue;
      }

      const used = await countRows(store);
      if (used >= settings.maxRows) {
        logger.warn({ used, max_rows: settings.maxRows, app: app.name }, 'Row limit reached, stopping');
        limitReached = true;
        outcomes.push({ app, added: 0, pages: 0, stop: 'skipped' });
        continue;
      }

      const result = await walkReviews(source, app, seen, {
        window,
        minTextLength: settings.minTextLength,
        offsetMinutes: settings.offsetMinutes,
        delay: settings.delay,
        logger,
        now,
        sleep: this.deps.sleep ?? sleep,
        random: this.deps.random,
      });

      if (result.records.length > 0 && !dryRun) {
        await store.appendRows(result.records.map(toRow));
      }
      totalAdded += result.records.length;

      logger.info({
        app: app.name,
        added: result.records.length,
        pages: result.pages,
        stop: result.stop,
      }, result.records.length > 0 ? 'App harvested' : 'No new reviews');

      outcomes.push({
        app,
        added: result.records.length,
        pages: result.pages,
        stop: result.stop,
        ...(result.error ? { error: result.error } : {}),
      });
    }

    logger.info({ total_added: totalAdded, limit_reached: limitReached }, 'Harvest complete');
    return { window, existingIds, totalAdded, apps: outcomes, limitReached, dryRun };
  }
}
