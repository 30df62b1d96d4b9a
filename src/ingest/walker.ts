import type { Logger } from 'pino';
import { errorMessage } from '../errors.js';
import { formatCivil } from './civil-time.js';
import { fingerprint } from './fingerprint.js';
import { textLength, trimText } from './text.js';
import type {
  DelayRange,
  IngestionWindow,
  PageResult,
  ReviewRecord,
  ReviewSource,
  TrackedApp,
  WalkResult,
} from '../types/index.js';

export interface WalkOptions {
  window: IngestionWindow;
  minTextLength: number;
  offsetMinutes: number;
  delay: DelayRange;
  logger: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function pickDelay(range: DelayRange, random: () => number = Math.random): number {
  return range.minMs + random() * (range.maxMs - range.minMs);
}

export async function fetchPage(source: ReviewSource, appId: string, token?: string): Promise<PageResult> {
  try {
    return { ok: true, page: await source.fetchPage(appId, token) };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

/**
 * Walk one app's review stream newest-first and collect every review inside
 * the window that passes the length filter and is not in `seen`.
 *
 * `seen` is extended in place. The first review older than `window.start`
 * ends the walk; the source is trusted to be reverse-chronological, so nothing
 * past that point is scanned. A failed page fetch ends the walk too, but the
 * records gathered so far are still returned.
 */
export async function walkReviews(
  source: ReviewSource,
  app: TrackedApp,
  seen: Set<string>,
  opts: WalkOptions,
): Promise<WalkResult> {
  const { window, minTextLength, offsetMinutes, logger } = opts;
  const now = opts.now ?? (() => new Date());
  const pause = opts.sleep ?? sleep;
  const log = logger.child({ app: app.name });

  const records: ReviewRecord[] = [];
  let token: string | undefined;
  let pages = 0;

  for (;;) {
    if (pages > 0) {
      await pause(pickDelay(opts.delay, opts.random));
    }

    const result = await fetchPage(source, app.id, token);
    if (!result.ok) {
      log.warn({ page: pages + 1, error: result.error, kept: records.length }, 'Review page fetch failed');
      return { records, pages, stop: 'error', error: result.error };
    }
    pages++;

    let accepted = 0;
    for (const raw of result.page.reviews) {
      const at = raw.at.getTime();
      if (at >= window.end.getTime()) continue;

      if (at < window.start.getTime()) {
        log.info({ page: pages, accepted, boundary: raw.at.toISOString() }, 'Reached backfill start');
        return { records, pages, stop: 'boundary', boundaryAt: raw.at };
      }

      const text = trimText(raw.text ?? '');
      if (textLength(text) <= minTextLength) continue;

      const reviewDate = formatCivil(raw.at, offsetMinutes);
      const id = fingerprint(app.id, text, reviewDate);
      if (seen.has(id)) continue;

      records.push({
        id,
        appName: app.name,
        reviewDate,
        rating: raw.rating,
        insertedOn: formatCivil(now(), offsetMinutes),
        text,
      });
      seen.add(id);
      accepted++;
    }

    log.info({ page: pages, fetched: result.page.reviews.length, accepted }, 'Fetched review page');

    token = result.page.nextToken || undefined;
    if (!token) {
      return { records, pages, stop: 'exhausted' };
    }
  }
}
