import { parse } from 'yaml';
import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import { config } from './config.js';
import { ConfigError } from './errors.js';
import { parseOffset } from './ingest/civil-time.js';
import type { BackfillStart, HarvestSettings } from './types/index.js';

const DATE_RE = /^\d{4}-\d{2}-\d{2}(T.*)?$/;

const appSchema = z.object({
  name: z.string().min(1),
  id: z.coerce.string().min(1),
});

const backfillSchema = z.union([
  z.object({ start: z.string().regex(DATE_RE, 'expected YYYY-MM-DD or an ISO timestamp') }).strict(),
  z.object({ lookback_days: z.number().int().positive() }).strict(),
]);

const fileSchema = z.object({
  apps: z.array(appSchema).min(1),
  backfill: backfillSchema,
  min_text_length: z.number().int().nonnegative().default(30),
  max_rows: z.number().int().positive().default(500_000),
  timezone_offset: z.string().default('+05:30'),
  source: z.object({
    lang: z.string().default('en'),
    country: z.string().default('in'),
    page_size: z.number().int().positive().max(4500).default(200),
    delay_seconds: z.tuple([z.number().nonnegative(), z.number().nonnegative()]).default([1, 3]),
  }).default({}),
  store: z.object({
    sheet_id: z.string().optional(),
    sheet_name: z.string().min(1).default('Raw_Reviews'),
  }).default({}),
});

export type HarvestFile = z.infer<typeof fileSchema>;

export function getConfigPath(): string {
  return config.harvestConfig;
}

export function loadHarvestSettings(path?: string): HarvestSettings {
  const configPath = path ?? getConfigPath();
  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }
  const raw = readFileSync(configPath, 'utf-8');
  return parseHarvestSettings(raw);
}

/**
 * Parse and validate the YAML harvest config. Dates without a time part are
 * taken as UTC midnight.
 */
export function parseHarvestSettings(raw: string): HarvestSettings {
  let doc: unknown;
  try {
    doc = parse(raw);
  } catch (err) {
    throw new ConfigError(`Config is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = fileSchema.safeParse(doc);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(`Invalid config at ${where}: ${issue.message}`);
  }
  const file = result.data;

  const seen = new Set<string>();
  for (const app of file.apps) {
    if (seen.has(app.id)) {
      throw new ConfigError(`Duplicate app id "${app.id}"`);
    }
    seen.add(app.id);
  }

  const [minDelay, maxDelay] = file.source.delay_seconds;
  if (minDelay > maxDelay) {
    throw new ConfigError(`source.delay_seconds must be [min, max], got [${minDelay}, ${maxDelay}]`);
  }

  const offsetMinutes = parseOffset(file.timezone_offset);
  if (offsetMinutes === null) {
    throw new ConfigError(`Invalid timezone_offset "${file.timezone_offset}" (expected ±HH:MM)`);
  }

  const sheetId = config.sheetId ?? file.store.sheet_id;

  return Object.freeze({
    apps: Object.freeze(file.apps.map(a => Object.freeze({ name: a.name, id: a.id }))),
    backfill: toBackfill(file.backfill),
    minTextLength: file.min_text_length,
    maxRows: file.max_rows,
    offsetMinutes,
    source: Object.freeze({
      lang: file.source.lang,
      country: file.source.country,
      pageSize: file.source.page_size,
    }),
    delay: Object.freeze({ minMs: minDelay * 1000, maxMs: maxDelay * 1000 }),
    store: Object.freeze({
      ...(sheetId ? { sheetId } : {}),
      sheetName: file.store.sheet_name,
    }),
  });
}

export function parseStartDate(value: string): Date {
  const iso = value.length === 10 ? `${value}T00:00:00Z` : value;
  const at = new Date(iso);
  if (Number.isNaN(at.getTime())) {
    throw new ConfigError(`Invalid backfill start "${value}"`);
  }
  return at;
}

function toBackfill(b: HarvestFile['backfill']): BackfillStart {
  if ('lookback_days' in b) {
    return { kind: 'lookback', days: b.lookback_days };
  }
  return { kind: 'fixed', at: parseStartDate(b.start) };
}
