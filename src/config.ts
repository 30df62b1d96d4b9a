import { config as dotenvLoad } from 'dotenv';
import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

export function expandTilde(p: string): string {
  if (p === '~' || p.startsWith('~/')) {
    return homedir() + p.slice(1);
  }
  return p;
}

const envFile = process.env.HARVEST_ENV_FILE ?? join(process.cwd(), '.env');
if (existsSync(envFile)) {
  dotenvLoad({ path: envFile });
}

const DEFAULT_DB_PATH = join(homedir(), '.revharvest', 'reviews.db');
const DEFAULT_CONFIG_PATH = join(homedir(), '.revharvest', 'config.yaml');

export const config = {
  harvestConfig:   expandTilde(process.env.HARVEST_CONFIG ?? DEFAULT_CONFIG_PATH),
  credentialsPath: expandTilde(process.env.GOOGLE_APPLICATION_CREDENTIALS ?? '/tmp/sa.json'),
  sheetId:         process.env.HARVEST_SHEET_ID,
  dbUrl:           process.env.HARVEST_DB_URL,
  dbPath:          expandTilde(process.env.HARVEST_DB_PATH ?? DEFAULT_DB_PATH),
  logLevel:        process.env.LOG_LEVEL ?? 'info',
} as const;

export type Config = typeof config;
