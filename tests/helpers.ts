import { SqliteClient } from '../src/store/sqlite.js';
import { SqlSheetStore } from '../src/store/sql-sheet.js';
import type { HarvestSettings, RawReview, ReviewPage, ReviewSource } from '../src/types/index.js';

export async function createTestStore(sheet = 'Raw_Reviews'): Promise<SqlSheetStore> {
  return SqlSheetStore.open(new SqliteClient(':memory:'), sheet);
}

export function review(id: string, iso: string, text: string | null, rating = 4): RawReview {
  return { id, at: new Date(iso), rating, text };
}

/** Serves scripted pages per app; a page may be an Error to simulate a transport failure. */
export class FakeSource implements ReviewSource {
  readonly calls: { appId: string; token?: string }[] = [];

  constructor(private readonly pages: Record<string, (RawReview[] | Error)[]>) {}

  async fetchPage(appId: string, token?: string): Promise<ReviewPage> {
    this.calls.push({ appId, token });
    const script = this.pages[appId] ?? [];
    const index = token ? Number(token) : 0;
    const entry = script[index];
    if (entry === undefined) return { reviews: [] };
    if (entry instanceof Error) throw entry;
    return index + 1 < script.length
      ? { reviews: entry, nextToken: String(index + 1) }
      : { reviews: entry };
  }
}

export const LONG_TEXT = 'This app is really useful for my daily budgeting needs';

export function testSettings(overrides: Partial<HarvestSettings> = {}): HarvestSettings {
  return {
    apps: [
      { name: 'Alpha', id: 'com.example.alpha' },
      { name: 'Beta', id: 'com.example.beta' },
    ],
    backfill: { kind: 'fixed', at: new Date('2025-07-01T00:00:00Z') },
    minTextLength: 30,
    maxRows: 500_000,
    offsetMinutes: 330,
    source: { lang: 'en', country: 'in', pageSize: 200 },
    delay: { minMs: 0, maxMs: 0 },
    store: { sheetName: 'Raw_Reviews' },
    ...overrides,
  };
}

export const noSleep = async (): Promise<void> => {};
