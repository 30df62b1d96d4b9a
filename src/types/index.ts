export interface TrackedApp {
  name: string;
  id: string;
}

/** A review as the source hands it over, before any filtering. */
export interface RawReview {
  id: string;
  at: Date;
  rating: number;
  text: string | null;
}

export interface ReviewPage {
  reviews: RawReview[];
  /** Absent or empty when the stream is exhausted. */
  nextToken?: string;
}

export type PageResult =
  | { ok: true; page: ReviewPage }
  | { ok: false; error: string };

export interface ReviewSource {
  fetchPage(appId: string, token?: string): Promise<ReviewPage>;
}

export interface ReviewRecord {
  id: string;
  appName: string;
  reviewDate: string;
  rating: number;
  insertedOn: string;
  text: string;
}

export interface IngestionWindow {
  start: Date;
  end: Date;
}

export type BackfillStart =
  | { kind: 'fixed'; at: Date }
  | { kind: 'lookback'; days: number };

export interface SourceLocale {
  lang: string;
  country: string;
  pageSize: number;
}

export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export interface StoreSettings {
  sheetId?: string;
  sheetName: string;
}

export interface HarvestSettings {
  readonly apps: readonly TrackedApp[];
  readonly backfill: BackfillStart;
  readonly minTextLength: number;
  readonly maxRows: number;
  readonly offsetMinutes: number;
  readonly source: SourceLocale;
  readonly delay: DelayRange;
  readonly store: StoreSettings;
}

export type WalkStop = 'exhausted' | 'boundary' | 'error';

export interface WalkResult {
  records: ReviewRecord[];
  pages: number;
  stop: WalkStop;
  boundaryAt?: Date;
  error?: string;
}

export interface AppOutcome {
  app: TrackedApp;
  added: number;
  pages: number;
  stop: WalkStop | 'skipped';
  error?: string;
}

export interface HarvestSummary {
  window: IngestionWindow;
  existingIds: number;
  totalAdded: number;
  apps: AppOutcome[];
  limitReached: boolean;
  dryRun: boolean;
}

export type CellValue = string | number;
