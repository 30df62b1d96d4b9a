import { z } from 'zod';
import type { RawReview, ReviewPage, ReviewSource, SourceLocale } from '../types/index.js';

const reviewSchema = z.object({
  id: z.string(),
  date: z.union([z.string(), z.date()]),
  score: z.number(),
  text: z.string().nullish(),
});

const responseSchema = z.object({
  data: z.array(reviewSchema),
  nextPaginationToken: z.string().nullish(),
});

/** Validate a raw google-play-scraper `reviews()` response and map it to a page. */
export function toReviewPage(response: unknown): ReviewPage {
  const parsed = responseSchema.safeParse(response);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Unexpected Google Play response at ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }

  const reviews: RawReview[] = parsed.data.data.map(r => {
    const at = r.date instanceof Date ? r.date : new Date(r.date);
    if (Number.isNaN(at.getTime())) {
      throw new Error(`Review ${r.id} has an invalid date "${String(r.date)}"`);
    }
    return { id: r.id, at, rating: r.score, text: r.text ?? null };
  });

  const token = parsed.data.nextPaginationToken;
  return token ? { reviews, nextToken: token } : { reviews };
}

/** google-play-scraper's `sort.NEWEST`. */
export const SORT_NEWEST = 2;

export interface PlayReviewsOptions {
  appId: string;
  lang: string;
  country: string;
  sort: number;
  num: number;
  paginate: true;
  nextPaginationToken?: string;
}

export type PlayReviewsFn = (options: PlayReviewsOptions) => Promise<unknown>;

async function playReviews(options: PlayReviewsOptions): Promise<unknown> {
  const { default: gplay } = await import('google-play-scraper');
  return gplay.reviews(options);
}

/** Newest-first review pages from the Google Play store listing. */
export class GooglePlaySource implements ReviewSource {
  constructor(
    private readonly locale: SourceLocale,
    private readonly reviews: PlayReviewsFn = playReviews,
  ) {}

  async fetchPage(appId: string, token?: string): Promise<ReviewPage> {
    const response = await this.reviews({
      appId,
      lang: this.locale.lang,
      country: this.locale.country,
      sort: SORT_NEWEST,
      num: this.locale.pageSize,
      paginate: true,
      ...(token ? { nextPaginationToken: token } : {}),
    });
    return toReviewPage(response);
  }
}
