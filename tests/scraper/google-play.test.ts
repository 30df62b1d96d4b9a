import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { GooglePlaySource, SORT_NEWEST, toReviewPage } from '../../src/scraper/google-play.js';
import type { PlayReviewsOptions } from '../../src/scraper/google-play.js';

describe('toReviewPage', () => {
  it('maps reviews and keeps the continuation token', () => {
    const page = toReviewPage({
      data: [
        { id: 'gp:1', userName: 'A', date: '2025-07-10T04:30:00.000Z', score: 5, text: 'Nice', thumbsUp: 2 },
        { id: 'gp:2', userName: 'B', date: '2025-07-09T04:30:00.000Z', score: 1, text: null },
      ],
      nextPaginationToken: 'tok-2',
    });

    assert.equal(page.nextToken, 'tok-2');
    assert.deepEqual(page.reviews, [
      { id: 'gp:1', at: new Date('2025-07-10T04:30:00.000Z'), rating: 5, text: 'Nice' },
      { id: 'gp:2', at: new Date('2025-07-09T04:30:00.000Z'), rating: 1, text: null },
    ]);
  });

  it('omits the token on the last page', () => {
    const page = toReviewPage({ data: [], nextPaginationToken: null });
    assert.deepEqual(page, { reviews: [] });
  });

  it('accepts Date objects', () => {
    const at = new Date('2025-07-10T04:30:00Z');
    const page = toReviewPage({ data: [{ id: 'x', date: at, score: 3 }] });
    assert.equal(page.reviews[0].at.getTime(), at.getTime());
    assert.equal(page.reviews[0].text, null);
  });

  it('rejects a malformed response', () => {
    assert.throws(() => toReviewPage({ reviews: [] }), /Unexpected Google Play response at data/);
  });

  it('rejects an unparseable date', () => {
    assert.throws(
      () => toReviewPage({ data: [{ id: 'x', date: 'yesterday', score: 3, text: 'hi' }] }),
      /Review x has an invalid date "yesterday"/,
    );
  });
});

describe('GooglePlaySource', () => {
  const locale = { lang: 'en', country: 'in', pageSize: 200 };

  function recordingSource(response: unknown): { source: GooglePlaySource; requests: PlayReviewsOptions[] } {
    const requests: PlayReviewsOptions[] = [];
    const source = new GooglePlaySource(locale, async (options) => {
      requests.push(options);
      return response;
    });
    return { source, requests };
  }

  it('asks for the newest reviews first without a token on the first page', async () => {
    const { source, requests } = recordingSource({ data: [], nextPaginationToken: 'tok-2' });
    const page = await source.fetchPage('com.example.alpha');

    assert.deepEqual(requests, [{
      appId: 'com.example.alpha',
      lang: 'en',
      country: 'in',
      sort: SORT_NEWEST,
      num: 200,
      paginate: true,
    }]);
    assert.deepEqual(page, { reviews: [], nextToken: 'tok-2' });
  });

  it('passes the continuation token for later pages', async () => {
    const { source, requests } = recordingSource({ data: [] });
    await source.fetchPage('com.example.alpha', 'tok-2');

    assert.deepEqual(requests, [{
      appId: 'com.example.alpha',
      lang: 'en',
      country: 'in',
      sort: SORT_NEWEST,
      num: 200,
      paginate: true,
      nextPaginationToken: 'tok-2',
    }]);
  });

  it('rejects when the response does not validate', async () => {
    const { source } = recordingSource({ results: [] });
    await assert.rejects(source.fetchPage('com.example.alpha'), /Unexpected Google Play response at data/);
  });
});
