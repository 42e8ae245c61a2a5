import { describe, it, expect, vi } from 'vitest';
import type { GoogleTrendsApi, TrendsQueryOptions } from 'google-trends-api';

import {
  createTrendsClient,
  parseInterestOverTime,
  parseRegionalInterest,
  parseRelatedQueries,
  parseRelatedTopics,
  trendsToResearchContext,
} from '../../../src/ai/tools/trends';
import { createMockClock } from '../../../src/ai/blog/types';

const silentLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

function timeline(values: number[]): string {
  return JSON.stringify({ default: { timelineData: values.map((value) => ({ value: [value] })) } });
}

function rankedQueries(top: string[], rising: string[]): string {
  const list = (queries: string[]) => ({ rankedKeyword: queries.map((query) => ({ query })) });
  return JSON.stringify({ default: { rankedList: [list(top), list(rising)] } });
}

function rankedTopics(top: string[], rising: string[]): string {
  const list = (titles: string[]) => ({ rankedKeyword: titles.map((title) => ({ topic: { title } })) });
  return JSON.stringify({ default: { rankedList: [list(top), list(rising)] } });
}

function geoMap(entries: Array<[string, number]>): string {
  return JSON.stringify({
    default: { geoMapData: entries.map(([geoName, value]) => ({ geoName, value: [value] })) },
  });
}

function fakeApi(overrides: Partial<GoogleTrendsApi> = {}) {
  return {
    interestOverTime: vi.fn<(options: TrendsQueryOptions) => Promise<string>>().mockResolvedValue(timeline([50, 50])),
    relatedQueries: vi
      .fn<(options: TrendsQueryOptions) => Promise<string>>()
      .mockResolvedValue(rankedQueries(['top query'], ['rising query'])),
    relatedTopics: vi
      .fn<(options: TrendsQueryOptions) => Promise<string>>()
      .mockResolvedValue(rankedTopics(['Top Topic'], ['Rising Topic'])),
    interestByRegion: vi
      .fn<(options: TrendsQueryOptions) => Promise<string>>()
      .mockResolvedValue(geoMap([['Canada', 40]])),
    ...overrides,
  };
}

describe('parsers', () => {
  it('scores interest and flags a rising tail as trending', () => {
    // mean 45, last four average 65 > 45 * 1.2
    expect(parseInterestOverTime(timeline([10, 20, 30, 40, 50, 60, 70, 80]))).toEqual({
      interestScore: 45,
      isTrending: true,
    });
  });

  it('does not flag flat interest as trending', () => {
    expect(parseInterestOverTime(timeline([10, 11]))).toEqual({ interestScore: 10, isTrending: false });
  });

  it('handles an empty timeline', () => {
    expect(parseInterestOverTime(timeline([]))).toEqual({ interestScore: 0, isTrending: false });
  });

  it('splits top and rising queries', () => {
    expect(parseRelatedQueries(rankedQueries(['a', 'b'], ['c']))).toEqual({
      relatedQueries: ['a', 'b'],
      risingQueries: ['c'],
    });
  });

  it('caps topics at five', () => {
    const topics = parseRelatedTopics(rankedTopics(['1', '2', '3', '4', '5', '6'], []));

    expect(topics.relatedTopics).toEqual(['1', '2', '3', '4', '5']);
    expect(topics.risingTopics).toEqual([]);
  });

  it('keeps only regions with interest', () => {
    expect(parseRegionalInterest(geoMap([['Canada', 40], ['Chad', 0]]))).toEqual({ Canada: 40 });
  });

  it('throws on an unexpected body', () => {
    expect(() => parseRelatedQueries('{"default":{}}')).toThrow();
  });
});

describe('createTrendsClient', () => {
  it('combines the four lookups', async () => {
    const api = fakeApi();
    const client = createTrendsClient({ api, clock: createMockClock(1_700_000_000_000), logger: silentLogger });

    const result = await client.lookup(' unit testing ');

    expect(result).toEqual({
      ok: true,
      data: {
        term: 'unit testing',
        interestScore: 50,
        isTrending: false,
        relatedQueries: ['top query'],
        risingQueries: ['rising query'],
        relatedTopics: ['Top Topic'],
        risingTopics: ['Rising Topic'],
        regionalInterest: { Canada: 40 },
      },
    });
    expect(api.interestOverTime).toHaveBeenCalledWith({
      keyword: 'unit testing',
      startTime: new Date(1_700_000_000_000 - 90 * 24 * 60 * 60 * 1000),
      geo: '',
      hl: 'en-US',
    });
    expect(api.interestByRegion).toHaveBeenCalledWith(expect.objectContaining({ resolution: 'COUNTRY' }));
  });

  it('keeps partial data when some lookups fail', async () => {
    const api = fakeApi({
      relatedQueries: vi.fn<(options: TrendsQueryOptions) => Promise<string>>().mockRejectedValue(new Error('429')),
    });
    const client = createTrendsClient({ api, logger: silentLogger });

    const result = await client.lookup('testing');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.relatedQueries).toEqual([]);
    expect(result.data.relatedTopics).toEqual(['Top Topic']);
    expect(silentLogger.warn).toHaveBeenCalledWith('Could not fetch related queries for "testing": 429');
  });

  it('fails when every lookup fails', async () => {
    const failing = () => vi.fn<(options: TrendsQueryOptions) => Promise<string>>().mockRejectedValue(new Error('blocked'));
    const api = fakeApi({
      interestOverTime: failing(),
      relatedQueries: failing(),
      relatedTopics: failing(),
      interestByRegion: failing(),
    });
    const client = createTrendsClient({ api, logger: silentLogger });

    const result = await client.lookup('testing');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.term).toBe('testing');
    expect(result.error).toContain('interest over time: blocked');
    expect(result.error).toContain('regional interest: blocked');
  });

  it('skips the regional lookup when disabled', async () => {
    const api = fakeApi();
    const client = createTrendsClient({ api, includeRegional: false, logger: silentLogger });

    const result = await client.lookup('testing');

    expect(api.interestByRegion).not.toHaveBeenCalled();
    expect(result.ok && result.data.regionalInterest).toEqual({});
  });

  it('rejects an empty term without calling the API', async () => {
    const api = fakeApi();
    const client = createTrendsClient({ api, logger: silentLogger });

    expect(await client.lookup('  ')).toEqual({ ok: false, term: '  ', error: 'Empty search term' });
    expect(api.interestOverTime).not.toHaveBeenCalled();
  });
});

describe('trendsToResearchContext', () => {
  it('renders the available blocks', () => {
    const text = trendsToResearchContext({
      term: 'unit testing',
      interestScore: 45,
      isTrending: true,
      relatedQueries: ['a', 'b'],
      risingQueries: ['r1'],
      relatedTopics: [],
      risingTopics: ['t1'],
      regionalInterest: { Canada: 40, Brazil: 80 },
    });

    expect(text).toBe(
      [
        '## Google Trends Data for: unit testing',
        '',
        '**Interest Score:** 45/100',
        '**Status:** Currently trending',
        '',
        '**Rising Searches (hot topics to cover):**',
        '- r1',
        '',
        '**Related Searches (what people also search):**',
        '- a',
        '- b',
        '',
        '**Rising Topics:**',
        '- t1',
        '',
        '**Top Regions:**',
        '- Brazil: 80%',
        '- Canada: 40%',
      ].join('\n')
    );
  });

  it('renders only the heading when there is no data', () => {
    expect(
      trendsToResearchContext({
        term: 'x',
        interestScore: 0,
        isTrending: false,
        relatedQueries: [],
        risingQueries: [],
        relatedTopics: [],
        risingTopics: [],
        regionalInterest: {},
      })
    ).toBe('## Google Trends Data for: x\n');
  });
});
