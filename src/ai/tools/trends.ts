/**
 * Google Trends lookup.
 *
 * Wraps the unofficial `google-trends-api` package. Each of the four
 * lookups (interest over time, related queries, related topics, regional
 * interest) is independent; one failing only drops its part of the data.
 */

import googleTrends, { type GoogleTrendsApi, type TrendsQueryOptions } from 'google-trends-api';
import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { systemClock, type Clock } from '../blog/types';
import type { TrendsClient, TrendsData, TrendsLookupResult } from './types';

export interface TrendsClientOptions {
  /** Defaults to the google-trends-api module */
  readonly api?: GoogleTrendsApi;
  readonly clock?: Clock;
  readonly logger?: Logger;
  /** Region code, '' for worldwide */
  readonly geo?: string;
  readonly hl?: string;
  /** Lookback window for interest over time (default: 90 days) */
  readonly windowDays?: number;
  /** Skip the regional breakdown */
  readonly includeRegional?: boolean;
}

export const TRENDS_LIMITS = {
  QUERIES: 10,
  TOPICS: 5,
  /** Points averaged to decide whether the term is trending */
  RECENT_POINTS: 4,
  TRENDING_RATIO: 1.2,
} as const;

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Response Schemas
// ============================================================================

const TimelineSchema = z.object({
  default: z.object({
    timelineData: z.array(z.object({ value: z.array(z.number()) })),
  }),
});

const RankedQueriesSchema = z.object({
  default: z.object({
    rankedList: z.array(
      z.object({
        rankedKeyword: z.array(z.object({ query: z.string() })),
      })
    ),
  }),
});

const RankedTopicsSchema = z.object({
  default: z.object({
    rankedList: z.array(
      z.object({
        rankedKeyword: z.array(z.object({ topic: z.object({ title: z.string() }) })),
      })
    ),
  }),
});

const GeoMapSchema = z.object({
  default: z.object({
    geoMapData: z.array(z.object({ geoName: z.string(), value: z.array(z.number()) })),
  }),
});

function parseBody<T>(schema: z.ZodType<T>, body: string): T {
  return schema.parse(JSON.parse(body));
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

// ============================================================================
// Parsers
// ============================================================================

export function parseInterestOverTime(body: string): Pick<TrendsData, 'interestScore' | 'isTrending'> {
  const points = parseBody(TimelineSchema, body).default.timelineData.map((point) => point.value[0] ?? 0);
  if (points.length === 0) return { interestScore: 0, isTrending: false };

  const overall = mean(points);
  const recent = mean(points.slice(-TRENDS_LIMITS.RECENT_POINTS));
  return {
    interestScore: Math.trunc(overall),
    isTrending: recent > overall * TRENDS_LIMITS.TRENDING_RATIO,
  };
}

/** rankedList[0] is "top", rankedList[1] is "rising" */
export function parseRelatedQueries(body: string): Pick<TrendsData, 'relatedQueries' | 'risingQueries'> {
  const [top, rising] = parseBody(RankedQueriesSchema, body).default.rankedList;
  return {
    relatedQueries: (top?.rankedKeyword ?? []).map((k) => k.query).slice(0, TRENDS_LIMITS.QUERIES),
    risingQueries: (rising?.rankedKeyword ?? []).map((k) => k.query).slice(0, TRENDS_LIMITS.QUERIES),
  };
}

export function parseRelatedTopics(body: string): Pick<TrendsData, 'relatedTopics' | 'risingTopics'> {
  const [top, rising] = parseBody(RankedTopicsSchema, body).default.rankedList;
  return {
    relatedTopics: (top?.rankedKeyword ?? []).map((k) => k.topic.title).slice(0, TRENDS_LIMITS.TOPICS),
    risingTopics: (rising?.rankedKeyword ?? []).map((k) => k.topic.title).slice(0, TRENDS_LIMITS.TOPICS),
  };
}

export function parseRegionalInterest(body: string): Record<string, number> {
  const regions: Record<string, number> = {};
  for (const entry of parseBody(GeoMapSchema, body).default.geoMapData) {
    const value = entry.value[0] ?? 0;
    if (value > 0) regions[entry.geoName] = value;
  }
  return regions;
}

// ============================================================================
// Client
// ============================================================================

/**
 * TrendsClient over google-trends-api. Never rejects; the lookup only
 * fails as a whole when every request failed.
 */
export function createTrendsClient(options: TrendsClientOptions = {}): TrendsClient {
  const api = options.api ?? googleTrends;
  const log = options.logger ?? createPrefixedLogger('[Trends]');
  const clock = options.clock ?? systemClock;
  const windowDays = options.windowDays ?? 90;

  return {
    async lookup(term): Promise<TrendsLookupResult> {
      const keyword = term.trim();
      if (!keyword) return { ok: false, term, error: 'Empty search term' };

      const query: TrendsQueryOptions = {
        keyword,
        startTime: new Date(clock.now() - windowDays * DAY_MS),
        geo: options.geo ?? '',
        hl: options.hl ?? 'en-US',
      };

      const errors: string[] = [];
      const attempt = async <T>(label: string, run: () => Promise<T>): Promise<T | undefined> => {
        try {
          return await run();
        } catch (error) {
          const detail = error instanceof Error ? error.message : String(error);
          log.warn(`Could not fetch ${label} for "${keyword}": ${detail}`);
          errors.push(`${label}: ${detail}`);
          return undefined;
        }
      };

      const [interest, queries, topics, regions] = await Promise.all([
        attempt('interest over time', async () => parseInterestOverTime(await api.interestOverTime(query))),
        attempt('related queries', async () => parseRelatedQueries(await api.relatedQueries(query))),
        attempt('related topics', async () => parseRelatedTopics(await api.relatedTopics(query))),
        options.includeRegional === false
          ? Promise.resolve<Record<string, number>>({})
          : attempt('regional interest', async () =>
              parseRegionalInterest(await api.interestByRegion({ ...query, resolution: 'COUNTRY' }))
            ),
      ]);

      const attempted = options.includeRegional === false ? 3 : 4;
      if (errors.length === attempted) {
        return { ok: false, term: keyword, error: errors.join('; ') };
      }

      const data: TrendsData = {
        term: keyword,
        interestScore: interest?.interestScore ?? 0,
        isTrending: interest?.isTrending ?? false,
        relatedQueries: queries?.relatedQueries ?? [],
        risingQueries: queries?.risingQueries ?? [],
        relatedTopics: topics?.relatedTopics ?? [],
        risingTopics: topics?.risingTopics ?? [],
        regionalInterest: regions ?? {},
      };
      log.info(`Interest score for "${keyword}": ${data.interestScore}`);
      return { ok: true, data };
    },
  };
}

// ============================================================================
// Prompt Formatting
// ============================================================================

/**
 * Renders trends data as a markdown block for research and enhancement prompts.
 */
export function trendsToResearchContext(data: TrendsData): string {
  const lines = [`## Google Trends Data for: ${data.term}`, ''];

  if (data.interestScore > 0) {
    lines.push(`**Interest Score:** ${data.interestScore}/100`);
    if (data.isTrending) lines.push('**Status:** Currently trending');
    lines.push('');
  }

  const block = (heading: string, items: readonly string[], limit: number): void => {
    if (items.length === 0) return;
    lines.push(heading, ...items.slice(0, limit).map((item) => `- ${item}`), '');
  };

  block('**Rising Searches (hot topics to cover):**', data.risingQueries, 5);
  block('**Related Searches (what people also search):**', data.relatedQueries, 5);
  block('**Rising Topics:**', data.risingTopics, 3);

  const topRegions = Object.entries(data.regionalInterest)
    .sort(([, a], [, b]) => b - a)
    .slice(0, 5);
  if (topRegions.length > 0) {
    lines.push('**Top Regions:**', ...topRegions.map(([region, score]) => `- ${region}: ${score}%`));
  }

  return lines.join('\n');
}
