/**
 * Collaborator Types
 *
 * Capability interfaces for the external services the pipeline talks to:
 * web search, page fetching and trends lookup. Production implementations
 * live beside this file; tests substitute in-process fakes.
 */

// ============================================================================
// Search
// ============================================================================

/**
 * One search hit. Identity key is `url`.
 */
export interface SearchResult {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
  /** Host of `url` without a leading `www.` */
  readonly sourceDomain: string;
}

export interface SearchClient {
  /** Ordered results. Never rejects: failures yield an empty list. */
  search(query: string, maxResults: number, signal?: AbortSignal): Promise<readonly SearchResult[]>;
}

// ============================================================================
// Fetch / Scrape
// ============================================================================

export interface ScrapeSuccess {
  readonly success: true;
  readonly url: string;
  readonly title: string;
  readonly bodyText: string;
  readonly metaDescription: string;
  readonly headings: readonly string[];
  readonly wordCount: number;
}

export interface ScrapeFailure {
  readonly success: false;
  readonly url: string;
  readonly errorDetail: string;
}

/**
 * Result of fetching one page. Failed fetches carry no text and are
 * excluded from synthesis input.
 */
export type ScrapedContent = ScrapeSuccess | ScrapeFailure;

export interface FetchClient {
  /** Never rejects: failures are encoded as `success: false`. */
  fetch(url: string, signal?: AbortSignal): Promise<ScrapedContent>;
}

// ============================================================================
// Trends
// ============================================================================

export interface TrendsData {
  readonly term: string;
  /** Mean interest over the lookup window, 0-100 */
  readonly interestScore: number;
  readonly isTrending: boolean;
  readonly relatedQueries: readonly string[];
  readonly risingQueries: readonly string[];
  readonly relatedTopics: readonly string[];
  readonly risingTopics: readonly string[];
  /** Region name → interest (0-100), only regions with interest above zero */
  readonly regionalInterest: Readonly<Record<string, number>>;
}

export type TrendsLookupResult =
  | { readonly ok: true; readonly data: TrendsData }
  | { readonly ok: false; readonly term: string; readonly error: string };

export interface TrendsClient {
  /** Best-effort. Never rejects. */
  lookup(term: string): Promise<TrendsLookupResult>;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Extracts the host of a URL without `www.`, or '' for unparseable input.
 */
export function extractDomain(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return '';
  }
}

/**
 * Narrow an unknown value to a plain record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
