declare module 'google-trends-api' {
  export interface TrendsQueryOptions {
    keyword: string | string[];
    startTime?: Date;
    endTime?: Date;
    geo?: string | string[];
    hl?: string;
    timezone?: number;
    category?: number;
    property?: string;
    resolution?: 'COUNTRY' | 'REGION' | 'CITY' | 'DMA';
    granularTimeResolution?: boolean;
  }

  /** Every method resolves to the raw JSON body as a string. */
  export interface GoogleTrendsApi {
    interestOverTime(options: TrendsQueryOptions): Promise<string>;
    interestByRegion(options: TrendsQueryOptions): Promise<string>;
    relatedQueries(options: TrendsQueryOptions): Promise<string>;
    relatedTopics(options: TrendsQueryOptions): Promise<string>;
  }

  const googleTrends: GoogleTrendsApi;
  export default googleTrends;
}
