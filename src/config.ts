/**
 * Configuration Management
 *
 * Centralized configuration for the Pain Radar pipeline.
 * Uses environment variables with sensible defaults.
 */

export type RedditSort = 'new' | 'hot' | 'top' | 'rising';
export type SentimentProvider = 'cloudflare' | 'lexicon';
export type StorageDriver = 'dynamodb' | 'memory';

export interface RedditConfig {
  clientId: string;
  clientSecret: string;
  userAgent: string;
  subreddits: string[];
  keywords: string[]; // complaint indicators a post or comment must contain
  postLimit: number;
  sort: RedditSort;
  includeComments: boolean;
  minCommentLength: number;
}

export interface HackerNewsConfig {
  apiUrl: string;
  requestDelayMs: number;
  searchTypes: string[];
  keywords: string[];
}

export interface ReviewsConfig {
  apifyApiToken: string;
  apiUrl: string;
  amazonAsins: string[];
  googleMapsPlaces: string[]; // search strings or place URLs
  maxReviews: number;
  maxRating: number; // reviews rated above this are not complaints
}

export interface SentimentConfig {
  provider: SentimentProvider;
  cloudflareAccountId: string;
  cloudflareApiToken: string;
  model: string;
  maxLength: number; // characters sent to the classifier
  timeoutMs: number;
}

export interface ExtractionConfig {
  anthropicApiKey: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

export interface StorageConfig {
  driver: StorageDriver;
  region?: string;
  endpoint?: string; // local DynamoDB
  rawItemsTable: string;
  painPointsTable: string;
  sessionsTable: string;
}

export interface PipelineConfig {
  sentimentBatchSize: number;
  extractionBatchSize: number;
  staleSessionMinutes: number;
  scorecardTopN: number;
}

export interface PainRadarConfig {
  reddit: RedditConfig;
  hackerNews: HackerNewsConfig;
  reviews: ReviewsConfig;
  sentiment: SentimentConfig;
  extraction: ExtractionConfig;
  storage: StorageConfig;
  pipeline: PipelineConfig;
}

type Env = Record<string, string | undefined>;

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const match = allowed.find((option) => option === value);
  return match ?? fallback;
}

function list(value: string | undefined, fallback: string): string[] {
  return (value || fallback)
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function int(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): PainRadarConfig {
  return {
    reddit: {
      clientId: env.REDDIT_CLIENT_ID || '',
      clientSecret: env.REDDIT_CLIENT_SECRET || '',
      userAgent: env.REDDIT_USER_AGENT || 'PainRadar/1.0',
      subreddits: list(env.REDDIT_SUBREDDITS, 'SaaS,smallbusiness,Entrepreneur,startups,freelance'),
      keywords: list(
        env.REDDIT_KEYWORDS,
        "hate,frustrated,annoying,terrible,worst,awful,disappointed,wish there was,sucks,useless,broken,doesn't work,problem,issue,bug"
      ),
      postLimit: int(env.REDDIT_POST_LIMIT, 50),
      sort: oneOf(env.REDDIT_SORT, ['new', 'hot', 'top', 'rising'], 'new'),
      includeComments: env.REDDIT_INCLUDE_COMMENTS === 'true',
      minCommentLength: int(env.REDDIT_MIN_COMMENT_LENGTH, 50),
    },
    hackerNews: {
      apiUrl: env.HN_API_URL || 'https://hn.algolia.com/api/v1',
      requestDelayMs: int(env.HN_REQUEST_DELAY_MS, 1000),
      searchTypes: list(env.HN_SEARCH_TYPES, 'Ask HN'),
      keywords: list(env.HN_KEYWORDS, 'frustrated with,biggest problem with,hate using,switched away from'),
    },
    reviews: {
      apifyApiToken: env.APIFY_API_TOKEN || '',
      apiUrl: env.APIFY_API_URL || 'https://api.apify.com/v2',
      amazonAsins: list(env.AMAZON_ASINS, ''),
      googleMapsPlaces: list(env.GOOGLE_MAPS_PLACES, ''),
      maxReviews: int(env.REVIEWS_MAX_REVIEWS, 100),
      maxRating: int(env.REVIEWS_MAX_RATING, 3),
    },
    sentiment: {
      provider: oneOf(env.SENTIMENT_PROVIDER, ['cloudflare', 'lexicon'], 'cloudflare'),
      cloudflareAccountId: env.CLOUDFLARE_ACCOUNT_ID || '',
      cloudflareApiToken: env.CLOUDFLARE_API_TOKEN || '',
      model: env.CLOUDFLARE_SENTIMENT_MODEL || '@cf/huggingface/distilbert-sst-2-int8',
      maxLength: int(env.SENTIMENT_MAX_LENGTH, 1000),
      timeoutMs: int(env.SENTIMENT_TIMEOUT_MS, 30000),
    },
    extraction: {
      anthropicApiKey: env.ANTHROPIC_API_KEY || '',
      model: env.ANTHROPIC_MODEL || 'claude-3-5-sonnet-20241022',
      maxTokens: int(env.EXTRACTION_MAX_TOKENS, 1000),
      timeoutMs: int(env.EXTRACTION_TIMEOUT_MS, 60000),
    },
    storage: {
      driver: oneOf(env.STORAGE_DRIVER, ['dynamodb', 'memory'], 'dynamodb'),
      region: env.AWS_REGION,
      endpoint: env.DYNAMODB_ENDPOINT,
      rawItemsTable: env.RAW_ITEMS_TABLE || 'PainRadarRawItems',
      painPointsTable: env.PAIN_POINTS_TABLE || 'PainRadarPainPoints',
      sessionsTable: env.EXTRACTION_SESSIONS_TABLE || 'PainRadarExtractionSessions',
    },
    pipeline: {
      sentimentBatchSize: int(env.SENTIMENT_BATCH_SIZE, 100),
      extractionBatchSize: int(env.EXTRACTION_BATCH_SIZE, 50),
      staleSessionMinutes: int(env.STALE_SESSION_MINUTES, 60),
      scorecardTopN: int(env.SCORECARD_TOP_N, 5),
    },
  };
}

export const config = loadConfig();
