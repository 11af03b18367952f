/**
 * Reddit Listener
 *
 * Fetches posts (and optionally top-level comments) from the configured
 * subreddits using the Reddit API. Only items that contain a complaint
 * indicator become candidates.
 *
 * Also looks up subreddit metadata and discovers subreddits worth
 * listening to, for choosing REDDIT_SUBREDDITS.
 */

import { z } from 'zod';
import { config } from '../config';
import type { RedditConfig } from '../config';
import type { CandidateItem } from '../types';
import { containsKeyword } from './connector';
import type { Connector } from './connector';

const tokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
});

const postSchema = z.object({
  id: z.string(),
  title: z.string(),
  selftext: z.string().default(''),
  author: z.string().default('[deleted]'),
  permalink: z.string(),
  score: z.number().default(0),
  num_comments: z.number().default(0),
  subreddit: z.string(),
  created_utc: z.number(),
});

const commentSchema = z.object({
  id: z.string(),
  body: z.string(),
  author: z.string().default('[deleted]'),
  permalink: z.string(),
  score: z.number().default(0),
  created_utc: z.number(),
});

const listingSchema = z.object({
  data: z.object({
    children: z.array(z.object({ kind: z.string(), data: z.unknown() })),
  }),
});

const subredditSchema = z.object({
  display_name: z.string(),
  display_name_prefixed: z.string().optional(),
  title: z.string().default(''),
  public_description: z.string().nullish(),
  description: z.string().nullish(),
  subscribers: z.number().nullish(),
  active_user_count: z.number().nullish(),
  created_utc: z.number(),
  over18: z.boolean().default(false),
  submission_type: z.string().nullish(),
  allow_images: z.boolean().nullish(),
  allow_videos: z.boolean().nullish(),
});

const aboutSchema = z.object({ data: subredditSchema });

const rulesSchema = z.object({
  rules: z.array(
    z.object({
      short_name: z.string(),
      description: z.string().default(''),
      kind: z.string().default('all'),
    })
  ),
});

const flairsSchema = z.array(
  z.object({
    id: z.string().default(''),
    text: z.string().default(''),
    css_class: z.string().nullish(),
  })
);

type RedditPost = z.infer<typeof postSchema>;
type RedditSubreddit = z.infer<typeof subredditSchema>;

export interface SubredditSummary {
  name: string;
  displayName: string;
  title: string;
  description: string;
  subscribers: number;
  activeUsers: number;
  createdAt: string;
  nsfw: boolean;
  url: string;
  category?: string;
}

export interface SubredditFlair {
  id: string;
  text: string;
  cssClass: string;
}

export interface SubredditRule {
  shortName: string;
  description: string;
  kind: string;
}

export interface SubredditMetadata extends SubredditSummary {
  longDescription: string;
  flairs: SubredditFlair[];
  rules: SubredditRule[];
  submissionType: string;
  allowImages: boolean;
  allowVideos: boolean;
}

function toSubredditSummary(subreddit: RedditSubreddit): SubredditSummary {
  return {
    name: subreddit.display_name,
    displayName: subreddit.display_name_prefixed ?? `r/${subreddit.display_name}`,
    title: subreddit.title,
    description: (subreddit.public_description ?? '').slice(0, 200),
    subscribers: subreddit.subscribers ?? 0,
    activeUsers: subreddit.active_user_count ?? 0,
    createdAt: new Date(subreddit.created_utc * 1000).toISOString(),
    nsfw: subreddit.over18,
    url: `https://reddit.com/r/${subreddit.display_name}`,
  };
}

function bySubscribersDescending(a: SubredditSummary, b: SubredditSummary): number {
  return b.subscribers - a.subscribers;
}

export class RedditListener implements Connector {
  readonly name = 'reddit';
  private accessToken?: string;
  private tokenExpiry?: Date;

  constructor(private reddit: RedditConfig = config.reddit) {}

  /**
   * Authenticate with Reddit API (client credentials)
   */
  private async authenticate(): Promise<string> {
    if (this.accessToken && this.tokenExpiry && this.tokenExpiry > new Date()) {
      return this.accessToken;
    }

    const auth = Buffer.from(`${this.reddit.clientId}:${this.reddit.clientSecret}`).toString('base64');

    const response = await fetch('https://www.reddit.com/api/v1/access_token', {
      method: 'POST',
      headers: {
        Authorization: `Basic ${auth}`,
        'Content-Type': 'application/x-www-form-urlencoded',
        'User-Agent': this.reddit.userAgent,
      },
      body: 'grant_type=client_credentials',
    });

    if (!response.ok) {
      throw new Error(`Reddit authentication failed: ${response.status} ${response.statusText}`);
    }

    const token = tokenSchema.parse(await response.json());
    this.accessToken = token.access_token;
    this.tokenExpiry = new Date(Date.now() + token.expires_in * 1000);
    return token.access_token;
  }

  private async get(path: string): Promise<unknown> {
    const accessToken = await this.authenticate();
    const response = await fetch(`https://oauth.reddit.com${path}`, {
      headers: {
        Authorization: `Bearer ${accessToken}`,
        'User-Agent': this.reddit.userAgent,
      },
    });

    if (!response.ok) {
      throw new Error(`Reddit API error for ${path}: ${response.status} ${response.statusText}`);
    }
    return response.json();
  }

  /**
   * Fetch complaint posts from a subreddit
   */
  async fetchFromSubreddit(subreddit: string): Promise<CandidateItem[]> {
    const listing = listingSchema.parse(
      await this.get(`/r/${subreddit}/${this.reddit.sort}?limit=${this.reddit.postLimit}`)
    );

    const candidates: CandidateItem[] = [];

    for (const child of listing.data.children) {
      if (child.kind !== 't3') continue;
      const parsed = postSchema.safeParse(child.data);
      if (!parsed.success) continue;

      const post = parsed.data;
      const content = `${post.title}\n\n${post.selftext}`.trim();

      if (containsKeyword(content, this.reddit.keywords)) {
        candidates.push(this.toPostCandidate(post, content));
      }

      if (this.reddit.includeComments && post.num_comments > 0) {
        candidates.push(...(await this.fetchComments(post)));
      }
    }

    return candidates;
  }

  /**
   * Fetch top-level complaint comments for a post
   */
  private async fetchComments(post: RedditPost): Promise<CandidateItem[]> {
    const body = await this.get(`/r/${post.subreddit}/comments/${post.id}?limit=100&depth=1`);
    const listings = z.array(listingSchema).parse(body);
    const comments = listings[1]?.data.children ?? [];

    const candidates: CandidateItem[] = [];

    for (const child of comments) {
      if (child.kind !== 't1') continue;
      const parsed = commentSchema.safeParse(child.data);
      if (!parsed.success) continue;

      const comment = parsed.data;
      if (comment.body.length < this.reddit.minCommentLength) continue;
      if (!containsKeyword(comment.body, this.reddit.keywords)) continue;

      candidates.push({
        externalId: `reddit_comment_${comment.id}`,
        source: 'reddit',
        content: comment.body,
        author: comment.author,
        url: `https://reddit.com${comment.permalink}`,
        originTimestamp: new Date(comment.created_utc * 1000).toISOString(),
        metadata: {
          engagementScore: comment.score,
          subreddit: post.subreddit,
          postId: post.id,
        },
      });
    }

    return candidates;
  }

  private toPostCandidate(post: RedditPost, content: string): CandidateItem {
    return {
      externalId: `reddit_${post.id}`,
      source: 'reddit',
      content,
      author: post.author,
      url: `https://reddit.com${post.permalink}`,
      originTimestamp: new Date(post.created_utc * 1000).toISOString(),
      metadata: {
        engagementScore: post.score,
        commentCount: post.num_comments,
        subreddit: post.subreddit,
      },
    };
  }

  /**
   * Subreddit details with its link flairs and rules. Flairs and rules are
   * optional extras: when Reddit refuses them they come back empty.
   */
  async getSubredditMetadata(name: string): Promise<SubredditMetadata> {
    const { data } = aboutSchema.parse(await this.get(`/r/${name}/about`));

    let flairs: SubredditFlair[] = [];
    try {
      flairs = flairsSchema.parse(await this.get(`/r/${name}/api/link_flair_v2`)).map((flair) => ({
        id: flair.id,
        text: flair.text,
        cssClass: flair.css_class ?? '',
      }));
    } catch (error) {
      console.warn(`[Reddit] Could not fetch flairs for r/${name}:`, error);
    }

    let rules: SubredditRule[] = [];
    try {
      rules = rulesSchema.parse(await this.get(`/r/${name}/about/rules`)).rules.map((rule) => ({
        shortName: rule.short_name,
        description: rule.description,
        kind: rule.kind,
      }));
    } catch (error) {
      console.warn(`[Reddit] Could not fetch rules for r/${name}:`, error);
    }

    const metadata: SubredditMetadata = {
      ...toSubredditSummary(data),
      description: data.public_description ?? '',
      longDescription: (data.description ?? '').slice(0, 500),
      flairs,
      rules,
      submissionType: data.submission_type ?? 'any',
      allowImages: data.allow_images ?? true,
      allowVideos: data.allow_videos ?? true,
    };

    console.log(
      `[Reddit] r/${metadata.name}: ${metadata.subscribers} subscribers, ${flairs.length} flairs, ${rules.length} rules`
    );
    return metadata;
  }

  /**
   * Popular subreddits, largest first
   */
  async discoverPopularSubreddits(limit: number = 30): Promise<SubredditSummary[]> {
    const subreddits = await this.listSubreddits(`/subreddits/popular?limit=${limit}`);
    console.log(`[Reddit] Discovered ${subreddits.length} popular subreddits`);
    return subreddits;
  }

  /**
   * Subreddits matching a topic such as "saas" or "ecommerce", largest first
   */
  async discoverSubredditsByCategory(category: string = 'business'): Promise<SubredditSummary[]> {
    const subreddits = await this.listSubreddits(`/subreddits/search?q=${encodeURIComponent(category)}&limit=30`);
    console.log(`[Reddit] Found ${subreddits.length} subreddits for category "${category}"`);
    return subreddits.map((subreddit) => ({ ...subreddit, category }));
  }

  private async listSubreddits(path: string): Promise<SubredditSummary[]> {
    const listing = listingSchema.parse(await this.get(path));
    const subreddits: SubredditSummary[] = [];

    for (const child of listing.data.children) {
      if (child.kind !== 't5') continue;
      const parsed = subredditSchema.safeParse(child.data);
      if (parsed.success) {
        subreddits.push(toSubredditSummary(parsed.data));
      }
    }

    return subreddits.sort(bySubscribersDescending);
  }

  /**
   * Fetch from all configured subreddits
   */
  async fetchAll(): Promise<CandidateItem[]> {
    const allCandidates: CandidateItem[] = [];

    for (const subreddit of this.reddit.subreddits) {
      console.log(`[Reddit] Fetching from r/${subreddit}...`);
      try {
        const candidates = await this.fetchFromSubreddit(subreddit);
        allCandidates.push(...candidates);
        console.log(`[Reddit] Fetched ${candidates.length} candidates from r/${subreddit}`);
      } catch (error) {
        console.error(`[Reddit] Error fetching from r/${subreddit}:`, error);
      }
    }

    return allCandidates;
  }
}
