/**
 * Hacker News Listener
 *
 * Searches Hacker News through the Algolia API for each configured
 * keyword and post type ("Ask HN" etc.).
 */

import { z } from 'zod';
import { config } from '../config';
import type { HackerNewsConfig } from '../config';
import type { CandidateItem } from '../types';
import { TextCleaner } from './cleaner';
import { sleep } from './connector';
import type { Connector } from './connector';

const hitSchema = z.object({
  objectID: z.string(),
  title: z.string().nullish(),
  story_text: z.string().nullish(),
  author: z.string().nullish(),
  points: z.number().nullish(),
  num_comments: z.number().nullish(),
  created_at: z.string().nullish(),
});

const searchResponseSchema = z.object({
  hits: z.array(z.unknown()),
});

type SearchHit = z.infer<typeof hitSchema>;

export class HackerNewsListener implements Connector {
  readonly name = 'hackernews';
  private cleaner = new TextCleaner();

  constructor(private hn: HackerNewsConfig = config.hackerNews) {}

  /**
   * Search Hacker News for posts matching a keyword
   */
  async search(query: string, tags: string = 'ask_hn'): Promise<CandidateItem[]> {
    const response = await fetch(
      `${this.hn.apiUrl}/search?query=${encodeURIComponent(query)}&tags=${tags}&hitsPerPage=100`
    );

    if (!response.ok) {
      throw new Error(`Hacker News search failed: ${response.status} ${response.statusText}`);
    }

    const { hits } = searchResponseSchema.parse(await response.json());
    const candidates: CandidateItem[] = [];

    for (const raw of hits) {
      const parsed = hitSchema.safeParse(raw);
      if (!parsed.success) continue;

      const candidate = this.toCandidate(parsed.data);
      if (candidate) {
        candidates.push(candidate);
      }
    }

    return candidates;
  }

  private toCandidate(hit: SearchHit): CandidateItem | null {
    const content = this.cleaner.clean(`${hit.title ?? ''}\n\n${hit.story_text ?? ''}`);
    if (!content) return null;

    const createdAt = hit.created_at ? new Date(hit.created_at) : null;

    return {
      externalId: `hn_${hit.objectID}`,
      source: 'hackernews',
      content,
      author: hit.author ?? undefined,
      url: `https://news.ycombinator.com/item?id=${hit.objectID}`,
      originTimestamp: createdAt && !Number.isNaN(createdAt.getTime()) ? createdAt.toISOString() : undefined,
      metadata: {
        engagementScore: hit.points ?? 0,
        commentCount: hit.num_comments ?? 0,
      },
    };
  }

  /**
   * Fetch all configured search types and keywords
   */
  async fetchAll(): Promise<CandidateItem[]> {
    const allCandidates: CandidateItem[] = [];

    for (const keyword of this.hn.keywords) {
      for (const searchType of this.hn.searchTypes) {
        console.log(`[HackerNews] Searching for "${keyword}" in ${searchType}...`);
        try {
          const tag = searchType.toLowerCase().replace(' ', '_');
          const candidates = await this.search(keyword, tag);
          allCandidates.push(...candidates);
          console.log(`[HackerNews] Fetched ${candidates.length} candidates for "${keyword}" in ${searchType}`);
        } catch (error) {
          console.error(`[HackerNews] Error searching "${keyword}" in ${searchType}:`, error);
        }

        // Rate limiting
        await sleep(this.hn.requestDelayMs);
      }
    }

    return allCandidates;
  }
}
