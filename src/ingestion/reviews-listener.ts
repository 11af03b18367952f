/**
 * Reviews Listener
 *
 * Collects low-rated Amazon product reviews and Google Maps business
 * reviews by running Apify scraper actors. Reviews rated above the
 * configured maximum are not complaints and are dropped.
 */

import { z } from 'zod';
import { config } from '../config';
import type { ReviewsConfig } from '../config';
import type { CandidateItem } from '../types';
import { TextCleaner } from './cleaner';
import type { Connector } from './connector';

const AMAZON_ACTOR = 'junglee~amazon-reviews-scraper';
const GOOGLE_MAPS_ACTOR = 'compass~google-maps-reviews-scraper';

// Unrated reviews are treated as five stars
const UNRATED = 5;

const amazonReviewSchema = z.object({
  id: z.string(),
  title: z.string().nullish(),
  text: z.string().nullish(),
  stars: z.number().nullish(),
  reviewerName: z.string().nullish(),
  url: z.string().nullish(),
  productTitle: z.string().nullish(),
  verifiedPurchase: z.boolean().nullish(),
  helpfulVotes: z.number().nullish(),
  date: z.string().nullish(),
});

const googleMapsReviewSchema = z.object({
  reviewId: z.string(),
  text: z.string().nullish(),
  stars: z.number().nullish(),
  name: z.string().nullish(),
  reviewUrl: z.string().nullish(),
  likes: z.number().nullish(),
  responseFromOwnerText: z.string().nullish(),
  publishedAtDate: z.string().nullish(),
});

type AmazonReview = z.infer<typeof amazonReviewSchema>;
type GoogleMapsReview = z.infer<typeof googleMapsReviewSchema>;

function toIsoTimestamp(value: string | null | undefined): string | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

export class ReviewsListener implements Connector {
  readonly name = 'reviews';
  private cleaner = new TextCleaner();

  constructor(private reviews: ReviewsConfig = config.reviews) {}

  /**
   * Run an actor synchronously and return its dataset items
   */
  private async runActor(actorId: string, input: Record<string, unknown>): Promise<unknown[]> {
    const response = await fetch(`${this.reviews.apiUrl}/acts/${actorId}/run-sync-get-dataset-items`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.reviews.apifyApiToken}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(input),
    });

    if (!response.ok) {
      throw new Error(`Apify actor ${actorId} failed: ${response.status} ${response.statusText}`);
    }

    return z.array(z.unknown()).parse(await response.json());
  }

  private isComplaint(stars: number | null | undefined): boolean {
    return (stars ?? UNRATED) <= this.reviews.maxRating;
  }

  /**
   * Fetch low-rated reviews for one Amazon product
   */
  async fetchAmazonReviews(asin: string): Promise<CandidateItem[]> {
    const items = await this.runActor(AMAZON_ACTOR, {
      asins: [asin],
      maxReviews: this.reviews.maxReviews,
      scrapeReviewerInfo: true,
    });

    const candidates: CandidateItem[] = [];
    for (const raw of items) {
      const parsed = amazonReviewSchema.safeParse(raw);
      if (!parsed.success || !this.isComplaint(parsed.data.stars)) continue;

      const candidate = this.toAmazonCandidate(parsed.data);
      if (candidate) candidates.push(candidate);
    }

    return candidates;
  }

  private toAmazonCandidate(review: AmazonReview): CandidateItem | null {
    const content = this.cleaner.clean(`${review.title ?? ''} ${review.text ?? ''}`);
    if (!content) return null;

    return {
      externalId: `amazon_${review.id}`,
      source: 'amazon',
      content,
      author: review.reviewerName ?? 'Anonymous',
      url: review.url ?? undefined,
      originTimestamp: toIsoTimestamp(review.date),
      metadata: {
        engagementScore: review.helpfulVotes ?? 0,
        rating: review.stars ?? null,
        verifiedPurchase: review.verifiedPurchase ?? null,
        productName: review.productTitle ?? null,
      },
    };
  }

  /**
   * Fetch low-rated reviews for one Google Maps place
   */
  async fetchGoogleMapsReviews(place: string): Promise<CandidateItem[]> {
    const items = await this.runActor(GOOGLE_MAPS_ACTOR, {
      searchStringsArray: [place],
      maxReviews: this.reviews.maxReviews,
      reviewsSort: 'newest',
    });

    const candidates: CandidateItem[] = [];
    for (const raw of items) {
      const parsed = googleMapsReviewSchema.safeParse(raw);
      if (!parsed.success || !this.isComplaint(parsed.data.stars)) continue;

      const candidate = this.toGoogleMapsCandidate(parsed.data);
      if (candidate) candidates.push(candidate);
    }

    return candidates;
  }

  private toGoogleMapsCandidate(review: GoogleMapsReview): CandidateItem | null {
    const content = this.cleaner.clean(review.text ?? '');
    if (!content) return null;

    return {
      externalId: `google_maps_${review.reviewId}`,
      source: 'google_maps',
      content,
      author: review.name ?? undefined,
      url: review.reviewUrl ?? undefined,
      originTimestamp: toIsoTimestamp(review.publishedAtDate),
      metadata: {
        engagementScore: review.likes ?? 0,
        rating: review.stars ?? null,
        responseFromOwner: review.responseFromOwnerText ?? null,
      },
    };
  }

  /**
   * Fetch every configured product and place
   */
  async fetchAll(): Promise<CandidateItem[]> {
    if (!this.reviews.apifyApiToken) {
      console.warn('[Reviews] APIFY_API_TOKEN not configured, skipping reviews');
      return [];
    }

    const allCandidates: CandidateItem[] = [];

    for (const asin of this.reviews.amazonAsins) {
      console.log(`[Reviews] Fetching Amazon reviews for ${asin}...`);
      try {
        const candidates = await this.fetchAmazonReviews(asin);
        allCandidates.push(...candidates);
        console.log(`[Reviews] Fetched ${candidates.length} negative Amazon reviews for ${asin}`);
      } catch (error) {
        console.error(`[Reviews] Error fetching Amazon reviews for ${asin}:`, error);
      }
    }

    for (const place of this.reviews.googleMapsPlaces) {
      console.log(`[Reviews] Fetching Google Maps reviews for "${place}"...`);
      try {
        const candidates = await this.fetchGoogleMapsReviews(place);
        allCandidates.push(...candidates);
        console.log(`[Reviews] Fetched ${candidates.length} negative Google Maps reviews for "${place}"`);
      } catch (error) {
        console.error(`[Reviews] Error fetching Google Maps reviews for "${place}":`, error);
      }
    }

    return allCandidates;
  }
}
