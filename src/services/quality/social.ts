// Social signals: author reach, editorial flags and standing among category peers.

import { daysAgo } from '../../utils/clock.js';
import { errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { QualityStore } from '../../db/store.js';
import type { Article, PeerStats, SubScore } from '../../types/index.js';

const logger = createLogger('quality:social');

export const NEUTRAL_CATEGORY_SCORE = 15;
const MAX_CATEGORY_SCORE = 30;
export const DEFAULT_CATEGORY_WINDOW_DAYS = 30;

export type SocialSource = Pick<
  Article,
  'id' | 'authorId' | 'categoryId' | 'views' | 'likes' | 'isSpotlight' | 'isPopular'
>;

export interface SocialScoreOptions {
  now: Date;
  categoryWindowDays?: number;
}

/**
 * Fraction of comparison values at or below `value`. Ties count as at-or-below.
 */
export function calculatePercentile(value: number, comparisonValues: readonly number[]): number {
  if (comparisonValues.length === 0) return 0.5;
  const rank = comparisonValues.filter((v) => v <= value).length;
  return rank / comparisonValues.length;
}

export function followerPoints(followerCount: number): number {
  if (followerCount > 1000) return 30;
  if (followerCount > 100) return 20;
  if (followerCount > 10) return 10;
  return 0;
}

export async function calculateCategoryPerformanceScore(
  store: QualityStore,
  article: SocialSource,
  options: SocialScoreOptions,
): Promise<SubScore> {
  const windowDays = options.categoryWindowDays ?? DEFAULT_CATEGORY_WINDOW_DAYS;

  let peers: PeerStats[];
  try {
    peers = await store.findCategoryPeers({
      categoryId: article.categoryId,
      excludeArticleId: article.id,
      createdSince: daysAgo(options.now, windowDays),
    });
  } catch (error) {
    logger.warn('Category peer lookup failed, using neutral score', {
      articleId: article.id,
      error: errorMessage(error),
    });
    return { score: NEUTRAL_CATEGORY_SCORE, confidence: 'degraded', reason: 'category peer lookup failed' };
  }

  if (peers.length === 0) {
    return { score: NEUTRAL_CATEGORY_SCORE, confidence: 'degraded', reason: 'no recent category peers' };
  }

  const viewPercentile = calculatePercentile(article.views, peers.map((p) => p.views));
  const likePercentile = calculatePercentile(article.likes, peers.map((p) => p.likes));
  const score = ((viewPercentile + likePercentile) / 2) * MAX_CATEGORY_SCORE;

  return { score: Math.min(score, MAX_CATEGORY_SCORE), confidence: 'full' };
}

export async function calculateSocialScore(
  store: QualityStore,
  article: SocialSource,
  options: SocialScoreOptions,
): Promise<SubScore> {
  const author = await store.findAuthor(article.authorId);
  const followerCount = author ? author.followers.length : 0;

  let score = followerPoints(followerCount);
  if (article.isSpotlight) score += 25;
  if (article.isPopular) score += 15;

  const category = await calculateCategoryPerformanceScore(store, article, options);
  score += category.score;

  return {
    score: Math.min(score, 100),
    confidence: category.confidence,
    ...(category.reason ? { reason: category.reason } : {}),
  };
}
