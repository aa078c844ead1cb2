import { errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { QualityStore } from '../../db/store.js';
import type { AuthorStats, SubScore } from '../../types/index.js';

const logger = createLogger('quality:author');

export const NEW_AUTHOR_BASELINE = 20;
const DEFAULT_AVG_QUALITY = 50;

function articleCountPoints(count: number): number {
  if (count > 50) return 25;
  if (count > 20) return 20;
  if (count > 10) return 15;
  if (count > 5) return 10;
  if (count > 0) return 5;
  return 0;
}

function viewPoints(totalViews: number): number {
  if (totalViews > 10000) return 20;
  if (totalViews > 1000) return 15;
  if (totalViews > 100) return 10;
  return 0;
}

function likePoints(totalLikes: number): number {
  if (totalLikes > 500) return 15;
  if (totalLikes > 100) return 10;
  if (totalLikes > 20) return 5;
  return 0;
}

function avgQualityPoints(avgQuality: number): number {
  if (avgQuality > 80) return 40;
  if (avgQuality > 70) return 30;
  if (avgQuality > 60) return 20;
  if (avgQuality > 50) return 10;
  return 0;
}

export function scoreAuthorStats(stats: AuthorStats): number {
  const score =
    articleCountPoints(stats.totalArticles) +
    viewPoints(stats.totalViews) +
    likePoints(stats.totalLikes) +
    // Unscored authors are treated as middling
    avgQualityPoints(stats.avgQuality || DEFAULT_AVG_QUALITY);

  return Math.min(score, 100);
}

export async function calculateAuthorCredibilityScore(
  store: QualityStore,
  authorId: string,
): Promise<SubScore> {
  let stats: AuthorStats | null;
  try {
    stats = await store.aggregateAuthorStats(authorId);
  } catch (error) {
    logger.warn('Author stats lookup failed, using baseline', { authorId, error: errorMessage(error) });
    return { score: NEW_AUTHOR_BASELINE, confidence: 'degraded', reason: 'author stats lookup failed' };
  }

  if (!stats) {
    return { score: NEW_AUTHOR_BASELINE, confidence: 'degraded', reason: 'author has no articles' };
  }

  return { score: scoreAuthorStats(stats), confidence: 'full' };
}
