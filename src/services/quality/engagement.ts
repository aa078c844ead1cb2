import type { Article } from '../../types/index.js';

export type EngagementSource = Pick<Article, 'views' | 'likes' | 'bookmarkedBy' | 'comments'>;

const LIKE_WEIGHT = 30;
const BOOKMARK_WEIGHT = 50;
const COMMENT_WEIGHT = 70;
const VIEW_BONUS_WEIGHT = 20;
const VIEW_BONUS_SATURATION = 100;

/**
 * Interaction-rate score. Rates are per view, so an unviewed article scores 0
 * whatever its other counts. High rates can push the raw sum past 100.
 */
export function calculateEngagementScore(article: EngagementSource): number {
  const { views, likes } = article;
  const bookmarks = article.bookmarkedBy.length;
  const comments = article.comments.length;

  let likeRate = 0;
  let bookmarkRate = 0;
  let commentRate = 0;
  if (views > 0) {
    likeRate = likes / views;
    bookmarkRate = bookmarks / views;
    commentRate = comments / views;
  }

  const score =
    likeRate * LIKE_WEIGHT +
    bookmarkRate * BOOKMARK_WEIGHT +
    commentRate * COMMENT_WEIGHT +
    Math.min(views / VIEW_BONUS_SATURATION, 1) * VIEW_BONUS_WEIGHT;

  return Math.min(score, 100);
}
