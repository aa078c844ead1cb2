// Centralized domain types for the article quality engine.
// Store implementations map their rows onto these; scoring code only sees these shapes.

export const SUBSCRIPTION_TIERS = ['free', 'premium', 'enterprise'] as const;
export type SubscriptionTier = (typeof SUBSCRIPTION_TIERS)[number];

export const CONTENT_ACCESS_LEVELS = ['free', 'premium', 'enterprise'] as const;
export type ContentAccess = (typeof CONTENT_ACCESS_LEVELS)[number];

export const ARTICLE_STATUSES = ['draft', 'published', 'archived'] as const;
export type ArticleStatus = (typeof ARTICLE_STATUSES)[number];

export const QUALITY_LABELS = ['excellent', 'good', 'average', 'poor', 'very_poor'] as const;
export type QualityLabel = (typeof QUALITY_LABELS)[number];

export const ACTIVITY_ACTIONS = [
  'view', 'like', 'unlike', 'bookmark', 'unbookmark', 'share', 'comment',
  'follow', 'unfollow', 'search', 'click', 'scroll', 'read_time',
] as const;
export type ActivityAction = (typeof ACTIVITY_ACTIONS)[number];

export type ContentLengthCategory = 'short' | 'medium' | 'long';

export interface Article {
  id: string;
  name: string;
  content: string;
  excerpt: string | null;
  image: string | null;
  imageId: string | null;
  tags: string[];
  categoryId: string;
  authorId: string;
  status: ArticleStatus;
  views: number;
  likes: number;
  bookmarkedBy: string[];
  comments: string[];
  isSpotlight: boolean;
  isPopular: boolean;
  createdAt: Date;
  qualityScore: number | null;
  contentQuality: QualityLabel | null;
  lastQualityUpdate: Date | null;
  contentAccess: ContentAccess;
  isPremiumContent: boolean;
  isEnterpriseContent: boolean;
}

export interface Author {
  id: string;
  username: string;
  followers: string[];
  subscriptionTier: SubscriptionTier;
}

export interface TextFeatures {
  wordCount: number;
  sentenceCount: number;
  paragraphCount: number;
  avgSentenceLength: number;
  readabilityScore: number;
  complexityScore: number;
  characterCount: number;
  uniqueWordRatio: number;
}

export interface ContentFeatures extends TextFeatures {
  titleLength: number;
  hasExcerpt: boolean;
  hasImage: boolean;
  tagCount: number;
  keywordDiversity: number;
  urlCount: number;
  contentHash: string;
  readingTimeMinutes: number;
  contentLengthCategory: ContentLengthCategory;
  qualityScore: number;
}

export interface Keyword {
  keyword: string;
  frequency: number;
  score: number;
}

export interface Entities {
  urls: string[];
  emails: string[];
  mentions: string[];
  hashtags: string[];
}

export type ScoreConfidence = 'full' | 'degraded';

/**
 * A component score together with whether it was computed from real data or
 * substituted with a neutral constant.
 */
export interface SubScore {
  score: number;
  confidence: ScoreConfidence;
  reason?: string;
}

export type ScoreComponent = 'content' | 'engagement' | 'social' | 'author' | 'recency';

export interface QualityScoreRecord {
  articleId: string;
  overallScore: number;
  contentScore: number;
  engagementScore: number;
  socialScore: number;
  authorScore: number;
  recencyScore: number;
  contentFeatures: ContentFeatures;
  confidence: ScoreConfidence;
  degradedComponents: ScoreComponent[];
  calculatedAt: Date;
  version: string;
}

export interface PeerStats {
  views: number;
  likes: number;
}

export interface AuthorStats {
  totalArticles: number;
  totalViews: number;
  totalLikes: number;
  avgQuality: number | null;
}

export interface UserActivity {
  id: string;
  userId: string;
  action: ActivityAction;
  articleId: string | null;
  sessionId: string;
  readingTime: number | null;
  metadata: Record<string, unknown>;
  timestamp: Date;
}

export interface SubscriptionContentRecord {
  articleId: string;
  contentAccess: ContentAccess;
  premiumFeatures: Record<string, unknown>;
  accessCount: number;
  revenueGenerated: number;
  lastAccessed: Date | null;
  createdAt: Date;
  updatedAt: Date;
}
