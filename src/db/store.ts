// Storage capabilities the services depend on. The scoring engine never
// reaches for a global connection; it is handed one of these.

import type {
  ActivityAction,
  Article,
  Author,
  AuthorStats,
  ContentAccess,
  ContentFeatures,
  Keyword,
  PeerStats,
  QualityLabel,
  QualityScoreRecord,
  SubscriptionContentRecord,
  SubscriptionTier,
  UserActivity,
} from '../types/index.js';

export interface CategoryPeerQuery {
  categoryId: string;
  excludeArticleId: string;
  createdSince: Date;
}

export interface StaleArticleQuery {
  staleBefore: Date;
  limit: number;
}

export interface ArticleQualityUpdate {
  qualityScore: number;
  contentQuality: QualityLabel;
  lastQualityUpdate: Date;
}

export interface ArticlePreprocessingUpdate {
  contentFeatures: ContentFeatures;
  embeddingText: string;
  keywords: Keyword[];
  processedAt: Date;
}

export interface QualityStore {
  findArticle(articleId: string): Promise<Article | null>;
  findAuthor(authorId: string): Promise<Author | null>;
  /** Views and likes of other articles in the category created on or after `createdSince`. */
  findCategoryPeers(query: CategoryPeerQuery): Promise<PeerStats[]>;
  /** Lifetime totals for an author, or null when they have no articles. */
  aggregateAuthorStats(authorId: string): Promise<AuthorStats | null>;
  /** Published articles never scored or last scored before `staleBefore`. */
  findArticlesNeedingQuality(query: StaleArticleQuery): Promise<string[]>;
  upsertQualityRecord(record: QualityScoreRecord): Promise<void>;
  updateArticleQuality(articleId: string, update: ArticleQualityUpdate): Promise<void>;
  updateArticlePreprocessing(articleId: string, update: ArticlePreprocessingUpdate): Promise<void>;
  findQualityRecord(articleId: string): Promise<QualityScoreRecord | null>;
  findQualityRecordsSince(since: Date): Promise<QualityScoreRecord[]>;
}

export interface ArticleAccessFlags {
  contentAccess: ContentAccess;
  isPremiumContent: boolean;
  isEnterpriseContent: boolean;
  premiumFeatures: Record<string, unknown>;
  subscriptionFlaggedAt: Date;
}

export interface PublishedArticleFilter {
  premiumOnly?: boolean;
  categoryIds?: string[];
  authorIds?: string[];
  qualityScoreMin?: number;
  createdAfter?: Date;
  /** Sort by quality score, highest first. */
  orderByQuality?: boolean;
  limit?: number;
}

export interface SubscriptionStore {
  findArticle(articleId: string): Promise<Article | null>;
  findAuthor(userId: string): Promise<Author | null>;
  findPublishedArticles(filter: PublishedArticleFilter): Promise<Article[]>;
  /** Returns false when the article does not exist. */
  updateArticleAccess(articleId: string, flags: ArticleAccessFlags): Promise<boolean>;
  upsertSubscriptionContent(record: SubscriptionContentRecord): Promise<void>;
  recordSubscriptionAccess(articleId: string, at: Date): Promise<void>;
  findSubscriptionContentSince(since: Date): Promise<SubscriptionContentRecord[]>;
  countUsersByTier(): Promise<Record<SubscriptionTier, number>>;
}

export interface ActivityQuery {
  userId: string;
  action?: ActivityAction;
  since?: Date;
}

export interface ActivityStore {
  insertActivity(activity: UserActivity): Promise<void>;
  countActivities(query: ActivityQuery): Promise<number>;
  /** Most recent first. */
  findActivities(query: ActivityQuery & { limit?: number }): Promise<UserActivity[]>;
}

export type ContentStore = QualityStore & SubscriptionStore & ActivityStore;
