import { sqliteTable, text, integer, real } from 'drizzle-orm/sqlite-core';

// Dates are ISO-8601 text; arrays and objects are JSON text.

// ============================================================================
// users
// ============================================================================
export const users = sqliteTable('users', {
  id: text('id').primaryKey(),
  username: text('username').notNull().unique(),
  role: text('role').notNull().default('user'),
  subscriptionTier: text('subscription_tier').notNull().default('free'),
  followers: text('followers').notNull().default('[]'), // JSON array of user ids
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
});

// ============================================================================
// articles
// ============================================================================
export const articles = sqliteTable('articles', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  content: text('content').notNull(),
  excerpt: text('excerpt'),
  image: text('image'),
  imageId: text('image_id'),
  tags: text('tags').notNull().default('[]'), // JSON array
  categoryId: text('category_id').notNull(),
  authorId: text('author_id').notNull(),
  status: text('status').notNull().default('draft'),
  views: integer('views').notNull().default(0),
  likes: integer('likes').notNull().default(0),
  bookmarkedBy: text('bookmarked_by').notNull().default('[]'), // JSON array
  comments: text('comments').notNull().default('[]'), // JSON array
  isSpotlight: integer('is_spotlight', { mode: 'boolean' }).notNull().default(false),
  isPopular: integer('is_popular', { mode: 'boolean' }).notNull().default(false),

  qualityScore: real('quality_score'),
  contentQuality: text('content_quality'),
  lastQualityUpdate: text('last_quality_update'),

  contentFeatures: text('content_features'), // JSON
  embeddingText: text('embedding_text'),
  keywords: text('keywords'), // JSON array
  processedAt: text('processed_at'),

  contentAccess: text('content_access').notNull().default('free'),
  isPremiumContent: integer('is_premium_content', { mode: 'boolean' }).notNull().default(false),
  isEnterpriseContent: integer('is_enterprise_content', { mode: 'boolean' }).notNull().default(false),
  premiumFeatures: text('premium_features').notNull().default('{}'), // JSON
  subscriptionFlaggedAt: text('subscription_flagged_at'),

  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
});

// ============================================================================
// article_quality_scores (one per article)
// ============================================================================
export const articleQualityScores = sqliteTable('article_quality_scores', {
  articleId: text('article_id').primaryKey(),
  overallScore: real('overall_score').notNull(),
  contentScore: real('content_score').notNull(),
  engagementScore: real('engagement_score').notNull(),
  socialScore: real('social_score').notNull(),
  authorScore: real('author_score').notNull(),
  recencyScore: real('recency_score').notNull(),
  contentFeatures: text('content_features').notNull(), // JSON
  confidence: text('confidence').notNull().default('full'),
  degradedComponents: text('degraded_components').notNull().default('[]'), // JSON array
  calculatedAt: text('calculated_at').notNull(),
  version: text('version').notNull(),
});

// ============================================================================
// subscription_content (one per article)
// ============================================================================
export const subscriptionContent = sqliteTable('subscription_content', {
  articleId: text('article_id').primaryKey(),
  contentAccess: text('content_access').notNull(),
  premiumFeatures: text('premium_features').notNull().default('{}'), // JSON
  accessCount: integer('access_count').notNull().default(0),
  revenueGenerated: real('revenue_generated').notNull().default(0),
  lastAccessed: text('last_accessed'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
});

// ============================================================================
// user_activities
// ============================================================================
export const userActivities = sqliteTable('user_activities', {
  id: text('id').primaryKey(),
  userId: text('user_id').notNull(),
  action: text('action').notNull(),
  articleId: text('article_id'),
  sessionId: text('session_id').notNull(),
  readingTime: real('reading_time'),
  metadata: text('metadata').notNull().default('{}'), // JSON
  timestamp: text('timestamp').notNull(),
});
