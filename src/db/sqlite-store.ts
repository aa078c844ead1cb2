// drizzle/better-sqlite3 implementation of ContentStore. Text columns holding
// enums or JSON are validated with zod on the way out.

import { and, desc, eq, gte, inArray, isNull, lt, ne, or, sql, type SQL } from 'drizzle-orm';
import { z } from 'zod';
import { articleQualityScores, articles, subscriptionContent, userActivities, users } from './schema.js';
import type { AppDatabase } from './index.js';
import type {
  ActivityQuery,
  ArticleAccessFlags,
  ArticlePreprocessingUpdate,
  ArticleQualityUpdate,
  CategoryPeerQuery,
  ContentStore,
  PublishedArticleFilter,
  StaleArticleQuery,
} from './store.js';
import {
  ACTIVITY_ACTIONS,
  ARTICLE_STATUSES,
  CONTENT_ACCESS_LEVELS,
  QUALITY_LABELS,
  SUBSCRIPTION_TIERS,
  type Article,
  type Author,
  type AuthorStats,
  type PeerStats,
  type QualityScoreRecord,
  type SubscriptionContentRecord,
  type SubscriptionTier,
  type UserActivity,
} from '../types/index.js';

type ArticleRow = typeof articles.$inferSelect;
type UserRow = typeof users.$inferSelect;
type QualityRow = typeof articleQualityScores.$inferSelect;
type SubscriptionRow = typeof subscriptionContent.$inferSelect;
type ActivityRow = typeof userActivities.$inferSelect;

const StringListSchema = z.array(z.string());
const JsonObjectSchema = z.record(z.unknown());

const ContentFeaturesSchema = z.object({
  wordCount: z.number(),
  sentenceCount: z.number(),
  paragraphCount: z.number(),
  avgSentenceLength: z.number(),
  readabilityScore: z.number(),
  complexityScore: z.number(),
  characterCount: z.number(),
  uniqueWordRatio: z.number(),
  titleLength: z.number(),
  hasExcerpt: z.boolean(),
  hasImage: z.boolean(),
  tagCount: z.number(),
  keywordDiversity: z.number(),
  urlCount: z.number(),
  contentHash: z.string(),
  readingTimeMinutes: z.number(),
  contentLengthCategory: z.enum(['short', 'medium', 'long']),
  qualityScore: z.number(),
});

const ScoreComponentsSchema = z.array(z.enum(['content', 'engagement', 'social', 'author', 'recency']));

function parseJson<T>(schema: z.ZodType<T>, text: string): T {
  return schema.parse(JSON.parse(text));
}

function toDate(value: string): Date;
function toDate(value: string | null): Date | null;
function toDate(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

function toArticle(row: ArticleRow): Article {
  return {
    id: row.id,
    name: row.name,
    content: row.content,
    excerpt: row.excerpt,
    image: row.image,
    imageId: row.imageId,
    tags: parseJson(StringListSchema, row.tags),
    categoryId: row.categoryId,
    authorId: row.authorId,
    status: z.enum(ARTICLE_STATUSES).parse(row.status),
    views: row.views,
    likes: row.likes,
    bookmarkedBy: parseJson(StringListSchema, row.bookmarkedBy),
    comments: parseJson(StringListSchema, row.comments),
    isSpotlight: row.isSpotlight,
    isPopular: row.isPopular,
    createdAt: toDate(row.createdAt),
    qualityScore: row.qualityScore,
    contentQuality: row.contentQuality === null ? null : z.enum(QUALITY_LABELS).parse(row.contentQuality),
    lastQualityUpdate: toDate(row.lastQualityUpdate),
    contentAccess: z.enum(CONTENT_ACCESS_LEVELS).parse(row.contentAccess),
    isPremiumContent: row.isPremiumContent,
    isEnterpriseContent: row.isEnterpriseContent,
  };
}

function toAuthor(row: UserRow): Author {
  return {
    id: row.id,
    username: row.username,
    followers: parseJson(StringListSchema, row.followers),
    subscriptionTier: z.enum(SUBSCRIPTION_TIERS).parse(row.subscriptionTier),
  };
}

function toQualityRecord(row: QualityRow): QualityScoreRecord {
  return {
    articleId: row.articleId,
    overallScore: row.overallScore,
    contentScore: row.contentScore,
    engagementScore: row.engagementScore,
    socialScore: row.socialScore,
    authorScore: row.authorScore,
    recencyScore: row.recencyScore,
    contentFeatures: parseJson(ContentFeaturesSchema, row.contentFeatures),
    confidence: z.enum(['full', 'degraded']).parse(row.confidence),
    degradedComponents: parseJson(ScoreComponentsSchema, row.degradedComponents),
    calculatedAt: toDate(row.calculatedAt),
    version: row.version,
  };
}

function toSubscriptionRecord(row: SubscriptionRow): SubscriptionContentRecord {
  return {
    articleId: row.articleId,
    contentAccess: z.enum(CONTENT_ACCESS_LEVELS).parse(row.contentAccess),
    premiumFeatures: parseJson(JsonObjectSchema, row.premiumFeatures),
    accessCount: row.accessCount,
    revenueGenerated: row.revenueGenerated,
    lastAccessed: toDate(row.lastAccessed),
    createdAt: toDate(row.createdAt),
    updatedAt: toDate(row.updatedAt),
  };
}

function toActivity(row: ActivityRow): UserActivity {
  return {
    id: row.id,
    userId: row.userId,
    action: z.enum(ACTIVITY_ACTIONS).parse(row.action),
    articleId: row.articleId,
    sessionId: row.sessionId,
    readingTime: row.readingTime,
    metadata: parseJson(JsonObjectSchema, row.metadata),
    timestamp: toDate(row.timestamp),
  };
}

function activityConditions(query: ActivityQuery): SQL[] {
  const conditions: SQL[] = [eq(userActivities.userId, query.userId)];
  if (query.action) conditions.push(eq(userActivities.action, query.action));
  if (query.since) conditions.push(gte(userActivities.timestamp, query.since.toISOString()));
  return conditions;
}

export class SqliteContentStore implements ContentStore {
  constructor(private readonly db: AppDatabase) {}

  // --- direct writes for loading fixtures ---

  async saveArticle(article: Article): Promise<void> {
    const values = {
      ...article,
      tags: JSON.stringify(article.tags),
      bookmarkedBy: JSON.stringify(article.bookmarkedBy),
      comments: JSON.stringify(article.comments),
      createdAt: article.createdAt.toISOString(),
      lastQualityUpdate: article.lastQualityUpdate?.toISOString() ?? null,
    };
    this.db.insert(articles).values(values)
      .onConflictDoUpdate({ target: articles.id, set: values })
      .run();
  }

  async saveAuthor(author: Author, role: 'user' | 'admin' = 'user'): Promise<void> {
    const values = {
      ...author,
      role,
      followers: JSON.stringify(author.followers),
    };
    this.db.insert(users).values(values)
      .onConflictDoUpdate({ target: users.id, set: values })
      .run();
  }

  // --- QualityStore ---

  async findArticle(articleId: string): Promise<Article | null> {
    const row = this.db.select().from(articles).where(eq(articles.id, articleId)).get();
    return row ? toArticle(row) : null;
  }

  async findAuthor(authorId: string): Promise<Author | null> {
    const row = this.db.select().from(users).where(eq(users.id, authorId)).get();
    return row ? toAuthor(row) : null;
  }

  async findCategoryPeers(query: CategoryPeerQuery): Promise<PeerStats[]> {
    return this.db
      .select({ views: articles.views, likes: articles.likes })
      .from(articles)
      .where(and(
        eq(articles.categoryId, query.categoryId),
        ne(articles.id, query.excludeArticleId),
        gte(articles.createdAt, query.createdSince.toISOString()),
      ))
      .all();
  }

  async aggregateAuthorStats(authorId: string): Promise<AuthorStats | null> {
    const row = this.db
      .select({
        totalArticles: sql<number>`count(*)`,
        totalViews: sql<number>`coalesce(sum(${articles.views}), 0)`,
        totalLikes: sql<number>`coalesce(sum(${articles.likes}), 0)`,
        avgQuality: sql<number | null>`avg(${articles.qualityScore})`,
      })
      .from(articles)
      .where(eq(articles.authorId, authorId))
      .get();

    if (!row || row.totalArticles === 0) return null;
    return row;
  }

  async findArticlesNeedingQuality(query: StaleArticleQuery): Promise<string[]> {
    const rows = this.db
      .select({ id: articles.id })
      .from(articles)
      .where(and(
        eq(articles.status, 'published'),
        or(
          isNull(articles.qualityScore),
          isNull(articles.lastQualityUpdate),
          lt(articles.lastQualityUpdate, query.staleBefore.toISOString()),
        ),
      ))
      .limit(query.limit)
      .all();
    return rows.map((r) => r.id);
  }

  async upsertQualityRecord(record: QualityScoreRecord): Promise<void> {
    const values = {
      ...record,
      contentFeatures: JSON.stringify(record.contentFeatures),
      degradedComponents: JSON.stringify(record.degradedComponents),
      calculatedAt: record.calculatedAt.toISOString(),
    };
    this.db.insert(articleQualityScores).values(values)
      .onConflictDoUpdate({ target: articleQualityScores.articleId, set: values })
      .run();
  }

  async updateArticleQuality(articleId: string, update: ArticleQualityUpdate): Promise<void> {
    this.db.update(articles)
      .set({
        qualityScore: update.qualityScore,
        contentQuality: update.contentQuality,
        lastQualityUpdate: update.lastQualityUpdate.toISOString(),
      })
      .where(eq(articles.id, articleId))
      .run();
  }

  async updateArticlePreprocessing(articleId: string, update: ArticlePreprocessingUpdate): Promise<void> {
    this.db.update(articles)
      .set({
        contentFeatures: JSON.stringify(update.contentFeatures),
        embeddingText: update.embeddingText,
        keywords: JSON.stringify(update.keywords),
        processedAt: update.processedAt.toISOString(),
      })
      .where(eq(articles.id, articleId))
      .run();
  }

  async findQualityRecord(articleId: string): Promise<QualityScoreRecord | null> {
    const row = this.db.select().from(articleQualityScores)
      .where(eq(articleQualityScores.articleId, articleId))
      .get();
    return row ? toQualityRecord(row) : null;
  }

  async findQualityRecordsSince(since: Date): Promise<QualityScoreRecord[]> {
    return this.db.select().from(articleQualityScores)
      .where(gte(articleQualityScores.calculatedAt, since.toISOString()))
      .all()
      .map(toQualityRecord);
  }

  // --- SubscriptionStore ---

  async findPublishedArticles(filter: PublishedArticleFilter): Promise<Article[]> {
    const conditions: SQL[] = [eq(articles.status, 'published')];
    if (filter.premiumOnly) conditions.push(eq(articles.isPremiumContent, true));
    if (filter.categoryIds) conditions.push(inArray(articles.categoryId, filter.categoryIds));
    if (filter.authorIds) conditions.push(inArray(articles.authorId, filter.authorIds));
    if (filter.qualityScoreMin !== undefined) conditions.push(gte(articles.qualityScore, filter.qualityScoreMin));
    if (filter.createdAfter) conditions.push(gte(articles.createdAt, filter.createdAfter.toISOString()));

    let query = this.db.select().from(articles).where(and(...conditions)).$dynamic();
    if (filter.orderByQuality) query = query.orderBy(desc(articles.qualityScore));
    if (filter.limit !== undefined) query = query.limit(filter.limit);
    return query.all().map(toArticle);
  }

  async updateArticleAccess(articleId: string, flags: ArticleAccessFlags): Promise<boolean> {
    const result = this.db.update(articles)
      .set({
        contentAccess: flags.contentAccess,
        isPremiumContent: flags.isPremiumContent,
        isEnterpriseContent: flags.isEnterpriseContent,
        premiumFeatures: JSON.stringify(flags.premiumFeatures),
        subscriptionFlaggedAt: flags.subscriptionFlaggedAt.toISOString(),
      })
      .where(eq(articles.id, articleId))
      .run();
    return result.changes > 0;
  }

  async upsertSubscriptionContent(record: SubscriptionContentRecord): Promise<void> {
    const values = {
      ...record,
      premiumFeatures: JSON.stringify(record.premiumFeatures),
      lastAccessed: record.lastAccessed?.toISOString() ?? null,
      createdAt: record.createdAt.toISOString(),
      updatedAt: record.updatedAt.toISOString(),
    };
    // Re-flagging keeps the original creation time and the access tally
    this.db.insert(subscriptionContent).values(values)
      .onConflictDoUpdate({
        target: subscriptionContent.articleId,
        set: {
          contentAccess: values.contentAccess,
          premiumFeatures: values.premiumFeatures,
          updatedAt: values.updatedAt,
        },
      })
      .run();
  }

  async recordSubscriptionAccess(articleId: string, at: Date): Promise<void> {
    this.db.update(subscriptionContent)
      .set({
        accessCount: sql`${subscriptionContent.accessCount} + 1`,
        lastAccessed: at.toISOString(),
        updatedAt: at.toISOString(),
      })
      .where(eq(subscriptionContent.articleId, articleId))
      .run();
  }

  async findSubscriptionContentSince(since: Date): Promise<SubscriptionContentRecord[]> {
    return this.db.select().from(subscriptionContent)
      .where(gte(subscriptionContent.createdAt, since.toISOString()))
      .all()
      .map(toSubscriptionRecord);
  }

  async countUsersByTier(): Promise<Record<SubscriptionTier, number>> {
    const rows = this.db
      .select({ tier: users.subscriptionTier, count: sql<number>`count(*)` })
      .from(users)
      .groupBy(users.subscriptionTier)
      .all();

    const distribution: Record<SubscriptionTier, number> = { free: 0, premium: 0, enterprise: 0 };
    for (const row of rows) {
      const tier = z.enum(SUBSCRIPTION_TIERS).safeParse(row.tier);
      if (tier.success) distribution[tier.data] = row.count;
    }
    return distribution;
  }

  // --- ActivityStore ---

  async insertActivity(activity: UserActivity): Promise<void> {
    this.db.insert(userActivities).values({
      ...activity,
      metadata: JSON.stringify(activity.metadata),
      timestamp: activity.timestamp.toISOString(),
    }).run();
  }

  async countActivities(query: ActivityQuery): Promise<number> {
    const row = this.db
      .select({ count: sql<number>`count(*)` })
      .from(userActivities)
      .where(and(...activityConditions(query)))
      .get();
    return row?.count ?? 0;
  }

  async findActivities(query: ActivityQuery & { limit?: number }): Promise<UserActivity[]> {
    let select = this.db.select().from(userActivities)
      .where(and(...activityConditions(query)))
      .orderBy(desc(userActivities.timestamp))
      .$dynamic();
    if (query.limit !== undefined) select = select.limit(query.limit);
    return select.all().map(toActivity);
  }
}
