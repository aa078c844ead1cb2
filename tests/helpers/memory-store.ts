import type {
  ActivityQuery,
  ArticleAccessFlags,
  ArticlePreprocessingUpdate,
  ArticleQualityUpdate,
  CategoryPeerQuery,
  ContentStore,
  PublishedArticleFilter,
  StaleArticleQuery,
} from '../../src/db/store.js';
import type {
  Article,
  Author,
  AuthorStats,
  PeerStats,
  QualityScoreRecord,
  SubscriptionContentRecord,
  SubscriptionTier,
  UserActivity,
} from '../../src/types/index.js';

export const FIXED_NOW = new Date('2025-06-15T12:00:00.000Z');

export function makeArticle(overrides: Partial<Article> = {}): Article {
  return {
    id: 'article-1',
    name: 'A test article',
    content: 'Short body.',
    excerpt: null,
    image: null,
    imageId: null,
    tags: [],
    categoryId: 'category-1',
    authorId: 'author-1',
    status: 'published',
    views: 0,
    likes: 0,
    bookmarkedBy: [],
    comments: [],
    isSpotlight: false,
    isPopular: false,
    createdAt: FIXED_NOW,
    qualityScore: null,
    contentQuality: null,
    lastQualityUpdate: null,
    contentAccess: 'free',
    isPremiumContent: false,
    isEnterpriseContent: false,
    ...overrides,
  };
}

export function makeAuthor(overrides: Partial<Author> = {}): Author {
  return {
    id: 'author-1',
    username: 'author-one',
    followers: [],
    subscriptionTier: 'free',
    ...overrides,
  };
}

export function ids(prefix: string, count: number): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}-${i}`);
}

/**
 * ContentStore backed by plain maps, with the same query semantics as the
 * SQLite store.
 */
export class MemoryContentStore implements ContentStore {
  readonly articles = new Map<string, Article>();
  readonly authors = new Map<string, Author>();
  readonly qualityRecords = new Map<string, QualityScoreRecord>();
  readonly subscriptionRecords = new Map<string, SubscriptionContentRecord>();
  readonly preprocessing = new Map<string, ArticlePreprocessingUpdate>();
  readonly accessFlags = new Map<string, ArticleAccessFlags>();
  readonly activities: UserActivity[] = [];

  addArticle(...articles: Article[]): this {
    for (const article of articles) this.articles.set(article.id, { ...article });
    return this;
  }

  addAuthor(...authors: Author[]): this {
    for (const author of authors) this.authors.set(author.id, { ...author });
    return this;
  }

  async findArticle(articleId: string): Promise<Article | null> {
    return this.articles.get(articleId) ?? null;
  }

  async findAuthor(authorId: string): Promise<Author | null> {
    return this.authors.get(authorId) ?? null;
  }

  async findCategoryPeers(query: CategoryPeerQuery): Promise<PeerStats[]> {
    return [...this.articles.values()]
      .filter((a) =>
        a.categoryId === query.categoryId &&
        a.id !== query.excludeArticleId &&
        a.createdAt.getTime() >= query.createdSince.getTime())
      .map((a) => ({ views: a.views, likes: a.likes }));
  }

  async aggregateAuthorStats(authorId: string): Promise<AuthorStats | null> {
    const owned = [...this.articles.values()].filter((a) => a.authorId === authorId);
    if (owned.length === 0) return null;

    const scored = owned.flatMap((a) => (a.qualityScore === null ? [] : [a.qualityScore]));
    return {
      totalArticles: owned.length,
      totalViews: owned.reduce((sum, a) => sum + a.views, 0),
      totalLikes: owned.reduce((sum, a) => sum + a.likes, 0),
      avgQuality: scored.length === 0 ? null : scored.reduce((sum, v) => sum + v, 0) / scored.length,
    };
  }

  async findArticlesNeedingQuality(query: StaleArticleQuery): Promise<string[]> {
    return [...this.articles.values()]
      .filter((a) =>
        a.status === 'published' &&
        (a.qualityScore === null ||
          a.lastQualityUpdate === null ||
          a.lastQualityUpdate.getTime() < query.staleBefore.getTime()))
      .slice(0, query.limit)
      .map((a) => a.id);
  }

  async upsertQualityRecord(record: QualityScoreRecord): Promise<void> {
    this.qualityRecords.set(record.articleId, record);
  }

  async updateArticleQuality(articleId: string, update: ArticleQualityUpdate): Promise<void> {
    const article = this.articles.get(articleId);
    if (article) this.articles.set(articleId, { ...article, ...update });
  }

  async updateArticlePreprocessing(articleId: string, update: ArticlePreprocessingUpdate): Promise<void> {
    if (this.articles.has(articleId)) this.preprocessing.set(articleId, update);
  }

  async findQualityRecord(articleId: string): Promise<QualityScoreRecord | null> {
    return this.qualityRecords.get(articleId) ?? null;
  }

  async findQualityRecordsSince(since: Date): Promise<QualityScoreRecord[]> {
    return [...this.qualityRecords.values()].filter((r) => r.calculatedAt.getTime() >= since.getTime());
  }

  async findPublishedArticles(filter: PublishedArticleFilter): Promise<Article[]> {
    const { categoryIds, authorIds, qualityScoreMin, createdAfter } = filter;
    const matches = [...this.articles.values()].filter((a) =>
      a.status === 'published' &&
      (!filter.premiumOnly || a.isPremiumContent) &&
      (!categoryIds || categoryIds.includes(a.categoryId)) &&
      (!authorIds || authorIds.includes(a.authorId)) &&
      (qualityScoreMin === undefined || (a.qualityScore !== null && a.qualityScore >= qualityScoreMin)) &&
      (!createdAfter || a.createdAt.getTime() >= createdAfter.getTime()));

    if (filter.orderByQuality) {
      matches.sort((a, b) => (b.qualityScore ?? -Infinity) - (a.qualityScore ?? -Infinity));
    }
    return filter.limit === undefined ? matches : matches.slice(0, filter.limit);
  }

  async updateArticleAccess(articleId: string, flags: ArticleAccessFlags): Promise<boolean> {
    const article = this.articles.get(articleId);
    if (!article) return false;

    this.articles.set(articleId, {
      ...article,
      contentAccess: flags.contentAccess,
      isPremiumContent: flags.isPremiumContent,
      isEnterpriseContent: flags.isEnterpriseContent,
    });
    this.accessFlags.set(articleId, flags);
    return true;
  }

  async upsertSubscriptionContent(record: SubscriptionContentRecord): Promise<void> {
    const existing = this.subscriptionRecords.get(record.articleId);
    this.subscriptionRecords.set(record.articleId, existing
      ? { ...existing, contentAccess: record.contentAccess, premiumFeatures: record.premiumFeatures, updatedAt: record.updatedAt }
      : record);
  }

  async recordSubscriptionAccess(articleId: string, at: Date): Promise<void> {
    const existing = this.subscriptionRecords.get(articleId);
    if (existing) {
      this.subscriptionRecords.set(articleId, {
        ...existing,
        accessCount: existing.accessCount + 1,
        lastAccessed: at,
        updatedAt: at,
      });
    }
  }

  async findSubscriptionContentSince(since: Date): Promise<SubscriptionContentRecord[]> {
    return [...this.subscriptionRecords.values()].filter((r) => r.createdAt.getTime() >= since.getTime());
  }

  async countUsersByTier(): Promise<Record<SubscriptionTier, number>> {
    const distribution: Record<SubscriptionTier, number> = { free: 0, premium: 0, enterprise: 0 };
    for (const author of this.authors.values()) distribution[author.subscriptionTier]++;
    return distribution;
  }

  async insertActivity(activity: UserActivity): Promise<void> {
    this.activities.push(activity);
  }

  private matchingActivities(query: ActivityQuery): UserActivity[] {
    return this.activities.filter((a) =>
      a.userId === query.userId &&
      (!query.action || a.action === query.action) &&
      (!query.since || a.timestamp.getTime() >= query.since.getTime()));
  }

  async countActivities(query: ActivityQuery): Promise<number> {
    return this.matchingActivities(query).length;
  }

  async findActivities(query: ActivityQuery & { limit?: number }): Promise<UserActivity[]> {
    const sorted = this.matchingActivities(query)
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
    return query.limit === undefined ? sorted : sorted.slice(0, query.limit);
  }
}
