import { config } from '../../config.js';
import {
  ACCESS_RULES,
  accessFlagsFor,
  checkUsageAgainstRules,
  evaluateTierAccess,
  getUpgradeSuggestions,
  type AccessType,
  type UpgradeSuggestions,
  type UsageLimitCheck,
} from './access.js';
import { daysAgo, startOfUtcDay, startOfUtcMonth, systemClock, type Clock } from '../../utils/clock.js';
import { errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { ActivityStore, SubscriptionStore } from '../../db/store.js';
import type { ContentAccess, SubscriptionTier } from '../../types/index.js';

const logger = createLogger('subscription');

export interface ContentAccessResult {
  canAccess: boolean;
  accessType: AccessType;
  reason?: string;
  userTier?: SubscriptionTier;
  contentAccess?: ContentAccess;
  isPremium?: boolean;
  isEnterprise?: boolean;
  upgradeSuggestions?: UpgradeSuggestions;
}

export interface PremiumSuggestion {
  id: string;
  title: string;
  excerpt: string;
  qualityScore: number;
  isPremium: boolean;
  isEnterprise: boolean;
  contentAccess: ContentAccess;
  previewAvailable: boolean;
}

export interface FlagCriteria {
  qualityScoreMin?: number;
  categoryIds?: string[];
  authorIds?: string[];
  createdAfter?: Date;
}

export interface BatchFlagResult {
  processed: number;
  errors: number;
  articleIds: string[];
}

export interface AccessLevelStats {
  contentAccess: ContentAccess;
  totalArticles: number;
  totalAccessCount: number;
  avgAccessCount: number;
}

export interface SubscriptionAnalytics {
  periodDays: number;
  contentAccessStats: AccessLevelStats[];
  userTierDistribution: Record<SubscriptionTier, number>;
  generatedAt: Date;
}

const PREFERRED_CATEGORY_LIMIT = 10;

export class SubscriptionService {
  private readonly clock: Clock;

  constructor(
    private readonly store: SubscriptionStore & ActivityStore,
    options: { clock?: Clock } = {},
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Set an article's access level and upsert its tracking record.
   * Returns false when the article does not exist.
   */
  async flagArticleForSubscription(
    articleId: string,
    contentAccess: ContentAccess,
    premiumFeatures: Record<string, unknown> = {},
  ): Promise<boolean> {
    const now = this.clock();
    const updated = await this.store.updateArticleAccess(articleId, {
      contentAccess,
      ...accessFlagsFor(contentAccess),
      premiumFeatures,
      subscriptionFlaggedAt: now,
    });

    if (!updated) {
      logger.warn('Cannot flag missing article', { articleId, contentAccess });
      return false;
    }

    await this.store.upsertSubscriptionContent({
      articleId,
      contentAccess,
      premiumFeatures,
      accessCount: 0,
      revenueGenerated: 0,
      lastAccessed: null,
      createdAt: now,
      updatedAt: now,
    });

    logger.info('Article flagged for subscription', { articleId, contentAccess });
    return true;
  }

  async checkContentAccess(userId: string, articleId: string): Promise<ContentAccessResult> {
    const user = await this.store.findAuthor(userId);
    const userTier: SubscriptionTier = user?.subscriptionTier ?? 'free';

    const article = await this.store.findArticle(articleId);
    if (!article) {
      return { canAccess: false, reason: 'Article not found', accessType: 'denied' };
    }

    let decision = evaluateTierAccess(userTier, article);

    // Only free readers are metered
    if (userTier === 'free' && decision.canAccess) {
      const limits = await this.checkUsageLimits(userId, userTier);
      if (!limits.withinLimits) {
        decision = { canAccess: false, accessType: 'limit_exceeded', reason: limits.reason };
      }
    }

    const result: ContentAccessResult = {
      canAccess: decision.canAccess,
      accessType: decision.accessType,
      userTier,
      contentAccess: article.contentAccess,
      isPremium: article.isPremiumContent,
      isEnterprise: article.isEnterpriseContent,
    };

    if (decision.reason) {
      result.reason = decision.reason;
    }
    if (!decision.canAccess) {
      result.upgradeSuggestions = getUpgradeSuggestions(userTier, article.contentAccess);
    }

    return result;
  }

  /**
   * Compare the reader's views today and this month against their tier's
   * limits. A failed count lookup lets the reader through.
   */
  async checkUsageLimits(userId: string, tier: SubscriptionTier): Promise<UsageLimitCheck> {
    const rules = ACCESS_RULES[tier];
    const now = this.clock();

    try {
      const today = rules.dailyArticleLimit === null
        ? 0
        : await this.store.countActivities({ userId, action: 'view', since: startOfUtcDay(now) });
      const thisMonth = rules.monthlyArticleLimit === null
        ? 0
        : await this.store.countActivities({ userId, action: 'view', since: startOfUtcMonth(now) });

      return checkUsageAgainstRules(rules, { today, thisMonth });
    } catch (error) {
      logger.warn('Usage limit lookup failed, allowing access', { userId, error: errorMessage(error) });
      return { withinLimits: true };
    }
  }

  async trackContentAccess(userId: string, articleId: string, accessGranted: boolean): Promise<void> {
    if (!accessGranted) return;
    try {
      await this.store.recordSubscriptionAccess(articleId, this.clock());
    } catch (error) {
      logger.warn('Failed to record content access', { userId, articleId, error: errorMessage(error) });
    }
  }

  /**
   * Premium articles, best quality first, from the categories behind the
   * last {@link PREFERRED_CATEGORY_LIMIT} entries of the user's recent view
   * history (newest first, so these are its oldest views). Duplicates are
   * dropped after that cut.
   */
  async getPremiumContentSuggestions(userId: string, limit: number = 10): Promise<PremiumSuggestion[]> {
    const recentViews = await this.store.findActivities({
      userId,
      action: 'view',
      limit: config.subscription.suggestionHistorySize,
    });

    const viewedCategories: string[] = [];
    for (const activity of recentViews) {
      if (!activity.articleId) continue;
      const viewed = await this.store.findArticle(activity.articleId);
      if (viewed) viewedCategories.push(viewed.categoryId);
    }
    const preferredCategories = [...new Set(viewedCategories.slice(-PREFERRED_CATEGORY_LIMIT))];

    const articles = await this.store.findPublishedArticles({
      premiumOnly: true,
      categoryIds: preferredCategories.length > 0 ? preferredCategories : undefined,
      orderByQuality: true,
      limit,
    });

    return articles.map((article) => ({
      id: article.id,
      title: article.name,
      excerpt: article.excerpt ?? '',
      qualityScore: article.qualityScore ?? 0,
      isPremium: article.isPremiumContent,
      isEnterprise: article.isEnterpriseContent,
      contentAccess: article.contentAccess,
      previewAvailable: true,
    }));
  }

  async batchFlagArticlesByCriteria(criteria: FlagCriteria, contentAccess: ContentAccess): Promise<BatchFlagResult> {
    const articles = await this.store.findPublishedArticles({
      qualityScoreMin: criteria.qualityScoreMin || undefined,
      categoryIds: criteria.categoryIds?.length ? criteria.categoryIds : undefined,
      authorIds: criteria.authorIds?.length ? criteria.authorIds : undefined,
      createdAfter: criteria.createdAfter,
    });

    const result: BatchFlagResult = { processed: 0, errors: 0, articleIds: [] };

    for (const article of articles) {
      try {
        const flagged = await this.flagArticleForSubscription(article.id, contentAccess);
        if (flagged) {
          result.processed++;
          result.articleIds.push(article.id);
        } else {
          result.errors++;
        }
      } catch (error) {
        logger.error('Failed to flag article', { articleId: article.id, error: errorMessage(error) });
        result.errors++;
      }
    }

    logger.info('Batch flagging complete', { contentAccess, processed: result.processed, errors: result.errors });
    return result;
  }

  async getSubscriptionAnalytics(days: number = 30): Promise<SubscriptionAnalytics> {
    const now = this.clock();
    const records = await this.store.findSubscriptionContentSince(daysAgo(now, days));

    const grouped = new Map<ContentAccess, { totalArticles: number; totalAccessCount: number }>();
    for (const record of records) {
      const entry = grouped.get(record.contentAccess) ?? { totalArticles: 0, totalAccessCount: 0 };
      entry.totalArticles++;
      entry.totalAccessCount += record.accessCount;
      grouped.set(record.contentAccess, entry);
    }

    return {
      periodDays: days,
      contentAccessStats: [...grouped.entries()].map(([contentAccess, stats]) => ({
        contentAccess,
        ...stats,
        avgAccessCount: stats.totalAccessCount / stats.totalArticles,
      })),
      userTierDistribution: await this.store.countUsersByTier(),
      generatedAt: now,
    };
  }
}
