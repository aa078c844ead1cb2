// Article quality orchestration: runs the five scorers for an article,
// persists the record and keeps the article's quality fields in sync.

import { config } from '../../config.js';
import { extractContentQualityFeatures, preprocessArticle } from '../content/quality-features.js';
import { calculateEngagementScore } from './engagement.js';
import { calculateSocialScore } from './social.js';
import { calculateAuthorCredibilityScore } from './author.js';
import { calculateRecencyScore } from './recency.js';
import { categorizeQualityScore, combineQualityScores } from './combine.js';
import { daysAgo, systemClock, type Clock } from '../../utils/clock.js';
import { errorMessage, NotFoundError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { roundHalfEven } from '../../utils/round.js';
import type { QualityStore } from '../../db/store.js';
import type { ContentFeatures, QualityScoreRecord, ScoreComponent, SubScore } from '../../types/index.js';

const logger = createLogger('quality:service');

export interface QualityServiceOptions {
  clock?: Clock;
  version?: string;
  staleAfterDays?: number;
  batchLimit?: number;
  batchConcurrency?: number;
  categoryWindowDays?: number;
  wordsPerMinute?: number;
  maxKeywords?: number;
}

export interface BatchQualityRequest {
  articleIds?: string[];
  limit?: number;
}

export type ArticleBatchResult =
  | { articleId: string; status: 'success'; qualityScore: number }
  | { articleId: string; status: 'error'; error: string };

export interface BatchQualityResult {
  processed: number;
  errors: number;
  articleResults: ArticleBatchResult[];
}

export interface AverageScores {
  overall: number;
  content: number;
  engagement: number;
  social: number;
  author: number;
  recency: number;
}

export interface QualityDistribution {
  excellent: number;
  good: number;
  averageOrBelow: number;
}

export type QualityInsights =
  | {
      periodDays: number;
      totalArticlesAnalyzed: number;
      averageScores: AverageScores;
      qualityDistribution: QualityDistribution;
    }
  | {
      periodDays: number;
      totalArticlesAnalyzed: 0;
      message: string;
    };

export interface PreprocessResult {
  articleId: string;
  contentFeatures: ContentFeatures;
  keywordCount: number;
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export class ContentQualityService {
  private readonly clock: Clock;
  private readonly version: string;
  private readonly staleAfterDays: number;
  private readonly batchLimit: number;
  private readonly batchConcurrency: number;
  private readonly categoryWindowDays: number;
  private readonly wordsPerMinute: number;
  private readonly maxKeywords: number;

  constructor(
    private readonly store: QualityStore,
    options: QualityServiceOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.version = options.version ?? config.quality.version;
    this.staleAfterDays = options.staleAfterDays ?? config.quality.staleAfterDays;
    this.batchLimit = options.batchLimit ?? config.quality.batchLimit;
    this.batchConcurrency = Math.max(1, options.batchConcurrency ?? config.quality.batchConcurrency);
    this.categoryWindowDays = options.categoryWindowDays ?? config.quality.categoryWindowDays;
    this.wordsPerMinute = options.wordsPerMinute ?? config.preprocessing.wordsPerMinute;
    this.maxKeywords = options.maxKeywords ?? config.preprocessing.maxKeywords;
  }

  async calculateArticleQualityScore(articleId: string): Promise<QualityScoreRecord> {
    const article = await this.store.findArticle(articleId);
    if (!article) {
      throw new NotFoundError('Article', articleId);
    }

    const now = this.clock();
    const contentFeatures = extractContentQualityFeatures(article, this.wordsPerMinute);
    const engagementScore = calculateEngagementScore(article);
    const social = await calculateSocialScore(this.store, article, {
      now,
      categoryWindowDays: this.categoryWindowDays,
    });
    const author = await calculateAuthorCredibilityScore(this.store, article.authorId);
    const recencyScore = calculateRecencyScore(article.createdAt, now);

    const overallScore = combineQualityScores({
      content: contentFeatures.qualityScore,
      engagement: engagementScore,
      social: social.score,
      author: author.score,
      recency: recencyScore,
    });

    const withFallbacks: Array<[ScoreComponent, SubScore]> = [
      ['social', social],
      ['author', author],
    ];
    const degraded = withFallbacks
      .filter(([, sub]) => sub.confidence === 'degraded')
      .map(([component]) => component);

    if (degraded.length > 0) {
      logger.debug('Scored with neutral fallbacks', {
        articleId,
        degraded,
        reasons: [social.reason, author.reason].filter(Boolean),
      });
    }

    const record: QualityScoreRecord = {
      articleId,
      overallScore,
      contentScore: contentFeatures.qualityScore,
      engagementScore,
      socialScore: social.score,
      authorScore: author.score,
      recencyScore,
      contentFeatures,
      confidence: degraded.length > 0 ? 'degraded' : 'full',
      degradedComponents: degraded,
      calculatedAt: now,
      version: this.version,
    };

    await this.store.upsertQualityRecord(record);
    await this.store.updateArticleQuality(articleId, {
      qualityScore: overallScore,
      contentQuality: categorizeQualityScore(overallScore),
      lastQualityUpdate: now,
    });

    logger.info('Article quality scored', { articleId, overallScore, confidence: record.confidence });
    return record;
  }

  /**
   * Score a list of articles, or when none are given, up to `limit` published
   * articles that are unscored or stale. One article failing never stops the rest.
   */
  async batchCalculateQualityScores(request: BatchQualityRequest = {}): Promise<BatchQualityResult> {
    const limit = request.limit ?? this.batchLimit;
    let articleIds = request.articleIds ?? [];

    if (articleIds.length === 0) {
      articleIds = await this.store.findArticlesNeedingQuality({
        staleBefore: daysAgo(this.clock(), this.staleAfterDays),
        limit,
      });
    }

    logger.info('Starting batch quality calculation', {
      count: articleIds.length,
      concurrency: this.batchConcurrency,
    });

    const done = logger.time('Batch quality calculation');
    const articleResults: ArticleBatchResult[] = new Array(articleIds.length);

    // Windows of `batchConcurrency` articles; each article is independent
    for (let start = 0; start < articleIds.length; start += this.batchConcurrency) {
      const window = articleIds.slice(start, start + this.batchConcurrency);
      const settled = await Promise.all(window.map((id) => this.scoreForBatch(id)));
      settled.forEach((result, offset) => {
        articleResults[start + offset] = result;
      });
    }

    const processed = articleResults.filter((r) => r.status === 'success').length;
    const result: BatchQualityResult = {
      processed,
      errors: articleResults.length - processed,
      articleResults,
    };

    done();
    logger.info('Batch quality calculation complete', { processed: result.processed, errors: result.errors });
    return result;
  }

  private async scoreForBatch(articleId: string): Promise<ArticleBatchResult> {
    try {
      const record = await this.calculateArticleQualityScore(articleId);
      return { articleId, status: 'success', qualityScore: record.overallScore };
    } catch (error) {
      logger.warn('Article quality calculation failed', { articleId, error: errorMessage(error) });
      return { articleId, status: 'error', error: errorMessage(error) };
    }
  }

  async getQualityInsights(days: number = config.quality.insightsDays): Promise<QualityInsights> {
    const records = await this.store.findQualityRecordsSince(daysAgo(this.clock(), days));

    if (records.length === 0) {
      return {
        periodDays: days,
        totalArticlesAnalyzed: 0,
        message: 'No quality data available for the specified period',
      };
    }

    const excellent = records.filter((r) => r.overallScore >= 80).length;
    const good = records.filter((r) => r.overallScore >= 65 && r.overallScore < 80).length;

    return {
      periodDays: days,
      totalArticlesAnalyzed: records.length,
      averageScores: {
        overall: roundHalfEven(mean(records.map((r) => r.overallScore)), 2),
        content: roundHalfEven(mean(records.map((r) => r.contentScore)), 2),
        engagement: roundHalfEven(mean(records.map((r) => r.engagementScore)), 2),
        social: roundHalfEven(mean(records.map((r) => r.socialScore)), 2),
        author: roundHalfEven(mean(records.map((r) => r.authorScore)), 2),
        recency: roundHalfEven(mean(records.map((r) => r.recencyScore)), 2),
      },
      qualityDistribution: {
        excellent,
        good,
        averageOrBelow: records.length - excellent - good,
      },
    };
  }

  async getArticleQualityDetails(articleId: string): Promise<QualityScoreRecord | null> {
    return this.store.findQualityRecord(articleId);
  }

  /** Extract features, embedding text and keywords and store them on the article. */
  async preprocessArticleContent(articleId: string): Promise<PreprocessResult> {
    const article = await this.store.findArticle(articleId);
    if (!article) {
      throw new NotFoundError('Article', articleId);
    }

    const processed = preprocessArticle(article, {
      wordsPerMinute: this.wordsPerMinute,
      maxKeywords: this.maxKeywords,
    });

    await this.store.updateArticlePreprocessing(articleId, {
      ...processed,
      processedAt: this.clock(),
    });

    return {
      articleId,
      contentFeatures: processed.contentFeatures,
      keywordCount: processed.keywords.length,
    };
  }
}
