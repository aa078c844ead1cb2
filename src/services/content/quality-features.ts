import {
  calculateContentHash,
  categorizeContentLength,
  DEFAULT_WORDS_PER_MINUTE,
  estimateReadingTime,
  extractEntities,
  extractKeywords,
  extractTextFeatures,
  preprocessForEmbedding,
} from './text-features.js';
import { createLogger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { Article, ContentFeatures, Keyword } from '../../types/index.js';

const logger = createLogger('content:quality-features');

const FEATURE_KEYWORD_LIMIT = 10;
const MAX_CONTENT_SCORE = 100;

/** The article fields feature extraction reads. */
export type FeatureSource = Pick<Article, 'content' | 'name' | 'excerpt' | 'image' | 'imageId' | 'tags'>;

export type RubricInput = Omit<ContentFeatures, 'qualityScore'>;

function inRange(value: number, min: number, max: number): boolean {
  return value >= min && value <= max;
}

function wordCountPoints(wordCount: number): number {
  if (wordCount > 1000) return 25;
  if (wordCount > 500) return 20;
  if (wordCount > 200) return 15;
  if (wordCount > 100) return 10;
  return 0;
}

function readabilityPoints(readability: number): number {
  if (inRange(readability, 60, 80)) return 20;
  if ((readability >= 40 && readability < 60) || (readability > 80 && readability <= 90)) return 15;
  if ((readability >= 20 && readability < 40) || (readability > 90 && readability <= 100)) return 10;
  return 0;
}

function titlePoints(titleLength: number): number {
  if (inRange(titleLength, 30, 70)) return 10;
  if ((titleLength >= 20 && titleLength < 30) || (titleLength > 70 && titleLength <= 100)) return 7;
  return 0;
}

function complexityPoints(complexity: number): number {
  if (inRange(complexity, 15, 40)) return 10;
  if ((complexity >= 10 && complexity < 15) || (complexity > 40 && complexity <= 50)) return 7;
  return 0;
}

/**
 * Point-allocation rubric for content quality. The category maxima sum to
 * exactly 100 (25 + 20 + 15 + 20 + 10 + 10).
 */
export function calculateQualityScore(features: RubricInput): number {
  let score = 0;

  score += wordCountPoints(features.wordCount);
  score += readabilityPoints(features.readabilityScore);

  // Structure
  if (features.paragraphCount > 3) score += 8;
  if (features.sentenceCount > 10) score += 7;

  // Rich content
  if (features.hasImage) score += 5;
  if (features.hasExcerpt) score += 5;
  if (features.tagCount > 2) score += 5;
  if (features.keywordDiversity > 5) score += 5;

  score += titlePoints(features.titleLength);
  score += complexityPoints(features.complexityScore);

  return Math.min(score, MAX_CONTENT_SCORE);
}

export function extractContentQualityFeatures(
  article: FeatureSource,
  wordsPerMinute: number = DEFAULT_WORDS_PER_MINUTE,
): ContentFeatures {
  const content = article.content;
  const textFeatures = extractTextFeatures(content);
  const keywords = extractKeywords(content, FEATURE_KEYWORD_LIMIT);
  const entities = extractEntities(content);

  const features: RubricInput = {
    ...textFeatures,
    titleLength: Array.from(article.name).length,
    hasExcerpt: Boolean(article.excerpt),
    hasImage: Boolean(article.image || article.imageId),
    tagCount: article.tags.length,
    keywordDiversity: keywords.length,
    urlCount: entities.urls.length,
    contentHash: calculateContentHash(content),
    readingTimeMinutes: estimateReadingTime(content, wordsPerMinute),
    contentLengthCategory: categorizeContentLength(textFeatures.wordCount),
  };

  return { ...features, qualityScore: calculateQualityScore(features) };
}

export interface PreprocessedArticle {
  contentFeatures: ContentFeatures;
  embeddingText: string;
  keywords: Keyword[];
}

export function preprocessArticle(
  article: FeatureSource,
  options: { wordsPerMinute?: number; maxKeywords?: number } = {},
): PreprocessedArticle {
  return {
    contentFeatures: extractContentQualityFeatures(article, options.wordsPerMinute),
    embeddingText: preprocessForEmbedding(article.name, article.content, article.tags),
    keywords: extractKeywords(article.content, options.maxKeywords),
  };
}

export interface PreprocessedBatchItem<T> {
  article: T;
  embeddingText: string;
  contentFeatures: ContentFeatures | { qualityScore: number };
}

/**
 * Preprocess many articles. A failing article is kept with a raw-text
 * embedding fallback and a zero quality score.
 */
export function preprocessArticles<T extends FeatureSource & { id?: string }>(
  articles: readonly T[],
  wordsPerMinute?: number,
): PreprocessedBatchItem<T>[] {
  return articles.map((article) => {
    try {
      return {
        article,
        contentFeatures: extractContentQualityFeatures(article, wordsPerMinute),
        embeddingText: preprocessForEmbedding(article.name, article.content, article.tags),
      };
    } catch (error) {
      logger.warn('Preprocessing failed, using fallback', { articleId: article.id ?? 'unknown', error: errorMessage(error) });
      return {
        article,
        contentFeatures: { qualityScore: 0 },
        embeddingText: `${article.name} ${article.content.slice(0, 500)}`,
      };
    }
  });
}
