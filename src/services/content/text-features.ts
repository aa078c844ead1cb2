// Lexical feature extraction for article bodies.
// Everything here is synchronous and pure apart from the one-time stop-word load.

import { readFileSync } from 'fs';
import { decode } from 'html-entities';
import { z } from 'zod';
import { hashContent } from '../../utils/hash.js';
import { roundHalfEven } from '../../utils/round.js';
import type { ContentLengthCategory, Entities, Keyword, TextFeatures } from '../../types/index.js';

const HTML_TAG_PATTERN = /<[^>]+>/g;
const WHITESPACE_PATTERN = /\s+/g;
const SENTENCE_BOUNDARY_PATTERN = /[.!?]+/;
const PUNCTUATION_PATTERN = /[^\p{L}\p{N}_\s]/gu;
const DIGIT_PATTERN = /\p{Nd}+/gu;
const ALPHABETIC_PATTERN = /^\p{L}+$/u;

const URL_PATTERN = /https?:\/\/(?:[a-zA-Z]|[0-9]|[$-_@.&+]|[!*(),]|(?:%[0-9a-fA-F][0-9a-fA-F]))+/g;
const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b/g;
const MENTION_PATTERN = /@([\p{L}\p{N}_]+)/gu;
const HASHTAG_PATTERN = /#([\p{L}\p{N}_]+)/gu;

const LONG_WORD_MIN_LENGTH = 7;
const EMBEDDING_CONTENT_LIMIT = 2000;
const EMBEDDING_HEAD_CHARS = 1500;
const EMBEDDING_TAIL_CHARS = 500;
const CONTENT_HASH_LENGTH = 16;

export const DEFAULT_WORDS_PER_MINUTE = 200;
export const DEFAULT_MAX_KEYWORDS = 20;

const StopWordsSchema = z.array(z.string().min(1));

function loadStopWords(): ReadonlySet<string> {
  const raw = readFileSync(new URL('../../../resources/stop-words.json', import.meta.url), 'utf-8');
  return new Set(StopWordsSchema.parse(JSON.parse(raw)));
}

export const STOP_WORDS: ReadonlySet<string> = loadStopWords();

const EMPTY_TEXT_FEATURES: TextFeatures = {
  wordCount: 0,
  sentenceCount: 0,
  paragraphCount: 0,
  avgSentenceLength: 0,
  readabilityScore: 0,
  complexityScore: 0,
  characterCount: 0,
  uniqueWordRatio: 0,
};

// Code points, not UTF-16 units
function charLength(word: string): number {
  return Array.from(word).length;
}

function splitWords(cleaned: string): string[] {
  return cleaned ? cleaned.split(' ') : [];
}

function stripTags(text: string): string {
  return decode(text).replace(HTML_TAG_PATTERN, ' ');
}

/**
 * Decode entities, replace tags with spaces and collapse whitespace.
 */
export function cleanHtml(text: string | null | undefined): string {
  if (!text) return '';
  return stripTags(text).replace(WHITESPACE_PATTERN, ' ').trim();
}

// Paragraphs are blank-line separated, so count them before whitespace is collapsed
function countParagraphs(content: string): number {
  const text = stripTags(content).replace(/\r\n?/g, '\n');
  return text.split('\n\n').filter((p) => p.trim().length > 0).length;
}

export function extractTextFeatures(content: string | null | undefined): TextFeatures {
  if (!content) return { ...EMPTY_TEXT_FEATURES };

  const cleaned = cleanHtml(content);
  const words = splitWords(cleaned);
  const wordCount = words.length;

  const sentenceCount = cleaned
    .split(SENTENCE_BOUNDARY_PATTERN)
    .filter((s) => s.trim().length > 0).length;

  const avgWordsPerSentence = wordCount / Math.max(sentenceCount, 1);
  const longWords = words.filter((w) => charLength(w) >= LONG_WORD_MIN_LENGTH).length;
  const longWordDensity = longWords / Math.max(wordCount, 1);

  // Flesch-style approximation using long words in place of syllables
  const rawReadability = 206.835 - 1.015 * avgWordsPerSentence - 84.6 * longWordDensity;
  const readabilityScore = Math.max(0, Math.min(100, rawReadability));

  const uniqueWords = new Set(
    words.filter((w) => ALPHABETIC_PATTERN.test(w)).map((w) => w.toLowerCase()),
  ).size;

  return {
    wordCount,
    sentenceCount,
    paragraphCount: countParagraphs(content),
    avgSentenceLength: roundHalfEven(avgWordsPerSentence, 2),
    readabilityScore: roundHalfEven(readabilityScore, 2),
    complexityScore: roundHalfEven((uniqueWords / Math.max(wordCount, 1)) * 100, 2),
    characterCount: cleaned.length,
    uniqueWordRatio: roundHalfEven(uniqueWords / Math.max(wordCount, 1), 3),
  };
}

/**
 * Most frequent non-stop-word tokens. Equal frequencies keep first-seen order.
 */
export function extractKeywords(
  text: string | null | undefined,
  maxKeywords: number = DEFAULT_MAX_KEYWORDS,
): Keyword[] {
  if (!text || maxKeywords <= 0) return [];

  const normalized = cleanHtml(text)
    .toLowerCase()
    .replace(PUNCTUATION_PATTERN, ' ')
    .replace(DIGIT_PATTERN, ' ')
    .normalize('NFKD');

  const words = normalized
    .split(WHITESPACE_PATTERN)
    .filter((w) => charLength(w) > 2 && !STOP_WORDS.has(w));

  const counts = new Map<string, number>();
  for (const word of words) {
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, maxKeywords)
    .map(([keyword, frequency]) => ({
      keyword,
      frequency,
      score: frequency / words.length,
    }));
}

function captureGroup(text: string, pattern: RegExp): string[] {
  return Array.from(text.matchAll(pattern), (m) => m[1] ?? '').filter(Boolean);
}

export function extractEntities(text: string | null | undefined): Entities {
  if (!text) {
    return { urls: [], emails: [], mentions: [], hashtags: [] };
  }

  return {
    urls: text.match(URL_PATTERN) ?? [],
    emails: text.match(EMAIL_PATTERN) ?? [],
    mentions: captureGroup(text, MENTION_PATTERN),
    hashtags: captureGroup(text, HASHTAG_PATTERN),
  };
}

export function estimateReadingTime(
  content: string | null | undefined,
  wordsPerMinute: number = DEFAULT_WORDS_PER_MINUTE,
): number {
  if (!content) return 0;
  const wordCount = splitWords(cleanHtml(content)).length;
  return Math.max(1, roundHalfEven(wordCount / wordsPerMinute));
}

export function categorizeContentLength(wordCount: number): ContentLengthCategory {
  if (wordCount < 300) return 'short';
  if (wordCount < 1500) return 'medium';
  return 'long';
}

/**
 * Change-detection fingerprint: truncated SHA-256 of the normalized, lower-cased text.
 */
export function calculateContentHash(content: string | null | undefined): string {
  if (!content) return '';
  return hashContent(cleanHtml(content).toLowerCase(), CONTENT_HASH_LENGTH);
}

/**
 * Build the text handed to an embedding model. The title is repeated to weight
 * it, long bodies keep their head and tail, and tags are appended twice.
 */
export function preprocessForEmbedding(
  title: string | null | undefined,
  content: string | null | undefined,
  tags: readonly string[] = [],
): string {
  if (!title && !content) return '';

  const cleanTitle = cleanHtml(title);
  let cleanContent = cleanHtml(content);
  const parts: string[] = [];

  if (cleanTitle) {
    parts.push(cleanTitle, cleanTitle, cleanTitle);
  }

  if (cleanContent) {
    if (cleanContent.length > EMBEDDING_CONTENT_LIMIT) {
      cleanContent =
        cleanContent.slice(0, EMBEDDING_HEAD_CHARS) + ' ... ' + cleanContent.slice(-EMBEDDING_TAIL_CHARS);
    }
    parts.push(cleanContent);
  }

  if (tags.length > 0) {
    const tagText = tags.map((tag) => `#${tag}`).join(' ');
    parts.push(tagText, tagText);
  }

  return parts.join(' ');
}
