import { roundHalfEven } from '../../utils/round.js';
import type { QualityLabel } from '../../types/index.js';

export interface ComponentScores {
  content: number;
  engagement: number;
  social: number;
  author: number;
  recency: number;
}

export const QUALITY_WEIGHTS: Readonly<ComponentScores> = {
  content: 0.30,
  engagement: 0.25,
  social: 0.20,
  author: 0.15,
  recency: 0.10,
};

export function combineQualityScores(scores: ComponentScores): number {
  const weighted =
    scores.content * QUALITY_WEIGHTS.content +
    scores.engagement * QUALITY_WEIGHTS.engagement +
    scores.social * QUALITY_WEIGHTS.social +
    scores.author * QUALITY_WEIGHTS.author +
    scores.recency * QUALITY_WEIGHTS.recency;

  return Math.min(roundHalfEven(weighted, 2), 100);
}

// Lower bounds are inclusive: exactly 80 is excellent
const LABEL_THRESHOLDS: ReadonlyArray<[number, QualityLabel]> = [
  [80, 'excellent'],
  [65, 'good'],
  [50, 'average'],
  [35, 'poor'],
];

export function categorizeQualityScore(score: number): QualityLabel {
  for (const [threshold, label] of LABEL_THRESHOLDS) {
    if (score >= threshold) return label;
  }
  return 'very_poor';
}
