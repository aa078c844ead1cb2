import { ageInDays } from '../../utils/clock.js';

/** Freshness step function over whole days of age. */
export function calculateRecencyScore(createdAt: Date, now: Date): number {
  const ageDays = ageInDays(createdAt, now);

  if (ageDays <= 1) return 100;
  if (ageDays <= 7) return 90;
  if (ageDays <= 30) return 70;
  if (ageDays <= 90) return 50;
  if (ageDays <= 365) return 30;
  return 20;
}
