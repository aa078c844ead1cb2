import { daysAgo, systemClock, type Clock } from '../../utils/clock.js';
import { generateId } from '../../utils/hash.js';
import { createLogger } from '../../utils/logger.js';
import type { ActivityStore } from '../../db/store.js';
import type { ActivityAction, UserActivity } from '../../types/index.js';

const logger = createLogger('behavior');

export interface ActivityInput {
  action: ActivityAction;
  articleId?: string | null;
  sessionId?: string;
  readingTime?: number | null;
  metadata?: Record<string, unknown>;
}

export interface ReadingStats {
  periodDays: number;
  totalViews: number;
  totalLikes: number;
  totalBookmarks: number;
  /** Seconds, summed over every activity that reported one. */
  totalReadingTime: number;
  uniqueArticles: number;
}

export class ActivityService {
  private readonly clock: Clock;

  constructor(
    private readonly store: ActivityStore,
    options: { clock?: Clock } = {},
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async recordActivity(userId: string, input: ActivityInput): Promise<UserActivity> {
    const activity: UserActivity = {
      id: generateId(),
      userId,
      action: input.action,
      articleId: input.articleId ?? null,
      sessionId: input.sessionId ?? generateId(),
      readingTime: input.readingTime ?? null,
      metadata: input.metadata ?? {},
      timestamp: this.clock(),
    };

    await this.store.insertActivity(activity);
    logger.debug('Activity recorded', { userId, action: activity.action, articleId: activity.articleId });
    return activity;
  }

  async getUserReadingStats(userId: string, days: number = 30): Promise<ReadingStats> {
    const activities = await this.store.findActivities({
      userId,
      since: daysAgo(this.clock(), days),
    });

    const countOf = (action: ActivityAction) => activities.filter((a) => a.action === action).length;
    const articles = new Set(activities.flatMap((a) => (a.articleId ? [a.articleId] : [])));

    return {
      periodDays: days,
      totalViews: countOf('view'),
      totalLikes: countOf('like'),
      totalBookmarks: countOf('bookmark'),
      totalReadingTime: activities.reduce((sum, a) => sum + (a.readingTime ?? 0), 0),
      uniqueArticles: articles.size,
    };
  }
}
