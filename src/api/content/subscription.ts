import { Hono } from 'hono';
import { adminAuth, userAuth, type AuthEnv } from '../middleware/auth.js';
import {
  BatchFlagRequestSchema,
  DaysQuerySchema,
  FlagRequestSchema,
  LimitQuerySchema,
  parseQuery,
  validateBody,
} from '../validation.js';
import type { ActivityService } from '../../services/behavior/activity.js';
import type { SubscriptionService } from '../../services/subscription/subscription-service.js';

export function subscriptionRoutes(
  subscription: SubscriptionService,
  activity: ActivityService,
): Hono<AuthEnv> {
  const app = new Hono<AuthEnv>();

  app.post('/flag/:articleId', adminAuth, async (c) => {
    const parsed = await validateBody(c, FlagRequestSchema);
    if (!parsed.ok) return parsed.response;

    const articleId = c.req.param('articleId');
    const { contentAccess, premiumFeatures } = parsed.data;
    const success = await subscription.flagArticleForSubscription(articleId, contentAccess, premiumFeatures);
    if (!success) return c.json({ error: 'Article not found' }, 404);

    return c.json({ message: `Article flagged as ${contentAccess} content`, articleId, success });
  });

  // Granted reads count as views, which feed the free-tier limits
  app.get('/access/:articleId', userAuth, async (c) => {
    const user = c.get('user');
    const articleId = c.req.param('articleId');

    const accessInfo = await subscription.checkContentAccess(user.id, articleId);
    if (accessInfo.canAccess) {
      await activity.recordActivity(user.id, { action: 'view', articleId });
    }
    await subscription.trackContentAccess(user.id, articleId, accessInfo.canAccess);

    return c.json({ accessInfo, status: 'success' });
  });

  app.get('/premium-suggestions', userAuth, async (c) => {
    const limit = parseQuery(c.req.query('limit'), LimitQuerySchema, 10);
    if (limit === null) return c.json({ error: 'limit must be an integer between 1 and 100' }, 400);

    const suggestions = await subscription.getPremiumContentSuggestions(c.get('user').id, limit);
    return c.json({ suggestions, total: suggestions.length, status: 'success' });
  });

  app.post('/batch-flag', adminAuth, async (c) => {
    const parsed = await validateBody(c, BatchFlagRequestSchema);
    if (!parsed.ok) return parsed.response;

    const results = await subscription.batchFlagArticlesByCriteria(parsed.data.criteria, parsed.data.contentAccess);
    return c.json({ message: 'Batch flagging completed', results, status: 'success' });
  });

  app.get('/analytics', adminAuth, async (c) => {
    const days = parseQuery(c.req.query('days'), DaysQuerySchema, 30);
    if (days === null) return c.json({ error: 'days must be an integer between 1 and 365' }, 400);

    const analytics = await subscription.getSubscriptionAnalytics(days);
    return c.json({ analytics, status: 'success' });
  });

  return app;
}
