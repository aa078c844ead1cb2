import { Hono } from 'hono';
import { adminAuth, userAuth, type AuthEnv } from '../middleware/auth.js';
import { ActivityRequestSchema, validateBody } from '../validation.js';
import { qualityRoutes } from './quality.js';
import { subscriptionRoutes } from './subscription.js';
import type { ActivityService } from '../../services/behavior/activity.js';
import type { ContentQualityService } from '../../services/quality/quality-service.js';
import type { SubscriptionService } from '../../services/subscription/subscription-service.js';

export interface ContentServices {
  quality: ContentQualityService;
  subscription: SubscriptionService;
  activity: ActivityService;
}

export function contentRoutes(services: ContentServices): Hono<AuthEnv> {
  const app = new Hono<AuthEnv>();

  app.route('/quality', qualityRoutes(services.quality));
  app.route('/subscription', subscriptionRoutes(services.subscription, services.activity));

  app.post('/preprocess/:articleId', adminAuth, async (c) => {
    const result = await services.quality.preprocessArticleContent(c.req.param('articleId'));
    return c.json({
      message: 'Article preprocessed successfully',
      articleId: result.articleId,
      contentFeatures: result.contentFeatures,
      keywordCount: result.keywordCount,
      status: 'success',
    });
  });

  app.post('/activity', userAuth, async (c) => {
    const parsed = await validateBody(c, ActivityRequestSchema);
    if (!parsed.ok) return parsed.response;

    const activity = await services.activity.recordActivity(c.get('user').id, parsed.data);
    return c.json({ activity, status: 'success' }, 201);
  });

  app.get('/activity/stats', userAuth, async (c) => {
    const stats = await services.activity.getUserReadingStats(c.get('user').id);
    return c.json({ stats, status: 'success' });
  });

  app.get('/health', (c) => c.json({
    status: 'healthy',
    services: ['content_quality', 'subscription', 'content_preprocessing', 'activity'],
    timestamp: new Date().toISOString(),
  }));

  return app;
}
