import { Hono } from 'hono';
import { adminAuth, userAuth, type AuthEnv } from '../middleware/auth.js';
import { BatchCalculateRequestSchema, DaysQuerySchema, parseQuery, validateBody } from '../validation.js';
import { config } from '../../config.js';
import { errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { ContentQualityService } from '../../services/quality/quality-service.js';

const logger = createLogger('api:quality');

export function qualityRoutes(quality: ContentQualityService): Hono<AuthEnv> {
  const app = new Hono<AuthEnv>();

  // Scoring runs after the response is sent
  app.post('/calculate/:articleId', adminAuth, (c) => {
    const articleId = c.req.param('articleId');

    quality.calculateArticleQualityScore(articleId).catch((error) => {
      logger.error('Background quality calculation failed', { articleId, error: errorMessage(error) });
    });

    return c.json({ message: 'Quality calculation started', articleId, status: 'processing' }, 202);
  });

  app.post('/batch-calculate', adminAuth, async (c) => {
    const parsed = await validateBody(c, BatchCalculateRequestSchema);
    if (!parsed.ok) return parsed.response;

    const { articleIds, limit } = parsed.data;
    const effectiveLimit = limit ?? config.quality.batchLimit;

    quality.batchCalculateQualityScores({ articleIds, limit: effectiveLimit }).catch((error) => {
      logger.error('Background batch quality calculation failed', { error: errorMessage(error) });
    });

    return c.json({
      message: 'Batch quality calculation started',
      articleCount: articleIds?.length ? articleIds.length : `up to ${effectiveLimit}`,
      status: 'processing',
    }, 202);
  });

  app.get('/insights', adminAuth, async (c) => {
    const days = parseQuery(c.req.query('days'), DaysQuerySchema, config.quality.insightsDays);
    if (days === null) return c.json({ error: 'days must be an integer between 1 and 365' }, 400);

    const insights = await quality.getQualityInsights(days);
    return c.json({ insights, status: 'success' });
  });

  app.get('/:articleId', userAuth, async (c) => {
    const details = await quality.getArticleQualityDetails(c.req.param('articleId'));
    if (!details) return c.json({ error: 'Quality details not found' }, 404);
    return c.json({ qualityDetails: details, status: 'success' });
  });

  return app;
}
