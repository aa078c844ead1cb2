import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    time: vi.fn(() => vi.fn()),
  }),
}));

import { z } from 'zod';
import { createApi } from '../../../src/api/index.js';
import { generateToken } from '../../../src/api/middleware/auth.js';
import { ActivityService } from '../../../src/services/behavior/activity.js';
import { ContentQualityService } from '../../../src/services/quality/quality-service.js';
import { SubscriptionService } from '../../../src/services/subscription/subscription-service.js';
import { FIXED_NOW, makeArticle, MemoryContentStore } from '../../helpers/memory-store.js';

const clock = () => FIXED_NOW;

async function body(res: Response): Promise<Record<string, unknown>> {
  return z.record(z.unknown()).parse(await res.json());
}

describe('content API', () => {
  let store: MemoryContentStore;
  let app: ReturnType<typeof createApi>;
  let userHeaders: Record<string, string>;
  let adminHeaders: Record<string, string>;

  function post(path: string, payload: unknown, headers: Record<string, string>) {
    return app.request(path, {
      method: 'POST',
      headers: { ...headers, 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
  }

  beforeEach(async () => {
    store = new MemoryContentStore();
    app = createApi({
      quality: new ContentQualityService(store, { clock }),
      subscription: new SubscriptionService(store, { clock }),
      activity: new ActivityService(store, { clock }),
    }, { requestLogging: false });

    userHeaders = { Authorization: `Bearer ${await generateToken('reader')}` };
    adminHeaders = { Authorization: `Bearer ${await generateToken('editor', 'admin')}` };
  });

  describe('service routes', () => {
    it('answers the health checks without auth', async () => {
      const root = await app.request('/health');
      expect(root.status).toBe(200);
      expect(await body(root)).toMatchObject({ status: 'ok' });

      const content = await app.request('/api/content/health');
      expect(await body(content)).toMatchObject({
        status: 'healthy',
        services: ['content_quality', 'subscription', 'content_preprocessing', 'activity'],
      });
    });

    it('returns JSON for unknown routes', async () => {
      const res = await app.request('/api/nowhere');
      expect(res.status).toBe(404);
      expect(await body(res)).toEqual({ error: 'Not found' });
    });
  });

  describe('authentication', () => {
    it('requires an Authorization header', async () => {
      const res = await app.request('/api/content/quality/a1');
      expect(res.status).toBe(401);
      expect(await body(res)).toEqual({ error: 'Authorization header required' });
    });

    it('requires the Bearer scheme', async () => {
      const res = await app.request('/api/content/quality/a1', { headers: { Authorization: 'Token abc' } });
      expect(res.status).toBe(401);
      expect(await body(res)).toEqual({ error: 'Authorization header must be: Bearer <token>' });
    });

    it('rejects a malformed token', async () => {
      const res = await app.request('/api/content/quality/a1', { headers: { Authorization: 'Bearer not-a-jwt' } });
      expect(res.status).toBe(401);
      expect(await body(res)).toEqual({ error: 'Invalid token' });
    });

    it('keeps admin routes from regular users', async () => {
      const res = await app.request('/api/content/quality/insights', { headers: userHeaders });
      expect(res.status).toBe(403);
      expect(await body(res)).toEqual({ error: 'Admin access required' });
    });
  });

  describe('quality routes', () => {
    it('starts a background calculation and answers 202', async () => {
      store.addArticle(makeArticle({ id: 'a1' }));

      const res = await post('/api/content/quality/calculate/a1', {}, adminHeaders);

      expect(res.status).toBe(202);
      expect(await body(res)).toEqual({ message: 'Quality calculation started', articleId: 'a1', status: 'processing' });
      await vi.waitFor(() => expect(store.qualityRecords.has('a1')).toBe(true));
    });

    it('still answers 202 when the background calculation fails', async () => {
      const res = await post('/api/content/quality/calculate/missing', {}, adminHeaders);
      expect(res.status).toBe(202);
    });

    it('reports the batch size or its ceiling', async () => {
      const explicit = await post('/api/content/quality/batch-calculate', { articleIds: ['a', 'b'] }, adminHeaders);
      expect(explicit.status).toBe(202);
      expect(await body(explicit)).toEqual({
        message: 'Batch quality calculation started',
        articleCount: 2,
        status: 'processing',
      });

      const stale = await post('/api/content/quality/batch-calculate', { limit: 25 }, adminHeaders);
      expect(await body(stale)).toMatchObject({ articleCount: 'up to 25' });

      const defaulted = await post('/api/content/quality/batch-calculate', {}, adminHeaders);
      expect(await body(defaulted)).toMatchObject({ articleCount: 'up to 100' });
    });

    it('validates the batch body', async () => {
      const invalid = await post('/api/content/quality/batch-calculate', { limit: 0 }, adminHeaders);
      expect(invalid.status).toBe(400);
      expect(await body(invalid)).toEqual({
        error: 'Validation failed',
        details: [{ path: 'limit', message: 'Number must be greater than or equal to 1' }],
      });

      const notJson = await app.request('/api/content/quality/batch-calculate', {
        method: 'POST',
        headers: { ...adminHeaders, 'Content-Type': 'application/json' },
        body: '{',
      });
      expect(notJson.status).toBe(400);
      expect(await body(notJson)).toEqual({ error: 'Invalid JSON body' });
    });

    it('serves insights for a validated period', async () => {
      const ok = await app.request('/api/content/quality/insights?days=7', { headers: adminHeaders });
      expect(await body(ok)).toEqual({
        insights: {
          periodDays: 7,
          totalArticlesAnalyzed: 0,
          message: 'No quality data available for the specified period',
        },
        status: 'success',
      });

      const bad = await app.request('/api/content/quality/insights?days=abc', { headers: adminHeaders });
      expect(bad.status).toBe(400);
      expect(await body(bad)).toEqual({ error: 'days must be an integer between 1 and 365' });
    });

    it('returns stored quality details or 404', async () => {
      const missing = await app.request('/api/content/quality/a1', { headers: userHeaders });
      expect(missing.status).toBe(404);
      expect(await body(missing)).toEqual({ error: 'Quality details not found' });

      store.addArticle(makeArticle({ id: 'a1' }));
      await post('/api/content/quality/calculate/a1', {}, adminHeaders);
      await vi.waitFor(() => expect(store.qualityRecords.has('a1')).toBe(true));

      const found = await app.request('/api/content/quality/a1', { headers: userHeaders });
      expect(found.status).toBe(200);
      expect(await body(found)).toMatchObject({
        qualityDetails: { articleId: 'a1', calculatedAt: '2025-06-15T12:00:00.000Z' },
        status: 'success',
      });
    });
  });

  describe('preprocessing', () => {
    it('preprocesses an article', async () => {
      store.addArticle(makeArticle({ id: 'a1', content: 'Streaming pipelines move data.' }));

      const res = await post('/api/content/preprocess/a1', {}, adminHeaders);

      expect(res.status).toBe(200);
      expect(await body(res)).toMatchObject({
        message: 'Article preprocessed successfully',
        articleId: 'a1',
        keywordCount: 4,
        status: 'success',
      });
    });

    it('maps a missing article to 404', async () => {
      const res = await post('/api/content/preprocess/missing', {}, adminHeaders);
      expect(res.status).toBe(404);
      expect(await body(res)).toEqual({ error: 'Article missing not found' });
    });
  });

  describe('subscription routes', () => {
    it('flags an article', async () => {
      store.addArticle(makeArticle({ id: 'a1' }));

      const res = await post('/api/content/subscription/flag/a1', { contentAccess: 'premium' }, adminHeaders);

      expect(await body(res)).toEqual({ message: 'Article flagged as premium content', articleId: 'a1', success: true });
      expect(store.articles.get('a1')?.isPremiumContent).toBe(true);
    });

    it('rejects flagging a missing article or an unknown level', async () => {
      const missing = await post('/api/content/subscription/flag/missing', { contentAccess: 'premium' }, adminHeaders);
      expect(missing.status).toBe(404);
      expect(await body(missing)).toEqual({ error: 'Article not found' });

      const invalid = await post('/api/content/subscription/flag/a1', { contentAccess: 'gold' }, adminHeaders);
      expect(invalid.status).toBe(400);
    });

    it('records a view when access is granted', async () => {
      store.addArticle(makeArticle({ id: 'a1' }));

      const res = await app.request('/api/content/subscription/access/a1', { headers: userHeaders });

      expect(await body(res)).toEqual({
        accessInfo: {
          canAccess: true,
          accessType: 'full',
          userTier: 'free',
          contentAccess: 'free',
          isPremium: false,
          isEnterprise: false,
        },
        status: 'success',
      });
      expect(store.activities).toHaveLength(1);
      expect(store.activities[0]).toMatchObject({ userId: 'reader', action: 'view', articleId: 'a1' });
    });

    it('records nothing when access is refused', async () => {
      store.addArticle(makeArticle({ id: 'p1', contentAccess: 'premium', isPremiumContent: true }));

      const res = await app.request('/api/content/subscription/access/p1', { headers: userHeaders });

      expect(await body(res)).toMatchObject({
        accessInfo: { canAccess: false, accessType: 'upgrade_required', reason: 'Premium subscription required' },
      });
      expect(store.activities).toHaveLength(0);
    });

    it('lists premium suggestions', async () => {
      store.addArticle(
        makeArticle({ id: 'p1', isPremiumContent: true, contentAccess: 'premium', qualityScore: 80 }),
        makeArticle({ id: 'p2', isPremiumContent: true, contentAccess: 'premium', qualityScore: 90 }),
      );

      const res = await app.request('/api/content/subscription/premium-suggestions?limit=1', { headers: userHeaders });
      expect(await body(res)).toMatchObject({ suggestions: [{ id: 'p2' }], total: 1, status: 'success' });

      const bad = await app.request('/api/content/subscription/premium-suggestions?limit=0', { headers: userHeaders });
      expect(bad.status).toBe(400);
    });

    it('batch flags by criteria', async () => {
      store.addArticle(
        makeArticle({ id: 'good', qualityScore: 75 }),
        makeArticle({ id: 'weak', qualityScore: 30 }),
      );

      const res = await post('/api/content/subscription/batch-flag', {
        contentAccess: 'enterprise',
        criteria: { qualityScoreMin: 70 },
      }, adminHeaders);

      expect(await body(res)).toEqual({
        message: 'Batch flagging completed',
        results: { processed: 1, errors: 0, articleIds: ['good'] },
        status: 'success',
      });
    });

    it('serves subscription analytics', async () => {
      const res = await app.request('/api/content/subscription/analytics?days=14', { headers: adminHeaders });

      expect(await body(res)).toEqual({
        analytics: {
          periodDays: 14,
          contentAccessStats: [],
          userTierDistribution: { free: 0, premium: 0, enterprise: 0 },
          generatedAt: '2025-06-15T12:00:00.000Z',
        },
        status: 'success',
      });
    });
  });

  describe('activity routes', () => {
    it('records an activity for the caller', async () => {
      const res = await post('/api/content/activity', { action: 'like', articleId: 'a1' }, userHeaders);

      expect(res.status).toBe(201);
      expect(await body(res)).toMatchObject({
        activity: { userId: 'reader', action: 'like', articleId: 'a1', timestamp: '2025-06-15T12:00:00.000Z' },
        status: 'success',
      });
    });

    it('rejects an unknown action', async () => {
      const res = await post('/api/content/activity', { action: 'teleport' }, userHeaders);
      expect(res.status).toBe(400);
    });

    it('summarizes the caller reading', async () => {
      await post('/api/content/activity', { action: 'view', articleId: 'a1' }, userHeaders);
      await post('/api/content/activity', { action: 'read_time', articleId: 'a1', readingTime: 90 }, userHeaders);

      const res = await app.request('/api/content/activity/stats', { headers: userHeaders });

      expect(await body(res)).toEqual({
        stats: {
          periodDays: 30,
          totalViews: 1,
          totalLikes: 0,
          totalBookmarks: 0,
          totalReadingTime: 90,
          uniqueArticles: 1,
        },
        status: 'success',
      });
    });
  });
});
