import { Router } from 'express';
import { z } from 'zod';
import { CROP_NAMES } from '../catalog/cropCatalog';
import { asyncHandler } from '../middleware/errorHandler.middleware';
import { requireJwt, requireSelf } from '../middleware/jwtAuth.middleware';
import { RecommendationService } from '../services/RecommendationService';
import { DEFAULT_TOP_N, MAX_TOP_N } from '../services/suitabilityScoring';

const recommendationsSchema = z.object({
  forceRefresh: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  topN: z.coerce.number().int().min(1).max(MAX_TOP_N).default(DEFAULT_TOP_N),
});

const historySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(10),
});

const feedbackSchema = z.object({
  cropName: z.enum(CROP_NAMES),
  rating: z.number().int().min(1).max(5),
  comment: z.string().trim().max(1000).optional(),
});

export function createRecommendationRouter(service: RecommendationService, jwtSecret: string): Router {
  const router = Router();

  router.use('/:farmerId', requireJwt(jwtSecret), requireSelf('farmerId'));

  /**
   * GET /api/v1/recommendations/:farmerId
   * Ranked crops for the farmer's location and the current season.
   */
  router.get(
    '/:farmerId',
    asyncHandler(async (req, res) => {
      const parsed = recommendationsSchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid query parameters', details: parsed.error.flatten() });
        return;
      }

      // Abandon upstream calls if the caller disconnects before we answer.
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableEnded) controller.abort();
      });

      const { forceRefresh, topN } = parsed.data;
      const result = await service.getRecommendations(req.params.farmerId, {
        forceRefresh,
        topN,
        signal: controller.signal,
      });

      res.setHeader('X-Cache', result.fromCache ? 'HIT' : 'MISS');
      res.json(result);
    }),
  );

  /**
   * GET /api/v1/recommendations/:farmerId/history
   * The last computed set, even if it has expired.
   */
  router.get(
    '/:farmerId/history',
    asyncHandler(async (req, res) => {
      const parsed = historySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid query parameters', details: parsed.error.flatten() });
        return;
      }
      res.json(await service.getHistory(req.params.farmerId, parsed.data.limit));
    }),
  );

  /**
   * DELETE /api/v1/recommendations/:farmerId/cache
   * Forget the cached set, e.g. after the farmer edits their profile.
   */
  router.delete(
    '/:farmerId/cache',
    asyncHandler(async (req, res) => {
      const removed = await service.clearCache(req.params.farmerId);
      res.json({ message: removed ? 'Cache cleared successfully' : 'No cache found to clear' });
    }),
  );

  /**
   * POST /api/v1/recommendations/:farmerId/feedback
   */
  router.post(
    '/:farmerId/feedback',
    asyncHandler(async (req, res) => {
      const parsed = feedbackSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid feedback', details: parsed.error.flatten() });
        return;
      }
      const feedback = await service.submitFeedback(req.params.farmerId, parsed.data);
      res.status(201).json({ message: 'Feedback submitted successfully', feedback });
    }),
  );

  return router;
}

/** Public season lookup, used by the assistant. */
export function createSeasonRouter(service: RecommendationService): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json(service.seasonNow());
  });

  return router;
}
