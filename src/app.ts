import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import compression from 'compression';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';

import { env } from './config/env';
import { AppServices, buildServices } from './config/container';
import { errorHandler } from './middleware/errorHandler.middleware';
import { createRecommendationRouter, createSeasonRouter } from './routes/recommendation.routes';

export function createApp(services: AppServices): Express {
  const app = express();

  // ── Security headers ────────────────────────────────────────────────────────
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'none'"],
          frameAncestors: ["'none'"],
        },
      },
      hsts: { maxAge: 31_536_000, includeSubDomains: true, preload: true },
    }),
  );

  // ── CORS ────────────────────────────────────────────────────────────────────
  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
      credentials: true,
    }),
  );

  // ── Body parsing & compression ──────────────────────────────────────────────
  app.use(express.json({ limit: '100kb' }));
  app.use(compression());

  // ── Logging ─────────────────────────────────────────────────────────────────
  if (env.NODE_ENV !== 'test') {
    app.use(morgan('combined'));
  }

  // ── Rate limiting ───────────────────────────────────────────────────────────
  const limiter = rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX_REQUESTS,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later.' },
  });
  app.use('/api/', limiter);

  // ── Health checks ───────────────────────────────────────────────────────────
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/api/health/cache', (_req, res) => {
    res.json({
      status: 'ok',
      backend: services.cache.isRedis ? 'redis' : 'in-memory',
      timestamp: new Date().toISOString(),
    });
  });

  // ── Routes ──────────────────────────────────────────────────────────────────
  app.use('/api/v1/season', createSeasonRouter(services.recommendations));
  app.use('/api/v1/recommendations', createRecommendationRouter(services.recommendations, services.jwtSecret));

  // ── 404 catch-all ───────────────────────────────────────────────────────────
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler);

  return app;
}

// ── Startup ───────────────────────────────────────────────────────────────────
async function start(): Promise<void> {
  const services = buildServices(env);
  await services.cache.connect(env.REDIS_URL);

  createApp(services).listen(env.PORT, () => {
    console.info(`🚀  Server listening on http://localhost:${env.PORT}`);
    console.info(`   NODE_ENV: ${env.NODE_ENV}`);
    console.info(`   Cache backend: ${services.cache.isRedis ? 'Redis' : 'in-memory'}`);
  });
}

if (require.main === module) {
  start().catch((err: unknown) => {
    console.error('Failed to start server:', err);
    process.exit(1);
  });
}
