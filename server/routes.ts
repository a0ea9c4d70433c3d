/**
 * HTTP surface over the pipeline. Every handler answers with JSON; pipeline
 * failures are mapped to status codes here and never thrown past Express.
 */
import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import type { AmadeusClient } from './amadeus.js';
import { config } from './config.js';
import type { FailureResult } from './errors.js';
import type { NarrativeSynthesizer } from './narrative.js';
import {
  defaultAggregationWindow,
  runAggregation,
  runIngestion,
  runInsightGeneration,
  type RouteRequest,
} from './pipeline.js';
import { daysAgo } from './stats.js';
import type { SqliteStore } from './store.js';
import { serializeInsight } from './insights.js';

export type AppDeps = {
  store: SqliteStore;
  synthesizer?: NarrativeSynthesizer | null;
  amadeus?: AmadeusClient | null;
  now?: () => Date;
};

function failureStatus(result: FailureResult): number {
  return result.error.kind === 'store_failure' ? 503 : 500;
}

function positiveInt(value: unknown, fallback: number, max: number): number {
  const parsed = typeof value === 'number' ? value : parseInt(String(value ?? ''), 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return Math.min(max, Math.floor(parsed));
}

/** undefined when absent, null when present but not a route id. */
function parseRouteParam(value: unknown): number | undefined | null {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || !/^\d+$/.test(value)) return null;
  return parseInt(value, 10);
}

function parseRouteRequests(value: unknown): RouteRequest[] | null {
  if (!Array.isArray(value) || value.length === 0) return null;
  const routes: RouteRequest[] = [];
  for (const item of value) {
    if (typeof item !== 'object' || item === null) return null;
    const origin: unknown = Reflect.get(item, 'origin');
    const destination: unknown = Reflect.get(item, 'destination');
    if (typeof origin !== 'string' || typeof destination !== 'string') return null;
    if (!/^[A-Za-z]{3}$/.test(origin) || !/^[A-Za-z]{3}$/.test(destination)) return null;
    routes.push({ origin: origin.toUpperCase(), destination: destination.toUpperCase() });
  }
  return routes;
}

export function registerRoutes(app: Express, deps: AppDeps): void {
  const { store } = deps;
  const now = deps.now ?? (() => new Date());

  // ---------------------------------------------------------------------------
  // CORS
  // ---------------------------------------------------------------------------
  const isDev = process.env.NODE_ENV !== 'production';
  const corsOptions: cors.CorsOptions = isDev
    ? { origin: ['http://localhost:3000', 'http://localhost:5173'], credentials: true }
    : { origin: false }; // same-origin only in production

  app.use(cors(corsOptions));

  // ---------------------------------------------------------------------------
  // Rate limiting (pipeline runs are heavier than reads)
  // ---------------------------------------------------------------------------
  const runLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: 10,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many pipeline runs, please try again later.' },
  });

  const apiLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: 120,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later.' },
  });

  app.use('/api/', apiLimiter);

  // ---------------------------------------------------------------------------
  // Health check
  // ---------------------------------------------------------------------------
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: now().toISOString() });
  });

  // ---------------------------------------------------------------------------
  // Market demand aggregation
  // POST /api/demand/aggregate   { "days": 30 }
  // ---------------------------------------------------------------------------
  app.post('/api/demand/aggregate', runLimiter, (req: Request, res: Response) => {
    const end = now();
    const days = positiveInt(req.body?.days, config.windows.aggregationDays, 365);
    const window = req.body?.days === undefined
      ? defaultAggregationWindow(end)
      : { start: daysAgo(end, days), end, basis: 'capturedAt' as const };

    const result = runAggregation(store, window);
    if (!result.ok) {
      return res.status(failureStatus(result)).json({ success: false, error: result.error });
    }
    res.json({ success: true, ...result, window: { start: window.start.toISOString(), end: window.end.toISOString() } });
  });

  // ---------------------------------------------------------------------------
  // GET /api/demand?route=3&limit=50
  // ---------------------------------------------------------------------------
  app.get('/api/demand', (req: Request, res: Response) => {
    const routeId = parseRouteParam(req.query.route);
    if (routeId === null) {
      return res.status(400).json({ error: 'route must be a numeric route id', demand: [] });
    }
    try {
      const demand = store.listMarketDemand({
        routeId,
        limit: positiveInt(req.query.limit, 100, 1000),
      });
      res.json({ demand });
    } catch (err) {
      console.error('[API] Market demand error:', err);
      res.status(503).json({ error: 'Failed to load market demand', demand: [] });
    }
  });

  // ---------------------------------------------------------------------------
  // Insight generation
  // POST /api/insights/generate
  // ---------------------------------------------------------------------------
  app.post('/api/insights/generate', runLimiter, async (_req: Request, res: Response) => {
    const result = await runInsightGeneration(store, { synthesizer: deps.synthesizer ?? null, now });
    if (!result.ok) {
      return res.status(failureStatus(result)).json({ success: false, error: result.error, insights: [] });
    }
    res.json({
      success: true,
      message: `Generated ${result.insights.length} insights`,
      insights: result.insights,
    });
  });

  // ---------------------------------------------------------------------------
  // GET /api/insights?limit=20
  // ---------------------------------------------------------------------------
  app.get('/api/insights', (req: Request, res: Response) => {
    try {
      const insights = store.listInsights(positiveInt(req.query.limit, 50, 500)).map(serializeInsight);
      res.json({ insights });
    } catch (err) {
      console.error('[API] Insights error:', err);
      res.status(503).json({ error: 'Failed to load insights', insights: [] });
    }
  });

  // ---------------------------------------------------------------------------
  // GET /api/analytics?route=3
  // ---------------------------------------------------------------------------
  app.get('/api/analytics', (req: Request, res: Response) => {
    const routeId = parseRouteParam(req.query.route);
    if (routeId === null) {
      return res.status(400).json({ error: 'route must be a numeric route id' });
    }
    try {
      res.json(store.routeAnalytics(routeId));
    } catch (err) {
      console.error('[API] Analytics error:', err);
      res.status(503).json({ error: 'Failed to compute analytics' });
    }
  });

  // ---------------------------------------------------------------------------
  // Offer ingestion
  // POST /api/ingest   { "routes": [{ "origin": "SYD", "destination": "MEL" }], "date": "2026-03-01" }
  // ---------------------------------------------------------------------------
  app.post('/api/ingest', runLimiter, async (req: Request, res: Response) => {
    const client = deps.amadeus;
    if (!client || !client.configured) {
      return res.status(503).json({ success: false, error: 'Flight-offer provider is not configured' });
    }

    const routes = parseRouteRequests(req.body?.routes);
    const date = typeof req.body?.date === 'string' ? req.body.date : '';
    if (!routes || !/^\d{4}-\d{2}-\d{2}$/.test(date)) {
      return res.status(400).json({ success: false, error: 'routes and date (YYYY-MM-DD) are required' });
    }

    const result = await runIngestion(store, client, routes, date, now);
    if (!result.ok) {
      return res.status(failureStatus(result)).json({ success: false, error: result.error });
    }
    res.json({ success: true, ...result });
  });
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.use(express.json());
  registerRoutes(app, deps);
  return app;
}
