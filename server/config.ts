import dotenv from 'dotenv';

// =============================================================================
// Runtime configuration
//
// Every window, threshold and timeout the pipeline uses is read here once.
// .env.local wins over .env; neither overrides variables already set.
// =============================================================================

dotenv.config({ path: '.env.local' });
dotenv.config();

export type DemandLevel = 'low' | 'medium' | 'high' | 'very_high';

export type DemandThreshold = { minVolume: number; level: DemandLevel };

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    console.warn(`[Config] ${name}="${raw}" is not a number, using ${fallback}`);
    return fallback;
  }
  return parsed;
}

function stringFromEnv(name: string, fallback = ''): string {
  const raw = process.env[name];
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

/** Checked top-down; the first threshold the volume reaches wins. */
export const DEMAND_THRESHOLDS: readonly DemandThreshold[] = [
  { minVolume: numberFromEnv('DEMAND_VERY_HIGH_MIN', 20), level: 'very_high' },
  { minVolume: numberFromEnv('DEMAND_HIGH_MIN', 10), level: 'high' },
  { minVolume: numberFromEnv('DEMAND_MEDIUM_MIN', 5), level: 'medium' },
];

export const config = {
  port: numberFromEnv('API_PORT', 3001),
  dbPath: stringFromEnv('DB_PATH', '.routepulse.db'),

  windows: {
    aggregationDays: numberFromEnv('AGGREGATION_WINDOW_DAYS', 30),
    insightDays: numberFromEnv('INSIGHT_WINDOW_DAYS', 7),
    seasonalDays: numberFromEnv('SEASONAL_WINDOW_DAYS', 10),
    trendLookbackDays: numberFromEnv('TREND_LOOKBACK_DAYS', 7),
  },

  demand: {
    thresholds: DEMAND_THRESHOLDS,
    trendChangeThreshold: numberFromEnv('TREND_CHANGE_THRESHOLD', 0.1),
  },

  insights: {
    minObservationsPerRoute: 3,
    volatilityThreshold: 0.5,
    budgetPriceCeiling: numberFromEnv('BUDGET_PRICE_CEILING', 200),
    popularRouteCount: 3,
    weekendPremiumRatio: 1.1,
  },

  narrative: {
    apiKey: stringFromEnv('LLM_API_KEY'),
    baseUrl: stringFromEnv('LLM_BASE_URL'),
    model: stringFromEnv('LLM_MODEL', 'gpt-4o-mini'),
    timeoutMs: numberFromEnv('LLM_TIMEOUT_MS', 20000),
    topRoutes: numberFromEnv('NARRATIVE_TOP_ROUTES', 5),
  },

  amadeus: {
    apiKey: stringFromEnv('AMADEUS_API_KEY'),
    apiSecret: stringFromEnv('AMADEUS_API_SECRET'),
    baseUrl: stringFromEnv('AMADEUS_BASE_URL', 'https://test.api.amadeus.com'),
    timeoutMs: numberFromEnv('AMADEUS_TIMEOUT_MS', 20000),
    maxOffers: numberFromEnv('AMADEUS_MAX_OFFERS', 20),
  },
};
