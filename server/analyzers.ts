import { config } from './config.js';
import type { ValidObservation } from './demand.js';
import { formatPrice, isWeekend, mean, minMax, routeName } from './stats.js';
import type { InsightCandidate, Route } from './types.js';

// =============================================================================
// Rule-based insight analyzers
//
// Each analyzer is independent: it sees the validated observation windows and
// returns zero or more candidates. The engine runs them in a fixed order and
// isolates their failures.
//
//   price-volatility  — per route spread vs. mean (recent window)
//   popularity        — top routes by observation count (recent window)
//   seasonal          — weekend vs. weekday mean price (seasonal window)
// =============================================================================

export type AnalyzerInput = {
  /** Trailing insight window, by capture time */
  recent: ValidObservation[];
  /** Trailing seasonal window, by departure date */
  seasonal: ValidObservation[];
};

export type Analyzer = {
  name: string;
  analyze(input: AnalyzerInput): InsightCandidate[];
};

export const GENERATOR_TAGS = {
  priceVolatility: 'price-volatility-analyzer',
  popularity: 'popularity-analyzer',
  seasonal: 'seasonal-analyzer',
} as const;

type RouteGroup = { route: Route; prices: number[] };

/** Groups by route id, preserving first-encounter order. */
function groupByRoute(observations: ValidObservation[]): RouteGroup[] {
  const groups = new Map<number, RouteGroup>();
  for (const { observation, price } of observations) {
    const existing = groups.get(observation.route.id);
    if (existing) existing.prices.push(price);
    else groups.set(observation.route.id, { route: observation.route, prices: [price] });
  }
  return [...groups.values()];
}

// ---------------------------------------------------------------------------
// Price volatility
// ---------------------------------------------------------------------------

export type RoutePriceStats = {
  route: Route;
  count: number;
  min: number;
  max: number;
  mean: number;
  volatility: number;
};

export function routePriceStats(observations: ValidObservation[]): RoutePriceStats[] {
  return groupByRoute(observations).map(({ route, prices }) => {
    const avg = mean(prices);
    const { min, max } = minMax(prices);
    return {
      route,
      count: prices.length,
      min,
      max,
      mean: avg,
      volatility: avg > 0 ? (max - min) / avg : 0,
    };
  });
}

export const priceVolatilityAnalyzer: Analyzer = {
  name: GENERATOR_TAGS.priceVolatility,
  analyze({ recent }) {
    const { minObservationsPerRoute, volatilityThreshold, budgetPriceCeiling } = config.insights;
    const candidates: InsightCandidate[] = [];

    for (const stats of routePriceStats(recent)) {
      if (stats.count < minObservationsPerRoute) continue;
      const name = routeName(stats.route);

      if (stats.volatility > volatilityThreshold) {
        candidates.push({
          title: `High Price Volatility on ${name} Route`,
          description:
            `The ${name} route shows significant price fluctuations with prices ranging from ` +
            `${formatPrice(stats.min)} to ${formatPrice(stats.max)} (average: ${formatPrice(stats.mean)}). ` +
            'This indicates high demand variability or limited seat availability.',
          type: 'price_trend',
          confidence: 0.85,
          generatedBy: GENERATOR_TAGS.priceVolatility,
        });
      } else if (stats.mean < budgetPriceCeiling) {
        candidates.push({
          title: `Budget-Friendly Route: ${name}`,
          description:
            `The ${name} route offers competitive pricing with an average of ${formatPrice(stats.mean)}. ` +
            'Pricing on this route is stable and affordable for budget-conscious travelers.',
          type: 'price_trend',
          confidence: 0.9,
          generatedBy: GENERATOR_TAGS.priceVolatility,
        });
      }
    }

    return candidates;
  },
};

// ---------------------------------------------------------------------------
// Popularity
// ---------------------------------------------------------------------------

export type RouteCount = { route: Route; count: number };

/** Descending by count; ties keep first-encounter order (Array#sort is stable). */
export function rankRoutesByCount(observations: ValidObservation[], limit: number): RouteCount[] {
  return groupByRoute(observations)
    .map(({ route, prices }) => ({ route, count: prices.length }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

export const popularityAnalyzer: Analyzer = {
  name: GENERATOR_TAGS.popularity,
  analyze({ recent }) {
    return rankRoutesByCount(recent, config.insights.popularRouteCount).map(({ route, count }, i): InsightCandidate => {
      const name = routeName(route);
      return {
        title: `Popular Route #${i + 1}: ${name}`,
        description:
          `${route.origin} to ${route.destination} on ${route.airline} is showing high activity with ` +
          `${count} flights in the analyzed period, ranking #${i + 1} by observed volume. ` +
          'This route demonstrates strong market demand and frequent service availability.',
        type: 'popular_route',
        confidence: 0.9,
        generatedBy: GENERATOR_TAGS.popularity,
      };
    });
  },
};

// ---------------------------------------------------------------------------
// Seasonal (weekend vs. weekday)
// ---------------------------------------------------------------------------

export type WeekendPremium = {
  weekendMean: number;
  weekdayMean: number;
  premiumPct: number;
};

/** Null when either bucket is empty. Weekend = Saturday/Sunday (UTC departure). */
export function weekendPremium(observations: ValidObservation[]): WeekendPremium | null {
  const weekend: number[] = [];
  const weekday: number[] = [];
  for (const { price, departure } of observations) {
    if (isWeekend(departure)) weekend.push(price);
    else weekday.push(price);
  }
  if (weekend.length === 0 || weekday.length === 0) return null;

  const weekendMean = mean(weekend);
  const weekdayMean = mean(weekday);
  return {
    weekendMean,
    weekdayMean,
    premiumPct: weekdayMean > 0 ? (weekendMean / weekdayMean - 1) * 100 : 0,
  };
}

export const seasonalAnalyzer: Analyzer = {
  name: GENERATOR_TAGS.seasonal,
  analyze({ seasonal }) {
    const premium = weekendPremium(seasonal);
    if (!premium) return [];
    if (!(premium.weekendMean > premium.weekdayMean * config.insights.weekendPremiumRatio)) return [];

    return [{
      title: 'Weekend Premium Pricing Pattern',
      description:
        `Weekend flights show premium pricing with an average of ${formatPrice(premium.weekendMean)} ` +
        `compared to ${formatPrice(premium.weekdayMean)} for weekday flights. ` +
        `This represents a ${premium.premiumPct.toFixed(1)}% weekend premium.`,
      type: 'seasonal_pattern',
      confidence: 0.85,
      generatedBy: GENERATOR_TAGS.seasonal,
    }];
  },
};

export const DEFAULT_ANALYZERS: readonly Analyzer[] = [
  priceVolatilityAnalyzer,
  popularityAnalyzer,
  seasonalAnalyzer,
];
