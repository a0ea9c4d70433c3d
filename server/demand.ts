import { config, type DemandLevel, type DemandThreshold } from './config.js';
import { MalformedRecordError } from './errors.js';
import { addDays, mean, parseTimestamp, roundTo, toDateStr } from './stats.js';
import type { MarketDemandStore, ObservationStore } from './store.js';
import type { MarketDemandUpsert, Observation, PriceTrend } from './types.js';

// =============================================================================
// Market Demand Aggregation
//
// Observations → one MarketDemand row per (route, UTC departure day):
//   searchVolume  = number of observations in the group (volume proxy)
//   averagePrice  = mean price, rounded to cents
//   priceTrend    = unrounded mean vs. the latest prior row in the lookback
//   demandLevel   = volume bucket from the configured thresholds
//
// Groups are written in ascending date order so each day's trend is computed
// against history that is already final. Re-running over the same input
// rewrites identical rows.
// =============================================================================

export function classifyDemandLevel(
  volume: number,
  thresholds: readonly DemandThreshold[] = config.demand.thresholds,
): DemandLevel {
  for (const threshold of thresholds) {
    if (volume >= threshold.minVolume) return threshold.level;
  }
  return 'low';
}

export function classifyPriceTrend(
  currentAverage: number,
  priorAverage: number | null,
  changeThreshold: number = config.demand.trendChangeThreshold,
): PriceTrend {
  if (priorAverage === null || priorAverage <= 0) return 'stable';

  const change = (currentAverage - priorAverage) / priorAverage;
  if (change > changeThreshold) return 'increasing';
  if (change < -changeThreshold) return 'decreasing';
  return 'stable';
}

export type ValidObservation = {
  observation: Observation;
  price: number;
  departure: Date;
};

export function validateObservation(observation: Observation): ValidObservation | MalformedRecordError {
  const { price } = observation;
  if (price === null || !Number.isFinite(price)) {
    return new MalformedRecordError(observation.id, 'missing price');
  }
  if (price < 0) {
    return new MalformedRecordError(observation.id, `negative price ${price}`);
  }
  const departure = parseTimestamp(observation.departureTime);
  if (!departure) {
    return new MalformedRecordError(observation.id, 'missing or invalid departure time');
  }
  return { observation, price, departure };
}

/** Splits a window into usable observations and the records that were skipped. */
export function partitionObservations(observations: Observation[]): {
  valid: ValidObservation[];
  skipped: MalformedRecordError[];
} {
  const valid: ValidObservation[] = [];
  const skipped: MalformedRecordError[] = [];
  for (const observation of observations) {
    const result = validateObservation(observation);
    if (result instanceof MalformedRecordError) skipped.push(result);
    else valid.push(result);
  }
  return { valid, skipped };
}

export type AggregationOutcome = {
  upserts: MarketDemandUpsert[];
  created: number;
  updated: number;
  skipped: MalformedRecordError[];
};

export type DemandAggregatorOptions = {
  thresholds?: readonly DemandThreshold[];
  trendChangeThreshold?: number;
  trendLookbackDays?: number;
};

type Group = { routeId: number; date: string; prices: number[] };

export class DemandAggregator {
  private readonly store: ObservationStore & MarketDemandStore;
  private readonly thresholds: readonly DemandThreshold[];
  private readonly trendChangeThreshold: number;
  private readonly trendLookbackDays: number;

  constructor(store: ObservationStore & MarketDemandStore, options: DemandAggregatorOptions = {}) {
    this.store = store;
    this.thresholds = options.thresholds ?? config.demand.thresholds;
    this.trendChangeThreshold = options.trendChangeThreshold ?? config.demand.trendChangeThreshold;
    this.trendLookbackDays = options.trendLookbackDays ?? config.windows.trendLookbackDays;
  }

  aggregate(observations: Observation[]): AggregationOutcome {
    const { valid, skipped } = partitionObservations(observations);
    if (skipped.length > 0) {
      console.warn(`[Demand] Skipped ${skipped.length} malformed observation(s)`);
    }

    const groups = new Map<string, Group>();
    for (const { observation, price, departure } of valid) {
      const date = toDateStr(departure);
      const key = `${observation.route.id}|${date}`;
      let group = groups.get(key);
      if (!group) {
        group = { routeId: observation.route.id, date, prices: [] };
        groups.set(key, group);
      }
      group.prices.push(price);
    }

    const ordered = [...groups.values()].sort((a, b) =>
      a.date === b.date ? a.routeId - b.routeId : a.date < b.date ? -1 : 1,
    );

    const upserts: MarketDemandUpsert[] = [];
    let created = 0;
    let updated = 0;

    for (const group of ordered) {
      const rawAverage = mean(group.prices);
      const prior = this.store.queryPriorDemand(
        group.routeId,
        group.date,
        addDays(group.date, -this.trendLookbackDays),
      );

      const record: MarketDemandUpsert = {
        routeId: group.routeId,
        date: group.date,
        searchVolume: group.prices.length,
        averagePrice: roundTo(rawAverage, 2),
        priceTrend: classifyPriceTrend(rawAverage, prior ? prior.averagePrice : null, this.trendChangeThreshold),
        demandLevel: classifyDemandLevel(group.prices.length, this.thresholds),
      };

      if (this.store.upsert(record) === 'created') created++;
      else updated++;
      upserts.push(record);
    }

    console.log(`[Demand] Upserted ${upserts.length} market demand record(s) (${created} new, ${updated} updated)`);
    return { upserts, created, updated, skipped };
  }
}
