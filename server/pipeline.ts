import { offersToObservations, type AmadeusClient } from './amadeus.js';
import { config } from './config.js';
import { DemandAggregator, type DemandAggregatorOptions } from './demand.js';
import { describeError, toFailure, type FailureResult } from './errors.js';
import { InsightEngine, serializeInsight, type InsightEngineOptions } from './insights.js';
import { daysAgo } from './stats.js';
import type { SqliteStore } from './store.js';
import type { ObservationWindow, SerializedInsight } from './types.js';

// =============================================================================
// Outward operations
//
// Each run is a discrete batch. Nothing here throws: store failures and
// anything unexpected come back as { ok: false, error }.
// =============================================================================

export type AggregationResult =
  | {
    ok: true;
    processedCount: number;
    created: number;
    updated: number;
    skipped: number;
    errors: string[];
  }
  | FailureResult;

export type InsightGenerationResult =
  | { ok: true; insights: SerializedInsight[] }
  | FailureResult;

export type IngestionResult =
  | {
    ok: true;
    observationsStored: number;
    routesQueried: number;
    errors: string[];
  }
  | FailureResult;

export function defaultAggregationWindow(now: Date = new Date()): ObservationWindow {
  return { start: daysAgo(now, config.windows.aggregationDays), end: now, basis: 'capturedAt' };
}

export function runAggregation(
  store: SqliteStore,
  window: ObservationWindow,
  options: DemandAggregatorOptions = {},
): AggregationResult {
  try {
    const observations = store.query(window);
    const outcome = new DemandAggregator(store, options).aggregate(observations);
    return {
      ok: true,
      processedCount: outcome.upserts.length,
      created: outcome.created,
      updated: outcome.updated,
      skipped: outcome.skipped.length,
      errors: outcome.skipped.map(e => e.message),
    };
  } catch (err) {
    console.error('[Pipeline] Aggregation run failed:', describeError(err));
    return toFailure(err);
  }
}

export async function runInsightGeneration(
  store: SqliteStore,
  options: InsightEngineOptions = {},
): Promise<InsightGenerationResult> {
  try {
    const saved = await new InsightEngine(store, options).run();
    return { ok: true, insights: saved.map(serializeInsight) };
  } catch (err) {
    console.error('[Pipeline] Insight generation failed:', describeError(err));
    return toFailure(err);
  }
}

export type RouteRequest = { origin: string; destination: string };

/**
 * Fetches current offers for each route and stores them as observations.
 * A provider failure on one route is reported and the rest continue; a store
 * failure ends the run.
 */
export async function runIngestion(
  store: SqliteStore,
  client: AmadeusClient,
  routes: RouteRequest[],
  departureDate: string,
  now: () => Date = () => new Date(),
): Promise<IngestionResult> {
  const errors: string[] = [];
  let stored = 0;

  try {
    for (const { origin, destination } of routes) {
      const observations = await client.searchFlightOffers(origin, destination, departureDate).then(
        offers => offersToObservations(offers, now()),
        (err: unknown) => {
          const message = `${origin}-${destination}: ${describeError(err)}`;
          console.warn(`[Pipeline] Ingestion skipped ${message}`);
          errors.push(message);
          return null;
        },
      );
      if (observations) stored += store.insertObservations(observations);
    }
  } catch (err) {
    console.error('[Pipeline] Ingestion run failed:', describeError(err));
    return toFailure(err);
  }

  console.log(`[Pipeline] Stored ${stored} observation(s) from ${routes.length} route(s)`);
  return { ok: true, observationsStored: stored, routesQueried: routes.length, errors };
}
