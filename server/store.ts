import type Database from 'better-sqlite3';
import { StoreFailureError } from './errors.js';
import { routeName, roundTo } from './stats.js';
import {
  BOOKING_CLASSES,
  DEMAND_LEVELS,
  INSIGHT_TYPES,
  PRICE_TRENDS,
  pickLiteral,
  type Insight,
  type InsightCandidate,
  type MarketDemand,
  type MarketDemandUpsert,
  type NewObservation,
  type Observation,
  type ObservationWindow,
  type Route,
  type RouteKey,
} from './types.js';

// =============================================================================
// Store contracts consumed by the pipeline, and their SQLite implementation.
//
// Every SQLite error is rethrown as StoreFailureError: the pipeline treats a
// failing store as fatal for the run.
// =============================================================================

export interface ObservationStore {
  query(window: ObservationWindow): Observation[];
  /** Most recent record for the route with sinceDate <= date < beforeDate. */
  queryPriorDemand(routeId: number, beforeDate: string, sinceDate: string): MarketDemand | null;
}

export interface MarketDemandStore {
  upsert(record: MarketDemandUpsert): 'created' | 'updated';
}

export interface InsightStore {
  exists(title: string): boolean;
  /** Returns null when an insight with the same title is already stored. */
  insert(candidate: InsightCandidate): Insight | null;
}

export type PopularRoute = {
  routeId: number;
  route: string;
  flightCount: number;
  averagePrice: number;
};

export type DailyPrice = {
  day: string;
  averagePrice: number;
  flightCount: number;
};

export type DemandPattern = {
  demandLevel: string;
  count: number;
  averagePrice: number;
  averageSearchVolume: number;
};

export type RouteAnalytics = {
  totalFlights: number;
  averagePrice: number;
  priceRange: { min: number; max: number };
  popularRoutes: PopularRoute[];
  dailyPrices: DailyPrice[];
  demandPatterns: DemandPattern[];
};

type RouteRow = {
  id: number;
  origin: string;
  destination: string;
  airline: string;
  distance_km: number | null;
};

type ObservationRow = {
  id: number;
  route_id: number;
  origin: string;
  destination: string;
  airline: string;
  distance_km: number | null;
  flight_number: string;
  departure_time: string | null;
  arrival_time: string | null;
  price: number | null;
  currency: string;
  availability: number;
  booking_class: string;
  captured_at: string;
  source: string;
};

type DemandRow = {
  route_id: number;
  date: string;
  search_volume: number;
  average_price: number;
  price_trend: string;
  demand_level: string;
  updated_at: string;
};

type InsightRow = {
  id: number;
  title: string;
  description: string;
  insight_type: string;
  confidence: number;
  generated_by: string;
  created_at: string;
};

const OBSERVATION_SELECT = `
  SELECT o.id, o.route_id, r.origin, r.destination, r.airline, r.distance_km,
         o.flight_number, o.departure_time, o.arrival_time, o.price, o.currency,
         o.availability, o.booking_class, o.captured_at, o.source
  FROM observations o
  JOIN routes r ON r.id = o.route_id
`;

function toRoute(row: RouteRow): Route {
  return {
    id: row.id,
    origin: row.origin,
    destination: row.destination,
    airline: row.airline,
    distanceKm: row.distance_km,
  };
}

function toObservation(row: ObservationRow): Observation {
  return {
    id: row.id,
    route: {
      id: row.route_id,
      origin: row.origin,
      destination: row.destination,
      airline: row.airline,
      distanceKm: row.distance_km,
    },
    flightNumber: row.flight_number,
    departureTime: row.departure_time,
    arrivalTime: row.arrival_time,
    price: row.price,
    currency: row.currency,
    availability: row.availability,
    bookingClass: pickLiteral(BOOKING_CLASSES, row.booking_class) ?? 'economy',
    capturedAt: row.captured_at,
    source: row.source,
  };
}

function toMarketDemand(row: DemandRow): MarketDemand {
  return {
    routeId: row.route_id,
    date: row.date,
    searchVolume: row.search_volume,
    averagePrice: row.average_price,
    priceTrend: pickLiteral(PRICE_TRENDS, row.price_trend) ?? 'stable',
    demandLevel: pickLiteral(DEMAND_LEVELS, row.demand_level) ?? 'low',
    updatedAt: row.updated_at,
  };
}

function toInsight(row: InsightRow): Insight {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    type: pickLiteral(INSIGHT_TYPES, row.insight_type) ?? 'demand_forecast',
    confidence: row.confidence,
    generatedBy: row.generated_by,
    createdAt: row.created_at,
  };
}

export type SqliteStoreOptions = {
  now?: () => Date;
};

export class SqliteStore implements ObservationStore, MarketDemandStore, InsightStore {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(db: Database.Database, options: SqliteStoreOptions = {}) {
    this.db = db;
    this.now = options.now ?? (() => new Date());
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StoreFailureError) throw err;
      throw new StoreFailureError(operation, err);
    }
  }

  // ---------------------------------------------------------------------------
  // Routes + observations (ingestion side)
  // ---------------------------------------------------------------------------

  ensureRoute(key: RouteKey & { distanceKm?: number | null }): Route {
    return this.run('ensureRoute', () => {
      this.db.prepare<[string, string, string, number | null]>(`
        INSERT INTO routes (origin, destination, airline, distance_km) VALUES (?, ?, ?, ?)
        ON CONFLICT (origin, destination, airline) DO NOTHING
      `).run(key.origin, key.destination, key.airline, key.distanceKm ?? null);

      const row = this.db.prepare<[string, string, string], RouteRow>(
        'SELECT * FROM routes WHERE origin = ? AND destination = ? AND airline = ?',
      ).get(key.origin, key.destination, key.airline);
      if (!row) throw new Error(`route ${routeName(key)} missing after insert`);
      return toRoute(row);
    });
  }

  listRoutes(): Route[] {
    return this.run('listRoutes', () =>
      this.db.prepare<[], RouteRow>('SELECT * FROM routes ORDER BY id').all().map(toRoute),
    );
  }

  insertObservations(observations: NewObservation[]): number {
    return this.run('insertObservations', () => {
      const insert = this.db.prepare<[number, string, string, string, number, string, number, string, string, string]>(`
        INSERT INTO observations
          (route_id, flight_number, departure_time, arrival_time, price, currency,
           availability, booking_class, captured_at, source)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      const insertAll = this.db.transaction((items: NewObservation[]) => {
        for (const item of items) {
          const route = this.ensureRoute(item.route);
          insert.run(
            route.id,
            item.flightNumber,
            new Date(item.departureTime).toISOString(),
            new Date(item.arrivalTime).toISOString(),
            roundTo(item.price, 2),
            item.currency,
            item.availability,
            item.bookingClass,
            new Date(item.capturedAt).toISOString(),
            item.source,
          );
        }
        return items.length;
      });
      return insertAll(observations);
    });
  }

  // ---------------------------------------------------------------------------
  // ObservationStore
  // ---------------------------------------------------------------------------

  query(window: ObservationWindow): Observation[] {
    const column = window.basis === 'departureTime' ? 'o.departure_time' : 'o.captured_at';
    return this.run('query', () =>
      this.db.prepare<[string, string], ObservationRow>(
        `${OBSERVATION_SELECT} WHERE ${column} >= ? AND ${column} < ? ORDER BY o.id`,
      ).all(window.start.toISOString(), window.end.toISOString()).map(toObservation),
    );
  }

  queryPriorDemand(routeId: number, beforeDate: string, sinceDate: string): MarketDemand | null {
    return this.run('queryPriorDemand', () => {
      const row = this.db.prepare<[number, string, string], DemandRow>(`
        SELECT * FROM market_demand
        WHERE route_id = ? AND date >= ? AND date < ?
        ORDER BY date DESC
        LIMIT 1
      `).get(routeId, sinceDate, beforeDate);
      return row ? toMarketDemand(row) : null;
    });
  }

  // ---------------------------------------------------------------------------
  // MarketDemandStore
  // ---------------------------------------------------------------------------

  upsert(record: MarketDemandUpsert): 'created' | 'updated' {
    return this.run('upsert', () => {
      const write = this.db.transaction((r: MarketDemandUpsert): 'created' | 'updated' => {
        const existing = this.db.prepare<[number, string], { present: number }>(
          'SELECT 1 AS present FROM market_demand WHERE route_id = ? AND date = ?',
        ).get(r.routeId, r.date);

        this.db.prepare<[number, string, number, number, string, string, string]>(`
          INSERT INTO market_demand
            (route_id, date, search_volume, average_price, price_trend, demand_level, updated_at)
          VALUES (?, ?, ?, ?, ?, ?, ?)
          ON CONFLICT (route_id, date) DO UPDATE SET
            search_volume = excluded.search_volume,
            average_price = excluded.average_price,
            price_trend = excluded.price_trend,
            demand_level = excluded.demand_level,
            updated_at = excluded.updated_at
        `).run(
          r.routeId, r.date, r.searchVolume, r.averagePrice,
          r.priceTrend, r.demandLevel, this.now().toISOString(),
        );

        return existing ? 'updated' : 'created';
      });
      return write(record);
    });
  }

  listMarketDemand(options: { routeId?: number; limit?: number } = {}): MarketDemand[] {
    const limit = options.limit ?? 100;
    return this.run('listMarketDemand', () => {
      const rows = options.routeId !== undefined
        ? this.db.prepare<[number, number], DemandRow>(
          'SELECT * FROM market_demand WHERE route_id = ? ORDER BY date DESC LIMIT ?',
        ).all(options.routeId, limit)
        : this.db.prepare<[number], DemandRow>(
          'SELECT * FROM market_demand ORDER BY date DESC, route_id LIMIT ?',
        ).all(limit);
      return rows.map(toMarketDemand);
    });
  }

  // ---------------------------------------------------------------------------
  // InsightStore
  // ---------------------------------------------------------------------------

  exists(title: string): boolean {
    return this.run('exists', () =>
      this.db.prepare<[string], { present: number }>(
        'SELECT 1 AS present FROM insights WHERE title = ?',
      ).get(title) !== undefined,
    );
  }

  insert(candidate: InsightCandidate): Insight | null {
    return this.run('insert', () => {
      const info = this.db.prepare<[string, string, string, number, string, string]>(`
        INSERT INTO insights (title, description, insight_type, confidence, generated_by, created_at)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT (title) DO NOTHING
      `).run(
        candidate.title,
        candidate.description,
        candidate.type,
        roundTo(candidate.confidence, 2),
        candidate.generatedBy,
        this.now().toISOString(),
      );
      if (info.changes === 0) return null;

      const row = this.db.prepare<[number | bigint], InsightRow>(
        'SELECT * FROM insights WHERE id = ?',
      ).get(info.lastInsertRowid);
      return row ? toInsight(row) : null;
    });
  }

  listInsights(limit = 50): Insight[] {
    return this.run('listInsights', () =>
      this.db.prepare<[number], InsightRow>(
        'SELECT * FROM insights ORDER BY created_at DESC, id DESC LIMIT ?',
      ).all(limit).map(toInsight),
    );
  }

  // ---------------------------------------------------------------------------
  // Analytics (dashboard summaries over every stored observation)
  // ---------------------------------------------------------------------------

  routeAnalytics(routeId?: number): RouteAnalytics {
    return this.run('routeAnalytics', () => {
      const where = routeId !== undefined ? 'WHERE o.route_id = ? AND o.price IS NOT NULL' : 'WHERE o.price IS NOT NULL';
      const params = routeId !== undefined ? [routeId] : [];

      const totals = this.db.prepare<number[], {
        total: number; avg_price: number | null; min_price: number | null; max_price: number | null;
      }>(`
        SELECT COUNT(*) AS total, AVG(o.price) AS avg_price,
               MIN(o.price) AS min_price, MAX(o.price) AS max_price
        FROM observations o ${where}
      `).get(...params);

      const popular = this.db.prepare<number[], {
        route_id: number; origin: string; destination: string; airline: string;
        flight_count: number; avg_price: number;
      }>(`
        SELECT o.route_id, r.origin, r.destination, r.airline,
               COUNT(*) AS flight_count, AVG(o.price) AS avg_price
        FROM observations o JOIN routes r ON r.id = o.route_id
        ${where}
        GROUP BY o.route_id
        ORDER BY flight_count DESC, o.route_id ASC
        LIMIT 10
      `).all(...params);

      const daily = this.db.prepare<number[], {
        day: string; avg_price: number; flight_count: number;
      }>(`
        SELECT substr(o.departure_time, 1, 10) AS day,
               AVG(o.price) AS avg_price, COUNT(*) AS flight_count
        FROM observations o
        ${where} AND o.departure_time IS NOT NULL
        GROUP BY day
        ORDER BY day
      `).all(...params);

      const demandWhere = routeId !== undefined ? 'WHERE route_id = ?' : '';
      const patterns = this.db.prepare<number[], {
        demand_level: string; count: number; avg_price: number; avg_volume: number;
      }>(`
        SELECT demand_level, COUNT(*) AS count,
               AVG(average_price) AS avg_price, AVG(search_volume) AS avg_volume
        FROM market_demand ${demandWhere}
        GROUP BY demand_level
        ORDER BY demand_level
      `).all(...params);

      return {
        totalFlights: totals?.total ?? 0,
        averagePrice: roundTo(totals?.avg_price ?? 0, 2),
        priceRange: {
          min: totals?.min_price ?? 0,
          max: totals?.max_price ?? 0,
        },
        popularRoutes: popular.map(row => ({
          routeId: row.route_id,
          route: routeName(row),
          flightCount: row.flight_count,
          averagePrice: roundTo(row.avg_price, 2),
        })),
        dailyPrices: daily.map(row => ({
          day: row.day,
          averagePrice: roundTo(row.avg_price, 2),
          flightCount: row.flight_count,
        })),
        demandPatterns: patterns.map(row => ({
          demandLevel: row.demand_level,
          count: row.count,
          averagePrice: roundTo(row.avg_price, 2),
          averageSearchVolume: roundTo(row.avg_volume, 2),
        })),
      };
    });
  }
}
