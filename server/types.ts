import type { DemandLevel } from './config.js';

export type { DemandLevel };

// =============================================================================
// Domain types shared by the stores, the aggregator and the insight engine
// =============================================================================

export type BookingClass = 'economy' | 'premium_economy' | 'business' | 'first';

export const BOOKING_CLASSES: readonly BookingClass[] = ['economy', 'premium_economy', 'business', 'first'];

export type PriceTrend = 'increasing' | 'decreasing' | 'stable';

export const PRICE_TRENDS: readonly PriceTrend[] = ['increasing', 'decreasing', 'stable'];

export const DEMAND_LEVELS: readonly DemandLevel[] = ['low', 'medium', 'high', 'very_high'];

export type InsightType = 'price_trend' | 'popular_route' | 'seasonal_pattern' | 'demand_forecast';

export const INSIGHT_TYPES: readonly InsightType[] = [
  'price_trend',
  'popular_route',
  'seasonal_pattern',
  'demand_forecast',
];

export type Route = {
  id: number;
  origin: string;       // IATA airport code
  destination: string;  // IATA airport code
  airline: string;      // IATA airline code
  distanceKm: number | null;
};

export type RouteKey = Pick<Route, 'origin' | 'destination' | 'airline'>;

/**
 * One flight price record as read back from the store. Price and departure
 * are nullable here because rows written by older ingesters may lack them;
 * the aggregator and analyzers validate before use.
 */
export type Observation = {
  id: number;
  route: Route;
  flightNumber: string;
  departureTime: string | null; // ISO-8601
  arrivalTime: string | null;   // ISO-8601
  price: number | null;
  currency: string;
  availability: number;
  bookingClass: BookingClass;
  capturedAt: string;           // ISO-8601
  source: string;
};

/** What an ingester hands to the store. */
export type NewObservation = {
  route: RouteKey & { distanceKm?: number | null };
  flightNumber: string;
  departureTime: string;
  arrivalTime: string;
  price: number;
  currency: string;
  availability: number;
  bookingClass: BookingClass;
  capturedAt: string;
  source: string;
};

export type MarketDemand = {
  routeId: number;
  date: string; // YYYY-MM-DD
  searchVolume: number;
  averagePrice: number;
  priceTrend: PriceTrend;
  demandLevel: DemandLevel;
  updatedAt: string;
};

export type MarketDemandUpsert = Omit<MarketDemand, 'updatedAt'>;

export type InsightCandidate = {
  title: string;
  description: string;
  type: InsightType;
  confidence: number;
  generatedBy: string;
};

export type Insight = InsightCandidate & {
  id: number;
  createdAt: string;
};

export type SerializedInsight = {
  id: number;
  title: string;
  description: string;
  type: InsightType;
  confidence: number;
  generatedBy: string;
  createdAt: string;
};

/**
 * Half-open range [start, end). `basis` picks which timestamp the range
 * applies to: when the price was captured, or when the flight departs.
 */
export type ObservationWindow = {
  start: Date;
  end: Date;
  basis: 'capturedAt' | 'departureTime';
};

/** Narrow a free-form string to one of the allowed literals. */
export function pickLiteral<T extends string>(allowed: readonly T[], value: unknown): T | undefined {
  return allowed.find(option => option === value);
}
