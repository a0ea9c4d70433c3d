import { openDatabase } from '../server/db.js';
import { validateObservation, type ValidObservation } from '../server/demand.js';
import { MalformedRecordError } from '../server/errors.js';
import { SqliteStore } from '../server/store.js';
import type { NewObservation, Observation, Route } from '../server/types.js';

// Shared builders for made-up flight observations.

export const NOW = new Date('2026-03-10T12:00:00Z');

export function makeRoute(id: number, origin = 'SYD', destination = 'MEL', airline = 'QF'): Route {
  return { id, origin, destination, airline, distanceKm: null };
}

let nextId = 1;

export function makeObservation(route: Route, price: number | null, departureTime: string | null): Observation {
  return {
    id: nextId++,
    route,
    flightNumber: `${route.airline}${100 + (nextId % 900)}`,
    departureTime,
    arrivalTime: departureTime,
    price,
    currency: 'AUD',
    availability: 9,
    bookingClass: 'economy',
    capturedAt: '2026-03-09T08:00:00.000Z',
    source: 'test',
  };
}

export function makeValid(route: Route, price: number, departureTime = '2026-03-04T09:00:00Z'): ValidObservation {
  const result = validateObservation(makeObservation(route, price, departureTime));
  if (result instanceof MalformedRecordError) throw result;
  return result;
}

export function newObservation(
  origin: string,
  destination: string,
  price: number,
  departureTime: string,
  capturedAt = '2026-03-09T08:00:00Z',
): NewObservation {
  return {
    route: { origin, destination, airline: 'QF' },
    flightNumber: 'QF400',
    departureTime,
    arrivalTime: departureTime,
    price,
    currency: 'AUD',
    availability: 4,
    bookingClass: 'economy',
    capturedAt,
    source: 'test',
  };
}

export function createTestStore(now: Date = NOW): SqliteStore {
  return new SqliteStore(openDatabase(':memory:'), { now: () => now });
}
