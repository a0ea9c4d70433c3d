import { describe, it, expect, vi } from 'vitest';
import {
  AmadeusClient,
  credentialFromTokenResponse,
  isCredentialExpired,
  offersToObservations,
  parseSegmentTime,
  type AmadeusSettings,
  type FetchLike,
  type FlightOffer,
} from '../server/amadeus.js';

const SETTINGS: AmadeusSettings = {
  apiKey: 'test-key',
  apiSecret: 'test-secret',
  baseUrl: 'https://amadeus.test',
  timeoutMs: 1000,
  maxOffers: 5,
};

const DIRECT_OFFER: FlightOffer = {
  id: '1',
  numberOfBookableSeats: 4,
  itineraries: [{
    segments: [{
      departure: { iataCode: 'SYD', at: '2026-04-01T07:00:00+10:00' },
      arrival: { iataCode: 'MEL', at: '2026-04-01T08:35:00+10:00' },
      carrierCode: 'QF',
      number: '401',
    }],
  }],
  price: { currency: 'AUD', total: '180.00', grandTotal: '189.40' },
  travelerPricings: [{ fareDetailsBySegment: [{ cabin: 'BUSINESS' }] }],
};

const CONNECTING_OFFER: FlightOffer = {
  id: '2',
  itineraries: [{
    segments: [
      {
        departure: { iataCode: 'SYD', at: '2026-04-01T06:00:00Z' },
        arrival: { iataCode: 'MEL', at: '2026-04-01T07:30:00Z' },
        carrierCode: 'VA',
        number: '810',
      },
      {
        departure: { iataCode: 'MEL', at: '2026-04-01T08:30:00Z' },
        arrival: { iataCode: 'ADL', at: '2026-04-01T09:45:00Z' },
        carrierCode: 'VA',
        number: '221',
      },
    ],
  }],
  price: { currency: 'AUD', total: '240.50' },
};

const UNPRICED_OFFER: FlightOffer = { ...DIRECT_OFFER, id: '3', price: undefined };

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubFetch(offersStatus = 200) {
  let tokens = 0;
  const fetchFn = vi.fn<FetchLike>(async (url) => {
    if (url.endsWith('/v1/security/oauth2/token')) {
      tokens += 1;
      return json({ access_token: `token-${tokens}`, expires_in: 1799 });
    }
    if (offersStatus !== 200) return json({ errors: [] }, offersStatus);
    return json({ data: [DIRECT_OFFER, UNPRICED_OFFER, { nonsense: true }] });
  });
  return fetchFn;
}

describe('Credential', () => {
  it('expires 60 seconds before the advertised lifetime', () => {
    expect(credentialFromTokenResponse('t', 1799, 0)).toEqual({ token: 't', expiresAt: 1_739_000 });
    expect(credentialFromTokenResponse('t', undefined, 0).expiresAt).toBe(1_739_000);
    expect(credentialFromTokenResponse('t', 30, 5000).expiresAt).toBe(5000);
  });

  it('is expired when missing or past its expiry', () => {
    const credential = { token: 't', expiresAt: 1000 };
    expect(isCredentialExpired(null, 0)).toBe(true);
    expect(isCredentialExpired(credential, 999)).toBe(false);
    expect(isCredentialExpired(credential, 1000)).toBe(true);
  });
});

describe('AmadeusClient', () => {
  it('reuses the token until it expires', async () => {
    let clock = 1_000_000;
    const fetchFn = stubFetch();
    const client = new AmadeusClient(SETTINGS, { fetch: fetchFn, now: () => clock });

    await client.searchFlightOffers('syd', 'mel', '2026-04-01');
    await client.searchFlightOffers('SYD', 'MEL', '2026-04-02');
    expect(fetchFn.mock.calls.filter(([url]) => url.endsWith('/token'))).toHaveLength(1);

    clock += 1_739_000;
    const credential = await client.refreshIfExpired();
    expect(credential.token).toBe('token-2');
  });

  it('sends the bearer token and search parameters', async () => {
    const fetchFn = stubFetch();
    const client = new AmadeusClient(SETTINGS, { fetch: fetchFn, now: () => 0 });

    const offers = await client.searchFlightOffers('syd', 'mel', '2026-04-01');
    expect(offers.map(o => o.id)).toEqual(['1', '3']);

    const [url, init] = fetchFn.mock.calls[1];
    expect(url).toBe(
      'https://amadeus.test/v2/shopping/flight-offers?originLocationCode=SYD&destinationLocationCode=MEL' +
      '&departureDate=2026-04-01&adults=1&max=5',
    );
    expect(init?.headers).toEqual({ Authorization: 'Bearer token-1', Accept: 'application/json' });
  });

  it('drops the credential after a 401', async () => {
    const fetchFn = stubFetch(401);
    const client = new AmadeusClient(SETTINGS, { fetch: fetchFn, now: () => 0 });

    await expect(client.searchFlightOffers('SYD', 'MEL', '2026-04-01')).rejects.toThrow('HTTP 401');
    expect((await client.refreshIfExpired()).token).toBe('token-2');
  });

  it('refuses to search without credentials', async () => {
    const fetchFn = stubFetch();
    const client = new AmadeusClient({ ...SETTINGS, apiSecret: '' }, { fetch: fetchFn });

    expect(client.configured).toBe(false);
    await expect(client.searchFlightOffers('SYD', 'MEL', '2026-04-01')).rejects.toThrow('not configured');
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('reports a failed token request', async () => {
    const fetchFn = vi.fn<FetchLike>(async () => json({ error: 'invalid_client' }, 401));
    const client = new AmadeusClient(SETTINGS, { fetch: fetchFn });

    await expect(client.refreshIfExpired()).rejects.toMatchObject({
      kind: 'external_capability',
      message: 'Amadeus token request failed: HTTP 401',
    });
  });
});

describe('Offer mapping', () => {
  const capturedAt = new Date('2026-03-10T12:00:00Z');

  it('maps a direct offer', () => {
    expect(offersToObservations([DIRECT_OFFER], capturedAt)).toEqual([{
      route: { origin: 'SYD', destination: 'MEL', airline: 'QF' },
      flightNumber: 'QF401',
      departureTime: '2026-03-31T21:00:00.000Z',
      arrivalTime: '2026-03-31T22:35:00.000Z',
      price: 189.4,
      currency: 'AUD',
      availability: 4,
      bookingClass: 'business',
      capturedAt: '2026-03-10T12:00:00.000Z',
      source: 'amadeus-flight-offers',
    }]);
  });

  it('spans a connecting itinerary from first departure to last arrival', () => {
    const [observation] = offersToObservations([CONNECTING_OFFER], capturedAt);
    expect(observation.route).toEqual({ origin: 'SYD', destination: 'ADL', airline: 'VA' });
    expect(observation.flightNumber).toBe('VA810');
    expect(observation.arrivalTime).toBe('2026-04-01T09:45:00.000Z');
    expect(observation.price).toBe(240.5);
    expect(observation.bookingClass).toBe('economy');
    expect(observation.availability).toBe(0);
  });

  it('keeps the local calendar day of times given without an offset', () => {
    // 2026-04-04 is a Saturday
    const offer: FlightOffer = {
      ...CONNECTING_OFFER,
      itineraries: [{
        segments: [{
          departure: { iataCode: 'SYD', at: '2026-04-04T08:00:00' },
          arrival: { iataCode: 'MEL', at: '2026-04-04T09:35:00' },
          carrierCode: 'QF',
          number: '409',
        }],
      }],
    };

    const [observation] = offersToObservations([offer], capturedAt);
    expect(observation.departureTime).toBe('2026-04-04T08:00:00.000Z');
    expect(observation.arrivalTime).toBe('2026-04-04T09:35:00.000Z');
  });

  it('reads segment times with and without an offset', () => {
    expect(parseSegmentTime('2026-04-04T23:30:00')?.toISOString()).toBe('2026-04-04T23:30:00.000Z');
    expect(parseSegmentTime('2026-04-04T07:00:00+10:00')?.toISOString()).toBe('2026-04-03T21:00:00.000Z');
    expect(parseSegmentTime('2026-04-04T07:00:00Z')?.toISOString()).toBe('2026-04-04T07:00:00.000Z');
    expect(parseSegmentTime('not a time')).toBeNull();
  });

  it('skips offers without a price or segments', () => {
    const noSegments = { ...CONNECTING_OFFER, itineraries: [{ segments: [] }] };
    expect(offersToObservations([UNPRICED_OFFER, noSegments], capturedAt)).toEqual([]);
  });
});
