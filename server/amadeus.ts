import { z } from 'zod';
import { config } from './config.js';
import { describeError, ExternalCapabilityError } from './errors.js';
import { parseTimestamp } from './stats.js';
import type { BookingClass, NewObservation } from './types.js';

// =============================================================================
// Amadeus Flight Offers Client
//
// OAuth2 client-credentials token → /v2/shopping/flight-offers search.
// Offers are mapped to observations; the pipeline decides what to store.
//
// The access token is a Credential value owned by the client instance and
// refreshed only when missing or expired (60s safety margin on expires_in).
// =============================================================================

const SOURCE = 'amadeus-flight-offers';
const TOKEN_MARGIN_SECONDS = 60;
const DEFAULT_EXPIRES_IN = 1799;

export type Credential = {
  token: string;
  expiresAt: number; // epoch ms
};

export function isCredentialExpired(credential: Credential | null, now: number): boolean {
  return credential === null || now >= credential.expiresAt;
}

export function credentialFromTokenResponse(
  token: string,
  expiresInSeconds: number | undefined,
  now: number,
): Credential {
  const lifetime = (expiresInSeconds ?? DEFAULT_EXPIRES_IN) - TOKEN_MARGIN_SECONDS;
  return { token, expiresAt: now + Math.max(0, lifetime) * 1000 };
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
});

const segmentSchema = z.object({
  departure: z.object({ iataCode: z.string(), at: z.string() }),
  arrival: z.object({ iataCode: z.string(), at: z.string() }),
  carrierCode: z.string(),
  number: z.string(),
});

const offerSchema = z.object({
  id: z.string().optional(),
  numberOfBookableSeats: z.number().optional(),
  itineraries: z.array(z.object({ segments: z.array(segmentSchema) })),
  price: z.object({
    currency: z.string(),
    total: z.string().optional(),
    grandTotal: z.string().optional(),
  }).optional(),
  travelerPricings: z.array(z.object({
    fareDetailsBySegment: z.array(z.object({ cabin: z.string().optional() })).optional(),
  })).optional(),
});

export type FlightOffer = z.infer<typeof offerSchema>;

const offersResponseSchema = z.object({ data: z.array(z.unknown()) });

const CABIN_MAP: Record<string, BookingClass> = {
  ECONOMY: 'economy',
  PREMIUM_ECONOMY: 'premium_economy',
  BUSINESS: 'business',
  FIRST: 'first',
};

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type AmadeusSettings = {
  apiKey: string;
  apiSecret: string;
  baseUrl: string;
  timeoutMs: number;
  maxOffers: number;
};

export class AmadeusClient {
  private readonly settings: AmadeusSettings;
  private readonly fetchFn: FetchLike;
  private readonly now: () => number;
  private credential: Credential | null = null;

  constructor(
    settings: AmadeusSettings = config.amadeus,
    options: { fetch?: FetchLike; now?: () => number } = {},
  ) {
    this.settings = settings;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  get configured(): boolean {
    return Boolean(this.settings.apiKey && this.settings.apiSecret);
  }

  private async requestToken(): Promise<Credential> {
    const res = await this.fetchFn(`${this.settings.baseUrl}/v1/security/oauth2/token`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        grant_type: 'client_credentials',
        client_id: this.settings.apiKey,
        client_secret: this.settings.apiSecret,
      }).toString(),
      signal: AbortSignal.timeout(this.settings.timeoutMs),
    });
    if (!res.ok) {
      throw new ExternalCapabilityError(`Amadeus token request failed: HTTP ${res.status}`);
    }
    const parsed = tokenResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ExternalCapabilityError('Amadeus token response missing access_token');
    }
    return credentialFromTokenResponse(parsed.data.access_token, parsed.data.expires_in, this.now());
  }

  /** Returns a valid token, fetching a new one only when the current one expired. */
  async refreshIfExpired(): Promise<Credential> {
    if (this.credential && !isCredentialExpired(this.credential, this.now())) {
      return this.credential;
    }
    this.credential = await this.requestToken();
    return this.credential;
  }

  async searchFlightOffers(origin: string, destination: string, departureDate: string): Promise<FlightOffer[]> {
    if (!this.configured) {
      throw new ExternalCapabilityError('Amadeus API credentials not configured');
    }
    const credential = await this.refreshIfExpired();

    const params = new URLSearchParams({
      originLocationCode: origin.toUpperCase(),
      destinationLocationCode: destination.toUpperCase(),
      departureDate,
      adults: '1',
      max: String(this.settings.maxOffers),
    });

    let res: Response;
    try {
      res = await this.fetchFn(`${this.settings.baseUrl}/v2/shopping/flight-offers?${params}`, {
        headers: { Authorization: `Bearer ${credential.token}`, Accept: 'application/json' },
        signal: AbortSignal.timeout(this.settings.timeoutMs),
      });
    } catch (err) {
      throw new ExternalCapabilityError(`Amadeus offers request failed: ${describeError(err)}`, err);
    }

    if (res.status === 401) {
      // Token revoked server-side before its expiry
      this.credential = null;
    }
    if (!res.ok) {
      throw new ExternalCapabilityError(`Amadeus offers request failed: HTTP ${res.status}`);
    }

    const body = offersResponseSchema.safeParse(await res.json());
    if (!body.success) {
      console.warn(`[Amadeus] No offer data for ${origin}-${destination} on ${departureDate}`);
      return [];
    }

    const offers: FlightOffer[] = [];
    for (const raw of body.data.data) {
      const offer = offerSchema.safeParse(raw);
      if (offer.success) offers.push(offer.data);
    }
    return offers;
  }
}

const OFFSET_RE = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Segment times are local airport wall-clock times, usually without an offset.
 * Those are read as UTC so the calendar day never depends on the host timezone.
 */
export function parseSegmentTime(at: string): Date | null {
  return parseTimestamp(OFFSET_RE.test(at) ? at : `${at}Z`);
}

/** Offers without a price or segments are skipped. */
export function offersToObservations(offers: FlightOffer[], capturedAt: Date): NewObservation[] {
  const observations: NewObservation[] = [];

  for (const offer of offers) {
    const segments = offer.itineraries[0]?.segments ?? [];
    const first = segments[0];
    const last = segments[segments.length - 1];
    if (!first || !last) continue;

    const price = parseFloat(offer.price?.grandTotal ?? offer.price?.total ?? '');
    if (!offer.price || !Number.isFinite(price)) continue;

    const departure = parseSegmentTime(first.departure.at);
    const arrival = parseSegmentTime(last.arrival.at);
    if (!departure || !arrival) continue;

    const cabin = offer.travelerPricings?.[0]?.fareDetailsBySegment?.[0]?.cabin ?? 'ECONOMY';

    observations.push({
      route: {
        origin: first.departure.iataCode,
        destination: last.arrival.iataCode,
        airline: first.carrierCode,
      },
      flightNumber: `${first.carrierCode}${first.number}`,
      departureTime: departure.toISOString(),
      arrivalTime: arrival.toISOString(),
      price,
      currency: offer.price.currency,
      availability: offer.numberOfBookableSeats ?? 0,
      bookingClass: CABIN_MAP[cabin] ?? 'economy',
      capturedAt: capturedAt.toISOString(),
      source: SOURCE,
    });
  }

  return observations;
}
