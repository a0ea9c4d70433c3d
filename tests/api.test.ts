import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'node:http';
import { z } from 'zod';
import { AmadeusClient, type FetchLike } from '../server/amadeus.js';
import { createApp, type AppDeps } from '../server/routes.js';
import type { SqliteStore } from '../server/store.js';
import { createTestStore, NOW, newObservation } from './fixtures.js';

type Running = { base: string; server: Server };

async function start(deps: AppDeps): Promise<Running> {
  const server = createApp(deps).listen(0);
  await new Promise<void>(resolve => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server has no port');
  return { base: `http://127.0.0.1:${address.port}`, server };
}

function stop({ server }: Running): Promise<void> {
  return new Promise((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
}

function post(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

const errorBody = z.object({ success: z.literal(false), error: z.unknown() });

describe('API Endpoints', () => {
  let store: SqliteStore;
  let running: Running;

  beforeAll(async () => {
    store = createTestStore();
    store.insertObservations([
      newObservation('SYD', 'MEL', 100, '2026-03-02T07:00:00Z'),
      newObservation('SYD', 'MEL', 200, '2026-03-02T18:00:00Z'),
    ]);
    running = await start({ store, now: () => NOW });
  });

  afterAll(() => stop(running));

  it('GET /api/health returns 200 with status ok', async () => {
    const res = await fetch(`${running.base}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', timestamp: '2026-03-10T12:00:00.000Z' });
  });

  it('POST /api/demand/aggregate writes market demand for the default window', async () => {
    const res = await post(`${running.base}/api/demand/aggregate`, {});
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      ok: true,
      processedCount: 1,
      created: 1,
      updated: 0,
      skipped: 0,
      errors: [],
      window: { start: '2026-02-08T12:00:00.000Z', end: '2026-03-10T12:00:00.000Z' },
    });

    const listing = await fetch(`${running.base}/api/demand`);
    const { demand } = z.object({
      demand: z.array(z.object({ date: z.string(), averagePrice: z.number(), searchVolume: z.number() })),
    }).parse(await listing.json());
    expect(demand).toEqual([{ date: '2026-03-02', averagePrice: 150, searchVolume: 2 }]);
  });

  it('POST /api/insights/generate stores and returns new insights', async () => {
    const res = await post(`${running.base}/api/insights/generate`, {});
    expect(res.status).toBe(200);
    const body = z.object({
      success: z.literal(true),
      message: z.string(),
      insights: z.array(z.object({ title: z.string(), generatedBy: z.string() })),
    }).parse(await res.json());

    expect(body.message).toBe('Generated 1 insights');
    expect(body.insights).toEqual([{ title: 'Popular Route #1: SYD-MEL (QF)', generatedBy: 'popularity-analyzer' }]);

    const again = z.object({ insights: z.array(z.unknown()) }).parse(
      await (await post(`${running.base}/api/insights/generate`, {})).json(),
    );
    expect(again.insights).toEqual([]);
  });

  it('GET /api/insights lists stored insights', async () => {
    const res = await fetch(`${running.base}/api/insights?limit=5`);
    const { insights } = z.object({ insights: z.array(z.object({ title: z.string() })) }).parse(await res.json());
    expect(insights.map(i => i.title)).toEqual(['Popular Route #1: SYD-MEL (QF)']);
  });

  it('GET /api/analytics summarizes observations', async () => {
    const res = await fetch(`${running.base}/api/analytics`);
    const body = z.object({ totalFlights: z.number(), averagePrice: z.number() }).parse(await res.json());
    expect(body).toEqual({ totalFlights: 2, averagePrice: 150 });
  });

  it('rejects a route filter that is not an id', async () => {
    const demand = await fetch(`${running.base}/api/demand?route=abc`);
    expect(demand.status).toBe(400);
    expect(await demand.json()).toEqual({ error: 'route must be a numeric route id', demand: [] });

    const analytics = await fetch(`${running.base}/api/analytics?route=1x`);
    expect(analytics.status).toBe(400);
  });

  it('GET /api/analytics narrows to one route', async () => {
    const res = await fetch(`${running.base}/api/analytics?route=99`);
    const body = z.object({ totalFlights: z.number() }).parse(await res.json());
    expect(body.totalFlights).toBe(0);
  });

  it('POST /api/ingest is unavailable without a provider', async () => {
    const res = await post(`${running.base}/api/ingest`, { routes: [{ origin: 'SYD', destination: 'MEL' }], date: '2026-04-01' });
    expect(res.status).toBe(503);
    expect(errorBody.safeParse(await res.json()).success).toBe(true);
  });
});

describe('API ingestion', () => {
  const offer = {
    numberOfBookableSeats: 2,
    itineraries: [{
      segments: [{
        departure: { iataCode: 'SYD', at: '2026-04-01T07:00:00Z' },
        arrival: { iataCode: 'MEL', at: '2026-04-01T08:35:00Z' },
        carrierCode: 'QF',
        number: '401',
      }],
    }],
    price: { currency: 'AUD', total: '150.00' },
  };

  const fakeFetch: FetchLike = async (url) => {
    const body = url.endsWith('/token') ? { access_token: 'token-1', expires_in: 1799 } : { data: [offer] };
    return new Response(JSON.stringify(body), { headers: { 'Content-Type': 'application/json' } });
  };

  let store: SqliteStore;
  let running: Running;

  beforeAll(async () => {
    store = createTestStore();
    const amadeus = new AmadeusClient(
      { apiKey: 'test-key', apiSecret: 'test-secret', baseUrl: 'https://amadeus.test', timeoutMs: 1000, maxOffers: 5 },
      { fetch: fakeFetch },
    );
    running = await start({ store, amadeus, now: () => NOW });
  });

  afterAll(() => stop(running));

  it('rejects a malformed request', async () => {
    const badRoute = await post(`${running.base}/api/ingest`, { routes: [{ origin: 'SYDNEY', destination: 'MEL' }], date: '2026-04-01' });
    expect(badRoute.status).toBe(400);

    const badDate = await post(`${running.base}/api/ingest`, { routes: [{ origin: 'SYD', destination: 'MEL' }], date: 'April 1' });
    expect(badDate.status).toBe(400);

    const noRoutes = await post(`${running.base}/api/ingest`, { routes: [], date: '2026-04-01' });
    expect(noRoutes.status).toBe(400);
  });

  it('stores fetched offers as observations', async () => {
    const res = await post(`${running.base}/api/ingest`, {
      routes: [{ origin: 'syd', destination: 'mel' }, { origin: 'bne', destination: 'per' }],
      date: '2026-04-01',
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      ok: true,
      observationsStored: 2,
      routesQueried: 2,
      errors: [],
    });

    const stored = store.query({
      start: new Date('2026-03-10T00:00:00Z'),
      end: new Date('2026-03-11T00:00:00Z'),
      basis: 'capturedAt',
    });
    expect(stored.map(o => [o.flightNumber, o.price, o.capturedAt])).toEqual([
      ['QF401', 150, '2026-03-10T12:00:00.000Z'],
      ['QF401', 150, '2026-03-10T12:00:00.000Z'],
    ]);
  });
});
