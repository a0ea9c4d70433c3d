import { z } from 'zod';
import { config } from './config.js';
import type { ValidObservation } from './demand.js';
import { describeError, ExternalCapabilityError } from './errors.js';
import { formatPrice, mean, minMax, routeName } from './stats.js';
import { INSIGHT_TYPES, pickLiteral, type InsightCandidate } from './types.js';

// =============================================================================
// Narrative Insights (optional)
//
// Observations → compact statistical summary → fixed prompt → text generation
// → decoder → candidates. Raw observations never leave the process; only the
// summary does. Any failure along the way yields zero candidates.
// =============================================================================

export const NARRATIVE_GENERATOR = 'narrative-synthesizer';

const MAX_TITLE_LENGTH = 200;
const DEFAULT_CONFIDENCE = 0.8;

export interface TextGenerationCapability {
  complete(prompt: string): Promise<string>;
}

export type RouteSummary = {
  route: string;
  count: number;
  averagePrice: number;
};

export type StatisticalSummary = {
  totalObservations: number;
  averagePrice: number;
  minPrice: number;
  maxPrice: number;
  uniqueRoutes: number;
  topRoutes: RouteSummary[];
};

export function buildSummary(
  observations: ValidObservation[],
  topN: number = config.narrative.topRoutes,
): StatisticalSummary {
  const byRoute = new Map<number, { route: string; prices: number[] }>();
  const prices: number[] = [];

  for (const { observation, price } of observations) {
    prices.push(price);
    const entry = byRoute.get(observation.route.id);
    if (entry) entry.prices.push(price);
    else byRoute.set(observation.route.id, { route: routeName(observation.route), prices: [price] });
  }

  const topRoutes = [...byRoute.values()]
    .map(({ route, prices: routePrices }) => ({
      route,
      count: routePrices.length,
      averagePrice: mean(routePrices),
    }))
    .sort((a, b) => b.count - a.count)
    .slice(0, topN);

  const { min, max } = minMax(prices);
  return {
    totalObservations: prices.length,
    averagePrice: mean(prices),
    minPrice: min,
    maxPrice: max,
    uniqueRoutes: byRoute.size,
    topRoutes,
  };
}

export function renderSummary(summary: StatisticalSummary): string {
  const lines = [
    'Flight Data Summary:',
    `- Total flights analyzed: ${summary.totalObservations}`,
    `- Average price: ${formatPrice(summary.averagePrice)}`,
    `- Price range: ${formatPrice(summary.minPrice)} - ${formatPrice(summary.maxPrice)}`,
    `- Number of unique routes: ${summary.uniqueRoutes}`,
    '',
    'Top Routes by Frequency:',
    ...summary.topRoutes.map(r => `- ${r.route}: ${r.count} flights, avg ${formatPrice(r.averagePrice)}`),
  ];
  return lines.join('\n');
}

export function buildPrompt(summary: StatisticalSummary): string {
  return [
    'As an airline industry analyst, analyze the following flight booking data and provide actionable insights:',
    '',
    renderSummary(summary),
    '',
    'Please provide 2-3 key insights as a JSON array with the following structure:',
    '[',
    '  {',
    '    "title": "Insight Title",',
    '    "description": "Detailed description of the insight",',
    `    "type": "${INSIGHT_TYPES.join(' | ')}",`,
    '    "confidence": 0.85',
    '  }',
    ']',
    '',
    'Focus on practical insights that help a travel business understand demand patterns. Respond with valid JSON only.',
  ].join('\n');
}

// ---------------------------------------------------------------------------
// Decoder
// ---------------------------------------------------------------------------

const rawInsightSchema = z.object({
  title: z.string().trim().min(1),
  description: z.string().trim().min(1),
  type: z.string().optional(),
  confidence: z.union([z.number(), z.string()]).optional(),
});

export type DecodeResult =
  | { ok: true; candidates: InsightCandidate[]; dropped: number }
  | { ok: false; reason: string };

const FENCE_RE = /```(?:json|JSON)?\s*\n?([\s\S]*?)```/;

/** Removes a surrounding fenced code block, if there is one. */
export function stripCodeFences(text: string): string {
  const match = text.match(FENCE_RE);
  return (match ? match[1] : text).trim();
}

function repairConfidence(value: number | string | undefined): number {
  const parsed = typeof value === 'string' ? parseFloat(value) : value;
  if (parsed === undefined || !Number.isFinite(parsed)) return DEFAULT_CONFIDENCE;
  return Math.min(1, Math.max(0, parsed));
}

export function decodeInsights(text: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(text));
  } catch (err) {
    return { ok: false, reason: `response is not valid JSON: ${describeError(err)}` };
  }

  let items: unknown[];
  if (Array.isArray(parsed)) {
    items = parsed;
  } else {
    const wrapped = z.object({ insights: z.array(z.unknown()) }).safeParse(parsed);
    if (!wrapped.success) return { ok: false, reason: 'response is not a list of insights' };
    items = wrapped.data.insights;
  }

  const candidates: InsightCandidate[] = [];
  let dropped = 0;
  for (const item of items) {
    const result = rawInsightSchema.safeParse(item);
    if (!result.success) {
      dropped++;
      continue;
    }
    const raw = result.data;
    candidates.push({
      title: raw.title.slice(0, MAX_TITLE_LENGTH),
      description: raw.description,
      type: pickLiteral(INSIGHT_TYPES, raw.type) ?? 'demand_forecast',
      confidence: repairConfidence(raw.confidence),
      generatedBy: NARRATIVE_GENERATOR,
    });
  }

  return { ok: true, candidates, dropped };
}

// ---------------------------------------------------------------------------
// Synthesizer
// ---------------------------------------------------------------------------

export class NarrativeSynthesizer {
  private readonly capability: TextGenerationCapability;

  constructor(capability: TextGenerationCapability) {
    this.capability = capability;
  }

  /** Summarizes the window first; a failure there also yields no candidates. */
  async synthesizeFrom(observations: ValidObservation[]): Promise<InsightCandidate[]> {
    let summary: StatisticalSummary;
    try {
      summary = buildSummary(observations);
    } catch (err) {
      console.warn(`[Narrative] Could not summarize observations: ${describeError(err)}`);
      return [];
    }
    return this.synthesize(summary);
  }

  /** Never throws: failures are logged and produce an empty list. */
  async synthesize(summary: StatisticalSummary): Promise<InsightCandidate[]> {
    if (summary.totalObservations === 0) return [];

    let text: string;
    try {
      text = await this.capability.complete(buildPrompt(summary));
    } catch (err) {
      const failure = err instanceof ExternalCapabilityError
        ? err
        : new ExternalCapabilityError('text generation failed', err);
      console.warn(`[Narrative] ${failure.message}: ${describeError(failure.cause)}`);
      return [];
    }

    const decoded = decodeInsights(text);
    if (!decoded.ok) {
      console.warn(`[Narrative] Could not parse generated insights: ${decoded.reason}`);
      return [];
    }
    if (decoded.dropped > 0) {
      console.warn(`[Narrative] Dropped ${decoded.dropped} malformed generated insight(s)`);
    }
    return decoded.candidates;
  }
}
