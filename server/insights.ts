import { DEFAULT_ANALYZERS, type Analyzer, type AnalyzerInput } from './analyzers.js';
import { config } from './config.js';
import { partitionObservations, type ValidObservation } from './demand.js';
import { DataUnavailableError, describeError } from './errors.js';
import type { NarrativeSynthesizer } from './narrative.js';
import { daysAgo } from './stats.js';
import type { InsightStore, ObservationStore } from './store.js';
import type { Insight, InsightCandidate, ObservationWindow, SerializedInsight } from './types.js';

// =============================================================================
// Insight Engine
//
// 1. Load the recent window (capture time) and the seasonal window (departure).
// 2. Run each analyzer in order; a throwing analyzer contributes nothing.
// 3. Append narrative candidates when a synthesizer is configured.
// 4. Persist with first-write-wins on title.
//
// An empty recent window short-circuits to the fixed mock set so a fresh
// dashboard is never blank. Mock insights carry their own generator tag.
// =============================================================================

export const MOCK_GENERATOR = 'mock-insights';

export const MOCK_INSIGHTS: readonly InsightCandidate[] = [
  {
    title: 'Sydney-Melbourne Route Shows Strong Demand',
    description:
      'The Sydney to Melbourne corridor typically carries high booking volume with competitive fares. ' +
      'It remains a key opportunity for business travelers and weekend getaways.',
    type: 'popular_route',
    confidence: 0.85,
    generatedBy: MOCK_GENERATOR,
  },
  {
    title: 'Weekend Premium Pricing Detected',
    description:
      'Fares commonly rise 15-25% for weekend departures on major domestic routes, ' +
      'reflecting stronger leisure demand on Saturdays and Sundays.',
    type: 'seasonal_pattern',
    confidence: 0.9,
    generatedBy: MOCK_GENERATOR,
  },
  {
    title: 'Brisbane-Gold Coast Corridor Opportunity',
    description:
      'Short-haul routes around Brisbane show growing demand with relatively stable pricing, ' +
      'and could support added frequency during peak tourist seasons.',
    type: 'demand_forecast',
    confidence: 0.75,
    generatedBy: MOCK_GENERATOR,
  },
];

export type InsightEngineOptions = {
  analyzers?: readonly Analyzer[];
  synthesizer?: NarrativeSynthesizer | null;
  now?: () => Date;
  insightWindowDays?: number;
  seasonalWindowDays?: number;
};

export class InsightEngine {
  private readonly store: ObservationStore & InsightStore;
  private readonly analyzers: readonly Analyzer[];
  private readonly synthesizer: NarrativeSynthesizer | null;
  private readonly now: () => Date;
  private readonly insightWindowDays: number;
  private readonly seasonalWindowDays: number;

  constructor(store: ObservationStore & InsightStore, options: InsightEngineOptions = {}) {
    this.store = store;
    this.analyzers = options.analyzers ?? DEFAULT_ANALYZERS;
    this.synthesizer = options.synthesizer ?? null;
    this.now = options.now ?? (() => new Date());
    this.insightWindowDays = options.insightWindowDays ?? config.windows.insightDays;
    this.seasonalWindowDays = options.seasonalWindowDays ?? config.windows.seasonalDays;
  }

  private loadWindow(window: ObservationWindow): ValidObservation[] {
    const { valid, skipped } = partitionObservations(this.store.query(window));
    if (skipped.length > 0) {
      console.warn(`[Insights] Ignoring ${skipped.length} malformed observation(s)`);
    }
    return valid;
  }

  private loadInput(): AnalyzerInput {
    const end = this.now();
    const recent = this.loadWindow({
      start: daysAgo(end, this.insightWindowDays),
      end,
      basis: 'capturedAt',
    });
    if (recent.length === 0) {
      throw new DataUnavailableError(`No observations captured in the last ${this.insightWindowDays} days`);
    }
    const seasonal = this.loadWindow({
      start: daysAgo(end, this.seasonalWindowDays),
      end,
      basis: 'departureTime',
    });
    return { recent, seasonal };
  }

  /** Candidates in analyzer order, before dedup. Store failures propagate. */
  async generate(): Promise<InsightCandidate[]> {
    let input: AnalyzerInput;
    try {
      input = this.loadInput();
    } catch (err) {
      if (!(err instanceof DataUnavailableError)) throw err;
      console.warn(`[Insights] ${err.message}; using mock insights`);
      return [...MOCK_INSIGHTS];
    }

    const candidates: InsightCandidate[] = [];
    for (const analyzer of this.analyzers) {
      try {
        const found = analyzer.analyze(input);
        candidates.push(...found);
      } catch (err) {
        console.error(`[Insights] ${analyzer.name} failed:`, describeError(err));
      }
    }

    if (this.synthesizer) {
      candidates.push(...await this.synthesizer.synthesizeFrom(input.recent));
    }

    return candidates;
  }

  /** Inserts candidates whose title is not stored yet; returns only new rows. */
  persist(candidates: InsightCandidate[]): Insight[] {
    const saved: Insight[] = [];
    const seen = new Set<string>();

    for (const candidate of candidates) {
      if (seen.has(candidate.title)) continue;
      seen.add(candidate.title);
      if (this.store.exists(candidate.title)) continue;

      const inserted = this.store.insert(candidate);
      if (inserted) saved.push(inserted);
    }

    console.log(`[Insights] Stored ${saved.length} of ${candidates.length} candidate(s)`);
    return saved;
  }

  async run(): Promise<Insight[]> {
    return this.persist(await this.generate());
  }
}

export function serializeInsight(insight: Insight): SerializedInsight {
  return {
    id: insight.id,
    title: insight.title,
    description: insight.description,
    type: insight.type,
    confidence: Number(insight.confidence),
    generatedBy: insight.generatedBy,
    createdAt: new Date(insight.createdAt).toISOString(),
  };
}
