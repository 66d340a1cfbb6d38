import { performance } from "node:perf_hooks";

import {
  FILTER_NAMES,
  REDACTION_KINDS,
  emptyRedactionCounts,
  type FilterName,
  type FilterResult,
  type RedactionCounts,
} from "./types.js";

export type FilterInvocationOutcome = "pass" | "block" | "fault";

export interface FilterStageSnapshot {
  readonly name: FilterName;
  readonly invocations: number;
  readonly blocks: number;
  readonly faults: number;
  readonly averageDurationMs: number;
}

/** Counters exposed through `getFilterMetrics`. */
export interface FilterMetricsSnapshot {
  readonly totalMessages: number;
  readonly blockedMessages: number;
  readonly filterFaults: number;
  readonly piiRedactions: number;
  readonly piiRedactionsByKind: RedactionCounts;
  readonly contentSanitizations: number;
  readonly responseSummaries: number;
  readonly responseTruncations: number;
  readonly secretMaskings: number;
  readonly metadataStamps: number;
  readonly cacheHits: number;
  readonly cacheMisses: number;
  readonly cacheHitRate: number;
  readonly cacheSize: number;
  readonly averageProcessingMs: number;
  readonly configVersion: number;
  readonly filters: readonly FilterStageSnapshot[];
}

interface StageCounters {
  invocations: number;
  blocks: number;
  faults: number;
  totalDurationMs: number;
}

/**
 * Accumulates pipeline counters. The recorder only stores totals; averages
 * and rates are derived when a snapshot is taken.
 */
export class FilterMetricsRecorder {
  private readonly clock: () => number;
  private totalMessages = 0;
  private blockedMessages = 0;
  private filterFaults = 0;
  private readonly redactions = emptyRedactionCounts();
  private contentSanitizations = 0;
  private responseSummaries = 0;
  private responseTruncations = 0;
  private secretMaskings = 0;
  private metadataStamps = 0;
  private cacheHits = 0;
  private cacheMisses = 0;
  private totalProcessingMs = 0;
  private readonly stages = new Map<FilterName, StageCounters>();

  constructor(options: { clock?: () => number } = {}) {
    this.clock = options.clock ?? (() => performance.now());
  }

  /** Monotonic milliseconds used to time pipeline runs. */
  now(): number {
    return this.clock();
  }

  recordCacheLookup(hit: boolean): void {
    if (hit) {
      this.cacheHits += 1;
    } else {
      this.cacheMisses += 1;
    }
  }

  recordStage(name: FilterName, outcome: FilterInvocationOutcome, durationMs: number): void {
    const counters = this.stages.get(name) ?? { invocations: 0, blocks: 0, faults: 0, totalDurationMs: 0 };
    counters.invocations += 1;
    counters.totalDurationMs += Math.max(0, durationMs);
    if (outcome === "block") {
      counters.blocks += 1;
    } else if (outcome === "fault") {
      counters.faults += 1;
      this.filterFaults += 1;
    }
    this.stages.set(name, counters);
  }

  recordResult(result: FilterResult, durationMs: number): void {
    this.totalMessages += 1;
    this.totalProcessingMs += Math.max(0, durationMs);
    if (result.blocked) {
      this.blockedMessages += 1;
      return;
    }
    for (const action of result.actionsTaken) {
      switch (action) {
        case "sanitized":
          this.contentSanitizations += 1;
          break;
        case "summarized":
          this.responseSummaries += 1;
          break;
        case "truncated":
          this.responseTruncations += 1;
          break;
        case "secrets_masked":
          this.secretMaskings += 1;
          break;
        case "metadata_stamped":
          this.metadataStamps += 1;
          break;
        case "pii_redacted":
          break;
      }
    }
    for (const kind of REDACTION_KINDS) {
      this.redactions[kind] += result.redactionCounts[kind];
    }
  }

  snapshot(extra: { cacheSize: number; configVersion: number }): FilterMetricsSnapshot {
    const lookups = this.cacheHits + this.cacheMisses;
    const piiRedactions = Object.values(this.redactions).reduce((sum, count) => sum + count, 0);
    return {
      totalMessages: this.totalMessages,
      blockedMessages: this.blockedMessages,
      filterFaults: this.filterFaults,
      piiRedactions,
      piiRedactionsByKind: { ...this.redactions },
      contentSanitizations: this.contentSanitizations,
      responseSummaries: this.responseSummaries,
      responseTruncations: this.responseTruncations,
      secretMaskings: this.secretMaskings,
      metadataStamps: this.metadataStamps,
      cacheHits: this.cacheHits,
      cacheMisses: this.cacheMisses,
      cacheHitRate: lookups === 0 ? 0 : this.cacheHits / lookups,
      cacheSize: extra.cacheSize,
      averageProcessingMs: this.totalMessages === 0 ? 0 : this.totalProcessingMs / this.totalMessages,
      configVersion: extra.configVersion,
      filters: FILTER_NAMES.map((name) => {
        const counters = this.stages.get(name);
        return {
          name,
          invocations: counters?.invocations ?? 0,
          blocks: counters?.blocks ?? 0,
          faults: counters?.faults ?? 0,
          averageDurationMs:
            counters && counters.invocations > 0 ? counters.totalDurationMs / counters.invocations : 0,
        };
      }),
    };
  }
}
