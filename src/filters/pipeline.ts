import { UnknownFilterError, describeError } from "../errors.js";
import { contentHash, type JsonValue } from "../json/value.js";
import type { StructuredLogger } from "../logger.js";
import { createBuiltinFilters } from "./builtin/index.js";
import { FilterResultCache } from "./cache.js";
import { buildFilterConfigSnapshot, withFilterToggle, type FilterConfigSnapshot } from "./config.js";
import { FilterMetricsRecorder, type FilterMetricsSnapshot } from "./metrics.js";
import {
  FILTER_NAMES,
  REDACTION_KINDS,
  emptyRedactionCounts,
  isFilterName,
  type Filter,
  type FilterAction,
  type FilterContext,
  type FilterDescriptor,
  type FilterDirection,
  type FilterName,
  type FilterResult,
  type FilterVerdict,
  type RedactionCounts,
} from "./types.js";

export interface FilterPipelineOptions {
  logger: StructuredLogger;
  /** Stages in execution order; defaults to the built-ins. */
  filters?: readonly Filter[];
  /** Initial configuration, validated like {@link FilterPipeline.swapConfig}. */
  config?: unknown;
  /** Wall clock handed to filters and the cache. */
  now?: () => number;
  metrics?: FilterMetricsRecorder;
}

/**
 * Runs the enabled filters of a direction over one message. Every run reads a
 * single configuration snapshot, so a concurrent swap never mixes settings
 * within one message. Faulty filters are skipped (fail-open) and reported.
 */
export class FilterPipeline {
  private readonly logger: StructuredLogger;
  private readonly filters: readonly Filter[];
  private readonly defaults: Readonly<Record<FilterName, boolean>>;
  private readonly now: () => number;
  private readonly cache: FilterResultCache;
  private readonly metrics: FilterMetricsRecorder;
  private current: FilterConfigSnapshot;

  constructor(options: FilterPipelineOptions) {
    this.logger = options.logger;
    this.filters = [...(options.filters ?? createBuiltinFilters())];
    this.now = options.now ?? Date.now;
    this.cache = new FilterResultCache({ now: this.now });
    this.metrics = options.metrics ?? new FilterMetricsRecorder();

    const defaults: Record<FilterName, boolean> = {
      blacklist: false,
      html_sanitizer: false,
      pii_redactor: false,
      secret_masking: false,
      response_size: false,
      bridge_metadata: false,
    };
    for (const filter of this.filters) {
      defaults[filter.name] = filter.defaultEnabled;
    }
    this.defaults = defaults;
    this.current = this.buildSnapshot(options.config ?? {}, 1);
  }

  /** Configuration snapshot currently in force. */
  get snapshot(): FilterConfigSnapshot {
    return this.current;
  }

  apply(direction: FilterDirection, sessionId: string, message: JsonValue): FilterResult {
    const snapshot = this.current;
    const startedAt = this.metrics.now();
    const active = this.filters.filter(
      (filter) => snapshot.enabled[filter.name] && filter.directions.includes(direction),
    );

    let cacheKey: string | null = null;
    if (direction === "server_to_client" && snapshot.cache.enabled && active.every((filter) => filter.cacheable)) {
      cacheKey = contentHash(message);
      const hit = this.cache.get(cacheKey);
      this.metrics.recordCacheLookup(hit !== null);
      if (hit) {
        const result: FilterResult = {
          message: hit.message,
          blocked: false,
          reason: null,
          blockedBy: null,
          actionsTaken: [...hit.actionsTaken],
          redactionCounts: { ...hit.redactionCounts },
          faults: [],
          cached: true,
        };
        this.metrics.recordResult(result, this.metrics.now() - startedAt);
        return result;
      }
    }

    const context: FilterContext = { direction, sessionId, config: snapshot, now: this.now };
    const actionsTaken: FilterAction[] = [];
    const redactionCounts = emptyRedactionCounts();
    const faults: FilterName[] = [];
    let current = message;

    for (const filter of active) {
      const stageStartedAt = this.metrics.now();
      let verdict: FilterVerdict;
      try {
        verdict = filter.apply(current, context);
      } catch (error) {
        this.metrics.recordStage(filter.name, "fault", this.metrics.now() - stageStartedAt);
        faults.push(filter.name);
        this.logger.error("filter_fault", {
          filter: filter.name,
          direction,
          session_id: sessionId,
          error: describeError(error),
        });
        continue;
      }

      if (verdict.action === "block") {
        this.metrics.recordStage(filter.name, "block", this.metrics.now() - stageStartedAt);
        const blocked: FilterResult = {
          message: current,
          blocked: true,
          reason: verdict.reason,
          blockedBy: filter.name,
          actionsTaken,
          redactionCounts,
          faults,
          cached: false,
        };
        if (snapshot.audit.logBlocked) {
          this.logger.warn("message_blocked", {
            filter: filter.name,
            direction,
            session_id: sessionId,
            reason: verdict.reason,
          });
        }
        this.metrics.recordResult(blocked, this.metrics.now() - startedAt);
        return blocked;
      }

      this.metrics.recordStage(filter.name, "pass", this.metrics.now() - stageStartedAt);
      current = verdict.message;
      for (const action of verdict.actions ?? []) {
        actionsTaken.push(action);
      }
      mergeRedactions(redactionCounts, verdict.redactions);
    }

    const result: FilterResult = {
      message: current,
      blocked: false,
      reason: null,
      blockedBy: null,
      actionsTaken,
      redactionCounts,
      faults,
      cached: false,
    };
    this.audit(snapshot, direction, sessionId, result);
    this.metrics.recordResult(result, this.metrics.now() - startedAt);

    // A swap during the run makes this outcome stale for the new snapshot.
    if (cacheKey !== null && faults.length === 0 && this.current === snapshot) {
      this.cache.set(
        cacheKey,
        { message: result.message, actionsTaken: result.actionsTaken, redactionCounts: result.redactionCounts },
        { ttlMs: snapshot.cache.ttlMs, maxEntries: snapshot.cache.maxEntries },
      );
    }
    return result;
  }

  /**
   * Validates {@link input} and installs it as the next snapshot. The cache is
   * cleared. Throws `ConfigurationError` and keeps the current snapshot when
   * the input is invalid.
   */
  swapConfig(input: unknown): FilterConfigSnapshot {
    return this.install(this.buildSnapshot(input, this.current.version + 1));
  }

  /** Enables or disables one filter; throws {@link UnknownFilterError} for unknown names. */
  toggle(name: string, enabled: boolean): FilterConfigSnapshot {
    if (!isFilterName(name) || !this.filters.some((filter) => filter.name === name)) {
      throw new UnknownFilterError(name);
    }
    const values = withFilterToggle(this.current.source, name, enabled);
    return this.install(this.buildSnapshot(values, this.current.version + 1));
  }

  listFilters(): FilterDescriptor[] {
    const snapshot = this.current;
    return this.filters.map((filter) => ({
      name: filter.name,
      enabled: snapshot.enabled[filter.name],
      description: filter.description,
      directions: [...filter.directions],
    }));
  }

  getMetrics(): FilterMetricsSnapshot {
    return this.metrics.snapshot({ cacheSize: this.cache.size, configVersion: this.current.version });
  }

  private buildSnapshot(input: unknown, version: number): FilterConfigSnapshot {
    return buildFilterConfigSnapshot(input, {
      version,
      defaults: this.defaults,
      logger: this.logger,
      now: this.now,
    });
  }

  private install(snapshot: FilterConfigSnapshot): FilterConfigSnapshot {
    this.current = snapshot;
    this.cache.clear();
    this.logger.info("filter_config_swapped", {
      version: snapshot.version,
      enabled: FILTER_NAMES.filter((name) => snapshot.enabled[name]),
    });
    return snapshot;
  }

  private audit(
    snapshot: FilterConfigSnapshot,
    direction: FilterDirection,
    sessionId: string,
    result: FilterResult,
  ): void {
    const redacted = REDACTION_KINDS.reduce((sum, kind) => sum + result.redactionCounts[kind], 0);
    if (snapshot.audit.logRedactions && redacted > 0) {
      this.logger.info("pii_redacted", { direction, session_id: sessionId, counts: result.redactionCounts });
    }
    if (snapshot.audit.logSummaries) {
      const sizeAction = result.actionsTaken.find((action) => action === "summarized" || action === "truncated");
      if (sizeAction !== undefined) {
        this.logger.info("response_summarized", { direction, session_id: sessionId, action: sizeAction });
      }
    }
  }
}

function mergeRedactions(target: RedactionCounts, addition: Partial<RedactionCounts> | undefined): void {
  if (!addition) {
    return;
  }
  for (const kind of REDACTION_KINDS) {
    target[kind] += addition[kind] ?? 0;
  }
}
