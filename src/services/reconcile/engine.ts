/**
 * Reconciliation engine
 *
 * Drives one run: snapshot every service once, walk the documents in scan
 * order against each service in configured order, then sweep orphans.
 * Every failure is caught at the (document, service) boundary and becomes a
 * failed result; only configuration errors escape.
 */

import { MarkdownTransformer } from "../../content/transformer.js";
import {
  AuthError,
  ConfigurationError,
  NotFoundError,
  PermissionError,
  normalizeError,
  type ConnectorError,
} from "../../errors.js";
import { syncLogger } from "../../logger.js";
import {
  DEFAULT_RETRY_POLICY,
  withRetry,
  type RetryOptions,
  type RetryPolicy,
} from "../../utils/retry.js";
import { evaluate, metadataPatch } from "./change-detector.js";
import { loadSnapshot, resolve, type ServiceSnapshot } from "./identity.js";
import {
  ResultAggregator,
  type DocumentSummary,
  type OutcomeCounts,
} from "./results.js";

import type { BodyNormalizer } from "../../content/normalize.js";
import type { ContentTransformer } from "../../content/transformer.js";
import type { ServiceConnector } from "../../connectors/types.js";
import type {
  LocalDocument,
  PublicationResult,
  ReconciliationAction,
  RemoteArticle,
  ServiceKind,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface EngineOptions {
  /** Enabled services, in the order they are reconciled */
  connectors: ServiceConnector[];
  transformer?: ContentTransformer;
  retry?: RetryPolicy;
  /** Per-service wait after a rate limit without Retry-After */
  rateLimitDelayMs?: Partial<Record<ServiceKind, number>>;
  /** Report refused deletions as warnings instead of failures */
  skipPermissionErrorsOnDelete?: boolean;
  deleteOrphans?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunOptions {
  /** Checked between documents only; the pair in flight finishes first */
  signal?: AbortSignal;
  /** Compute and report decisions without writing anything */
  dryRun?: boolean;
  /**
   * Local files that exist but could not be read as documents. Any entry
   * turns the orphan sweep off, since their remote mirrors are not orphans.
   */
  skippedFiles?: readonly string[];
}

export type OrphanSweepStatus =
  | "done"
  | "disabled"
  | "cancelled"
  | "incomplete-scan";

export type ReconcilePhase = "snapshot" | "documents" | "orphans";

export interface ReconcileProgress {
  phase: ReconcilePhase;
  current: number;
  total: number;
  currentItem?: string;
}

type ProgressCallback = (progress: ReconcileProgress) => void;

export interface SnapshotSummary {
  service: ServiceKind;
  status: ServiceSnapshot["status"];
  articleCount: number;
  error?: string;
}

export interface ReconciliationReport {
  results: readonly Readonly<PublicationResult>[];
  summary: DocumentSummary[];
  counts: OutcomeCounts;
  snapshots: SnapshotSummary[];
  cancelled: boolean;
  dryRun: boolean;
  orphanSweep: OrphanSweepStatus;
  skippedFiles: string[];
  /** True when any result failed */
  failed: boolean;
  durationMs: number;
}

interface RunContext {
  dryRun: boolean;
  snapshots: Map<ServiceKind, ServiceSnapshot>;
  /** Services that failed authentication; later pairs short-circuit */
  dead: Map<ServiceKind, ConnectorError>;
}

// ============================================================================
// Reconciliation Engine
// ============================================================================

export class ReconciliationEngine {
  private connectors: ServiceConnector[];
  private transformer: ContentTransformer;
  /** Set only for an injected transformer; the default uses the built-in rules */
  private normalize?: BodyNormalizer;
  private retry: RetryPolicy;
  private onProgress?: ProgressCallback;

  constructor(private options: EngineOptions) {
    this.connectors = options.connectors;
    this.transformer = options.transformer ?? new MarkdownTransformer();
    if (options.transformer) {
      const transformer = options.transformer;
      this.normalize = (body) => transformer.normalizeForComparison(body);
    }
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  /**
   * Run one full reconciliation of `documents` against every service
   */
  async run(
    documents: readonly LocalDocument[],
    options: RunOptions = {}
  ): Promise<ReconciliationReport> {
    if (this.connectors.length === 0) {
      throw new ConfigurationError("No publishing service is enabled");
    }

    const startTime = Date.now();
    const dryRun = options.dryRun ?? false;
    const results = new ResultAggregator();
    const ctx: RunContext = {
      dryRun,
      snapshots: new Map(),
      dead: new Map(),
    };

    syncLogger.info(
      {
        documentCount: documents.length,
        services: this.connectors.map((c) => c.kind),
        dryRun,
      },
      "Starting reconciliation"
    );

    // 1. Snapshot each service once
    for (let i = 0; i < this.connectors.length; i++) {
      const connector = this.connectors[i];
      if (!connector) continue;

      this.onProgress?.({
        phase: "snapshot",
        current: i + 1,
        total: this.connectors.length,
        currentItem: connector.kind,
      });

      const snapshot = await loadSnapshot(
        connector,
        this.retryFor(connector.kind)
      );
      ctx.snapshots.set(connector.kind, snapshot);
      if (snapshot.status === "unavailable" && snapshot.error) {
        ctx.dead.set(connector.kind, snapshot.error);
      }
    }

    // 2. Documents in scan order, services in configured order
    let cancelled = false;
    for (let i = 0; i < documents.length; i++) {
      const doc = documents[i];
      if (!doc) continue;

      if (options.signal?.aborted === true) {
        cancelled = true;
        syncLogger.warn(
          { processed: i, remaining: documents.length - i },
          "Reconciliation cancelled"
        );
        break;
      }

      this.onProgress?.({
        phase: "documents",
        current: i + 1,
        total: documents.length,
        currentItem: doc.title,
      });

      for (const connector of this.connectors) {
        results.add(await this.reconcilePair(doc, connector, ctx));
      }
    }

    // 3. Orphan sweep
    const skippedFiles = [...(options.skippedFiles ?? [])];
    let orphanSweep: OrphanSweepStatus;
    if (cancelled) {
      orphanSweep = "cancelled";
      syncLogger.info("Skipping orphan sweep for cancelled run");
    } else if (this.options.deleteOrphans === false) {
      orphanSweep = "disabled";
      syncLogger.info("Orphan deletion disabled");
    } else if (skippedFiles.length > 0) {
      orphanSweep = "incomplete-scan";
      syncLogger.warn(
        { skippedFiles },
        "Some local files could not be read, skipping orphan sweep"
      );
    } else {
      orphanSweep = "done";
      await this.sweepOrphans(documents, ctx, results);
    }

    const counts = results.counts();
    const durationMs = Date.now() - startTime;

    syncLogger.info(
      { ...counts, cancelled, dryRun, durationMs },
      "Reconciliation complete"
    );

    return {
      results: results.all(),
      summary: results.summarize(),
      counts,
      snapshots: [...ctx.snapshots.values()].map((snapshot) => ({
        service: snapshot.service,
        status: snapshot.status,
        articleCount: snapshot.articles.length,
        ...(snapshot.error ? { error: snapshot.error.message } : {}),
      })),
      cancelled,
      dryRun,
      orphanSweep,
      skippedFiles,
      failed: results.hasFailures(),
      durationMs,
    };
  }

  // ==========================================================================
  // Pairs
  // ==========================================================================

  private async reconcilePair(
    doc: LocalDocument,
    connector: ServiceConnector,
    ctx: RunContext
  ): Promise<PublicationResult> {
    const service = connector.kind;
    const base = { service, title: doc.title };
    const published = !doc.draft;
    let action: ReconciliationAction = "create";
    let operation = "transform";

    try {
      const payload = this.transformer.toPayload(doc, service);
      const articles = ctx.snapshots.get(service)?.articles ?? [];
      const match = resolve(doc.title, articles).article;
      const decision = evaluate(
        doc,
        payload,
        match,
        connector.capabilities,
        this.normalize
      );
      action = decision.action;

      const dead = ctx.dead.get(service);
      if (dead) {
        return this.deadResult(base, action, dead);
      }

      switch (decision.action) {
        case "skip":
          syncLogger.debug({ ...base }, "Unchanged, skipping");
          return {
            ...base,
            action: "skip",
            success: true,
            remoteId: decision.targetId,
            ...(ctx.dryRun ? { dryRun: true } : {}),
          };

        case "create": {
          if (ctx.dryRun) {
            return { ...base, action: "create", success: true, dryRun: true };
          }
          operation = "createArticle";
          const created = await this.call(
            connector,
            doc.title,
            operation,
            () => connector.createArticle(payload, published)
          );
          return {
            ...base,
            action: "create",
            success: true,
            remoteId: created.id,
          };
        }

        case "update": {
          const updateResult: PublicationResult = {
            ...base,
            action: "update",
            updateMode: decision.mode,
            success: true,
            remoteId: decision.targetId,
            changedFields: decision.changedFields,
          };
          if (ctx.dryRun) {
            return { ...updateResult, dryRun: true };
          }

          const patch =
            decision.mode === "metadata"
              ? metadataPatch(payload, decision.changedFields)
              : payload;
          operation = "updateArticle";

          try {
            await this.call(connector, doc.title, operation, () =>
              connector.updateArticle(decision.targetId, patch, published)
            );
            return updateResult;
          } catch (thrown) {
            if (!(thrown instanceof NotFoundError)) throw thrown;

            syncLogger.warn(
              { ...base, remoteId: decision.targetId },
              "Remote article vanished before update, creating it again"
            );
            action = "create";
            operation = "createArticle";
            const created = await this.call(
              connector,
              doc.title,
              operation,
              () => connector.createArticle(payload, published)
            );
            return {
              ...base,
              action: "create",
              success: true,
              remoteId: created.id,
              message: `Remote article ${decision.targetId} was gone, created anew`,
            };
          }
        }

        case "delete":
          // Decisions for local documents never delete
          return { ...base, action: "skip", success: true };
      }
    } catch (thrown) {
      return this.failure(base, action, operation, thrown, ctx);
    }
  }

  // ==========================================================================
  // Orphans
  // ==========================================================================

  private async sweepOrphans(
    documents: readonly LocalDocument[],
    ctx: RunContext,
    results: ResultAggregator
  ): Promise<void> {
    const localTitles = new Set(documents.map((doc) => doc.title));

    const work: { connector: ServiceConnector; article: RemoteArticle }[] = [];
    for (const connector of this.connectors) {
      const snapshot = ctx.snapshots.get(connector.kind);
      if (!snapshot || snapshot.status !== "ok") {
        syncLogger.warn(
          { service: connector.kind, status: snapshot?.status },
          "Snapshot incomplete, skipping orphan sweep for service"
        );
        continue;
      }
      for (const article of snapshot.articles) {
        if (!localTitles.has(article.title)) {
          work.push({ connector, article });
        }
      }
    }

    for (let i = 0; i < work.length; i++) {
      const item = work[i];
      if (!item) continue;

      this.onProgress?.({
        phase: "orphans",
        current: i + 1,
        total: work.length,
        currentItem: item.article.title,
      });
      results.add(await this.deleteOrphan(item.connector, item.article, ctx));
    }
  }

  private async deleteOrphan(
    connector: ServiceConnector,
    article: RemoteArticle,
    ctx: RunContext
  ): Promise<PublicationResult> {
    const service = connector.kind;
    const base = { service, title: article.title, remoteId: article.id };

    const dead = ctx.dead.get(service);
    if (dead) {
      return this.deadResult(base, "delete", dead);
    }
    if (ctx.dryRun) {
      return { ...base, action: "delete", success: true, dryRun: true };
    }

    try {
      await this.call(connector, article.title, "deleteArticle", () =>
        connector.deleteArticle(article.id)
      );
      return { ...base, action: "delete", success: true };
    } catch (thrown) {
      const error = normalizeError(thrown);

      if (error instanceof NotFoundError) {
        syncLogger.info({ ...base }, "Orphan already removed");
        return {
          ...base,
          action: "delete",
          success: true,
          message: "Already removed",
        };
      }

      if (
        error instanceof PermissionError &&
        this.options.skipPermissionErrorsOnDelete !== false
      ) {
        syncLogger.warn(
          { ...base, error: error.message },
          "Not allowed to delete orphan, leaving it in place"
        );
        return {
          ...base,
          action: "delete",
          success: true,
          warning: true,
          errorCategory: error.category,
          message: error.message,
        };
      }

      return this.failure(base, "delete", "deleteArticle", error, ctx);
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private retryFor(service: ServiceKind): RetryOptions {
    return {
      ...this.retry,
      rateLimitDelayMs:
        this.options.rateLimitDelayMs?.[service] ?? this.retry.rateLimitDelayMs,
      sleep: this.options.sleep,
    };
  }

  private call<T>(
    connector: ServiceConnector,
    title: string,
    operation: string,
    fn: () => Promise<T>
  ): Promise<T> {
    return withRetry(fn, {
      ...this.retryFor(connector.kind),
      onRetry: (info) => {
        syncLogger.warn(
          {
            service: connector.kind,
            title,
            operation,
            attempt: info.attempt,
            maxAttempts: info.maxAttempts,
            delayMs: info.delayMs,
            error: info.error.message,
          },
          "Operation failed, retrying"
        );
      },
    });
  }

  private deadResult(
    base: { service: ServiceKind; title: string; remoteId?: string },
    action: ReconciliationAction,
    error: ConnectorError
  ): PublicationResult {
    return {
      ...base,
      action,
      success: false,
      errorCategory: error.category,
      message: `${base.service} unavailable for this run: ${error.message}`,
    };
  }

  private failure(
    base: { service: ServiceKind; title: string; remoteId?: string },
    action: ReconciliationAction,
    operation: string,
    thrown: unknown,
    ctx: RunContext
  ): PublicationResult {
    const error = normalizeError(thrown);

    if (error instanceof AuthError && !ctx.dead.has(base.service)) {
      ctx.dead.set(base.service, error);
      syncLogger.error(
        { service: base.service, error: error.message },
        "Authentication failed, skipping service for the rest of the run"
      );
    }

    syncLogger.error(
      {
        ...base,
        operation,
        category: error.category,
        error: error.message,
      },
      "Publication failed"
    );

    return {
      ...base,
      action,
      success: false,
      errorCategory: error.category,
      message: error.message,
    };
  }
}
