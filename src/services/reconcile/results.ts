/**
 * Result aggregation for a reconciliation run. Pure, no I/O.
 */

import type {
  PublicationResult,
  ReconciliationAction,
  ServiceKind,
} from "../../types/index.js";

export type OutcomeLabel =
  | "created"
  | "updated"
  | "skipped"
  | "deleted"
  | "warning"
  | "failed"
  | `planned:${Exclude<ReconciliationAction, "skip">}`;

export interface ServiceOutcome {
  service: ServiceKind;
  outcome: OutcomeLabel;
  result: Readonly<PublicationResult>;
}

export interface DocumentSummary {
  title: string;
  outcomes: ServiceOutcome[];
}

export interface OutcomeCounts {
  created: number;
  updated: number;
  skipped: number;
  deleted: number;
  warning: number;
  failed: number;
  planned: number;
}

const DONE_LABELS = {
  create: "created",
  update: "updated",
  skip: "skipped",
  delete: "deleted",
} as const satisfies Record<ReconciliationAction, OutcomeLabel>;

export function outcomeLabel(result: PublicationResult): OutcomeLabel {
  if (!result.success) return "failed";
  if (result.warning === true) return "warning";
  if (result.dryRun === true && result.action !== "skip") {
    return `planned:${result.action}`;
  }
  return DONE_LABELS[result.action];
}

function resultKey(title: string, service: ServiceKind): string {
  return `${service}\u0000${title}`;
}

export class ResultAggregator {
  private ordered: Readonly<PublicationResult>[] = [];
  private byKey = new Map<string, Readonly<PublicationResult>[]>();

  /**
   * Store a result. It is frozen and cannot change afterwards.
   */
  add(result: PublicationResult): Readonly<PublicationResult> {
    const frozen = Object.freeze({
      ...result,
      ...(result.changedFields !== undefined
        ? { changedFields: [...result.changedFields] }
        : {}),
    });

    this.ordered.push(frozen);
    const key = resultKey(frozen.title, frozen.service);
    const existing = this.byKey.get(key);
    if (existing !== undefined) {
      existing.push(frozen);
    } else {
      this.byKey.set(key, [frozen]);
    }
    return frozen;
  }

  all(): readonly Readonly<PublicationResult>[] {
    return this.ordered;
  }

  get(
    title: string,
    service: ServiceKind
  ): readonly Readonly<PublicationResult>[] {
    return this.byKey.get(resultKey(title, service)) ?? [];
  }

  /**
   * One entry per title in first-seen order
   */
  summarize(): DocumentSummary[] {
    const summaries = new Map<string, DocumentSummary>();

    for (const result of this.ordered) {
      let summary = summaries.get(result.title);
      if (summary === undefined) {
        summary = { title: result.title, outcomes: [] };
        summaries.set(result.title, summary);
      }
      summary.outcomes.push({
        service: result.service,
        outcome: outcomeLabel(result),
        result,
      });
    }

    return [...summaries.values()];
  }

  counts(): OutcomeCounts {
    const counts: OutcomeCounts = {
      created: 0,
      updated: 0,
      skipped: 0,
      deleted: 0,
      warning: 0,
      failed: 0,
      planned: 0,
    };

    for (const result of this.ordered) {
      const label = outcomeLabel(result);
      switch (label) {
        case "created":
        case "updated":
        case "skipped":
        case "deleted":
        case "warning":
        case "failed":
          counts[label]++;
          break;
        default:
          counts.planned++;
      }
    }
    return counts;
  }

  hasFailures(): boolean {
    return this.ordered.some((result) => !result.success);
  }
}
