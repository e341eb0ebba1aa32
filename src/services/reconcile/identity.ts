/**
 * Identity resolution: which remote article, if any, mirrors a local title
 */

import {
  AuthError,
  isRetryable,
  normalizeError,
  type ConnectorError,
} from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { withRetry, type RetryOptions } from "../../utils/retry.js";

import type { ServiceConnector } from "../../connectors/types.js";
import type { RemoteArticle, ServiceKind } from "../../types/index.js";

export interface IdentityMatch {
  remoteId?: string;
  published?: boolean;
  article?: RemoteArticle;
}

export type SnapshotStatus = "ok" | "degraded" | "unavailable";

/**
 * One service's listing, read once per run
 */
export interface ServiceSnapshot {
  service: ServiceKind;
  articles: RemoteArticle[];
  /**
   * degraded: listing failed transiently, treated as empty.
   * unavailable: the service cannot be used this run.
   */
  status: SnapshotStatus;
  error?: ConnectorError;
}

function createdAtValue(article: RemoteArticle): number {
  const time = Date.parse(article.createdAt);
  return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
}

/**
 * Exact, case-sensitive title match. With duplicates the most recently
 * created article wins; equal timestamps keep the earlier listing entry.
 */
export function resolve(
  title: string,
  articles: readonly RemoteArticle[]
): IdentityMatch {
  let best: RemoteArticle | undefined;

  for (const article of articles) {
    if (article.title !== title) continue;
    if (best === undefined || createdAtValue(article) > createdAtValue(best)) {
      best = article;
    }
  }

  if (best === undefined) {
    return {};
  }
  return { remoteId: best.id, published: best.published, article: best };
}

/**
 * List a service's articles once, with retries. Never throws.
 */
export async function loadSnapshot(
  connector: ServiceConnector,
  retry: RetryOptions
): Promise<ServiceSnapshot> {
  const service = connector.kind;

  try {
    const articles = await withRetry(() => connector.listArticles(), {
      ...retry,
      onRetry: (info) => {
        syncLogger.warn(
          {
            service,
            operation: "listArticles",
            attempt: info.attempt,
            maxAttempts: info.maxAttempts,
            delayMs: info.delayMs,
            error: info.error.message,
          },
          "Listing failed, retrying"
        );
        retry.onRetry?.(info);
      },
    });

    syncLogger.info(
      { service, articleCount: articles.length },
      "Loaded remote snapshot"
    );
    return { service, articles, status: "ok" };
  } catch (thrown) {
    const error = normalizeError(thrown);

    if (isRetryable(error)) {
      syncLogger.warn(
        { service, error: error.message, category: error.category },
        "Listing failed after retries, using an empty snapshot"
      );
      return { service, articles: [], status: "degraded", error };
    }

    syncLogger.error(
      { service, error: error.message, category: error.category },
      error instanceof AuthError
        ? "Authentication failed, service disabled for this run"
        : "Listing failed, service disabled for this run"
    );
    return { service, articles: [], status: "unavailable", error };
  }
}
