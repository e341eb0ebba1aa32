// Domain types for local documents, remote articles and reconciliation

import type { ErrorCategory } from "../errors.js";

// =====================
// Services
// =====================

export const SERVICE_KINDS = ["devto", "hashnode"] as const;

export type ServiceKind = (typeof SERVICE_KINDS)[number];

export function isServiceKind(value: string): value is ServiceKind {
  return SERVICE_KINDS.some((kind) => kind === value);
}

// =====================
// Local Documents
// =====================

/**
 * A markdown file from the content directory plus its frontmatter
 */
export interface LocalDocument {
  path: string;
  title: string;
  subtitle: string;
  slug: string;
  tags: string[];
  /** Frontmatter `saveAsDraft`; the same flag goes to every service */
  draft: boolean;
  toc: boolean;
  coverUrl: string;
  canonicalUrl: string;
  seriesName?: string;
  body: string;
  fingerprint: string;
}

// =====================
// Remote Articles
// =====================

/**
 * A service's stored representation of a post, as reported by its listing
 */
export interface RemoteArticle {
  service: ServiceKind;
  id: string;
  title: string;
  body: string;
  tags: string[];
  published: boolean;
  coverUrl: string;
  /** ISO-8601; empty when the service does not report it */
  createdAt: string;
  updatedAt?: string;
  url?: string;
}

/**
 * Service-specific article content produced by the content transformer
 */
export interface ArticlePayload {
  title: string;
  subtitle: string;
  slug: string;
  body: string;
  tags: string[];
  coverUrl: string;
  canonicalUrl: string;
  seriesName?: string;
}

export type ArticlePatch = Partial<ArticlePayload>;

// =====================
// Reconciliation
// =====================

export type ChangedField = "title" | "tags" | "cover" | "body" | "published";

export type UpdateMode = "full" | "metadata";

export type ReconciliationDecision =
  | { action: "create" }
  | {
      action: "update";
      mode: UpdateMode;
      targetId: string;
      changedFields: ChangedField[];
    }
  | { action: "skip"; targetId: string }
  | { action: "delete"; targetId: string };

export type ReconciliationAction = ReconciliationDecision["action"];

/**
 * Outcome of one (document, service) pair or one orphan deletion
 */
export interface PublicationResult {
  service: ServiceKind;
  title: string;
  action: ReconciliationAction;
  updateMode?: UpdateMode;
  success: boolean;
  /** Non-fatal problem, e.g. a delete refused on a shared publication */
  warning?: boolean;
  /** Decision only; nothing was written */
  dryRun?: boolean;
  remoteId?: string;
  changedFields?: ChangedField[];
  errorCategory?: ErrorCategory | "configuration";
  message?: string;
}
