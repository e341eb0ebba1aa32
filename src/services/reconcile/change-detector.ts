/**
 * Change detection between a local document and its remote mirror
 */

import {
  computeFingerprint,
  normalizeForComparison,
  type BodyNormalizer,
} from "../../content/normalize.js";

import type { ServiceCapabilities } from "../../connectors/types.js";
import type {
  ArticlePatch,
  ArticlePayload,
  ChangedField,
  LocalDocument,
  ReconciliationDecision,
  RemoteArticle,
} from "../../types/index.js";

// Any of these alone can go out without resending the body
const METADATA_FIELDS: ReadonlySet<ChangedField> = new Set([
  "title",
  "tags",
  "cover",
]);

function sameTags(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((tag) => right.has(tag));
}

/**
 * Fingerprint of what we would send. The scanner's `doc.fingerprint` is
 * reused when the payload carries the document's own values and the default
 * normalization applies.
 */
function localFingerprint(
  doc: LocalDocument,
  payload: ArticlePayload,
  capabilities: ServiceCapabilities,
  normalize: BodyNormalizer | undefined
): string {
  const draft = capabilities.drafts && doc.draft;
  if (
    normalize === undefined &&
    draft === doc.draft &&
    payload.title === doc.title &&
    payload.coverUrl === doc.coverUrl &&
    sameTags(payload.tags, doc.tags)
  ) {
    return doc.fingerprint;
  }

  return computeFingerprint(
    {
      title: payload.title,
      body: doc.body,
      tags: payload.tags,
      draft,
      coverUrl: payload.coverUrl,
    },
    normalize
  );
}

/**
 * Fields that differ between what we would send and what the service holds
 */
export function diffFields(
  doc: LocalDocument,
  payload: ArticlePayload,
  article: RemoteArticle,
  capabilities: ServiceCapabilities,
  normalize: BodyNormalizer = normalizeForComparison
): ChangedField[] {
  const changed: ChangedField[] = [];

  if (payload.title !== article.title) changed.push("title");
  if (!sameTags(payload.tags, article.tags)) changed.push("tags");
  if (payload.coverUrl !== article.coverUrl) changed.push("cover");
  if (normalize(doc.body) !== normalize(article.body)) {
    changed.push("body");
  }
  if (capabilities.drafts && !doc.draft !== article.published) {
    changed.push("published");
  }

  return changed;
}

/**
 * Decide what one (document, service) pair needs.
 *
 * `normalize` replaces the default body normalization for both the
 * fingerprint and the body diff.
 */
export function evaluate(
  doc: LocalDocument,
  payload: ArticlePayload,
  match: RemoteArticle | undefined,
  capabilities: ServiceCapabilities,
  normalize?: BodyNormalizer
): ReconciliationDecision {
  if (match === undefined) {
    return { action: "create" };
  }

  // Services without drafts always hold published posts
  const remoteFingerprint = computeFingerprint(
    {
      title: match.title,
      body: match.body,
      tags: match.tags,
      draft: capabilities.drafts && !match.published,
      coverUrl: match.coverUrl,
    },
    normalize
  );

  if (
    localFingerprint(doc, payload, capabilities, normalize) ===
    remoteFingerprint
  ) {
    return { action: "skip", targetId: match.id };
  }

  const changedFields = diffFields(
    doc,
    payload,
    match,
    capabilities,
    normalize
  );
  if (changedFields.length === 0) {
    return { action: "skip", targetId: match.id };
  }

  const metadataOnly = changedFields.every((field) =>
    METADATA_FIELDS.has(field)
  );
  return {
    action: "update",
    mode: metadataOnly ? "metadata" : "full",
    targetId: match.id,
    changedFields,
  };
}

/**
 * Patch for a metadata-only update. Never carries the body.
 */
export function metadataPatch(
  payload: ArticlePayload,
  changedFields: readonly ChangedField[]
): ArticlePatch {
  const patch: ArticlePatch = {};

  if (changedFields.includes("title")) patch.title = payload.title;
  if (changedFields.includes("tags")) patch.tags = payload.tags;
  if (changedFields.includes("cover")) patch.coverUrl = payload.coverUrl;

  return patch;
}
