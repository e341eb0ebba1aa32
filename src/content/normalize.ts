import { createHash } from "node:crypto";

// Markers around the table of contents injected by the transformer
export const TOC_START = "<!-- toc -->";
export const TOC_END = "<!-- /toc -->";

const FRONTMATTER_PATTERN = /^---\r?\n[\s\S]*?\r?\n---(?:\r?\n|$)/;
const TOC_PATTERN = /<!-- toc -->[\s\S]*?<!-- \/toc -->/g;
const ALIGN_PATTERN = /\s*align="[^"]*"/g;

/**
 * Reduce an article body to the text that matters for change detection.
 *
 * Removes the frontmatter block, anything the transformer injects only for
 * rendering (table of contents, alignment attributes), and collapses
 * whitespace, so a body that went through the transformer and back compares
 * equal to its source.
 */
export function normalizeForComparison(body: string): string {
  return body
    .replace(FRONTMATTER_PATTERN, "")
    .replace(TOC_PATTERN, "")
    .replace(ALIGN_PATTERN, "")
    .replace(/\s+/g, " ")
    .trim();
}

export interface FingerprintInput {
  title: string;
  body: string;
  tags: readonly string[];
  draft: boolean;
  coverUrl: string;
}

export type BodyNormalizer = (body: string) => string;

/**
 * Stable content fingerprint: same inputs, same hash, across runs
 */
export function computeFingerprint(
  input: FingerprintInput,
  normalize: BodyNormalizer = normalizeForComparison
): string {
  const canonical = JSON.stringify([
    normalize(input.body),
    [...new Set(input.tags)].sort(),
    input.title,
    input.draft,
    input.coverUrl,
  ]);

  return createHash("sha256").update(canonical).digest("hex");
}
