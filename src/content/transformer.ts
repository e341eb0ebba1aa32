/**
 * Content transformer - turns a local document into a service payload
 */

import { TOC_END, TOC_START, normalizeForComparison } from "./normalize.js";

import type {
  ArticlePayload,
  LocalDocument,
  ServiceKind,
} from "../types/index.js";

export interface ContentTransformer {
  /** Deterministic: identical input always yields identical output */
  toPayload(doc: LocalDocument, service: ServiceKind): ArticlePayload;
  normalizeForComparison(body: string): string;
}

// dev.to rejects more than four tags, Hashnode more than five
const TAG_LIMITS: Record<ServiceKind, number> = {
  devto: 4,
  hashnode: 5,
};

const HEADING_PATTERN = /^(#{1,6})\s+(.+?)\s*#*\s*$/;
const FENCE_PATTERN = /^\s*(```|~~~)/;

/**
 * GitHub-style heading anchor
 */
export function headingAnchor(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\w\s-]/g, "")
    .replace(/[-\s]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Markdown table of contents for the body's headings, or "" when it has none
 */
export function buildTableOfContents(body: string): string {
  const lines: string[] = [];
  let fence: string | null = null;

  for (const line of body.split(/\r?\n/)) {
    const fenceMatch = FENCE_PATTERN.exec(line);
    if (fenceMatch?.[1] !== undefined) {
      if (fence === null) {
        fence = fenceMatch[1];
      } else if (fence === fenceMatch[1]) {
        fence = null;
      }
      continue;
    }
    if (fence !== null) continue;

    const heading = HEADING_PATTERN.exec(line);
    if (heading?.[1] === undefined || heading[2] === undefined) continue;

    const indent = "  ".repeat(heading[1].length - 1);
    const text = heading[2];
    lines.push(`${indent}- [${text}](#${headingAnchor(text)})`);
  }

  if (lines.length === 0) {
    return "";
  }

  return [TOC_START, "## Table of Contents", "", ...lines, TOC_END].join("\n");
}

/**
 * Convert free-form tags into what the service accepts
 */
export function convertTags(
  tags: readonly string[],
  service: ServiceKind
): string[] {
  const converted = tags.map((tag) => {
    const lower = tag.trim().toLowerCase();
    if (service === "devto") {
      return lower.replace(/[^a-z0-9]/g, "");
    }
    return lower
      .replace(/[^a-z0-9\s-]/g, "")
      .replace(/\s+/g, "-")
      .replace(/-+/g, "-")
      .replace(/^-+|-+$/g, "");
  });

  const unique = [...new Set(converted.filter((tag) => tag !== ""))];
  return unique.slice(0, TAG_LIMITS[service]);
}

export class MarkdownTransformer implements ContentTransformer {
  toPayload(doc: LocalDocument, service: ServiceKind): ArticlePayload {
    let body = doc.body;

    if (doc.toc) {
      const toc = buildTableOfContents(body);
      if (toc !== "") {
        body = `${toc}\n\n${body}`;
      }
    }

    if (service === "hashnode") {
      // Hashnode renders raw alignment attributes as text
      body = body.replace(/\s*align="(?:left|center|right)"/g, "");
    }

    const payload: ArticlePayload = {
      title: doc.title,
      subtitle: doc.subtitle,
      slug: doc.slug,
      body,
      tags: convertTags(doc.tags, service),
      coverUrl: doc.coverUrl,
      canonicalUrl: doc.canonicalUrl,
    };
    if (doc.seriesName !== undefined) {
      payload.seriesName = doc.seriesName;
    }
    return payload;
  }

  normalizeForComparison(body: string): string {
    return normalizeForComparison(body);
  }
}
