/**
 * Directory scanner - builds the complete set of local documents for a run
 */

import { readdir, readFile } from "node:fs/promises";
import type { Dirent } from "node:fs";
import { join } from "node:path";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import matter from "gray-matter";

import { ConfigurationError } from "../errors.js";
import { contentLogger } from "../logger.js";
import { computeFingerprint } from "./normalize.js";

import type { LocalDocument } from "../types/index.js";

// ============================================================================
// Frontmatter
// ============================================================================

// YAML leaves empty keys as null
const OptionalText = Type.Optional(Type.Union([Type.String(), Type.Null()]));

export const FrontmatterSchema = Type.Object({
  title: Type.String({ pattern: "\\S" }),
  subtitle: OptionalText,
  slug: OptionalText,
  tags: Type.Optional(
    Type.Union([
      Type.String(),
      Type.Array(Type.Union([Type.String(), Type.Number()])),
      Type.Null(),
    ])
  ),
  cover: OptionalText,
  domain: OptionalText,
  canonicalUrl: OptionalText,
  saveAsDraft: Type.Optional(Type.Boolean()),
  enableToc: Type.Optional(Type.Boolean()),
  seriesName: OptionalText,
});

export type Frontmatter = Static<typeof FrontmatterSchema>;

export interface ScanOptions {
  contentDir: string;
  /** File names to leave out, e.g. README.md */
  exclude?: string[];
}

export interface ScanResult {
  /** Usable documents, sorted by path, one per title */
  documents: LocalDocument[];
  /** Markdown files whose frontmatter could not be used */
  skipped: string[];
}

const TEXT_FIELDS = new Set([
  "title",
  "subtitle",
  "slug",
  "cover",
  "domain",
  "canonicalUrl",
  "seriesName",
]);
const FLAG_FIELDS = new Set(["saveAsDraft", "enableToc"]);
const TRUE_WORDS = new Set(["true", "yes", "on", "1"]);
const FALSE_WORDS = new Set(["false", "no", "off", "0"]);

function coerceValue(key: string, value: unknown): unknown {
  if (
    TEXT_FIELDS.has(key) &&
    (typeof value === "number" || typeof value === "boolean")
  ) {
    return String(value);
  }
  if (FLAG_FIELDS.has(key) && typeof value === "string") {
    const word = value.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
  }
  return value;
}

/**
 * Bring YAML scalars to the types the schema expects: `title: 2024` is a
 * number and `saveAsDraft: yes` a string under the YAML 1.2 core schema.
 */
export function coerceFrontmatter(data: unknown): unknown {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return data;
  }
  return Object.fromEntries(
    Object.entries(data).map(([key, value]: [string, unknown]) => [
      key,
      coerceValue(key, value),
    ])
  );
}

function text(value: string | null | undefined): string {
  return value?.trim() ?? "";
}

/**
 * Tags come either as "a, b, c" or as a YAML list
 */
export function parseTags(raw: Frontmatter["tags"]): string[] {
  if (raw === undefined || raw === null) {
    return [];
  }
  const items = typeof raw === "string" ? raw.split(",") : raw.map(String);
  return items.map((tag) => tag.trim()).filter((tag) => tag !== "");
}

export function resolveCanonicalUrl(frontmatter: Frontmatter): string {
  const explicit = text(frontmatter.canonicalUrl);
  if (explicit !== "") {
    return explicit;
  }

  const domain = text(frontmatter.domain);
  const slug = text(frontmatter.slug);
  if (domain !== "" && slug !== "") {
    return `https://${domain}/${slug}`;
  }
  return "";
}

/**
 * Parse one markdown file. Returns null when its frontmatter is unusable.
 */
export function parseDocument(
  path: string,
  source: string
): LocalDocument | null {
  const parsed = matter(source);
  const data = coerceFrontmatter(parsed.data);

  if (!Value.Check(FrontmatterSchema, data)) {
    const problems = [...Value.Errors(FrontmatterSchema, data)].map(
      (e) => `${e.path !== "" ? e.path : "/"}: ${e.message}`
    );
    contentLogger.error({ path, problems }, "Invalid frontmatter, skipping file");
    return null;
  }

  const title = data.title.trim();
  const tags = parseTags(data.tags);
  const draft = data.saveAsDraft ?? false;
  const coverUrl = text(data.cover);
  const body = parsed.content;
  const seriesName = text(data.seriesName);

  const doc: LocalDocument = {
    path,
    title,
    subtitle: text(data.subtitle),
    slug: text(data.slug),
    tags,
    draft,
    toc: data.enableToc ?? true,
    coverUrl,
    canonicalUrl: resolveCanonicalUrl(data),
    body,
    fingerprint: computeFingerprint({ title, body, tags, draft, coverUrl }),
  };
  if (seriesName !== "") {
    doc.seriesName = seriesName;
  }
  return doc;
}

// ============================================================================
// Scanner
// ============================================================================

/**
 * Read every markdown document in `contentDir`, sorted by path.
 *
 * A missing directory is a configuration error: an empty result would
 * otherwise mark every remote article as an orphan.
 */
export async function scanDocuments(options: ScanOptions): Promise<ScanResult> {
  const exclude = new Set(options.exclude ?? []);

  let entries: Dirent[];
  try {
    entries = await readdir(options.contentDir, { withFileTypes: true });
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read content directory ${options.contentDir}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const files = entries
    .filter(
      (entry) =>
        entry.isFile() &&
        entry.name.toLowerCase().endsWith(".md") &&
        !exclude.has(entry.name)
    )
    .map((entry) => join(options.contentDir, entry.name))
    .sort();

  contentLogger.debug(
    { contentDir: options.contentDir, fileCount: files.length },
    "Scanning markdown files"
  );

  const documents: LocalDocument[] = [];
  const skipped: string[] = [];
  const seenTitles = new Map<string, string>();

  for (const path of files) {
    const source = await readFile(path, "utf-8");
    const doc = parseDocument(path, source);
    if (doc === null) {
      skipped.push(path);
      continue;
    }

    const firstPath = seenTitles.get(doc.title);
    if (firstPath !== undefined) {
      contentLogger.warn(
        { path, title: doc.title, keptPath: firstPath },
        "Duplicate title, skipping file"
      );
      continue;
    }

    seenTitles.set(doc.title, path);
    documents.push(doc);
  }

  contentLogger.info(
    {
      contentDir: options.contentDir,
      documentCount: documents.length,
      skippedCount: skipped.length,
    },
    "Scanned local documents"
  );

  return { documents, skipped };
}
