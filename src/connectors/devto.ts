/**
 * dev.to (Forem) REST connector
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { NotFoundError, UnknownError } from "../errors.js";
import { connectorLogger } from "../logger.js";
import { RateLimiter, requestJson, type FetchFn } from "./http.js";

import type { ServiceCapabilities, ServiceConnector } from "./types.js";
import type {
  ArticlePatch,
  ArticlePayload,
  RemoteArticle,
} from "../types/index.js";

const DEFAULT_BASE_URL = "https://dev.to/api";
const PAGE_SIZE = 1000;

// ============================================================================
// API Schemas
// ============================================================================

const NullableString = Type.Optional(Type.Union([Type.String(), Type.Null()]));
const TagList = Type.Optional(
  Type.Union([Type.Array(Type.String()), Type.String()])
);

export const DevToArticleSchema = Type.Object({
  id: Type.Number(),
  title: Type.String(),
  body_markdown: NullableString,
  // /me endpoints return an array, /articles/{id} a comma-separated string
  tag_list: TagList,
  tags: TagList,
  published: Type.Optional(Type.Boolean()),
  published_at: NullableString,
  published_timestamp: NullableString,
  created_at: NullableString,
  edited_at: NullableString,
  cover_image: NullableString,
  url: NullableString,
});

export type DevToArticle = Static<typeof DevToArticleSchema>;

const DevToArticleListSchema = Type.Array(DevToArticleSchema);

export interface DevToConnectorOptions {
  apiKey: string;
  rateLimitMs: number;
  baseUrl?: string;
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}

function splitTags(value: string[] | string | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  const tags = typeof value === "string" ? value.split(",") : value;
  return tags.map((tag) => tag.trim()).filter((tag) => tag !== "");
}

// Listings serve covers through the image CDN, e.g.
// https://media2.dev.to/dynamic/image/width=1000,height=420,fit=cover/https%3A%2F%2F...
const CDN_COVER_PATTERN = /^https:\/\/[^/]+\/dynamic\/image\/[^/]+\/(.+)$/;

/**
 * The cover URL as it was submitted, unwrapped from the CDN proxy URL
 */
export function originalCoverUrl(url: string): string {
  const wrapped = CDN_COVER_PATTERN.exec(url)?.[1];
  if (wrapped === undefined) {
    return url;
  }
  try {
    return decodeURIComponent(wrapped);
  } catch (error) {
    connectorLogger.debug(
      { url, error: error instanceof Error ? error.message : String(error) },
      "Cover URL is not percent-encoded, keeping it as listed"
    );
    return url;
  }
}

export function toRemoteArticle(article: DevToArticle): RemoteArticle {
  const tagSource = Array.isArray(article.tag_list)
    ? article.tag_list
    : (article.tags ?? article.tag_list);

  const remote: RemoteArticle = {
    service: "devto",
    id: String(article.id),
    title: article.title,
    body: article.body_markdown ?? "",
    tags: splitTags(tagSource),
    published:
      article.published ??
      (article.published_at !== undefined && article.published_at !== null),
    coverUrl: originalCoverUrl(article.cover_image ?? ""),
    createdAt:
      article.created_at ??
      article.published_timestamp ??
      article.published_at ??
      "",
  };
  if (article.edited_at !== undefined && article.edited_at !== null) {
    remote.updatedAt = article.edited_at;
  }
  if (article.url !== undefined && article.url !== null) {
    remote.url = article.url;
  }
  return remote;
}

/**
 * Map our field names onto dev.to's article attributes
 */
export function toDevToArticle(
  patch: ArticlePatch,
  published: boolean
): Record<string, unknown> {
  const article: Record<string, unknown> = { published };

  if (patch.title !== undefined) article.title = patch.title;
  if (patch.body !== undefined) article.body_markdown = patch.body;
  if (patch.tags !== undefined) article.tags = patch.tags;
  if (patch.coverUrl !== undefined) article.main_image = patch.coverUrl;
  if (patch.canonicalUrl !== undefined) {
    article.canonical_url = patch.canonicalUrl;
  }
  if (patch.subtitle !== undefined) article.description = patch.subtitle;
  if (patch.seriesName !== undefined) article.series = patch.seriesName;

  return article;
}

// ============================================================================
// Connector
// ============================================================================

export class DevToConnector implements ServiceConnector {
  readonly kind = "devto" as const;
  readonly capabilities: ServiceCapabilities = { drafts: true };

  private baseUrl: string;
  private fetchFn: FetchFn;
  private limiter: RateLimiter;

  constructor(private options: DevToConnectorOptions) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.fetchFn = options.fetch ?? fetch;
    this.limiter = new RateLimiter(options.rateLimitMs, options.sleep);
  }

  private request(
    path: string,
    method: "GET" | "POST" | "PUT" | "DELETE" = "GET",
    body?: unknown
  ): Promise<unknown> {
    return requestJson(this.fetchFn, this.limiter, {
      service: this.kind,
      url: `${this.baseUrl}${path}`,
      method,
      headers: {
        "api-key": this.options.apiKey,
        Accept: "application/vnd.forem.api-v1+json",
      },
      body,
    });
  }

  private parseArticle(data: unknown, operation: string): RemoteArticle {
    if (!Value.Check(DevToArticleSchema, data)) {
      throw new UnknownError(`Unexpected dev.to response for ${operation}`);
    }
    return toRemoteArticle(data);
  }

  async listArticles(): Promise<RemoteArticle[]> {
    const articles: RemoteArticle[] = [];

    for (let page = 1; ; page++) {
      const data = await this.request(
        `/articles/me/all?page=${String(page)}&per_page=${String(PAGE_SIZE)}`
      );
      if (!Value.Check(DevToArticleListSchema, data)) {
        throw new UnknownError("Unexpected dev.to response for listArticles");
      }

      articles.push(...data.map(toRemoteArticle));
      if (data.length < PAGE_SIZE) break;
    }

    connectorLogger.debug(
      { service: this.kind, articleCount: articles.length },
      "Listed articles"
    );
    return articles;
  }

  async getArticle(id: string): Promise<RemoteArticle | null> {
    try {
      const data = await this.request(`/articles/${encodeURIComponent(id)}`);
      return this.parseArticle(data, "getArticle");
    } catch (error) {
      if (error instanceof NotFoundError) {
        return null;
      }
      throw error;
    }
  }

  async createArticle(
    payload: ArticlePayload,
    published: boolean
  ): Promise<RemoteArticle> {
    const data = await this.request("/articles", "POST", {
      article: toDevToArticle(payload, published),
    });
    const created = this.parseArticle(data, "createArticle");

    connectorLogger.info(
      { service: this.kind, id: created.id, title: payload.title },
      "Article created"
    );
    return created.body === "" ? { ...created, body: payload.body } : created;
  }

  async updateArticle(
    id: string,
    patch: ArticlePatch,
    published: boolean
  ): Promise<RemoteArticle> {
    const data = await this.request(
      `/articles/${encodeURIComponent(id)}`,
      "PUT",
      { article: toDevToArticle(patch, published) }
    );
    const updated = this.parseArticle(data, "updateArticle");

    connectorLogger.info(
      { service: this.kind, id, fields: Object.keys(patch) },
      "Article updated"
    );
    return updated;
  }

  async deleteArticle(id: string): Promise<void> {
    await this.request(`/articles/${encodeURIComponent(id)}`, "DELETE");
    connectorLogger.info({ service: this.kind, id }, "Article deleted");
  }
}
