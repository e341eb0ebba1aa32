/**
 * Hashnode GraphQL connector
 *
 * Hashnode answers GraphQL failures with HTTP 200 and an `errors` array, so
 * those are mapped onto the connector taxonomy here rather than in http.ts.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import {
  AuthError,
  NotFoundError,
  PermissionError,
  RateLimitError,
  UnknownError,
  type ConnectorError,
} from "../errors.js";
import { connectorLogger } from "../logger.js";
import { RateLimiter, requestJson, type FetchFn } from "./http.js";

import type { ServiceCapabilities, ServiceConnector } from "./types.js";
import type {
  ArticlePatch,
  ArticlePayload,
  RemoteArticle,
} from "../types/index.js";

const DEFAULT_API_URL = "https://gql.hashnode.com";
const PAGE_SIZE = 20;

// ============================================================================
// GraphQL Documents
// ============================================================================

const POST_FIELDS = `
  id
  title
  url
  publishedAt
  updatedAt
  content { markdown }
  coverImage { url }
  tags { name slug }
  publication { id }
`;

const LIST_POSTS_QUERY = `
  query ListPosts($username: String!, $page: Int!, $pageSize: Int!) {
    user(username: $username) {
      posts(page: $page, pageSize: $pageSize) {
        nodes { ${POST_FIELDS} }
        pageInfo { hasNextPage }
      }
    }
  }
`;

const GET_POST_QUERY = `
  query GetPost($id: ID!) {
    post(id: $id) { ${POST_FIELDS} }
  }
`;

const PUBLISH_POST_MUTATION = `
  mutation PublishPost($input: PublishPostInput!) {
    publishPost(input: $input) { post { ${POST_FIELDS} } }
  }
`;

const UPDATE_POST_MUTATION = `
  mutation UpdatePost($input: UpdatePostInput!) {
    updatePost(input: $input) { post { ${POST_FIELDS} } }
  }
`;

const REMOVE_POST_MUTATION = `
  mutation RemovePost($input: RemovePostInput!) {
    removePost(input: $input) { post { id } }
  }
`;

// ============================================================================
// API Schemas
// ============================================================================

const NullableString = Type.Optional(Type.Union([Type.String(), Type.Null()]));

export const HashnodePostSchema = Type.Object({
  id: Type.String(),
  title: Type.String(),
  url: NullableString,
  publishedAt: NullableString,
  updatedAt: NullableString,
  content: Type.Optional(
    Type.Union([Type.Object({ markdown: NullableString }), Type.Null()])
  ),
  coverImage: Type.Optional(
    Type.Union([Type.Object({ url: NullableString }), Type.Null()])
  ),
  tags: Type.Optional(
    Type.Union([
      Type.Array(Type.Object({ name: Type.String(), slug: Type.String() })),
      Type.Null(),
    ])
  ),
  publication: Type.Optional(
    Type.Union([Type.Object({ id: Type.String() }), Type.Null()])
  ),
});

export type HashnodePost = Static<typeof HashnodePostSchema>;

const GraphQLResponseSchema = Type.Object({
  data: Type.Optional(Type.Unknown()),
  errors: Type.Optional(
    Type.Array(
      Type.Object({
        message: Type.String(),
        extensions: Type.Optional(
          Type.Object({ code: Type.Optional(Type.String()) })
        ),
      })
    )
  ),
});

type GraphQLErrorItem = NonNullable<
  Static<typeof GraphQLResponseSchema>["errors"]
>[number];

const ListPostsDataSchema = Type.Object({
  user: Type.Union([
    Type.Object({
      posts: Type.Object({
        nodes: Type.Array(HashnodePostSchema),
        pageInfo: Type.Object({ hasNextPage: Type.Boolean() }),
      }),
    }),
    Type.Null(),
  ]),
});

const GetPostDataSchema = Type.Object({
  post: Type.Union([HashnodePostSchema, Type.Null()]),
});

const PostPayloadSchema = Type.Object({
  post: Type.Union([HashnodePostSchema, Type.Null()]),
});

const PublishPostDataSchema = Type.Object({ publishPost: PostPayloadSchema });
const UpdatePostDataSchema = Type.Object({ updatePost: PostPayloadSchema });
const RemovePostDataSchema = Type.Object({
  removePost: Type.Object({
    post: Type.Union([Type.Object({ id: Type.String() }), Type.Null()]),
  }),
});

// ============================================================================
// Mapping
// ============================================================================

export interface HashnodeConnectorOptions {
  apiKey: string;
  username: string;
  publicationId: string;
  rateLimitMs: number;
  apiUrl?: string;
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Translate a GraphQL `errors` array into the connector taxonomy
 */
export function graphQLError(errors: GraphQLErrorItem[]): ConnectorError {
  const message = errors.map((e) => e.message).join("; ");
  const codes = errors.map((e) => e.extensions?.code ?? "");

  if (codes.includes("UNAUTHENTICATED")) {
    return new AuthError(message);
  }
  if (
    codes.includes("FORBIDDEN") ||
    /minimum required role/i.test(message)
  ) {
    return new PermissionError(message);
  }
  if (codes.includes("NOT_FOUND") || /not found/i.test(message)) {
    return new NotFoundError(message);
  }
  if (codes.includes("TOO_MANY_REQUESTS") || /rate limit/i.test(message)) {
    return new RateLimitError(message);
  }
  return new UnknownError(message);
}

export function toRemoteArticle(post: HashnodePost): RemoteArticle {
  const remote: RemoteArticle = {
    service: "hashnode",
    id: post.id,
    title: post.title,
    body: post.content?.markdown ?? "",
    tags: (post.tags ?? []).map((tag) => tag.slug),
    published: post.publishedAt !== undefined && post.publishedAt !== null,
    coverUrl: post.coverImage?.url ?? "",
    createdAt: post.publishedAt ?? "",
  };
  if (post.updatedAt !== undefined && post.updatedAt !== null) {
    remote.updatedAt = post.updatedAt;
  }
  if (post.url !== undefined && post.url !== null) {
    remote.url = post.url;
  }
  return remote;
}

/**
 * Map our field names onto Hashnode's post input
 */
export function toPostInput(patch: ArticlePatch): Record<string, unknown> {
  const input: Record<string, unknown> = {};

  if (patch.title !== undefined) input.title = patch.title;
  if (patch.body !== undefined) input.contentMarkdown = patch.body;
  if (patch.tags !== undefined) {
    input.tags = patch.tags.map((tag) => ({ name: tag, slug: tag }));
  }
  if (patch.coverUrl !== undefined) {
    input.coverImageOptions = { coverImageURL: patch.coverUrl };
  }
  if (patch.subtitle !== undefined && patch.subtitle !== "") {
    input.subtitle = patch.subtitle;
  }
  if (patch.slug !== undefined && patch.slug !== "") {
    input.slug = patch.slug;
  }
  if (patch.canonicalUrl !== undefined && patch.canonicalUrl !== "") {
    input.originalArticleURL = patch.canonicalUrl;
  }

  return input;
}

// ============================================================================
// Connector
// ============================================================================

export class HashnodeConnector implements ServiceConnector {
  readonly kind = "hashnode" as const;
  // Posts are always published; drafts never show up in the post listing
  readonly capabilities: ServiceCapabilities = { drafts: false };

  private apiUrl: string;
  private fetchFn: FetchFn;
  private limiter: RateLimiter;

  constructor(private options: HashnodeConnectorOptions) {
    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL;
    this.fetchFn = options.fetch ?? fetch;
    this.limiter = new RateLimiter(options.rateLimitMs, options.sleep);
  }

  private async graphql<T extends TSchema>(
    query: string,
    variables: Record<string, unknown>,
    schema: T,
    operation: string
  ): Promise<Static<T>> {
    const response = await requestJson(this.fetchFn, this.limiter, {
      service: this.kind,
      url: this.apiUrl,
      method: "POST",
      headers: { Authorization: this.options.apiKey },
      body: { query, variables },
    });

    if (!Value.Check(GraphQLResponseSchema, response)) {
      throw new UnknownError(`Unexpected Hashnode response for ${operation}`);
    }
    if (response.errors !== undefined && response.errors.length > 0) {
      throw graphQLError(response.errors);
    }
    if (!Value.Check(schema, response.data)) {
      throw new UnknownError(`Unexpected Hashnode data for ${operation}`);
    }
    return response.data;
  }

  private requirePost(
    post: HashnodePost | null,
    operation: string
  ): RemoteArticle {
    if (post === null) {
      throw new UnknownError(`Hashnode returned no post for ${operation}`);
    }
    return toRemoteArticle(post);
  }

  private warnIfDraft(published: boolean, operation: string): void {
    if (!published) {
      connectorLogger.warn(
        { service: this.kind, operation },
        "Hashnode drafts are not supported, publishing instead"
      );
    }
  }

  async listArticles(): Promise<RemoteArticle[]> {
    const articles: RemoteArticle[] = [];

    for (let page = 1; ; page++) {
      const data = await this.graphql(
        LIST_POSTS_QUERY,
        { username: this.options.username, page, pageSize: PAGE_SIZE },
        ListPostsDataSchema,
        "listArticles"
      );
      if (data.user === null) {
        throw new NotFoundError(
          `Hashnode user ${this.options.username} not found`
        );
      }

      const { nodes, pageInfo } = data.user.posts;
      for (const post of nodes) {
        // The user may write for other publications too
        if (post.publication?.id !== this.options.publicationId) continue;
        articles.push(toRemoteArticle(post));
      }

      if (!pageInfo.hasNextPage || nodes.length === 0) break;
    }

    connectorLogger.debug(
      { service: this.kind, articleCount: articles.length },
      "Listed articles"
    );
    return articles;
  }

  async getArticle(id: string): Promise<RemoteArticle | null> {
    const data = await this.graphql(
      GET_POST_QUERY,
      { id },
      GetPostDataSchema,
      "getArticle"
    );
    return data.post === null ? null : toRemoteArticle(data.post);
  }

  async createArticle(
    payload: ArticlePayload,
    published: boolean
  ): Promise<RemoteArticle> {
    this.warnIfDraft(published, "createArticle");

    const data = await this.graphql(
      PUBLISH_POST_MUTATION,
      {
        input: {
          ...toPostInput(payload),
          publicationId: this.options.publicationId,
        },
      },
      PublishPostDataSchema,
      "createArticle"
    );
    const created = this.requirePost(data.publishPost.post, "createArticle");

    connectorLogger.info(
      { service: this.kind, id: created.id, title: payload.title },
      "Article created"
    );
    return created;
  }

  async updateArticle(
    id: string,
    patch: ArticlePatch,
    published: boolean
  ): Promise<RemoteArticle> {
    this.warnIfDraft(published, "updateArticle");

    const data = await this.graphql(
      UPDATE_POST_MUTATION,
      { input: { ...toPostInput(patch), id } },
      UpdatePostDataSchema,
      "updateArticle"
    );
    const updated = this.requirePost(data.updatePost.post, "updateArticle");

    connectorLogger.info(
      { service: this.kind, id, fields: Object.keys(patch) },
      "Article updated"
    );
    return updated;
  }

  async deleteArticle(id: string): Promise<void> {
    const data = await this.graphql(
      REMOVE_POST_MUTATION,
      { input: { id } },
      RemovePostDataSchema,
      "deleteArticle"
    );
    if (data.removePost.post === null) {
      throw new NotFoundError(`Hashnode post ${id} not found`);
    }
    connectorLogger.info({ service: this.kind, id }, "Article deleted");
  }
}
