import { describe, it, expect } from "vitest";

import {
  DevToConnector,
  originalCoverUrl,
  toRemoteArticle,
} from "../../../src/connectors/devto.js";
import {
  AuthError,
  PermissionError,
  RateLimitError,
  TransientNetworkError,
  UnknownError,
} from "../../../src/errors.js";
import {
  createFetchMock,
  jsonResponse,
  sentRequest,
  textResponse,
} from "../../mocks/fetch.js";

import type { ArticlePayload } from "../../../src/types/index.js";

function createConnector(fetchMock: ReturnType<typeof createFetchMock>) {
  return new DevToConnector({
    apiKey: "test-secret",
    rateLimitMs: 0,
    fetch: fetchMock,
  });
}

const listedArticle = {
  id: 7,
  title: "Post A",
  body_markdown: "# Hello",
  tag_list: ["typescript", "node"],
  published: true,
  published_at: "2024-02-02T08:00:00Z",
  published_timestamp: "2024-02-02T08:00:00Z",
  cover_image: null,
  url: "https://dev.to/someone/post-a",
};

const payload: ArticlePayload = {
  title: "Post A",
  subtitle: "",
  slug: "post-a",
  body: "# Hello",
  tags: ["typescript", "node"],
  coverUrl: "https://images.example.com/a.png",
  canonicalUrl: "https://blog.example.com/post-a",
};

describe("connectors/devto", () => {
  describe("toRemoteArticle", () => {
    it("should map a listed article", () => {
      expect(toRemoteArticle(listedArticle)).toEqual({
        service: "devto",
        id: "7",
        title: "Post A",
        body: "# Hello",
        tags: ["typescript", "node"],
        published: true,
        coverUrl: "",
        createdAt: "2024-02-02T08:00:00Z",
        url: "https://dev.to/someone/post-a",
      });
    });

    it("should read tags from the array when tag_list is a string", () => {
      const article = toRemoteArticle({
        id: 8,
        title: "Draft",
        tag_list: "typescript, node",
        tags: ["typescript", "node"],
        published_at: null,
        created_at: "2024-01-01T00:00:00Z",
      });

      expect(article.tags).toEqual(["typescript", "node"]);
      expect(article.published).toBe(false);
      expect(article.createdAt).toBe("2024-01-01T00:00:00Z");
    });
  });

  describe("originalCoverUrl", () => {
    it("should unwrap an encoded CDN cover", () => {
      expect(
        originalCoverUrl(
          "https://media2.dev.to/dynamic/image/width=1000,height=420,fit=cover,gravity=auto,format=auto/https%3A%2F%2Fimages.example.com%2Fa.png"
        )
      ).toBe("https://images.example.com/a.png");
    });

    it("should unwrap a CDN cover that is not encoded", () => {
      expect(
        originalCoverUrl(
          "https://media2.dev.to/dynamic/image/width=1000/https://images.example.com/a.png"
        )
      ).toBe("https://images.example.com/a.png");
    });

    it("should keep other URLs as they are", () => {
      expect(originalCoverUrl("https://images.example.com/a.png")).toBe(
        "https://images.example.com/a.png"
      );
      expect(originalCoverUrl("")).toBe("");
    });

    it("should let a listed CDN cover compare equal to the submitted one", () => {
      const article = toRemoteArticle({
        ...listedArticle,
        cover_image:
          "https://media2.dev.to/dynamic/image/width=1000,height=420/https%3A%2F%2Fimages.example.com%2Fa.png",
      });

      expect(article.coverUrl).toBe(payload.coverUrl);
    });
  });

  describe("listArticles", () => {
    it("should page until a short page", async () => {
      const fullPage = Array.from({ length: 1000 }, (_, i) => ({
        ...listedArticle,
        id: i + 1,
      }));
      const fetchMock = createFetchMock(
        jsonResponse(fullPage),
        jsonResponse([{ ...listedArticle, id: 5000 }])
      );

      const articles = await createConnector(fetchMock).listArticles();

      expect(articles).toHaveLength(1001);
      expect(sentRequest(fetchMock, 0).url).toBe(
        "https://dev.to/api/articles/me/all?page=1&per_page=1000"
      );
      expect(sentRequest(fetchMock, 1).url).toBe(
        "https://dev.to/api/articles/me/all?page=2&per_page=1000"
      );
      expect(sentRequest(fetchMock).headers.get("api-key")).toBe("test-secret");
    });

    it("should reject an unexpected response shape", async () => {
      const fetchMock = createFetchMock(jsonResponse({ error: "nope" }));

      await expect(createConnector(fetchMock).listArticles()).rejects.toBeInstanceOf(
        UnknownError
      );
    });
  });

  describe("getArticle", () => {
    it("should return null for a missing article", async () => {
      const fetchMock = createFetchMock(jsonResponse({ error: "not found" }, 404));

      await expect(createConnector(fetchMock).getArticle("9")).resolves.toBeNull();
      expect(sentRequest(fetchMock).url).toBe("https://dev.to/api/articles/9");
    });
  });

  describe("createArticle", () => {
    it("should post the mapped article with the published flag", async () => {
      const fetchMock = createFetchMock(
        jsonResponse({ ...listedArticle, published: false }, 201)
      );

      const created = await createConnector(fetchMock).createArticle(
        payload,
        false
      );

      expect(created.id).toBe("7");
      const request = sentRequest(fetchMock);
      expect(request.method).toBe("POST");
      expect(request.url).toBe("https://dev.to/api/articles");
      expect(request.body).toEqual({
        article: {
          published: false,
          title: "Post A",
          body_markdown: "# Hello",
          tags: ["typescript", "node"],
          main_image: "https://images.example.com/a.png",
          canonical_url: "https://blog.example.com/post-a",
          description: "",
        },
      });
    });
  });

  describe("updateArticle", () => {
    it("should send only the patched fields", async () => {
      const fetchMock = createFetchMock(jsonResponse(listedArticle));

      await createConnector(fetchMock).updateArticle(
        "7",
        { tags: ["rust"] },
        true
      );

      const request = sentRequest(fetchMock);
      expect(request.method).toBe("PUT");
      expect(request.url).toBe("https://dev.to/api/articles/7");
      expect(request.body).toEqual({ article: { published: true, tags: ["rust"] } });
    });
  });

  describe("deleteArticle", () => {
    it("should accept an empty response", async () => {
      const fetchMock = createFetchMock(textResponse("", 204));

      await expect(createConnector(fetchMock).deleteArticle("7")).resolves.toBeUndefined();
      expect(sentRequest(fetchMock).method).toBe("DELETE");
    });

    it("should surface a refused deletion as a permission error", async () => {
      const fetchMock = createFetchMock(textResponse("forbidden", 403));

      await expect(createConnector(fetchMock).deleteArticle("7")).rejects.toBeInstanceOf(
        PermissionError
      );
    });
  });

  describe("error mapping", () => {
    it("should map 401 to an authentication error", async () => {
      const fetchMock = createFetchMock(textResponse("unauthorized", 401));

      await expect(createConnector(fetchMock).listArticles()).rejects.toBeInstanceOf(
        AuthError
      );
    });

    it("should read Retry-After on 429", async () => {
      const fetchMock = createFetchMock(
        jsonResponse({ error: "rate limit" }, 429, { "Retry-After": "3" })
      );

      const error: unknown = await createConnector(fetchMock)
        .listArticles()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error instanceof RateLimitError && error.retryAfterMs).toBe(3000);
    });

    it("should map network failures to transient errors", async () => {
      const fetchMock = createFetchMock();
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

      await expect(createConnector(fetchMock).listArticles()).rejects.toBeInstanceOf(
        TransientNetworkError
      );
    });

    it("should reject a body that is not JSON", async () => {
      const fetchMock = createFetchMock(textResponse("<html>oops</html>", 200));

      await expect(createConnector(fetchMock).listArticles()).rejects.toThrow(
        "Invalid JSON response from devto: <html>oops</html>"
      );
    });
  });
});
