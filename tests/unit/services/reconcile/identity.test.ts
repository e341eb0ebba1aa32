import { describe, it, expect, vi } from "vitest";

import {
  AuthError,
  PermissionError,
  RateLimitError,
} from "../../../../src/errors.js";
import {
  loadSnapshot,
  resolve,
} from "../../../../src/services/reconcile/identity.js";
import { remoteArticle } from "../../../fixtures/documents.js";
import { InMemoryConnector } from "../../../mocks/connector.js";

const retry = {
  maxAttempts: 2,
  baseDelayMs: 10,
  maxDelayMs: 1000,
  backoffMultiplier: 2,
  rateLimitDelayMs: 100,
  sleep: () => Promise.resolve(),
};

describe("services/reconcile/identity", () => {
  describe("resolve", () => {
    it("should return an empty match when no title matches", () => {
      expect(resolve("Missing", [remoteArticle()])).toEqual({});
    });

    it("should match titles exactly and case-sensitively", () => {
      const articles = [
        remoteArticle({ id: "1", title: "post a" }),
        remoteArticle({ id: "2", title: "Post A" }),
      ];

      expect(resolve("Post A", articles).remoteId).toBe("2");
    });

    it("should prefer the most recently created duplicate", () => {
      const newest = remoteArticle({
        id: "2",
        title: "Post A",
        published: false,
        createdAt: "2024-05-01T00:00:00Z",
      });
      const articles = [
        remoteArticle({ id: "1", title: "Post A", createdAt: "2024-01-01T00:00:00Z" }),
        newest,
        remoteArticle({ id: "3", title: "Post A", createdAt: "2024-03-01T00:00:00Z" }),
      ];

      expect(resolve("Post A", articles)).toEqual({
        remoteId: "2",
        published: false,
        article: newest,
      });
    });

    it("should keep the earlier listing entry on equal timestamps", () => {
      const articles = [
        remoteArticle({ id: "1", title: "Post A", createdAt: "2024-01-01T00:00:00Z" }),
        remoteArticle({ id: "2", title: "Post A", createdAt: "2024-01-01T00:00:00Z" }),
      ];

      expect(resolve("Post A", articles).remoteId).toBe("1");
    });

    it("should rank unparseable timestamps as oldest", () => {
      const articles = [
        remoteArticle({ id: "1", title: "Post A", createdAt: "" }),
        remoteArticle({ id: "2", title: "Post A", createdAt: "2020-01-01T00:00:00Z" }),
      ];

      expect(resolve("Post A", articles).remoteId).toBe("2");
    });
  });

  describe("loadSnapshot", () => {
    it("should return the full listing", async () => {
      const connector = new InMemoryConnector("devto", {
        articles: [remoteArticle({ id: "1" }), remoteArticle({ id: "2" })],
      });

      const snapshot = await loadSnapshot(connector, retry);

      expect(snapshot.status).toBe("ok");
      expect(snapshot.articles.map((a) => a.id)).toEqual(["1", "2"]);
    });

    it("should retry a rate-limited listing", async () => {
      const connector = new InMemoryConnector("devto", {
        articles: [remoteArticle()],
      }).failWith("listArticles", new RateLimitError("HTTP 429"), { times: 1 });
      const onRetry = vi.fn();

      const snapshot = await loadSnapshot(connector, { ...retry, onRetry });

      expect(snapshot.status).toBe("ok");
      expect(onRetry).toHaveBeenCalledTimes(1);
      expect(connector.calls).toHaveLength(2);
    });

    it("should degrade to an empty snapshot after retries run out", async () => {
      const connector = new InMemoryConnector("devto", {
        articles: [remoteArticle()],
      }).failWith("listArticles", new RateLimitError("HTTP 429"));

      const snapshot = await loadSnapshot(connector, retry);

      expect(snapshot.status).toBe("degraded");
      expect(snapshot.articles).toEqual([]);
      expect(snapshot.error).toBeInstanceOf(RateLimitError);
    });

    it("should mark the service unavailable on an authentication failure", async () => {
      const connector = new InMemoryConnector("hashnode").failWith(
        "listArticles",
        new AuthError("HTTP 401")
      );

      const snapshot = await loadSnapshot(connector, retry);

      expect(snapshot.status).toBe("unavailable");
      expect(snapshot.error?.category).toBe("auth");
      expect(connector.calls).toHaveLength(1);
    });

    it("should mark the service unavailable on other failures", async () => {
      const connector = new InMemoryConnector("hashnode").failWith(
        "listArticles",
        new PermissionError("HTTP 403")
      );

      const snapshot = await loadSnapshot(connector, retry);

      expect(snapshot.status).toBe("unavailable");
      expect(snapshot.error?.category).toBe("permission");
    });
  });
});
