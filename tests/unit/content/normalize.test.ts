import { describe, it, expect } from "vitest";

import {
  computeFingerprint,
  normalizeForComparison,
} from "../../../src/content/normalize.js";

const input = {
  title: "Post A",
  body: "# Heading\n\nText",
  tags: ["b", "a"],
  draft: false,
  coverUrl: "",
};

describe("content/normalize", () => {
  describe("normalizeForComparison", () => {
    it("should drop a leading frontmatter block", () => {
      expect(normalizeForComparison("---\ntitle: x\n---\nHello   world\n")).toBe(
        "Hello world"
      );
    });

    it("should drop the injected table of contents", () => {
      const body = [
        "<!-- toc -->",
        "## Table of Contents",
        "",
        "- [Intro](#intro)",
        "<!-- /toc -->",
        "",
        "# Intro",
      ].join("\n");

      expect(normalizeForComparison(body)).toBe("# Intro");
    });

    it("should drop alignment attributes", () => {
      expect(normalizeForComparison('<p align="center">Hi</p>')).toBe(
        "<p>Hi</p>"
      );
    });

    it("should keep a horizontal rule that is not at the start", () => {
      expect(normalizeForComparison("Intro\n\n---\n\nMore")).toBe(
        "Intro --- More"
      );
    });
  });

  describe("computeFingerprint", () => {
    it("should be a stable sha256 hex digest", () => {
      const first = computeFingerprint(input);

      expect(first).toMatch(/^[0-9a-f]{64}$/);
      expect(computeFingerprint({ ...input })).toBe(first);
    });

    it("should ignore tag order, duplicates and whitespace", () => {
      expect(
        computeFingerprint({
          ...input,
          tags: ["a", "b", "a"],
          body: "# Heading\n\n\nText  ",
        })
      ).toBe(computeFingerprint(input));
    });

    it("should change with the draft flag, title or cover", () => {
      const base = computeFingerprint(input);

      expect(computeFingerprint({ ...input, draft: true })).not.toBe(base);
      expect(computeFingerprint({ ...input, title: "Post B" })).not.toBe(base);
      expect(computeFingerprint({ ...input, coverUrl: "x.png" })).not.toBe(
        base
      );
    });
  });
});
