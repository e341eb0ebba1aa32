import { describe, it, expect } from "vitest";

import { MarkdownTransformer } from "../../../../src/content/transformer.js";
import {
  evaluate,
  metadataPatch,
} from "../../../../src/services/reconcile/change-detector.js";
import { makeDocument, mirrorOf } from "../../../fixtures/documents.js";

const transformer = new MarkdownTransformer();
const drafts = { drafts: true };
const noDrafts = { drafts: false };

describe("services/reconcile/change-detector", () => {
  describe("evaluate", () => {
    it("should create when there is no match", () => {
      const doc = makeDocument();
      const payload = transformer.toPayload(doc, "devto");

      expect(evaluate(doc, payload, undefined, drafts)).toEqual({
        action: "create",
      });
    });

    it("should skip a mirror that went through the transformer", () => {
      const doc = makeDocument({
        body: '<p align="center"><img src="x.png"></p>\n\n# Title\n\nText',
      });
      const payload = transformer.toPayload(doc, "hashnode");

      expect(
        evaluate(doc, payload, mirrorOf(doc, "hashnode"), noDrafts)
      ).toEqual({ action: "skip", targetId: "hashnode-post-a" });
    });

    it("should ignore tag order", () => {
      const doc = makeDocument();
      const payload = transformer.toPayload(doc, "devto");
      const remote = mirrorOf(doc, "devto", { tags: ["testing", "typescript"] });

      expect(evaluate(doc, payload, remote, drafts).action).toBe("skip");
    });

    it("should ignore whitespace-only body differences", () => {
      const doc = makeDocument();
      const payload = transformer.toPayload(doc, "devto");
      const remote = mirrorOf(doc, "devto", {
        body: `  ${doc.body.replace(/\n\n/g, "\n\n\n")}  `,
      });

      expect(evaluate(doc, payload, remote, drafts).action).toBe("skip");
    });

    it("should update metadata only when tags and cover changed", () => {
      const doc = makeDocument();
      const payload = transformer.toPayload(doc, "devto");
      const remote = mirrorOf(doc, "devto", {
        tags: ["old"],
        coverUrl: "https://images.example.com/old.png",
      });

      expect(evaluate(doc, payload, remote, drafts)).toEqual({
        action: "update",
        mode: "metadata",
        targetId: "devto-post-a",
        changedFields: ["tags", "cover"],
      });
    });

    it("should fully update when the body changed", () => {
      const doc = makeDocument({ body: "# Fresh\n\nNew words." });
      const payload = transformer.toPayload(doc, "devto");
      const remote = mirrorOf(makeDocument(), "devto");

      expect(evaluate(doc, payload, remote, drafts)).toEqual({
        action: "update",
        mode: "full",
        targetId: "devto-post-a",
        changedFields: ["body"],
      });
    });

    it("should fully update when body and tags changed together", () => {
      const doc = makeDocument({ body: "Other", tags: ["rust"] });
      const payload = transformer.toPayload(doc, "devto");
      const remote = mirrorOf(makeDocument(), "devto");

      const decision = evaluate(doc, payload, remote, drafts);

      expect(decision).toEqual({
        action: "update",
        mode: "full",
        targetId: "devto-post-a",
        changedFields: ["tags", "body"],
      });
    });

    it("should compare the published flag only where drafts exist", () => {
      const doc = makeDocument({ draft: true });
      const remote = mirrorOf(makeDocument(), "devto");
      const payload = transformer.toPayload(doc, "devto");

      expect(evaluate(doc, payload, remote, drafts)).toEqual({
        action: "update",
        mode: "full",
        targetId: "devto-post-a",
        changedFields: ["published"],
      });
      expect(evaluate(doc, payload, remote, noDrafts).action).toBe("skip");
    });

    it("should compare with a supplied normalization", () => {
      const doc = makeDocument({ body: "hello", toc: false });
      const payload = transformer.toPayload(doc, "devto");
      const remote = mirrorOf(doc, "devto", { body: "HELLO" });
      const lowercase = (body: string) => body.toLowerCase();

      expect(evaluate(doc, payload, remote, drafts, lowercase)).toEqual({
        action: "skip",
        targetId: "devto-post-a",
      });
      expect(evaluate(doc, payload, remote, drafts).action).toBe("update");
    });

    it("should read the document fingerprint when the payload keeps its values", () => {
      const original = makeDocument();
      // Fingerprint of the published version, body edited since
      const doc = {
        ...makeDocument({ body: "Edited" }),
        fingerprint: original.fingerprint,
      };
      const payload = transformer.toPayload(doc, "devto");

      expect(
        evaluate(doc, payload, mirrorOf(original, "devto"), drafts).action
      ).toBe("skip");
    });

    it("should recompute the fingerprint when tags are converted", () => {
      const original = makeDocument({ tags: ["Type Script"] });
      const doc = {
        ...makeDocument({ tags: ["Type Script"], body: "Edited" }),
        fingerprint: original.fingerprint,
      };
      const payload = transformer.toPayload(doc, "devto");

      expect(
        evaluate(doc, payload, mirrorOf(original, "devto"), drafts)
      ).toEqual({
        action: "update",
        mode: "full",
        targetId: "devto-post-a",
        changedFields: ["body"],
      });
    });
  });

  describe("metadataPatch", () => {
    it("should carry only the changed metadata fields", () => {
      const payload = transformer.toPayload(makeDocument(), "devto");

      expect(metadataPatch(payload, ["tags", "cover"])).toEqual({
        tags: ["typescript", "testing"],
        coverUrl: "https://images.example.com/cover-a.png",
      });
    });

    it("should never include the body", () => {
      const payload = transformer.toPayload(makeDocument(), "devto");

      expect(metadataPatch(payload, ["title", "body", "published"])).toEqual({
        title: "Post A",
      });
    });
  });
});
