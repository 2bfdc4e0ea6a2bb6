import { beforeEach, describe, expect, it, vi } from "vitest";

import { EmptyDocumentError, InvalidPolicyParamsError } from "../../domain/errors.js";
import { SourceDocument } from "../../domain/models.js";
import { WhitespaceTokenizer } from "../../testing/fakes.js";
import { Chunker } from "./chunker.js";

function makeDocument(texts: string[]): SourceDocument {
  return {
    id: "document-test",
    title: "test",
    filePath: "test.txt",
    importedAt: "2024-01-01T00:00:00.000Z",
    units: texts.map((text, position) => ({ index: position + 1, text }))
  };
}

describe("Chunker", () => {
  let chunker: Chunker;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    chunker = new Chunker(new WhitespaceTokenizer());
  });

  describe("unit policy", () => {
    it("creates one chunk per unit, in order, weighed by tokens", () => {
      const chunks = chunker.chunk(makeDocument(["one two three", "four", "five six"]), { kind: "unit" });

      expect(chunks.map((chunk) => chunk.id)).toEqual([0, 1, 2]);
      expect(chunks.map((chunk) => chunk.tokenWeight)).toEqual([3, 1, 2]);
      expect(chunks.map((chunk) => chunk.sourceRefs)).toEqual([[1], [2], [3]]);
      expect(chunks[1]?.text).toBe("four");
    });

    it("keeps blank units as zero-weight chunks", () => {
      const chunks = chunker.chunk(makeDocument(["alpha beta", "   ", "gamma"]), { kind: "unit" });

      expect(chunks).toHaveLength(3);
      expect(chunks[1]).toEqual({ id: 1, text: "", tokenWeight: 0, sourceRefs: [2] });
    });

    it("keeps the original unit index in source refs", () => {
      const document = makeDocument(["alpha"]);
      document.units = [
        { index: 3, text: "alpha" },
        { index: 7, text: "beta" }
      ];

      const chunks = chunker.chunk(document, { kind: "unit" });

      expect(chunks.map((chunk) => chunk.sourceRefs)).toEqual([[3], [7]]);
    });
  });

  describe("window policy", () => {
    // Token stream: [begin-unit:1] a b c [end-unit:1] [begin-unit:2] d e f g [end-unit:2]
    const document = makeDocument(["a b c", "d e f g"]);

    it("cuts overlapping windows that advance by size minus overlap", () => {
      const chunks = chunker.chunk(document, { kind: "window", windowSizeTokens: 6, overlapTokens: 2 });

      expect(chunks.map((chunk) => chunk.tokenWeight)).toEqual([6, 6, 3]);
      expect(chunks.map((chunk) => chunk.text)).toEqual([
        "[begin-unit:1] a b c [end-unit:1] [begin-unit:2]",
        "[end-unit:1] [begin-unit:2] d e f g",
        "f g [end-unit:2]"
      ]);
    });

    it("records the units and boundary markers each window touches", () => {
      const chunks = chunker.chunk(document, { kind: "window", windowSizeTokens: 6, overlapTokens: 2 });

      expect(chunks.map((chunk) => chunk.sourceRefs)).toEqual([[1, 2], [1, 2], [2]]);
      expect(chunks[0]?.boundaryMarkers).toEqual([
        { unitIndex: 1, kind: "begin" },
        { unitIndex: 1, kind: "end" },
        { unitIndex: 2, kind: "begin" }
      ]);
      expect(chunks[2]?.boundaryMarkers).toEqual([{ unitIndex: 2, kind: "end" }]);
    });

    it("emits a single window when the document fits", () => {
      const chunks = chunker.chunk(document, { kind: "window", windowSizeTokens: 50, overlapTokens: 10 });

      expect(chunks).toHaveLength(1);
      expect(chunks[0]?.tokenWeight).toBe(11);
      expect(chunks[0]?.sourceRefs).toEqual([1, 2]);
    });

    it("covers every token without overlap when overlap is zero", () => {
      const chunks = chunker.chunk(document, { kind: "window", windowSizeTokens: 4, overlapTokens: 0 });

      expect(chunks.map((chunk) => chunk.tokenWeight)).toEqual([4, 4, 3]);
      expect(chunks.reduce((total, chunk) => total + chunk.tokenWeight, 0)).toBe(11);
    });

    it.each([
      [0, 0],
      [10, -1],
      [10, 10],
      [10, 12],
      [2.5, 0]
    ])("rejects window %s with overlap %s", (windowSizeTokens, overlapTokens) => {
      expect(() => chunker.chunk(document, { kind: "window", windowSizeTokens, overlapTokens })).toThrow(
        InvalidPolicyParamsError
      );
    });
  });

  it("rejects documents without text", () => {
    expect(() => chunker.chunk(makeDocument([]), { kind: "unit" })).toThrow(EmptyDocumentError);
    expect(() => chunker.chunk(makeDocument(["  ", "\n"]), { kind: "unit" })).toThrow(EmptyDocumentError);
  });

  it("validates the window policy before looking at the document", () => {
    expect(() =>
      chunker.chunk(makeDocument([]), { kind: "window", windowSizeTokens: 5, overlapTokens: 5 })
    ).toThrow(InvalidPolicyParamsError);
  });
});
