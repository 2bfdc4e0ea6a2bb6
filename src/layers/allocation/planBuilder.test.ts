import { beforeEach, describe, expect, it, vi } from "vitest";

import { SourceDocument } from "../../domain/models.js";
import { WhitespaceTokenizer } from "../../testing/fakes.js";
import { Chunker } from "../chunking/chunker.js";
import { Allocator } from "./allocator.js";
import { PlanBuilder } from "./planBuilder.js";

const document: SourceDocument = {
  id: "document-notes",
  title: "notes",
  filePath: "notes.txt",
  importedAt: "2024-01-01T00:00:00.000Z",
  units: [
    { index: 1, text: "one two three four five six" },
    { index: 2, text: "seven eight" }
  ]
};

describe("PlanBuilder", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  it("chunks once and allocates each set of counts over the same chunks", () => {
    const builder = new PlanBuilder(new Chunker(new WhitespaceTokenizer()), new Allocator());

    const quiz = builder.buildPlan(document, { kind: "unit" }, { easy: 4 });
    const exercises = builder.replan(quiz, { hard: 1 });

    expect(quiz.plan.easy).toEqual([
      { chunkId: 0, itemCount: 3 },
      { chunkId: 1, itemCount: 1 }
    ]);
    expect(exercises.chunks).toBe(quiz.chunks);
    expect(exercises.plan.hard).toEqual([{ chunkId: 0, itemCount: 1 }]);
  });
});
