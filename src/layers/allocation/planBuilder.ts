import { ChunkPolicy, ChunkedPlan, DifficultyCounts, SourceDocument } from "../../domain/models.js";
import { Chunker } from "../chunking/chunker.js";
import { Allocator } from "./allocator.js";

export class PlanBuilder {
  constructor(
    private readonly chunker: Chunker,
    private readonly allocator: Allocator
  ) {}

  buildPlan(document: SourceDocument, policy: ChunkPolicy, requested: DifficultyCounts): ChunkedPlan {
    const chunks = this.chunker.chunk(document, policy);
    return {
      chunks,
      plan: this.allocator.allocate(chunks, requested)
    };
  }

  /**
   * Reuses an existing chunking for a second set of counts (quiz and exercise plans share chunks).
   */
  replan(existing: ChunkedPlan, requested: DifficultyCounts): ChunkedPlan {
    return {
      chunks: existing.chunks,
      plan: this.allocator.allocate(existing.chunks, requested)
    };
  }
}
