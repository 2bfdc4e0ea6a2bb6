import { EmptyDocumentError, InvalidPolicyParamsError } from "../../domain/errors.js";
import { Chunk, ChunkPolicy, SourceDocument, UnitBoundaryMarker } from "../../domain/models.js";
import { TokenizerAdapter } from "../tokenizer/tokenizerAdapter.js";

export function beginUnitMarker(unitIndex: number): string {
  return `[begin-unit:${unitIndex}]`;
}

export function endUnitMarker(unitIndex: number): string {
  return `[end-unit:${unitIndex}]`;
}

interface TokenSpan {
  start: number;
  end: number;
}

interface UnitLayout {
  unitIndex: number;
  span: TokenSpan;
  begin: TokenSpan;
  end: TokenSpan;
}

/**
 * Splits a document into ordered chunks.
 *
 * - `unit`: one chunk per document unit (page or slide), weighed by its own token count.
 * - `window`: units are concatenated with begin/end markers around each unit, then cut
 *   into windows of `windowSizeTokens` that advance by `windowSizeTokens - overlapTokens`.
 *   Adjacent windows may share source refs; the last window may be short.
 */
export class Chunker {
  constructor(private readonly tokenizer: TokenizerAdapter) {}

  chunk(document: SourceDocument, policy: ChunkPolicy): Chunk[] {
    if (policy.kind === "window") {
      validateWindowPolicy(policy.windowSizeTokens, policy.overlapTokens);
    }

    if (document.units.length === 0 || document.units.every((unit) => unit.text.trim().length === 0)) {
      throw new EmptyDocumentError(document.id);
    }

    const chunks =
      policy.kind === "unit"
        ? this.chunkByUnit(document)
        : this.chunkByWindow(document, policy.windowSizeTokens, policy.overlapTokens);

    console.log(
      `[chunker] ${document.title}: ${document.units.length} unit(s) -> ${chunks.length} chunk(s) (${policy.kind} policy)`
    );

    return chunks;
  }

  private chunkByUnit(document: SourceDocument): Chunk[] {
    return document.units.map((unit, ordinal) => {
      const text = unit.text.trim();
      return {
        id: ordinal,
        text,
        tokenWeight: text.length > 0 ? this.tokenizer.countTokens(text) : 0,
        sourceRefs: [unit.index]
      };
    });
  }

  private chunkByWindow(document: SourceDocument, windowSize: number, overlap: number): Chunk[] {
    const tokens: number[] = [];
    const layouts: UnitLayout[] = [];

    const append = (piece: string): TokenSpan => {
      const start = tokens.length;
      for (const token of this.tokenizer.encode(piece)) {
        tokens.push(token);
      }
      return { start, end: tokens.length };
    };

    document.units.forEach((unit, position) => {
      if (position > 0) {
        append("\n\n");
      }
      const begin = append(beginUnitMarker(unit.index));
      append(`\n${unit.text.trim()}\n`);
      const end = append(endUnitMarker(unit.index));
      layouts.push({ unitIndex: unit.index, span: { start: begin.start, end: end.end }, begin, end });
    });

    const step = windowSize - overlap;
    const chunks: Chunk[] = [];

    for (let start = 0; start < tokens.length; start += step) {
      const window: TokenSpan = { start, end: Math.min(start + windowSize, tokens.length) };
      const windowTokens = tokens.slice(window.start, window.end);

      chunks.push({
        id: chunks.length,
        text: this.tokenizer.decode(windowTokens).trim(),
        tokenWeight: windowTokens.length,
        sourceRefs: layouts.filter((layout) => overlaps(layout.span, window)).map((layout) => layout.unitIndex),
        boundaryMarkers: collectMarkers(layouts, window)
      });

      if (window.end >= tokens.length) {
        break;
      }
    }

    return chunks;
  }
}

function validateWindowPolicy(windowSize: number, overlap: number): void {
  if (!Number.isInteger(windowSize) || windowSize <= 0) {
    throw new InvalidPolicyParamsError(`windowSizeTokens must be a positive integer. Received: ${windowSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidPolicyParamsError(`overlapTokens must be a non-negative integer. Received: ${overlap}`);
  }
  if (overlap >= windowSize) {
    throw new InvalidPolicyParamsError(
      `overlapTokens (${overlap}) must be lower than windowSizeTokens (${windowSize}).`
    );
  }
}

function overlaps(left: TokenSpan, right: TokenSpan): boolean {
  return Math.max(left.start, right.start) < Math.min(left.end, right.end);
}

function collectMarkers(layouts: UnitLayout[], window: TokenSpan): UnitBoundaryMarker[] {
  const markers: UnitBoundaryMarker[] = [];

  for (const layout of layouts) {
    if (overlaps(layout.begin, window)) {
      markers.push({ unitIndex: layout.unitIndex, kind: "begin" });
    }
    if (overlaps(layout.end, window)) {
      markers.push({ unitIndex: layout.unitIndex, kind: "end" });
    }
  }

  return markers;
}
