import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import {
  ChunkedPlan,
  LearningPack,
  Notion,
  Quiz,
  SourceDocument,
  VerificationOutcome
} from "../../domain/models.js";
import { slugify } from "../../utils/text.js";

const PACK_ID_PREFIX = "pack-";

export interface PackContents {
  document: SourceDocument;
  chunked: ChunkedPlan;
  notions: Notion[];
  quiz: Quiz;
  exercises: VerificationOutcome[];
  cancelled: boolean;
}

export class LearningPackStore {
  constructor(private readonly outputDirectory: string) {}

  assemblePack(contents: PackContents): LearningPack {
    return {
      id: `${PACK_ID_PREFIX}${packSlug(contents.document)}`,
      title: contents.document.title,
      sourceDocumentId: contents.document.id,
      createdAt: new Date().toISOString(),
      cancelled: contents.cancelled,
      chunks: contents.chunked.chunks.map((chunk) => ({
        id: chunk.id,
        tokenWeight: chunk.tokenWeight,
        sourceRefs: [...chunk.sourceRefs]
      })),
      notions: contents.notions,
      quiz: contents.quiz,
      exercises: contents.exercises
    };
  }

  async persistPack(pack: LearningPack): Promise<string> {
    const packsDirectory = path.join(this.outputDirectory, "packs");
    await mkdir(packsDirectory, { recursive: true });

    const filePath = path.join(packsDirectory, `${pack.id.slice(PACK_ID_PREFIX.length)}.json`);
    await writeFile(filePath, JSON.stringify(pack, null, 2), "utf8");

    return filePath;
  }
}

/** Slug of the source file name, extension included, so same-named documents of different types get separate packs. */
export function packSlug(document: SourceDocument): string {
  return slugify(path.basename(document.filePath)) || "pack";
}
