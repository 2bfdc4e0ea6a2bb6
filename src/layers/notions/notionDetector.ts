import { z } from "zod";

import { ModelGateway } from "../../agents/runtime/modelGateway.js";
import { AgentStageResult, StageRecorder } from "../../agents/runtime/stageResult.js";
import { Chunk, Notion } from "../../domain/models.js";
import { extractKeywords } from "../../utils/text.js";
import { TokenizerAdapter } from "../tokenizer/tokenizerAdapter.js";

const MAX_NOTIONS = 20;

const NOTION_SYSTEM_PROMPT = [
  "You are an instructional designer identifying the KEY NOTIONS of a document.",
  "Key notions are core concepts and definitions, important theorems, laws or principles,",
  "fundamental formulas and methods, and the ideas that structure the document.",
  "Identify between 5 and 20 notions depending on how rich the content is.",
  "Give each notion a concise title and a 1-3 sentence description.",
  "List the unit numbers where the notion appears, using the [Units: ...] labels.",
  "Order notions by teaching importance.",
  "Return only JSON.",
  "Output schema:",
  "{",
  '  "notions": [{ "title": string, "description": string, "sourceRefs": number[] }]',
  "}"
].join("\n");

const notionResponseSchema = z.object({
  notions: z.array(
    z.object({
      title: z.string().trim().min(1),
      description: z.string().default(""),
      sourceRefs: z.array(z.number().int()).default([])
    })
  )
});

type NotionResponse = z.infer<typeof notionResponseSchema>;

export class NotionDetector {
  constructor(
    private readonly gateway: ModelGateway,
    private readonly tokenizer: TokenizerAdapter,
    private readonly tokenBudget: number
  ) {}

  /**
   * Detection failures are not fatal: the stage then yields an empty notion list.
   */
  async detect(chunks: readonly Chunk[]): Promise<AgentStageResult<Notion[]>> {
    const recorder = new StageRecorder();
    if (chunks.length === 0) {
      return recorder.finish([]);
    }

    const response = await this.gateway.generateStructured({
      stage: "notions",
      agentName: "notion-detector",
      systemPrompt: NOTION_SYSTEM_PROMPT,
      userPrompt: this.buildUserPrompt(chunks),
      schema: notionResponseSchema,
      temperature: 0.3,
      mock: () => buildMockNotions(chunks)
    });
    recorder.record(response);

    if (!response.result.ok) {
      console.warn(
        `[notions] Detection failed (${response.result.error.kind}): ${response.result.error.message}. Continuing without notions.`
      );
      return recorder.finish([]);
    }

    const notions = response.result.value.notions.slice(0, MAX_NOTIONS).map((notion) => ({
      title: notion.title,
      description: notion.description.trim(),
      sourceRefs: notion.sourceRefs,
      enabled: true
    }));
    console.log(`[notions] Detected ${notions.length} key notion(s)`);

    return recorder.finish(notions);
  }

  private buildUserPrompt(chunks: readonly Chunk[]): string {
    const context = chunks
      .map((chunk) => `[Units: ${chunk.sourceRefs.join(", ")}]\n${chunk.text}`)
      .join("\n\n---\n\n");

    return [
      "Document content:",
      "---",
      this.truncate(context),
      "---",
      "Identify the key notions of this document."
    ].join("\n\n");
  }

  private truncate(text: string): string {
    const tokens = this.tokenizer.encode(text);
    if (tokens.length <= this.tokenBudget) {
      return text;
    }

    console.warn(`[notions] Document context truncated from ${tokens.length} to ${this.tokenBudget} tokens`);
    return this.tokenizer.decode(tokens.slice(0, this.tokenBudget));
  }
}

export function notionsToPromptText(notions: readonly Notion[]): string {
  const active = notions.filter((notion) => notion.enabled);
  if (active.length === 0) {
    return "";
  }

  return [
    "Key notions to cover:",
    ...active.map((notion, index) =>
      notion.description ? `${index + 1}. ${notion.title}: ${notion.description}` : `${index + 1}. ${notion.title}`
    )
  ].join("\n");
}

function buildMockNotions(chunks: readonly Chunk[]): NotionResponse {
  const keywords = extractKeywords(chunks.map((chunk) => chunk.text).join("\n"), 5);

  return {
    notions: keywords.map((keyword) => ({
      title: keyword,
      description: `Recurring term "${keyword}" in the document.`,
      sourceRefs: [
        ...new Set(
          chunks.filter((chunk) => chunk.text.toLowerCase().includes(keyword)).flatMap((chunk) => chunk.sourceRefs)
        )
      ]
    }))
  };
}
