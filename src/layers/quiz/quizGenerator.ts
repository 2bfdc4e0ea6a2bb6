import { z } from "zod";

import { ModelGateway } from "../../agents/runtime/modelGateway.js";
import { AgentStageResult, StageRecorder } from "../../agents/runtime/stageResult.js";
import { RunCancelledError } from "../../domain/errors.js";
import {
  Chunk,
  ChunkedPlan,
  DIFFICULTIES,
  Difficulty,
  DifficultyCounts,
  Quiz,
  QuizMetadata,
  QuizQuestion
} from "../../domain/models.js";
import { mapWithConcurrency } from "../../utils/concurrency.js";
import { createId, extractKeywords } from "../../utils/text.js";

export const DEFAULT_DIFFICULTY_PROMPTS: Record<Difficulty, string> = {
  easy: [
    "Write EASY questions based on facts stated explicitly in the text:",
    "definitions, dates, named items or simple facts. Wrong choices must be clearly wrong."
  ].join(" "),
  medium: [
    "Write MEDIUM questions that test understanding of the text.",
    "They may require linking several pieces of information, understanding concepts or interpreting data.",
    "Wrong choices must be plausible but incorrect."
  ].join(" "),
  hard: [
    "Write HARD questions that test analysis and synthesis.",
    "They must require careful reasoning, inference or applying concepts, and may combine several parts of the text.",
    "Wrong choices must be very plausible and subtle."
  ].join(" ")
};

const quizResponseSchema = z.object({
  questions: z.array(
    z.object({
      question: z.string().trim().min(1),
      choices: z.record(z.string(), z.string()),
      correctAnswers: z.array(z.string()),
      explanation: z.string().default("")
    })
  )
});

type QuizResponse = z.infer<typeof quizResponseSchema>;
type RawQuestion = QuizResponse["questions"][number];

export interface QuizGeneratorOptions {
  numChoices: number;
  numCorrect: number;
  concurrency: number;
  difficultyPrompts?: Partial<Record<Difficulty, string>>;
}

export interface QuizRunOptions {
  signal?: AbortSignal;
  notionsDirective?: string;
}

/** A cancelled run still carries the questions of every request that settled before the abort. */
export interface QuizStageResult extends AgentStageResult<Quiz> {
  cancelled: boolean;
}

interface QuizRequest {
  difficulty: Difficulty;
  chunk: Chunk;
  count: number;
}

interface QuizRequestResult {
  questions: QuizQuestion[];
  failure?: string;
}

export function choiceLabels(count: number): string[] {
  return Array.from({ length: count }, (_, index) => String.fromCharCode(65 + index));
}

export class QuizGenerator {
  private readonly labels: string[];

  constructor(
    private readonly gateway: ModelGateway,
    private readonly options: QuizGeneratorOptions
  ) {
    this.labels = choiceLabels(options.numChoices);
  }

  async generate(
    title: string,
    chunked: ChunkedPlan,
    requested: DifficultyCounts,
    options: QuizRunOptions = {}
  ): Promise<QuizStageResult> {
    const recorder = new StageRecorder();
    const requests = this.collectRequests(chunked);
    const settled = new Map<number, QuizRequestResult>();
    let cancelled = false;

    try {
      await mapWithConcurrency(
        requests,
        this.options.concurrency,
        async (request, index) => {
          const result = await this.generateForRequest(request, recorder, options.notionsDirective);
          settled.set(index, result);
          return result;
        },
        options.signal
      );
    } catch (error) {
      if (!(error instanceof RunCancelledError)) {
        throw error;
      }
      cancelled = true;
      console.log(`[quiz] ${title}: cancelled after ${error.settledCount}/${requests.length} request(s)`);
    }

    const results = [...settled.entries()].sort(([left], [right]) => left - right);
    const questions = results.flatMap(([, result]) => result.questions);
    const failedRequests: QuizMetadata["failedRequests"] = [];
    for (const [index, result] of results) {
      const request = requests[index];
      if (result.failure !== undefined && request) {
        failedRequests.push({ chunkId: request.chunk.id, difficulty: request.difficulty, reason: result.failure });
      }
    }

    const requestedTotal = DIFFICULTIES.reduce((total, difficulty) => total + (requested[difficulty] ?? 0), 0);
    console.log(
      `[quiz] ${title}: ${questions.length}/${requestedTotal} question(s) from ${requests.length} request(s), ${failedRequests.length} failed`
    );

    const quiz = recorder.finish({
      title: `Quiz: ${title}`,
      difficulties: DIFFICULTIES.filter((difficulty) => (requested[difficulty] ?? 0) > 0),
      questions,
      metadata: {
        requestedCounts: { ...requested },
        generatedCount: questions.length,
        failedRequests,
        numChoices: this.options.numChoices,
        numCorrect: this.options.numCorrect,
        model: this.gateway.modelName
      }
    });

    return { ...quiz, cancelled };
  }

  private collectRequests(chunked: ChunkedPlan): QuizRequest[] {
    const chunksById = new Map(chunked.chunks.map((chunk) => [chunk.id, chunk]));
    const requests: QuizRequest[] = [];

    for (const difficulty of DIFFICULTIES) {
      for (const entry of chunked.plan[difficulty]) {
        const chunk = chunksById.get(entry.chunkId);
        if (chunk && entry.itemCount > 0) {
          requests.push({ difficulty, chunk, count: entry.itemCount });
        }
      }
    }

    return requests;
  }

  private async generateForRequest(
    request: QuizRequest,
    recorder: StageRecorder,
    notionsDirective?: string
  ): Promise<QuizRequestResult> {
    const { chunk, difficulty, count } = request;
    const response = await this.gateway.generateStructured({
      stage: "quiz",
      agentName: `quiz-agent-chunk-${chunk.id}-${difficulty}`,
      systemPrompt: this.buildSystemPrompt(difficulty, count),
      userPrompt: this.buildUserPrompt(chunk, difficulty, count, notionsDirective),
      schema: quizResponseSchema,
      temperature: 0.6,
      mock: () => this.buildMockQuestions(chunk, count)
    });
    recorder.record(response);

    if (!response.result.ok) {
      const reason = `${response.result.error.kind}: ${response.result.error.message}`;
      console.warn(`[quiz] Request for chunk ${chunk.id} (${difficulty}) failed: ${reason}`);
      return { questions: [], failure: reason };
    }

    const questions: QuizQuestion[] = [];
    for (const raw of response.result.value.questions) {
      if (questions.length >= count) {
        break;
      }

      const problem = this.validate(raw);
      if (problem) {
        console.warn(`[quiz] Dropped question for chunk ${chunk.id} (${difficulty}): ${problem}`);
        continue;
      }

      const sequence = questions.length;
      questions.push({
        id: createId("question", `${chunk.id}-${difficulty}-${sequence}`),
        identity: { chunkId: chunk.id, difficulty, sequence },
        question: raw.question,
        choices: Object.fromEntries(this.labels.map((label) => [label, (raw.choices[label] ?? "").trim()])),
        correctAnswers: [...raw.correctAnswers].sort(),
        explanation: raw.explanation.trim(),
        sourceRefs: [...chunk.sourceRefs]
      });
    }

    return { questions };
  }

  /** Returns why a question is unusable, or null when it is valid. */
  private validate(raw: RawQuestion): string | null {
    const keys = Object.keys(raw.choices).sort();
    if (keys.length !== this.labels.length || keys.some((key, index) => key !== this.labels[index])) {
      return `expected choices ${this.labels.join(", ")}, got ${keys.join(", ") || "none"}`;
    }
    if (Object.values(raw.choices).some((choice) => choice.trim().length === 0)) {
      return "empty choice text";
    }

    const correct = new Set(raw.correctAnswers);
    if (correct.size !== raw.correctAnswers.length || correct.size !== this.options.numCorrect) {
      return `expected ${this.options.numCorrect} distinct correct answer(s), got ${raw.correctAnswers.length}`;
    }
    const unknown = raw.correctAnswers.filter((answer) => !this.labels.includes(answer));
    if (unknown.length > 0) {
      return `correct answers ${unknown.join(", ")} are not choice labels`;
    }

    return null;
  }

  private buildSystemPrompt(difficulty: Difficulty, count: number): string {
    const directive = this.options.difficultyPrompts?.[difficulty] ?? DEFAULT_DIFFICULTY_PROMPTS[difficulty];
    const exampleChoices = this.labels.map((label) => `"${label}": string`).join(", ");

    return [
      "You are an expert educator who writes multiple-choice quizzes.",
      `Write exactly ${count} question(s).`,
      `Every question has exactly ${this.options.numChoices} choices labelled ${this.labels.join(", ")}.`,
      `Every question has exactly ${this.options.numCorrect} correct answer(s).`,
      directive,
      "Every question includes an explanation of the correct answer.",
      "Questions must be varied and cover different parts of the text.",
      "Choices must be of the same kind and of similar length.",
      "Output schema:",
      "{",
      '  "questions": [',
      `    { "question": string, "choices": { ${exampleChoices} }, "correctAnswers": string[], "explanation": string }`,
      "  ]",
      "}"
    ].join("\n");
  }

  private buildUserPrompt(chunk: Chunk, difficulty: Difficulty, count: number, notionsDirective?: string): string {
    return [
      notionsDirective ?? "",
      `Source text (units ${chunk.sourceRefs.join(", ")}):`,
      "---",
      chunk.text,
      "---",
      `Write exactly ${count} ${difficulty} multiple-choice question(s).`
    ]
      .filter((line) => line.length > 0)
      .join("\n\n");
  }

  private buildMockQuestions(chunk: Chunk, count: number): QuizResponse {
    const keywords = extractKeywords(chunk.text, count + this.labels.length);
    const terms = keywords.length > 0 ? keywords : [`unit ${chunk.sourceRefs[0] ?? chunk.id}`];

    return {
      questions: Array.from({ length: count }, (_, questionIndex) => {
        const choices: Record<string, string> = {};
        this.labels.forEach((label, labelIndex) => {
          choices[label] =
            labelIndex < this.options.numCorrect
              ? terms[(questionIndex + labelIndex) % terms.length] ?? label
              : `Not discussed in this passage (${label})`;
        });

        return {
          question: `Which term is discussed in the passage from unit(s) ${chunk.sourceRefs.join(", ")}? (${questionIndex + 1})`,
          choices,
          correctAnswers: this.labels.slice(0, this.options.numCorrect),
          explanation: "The correct choices appear in the passage; the others do not."
        };
      })
    };
  }
}
