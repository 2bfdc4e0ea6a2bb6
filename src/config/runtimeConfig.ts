import type { TiktokenEncoding } from "js-tiktoken";

import { ChunkPolicy, DIFFICULTIES, DifficultyCounts } from "../domain/models.js";

export type AgentMode = "live" | "mock";

export interface ToleranceConfig {
  relative: number;
  absolute: number;
}

export type ExecutorKind = "vm" | "python";

export interface RuntimeConfig {
  mode: AgentMode;
  gatewayApiKey?: string;
  gatewayModel: string;
  maxOutputTokens: number;
  contextWindowTokens: number;
  temperature: number;
  retryCount: number;
  requestTimeoutMs: number;
  chunkPolicy: ChunkPolicy;
  quizCounts: DifficultyCounts;
  exerciseCounts: DifficultyCounts;
  numChoices: number;
  numCorrect: number;
  maxAttempts: number;
  tolerance: ToleranceConfig;
  executionTimeoutMs: number;
  executor: ExecutorKind;
  pythonCommand: string;
  concurrency: number;
  detectNotions: boolean;
  verboseAgentLogs: boolean;
  tokenizerEncoding: TiktokenEncoding;
}

type Env = Record<string, string | undefined>;

const DEFAULT_MODEL = "openai/gpt-4o-mini";

const TIKTOKEN_ENCODINGS = [
  "gpt2",
  "r50k_base",
  "p50k_base",
  "p50k_edit",
  "cl100k_base",
  "o200k_base"
] as const satisfies readonly TiktokenEncoding[];

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const reader = new EnvReader(env);
  const gatewayApiKey = env.AI_GATEWAY_API_KEY?.trim() || undefined;
  const mode = resolveMode(reader, gatewayApiKey);

  if (mode === "live" && !gatewayApiKey) {
    throw new Error(
      "AI_GATEWAY_API_KEY is required for live agent mode. Set QUIZFORGE_AGENT_MODE=mock to run without API calls."
    );
  }

  const numChoices = reader.integer("QUIZFORGE_CHOICES", 4, 2);
  if (numChoices > 7) {
    throw new Error(`QUIZFORGE_CHOICES must be at most 7. Received: ${numChoices}`);
  }
  const numCorrect = reader.integer("QUIZFORGE_CORRECT_ANSWERS", 1, 1);
  if (numCorrect >= numChoices) {
    throw new Error(
      `QUIZFORGE_CORRECT_ANSWERS (${numCorrect}) must be lower than QUIZFORGE_CHOICES (${numChoices}).`
    );
  }

  return {
    mode,
    gatewayApiKey,
    gatewayModel: reader.string("AI_GATEWAY_MODEL", DEFAULT_MODEL),
    maxOutputTokens: reader.integer("QUIZFORGE_MAX_OUTPUT_TOKENS", 4096, 256),
    contextWindowTokens: reader.integer("QUIZFORGE_CONTEXT_WINDOW", 32000, 1024),
    temperature: reader.number("QUIZFORGE_TEMPERATURE", 0.5, 0),
    retryCount: reader.integer("QUIZFORGE_RETRY_COUNT", 2, 0),
    requestTimeoutMs: reader.integer("QUIZFORGE_REQUEST_TIMEOUT_MS", 90000, 1000),
    chunkPolicy: resolveChunkPolicy(reader),
    quizCounts: reader.difficultyCounts("QUIZFORGE_QUIZ_COUNTS", { easy: 5, medium: 5, hard: 0 }),
    exerciseCounts: reader.difficultyCounts("QUIZFORGE_EXERCISE_COUNTS", { medium: 2, hard: 1 }),
    numChoices,
    numCorrect,
    maxAttempts: reader.integer("QUIZFORGE_MAX_ATTEMPTS", 3, 1),
    tolerance: {
      relative: reader.number("QUIZFORGE_NUMERIC_TOLERANCE", 0.001, 0),
      absolute: reader.number("QUIZFORGE_ABSOLUTE_TOLERANCE", 0.01, 0)
    },
    executionTimeoutMs: reader.integer("QUIZFORGE_EXECUTION_TIMEOUT_MS", 5000, 10),
    executor: resolveExecutor(reader),
    pythonCommand: reader.string("QUIZFORGE_PYTHON", "python3"),
    concurrency: reader.integer("QUIZFORGE_CONCURRENCY", 4, 1),
    detectNotions: reader.boolean("QUIZFORGE_DETECT_NOTIONS", true),
    verboseAgentLogs: reader.boolean("QUIZFORGE_VERBOSE_AGENT_LOGS", true),
    tokenizerEncoding: resolveEncoding(reader)
  };
}

function resolveMode(reader: EnvReader, apiKey: string | undefined): AgentMode {
  const raw = reader.string("QUIZFORGE_AGENT_MODE", "auto").toLowerCase();

  if (raw === "live") {
    return "live";
  }
  if (raw === "mock") {
    return "mock";
  }

  return apiKey ? "live" : "mock";
}

function resolveChunkPolicy(reader: EnvReader): ChunkPolicy {
  const raw = reader.string("QUIZFORGE_CHUNK_POLICY", "unit").toLowerCase();

  if (raw === "unit" || raw === "page") {
    return { kind: "unit" };
  }
  if (raw === "window" || raw === "token") {
    return {
      kind: "window",
      windowSizeTokens: reader.integer("QUIZFORGE_WINDOW_TOKENS", 2000, 1),
      overlapTokens: reader.integer("QUIZFORGE_OVERLAP_TOKENS", 200, 0)
    };
  }

  throw new Error(`QUIZFORGE_CHUNK_POLICY must be "unit" or "window". Received: ${raw}`);
}

function resolveExecutor(reader: EnvReader): ExecutorKind {
  const raw = reader.string("QUIZFORGE_EXECUTOR", "vm").toLowerCase();

  if (raw === "vm" || raw === "javascript") {
    return "vm";
  }
  if (raw === "python") {
    return "python";
  }

  throw new Error(`QUIZFORGE_EXECUTOR must be "vm" or "python". Received: ${raw}`);
}

function resolveEncoding(reader: EnvReader): TiktokenEncoding {
  const raw = reader.string("QUIZFORGE_TIKTOKEN_ENCODING", "cl100k_base");
  const encoding = TIKTOKEN_ENCODINGS.find((candidate) => candidate === raw);

  if (!encoding) {
    throw new Error(
      `QUIZFORGE_TIKTOKEN_ENCODING must be one of ${TIKTOKEN_ENCODINGS.join(", ")}. Received: ${raw}`
    );
  }

  return encoding;
}

class EnvReader {
  constructor(private readonly env: Env) {}

  string(name: string, fallback: string): string {
    const value = this.env[name]?.trim();
    return value && value.length > 0 ? value : fallback;
  }

  number(name: string, fallback: number, min: number): number {
    const raw = this.env[name]?.trim();
    if (!raw) {
      return fallback;
    }

    const parsed = Number(raw);
    if (!Number.isFinite(parsed) || parsed < min) {
      throw new Error(`${name} must be a number greater than or equal to ${min}. Received: ${raw}`);
    }

    return parsed;
  }

  integer(name: string, fallback: number, min: number): number {
    const raw = this.env[name]?.trim();
    if (!raw) {
      return fallback;
    }

    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new Error(`${name} must be an integer greater than or equal to ${min}. Received: ${raw}`);
    }

    return parsed;
  }

  boolean(name: string, fallback: boolean): boolean {
    const raw = this.env[name]?.trim().toLowerCase();
    if (!raw) {
      return fallback;
    }

    if (["1", "true", "yes", "on"].includes(raw)) {
      return true;
    }
    if (["0", "false", "no", "off"].includes(raw)) {
      return false;
    }

    throw new Error(`${name} must be a boolean (true/false). Received: ${raw}`);
  }

  // Format: "easy:5,medium:3,hard:0"
  difficultyCounts(name: string, fallback: DifficultyCounts): DifficultyCounts {
    const raw = this.env[name]?.trim();
    if (!raw) {
      return { ...fallback };
    }

    const counts: DifficultyCounts = {};
    for (const pair of raw.split(",")) {
      const [label, value] = pair.split(":").map((part) => part.trim());
      const difficulty = DIFFICULTIES.find((candidate) => candidate === label?.toLowerCase());
      const count = Number(value);

      if (!difficulty || !Number.isInteger(count) || count < 0) {
        throw new Error(
          `${name} must look like "easy:5,medium:3,hard:0" with non-negative integer counts. Received: ${raw}`
        );
      }

      counts[difficulty] = count;
    }

    return counts;
  }
}
