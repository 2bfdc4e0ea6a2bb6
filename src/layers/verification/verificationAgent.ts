import { z } from "zod";

import { ModelGateway } from "../../agents/runtime/modelGateway.js";
import { StageRecorder } from "../../agents/runtime/stageResult.js";
import { ToleranceConfig } from "../../config/runtimeConfig.js";
import { InvalidPolicyParamsError, RunCancelledError, formatError } from "../../domain/errors.js";
import {
  AttemptRecord,
  AttemptResult,
  Chunk,
  Difficulty,
  ExerciseCandidate,
  ItemIdentity,
  VerificationOutcome
} from "../../domain/models.js";
import { mapWithConcurrency } from "../../utils/concurrency.js";
import { CodeExecutionFacility, VerificationLanguage } from "../execution/codeExecutionFacility.js";
import { compareAnswers, noMatch } from "./answerComparator.js";

const EXERCISE_DIRECTIVES: Record<Difficulty, string> = {
  easy: "Create an EASY exercise: one calculation step applying a fact or formula stated explicitly in the text.",
  medium:
    "Create a MEDIUM exercise: two or three reasoning steps that combine pieces of data or relations from the text.",
  hard: "Create a HARD exercise: a multi-step quantitative problem that requires analysis, combining several parts of the text or deriving an intermediate quantity."
};

const LANGUAGE_RULES: Record<VerificationLanguage, string> = {
  javascript:
    "verificationCode is plain JavaScript (no imports, no async). It must compute the answer from scratch and assign it to a top-level `const result`.",
  python:
    "verificationCode is plain Python 3 using only the standard library. It must compute the answer from scratch and assign it to a top-level variable named `result`."
};

export const exerciseResponseSchema = z.object({
  statement: z.string().trim().min(1),
  claimedAnswer: z.union([z.string().trim().min(1), z.number()]),
  reasoningSteps: z.array(z.string()).min(1),
  verificationCode: z.string().trim().min(1),
  correction: z.string().optional()
});

export type ExerciseResponse = z.infer<typeof exerciseResponseSchema>;

interface StateBase {
  attemptsUsed: number;
  trace: readonly AttemptRecord[];
  lastCandidate: ExerciseCandidate | null;
}

export type AgentState =
  | (StateBase & { kind: "Generating" })
  | (StateBase & { kind: "Executing"; candidate: ExerciseCandidate })
  | (StateBase & { kind: "Comparing"; candidate: ExerciseCandidate | null; result: AttemptResult })
  | (StateBase & { kind: "Verified"; candidate: ExerciseCandidate })
  | (StateBase & { kind: "Failed" });

export type GeneratingState = Extract<AgentState, { kind: "Generating" }>;
export type ComparingState = Extract<AgentState, { kind: "Comparing" }>;

export interface StepContext {
  chunk: Chunk;
  difficulty: Difficulty;
  sequence: number;
  maxAttempts: number;
  recorder?: StageRecorder;
  /** Extra prompt directive, e.g. the key notions to cover. */
  notionsDirective?: string;
}

export interface VerifyOptions {
  sequence?: number;
  signal?: AbortSignal;
  recorder?: StageRecorder;
  notionsDirective?: string;
}

export interface ExercisePair {
  chunk: Chunk;
  difficulty: Difficulty;
  sequence?: number;
}

export interface BatchOptions {
  signal?: AbortSignal;
  recorder?: StageRecorder;
  notionsDirective?: string;
  onOutcome?: (index: number, outcome: VerificationOutcome) => void;
}

export interface VerificationAgentOptions {
  tolerance: ToleranceConfig;
}

export const INITIAL_STATE: GeneratingState = {
  kind: "Generating",
  attemptsUsed: 0,
  trace: [],
  lastCandidate: null
};

/**
 * Generates one exercise at a time and checks it by running its verification code.
 * Generating -> Executing -> Comparing -> Verified | Generating (fresh candidate) | Failed.
 */
export class VerificationAgent {
  constructor(
    private readonly gateway: ModelGateway,
    private readonly executor: CodeExecutionFacility,
    private readonly options: VerificationAgentOptions
  ) {}

  async verifyExercise(
    chunk: Chunk,
    difficulty: Difficulty,
    maxAttempts: number,
    options: VerifyOptions = {}
  ): Promise<VerificationOutcome> {
    assertMaxAttempts(maxAttempts);

    const context: StepContext = {
      chunk,
      difficulty,
      sequence: options.sequence ?? 0,
      maxAttempts,
      recorder: options.recorder,
      notionsDirective: options.notionsDirective
    };

    let state: AgentState = INITIAL_STATE;
    while (state.kind !== "Verified" && state.kind !== "Failed") {
      if (state.kind === "Generating" && options.signal?.aborted) {
        throw new RunCancelledError(0);
      }
      state = await this.step(state, context);
    }

    const outcome = toOutcome(state, { chunkId: chunk.id, difficulty, sequence: context.sequence }, chunk);
    const label = `chunk ${chunk.id}/${difficulty}#${context.sequence}`;
    if (outcome.status === "Verified") {
      console.log(`[verification] ${label} verified after ${outcome.attemptsUsed} attempt(s)`);
    } else {
      console.warn(`[verification] ${label} exhausted ${outcome.attemptsUsed} attempt(s) without a match`);
    }

    return outcome;
  }

  /**
   * Outcomes come back in input order. One exercise failing never affects its siblings.
   */
  async verifyBatch(
    pairs: readonly ExercisePair[],
    maxAttempts: number,
    concurrencyLimit: number,
    options: BatchOptions = {}
  ): Promise<VerificationOutcome[]> {
    assertMaxAttempts(maxAttempts);
    if (!Number.isInteger(concurrencyLimit) || concurrencyLimit < 1) {
      throw new InvalidPolicyParamsError(`concurrencyLimit must be a positive integer. Received: ${concurrencyLimit}`);
    }

    return mapWithConcurrency(
      pairs,
      concurrencyLimit,
      async (pair, index) => {
        const outcome = await this.verifyExercise(pair.chunk, pair.difficulty, maxAttempts, {
          sequence: pair.sequence ?? index,
          signal: options.signal,
          recorder: options.recorder,
          notionsDirective: options.notionsDirective
        });
        options.onOutcome?.(index, outcome);
        return outcome;
      },
      options.signal
    );
  }

  async step(state: AgentState, context: StepContext): Promise<AgentState> {
    switch (state.kind) {
      case "Generating":
        return this.generate(state, context);
      case "Executing":
        return this.execute(state);
      case "Comparing":
        return settleAttempt(state, context.maxAttempts, this.options.tolerance);
      case "Verified":
      case "Failed":
        return state;
    }
  }

  private async generate(state: StateBase, context: StepContext): Promise<AgentState> {
    const { chunk, difficulty, sequence } = context;
    const response = await this.gateway.generateStructured({
      stage: "exercise_generation",
      agentName: `exercise-agent-chunk-${chunk.id}-${difficulty}-${sequence}-attempt-${state.attemptsUsed + 1}`,
      systemPrompt: this.buildSystemPrompt(),
      userPrompt: this.buildUserPrompt(chunk, difficulty, context.notionsDirective),
      schema: exerciseResponseSchema,
      mock: () => buildMockExercise(chunk, this.executor.language)
    });
    context.recorder?.record(response);

    if (!response.result.ok) {
      return {
        ...carry(state),
        kind: "Comparing",
        candidate: null,
        result: {
          type: "generation_error",
          errorKind: response.result.error.kind,
          message: response.result.error.message
        }
      };
    }

    const candidate = toCandidate(response.result.value, chunk.id);
    return { ...carry(state), kind: "Executing", candidate, lastCandidate: candidate };
  }

  private async execute(state: Extract<AgentState, { kind: "Executing" }>): Promise<AgentState> {
    let result: AttemptResult;
    try {
      const execution = await this.executor.run(state.candidate.verificationCode);
      result = execution.ok
        ? { type: "executed", value: execution.value.value, output: execution.value.output }
        : { type: "execution_error", errorKind: execution.error.kind, message: execution.error.message };
    } catch (error) {
      result = { type: "execution_error", errorKind: "RuntimeError", message: formatError(error) };
    }

    return { ...carry(state), kind: "Comparing", candidate: state.candidate, result };
  }

  private buildSystemPrompt(): string {
    return [
      "You are an exercise author who writes computational exercises with verifiable answers.",
      "Every exercise must have one clear, machine-checkable answer (preferably numeric).",
      "The statement must be complete and unambiguous, grounded in the provided text.",
      "Break the solution into numbered reasoning steps.",
      LANGUAGE_RULES[this.executor.language],
      "Return only JSON.",
      "Output schema:",
      "{",
      '  "statement": string,',
      '  "claimedAnswer": string | number,',
      '  "reasoningSteps": string[],',
      '  "verificationCode": string,',
      '  "correction": string',
      "}"
    ].join("\n");
  }

  private buildUserPrompt(chunk: Chunk, difficulty: Difficulty, notionsDirective?: string): string {
    return [
      EXERCISE_DIRECTIVES[difficulty],
      notionsDirective ?? "",
      `Source units: ${chunk.sourceRefs.join(", ")}`,
      "---",
      chunk.text,
      "---",
      "Write exactly one exercise."
    ]
      .filter((line) => line.length > 0)
      .join("\n\n");
  }
}

/**
 * Records the attempt and decides where the loop goes next. Execution and generation
 * failures count as a no-match so every attempt is booked the same way.
 */
export function settleAttempt(state: ComparingState, maxAttempts: number, tolerance: ToleranceConfig): AgentState {
  const comparison =
    state.result.type === "executed" && state.candidate
      ? compareAnswers(state.candidate.claimedAnswer, state.result.value, tolerance)
      : noMatch(describeFailure(state.result));

  const attemptsUsed = state.attemptsUsed + 1;
  const trace: AttemptRecord[] = [
    ...state.trace,
    { attempt: attemptsUsed, candidate: state.candidate, result: state.result, comparison }
  ];

  if (comparison.matched && state.candidate) {
    return { kind: "Verified", attemptsUsed, trace, lastCandidate: state.candidate, candidate: state.candidate };
  }
  if (attemptsUsed < maxAttempts) {
    return { kind: "Generating", attemptsUsed, trace, lastCandidate: state.lastCandidate };
  }
  return { kind: "Failed", attemptsUsed, trace, lastCandidate: state.lastCandidate };
}

function carry(state: StateBase): StateBase {
  return { attemptsUsed: state.attemptsUsed, trace: state.trace, lastCandidate: state.lastCandidate };
}

function describeFailure(result: AttemptResult): string {
  switch (result.type) {
    case "executed":
      return "no candidate to compare against";
    case "execution_error":
      return `execution failed (${result.errorKind}): ${result.message}`;
    case "generation_error":
      return `generation failed (${result.errorKind}): ${result.message}`;
  }
}

function assertMaxAttempts(maxAttempts: number): void {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new InvalidPolicyParamsError(`maxAttempts must be a positive integer. Received: ${maxAttempts}`);
  }
}

function toCandidate(response: ExerciseResponse, chunkId: number): ExerciseCandidate {
  return {
    statement: response.statement,
    claimedAnswer: String(response.claimedAnswer).trim(),
    reasoningSteps: response.reasoningSteps.map((step) => step.trim()).filter((step) => step.length > 0),
    verificationCode: response.verificationCode,
    correction: response.correction?.trim() ?? "",
    sourceChunk: chunkId
  };
}

function toOutcome(state: AgentState, identity: ItemIdentity, chunk: Chunk): VerificationOutcome {
  const verified = state.kind === "Verified";
  return {
    identity,
    candidate: state.kind === "Verified" ? state.candidate : state.lastCandidate,
    status: verified ? "Verified" : "Exhausted",
    attemptsUsed: state.attemptsUsed,
    executionTrace: state.trace,
    sourceRefs: [...chunk.sourceRefs]
  };
}

function buildMockExercise(chunk: Chunk, language: VerificationLanguage): ExerciseResponse {
  const words = chunk.text.split(/\s+/).filter((word) => word.length > 0).length;
  const rate = 150;
  const minutes = Math.round((words / rate) * 100) / 100;
  const verificationCode =
    language === "python"
      ? `words = ${words}\nresult = round(words / ${rate}, 2)`
      : `const words = ${words};\nconst result = Math.round((words / ${rate}) * 100) / 100;`;

  return {
    statement: `The excerpt from unit(s) ${chunk.sourceRefs.join(", ")} contains ${words} words. At ${rate} words per minute, how many minutes does it take to read? Round to two decimals.`,
    claimedAnswer: String(minutes),
    reasoningSteps: [`Count the words: ${words}.`, `Divide by the reading speed: ${words} / ${rate}.`, "Round to two decimals."],
    verificationCode,
    correction: `${words} / ${rate} = ${minutes} minutes.`
  };
}
