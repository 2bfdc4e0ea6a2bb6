import { GatewayTrace } from "../../agents/runtime/modelGateway.js";
import { StageRecorder } from "../../agents/runtime/stageResult.js";
import { RunCancelledError } from "../../domain/errors.js";
import {
  ChunkPolicy,
  DifficultyCounts,
  Notion,
  SourceDocument,
  VerificationOutcome
} from "../../domain/models.js";
import { createId } from "../../utils/text.js";
import { expandPlan } from "../allocation/allocator.js";
import { PlanBuilder } from "../allocation/planBuilder.js";
import { DocumentLoader, documentStats } from "../input/documentLoader.js";
import { NotionDetector, notionsToPromptText } from "../notions/notionDetector.js";
import { QuizGenerator } from "../quiz/quizGenerator.js";
import { LearningPackStore, packSlug } from "../storage/learningPackStore.js";
import { TokenizerAdapter } from "../tokenizer/tokenizerAdapter.js";
import { ExercisePair, VerificationAgent } from "../verification/verificationAgent.js";
import { PipelineArtifactStore, PipelineStage } from "./pipelineArtifactStore.js";

export interface GenerationSettings {
  chunkPolicy: ChunkPolicy;
  quizCounts: DifficultyCounts;
  exerciseCounts: DifficultyCounts;
  maxAttempts: number;
  concurrency: number;
}

export interface GenerationOrchestratorDependencies {
  loader: DocumentLoader;
  tokenizer: TokenizerAdapter;
  planBuilder: PlanBuilder;
  notionDetector: NotionDetector | null;
  quizGenerator: QuizGenerator;
  verificationAgent: VerificationAgent;
  packStore: LearningPackStore;
  outputDirectory: string;
  settings: GenerationSettings;
}

export interface OrchestrationResult {
  runId: string;
  packId: string;
  title: string;
  packOutputPath: string;
  runDirectory: string;
  stageArtifacts: Partial<Record<PipelineStage, string>>;
  tracesPath: string;
  mode: "live" | "mock";
  cancelled: boolean;
  questionCount: number;
  verifiedCount: number;
  exerciseCount: number;
}

export class GenerationOrchestrator {
  constructor(private readonly dependencies: GenerationOrchestratorDependencies) {}

  async run(signal?: AbortSignal): Promise<OrchestrationResult[]> {
    const documents = await this.dependencies.loader.loadDocuments();
    const results: OrchestrationResult[] = [];

    for (const document of documents) {
      if (signal?.aborted) {
        this.log(`Cancelled before "${document.title}"`);
        break;
      }
      results.push(await this.runDocument(document, signal));
    }

    return results;
  }

  async runDocument(document: SourceDocument, signal?: AbortSignal): Promise<OrchestrationResult> {
    const { settings, planBuilder, tokenizer } = this.dependencies;
    const runId = createId("run", `${packSlug(document)}-${Date.now()}`);
    const artifactStore = new PipelineArtifactStore(this.dependencies.outputDirectory, runId);
    const traces: GatewayTrace[] = [];
    const stageArtifacts: Partial<Record<PipelineStage, string>> = {};
    const startedAt = new Date().toISOString();

    const stats = documentStats(document, tokenizer);
    this.log(
      `[${runId}] Starting "${document.title}": ${stats.unitCount} unit(s), ${stats.totalTokens} tokens (avg ${stats.averageTokensPerUnit}/unit)`
    );
    stageArtifacts.document = await artifactStore.persistStageArtifact("document", { ...document, stats });

    const quizPlan = planBuilder.buildPlan(document, settings.chunkPolicy, settings.quizCounts);
    const exercisePlan = planBuilder.replan(quizPlan, settings.exerciseCounts);
    stageArtifacts.chunks = await artifactStore.persistStageArtifact("chunks", quizPlan.chunks);
    stageArtifacts.plan = await artifactStore.persistStageArtifact("plan", {
      quiz: quizPlan.plan,
      exercises: exercisePlan.plan
    });

    let notions: Notion[] = [];
    if (this.dependencies.notionDetector && !signal?.aborted) {
      const notionResult = await this.dependencies.notionDetector.detect(quizPlan.chunks);
      traces.push(...notionResult.traces);
      notions = notionResult.artifact;
      stageArtifacts.notions = await artifactStore.persistStageResult("notions", notionResult);
    }
    const notionsDirective = notionsToPromptText(notions);

    const quizResult = await this.dependencies.quizGenerator.generate(
      document.title,
      quizPlan,
      settings.quizCounts,
      { signal, notionsDirective }
    );
    traces.push(...quizResult.traces);
    const quiz = quizResult.artifact;
    stageArtifacts.quiz = await artifactStore.persistStageResult("quiz", quizResult);
    let cancelled = quizResult.cancelled;
    if (cancelled) {
      this.log(`[${runId}] Quiz generation cancelled with ${quiz.questions.length} question(s) kept`);
    }

    const chunksById = new Map(exercisePlan.chunks.map((chunk) => [chunk.id, chunk]));
    const pairs: ExercisePair[] = [];
    for (const identity of expandPlan(exercisePlan.plan)) {
      const chunk = chunksById.get(identity.chunkId);
      if (chunk) {
        pairs.push({ chunk, difficulty: identity.difficulty, sequence: identity.sequence });
      }
    }

    const settled = new Map<number, VerificationOutcome>();
    const exerciseRecorder = new StageRecorder();
    if (!cancelled) {
      try {
        await this.dependencies.verificationAgent.verifyBatch(pairs, settings.maxAttempts, settings.concurrency, {
          signal,
          recorder: exerciseRecorder,
          notionsDirective,
          onOutcome: (index, outcome) => settled.set(index, outcome)
        });
      } catch (error) {
        if (!(error instanceof RunCancelledError)) {
          throw error;
        }
        cancelled = true;
        this.log(`[${runId}] Verification cancelled after ${error.settledCount} exercise(s)`);
      }
    }

    const exercises = [...settled.entries()].sort(([left], [right]) => left - right).map(([, outcome]) => outcome);
    const exerciseResult = exerciseRecorder.finish(exercises);
    traces.push(...exerciseResult.traces);
    stageArtifacts.exercises = await artifactStore.persistStageResult("exercises", exerciseResult);

    const pack = this.dependencies.packStore.assemblePack({
      document,
      chunked: quizPlan,
      notions,
      quiz,
      exercises,
      cancelled
    });
    const packOutputPath = await this.dependencies.packStore.persistPack(pack);

    const verifiedCount = exercises.filter((outcome) => outcome.status === "Verified").length;
    const tracesPath = await artifactStore.persistTraces(traces);
    await artifactStore.persistRunSummary({
      runId,
      sourceDocument: { id: document.id, title: document.title, filePath: document.filePath },
      packId: pack.id,
      stageArtifacts,
      traceCount: traces.length,
      cancelled,
      questionCount: quiz.questions.length,
      exercises: { requested: pairs.length, settled: exercises.length, verified: verifiedCount },
      startedAt,
      completedAt: new Date().toISOString()
    });

    const mode = traces.some((trace) => trace.mode === "live") ? "live" : "mock";
    this.log(
      `[${runId}] ${cancelled ? "Cancelled" : "Completed"} in ${mode} mode: ${quiz.questions.length} question(s), ${verifiedCount}/${pairs.length} verified exercise(s) -> ${packOutputPath}`
    );

    return {
      runId,
      packId: pack.id,
      title: pack.title,
      packOutputPath,
      runDirectory: artifactStore.directoryPath,
      stageArtifacts,
      tracesPath,
      mode,
      cancelled,
      questionCount: quiz.questions.length,
      verifiedCount,
      exerciseCount: exercises.length
    };
  }

  private log(message: string): void {
    console.log(`[orchestrator] ${message}`);
  }
}
