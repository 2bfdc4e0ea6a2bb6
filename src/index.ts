#!/usr/bin/env node
import "dotenv/config";

import path from "node:path";

import { AiModelGateway } from "./agents/runtime/aiModelGateway.js";
import { RuntimeConfig, loadRuntimeConfig } from "./config/runtimeConfig.js";
import { formatError } from "./domain/errors.js";
import { Allocator } from "./layers/allocation/allocator.js";
import { PlanBuilder } from "./layers/allocation/planBuilder.js";
import { Chunker } from "./layers/chunking/chunker.js";
import { CodeExecutionFacility } from "./layers/execution/codeExecutionFacility.js";
import { PythonProcessExecutor } from "./layers/execution/pythonProcessExecutor.js";
import { VmCodeExecutor } from "./layers/execution/vmCodeExecutor.js";
import { DocumentLoader } from "./layers/input/documentLoader.js";
import { NotionDetector } from "./layers/notions/notionDetector.js";
import { GenerationOrchestrator } from "./layers/orchestration/generationOrchestrator.js";
import { QuizGenerator } from "./layers/quiz/quizGenerator.js";
import { LearningPackStore } from "./layers/storage/learningPackStore.js";
import { TiktokenAdapter } from "./layers/tokenizer/tokenizerAdapter.js";
import { VerificationAgent } from "./layers/verification/verificationAgent.js";

const NOTION_PROMPT_OVERHEAD_TOKENS = 500;

function createExecutor(config: RuntimeConfig): CodeExecutionFacility {
  return config.executor === "python"
    ? new PythonProcessExecutor(config.executionTimeoutMs, config.pythonCommand)
    : new VmCodeExecutor(config.executionTimeoutMs);
}

async function main(): Promise<void> {
  const runtimeConfig = loadRuntimeConfig();
  const gateway = new AiModelGateway(runtimeConfig);
  const tokenizer = new TiktokenAdapter(runtimeConfig.tokenizerEncoding);

  const inputDirectory = path.resolve(process.cwd(), process.argv[2] ?? "documents");
  const outputDirectory = path.resolve(process.cwd(), "output");

  console.log(
    `[bootstrap] quizforge starting in ${runtimeConfig.mode} mode (${gateway.modelName}), ${runtimeConfig.chunkPolicy.kind} chunking, ${runtimeConfig.executor} executor, concurrency ${runtimeConfig.concurrency}`
  );

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("[bootstrap] Interrupt received: finishing in-flight items, no new requests will be sent.");
    controller.abort();
  });

  const notionBudget = Math.max(
    1,
    runtimeConfig.contextWindowTokens - runtimeConfig.maxOutputTokens - NOTION_PROMPT_OVERHEAD_TOKENS
  );

  const orchestrator = new GenerationOrchestrator({
    loader: new DocumentLoader(inputDirectory),
    tokenizer,
    planBuilder: new PlanBuilder(new Chunker(tokenizer), new Allocator()),
    notionDetector: runtimeConfig.detectNotions ? new NotionDetector(gateway, tokenizer, notionBudget) : null,
    quizGenerator: new QuizGenerator(gateway, {
      numChoices: runtimeConfig.numChoices,
      numCorrect: runtimeConfig.numCorrect,
      concurrency: runtimeConfig.concurrency
    }),
    verificationAgent: new VerificationAgent(gateway, createExecutor(runtimeConfig), {
      tolerance: runtimeConfig.tolerance
    }),
    packStore: new LearningPackStore(outputDirectory),
    outputDirectory,
    settings: {
      chunkPolicy: runtimeConfig.chunkPolicy,
      quizCounts: runtimeConfig.quizCounts,
      exerciseCounts: runtimeConfig.exerciseCounts,
      maxAttempts: runtimeConfig.maxAttempts,
      concurrency: runtimeConfig.concurrency
    }
  });

  const results = await orchestrator.run(controller.signal);

  if (results.length === 0) {
    console.log(`No documents found in ${inputDirectory}. Add .pdf, .txt or .md files and rerun npm run dev.`);
    return;
  }

  console.log(`Generated ${results.length} learning pack(s):`);
  for (const result of results) {
    console.log(`- ${result.title}${result.cancelled ? " (cancelled, partial)" : ""}`);
    console.log(`  Pack: ${result.packOutputPath}`);
    console.log(`  Questions: ${result.questionCount}`);
    console.log(`  Exercises: ${result.verifiedCount}/${result.exerciseCount} verified`);
    console.log(`  Run artifacts: ${result.runDirectory}`);
    console.log(`  Gateway traces: ${result.tracesPath}`);
    console.log(`  Mode: ${result.mode}`);
  }
}

main().catch((error: unknown) => {
  console.error(`Pipeline failed: ${formatError(error)}`);
  process.exitCode = 1;
});
