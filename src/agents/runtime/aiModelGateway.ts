import { APICallError, createGateway, generateText, type LanguageModel } from "ai";

import { AgentMode, RuntimeConfig } from "../../config/runtimeConfig.js";
import { ModelError, formatError } from "../../domain/errors.js";
import { err, ok } from "../../utils/result.js";
import { createId } from "../../utils/text.js";
import { GatewayResponse, GatewayTrace, ModelGateway, StructuredRequest, decodeModelText } from "./modelGateway.js";

export interface TextGenerationInput {
  system: string;
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

export interface TextGenerationOutput {
  text: string;
  inputTokens: number;
  outputTokens: number;
}

export type TextGenerator = (input: TextGenerationInput) => Promise<TextGenerationOutput>;

type GatewayConfig = Pick<
  RuntimeConfig,
  | "mode"
  | "gatewayApiKey"
  | "gatewayModel"
  | "maxOutputTokens"
  | "temperature"
  | "retryCount"
  | "requestTimeoutMs"
  | "verboseAgentLogs"
>;

const JSON_ONLY_INSTRUCTION =
  "Respond ONLY with one valid JSON object. No text before or after the JSON, no markdown fences.";

export class AiModelGateway implements ModelGateway {
  private readonly generate?: TextGenerator;

  constructor(
    private readonly config: GatewayConfig,
    generator?: TextGenerator
  ) {
    if (generator) {
      this.generate = generator;
    } else if (config.mode === "live") {
      this.generate = createGatewayGenerator(config);
    }
  }

  get modelName(): string {
    return this.config.mode === "live" ? this.config.gatewayModel : "mock-runtime";
  }

  async generateStructured<T>(request: StructuredRequest<T>): Promise<GatewayResponse<T>> {
    const startedAt = new Date().toISOString();
    const startedAtMs = Date.now();

    if (this.config.mode === "mock" || !this.generate) {
      const result = request.mock
        ? ok(request.mock())
        : err(new ModelError("Unavailable", `No mock response available for ${request.agentName}.`));
      const trace = this.buildTrace({
        request,
        mode: "mock",
        model: "mock-runtime",
        startedAt,
        startedAtMs,
        attemptCount: 1,
        inputTokens: 0,
        outputTokens: 0,
        error: result.ok ? undefined : result.error
      });

      return { result, trace, rawText: "" };
    }

    const maxAttempts = Math.max(1, this.config.retryCount + 1);
    let lastError = new ModelError("Unavailable", "Model was not called.");

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        const output = await this.generate({
          system: `${request.systemPrompt}\n\n${JSON_ONLY_INSTRUCTION}`,
          prompt: request.userPrompt,
          temperature: request.temperature ?? this.config.temperature,
          maxOutputTokens: request.maxOutputTokens ?? this.config.maxOutputTokens,
          timeoutMs: this.config.requestTimeoutMs
        });

        const rawText = output.text.trim();
        const result = decodeModelText(rawText, request.schema);
        const trace = this.buildTrace({
          request,
          mode: "live",
          model: this.config.gatewayModel,
          startedAt,
          startedAtMs,
          attemptCount: attempt,
          inputTokens: output.inputTokens,
          outputTokens: output.outputTokens,
          error: result.ok ? undefined : result.error
        });
        this.logTrace(trace);

        // A malformed response is the caller's retry to spend, not ours.
        return { result, trace, rawText };
      } catch (error) {
        lastError = classifyModelError(error);

        if (attempt < maxAttempts) {
          await delay(300 * attempt);
        }
      }
    }

    const trace = this.buildTrace({
      request,
      mode: "live",
      model: this.config.gatewayModel,
      startedAt,
      startedAtMs,
      attemptCount: maxAttempts,
      inputTokens: 0,
      outputTokens: 0,
      error: lastError
    });
    this.logTrace(trace);

    return { result: err(lastError), trace, rawText: "" };
  }

  private buildTrace(input: {
    request: StructuredRequest<unknown>;
    mode: AgentMode;
    model: string;
    startedAt: string;
    startedAtMs: number;
    attemptCount: number;
    inputTokens: number;
    outputTokens: number;
    error?: ModelError;
  }): GatewayTrace {
    return {
      traceId: createId("trace", `${input.request.stage}-${input.request.agentName}-${Date.now()}`),
      stage: input.request.stage,
      agentName: input.request.agentName,
      mode: input.mode,
      model: input.model,
      startedAt: input.startedAt,
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - input.startedAtMs,
      attemptCount: input.attemptCount,
      inputTokens: input.inputTokens,
      outputTokens: input.outputTokens,
      errorKind: input.error?.kind,
      errorMessage: input.error?.message
    };
  }

  private logTrace(trace: GatewayTrace): void {
    if (!this.config.verboseAgentLogs) {
      return;
    }

    const outcome = trace.errorKind ? `error:${trace.errorKind}` : "ok";
    console.log(
      `[gateway:${trace.stage}] ${trace.agentName} ${trace.mode}/${outcome} in ${trace.durationMs}ms (${trace.inputTokens}/${trace.outputTokens} tokens)`
    );
  }
}

export function classifyModelError(error: unknown): ModelError {
  if (error instanceof ModelError) {
    return error;
  }

  if (APICallError.isInstance(error)) {
    if (error.statusCode === 429) {
      return new ModelError("RateLimited", error.message);
    }
    if (error.statusCode === 408 || error.statusCode === 504) {
      return new ModelError("Timeout", error.message);
    }
    return new ModelError("Unavailable", error.message);
  }

  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return new ModelError("Timeout", error.message);
  }

  return new ModelError("Unavailable", formatError(error));
}

function createGatewayGenerator(config: GatewayConfig): TextGenerator {
  const gateway = createGateway({
    apiKey: config.gatewayApiKey
  });
  const model: LanguageModel = gateway(config.gatewayModel);

  return async (input) => {
    const result = await generateText({
      model,
      system: input.system,
      prompt: input.prompt,
      temperature: input.temperature,
      maxOutputTokens: input.maxOutputTokens,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(input.timeoutMs)
    });

    return {
      text: result.text,
      inputTokens: result.usage?.inputTokens ?? 0,
      outputTokens: result.usage?.outputTokens ?? 0
    };
  };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
