import { GatewayResponse, ModelGateway, StructuredRequest, decodeModelText } from "../agents/runtime/modelGateway.js";
import { ExecutionError, ModelError } from "../domain/errors.js";
import { CodeExecutionFacility, ExecutedValue, VerificationLanguage } from "../layers/execution/codeExecutionFacility.js";
import { TokenizerAdapter } from "../layers/tokenizer/tokenizerAdapter.js";
import { Result, err, ok } from "../utils/result.js";

/** One token per whitespace-separated word; decode joins words with single spaces. */
export class WhitespaceTokenizer implements TokenizerAdapter {
  private readonly ids = new Map<string, number>();
  private readonly words: string[] = [];

  countTokens(text: string): number {
    return this.encode(text).length;
  }

  encode(text: string): number[] {
    return text
      .split(/\s+/)
      .filter((word) => word.length > 0)
      .map((word) => {
        const known = this.ids.get(word);
        if (known !== undefined) {
          return known;
        }
        this.words.push(word);
        this.ids.set(word, this.words.length - 1);
        return this.words.length - 1;
      });
  }

  decode(tokens: number[]): string {
    return tokens.map((token) => this.words[token] ?? "").join(" ");
  }
}

export type ScriptedRequest = Pick<StructuredRequest<unknown>, "stage" | "agentName" | "systemPrompt" | "userPrompt">;

export type ScriptedReply = string | ModelError;

/**
 * Gateway whose replies come from a script. Text replies go through the real decode step,
 * so malformed text still surfaces as InvalidResponse.
 */
export class ScriptedModelGateway implements ModelGateway {
  readonly modelName = "scripted-model";
  readonly requests: ScriptedRequest[] = [];

  constructor(private readonly respond: (request: ScriptedRequest, callIndex: number) => ScriptedReply) {}

  static sequence(replies: ScriptedReply[]): ScriptedModelGateway {
    return new ScriptedModelGateway((_, callIndex) => {
      const reply = replies[Math.min(callIndex, replies.length - 1)];
      return reply ?? new ModelError("Unavailable", "No scripted reply.");
    });
  }

  async generateStructured<T>(request: StructuredRequest<T>): Promise<GatewayResponse<T>> {
    const callIndex = this.requests.length;
    this.requests.push({
      stage: request.stage,
      agentName: request.agentName,
      systemPrompt: request.systemPrompt,
      userPrompt: request.userPrompt
    });

    const reply = this.respond(request, callIndex);
    const result: Result<T, ModelError> =
      typeof reply === "string" ? decodeModelText(reply, request.schema) : err(reply);
    const now = new Date().toISOString();

    return {
      result,
      rawText: typeof reply === "string" ? reply : "",
      trace: {
        traceId: `trace-${callIndex}`,
        stage: request.stage,
        agentName: request.agentName,
        mode: "mock",
        model: this.modelName,
        startedAt: now,
        completedAt: now,
        durationMs: 0,
        attemptCount: 1,
        inputTokens: 0,
        outputTokens: 0,
        errorKind: result.ok ? undefined : result.error.kind,
        errorMessage: result.ok ? undefined : result.error.message
      }
    };
  }
}

export type ScriptedExecution = Result<ExecutedValue, ExecutionError>;

export function executed(value: string, output: string[] = []): ScriptedExecution {
  return ok({ value, output });
}

export function failedExecution(kind: ExecutionError["kind"], message: string): ScriptedExecution {
  return err(new ExecutionError(kind, message));
}

/** Hands out scripted results in order and records the code it was asked to run. */
export class ScriptedCodeExecutor implements CodeExecutionFacility {
  readonly codes: string[] = [];

  constructor(
    private readonly results: ScriptedExecution[],
    readonly language: VerificationLanguage = "javascript"
  ) {}

  async run(code: string): Promise<ScriptedExecution> {
    this.codes.push(code);
    return this.results.shift() ?? failedExecution("RuntimeError", "No scripted execution result.");
  }
}
