import { z } from "zod";

import { AgentMode } from "../../config/runtimeConfig.js";
import { ModelError } from "../../domain/errors.js";
import { ModelErrorKind } from "../../domain/models.js";
import { parseJsonFromModelText } from "../../utils/json.js";
import { Result, err, ok } from "../../utils/result.js";

export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface StructuredRequest<T> {
  stage: string;
  agentName: string;
  systemPrompt: string;
  userPrompt: string;
  schema: ResponseSchema<T>;
  /** Offline stand-in used in mock mode. */
  mock?: () => T;
  temperature?: number;
  maxOutputTokens?: number;
}

export interface GatewayTrace {
  traceId: string;
  stage: string;
  agentName: string;
  mode: AgentMode;
  model: string;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  attemptCount: number;
  inputTokens: number;
  outputTokens: number;
  errorKind?: ModelErrorKind;
  errorMessage?: string;
}

export interface GatewayResponse<T> {
  result: Result<T, ModelError>;
  trace: GatewayTrace;
  rawText: string;
}

export interface ModelGateway {
  readonly modelName: string;
  generateStructured<T>(request: StructuredRequest<T>): Promise<GatewayResponse<T>>;
}

/**
 * Strict decode step at the gateway boundary: model text either becomes a value of the
 * schema's type or an InvalidResponse error. Callers never see untyped JSON.
 */
export function decodeModelText<T>(rawText: string, schema: ResponseSchema<T>): Result<T, ModelError> {
  let json: unknown;
  try {
    json = parseJsonFromModelText(rawText);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Model response was not JSON.";
    return err(new ModelError("InvalidResponse", message));
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return err(new ModelError("InvalidResponse", `Response did not match the expected schema (${issues}).`));
  }

  return ok(parsed.data);
}
