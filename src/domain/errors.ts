import { ExecutionErrorKind, ModelErrorKind } from "./models.js";

export type PipelineInputErrorCode = "INVALID_POLICY_PARAMS" | "EMPTY_DOCUMENT" | "NO_CHUNKS";

/**
 * Configuration or input problems. These abort the whole run and are never retried.
 */
export abstract class PipelineInputError extends Error {
  abstract readonly code: PipelineInputErrorCode;
}

export class InvalidPolicyParamsError extends PipelineInputError {
  readonly code = "INVALID_POLICY_PARAMS";

  constructor(message: string) {
    super(message);
    this.name = "InvalidPolicyParamsError";
  }
}

export class EmptyDocumentError extends PipelineInputError {
  readonly code = "EMPTY_DOCUMENT";

  constructor(documentId?: string) {
    super(documentId ? `Document "${documentId}" has no text to chunk.` : "Document has no text to chunk.");
    this.name = "EmptyDocumentError";
  }
}

export class NoChunksError extends PipelineInputError {
  readonly code = "NO_CHUNKS";

  constructor() {
    super("Cannot allocate a non-zero item count without any chunks.");
    this.name = "NoChunksError";
  }
}

export class ModelError extends Error {
  constructor(
    readonly kind: ModelErrorKind,
    message: string
  ) {
    super(message);
    this.name = "ModelError";
  }
}

export class ExecutionError extends Error {
  constructor(
    readonly kind: ExecutionErrorKind,
    message: string
  ) {
    super(message);
    this.name = "ExecutionError";
  }
}

export class RunCancelledError extends Error {
  constructor(readonly settledCount: number) {
    super(`Run cancelled after ${settledCount} item(s) settled.`);
    this.name = "RunCancelledError";
  }
}

export function formatError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  if (typeof value === "object" && value !== null && "message" in value && typeof value.message === "string") {
    return value.message;
  }
  if (typeof value === "string") {
    return value;
  }
  return "Unknown runtime error.";
}
