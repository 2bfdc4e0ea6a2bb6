import { ExecutionError } from "../../domain/errors.js";
import { Result } from "../../utils/result.js";

export type VerificationLanguage = "javascript" | "python";

export interface ExecutedValue {
  /** Printable form of the script's answer. */
  value: string;
  /** Lines the script wrote to its console. */
  output: string[];
}

/**
 * Runs one verification script. Implementations must not let state from one call
 * leak into the next.
 */
export interface CodeExecutionFacility {
  readonly language: VerificationLanguage;
  run(code: string): Promise<Result<ExecutedValue, ExecutionError>>;
}
