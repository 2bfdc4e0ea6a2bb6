import vm from "node:vm";

import { ExecutionError, formatError } from "../../domain/errors.js";
import { Result, err, ok } from "../../utils/result.js";
import { CodeExecutionFacility, ExecutedValue } from "./codeExecutionFacility.js";

// Top-level const/let bindings are not properties of the context object, but a second
// script in the same context can still read them.
const RESULT_LOOKUP = [
  'typeof result !== "undefined" ? result',
  ': typeof answer !== "undefined" ? answer',
  ': typeof res !== "undefined" ? res',
  ": undefined"
].join(" ");

/**
 * Runs JavaScript verification code in a fresh `node:vm` context per call.
 * The context separates globals only; it is not a security boundary.
 */
export class VmCodeExecutor implements CodeExecutionFacility {
  readonly language = "javascript";

  constructor(private readonly timeoutMs: number) {}

  async run(code: string): Promise<Result<ExecutedValue, ExecutionError>> {
    let script: vm.Script;
    try {
      script = new vm.Script(code, { filename: "verification.js" });
    } catch (error) {
      return err(new ExecutionError("SyntaxError", formatError(error)));
    }

    const output: string[] = [];
    const capture = (...values: unknown[]): void => {
      output.push(values.map(formatValue).join(" "));
    };
    const context = vm.createContext({
      console: { log: capture, info: capture, warn: capture, error: capture }
    });

    try {
      const completion: unknown = script.runInContext(context, { timeout: this.timeoutMs });
      const named: unknown = new vm.Script(RESULT_LOOKUP).runInContext(context, { timeout: this.timeoutMs });
      const value = pickValue(named, output, completion);

      if (value === null) {
        return err(
          new ExecutionError(
            "RuntimeError",
            "Verification script produced no result. Assign it to `result` or print it with console.log."
          )
        );
      }

      return ok({ value, output });
    } catch (error) {
      if (isTimeout(error)) {
        return err(new ExecutionError("Timeout", `Verification script exceeded ${this.timeoutMs}ms.`));
      }
      return err(new ExecutionError("RuntimeError", formatError(error)));
    }
  }
}

function pickValue(named: unknown, output: string[], completion: unknown): string | null {
  if (named !== undefined) {
    return formatValue(named);
  }
  const lastLine = output.filter((line) => line.trim().length > 0).at(-1);
  if (lastLine !== undefined) {
    return lastLine.trim();
  }
  if (completion !== undefined) {
    return formatValue(completion);
  }
  return null;
}

export function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "bigint" || typeof value === "boolean") {
    return String(value);
  }
  if (value === null || value === undefined) {
    return String(value);
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function isTimeout(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ERR_SCRIPT_EXECUTION_TIMEOUT"
  );
}
