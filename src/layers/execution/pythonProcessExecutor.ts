import { spawn } from "node:child_process";

import { ExecutionError } from "../../domain/errors.js";
import { Result, err, ok } from "../../utils/result.js";
import { CodeExecutionFacility, ExecutedValue } from "./codeExecutionFacility.js";

const RESULT_SENTINEL = "__QUIZFORGE_RESULT__=";

const RESULT_FOOTER = [
  "",
  "for __quizforge_name in ('result', 'answer', 'res'):",
  "    if __quizforge_name in globals():",
  `        print('${RESULT_SENTINEL}' + str(globals()[__quizforge_name]))`,
  "        break"
].join("\n");

export interface PythonRun {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Runs Python verification code in a new interpreter process per call.
 */
export class PythonProcessExecutor implements CodeExecutionFacility {
  readonly language = "python";

  constructor(
    private readonly timeoutMs: number,
    private readonly pythonCommand = "python3"
  ) {}

  run(code: string): Promise<Result<ExecutedValue, ExecutionError>> {
    return new Promise((resolve) => {
      const child = spawn(this.pythonCommand, ["-c", `${code}\n${RESULT_FOOTER}`], { shell: false });
      let stdout = "";
      let stderr = "";
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGKILL");
      }, this.timeoutMs);

      child.stdout.on("data", (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });
      child.on("error", (error) => {
        clearTimeout(timer);
        resolve(err(new ExecutionError("RuntimeError", `Could not start ${this.pythonCommand}: ${error.message}`)));
      });
      child.on("close", (exitCode) => {
        clearTimeout(timer);
        resolve(interpretPythonRun({ exitCode, stdout, stderr, timedOut }, this.timeoutMs));
      });
    });
  }
}

export function interpretPythonRun(run: PythonRun, timeoutMs: number): Result<ExecutedValue, ExecutionError> {
  if (run.timedOut) {
    return err(new ExecutionError("Timeout", `Verification script exceeded ${timeoutMs}ms.`));
  }

  if (run.exitCode !== 0) {
    const lastLine = run.stderr.trim().split("\n").at(-1) ?? "Python exited with an error.";
    const kind = /^(SyntaxError|IndentationError|TabError)\b/.test(lastLine) ? "SyntaxError" : "RuntimeError";
    return err(new ExecutionError(kind, lastLine));
  }

  const lines = run.stdout.split("\n").map((line) => line.trimEnd());
  const sentinel = lines.find((line) => line.startsWith(RESULT_SENTINEL));
  const output = lines.filter((line) => line.length > 0 && !line.startsWith(RESULT_SENTINEL));

  if (sentinel !== undefined) {
    return ok({ value: sentinel.slice(RESULT_SENTINEL.length).trim(), output });
  }

  const lastPrinted = output.at(-1);
  if (lastPrinted !== undefined) {
    return ok({ value: lastPrinted.trim(), output });
  }

  return err(
    new ExecutionError("RuntimeError", "Verification script produced no result. Assign it to `result` or print it.")
  );
}
