import { describe, expect, it } from "vitest";

import { interpretPythonRun } from "./pythonProcessExecutor.js";

describe("interpretPythonRun", () => {
  const base = { exitCode: 0, stdout: "", stderr: "", timedOut: false };

  it("prefers the value printed by the result footer", () => {
    const run = interpretPythonRun({ ...base, stdout: "step 1\n__QUIZFORGE_RESULT__=42.0\n" }, 1000);

    expect(run).toEqual({ ok: true, value: { value: "42.0", output: ["step 1"] } });
  });

  it("falls back to the last printed line", () => {
    const run = interpretPythonRun({ ...base, stdout: "first\n  12  \n\n" }, 1000);

    expect(run).toEqual({ ok: true, value: { value: "12", output: ["first", "  12"] } });
  });

  it("classifies syntax errors from the last stderr line", () => {
    const run = interpretPythonRun(
      { ...base, exitCode: 1, stderr: '  File "<string>", line 1\n    x =\nSyntaxError: invalid syntax\n' },
      1000
    );

    expect(run.ok).toBe(false);
    if (!run.ok) {
      expect(run.error).toMatchObject({ kind: "SyntaxError", message: "SyntaxError: invalid syntax" });
    }
  });

  it("classifies other failures as runtime errors", () => {
    const run = interpretPythonRun({ ...base, exitCode: 1, stderr: "ZeroDivisionError: division by zero\n" }, 1000);

    expect(run.ok).toBe(false);
    if (!run.ok) {
      expect(run.error).toMatchObject({ kind: "RuntimeError", message: "ZeroDivisionError: division by zero" });
    }
  });

  it("reports timeouts before anything else", () => {
    const run = interpretPythonRun({ ...base, exitCode: null, timedOut: true }, 250);

    expect(run.ok).toBe(false);
    if (!run.ok) {
      expect(run.error).toMatchObject({ kind: "Timeout", message: "Verification script exceeded 250ms." });
    }
  });

  it("reports scripts that print nothing", () => {
    const run = interpretPythonRun(base, 1000);

    expect(run.ok).toBe(false);
    if (!run.ok) {
      expect(run.error.kind).toBe("RuntimeError");
    }
  });
});
