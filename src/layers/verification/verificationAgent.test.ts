import { beforeEach, describe, expect, it, vi } from "vitest";

import { InvalidPolicyParamsError, ModelError, RunCancelledError } from "../../domain/errors.js";
import { Chunk, VerificationOutcome } from "../../domain/models.js";
import {
  ScriptedCodeExecutor,
  ScriptedModelGateway,
  executed,
  failedExecution
} from "../../testing/fakes.js";
import { VmCodeExecutor } from "../execution/vmCodeExecutor.js";
import { INITIAL_STATE, VerificationAgent, settleAttempt } from "./verificationAgent.js";

const tolerance = { relative: 0.001, absolute: 0.01 };

const chunk: Chunk = {
  id: 0,
  text: "A train travels 84 km in 2 hours at constant speed.",
  tokenWeight: 11,
  sourceRefs: [1]
};

function exerciseJson(claimedAnswer: string | number, verificationCode = "const result = 84 / 2;"): string {
  return JSON.stringify({
    statement: "What is the average speed of the train in km/h?",
    claimedAnswer,
    reasoningSteps: ["Divide distance by time: 84 / 2."],
    verificationCode,
    correction: "84 / 2 = 42 km/h."
  });
}

describe("VerificationAgent", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("verifies a candidate whose claimed answer matches the executed value", async () => {
    const gateway = ScriptedModelGateway.sequence([exerciseJson("42")]);
    const executor = new ScriptedCodeExecutor([executed("42.0")]);
    const agent = new VerificationAgent(gateway, executor, { tolerance });

    const outcome = await agent.verifyExercise(chunk, "medium", 3);

    expect(outcome.status).toBe("Verified");
    expect(outcome.attemptsUsed).toBe(1);
    expect(outcome.executionTrace).toHaveLength(1);
    expect(outcome.executionTrace[0]?.comparison).toMatchObject({ matched: true, kind: "numeric" });
    expect(outcome.candidate).toMatchObject({
      claimedAnswer: "42",
      verificationCode: "const result = 84 / 2;",
      correction: "84 / 2 = 42 km/h.",
      sourceChunk: 0
    });
    expect(outcome.identity).toEqual({ chunkId: 0, difficulty: "medium", sequence: 0 });
    expect(outcome.sourceRefs).toEqual([1]);
    expect(executor.codes).toEqual(["const result = 84 / 2;"]);
  });

  it("regenerates after an execution error and verifies the second candidate", async () => {
    const gateway = ScriptedModelGateway.sequence([exerciseJson("42", "throw new Error('boom')"), exerciseJson("42")]);
    const executor = new ScriptedCodeExecutor([failedExecution("RuntimeError", "boom"), executed("42")]);
    const agent = new VerificationAgent(gateway, executor, { tolerance });

    const outcome = await agent.verifyExercise(chunk, "easy", 3);

    expect(outcome.status).toBe("Verified");
    expect(outcome.attemptsUsed).toBe(2);
    expect(outcome.executionTrace).toHaveLength(2);
    expect(outcome.executionTrace[0]?.result).toEqual({
      type: "execution_error",
      errorKind: "RuntimeError",
      message: "boom"
    });
    expect(outcome.executionTrace[0]?.comparison.kind).toBe("no_match");
    expect(outcome.candidate?.verificationCode).toBe("const result = 84 / 2;");
    expect(gateway.requests).toHaveLength(2);
  });

  it("gives up after maxAttempts mismatches and keeps the last candidate", async () => {
    const gateway = ScriptedModelGateway.sequence([exerciseJson("42"), exerciseJson(43)]);
    const executor = new ScriptedCodeExecutor([executed("41"), executed("41")]);
    const agent = new VerificationAgent(gateway, executor, { tolerance });

    const outcome = await agent.verifyExercise(chunk, "hard", 2);

    expect(outcome.status).toBe("Exhausted");
    expect(outcome.attemptsUsed).toBe(2);
    expect(outcome.executionTrace.map((record) => record.attempt)).toEqual([1, 2]);
    expect(outcome.executionTrace.every((record) => !record.comparison.matched)).toBe(true);
    expect(outcome.candidate?.claimedAnswer).toBe("43");
  });

  it("counts malformed model output as an attempt without running anything", async () => {
    const gateway = ScriptedModelGateway.sequence(["I cannot help with that.", exerciseJson("42")]);
    const executor = new ScriptedCodeExecutor([executed("42")]);
    const agent = new VerificationAgent(gateway, executor, { tolerance });

    const outcome = await agent.verifyExercise(chunk, "medium", 3);

    expect(outcome.status).toBe("Verified");
    expect(outcome.attemptsUsed).toBe(2);
    expect(outcome.executionTrace[0]?.candidate).toBeNull();
    expect(outcome.executionTrace[0]?.result).toMatchObject({ type: "generation_error", errorKind: "InvalidResponse" });
    expect(executor.codes).toHaveLength(1);
  });

  it("terminates when every generation fails", async () => {
    const gateway = ScriptedModelGateway.sequence([new ModelError("RateLimited", "slow down")]);
    const executor = new ScriptedCodeExecutor([]);
    const agent = new VerificationAgent(gateway, executor, { tolerance });

    const outcome = await agent.verifyExercise(chunk, "medium", 3);

    expect(outcome.status).toBe("Exhausted");
    expect(outcome.attemptsUsed).toBe(3);
    expect(outcome.candidate).toBeNull();
    expect(gateway.requests).toHaveLength(3);
    expect(executor.codes).toEqual([]);
  });

  it("rejects an invalid attempt budget before calling the model", async () => {
    const gateway = ScriptedModelGateway.sequence([exerciseJson("42")]);
    const agent = new VerificationAgent(gateway, new ScriptedCodeExecutor([]), { tolerance });

    await expect(agent.verifyExercise(chunk, "easy", 0)).rejects.toBeInstanceOf(InvalidPolicyParamsError);
    await expect(agent.verifyBatch([{ chunk, difficulty: "easy" }], 2, 0)).rejects.toBeInstanceOf(
      InvalidPolicyParamsError
    );
    expect(gateway.requests).toHaveLength(0);
  });

  it("puts the difficulty, notions and executor language into the prompt", async () => {
    const gateway = ScriptedModelGateway.sequence([exerciseJson("42")]);
    const agent = new VerificationAgent(gateway, new ScriptedCodeExecutor([executed("42")], "python"), { tolerance });

    await agent.verifyExercise(chunk, "hard", 1, { notionsDirective: "Key notions to cover:\n1. Speed" });

    const request = gateway.requests[0];
    expect(request?.userPrompt).toContain("Create a HARD exercise");
    expect(request?.userPrompt).toContain("Key notions to cover:\n1. Speed");
    expect(request?.userPrompt).toContain(chunk.text);
    expect(request?.systemPrompt).toContain("plain Python 3");
  });

  describe("verifyBatch", () => {
    const chunks: Chunk[] = [0, 1, 2].map((id) => ({ id, text: `Chunk ${id}`, tokenWeight: 2, sourceRefs: [id + 1] }));

    function gatewayAnsweringPerChunk(): ScriptedModelGateway {
      return new ScriptedModelGateway((request) => {
        const chunkId = Number(/chunk-(\d+)/.exec(request.agentName)?.[1]);
        return exerciseJson(String(chunkId * 10), `const result = ${chunkId} * 10;`);
      });
    }

    it("returns outcomes in input order", async () => {
      const agent = new VerificationAgent(gatewayAnsweringPerChunk(), new VmCodeExecutor(1000), { tolerance });

      const outcomes = await agent.verifyBatch(
        chunks.map((item) => ({ chunk: item, difficulty: "medium" as const })),
        2,
        2
      );

      expect(outcomes.map((outcome) => outcome.identity)).toEqual([
        { chunkId: 0, difficulty: "medium", sequence: 0 },
        { chunkId: 1, difficulty: "medium", sequence: 1 },
        { chunkId: 2, difficulty: "medium", sequence: 2 }
      ]);
      expect(outcomes.map((outcome) => outcome.status)).toEqual(["Verified", "Verified", "Verified"]);
    });

    it("stops issuing requests once cancelled and reports settled outcomes", async () => {
      const controller = new AbortController();
      const settled: VerificationOutcome[] = [];
      const gateway = gatewayAnsweringPerChunk();
      const agent = new VerificationAgent(gateway, new VmCodeExecutor(1000), { tolerance });

      const run = agent.verifyBatch(
        chunks.map((item) => ({ chunk: item, difficulty: "easy" as const })),
        2,
        1,
        {
          signal: controller.signal,
          onOutcome: (_, outcome) => {
            settled.push(outcome);
            controller.abort();
          }
        }
      );

      await expect(run).rejects.toBeInstanceOf(RunCancelledError);
      expect(settled).toHaveLength(1);
      expect(settled[0]?.status).toBe("Verified");
      expect(gateway.requests).toHaveLength(1);
    });
  });
});

describe("settleAttempt", () => {
  const candidate = {
    statement: "s",
    claimedAnswer: "7",
    reasoningSteps: ["r"],
    verificationCode: "const result = 7;",
    correction: "",
    sourceChunk: 0
  };

  it("moves to Verified on a match", () => {
    const next = settleAttempt(
      { ...INITIAL_STATE, kind: "Comparing", candidate, result: { type: "executed", value: "7", output: [] } },
      3,
      tolerance
    );

    expect(next.kind).toBe("Verified");
    expect(next.attemptsUsed).toBe(1);
  });

  it("returns to Generating while attempts remain", () => {
    const next = settleAttempt(
      {
        ...INITIAL_STATE,
        kind: "Comparing",
        candidate,
        lastCandidate: candidate,
        result: { type: "executed", value: "8", output: [] }
      },
      2,
      tolerance
    );

    expect(next).toMatchObject({ kind: "Generating", attemptsUsed: 1, lastCandidate: candidate });
    expect(next.trace).toHaveLength(1);
  });

  it("fails once the budget is spent", () => {
    const next = settleAttempt(
      {
        ...INITIAL_STATE,
        kind: "Comparing",
        candidate: null,
        result: { type: "generation_error", errorKind: "Timeout", message: "late" }
      },
      1,
      tolerance
    );

    expect(next.kind).toBe("Failed");
    expect(next.trace[0]?.comparison).toEqual({
      matched: false,
      kind: "no_match",
      detail: "generation failed (Timeout): late"
    });
  });
});
