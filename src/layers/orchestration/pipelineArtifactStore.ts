import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { GatewayTrace } from "../../agents/runtime/modelGateway.js";
import { AgentStageResult, StageRawResponse } from "../../agents/runtime/stageResult.js";

export type PipelineStage = "document" | "chunks" | "plan" | "notions" | "quiz" | "exercises";

/**
 * Writes every stage of one run under `<output>/runs/<runId>/` so a run can be inspected
 * after the fact.
 */
export class PipelineArtifactStore {
  private readonly runDirectory: string;

  constructor(outputDirectory: string, readonly runId: string) {
    this.runDirectory = path.join(outputDirectory, "runs", runId);
  }

  get directoryPath(): string {
    return this.runDirectory;
  }

  async persistStageArtifact(stage: PipelineStage, artifact: unknown): Promise<string> {
    return this.writeJson(`${stage}.artifact.json`, artifact);
  }

  async persistStageResult(stage: PipelineStage, result: AgentStageResult<unknown>): Promise<string> {
    const artifactPath = await this.persistStageArtifact(stage, result.artifact);
    await this.persistRawResponses(stage, result.rawResponses);
    return artifactPath;
  }

  async persistRawResponses(stage: PipelineStage, rawResponses: StageRawResponse[]): Promise<string | null> {
    if (rawResponses.length === 0) {
      return null;
    }

    return this.writeJson(`${stage}.raw-responses.json`, rawResponses);
  }

  async persistTraces(traces: GatewayTrace[]): Promise<string> {
    return this.writeJson("gateway-traces.json", traces);
  }

  async persistRunSummary(summary: unknown): Promise<string> {
    return this.writeJson("run-summary.json", summary);
  }

  private async writeJson(fileName: string, value: unknown): Promise<string> {
    await mkdir(this.runDirectory, { recursive: true });
    const filePath = path.join(this.runDirectory, fileName);
    await writeFile(filePath, JSON.stringify(value, null, 2), "utf8");
    return filePath;
  }
}
