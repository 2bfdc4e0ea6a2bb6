import { GatewayResponse, GatewayTrace } from "./modelGateway.js";

export interface StageRawResponse {
  stage: string;
  agentName: string;
  text: string;
}

export interface AgentStageResult<T> {
  artifact: T;
  traces: GatewayTrace[];
  rawResponses: StageRawResponse[];
}

export class StageRecorder {
  readonly traces: GatewayTrace[] = [];
  readonly rawResponses: StageRawResponse[] = [];

  record(response: GatewayResponse<unknown>): void {
    this.traces.push(response.trace);
    if (response.rawText) {
      this.rawResponses.push({
        stage: response.trace.stage,
        agentName: response.trace.agentName,
        text: response.rawText
      });
    }
  }

  finish<T>(artifact: T): AgentStageResult<T> {
    return {
      artifact,
      traces: [...this.traces],
      rawResponses: [...this.rawResponses]
    };
  }
}
