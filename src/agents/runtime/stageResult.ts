import type { PipelineFailureKind, TerminalFailure } from "../../domain/errors.js";
import type { AgentRunResult, AgentRunTrace } from "./agentRuntime.js";

export interface StageRawResponse {
  stage: string;
  agentName: string;
  text: string;
}

export interface FailedItem {
  stage: string;
  item: string;
  kind: PipelineFailureKind;
  message: string;
}

/** Structured outcome of every pipeline invocation. */
export interface PipelineResult<T> {
  okItems: T[];
  failedItems: FailedItem[];
  terminalFailure?: TerminalFailure;
  traces: AgentRunTrace[];
  rawResponses: StageRawResponse[];
}

/** Collects traces and raw responses across the sub-calls of one stage. */
export class StageRecorder {
  readonly traces: AgentRunTrace[] = [];
  readonly rawResponses: StageRawResponse[] = [];
  readonly failedItems: FailedItem[] = [];

  record<T>(run: AgentRunResult<T>): AgentRunResult<T> {
    this.traces.push(run.trace);
    if (run.rawText) {
      this.rawResponses.push({ stage: run.trace.stage, agentName: run.trace.agentName, text: run.rawText });
    }
    return run;
  }

  fail(item: FailedItem): void {
    this.failedItems.push(item);
  }

  finish<T>(okItems: T[], terminalFailure?: TerminalFailure): PipelineResult<T> {
    const result: PipelineResult<T> = {
      okItems,
      failedItems: this.failedItems,
      traces: this.traces,
      rawResponses: this.rawResponses
    };
    if (terminalFailure) {
      result.terminalFailure = terminalFailure;
    }
    return result;
  }
}
