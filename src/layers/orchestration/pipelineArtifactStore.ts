import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { AgentRunTrace } from "../../agents/runtime/agentRuntime.js";
import type { FailedItem, StageRawResponse } from "../../agents/runtime/stageResult.js";

export interface RunSummary {
  runId: string;
  courseId: string;
  courseName: string;
  sourceFiles: string[];
  lessonIds: string[];
  questionCount: number;
  quizId: string | null;
  stageArtifacts: Record<string, string>;
  failedItemCount: number;
  traceCount: number;
  startedAt: string;
  completedAt: string;
}

/** Per-run debugging output under `<output>/runs/<runId>/`. */
export class PipelineArtifactStore {
  private readonly runDirectory: string;

  constructor(outputDirectory: string, runId: string) {
    this.runDirectory = path.join(outputDirectory, "runs", runId);
  }

  get directoryPath(): string {
    return this.runDirectory;
  }

  async persistStageArtifact(stage: string, artifact: unknown): Promise<string> {
    return this.writeJson(`${stage}.artifact.json`, artifact);
  }

  async persistRawResponses(stage: string, rawResponses: StageRawResponse[]): Promise<string | null> {
    return rawResponses.length === 0 ? null : this.writeJson(`${stage}.raw-responses.json`, rawResponses);
  }

  async persistTraces(traces: AgentRunTrace[]): Promise<string> {
    return this.writeJson("agent-traces.json", traces);
  }

  async persistFailures(failedItems: FailedItem[]): Promise<string | null> {
    return failedItems.length === 0 ? null : this.writeJson("failed-items.json", failedItems);
  }

  async persistRunSummary(summary: RunSummary): Promise<string> {
    return this.writeJson("run-summary.json", summary);
  }

  private async writeJson(fileName: string, value: unknown): Promise<string> {
    await mkdir(this.runDirectory, { recursive: true });
    const filePath = path.join(this.runDirectory, fileName);
    await writeFile(filePath, JSON.stringify(value, null, 2), "utf8");
    return filePath;
  }
}
