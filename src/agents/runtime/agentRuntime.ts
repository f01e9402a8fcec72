import type { RuntimeConfig } from "../../config/runtimeConfig.js";
import { AllProvidersExhaustedError, formatError } from "../../domain/errors.js";
import { parseJsonFromModelText, type JsonShape } from "../../utils/json.js";
import { createId } from "../../utils/text.js";
import type { ChatMessage } from "../providers/llmProvider.js";
import type { BrokerCompletion, ProviderBroker } from "../providers/providerBroker.js";

export type AgentRuntimeSettings = Pick<RuntimeConfig, "maxOutputTokens" | "temperature" | "jsonRetryCount" | "verboseAgentLogs">;

export interface JsonAgentRequest<T> {
  stage: string;
  agentName: string;
  systemPrompt: string;
  userPrompt: string;
  parse: (value: unknown) => T;
  fallback: () => T;
  expect?: JsonShape;
  temperature?: number;
  maxOutputTokens?: number;
  retryCount?: number;
}

export interface TextAgentRequest {
  stage: string;
  agentName: string;
  messages: ChatMessage[];
  temperature?: number;
  maxOutputTokens?: number;
}

export interface AgentRunTrace {
  traceId: string;
  stage: string;
  agentName: string;
  provider: string | null;
  model: string | null;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  attemptCount: number;
  inputTokens: number;
  outputTokens: number;
  fallbackUsed: boolean;
  errorMessage?: string;
}

export interface AgentRunResult<T> {
  data: T;
  trace: AgentRunTrace;
  rawText: string;
}

/**
 * Stage-facing wrapper over the broker. JSON and parse failures degrade to the
 * request's fallback; broker exhaustion is rethrown for the pipeline to surface.
 */
export class AgentRuntime {
  constructor(
    private readonly broker: ProviderBroker,
    private readonly settings: AgentRuntimeSettings
  ) {}

  async runJson<T>(request: JsonAgentRequest<T>): Promise<AgentRunResult<T>> {
    const startedAt = new Date().toISOString();
    const startedAtMs = Date.now();
    const maxAttempts = Math.max(1, (request.retryCount ?? this.settings.jsonRetryCount) + 1);
    const messages: ChatMessage[] = [
      { role: "system", content: request.systemPrompt },
      { role: "user", content: request.userPrompt }
    ];

    let lastError: unknown;
    let lastRawText = "";
    let lastCompletion: BrokerCompletion | null = null;
    let inputTokens = 0;
    let outputTokens = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        const completion = await this.broker.complete(
          messages,
          request.maxOutputTokens ?? this.settings.maxOutputTokens,
          request.temperature ?? this.settings.temperature
        );
        lastCompletion = completion;
        lastRawText = completion.text.trim();
        inputTokens += completion.inputTokens;
        outputTokens += completion.outputTokens;

        const parsed = request.parse(parseJsonFromModelText(lastRawText, request.expect));
        const trace = this.buildTrace({
          stage: request.stage,
          agentName: request.agentName,
          completion,
          startedAt,
          startedAtMs,
          attemptCount: attempt,
          inputTokens,
          outputTokens,
          fallbackUsed: false
        });
        this.logTrace(trace);

        return { data: parsed, trace, rawText: lastRawText };
      } catch (error) {
        if (error instanceof AllProvidersExhaustedError) {
          this.logFailure(request.stage, request.agentName, error);
          throw error;
        }
        lastError = error;
      }
    }

    const trace = this.buildTrace({
      stage: request.stage,
      agentName: request.agentName,
      completion: lastCompletion,
      startedAt,
      startedAtMs,
      attemptCount: maxAttempts,
      inputTokens,
      outputTokens,
      fallbackUsed: true,
      errorMessage: formatError(lastError)
    });
    this.logTrace(trace);

    return { data: request.fallback(), trace, rawText: lastRawText };
  }

  async runText(request: TextAgentRequest): Promise<AgentRunResult<string>> {
    const startedAt = new Date().toISOString();
    const startedAtMs = Date.now();

    try {
      const completion = await this.broker.complete(
        request.messages,
        request.maxOutputTokens ?? this.settings.maxOutputTokens,
        request.temperature ?? this.settings.temperature
      );
      const text = completion.text.trim();
      const trace = this.buildTrace({
        stage: request.stage,
        agentName: request.agentName,
        completion,
        startedAt,
        startedAtMs,
        attemptCount: 1,
        inputTokens: completion.inputTokens,
        outputTokens: completion.outputTokens,
        fallbackUsed: false
      });
      this.logTrace(trace);

      return { data: text, trace, rawText: text };
    } catch (error) {
      if (error instanceof AllProvidersExhaustedError) {
        this.logFailure(request.stage, request.agentName, error);
      }
      throw error;
    }
  }

  private buildTrace(input: {
    stage: string;
    agentName: string;
    completion: BrokerCompletion | null;
    startedAt: string;
    startedAtMs: number;
    attemptCount: number;
    inputTokens: number;
    outputTokens: number;
    fallbackUsed: boolean;
    errorMessage?: string;
  }): AgentRunTrace {
    return {
      traceId: createId("trace", `${input.stage}-${input.agentName}-${Date.now()}`),
      stage: input.stage,
      agentName: input.agentName,
      provider: input.completion?.provider ?? null,
      model: input.completion?.model ?? null,
      startedAt: input.startedAt,
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - input.startedAtMs,
      attemptCount: input.attemptCount,
      inputTokens: input.inputTokens,
      outputTokens: input.outputTokens,
      fallbackUsed: input.fallbackUsed,
      errorMessage: input.errorMessage
    };
  }

  private logTrace(trace: AgentRunTrace): void {
    if (!this.settings.verboseAgentLogs) {
      return;
    }
    const fallbackMarker = trace.fallbackUsed ? "fallback" : "primary";
    console.log(
      `[agent:${trace.stage}] ${trace.agentName} ${trace.provider ?? "none"}/${fallbackMarker} in ${trace.durationMs}ms (${trace.inputTokens}/${trace.outputTokens} tokens)`
    );
  }

  private logFailure(stage: string, agentName: string, error: AllProvidersExhaustedError): void {
    if (this.settings.verboseAgentLogs) {
      console.error(`[agent:${stage}] ${agentName} failed: ${error.message}`);
    }
  }
}
