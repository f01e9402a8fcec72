import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { createGateway, type LanguageModel } from "ai";

import type { ProviderSettings, RuntimeConfig } from "../../config/runtimeConfig.js";
import { AiSdkProvider, type LlmProvider } from "./llmProvider.js";
import { ProviderBroker } from "./providerBroker.js";

export function createProviders(settings: ProviderSettings[]): LlmProvider[] {
  return settings.map(
    (entry) =>
      new AiSdkProvider(entry.name, entry.model, entry.apiKeys, entry.name === "openrouter", (apiKey) =>
        createLanguageModel(entry, apiKey)
      )
  );
}

export function createProviderBroker(config: RuntimeConfig): ProviderBroker {
  return new ProviderBroker(createProviders(config.providers), {
    maxRetries: config.maxRetries,
    retryInitialDelayMs: config.retryInitialDelayMs,
    callTimeoutMs: config.callTimeoutMs,
    verbose: config.verboseAgentLogs
  });
}

function createLanguageModel(settings: ProviderSettings, apiKey: string): LanguageModel {
  switch (settings.name) {
    case "gemini":
      return createGoogleGenerativeAI({ apiKey })(settings.model);
    case "gateway":
      return createGateway({ apiKey })(settings.model);
    case "ollama":
      return createOpenAICompatible({
        name: settings.name,
        baseURL: settings.baseURL ?? "http://localhost:11434/v1"
      })(settings.model);
    case "groq":
    case "cerebras":
    case "openrouter":
      if (!settings.baseURL) {
        throw new Error(`Provider ${settings.name} requires a base URL.`);
      }
      return createOpenAICompatible({ name: settings.name, baseURL: settings.baseURL, apiKey })(settings.model);
  }
}
