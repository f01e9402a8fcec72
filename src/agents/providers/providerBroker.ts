import { AllProvidersExhaustedError, formatError, type ProviderAttemptRecord } from "../../domain/errors.js";
import { classifyProviderError, type ProviderErrorKind } from "./errorClassification.js";
import { KeyRing } from "./keyRing.js";
import type { ChatMessage, LlmProvider } from "./llmProvider.js";

export interface ProviderBrokerOptions {
  maxRetries: number;
  retryInitialDelayMs: number;
  callTimeoutMs: number;
  verbose?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

export interface BrokerCompletion {
  text: string;
  provider: string;
  model: string;
  attempts: number;
  inputTokens: number;
  outputTokens: number;
}

export const DEFAULT_TEMPERATURE = 0.3;

export class ProviderBroker {
  private readonly rings = new Map<string, KeyRing>();
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly providers: LlmProvider[],
    private readonly options: ProviderBrokerOptions
  ) {
    for (const provider of providers) {
      this.rings.set(provider.name, new KeyRing(provider.apiKeys));
    }
    this.sleep = options.sleep ?? delay;
  }

  async call(messages: ChatMessage[], maxTokens: number, temperature = DEFAULT_TEMPERATURE): Promise<string> {
    const completion = await this.complete(messages, maxTokens, temperature);
    return completion.text;
  }

  async complete(
    messages: ChatMessage[],
    maxTokens: number,
    temperature = DEFAULT_TEMPERATURE
  ): Promise<BrokerCompletion> {
    const failures: ProviderAttemptRecord[] = [];
    let attempts = 0;

    for (const provider of this.providers) {
      const ring = this.ringFor(provider);

      for (let attempt = 1; attempt <= this.options.maxRetries; attempt += 1) {
        const apiKey = ring.current();
        if (apiKey === null) {
          this.warn(`${provider.name}: every key is exhausted, moving on`);
          break;
        }

        attempts += 1;
        let outcome: ProviderErrorKind;
        let message: string;

        try {
          const response = await provider.generate(
            { messages, maxTokens, temperature, timeoutMs: this.options.callTimeoutMs },
            apiKey
          );
          if (response.text.trim()) {
            return {
              text: response.text,
              provider: provider.name,
              model: provider.model,
              attempts,
              inputTokens: response.inputTokens,
              outputTokens: response.outputTokens
            };
          }
          outcome = "client";
          message = "empty response";
        } catch (error) {
          outcome = classifyProviderError(error);
          message = formatError(error);
        }

        failures.push({ provider: provider.name, attempt, outcome, message });
        this.warn(`${provider.name} attempt ${attempt}/${this.options.maxRetries} failed (${outcome}): ${message}`);

        if (outcome === "client") {
          break;
        }
        if (outcome === "quota" && provider.pooled) {
          ring.markExhausted(apiKey);
          this.warn(`${provider.name}: key ${maskKey(apiKey)} marked exhausted`);
        }
        ring.advance();

        if (attempt < this.options.maxRetries) {
          await this.sleep(this.options.retryInitialDelayMs * attempt);
        }
      }
    }

    throw new AllProvidersExhaustedError(failures);
  }

  exhaustedKeys(providerName: string): string[] {
    return this.rings.get(providerName)?.exhaustedKeys() ?? [];
  }

  private ringFor(provider: LlmProvider): KeyRing {
    const existing = this.rings.get(provider.name);
    if (existing) {
      return existing;
    }
    const ring = new KeyRing(provider.apiKeys);
    this.rings.set(provider.name, ring);
    return ring;
  }

  private warn(message: string): void {
    if (this.options.verbose ?? true) {
      console.warn(`[broker] ${message}`);
    }
  }
}

function maskKey(key: string): string {
  return key.length <= 8 ? "****" : `${key.slice(0, 4)}…${key.slice(-4)}`;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
