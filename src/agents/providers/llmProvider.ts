import { generateText, type LanguageModel, type ModelMessage } from "ai";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ProviderRequest {
  messages: ChatMessage[];
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface ProviderResponse {
  text: string;
  inputTokens: number;
  outputTokens: number;
}

/**
 * One backend in the broker's chain. Pooled providers rotate through `apiKeys`
 * and have keys marked exhausted on quota errors; others hold a single credential.
 */
export interface LlmProvider {
  readonly name: string;
  readonly model: string;
  readonly apiKeys: readonly string[];
  readonly pooled: boolean;
  generate(request: ProviderRequest, apiKey: string): Promise<ProviderResponse>;
}

export class AiSdkProvider implements LlmProvider {
  private readonly models = new Map<string, LanguageModel>();

  constructor(
    readonly name: string,
    readonly model: string,
    readonly apiKeys: readonly string[],
    readonly pooled: boolean,
    private readonly createModel: (apiKey: string) => LanguageModel
  ) {}

  async generate(request: ProviderRequest, apiKey: string): Promise<ProviderResponse> {
    const result = await generateText({
      model: this.modelFor(apiKey),
      messages: request.messages.map(toModelMessage),
      maxOutputTokens: request.maxTokens,
      temperature: request.temperature,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(request.timeoutMs)
    });

    return {
      text: result.text,
      inputTokens: result.usage?.inputTokens ?? 0,
      outputTokens: result.usage?.outputTokens ?? 0
    };
  }

  private modelFor(apiKey: string): LanguageModel {
    const cached = this.models.get(apiKey);
    if (cached) {
      return cached;
    }
    const created = this.createModel(apiKey);
    this.models.set(apiKey, created);
    return created;
  }
}

function toModelMessage(message: ChatMessage): ModelMessage {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}
