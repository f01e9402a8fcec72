export const PROVIDER_NAMES = ["gemini", "groq", "cerebras", "openrouter", "gateway", "ollama"] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

import { QUESTION_TYPES, type QuestionType } from "../domain/models.js";

export type LessonDeletionPolicy = "refuse" | "cascade";

export interface ProviderSettings {
  name: ProviderName;
  model: string;
  apiKeys: string[];
  baseURL?: string;
}

export interface PromptCharBudgets {
  sectionIdentification: number;
  sectionSlice: number;
  learningObjects: number;
  summary: number;
  ontology: number;
  questionScope: number;
  chatSummary: number;
  chatTitles: number;
  chatRelationships: number;
}

export interface RuntimeConfig {
  providers: ProviderSettings[];
  maxOutputTokens: number;
  temperature: number;
  maxRetries: number;
  retryInitialDelayMs: number;
  callTimeoutMs: number;
  jsonRetryCount: number;
  promptCharBudgets: PromptCharBudgets;
  questionsPerLevelDefault: number;
  questionTypeDefault: QuestionType;
  translationTargetLanguages: string[];
  translationConcurrency: number;
  lessonDeletionPolicy: LessonDeletionPolicy;
  verboseAgentLogs: boolean;
}

type Env = Record<string, string | undefined>;

const DEFAULT_CHAIN = "gemini,groq,cerebras,openrouter,gateway,ollama";
const DEFAULT_TRANSLATION_LANGUAGES = "sr,fr,es,de,ru,zh,ja,pt,it";

export const DEFAULT_PROMPT_CHAR_BUDGETS: PromptCharBudgets = {
  sectionIdentification: 15000,
  sectionSlice: 5000,
  learningObjects: 8000,
  summary: 10000,
  ontology: 10000,
  questionScope: 6000,
  chatSummary: 1500,
  chatTitles: 40,
  chatRelationships: 20
};

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const chain = readList(env, "FORGE_PROVIDER_CHAIN", DEFAULT_CHAIN).map((name) => toProviderName(name));
  const providers = chain
    .map((name) => resolveProvider(env, name))
    .filter((settings): settings is ProviderSettings => settings !== null);

  if (providers.length === 0) {
    throw new Error(
      `No LLM provider is configured for chain [${chain.join(", ")}]. Set GEMINI_API_KEY, GROQ_API_KEY, CEREBRAS_API_KEY, OPENROUTER_API_KEYS, AI_GATEWAY_API_KEY or OLLAMA_BASE_URL.`
    );
  }

  const languages = readList(env, "FORGE_TRANSLATION_LANGUAGES", DEFAULT_TRANSLATION_LANGUAGES).map((code) =>
    code.toLowerCase()
  );
  if (languages.includes("en")) {
    throw new Error("FORGE_TRANSLATION_LANGUAGES must not include en: English is the source language.");
  }

  return {
    providers,
    maxOutputTokens: readNumber(env, "FORGE_MAX_OUTPUT_TOKENS", 2000, 64),
    temperature: readNumber(env, "FORGE_TEMPERATURE", 0.3, 0),
    maxRetries: readNumber(env, "FORGE_MAX_RETRIES", 3, 1),
    retryInitialDelayMs: readNumber(env, "FORGE_RETRY_INITIAL_DELAY_SECONDS", 1, 0) * 1000,
    callTimeoutMs: readNumber(env, "FORGE_CALL_TIMEOUT_SECONDS", 60, 0.1) * 1000,
    jsonRetryCount: readNumber(env, "FORGE_JSON_RETRY_COUNT", 1, 0),
    promptCharBudgets: {
      sectionIdentification: readNumber(env, "FORGE_BUDGET_SECTIONS", DEFAULT_PROMPT_CHAR_BUDGETS.sectionIdentification, 500),
      sectionSlice: readNumber(env, "FORGE_BUDGET_SECTION_SLICE", DEFAULT_PROMPT_CHAR_BUDGETS.sectionSlice, 500),
      learningObjects: readNumber(env, "FORGE_BUDGET_LEARNING_OBJECTS", DEFAULT_PROMPT_CHAR_BUDGETS.learningObjects, 500),
      summary: readNumber(env, "FORGE_BUDGET_SUMMARY", DEFAULT_PROMPT_CHAR_BUDGETS.summary, 500),
      ontology: readNumber(env, "FORGE_BUDGET_ONTOLOGY", DEFAULT_PROMPT_CHAR_BUDGETS.ontology, 500),
      questionScope: readNumber(env, "FORGE_BUDGET_QUESTION_SCOPE", DEFAULT_PROMPT_CHAR_BUDGETS.questionScope, 500),
      chatSummary: readNumber(env, "FORGE_BUDGET_CHAT_SUMMARY", DEFAULT_PROMPT_CHAR_BUDGETS.chatSummary, 100),
      chatTitles: readNumber(env, "FORGE_BUDGET_CHAT_TITLES", DEFAULT_PROMPT_CHAR_BUDGETS.chatTitles, 1),
      chatRelationships: readNumber(
        env,
        "FORGE_BUDGET_CHAT_RELATIONSHIPS",
        DEFAULT_PROMPT_CHAR_BUDGETS.chatRelationships,
        0
      )
    },
    questionsPerLevelDefault: readNumber(env, "FORGE_QUESTIONS_PER_LEVEL", 3, 1),
    questionTypeDefault: readQuestionType(env),
    translationTargetLanguages: languages,
    translationConcurrency: readNumber(env, "FORGE_TRANSLATION_CONCURRENCY", 3, 1),
    lessonDeletionPolicy: readDeletionPolicy(env),
    verboseAgentLogs: readBoolean(env, "FORGE_VERBOSE_AGENT_LOGS", true)
  };
}

function resolveProvider(env: Env, name: ProviderName): ProviderSettings | null {
  switch (name) {
    case "gemini":
      return withKeys(name, readString(env, "FORGE_PRIMARY_MODEL", "gemini-2.0-flash"), [
        readString(env, "GEMINI_API_KEY", readString(env, "GOOGLE_GENERATIVE_AI_API_KEY", ""))
      ]);
    case "groq":
      return withKeys(
        name,
        readString(env, "FORGE_SECONDARY_MODEL", "llama-3.3-70b-versatile"),
        [readString(env, "GROQ_API_KEY", "")],
        "https://api.groq.com/openai/v1"
      );
    case "cerebras":
      return withKeys(
        name,
        readString(env, "FORGE_CEREBRAS_MODEL", "llama-3.3-70b"),
        [readString(env, "CEREBRAS_API_KEY", "")],
        "https://api.cerebras.ai/v1"
      );
    case "openrouter":
      return withKeys(
        name,
        readString(env, "FORGE_OPENROUTER_MODEL", "google/gemini-2.0-flash-001"),
        [...readList(env, "OPENROUTER_API_KEYS", ""), readString(env, "OPENROUTER_API_KEY", "")],
        "https://openrouter.ai/api/v1"
      );
    case "gateway":
      return withKeys(name, readString(env, "AI_GATEWAY_MODEL", "anthropic/claude-sonnet-4"), [
        readString(env, "AI_GATEWAY_API_KEY", "")
      ]);
    case "ollama": {
      const baseURL = readString(env, "OLLAMA_BASE_URL", "");
      if (!baseURL) {
        return null;
      }
      // Local servers take no credential; the ring still needs one slot.
      return { name, model: readString(env, "FORGE_OLLAMA_MODEL", "llama3.1"), apiKeys: ["local"], baseURL };
    }
  }
}

function withKeys(name: ProviderName, model: string, keys: string[], baseURL?: string): ProviderSettings | null {
  const apiKeys = [...new Set(keys.filter((key) => key.length > 0))];
  if (apiKeys.length === 0) {
    return null;
  }
  return baseURL ? { name, model, apiKeys, baseURL } : { name, model, apiKeys };
}

function toProviderName(value: string): ProviderName {
  const normalized = value.toLowerCase();
  const match = PROVIDER_NAMES.find((name) => name === normalized);
  if (!match) {
    throw new Error(`FORGE_PROVIDER_CHAIN contains unknown provider "${value}". Known: ${PROVIDER_NAMES.join(", ")}.`);
  }
  return match;
}

function readQuestionType(env: Env): QuestionType {
  const raw = readString(env, "FORGE_QUESTION_TYPE", "multiple_choice").toLowerCase();
  const match = QUESTION_TYPES.find((type) => type === raw);
  if (!match) {
    throw new Error(`FORGE_QUESTION_TYPE must be one of ${QUESTION_TYPES.join(", ")}. Received: ${raw}`);
  }
  return match;
}

function readDeletionPolicy(env: Env): LessonDeletionPolicy {
  const raw = readString(env, "FORGE_LESSON_DELETE_POLICY", "refuse").toLowerCase();
  if (raw === "refuse" || raw === "cascade") {
    return raw;
  }
  throw new Error(`FORGE_LESSON_DELETE_POLICY must be refuse or cascade. Received: ${raw}`);
}

function readString(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value && value.length > 0 ? value : fallback;
}

function readList(env: Env, name: string, fallback: string): string[] {
  return readString(env, name, fallback)
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function readNumber(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < min) {
    throw new Error(`${name} must be a number greater than or equal to ${min}. Received: ${raw}`);
  }

  return parsed;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }

  if (["1", "true", "yes", "on"].includes(raw)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(raw)) {
    return false;
  }

  throw new Error(`${name} must be a boolean (true/false). Received: ${raw}`);
}
