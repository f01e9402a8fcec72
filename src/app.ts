import path from "node:path";

import type { ProviderBroker } from "./agents/providers/providerBroker.js";
import { createProviderBroker } from "./agents/providers/providerFactory.js";
import { AgentRuntime } from "./agents/runtime/agentRuntime.js";
import type { RuntimeConfig } from "./config/runtimeConfig.js";
import { SoloQuestionGenerator } from "./layers/assessment/soloQuestionGenerator.js";
import { ChatbotAgent } from "./layers/chatbot/chatbotAgent.js";
import { ContentExtractionAgent } from "./layers/content/contentExtractionAgent.js";
import { PdfTextReader } from "./layers/input/pdfTextReader.js";
import { OntologyBuilderAgent } from "./layers/ontology/ontologyBuilderAgent.js";
import { OwlExporter } from "./layers/ontology/owlExporter.js";
import { CourseOrchestrator } from "./layers/orchestration/courseOrchestrator.js";
import type { ContentRepository } from "./layers/storage/contentRepository.js";
import { CourseExportStore } from "./layers/storage/courseExportStore.js";
import { InMemoryContentRepository } from "./layers/storage/inMemoryContentRepository.js";
import { TranslationAgent } from "./layers/translation/translationAgent.js";

export interface ForgeServices {
  repository: ContentRepository;
  runtime: AgentRuntime;
  orchestrator: CourseOrchestrator;
  translationAgent: TranslationAgent;
  chatbot: ChatbotAgent;
  owlExporter: OwlExporter;
}

export interface ForgeOverrides {
  broker?: ProviderBroker;
  repository?: ContentRepository;
  pdfReader?: PdfTextReader;
  outputDirectory?: string;
}

/** Wires every pipeline component from one immutable configuration. */
export function createForge(config: RuntimeConfig, overrides: ForgeOverrides = {}): ForgeServices {
  const budgets = config.promptCharBudgets;
  const runtime = new AgentRuntime(overrides.broker ?? createProviderBroker(config), config);
  const repository =
    overrides.repository ?? new InMemoryContentRepository({ lessonDeletionPolicy: config.lessonDeletionPolicy });
  const owlExporter = new OwlExporter();
  const outputDirectory = overrides.outputDirectory ?? path.resolve(process.cwd(), "output");

  const orchestrator = new CourseOrchestrator({
    repository,
    pdfReader: overrides.pdfReader ?? new PdfTextReader(),
    contentAgent: new ContentExtractionAgent(runtime, budgets),
    ontologyAgent: new OntologyBuilderAgent(runtime, budgets.ontology),
    questionGenerator: new SoloQuestionGenerator(runtime, repository, {
      questionsPerLevelDefault: config.questionsPerLevelDefault,
      questionTypeDefault: config.questionTypeDefault,
      scopeCharBudget: budgets.questionScope
    }),
    exportStore: new CourseExportStore(outputDirectory, repository, owlExporter),
    outputDirectory
  });

  return {
    repository,
    runtime,
    orchestrator,
    translationAgent: new TranslationAgent(runtime, repository, {
      targetLanguages: config.translationTargetLanguages,
      concurrency: config.translationConcurrency
    }),
    chatbot: new ChatbotAgent(runtime, repository, {
      summaryChars: budgets.chatSummary,
      maxTitles: budgets.chatTitles,
      maxRelationships: budgets.chatRelationships
    }),
    owlExporter
  };
}
