import { isStageTerminal, throwIfCancelled } from "../../agents/runtime/cancellation.js";
import type { AgentRuntime } from "../../agents/runtime/agentRuntime.js";
import { StageRecorder, type PipelineResult } from "../../agents/runtime/stageResult.js";
import { DependencyMissingError, type TerminalFailure } from "../../domain/errors.js";
import type {
  LearningObject,
  Lesson,
  OntologyRelationship,
  Question,
  Quiz,
  Section,
  TranslatableEntityKind,
  Translation,
  TranslationFieldsByKind,
  TranslationInput
} from "../../domain/models.js";
import { mapWithConcurrency } from "../../utils/concurrency.js";
import { asObject, asString, asStringArray } from "../../utils/json.js";
import type { ContentRepository } from "../storage/contentRepository.js";
import { languageName, SOURCE_LANGUAGE } from "./languages.js";

export interface TranslationTarget {
  kind: TranslatableEntityKind;
  entityId: string;
}

export interface TranslationBatchOptions {
  /** Skip entities that already have a row in the target language. */
  onlyMissing?: boolean;
  signal?: AbortSignal;
}

export interface LanguageStatus {
  languageCode: string;
  translated: number;
  total: number;
  complete: boolean;
}

export interface TranslationAgentOptions {
  targetLanguages: string[];
  concurrency: number;
}

export type SourceEntity =
  | { kind: "question"; entity: Question }
  | { kind: "lesson"; entity: Lesson }
  | { kind: "section"; entity: Section }
  | { kind: "learning_object"; entity: LearningObject }
  | { kind: "relationship"; entity: OntologyRelationship };

export class TranslationAgent {
  constructor(
    private readonly runtime: AgentRuntime,
    private readonly repository: ContentRepository,
    private readonly options: TranslationAgentOptions
  ) {}

  async translateEntity(
    kind: TranslatableEntityKind,
    entityId: string,
    languageCode: string
  ): Promise<PipelineResult<Translation>> {
    return this.translateBatch([{ kind, entityId }], languageCode);
  }

  async translateQuiz(
    quizId: string,
    languageCode: string,
    options: TranslationBatchOptions = {}
  ): Promise<PipelineResult<Translation>> {
    const quiz = await this.requireQuiz(quizId);
    return this.translateBatch(
      quiz.questionIds.map((entityId) => ({ kind: "question", entityId })),
      languageCode,
      options
    );
  }

  /** Lesson content first, then every question of the course, then the ontology relationships. */
  async translateCourse(
    courseId: string,
    languageCode: string,
    options: TranslationBatchOptions = {}
  ): Promise<PipelineResult<Translation>> {
    if (!(await this.repository.getCourse(courseId))) {
      throw new DependencyMissingError(`Course ${courseId} does not exist.`);
    }

    const lessons = await this.repository.listLessons(courseId);
    const targets: TranslationTarget[] = [];
    for (const lesson of lessons) {
      targets.push({ kind: "lesson", entityId: lesson.id });
      for (const section of await this.repository.listSections(lesson.id)) {
        targets.push({ kind: "section", entityId: section.id });
        for (const learningObject of await this.repository.listLearningObjects(section.id)) {
          targets.push({ kind: "learning_object", entityId: learningObject.id });
        }
      }
    }

    // Extended abstract questions reference two lessons and would otherwise be queued twice.
    const questionIds = new Set<string>();
    for (const lesson of lessons) {
      for (const question of await this.repository.listQuestions({ lessonId: lesson.id })) {
        questionIds.add(question.id);
      }
    }
    targets.push(...[...questionIds].map((entityId): TranslationTarget => ({ kind: "question", entityId })));

    for (const lesson of lessons) {
      for (const relationship of await this.repository.listRelationships(lesson.id)) {
        targets.push({ kind: "relationship", entityId: relationship.id });
      }
    }

    return this.translateBatch(targets, languageCode, options);
  }

  /**
   * Translates each target independently and reports per-entity success. Provider
   * exhaustion or cancellation stops the remaining items and becomes the terminal failure.
   */
  async translateBatch(
    targets: TranslationTarget[],
    languageCode: string,
    options: TranslationBatchOptions = {}
  ): Promise<PipelineResult<Translation>> {
    const language = this.assertSupported(languageCode);
    const recorder = new StageRecorder();
    let terminalFailure: TerminalFailure | undefined;

    const halt = {
      when: () => terminalFailure !== undefined,
      skip: (target: TranslationTarget): Translation | null => {
        recorder.fail({
          stage: "translation",
          item: `${target.kind}:${target.entityId}`,
          kind: terminalFailure?.kind ?? "Cancelled",
          message: "Not attempted."
        });
        return null;
      }
    };

    const outcomes = await mapWithConcurrency(
      targets,
      { concurrency: this.options.concurrency, halt },
      async (target) => {
        try {
          throwIfCancelled(options.signal, "Translation");
          if (options.onlyMissing) {
            const existing = await this.repository.getTranslation(target.kind, target.entityId, language);
            if (existing) {
              return existing;
            }
          }
          return await this.translateOne(target, language, recorder);
        } catch (error) {
          if (isStageTerminal(error)) {
            terminalFailure ??= error;
            recorder.fail({
              stage: "translation",
              item: `${target.kind}:${target.entityId}`,
              kind: error.kind,
              message: error.message
            });
            return null;
          }
          throw error;
        }
      }
    );

    const translations = outcomes.filter((outcome): outcome is Translation => outcome !== null);
    console.log(
      `[translation] ${language}: ${translations.length}/${targets.length} entit${targets.length === 1 ? "y" : "ies"} translated`
    );
    return recorder.finish(translations, terminalFailure);
  }

  async getQuizTranslationStatus(quizId: string): Promise<LanguageStatus[]> {
    const quiz = await this.requireQuiz(quizId);

    const counts = new Map<string, number>();
    for (const questionId of quiz.questionIds) {
      for (const translation of await this.repository.listTranslations("question", questionId)) {
        counts.set(translation.languageCode, (counts.get(translation.languageCode) ?? 0) + 1);
      }
    }

    const total = quiz.questionIds.length;
    return [...counts.entries()].map(([languageCode, translated]) => ({
      languageCode,
      translated,
      total,
      complete: total > 0 && translated === total
    }));
  }

  /** Languages in which every question of the quiz has a translation. */
  async availableLanguages(quizId: string): Promise<string[]> {
    const status = await this.getQuizTranslationStatus(quizId);
    return status.filter((entry) => entry.complete).map((entry) => entry.languageCode);
  }

  async fixQuizTranslations(quizId: string, languageCode: string): Promise<number> {
    await this.requireQuiz(quizId);
    const deleted = await this.repository.deleteTranslationsForQuiz(quizId, languageCode);
    console.log(`[translation] removed ${deleted} ${languageCode} translation(s) from quiz ${quizId}`);
    return deleted;
  }

  private async translateOne(
    target: TranslationTarget,
    language: string,
    recorder: StageRecorder
  ): Promise<Translation | null> {
    const label = `${target.kind}:${target.entityId}`;
    const source = await this.loadSource(target);
    if (!source) {
      recorder.fail({ stage: "translation", item: label, kind: "DependencyMissing", message: "Entity does not exist." });
      return null;
    }

    const run = recorder.record(
      await this.runtime.runJson<TranslationInput | null>({
        stage: "translation",
        agentName: `translation-agent-${target.kind}-${language}`,
        systemPrompt: buildSystemPrompt(language),
        userPrompt: JSON.stringify(sourcePayload(source), null, 2),
        expect: "object",
        parse: (value) => parseTranslation(source, language, value),
        fallback: () => null
      })
    );

    if (run.data === null) {
      recorder.fail({
        stage: "translation",
        item: label,
        kind: "JsonRecoveryFailed",
        message: run.trace.errorMessage ?? "Translation did not match the expected shape."
      });
      return null;
    }

    return this.repository.upsertTranslation(run.data);
  }

  private async loadSource(target: TranslationTarget): Promise<SourceEntity | null> {
    switch (target.kind) {
      case "question": {
        const entity = await this.repository.getQuestion(target.entityId);
        return entity ? { kind: "question", entity } : null;
      }
      case "lesson": {
        const entity = await this.repository.getLesson(target.entityId);
        return entity ? { kind: "lesson", entity } : null;
      }
      case "section": {
        const entity = await this.repository.getSection(target.entityId);
        return entity ? { kind: "section", entity } : null;
      }
      case "learning_object": {
        const entity = await this.repository.getLearningObject(target.entityId);
        return entity ? { kind: "learning_object", entity } : null;
      }
      case "relationship": {
        const entity = await this.repository.getRelationship(target.entityId);
        return entity ? { kind: "relationship", entity } : null;
      }
    }
  }

  private async requireQuiz(quizId: string): Promise<Quiz> {
    const quiz = await this.repository.getQuiz(quizId);
    if (!quiz) {
      throw new DependencyMissingError(`Quiz ${quizId} does not exist.`);
    }
    return quiz;
  }

  private assertSupported(languageCode: string): string {
    const code = languageCode.trim().toLowerCase();
    if (code === SOURCE_LANGUAGE) {
      throw new Error("English is the source language; there is nothing to translate.");
    }
    if (!this.options.targetLanguages.includes(code)) {
      throw new Error(
        `Language "${languageCode}" is not supported. Supported: ${this.options.targetLanguages.join(", ")}.`
      );
    }
    return code;
  }
}

function buildSystemPrompt(language: string): string {
  return [
    `You translate educational content from English into ${languageName(language)} (${language}).`,
    "Return only JSON.",
    "Translate every string value of the JSON object you receive.",
    "Keep every key unchanged, keep arrays the same length and in the same order.",
    "Leave formulas, code and proper names untranslated."
  ].join("\n");
}

function sourcePayload(source: SourceEntity): Record<string, unknown> {
  switch (source.kind) {
    case "question":
      return {
        question_text: source.entity.questionText,
        ...(source.entity.options ? { options: source.entity.options } : {}),
        ...(source.entity.questionType === "true_false" ? {} : { correct_answer: source.entity.correctAnswer }),
        explanation: source.entity.explanation
      };
    case "lesson":
    case "section":
      return { title: source.entity.title, summary: source.entity.summary ?? "" };
    case "learning_object":
      return { title: source.entity.title, content: source.entity.content, keywords: source.entity.keywords };
    case "relationship":
      return { relationship_type: source.entity.type.replace(/_/g, " "), description: source.entity.description };
  }
}

/** Strict shape check per entity kind; any deviation throws and fails the entity. */
export function parseTranslation(source: SourceEntity, languageCode: string, value: unknown): TranslationInput {
  const root = asObject(value);
  const entityId = source.entity.id;

  switch (source.kind) {
    case "question":
      return {
        entityKind: "question",
        entityId,
        languageCode,
        fields: parseQuestionFields(source.entity, root)
      };
    case "lesson":
    case "section": {
      const fields: TranslationFieldsByKind["lesson"] = {
        title: requireString(root, "title"),
        summary: source.entity.summary ? requireString(root, "summary") : asString(root.summary)
      };
      return source.kind === "lesson"
        ? { entityKind: "lesson", entityId, languageCode, fields }
        : { entityKind: "section", entityId, languageCode, fields };
    }
    case "learning_object": {
      const keywords = asStringArray(root.keywords);
      if (keywords.length !== source.entity.keywords.length) {
        throw new Error(`Expected ${source.entity.keywords.length} keywords, received ${keywords.length}.`);
      }
      return {
        entityKind: "learning_object",
        entityId,
        languageCode,
        fields: { title: requireString(root, "title"), content: requireString(root, "content"), keywords }
      };
    }
    case "relationship":
      return {
        entityKind: "relationship",
        entityId,
        languageCode,
        fields: {
          relationshipLabel: requireString(root, "relationship_type"),
          description: source.entity.description ? requireString(root, "description") : asString(root.description)
        }
      };
  }
}

function parseQuestionFields(question: Question, root: Record<string, unknown>): TranslationFieldsByKind["question"] {
  const questionText = requireString(root, "question_text");
  const explanation = question.explanation ? requireString(root, "explanation") : asString(root.explanation);

  if (question.questionType === "true_false") {
    // "True"/"False" is the answer key itself; a translated verdict could flip it.
    return { questionText, options: null, correctAnswer: question.correctAnswer, explanation };
  }
  if (!question.options) {
    return { questionText, options: null, correctAnswer: requireString(root, "correct_answer"), explanation };
  }

  const options = Array.isArray(root.options) ? asStringArray(root.options) : [];
  if (!Array.isArray(root.options) || options.length !== root.options.length || options.length !== question.options.length) {
    throw new Error(`Expected ${question.options.length} translated options.`);
  }

  // The answer's identity is its index; the translated answer is read back from the options.
  const index = question.correctOptionIndex ?? -1;
  const correctAnswer = options[index];
  if (correctAnswer === undefined) {
    throw new Error("Source question has no valid correct option index.");
  }

  return { questionText, options, correctAnswer, explanation };
}

function requireString(root: Record<string, unknown>, key: string): string {
  const value = asString(root[key]);
  if (!value) {
    throw new Error(`Translated "${key}" is missing or empty.`);
  }
  return value;
}
