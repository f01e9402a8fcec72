import { isStageTerminal, throwIfCancelled } from "../../agents/runtime/cancellation.js";
import type { AgentRuntime } from "../../agents/runtime/agentRuntime.js";
import { StageRecorder, type PipelineResult } from "../../agents/runtime/stageResult.js";
import { DependencyMissingError, GenerationFailedError } from "../../domain/errors.js";
import {
  SOLO_LEVELS,
  type GeneratedQuestion,
  type QuestionType,
  type SoloLevel
} from "../../domain/models.js";
import { truncate } from "../../utils/text.js";
import type { ContentRepository } from "../storage/contentRepository.js";
import {
  findDraftViolations,
  normalizeDraft,
  unwrapQuestionObject,
  type DraftContext
} from "./questionDraft.js";
import {
  buildWorkPlan,
  describeScope,
  populatedSections,
  renderScope,
  scopeKeywords,
  scopeLessonIds,
  type LessonMaterial,
  type WorkItem
} from "./questionScopes.js";
import { LEVEL_CONSTRAINTS, QUESTION_SCHEMAS, SOLO_DEFINITIONS } from "./soloLevels.js";

const MAX_TAG_KEYWORDS = 4;
const MAX_AVOID_LIST = 10;

const QUESTION_SYSTEM_PROMPT = [
  "You are the SOLO Question Generation Agent.",
  "Return only JSON for exactly one question.",
  "The SOLO taxonomy describes five levels of understanding:",
  ...SOLO_DEFINITIONS.map(([level, definition]) => `- ${level}: ${definition}`),
  "Write the question strictly at the target level and answerable from the supplied material alone."
].join("\n");

export interface QuestionGenerationRequest {
  lessonIds: string[];
  levels: SoloLevel[];
  questionsPerLevel?: number | Partial<Record<SoloLevel, number>>;
  questionType?: QuestionType;
  signal?: AbortSignal;
}

export interface QuestionGenerationResult extends PipelineResult<GeneratedQuestion> {
  perLevelCounts: Partial<Record<SoloLevel, number>>;
}

export interface QuestionGeneratorOptions {
  questionsPerLevelDefault: number;
  questionTypeDefault: QuestionType;
  scopeCharBudget: number;
  temperature?: number;
}

type DraftOutcome = { question: GeneratedQuestion } | { failure: "JsonRecoveryFailed" | "ValidationFailed"; message: string };

export class SoloQuestionGenerator {
  constructor(
    private readonly runtime: AgentRuntime,
    private readonly repository: ContentRepository,
    private readonly options: QuestionGeneratorOptions
  ) {}

  async generate(request: QuestionGenerationRequest): Promise<QuestionGenerationResult> {
    const recorder = new StageRecorder();
    const levels = SOLO_LEVELS.filter((level) => request.levels.includes(level));
    const perLevelCounts: Partial<Record<SoloLevel, number>> = Object.fromEntries(levels.map((level) => [level, 0]));

    let materials: LessonMaterial[];
    try {
      materials = await this.loadMaterials(request, levels);
    } catch (error) {
      if (error instanceof DependencyMissingError) {
        console.warn(`[questions] ${error.message}`);
        return { ...recorder.finish([], error), perLevelCounts };
      }
      throw error;
    }

    const plan = buildWorkPlan(
      materials,
      levels.map((level) => [level, this.countFor(request, level)] as const)
    );
    const questionType = request.questionType ?? this.options.questionTypeDefault;
    const accepted: GeneratedQuestion[] = [];

    console.log(`[questions] ${plan.length} work item(s) across ${levels.join(", ")} for ${materials.length} lesson(s)`);

    try {
      for (const item of plan) {
        throwIfCancelled(request.signal, "Question generation");
        const outcome = await this.generateItem(item, questionType, accepted, recorder);

        if ("question" in outcome) {
          accepted.push(outcome.question);
          perLevelCounts[item.level] = (perLevelCounts[item.level] ?? 0) + 1;
        } else {
          const label = `${item.level} #${item.ordinal + 1} (${describeScope(item.scope)})`;
          console.warn(`[questions] discarded ${label}: ${outcome.message}`);
          recorder.fail({ stage: "questions", item: label, kind: outcome.failure, message: outcome.message });
        }
      }
    } catch (error) {
      if (isStageTerminal(error)) {
        console.warn(`[questions] stopped after ${accepted.length} question(s): ${error.message}`);
        return { ...recorder.finish(accepted, error), perLevelCounts };
      }
      throw error;
    }

    if (accepted.length === 0) {
      return {
        ...recorder.finish(
          accepted,
          new GenerationFailedError(`No valid question survived generation (${plan.length} attempted).`)
        ),
        perLevelCounts
      };
    }

    console.log(`[questions] kept ${accepted.length} of ${plan.length} question(s)`);
    return { ...recorder.finish(accepted), perLevelCounts };
  }

  private countFor(request: QuestionGenerationRequest, level: SoloLevel): number {
    const requested = request.questionsPerLevel;
    const count =
      typeof requested === "number" ? requested : (requested?.[level] ?? this.options.questionsPerLevelDefault);
    return Math.max(0, Math.floor(count));
  }

  private async loadMaterials(request: QuestionGenerationRequest, levels: SoloLevel[]): Promise<LessonMaterial[]> {
    if (levels.length === 0) {
      throw new DependencyMissingError("No SOLO level was requested.");
    }

    const lessonIds = [...new Set(request.lessonIds)];
    if (lessonIds.length === 0) {
      throw new DependencyMissingError("Question generation needs at least one lesson id.");
    }
    if (levels.includes("extended_abstract") && lessonIds.length !== 2) {
      throw new DependencyMissingError(
        `Extended Abstract questions need exactly two distinct lessons; received ${lessonIds.length}.`
      );
    }

    const materials: LessonMaterial[] = [];
    for (const lessonId of lessonIds) {
      const lesson = await this.repository.getLesson(lessonId);
      if (!lesson) {
        throw new DependencyMissingError(`Lesson ${lessonId} does not exist.`);
      }

      const sections = await this.repository.listSections(lessonId);
      const material: LessonMaterial = {
        lesson,
        sections: await Promise.all(
          sections.map(async (section) => ({
            section,
            learningObjects: await this.repository.listLearningObjects(section.id)
          }))
        ),
        relationships: await this.repository.listRelationships(lessonId)
      };

      if (populatedSections(material).length === 0) {
        throw new DependencyMissingError(
          `Lesson "${lesson.title}" has no sections with learning objects; parse the lesson before generating questions.`
        );
      }
      materials.push(material);
    }

    return materials;
  }

  private async generateItem(
    item: WorkItem,
    questionType: QuestionType,
    accepted: GeneratedQuestion[],
    recorder: StageRecorder
  ): Promise<DraftOutcome> {
    const lessonIds = scopeLessonIds(item.scope);
    const context: DraftContext = {
      level: item.level,
      questionType,
      primaryLessonId: lessonIds.primary,
      secondaryLessonId: lessonIds.secondary,
      sectionId: item.scope.level === "extended_abstract" ? null : item.scope.section.id,
      learningObjectId: item.scope.level === "unistructural" ? item.scope.learningObject.id : null,
      tags: [item.level, ...scopeKeywords(item.scope).slice(0, MAX_TAG_KEYWORDS)]
    };
    const earlierQuestions = accepted.map((question) => question.questionText);
    const basePrompt = this.buildUserPrompt(item, questionType, accepted);

    let lastOutcome: DraftOutcome = { failure: "JsonRecoveryFailed", message: "No response." };
    let feedback = "";

    for (let attempt = 1; attempt <= 2; attempt += 1) {
      const run = recorder.record(
        await this.runtime.runJson<Record<string, unknown> | null>({
          stage: "questions",
          agentName: `question-agent-${item.level}-${item.ordinal + 1}`,
          systemPrompt: QUESTION_SYSTEM_PROMPT,
          userPrompt: feedback ? `${basePrompt}\n\n${feedback}` : basePrompt,
          expect: "object",
          temperature: this.options.temperature,
          retryCount: 0,
          parse: (value) => unwrapQuestionObject(value),
          fallback: () => null
        })
      );

      if (run.data === null) {
        const message = run.trace.errorMessage ?? "Model response did not contain valid JSON.";
        lastOutcome = { failure: "JsonRecoveryFailed", message };
        feedback = `Your previous reply could not be parsed (${message}). Reply with the JSON object only.`;
        continue;
      }

      const question = normalizeDraft(run.data, context);
      const violations = findDraftViolations(question, earlierQuestions);
      if (violations.length === 0) {
        return { question };
      }

      lastOutcome = { failure: "ValidationFailed", message: violations.join("; ") };
      feedback = `Your previous reply was rejected: ${violations.join("; ")}. Fix these problems and reply again.`;
    }

    return lastOutcome;
  }

  private buildUserPrompt(item: WorkItem, questionType: QuestionType, accepted: GeneratedQuestion[]): string {
    const sameLevel = accepted
      .filter((question) => question.soloLevel === item.level)
      .slice(-MAX_AVOID_LIST)
      .map((question) => `- ${question.questionText}`);

    const sections = [
      `Target SOLO level: ${item.level}`,
      ["Level constraints:", ...LEVEL_CONSTRAINTS[item.level].map((constraint) => `- ${constraint}`)].join("\n"),
      `Question type: ${questionType}`,
      ["Output schema:", ...QUESTION_SCHEMAS[questionType]].join("\n"),
      ["Material:", truncate(renderScope(item.scope), this.options.scopeCharBudget)].join("\n")
    ];

    if (sameLevel.length > 0) {
      sections.push(["Do not repeat these existing questions:", ...sameLevel].join("\n"));
    }

    return sections.join("\n\n");
  }
}
