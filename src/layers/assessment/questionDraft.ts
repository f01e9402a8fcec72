import { findQuestionViolations } from "../../domain/questionRules.js";
import type { GeneratedQuestion, QuestionType, SoloLevel } from "../../domain/models.js";
import { asNumber, asString, asStringArray, isRecord } from "../../utils/json.js";
import { normalizeForComparison, wordOverlap } from "../../utils/text.js";
import { LEVEL_BLOOM, LEVEL_DIFFICULTY } from "./soloLevels.js";

const MULTIPLE_CHOICE_OPTION_COUNT = 4;
const DUPLICATE_OVERLAP_THRESHOLD = 0.7;
const LETTER_REFERENCE = /^([A-Za-z])\s*[).:]?$/;
const LETTER_PREFIX = /^([A-Za-z])[).:]\s/;

export interface DraftContext {
  level: SoloLevel;
  questionType: QuestionType;
  primaryLessonId: string;
  secondaryLessonId: string | null;
  sectionId: string | null;
  learningObjectId: string | null;
  tags: string[];
}

/** Accepts the question object itself, a one-element array, or `{ questions: [...] }`. */
export function unwrapQuestionObject(value: unknown): Record<string, unknown> {
  if (isRecord(value)) {
    const nested = value.questions;
    if (!("question" in value) && Array.isArray(nested) && isRecord(nested[0])) {
      return nested[0];
    }
    return value;
  }
  if (Array.isArray(value) && isRecord(value[0])) {
    return value[0];
  }
  throw new Error("Expected a JSON object describing one question.");
}

/**
 * Projects model JSON onto a question record. Never throws: shape problems surface
 * as violations from `findDraftViolations` so they can be fed back to the model.
 */
export function normalizeDraft(raw: Record<string, unknown>, context: DraftContext): GeneratedQuestion {
  const questionText = asString(raw.question) || asString(raw.question_text);
  const explanation = asString(raw.explanation);
  const modelDifficulty = asNumber(raw.difficulty);
  const difficulty =
    modelDifficulty !== undefined && modelDifficulty >= 0 && modelDifficulty <= 1
      ? modelDifficulty
      : LEVEL_DIFFICULTY[context.level];

  let options: string[] | null = null;
  let correctOptionIndex: number | null = null;
  let correctAnswer = asString(raw.correct_answer) || asString(raw.answer);

  if (context.questionType === "multiple_choice") {
    options = asStringArray(raw.options);
    const declaredIndex = asNumber(raw.correct_option_index);
    correctOptionIndex =
      declaredIndex !== undefined && Number.isInteger(declaredIndex)
        ? declaredIndex
        : findCorrectIndex(options, correctAnswer);

    const resolved = correctOptionIndex !== null ? options[correctOptionIndex] : undefined;
    if (
      resolved !== undefined &&
      (correctAnswer === "" || LETTER_REFERENCE.test(correctAnswer) || stripLetterPrefix(resolved) === correctAnswer)
    ) {
      correctAnswer = resolved;
    }
  } else if (context.questionType === "true_false") {
    const lowered = correctAnswer.toLowerCase();
    if (lowered === "true" || lowered === "false") {
      correctAnswer = lowered === "true" ? "True" : "False";
    }
  }

  return {
    questionText,
    soloLevel: context.level,
    questionType: context.questionType,
    options,
    correctOptionIndex,
    correctAnswer,
    explanation,
    difficulty,
    bloomLevel: LEVEL_BLOOM[context.level],
    tags: context.tags,
    primaryLessonId: context.primaryLessonId,
    secondaryLessonId: context.secondaryLessonId,
    sectionId: context.sectionId,
    learningObjectId: context.learningObjectId,
    isAiGenerated: true,
    humanModified: false
  };
}

/** Exact option text, then the option without its "A) " prefix, then a letter reference such as "B" or "B)". */
export function findCorrectIndex(options: string[], answer: string): number | null {
  if (!answer) {
    return null;
  }

  const exact = options.indexOf(answer);
  if (exact !== -1) {
    return exact;
  }

  const unprefixed = options.findIndex((option) => stripLetterPrefix(option) === answer);
  if (unprefixed !== -1) {
    return unprefixed;
  }

  const letter = LETTER_REFERENCE.exec(answer)?.[1] ?? LETTER_PREFIX.exec(answer)?.[1];
  if (letter) {
    const index = letter.toUpperCase().charCodeAt(0) - "A".charCodeAt(0);
    if (index >= 0 && index < options.length) {
      return index;
    }
  }

  return null;
}

function stripLetterPrefix(option: string): string {
  return option.replace(LETTER_PREFIX, "").trim();
}

/**
 * Structural invariants plus generation-only rules: four distinct multiple-choice
 * options, an explanation, and no near-duplicate of an earlier question in the run.
 */
export function findDraftViolations(question: GeneratedQuestion, earlierQuestions: string[]): string[] {
  const violations = findQuestionViolations(question);

  if (question.questionType === "multiple_choice" && question.options) {
    if (question.options.length !== MULTIPLE_CHOICE_OPTION_COUNT) {
      violations.push(`multiple choice questions need exactly ${MULTIPLE_CHOICE_OPTION_COUNT} options`);
    }
    const distinct = new Set(question.options.map((option) => normalizeForComparison(option)));
    if (distinct.size !== question.options.length) {
      violations.push("options must be distinct");
    }
  }

  if (!question.explanation) {
    violations.push("explanation is empty");
  }

  if (question.questionText && isNearDuplicate(question.questionText, earlierQuestions)) {
    violations.push("question repeats an earlier question; ask about something different");
  }

  return violations;
}

export function isNearDuplicate(candidate: string, earlierQuestions: string[]): boolean {
  const normalized = normalizeForComparison(candidate);
  return earlierQuestions.some(
    (earlier) =>
      normalizeForComparison(earlier) === normalized || wordOverlap(earlier, candidate) > DUPLICATE_OVERLAP_THRESHOLD
  );
}
