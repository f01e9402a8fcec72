import type { GeneratedQuestion } from "./models.js";

export const TRUE_FALSE_ANSWERS = ["True", "False"] as const;

/** Every structural invariant a stored question must satisfy; empty when valid. */
export function findQuestionViolations(question: GeneratedQuestion): string[] {
  const violations: string[] = [];

  if (!question.questionText.trim()) {
    violations.push("question text is empty");
  }
  if (!question.primaryLessonId) {
    violations.push("primary lesson is missing");
  }

  if (question.soloLevel === "extended_abstract") {
    if (!question.secondaryLessonId) {
      violations.push("extended_abstract questions need a secondary lesson");
    } else if (question.secondaryLessonId === question.primaryLessonId) {
      violations.push("secondary lesson must differ from the primary lesson");
    }
  } else if (question.secondaryLessonId !== null) {
    violations.push(`${question.soloLevel} questions must not have a secondary lesson`);
  }

  switch (question.questionType) {
    case "multiple_choice": {
      const options = question.options ?? [];
      const index = question.correctOptionIndex;
      if (options.length < 2) {
        violations.push("multiple choice questions need at least two options");
      }
      if (index === null || !Number.isInteger(index) || index < 0 || index >= options.length) {
        violations.push("correct_option_index is out of range");
      } else if (options[index] !== question.correctAnswer) {
        violations.push("correct_answer must equal options[correct_option_index]");
      }
      break;
    }
    case "true_false":
      if (!TRUE_FALSE_ANSWERS.some((answer) => answer === question.correctAnswer)) {
        violations.push('true/false answers must be "True" or "False"');
      }
      break;
    case "short_answer":
      if (!question.correctAnswer.trim()) {
        violations.push("short answer questions need a model answer");
      }
      break;
  }

  if (!Number.isFinite(question.difficulty) || question.difficulty < 0 || question.difficulty > 1) {
    violations.push("difficulty must lie in [0, 1]");
  }

  return violations;
}
