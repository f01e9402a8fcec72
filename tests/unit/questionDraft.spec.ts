import { describe, expect, it } from "vitest";

import {
  findCorrectIndex,
  findDraftViolations,
  isNearDuplicate,
  normalizeDraft,
  unwrapQuestionObject,
  type DraftContext
} from "../../src/layers/assessment/questionDraft.js";

const CONTEXT: DraftContext = {
  level: "multistructural",
  questionType: "multiple_choice",
  primaryLessonId: "lesson-1",
  secondaryLessonId: null,
  sectionId: "section-1",
  learningObjectId: null,
  tags: ["multistructural"]
};

describe("findCorrectIndex", () => {
  const options = ["A) Mitosis", "B) Meiosis", "C) Osmosis", "D) Diffusion"];

  it("resolves exact text, unprefixed text and letter references", () => {
    expect(findCorrectIndex(options, "B) Meiosis")).toBe(1);
    expect(findCorrectIndex(options, "Osmosis")).toBe(2);
    expect(findCorrectIndex(options, "d")).toBe(3);
    expect(findCorrectIndex(options, "A) something else")).toBe(0);
    expect(findCorrectIndex(options, "Photosynthesis")).toBeNull();
    expect(findCorrectIndex(options, "")).toBeNull();
  });
});

describe("normalizeDraft", () => {
  it("reads the answer back from the options when the model gives a letter", () => {
    const question = normalizeDraft(
      {
        question: "Which processes move water?",
        options: ["A) Mitosis", "B) Osmosis", "C) Meiosis", "D) Budding"],
        correct_answer: "B",
        explanation: "Osmosis moves water."
      },
      CONTEXT
    );

    expect(question.correctOptionIndex).toBe(1);
    expect(question.correctAnswer).toBe("B) Osmosis");
    expect(question.difficulty).toBe(0.4);
    expect(question.bloomLevel).toBe("understand");
    expect(findDraftViolations(question, [])).toEqual([]);
  });

  it("canonicalizes true/false answers", () => {
    const question = normalizeDraft(
      { question: "Osmosis needs ATP.", correct_answer: "false", explanation: "It is passive.", difficulty: 3 },
      { ...CONTEXT, questionType: "true_false" }
    );

    expect(question.correctAnswer).toBe("False");
    expect(question.options).toBeNull();
    expect(question.difficulty).toBe(0.4);
  });

  it("leaves shape problems to the violation check", () => {
    const question = normalizeDraft(
      { question: "", options: ["Same", "same", "Other"], correct_option_index: 7 },
      CONTEXT
    );

    expect(findDraftViolations(question, [])).toEqual([
      "question text is empty",
      "correct_option_index is out of range",
      "multiple choice questions need exactly 4 options",
      "options must be distinct",
      "explanation is empty"
    ]);
  });
});

describe("unwrapQuestionObject", () => {
  it("accepts a bare object, a one-element array or a questions wrapper", () => {
    const question = { question: "Why?" };
    expect(unwrapQuestionObject(question)).toBe(question);
    expect(unwrapQuestionObject([question])).toBe(question);
    expect(unwrapQuestionObject({ questions: [question] })).toBe(question);
    expect(() => unwrapQuestionObject("text")).toThrow("Expected a JSON object describing one question.");
  });
});

describe("isNearDuplicate", () => {
  it("flags rewordings with heavy word overlap", () => {
    expect(isNearDuplicate("What is osmosis in plant cells?", ["What is osmosis in plant cells"])).toBe(true);
    expect(isNearDuplicate("What is osmosis in plant cells?", ["Describe how animal cells divide."])).toBe(false);
  });
});
