import { describe, expect, it } from "vitest";

import type { AgentRuntime } from "../../src/agents/runtime/agentRuntime.js";
import { DependencyMissingError, GenerationFailedError } from "../../src/domain/errors.js";
import { SoloQuestionGenerator } from "../../src/layers/assessment/soloQuestionGenerator.js";
import type { ContentRepository } from "../../src/layers/storage/contentRepository.js";
import { createTestRuntime, FakeLlmProvider, scripted, userPrompt } from "../helpers/fakeLlmProvider.js";
import { DISTINCT_QUESTIONS, questionReplies, QUESTION_AGENT, routeBySystemPrompt } from "../helpers/routedResponder.js";
import { PHOTOSYNTHESIS_SECTIONS, RESPIRATION_SECTIONS, seedCourse } from "../helpers/seedRepository.js";

function createGenerator(runtime: AgentRuntime, repository: ContentRepository): SoloQuestionGenerator {
  return new SoloQuestionGenerator(runtime, repository, {
    questionsPerLevelDefault: 3,
    questionTypeDefault: "multiple_choice",
    scopeCharBudget: 4000
  });
}

function multipleChoice(question: string, options: string[]): string {
  return JSON.stringify({
    question,
    options,
    correct_option_index: 0,
    correct_answer: options[0],
    explanation: "Stated in the lesson."
  });
}

describe("SoloQuestionGenerator", () => {
  it("generates the requested count per level within one lesson", async () => {
    const { repository, lessons } = await seedCourse([{ title: "Photosynthesis", sections: PHOTOSYNTHESIS_SECTIONS }]);
    const [lesson] = lessons;
    if (!lesson) {
      throw new Error("seed failed");
    }
    const provider = new FakeLlmProvider(
      "gemini",
      routeBySystemPrompt({ [QUESTION_AGENT]: questionReplies(DISTINCT_QUESTIONS) })
    );
    const { runtime } = createTestRuntime([provider]);

    const result = await createGenerator(runtime, repository).generate({
      lessonIds: [lesson.id],
      levels: ["unistructural", "multistructural"],
      questionsPerLevel: { unistructural: 2, multistructural: 2 }
    });

    expect(result.terminalFailure).toBeUndefined();
    expect(result.okItems).toHaveLength(4);
    expect(result.perLevelCounts).toEqual({ unistructural: 2, multistructural: 2 });
    expect(result.okItems.map((question) => question.soloLevel)).toEqual([
      "unistructural",
      "unistructural",
      "multistructural",
      "multistructural"
    ]);
    for (const question of result.okItems) {
      expect(question.options).toHaveLength(4);
      expect(question.secondaryLessonId).toBeNull();
      expect(question.primaryLessonId).toBe(lesson.id);
      expect(question.correctAnswer).toBe(question.options?.[0]);
    }

    const learningObjects = await repository.listLessonLearningObjects(lesson.id);
    expect(result.okItems.slice(0, 2).map((question) => question.learningObjectId)).toEqual(
      learningObjects.slice(0, 2).map((learningObject) => learningObject.id)
    );
    expect(result.okItems[0]?.bloomLevel).toBe("remember");
    expect(result.okItems[2]?.learningObjectId).toBeNull();
    expect(result.okItems[0]?.tags).toEqual(["unistructural", "chlorophyll", "pigment"]);
  });

  it("alternates the primary lesson for Extended Abstract questions", async () => {
    const { repository, lessons } = await seedCourse([
      { title: "Photosynthesis", sections: PHOTOSYNTHESIS_SECTIONS },
      { title: "Respiration", sections: RESPIRATION_SECTIONS }
    ]);
    const [first, second] = lessons;
    if (!first || !second) {
      throw new Error("seed failed");
    }
    const provider = new FakeLlmProvider(
      "gemini",
      routeBySystemPrompt({ [QUESTION_AGENT]: questionReplies(DISTINCT_QUESTIONS) })
    );
    const { runtime } = createTestRuntime([provider]);

    const result = await createGenerator(runtime, repository).generate({
      lessonIds: [first.id, second.id],
      levels: ["extended_abstract"],
      questionsPerLevel: 3
    });

    expect(result.okItems.map((question) => [question.primaryLessonId, question.secondaryLessonId])).toEqual([
      [first.id, second.id],
      [second.id, first.id],
      [first.id, second.id]
    ]);
    expect(result.okItems.every((question) => question.sectionId === null)).toBe(true);
    const [firstCall] = provider.calls;
    expect(firstCall && userPrompt(firstCall.request)).toContain(
      "Lesson A: Photosynthesis\nSection: Light reactions\n- Chlorophyll:"
    );
  });

  it("refuses Extended Abstract generation for a single lesson without calling the model", async () => {
    const { repository, lessons } = await seedCourse([{ title: "Photosynthesis", sections: PHOTOSYNTHESIS_SECTIONS }]);
    const [lesson] = lessons;
    if (!lesson) {
      throw new Error("seed failed");
    }
    const provider = new FakeLlmProvider("gemini", () => "{}");
    const { runtime } = createTestRuntime([provider]);

    const result = await createGenerator(runtime, repository).generate({
      lessonIds: [lesson.id],
      levels: ["extended_abstract"],
      questionsPerLevel: 2
    });

    expect(result.terminalFailure).toBeInstanceOf(DependencyMissingError);
    expect(result.okItems).toEqual([]);
    expect(provider.calls).toHaveLength(0);
  });

  it("refuses an unparsed lesson", async () => {
    const { repository, lessons } = await seedCourse([{ title: "Empty", sections: [] }]);
    const [lesson] = lessons;
    if (!lesson) {
      throw new Error("seed failed");
    }
    const provider = new FakeLlmProvider("gemini", () => "{}");
    const { runtime } = createTestRuntime([provider]);

    const result = await createGenerator(runtime, repository).generate({
      lessonIds: [lesson.id],
      levels: ["unistructural"]
    });

    expect(result.terminalFailure?.kind).toBe("DependencyMissing");
    expect(result.terminalFailure?.message).toContain('Lesson "Empty" has no sections with learning objects');
    expect(provider.calls).toHaveLength(0);
  });

  it("feeds validation problems back for one more attempt", async () => {
    const { repository, lessons } = await seedCourse([{ title: "Photosynthesis", sections: PHOTOSYNTHESIS_SECTIONS }]);
    const [lesson] = lessons;
    if (!lesson) {
      throw new Error("seed failed");
    }
    const provider = new FakeLlmProvider(
      "gemini",
      scripted([
        multipleChoice("Which pigment absorbs red and blue light?", ["Chlorophyll", "Keratin", "Melanin"]),
        multipleChoice("Which pigment absorbs red and blue light?", ["Chlorophyll", "Keratin", "Melanin", "Hemoglobin"])
      ])
    );
    const { runtime } = createTestRuntime([provider]);

    const result = await createGenerator(runtime, repository).generate({
      lessonIds: [lesson.id],
      levels: ["unistructural"],
      questionsPerLevel: 1
    });

    expect(result.okItems).toHaveLength(1);
    expect(result.failedItems).toEqual([]);
    expect(provider.calls).toHaveLength(2);
    const [, retry] = provider.calls;
    expect(retry && userPrompt(retry.request)).toContain(
      "Your previous reply was rejected: multiple choice questions need exactly 4 options."
    );
  });

  it("discards a near-duplicate of an earlier question", async () => {
    const { repository, lessons } = await seedCourse([{ title: "Photosynthesis", sections: PHOTOSYNTHESIS_SECTIONS }]);
    const [lesson] = lessons;
    if (!lesson) {
      throw new Error("seed failed");
    }
    const repeated = multipleChoice("Which pigment absorbs red and blue light?", [
      "Chlorophyll",
      "Keratin",
      "Melanin",
      "Hemoglobin"
    ]);
    const provider = new FakeLlmProvider("gemini", () => repeated);
    const { runtime } = createTestRuntime([provider]);

    const result = await createGenerator(runtime, repository).generate({
      lessonIds: [lesson.id],
      levels: ["unistructural"],
      questionsPerLevel: 2
    });

    expect(result.okItems).toHaveLength(1);
    expect(result.perLevelCounts).toEqual({ unistructural: 1 });
    expect(result.failedItems).toEqual([
      expect.objectContaining({ stage: "questions", kind: "ValidationFailed", item: "unistructural #2 (Photosynthesis / Photolysis)" })
    ]);
    expect(provider.calls).toHaveLength(3);
  });

  it("reports GenerationFailed when nothing survives", async () => {
    const { repository, lessons } = await seedCourse([{ title: "Photosynthesis", sections: PHOTOSYNTHESIS_SECTIONS }]);
    const [lesson] = lessons;
    if (!lesson) {
      throw new Error("seed failed");
    }
    const provider = new FakeLlmProvider("gemini", () => "I would rather not write a question.");
    const { runtime } = createTestRuntime([provider]);

    const result = await createGenerator(runtime, repository).generate({
      lessonIds: [lesson.id],
      levels: ["unistructural"],
      questionsPerLevel: 1
    });

    expect(result.okItems).toEqual([]);
    expect(result.terminalFailure).toBeInstanceOf(GenerationFailedError);
    expect(result.failedItems.map((item) => item.kind)).toEqual(["JsonRecoveryFailed"]);
    expect(provider.calls).toHaveLength(2);
  });

  it("stops and keeps survivors when every provider is exhausted", async () => {
    const { repository, lessons } = await seedCourse([{ title: "Photosynthesis", sections: PHOTOSYNTHESIS_SECTIONS }]);
    const [lesson] = lessons;
    if (!lesson) {
      throw new Error("seed failed");
    }
    const first = multipleChoice("Which pigment absorbs red and blue light?", [
      "Chlorophyll",
      "Keratin",
      "Melanin",
      "Hemoglobin"
    ]);
    const provider = new FakeLlmProvider("gemini", scripted([first]));
    const { runtime } = createTestRuntime([provider]);

    const result = await createGenerator(runtime, repository).generate({
      lessonIds: [lesson.id],
      levels: ["unistructural"],
      questionsPerLevel: 3
    });

    expect(result.okItems).toHaveLength(1);
    expect(result.terminalFailure?.kind).toBe("AllProvidersExhausted");
  });
});
