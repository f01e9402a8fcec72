import { describe, expect, it } from "vitest";

import type { AgentRuntime } from "../../src/agents/runtime/agentRuntime.js";
import type { Course } from "../../src/domain/models.js";
import type { ContentRepository } from "../../src/layers/storage/contentRepository.js";
import { InMemoryContentRepository } from "../../src/layers/storage/inMemoryContentRepository.js";
import { ChatbotAgent, matchLearningObjects, offlineReply } from "../../src/layers/chatbot/chatbotAgent.js";
import { createTestRuntime, FakeLlmProvider, httpError } from "../helpers/fakeLlmProvider.js";
import { PHOTOSYNTHESIS_SECTIONS, RESPIRATION_SECTIONS, seedCourse } from "../helpers/seedRepository.js";

const BUDGETS = { summaryChars: 500, maxTitles: 10, maxRelationships: 5 };

function createChatbot(runtime: AgentRuntime, repository: ContentRepository): ChatbotAgent {
  return new ChatbotAgent(runtime, repository, BUDGETS);
}

async function seedBiology() {
  const seeded = await seedCourse([
    { title: "Photosynthesis", sections: PHOTOSYNTHESIS_SECTIONS, summary: "Plants turn light into sugar." },
    { title: "Respiration", sections: RESPIRATION_SECTIONS }
  ]);
  const [photosynthesis] = seeded.lessons;
  if (!photosynthesis) {
    throw new Error("seed failed");
  }
  const [chlorophyll, photolysis] = await seeded.repository.listLessonLearningObjects(photosynthesis.id);
  if (!chlorophyll || !photolysis) {
    throw new Error("seed failed");
  }
  await seeded.repository.replaceRelationships(photosynthesis.id, [
    { sourceId: chlorophyll.id, targetId: photolysis.id, type: "prerequisite", description: "Light first." }
  ]);
  return { ...seeded, photosynthesis };
}

describe("ChatbotAgent", () => {
  it("grounds a lesson question in titles, relationships and matching learning objects", async () => {
    const { repository, photosynthesis } = await seedBiology();
    const { runtime } = createTestRuntime([new FakeLlmProvider("gemini", () => "unused")]);

    const context = await createChatbot(runtime, repository).buildContext({
      message: "How does photolysis release oxygen?",
      lessonId: photosynthesis.id
    });

    expect(context).toBe(
      [
        "Lesson: Photosynthesis",
        "Summary: Plants turn light into sugar.",
        "Sections and learning objects:",
        "- Light reactions",
        "  - Chlorophyll (definition)",
        "  - Photolysis (procedure)",
        "- Calvin cycle",
        "  - Carbon fixation (concept)",
        "Relationships:",
        "- Chlorophyll --prerequisite--> Photolysis",
        "Most relevant learning objects:",
        "- Photolysis: Photolysis splits water molecules into hydrogen ions, electrons and oxygen."
      ].join("\n")
    );
  });

  it("summarizes the course when no lesson is given", async () => {
    const { repository, courseId } = await seedBiology();
    const { runtime } = createTestRuntime([new FakeLlmProvider("gemini", () => "unused")]);

    const context = await createChatbot(runtime, repository).buildContext({ message: "glucose breakdown", courseId });

    expect(context).toBe(
      [
        "Course: Biology 101",
        "Lessons:",
        "- Photosynthesis: Plants turn light into sugar.",
        "- Respiration",
        "Most relevant learning objects:",
        "- Glycolysis: Glycolysis converts one glucose into two pyruvate molecules."
      ].join("\n")
    );
  });

  it("sends the context and the last six history messages to the model", async () => {
    const { repository, photosynthesis } = await seedBiology();
    const provider = new FakeLlmProvider("gemini", () => "  Chlorophyll captures the light.  ");
    const { runtime } = createTestRuntime([provider]);
    const history = Array.from({ length: 8 }, (_, index) => ({
      role: index % 2 === 0 ? ("user" as const) : ("assistant" as const),
      content: `turn ${index + 1}`
    }));

    const reply = await createChatbot(runtime, repository).respond({
      message: "What does chlorophyll do?",
      lessonId: photosynthesis.id,
      history
    });

    expect(reply).toEqual(
      expect.objectContaining({ response: "Chlorophyll captures the light.", source: "llm", contextUsed: true })
    );
    const [call] = provider.calls;
    const messages = call?.request.messages ?? [];
    expect(messages.map((message) => message.content).slice(1)).toEqual([
      "turn 3",
      "turn 4",
      "turn 5",
      "turn 6",
      "turn 7",
      "turn 8",
      "What does chlorophyll do?"
    ]);
    expect(messages[0]?.content).toContain("Course context:\nLesson: Photosynthesis\n");
    expect(call?.request.maxTokens).toBe(800);
  });

  it("answers without context for an unknown lesson", async () => {
    const { repository } = await seedBiology();
    const provider = new FakeLlmProvider("gemini", () => "General answer.");
    const { runtime } = createTestRuntime([provider]);

    const reply = await createChatbot(runtime, repository).respond({ message: "Hi there", lessonId: "lesson-missing" });

    expect(reply.contextUsed).toBe(false);
    expect(reply.source).toBe("llm");
    expect(provider.calls[0]?.request.messages[0]?.content).not.toContain("Course context:");
  });

  it("falls back to an offline reply when every provider is exhausted", async () => {
    const { repository, photosynthesis } = await seedBiology();
    const { runtime } = createTestRuntime([new FakeLlmProvider("gemini", () => httpError(401, "invalid key"))]);

    const reply = await createChatbot(runtime, repository).respond({
      message: "How does photolysis release oxygen?",
      lessonId: photosynthesis.id
    });

    expect(reply).toEqual({
      response:
        "The tutor is offline right now. Your question is about photolysis, release, oxygen; review the lesson sections on photolysis, release, oxygen and ask again shortly.",
      source: "offline",
      contextUsed: false
    });
  });

  it("rethrows failures that are not provider exhaustion", async () => {
    class UnreachableRepository extends InMemoryContentRepository {
      override async getCourse(): Promise<Course | null> {
        throw new Error("storage offline");
      }
    }
    const { runtime } = createTestRuntime([new FakeLlmProvider("gemini", () => "unused")]);

    await expect(
      createChatbot(runtime, new UnreachableRepository()).respond({ message: "Hello", courseId: "course-1" })
    ).rejects.toThrow("storage offline");
  });
});

describe("offlineReply", () => {
  it("greets", () => {
    expect(offlineReply("Good morning!")).toBe(
      "Hello! The tutor is offline at the moment, but you can still browse your lessons and quizzes. Ask again in a little while."
    );
  });

  it("describes what the tutor can do", () => {
    expect(offlineReply("I need help")).toBe(
      "I can explain concepts from your lessons, connect ideas across sections and help you prepare for quizzes. The tutor is offline right now, so please try again shortly."
    );
  });

  it("falls back to a generic line when no topic can be read", () => {
    expect(offlineReply("why?")).toBe("The tutor is offline right now. Please try again shortly.");
  });
});

describe("matchLearningObjects", () => {
  it("ranks by the number of matching terms and keeps source order on ties", async () => {
    const { repository, photosynthesis } = await seedBiology();
    const learningObjects = await repository.listLessonLearningObjects(photosynthesis.id);

    expect(
      matchLearningObjects(learningObjects, "water oxygen carbon").map((learningObject) => learningObject.title)
    ).toEqual(["Photolysis", "Carbon fixation"]);
    expect(matchLearningObjects(learningObjects, "why?")).toEqual([]);
  });
});
