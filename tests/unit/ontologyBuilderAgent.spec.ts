import { describe, expect, it } from "vitest";

import type { LearningObject } from "../../src/domain/models.js";
import { OntologyBuilderAgent, resolveRelationships } from "../../src/layers/ontology/ontologyBuilderAgent.js";
import { createTestRuntime, FakeLlmProvider, userPrompt } from "../helpers/fakeLlmProvider.js";
import { PHOTOSYNTHESIS_SECTIONS, seedCourse } from "../helpers/seedRepository.js";

function learningObject(id: string, title: string): LearningObject {
  return { id, sectionId: "section-1", order: 0, title, content: `${title} content.`, objectType: "concept", keywords: [] };
}

const LEARNING_OBJECTS = [
  learningObject("lo-1", "Chlorophyll"),
  learningObject("lo-2", "Photolysis"),
  learningObject("lo-3", "Carbon fixation")
];

describe("resolveRelationships", () => {
  it("keeps only typed, resolvable, non-looping, distinct relationships", () => {
    const relationships = resolveRelationships(
      [
        { sourceTitle: "Chlorophyll", targetTitle: "Photolysis", type: "prerequisite", description: "drives" },
        { sourceTitle: " photolysis ", targetTitle: "CARBON FIXATION", type: "part of", description: "feeds" },
        { sourceTitle: "Chlorophyll", targetTitle: "Chlorophyll", type: "related_to", description: "loop" },
        { sourceTitle: "Chlorophyll", targetTitle: "Stomata", type: "related_to", description: "unknown" },
        { sourceTitle: "Chlorophyll", targetTitle: "Photolysis", type: "causes", description: "bad type" },
        { sourceTitle: "Chlorophyll", targetTitle: "Photolysis", type: "prerequisite", description: "repeat" }
      ],
      LEARNING_OBJECTS
    );

    expect(relationships).toEqual([
      { sourceId: "lo-1", targetId: "lo-2", type: "prerequisite", description: "drives" },
      { sourceId: "lo-2", targetId: "lo-3", type: "part_of", description: "feeds" }
    ]);
  });
});

describe("OntologyBuilderAgent", () => {
  const lesson = { id: "lesson-1", title: "Photosynthesis", rawText: "Light reactions feed the Calvin cycle." };

  it("builds relationships whose endpoints belong to the lesson", async () => {
    const provider = new FakeLlmProvider("gemini", () =>
      JSON.stringify([
        { source_title: "Chlorophyll", target_title: "Photolysis", type: "prerequisite", description: "Light first." },
        { source_title: "Photolysis", target_title: "Ghost concept", type: "related_to", description: "Dropped." }
      ])
    );
    const { runtime } = createTestRuntime([provider]);

    const result = await new OntologyBuilderAgent(runtime, 10000).build({ lesson, learningObjects: LEARNING_OBJECTS });

    expect(result.okItems).toEqual([
      { sourceId: "lo-1", targetId: "lo-2", type: "prerequisite", description: "Light first." }
    ]);
    const ids = new Set(LEARNING_OBJECTS.map((entry) => entry.id));
    for (const relationship of result.okItems) {
      expect(ids.has(relationship.sourceId) && ids.has(relationship.targetId)).toBe(true);
      expect(relationship.sourceId).not.toBe(relationship.targetId);
    }
    const [call] = provider.calls;
    expect(call && userPrompt(call.request)).toContain('"Carbon fixation"');
  });

  it("skips the model when fewer than two learning objects exist", async () => {
    const provider = new FakeLlmProvider("gemini", () => "[]");
    const { runtime } = createTestRuntime([provider]);

    const result = await new OntologyBuilderAgent(runtime, 10000).build({
      lesson,
      learningObjects: LEARNING_OBJECTS.slice(0, 1)
    });

    expect(result.okItems).toEqual([]);
    expect(provider.calls).toHaveLength(0);
  });

  it("records a failed item when the reply holds no JSON", async () => {
    const provider = new FakeLlmProvider("gemini", () => "No relationships come to mind.");
    const { runtime } = createTestRuntime([provider]);

    const result = await new OntologyBuilderAgent(runtime, 10000).build({ lesson, learningObjects: LEARNING_OBJECTS });

    expect(result.okItems).toEqual([]);
    expect(result.failedItems).toEqual([
      expect.objectContaining({ stage: "ontology", item: "Photosynthesis", kind: "JsonRecoveryFailed" })
    ]);
    expect(result.terminalFailure).toBeUndefined();
  });
});

describe("relationship replacement", () => {
  it("leaves exactly the new set after a rebuild", async () => {
    const { repository, lessons } = await seedCourse([{ title: "Photosynthesis", sections: PHOTOSYNTHESIS_SECTIONS }]);
    const [lesson] = lessons;
    if (!lesson) {
      throw new Error("seed failed");
    }
    const [chlorophyll, photolysis, fixation] = await repository.listLessonLearningObjects(lesson.id);
    if (!chlorophyll || !photolysis || !fixation) {
      throw new Error("seed failed");
    }

    await repository.replaceRelationships(lesson.id, [
      { sourceId: chlorophyll.id, targetId: photolysis.id, type: "prerequisite", description: "R1" },
      { sourceId: photolysis.id, targetId: fixation.id, type: "part_of", description: "R2" },
      { sourceId: chlorophyll.id, targetId: fixation.id, type: "related_to", description: "R3" }
    ]);
    await repository.replaceRelationships(lesson.id, [
      { sourceId: chlorophyll.id, targetId: photolysis.id, type: "prerequisite", description: "R1'" },
      { sourceId: fixation.id, targetId: photolysis.id, type: "related_to", description: "R2'" }
    ]);

    const stored = await repository.listRelationships(lesson.id);
    expect(stored.map((relationship) => relationship.description)).toEqual(["R1'", "R2'"]);
  });

  it("rejects a set that leaves the lesson without touching the stored one", async () => {
    const { repository, lessons } = await seedCourse([
      { title: "Photosynthesis", sections: PHOTOSYNTHESIS_SECTIONS },
      { title: "Respiration", sections: PHOTOSYNTHESIS_SECTIONS.slice(0, 1) }
    ]);
    const [first, second] = lessons;
    if (!first || !second) {
      throw new Error("seed failed");
    }
    const [own, ownOther] = await repository.listLessonLearningObjects(first.id);
    const [foreign] = await repository.listLessonLearningObjects(second.id);
    if (!own || !ownOther || !foreign) {
      throw new Error("seed failed");
    }
    await repository.replaceRelationships(first.id, [
      { sourceId: own.id, targetId: ownOther.id, type: "prerequisite", description: "kept" }
    ]);

    await expect(
      repository.replaceRelationships(first.id, [
        { sourceId: own.id, targetId: foreign.id, type: "related_to", description: "crosses lessons" }
      ])
    ).rejects.toThrow(/leaves lesson/);
    expect((await repository.listRelationships(first.id)).map((relationship) => relationship.description)).toEqual([
      "kept"
    ]);
  });
});
