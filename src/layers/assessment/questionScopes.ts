import type { LearningObject, Lesson, OntologyRelationship, Section, SoloLevel } from "../../domain/models.js";

export interface SectionMaterial {
  section: Section;
  learningObjects: LearningObject[];
}

export interface LessonMaterial {
  lesson: Lesson;
  sections: SectionMaterial[];
  relationships: OntologyRelationship[];
}

export type QuestionScope =
  | { level: "unistructural"; lesson: Lesson; section: Section; learningObject: LearningObject }
  | { level: "multistructural"; lesson: Lesson; section: Section; learningObjects: LearningObject[] }
  | {
      level: "relational";
      lesson: Lesson;
      section: Section;
      learningObjects: LearningObject[];
      relationships: OntologyRelationship[];
    }
  | { level: "extended_abstract"; primary: LessonMaterial; secondary: LessonMaterial };

export interface WorkItem {
  level: SoloLevel;
  ordinal: number;
  scope: QuestionScope;
}

/**
 * Lays out `count` items per level in the order given. Item i of a level uses
 * lesson i mod n; the learning object or section within it advances every full
 * pass over the lessons. Extended Abstract alternates which lesson is primary.
 */
export function buildWorkPlan(
  materials: LessonMaterial[],
  levels: ReadonlyArray<readonly [SoloLevel, number]>
): WorkItem[] {
  const plan: WorkItem[] = [];

  for (const [level, count] of levels) {
    for (let ordinal = 0; ordinal < count; ordinal += 1) {
      plan.push({ level, ordinal, scope: chooseScope(materials, level, ordinal) });
    }
  }

  return plan;
}

function chooseScope(materials: LessonMaterial[], level: SoloLevel, ordinal: number): QuestionScope {
  if (level === "extended_abstract") {
    const [first, second] = materials;
    return ordinal % 2 === 0
      ? { level, primary: first, secondary: second }
      : { level, primary: second, secondary: first };
  }

  const material = materials[ordinal % materials.length];
  const pass = Math.floor(ordinal / materials.length);
  const populated = populatedSections(material);

  if (level === "unistructural") {
    const candidates = populated.flatMap((entry) =>
      entry.learningObjects.map((learningObject) => ({ section: entry.section, learningObject }))
    );
    const chosen = candidates[pass % candidates.length];
    return { level, lesson: material.lesson, section: chosen.section, learningObject: chosen.learningObject };
  }

  const chosen = populated[pass % populated.length];
  if (level === "multistructural") {
    return { level, lesson: material.lesson, section: chosen.section, learningObjects: chosen.learningObjects };
  }

  const ids = new Set(chosen.learningObjects.map((learningObject) => learningObject.id));
  return {
    level,
    lesson: material.lesson,
    section: chosen.section,
    learningObjects: chosen.learningObjects,
    relationships: material.relationships.filter(
      (relationship) => ids.has(relationship.sourceId) || ids.has(relationship.targetId)
    )
  };
}

export function populatedSections(material: LessonMaterial): SectionMaterial[] {
  return material.sections.filter((entry) => entry.learningObjects.length > 0);
}

export function scopeLessonIds(scope: QuestionScope): { primary: string; secondary: string | null } {
  return scope.level === "extended_abstract"
    ? { primary: scope.primary.lesson.id, secondary: scope.secondary.lesson.id }
    : { primary: scope.lesson.id, secondary: null };
}

export function describeScope(scope: QuestionScope): string {
  switch (scope.level) {
    case "unistructural":
      return `${scope.lesson.title} / ${scope.learningObject.title}`;
    case "multistructural":
    case "relational":
      return `${scope.lesson.title} / ${scope.section.title}`;
    case "extended_abstract":
      return `${scope.primary.lesson.title} + ${scope.secondary.lesson.title}`;
  }
}

/** Renders the material a question may draw on, with endpoint titles for relationships. */
export function renderScope(scope: QuestionScope): string {
  switch (scope.level) {
    case "unistructural":
      return [
        `Lesson: ${scope.lesson.title}`,
        `Section: ${scope.section.title}`,
        `Learning object (${scope.learningObject.objectType}): ${scope.learningObject.title}`,
        scope.learningObject.content,
        `Keywords: ${scope.learningObject.keywords.join(", ")}`
      ].join("\n");
    case "multistructural":
      return [renderSectionHeader(scope.lesson, scope.section), renderLearningObjects(scope.learningObjects)].join(
        "\n"
      );
    case "relational":
      return [
        renderSectionHeader(scope.lesson, scope.section),
        renderLearningObjects(scope.learningObjects),
        "Relationships:",
        scope.relationships.length > 0
          ? renderRelationships(scope.relationships, scope.learningObjects)
          : "- (none recorded; infer connections from the content)"
      ].join("\n");
    case "extended_abstract":
      return [renderLessonDigest("Lesson A", scope.primary), "", renderLessonDigest("Lesson B", scope.secondary)].join(
        "\n"
      );
  }
}

function renderSectionHeader(lesson: Lesson, section: Section): string {
  const lines = [`Lesson: ${lesson.title}`, `Section: ${section.title}`];
  if (section.summary) {
    lines.push(`Section summary: ${section.summary}`);
  }
  lines.push("Learning objects:");
  return lines.join("\n");
}

function renderLearningObjects(learningObjects: LearningObject[]): string {
  return learningObjects
    .map((learningObject) => `- ${learningObject.title} (${learningObject.objectType}): ${learningObject.content}`)
    .join("\n");
}

function renderRelationships(relationships: OntologyRelationship[], learningObjects: LearningObject[]): string {
  const titles = new Map(learningObjects.map((learningObject) => [learningObject.id, learningObject.title]));
  return relationships
    .map((relationship) => {
      const source = titles.get(relationship.sourceId) ?? "another concept in the lesson";
      const target = titles.get(relationship.targetId) ?? "another concept in the lesson";
      const suffix = relationship.description ? `: ${relationship.description}` : "";
      return `- ${source} --${relationship.type}--> ${target}${suffix}`;
    })
    .join("\n");
}

function renderLessonDigest(label: string, material: LessonMaterial): string {
  const lines = [`${label}: ${material.lesson.title}`];
  if (material.lesson.summary) {
    lines.push(`Summary: ${material.lesson.summary}`);
  }
  for (const entry of populatedSections(material)) {
    lines.push(`Section: ${entry.section.title}`);
    for (const learningObject of entry.learningObjects) {
      lines.push(`- ${learningObject.title}: ${learningObject.content}`);
    }
  }
  return lines.join("\n");
}

export function scopeKeywords(scope: QuestionScope): string[] {
  const learningObjects =
    scope.level === "unistructural"
      ? [scope.learningObject]
      : scope.level === "extended_abstract"
        ? [...populatedSections(scope.primary), ...populatedSections(scope.secondary)].flatMap(
            (entry) => entry.learningObjects
          )
        : scope.learningObjects;
  return [...new Set(learningObjects.flatMap((learningObject) => learningObject.keywords))];
}
