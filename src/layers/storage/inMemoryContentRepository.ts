import type { LessonDeletionPolicy } from "../../config/runtimeConfig.js";
import { ValidationFailedError } from "../../domain/errors.js";
import { findQuestionViolations } from "../../domain/questionRules.js";
import type {
  Course,
  ExtractedRelationship,
  ExtractedSection,
  GeneratedQuestion,
  LearningObject,
  Lesson,
  OntologyRelationship,
  Question,
  Quiz,
  Section,
  TranslatableEntityKind,
  Translation,
  TranslationInput
} from "../../domain/models.js";
import type {
  ContentRepository,
  LearningObjectPatch,
  LessonPatch,
  NewCourse,
  NewLesson,
  NewQuiz,
  QuestionFilter,
  QuestionPatch,
  SectionPatch,
  StoredLessonContent
} from "./contentRepository.js";

export interface InMemoryContentRepositoryOptions {
  lessonDeletionPolicy?: LessonDeletionPolicy;
}

/**
 * Process-local repository used by the batch runner and the tests. Each method
 * mutates its maps without awaiting, so every operation is atomic to other callers.
 */
export class InMemoryContentRepository implements ContentRepository {
  private readonly courses = new Map<string, Course>();
  private readonly lessons = new Map<string, Lesson>();
  private readonly sections = new Map<string, Section>();
  private readonly learningObjects = new Map<string, LearningObject>();
  private readonly relationships = new Map<string, OntologyRelationship>();
  private readonly questions = new Map<string, Question>();
  private readonly quizzes = new Map<string, Quiz>();
  private readonly translations = new Map<string, Translation>();
  private readonly counters = new Map<string, number>();
  private readonly lessonDeletionPolicy: LessonDeletionPolicy;

  constructor(options: InMemoryContentRepositoryOptions = {}) {
    this.lessonDeletionPolicy = options.lessonDeletionPolicy ?? "refuse";
  }

  async createCourse(input: NewCourse): Promise<Course> {
    const course: Course = { ...input, id: this.nextId("course"), createdAt: new Date().toISOString() };
    this.courses.set(course.id, course);
    return structuredClone(course);
  }

  async getCourse(courseId: string): Promise<Course | null> {
    return cloneOrNull(this.courses.get(courseId));
  }

  async listCourses(): Promise<Course[]> {
    return [...this.courses.values()].map((course) => structuredClone(course));
  }

  async deleteCourse(courseId: string): Promise<void> {
    this.require(this.courses, courseId, "Course");
    const lessonIds = [...this.lessons.values()].filter((lesson) => lesson.courseId === courseId).map((lesson) => lesson.id);
    for (const lessonId of lessonIds) {
      this.assertLessonDeletable(lessonId);
    }
    for (const lessonId of lessonIds) {
      this.removeLesson(lessonId);
    }
    for (const quiz of [...this.quizzes.values()].filter((candidate) => candidate.courseId === courseId)) {
      this.quizzes.delete(quiz.id);
    }
    this.courses.delete(courseId);
  }

  async createLesson(input: NewLesson): Promise<Lesson> {
    this.require(this.courses, input.courseId, "Course");
    const lesson: Lesson = { ...input, id: this.nextId("lesson"), createdAt: new Date().toISOString() };
    this.lessons.set(lesson.id, lesson);
    return structuredClone(lesson);
  }

  async getLesson(lessonId: string): Promise<Lesson | null> {
    return cloneOrNull(this.lessons.get(lessonId));
  }

  async listLessons(courseId: string): Promise<Lesson[]> {
    return [...this.lessons.values()]
      .filter((lesson) => lesson.courseId === courseId)
      .map((lesson) => structuredClone(lesson));
  }

  async updateLesson(lessonId: string, patch: LessonPatch): Promise<Lesson> {
    const lesson = { ...this.require(this.lessons, lessonId, "Lesson"), ...patch };
    this.lessons.set(lessonId, lesson);
    this.clearTranslations("lesson", lessonId);
    return structuredClone(lesson);
  }

  async deleteLesson(lessonId: string): Promise<void> {
    this.require(this.lessons, lessonId, "Lesson");
    this.assertLessonDeletable(lessonId);
    this.removeLesson(lessonId);
  }

  async replaceLessonContent(
    lessonId: string,
    sections: ExtractedSection[],
    summary: string
  ): Promise<StoredLessonContent> {
    const lesson = this.require(this.lessons, lessonId, "Lesson");

    for (const section of this.sectionsOf(lessonId)) {
      this.removeSection(section.id);
    }

    const storedSections: Section[] = [];
    const storedLearningObjects: LearningObject[] = [];

    sections.forEach((extracted, sectionIndex) => {
      const section: Section = {
        id: this.nextId("section"),
        lessonId,
        order: sectionIndex,
        title: extracted.title,
        content: extracted.content,
        ...(extracted.summary ? { summary: extracted.summary } : {}),
        ...(extracted.startPage !== undefined ? { startPage: extracted.startPage } : {}),
        ...(extracted.endPage !== undefined ? { endPage: extracted.endPage } : {})
      };
      this.sections.set(section.id, section);
      storedSections.push(structuredClone(section));

      extracted.learningObjects.forEach((extractedObject, objectIndex) => {
        const learningObject: LearningObject = {
          id: this.nextId("lo"),
          sectionId: section.id,
          order: objectIndex,
          title: extractedObject.title,
          content: extractedObject.content,
          objectType: extractedObject.objectType,
          keywords: [...extractedObject.keywords]
        };
        this.learningObjects.set(learningObject.id, learningObject);
        storedLearningObjects.push(structuredClone(learningObject));
      });
    });

    this.lessons.set(lessonId, summary ? { ...lesson, summary } : withoutSummary(lesson));
    this.clearTranslations("lesson", lessonId);

    return { sections: storedSections, learningObjects: storedLearningObjects };
  }

  async listSections(lessonId: string): Promise<Section[]> {
    return this.sectionsOf(lessonId).map((section) => structuredClone(section));
  }

  async getSection(sectionId: string): Promise<Section | null> {
    return cloneOrNull(this.sections.get(sectionId));
  }

  async updateSection(sectionId: string, patch: SectionPatch): Promise<Section> {
    const section = { ...this.require(this.sections, sectionId, "Section"), ...patch };
    this.sections.set(sectionId, section);
    this.clearTranslations("section", sectionId);
    return structuredClone(section);
  }

  async deleteSection(sectionId: string): Promise<void> {
    this.require(this.sections, sectionId, "Section");
    this.removeSection(sectionId);
  }

  async listLearningObjects(sectionId: string): Promise<LearningObject[]> {
    return this.learningObjectsOf(sectionId).map((learningObject) => structuredClone(learningObject));
  }

  async listLessonLearningObjects(lessonId: string): Promise<LearningObject[]> {
    return this.sectionsOf(lessonId)
      .flatMap((section) => this.learningObjectsOf(section.id))
      .map((learningObject) => structuredClone(learningObject));
  }

  async getLearningObject(learningObjectId: string): Promise<LearningObject | null> {
    return cloneOrNull(this.learningObjects.get(learningObjectId));
  }

  async updateLearningObject(learningObjectId: string, patch: LearningObjectPatch): Promise<LearningObject> {
    const learningObject = { ...this.require(this.learningObjects, learningObjectId, "Learning object"), ...patch };
    this.learningObjects.set(learningObjectId, learningObject);
    this.clearTranslations("learning_object", learningObjectId);
    return structuredClone(learningObject);
  }

  async deleteLearningObject(learningObjectId: string): Promise<void> {
    this.require(this.learningObjects, learningObjectId, "Learning object");
    this.removeLearningObject(learningObjectId);
  }

  async replaceRelationships(
    lessonId: string,
    relationships: ExtractedRelationship[]
  ): Promise<OntologyRelationship[]> {
    this.require(this.lessons, lessonId, "Lesson");
    const lessonObjectIds = new Set(
      this.sectionsOf(lessonId).flatMap((section) => this.learningObjectsOf(section.id).map((item) => item.id))
    );

    // Validate the whole set before touching the stored one.
    for (const relationship of relationships) {
      if (relationship.sourceId === relationship.targetId) {
        throw new Error(`Relationship endpoints must differ (${relationship.sourceId}).`);
      }
      if (!lessonObjectIds.has(relationship.sourceId) || !lessonObjectIds.has(relationship.targetId)) {
        throw new Error(
          `Relationship ${relationship.sourceId} -> ${relationship.targetId} leaves lesson ${lessonId}.`
        );
      }
    }

    for (const existing of [...this.relationships.values()].filter((item) => item.lessonId === lessonId)) {
      this.removeRelationship(existing.id);
    }

    const stored = relationships.map((relationship) => {
      const entry: OntologyRelationship = { ...relationship, id: this.nextId("rel"), lessonId };
      this.relationships.set(entry.id, entry);
      return structuredClone(entry);
    });
    return stored;
  }

  async listRelationships(lessonId: string): Promise<OntologyRelationship[]> {
    return [...this.relationships.values()]
      .filter((relationship) => relationship.lessonId === lessonId)
      .map((relationship) => structuredClone(relationship));
  }

  async getRelationship(relationshipId: string): Promise<OntologyRelationship | null> {
    return cloneOrNull(this.relationships.get(relationshipId));
  }

  async createQuestion(input: GeneratedQuestion): Promise<Question> {
    this.assertQuestion(input);
    const question: Question = { ...structuredClone(input), id: this.nextId("question"), createdAt: new Date().toISOString() };
    this.questions.set(question.id, question);
    return structuredClone(question);
  }

  async getQuestion(questionId: string): Promise<Question | null> {
    return cloneOrNull(this.questions.get(questionId));
  }

  async listQuestions(filter: QuestionFilter = {}): Promise<Question[]> {
    return [...this.questions.values()]
      .filter(
        (question) =>
          (!filter.lessonId ||
            question.primaryLessonId === filter.lessonId ||
            question.secondaryLessonId === filter.lessonId) &&
          (!filter.soloLevel || question.soloLevel === filter.soloLevel)
      )
      .map((question) => structuredClone(question));
  }

  async updateQuestion(questionId: string, patch: QuestionPatch): Promise<Question> {
    const question: Question = {
      ...this.require(this.questions, questionId, "Question"),
      ...structuredClone(patch),
      humanModified: true
    };
    this.assertQuestion(question);
    this.questions.set(questionId, question);
    this.clearTranslations("question", questionId);
    return structuredClone(question);
  }

  async deleteQuestion(questionId: string): Promise<void> {
    this.require(this.questions, questionId, "Question");
    this.removeQuestion(questionId);
  }

  async createQuiz(input: NewQuiz): Promise<Quiz> {
    this.require(this.courses, input.courseId, "Course");
    for (const questionId of input.questionIds) {
      this.require(this.questions, questionId, "Question");
    }
    const quiz: Quiz = { ...input, questionIds: [...new Set(input.questionIds)], id: this.nextId("quiz") };
    this.quizzes.set(quiz.id, quiz);
    return structuredClone(quiz);
  }

  async getQuiz(quizId: string): Promise<Quiz | null> {
    return cloneOrNull(this.quizzes.get(quizId));
  }

  async deleteQuiz(quizId: string): Promise<void> {
    this.require(this.quizzes, quizId, "Quiz");
    this.quizzes.delete(quizId);
  }

  async upsertTranslation(input: TranslationInput): Promise<Translation> {
    const languageCode = input.languageCode.toLowerCase();
    if (languageCode === "en") {
      throw new Error("English is the source language and is never stored as a translation.");
    }
    this.assertEntityExists(input.entityKind, input.entityId);

    const key = translationKey(input.entityKind, input.entityId, languageCode);
    const translation: Translation = {
      ...structuredClone(input),
      languageCode,
      id: this.translations.get(key)?.id ?? this.nextId("translation"),
      translatedAt: new Date().toISOString()
    };
    this.translations.set(key, translation);
    return structuredClone(translation);
  }

  async getTranslation(
    kind: TranslatableEntityKind,
    entityId: string,
    languageCode: string
  ): Promise<Translation | null> {
    return cloneOrNull(this.translations.get(translationKey(kind, entityId, languageCode.toLowerCase())));
  }

  async listTranslations(kind: TranslatableEntityKind, entityId: string): Promise<Translation[]> {
    return [...this.translations.values()]
      .filter((translation) => translation.entityKind === kind && translation.entityId === entityId)
      .map((translation) => structuredClone(translation));
  }

  async deleteTranslationsForQuiz(quizId: string, languageCode: string): Promise<number> {
    const quiz = this.require(this.quizzes, quizId, "Quiz");
    let deleted = 0;
    for (const questionId of quiz.questionIds) {
      if (this.translations.delete(translationKey("question", questionId, languageCode.toLowerCase()))) {
        deleted += 1;
      }
    }
    return deleted;
  }

  private assertLessonDeletable(lessonId: string): void {
    if (this.lessonDeletionPolicy === "cascade") {
      return;
    }
    const referencing = this.questionsReferencing(lessonId);
    if (referencing.length > 0) {
      throw new Error(
        `Lesson ${lessonId} is referenced by ${referencing.length} question(s); delete them first or use the cascade policy.`
      );
    }
  }

  private removeLesson(lessonId: string): void {
    for (const section of this.sectionsOf(lessonId)) {
      this.removeSection(section.id);
    }
    for (const relationship of [...this.relationships.values()].filter((item) => item.lessonId === lessonId)) {
      this.removeRelationship(relationship.id);
    }
    for (const question of this.questionsReferencing(lessonId)) {
      this.removeQuestion(question.id);
    }
    this.clearTranslations("lesson", lessonId);
    this.lessons.delete(lessonId);
  }

  private removeSection(sectionId: string): void {
    for (const learningObject of this.learningObjectsOf(sectionId)) {
      this.removeLearningObject(learningObject.id);
    }
    this.clearTranslations("section", sectionId);
    this.sections.delete(sectionId);
  }

  private removeLearningObject(learningObjectId: string): void {
    for (const relationship of [...this.relationships.values()]) {
      if (relationship.sourceId === learningObjectId || relationship.targetId === learningObjectId) {
        this.removeRelationship(relationship.id);
      }
    }
    for (const question of this.questions.values()) {
      if (question.learningObjectId === learningObjectId) {
        question.learningObjectId = null;
      }
    }
    this.clearTranslations("learning_object", learningObjectId);
    this.learningObjects.delete(learningObjectId);
  }

  private removeRelationship(relationshipId: string): void {
    this.clearTranslations("relationship", relationshipId);
    this.relationships.delete(relationshipId);
  }

  private removeQuestion(questionId: string): void {
    for (const quiz of this.quizzes.values()) {
      quiz.questionIds = quiz.questionIds.filter((id) => id !== questionId);
    }
    this.clearTranslations("question", questionId);
    this.questions.delete(questionId);
  }

  private questionsReferencing(lessonId: string): Question[] {
    return [...this.questions.values()].filter(
      (question) => question.primaryLessonId === lessonId || question.secondaryLessonId === lessonId
    );
  }

  private sectionsOf(lessonId: string): Section[] {
    return [...this.sections.values()]
      .filter((section) => section.lessonId === lessonId)
      .sort((left, right) => left.order - right.order);
  }

  private learningObjectsOf(sectionId: string): LearningObject[] {
    return [...this.learningObjects.values()]
      .filter((learningObject) => learningObject.sectionId === sectionId)
      .sort((left, right) => left.order - right.order);
  }

  private clearTranslations(kind: TranslatableEntityKind, entityId: string): void {
    for (const [key, translation] of this.translations) {
      if (translation.entityKind === kind && translation.entityId === entityId) {
        this.translations.delete(key);
      }
    }
  }

  private assertQuestion(question: GeneratedQuestion): void {
    this.require(this.lessons, question.primaryLessonId, "Lesson");
    if (question.secondaryLessonId) {
      this.require(this.lessons, question.secondaryLessonId, "Lesson");
    }
    const violations = findQuestionViolations(question);
    if (violations.length > 0) {
      throw new ValidationFailedError(violations);
    }
  }

  private assertEntityExists(kind: TranslatableEntityKind, entityId: string): void {
    switch (kind) {
      case "question":
        this.require(this.questions, entityId, "Question");
        return;
      case "lesson":
        this.require(this.lessons, entityId, "Lesson");
        return;
      case "section":
        this.require(this.sections, entityId, "Section");
        return;
      case "learning_object":
        this.require(this.learningObjects, entityId, "Learning object");
        return;
      case "relationship":
        this.require(this.relationships, entityId, "Relationship");
        return;
    }
  }

  private require<T>(store: Map<string, T>, id: string, label: string): T {
    const entity = store.get(id);
    if (!entity) {
      throw new Error(`${label} ${id} does not exist.`);
    }
    return entity;
  }

  private nextId(prefix: string): string {
    const next = (this.counters.get(prefix) ?? 0) + 1;
    this.counters.set(prefix, next);
    return `${prefix}-${next}`;
  }
}

function translationKey(kind: TranslatableEntityKind, entityId: string, languageCode: string): string {
  return `${kind}:${entityId}:${languageCode}`;
}

function cloneOrNull<T>(value: T | undefined): T | null {
  return value === undefined ? null : structuredClone(value);
}

function withoutSummary(lesson: Lesson): Lesson {
  const { summary: _summary, ...rest } = lesson;
  return rest;
}
