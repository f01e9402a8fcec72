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
  SoloLevel,
  TranslatableEntityKind,
  Translation,
  TranslationInput
} from "../../domain/models.js";

export type NewCourse = Omit<Course, "id" | "createdAt">;
export type NewLesson = Omit<Lesson, "id" | "createdAt">;
export type NewQuiz = Omit<Quiz, "id">;

export type LessonPatch = Partial<Pick<Lesson, "title" | "summary">>;
export type SectionPatch = Partial<Pick<Section, "title" | "content" | "summary">>;
export type LearningObjectPatch = Partial<Pick<LearningObject, "title" | "content" | "objectType" | "keywords">>;
export type QuestionPatch = Partial<
  Pick<
    Question,
    | "questionText"
    | "options"
    | "correctOptionIndex"
    | "correctAnswer"
    | "explanation"
    | "difficulty"
    | "bloomLevel"
    | "tags"
  >
>;

export interface QuestionFilter {
  lessonId?: string;
  soloLevel?: SoloLevel;
}

export interface StoredLessonContent {
  sections: Section[];
  learningObjects: LearningObject[];
}

/**
 * Persistence boundary of the pipeline. Implementations own cascade semantics,
 * the uniqueness of (entity kind, entity id, language) translations, and the
 * atomicity of the replace and delete-for-composite operations.
 */
export interface ContentRepository {
  createCourse(input: NewCourse): Promise<Course>;
  getCourse(courseId: string): Promise<Course | null>;
  listCourses(): Promise<Course[]>;
  deleteCourse(courseId: string): Promise<void>;

  createLesson(input: NewLesson): Promise<Lesson>;
  getLesson(lessonId: string): Promise<Lesson | null>;
  listLessons(courseId: string): Promise<Lesson[]>;
  updateLesson(lessonId: string, patch: LessonPatch): Promise<Lesson>;
  /** Honors the configured policy when questions still reference the lesson. */
  deleteLesson(lessonId: string): Promise<void>;

  /** Atomically swaps a lesson's sections, learning objects and summary for a new extraction. */
  replaceLessonContent(lessonId: string, sections: ExtractedSection[], summary: string): Promise<StoredLessonContent>;
  listSections(lessonId: string): Promise<Section[]>;
  getSection(sectionId: string): Promise<Section | null>;
  updateSection(sectionId: string, patch: SectionPatch): Promise<Section>;
  deleteSection(sectionId: string): Promise<void>;

  listLearningObjects(sectionId: string): Promise<LearningObject[]>;
  listLessonLearningObjects(lessonId: string): Promise<LearningObject[]>;
  getLearningObject(learningObjectId: string): Promise<LearningObject | null>;
  updateLearningObject(learningObjectId: string, patch: LearningObjectPatch): Promise<LearningObject>;
  deleteLearningObject(learningObjectId: string): Promise<void>;

  /** Replace-all: no reader ever observes a mix of the old and new sets. */
  replaceRelationships(lessonId: string, relationships: ExtractedRelationship[]): Promise<OntologyRelationship[]>;
  listRelationships(lessonId: string): Promise<OntologyRelationship[]>;
  getRelationship(relationshipId: string): Promise<OntologyRelationship | null>;

  createQuestion(input: GeneratedQuestion): Promise<Question>;
  getQuestion(questionId: string): Promise<Question | null>;
  listQuestions(filter?: QuestionFilter): Promise<Question[]>;
  /** A human edit: marks the question modified and drops its translations. */
  updateQuestion(questionId: string, patch: QuestionPatch): Promise<Question>;
  deleteQuestion(questionId: string): Promise<void>;

  createQuiz(input: NewQuiz): Promise<Quiz>;
  getQuiz(quizId: string): Promise<Quiz | null>;
  deleteQuiz(quizId: string): Promise<void>;

  upsertTranslation(input: TranslationInput): Promise<Translation>;
  getTranslation(kind: TranslatableEntityKind, entityId: string, languageCode: string): Promise<Translation | null>;
  listTranslations(kind: TranslatableEntityKind, entityId: string): Promise<Translation[]>;
  /** Deletes every question translation of the quiz in one language; returns how many rows went. */
  deleteTranslationsForQuiz(quizId: string, languageCode: string): Promise<number>;
}
