export const SOLO_LEVELS = ["unistructural", "multistructural", "relational", "extended_abstract"] as const;
export type SoloLevel = (typeof SOLO_LEVELS)[number];

export const LEARNING_OBJECT_TYPES = ["concept", "definition", "procedure", "principle", "example", "fact"] as const;
export type LearningObjectType = (typeof LEARNING_OBJECT_TYPES)[number];

export const RELATIONSHIP_TYPES = ["prerequisite", "part_of", "related_to", "instance_of"] as const;
export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

export const QUESTION_TYPES = ["multiple_choice", "true_false", "short_answer"] as const;
export type QuestionType = (typeof QUESTION_TYPES)[number];

export type BloomLevel = "remember" | "understand" | "apply" | "analyze" | "evaluate" | "create";

export interface Course {
  id: string;
  name: string;
  code?: string;
  description?: string;
  createdAt: string;
}

export interface Lesson {
  id: string;
  courseId: string;
  title: string;
  sourceFilename: string;
  rawText: string;
  summary?: string;
  pageCount: number;
  createdAt: string;
}

export interface Section {
  id: string;
  lessonId: string;
  order: number;
  title: string;
  content: string;
  summary?: string;
  startPage?: number;
  endPage?: number;
}

export interface LearningObject {
  id: string;
  sectionId: string;
  order: number;
  title: string;
  content: string;
  objectType: LearningObjectType;
  keywords: string[];
}

export interface OntologyRelationship {
  id: string;
  lessonId: string;
  sourceId: string;
  targetId: string;
  type: RelationshipType;
  description: string;
}

export interface Question {
  id: string;
  questionText: string;
  soloLevel: SoloLevel;
  questionType: QuestionType;
  options: string[] | null;
  correctOptionIndex: number | null;
  correctAnswer: string;
  explanation: string;
  difficulty: number;
  bloomLevel: BloomLevel;
  tags: string[];
  primaryLessonId: string;
  secondaryLessonId: string | null;
  sectionId: string | null;
  learningObjectId: string | null;
  isAiGenerated: boolean;
  humanModified: boolean;
  createdAt: string;
}

export type GeneratedQuestion = Omit<Question, "id" | "createdAt">;

export interface Quiz {
  id: string;
  courseId: string;
  title: string;
  questionIds: string[];
}

export interface TranslationFieldsByKind {
  question: {
    questionText: string;
    options: string[] | null;
    correctAnswer: string;
    explanation: string;
  };
  lesson: {
    title: string;
    summary: string;
  };
  section: {
    title: string;
    summary: string;
  };
  learning_object: {
    title: string;
    content: string;
    keywords: string[];
  };
  /** The relationship type itself stays canonical; only its display label is translated. */
  relationship: {
    relationshipLabel: string;
    description: string;
  };
}

export type TranslatableEntityKind = keyof TranslationFieldsByKind;

export type TranslationInput = {
  [K in TranslatableEntityKind]: {
    entityKind: K;
    entityId: string;
    languageCode: string;
    fields: TranslationFieldsByKind[K];
  };
}[TranslatableEntityKind];

export type Translation = TranslationInput & {
  id: string;
  translatedAt: string;
};

export interface PdfPageText {
  pageNum: number;
  text: string;
}

export interface PdfDocumentText {
  sourceFilename: string;
  fullText: string;
  pages: PdfPageText[];
  pageCount: number;
}

export interface SectionDescriptor {
  title: string;
  startPage?: number;
  endPage?: number;
  summary: string;
}

export interface ExtractedLearningObject {
  title: string;
  content: string;
  objectType: LearningObjectType;
  keywords: string[];
}

export interface ExtractedSection {
  title: string;
  content: string;
  summary: string;
  startPage?: number;
  endPage?: number;
  learningObjects: ExtractedLearningObject[];
}

export interface ExtractedRelationship {
  sourceId: string;
  targetId: string;
  type: RelationshipType;
  description: string;
}
