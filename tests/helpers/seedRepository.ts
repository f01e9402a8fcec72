import type { ExtractedSection, GeneratedQuestion, Lesson } from "../../src/domain/models.js";
import { InMemoryContentRepository } from "../../src/layers/storage/inMemoryContentRepository.js";

export const PHOTOSYNTHESIS_SECTIONS: ExtractedSection[] = [
  {
    title: "Light reactions",
    content: "Chlorophyll absorbs light and splits water, releasing oxygen and producing ATP.",
    summary: "How light energy is captured.",
    startPage: 1,
    endPage: 1,
    learningObjects: [
      {
        title: "Chlorophyll",
        content: "Chlorophyll is the green pigment that absorbs red and blue light.",
        objectType: "definition",
        keywords: ["chlorophyll", "pigment"]
      },
      {
        title: "Photolysis",
        content: "Photolysis splits water molecules into hydrogen ions, electrons and oxygen.",
        objectType: "procedure",
        keywords: ["water", "oxygen"]
      }
    ]
  },
  {
    title: "Calvin cycle",
    content: "The Calvin cycle fixes carbon dioxide into sugars using ATP and NADPH.",
    summary: "How carbon is fixed.",
    startPage: 2,
    endPage: 2,
    learningObjects: [
      {
        title: "Carbon fixation",
        content: "RuBisCO attaches carbon dioxide to ribulose bisphosphate.",
        objectType: "concept",
        keywords: ["rubisco", "carbon"]
      }
    ]
  }
];

export const RESPIRATION_SECTIONS: ExtractedSection[] = [
  {
    title: "Glycolysis",
    content: "Glycolysis breaks glucose into pyruvate in the cytoplasm.",
    summary: "Glucose breakdown.",
    startPage: 1,
    endPage: 1,
    learningObjects: [
      {
        title: "Glycolysis",
        content: "Glycolysis converts one glucose into two pyruvate molecules.",
        objectType: "procedure",
        keywords: ["glucose", "pyruvate"]
      }
    ]
  }
];

export interface SeededCourse {
  repository: InMemoryContentRepository;
  courseId: string;
  lessons: Lesson[];
}

/** One course with a lesson per entry of `lessonContents`, each already parsed. */
export async function seedCourse(
  lessonContents: Array<{ title: string; sections: ExtractedSection[]; summary?: string }>,
  repository = new InMemoryContentRepository()
): Promise<SeededCourse> {
  const course = await repository.createCourse({ name: "Biology 101" });
  const lessons: Lesson[] = [];

  for (const entry of lessonContents) {
    const lesson = await repository.createLesson({
      courseId: course.id,
      title: entry.title,
      sourceFilename: `${entry.title.toLowerCase().replace(/\s+/g, "-")}.pdf`,
      rawText: entry.sections.map((section) => section.content).join("\n"),
      pageCount: 2
    });
    await repository.replaceLessonContent(lesson.id, entry.sections, entry.summary ?? "");
    const stored = await repository.getLesson(lesson.id);
    lessons.push(stored ?? lesson);
  }

  return { repository, courseId: course.id, lessons };
}

export function sampleQuestion(lessonId: string, overrides: Partial<GeneratedQuestion> = {}): GeneratedQuestion {
  return {
    questionText: "Which pigment absorbs light during photosynthesis?",
    soloLevel: "unistructural",
    questionType: "multiple_choice",
    options: ["Chlorophyll", "Keratin", "Hemoglobin", "Melanin"],
    correctOptionIndex: 0,
    correctAnswer: "Chlorophyll",
    explanation: "Chlorophyll is the light-absorbing pigment.",
    difficulty: 0.2,
    bloomLevel: "remember",
    tags: ["unistructural"],
    primaryLessonId: lessonId,
    secondaryLessonId: null,
    sectionId: null,
    learningObjectId: null,
    isAiGenerated: true,
    humanModified: false,
    ...overrides
  };
}
