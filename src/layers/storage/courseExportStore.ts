import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { DependencyMissingError } from "../../domain/errors.js";
import type { Course, Lesson, Question } from "../../domain/models.js";
import { slugify } from "../../utils/text.js";
import { OwlExporter, type OwlLessonInput } from "../ontology/owlExporter.js";
import type { ContentRepository } from "./contentRepository.js";

const COURSE_ONTOLOGY_STEM = "course";

export interface QuestionBankExport {
  course: Course;
  lessons: Array<Pick<Lesson, "id" | "title" | "sourceFilename" | "summary" | "pageCount">>;
  questions: Question[];
  exportedAt: string;
}

export interface CourseExportPaths {
  directory: string;
  questionBankPath: string;
  courseOntologyPath: string;
  lessonOntologyPaths: string[];
}

/** Writes a course's question bank and OWL documents under `<output>/courses/<course>/`. */
export class CourseExportStore {
  constructor(
    private readonly outputDirectory: string,
    private readonly repository: ContentRepository,
    private readonly owlExporter: OwlExporter = new OwlExporter()
  ) {}

  async exportCourse(courseId: string): Promise<CourseExportPaths> {
    const course = await this.repository.getCourse(courseId);
    if (!course) {
      throw new DependencyMissingError(`Course ${courseId} does not exist.`);
    }

    const directory = path.join(this.outputDirectory, "courses", slugify(course.name) || course.id);
    await mkdir(directory, { recursive: true });

    const lessons = await this.repository.listLessons(course.id);
    const ontologyInputs: OwlLessonInput[] = [];
    const lessonOntologyPaths: string[] = [];
    const questions: Question[] = [];
    const usedStems = new Set<string>([COURSE_ONTOLOGY_STEM]);

    for (const lesson of lessons) {
      const input: OwlLessonInput = {
        lesson,
        learningObjects: await this.repository.listLessonLearningObjects(lesson.id),
        relationships: await this.repository.listRelationships(lesson.id)
      };
      ontologyInputs.push(input);

      const lessonPath = path.join(directory, `${claimStem(slugify(lesson.title) || lesson.id, usedStems)}.owl`);
      await writeFile(lessonPath, this.owlExporter.exportLesson(input), "utf8");
      lessonOntologyPaths.push(lessonPath);

      questions.push(...(await this.repository.listQuestions({ lessonId: lesson.id })));
    }

    const courseOntologyPath = path.join(directory, `${COURSE_ONTOLOGY_STEM}.owl`);
    await writeFile(courseOntologyPath, this.owlExporter.exportCourse(course, ontologyInputs), "utf8");

    const questionBank: QuestionBankExport = {
      course,
      lessons: lessons.map(({ id, title, sourceFilename, summary, pageCount }) => ({
        id,
        title,
        sourceFilename,
        summary,
        pageCount
      })),
      questions: dedupeById(questions),
      exportedAt: new Date().toISOString()
    };
    const questionBankPath = path.join(directory, "question-bank.json");
    await writeFile(questionBankPath, JSON.stringify(questionBank, null, 2), "utf8");

    return { directory, questionBankPath, courseOntologyPath, lessonOntologyPaths };
  }
}

// Titles that slug alike ("Intro", "intro") get -2, -3 ... so no file is overwritten.
function claimStem(base: string, used: Set<string>): string {
  let candidate = base;
  for (let suffix = 2; used.has(candidate); suffix += 1) {
    candidate = `${base}-${suffix}`;
  }
  used.add(candidate);
  return candidate;
}

// Extended Abstract questions are listed under both of their lessons.
function dedupeById(questions: Question[]): Question[] {
  const seen = new Set<string>();
  return questions.filter((question) => {
    if (seen.has(question.id)) {
      return false;
    }
    seen.add(question.id);
    return true;
  });
}
