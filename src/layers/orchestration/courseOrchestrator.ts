import path from "node:path";

import type { AgentRunTrace } from "../../agents/runtime/agentRuntime.js";
import { throwIfCancelled } from "../../agents/runtime/cancellation.js";
import type { FailedItem, PipelineResult } from "../../agents/runtime/stageResult.js";
import { CancelledError, PdfExtractionFailedError } from "../../domain/errors.js";
import type { Lesson, OntologyRelationship, Question, SoloLevel } from "../../domain/models.js";
import { createId, slugify } from "../../utils/text.js";
import type {
  QuestionGenerationRequest,
  QuestionGenerationResult,
  SoloQuestionGenerator
} from "../assessment/soloQuestionGenerator.js";
import type { ContentExtractionAgent, ContentExtractionResult } from "../content/contentExtractionAgent.js";
import { listPdfFiles, type PdfTextReader } from "../input/pdfTextReader.js";
import type { OntologyBuilderAgent } from "../ontology/ontologyBuilderAgent.js";
import type { ContentRepository, StoredLessonContent } from "../storage/contentRepository.js";
import type { CourseExportPaths, CourseExportStore } from "../storage/courseExportStore.js";
import { PipelineArtifactStore } from "./pipelineArtifactStore.js";

const SINGLE_LESSON_LEVELS: SoloLevel[] = ["unistructural", "multistructural", "relational"];

export interface CourseOrchestratorDependencies {
  repository: ContentRepository;
  pdfReader: PdfTextReader;
  contentAgent: ContentExtractionAgent;
  ontologyAgent: OntologyBuilderAgent;
  questionGenerator: SoloQuestionGenerator;
  exportStore: CourseExportStore;
  outputDirectory: string;
}

export interface ParseLessonResult extends ContentExtractionResult {
  /** Null when a terminal failure left the stored content untouched. */
  stored: StoredLessonContent | null;
}

export interface PersistedQuestionResult extends PipelineResult<Question> {
  perLevelCounts: QuestionGenerationResult["perLevelCounts"];
}

export interface DirectoryRunOptions {
  questionsPerLevel?: QuestionGenerationRequest["questionsPerLevel"];
  signal?: AbortSignal;
}

export interface DirectoryRunResult {
  runId: string;
  courseId: string;
  lessonIds: string[];
  questionCount: number;
  quizId: string | null;
  failedItems: FailedItem[];
  runDirectory: string;
  tracesPath: string;
  exports: CourseExportPaths;
}

export class CourseOrchestrator {
  constructor(private readonly dependencies: CourseOrchestratorDependencies) {}

  async ingestLesson(courseId: string, pdfPath: string): Promise<Lesson> {
    const document = await this.dependencies.pdfReader.read(pdfPath);
    const lesson = await this.dependencies.repository.createLesson({
      courseId,
      title: titleFromFilename(document.sourceFilename),
      sourceFilename: document.sourceFilename,
      rawText: document.fullText,
      pageCount: document.pageCount
    });
    this.log(`ingested ${document.sourceFilename} as ${lesson.id}`);
    return lesson;
  }

  async parseLesson(lessonId: string, signal?: AbortSignal): Promise<ParseLessonResult> {
    const lesson = await this.requireLesson(lessonId);
    const result = await this.dependencies.contentAgent.extract({
      lessonTitle: lesson.title,
      fullText: lesson.rawText,
      signal
    });

    if (result.terminalFailure) {
      this.log(`kept previous content of ${lesson.id}: ${result.terminalFailure.message}`);
      return { ...result, stored: null };
    }

    const stored = await this.dependencies.repository.replaceLessonContent(lesson.id, result.okItems, result.summary);
    this.log(
      `${lesson.id}: stored ${stored.sections.length} section(s) and ${stored.learningObjects.length} learning object(s)`
    );
    return { ...result, stored };
  }

  async buildOntology(lessonId: string, signal?: AbortSignal): Promise<PipelineResult<OntologyRelationship>> {
    const lesson = await this.requireLesson(lessonId);
    const learningObjects = await this.dependencies.repository.listLessonLearningObjects(lesson.id);
    const result = await this.dependencies.ontologyAgent.build({ lesson, learningObjects, signal });

    if (result.terminalFailure) {
      this.log(`kept previous relationships of ${lesson.id}: ${result.terminalFailure.message}`);
      return { ...result, okItems: await this.dependencies.repository.listRelationships(lesson.id) };
    }

    const stored = await this.dependencies.repository.replaceRelationships(lesson.id, result.okItems);
    this.log(`${lesson.id}: stored ${stored.length} relationship(s)`);
    return { ...result, okItems: stored };
  }

  /** Survivors are persisted even when the run stopped early. */
  async generateQuestions(request: QuestionGenerationRequest): Promise<PersistedQuestionResult> {
    const result = await this.dependencies.questionGenerator.generate(request);
    const stored: Question[] = [];
    for (const question of result.okItems) {
      stored.push(await this.dependencies.repository.createQuestion(question));
    }
    return { ...result, okItems: stored };
  }

  async runDirectory(
    courseName: string,
    pdfDirectory: string,
    options: DirectoryRunOptions = {}
  ): Promise<DirectoryRunResult> {
    const { repository, exportStore, outputDirectory } = this.dependencies;
    const startedAt = new Date().toISOString();
    const runId = createId("run", `${courseName}-${Date.now()}`);
    const artifactStore = new PipelineArtifactStore(outputDirectory, runId);
    const traces: AgentRunTrace[] = [];
    const failedItems: FailedItem[] = [];
    const stageArtifacts: Record<string, string> = {};

    const collect = async <T>(stage: string, result: PipelineResult<T>): Promise<void> => {
      traces.push(...result.traces);
      failedItems.push(...result.failedItems);
      if (result.terminalFailure) {
        failedItems.push({
          stage,
          item: "(stage)",
          kind: result.terminalFailure.kind,
          message: result.terminalFailure.message
        });
      }
      stageArtifacts[stage] = await artifactStore.persistStageArtifact(stage, result.okItems);
      await artifactStore.persistRawResponses(stage, result.rawResponses);
    };

    const course = await repository.createCourse({ name: courseName });
    const pdfFiles = await listPdfFiles(pdfDirectory);
    this.log(`[${runId}] ${pdfFiles.length} PDF(s) in ${pdfDirectory} for course "${courseName}"`);

    const lessons: Lesson[] = [];
    for (const pdfPath of pdfFiles) {
      throwIfCancelled(options.signal, "Course run");
      try {
        lessons.push(await this.ingestLesson(course.id, pdfPath));
      } catch (error) {
        if (!(error instanceof PdfExtractionFailedError)) {
          throw error;
        }
        this.log(`[${runId}] skipped ${path.basename(pdfPath)}: ${error.message}`);
        failedItems.push({ stage: "input", item: path.basename(pdfPath), kind: error.kind, message: error.message });
      }
    }

    const parsedLessons: Lesson[] = [];
    for (const lesson of lessons) {
      const stage = `${slugify(lesson.title) || lesson.id}.content`;
      const parsed = await this.parseLesson(lesson.id, options.signal);
      await collect(stage, parsed);
      throwIfCancelledResult(parsed);
      if (parsed.stored && parsed.stored.learningObjects.length > 0) {
        parsedLessons.push(lesson);
      }
    }

    for (const lesson of parsedLessons) {
      const ontology = await this.buildOntology(lesson.id, options.signal);
      await collect(`${slugify(lesson.title) || lesson.id}.ontology`, ontology);
      throwIfCancelledResult(ontology);
    }

    const questionIds: string[] = [];
    const questionRequests: QuestionGenerationRequest[] = parsedLessons.map((lesson) => ({
      lessonIds: [lesson.id],
      levels: SINGLE_LESSON_LEVELS,
      questionsPerLevel: options.questionsPerLevel,
      signal: options.signal
    }));
    for (let index = 0; index + 1 < parsedLessons.length; index += 1) {
      questionRequests.push({
        lessonIds: [parsedLessons[index].id, parsedLessons[index + 1].id],
        levels: ["extended_abstract"],
        questionsPerLevel: options.questionsPerLevel,
        signal: options.signal
      });
    }

    for (const [index, request] of questionRequests.entries()) {
      const questions = await this.generateQuestions(request);
      await collect(`questions-${index + 1}`, questions);
      questionIds.push(...questions.okItems.map((question) => question.id));
      throwIfCancelledResult(questions);
    }

    const quiz =
      questionIds.length > 0
        ? await repository.createQuiz({ courseId: course.id, title: `${courseName} question bank`, questionIds })
        : null;
    const exports = await exportStore.exportCourse(course.id);
    stageArtifacts.export = exports.directory;

    const tracesPath = await artifactStore.persistTraces(traces);
    await artifactStore.persistFailures(failedItems);
    await artifactStore.persistRunSummary({
      runId,
      courseId: course.id,
      courseName,
      sourceFiles: pdfFiles.map((file) => path.basename(file)),
      lessonIds: lessons.map((lesson) => lesson.id),
      questionCount: questionIds.length,
      quizId: quiz?.id ?? null,
      stageArtifacts,
      failedItemCount: failedItems.length,
      traceCount: traces.length,
      startedAt,
      completedAt: new Date().toISOString()
    });

    this.log(
      `[${runId}] ${lessons.length} lesson(s), ${questionIds.length} question(s), ${failedItems.length} failed item(s) -> ${exports.directory}`
    );

    return {
      runId,
      courseId: course.id,
      lessonIds: lessons.map((lesson) => lesson.id),
      questionCount: questionIds.length,
      quizId: quiz?.id ?? null,
      failedItems,
      runDirectory: artifactStore.directoryPath,
      tracesPath,
      exports
    };
  }

  private async requireLesson(lessonId: string): Promise<Lesson> {
    const lesson = await this.dependencies.repository.getLesson(lessonId);
    if (!lesson) {
      throw new Error(`Lesson ${lessonId} does not exist.`);
    }
    return lesson;
  }

  private log(message: string): void {
    console.log(`[orchestrator] ${message}`);
  }
}

export function titleFromFilename(filename: string): string {
  const stem = filename.replace(/\.pdf$/i, "").replace(/[_-]+/g, " ").replace(/\s+/g, " ").trim();
  return stem || filename;
}

function throwIfCancelledResult<T>(result: PipelineResult<T>): void {
  if (result.terminalFailure instanceof CancelledError) {
    throw result.terminalFailure;
  }
}
