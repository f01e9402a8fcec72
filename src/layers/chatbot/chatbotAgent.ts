import type { AgentRunTrace, AgentRuntime } from "../../agents/runtime/agentRuntime.js";
import type { ChatMessage } from "../../agents/providers/llmProvider.js";
import { AllProvidersExhaustedError } from "../../domain/errors.js";
import type { LearningObject, Lesson } from "../../domain/models.js";
import { extractQueryTerms, truncate } from "../../utils/text.js";
import type { ContentRepository } from "../storage/contentRepository.js";

const HISTORY_WINDOW = 6;
const MAX_MATCHED_LEARNING_OBJECTS = 5;
const MATCHED_CONTENT_CHARS = 400;
const REPLY_MAX_TOKENS = 800;
const GREETING = /^\s*(hi|hello|hey|good (morning|afternoon|evening))\b/i;
const HELP_REQUEST = /\b(help|what can you do|how do i use)\b/i;

export interface ChatHistoryMessage {
  role: "user" | "assistant";
  content: string;
}

export interface ChatRequest {
  message: string;
  courseId?: string;
  lessonId?: string;
  history?: ChatHistoryMessage[];
}

export interface ChatReply {
  response: string;
  source: "llm" | "offline";
  contextUsed: boolean;
  trace?: AgentRunTrace;
}

export interface ChatContextBudgets {
  summaryChars: number;
  maxTitles: number;
  maxRelationships: number;
}

export class ChatbotAgent {
  constructor(
    private readonly runtime: AgentRuntime,
    private readonly repository: ContentRepository,
    private readonly budgets: ChatContextBudgets
  ) {}

  async respond(request: ChatRequest): Promise<ChatReply> {
    const context = await this.buildContext(request);
    const messages: ChatMessage[] = [
      { role: "system", content: buildSystemPrompt(context) },
      ...(request.history ?? []).slice(-HISTORY_WINDOW).map((entry) => ({ role: entry.role, content: entry.content })),
      { role: "user", content: request.message }
    ];

    try {
      const run = await this.runtime.runText({
        stage: "chatbot",
        agentName: "chatbot-agent",
        messages,
        maxOutputTokens: REPLY_MAX_TOKENS
      });
      return { response: run.data, source: "llm", contextUsed: context.length > 0, trace: run.trace };
    } catch (error) {
      if (!(error instanceof AllProvidersExhaustedError)) {
        throw error;
      }
      console.warn(`[chatbot] answering offline: ${error.message}`);
      return { response: offlineReply(request.message), source: "offline", contextUsed: false };
    }
  }

  /** Plain-text context block; empty when neither a lesson nor a course resolves. */
  async buildContext(request: Pick<ChatRequest, "message" | "courseId" | "lessonId">): Promise<string> {
    if (request.lessonId) {
      const lesson = await this.repository.getLesson(request.lessonId);
      if (lesson) {
        return this.lessonContext(lesson, request.message);
      }
      console.warn(`[chatbot] lesson ${request.lessonId} not found; answering without lesson context`);
    }

    if (request.courseId) {
      const course = await this.repository.getCourse(request.courseId);
      if (course) {
        const lessons = await this.repository.listLessons(course.id);
        return this.courseContext(course.name, lessons, request.message);
      }
      console.warn(`[chatbot] course ${request.courseId} not found; answering without course context`);
    }

    return "";
  }

  private async lessonContext(lesson: Lesson, message: string): Promise<string> {
    const lines = [`Lesson: ${lesson.title}`];
    if (lesson.summary) {
      lines.push(`Summary: ${truncate(lesson.summary, this.budgets.summaryChars)}`);
    }

    const titles: string[] = [];
    for (const section of await this.repository.listSections(lesson.id)) {
      titles.push(`- ${section.title}`);
      for (const learningObject of await this.repository.listLearningObjects(section.id)) {
        titles.push(`  - ${learningObject.title} (${learningObject.objectType})`);
      }
    }
    if (titles.length > 0) {
      lines.push("Sections and learning objects:", ...titles.slice(0, this.budgets.maxTitles));
    }

    const learningObjects = await this.repository.listLessonLearningObjects(lesson.id);
    const titleById = new Map(learningObjects.map((learningObject) => [learningObject.id, learningObject.title]));
    const relationships = (await this.repository.listRelationships(lesson.id))
      .slice(0, this.budgets.maxRelationships)
      .map(
        (relationship) =>
          `- ${titleById.get(relationship.sourceId) ?? relationship.sourceId} --${relationship.type}--> ${
            titleById.get(relationship.targetId) ?? relationship.targetId
          }`
      );
    if (relationships.length > 0) {
      lines.push("Relationships:", ...relationships);
    }

    lines.push(...renderMatches(matchLearningObjects(learningObjects, message)));
    return lines.join("\n");
  }

  private async courseContext(courseName: string, lessons: Lesson[], message: string): Promise<string> {
    const lines = [`Course: ${courseName}`];
    if (lessons.length > 0) {
      lines.push(
        "Lessons:",
        ...lessons
          .slice(0, this.budgets.maxTitles)
          .map((lesson) =>
            lesson.summary ? `- ${lesson.title}: ${truncate(lesson.summary, this.budgets.summaryChars)}` : `- ${lesson.title}`
          )
      );
    }

    const learningObjects: LearningObject[] = [];
    for (const lesson of lessons) {
      learningObjects.push(...(await this.repository.listLessonLearningObjects(lesson.id)));
    }
    lines.push(...renderMatches(matchLearningObjects(learningObjects, message)));
    return lines.join("\n");
  }
}

/** Learning objects whose title or keywords contain a term of the message, best matches first. */
export function matchLearningObjects(learningObjects: LearningObject[], message: string): LearningObject[] {
  const terms = extractQueryTerms(message);
  if (terms.length === 0) {
    return [];
  }

  return learningObjects
    .map((learningObject, index) => {
      const title = learningObject.title.toLowerCase();
      const keywords = learningObject.keywords.map((keyword) => keyword.toLowerCase());
      const score = terms.filter(
        (term) => title.includes(term) || keywords.some((keyword) => keyword.includes(term))
      ).length;
      return { learningObject, index, score };
    })
    .filter((entry) => entry.score > 0)
    .sort((left, right) => right.score - left.score || left.index - right.index)
    .slice(0, MAX_MATCHED_LEARNING_OBJECTS)
    .map((entry) => entry.learningObject);
}

function renderMatches(matches: LearningObject[]): string[] {
  if (matches.length === 0) {
    return [];
  }
  return [
    "Most relevant learning objects:",
    ...matches.map(
      (learningObject) => `- ${learningObject.title}: ${truncate(learningObject.content, MATCHED_CONTENT_CHARS)}`
    )
  ];
}

function buildSystemPrompt(context: string): string {
  const lines = [
    "You are a patient tutor helping a student with their course material.",
    "Answer from the course context below.",
    "If the context does not cover the question, say so plainly before offering general guidance.",
    "Keep answers short and concrete."
  ];
  return context ? [...lines, "", "Course context:", context].join("\n") : lines.join("\n");
}

export function offlineReply(message: string): string {
  if (GREETING.test(message)) {
    return "Hello! The tutor is offline at the moment, but you can still browse your lessons and quizzes. Ask again in a little while.";
  }
  if (HELP_REQUEST.test(message)) {
    return "I can explain concepts from your lessons, connect ideas across sections and help you prepare for quizzes. The tutor is offline right now, so please try again shortly.";
  }

  const topic = extractQueryTerms(message).slice(0, 3).join(", ");
  return topic
    ? `The tutor is offline right now. Your question is about ${topic}; review the lesson sections on ${topic} and ask again shortly.`
    : "The tutor is offline right now. Please try again shortly.";
}
