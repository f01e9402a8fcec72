import { isStageTerminal, throwIfCancelled } from "../../agents/runtime/cancellation.js";
import type { AgentRuntime } from "../../agents/runtime/agentRuntime.js";
import { StageRecorder, type PipelineResult } from "../../agents/runtime/stageResult.js";
import type { PromptCharBudgets } from "../../config/runtimeConfig.js";
import {
  LEARNING_OBJECT_TYPES,
  type ExtractedLearningObject,
  type ExtractedSection,
  type LearningObjectType,
  type SectionDescriptor
} from "../../domain/models.js";
import { asNumber, asString, asStringArray, unwrapArray } from "../../utils/json.js";
import { extractKeywords, slugify, truncate } from "../../utils/text.js";
import { pageMarker } from "../input/pdfTextReader.js";

const MAX_SECTIONS = 8;
const MAX_LEARNING_OBJECTS = 6;
const MAX_KEYWORDS = 4;
const PAGE_MARKER_PATTERN = /--- Page (\d+) ---/g;

const SECTION_SYSTEM_PROMPT = [
  "You are the Section Identification Agent for instructional documents.",
  "Return only JSON.",
  "Split the lesson into 3-8 logical sections that follow the document's own headings and topic shifts.",
  "The text contains page markers of the form --- Page N ---; use them to set start_page and end_page.",
  "Output schema:",
  "[",
  '  { "title": string, "start_page": number, "end_page": number, "summary": string }',
  "]"
].join("\n");

const LEARNING_OBJECT_SYSTEM_PROMPT = [
  "You are the Learning Object Extraction Agent.",
  "Return only JSON.",
  "Extract 2-6 learning objects: the smallest assessable units of the section.",
  `Each object_type must be one of: ${LEARNING_OBJECT_TYPES.join(", ")}.`,
  "Content must restate the source faithfully in 1-3 sentences; keywords are 2-4 short terms.",
  "Output schema:",
  "[",
  '  { "title": string, "content": string, "object_type": string, "keywords": string[] }',
  "]"
].join("\n");

const SUMMARY_SYSTEM_PROMPT = [
  "You are the Lesson Summary Agent.",
  "Summarize the lesson in 2-3 plain-text paragraphs for a student preparing for an exam.",
  "Do not use headings, bullet points or markdown."
].join("\n");

export type ContentBudgets = Pick<PromptCharBudgets, "sectionIdentification" | "sectionSlice" | "learningObjects" | "summary">;

export interface ContentExtractionInput {
  lessonTitle: string;
  fullText: string;
  signal?: AbortSignal;
}

export interface ContentExtractionResult extends PipelineResult<ExtractedSection> {
  summary: string;
}

export class ContentExtractionAgent {
  constructor(
    private readonly runtime: AgentRuntime,
    private readonly budgets: ContentBudgets
  ) {}

  async extract(input: ContentExtractionInput): Promise<ContentExtractionResult> {
    const recorder = new StageRecorder();
    const sections: ExtractedSection[] = [];

    try {
      throwIfCancelled(input.signal, "Content extraction");
      const descriptors = await this.identifySections(input, recorder);

      for (const descriptor of descriptors ?? [null]) {
        throwIfCancelled(input.signal, "Content extraction");
        const section = descriptor
          ? {
              title: descriptor.title,
              summary: descriptor.summary,
              startPage: descriptor.startPage,
              endPage: descriptor.endPage,
              content: sliceSectionContent(input.fullText, descriptor, this.budgets.sectionSlice)
            }
          : buildSyntheticSection(input);

        const learningObjects = await this.extractLearningObjects(input.lessonTitle, section, recorder);
        sections.push(withoutUndefinedPages({ ...section, learningObjects }));
      }

      throwIfCancelled(input.signal, "Content extraction");
      const summary = await this.summarize(input);

      const learningObjectCount = sections.reduce((total, section) => total + section.learningObjects.length, 0);
      console.log(
        `[content] ${input.lessonTitle}: ${sections.length} section(s), ${learningObjectCount} learning object(s)`
      );

      return { ...recorder.finish(sections), summary };
    } catch (error) {
      if (isStageTerminal(error)) {
        console.warn(`[content] ${input.lessonTitle}: stopped after ${sections.length} section(s): ${error.message}`);
        return { ...recorder.finish(sections, error), summary: "" };
      }
      throw error;
    }
  }

  // null means "no usable descriptors": the caller falls back to one synthetic section.
  private async identifySections(
    input: ContentExtractionInput,
    recorder: StageRecorder
  ): Promise<SectionDescriptor[] | null> {
    if (!hasPageMarkers(input.fullText)) {
      return null;
    }

    const agentName = `section-agent-${slugify(input.lessonTitle) || "lesson"}`;
    const run = recorder.record(
      await this.runtime.runJson<SectionDescriptor[] | null>({
        stage: "sections",
        agentName,
        systemPrompt: SECTION_SYSTEM_PROMPT,
        userPrompt: [
          `Lesson title: ${input.lessonTitle}`,
          "Lesson text:",
          truncate(input.fullText, this.budgets.sectionIdentification)
        ].join("\n\n"),
        expect: "array",
        parse: (value) => this.parseDescriptors(value),
        fallback: () => null
      })
    );

    if (run.data === null) {
      recorder.fail({
        stage: "sections",
        item: input.lessonTitle,
        kind: "JsonRecoveryFailed",
        message: run.trace.errorMessage ?? "No sections identified."
      });
    }

    return run.data;
  }

  private parseDescriptors(value: unknown): SectionDescriptor[] {
    const descriptors = unwrapArray(value, "sections")
      .map((item): SectionDescriptor | null => {
        const title = asString(item.title);
        if (!title) {
          return null;
        }
        const startPage = asPageNumber(item.start_page);
        const endPage = asPageNumber(item.end_page);
        return {
          title,
          summary: asString(item.summary),
          ...(startPage !== undefined ? { startPage } : {}),
          ...(endPage !== undefined ? { endPage } : {})
        };
      })
      .filter((descriptor): descriptor is SectionDescriptor => descriptor !== null)
      .slice(0, MAX_SECTIONS);

    if (descriptors.length === 0) {
      throw new Error("Section list was empty.");
    }
    return descriptors;
  }

  private async extractLearningObjects(
    lessonTitle: string,
    section: { title: string; content: string },
    recorder: StageRecorder
  ): Promise<ExtractedLearningObject[]> {
    const run = recorder.record(
      await this.runtime.runJson<ExtractedLearningObject[] | null>({
        stage: "learning-objects",
        agentName: `learning-object-agent-${slugify(section.title) || "section"}`,
        systemPrompt: LEARNING_OBJECT_SYSTEM_PROMPT,
        userPrompt: [
          `Lesson title: ${lessonTitle}`,
          `Section title: ${section.title}`,
          "Section content:",
          truncate(section.content, this.budgets.learningObjects)
        ].join("\n\n"),
        expect: "array",
        parse: (value) => this.parseLearningObjects(value),
        fallback: () => null
      })
    );

    if (run.data === null) {
      recorder.fail({
        stage: "learning-objects",
        item: section.title,
        kind: "JsonRecoveryFailed",
        message: run.trace.errorMessage ?? "No learning objects extracted."
      });
      return [];
    }
    return run.data;
  }

  private parseLearningObjects(value: unknown): ExtractedLearningObject[] {
    const learningObjects = unwrapArray(value, "learning_objects")
      .map((item): ExtractedLearningObject | null => {
        const title = asString(item.title);
        const content = asString(item.content) || asString(item.description);
        if (!title || !content) {
          return null;
        }
        const keywords = asStringArray(item.keywords).slice(0, MAX_KEYWORDS);
        return {
          title,
          content,
          objectType: coerceObjectType(asString(item.object_type) || asString(item.type)),
          keywords: keywords.length >= 2 ? keywords : fillKeywords(keywords, `${title} ${content}`)
        };
      })
      .filter((learningObject): learningObject is ExtractedLearningObject => learningObject !== null)
      .slice(0, MAX_LEARNING_OBJECTS);

    if (learningObjects.length === 0) {
      throw new Error("Learning object list was empty.");
    }
    return learningObjects;
  }

  private async summarize(input: ContentExtractionInput): Promise<string> {
    const run = await this.runtime.runText({
      stage: "summary",
      agentName: `summary-agent-${slugify(input.lessonTitle) || "lesson"}`,
      maxOutputTokens: 500,
      messages: [
        { role: "system", content: SUMMARY_SYSTEM_PROMPT },
        {
          role: "user",
          content: [`Lesson title: ${input.lessonTitle}`, truncate(input.fullText, this.budgets.summary)].join("\n\n")
        }
      ]
    });
    return run.data;
  }
}

/**
 * Cuts a section's text out of the lesson: page markers first, then a
 * case-insensitive title search, then a fixed prefix. Pure, so identical
 * descriptors always produce identical boundaries.
 */
export function sliceSectionContent(fullText: string, descriptor: SectionDescriptor, maxChars: number): string {
  if (descriptor.startPage !== undefined) {
    const startMarker = pageMarker(descriptor.startPage);
    const markerIndex = fullText.indexOf(startMarker);

    if (markerIndex !== -1) {
      const contentStart = markerIndex + startMarker.length;
      const endPage = Math.max(descriptor.endPage ?? descriptor.startPage, descriptor.startPage);
      const endIndex = fullText.indexOf(pageMarker(endPage + 1), contentStart);
      const slice = (endIndex === -1 ? fullText.slice(contentStart) : fullText.slice(contentStart, endIndex)).trim();
      if (slice) {
        return slice;
      }
    }
  }

  const titleIndex = descriptor.title ? fullText.toLowerCase().indexOf(descriptor.title.toLowerCase()) : -1;
  if (titleIndex !== -1) {
    return fullText.slice(titleIndex, titleIndex + maxChars).trim();
  }

  return fullText.slice(0, maxChars).trim();
}

export function hasPageMarkers(text: string): boolean {
  return new RegExp(PAGE_MARKER_PATTERN.source).test(text);
}

function buildSyntheticSection(input: ContentExtractionInput): Omit<ExtractedSection, "learningObjects"> {
  const pageNumbers = [...input.fullText.matchAll(PAGE_MARKER_PATTERN)].map((match) => Number(match[1]));
  const section: Omit<ExtractedSection, "learningObjects"> = {
    title: input.lessonTitle,
    content: input.fullText.trim(),
    summary: "Full lesson content"
  };
  if (pageNumbers.length > 0) {
    section.startPage = Math.min(...pageNumbers);
    section.endPage = Math.max(...pageNumbers);
  }
  return section;
}

function withoutUndefinedPages(section: ExtractedSection): ExtractedSection {
  const { startPage, endPage, ...rest } = section;
  return {
    ...rest,
    ...(startPage !== undefined ? { startPage } : {}),
    ...(endPage !== undefined ? { endPage } : {})
  };
}

function asPageNumber(value: unknown): number | undefined {
  const parsed = asNumber(value);
  return parsed !== undefined && Number.isInteger(parsed) && parsed >= 1 ? parsed : undefined;
}

function coerceObjectType(value: string): LearningObjectType {
  const normalized = value.toLowerCase();
  return LEARNING_OBJECT_TYPES.find((type) => type === normalized) ?? "concept";
}

function fillKeywords(existing: string[], text: string): string[] {
  const merged = [...existing];
  for (const keyword of extractKeywords(text, MAX_KEYWORDS)) {
    if (merged.length >= MAX_KEYWORDS) {
      break;
    }
    if (!merged.some((candidate) => candidate.toLowerCase() === keyword)) {
      merged.push(keyword);
    }
  }
  return merged;
}
