import { isStageTerminal, throwIfCancelled } from "../../agents/runtime/cancellation.js";
import type { AgentRuntime } from "../../agents/runtime/agentRuntime.js";
import { StageRecorder, type PipelineResult } from "../../agents/runtime/stageResult.js";
import {
  RELATIONSHIP_TYPES,
  type ExtractedRelationship,
  type LearningObject,
  type Lesson,
  type RelationshipType
} from "../../domain/models.js";
import { asString, unwrapArray } from "../../utils/json.js";
import { slugify, truncate } from "../../utils/text.js";

const ONTOLOGY_SYSTEM_PROMPT = [
  "You are the Ontology Builder Agent.",
  "Return only JSON.",
  "Identify directed, typed relationships between the learning objects listed by title.",
  "Use the titles exactly as listed; never invent new ones.",
  "Relationship types:",
  "- prerequisite: the source must be understood before the target",
  "- part_of: the source is a component of the target",
  "- related_to: the two are associated without a dependency",
  "- instance_of: the source is an example or kind of the target",
  "Output schema:",
  "[",
  '  { "source_title": string, "target_title": string, "type": "prerequisite|part_of|related_to|instance_of", "description": string }',
  "]"
].join("\n");

export interface CandidateRelationship {
  sourceTitle: string;
  targetTitle: string;
  type: string;
  description: string;
}

export interface OntologyBuildInput {
  lesson: Pick<Lesson, "id" | "title" | "rawText">;
  learningObjects: LearningObject[];
  signal?: AbortSignal;
}

export class OntologyBuilderAgent {
  constructor(
    private readonly runtime: AgentRuntime,
    private readonly contentBudget: number
  ) {}

  async build(input: OntologyBuildInput): Promise<PipelineResult<ExtractedRelationship>> {
    const recorder = new StageRecorder();
    const { lesson, learningObjects } = input;

    if (learningObjects.length < 2) {
      console.log(`[ontology] ${lesson.title}: fewer than two learning objects, nothing to relate`);
      return recorder.finish([]);
    }

    try {
      throwIfCancelled(input.signal, "Ontology build");
      const agentName = `ontology-agent-${slugify(lesson.title) || lesson.id}`;
      const run = recorder.record(
        await this.runtime.runJson<CandidateRelationship[] | null>({
          stage: "ontology",
          agentName,
          systemPrompt: ONTOLOGY_SYSTEM_PROMPT,
          userPrompt: [
            `Lesson title: ${lesson.title}`,
            "Learning object titles:",
            JSON.stringify(
              learningObjects.map((learningObject) => learningObject.title),
              null,
              2
            ),
            "Lesson content (for disambiguation):",
            truncate(lesson.rawText, this.contentBudget)
          ].join("\n\n"),
          expect: "array",
          parse: (value) => this.parseCandidates(value),
          fallback: () => null
        })
      );

      if (run.data === null) {
        recorder.fail({
          stage: "ontology",
          item: lesson.title,
          kind: "JsonRecoveryFailed",
          message: run.trace.errorMessage ?? "Relationship list could not be recovered."
        });
        return recorder.finish([]);
      }

      const relationships = resolveRelationships(run.data, learningObjects);
      console.log(
        `[ontology] ${lesson.title}: kept ${relationships.length} of ${run.data.length} proposed relationship(s)`
      );
      return recorder.finish(relationships);
    } catch (error) {
      if (isStageTerminal(error)) {
        return recorder.finish([], error);
      }
      throw error;
    }
  }

  private parseCandidates(value: unknown): CandidateRelationship[] {
    return unwrapArray(value, "relationships").map((item) => ({
      sourceTitle: asString(item.source_title) || asString(item.source),
      targetTitle: asString(item.target_title) || asString(item.target),
      type: asString(item.type) || asString(item.relationship_type),
      description: asString(item.description)
    }));
  }
}

/**
 * Maps proposed title pairs onto learning-object ids. Exact titles win; a trimmed,
 * case-insensitive match is the second chance. Unresolved endpoints, self-loops,
 * unknown types and repeated (source, target, type) triples are dropped.
 */
export function resolveRelationships(
  candidates: CandidateRelationship[],
  learningObjects: LearningObject[]
): ExtractedRelationship[] {
  const exact = new Map<string, string>();
  const loose = new Map<string, string>();
  for (const learningObject of learningObjects) {
    if (!exact.has(learningObject.title)) {
      exact.set(learningObject.title, learningObject.id);
    }
    const key = looseKey(learningObject.title);
    if (!loose.has(key)) {
      loose.set(key, learningObject.id);
    }
  }

  const resolve = (title: string): string | undefined => exact.get(title) ?? loose.get(looseKey(title));
  const seen = new Set<string>();
  const relationships: ExtractedRelationship[] = [];

  for (const candidate of candidates) {
    const type = toRelationshipType(candidate.type);
    const sourceId = resolve(candidate.sourceTitle);
    const targetId = resolve(candidate.targetTitle);
    if (!type || !sourceId || !targetId || sourceId === targetId) {
      continue;
    }

    const key = `${sourceId}|${targetId}|${type}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    relationships.push({ sourceId, targetId, type, description: candidate.description });
  }

  return relationships;
}

function looseKey(title: string): string {
  return title.trim().toLowerCase().replace(/\s+/g, " ");
}

function toRelationshipType(value: string): RelationshipType | undefined {
  const normalized = value.trim().toLowerCase().replace(/[\s-]+/g, "_");
  return RELATIONSHIP_TYPES.find((type) => type === normalized);
}
