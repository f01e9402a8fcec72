import {
  RELATIONSHIP_TYPES,
  type Course,
  type LearningObject,
  type Lesson,
  type OntologyRelationship
} from "../../domain/models.js";

const BASE_IRI_PREFIX = "http://example.org/educational-ontology/";

export interface OwlLessonInput {
  lesson: Pick<Lesson, "id" | "title">;
  learningObjects: LearningObject[];
  relationships: OntologyRelationship[];
}

/**
 * Renders OWL/XML: XML declaration, Ontology root and prefixes, then every
 * declaration before any axiom.
 */
export class OwlExporter {
  exportLesson(input: OwlLessonInput): string {
    return this.render(input.lesson.title, input.learningObjects, input.relationships);
  }

  exportCourse(course: Pick<Course, "id" | "name">, lessons: OwlLessonInput[]): string {
    return this.render(
      course.name,
      lessons.flatMap((entry) => entry.learningObjects),
      lessons.flatMap((entry) => entry.relationships)
    );
  }

  private render(ontologyName: string, learningObjects: LearningObject[], relationships: OntologyRelationship[]): string {
    const ontologyIri = `${BASE_IRI_PREFIX}${toSafeId(ontologyName)}`;
    const classIds = assignClassIds(learningObjects);
    const assertable = relationships.filter(
      (relationship) => classIds.has(relationship.sourceId) && classIds.has(relationship.targetId)
    );
    const propertyTypes = RELATIONSHIP_TYPES.filter((type) =>
      assertable.some((relationship) => relationship.type === type)
    );

    const lines: string[] = [
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<Ontology xmlns="http://www.w3.org/2002/07/owl#"',
      `     xml:base="${ontologyIri}"`,
      '     xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#"',
      '     xmlns:xml="http://www.w3.org/XML/1998/namespace"',
      '     xmlns:xsd="http://www.w3.org/2001/XMLSchema#"',
      '     xmlns:rdfs="http://www.w3.org/2000/01/rdf-schema#"',
      `     ontologyIRI="${ontologyIri}">`,
      '    <Prefix name="" IRI="http://www.w3.org/2002/07/owl#"/>',
      '    <Prefix name="owl" IRI="http://www.w3.org/2002/07/owl#"/>',
      '    <Prefix name="rdf" IRI="http://www.w3.org/1999/02/22-rdf-syntax-ns#"/>',
      '    <Prefix name="xml" IRI="http://www.w3.org/XML/1998/namespace"/>',
      '    <Prefix name="xsd" IRI="http://www.w3.org/2001/XMLSchema#"/>',
      '    <Prefix name="rdfs" IRI="http://www.w3.org/2000/01/rdf-schema#"/>',
      `    <Prefix name="edu" IRI="${ontologyIri}#"/>`
    ];

    for (const learningObject of learningObjects) {
      lines.push(element("Declaration", [`<Class IRI="#${classId(classIds, learningObject.id)}"/>`]));
    }
    for (const type of propertyTypes) {
      lines.push(element("Declaration", [`<ObjectProperty IRI="#${type}"/>`]));
    }
    lines.push(element("Declaration", ['<DataProperty IRI="#hasObjectType"/>']));
    lines.push(element("Declaration", ['<DataProperty IRI="#hasKeyword"/>']));
    for (const learningObject of learningObjects) {
      lines.push(element("Declaration", [`<NamedIndividual IRI="#${classId(classIds, learningObject.id)}_inst"/>`]));
    }

    for (const learningObject of learningObjects) {
      const id = classId(classIds, learningObject.id);
      const individual = `<NamedIndividual IRI="#${id}_inst"/>`;

      lines.push(element("ClassAssertion", [`<Class IRI="#${id}"/>`, individual]));
      lines.push(
        element("DataPropertyAssertion", [
          '<DataProperty abbreviatedIRI="rdfs:label"/>',
          individual,
          `<Literal>${escapeXml(learningObject.title)}</Literal>`
        ])
      );
      lines.push(
        element("DataPropertyAssertion", [
          '<DataProperty IRI="#hasObjectType"/>',
          individual,
          `<Literal>${learningObject.objectType}</Literal>`
        ])
      );
      for (const keyword of learningObject.keywords) {
        lines.push(
          element("DataPropertyAssertion", [
            '<DataProperty IRI="#hasKeyword"/>',
            individual,
            `<Literal>${escapeXml(keyword)}</Literal>`
          ])
        );
      }
      lines.push(
        element("AnnotationAssertion", [
          '<AnnotationProperty abbreviatedIRI="rdfs:comment"/>',
          `<IRI>#${id}</IRI>`,
          `<Literal>${escapeXml(learningObject.content)}</Literal>`
        ])
      );
    }

    for (const relationship of assertable) {
      lines.push(
        element("ObjectPropertyAssertion", [
          `<ObjectProperty IRI="#${relationship.type}"/>`,
          `<NamedIndividual IRI="#${classId(classIds, relationship.sourceId)}_inst"/>`,
          `<NamedIndividual IRI="#${classId(classIds, relationship.targetId)}_inst"/>`
        ])
      );
    }

    lines.push("</Ontology>", "");
    return lines.join("\n");
  }
}

export function toSafeId(value: string): string {
  const safe = value.replace(/[^A-Za-z0-9]/g, "_");
  return safe.length > 0 ? safe : "item";
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#x27;");
}

// Learning-object id -> unique IRI-safe class name; collisions get _2, _3, ...
function assignClassIds(learningObjects: LearningObject[]): Map<string, string> {
  const assigned = new Map<string, string>();
  const used = new Set<string>();

  for (const learningObject of learningObjects) {
    const base = toSafeId(learningObject.title);
    let candidate = base;
    for (let suffix = 2; used.has(candidate); suffix += 1) {
      candidate = `${base}_${suffix}`;
    }
    used.add(candidate);
    assigned.set(learningObject.id, candidate);
  }

  return assigned;
}

function classId(classIds: Map<string, string>, learningObjectId: string): string {
  const id = classIds.get(learningObjectId);
  if (!id) {
    throw new Error(`Learning object ${learningObjectId} has no class IRI.`);
  }
  return id;
}

function element(name: string, children: string[]): string {
  return [`    <${name}>`, ...children.map((child) => `        ${child}`), `    </${name}>`].join("\n");
}
