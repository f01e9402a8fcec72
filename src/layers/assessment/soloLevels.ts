import type { BloomLevel, QuestionType, SoloLevel } from "../../domain/models.js";

// Prestructural is described so the model sees the whole hierarchy; it is never requested.
export const SOLO_DEFINITIONS: ReadonlyArray<readonly [string, string]> = [
  ["prestructural", "The learner misses the point; the response is irrelevant or shows no understanding."],
  ["unistructural", "One relevant aspect is grasped: a single fact, term or definition is recalled or identified."],
  [
    "multistructural",
    "Several relevant aspects are known but treated independently: listing, describing, enumerating, combining."
  ],
  [
    "relational",
    "The aspects are integrated into a structure: comparing, contrasting, explaining causes, relating parts to a whole."
  ],
  [
    "extended_abstract",
    "The integrated structure is generalized to a new domain: hypothesizing, theorizing, transferring, predicting."
  ]
];

export const LEVEL_CONSTRAINTS: Record<SoloLevel, string[]> = {
  unistructural: [
    "Ask about exactly one fact from the single learning object supplied.",
    'Use recall or identification stems such as "What is ...?", "Which term ...?" or "Identify ...".',
    "Do not require combining it with any other idea."
  ],
  multistructural: [
    "Ask the learner to recognize or list several independent aspects of the section.",
    "The question must draw on at least two of the learning objects supplied.",
    "Do NOT ask how the aspects relate, compare, cause or depend on each other."
  ],
  relational: [
    "Ask how the ideas in the section connect: compare, contrast, explain cause and effect or dependency.",
    "Use the relationships supplied as the backbone of the question.",
    "A correct answer must require understanding at least two ideas together."
  ],
  extended_abstract: [
    "Combine ideas from BOTH lessons supplied and transfer them to a new situation not described in either.",
    "Ask the learner to generalize, hypothesize, predict or evaluate beyond the material.",
    "A correct answer must depend on principles from both lessons."
  ]
};

export const LEVEL_BLOOM: Record<SoloLevel, BloomLevel> = {
  unistructural: "remember",
  multistructural: "understand",
  relational: "analyze",
  extended_abstract: "create"
};

export const LEVEL_DIFFICULTY: Record<SoloLevel, number> = {
  unistructural: 0.2,
  multistructural: 0.4,
  relational: 0.6,
  extended_abstract: 0.8
};

export const QUESTION_SCHEMAS: Record<QuestionType, string[]> = {
  multiple_choice: [
    "{",
    '  "question": string,',
    '  "options": [string, string, string, string],',
    '  "correct_option_index": number (0-3),',
    '  "correct_answer": string (identical to options[correct_option_index]),',
    '  "explanation": string,',
    '  "difficulty": number (0-1)',
    "}"
  ],
  true_false: [
    "{",
    '  "question": string (a statement to judge),',
    '  "correct_answer": "True" | "False",',
    '  "explanation": string,',
    '  "difficulty": number (0-1)',
    "}"
  ],
  short_answer: [
    "{",
    '  "question": string,',
    '  "correct_answer": string (a model answer of one to three sentences),',
    '  "explanation": string,',
    '  "difficulty": number (0-1)',
    "}"
  ]
};
