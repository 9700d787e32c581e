import type {
  AssessmentKey,
  CurriculumKey,
  LessonInference,
  LessonRecord,
  MaterialKey,
  MethodKey,
  OtherAreaKey,
} from "@cte-kit/shared-types/contracts";
import {
  ACTIVITY_SURFACES,
  CONTENT_SURFACES,
  MATERIAL_SURFACES,
  activityNames,
  aggregateText,
} from "./aggregator.ts";
import { appendUnique, classify, containsAny, type DerivedRule } from "./classifier.ts";
import { buildDifferentiationText, buildOverviewText, buildProceduresText } from "./derived_text.ts";
import { KEYWORD_TABLES, type DerivedRuleKeywords, type KeywordTables } from "./keywords.ts";

/**
 * Tagging engine.
 *
 * Everything in this module is pure: no I/O, no shared mutable state. The tables default to the frozen
 * `KEYWORD_TABLES`; tests pass their own.
 *
 * Each family runs one table pass. Derived rules look at more than keyword presence (activity names,
 * differentiation data, the curriculum result), so they are kept out of the tables and named below; each one
 * is scanned at a fixed position among the table keys.
 */
function hasDifferentiation(lesson: LessonRecord): boolean {
  const diff = lesson.differentiation;
  if (diff === undefined) return false;
  return typeof diff === "string" ? diff.length > 0 : Object.keys(diff).length > 0;
}

// `reading` follows research/reading/article text even when the caller already supplied `english`.
export function readingRule(text: string, rules: DerivedRuleKeywords): DerivedRule<CurriculumKey> {
  return { key: "reading", after: "english", applies: () => containsAny(text, rules.readingKeywords) };
}

// Lecture: an activity named exactly like a lecture segment, or lecture wording anywhere in the text.
export function lectureRule(lesson: LessonRecord, text: string, rules: DerivedRuleKeywords): DerivedRule<MethodKey> {
  return {
    key: "lecture",
    after: "demonstration",
    applies: () =>
      activityNames(lesson).some((name) => rules.lectureActivityNames.includes(name)) ||
      containsAny(text, rules.lectureKeywords),
  };
}

export function variedLearningRule(
  lesson: LessonRecord,
  text: string,
  rules: DerivedRuleKeywords,
): DerivedRule<OtherAreaKey> {
  return {
    key: "varied_learning",
    after: "higher_order_reasoning",
    applies: () => containsAny(text, rules.modalityKeywords) || hasDifferentiation(lesson),
  };
}

export function integratedAcademicsRule(curriculum: readonly CurriculumKey[]): DerivedRule<OtherAreaKey> {
  return { key: "integrated_academics", after: "work_ethics", applies: () => curriculum.length > 0 };
}

// Exit tickets and reflections count as classwork. `classwork` already leads the table, so this runs last.
export function applyExitTicketRule(assessment: readonly AssessmentKey[], text: string, rules: DerivedRuleKeywords) {
  return appendUnique(assessment, ["classwork"], () => containsAny(text, rules.exitTicketKeywords));
}

export function inferMaterials(lesson: LessonRecord, tables: KeywordTables = KEYWORD_TABLES): MaterialKey[] {
  return classify(tables.materials, aggregateText(lesson, MATERIAL_SURFACES), lesson.materials);
}

export function inferMethods(lesson: LessonRecord, tables: KeywordTables = KEYWORD_TABLES): MethodKey[] {
  const text = aggregateText(lesson, ACTIVITY_SURFACES);
  return classify(tables.methods, text, lesson.methods, [lectureRule(lesson, text, tables.rules)]);
}

export function inferAssessment(lesson: LessonRecord, tables: KeywordTables = KEYWORD_TABLES): AssessmentKey[] {
  const text = aggregateText(lesson, ACTIVITY_SURFACES);
  const assessment = classify(tables.assessment, text, lesson.assessment);
  return applyExitTicketRule(assessment, text, tables.rules);
}

export function inferCurriculumAreas(lesson: LessonRecord, tables: KeywordTables = KEYWORD_TABLES): CurriculumKey[] {
  const text = aggregateText(lesson, CONTENT_SURFACES);
  return classify(tables.curriculum, text, lesson.curriculum, [readingRule(text, tables.rules)]);
}

/**
 * Needs the curriculum result of the same lesson: `integrated_academics` is set whenever it is non-empty.
 */
export function inferOtherAreas(
  lesson: LessonRecord,
  curriculum: readonly CurriculumKey[],
  tables: KeywordTables = KEYWORD_TABLES,
): OtherAreaKey[] {
  const text = aggregateText(lesson, ACTIVITY_SURFACES);
  return classify(tables.otherAreas, text, lesson.other_areas, [
    variedLearningRule(lesson, text, tables.rules),
    integratedAcademicsRule(curriculum),
  ]);
}

/**
 * Infer every tag family and the derived text blocks for one lesson.
 */
export function infer(lesson: LessonRecord, tables: KeywordTables = KEYWORD_TABLES): LessonInference {
  const curriculum = inferCurriculumAreas(lesson, tables);
  return {
    materials: inferMaterials(lesson, tables),
    methods: inferMethods(lesson, tables),
    assessment: inferAssessment(lesson, tables),
    curriculum,
    otherAreas: inferOtherAreas(lesson, curriculum, tables),
    overviewText: buildOverviewText(lesson),
    proceduresText: buildProceduresText(lesson),
    differentiationText: buildDifferentiationText(lesson),
  };
}
