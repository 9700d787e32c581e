import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  ASSESSMENT_KEYS,
  CURRICULUM_KEYS,
  MATERIAL_KEYS,
  METHOD_KEYS,
  OTHER_AREA_KEYS,
  type AssessmentKey,
  type CurriculumKey,
  type MaterialKey,
  type MethodKey,
  type OtherAreaKey,
} from "@cte-kit/shared-types/contracts";
import type { KeywordTable } from "./types.ts";

/**
 * Keyword tables for the tagging engine.
 *
 * The tables are configuration data kept in `data/keyword_tables.json`. They are read and validated once
 * when this module loads, then frozen; the inference functions only ever see the frozen copies.
 *
 * - Family tables drive the uniform substring scan (`classify`).
 * - `rules` holds the keyword lists of the derived rules (lecture, reading, exit ticket, varied learning),
 *   which need more than keyword presence and are folded into the table scan at fixed positions.
 */
const keyword = z
  .string()
  .min(1)
  .refine((value) => value === value.toLowerCase(), "keywords must be lowercase");

function tableSchema<K extends string>(keys: readonly [K, ...K[]]) {
  return z
    .array(z.object({ key: z.enum(keys), keywords: z.array(keyword).min(1) }))
    .refine((entries) => new Set(entries.map((entry) => entry.key)).size === entries.length, "duplicate key");
}

const keywordTablesSchema = z.object({
  materials: tableSchema(MATERIAL_KEYS),
  methods: tableSchema(METHOD_KEYS),
  assessment: tableSchema(ASSESSMENT_KEYS),
  curriculum: tableSchema(CURRICULUM_KEYS),
  otherAreas: tableSchema(OTHER_AREA_KEYS),
  rules: z.object({
    lectureActivityNames: z.array(keyword),
    lectureKeywords: z.array(keyword),
    readingKeywords: z.array(keyword),
    exitTicketKeywords: z.array(keyword),
    modalityKeywords: z.array(keyword),
  }),
});

export interface DerivedRuleKeywords {
  // Exact (lowercased) activity names that mark a lecture segment.
  lectureActivityNames: readonly string[];
  lectureKeywords: readonly string[];
  readingKeywords: readonly string[];
  exitTicketKeywords: readonly string[];
  // Sensory/modality words that mark varied learning.
  modalityKeywords: readonly string[];
}

export interface KeywordTables {
  materials: KeywordTable<MaterialKey>;
  methods: KeywordTable<MethodKey>;
  assessment: KeywordTable<AssessmentKey>;
  curriculum: KeywordTable<CurriculumKey>;
  otherAreas: KeywordTable<OtherAreaKey>;
  rules: DerivedRuleKeywords;
}

function freezeTable<K extends string>(entries: ReadonlyArray<{ key: K; keywords: string[] }>): KeywordTable<K> {
  return Object.freeze(entries.map((entry) => Object.freeze({ key: entry.key, keywords: Object.freeze([...entry.keywords]) })));
}

/**
 * Validate raw table data (the parsed JSON file) into frozen keyword tables.
 * Throws a `ZodError` naming the offending path when the data is malformed.
 */
export function parseKeywordTables(raw: unknown): KeywordTables {
  const parsed = keywordTablesSchema.parse(raw);
  return Object.freeze({
    materials: freezeTable(parsed.materials),
    methods: freezeTable(parsed.methods),
    assessment: freezeTable(parsed.assessment),
    curriculum: freezeTable(parsed.curriculum),
    otherAreas: freezeTable(parsed.otherAreas),
    rules: Object.freeze({
      lectureActivityNames: Object.freeze([...parsed.rules.lectureActivityNames]),
      lectureKeywords: Object.freeze([...parsed.rules.lectureKeywords]),
      readingKeywords: Object.freeze([...parsed.rules.readingKeywords]),
      exitTicketKeywords: Object.freeze([...parsed.rules.exitTicketKeywords]),
      modalityKeywords: Object.freeze([...parsed.rules.modalityKeywords]),
    }),
  });
}

const TABLES_PATH = new URL("../data/keyword_tables.json", import.meta.url);

export const KEYWORD_TABLES: KeywordTables = parseKeywordTables(JSON.parse(readFileSync(TABLES_PATH, "utf8")));
