import { z } from "zod";
import {
  ASSESSMENT_KEYS,
  CURRICULUM_KEYS,
  MATERIAL_KEYS,
  METHOD_KEYS,
  OTHER_AREA_KEYS,
  type HandoutRecord,
  type LessonRecord,
} from "./contracts.ts";

/**
 * Runtime validation schemas for lesson payloads.
 *
 * How these schemas are used:
 * - `src/validator.ts` parses each day separately with `lessonRecordSchema` so one broken day does not reject
 *   the whole week.
 * - Unknown keys are stripped (zod's default), so extra authoring notes in the JSON are ignored.
 */
const textList = z.array(z.string());

/**
 * Tag keys per override field. Entries outside a field's categories have no checkbox, so `tagList` drops them
 * instead of failing the day; the validator reports what was dropped.
 */
export const TAG_FIELD_KEYS = {
  materials: MATERIAL_KEYS,
  methods: METHOD_KEYS,
  assessment: ASSESSMENT_KEYS,
  curriculum: CURRICULUM_KEYS,
  other_areas: OTHER_AREA_KEYS,
} as const;

function tagList<K extends string>(keys: readonly K[]) {
  const known = new Set<string>(keys);
  return z.array(z.string()).transform((tags) => tags.filter((tag): tag is K => known.has(tag)));
}
const glossary = z.record(z.string());
const notes = z.union([z.string(), textList]);

export const activitySchema = z.union([
  z.string(),
  z.object({
    time: z.string().optional(),
    duration: z.string().optional(),
    name: z.string().optional(),
    activity: z.string().optional(),
    description: z.string().optional(),
  }),
]);

export const lessonRecordSchema: z.ZodType<LessonRecord, z.ZodTypeDef, unknown> = z.object({
  // Kept as authored; only a blank topic is rejected.
  topic: z
    .string({ required_error: "is required", invalid_type_error: "must be a string" })
    .refine((topic) => topic.trim().length > 0, "must not be empty"),
  overview: z.string().optional(),
  objectives: textList.optional(),
  schedule: z.array(activitySchema).optional(),
  day_materials: textList.optional(),
  differentiation: z.union([z.string(), z.record(z.string())]).optional(),
  materials: tagList(MATERIAL_KEYS).optional(),
  methods: tagList(METHOD_KEYS).optional(),
  assessment: tagList(ASSESSMENT_KEYS).optional(),
  curriculum: tagList(CURRICULUM_KEYS).optional(),
  other_areas: tagList(OTHER_AREA_KEYS).optional(),
  // Durations are often authored as numbers ("duration": 90).
  duration: z.union([z.string(), z.number().transform(String)]).optional(),
  content_standards: z.string().optional(),
  embedded_credit: z.string().optional(),
  lesson_evaluation: z.string().optional(),
  teacher_notes: notes.optional(),
  procedures: z.string().optional(),
  individual_differences: z.string().optional(),
  vocabulary: glossary.optional(),
  day_label: z.string().optional(),
});

export const handoutSectionSchema = z.object({
  heading: z.string(),
  content: z.string().optional(),
  items: textList.optional(),
  numbered: z.boolean().optional(),
  blank_lines: z.number().int().nonnegative().optional(),
});

export const handoutRecordSchema: z.ZodType<HandoutRecord, z.ZodTypeDef, unknown> = z.object({
  name: z.string().min(1).default("Handout"),
  title: z.string().optional(),
  subtitle: z.string().optional(),
  instructions: z.string().optional(),
  sections: z.array(handoutSectionSchema).optional(),
  questions: textList.optional(),
  vocabulary: glossary.optional(),
  tips: textList.optional(),
  notes: textList.optional(),
});

const WHOLE_NUMBER = "must be a whole number";

// A positive integer, or its digits as a string ("04" is week 4).
export const weekNumberSchema = z
  .union([z.number(), z.string()], { errorMap: () => ({ message: WHOLE_NUMBER }) })
  .default(1)
  .transform((value, ctx) => {
    const week = typeof value === "string" && /^\d+$/.test(value) ? Number(value) : value;
    if (typeof week === "string" || !Number.isInteger(week)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: WHOLE_NUMBER });
      return z.NEVER;
    }
    if (week < 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a positive number" });
      return z.NEVER;
    }
    return week;
  });

/**
 * Week envelope: every week-level field is checked here, while `days` is left as raw values so the validator
 * can report per-day problems with their index.
 */
export const weekEnvelopeSchema = z.object({
  week: weekNumberSchema,
  unit: z.string().default(""),
  days: z.array(z.unknown()).min(1, "must not be empty"),
  week_overview: z.string().optional(),
  week_focus: z.string().optional(),
  week_objectives: textList.optional(),
  week_materials: textList.optional(),
  assessment_overview: z.string().optional(),
  formative_assessment: z.string().optional(),
  summative_assessment: z.string().optional(),
  weekly_deliverable: z.string().optional(),
  vocabulary_summary: glossary.optional(),
  standards_alignment: z.string().optional(),
  teacher_notes: notes.optional(),
  student_handouts: z.array(handoutRecordSchema).optional(),
  skip_media: z.boolean().optional(),
  skip_presentations: z.boolean().optional(),
});

export type WeekEnvelope = z.infer<typeof weekEnvelopeSchema>;

