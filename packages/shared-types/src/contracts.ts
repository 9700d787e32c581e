/**
 * Shared input/output contracts for the lesson generator.
 *
 * What lives here:
 * - The closed tag enumerations (materials, methods, assessment, curriculum, other areas). The key arrays are
 *   values because the zod schemas in `schemas.ts` build their enums from them.
 * - The lesson/week/handout shapes accepted on the wire. Field names stay snake_case because they mirror the
 *   JSON payload teachers author by hand.
 * - The `LessonInference` bundle the tagging engine hands to the document builders.
 *
 * Runtime validation lives in `schemas.ts`; these are the compile-time shapes.
 */
export const MATERIAL_KEYS = [
  "textbook",
  "lab_manual",
  "video_dvd",
  "labs",
  "posters",
  "speaker",
  "projector",
  "computer",
  "supplemental_materials",
  "student_journals",
  "other_equipment",
] as const;

export const METHOD_KEYS = [
  "discussion",
  "demonstration",
  "lecture",
  "powerpoint",
  "multimedia",
  "guest_speaker",
] as const;

export const ASSESSMENT_KEYS = [
  "homework",
  "classwork",
  "test",
  "project_based",
  "teamwork",
  "observation",
  "performance",
  "on_task",
  "other",
] as const;

export const CURRICULUM_KEYS = [
  "math",
  "science",
  "reading",
  "social_studies",
  "english",
  "government_economics",
  "fine_arts",
  "foreign_language",
  "technology",
] as const;

export const OTHER_AREA_KEYS = [
  "safety",
  "management_skills",
  "teamwork",
  "live_work",
  "higher_order_reasoning",
  "varied_learning",
  "work_ethics",
  "integrated_academics",
  "ctso",
  "problem_solving",
] as const;

export type MaterialKey = (typeof MATERIAL_KEYS)[number];
export type MethodKey = (typeof METHOD_KEYS)[number];
export type AssessmentKey = (typeof ASSESSMENT_KEYS)[number];
export type CurriculumKey = (typeof CURRICULUM_KEYS)[number];
export type OtherAreaKey = (typeof OTHER_AREA_KEYS)[number];

export interface ActivityEntry {
  // Clock time ("9:00") or a length ("10 min"); `duration` is read when `time` is absent.
  time?: string;
  duration?: string;
  // Activity title. `activity` is an older alias some lesson files still use.
  name?: string;
  activity?: string;
  description?: string;
}

// A schedule row may also be a bare line of text.
export type Activity = ActivityEntry | string;

// Either per-level strategies ({ Advanced: "...", ELL: "..." }) or one narrative paragraph.
export type Differentiation = Record<string, string> | string;

export interface LessonRecord {
  topic: string;
  overview?: string;
  objectives?: string[];
  schedule?: Activity[];
  // Free-text equipment list; distinct from the inferred `materials` tags.
  day_materials?: string[];
  differentiation?: Differentiation;
  // Explicit tag overrides. Inference appends to these and never removes an entry.
  materials?: MaterialKey[];
  methods?: MethodKey[];
  assessment?: AssessmentKey[];
  curriculum?: CurriculumKey[];
  other_areas?: OtherAreaKey[];
  duration?: string;
  content_standards?: string;
  embedded_credit?: string;
  lesson_evaluation?: string;
  // One note or a list of notes.
  teacher_notes?: string | string[];
  procedures?: string;
  individual_differences?: string;
  vocabulary?: Record<string, string>;
  day_label?: string;
}

export interface HandoutSection {
  heading: string;
  content?: string;
  items?: string[];
  numbered?: boolean;
  // Number of blank answer lines printed under the section.
  blank_lines?: number;
}

export interface HandoutRecord {
  // Used for the output file name.
  name: string;
  title?: string;
  subtitle?: string;
  instructions?: string;
  sections?: HandoutSection[];
  questions?: string[];
  vocabulary?: Record<string, string>;
  tips?: string[];
  notes?: string[];
}

export interface WeekRecord {
  week: number;
  // Unit name; also selects the colour theme of the teacher handout.
  unit: string;
  days: LessonRecord[];
  week_overview?: string;
  week_focus?: string;
  week_objectives?: string[];
  week_materials?: string[];
  assessment_overview?: string;
  formative_assessment?: string;
  summative_assessment?: string;
  weekly_deliverable?: string;
  vocabulary_summary?: Record<string, string>;
  standards_alignment?: string;
  teacher_notes?: string | string[];
  student_handouts?: HandoutRecord[];
  skip_media?: boolean;
  skip_presentations?: boolean;
}

export interface LessonInference {
  materials: MaterialKey[];
  methods: MethodKey[];
  assessment: AssessmentKey[];
  curriculum: CurriculumKey[];
  otherAreas: OtherAreaKey[];
  overviewText: string;
  proceduresText: string;
  differentiationText: string;
}

// Every field holds a path under the configured output directory.
export interface GenerationResult {
  weekFolder: string;
  ctePlans: string[];
  teacherHandout: string;
  studentHandouts: string[];
  bellRingers: string;
  // One per day; empty when the week sets `skip_presentations`. A day whose deck fails is left out.
  dailyPresentations: string[];
  // Absent when media lookups were skipped or produced no entries.
  mediaLog?: string;
}
