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
import type { TagFamily } from "./types.ts";

/**
 * Checkbox labels of the CTE lesson plan form, per tag family. Boxes print in the order of the
 * family's key list.
 */
export const MATERIAL_LABELS: Record<MaterialKey, string> = {
  textbook: "Textbook",
  lab_manual: "Lab Manual",
  video_dvd: "Video/DVD",
  labs: "Labs",
  posters: "Posters",
  speaker: "Speaker",
  projector: "Projector",
  computer: "Computer",
  supplemental_materials: "Supplemental Materials",
  student_journals: "Student Journals",
  other_equipment: "Other Equipment",
};

export const METHOD_LABELS: Record<MethodKey, string> = {
  discussion: "Discussion",
  demonstration: "Demonstration",
  lecture: "Lecture",
  powerpoint: "Power Point",
  multimedia: "Multi-Media",
  guest_speaker: "Guest Speaker",
};

export const ASSESSMENT_LABELS: Record<AssessmentKey, string> = {
  homework: "Homework",
  classwork: "Classwork",
  test: "Test",
  project_based: "Project-based",
  teamwork: "Teamwork",
  observation: "Teacher Observation",
  performance: "Performance",
  on_task: "On-Task",
  other: "Other",
};

export const CURRICULUM_LABELS: Record<CurriculumKey, string> = {
  math: "Math",
  science: "Science",
  reading: "Reading",
  social_studies: "Social Studies",
  english: "English",
  government_economics: "Government/Economics",
  fine_arts: "Fine Arts",
  foreign_language: "Foreign Language",
  technology: "Technology",
};

export const OTHER_AREA_LABELS: Record<OtherAreaKey, string> = {
  safety: "Safety",
  management_skills: "Management Skills",
  teamwork: "Teamwork",
  live_work: "Live work",
  higher_order_reasoning: "Higher Order Reasoning",
  varied_learning: "Varied Learning",
  work_ethics: "Work Ethics",
  integrated_academics: "Integrated Academics",
  ctso: "CTSO",
  problem_solving: "Problem Solving",
};

export interface TagFamilyLabels<K extends string> {
  keys: readonly K[];
  labels: Record<K, string>;
}

export const TAG_LABELS = {
  materials: { keys: MATERIAL_KEYS, labels: MATERIAL_LABELS },
  methods: { keys: METHOD_KEYS, labels: METHOD_LABELS },
  assessment: { keys: ASSESSMENT_KEYS, labels: ASSESSMENT_LABELS },
  curriculum: { keys: CURRICULUM_KEYS, labels: CURRICULUM_LABELS },
  otherAreas: { keys: OTHER_AREA_KEYS, labels: OTHER_AREA_LABELS },
} satisfies Record<TagFamily, TagFamilyLabels<string>>;

export interface ChecklistItem {
  label: string;
  checked: boolean;
}

/**
 * Every label of a family, in print order, marked when its key was selected.
 */
export function checklist<K extends string>(family: TagFamilyLabels<K>, selected: readonly K[]): ChecklistItem[] {
  const chosen = new Set(selected);
  return family.keys.map((key) => ({ label: family.labels[key], checked: chosen.has(key) }));
}

// "X Label" for a selected box, "_ Label" otherwise.
export function renderChecklist(items: readonly ChecklistItem[]): string[] {
  return items.map((item) => `${item.checked ? "X" : "_"} ${item.label}`);
}
