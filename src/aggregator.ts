import type { Activity, ActivityEntry, LessonRecord } from "@cte-kit/shared-types/contracts";

/**
 * Text aggregator: flattens the searchable parts of a lesson into one lowercase string.
 *
 * Each tag family reads a different set of surfaces:
 * - materials: topic, overview, objectives, day materials, schedule
 * - methods, assessment, other areas: topic, overview, objectives, schedule
 * - curriculum: topic, overview, objectives
 */
export interface TextSurfaces {
  dayMaterials: boolean;
  schedule: boolean;
}

export const MATERIAL_SURFACES: TextSurfaces = { dayMaterials: true, schedule: true };
export const ACTIVITY_SURFACES: TextSurfaces = { dayMaterials: false, schedule: true };
export const CONTENT_SURFACES: TextSurfaces = { dayMaterials: false, schedule: false };

export function isActivityEntry(activity: Activity): activity is ActivityEntry {
  return typeof activity !== "string";
}

// Bare-string schedule rows carry no name or description and are not searched.
export function scheduleEntries(lesson: LessonRecord): ActivityEntry[] {
  return (lesson.schedule ?? []).filter(isActivityEntry);
}

/**
 * Every object activity contributes `" " + name + " " + description`, so the schedule segment starts with a
 * space of its own.
 */
function scheduleText(lesson: LessonRecord): string {
  return scheduleEntries(lesson)
    .map((activity) => ` ${activity.name ?? ""} ${activity.description ?? ""}`)
    .join("");
}

export function aggregateText(lesson: LessonRecord, surfaces: TextSurfaces): string {
  const parts = [lesson.topic, lesson.overview ?? "", (lesson.objectives ?? []).join(" ")];
  if (surfaces.dayMaterials) {
    parts.push((lesson.day_materials ?? []).join(" "));
  }
  if (surfaces.schedule) {
    parts.push(scheduleText(lesson));
  }
  return parts.join(" ").toLowerCase();
}

// Lowercased names of the object activities, in schedule order.
export function activityNames(lesson: LessonRecord): string[] {
  return scheduleEntries(lesson).map((activity) => (activity.name ?? "").toLowerCase());
}
