import type { LessonRecord } from "@cte-kit/shared-types/contracts";
import { scheduleEntries } from "../aggregator.ts";

const DAY_NAMES = ["Monday", "Tuesday", "Wednesday", "Thursday", "Friday"] as const;
const BELL_RINGER_MARKERS = ["bell ringer", "bellringer", "warm up", "warmup"] as const;

export const BELL_RINGER_PLACEHOLDER = "[Add Bell Ringer prompt]";

/**
 * Display name of the day at zero-based `index`: the lesson's own `day_label`, then Monday–Friday, then "Day N".
 */
export function dayLabel(lesson: LessonRecord, index: number): string {
  return lesson.day_label || DAY_NAMES[index] || `Day ${index + 1}`;
}

/**
 * Prompt of the first warm-up activity in the schedule, or the placeholder when there is none (or it is blank).
 */
export function findBellRinger(lesson: LessonRecord): string {
  const warmUp = scheduleEntries(lesson).find((activity) => {
    const name = (activity.name ?? activity.activity ?? "").toLowerCase();
    return BELL_RINGER_MARKERS.some((marker) => name.includes(marker));
  });
  return warmUp?.description || BELL_RINGER_PLACEHOLDER;
}
