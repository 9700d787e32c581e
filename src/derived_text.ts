import type { LessonRecord } from "@cte-kit/shared-types/contracts";
import { scheduleEntries } from "./aggregator.ts";

/**
 * Narrative fields synthesized from structured lesson data when the author did not write them.
 * An explicit field always wins over the synthesized text.
 */
const OBJECTIVE_PREFIXES = ["students will ", "to "] as const;
const HANDS_ON_MARKERS = ["hands-on", "activity", "practice"] as const;
const HIGHLIGHT_LENGTH = 100;

// Levels printed first, in this order, with their display prefix.
const PRIORITY_LEVELS = [
  ["Advanced", "Advanced Learners"],
  ["Struggling", "Struggling Learners"],
  ["ELL", "ELL Students"],
] as const;

/**
 * Remove `prefix` once if `text` starts with it. Literal comparison; no pattern matching.
 */
export function stripLeadingLiteral(text: string, prefix: string): string {
  return text.startsWith(prefix) ? text.slice(prefix.length) : text;
}

export function cleanObjective(objective: string): string {
  return OBJECTIVE_PREFIXES.reduce((text, prefix) => stripLeadingLiteral(text, prefix), objective.toLowerCase());
}

// First `length` characters, counted by code point so emoji and accents are never split.
function truncate(text: string, length: number): string {
  return Array.from(text).slice(0, length).join("");
}

export function buildOverviewText(lesson: LessonRecord): string {
  if (lesson.overview) {
    return lesson.overview;
  }

  const topic = lesson.topic || "the lesson topic";
  const objectives = lesson.objectives ?? [];
  const parts = [`Students will learn about ${topic}.`];

  if (objectives.length === 1) {
    // The period is appended as-is; an objective that already ends in "." yields "..".
    parts.push(`The primary objective is to ${cleanObjective(objectives[0])}.`);
  } else if (objectives.length > 1) {
    const [first, ...rest] = objectives;
    parts.push(`Key objectives include: ${cleanObjective(first)}`);
    for (const objective of rest) {
      parts.push(`and ${cleanObjective(objective)}`);
    }
  }

  const handsOn = scheduleEntries(lesson).find((activity) => {
    const name = (activity.name ?? "").toLowerCase();
    return HANDS_ON_MARKERS.some((marker) => name.includes(marker));
  });
  if (handsOn) {
    const highlight = truncate(handsOn.description ?? "", HIGHLIGHT_LENGTH);
    parts.push(`Students will engage in hands-on activities including: ${highlight}...`);
  }

  return parts.join(" ");
}

export function buildProceduresText(lesson: LessonRecord): string {
  if (lesson.procedures) {
    return lesson.procedures;
  }

  const lines: string[] = [];
  for (const activity of lesson.schedule ?? []) {
    if (typeof activity === "string") {
      lines.push(activity);
      continue;
    }
    const time = activity.time ?? activity.duration ?? "";
    const name = activity.name ?? activity.activity ?? "";
    const desc = activity.description ?? "";
    if (time && name) {
      lines.push(desc ? `${time} - ${name}: ${desc}` : `${time} - ${name}`);
    } else if (name) {
      lines.push(desc ? `${name}: ${desc}` : name);
    }
  }
  return lines.join("\n");
}

export function buildDifferentiationText(lesson: LessonRecord): string {
  if (lesson.individual_differences) {
    return lesson.individual_differences;
  }

  const diff = lesson.differentiation;
  if (diff === undefined) return "";
  if (typeof diff === "string") return diff;

  const lines: string[] = [];
  for (const [level, label] of PRIORITY_LEVELS) {
    const strategy = diff[level];
    if (strategy) {
      lines.push(`${label}: ${strategy}`);
    }
  }

  const priority = new Set<string>(PRIORITY_LEVELS.map(([level]) => level));
  for (const [level, strategy] of Object.entries(diff)) {
    if (!priority.has(level)) {
      lines.push(`${level}: ${strategy}`);
    }
  }
  return lines.join("\n");
}
