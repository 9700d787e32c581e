import type { ZodError } from "zod";
import type { LessonRecord, WeekRecord } from "@cte-kit/shared-types/contracts";
import { TAG_FIELD_KEYS, lessonRecordSchema, weekEnvelopeSchema, weekNumberSchema } from "@cte-kit/shared-types/schemas";

/**
 * Boundary validator for lesson input.
 *
 * - `validateLesson` checks one day and returns either a typed `LessonRecord` or its errors.
 * - `validateWeek` checks the week envelope, then every day on its own. Invalid days are reported and
 *   dropped while the valid ones are kept, so one broken day does not block the rest of the week.
 * - `validateSingleLesson` handles payloads without `days` (one lesson plan, optional `week` number).
 *
 * Errors are path-prefixed strings (`days[2].topic: is required`) so the raw JSON can be fixed quickly.
 * Warnings use the same format for input that was accepted with changes (unknown tags are dropped).
 */
export type ValidationResult<T> = { ok: true; value: T; warnings: string[] } | { ok: false; errors: string[] };

// A week can succeed while still carrying the errors of the days it dropped.
export type WeekValidation =
  | { ok: true; value: WeekRecord; errors: string[]; warnings: string[] }
  | { ok: false; errors: string[] };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function formatPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === "number") return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, "");
}

function formatIssues(error: ZodError, prefix: ReadonlyArray<string | number> = []): string[] {
  return error.issues.map((issue) => {
    const path = formatPath([...prefix, ...issue.path]);
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function unknownTags(value: Record<string, unknown>, prefix: ReadonlyArray<string | number>): string[] {
  const warnings: string[] = [];
  for (const [field, keys] of Object.entries(TAG_FIELD_KEYS)) {
    const tags = value[field];
    if (!Array.isArray(tags)) continue;
    const known = new Set<string>(keys);
    tags.forEach((tag: unknown, index) => {
      if (typeof tag === "string" && !known.has(tag)) {
        warnings.push(`${formatPath([...prefix, field, index])}: unknown tag "${tag}" ignored`);
      }
    });
  }
  return warnings;
}

export function validateLesson(value: unknown, index?: number): ValidationResult<LessonRecord> {
  const prefix = index === undefined ? [] : ["days", index];
  if (!isRecord(value)) {
    const location = formatPath(prefix) || "lesson";
    return { ok: false, errors: [`${location}: must be an object`] };
  }

  const parsed = lessonRecordSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, errors: formatIssues(parsed.error, prefix) };
  }
  return { ok: true, value: parsed.data, warnings: unknownTags(value, prefix) };
}

export function validateWeek(data: unknown): WeekValidation {
  if (!isRecord(data)) {
    return { ok: false, errors: ["week payload must be a JSON object"] };
  }

  const envelope = weekEnvelopeSchema.safeParse(data);
  if (!envelope.success) {
    return { ok: false, errors: formatIssues(envelope.error) };
  }

  const errors: string[] = [];
  const warnings: string[] = [];
  const days: LessonRecord[] = [];
  envelope.data.days.forEach((day, index) => {
    const result = validateLesson(day, index);
    if (result.ok) {
      days.push(result.value);
      warnings.push(...result.warnings);
    } else {
      errors.push(...result.errors);
    }
  });

  if (days.length === 0) {
    return { ok: false, errors: [...errors, "days: no valid lessons"] };
  }

  const week: WeekRecord = { ...envelope.data, days };
  return { ok: true, value: week, errors, warnings };
}

export function validateSingleLesson(data: unknown): ValidationResult<{ week: number; lesson: LessonRecord }> {
  const lesson = validateLesson(data);
  if (!lesson.ok) {
    return lesson;
  }
  const week = weekNumberSchema.safeParse(isRecord(data) ? data.week : undefined);
  if (!week.success) {
    return { ok: false, errors: formatIssues(week.error, ["week"]) };
  }
  return { ok: true, value: { week: week.data, lesson: lesson.value }, warnings: lesson.warnings };
}
