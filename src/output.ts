import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { MediaResult } from "./types.ts";

/**
 * Output layout: every week gets its own `WeekNN` folder under the configured output root, and file names
 * carry a filesystem-safe slug of the topic, unit or handout name.
 */
export function weekFolderName(week: number): string {
  return `Week${String(week).padStart(2, "0")}`;
}

// Spaces become underscores and slashes dashes; cut to `maxLength` characters.
export function slugify(text: string, maxLength: number): string {
  return Array.from(text.replaceAll(" ", "_").replaceAll("/", "-"))
    .slice(0, maxLength)
    .join("");
}

export function ctePlanFileName(day: number, topic: string): string {
  return `Day${day}_${slugify(topic || "Lesson", 25)}_CTE.docx`;
}

export function teacherHandoutFileName(week: number, unit: string): string {
  const unitSlug = unit ? slugify(unit, 20) : "Lessons";
  return `Week${week}_${unitSlug}_TeacherHandout.docx`;
}

export function studentHandoutFileName(name: string): string {
  return `${slugify(name || "Handout", 25)}_StudentHandout.docx`;
}

export function bellRingersFileName(week: number): string {
  return `Week${week}_BellRingers.docx`;
}

export function presentationFileName(day: number, topic: string): string {
  return `Day${day}_${slugify(topic || "Lesson", 25)}_Presentation.docx`;
}

export function mediaLogFileName(week: number): string {
  return `Week${week}_Media_Log.txt`;
}

export async function ensureWeekFolder(outputDir: string, week: number): Promise<string> {
  const folder = join(outputDir, weekFolderName(week));
  await mkdir(folder, { recursive: true });
  return folder;
}

export async function writeOutput(folder: string, fileName: string, contents: Buffer | string): Promise<string> {
  const path = join(folder, fileName);
  await writeFile(path, contents);
  return path;
}

/**
 * Media log lines for one day: the suggested video, then the image with its photographer.
 */
export function mediaLogEntries(day: number, topic: string, media: MediaResult): string[] {
  const entries: string[] = [];
  if (media.video) {
    entries.push(`Day ${day} - ${topic} | Video: ${media.video.title} | ${media.video.url}`);
  }
  if (media.image) {
    const credit = media.image.photographer || "unknown photographer";
    entries.push(`Day ${day} - ${topic} | Image: ${credit} | ${media.image.sourceUrl}`);
  }
  return entries;
}

export function formatMediaLog(week: number, unit: string, entries: readonly string[]): string {
  return [`Media Log - Week ${week}: ${unit}`, "=".repeat(60), "", ...entries, ""].join("\n");
}
