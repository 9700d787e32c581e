import type { GenerationResult, LessonRecord, WeekRecord } from "@cte-kit/shared-types/contracts";
import { bellRingerDocument, buildBellRingerPages } from "./documents/bell_ringers.ts";
import { buildCtePlanRows, ctePlanDocument, type PlanContext } from "./documents/cte_plan.ts";
import { renderDocx } from "./documents/docx_helpers.ts";
import { buildPresentationSlides, presentationDocument } from "./documents/presentation.ts";
import { studentHandoutDocument } from "./documents/student_handout.ts";
import { teacherHandoutDocument } from "./documents/teacher_handout.ts";
import { infer } from "./inference.ts";
import { errorMessage, type Logger } from "./logger.ts";
import {
  bellRingersFileName,
  ctePlanFileName,
  ensureWeekFolder,
  formatMediaLog,
  mediaLogEntries,
  mediaLogFileName,
  presentationFileName,
  studentHandoutFileName,
  teacherHandoutFileName,
  writeOutput,
} from "./output.ts";
import type { AppConfig, MediaResult } from "./types.ts";

/**
 * Week generation pipeline:
 * - infer tags and derived text for every day, write one CTE plan per day
 * - look up media per day (unless the week opts out); a failed lookup only costs that day its media
 * - write the teacher handout, student handouts and bell ringers
 * - write one presentation per day (unless the week opts out); a failed deck only costs that day its deck
 * - write the media log when any media was found
 *
 * Days are processed in order and one at a time, so file numbering and log order follow the input.
 */
export interface MediaSource {
  fetchMedia(topic: string): Promise<MediaResult>;
}

export interface GeneratorDeps {
  config: Pick<AppConfig, "outputDir" | "courseTitle" | "defaultDuration">;
  logger: Logger;
  media: MediaSource;
}

function planContext(week: number, config: GeneratorDeps["config"]): PlanContext {
  return { week, courseTitle: config.courseTitle, defaultDuration: config.defaultDuration };
}

async function writeCtePlan(folder: string, lesson: LessonRecord, day: number, week: number, deps: GeneratorDeps) {
  const rows = buildCtePlanRows(lesson, infer(lesson), planContext(week, deps.config));
  const buffer = await renderDocx(ctePlanDocument(rows));
  const path = await writeOutput(folder, ctePlanFileName(day, lesson.topic), buffer);
  deps.logger.debug("CTE plan written", { week, day, path });
  return path;
}

async function writePresentations(folder: string, week: WeekRecord, media: ReadonlyMap<number, MediaResult>, deps: GeneratorDeps) {
  const paths: string[] = [];
  for (const [index, lesson] of week.days.entries()) {
    try {
      const dayMedia = media.get(index);
      const slides = buildPresentationSlides(lesson, index, week.week, dayMedia?.video);
      const buffer = await renderDocx(presentationDocument(lesson, index, week.unit, slides, dayMedia));
      paths.push(await writeOutput(folder, presentationFileName(index + 1, lesson.topic), buffer));
    } catch (error) {
      deps.logger.warn("Presentation failed; continuing with the next day", {
        week: week.week,
        day: index + 1,
        error: errorMessage(error),
      });
    }
  }
  return paths;
}

async function lookupMedia(week: WeekRecord, deps: GeneratorDeps) {
  const media = new Map<number, MediaResult>();
  const entries: string[] = [];
  for (const [index, lesson] of week.days.entries()) {
    try {
      const result = await deps.media.fetchMedia(lesson.topic);
      media.set(index, result);
      entries.push(...mediaLogEntries(index + 1, lesson.topic, result));
    } catch (error) {
      deps.logger.warn("Media lookup failed; continuing without media", {
        week: week.week,
        day: index + 1,
        error: errorMessage(error),
      });
    }
  }
  return { media, entries };
}

export async function generateWeek(week: WeekRecord, deps: GeneratorDeps): Promise<GenerationResult> {
  const folder = await ensureWeekFolder(deps.config.outputDir, week.week);
  deps.logger.info("Generating week", { week: week.week, unit: week.unit, days: week.days.length });

  const ctePlans: string[] = [];
  for (const [index, lesson] of week.days.entries()) {
    ctePlans.push(await writeCtePlan(folder, lesson, index + 1, week.week, deps));
  }

  const skipMedia = Boolean(week.skip_media || week.skip_presentations);
  const { media, entries } = skipMedia ? { media: new Map<number, MediaResult>(), entries: [] } : await lookupMedia(week, deps);

  const teacherHandout = await writeOutput(
    folder,
    teacherHandoutFileName(week.week, week.unit),
    await renderDocx(teacherHandoutDocument(week, { courseTitle: deps.config.courseTitle, media })),
  );

  const studentHandouts: string[] = [];
  for (const handout of week.student_handouts ?? []) {
    const buffer = await renderDocx(studentHandoutDocument(handout, week.unit, deps.config.courseTitle));
    studentHandouts.push(await writeOutput(folder, studentHandoutFileName(handout.name), buffer));
  }

  const bellRingers = await writeOutput(
    folder,
    bellRingersFileName(week.week),
    await renderDocx(bellRingerDocument(week, buildBellRingerPages(week))),
  );

  const dailyPresentations = week.skip_presentations ? [] : await writePresentations(folder, week, media, deps);

  let mediaLog: string | undefined;
  if (entries.length > 0) {
    mediaLog = await writeOutput(folder, mediaLogFileName(week.week), formatMediaLog(week.week, week.unit, entries));
  }

  deps.logger.info("Week generated", {
    week: week.week,
    folder,
    ctePlans: ctePlans.length,
    presentations: dailyPresentations.length,
    mediaEntries: entries.length,
  });
  return { weekFolder: folder, ctePlans, teacherHandout, studentHandouts, bellRingers, dailyPresentations, mediaLog };
}

// Input without `days`: one plan, written as day 1 of the given week.
export async function generateLessonPlan(lesson: LessonRecord, week: number, deps: GeneratorDeps): Promise<string> {
  const folder = await ensureWeekFolder(deps.config.outputDir, week);
  const path = await writeCtePlan(folder, lesson, 1, week, deps);
  deps.logger.info("Lesson plan generated", { week, path });
  return path;
}
