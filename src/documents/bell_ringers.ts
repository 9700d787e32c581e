import { AlignmentType, Paragraph, TableRow, type Document } from "docx";
import type { WeekRecord } from "@cte-kit/shared-types/contracts";
import { createDocument, fullWidthTable, shadedCell, textRun, LIGHT_BLUE, type Block } from "./docx_helpers.ts";
import { dayLabel, findBellRinger } from "./days.ts";
import { themeForUnit } from "./theme.ts";

/**
 * Bell ringer prompts for the week, one page per day, sized to be projected at the start of class.
 */
export interface BellRingerPage {
  day: string;
  topic: string;
  prompt: string;
}

export function buildBellRingerPages(week: WeekRecord): BellRingerPage[] {
  return week.days.map((lesson, index) => ({
    day: dayLabel(lesson, index),
    topic: lesson.topic,
    prompt: findBellRinger(lesson),
  }));
}

export function bellRingerDocument(week: WeekRecord, pages: readonly BellRingerPage[]): Document {
  const theme = themeForUnit(week.unit);
  const sections = pages.map((page): Block[] => [
    fullWidthTable([
      new TableRow({
        children: [
          shadedCell(
            [
              new Paragraph({
                alignment: AlignmentType.CENTER,
                children: [textRun(`BELL RINGER · ${page.day.toUpperCase()}`, { bold: true, color: LIGHT_BLUE })],
              }),
              new Paragraph({
                alignment: AlignmentType.CENTER,
                spacing: { before: 120, after: 120 },
                children: [textRun(page.topic, { bold: true, size: 40, color: "FFFFFF" })],
              }),
            ],
            theme.primary,
          ),
        ],
      }),
    ]),
    new Paragraph({
      alignment: AlignmentType.CENTER,
      spacing: { before: 600 },
      children: [textRun(page.prompt, { size: 48 })],
    }),
  ]);
  return createDocument(`Week ${week.week} Bell Ringers`, sections);
}
