import { ExternalHyperlink, Paragraph, TableRow, TextRun, type Document } from "docx";
import type { Differentiation, LessonRecord, WeekRecord } from "@cte-kit/shared-types/contracts";
import type { MediaResult } from "../types.ts";
import {
  CREAM_YELLOW,
  LIGHT_BLUE,
  LIGHT_GRAY,
  MEDIUM_GRAY,
  SMALL_SIZE,
  SOFT_GREEN,
  banner,
  bulletList,
  createDocument,
  fullWidthTable,
  glossaryTable,
  imageParagraph,
  paragraphs,
  sectionHeading,
  shadedCell,
  spacer,
  textRun,
  type Block,
} from "./docx_helpers.ts";
import { dayLabel } from "./days.ts";
import { themeForUnit, type ColorTheme } from "./theme.ts";

/**
 * Teacher handout: the whole week in one document.
 *
 * Layout: unit banner, week-level sections (overview, objectives, materials, assessment), one block per day,
 * then the vocabulary summary, notes and standards. Sections without data are left out.
 */
export interface TeacherHandoutContext {
  courseTitle: string;
  // Media found for each day, keyed by zero-based day index.
  media?: ReadonlyMap<number, MediaResult>;
}

const DIFFERENTIATION_FILLS: Record<string, string> = {
  Struggling: "FFEBEE",
  "On-Level": LIGHT_BLUE,
  Advanced: SOFT_GREEN,
  ELL: "FFF3E0",
};

export function notesList(notes: string | readonly string[] | undefined): string[] {
  if (notes === undefined) return [];
  return typeof notes === "string" ? [notes] : [...notes];
}

function label(text: string): Paragraph {
  return new Paragraph({ spacing: { after: 60 }, children: [textRun(text, { bold: true })] });
}

function weekOverview(week: WeekRecord, theme: ColorTheme): Block[] {
  if (!week.week_overview && !week.week_focus) return [];
  const lines: Paragraph[] = [];
  if (week.week_focus) {
    lines.push(new Paragraph({ children: [textRun("Focus: ", { bold: true }), textRun(week.week_focus)] }));
  }
  if (week.week_overview) {
    lines.push(...paragraphs(week.week_overview));
  }
  return [sectionHeading("Week Overview", theme.primary), fullWidthTable([new TableRow({ children: [shadedCell(lines, theme.secondary)] })])];
}

function assessmentOverview(week: WeekRecord, theme: ColorTheme): Block[] {
  const cards = [
    ["Formative", week.formative_assessment, LIGHT_BLUE],
    ["Summative", week.summative_assessment, SOFT_GREEN],
    ["Deliverable", week.weekly_deliverable, CREAM_YELLOW],
  ] as const;
  const present = cards.filter(([, text]) => Boolean(text));
  if (!week.assessment_overview && present.length === 0) return [];

  const blocks: Block[] = [sectionHeading("Assessment Overview", theme.primary)];
  if (week.assessment_overview) {
    blocks.push(...paragraphs(week.assessment_overview));
  }
  if (present.length > 0) {
    blocks.push(
      fullWidthTable([
        new TableRow({
          children: present.map(([title, text, fill]) => shadedCell([label(title), ...paragraphs(text ?? "", { size: SMALL_SIZE })], fill)),
        }),
      ]),
    );
  }
  return blocks;
}

function scheduleTable(lesson: LessonRecord, theme: ColorTheme): Block[] {
  const schedule = lesson.schedule ?? [];
  if (schedule.length === 0) return [];
  const header = new TableRow({
    tableHeader: true,
    children: ["Time", "Activity", "Details"].map((title) => shadedCell([label(title)], theme.secondary)),
  });
  const rows = schedule.map((activity, index) => {
    const fill = index % 2 === 1 ? LIGHT_GRAY : undefined;
    const [time, name, description] =
      typeof activity === "string"
        ? ["", activity, ""]
        : [activity.time ?? activity.duration ?? "", activity.name ?? activity.activity ?? "", activity.description ?? ""];
    return new TableRow({
      children: [
        shadedCell(paragraphs(time, { size: SMALL_SIZE }), fill),
        shadedCell([new Paragraph({ children: [textRun(name, { bold: true, size: SMALL_SIZE })] })], fill),
        shadedCell(paragraphs(description, { size: SMALL_SIZE }), fill),
      ],
    });
  });
  return [sectionHeading("Schedule", theme.primary, 2), fullWidthTable([header, ...rows])];
}

function differentiationBlock(diff: Differentiation | undefined, theme: ColorTheme): Block[] {
  if (diff === undefined) return [];
  if (typeof diff === "string") {
    return diff ? [sectionHeading("Differentiation Strategies", theme.primary, 2), ...paragraphs(diff)] : [];
  }
  const levels = Object.entries(diff);
  if (levels.length === 0) return [];
  return [
    sectionHeading("Differentiation Strategies", theme.primary, 2),
    fullWidthTable([
      new TableRow({
        children: levels.map(([level, strategy]) =>
          shadedCell([label(level), ...paragraphs(strategy, { size: SMALL_SIZE })], DIFFERENTIATION_FILLS[level] ?? LIGHT_GRAY),
        ),
      }),
    ]),
  ];
}

function mediaBlock(media: MediaResult | undefined): Block[] {
  if (!media) return [];
  const blocks: Block[] = [];
  if (media.video) {
    blocks.push(
      new Paragraph({
        children: [
          textRun("Suggested video: ", { bold: true }),
          new ExternalHyperlink({ link: media.video.url, children: [new TextRun({ text: media.video.title, style: "Hyperlink" })] }),
        ],
      }),
    );
  }
  if (media.image) {
    blocks.push(
      imageParagraph(media.image, 480, 270),
      new Paragraph({
        children: [textRun(`Photo: ${media.image.photographer || "Pexels"} (${media.image.sourceUrl})`, { size: SMALL_SIZE, color: MEDIUM_GRAY, italics: true })],
      }),
    );
  }
  return blocks;
}

function dayBlock(lesson: LessonRecord, index: number, theme: ColorTheme, media: MediaResult | undefined): Block[] {
  const blocks: Block[] = [
    fullWidthTable([
      new TableRow({
        children: [
          shadedCell(
            [
              new Paragraph({ children: [textRun(`DAY ${index + 1} · ${dayLabel(lesson, index)}`, { bold: true, color: LIGHT_BLUE })] }),
              new Paragraph({ children: [textRun(lesson.topic, { bold: true, size: 32, color: "FFFFFF" })] }),
            ],
            theme.primary,
          ),
        ],
      }),
    ]),
  ];

  if (lesson.objectives?.length) {
    blocks.push(sectionHeading("Objectives", theme.primary, 2), ...bulletList(lesson.objectives));
  }
  if (lesson.day_materials?.length) {
    blocks.push(sectionHeading("Materials", theme.primary, 2), ...paragraphs(lesson.day_materials.join("  •  ")));
  }
  blocks.push(...scheduleTable(lesson, theme));
  if (lesson.vocabulary && Object.keys(lesson.vocabulary).length > 0) {
    blocks.push(sectionHeading("Vocabulary", theme.primary, 2), glossaryTable(lesson.vocabulary, theme.secondary));
  }
  blocks.push(...differentiationBlock(lesson.differentiation, theme));
  const notes = notesList(lesson.teacher_notes);
  if (notes.length > 0) {
    blocks.push(sectionHeading("Teacher Notes", theme.primary, 2), ...bulletList(notes));
  }
  blocks.push(...mediaBlock(media), spacer());
  return blocks;
}

export function teacherHandoutDocument(week: WeekRecord, context: TeacherHandoutContext): Document {
  const theme = themeForUnit(week.unit);
  const children: Block[] = [
    banner(`WEEK ${week.week}`, week.unit || "Weekly Lessons", `${context.courseTitle} · Teacher Guide`, theme.primary),
    spacer(),
    ...weekOverview(week, theme),
  ];

  if (week.week_objectives?.length) {
    children.push(sectionHeading("Weekly Learning Objectives", theme.primary), ...bulletList(week.week_objectives));
  }
  if (week.week_materials?.length) {
    children.push(sectionHeading("Materials Needed for the Week", theme.primary), ...bulletList(week.week_materials));
  }
  children.push(...assessmentOverview(week, theme));

  week.days.forEach((lesson, index) => {
    children.push(...dayBlock(lesson, index, theme, context.media?.get(index)));
  });

  if (week.vocabulary_summary && Object.keys(week.vocabulary_summary).length > 0) {
    children.push(sectionHeading("Week Vocabulary Summary", theme.primary), glossaryTable(week.vocabulary_summary, theme.secondary));
  }
  const notes = notesList(week.teacher_notes);
  if (notes.length > 0) {
    children.push(
      sectionHeading("Teacher Notes", theme.primary),
      fullWidthTable([new TableRow({ children: [shadedCell(bulletList(notes), CREAM_YELLOW)] })]),
    );
  }
  if (week.standards_alignment) {
    children.push(
      sectionHeading("Standards Alignment", theme.primary),
      ...paragraphs(week.standards_alignment, { size: 18, color: MEDIUM_GRAY, italics: true }),
    );
  }

  return createDocument(`Week ${week.week} Teacher Handout`, [children]);
}
