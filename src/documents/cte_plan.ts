import { AlignmentType, Paragraph, TableRow, type Document } from "docx";
import type { LessonInference, LessonRecord } from "@cte-kit/shared-types/contracts";
import { TAG_LABELS, checklist, renderChecklist } from "../labels.ts";
import {
  LIGHT_BLUE,
  createDocument,
  fullWidthTable,
  paragraphs,
  shadedCell,
  spacer,
  textRun,
} from "./docx_helpers.ts";
import { DEFAULT_THEME } from "./theme.ts";

/**
 * CTE lesson plan: one form per day.
 *
 * `buildCtePlanRows` turns a lesson plus its inference into labelled rows (plain strings, easy to assert on);
 * `ctePlanDocument` lays those rows out as a two-column docx table.
 */
export interface PlanContext {
  week: number;
  courseTitle: string;
  defaultDuration: string;
}

export interface PlanRow {
  label: string;
  lines: string[];
}

function textLines(text: string | undefined): string[] {
  return text ? text.split("\n") : [];
}

export function buildCtePlanRows(lesson: LessonRecord, inference: LessonInference, context: PlanContext): PlanRow[] {
  return [
    { label: "Week", lines: [String(context.week)] },
    { label: "Course Title", lines: [context.courseTitle] },
    { label: "Topic", lines: [lesson.topic] },
    { label: "Estimated Duration (minutes)", lines: [lesson.duration || context.defaultDuration] },
    { label: "Content Standards", lines: textLines(lesson.content_standards) },
    { label: "Lesson Overview", lines: textLines(inference.overviewText) },
    { label: "Materials & Equipment", lines: renderChecklist(checklist(TAG_LABELS.materials, inference.materials)) },
    { label: "Procedures / Activities / Learning Experiences", lines: textLines(inference.proceduresText) },
    { label: "Instructional Methods", lines: renderChecklist(checklist(TAG_LABELS.methods, inference.methods)) },
    { label: "Assessment", lines: renderChecklist(checklist(TAG_LABELS.assessment, inference.assessment)) },
    { label: "Provision for Individual Differences", lines: textLines(inference.differentiationText) },
    {
      label: "Integrated Curriculum Areas",
      lines: renderChecklist(checklist(TAG_LABELS.curriculum, inference.curriculum)),
    },
    { label: "Embedded Credit", lines: textLines(lesson.embedded_credit) },
    { label: "Other Areas Addressed", lines: renderChecklist(checklist(TAG_LABELS.otherAreas, inference.otherAreas)) },
    { label: "Lesson Evaluation", lines: textLines(lesson.lesson_evaluation) },
  ];
}

export function ctePlanDocument(rows: readonly PlanRow[], title = "CTE Lesson Plan"): Document {
  const heading = new Paragraph({
    alignment: AlignmentType.CENTER,
    spacing: { after: 200 },
    children: [textRun(title, { bold: true, size: 32, color: DEFAULT_THEME.primary })],
  });

  const tableRows = rows.map(
    (row) =>
      new TableRow({
        children: [
          shadedCell([new Paragraph({ children: [textRun(row.label, { bold: true })] })], LIGHT_BLUE),
          shadedCell(row.lines.flatMap((line) => paragraphs(line))),
        ],
      }),
  );

  return createDocument(title, [[heading, fullWidthTable(tableRows), spacer()]]);
}
