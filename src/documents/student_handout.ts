import { Paragraph, TableRow, type Document } from "docx";
import type { HandoutRecord, HandoutSection } from "@cte-kit/shared-types/contracts";
import {
  CREAM_YELLOW,
  MEDIUM_GRAY,
  SMALL_SIZE,
  answerLines,
  banner,
  bulletList,
  createDocument,
  fullWidthTable,
  glossaryTable,
  numberedList,
  paragraphs,
  sectionHeading,
  shadedCell,
  spacer,
  textRun,
  type Block,
} from "./docx_helpers.ts";
import { themeForUnit } from "./theme.ts";

// Answer lines printed under each review question.
const QUESTION_LINES = 2;

function sectionBlocks(section: HandoutSection, color: string): Block[] {
  const blocks: Block[] = [sectionHeading(section.heading, color, 2)];
  if (section.content) {
    blocks.push(...paragraphs(section.content));
  }
  if (section.items?.length) {
    blocks.push(...(section.numbered ? numberedList(section.items) : bulletList(section.items)));
  }
  if (section.blank_lines && section.blank_lines > 0) {
    blocks.push(...answerLines(section.blank_lines));
  }
  return blocks;
}

function questionBlocks(questions: readonly string[], color: string): Block[] {
  const blocks: Block[] = [sectionHeading("Review Questions", color)];
  questions.forEach((question, index) => {
    blocks.push(new Paragraph({ spacing: { before: 120 }, children: [textRun(`${index + 1}. ${question}`, { bold: true })] }));
    blocks.push(...answerLines(QUESTION_LINES));
  });
  return blocks;
}

/**
 * Student handout for one `student_handouts` entry. `tips` falls back to `notes` for older files.
 */
export function studentHandoutDocument(handout: HandoutRecord, unit: string, courseTitle: string): Document {
  const theme = themeForUnit(unit);
  const title = handout.title || handout.name;
  const children: Block[] = [banner(courseTitle.toUpperCase(), title, handout.subtitle, theme.primary), spacer()];

  children.push(
    new Paragraph({
      spacing: { after: 200 },
      children: [textRun("Name: ______________________________    Date: ______________", { color: MEDIUM_GRAY })],
    }),
  );

  if (handout.instructions) {
    children.push(
      fullWidthTable([
        new TableRow({
          children: [shadedCell([new Paragraph({ children: [textRun("Instructions", { bold: true })] }), ...paragraphs(handout.instructions)], CREAM_YELLOW)],
        }),
      ]),
      spacer(),
    );
  }

  for (const section of handout.sections ?? []) {
    children.push(...sectionBlocks(section, theme.primary));
  }
  if (handout.questions?.length) {
    children.push(...questionBlocks(handout.questions, theme.primary));
  }
  if (handout.vocabulary && Object.keys(handout.vocabulary).length > 0) {
    children.push(sectionHeading("Key Vocabulary", theme.primary), glossaryTable(handout.vocabulary, theme.secondary));
  }
  const tips = handout.tips ?? handout.notes ?? [];
  if (tips.length > 0) {
    children.push(
      sectionHeading("Tips", theme.primary),
      fullWidthTable([new TableRow({ children: [shadedCell(tips.flatMap((tip) => paragraphs(tip, { size: SMALL_SIZE })), theme.secondary)] })]),
    );
  }

  return createDocument(title, [children]);
}
