import {
  AlignmentType,
  Document,
  HeadingLevel,
  ImageRun,
  Packer,
  PageOrientation,
  Paragraph,
  ShadingType,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
} from "docx";
import type { TopicImage } from "../types.ts";

/**
 * Building blocks shared by the lesson plan and handout builders.
 * docx sizes are half-points (22 = 11pt); margins are twips (1440 = 1 inch).
 */
export const BODY_SIZE = 22;
export const SMALL_SIZE = 20;
export const DARK_GRAY = "333333";
export const MEDIUM_GRAY = "666666";
export const LIGHT_GRAY = "F5F5F5";
export const CREAM_YELLOW = "FFF9E6";
export const SOFT_GREEN = "E8F5E9";
export const LIGHT_BLUE = "D6E3F8";

const MARGIN_TWIPS = 1008; // 0.7 inch

export function textRun(text: string, options: { bold?: boolean; italics?: boolean; size?: number; color?: string } = {}) {
  return new TextRun({ ...options, text, size: options.size ?? BODY_SIZE, color: options.color ?? DARK_GRAY });
}

/**
 * One paragraph per line of `text`; a blank string still yields one (empty) paragraph so table cells stay valid.
 */
export function paragraphs(text: string, options: { size?: number; color?: string; italics?: boolean } = {}): Paragraph[] {
  const lines = text.split("\n");
  return lines.map((line) => new Paragraph({ spacing: { after: 80 }, children: [textRun(line, options)] }));
}

export function sectionHeading(text: string, color: string, level: 1 | 2 = 1): Paragraph {
  return new Paragraph({
    heading: level === 1 ? HeadingLevel.HEADING_1 : HeadingLevel.HEADING_2,
    spacing: { before: level === 1 ? 240 : 160, after: 120 },
    children: [new TextRun({ text, bold: true, color, size: level === 1 ? 30 : 26 })],
  });
}

export function bulletList(items: readonly string[]): Paragraph[] {
  return items.map((item) => new Paragraph({ bullet: { level: 0 }, children: [textRun(item)] }));
}

export function numberedList(items: readonly string[]): Paragraph[] {
  return items.map((item, index) => new Paragraph({ spacing: { after: 80 }, children: [textRun(`${index + 1}. ${item}`)] }));
}

// Underscored lines students write on.
export function answerLines(count: number): Paragraph[] {
  return Array.from({ length: count }, () => new Paragraph({ spacing: { after: 160 }, children: [textRun("_".repeat(80), { color: MEDIUM_GRAY })] }));
}

export function shadedCell(children: Paragraph[], fill?: string, columnSpan?: number): TableCell {
  return new TableCell({
    children: children.length > 0 ? children : [new Paragraph("")],
    columnSpan,
    shading: fill ? { fill, type: ShadingType.CLEAR, color: "auto" } : undefined,
  });
}

export function fullWidthTable(rows: TableRow[]): Table {
  return new Table({ rows, width: { size: 100, type: WidthType.PERCENTAGE } });
}

// Two-column term/definition table with a shaded header row.
export function glossaryTable(entries: Record<string, string>, headerFill: string): Table {
  const header = new TableRow({
    tableHeader: true,
    children: [
      shadedCell([new Paragraph({ children: [textRun("Term", { bold: true })] })], headerFill),
      shadedCell([new Paragraph({ children: [textRun("Definition", { bold: true })] })], headerFill),
    ],
  });
  const rows = Object.entries(entries).map(
    ([term, definition], index) =>
      new TableRow({
        children: [
          shadedCell([new Paragraph({ children: [textRun(term, { bold: true })] })], index % 2 === 1 ? LIGHT_GRAY : undefined),
          shadedCell(paragraphs(definition), index % 2 === 1 ? LIGHT_GRAY : undefined),
        ],
      }),
  );
  return fullWidthTable([header, ...rows]);
}

// Full-width coloured title block: small caption, large title, optional subtitle.
export function banner(caption: string, title: string, subtitle: string | undefined, fill: string): Table {
  const lines = [
    new Paragraph({ alignment: AlignmentType.CENTER, children: [textRun(caption, { bold: true, color: LIGHT_BLUE })] }),
    new Paragraph({
      alignment: AlignmentType.CENTER,
      spacing: { before: 80, after: 80 },
      children: [new TextRun({ text: title, bold: true, size: 52, color: "FFFFFF", font: "Cambria" })],
    }),
  ];
  if (subtitle) {
    lines.push(new Paragraph({ alignment: AlignmentType.CENTER, children: [textRun(subtitle, { color: LIGHT_BLUE })] }));
  }
  return fullWidthTable([new TableRow({ children: [shadedCell(lines, fill)] })]);
}

// `type` names the media part inside the archive; without it Word reports the file as damaged.
export function imageParagraph(image: TopicImage, width: number, height: number): Paragraph {
  return new Paragraph({
    alignment: AlignmentType.CENTER,
    children: [new ImageRun({ type: image.type, data: image.data, transformation: { width, height } })],
  });
}

export function spacer(): Paragraph {
  return new Paragraph("");
}

export type Block = Paragraph | Table;

export function createDocument(title: string, sections: Block[][], options: { landscape?: boolean } = {}): Document {
  const orientation = options.landscape ? PageOrientation.LANDSCAPE : PageOrientation.PORTRAIT;
  return new Document({
    title,
    creator: "cte-lesson-kit",
    styles: {
      default: {
        document: { run: { font: "Calibri", size: BODY_SIZE, color: DARK_GRAY } },
      },
    },
    sections: sections.map((children) => ({
      properties: {
        page: {
          size: { orientation },
          margin: { top: MARGIN_TWIPS, right: MARGIN_TWIPS, bottom: MARGIN_TWIPS, left: MARGIN_TWIPS },
        },
      },
      children,
    })),
  });
}

export function renderDocx(doc: Document): Promise<Buffer> {
  return Packer.toBuffer(doc);
}
