import { AlignmentType, ExternalHyperlink, Paragraph, TableRow, TextRun, type Document } from "docx";
import type { LessonRecord } from "@cte-kit/shared-types/contracts";
import { scheduleEntries } from "../aggregator.ts";
import type { CuratedVideo, MediaResult, TopicImage } from "../types.ts";
import {
  LIGHT_BLUE,
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
import { dayLabel, findBellRinger } from "./days.ts";
import { themeForUnit, type ColorTheme } from "./theme.ts";

/**
 * Daily presentation: the lesson as a deck of landscape pages, one slide per page, to be projected in class.
 *
 * Slide order: bell ringer, agenda, objectives, vocabulary, topic, video, one slide per practice activity,
 * wrap-up. Slides without data are left out, except the bell ringer, agenda, topic and wrap-up.
 */
export type Slide =
  | { kind: "bellRinger"; title: string; subtitle: string; prompt: string }
  | { kind: "agenda"; title: string; subtitle: string; items: AgendaItem[] }
  | { kind: "bullets"; title: string; bullets: string[]; withImage: boolean }
  | { kind: "vocabulary"; title: string; terms: Record<string, string> }
  | { kind: "video"; title: string; subtitle: string; url: string }
  | { kind: "activity"; title: string; text: string }
  | { kind: "wrapUp"; title: string; takeaways: string[]; exitTicket: string };

export interface AgendaItem {
  time: string;
  name: string;
}

const ACTIVITY_MARKERS = ["practice", "activity", "hands-on", "work time", "project"] as const;
const EXIT_TICKET_MARKERS = ["wrap", "exit", "reflection"] as const;
export const DEFAULT_EXIT_TICKET = "What did you learn today?";

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function exitTicket(lesson: LessonRecord): string {
  const wrapUp = scheduleEntries(lesson).find((activity) => {
    const name = (activity.name ?? "").toLowerCase();
    return EXIT_TICKET_MARKERS.some((marker) => name.includes(marker));
  });
  return wrapUp?.description ?? DEFAULT_EXIT_TICKET;
}

export function buildPresentationSlides(lesson: LessonRecord, index: number, week: number, video?: CuratedVideo): Slide[] {
  const objectives = lesson.objectives ?? [];
  const entries = scheduleEntries(lesson);
  const slides: Slide[] = [
    {
      kind: "bellRinger",
      title: "BELL RINGER",
      subtitle: `Week ${week} • ${dayLabel(lesson, index)}`,
      prompt: findBellRinger(lesson),
    },
    {
      kind: "agenda",
      title: "TODAY'S AGENDA",
      subtitle: lesson.topic,
      items: entries.flatMap(({ time, name }): AgendaItem[] => (time && name ? [{ time, name }] : [])),
    },
  ];

  if (objectives.length > 0) {
    slides.push({ kind: "bullets", title: "LEARNING OBJECTIVES", bullets: objectives, withImage: true });
  }
  if (lesson.vocabulary && Object.keys(lesson.vocabulary).length > 0) {
    slides.push({ kind: "vocabulary", title: "KEY VOCABULARY", terms: lesson.vocabulary });
  }
  slides.push({
    kind: "bullets",
    title: lesson.topic.toUpperCase(),
    bullets: [`Today's focus: ${lesson.topic}`, ...objectives.slice(0, 3)],
    withImage: true,
  });
  if (video) {
    slides.push({ kind: "video", title: "VIDEO", subtitle: truncate(video.title, 50), url: video.url });
  }

  for (const activity of entries) {
    const name = activity.name ?? "";
    if (!ACTIVITY_MARKERS.some((marker) => name.toLowerCase().includes(marker))) continue;
    slides.push({ kind: "activity", title: name.toUpperCase(), text: activity.description ?? "" });
  }

  slides.push({
    kind: "wrapUp",
    title: "WRAP-UP",
    takeaways: objectives.slice(0, 3).map((objective) => truncate(objective, 60)),
    exitTicket: exitTicket(lesson),
  });
  return slides;
}

function centered(text: string, options: { size: number; color?: string; bold?: boolean }): Paragraph {
  return new Paragraph({ alignment: AlignmentType.CENTER, spacing: { after: 160 }, children: [textRun(text, options)] });
}

interface SlideStyle {
  // Small line above every slide title: the day, e.g. "TUESDAY".
  caption: string;
  theme: ColorTheme;
  image?: TopicImage;
}

function titleBar(title: string, subtitle: string | undefined, style: SlideStyle): Block[] {
  return [banner(style.caption, title, subtitle, style.theme.primary), spacer()];
}

function slideBlocks(slide: Slide, style: SlideStyle): Block[] {
  const { theme, image } = style;
  switch (slide.kind) {
    case "bellRinger":
      return [
        fullWidthTable([
          new TableRow({
            children: [
              shadedCell(
                [
                  centered(slide.title, { size: 72, color: "FFFFFF", bold: true }),
                  centered(slide.subtitle, { size: 36, color: LIGHT_BLUE }),
                ],
                theme.primary,
              ),
            ],
          }),
        ]),
        new Paragraph({ alignment: AlignmentType.CENTER, spacing: { before: 600 }, children: [textRun(slide.prompt, { size: 56, color: theme.primary })] }),
      ];
    case "agenda":
      return [
        ...titleBar(slide.title, slide.subtitle, style),
        ...slide.items.map(
          (item) =>
            new Paragraph({
              spacing: { after: 160 },
              children: [textRun(`${item.time}   `, { bold: true, size: 36, color: theme.primary }), textRun(item.name, { size: 36 })],
            }),
        ),
      ];
    case "bullets":
      return [
        ...titleBar(slide.title, undefined, style),
        ...bulletList(slide.bullets),
        ...(slide.withImage && image ? [spacer(), imageParagraph(image, 400, 225)] : []),
      ];
    case "vocabulary":
      return [...titleBar(slide.title, undefined, style), glossaryTable(slide.terms, theme.primary)];
    case "video":
      return [
        ...titleBar(slide.title, slide.subtitle, style),
        new Paragraph({
          alignment: AlignmentType.CENTER,
          spacing: { before: 600 },
          children: [new ExternalHyperlink({ link: slide.url, children: [new TextRun({ text: slide.url, style: "Hyperlink", size: 36 })] })],
        }),
      ];
    case "activity":
      return [...titleBar(slide.title, undefined, style), ...paragraphs(slide.text, { size: 36 })];
    case "wrapUp":
      return [
        ...titleBar(slide.title, undefined, style),
        sectionHeading("Key Takeaways:", theme.primary, 2),
        ...bulletList(slide.takeaways),
        sectionHeading("Exit Ticket", theme.primary, 2),
        ...paragraphs(slide.exitTicket, { size: 32 }),
      ];
  }
}

export function presentationDocument(
  lesson: LessonRecord,
  index: number,
  unit: string,
  slides: readonly Slide[],
  media: MediaResult | undefined,
): Document {
  const style: SlideStyle = { caption: dayLabel(lesson, index).toUpperCase(), theme: themeForUnit(unit), image: media?.image };
  const sections = slides.map((slide) => slideBlocks(slide, style));
  return createDocument(`${lesson.topic} Presentation`, sections, { landscape: true });
}
