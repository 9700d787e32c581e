import { test } from "node:test";
import assert from "node:assert/strict";
import JSZip from "jszip";
import type { LessonRecord, WeekRecord } from "@cte-kit/shared-types/contracts";
import { bellRingerDocument, buildBellRingerPages } from "../src/documents/bell_ringers.ts";
import { buildCtePlanRows, ctePlanDocument } from "../src/documents/cte_plan.ts";
import { BELL_RINGER_PLACEHOLDER, dayLabel, findBellRinger } from "../src/documents/days.ts";
import { renderDocx } from "../src/documents/docx_helpers.ts";
import { studentHandoutDocument } from "../src/documents/student_handout.ts";
import { DEFAULT_EXIT_TICKET, buildPresentationSlides, presentationDocument } from "../src/documents/presentation.ts";
import { notesList, teacherHandoutDocument } from "../src/documents/teacher_handout.ts";
import { DEFAULT_THEME, themeForUnit } from "../src/documents/theme.ts";
import { infer } from "../src/inference.ts";
import { TAG_LABELS, checklist, renderChecklist } from "../src/labels.ts";
import type { TopicImage } from "../src/types.ts";

const cameraAngles: LessonRecord = {
  topic: "Camera Angles",
  objectives: ["Identify three camera angles"],
  schedule: [{ time: "9:00", name: "Bell Ringer", description: "Write a reflection" }, "Lecture"],
};

const context = { week: 2, courseTitle: "Media Foundations", defaultDuration: "90" };

// A .docx file is a zip archive.
function isZip(buffer: Buffer): boolean {
  return buffer.subarray(0, 2).toString("latin1") === "PK";
}

test("checklists print every label in key order", () => {
  assert.deepEqual(renderChecklist(checklist(TAG_LABELS.methods, ["lecture", "discussion"])), [
    "X Discussion",
    "_ Demonstration",
    "X Lecture",
    "_ Power Point",
    "_ Multi-Media",
    "_ Guest Speaker",
  ]);
});

test("buildCtePlanRows fills the form in order", () => {
  const rows = buildCtePlanRows(cameraAngles, infer(cameraAngles), context);
  assert.deepEqual(
    rows.map((row) => row.label),
    [
      "Week",
      "Course Title",
      "Topic",
      "Estimated Duration (minutes)",
      "Content Standards",
      "Lesson Overview",
      "Materials & Equipment",
      "Procedures / Activities / Learning Experiences",
      "Instructional Methods",
      "Assessment",
      "Provision for Individual Differences",
      "Integrated Curriculum Areas",
      "Embedded Credit",
      "Other Areas Addressed",
      "Lesson Evaluation",
    ],
  );

  const byLabel = new Map(rows.map((row) => [row.label, row.lines]));
  assert.deepEqual(byLabel.get("Week"), ["2"]);
  assert.deepEqual(byLabel.get("Estimated Duration (minutes)"), ["90"]);
  assert.deepEqual(byLabel.get("Content Standards"), []);
  assert.deepEqual(byLabel.get("Materials & Equipment"), [
    "_ Textbook",
    "_ Lab Manual",
    "_ Video/DVD",
    "_ Labs",
    "_ Posters",
    "_ Speaker",
    "_ Projector",
    "_ Computer",
    "_ Supplemental Materials",
    "X Student Journals",
    "X Other Equipment",
  ]);
  assert.deepEqual(byLabel.get("Procedures / Activities / Learning Experiences"), [
    "9:00 - Bell Ringer: Write a reflection",
    "Lecture",
  ]);
  assert.deepEqual(byLabel.get("Provision for Individual Differences"), []);
});

test("an authored duration replaces the default", () => {
  const rows = buildCtePlanRows({ ...cameraAngles, duration: "50" }, infer(cameraAngles), context);
  assert.deepEqual(rows[3]?.lines, ["50"]);
});

test("dayLabel prefers the lesson's own label", () => {
  assert.equal(dayLabel({ topic: "A" }, 0), "Monday");
  assert.equal(dayLabel({ topic: "A" }, 4), "Friday");
  assert.equal(dayLabel({ topic: "A" }, 5), "Day 6");
  assert.equal(dayLabel({ topic: "A", day_label: "Block Day" }, 1), "Block Day");
});

test("findBellRinger reads the first warm-up activity", () => {
  assert.equal(findBellRinger(cameraAngles), "Write a reflection");
  assert.equal(
    findBellRinger({ topic: "A", schedule: [{ name: "Lecture" }, { name: "Quick Warmup", description: "Name a shot" }] }),
    "Name a shot",
  );
  assert.equal(findBellRinger({ topic: "A", schedule: [{ name: "Bell Ringer" }] }), BELL_RINGER_PLACEHOLDER);
  assert.equal(findBellRinger({ topic: "A", schedule: ["Bell ringer: sketch a frame"] }), BELL_RINGER_PLACEHOLDER);
});

test("buildBellRingerPages covers every day", () => {
  const week: WeekRecord = { week: 2, unit: "", days: [cameraAngles, { topic: "Composition" }] };
  assert.deepEqual(buildBellRingerPages(week), [
    { day: "Monday", topic: "Camera Angles", prompt: "Write a reflection" },
    { day: "Tuesday", topic: "Composition", prompt: "[Add Bell Ringer prompt]" },
  ]);
});

test("themeForUnit falls back to the default theme", () => {
  assert.equal(themeForUnit("Pre-Production").primary, "2E86AB");
  assert.deepEqual(themeForUnit("Unknown Unit"), DEFAULT_THEME);
});

test("notesList accepts one note or many", () => {
  assert.deepEqual(notesList("Check batteries"), ["Check batteries"]);
  assert.deepEqual(notesList(["A", "B"]), ["A", "B"]);
  assert.deepEqual(notesList(undefined), []);
});

test("documents render to docx archives", async () => {
  const week: WeekRecord = {
    week: 2,
    unit: "Pre-Production",
    week_overview: "Planning a shoot",
    week_objectives: ["Write a shot list"],
    formative_assessment: "Exit tickets",
    vocabulary_summary: { Storyboard: "Drawn plan of shots" },
    teacher_notes: "Book the studio",
    days: [
      { ...cameraAngles, vocabulary: { "High angle": "Camera above the subject" }, differentiation: { ELL: "Visual cards" } },
      { topic: "Composition", differentiation: "Pair students" },
    ],
  };
  const media = new Map([[0, { video: { keyword: "camera angles", url: "https://example.test/v", title: "Angles" } }]]);

  const teacher = await renderDocx(teacherHandoutDocument(week, { courseTitle: "Media Foundations", media }));
  const student = await renderDocx(
    studentHandoutDocument(
      {
        name: "Shot List",
        instructions: "Fill in every row",
        sections: [{ heading: "Shots", items: ["Wide", "Close"], numbered: true, blank_lines: 2 }],
        questions: ["Why plan shots?"],
        vocabulary: { Shot: "One continuous take" },
        notes: ["Use pencil"],
      },
      week.unit,
      "Media Foundations",
    ),
  );
  const plan = await renderDocx(ctePlanDocument(buildCtePlanRows(cameraAngles, infer(cameraAngles), context)));
  const bells = await renderDocx(bellRingerDocument(week, buildBellRingerPages(week)));

  for (const buffer of [teacher, student, plan, bells]) {
    assert.equal(isZip(buffer), true);
  }
});

// Smallest valid PNG: one transparent pixel.
const ONE_PIXEL_PNG = Buffer.from(
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==",
  "base64",
);

test("the topic photo is embedded under its image extension", async () => {
  const week: WeekRecord = { week: 2, unit: "", days: [{ topic: "Lighting" }] };
  const image: TopicImage = { sourceUrl: "https://images.test/l.png", photographer: "Test Photographer", type: "png", data: ONE_PIXEL_PNG };
  const teacher = await renderDocx(teacherHandoutDocument(week, { courseTitle: "Media Foundations", media: new Map([[0, { image }]]) }));

  const zip = await JSZip.loadAsync(teacher);
  const mediaParts = zip.file(/^word\/media\//).map((entry) => entry.name);
  assert.equal(mediaParts.length, 1);
  const part = mediaParts[0] ?? "";
  assert.match(part, /^word\/media\/[^/]+\.png$/);
  const rels = (await zip.file("word/_rels/document.xml.rels")?.async("string")) ?? "";
  assert.ok(rels.includes(`Target="${part.slice("word/".length)}"`));
});

const anglesDeck: LessonRecord = {
  topic: "Camera Angles",
  objectives: [
    "Identify three camera angles",
    "Explain when to use a low angle shot to build tension in a scene",
    "Frame a subject",
    "Review the shot list",
  ],
  vocabulary: { "High angle": "Camera above the subject" },
  schedule: [
    { time: "9:00", name: "Bell Ringer", description: "Name a camera angle" },
    { time: "9:10", name: "Guided Practice", description: "Shoot three angles" },
    { name: "Exit Ticket" },
    "Lecture",
  ],
};

test("buildPresentationSlides follows the lesson", () => {
  const video = {
    keyword: "camera angles",
    url: "https://example.test/v",
    title: "Camera Angles Explained For Beginners In Film And Video Production",
  };
  assert.deepEqual(buildPresentationSlides(anglesDeck, 1, 4, video), [
    { kind: "bellRinger", title: "BELL RINGER", subtitle: "Week 4 • Tuesday", prompt: "Name a camera angle" },
    {
      kind: "agenda",
      title: "TODAY'S AGENDA",
      subtitle: "Camera Angles",
      items: [
        { time: "9:00", name: "Bell Ringer" },
        { time: "9:10", name: "Guided Practice" },
      ],
    },
    { kind: "bullets", title: "LEARNING OBJECTIVES", bullets: anglesDeck.objectives, withImage: true },
    { kind: "vocabulary", title: "KEY VOCABULARY", terms: { "High angle": "Camera above the subject" } },
    {
      kind: "bullets",
      title: "CAMERA ANGLES",
      bullets: [
        "Today's focus: Camera Angles",
        "Identify three camera angles",
        "Explain when to use a low angle shot to build tension in a scene",
        "Frame a subject",
      ],
      withImage: true,
    },
    { kind: "video", title: "VIDEO", subtitle: "Camera Angles Explained For Beginners In Film And ...", url: "https://example.test/v" },
    { kind: "activity", title: "GUIDED PRACTICE", text: "Shoot three angles" },
    {
      kind: "wrapUp",
      title: "WRAP-UP",
      takeaways: [
        "Identify three camera angles",
        "Explain when to use a low angle shot to build tension in a s...",
        "Frame a subject",
      ],
      exitTicket: DEFAULT_EXIT_TICKET,
    },
  ]);
});

test("a bare lesson still gets the core slides", () => {
  const slides = buildPresentationSlides({ topic: "Foley", schedule: [{ name: "Wrap Up", description: "One new sound" }] }, 0, 1);
  assert.deepEqual(
    slides.map((slide) => slide.kind),
    ["bellRinger", "agenda", "bullets", "wrapUp"],
  );
  assert.deepEqual(slides[3], { kind: "wrapUp", title: "WRAP-UP", takeaways: [], exitTicket: "One new sound" });
});

test("presentations render one landscape page per slide", async () => {
  const slides = buildPresentationSlides(anglesDeck, 0, 2);
  const image: TopicImage = { sourceUrl: "https://images.test/a.png", photographer: "", type: "png", data: ONE_PIXEL_PNG };
  const deck = await renderDocx(presentationDocument(anglesDeck, 0, "", slides, { image }));

  const zip = await JSZip.loadAsync(deck);
  const body = (await zip.file("word/document.xml")?.async("string")) ?? "";
  assert.equal(body.match(/<w:sectPr/g)?.length, slides.length);
  assert.ok(body.includes('w:orient="landscape"'));
  // Both image slides embed the same photo.
  assert.equal(body.match(/<w:drawing>/g)?.length, 2);
});
