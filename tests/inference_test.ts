import { test } from "node:test";
import assert from "node:assert/strict";
import type { LessonRecord } from "@cte-kit/shared-types/contracts";
import {
  infer,
  inferAssessment,
  inferCurriculumAreas,
  inferMaterials,
  inferMethods,
  inferOtherAreas,
} from "../src/inference.ts";
import { parseKeywordTables } from "../src/keywords.ts";

/**
 * Tagging engine tests against the shipped keyword tables.
 *
 * Expected tags were worked out keyword by keyword: a word like "reflection" triggers both the journals
 * material and the exit-ticket rule, so lessons here are kept short to make every match deliberate.
 */
const cameraAngles: LessonRecord = {
  topic: "Camera Angles",
  objectives: ["Identify three camera angles"],
  schedule: [{ time: "9:00", name: "Bell Ringer", description: "Write a reflection" }, "Lecture"],
};

test("infer tags a typical lesson", () => {
  const result = infer(cameraAngles);
  assert.deepEqual(result.materials, ["other_equipment", "student_journals"]);
  // "Lecture" is a bare schedule line and is not searched.
  assert.deepEqual(result.methods, []);
  assert.deepEqual(result.assessment, ["classwork"]);
  assert.deepEqual(result.curriculum, ["technology"]);
  assert.deepEqual(result.otherAreas, ["integrated_academics"]);
  assert.equal(
    result.overviewText,
    "Students will learn about Camera Angles. The primary objective is to identify three camera angles.",
  );
  assert.equal(result.proceduresText, "9:00 - Bell Ringer: Write a reflection\nLecture");
  assert.equal(result.differentiationText, "");
});

test("tripod marks other equipment", () => {
  assert.deepEqual(inferMaterials({ topic: "Setup", day_materials: ["tripod"] }), ["other_equipment"]);
  assert.deepEqual(inferMaterials({ topic: "Setup", overview: "Bring a tripod" }), ["other_equipment"]);
});

test("day materials are not read by the methods scan", () => {
  assert.deepEqual(inferMethods({ topic: "Setup", day_materials: ["slides", "video"] }), []);
});

test("an activity named Direct Instruction adds lecture", () => {
  const lesson: LessonRecord = {
    topic: "Foley",
    schedule: [{ name: "Direct Instruction", description: "Overview of foley" }],
  };
  assert.deepEqual(inferMethods(lesson), ["lecture"]);
});

test("lecture activity names must match exactly", () => {
  assert.deepEqual(inferMethods({ topic: "Foley", schedule: [{ name: "Instruction", description: "Sound effects basics" }] }), [
    "lecture",
  ]);
  assert.deepEqual(inferMethods({ topic: "Foley", schedule: [{ name: "Instruction time", description: "Sound" }] }), []);
});

test("exit ticket yields classwork exactly once", () => {
  const lesson: LessonRecord = {
    topic: "Editing",
    schedule: [
      { name: "Practice", description: "Cut a scene" },
      { name: "Exit Ticket", description: "Answer one question" },
    ],
  };
  const assessment = inferAssessment(lesson);
  assert.deepEqual(assessment, ["classwork"]);
  assert.equal(assessment.filter((key) => key === "classwork").length, 1);

  assert.deepEqual(inferAssessment({ topic: "Foley", schedule: [{ name: "Exit Ticket", description: "One word" }] }), ["classwork"]);
  assert.deepEqual(inferAssessment({ topic: "Foley", overview: "Finish with an exit ticket" }), ["classwork"]);
});

test("reading sits right after english", () => {
  assert.deepEqual(inferCurriculumAreas({ topic: "Research a documentary" }), ["english", "reading", "social_studies"]);
  assert.deepEqual(inferCurriculumAreas({ topic: "Read an article", curriculum: ["english"] }), ["english", "reading"]);
});

test("lecture sits between demonstration and powerpoint", () => {
  const lesson: LessonRecord = { topic: "Shot Review", overview: "Class discussion, then a demonstration. Explain the slides." };
  assert.deepEqual(inferMethods(lesson), ["discussion", "demonstration", "lecture", "powerpoint"]);
});

test("derived other areas keep their form position", () => {
  const lesson: LessonRecord = { topic: "Design a logo", overview: "Hands-on practice for professional quality" };
  assert.deepEqual(infer(lesson).otherAreas, [
    "higher_order_reasoning",
    "varied_learning",
    "work_ethics",
    "integrated_academics",
  ]);
});

test("integrated academics follows the curriculum result", () => {
  assert.deepEqual(infer({ topic: "Camera Basics" }).otherAreas, ["integrated_academics"]);
  assert.deepEqual(infer({ topic: "Foley" }).curriculum, []);
  assert.deepEqual(infer({ topic: "Foley" }).otherAreas, []);
  assert.deepEqual(inferOtherAreas({ topic: "Foley" }, ["math"]), ["integrated_academics"]);
});

test("differentiation data marks varied learning", () => {
  assert.deepEqual(infer({ topic: "Foley", differentiation: { Advanced: "Layer sounds" } }).otherAreas, ["varied_learning"]);
  assert.deepEqual(infer({ topic: "Foley", differentiation: {} }).otherAreas, []);
});

test("explicit tags are kept first and never removed", () => {
  const lesson: LessonRecord = {
    topic: "Foley",
    materials: ["textbook", "textbook"],
    methods: ["guest_speaker"],
    assessment: ["test"],
    curriculum: ["math"],
    other_areas: ["ctso"],
  };
  const result = infer(lesson);
  assert.deepEqual(result.materials, ["textbook"]);
  assert.deepEqual(result.methods, ["guest_speaker"]);
  assert.deepEqual(result.assessment, ["test"]);
  assert.deepEqual(result.curriculum, ["math"]);
  assert.deepEqual(result.otherAreas, ["ctso", "integrated_academics"]);
});

test("feeding tags back in changes nothing", () => {
  const lesson: LessonRecord = {
    ...cameraAngles,
    day_materials: ["Camera", "Laptop"],
    schedule: [
      { name: "Direct Instruction", description: "Explain the rule of thirds" },
      { name: "Practice", description: "Shoot in teams" },
    ],
    differentiation: { ELL: "Visual glossary" },
  };
  const first = infer(lesson);
  const second = infer({
    ...lesson,
    materials: first.materials,
    methods: first.methods,
    assessment: first.assessment,
    curriculum: first.curriculum,
    other_areas: first.otherAreas,
  });
  assert.deepEqual(second, first);
});

test("custom tables replace the shipped ones", () => {
  const tables = parseKeywordTables({
    materials: [{ key: "posters", keywords: ["foley"] }],
    methods: [],
    assessment: [],
    curriculum: [],
    otherAreas: [],
    rules: {
      lectureActivityNames: [],
      lectureKeywords: [],
      readingKeywords: [],
      exitTicketKeywords: [],
      modalityKeywords: [],
    },
  });
  assert.deepEqual(inferMaterials({ topic: "Foley" }, tables), ["posters"]);
  assert.equal(Object.isFrozen(tables.materials), true);
});

test("parseKeywordTables rejects uppercase keywords", () => {
  assert.throws(() =>
    parseKeywordTables({
      materials: [{ key: "posters", keywords: ["Foley"] }],
      methods: [],
      assessment: [],
      curriculum: [],
      otherAreas: [],
      rules: {
        lectureActivityNames: [],
        lectureKeywords: [],
        readingKeywords: [],
        exitTicketKeywords: [],
        modalityKeywords: [],
      },
    }),
  );
});
