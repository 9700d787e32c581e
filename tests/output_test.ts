import { test } from "node:test";
import assert from "node:assert/strict";
import {
  bellRingersFileName,
  ctePlanFileName,
  formatMediaLog,
  mediaLogEntries,
  presentationFileName,
  slugify,
  studentHandoutFileName,
  teacherHandoutFileName,
  weekFolderName,
} from "../src/output.ts";

test("week folders are zero-padded", () => {
  assert.equal(weekFolderName(3), "Week03");
  assert.equal(weekFolderName(12), "Week12");
});

test("slugify replaces spaces and slashes, then truncates", () => {
  assert.equal(slugify("Fill / Back Light", 25), "Fill_-_Back_Light");
  assert.equal(slugify("Introduction to Documentary Film", 25), "Introduction_to_Documenta");
});

test("file names follow the output layout", () => {
  assert.equal(ctePlanFileName(1, "Camera Angles"), "Day1_Camera_Angles_CTE.docx");
  assert.equal(ctePlanFileName(2, ""), "Day2_Lesson_CTE.docx");
  assert.equal(teacherHandoutFileName(3, "Introduction & History of Film"), "Week3_Introduction_&_Histo_TeacherHandout.docx");
  assert.equal(teacherHandoutFileName(3, ""), "Week3_Lessons_TeacherHandout.docx");
  assert.equal(studentHandoutFileName("Shot List"), "Shot_List_StudentHandout.docx");
  assert.equal(bellRingersFileName(3), "Week3_BellRingers.docx");
  assert.equal(presentationFileName(2, "Fill / Back Light"), "Day2_Fill_-_Back_Light_Presentation.docx");
});

test("media log lists one line per asset", () => {
  const entries = mediaLogEntries(1, "Lighting", {
    video: { keyword: "lighting", url: "https://example.test/v", title: "Lighting 101" },
    image: { sourceUrl: "https://images.test/l.jpg", photographer: "", type: "jpg", data: Buffer.alloc(0) },
  });
  assert.deepEqual(entries, [
    "Day 1 - Lighting | Video: Lighting 101 | https://example.test/v",
    "Day 1 - Lighting | Image: unknown photographer | https://images.test/l.jpg",
  ]);
  assert.equal(
    formatMediaLog(3, "Lighting", entries),
    `Media Log - Week 3: Lighting\n${"=".repeat(60)}\n\n${entries[0]}\n${entries[1]}\n`,
  );
});
