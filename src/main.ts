#!/usr/bin/env -S node --import tsx
import { readFile } from "node:fs/promises";
import { realpathSync } from "node:fs";
import { basename } from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig, loadEnvFile } from "./config.ts";
import { generateLessonPlan, generateWeek, type MediaSource } from "./generator.ts";
import { createLogger, errorMessage } from "./logger.ts";
import { MediaLookup } from "./media.ts";
import { isRecord, validateSingleLesson, validateWeek } from "./validator.ts";

/**
 * CLI entry point.
 *
 *   cte-lesson-kit '<json>'
 *   cte-lesson-kit --file week.json
 *
 * A payload with `days` produces the full week; anything else is treated as one lesson plan. The summary goes
 * to stdout as `SUCCESS:` lines; failures print `ERROR:` to stderr and exit with status 1.
 */
export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface CliOptions {
  io?: CliIo;
  env?: NodeJS.ProcessEnv;
  // Replaces the Pexels-backed lookup.
  media?: MediaSource;
}

const USAGE = "Usage: cte-lesson-kit '<json_data>' | --file <path>";

const consoleIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

type RawInput = { ok: true; text: string } | { ok: false; error: string };

async function readInput(argv: readonly string[]): Promise<RawInput> {
  const [first, second] = argv;
  if (first === undefined) {
    return { ok: false, error: USAGE };
  }
  if (first !== "--file") {
    return { ok: true, text: first };
  }
  if (!second) {
    return { ok: false, error: USAGE };
  }
  try {
    return { ok: true, text: await readFile(second, "utf8") };
  } catch (error) {
    return { ok: false, error: `ERROR: Could not read ${second} - ${errorMessage(error)}` };
  }
}

export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? consoleIo;
  const input = await readInput(argv);
  if (!input.ok) {
    io.stderr(input.error);
    return 1;
  }

  let data: unknown;
  try {
    data = JSON.parse(input.text);
  } catch (error) {
    io.stderr(`ERROR: Invalid JSON - ${errorMessage(error)}`);
    return 1;
  }

  const config = loadConfig(options.env);
  const logger = createLogger(config.logLevel);
  const deps = { config, logger, media: options.media ?? new MediaLookup(config, logger) };

  try {
    if (isRecord(data) && "days" in data) {
      const validation = validateWeek(data);
      if (!validation.ok) {
        io.stderr("ERROR: Invalid week data");
        validation.errors.forEach((error) => io.stderr(`  - ${error}`));
        return 1;
      }
      validation.errors.forEach((error) => logger.warn("Skipping invalid day", { error }));
      validation.warnings.forEach((warning) => logger.warn("Ignoring input", { warning }));

      const result = await generateWeek(validation.value, deps);
      io.stdout("SUCCESS: Weekly lesson plans generated");
      io.stdout(`Week Folder: ${result.weekFolder}`);
      io.stdout(`CTE Plans: ${result.ctePlans.length}`);
      result.ctePlans.forEach((path) => io.stdout(`  - ${basename(path)}`));
      io.stdout(`Teacher Handout: ${basename(result.teacherHandout)}`);
      result.studentHandouts.forEach((path) => io.stdout(`Student Handout: ${basename(path)}`));
      io.stdout(`Bell Ringers: ${basename(result.bellRingers)}`);
      if (result.dailyPresentations.length > 0) {
        io.stdout(`Daily Presentations: ${result.dailyPresentations.length}`);
        result.dailyPresentations.forEach((path) => io.stdout(`  - ${basename(path)}`));
      }
      if (result.mediaLog) {
        io.stdout(`Media Log: ${basename(result.mediaLog)}`);
      }
      return 0;
    }

    const validation = validateSingleLesson(data);
    if (!validation.ok) {
      io.stderr("ERROR: Invalid lesson data");
      validation.errors.forEach((error) => io.stderr(`  - ${error}`));
      return 1;
    }
    validation.warnings.forEach((warning) => logger.warn("Ignoring input", { warning }));
    const path = await generateLessonPlan(validation.value.lesson, validation.value.week, deps);
    io.stdout(`SUCCESS: ${path}`);
    return 0;
  } catch (error) {
    logger.error("Generation failed", { error: errorMessage(error) });
    io.stderr(`ERROR: ${errorMessage(error)}`);
    return 1;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  loadEnvFile();
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error("Fatal error", error);
      process.exitCode = 1;
    });
}
