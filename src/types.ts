/**
 * Core domain types for the generator process.
 *
 * - Wire shapes (lessons, weeks, handouts, tag keys) live in `@cte-kit/shared-types/contracts`.
 * - This file holds the types that only the Node process needs: keyword tables for the tagging engine,
 *   media lookup results, and runtime configuration.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export type TagFamily = "materials" | "methods" | "assessment" | "curriculum" | "otherAreas";

export interface KeywordEntry<K extends string> {
  // Category key appended to the tag list when any keyword matches.
  key: K;
  // Lowercase substrings searched in the aggregated lesson text.
  keywords: readonly string[];
}

// Evaluated in declaration order; that order is the order inferred tags appear in.
export type KeywordTable<K extends string> = ReadonlyArray<KeywordEntry<K>>;

export interface CuratedVideo {
  // Topic fragment the video is filed under ("camera angles").
  keyword: string;
  url: string;
  title: string;
}

// Raster formats Word can embed; the docx package names the media part after this.
export type ImageType = "jpg" | "png" | "gif" | "bmp";

export interface TopicImage {
  // Download URL of the photo, recorded in the media log for attribution.
  sourceUrl: string;
  photographer: string;
  type: ImageType;
  data: Buffer;
}

export interface MediaResult {
  video?: CuratedVideo;
  image?: TopicImage;
}

export interface AppConfig {
  // Root folder that receives the WeekNN directories.
  outputDir: string;
  // Printed on every lesson plan and handout header.
  courseTitle: string;
  // Minutes shown when a lesson does not give its own duration.
  defaultDuration: string;
  // Optional: without it topic images are skipped and only curated videos are looked up.
  pexelsApiKey?: string;
  mediaTimeoutMs: number;
  logLevel: LogLevel;
}
