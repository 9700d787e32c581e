import { readFileSync } from "node:fs";
import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { errorMessage, type Logger } from "./logger.ts";
import type { AppConfig, CuratedVideo, ImageType, MediaResult, TopicImage } from "./types.ts";

/**
 * Media lookup for lesson topics.
 *
 * - Videos come from a curated library (`data/curated_videos.json`); no network access is involved.
 * - Images come from the Pexels search API and are only looked up when `PEXELS_API_KEY` is configured.
 *
 * Lookups are best effort: a failed request is logged and the lesson simply goes without that asset.
 */
const curatedVideoSchema = z.array(
  z.object({
    keyword: z.string().min(1),
    url: z.string().url(),
    title: z.string().min(1),
  }),
);

const VIDEOS_PATH = new URL("../data/curated_videos.json", import.meta.url);

export const CURATED_VIDEOS: readonly CuratedVideo[] = Object.freeze(
  curatedVideoSchema.parse(JSON.parse(readFileSync(VIDEOS_PATH, "utf8"))),
);

// Only the fields we read from a Pexels search response.
const pexelsSearchSchema = z.object({
  photos: z.array(
    z.object({
      photographer: z.string().default(""),
      src: z.object({ large: z.string() }),
    }),
  ),
});

const PEXELS_BASE_URL = "https://api.pexels.com/v1";
const IMAGE_CONTEXT = "media production";

/**
 * Curated video for a topic. A keyword contained in the topic (or the topic contained in a keyword) wins;
 * otherwise the first keyword containing any topic word longer than three characters.
 */
export function findCuratedVideo(topic: string, videos: readonly CuratedVideo[] = CURATED_VIDEOS): CuratedVideo | undefined {
  const normalized = topic.toLowerCase().trim();
  if (!normalized) return undefined;

  const direct = videos.find((video) => normalized.includes(video.keyword) || video.keyword.includes(normalized));
  if (direct) return direct;

  const words = normalized.split(/\s+/).filter((word) => word.length > 3);
  return videos.find((video) => words.some((word) => video.keyword.includes(word)));
}

export function getYoutubeVideoId(url: string | undefined): string | undefined {
  if (!url) return undefined;
  if (url.includes("youtu.be/")) {
    const match = /youtu\.be\/([a-zA-Z0-9_-]+)/.exec(url);
    if (match) return match[1];
  }
  if (url.includes("youtube.com/watch")) {
    const match = /[?&]v=([a-zA-Z0-9_-]+)/.exec(url);
    if (match) return match[1];
  }
  return undefined;
}

// Queries tried in order until one returns a downloadable photo.
const IMAGE_SIGNATURES: ReadonlyArray<{ type: ImageType; bytes: readonly number[] }> = [
  { type: "png", bytes: [0x89, 0x50, 0x4e, 0x47] },
  { type: "gif", bytes: [0x47, 0x49, 0x46, 0x38] },
  { type: "bmp", bytes: [0x42, 0x4d] },
];

/**
 * Sniff the format from the leading bytes. Pexels serves JPEG for `src.large`, so anything unrecognised is
 * treated as one.
 */
export function detectImageType(data: Uint8Array): ImageType {
  const match = IMAGE_SIGNATURES.find(({ bytes }) => bytes.every((byte, index) => data[index] === byte));
  return match?.type ?? "jpg";
}

export function imageQueries(topic: string): string[] {
  return [`${topic} ${IMAGE_CONTEXT}`, `${topic} film`, `${topic} video`, topic];
}

export function createPexelsClient(apiKey: string, timeoutMs: number): AxiosInstance {
  return axios.create({
    baseURL: PEXELS_BASE_URL,
    timeout: timeoutMs,
    headers: { Authorization: apiKey },
  });
}

export class MediaLookup {
  #http: AxiosInstance | undefined;
  #logger: Logger;

  /**
   * `http` overrides the Pexels client; without it one is created when an API key is configured.
   */
  constructor(config: Pick<AppConfig, "pexelsApiKey" | "mediaTimeoutMs">, logger: Logger, http?: AxiosInstance) {
    this.#logger = logger;
    this.#http = http ?? (config.pexelsApiKey ? createPexelsClient(config.pexelsApiKey, config.mediaTimeoutMs) : undefined);
  }

  get imagesEnabled(): boolean {
    return this.#http !== undefined;
  }

  async fetchMedia(topic: string): Promise<MediaResult> {
    const video = findCuratedVideo(topic);
    const image = await this.searchTopicImage(topic);
    this.#logger.debug("Media lookup finished", { topic, video: video?.url, image: image?.sourceUrl });
    return { video, image };
  }

  async searchTopicImage(topic: string): Promise<TopicImage | undefined> {
    const http = this.#http;
    if (!http) return undefined;

    for (const query of imageQueries(topic)) {
      try {
        const response = await http.get("/search", {
          params: { query, per_page: 1, orientation: "landscape" },
        });
        const parsed = pexelsSearchSchema.safeParse(response.data);
        if (!parsed.success) {
          this.#logger.warn("Unexpected Pexels response", { query });
          continue;
        }
        const photo = parsed.data.photos[0];
        if (!photo) continue;

        const download = await http.get<ArrayBuffer>(photo.src.large, { responseType: "arraybuffer" });
        const data = Buffer.from(download.data);
        return { sourceUrl: photo.src.large, photographer: photo.photographer, type: detectImageType(data), data };
      } catch (error) {
        this.#logger.warn("Image lookup failed", { query, error: errorMessage(error) });
      }
    }
    return undefined;
  }
}
