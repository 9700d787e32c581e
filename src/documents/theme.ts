import { readFileSync } from "node:fs";
import { z } from "zod";

/**
 * Unit colour themes for handout banners, keyed by unit name (`data/unit_themes.json`).
 * Colours are six-digit hex strings as docx expects them (no leading `#`).
 */
const hex = z.string().regex(/^[0-9A-F]{6}$/);

const unitThemesSchema = z.array(
  z.object({
    unit: z.string().min(1),
    primary: hex,
    secondary: hex,
    accent: hex,
  }),
);

export interface ColorTheme {
  primary: string;
  secondary: string;
  accent: string;
}

// Navy, used for units without a theme of their own.
export const DEFAULT_THEME: ColorTheme = Object.freeze({ primary: "1A3C6E", secondary: "D6E3F8", accent: "3498DB" });

const THEMES_PATH = new URL("../../data/unit_themes.json", import.meta.url);

const UNIT_THEMES: ReadonlyMap<string, ColorTheme> = new Map(
  unitThemesSchema
    .parse(JSON.parse(readFileSync(THEMES_PATH, "utf8")))
    .map(({ unit, ...theme }) => [unit, Object.freeze(theme)] as const),
);

export function themeForUnit(unit: string): ColorTheme {
  return UNIT_THEMES.get(unit) ?? DEFAULT_THEME;
}
