import { z } from "zod";
import {
  OPTIONAL_CATEGORY_IDS,
  isOptionalCategoryId,
  type OptionalCategoryId,
} from "../domain/categories.js";
import type { Env } from "./env.js";

export const API_KEY_LENGTH = 32;
export const MIN_ROTATION_INTERVAL_MINUTES = 1;
export const MAX_ROTATION_INTERVAL_MINUTES = 60;

export function clampRotationInterval(minutes: number): number {
  if (!Number.isFinite(minutes)) {
    return MIN_ROTATION_INTERVAL_MINUTES;
  }
  return Math.min(MAX_ROTATION_INTERVAL_MINUTES, Math.max(MIN_ROTATION_INTERVAL_MINUTES, Math.round(minutes)));
}

const hubConfigSchema = z.object({
  apiKey: z
    .string()
    .transform((value) => value.trim())
    .refine((value) => value.length === API_KEY_LENGTH, "invalid_api_key_format"),
  enabledCategories: z
    .array(z.string())
    .default([...OPTIONAL_CATEGORY_IDS])
    .transform((values, ctx): OptionalCategoryId[] => {
      const wanted = new Set<OptionalCategoryId>();
      for (const value of values) {
        const id = value.trim();
        if (!isOptionalCategoryId(id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unsupported category: ${value}`,
          });
          continue;
        }
        wanted.add(id);
      }
      return OPTIONAL_CATEGORY_IDS.filter((id) => wanted.has(id));
    }),
  rotationIntervalMinutes: z.coerce.number().default(5).transform(clampRotationInterval),
});

export type HubConfig = z.output<typeof hubConfigSchema>;
export type HubConfigInput = z.input<typeof hubConfigSchema>;

export function parseHubConfig(input: HubConfigInput): HubConfig {
  return hubConfigSchema.parse(input);
}

export function parseEnabledCategoriesList(raw: string): string[] {
  const value = raw.trim().toLowerCase();
  if (value === "" || value === "all") {
    return [...OPTIONAL_CATEGORY_IDS];
  }
  if (value === "none") {
    return [];
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function hubConfigFromEnv(source: Pick<Env, "TIAN_API_KEY" | "ENABLED_CATEGORIES" | "ROTATION_INTERVAL_MINUTES">): HubConfig {
  return parseHubConfig({
    apiKey: source.TIAN_API_KEY,
    enabledCategories: parseEnabledCategoriesList(source.ENABLED_CATEGORIES),
    rotationIntervalMinutes: source.ROTATION_INTERVAL_MINUTES,
  });
}
