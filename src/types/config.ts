import { z } from "zod";

export const PROVIDERS = ["claude", "gemini"] as const;
export type ProviderName = (typeof PROVIDERS)[number];

export const UNIT_SYSTEMS = ["metric", "imperial"] as const;
export type UnitSystem = (typeof UNIT_SYSTEMS)[number];

export const ConfigSchema = z.object({
  ai: z
    .object({
      provider: z.enum(PROVIDERS).default("claude"),
      anthropicKey: z.string().optional(),
      geminiKey: z.string().optional(),
      model: z.string().optional(),
    })
    .default({}),
  storage: z
    .object({
      recipesFile: z.string().min(1).default("saved_recipes.json"),
    })
    .default({}),
  defaults: z
    .object({
      maxSuggestions: z.number().int().min(1).max(10).default(5),
      servings: z.number().int().positive().default(4),
      units: z.enum(UNIT_SYSTEMS).default("metric"),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
