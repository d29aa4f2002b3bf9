import type { UnitSystem } from "./config.js";

/**
 * Ordered ingredient names. Never empty once it reaches an AI stage.
 */
export type IngredientList = string[];

export interface DishSuggestion {
  name: string;
  description?: string;
}

export interface RecipeIngredient {
  name: string;
  quantity: number | null;
  unit: string | null;
}

/**
 * Core recipe representation used throughout the application
 */
export interface Recipe {
  title: string;
  servings: number;
  ingredients: RecipeIngredient[];
  steps: string[];
  substitutions: Record<string, string[]>;
  prepTime: string | null;
  cookTime: string | null;
  scale: number;
}

/**
 * What the recipe stage produces. The AI service does not always answer with
 * structured data, so a plain-text draft is kept instead of being discarded.
 */
export type GeneratedRecipe =
  | { format: "structured"; recipe: Recipe }
  | { format: "text"; title: string; text: string };

export type SavedRecipe = GeneratedRecipe & { savedAt: string };

export interface RecipeOptions {
  scale: number;
  servings: number;
  units: UnitSystem;
  restrictions: string[];
}
