import { z } from "zod";
import {
  FormatError,
  TransportError,
  isStageError,
} from "../types/errors.js";
import type { CompletionProvider } from "../types/provider.js";
import type {
  DishSuggestion,
  GeneratedRecipe,
  IngredientList,
  Recipe,
  RecipeIngredient,
  RecipeOptions,
} from "../types/recipe.js";
import {
  buildNormalizePrompt,
  buildRecipePrompt,
  buildSuggestPrompt,
} from "../utils/ai-prompts.js";
import { dedupeIngredients, splitIngredientText } from "../utils/ingredients.js";
import { extractJson } from "../utils/json.js";
import { logger } from "../utils/logger.js";
import {
  normalizeUnit,
  parseIngredientLine,
  parseQuantity,
  scaleRecipe,
} from "../utils/scale.js";

export const DEFAULT_MAX_SUGGESTIONS = 5;

const NormalizedSchema = z.union([
  z
    .object({ normalized_ingredients: z.array(z.string()) })
    .transform((value) => value.normalized_ingredients),
  z.array(z.string()),
]);

const DishEntrySchema = z.union([
  z.string().transform((name): DishSuggestion => ({ name })),
  z
    .object({ name: z.string(), description: z.string().nullish() })
    .transform(
      ({ name, description }): DishSuggestion =>
        description?.trim()
          ? { name, description: description.trim() }
          : { name }
    ),
]);

const DishesSchema = z.union([
  z
    .object({ dishes: z.array(DishEntrySchema) })
    .transform((value) => value.dishes),
  z.array(DishEntrySchema),
]);

const IngredientEntrySchema = z.union([
  z.string().transform(parseIngredientLine),
  z
    .object({
      name: z.string(),
      quantity: z.union([z.number(), z.string()]).nullish(),
      unit: z.string().nullish(),
    })
    .transform(toRecipeIngredient),
]);

const StepSchema = z.union([
  z.string(),
  z.object({ text: z.string() }).transform((step) => step.text),
]);

const TimeSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) =>
    value === null || value === undefined || value === ""
      ? null
      : typeof value === "number"
        ? `${value} min`
        : value
  );

const RecipeResponseSchema = z.preprocess(
  (value) =>
    value !== null &&
    typeof value === "object" &&
    !("steps" in value) &&
    "instructions" in value
      ? { ...value, steps: value.instructions }
      : value,
  z.object({
    title: z.string().optional(),
    name: z.string().optional(),
    servings: z.union([z.number(), z.string()]).optional(),
    ingredients: z.array(IngredientEntrySchema).min(1),
    steps: z.array(StepSchema).min(1),
    prep_time: TimeSchema,
    cook_time: TimeSchema,
    substitutions: z
      .record(z.union([z.string(), z.array(z.string())]))
      .nullish(),
  })
);

function toRecipeIngredient(entry: {
  name: string;
  quantity?: number | string | null;
  unit?: string | null;
}): RecipeIngredient {
  let quantity: number | null = null;
  let unit = entry.unit?.trim() ? normalizeUnit(entry.unit) : null;

  if (typeof entry.quantity === "number") {
    quantity = entry.quantity;
  } else if (typeof entry.quantity === "string" && entry.quantity.trim()) {
    quantity = parseQuantity(entry.quantity);
    // "to taste", "a handful": keep the wording as the unit
    if (quantity === null && unit === null) unit = entry.quantity.trim();
  }

  return { name: entry.name.trim(), quantity, unit };
}

function toServings(value: number | string | undefined, fallback: number) {
  const servings = typeof value === "string" ? parseQuantity(value) : value;
  return servings && servings > 0 ? servings : fallback;
}

function toSubstitutions(
  value: Record<string, string | string[]> | null | undefined
): Record<string, string[]> {
  const substitutions: Record<string, string[]> = {};
  for (const [original, alternatives] of Object.entries(value ?? {})) {
    const list = (Array.isArray(alternatives) ? alternatives : [alternatives])
      .map((alternative) => alternative.trim())
      .filter(Boolean);
    if (list.length > 0) substitutions[original] = list;
  }
  return substitutions;
}

function assertIngredients(ingredients: IngredientList): void {
  if (ingredients.length === 0) {
    throw new Error("At least one ingredient is required");
  }
}

/**
 * Drives the three AI-backed stages of the wizard: normalizing ingredients,
 * suggesting dishes and writing a recipe. Replies are parsed defensively;
 * the service is never trusted to follow the requested shape.
 */
export class SousChef {
  constructor(private provider: CompletionProvider) {}

  async normalizeIngredients(ingredientsText: string): Promise<IngredientList> {
    if (splitIngredientText(ingredientsText).length === 0) {
      throw new Error("Please enter some ingredients");
    }

    const raw = await this.ask(buildNormalizePrompt(ingredientsText));
    const result = NormalizedSchema.safeParse(extractJson(raw));
    if (!result.success) {
      throw new FormatError("Could not read the normalized ingredients", raw, {
        issues: result.error.issues,
      });
    }

    const ingredients = dedupeIngredients(result.data);
    if (ingredients.length === 0) {
      throw new FormatError("The AI service returned no ingredients", raw);
    }
    return ingredients;
  }

  async suggestDishes(
    ingredients: IngredientList,
    maxDishes = DEFAULT_MAX_SUGGESTIONS
  ): Promise<DishSuggestion[]> {
    assertIngredients(ingredients);
    if (!Number.isInteger(maxDishes) || maxDishes < 1) {
      throw new RangeError(`Dish count must be a positive integer, got ${maxDishes}`);
    }

    const raw = await this.ask(buildSuggestPrompt(ingredients, maxDishes));
    const result = DishesSchema.safeParse(extractJson(raw));
    if (!result.success) {
      throw new FormatError("Could not read the dish suggestions", raw, {
        issues: result.error.issues,
      });
    }

    return result.data
      .map((dish) => ({ ...dish, name: dish.name.trim() }))
      .filter((dish) => dish.name.length > 0)
      .slice(0, maxDishes);
  }

  /**
   * Asks for the baseline recipe and applies `options.scale` locally, so
   * numeric quantities are exactly proportional to the scale factor.
   */
  async generateRecipe(
    dish: DishSuggestion,
    ingredients: IngredientList,
    options: RecipeOptions
  ): Promise<GeneratedRecipe> {
    assertIngredients(ingredients);
    if (!Number.isFinite(options.scale) || options.scale <= 0) {
      throw new RangeError(
        `Scale factor must be a positive number, got ${options.scale}`
      );
    }

    const raw = await this.ask(buildRecipePrompt(dish, ingredients, options));
    if (!raw.trim()) {
      throw new FormatError("The AI service returned an empty recipe", raw);
    }

    const result = RecipeResponseSchema.safeParse(extractJson(raw));
    if (!result.success) {
      logger.debug(`recipe reply is not structured: ${result.error.message}`);
      return { format: "text", title: dish.name, text: raw.trim() };
    }

    const data = result.data;
    const baseline: Recipe = {
      title: data.title?.trim() || data.name?.trim() || dish.name,
      servings: toServings(data.servings, options.servings),
      ingredients: data.ingredients,
      steps: data.steps.map((step) => step.trim()).filter(Boolean),
      substitutions: toSubstitutions(data.substitutions),
      prepTime: data.prep_time,
      cookTime: data.cook_time,
      scale: 1,
    };

    return { format: "structured", recipe: scaleRecipe(baseline, options.scale) };
  }

  private async ask(prompt: string): Promise<string> {
    try {
      const raw = await this.provider.complete(prompt);
      logger.debug(`${this.provider.name} replied with ${raw.length} chars`);
      return raw;
    } catch (error) {
      if (isStageError(error)) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`AI request failed: ${message}`);
    }
  }
}
