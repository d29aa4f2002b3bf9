import type { DishSuggestion, RecipeOptions } from "../types/recipe.js";

export function buildNormalizePrompt(ingredientsText: string): string {
  return `Normalize the following user-provided ingredients into a clean, standardized list.
Fix spelling, use lowercase singular names, resolve synonyms and drop quantities and duplicates.
Respond with JSON only, using the key "normalized_ingredients" holding a list of strings.

Ingredients: ${ingredientsText}

Example output:
{"normalized_ingredients": ["egg", "flour", "milk"]}`;
}

export function buildSuggestPrompt(
  ingredients: string[],
  maxDishes: number
): string {
  return `Based on these ingredients: ${ingredients.join(", ")}
Suggest up to ${maxDishes} dish ideas that can be made with these or similar ingredients.
For each dish, give a one-sentence description of why it fits.
Respond with JSON only, using the key "dishes" holding a list of objects with "name" and "description".

Example output:
{"dishes": [{"name": "Pancakes", "description": "Fluffy pancakes from eggs, flour and milk."}]}`;
}

export function buildRecipePrompt(
  dish: DishSuggestion,
  ingredients: string[],
  options: Pick<RecipeOptions, "servings" | "units" | "restrictions">
): string {
  const restrictions =
    options.restrictions.length > 0
      ? `The recipe must suit these dietary restrictions: ${options.restrictions.join(", ")}.`
      : "There are no dietary restrictions.";

  return `Generate a full recipe for "${dish.name}"${dish.description ? ` (${dish.description})` : ""} using these ingredients: ${ingredients.join(", ")}
Write it for ${options.servings} servings using ${options.units} units.
${restrictions}
Include substitution options for ingredients that are commonly swapped.
Respond with JSON only, with keys:
"title" (string), "servings" (number),
"ingredients" (list of objects with "name" string, "quantity" number or null, "unit" string or null),
"steps" (list of strings), "prep_time" (string), "cook_time" (string),
"substitutions" (object mapping an ingredient name to a list of alternatives).

Example output:
{"title": "Pancakes", "servings": 4, "ingredients": [{"name": "flour", "quantity": 200, "unit": "g"}, {"name": "salt", "quantity": null, "unit": "to taste"}], "steps": ["Whisk the batter", "Fry in a hot pan"], "prep_time": "10 min", "cook_time": "15 min", "substitutions": {"milk": ["oat milk", "almond milk"]}}`;
}
