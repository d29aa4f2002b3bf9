import type { Recipe, RecipeIngredient } from "../types/recipe.js";

const UNIT_MAP: Record<string, string> = {
  g: "g",
  gram: "g",
  grams: "g",
  kg: "kg",
  kilogram: "kg",
  kilograms: "kg",
  oz: "oz",
  ounce: "oz",
  ounces: "oz",
  lb: "lb",
  lbs: "lb",
  pound: "lb",
  pounds: "lb",
  cup: "cup",
  cups: "cup",
  tbsp: "tbsp",
  tablespoon: "tbsp",
  tablespoons: "tbsp",
  tsp: "tsp",
  teaspoon: "tsp",
  teaspoons: "tsp",
  ml: "ml",
  l: "L",
  liter: "L",
  liters: "L",
  litre: "L",
  litres: "L",
  pinch: "pinch",
  pinches: "pinch",
  clove: "clove",
  cloves: "clove",
};

// Quantities attached to these units do not grow with the serving size.
const NON_LINEAR_UNITS = new Set(["to taste", "as needed"]);

const UNICODE_FRACTIONS: Record<string, number> = {
  "¼": 0.25,
  "½": 0.5,
  "¾": 0.75,
  "⅓": 1 / 3,
  "⅔": 2 / 3,
};

function parseNumberToken(token: string): number | null {
  if (Object.hasOwn(UNICODE_FRACTIONS, token)) return UNICODE_FRACTIONS[token];
  if (token.includes("/")) {
    const [num, denom] = token.split("/").map(Number);
    if (!Number.isFinite(num) || !Number.isFinite(denom) || denom === 0) {
      return null;
    }
    return num / denom;
  }
  const value = Number(token);
  return Number.isFinite(value) && token.trim() !== "" ? value : null;
}

/**
 * Parses "2", "2.5", "1/2", "1 1/2" or "½". Returns null for anything else.
 */
export function parseQuantity(raw: string): number | null {
  const parts = raw.trim().split(/\s+/).filter(Boolean);
  if (parts.length === 0 || parts.length > 2) return null;

  let total = 0;
  for (const part of parts) {
    const value = parseNumberToken(part);
    if (value === null) return null;
    total += value;
  }
  return total;
}

export function normalizeUnit(unit: string): string {
  const key = unit.trim().toLowerCase().replace(/\.$/, "");
  return Object.hasOwn(UNIT_MAP, key) ? UNIT_MAP[key] : key;
}

/**
 * Splits a free-form line such as "2 cups flour" or "1 1/2 tsp salt" into
 * quantity, unit and name. Lines without a leading number keep the whole text
 * as the name.
 */
export function parseIngredientLine(line: string): RecipeIngredient {
  const tokens = line.trim().split(/\s+/).filter(Boolean);

  let consumed = 0;
  let quantity: number | null = null;
  for (const take of [2, 1]) {
    if (tokens.length <= take - 1) continue;
    const value = parseQuantity(tokens.slice(0, take).join(" "));
    if (value !== null) {
      quantity = value;
      consumed = take;
      break;
    }
  }

  let unit: string | null = null;
  if (quantity !== null && tokens.length > consumed + 1) {
    const candidate = tokens[consumed].toLowerCase().replace(/\.$/, "");
    if (Object.hasOwn(UNIT_MAP, candidate)) {
      unit = UNIT_MAP[candidate];
      consumed++;
    }
  }

  const name = tokens.slice(consumed).join(" ") || line.trim();
  return { name, quantity, unit };
}

function isLinear(ingredient: RecipeIngredient): boolean {
  return (
    ingredient.quantity !== null &&
    !(ingredient.unit && NON_LINEAR_UNITS.has(ingredient.unit.toLowerCase()))
  );
}

/**
 * Multiplies every linearly scalable quantity by `factor`. The recipe's own
 * `scale` is multiplied too, so scaling a scaled recipe composes.
 */
export function scaleRecipe(recipe: Recipe, factor: number): Recipe {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new RangeError(`Scale factor must be a positive number, got ${factor}`);
  }

  return {
    ...recipe,
    scale: recipe.scale * factor,
    ingredients: recipe.ingredients.map((ingredient) =>
      isLinear(ingredient) && ingredient.quantity !== null
        ? { ...ingredient, quantity: ingredient.quantity * factor }
        : { ...ingredient }
    ),
  };
}

export function formatQuantity(quantity: number): string {
  return String(Number(quantity.toFixed(2)));
}

export function formatIngredient(ingredient: RecipeIngredient): string {
  if (
    ingredient.quantity === null &&
    ingredient.unit &&
    NON_LINEAR_UNITS.has(ingredient.unit.toLowerCase())
  ) {
    return `${ingredient.name} ${ingredient.unit}`;
  }
  return [
    ingredient.quantity !== null ? formatQuantity(ingredient.quantity) : null,
    ingredient.unit,
    ingredient.name,
  ]
    .filter((part): part is string => Boolean(part))
    .join(" ");
}
