import YAML from "yaml";
import type { SavedRecipe } from "../types/recipe.js";
import { formatIngredient, formatQuantity } from "./scale.js";

export const EXPORT_FORMATS = ["json", "yaml", "markdown"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

export function savedRecipeTitle(saved: SavedRecipe): string {
  return saved.format === "structured" ? saved.recipe.title : saved.title;
}

function toMarkdown(saved: SavedRecipe): string {
  if (saved.format === "text") {
    return `# ${saved.title}

${saved.text}

---
Saved: ${saved.savedAt}
`;
  }

  const { recipe } = saved;
  const times = [
    recipe.prepTime ? `Prep: ${recipe.prepTime}` : null,
    recipe.cookTime ? `Cook: ${recipe.cookTime}` : null,
  ].filter((part): part is string => part !== null);
  const substitutions = Object.entries(recipe.substitutions);

  return `# ${recipe.title}

Serves ${formatQuantity(recipe.servings)}${recipe.scale !== 1 ? ` (scaled x${formatQuantity(recipe.scale)})` : ""}${times.length > 0 ? `\n${times.join(" | ")}` : ""}

## Ingredients
${recipe.ingredients.map((i) => `- ${formatIngredient(i)}`).join("\n")}

## Steps
${recipe.steps.map((step, idx) => `${idx + 1}. ${step}`).join("\n")}
${
  substitutions.length > 0
    ? `\n## Substitutions\n${substitutions
        .map(([original, alternatives]) => `- ${original}: ${alternatives.join(", ")}`)
        .join("\n")}\n`
    : ""
}
---
Saved: ${saved.savedAt}
`;
}

export function formatSavedRecipe(
  saved: SavedRecipe,
  format: ExportFormat,
  pretty = true
): string {
  switch (format) {
    case "json":
      return JSON.stringify(saved, null, pretty ? 2 : 0);
    case "yaml":
      return YAML.stringify(saved);
    case "markdown":
      return toMarkdown(saved);
  }
}
