import { Command } from "commander";
import chalk from "chalk";
import { ConfigManager } from "../managers/config.js";
import { RecipeStore } from "../managers/store.js";
import type { SavedRecipe } from "../types/recipe.js";
import { savedRecipeTitle } from "../utils/format.js";
import { describeError, logger } from "../utils/logger.js";
import { formatQuantity } from "../utils/scale.js";

export function describeSavedRecipe(saved: SavedRecipe, index: number): string {
  const details =
    saved.format === "structured"
      ? `serves ${formatQuantity(saved.recipe.servings)}, x${formatQuantity(saved.recipe.scale)}`
      : "text";
  return `${index}. ${savedRecipeTitle(saved)} (${details}) - ${saved.savedAt}`;
}

export async function executeSaved(store: RecipeStore): Promise<string[]> {
  const recipes = await store.list();
  return recipes.map((saved, i) => describeSavedRecipe(saved, i + 1));
}

export function registerSavedCommand(program: Command): void {
  program
    .command("saved")
    .description("List saved recipes")
    .option("-f, --file <path>", "Recipe collection file")
    .action(async (options: { file?: string }) => {
      try {
        const config = await ConfigManager.load();
        const store = new RecipeStore(
          options.file ?? config.storage.recipesFile
        );
        const lines = await executeSaved(store);
        if (lines.length === 0) {
          console.log(chalk.gray(`No recipes saved in ${store.filePath}`));
          return;
        }
        lines.forEach((line) => console.log(line));
      } catch (error) {
        logger.error(`Error: ${describeError(error)}`);
        process.exit(1);
      }
    });
}
