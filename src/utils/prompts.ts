import inquirer from "inquirer";
import chalk from "chalk";
import type { CookPrompts, CookStage, RecipeAction } from "../commands/cook.js";
import { UNIT_SYSTEMS, type UnitSystem } from "../types/config.js";
import { FormatError, type StageError } from "../types/errors.js";
import type { DishSuggestion, GeneratedRecipe } from "../types/recipe.js";
import { savedRecipeTitle } from "./format.js";
import { splitIngredientText } from "./ingredients.js";
import { formatIngredient, formatQuantity } from "./scale.js";

const STAGE_LABELS: Record<CookStage, string> = {
  input: "Normalizing ingredients",
  suggest: "Suggesting dishes",
  recipe: "Writing the recipe",
};

export function printRecipe(generated: GeneratedRecipe): void {
  if (generated.format === "text") {
    console.log(chalk.blue("\nRecipe:"), generated.title);
    console.log(
      chalk.yellow("(The reply was not structured; showing it as text.)\n")
    );
    console.log(generated.text);
    return;
  }

  const { recipe } = generated;
  console.log(chalk.blue("\nRecipe:"), recipe.title);
  console.log(
    chalk.blue("Servings:"),
    formatQuantity(recipe.servings),
    recipe.scale !== 1
      ? chalk.gray(`(quantities x${formatQuantity(recipe.scale)})`)
      : ""
  );
  if (recipe.prepTime) console.log(chalk.blue("Prep Time:"), recipe.prepTime);
  if (recipe.cookTime) console.log(chalk.blue("Cook Time:"), recipe.cookTime);

  console.log(chalk.blue("\nIngredients:"));
  recipe.ingredients.forEach((ing, i) =>
    console.log(chalk.gray(`${i + 1}.`), formatIngredient(ing))
  );
  console.log(chalk.blue("\nSteps:"));
  recipe.steps.forEach((step, i) => console.log(chalk.gray(`${i + 1}.`), step));

  const substitutions = Object.entries(recipe.substitutions);
  if (substitutions.length > 0) {
    console.log(chalk.blue("\nSubstitutions:"));
    for (const [original, alternatives] of substitutions) {
      console.log(`- ${original}: ${alternatives.join(", ")}`);
    }
  }
}

export const inquirerCookPrompts: CookPrompts = {
  async askIngredients(previous) {
    const { ingredients } = await inquirer.prompt<{ ingredients: string }>([
      {
        type: "input",
        name: "ingredients",
        message: "Ingredients you have (comma-separated):",
        default: previous,
        validate: (input: string) =>
          splitIngredientText(input).length > 0 ||
          "Please enter some ingredients.",
      },
    ]);
    return ingredients;
  },

  showIngredients(ingredients) {
    console.log(chalk.blue("\nNormalized ingredients:"));
    ingredients.forEach((ing) => console.log(`- ${ing}`));
  },

  showDishes(dishes) {
    console.log(chalk.blue("\nSuggested dishes:"));
    dishes.forEach((dish, i) =>
      console.log(
        chalk.gray(`${i + 1}.`),
        chalk.bold(dish.name),
        dish.description ? `- ${dish.description}` : ""
      )
    );
  },

  showNoDishes() {
    console.log(
      chalk.yellow("\nNo dishes came back for these ingredients. Try adding a few more.")
    );
  },

  async pickDish(dishes) {
    const { dish } = await inquirer.prompt<{ dish: DishSuggestion | null }>([
      {
        type: "list",
        name: "dish",
        message: "Pick a dish:",
        choices: [
          ...dishes.map((d) => ({ name: d.name, value: d })),
          new inquirer.Separator(),
          { name: "Start over with different ingredients", value: null },
        ],
      },
    ]);
    return dish;
  },

  async askRecipeOptions(defaults) {
    const answers = await inquirer.prompt<{
      servings: number;
      scale: number;
      units: UnitSystem;
      restrictions: string;
    }>([
      {
        type: "number",
        name: "servings",
        message: "Number of servings:",
        default: defaults.servings,
        validate: (input: number) =>
          (Number.isInteger(input) && input > 0) || "Enter a whole number above 0.",
      },
      {
        type: "number",
        name: "scale",
        message: "Scale factor:",
        default: defaults.scale,
        validate: (input: number) =>
          (Number.isFinite(input) && input > 0) || "Enter a number above 0.",
      },
      {
        type: "list",
        name: "units",
        message: "Units:",
        choices: [...UNIT_SYSTEMS],
        default: defaults.units,
      },
      {
        type: "input",
        name: "restrictions",
        message: "Dietary restrictions (comma-separated, optional):",
        default: defaults.restrictions.join(", "),
      },
    ]);

    return {
      servings: answers.servings,
      scale: answers.scale,
      units: answers.units,
      restrictions: splitIngredientText(answers.restrictions),
    };
  },

  showRecipe: printRecipe,

  async nextAction() {
    const { action } = await inquirer.prompt<{ action: RecipeAction }>([
      {
        type: "list",
        name: "action",
        message: "Would you like to:",
        choices: [
          { name: "Save recipe", value: "save" },
          { name: "Pick another dish", value: "another" },
          { name: "Quit", value: "quit" },
        ],
      },
    ]);
    return action;
  },

  showSaved(saved, filePath) {
    console.log(
      chalk.green(`Saved "${savedRecipeTitle(saved)}" to ${filePath}`)
    );
  },

  showError(stage: CookStage, error: StageError) {
    console.log(chalk.red(`\n${STAGE_LABELS[stage]} failed: ${error.message}`));
    if (error instanceof FormatError && error.raw.trim()) {
      console.log(chalk.gray("Raw response:"));
      console.log(chalk.gray(error.raw));
    }
  },

  async confirmRetry(stage) {
    const { retry } = await inquirer.prompt<{ retry: boolean }>([
      {
        type: "confirm",
        name: "retry",
        message: `${STAGE_LABELS[stage]} again?`,
        default: true,
      },
    ]);
    return retry;
  },
};
