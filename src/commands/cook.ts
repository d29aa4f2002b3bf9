import { Command } from "commander";
import ora, { type Ora } from "ora";
import { ConfigManager } from "../managers/config.js";
import { SousChef } from "../managers/chef.js";
import { RecipeStore } from "../managers/store.js";
import { getCompletionProvider } from "../providers/index.js";
import { UNIT_SYSTEMS, type UnitSystem } from "../types/config.js";
import { StageError, isStageError } from "../types/errors.js";
import type {
  DishSuggestion,
  GeneratedRecipe,
  IngredientList,
  RecipeOptions,
  SavedRecipe,
} from "../types/recipe.js";
import { inquirerCookPrompts } from "../utils/prompts.js";
import { describeError, logger } from "../utils/logger.js";

export type CookStage = "input" | "suggest" | "recipe";
export type RecipeAction = "save" | "another" | "quit";

/**
 * Everything the wizard needs from the user. The default implementation is
 * inquirer-backed; tests script it.
 */
export interface CookPrompts {
  askIngredients(previous?: string): Promise<string>;
  showIngredients(ingredients: IngredientList): void;
  showDishes(dishes: DishSuggestion[]): void;
  showNoDishes(): void;
  pickDish(dishes: DishSuggestion[]): Promise<DishSuggestion | null>;
  askRecipeOptions(defaults: RecipeOptions): Promise<RecipeOptions>;
  showRecipe(generated: GeneratedRecipe): void;
  nextAction(): Promise<RecipeAction>;
  showSaved(saved: SavedRecipe, filePath: string): void;
  showError(stage: CookStage, error: StageError): void;
  confirmRetry(stage: CookStage): Promise<boolean>;
}

export interface CookOptions {
  maxSuggestions: number;
  recipe: RecipeOptions;
  spinner?: boolean;
}

export interface CookSummary {
  ingredients: IngredientList;
  dishes: DishSuggestion[];
  saved: SavedRecipe[];
}

async function withSpinner<T>(
  text: string,
  enabled: boolean,
  operation: () => Promise<T>
): Promise<T> {
  const spinner: Ora = ora({ text, isSilent: !enabled }).start();
  try {
    const result = await operation();
    spinner.succeed();
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
}

/**
 * Runs the wizard: ingredients → normalized list → dish suggestions →
 * recipe, with an optional save. A failed AI stage shows its error and is
 * offered again; nothing is retried without the user asking.
 */
export async function executeCook(
  options: CookOptions,
  chef: SousChef,
  store: RecipeStore,
  ui: CookPrompts
): Promise<CookSummary> {
  const spinner = options.spinner ?? true;
  const summary: CookSummary = { ingredients: [], dishes: [], saved: [] };
  let stage: CookStage = "input";
  let ingredientsText: string | undefined;
  let recipeOptions = options.recipe;

  for (;;) {
    switch (stage) {
      case "input": {
        ingredientsText = await ui.askIngredients(ingredientsText);
        const text = ingredientsText;
        try {
          summary.ingredients = await withSpinner(
            "Normalizing ingredients",
            spinner,
            () => chef.normalizeIngredients(text)
          );
        } catch (error) {
          if (!isStageError(error)) throw error;
          ui.showError("input", error);
          break;
        }
        ui.showIngredients(summary.ingredients);
        stage = "suggest";
        break;
      }

      case "suggest": {
        try {
          summary.dishes = await withSpinner(
            "Suggesting dishes",
            spinner,
            () => chef.suggestDishes(summary.ingredients, options.maxSuggestions)
          );
        } catch (error) {
          if (!isStageError(error)) throw error;
          ui.showError("suggest", error);
          if (!(await ui.confirmRetry("suggest"))) return summary;
          break;
        }

        if (summary.dishes.length === 0) {
          ui.showNoDishes();
          stage = "input";
          break;
        }
        ui.showDishes(summary.dishes);
        stage = "recipe";
        break;
      }

      case "recipe": {
        const dish = await ui.pickDish(summary.dishes);
        if (!dish) {
          stage = "input";
          break;
        }
        recipeOptions = await ui.askRecipeOptions(recipeOptions);

        let generated: GeneratedRecipe;
        try {
          generated = await withSpinner(
            `Writing a recipe for ${dish.name}`,
            spinner,
            () =>
              chef.generateRecipe(dish, summary.ingredients, recipeOptions)
          );
        } catch (error) {
          if (!isStageError(error)) throw error;
          ui.showError("recipe", error);
          if (!(await ui.confirmRetry("recipe"))) return summary;
          break;
        }

        ui.showRecipe(generated);
        for (;;) {
          const action = await ui.nextAction();
          if (action === "quit") return summary;
          if (action === "another") break;
          const saved = await store.append(generated);
          summary.saved.push(saved);
          ui.showSaved(saved, store.filePath);
        }
        break;
      }
    }
  }
}

function parseScale(value: string): number {
  const scale = Number(value);
  if (!Number.isFinite(scale) || scale <= 0) {
    throw new Error(`Invalid scale "${value}": must be a positive number`);
  }
  return scale;
}

export const MAX_SUGGESTIONS = 10;

export function parsePositiveInt(value: string, max?: number): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Invalid number "${value}": must be a positive integer`);
  }
  if (max !== undefined && parsed > max) {
    throw new Error(`Invalid number "${value}": must be at most ${max}`);
  }
  return parsed;
}

function parseUnits(value: string): UnitSystem {
  const units = UNIT_SYSTEMS.find((system) => system === value.toLowerCase());
  if (!units) {
    throw new Error(
      `Invalid units "${value}": must be one of ${UNIT_SYSTEMS.join(", ")}`
    );
  }
  return units;
}

export function registerCookCommand(program: Command): void {
  program
    .command("cook", { isDefault: true })
    .description("Turn your ingredients into a dish and a recipe")
    .option("-s, --scale <factor>", "Scale factor for quantities", "1")
    .option("-n, --servings <count>", "Number of servings")
    .option("-u, --units <system>", "Unit system (metric/imperial)")
    .option("-d, --diet <restrictions...>", "Dietary restrictions")
    .option(
      "-m, --max <count>",
      `Maximum number of dish suggestions (1-${MAX_SUGGESTIONS})`
    )
    .option("-f, --file <path>", "File to save recipes to")
    .option("--no-spinner", "Disable progress spinner")
    .action(
      async (cmdOptions: {
        scale: string;
        servings?: string;
        units?: string;
        diet?: string[];
        max?: string;
        file?: string;
        spinner: boolean;
      }) => {
        try {
          const config = await ConfigManager.load();
          const chef = new SousChef(getCompletionProvider(config));
          const store = new RecipeStore(
            cmdOptions.file ?? config.storage.recipesFile
          );

          await executeCook(
            {
              maxSuggestions: cmdOptions.max
                ? parsePositiveInt(cmdOptions.max, MAX_SUGGESTIONS)
                : config.defaults.maxSuggestions,
              recipe: {
                scale: parseScale(cmdOptions.scale),
                servings: cmdOptions.servings
                  ? parsePositiveInt(cmdOptions.servings)
                  : config.defaults.servings,
                units: cmdOptions.units
                  ? parseUnits(cmdOptions.units)
                  : config.defaults.units,
                restrictions: cmdOptions.diet ?? [],
              },
              spinner: cmdOptions.spinner,
            },
            chef,
            store,
            inquirerCookPrompts
          );
        } catch (error) {
          logger.error(`Error: ${describeError(error)}`);
          process.exit(1);
        }
      }
    );
}
