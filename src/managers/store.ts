import * as fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { GeneratedRecipe, SavedRecipe } from "../types/recipe.js";
import { logger } from "../utils/logger.js";

const RecipeIngredientSchema = z.object({
  name: z.string(),
  quantity: z.number().nullable(),
  unit: z.string().nullable(),
});

const RecipeSchema = z.object({
  title: z.string(),
  servings: z.number(),
  ingredients: z.array(RecipeIngredientSchema),
  steps: z.array(z.string()),
  substitutions: z.record(z.array(z.string())),
  prepTime: z.string().nullable(),
  cookTime: z.string().nullable(),
  scale: z.number().positive(),
});

const SavedRecipeSchema = z.discriminatedUnion("format", [
  z.object({
    format: z.literal("structured"),
    recipe: RecipeSchema,
    savedAt: z.string(),
  }),
  z.object({
    format: z.literal("text"),
    title: z.string(),
    text: z.string(),
    savedAt: z.string(),
  }),
]);

const CollectionSchema = z.array(SavedRecipeSchema);

interface LoadResult {
  recipes: SavedRecipe[];
  unreadable?: string;
  readError?: unknown;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Append-only JSON collection of saved recipes. Every save reads the whole
 * file, appends one entry and writes the whole file back. Only one process
 * is expected to touch the file at a time.
 */
export class RecipeStore {
  constructor(public readonly filePath: string) {}

  async list(): Promise<SavedRecipe[]> {
    const { recipes, readError } = await this.load();
    if (readError !== undefined) {
      logger.warn(`Could not read ${this.filePath}; treating it as empty`);
      logger.debug("read error:", readError);
    }
    return recipes;
  }

  async get(index: number): Promise<SavedRecipe> {
    const recipes = await this.list();
    const recipe = recipes[index - 1];
    if (!Number.isInteger(index) || recipe === undefined) {
      throw new Error(
        `No saved recipe #${index} (${recipes.length} saved in ${this.filePath})`
      );
    }
    return recipe;
  }

  async append(
    generated: GeneratedRecipe,
    savedAt: Date = new Date()
  ): Promise<SavedRecipe> {
    const { recipes, unreadable, readError } = await this.load();
    // the file exists but cannot be read; writing would replace it
    if (readError !== undefined) throw readError;

    if (unreadable !== undefined) {
      const backupPath = `${this.filePath}.bak`;
      await fs.writeFile(backupPath, unreadable, "utf-8");
      logger.warn(
        `${this.filePath} could not be read; starting a new collection (old content kept in ${backupPath})`
      );
    }

    const saved: SavedRecipe = { ...generated, savedAt: savedAt.toISOString() };
    recipes.push(saved);

    await fs.mkdir(path.dirname(path.resolve(this.filePath)), {
      recursive: true,
    });
    await fs.writeFile(
      this.filePath,
      JSON.stringify(recipes, null, 2),
      "utf-8"
    );
    logger.debug(`saved recipe #${recipes.length} to ${this.filePath}`);
    return saved;
  }

  private async load(): Promise<LoadResult> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return { recipes: [] };
      return { recipes: [], readError: error };
    }

    if (!content.trim()) return { recipes: [] };

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      logger.debug(`invalid JSON in ${this.filePath}:`, error);
      return { recipes: [], unreadable: content };
    }

    const result = CollectionSchema.safeParse(parsed);
    if (!result.success) {
      logger.debug(`unexpected shape in ${this.filePath}: ${result.error.message}`);
      return { recipes: [], unreadable: content };
    }
    return { recipes: result.data };
  }
}
