import { Command } from "commander";
import ora from "ora";
import fs from "fs/promises";
import { ConfigManager } from "../managers/config.js";
import { RecipeStore } from "../managers/store.js";
import {
  EXPORT_FORMATS,
  formatSavedRecipe,
  isExportFormat,
  type ExportFormat,
} from "../utils/format.js";
import { describeError, logger } from "../utils/logger.js";

export interface PlateOptions {
  index: number;
  format: ExportFormat;
  out?: string;
  pretty?: boolean;
}

/**
 * Renders saved recipe `index` (1-based, as listed by `saved`). Writes to
 * `out` when given and returns the rendered text either way.
 */
export async function executePlate(
  options: PlateOptions,
  store: RecipeStore
): Promise<string> {
  const saved = await store.get(options.index);
  const output = formatSavedRecipe(saved, options.format, options.pretty);
  if (options.out) {
    await fs.writeFile(options.out, output);
  }
  return output;
}

export function registerPlateCommand(program: Command): void {
  program
    .command("plate <index>")
    .description("Export a saved recipe as json, yaml or markdown")
    .option(
      "-F, --format <format>",
      "Output format (json|yaml|markdown)",
      "markdown"
    )
    .option("-o, --out <file>", "Write to a file instead of stdout")
    .option("-f, --file <path>", "Recipe collection file")
    .option("--compact", "Compact JSON output")
    .action(
      async (
        index: string,
        cmdOptions: {
          format: string;
          out?: string;
          file?: string;
          compact?: boolean;
        }
      ) => {
        const spinner = cmdOptions.out ? ora("Exporting recipe").start() : null;
        try {
          if (!isExportFormat(cmdOptions.format)) {
            throw new Error(
              `Unsupported format: ${cmdOptions.format} (use ${EXPORT_FORMATS.join(", ")})`
            );
          }
          const config = await ConfigManager.load();
          const store = new RecipeStore(
            cmdOptions.file ?? config.storage.recipesFile
          );
          const output = await executePlate(
            {
              index: Number(index),
              format: cmdOptions.format,
              out: cmdOptions.out,
              pretty: !cmdOptions.compact,
            },
            store
          );
          if (spinner) spinner.succeed(`Recipe exported to ${cmdOptions.out}`);
          else console.log(output);
        } catch (error) {
          spinner?.fail("Export failed");
          logger.error(`Error: ${describeError(error)}`);
          process.exit(1);
        }
      }
    );
}
