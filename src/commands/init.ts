import { Command } from "commander";
import inquirer from "inquirer";
import chalk from "chalk";
import { ConfigManager } from "../managers/config.js";
import { DEFAULT_CLAUDE_MODEL } from "../providers/anthropic.js";
import { DEFAULT_GEMINI_MODEL } from "../providers/gemini.js";
import type { ConfigInput, ProviderName, UnitSystem } from "../types/config.js";
import { describeError, logger } from "../utils/logger.js";

type InitAnswers = {
  provider: ProviderName;
  apiKey: string;
  model: string;
  recipesFile: string;
  maxSuggestions: number;
  servings: number;
  units: UnitSystem;
};

export function buildConfig(answers: InitAnswers): ConfigInput {
  const model = answers.model.trim();
  const apiKey = answers.apiKey.trim() || undefined;
  return {
    ai: {
      provider: answers.provider,
      anthropicKey: answers.provider === "claude" ? apiKey : undefined,
      geminiKey: answers.provider === "gemini" ? apiKey : undefined,
      model: model || undefined,
    },
    storage: { recipesFile: answers.recipesFile.trim() || undefined },
    defaults: {
      maxSuggestions: answers.maxSuggestions,
      servings: answers.servings,
      units: answers.units,
    },
  };
}

export async function executeInit(): Promise<void> {
  const answers = await inquirer.prompt<InitAnswers>([
    {
      type: "list",
      name: "provider",
      message: "AI provider:",
      choices: [
        { name: "Claude (Anthropic)", value: "claude" },
        { name: "Gemini (Google AI Studio)", value: "gemini" },
      ],
      default: "claude",
    },
    {
      type: "password",
      name: "apiKey",
      message: "API key (leave empty to use the environment variable):",
      mask: "*",
    },
    {
      type: "input",
      name: "model",
      message: "Model:",
      default: (current: Partial<InitAnswers>) =>
        current.provider === "gemini" ? DEFAULT_GEMINI_MODEL : DEFAULT_CLAUDE_MODEL,
    },
    {
      type: "input",
      name: "recipesFile",
      message: "File to save recipes to:",
      default: "saved_recipes.json",
    },
    {
      type: "number",
      name: "maxSuggestions",
      message: "Dish suggestions to ask for:",
      default: 5,
      validate: (input: number) =>
        (Number.isInteger(input) && input >= 1 && input <= 10) ||
        "Enter a whole number from 1 to 10.",
    },
    {
      type: "number",
      name: "servings",
      message: "Default servings:",
      default: 4,
      validate: (input: number) =>
        (Number.isInteger(input) && input > 0) || "Enter a whole number above 0.",
    },
    {
      type: "list",
      name: "units",
      message: "Default units:",
      choices: ["metric", "imperial"],
      default: "metric",
    },
  ]);

  const configPath = await ConfigManager.save(buildConfig(answers));
  console.log(chalk.green(`Configuration saved to ${configPath}`));
}

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Initialize configuration")
    .action(async () => {
      try {
        await executeInit();
      } catch (error) {
        logger.error(`Error: ${describeError(error)}`);
        process.exit(1);
      }
    });
}
