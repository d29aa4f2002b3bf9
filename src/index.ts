#!/usr/bin/env node
import { Command } from "commander";
import { registerCookCommand } from "./commands/cook.js";
import { registerInitCommand } from "./commands/init.js";
import { registerPlateCommand } from "./commands/plate.js";
import { registerSavedCommand } from "./commands/saved.js";
import { describeError, logger } from "./utils/logger.js";

const program = new Command()
  .name("sous")
  .description("Turn the ingredients you have into dish ideas and recipes")
  .version("0.1.0");

registerInitCommand(program);
registerCookCommand(program);
registerSavedCommand(program);
registerPlateCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(describeError(error));
  process.exit(1);
});
