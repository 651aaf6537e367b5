#!/usr/bin/env node
import "dotenv/config";
import chalk from "chalk";
import { buildProgram } from "./cli/commands.js";
import { errorMessage } from "./utils/helpers.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(chalk.red(errorMessage(err)));
    process.exit(1);
  });
