#!/usr/bin/env node
import chalk from "chalk";
import { config as loadEnv } from "dotenv";
import { EXIT_FAILURE, runCli } from "../cli.js";

loadEnv();

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(chalk.red("Unexpected failure:"), error);
    process.exitCode = EXIT_FAILURE;
  }
);
