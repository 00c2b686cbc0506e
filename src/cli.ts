/**
 * Command-line interface.
 *
 *   dbc-diff <old_dbc> <new_dbc> <output_xlsx> [options]
 *
 * Exit codes: 0 on success (and for --help/--version), 1 on a usage or
 * configuration error, 2 when a database cannot be loaded or the report
 * cannot be written.
 */

import chalk from "chalk";
import { Command, CommanderError } from "commander";
import { compareDatabaseFiles, type CompareRequest } from "./compare.js";
import { resolveConfig } from "./config.js";
import { CHANGE_KIND_LABELS, ChangeKind, type ChangeSummary } from "./diff/types.js";
import { DbcDiffError, UsageError } from "./errors.js";
import { setLogLevel } from "./util/logging.js";

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_FAILURE = 2;

export interface CliOptions {
  nodeOrder?: string;
  sheetName?: string;
  columnWidth?: string;
  quiet?: boolean;
}

type CompareAction = (request: CompareRequest, options: CliOptions) => Promise<void>;

export function createProgram(onCompare: CompareAction): Command {
  return new Command()
    .name("dbc-diff")
    .description("Compare two CAN database files and write the differences to a spreadsheet")
    .version("0.1.0")
    .argument("<old_dbc>", "Path to the old database (.dbc or .json)")
    .argument("<new_dbc>", "Path to the new database (.dbc or .json)")
    .argument("<output_xlsx>", "Path of the report to write")
    .option("--node-order <policy>", 'Tx/Rx list comparison: "ordered" or "set" (env DBC_DIFF_NODE_ORDER)')
    .option("--sheet-name <name>", "Worksheet name (env DBC_DIFF_SHEET_NAME)")
    .option("--column-width <width>", "Width of every report column (env DBC_DIFF_COLUMN_WIDTH)")
    .option("-q, --quiet", "Suppress event logging")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => console.log(str.trimEnd()),
      writeErr: (str) => console.error(str.trimEnd()),
    })
    .action(async (oldPath: string, newPath: string, outputPath: string, options: CliOptions) => {
      await onCompare({ oldPath, newPath, outputPath }, options);
    });
}

/**
 * Run the CLI with user arguments (without the node and script paths).
 * Resolves to the process exit code. Errors that are not part of the
 * tool's own taxonomy are rethrown.
 */
export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let exitCode = EXIT_OK;
  const program = createProgram(async (request, options) => {
    exitCode = await runComparison(request, options, env);
  });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version end here with exit code 0
      if (error.exitCode === 0) return EXIT_OK;
      console.error(chalk.yellow(`Usage: ${program.name()} ${program.usage()}`));
      return EXIT_USAGE;
    }
    throw error;
  }
  return exitCode;
}

async function runComparison(
  request: CompareRequest,
  options: CliOptions,
  env: NodeJS.ProcessEnv
): Promise<number> {
  try {
    const config = resolveConfig(
      {
        nodeOrder: options.nodeOrder,
        sheetName: options.sheetName,
        columnWidth: options.columnWidth,
        logLevel: options.quiet ? "silent" : undefined,
      },
      env
    );
    setLogLevel(config.logLevel);

    const result = await compareDatabaseFiles(request, config);
    console.log(chalk.green(`Comparison complete. Differences saved in: ${result.outputPath}`));
    console.log(formatSummary(result.summary));
    return EXIT_OK;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(chalk.red(error.message));
      return EXIT_USAGE;
    }
    if (error instanceof DbcDiffError) {
      console.error(chalk.red(`${error.name}: ${error.message}`));
      return EXIT_FAILURE;
    }
    throw error;
  }
}

/**
 * One line of per-kind counts, e.g. "Message Removed: 1, Message Added: 0, ..."
 */
export function formatSummary(summary: ChangeSummary): string {
  return Object.values(ChangeKind)
    .map((kind) => `${CHANGE_KIND_LABELS[kind]}: ${summary[kind]}`)
    .join(", ");
}
