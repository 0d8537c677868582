/**
 * Conformance script runner.
 *
 * Usage:
 *   ntcheck <script> [options]
 *   ntcheck --help
 *
 * Options:
 *   --fail-fast    Stop at the first failing assertion
 *   --verbose      List passing assertions too
 *   --json         Print the report as JSON
 *   -h, --help     Show help
 */

import * as fs from "fs";
import * as path from "path";
import { checkScript, AssertionError, ScriptTypeError } from "./evaluate";
import { ParseError } from "./script";
import { formatReport, reportToJson } from "./report";

export interface CliOptions {
  inputFile: string;
  failFast: boolean;
  verbose: boolean;
  json: boolean;
}

function printHelp(): void {
  console.log(`
numeric-truth conformance checker

Usage:
  ntcheck <script> [options]

Options:
  --fail-fast    Stop at the first failing assertion
  --verbose      List passing assertions too
  --json         Print the report as JSON
  -h, --help     Show this help

Examples:
  ntcheck bool.nt
  ntcheck bool.nt --verbose
  ntcheck bool.nt --json > report.json
`);
}

/**
 * Parse command-line flags. Returns "help" when help was requested and null
 * when the arguments are unusable (the reason has been printed).
 */
export function parseArgs(args: string[]): CliOptions | "help" | null {
  const options: CliOptions = {
    inputFile: "",
    failFast: false,
    verbose: false,
    json: false,
  };

  for (const arg of args) {
    if (arg === "-h" || arg === "--help") {
      return "help";
    } else if (arg === "--fail-fast") {
      options.failFast = true;
    } else if (arg === "--verbose") {
      options.verbose = true;
    } else if (arg === "--json") {
      options.json = true;
    } else if (arg.startsWith("-")) {
      console.error(`Error: Unknown option: ${arg}`);
      return null;
    } else {
      if (options.inputFile) {
        console.error("Error: Multiple input files not supported");
        return null;
      }
      options.inputFile = arg;
    }
  }

  if (!options.inputFile) {
    console.error("Error: No input file specified");
    printHelp();
    return null;
  }

  return options;
}

export function formatError(error: unknown, filePath: string): string {
  if (error instanceof ParseError) {
    return `${filePath}:${error.line}:${error.column}: Parse error: ${error.detail}`;
  }

  if (error instanceof ScriptTypeError) {
    return `${filePath}:${error.line}: Type error: ${error.detail}`;
  }

  if (error instanceof AssertionError) {
    return `${filePath}:${error.result.line}: assertion failed: ${error.result.message ?? error.result.source}`;
  }

  if (error instanceof Error) {
    return `${filePath}: ${error.message}`;
  }

  return `${filePath}: Unknown error: ${String(error)}`;
}

/**
 * Run the checker with the given arguments (without the node and script
 * paths) and return the process exit code.
 */
export function runCli(args: string[]): number {
  const options = parseArgs(args);
  if (options === "help") {
    printHelp();
    return 0;
  }
  if (!options) return 1;

  const inputPath = path.resolve(options.inputFile);
  let source: string;
  try {
    source = fs.readFileSync(inputPath, "utf-8");
  } catch (err) {
    console.error(`Error reading file: ${inputPath}`);
    if (err instanceof Error) {
      console.error(err.message);
    }
    return 1;
  }

  try {
    const report = checkScript(source, { failFast: options.failFast });
    if (options.json) {
      console.log(JSON.stringify(reportToJson(report, options.inputFile), null, 2));
    } else {
      for (const line of formatReport(report, options.inputFile, options.verbose)) {
        console.log(line);
      }
    }
    return report.failed === 0 ? 0 : 1;
  } catch (err) {
    console.error(formatError(err, options.inputFile));
    return 1;
  }
}
