/**
 * Command line front end for the solver.
 *
 * Usage:
 *   clp-solve <program.json> [options]
 *   clp-solve --help
 *
 * Options:
 *   --trace                  Print every driver step
 *   --no-color               Plain output
 *   --max-iterations <n>     Driver iteration bound (default: program size + 1)
 *   -h, --help               Show help
 *
 * Exit codes: 0 satisfied, 2 unsatisfiable, 1 usage or input errors.
 */

import * as path from "path";
import color from "cli-color";
import { ProgramDecodeError, loadProgram } from "./decode";
import { ConstraintProgramExpression } from "./expr";
import { consoleTracer, programToString, solutionsToString } from "./format";
import { SolveOptions, solve } from "./solve";

export interface CliOptions {
  inputFile: string;
  trace: boolean;
  color: boolean;
  maxIterations: number | null;
}

export type ParsedArgs =
  | { tag: "run"; options: CliOptions }
  | { tag: "help" }
  | { tag: "error"; message: string };

export const EXIT_SATISFIED = 0;
export const EXIT_ERROR = 1;
export const EXIT_UNSATISFIABLE = 2;

export const HELP = `
clp-solve: constraint logic program solver

Usage:
  clp-solve <program.json> [options]

Options:
  --trace                  Print every driver step
  --no-color               Plain output
  --max-iterations <n>     Driver iteration bound (default: program size + 1)
  -h, --help               Show this help

Examples:
  clp-solve examples/equals-five.json
  clp-solve examples/maximise.json --trace --no-color
`;

export function parseArgs(args: string[]): ParsedArgs {
  const options: CliOptions = {
    inputFile: "",
    trace: false,
    color: true,
    maxIterations: null,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      return { tag: "help" };
    } else if (arg === "--trace") {
      options.trace = true;
    } else if (arg === "--no-color") {
      options.color = false;
    } else if (arg === "--max-iterations") {
      i++;
      const value = args[i];
      if (value === undefined) {
        return { tag: "error", message: "--max-iterations requires a number" };
      }
      const n = Number(value);
      if (!Number.isInteger(n) || n < 1) {
        return { tag: "error", message: `--max-iterations expects a positive integer, got ${value}` };
      }
      options.maxIterations = n;
    } else if (arg.startsWith("-")) {
      return { tag: "error", message: `Unknown option: ${arg}` };
    } else {
      if (options.inputFile) {
        return { tag: "error", message: "Multiple input files not supported" };
      }
      options.inputFile = arg;
    }
    i++;
  }

  if (!options.inputFile) {
    return { tag: "error", message: "No input file specified" };
  }

  return { tag: "run", options };
}

export function formatError(error: unknown, filePath: string): string {
  if (error instanceof ProgramDecodeError) {
    return `${filePath}: Decode error at ${error.message}`;
  }

  if (error instanceof Error) {
    return `${filePath}: ${error.message}`;
  }

  return `${filePath}: Unknown error: ${String(error)}`;
}

/**
 * Run the front end on raw arguments and return the exit code.
 */
export function runCli(args: string[]): number {
  if (args.length === 0) {
    console.log(HELP);
    return EXIT_ERROR;
  }

  const parsed = parseArgs(args);
  switch (parsed.tag) {
    case "help":
      console.log(HELP);
      return EXIT_SATISFIED;
    case "error":
      console.error(`Error: ${parsed.message}`);
      return EXIT_ERROR;
    case "run":
      break;
  }

  const { options } = parsed;
  const format = { color: options.color };
  const inputPath = path.resolve(options.inputFile);

  let program: ConstraintProgramExpression;
  try {
    program = loadProgram(inputPath);
  } catch (err) {
    const message = formatError(err, options.inputFile);
    console.error(options.color ? color.red(message) : message);
    return EXIT_ERROR;
  }

  const solveOptions: SolveOptions = {};
  if (options.maxIterations !== null) solveOptions.maxIterations = options.maxIterations;
  if (options.trace) {
    console.log(programToString(program, format));
    solveOptions.trace = consoleTracer(format);
  }

  const solutions = solve(program, solveOptions);
  console.log(solutionsToString(solutions, format));
  return solutions.some(s => s.tag === "unsatisfiable") ? EXIT_UNSATISFIABLE : EXIT_SATISFIED;
}
