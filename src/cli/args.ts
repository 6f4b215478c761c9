import { parseArgs } from "node:util";
import type { RunOptions } from "../types";
import { ArgumentError, fail, ok, type Result } from "../utils/errors";

export const CLI_OPTIONS = {
  verbose: { type: "boolean", short: "v" },
  "dry-run": { type: "boolean", short: "d" },
  help: { type: "boolean", short: "h" },
} as const;

export interface ParsedArgs {
  /** Usage was requested; the caller prints it and stops */
  help: boolean;
  options: RunOptions;
}

/**
 * Scan arguments left to right. `--help` wins as soon as it is reached,
 * `--` ends option parsing and whatever follows it is ignored. Any other
 * token is an error; nothing is applied when parsing fails.
 */
export function parseCliArgs(argv: readonly string[]): Result<ParsedArgs> {
  const args = [...argv];
  const { tokens } = parseArgs({
    args,
    options: CLI_OPTIONS,
    strict: false,
    allowPositionals: true,
    tokens: true,
  });

  let verbose = false;
  let dryRun = false;

  for (const token of tokens) {
    if (token.kind === "option-terminator") {
      break;
    }

    if (token.kind === "positional") {
      if (token.value.startsWith("-")) {
        return fail(
          new ArgumentError(
            `Unknown or invalid option: '${token.value}'. Use -h for help.`,
          ),
        );
      }
      return fail(
        new ArgumentError(
          `Unexpected argument: '${token.value}'. ` +
            "This command does not accept positional arguments.",
        ),
      );
    }

    const raw = args[token.index] ?? token.rawName;
    const unknown = () =>
      fail<ParsedArgs>(
        new ArgumentError(
          `Unknown or invalid option: '${raw}'. Use -h for help.`,
        ),
      );

    if (token.value !== undefined) {
      return unknown();
    }

    switch (token.name) {
      case "help":
        return ok({ help: true, options: Object.freeze({ verbose, dryRun }) });
      case "verbose":
        verbose = true;
        break;
      case "dry-run":
        dryRun = true;
        break;
      default:
        return unknown();
    }
  }

  return ok({ help: false, options: Object.freeze({ verbose, dryRun }) });
}
