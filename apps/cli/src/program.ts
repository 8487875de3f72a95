import { Command, CommanderError } from "commander";
import { registerConfigCommands } from "./commands/config.ts";
import { registerPathCommands } from "./commands/path.ts";
import { registerVerifyCommands } from "./commands/verify.ts";
import { CliFailure } from "./lib/errors.ts";

const QUIET_EXITS = new Set(["commander.helpDisplayed", "commander.version", "commander.help"]);

export function createProgram(): Command {
  const program = new Command();

  program
    .name("chainproof")
    .description("Render commitment paths and verify chained Merkle proofs")
    .version("0.1.0")
    .option("-f, --format <type>", "output format: text|json|yaml|table", "text")
    .option("-v, --verbose", "verbose output")
    .option("-q, --quiet", "quiet mode")
    // Set before registering so subcommands inherit it
    .exitOverride();

  registerPathCommands(program);
  registerVerifyCommands(program);
  registerConfigCommands(program);

  return program;
}

/**
 * Parse and run one command line, returning the process exit status.
 */
export async function runProgram(argv: string[]): Promise<number> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
    // If no subcommand is provided, show help
    if (argv.length <= 2) {
      program.outputHelp();
    }
    return 0;
  } catch (error: unknown) {
    if (error instanceof CliFailure) {
      return 1;
    }
    if (error instanceof CommanderError) {
      return QUIET_EXITS.has(error.code) ? 0 : error.exitCode || 1;
    }
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
