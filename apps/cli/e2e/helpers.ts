/**
 * CLI E2E Test Helpers
 *
 * Runs the commander program in-process and captures what the output
 * formatter prints.
 */

import chalk from "chalk";
import { vi } from "vitest";
import { runProgram } from "../src/program.ts";

// Plain ✓/✗ lines regardless of the terminal running the tests
chalk.level = 0;

// ============================================================================
// Types
// ============================================================================

export interface CliResult {
  /** Exit code */
  code: number;
  /** Lines printed through console.log */
  stdout: string[];
  /** Lines printed through console.error / console.warn */
  stderr: string[];
}

// ============================================================================
// Runner
// ============================================================================

export async function runCli(args: string[]): Promise<CliResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const collect =
    (sink: string[]) =>
    (...parts: unknown[]): void => {
      sink.push(parts.map(String).join(" "));
    };

  const log = vi.spyOn(console, "log").mockImplementation(collect(stdout));
  const warn = vi.spyOn(console, "warn").mockImplementation(collect(stderr));
  const error = vi.spyOn(console, "error").mockImplementation(collect(stderr));

  try {
    const code = await runProgram(["node", "chainproof", ...args]);
    return { code, stdout, stderr };
  } finally {
    log.mockRestore();
    warn.mockRestore();
    error.mockRestore();
  }
}

export function parseJsonOutput(result: CliResult): unknown {
  return JSON.parse(result.stdout.join("\n"));
}
