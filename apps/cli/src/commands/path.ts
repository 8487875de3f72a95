import { pathToString, prettyPath } from "@chainproof/commitment";
import { defaultPathValidator } from "@chainproof/host";
import type { Command } from "commander";
import { loadConfig } from "../lib/config.ts";
import { CliFailure } from "../lib/errors.ts";
import { buildPath, resolvePrefix } from "../lib/input.ts";
import { createFormatter } from "../lib/output.ts";

type RenderOptions = { prefix?: string | false };

export function registerPathCommands(program: Command): void {
  const path = program.command("path").description("Build and check commitment paths");

  path
    .command("render <segments...>")
    .description("Render the path formed by the segments (and store prefix)")
    .option("--prefix <prefix>", "store prefix (default: config defaultPrefix)")
    .option("--no-prefix", "ignore the configured default prefix")
    .action((segments: string[], cmdOpts: RenderOptions) => {
      const formatter = createFormatter(program.opts());
      const config = loadConfig();

      const built = buildPath(segments, resolvePrefix(cmdOpts.prefix, config.defaultPrefix));
      if (!built.ok) {
        formatter.error(`${built.code}: ${built.message}`);
        throw new CliFailure();
      }
      const pretty = prettyPath(built.value);
      if (!pretty.ok) {
        formatter.error(`${pretty.code}: ${pretty.message}`);
        throw new CliFailure();
      }

      const rendered = {
        path: pathToString(built.value),
        pretty: pretty.value,
        levels: built.value.keyPaths.length,
      };
      formatter.output(rendered, (r) =>
        [`Path:    ${r.path}`, `Pretty:  ${r.pretty}`, `Levels:  ${r.levels}`].join("\n")
      );
    });

  path
    .command("validate <path>")
    .description("Check a rendered path against the host path grammar")
    .action((rendered: string) => {
      const formatter = createFormatter(program.opts());

      const result = defaultPathValidator(rendered);
      if (!result.ok) {
        formatter.error(`${result.code}: ${result.message}`);
        throw new CliFailure();
      }
      formatter.success(`Valid path: ${rendered}`);
    });
}
