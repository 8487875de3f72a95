import type { Command } from "commander";
import {
  CONFIG_KEYS,
  getConfigPath,
  getConfigValue,
  listConfig,
  loadConfig,
  saveConfig,
  setConfigValue,
} from "../lib/config.ts";
import { CliFailure } from "../lib/errors.ts";
import { createFormatter } from "../lib/output.ts";

export function registerConfigCommands(program: Command): void {
  const config = program.command("config").description("Manage CLI configuration");

  config
    .command("list")
    .alias("ls")
    .description("List all configuration values")
    .action(() => {
      const formatter = createFormatter(program.opts());
      const entries = listConfig(loadConfig());

      formatter.output(entries, (rows) =>
        rows.map((e) => `${e.key.padEnd(15)} ${e.value ?? "(unset)"}`).join("\n")
      );
    });

  config
    .command("set <key> <value>")
    .description(`Set a configuration value (${CONFIG_KEYS.join(", ")}); "" clears defaultPrefix`)
    .action((key: string, value: string) => {
      const formatter = createFormatter(program.opts());

      const cfg = loadConfig();
      setConfigValue(cfg, key, value);
      saveConfig(cfg);

      formatter.success(`Set ${key} = ${value}`);
    });

  config
    .command("get <key>")
    .description("Get a configuration value")
    .action((key: string) => {
      const formatter = createFormatter(program.opts());

      const value = getConfigValue(loadConfig(), key);
      if (value === undefined) {
        formatter.error(`Configuration key "${key}" not set`);
        throw new CliFailure();
      }

      formatter.output({ key, value }, (entry) => entry.value);
    });

  config
    .command("path")
    .description("Show configuration file path")
    .action(() => {
      const formatter = createFormatter(program.opts());
      const configPath = getConfigPath();

      formatter.output({ path: configPath }, (entry) => entry.path);
    });
}
