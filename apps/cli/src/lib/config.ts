import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { DEFAULT_MAX_CHAIN_LENGTH } from "@chainproof/commitment";
import { z } from "zod";

export const VALUE_ENCODINGS = ["utf8", "hex"] as const;

export type ValueEncoding = (typeof VALUE_ENCODINGS)[number];

const ConfigSchema = z.object({
  /** Longest proof chain `verify` accepts */
  maxChainLength: z.number().int().positive().default(DEFAULT_MAX_CHAIN_LENGTH),
  /** Store prefix applied when `--prefix` is not given */
  defaultPrefix: z.string().min(1).optional(),
  /** How `verify membership --value` is read */
  valueEncoding: z.enum(VALUE_ENCODINGS).default("utf8"),
});

export type Config = z.infer<typeof ConfigSchema>;

export const CONFIG_KEYS = ["maxChainLength", "defaultPrefix", "valueEncoding"] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function getChainproofDir(): string {
  return process.env.CHAINPROOF_HOME || path.join(os.homedir(), ".chainproof");
}

export function getConfigPath(): string {
  return path.join(getChainproofDir(), "config.json");
}

export function ensureChainproofDir(): void {
  const dir = getChainproofDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
}

/**
 * Load the config file merged over the defaults. A missing file yields the
 * defaults; an unreadable or invalid one throws.
 */
export function loadConfig(): Config {
  const configPath = getConfigPath();
  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }

  let content: unknown;
  try {
    content = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read config file ${configPath}: ${message}`);
  }

  const parsed = ConfigSchema.safeParse(content);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new Error(`Invalid config file ${configPath}: ${where}${issue?.message ?? "malformed"}`);
  }
  return parsed.data;
}

export function saveConfig(config: Config): void {
  ensureChainproofDir();
  fs.writeFileSync(getConfigPath(), JSON.stringify(config, null, 2), {
    encoding: "utf-8",
    mode: 0o600,
  });
}

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

export function isValueEncoding(value: string): value is ValueEncoding {
  return VALUE_ENCODINGS.some((e) => e === value);
}

/**
 * Set one key from its command-line string form. An empty string clears
 * `defaultPrefix`.
 */
export function setConfigValue(config: Config, key: string, value: string): void {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: ${key} (expected ${CONFIG_KEYS.join(", ")})`);
  }

  switch (key) {
    case "maxChainLength": {
      const n = Number(value);
      if (!Number.isInteger(n) || n < 1) {
        throw new Error(`maxChainLength must be a positive integer, got "${value}"`);
      }
      config.maxChainLength = n;
      break;
    }
    case "defaultPrefix":
      if (value === "") {
        delete config.defaultPrefix;
      } else {
        config.defaultPrefix = value;
      }
      break;
    case "valueEncoding":
      if (!isValueEncoding(value)) {
        throw new Error(`valueEncoding must be one of ${VALUE_ENCODINGS.join(", ")}, got "${value}"`);
      }
      config.valueEncoding = value;
      break;
  }
}

export function getConfigValue(config: Config, key: string): string | undefined {
  if (!isConfigKey(key)) return undefined;
  const value = config[key];
  return value === undefined ? undefined : String(value);
}

export function listConfig(config: Config): Array<{ key: ConfigKey; value: string | undefined }> {
  return CONFIG_KEYS.map((key) => ({ key, value: getConfigValue(config, key) }));
}
