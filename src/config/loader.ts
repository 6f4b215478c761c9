/**
 * Configuration file loading
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { BackupConfig, ConfigFormat } from "../types";
import { errorMessage, fail, ok, type Result } from "../utils/errors";
import { APP_NAME, CONF_FILE_KEYS, CONFIG_FILE_NAMES } from "./defaults";
import { resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export interface LoadedConfig {
  config: BackupConfig;
  configPath: string;
}

const ASSIGNMENT_PATTERN = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)=(.*)$/;

function unquote(raw: string, lineNumber: number): string {
  const value = raw.trim();
  const quote = value[0];

  if (quote === '"' || quote === "'") {
    const closing = value.indexOf(quote, 1);
    if (closing === -1) {
      throw new ConfigError(`Unterminated quote on line ${lineNumber}`);
    }
    const rest = value.slice(closing + 1).trim();
    if (rest.length > 0 && !rest.startsWith("#")) {
      throw new ConfigError(
        `Unexpected text after quoted value on line ${lineNumber}`,
      );
    }
    return value.slice(1, closing);
  }

  const commentStart = value.search(/\s#/);
  const bare =
    commentStart === -1 ? value : value.slice(0, commentStart).trim();
  if (/\s/.test(bare)) {
    throw new ConfigError(
      `Value on line ${lineNumber} contains whitespace; quote it`,
    );
  }
  return bare;
}

/**
 * Parse `KEY=value` content. Nothing is evaluated: values are taken literally
 * apart from quote removal, and variable expansion happens during resolution.
 */
export function parseConfContent(content: string): Record<string, string> {
  const parsed: Record<string, string> = {};
  const lines = content.split(/\r?\n/);

  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith("#")) {
      return;
    }

    const match = ASSIGNMENT_PATTERN.exec(trimmed);
    if (!match) {
      throw new ConfigError(`Malformed line ${lineNumber}: expected KEY=value`);
    }

    const name = match[1] ?? "";
    const key = CONF_FILE_KEYS[name];
    if (!key) {
      const expected = Object.keys(CONF_FILE_KEYS).join(", ");
      throw new ConfigError(
        `Unknown config key '${name}' on line ${lineNumber}. ` +
          `Expected one of: ${expected}`,
      );
    }
    if (key in parsed) {
      throw new ConfigError(
        `Duplicate config key '${name}' on line ${lineNumber}`,
      );
    }

    parsed[key] = unquote(match[2] ?? "", lineNumber);
  });

  return parsed;
}

export function detectFormat(configPath: string): ConfigFormat {
  const ext = path.extname(configPath).toLowerCase();
  switch (ext) {
    case ".conf":
      return "conf";
    case ".yaml":
    case ".yml":
      return "yaml";
    case ".json":
      return "json";
    default:
      throw new ConfigError(
        `Unsupported config file format: ${ext || "(none)"}. ` +
          "Use .conf, .yaml, .yml, or .json",
      );
  }
}

function parseConfigContent(content: string, format: ConfigFormat): unknown {
  switch (format) {
    case "conf":
      return parseConfContent(content);
    case "yaml":
      try {
        return yaml.load(content);
      } catch (e) {
        throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
      }
    case "json":
      try {
        return JSON.parse(content);
      } catch (e) {
        throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
      }
  }
}

/**
 * Load and parse a config file
 */
export async function loadConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<BackupConfig> {
  const absolutePath = path.resolve(configPath);
  const format = detectFormat(absolutePath);

  let content: string;
  try {
    content = await fs.readFile(absolutePath, "utf8");
  } catch (e) {
    throw new ConfigError(
      `Config file not readable: ${absolutePath} (${errorMessage(e)})`,
      "ConfigMissing",
    );
  }

  const raw = validateConfig(parseConfigContent(content, format));
  return resolvePaths(raw, absolutePath, env);
}

/**
 * Find the config file in the given directory
 */
export async function findConfigFile(dir: string): Promise<string | null> {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(dir, name);
    try {
      const stat = await fs.stat(configPath);
      if (stat.isFile()) {
        return configPath;
      }
    } catch {
      // Not present, try the next name
    }
  }

  return null;
}

/**
 * Find and load the config file that lives next to the executable
 */
export async function findAndLoadConfig(
  appDir: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Result<LoadedConfig>> {
  const configPath = await findConfigFile(appDir);
  if (!configPath) {
    return fail(
      new ConfigError(
        `Configuration file not found in: ${appDir}. ` +
          `Create ${CONFIG_FILE_NAMES[0]} in the same directory as ${APP_NAME}.`,
        "ConfigMissing",
      ),
    );
  }

  try {
    return ok({ config: await loadConfig(configPath, env), configPath });
  } catch (e) {
    if (e instanceof ConfigError) {
      const kind =
        e.kind === "ConfigMissing" ? "ConfigMissing" : "ConfigInvalid";
      const name = path.basename(configPath);
      return fail(new ConfigError(`${name}: ${e.message}`, kind));
    }
    throw e;
  }
}
