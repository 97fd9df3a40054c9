import fs from "node:fs";
import path from "node:path";
import { DEFAULT_CATALOG_URL } from "./catalog";
import { CliOptions, ConfigFile, EffectiveConfig } from "./types";
import { isPositiveInteger } from "./utils";

const CONFIG_FILE_NAMES = ["clippy-lintgen.json", ".clippy-lintgen.json"];

const DEFAULTS: Omit<EffectiveConfig, "profile"> = {
  workspace: false,
  catalogUrl: DEFAULT_CATALOG_URL,
  timeoutMs: 30000,
  debug: false
};

function readJsonIfExists(filePath: string): Record<string, unknown> | undefined {
  if (!fs.existsSync(filePath)) {
    return undefined;
  }
  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse config JSON in ${filePath}: ${message}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config at ${filePath} must be a JSON object`);
  }
  return parsed as Record<string, unknown>;
}

export function resolveConfigPath(explicitPath?: string, cwd = process.cwd()): string | undefined {
  if (explicitPath) {
    return path.resolve(cwd, explicitPath);
  }

  return CONFIG_FILE_NAMES.map((name) => path.join(cwd, name)).find((candidate) =>
    fs.existsSync(candidate)
  );
}

function sanitizeUrl(value: unknown): string | undefined {
  if (typeof value !== "string" || value.trim() === "") {
    return undefined;
  }
  return value.trim();
}

export function loadEffectiveConfig(options: CliOptions, cwd = process.cwd()): EffectiveConfig {
  if (!options.profile) {
    throw new Error("Missing required flag: --profile <publish|personal>");
  }

  const configPath = resolveConfigPath(options.configPath, cwd);
  if (options.configPath && configPath && !fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }
  const parsed = configPath ? readJsonIfExists(configPath) : undefined;
  const fileConfig = (parsed ?? {}) as ConfigFile;
  const fileTimeout = fileConfig.catalog?.timeout_ms;

  return {
    profile: options.profile,
    workspace:
      options.workspace ??
      (typeof fileConfig.output?.workspace === "boolean"
        ? fileConfig.output.workspace
        : DEFAULTS.workspace),
    catalogUrl: options.catalogUrl ?? sanitizeUrl(fileConfig.catalog?.url) ?? DEFAULTS.catalogUrl,
    timeoutMs:
      options.timeoutMs ??
      (isPositiveInteger(fileTimeout) ? fileTimeout : DEFAULTS.timeoutMs),
    debug: options.debug || DEFAULTS.debug
  };
}
