import pc from "picocolors";
import { fetchCatalog } from "./catalog";
import { buildConfig } from "./classifier";
import { loadEffectiveConfig } from "./config";
import { renderConfig } from "./render";
import { CliOptions } from "./types";
import { debugLog } from "./utils";

export const VERSION = "0.1.0";

function timed<T>(enabled: boolean, label: string, action: () => T): T {
  const startedAt = Date.now();
  const result = action();
  debugLog(enabled, `${label} in ${Date.now() - startedAt}ms`);
  return result;
}

async function timedAsync<T>(enabled: boolean, label: string, action: () => Promise<T>): Promise<T> {
  const startedAt = Date.now();
  const result = await action();
  debugLog(enabled, `${label} in ${Date.now() - startedAt}ms`);
  return result;
}

export async function generateConfig(options: CliOptions): Promise<string> {
  const config = timed(options.debug, "Loaded effective config", () => loadEffectiveConfig(options));
  debugLog(config.debug, `Profile ${config.profile}, workspace ${String(config.workspace)}`);

  const catalog = await timedAsync(config.debug, `Fetched catalog from ${config.catalogUrl}`, () =>
    fetchCatalog(config.catalogUrl, config.timeoutMs)
  );
  debugLog(config.debug, `Catalog holds ${catalog.length} lint(s)`);

  const lintConfig = timed(config.debug, "Classified catalog", () => buildConfig(catalog, config.profile));
  for (const group of lintConfig) {
    debugLog(config.debug, `${group.comment ?? "(no comment)"}: ${group.settings.length} setting(s)`);
  }

  return timed(config.debug, "Rendered config", () => renderConfig(lintConfig, config.workspace));
}

export async function runGenerator(options: CliOptions): Promise<number> {
  try {
    const output = await generateConfig(options);
    process.stdout.write(`${output}\n`);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(pc.red(`Error: ${message}\n`));
    return 2;
  }
}
