#!/usr/bin/env node
import pc from "picocolors";
import { ArgsError } from "./errors";
import { runGenerator, VERSION } from "./main";
import { CliOptions } from "./types";
import { isPositiveInteger, isProfile } from "./utils";

export const HELP_TEXT = [
  "Usage:",
  " clippy-lintgen --profile <publish|personal> [--workspace] [--config <path>] [--url <url>] [--timeout <ms>] [--debug]",
  " clippy-lintgen --version",
  " clippy-lintgen --help",
  "",
  "Prints a Cargo manifest [lints.clippy] table built from the published clippy lint catalog.",
  "",
  "Options:",
  "  --profile    publish: crate goes to a registry; personal: also allows cargo_common_metadata",
  "  --workspace  Emit [workspace.lints.clippy] instead of [lints.clippy]",
  "  --config     Path to a clippy-lintgen.json config file",
  "  --url        Catalog URL override",
  "  --timeout    Catalog fetch timeout in milliseconds",
  "  --debug      Log stage timings to stderr",
  "  -v, --version  Print the version",
  "  -h, --help   Show this help text"
].join("\n");

const FLAGS_WITH_VALUES = new Set(["--profile", "--config", "--url", "--timeout"]);

export function parseArgs(argv: string[]): CliOptions {
  if (argv.includes("--help") || argv.includes("-h")) {
    return { command: "help", debug: false };
  }
  if (argv.includes("--version") || argv.includes("-v")) {
    return { command: "version", debug: false };
  }

  const options: CliOptions = {
    command: "generate",
    debug: false
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === "--workspace") {
      options.workspace = true;
      continue;
    }
    if (token === "--debug") {
      options.debug = true;
      continue;
    }

    if (!FLAGS_WITH_VALUES.has(token)) {
      throw new ArgsError(`Unknown flag: ${token}`);
    }

    const value = argv[i + 1];
    if (!value || value.startsWith("--")) {
      throw new ArgsError(`Missing value for flag: ${token}`);
    }
    i += 1;

    switch (token) {
      case "--profile":
        if (!isProfile(value)) {
          throw new ArgsError(`Invalid --profile value: ${value}`);
        }
        options.profile = value;
        break;
      case "--config":
        options.configPath = value;
        break;
      case "--url":
        options.catalogUrl = value;
        break;
      case "--timeout": {
        const timeoutMs = Number(value);
        if (!isPositiveInteger(timeoutMs)) {
          throw new ArgsError(`Invalid --timeout value: ${value}`);
        }
        options.timeoutMs = timeoutMs;
        break;
      }
      default:
        throw new ArgsError(`Unsupported flag: ${token}`);
    }
  }

  if (!options.profile) {
    throw new ArgsError("Missing required flag: --profile <publish|personal>");
  }

  return options;
}

async function main(): Promise<void> {
  try {
    const options = parseArgs(process.argv.slice(2));
    if (options.command === "help") {
      process.stderr.write(`${HELP_TEXT}\n`);
      process.exitCode = 0;
      return;
    }
    if (options.command === "version") {
      process.stdout.write(`${VERSION}\n`);
      process.exitCode = 0;
      return;
    }
    process.exitCode = await runGenerator(options);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(pc.red(`Error: ${message}\n`));
    if (error instanceof ArgsError) {
      process.stderr.write(`${HELP_TEXT}\n`);
    }
    process.exitCode = 2;
  }
}

if (require.main === module) {
  void main();
}
