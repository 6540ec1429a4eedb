import * as fs from "node:fs";
import { Command, Option } from "commander";
import { defaultConfig, loadConfig, type AppConfig } from "./config/index.js";
import { errorMessage } from "./errors.js";
import {
  createLogger,
  isLogLevel,
  setDefaultLogLevel,
  setDefaultLogSink,
  stderrSink,
  LOG_LEVELS,
} from "./logging/index.js";
import { runMcpStdio } from "./mcp/stdio.js";
import { UsageFileCodec } from "./persistence/codec.js";
import { resolvePath } from "./persistence/path.js";
import { startService, waitForShutdown } from "./service/lifecycle.js";
import { summarizeSnapshot } from "./usage/summary.js";

export const DEFAULT_CONFIG_FILE = "usage-keeper.yaml";

const logger = createLogger("cli");

const pkg = {
  name: "usage-keeper",
  version: "0.1.0",
  description: "Local usage statistics service with crash-safe file persistence",
};

interface ServeOptions {
  config?: string;
  localPassword?: string;
  logLevel?: string;
}

async function resolveConfig(configPath: string | undefined): Promise<AppConfig | null> {
  if (configPath) return loadConfig(configPath);
  if (fs.existsSync(DEFAULT_CONFIG_FILE)) return loadConfig(DEFAULT_CONFIG_FILE);
  return null;
}

function applyLogLevel(config: AppConfig, override?: string): void {
  if (override && isLogLevel(override)) {
    setDefaultLogLevel(override);
  } else {
    setDefaultLogLevel(config.logLevel);
  }
}

export function createProgram(): Command {
  const program = new Command()
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version, "-v, --version", "Show version number");

  const logLevelOption = (): Option =>
    new Option("--log-level <level>", "Override the configured log level").choices(LOG_LEVELS);

  program
    .command("serve")
    .description("Run the usage service until SIGINT/SIGTERM")
    .option("-c, --config <file>", `Config file (default: ./${DEFAULT_CONFIG_FILE})`)
    .addOption(
      new Option("--local-password <password>", "Enable the keep-alive endpoint and idle shutdown")
        .env("USAGE_KEEPER_LOCAL_PASSWORD"),
    )
    .addOption(logLevelOption())
    .action(async (options: ServeOptions) => {
      const config = await resolveConfig(options.config);
      if (!config) {
        applyLogLevel(defaultConfig(), options.logLevel);
        await waitForShutdown();
        return;
      }
      applyLogLevel(config, options.logLevel);
      await startService({ config, localPassword: options.localPassword });
    });

  program
    .command("mcp")
    .description("Serve usage tools over MCP stdio")
    .option("-c, --config <file>", `Config file (default: ./${DEFAULT_CONFIG_FILE})`)
    .addOption(logLevelOption())
    .action(async (options: ServeOptions) => {
      setDefaultLogSink(stderrSink);
      const config = (await resolveConfig(options.config)) ?? defaultConfig();
      applyLogLevel(config, options.logLevel);
      await runMcpStdio({ config });
    });

  program
    .command("inspect")
    .description("Print a summary of a persisted usage file")
    .argument("<file>", "Persisted usage file")
    .option("--day <day>", "UTC day filter (YYYY-MM-DD)")
    .action(async (file: string, options: { day?: string }) => {
      const filePath = resolvePath(file);
      const envelope = await new UsageFileCodec({ logger, quarantine: false }).load(filePath);
      if (!envelope) {
        logger.warn(`no usage file at ${filePath}`);
        process.exitCode = 1;
        return;
      }
      const summary = summarizeSnapshot(envelope.data, options.day);
      console.log(
        JSON.stringify({ version: envelope.version, saved_at: envelope.saved_at, ...summary }, null, 2),
      );
    });

  return program;
}

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (err) {
    logger.error(errorMessage(err));
    process.exitCode = 1;
  }
}
