import { resolve } from "node:path";
import { loadConfig } from "./config.js";
import type { ConfigOverrides } from "./config.js";
import { createFileLogger, silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { AppController } from "./services/appController.js";
import { BrewService } from "./services/brewService.js";
import { ShellCommandRunner } from "./services/commandRunner.js";
import { TapdeckApp } from "./tui/app.js";

interface CliArgs {
  configPath?: string;
  brewPath?: string;
  logFile?: string;
  debug: boolean;
}

async function main(): Promise<void> {
  normalizeTerminalEnv();
  const args = parseArgs(process.argv.slice(2));
  const overrides: ConfigOverrides = {
    brewPath: args.brewPath,
    logFile: args.logFile ?? (args.debug ? resolve(process.cwd(), "tapdeck-debug.log") : undefined),
    logLevel: args.debug ? "debug" : undefined
  };
  const config = await loadConfig(args.configPath, overrides);

  const logger: Logger = config.logFile ? createFileLogger(config.logFile, config.logLevel) : silentLogger;
  logger.info("tapdeck starting", { brewPath: config.brewPath, debug: args.debug });

  const runner = new ShellCommandRunner(logger);
  const service = new BrewService(runner, {
    brewPath: config.brewPath,
    askpassPath: config.askpassPath,
    logger
  });
  const controller = new AppController(service, config, { logger, showDebug: args.debug });
  const app = new TapdeckApp(controller, {
    debug: args.debug,
    tickIntervalMs: config.tickIntervalMs,
    confirmBeforeActions: config.confirmBeforeActions
  });
  app.start();
}

function normalizeTerminalEnv(): void {
  const term = process.env.TERM ?? "";
  const termProgram = process.env.TERM_PROGRAM ?? "";
  const isGhostty = term.toLowerCase().includes("ghostty") || termProgram.toLowerCase().includes("ghostty");

  // blessed has known incompatibilities with some extended terminfo entries from ghostty.
  if (isGhostty) {
    process.env.TERM = "xterm-256color";
  }
}

function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = { debug: false };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];

    if (arg === "--debug") {
      parsed.debug = true;
      continue;
    }

    if (arg === "--config" || arg === "--brew" || arg === "--log-file") {
      const value = args[i + 1];
      if (value === undefined) {
        throw new Error(`${arg} expects a value`);
      }
      if (arg === "--config") {
        parsed.configPath = resolve(process.cwd(), value);
      } else if (arg === "--brew") {
        parsed.brewPath = value;
      } else {
        parsed.logFile = resolve(process.cwd(), value);
      }
      i += 1;
      continue;
    }

    throw new Error(`Unknown argument: ${arg}`);
  }

  return parsed;
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  // eslint-disable-next-line no-console
  console.error(`tapdeck failed: ${message}`);
  process.exit(1);
});
