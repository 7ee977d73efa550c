#!/usr/bin/env node
import os from "os";
import path from "path";
import { Command, InvalidArgumentError, Option } from "commander";
import { attachFileTransport, getLogger, setConsoleOutput, setLogLevel } from "./lib/logger";
import { UsageMeter } from "./lib/meter";
import { payloadToLines } from "./lib/presentation";
import { defaultSettingsPath, REFRESH_INTERVALS, SettingsStore } from "./lib/settings";
import { createFetchTransport } from "./lib/transport";
import { resolveUsageSource, SOURCE_CHOICES } from "./providers";

type GlobalOptions = {
  source?: string;
  config?: string;
  verbose?: boolean;
};

const DEFAULT_LOG_FILE = path.join(os.homedir(), ".config", "usage-meter", "debug.log");

// Moves the cursor home and clears the screen.
const CLEAR_SCREEN = "\u001b[H\u001b[2J";

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a whole number of seconds.");
  }
  return parsed;
}

async function createMeter(options: GlobalOptions): Promise<UsageMeter> {
  if (options.verbose) {
    setConsoleOutput(true);
    setLogLevel("debug");
  }

  return UsageMeter.create({
    source: resolveUsageSource(options.source),
    settings: new SettingsStore(options.config ?? defaultSettingsPath()),
    transport: createFetchTransport(),
  });
}

function printLines(lines: string[]): void {
  process.stdout.write(`${lines.join("\n")}\n`);
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("usage-meter")
    .description("Glanceable rate-limit and plan-usage meter")
    .addOption(new Option("-s, --source <name>", "usage source").choices(SOURCE_CHOICES).env("USAGE_METER_SOURCE"))
    .option("-c, --config <path>", "settings file", defaultSettingsPath())
    .option("-v, --verbose", "log to stderr");

  program
    .command("status", { isDefault: true })
    .description("fetch once and print the summary")
    .action(async (_options: unknown, command: Command) => {
      const meter = await createMeter(command.optsWithGlobals<GlobalOptions>());
      const outcome = await meter.refresh();
      printLines(payloadToLines(meter.published.payload));
      process.exitCode = outcome?.kind === "success" ? 0 : 1;
    });

  program
    .command("watch")
    .description("refresh on the saved interval until interrupted")
    .action(async (_options: unknown, command: Command) => {
      const meter = await createMeter(command.optsWithGlobals<GlobalOptions>());
      meter.subscribe((view) => {
        process.stdout.write(CLEAR_SCREEN);
        printLines(payloadToLines(view.payload));
      });
      process.once("SIGINT", () => {
        meter.stop();
        process.stdout.write("\n");
      });
      await meter.start();
    });

  program
    .command("interval")
    .description("show or change the auto-refresh interval")
    .argument("[seconds]", "one of 30, 60, 300, 900", parseSeconds)
    .action(async (seconds: number | undefined, _options: unknown, command: Command) => {
      const meter = await createMeter(command.optsWithGlobals<GlobalOptions>());
      if (seconds !== undefined) {
        await meter.changeInterval(seconds);
      }
      const current = meter.currentSettings.refreshSeconds;
      printLines(
        REFRESH_INTERVALS.map(({ label, seconds: value }) => `${value === current ? "✓" : " "} ${label}`),
      );
    });

  program
    .command("set-key")
    .description("save an API key and refresh (rate-limit header source only)")
    .argument("<key>", "API key")
    .action(async (key: string, _options: unknown, command: Command) => {
      const meter = await createMeter(command.optsWithGlobals<GlobalOptions>());
      const outcome = await meter.setCredential(key);
      printLines(payloadToLines(meter.published.payload));
      process.exitCode = outcome?.kind === "success" ? 0 : 1;
    });

  return program;
}

if (require.main === module) {
  attachFileTransport(process.env.USAGE_METER_LOG_FILE ?? DEFAULT_LOG_FILE);
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      getLogger().fatal("Command failed", error);
      process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = 1;
    });
}
