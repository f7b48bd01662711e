#!/usr/bin/env node

import { Command } from "commander";
import { ConfigError } from "./lib/config.js";
import { CLI_NAME, CLI_VERSION } from "./lib/branding.js";

const program = new Command();

// Global config option
let globalConfigPath: string | undefined;

function fail(prefix: string, error: unknown): never {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
  } else {
    console.error(`${prefix}: ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exit(1);
}

program
  .name(CLI_NAME)
  .description("Pad or slice text to a fixed width with a single allocation per line")
  .version(CLI_VERSION)
  .option("-c, --config <path>", "Path to configuration file")
  .hook("preAction", (thisCommand) => {
    globalConfigPath = thisCommand.opts<{ config?: string }>().config;
  });

program
  .command("pad")
  .description("Pad each text argument (or each stdin line) to the target width")
  .argument("[text...]", "Text to pad; reads stdin when omitted")
  .option("-w, --width <n>", "Target width in characters")
  .option("-a, --alignment <tag>", "Left, Right or Center")
  .option("-s, --symbol <tag>", "Fill symbol, e.g. Whitespace, Zero, Hyphen")
  .option("-r, --request <path>", "JSON pad request file")
  .option("-q, --quiet", "Do not warn when a line is truncated")
  .action(async (texts: string[], options: { width?: string; alignment?: string; symbol?: string; request?: string; quiet?: boolean }) => {
    try {
      const { padCommand } = await import("./commands/pad.js");
      await padCommand({ ...options, texts, configPath: globalConfigPath });
    } catch (error) {
      fail("Failed to pad", error);
    }
  });

program
  .command("symbols")
  .description("List the fill symbol catalog")
  .option("--json", "Output in JSON format")
  .action(async (options: { json?: boolean }) => {
    const { symbolsCommand } = await import("./commands/symbols.js");
    symbolsCommand(options);
  });

program
  .command("bench")
  .description("Benchmark the engine against built-in padStart/padEnd")
  .option("--iterations <n>", "Iterations per case", (v: string) => parseInt(v, 10))
  .option("--json", "Output in JSON format")
  .action(async (options: { iterations?: number; json?: boolean }) => {
    try {
      const { benchCommand } = await import("./commands/bench.js");
      benchCommand(options);
    } catch (error) {
      fail("Benchmark failed", error);
    }
  });

program
  .command("init")
  .description(`Write a default configuration file in the current directory`)
  .option("-f, --force", "Overwrite an existing file")
  .action(async (options: { force?: boolean }) => {
    try {
      const { initCommand } = await import("./commands/init.js");
      const written = await initCommand({ force: options.force });
      console.log(`Wrote ${written}`);
    } catch (error) {
      fail("Failed to initialize", error);
    }
  });

export async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
