#!/usr/bin/env tsx
/**
 * CLI entry point
 */

import { Command } from "commander";
import kleur from "kleur";
import { initCommand } from "./commands/init.js";
import { serveCommand } from "./commands/serve.js";
import { tokenCommand } from "./commands/token.js";
import { CONFIG_FILE_NAME } from "../config.js";

const program = new Command();

function fail(err: unknown): never {
  console.error(kleur.red(`❌ ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
}

program
  .name("deskrelay")
  .description("Remote desktop control for support sessions")
  .version("0.1.0");

program
  .command("init")
  .description(`Initialize ${CONFIG_FILE_NAME}`)
  .option("--dir <path>", "Project directory", ".")
  .action(async (options: { dir: string }) => {
    if (options.dir !== ".") {
      process.chdir(options.dir);
    }
    await initCommand().catch(fail);
  });

program
  .command("serve")
  .description("Start the remote-control server")
  .option("-c, --config <path>", "Config file path", CONFIG_FILE_NAME)
  .option("-p, --port <number>", "Server port", "7890")
  .option("--bind <address>", "Bind address", "127.0.0.1")
  .option("--fps <number>", "Capture frames per second")
  .option("--quality <number>", "JPEG quality (1-100)")
  .option("--session-ttl <ms>", "Session lifetime in milliseconds")
  .action(async (options: Parameters<typeof serveCommand>[0]) => {
    await serveCommand(options).catch(fail);
  });

program
  .command("token")
  .description("Issue a staff bearer token")
  .requiredOption("--name <staff>", "Staff member name (token subject)")
  .option("-c, --config <path>", "Config file path", CONFIG_FILE_NAME)
  .option("--ttl <span>", "Token lifetime, e.g. 8h")
  .action(async (options: Parameters<typeof tokenCommand>[0]) => {
    await tokenCommand(options).catch(fail);
  });

await program.parseAsync();
