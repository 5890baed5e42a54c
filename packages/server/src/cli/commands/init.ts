/**
 * init command - creates deskrelay.config.json
 */

import { writeFile, access } from "node:fs/promises";
import { resolve } from "node:path";
import kleur from "kleur";
import { DEFAULT_CONFIG } from "@deskrelay/shared";
import { CONFIG_FILE_NAME } from "../../config.js";

export async function initCommand() {
  const configPath = resolve(process.cwd(), CONFIG_FILE_NAME);

  // Check if config already exists
  try {
    await access(configPath);
    console.log(kleur.yellow(`⚠ ${CONFIG_FILE_NAME} already exists`));
    return;
  } catch {
    // File doesn't exist, continue
  }

  await writeFile(
    configPath,
    JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n",
    "utf-8"
  );

  console.log(kleur.green(`✅ Created ${CONFIG_FILE_NAME}`));
  console.log("\nNext steps:");
  console.log(`  1. Edit ${CONFIG_FILE_NAME} to tune capture and session limits`);
  console.log("  2. Run: deskrelay serve");
  console.log("  3. Issue a staff token: deskrelay token --name <you>");
}
