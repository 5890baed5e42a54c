/**
 * serve command - starts the remote-control server
 */

import { existsSync } from "node:fs";
import { access, mkdir, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import kleur from "kleur";
import { ENDPOINTS } from "@deskrelay/shared";
import { startServer } from "../../index.js";
import { generateSigningKeys, SIGNING_KEY_FILES } from "../../services/crypto.js";
import {
  CONFIG_FILE_NAME,
  parseNumberOption,
  readConfigFile,
  resolveConfig,
} from "../../config.js";

export interface ServeOptions {
  config: string;
  port: string;
  bind: string;
  fps?: string;
  quality?: string;
  sessionTtl?: string;
}

export async function serveCommand(options: ServeOptions) {
  const configPath = resolve(process.cwd(), options.config);

  // Load config
  if (!existsSync(configPath)) {
    console.log(kleur.red(`❌ ${CONFIG_FILE_NAME} not found`));
    console.log("Run: deskrelay init");
    process.exit(1);
  }

  const config = resolveConfig(await readConfigFile(configPath), process.env, {
    sessionTtlMs: parseNumberOption(options.sessionTtl, "--session-ttl"),
    fps: parseNumberOption(options.fps, "--fps"),
    quality: parseNumberOption(options.quality, "--quality"),
  });

  // First-run initialization
  const keyPath = resolve(process.cwd(), config.signingKeyPath);
  await mkdir(keyPath, { recursive: true });
  await ensureSigningKeys(keyPath);

  // Detect Docker environment
  let bindAddress = options.bind;
  if (
    bindAddress === "127.0.0.1" &&
    (existsSync("/.dockerenv") || process.env.DOCKER_CONTAINER === "true")
  ) {
    console.log(kleur.cyan("🐳 Docker detected, binding to 0.0.0.0"));
    bindAddress = "0.0.0.0";
  }

  const port = parseInt(options.port, 10);
  const host = bindAddress === "0.0.0.0" ? "127.0.0.1" : bindAddress;
  const baseUrl = `http://${host}:${port}`;

  // Start server
  console.log(kleur.cyan("🚀 Starting deskrelay server..."));
  await startServer({
    config,
    port,
    bindAddress,
    keyPath,
    logLevel: process.env.LOG_LEVEL ?? "info",
  });

  console.log(kleur.green(`✅ Server started at ${baseUrl}`));
  console.log(kleur.gray(`   Sessions: POST ${baseUrl}${ENDPOINTS.SESSIONS}`));
  console.log(kleur.gray(`   Channel:  ws://${host}:${port}${ENDPOINTS.CHANNEL}`));
  console.log(
    kleur.gray(
      `   Capture:  ${config.capture.fps} fps, quality ${config.capture.quality}`
    )
  );
}

async function ensureSigningKeys(keyPath: string): Promise<void> {
  const privateKeyPath = resolve(keyPath, SIGNING_KEY_FILES.PRIVATE);
  const publicKeyPath = resolve(keyPath, SIGNING_KEY_FILES.PUBLIC);

  try {
    await access(privateKeyPath);
    return;
  } catch {
    // First run
  }

  console.log(kleur.cyan("🔑 Generating Ed25519 signing keys..."));
  const { privateKey, publicKey, fingerprint } = await generateSigningKeys();
  await writeFile(privateKeyPath, privateKey, { encoding: "utf-8", mode: 0o600 });
  await writeFile(publicKeyPath, publicKey, "utf-8");
  console.log(kleur.gray(`   Fingerprint: ${fingerprint}`));
}
