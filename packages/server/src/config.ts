/**
 * Configuration loading
 *
 * Priority: CLI > environment > config file > defaults
 */

import { readFile } from "node:fs/promises";
import {
  DeskRelayConfigSchema,
  type DeskRelayConfig,
  type DeskRelayConfigInput,
} from "@deskrelay/shared";

export const CONFIG_FILE_NAME = "deskrelay.config.json";

export interface ConfigOverrides {
  sessionTtlMs?: number;
  fps?: number;
  quality?: number;
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export async function readConfigFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read ${path}`, { cause: err });
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new ConfigError(`${path} is not valid JSON`, { cause: err });
  }
}

/**
 * Overlay environment and CLI values on the file contents and validate the
 * result. Unset values fall through to the schema defaults.
 */
export function resolveConfig(
  file: unknown,
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): DeskRelayConfig {
  const base = DeskRelayConfigSchema.safeParse(file ?? {});
  if (!base.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(base.error.issues)}`);
  }
  const config = base.data;

  const merged: DeskRelayConfigInput = {
    ...config,
    session: {
      ...config.session,
      ttlMs: overrides.sessionTtlMs ?? envNumber(env, "SESSION_TTL_MS") ?? config.session.ttlMs,
    },
    capture: {
      ...config.capture,
      fps: overrides.fps ?? envNumber(env, "CAPTURE_FPS") ?? config.capture.fps,
      quality: overrides.quality ?? envNumber(env, "CAPTURE_QUALITY") ?? config.capture.quality,
    },
  };

  const result = DeskRelayConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

export function parseNumberOption(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new ConfigError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  return parseNumberOption(env[name], name);
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
}
