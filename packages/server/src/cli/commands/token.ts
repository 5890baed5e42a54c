/**
 * token command - issues a staff bearer token
 */

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import kleur from "kleur";
import { StaffAuthenticator } from "../../services/staff-auth.js";
import { SIGNING_KEY_FILES } from "../../services/crypto.js";
import { readConfigFile, resolveConfig } from "../../config.js";

export interface TokenOptions {
  name: string;
  config: string;
  ttl?: string;
}

export async function tokenCommand(options: TokenOptions) {
  const configPath = resolve(process.cwd(), options.config);
  const config = resolveConfig(
    existsSync(configPath) ? await readConfigFile(configPath) : {}
  );

  const keyPath = resolve(process.cwd(), config.signingKeyPath);
  const privateKeyPath = resolve(keyPath, SIGNING_KEY_FILES.PRIVATE);
  if (!existsSync(privateKeyPath)) {
    console.error(kleur.red("❌ Signing keys not found"));
    console.error("Run: deskrelay serve (keys are generated on first start)");
    process.exit(1);
  }

  const auth = await StaffAuthenticator.fromKeyFiles(
    resolve(keyPath, SIGNING_KEY_FILES.PUBLIC),
    privateKeyPath
  );
  const ttl = options.ttl ?? config.staffTokenTtl;
  const token = await auth.issue(options.name, ttl);

  // Token alone on stdout so it can be captured by scripts
  console.log(token);
  console.error(kleur.gray(`Issued for ${options.name}, valid ${ttl}`));
}
