/**
 * Staff bearer tokens (EdDSA-signed JWTs)
 *
 * Staff log in elsewhere; this server only needs to know that a request comes
 * from someone holding a token signed with the deployment's key.
 */

import { readFile } from "node:fs/promises";
import {
  SignJWT,
  errors,
  importPKCS8,
  importSPKI,
  jwtVerify,
  type KeyLike,
} from "jose";
import { STAFF_TOKEN_ISSUER } from "@deskrelay/shared";

export interface StaffClaims {
  name: string;
}

export class StaffAuthenticator {
  constructor(
    private publicKey: KeyLike,
    private privateKey: KeyLike | null = null
  ) {}

  static async fromPem(
    publicKeyPem: string,
    privateKeyPem?: string
  ): Promise<StaffAuthenticator> {
    const publicKey = await importSPKI(publicKeyPem, "EdDSA");
    const privateKey = privateKeyPem
      ? await importPKCS8(privateKeyPem, "EdDSA")
      : null;
    return new StaffAuthenticator(publicKey, privateKey);
  }

  static async fromKeyFiles(
    publicKeyPath: string,
    privateKeyPath?: string
  ): Promise<StaffAuthenticator> {
    const publicKeyPem = await readFile(publicKeyPath, "utf-8");
    const privateKeyPem = privateKeyPath
      ? await readFile(privateKeyPath, "utf-8")
      : undefined;
    return StaffAuthenticator.fromPem(publicKeyPem, privateKeyPem);
  }

  /**
   * @param ttl jose time span, e.g. "8h"
   */
  async issue(name: string, ttl: string): Promise<string> {
    if (!this.privateKey) {
      throw new Error("StaffAuthenticator has no private key; cannot issue tokens");
    }

    return new SignJWT({})
      .setProtectedHeader({ alg: "EdDSA" })
      .setSubject(name)
      .setIssuer(STAFF_TOKEN_ISSUER)
      .setIssuedAt()
      .setExpirationTime(ttl)
      .sign(this.privateKey);
  }

  /**
   * Resolves to null for any token that is malformed, expired or signed with
   * another key.
   */
  async verify(token: string): Promise<StaffClaims | null> {
    try {
      const { payload } = await jwtVerify(token, this.publicKey, {
        issuer: STAFF_TOKEN_ISSUER,
        algorithms: ["EdDSA"],
      });
      if (!payload.sub) return null;
      return { name: payload.sub };
    } catch (err) {
      if (err instanceof errors.JOSEError) return null;
      throw err;
    }
  }
}
