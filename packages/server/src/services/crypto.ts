/**
 * Identifier, token and signing-key generation
 */

import { generateKeyPair, exportSPKI, exportPKCS8 } from "jose";
import { createHash, timingSafeEqual } from "node:crypto";
import { nanoid } from "nanoid";
import {
  ConnectionIdSchema,
  ID_LENGTHS,
  SessionIdSchema,
  type ConnectionId,
  type SessionId,
} from "@deskrelay/shared";

export function generateSessionId(): SessionId {
  return SessionIdSchema.parse(nanoid(ID_LENGTHS.SESSION_ID));
}

export function generateConnectionId(): ConnectionId {
  return ConnectionIdSchema.parse(nanoid(ID_LENGTHS.CONNECTION_ID));
}

/**
 * Party token, URL-safe so it can travel in a join link
 */
export function generateToken(): string {
  return nanoid(ID_LENGTHS.TOKEN);
}

/**
 * Constant-time token comparison. Inputs of different length are padded and
 * still compared so the length does not leak through timing.
 */
export function tokensMatch(provided: string, expected: string): boolean {
  const providedBuf = Buffer.from(provided);
  const expectedBuf = Buffer.from(expected);

  if (providedBuf.length !== expectedBuf.length) {
    const maxLen = Math.max(providedBuf.length, expectedBuf.length);
    const paddedProvided = Buffer.alloc(maxLen);
    const paddedExpected = Buffer.alloc(maxLen);
    providedBuf.copy(paddedProvided);
    expectedBuf.copy(paddedExpected);
    timingSafeEqual(paddedProvided, paddedExpected);
    return false;
  }

  return timingSafeEqual(providedBuf, expectedBuf);
}

export const SIGNING_KEY_FILES = {
  PRIVATE: "signing.key",
  PUBLIC: "signing.pub",
} as const;

/**
 * Ed25519 key pair for staff bearer tokens
 */
export async function generateSigningKeys() {
  const { publicKey, privateKey } = await generateKeyPair("EdDSA", {
    crv: "Ed25519",
    extractable: true,
  });

  const publicKeyPem = await exportSPKI(publicKey);
  const privateKeyPem = await exportPKCS8(privateKey);

  const fingerprint = createHash("sha256")
    .update(publicKeyPem)
    .digest("hex")
    .slice(0, 16);

  return {
    publicKey: publicKeyPem,
    privateKey: privateKeyPem,
    fingerprint,
  };
}
