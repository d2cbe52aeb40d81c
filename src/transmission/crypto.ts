import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes } from "node:crypto";

import { ShareGateError } from "../lib/errors.js";
import { nowIso } from "../lib/ids.js";

export const ENCRYPTION_ALGORITHM = "AES-256-GCM";

const KEY_BYTES = 32;
const NONCE_BYTES = 12;
const TAG_BYTES = 16;
const PBKDF2_ITERATIONS = 100_000;

export interface EncryptedPayload {
  /** base64 of ciphertext followed by the 16-byte GCM tag */
  ciphertext: string;
  /** base64, 12 bytes */
  nonce: string;
  algorithm: typeof ENCRYPTION_ALGORITHM;
  timestamp: string;
}

function assertKey(key: Uint8Array): void {
  if (key.length !== KEY_BYTES) {
    throw new ShareGateError(
      "INVALID_KEY",
      `Encryption key must be ${KEY_BYTES} bytes, got ${key.length}.`,
    );
  }
}

export function generateKey(): Buffer {
  return randomBytes(KEY_BYTES);
}

export function deriveKeyFromPassword(password: string, salt: Uint8Array): Buffer {
  return pbkdf2Sync(password, salt, PBKDF2_ITERATIONS, KEY_BYTES, "sha256");
}

export function encryptData(data: Uint8Array, key: Uint8Array): EncryptedPayload {
  assertKey(key);

  try {
    const nonce = randomBytes(NONCE_BYTES);
    const cipher = createCipheriv("aes-256-gcm", key, nonce);
    const ciphertext = Buffer.concat([cipher.update(data), cipher.final(), cipher.getAuthTag()]);

    return {
      ciphertext: ciphertext.toString("base64"),
      nonce: nonce.toString("base64"),
      algorithm: ENCRYPTION_ALGORITHM,
      timestamp: nowIso(),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ShareGateError("ENCRYPTION_FAILED", `Encryption failed: ${message}`, { cause: error });
  }
}

export function decryptData(payload: Pick<EncryptedPayload, "ciphertext" | "nonce">, key: Uint8Array): Buffer {
  assertKey(key);

  try {
    const sealed = Buffer.from(payload.ciphertext, "base64");
    const nonce = Buffer.from(payload.nonce, "base64");
    if (sealed.length < TAG_BYTES) {
      throw new Error("ciphertext is shorter than the authentication tag");
    }

    const decipher = createDecipheriv("aes-256-gcm", key, nonce);
    decipher.setAuthTag(sealed.subarray(sealed.length - TAG_BYTES));
    return Buffer.concat([decipher.update(sealed.subarray(0, sealed.length - TAG_BYTES)), decipher.final()]);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ShareGateError("DECRYPTION_FAILED", `Decryption failed: ${message}`, { cause: error });
  }
}
