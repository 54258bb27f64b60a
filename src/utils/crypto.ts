/**
 * Secret encryption at rest (AES-256-GCM)
 *
 * Stored format: base64(iv[12] + authTag[16] + ciphertext)
 */

import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";

const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;

export interface SecretCipher {
  encrypt(plaintext: string): string;
  decrypt(ciphertext: string): string;
}

export class SecretKeyError extends Error {
  code = "SECRET_KEY_ERROR" as const;

  constructor(message: string) {
    super(message);
    this.name = "SecretKeyError";
  }
}

/**
 * Create a cipher from a 64-character hex key
 */
export function createSecretCipher(key: string): SecretCipher {
  const keyBuffer = Buffer.from(key, "hex");
  if (!/^[0-9a-fA-F]{64}$/.test(key) || keyBuffer.length !== 32) {
    throw new SecretKeyError(
      "Encryption key must be 64 hex characters (32 bytes) for AES-256-GCM"
    );
  }

  return {
    encrypt(plaintext: string): string {
      const iv = randomBytes(IV_LENGTH);
      const cipher = createCipheriv("aes-256-gcm", keyBuffer, iv);
      const encrypted = Buffer.concat([
        cipher.update(plaintext, "utf8"),
        cipher.final(),
      ]);
      return Buffer.concat([iv, cipher.getAuthTag(), encrypted]).toString(
        "base64"
      );
    },

    decrypt(ciphertext: string): string {
      const combined = Buffer.from(ciphertext, "base64");
      if (combined.length < IV_LENGTH + AUTH_TAG_LENGTH) {
        throw new SecretKeyError("Encrypted secret is truncated");
      }

      const iv = combined.subarray(0, IV_LENGTH);
      const authTag = combined.subarray(IV_LENGTH, IV_LENGTH + AUTH_TAG_LENGTH);
      const encrypted = combined.subarray(IV_LENGTH + AUTH_TAG_LENGTH);

      const decipher = createDecipheriv("aes-256-gcm", keyBuffer, iv);
      decipher.setAuthTag(authTag);
      return Buffer.concat([
        decipher.update(encrypted),
        decipher.final(),
      ]).toString("utf8");
    },
  };
}

/**
 * Cipher keyed from SECRET_KEY
 */
export function getSecretCipher(): SecretCipher {
  const key = process.env.SECRET_KEY;
  if (key === undefined || key === "") {
    throw new SecretKeyError(
      "SECRET_KEY is not set (expected 64 hex characters)"
    );
  }
  return createSecretCipher(key);
}
