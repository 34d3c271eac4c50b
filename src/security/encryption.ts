import {
  createCipheriv,
  createDecipheriv,
  createHash,
  randomBytes,
} from "node:crypto";

const ALGO = "aes-256-gcm";

export type EncryptedPayload = {
  iv: string;
  ciphertext: string;
  authTag: string;
};

export type FieldCipher = {
  encrypt: (plaintext: string) => EncryptedPayload;
  decrypt: (payload: EncryptedPayload) => string;
};

const deriveKey = (secret: string) =>
  createHash("sha256").update(`credential-store:${secret}`).digest();

/**
 * AES-256-GCM field encryption keyed by a SHA-256 digest of `secret`.
 * `decrypt` throws when the payload was sealed with another secret.
 */
export const createFieldCipher = (secret: string): FieldCipher => {
  if (secret.length === 0) {
    throw new Error("Field cipher secret must be non-empty.");
  }
  const key = deriveKey(secret);

  return {
    encrypt: (plaintext) => {
      const iv = randomBytes(12);
      const cipher = createCipheriv(ALGO, key, iv);
      const encrypted = Buffer.concat([
        cipher.update(plaintext, "utf8"),
        cipher.final(),
      ]);

      return {
        iv: iv.toString("base64"),
        ciphertext: encrypted.toString("base64"),
        authTag: cipher.getAuthTag().toString("base64"),
      };
    },
    decrypt: (payload) => {
      const decipher = createDecipheriv(ALGO, key, Buffer.from(payload.iv, "base64"));
      decipher.setAuthTag(Buffer.from(payload.authTag, "base64"));
      const decrypted = Buffer.concat([
        decipher.update(Buffer.from(payload.ciphertext, "base64")),
        decipher.final(),
      ]);
      return decrypted.toString("utf8");
    },
  };
};
