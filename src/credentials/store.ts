import {
  countCredentialRows,
  deleteCredentialRow,
  getCredentialRow,
  upsertCredentialRow,
} from "@/db/queries/credentials";
import { openDatabase, type DatabaseHandle } from "@/db/client";
import { ensureCredentialSchema } from "@/db/schema-compat";
import { describeError, logger } from "@/observability/logger";
import { createFieldCipher, type FieldCipher } from "@/security/encryption";

/**
 * Durable per-user API key storage. Keys are addressed by Telegram user id.
 * Writes are last-writer-wins; there is no transaction spanning calls.
 */
export interface CredentialStore {
  load(): Promise<{ records: number }>;
  get(userId: string): Promise<string | null>;
  set(userId: string, apiKey: string): Promise<void>;
  delete(userId: string): Promise<boolean>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

type SqliteCredentialStoreOptions = {
  path: string;
  encryptionSecret: string;
};

export class SqliteCredentialStore implements CredentialStore {
  private handle: DatabaseHandle | null = null;
  private readonly cipher: FieldCipher;

  constructor(private readonly options: SqliteCredentialStoreOptions) {
    this.cipher = createFieldCipher(options.encryptionSecret);
  }

  private requireHandle() {
    if (!this.handle) {
      throw new Error("Credential store used before load().");
    }
    return this.handle;
  }

  async load() {
    if (!this.handle) {
      const handle = openDatabase(this.options.path);
      try {
        ensureCredentialSchema(handle.sqlite);
      } catch (error) {
        handle.sqlite.close();
        throw error;
      }
      this.handle = handle;
    }

    const records = countCredentialRows(this.handle.db);
    logger.info("Credential store loaded.", {
      path: this.handle.path,
      records,
    });
    return { records };
  }

  async get(userId: string) {
    const row = getCredentialRow(this.requireHandle().db, userId);
    if (!row) {
      return null;
    }

    try {
      return this.cipher.decrypt(row);
    } catch (error) {
      logger.warn("Stored credential could not be decrypted; treating as missing.", {
        userId,
        error: describeError(error),
      });
      return null;
    }
  }

  async set(userId: string, apiKey: string) {
    upsertCredentialRow(this.requireHandle().db, {
      telegramUserId: userId,
      payload: this.cipher.encrypt(apiKey),
    });
  }

  async delete(userId: string) {
    return deleteCredentialRow(this.requireHandle().db, userId);
  }

  async flush() {
    if (!this.handle) {
      return;
    }
    this.handle.sqlite.pragma("wal_checkpoint(TRUNCATE)");
  }

  async close() {
    if (!this.handle) {
      return;
    }
    await this.flush();
    this.handle.sqlite.close();
    this.handle = null;
  }
}
