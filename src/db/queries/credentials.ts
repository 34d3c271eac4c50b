import { count, eq } from "drizzle-orm";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { userCredentials } from "@/db/schema";
import type { EncryptedPayload } from "@/security/encryption";

export const getCredentialRow = (db: BetterSQLite3Database, telegramUserId: string) =>
  db
    .select()
    .from(userCredentials)
    .where(eq(userCredentials.telegramUserId, telegramUserId))
    .get() ?? null;

export const upsertCredentialRow = (
  db: BetterSQLite3Database,
  input: {
    telegramUserId: string;
    payload: EncryptedPayload;
  },
) => {
  const now = new Date();
  db.insert(userCredentials)
    .values({
      telegramUserId: input.telegramUserId,
      ...input.payload,
      createdAt: now,
      updatedAt: now,
    })
    .onConflictDoUpdate({
      target: userCredentials.telegramUserId,
      set: {
        ...input.payload,
        updatedAt: now,
      },
    })
    .run();
};

export const deleteCredentialRow = (db: BetterSQLite3Database, telegramUserId: string) =>
  db
    .delete(userCredentials)
    .where(eq(userCredentials.telegramUserId, telegramUserId))
    .run().changes > 0;

export const countCredentialRows = (db: BetterSQLite3Database) => {
  const [row] = db.select({ total: count() }).from(userCredentials).all();
  return row?.total ?? 0;
};
