import type { InferInsertModel, InferSelectModel } from "drizzle-orm";
import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const userCredentials = sqliteTable("user_credentials", {
  telegramUserId: text("telegram_user_id").primaryKey(),
  iv: text("iv").notNull(),
  ciphertext: text("ciphertext").notNull(),
  authTag: text("auth_tag").notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  updatedAt: integer("updated_at", { mode: "timestamp_ms" }).notNull(),
});

export type UserCredential = InferSelectModel<typeof userCredentials>;
export type NewUserCredential = InferInsertModel<typeof userCredentials>;
