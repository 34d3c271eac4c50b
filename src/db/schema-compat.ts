import type Database from "better-sqlite3";
import { logger } from "@/observability/logger";

const REQUIRED_COLUMNS = [
  "telegram_user_id",
  "iv",
  "ciphertext",
  "auth_tag",
  "created_at",
  "updated_at",
] as const;

const CREATE_USER_CREDENTIALS_SQL = `
CREATE TABLE IF NOT EXISTS "user_credentials" (
  "telegram_user_id" text PRIMARY KEY NOT NULL,
  "iv" text NOT NULL,
  "ciphertext" text NOT NULL,
  "auth_tag" text NOT NULL,
  "created_at" integer NOT NULL,
  "updated_at" integer NOT NULL
);
`;

type TableInfoRow = {
  name: string;
};

const isTableInfoRow = (value: unknown): value is TableInfoRow =>
  typeof value === "object" &&
  value !== null &&
  "name" in value &&
  typeof value.name === "string";

export const listMissingCredentialColumns = (sqlite: Database.Database) => {
  const present = new Set(
    sqlite
      .prepare(`PRAGMA table_info("user_credentials")`)
      .all()
      .filter(isTableInfoRow)
      .map((row) => row.name),
  );
  return REQUIRED_COLUMNS.filter((column) => !present.has(column));
};

export const ensureCredentialSchema = (sqlite: Database.Database) => {
  sqlite.exec(CREATE_USER_CREDENTIALS_SQL);

  const missing = listMissingCredentialColumns(sqlite);
  if (missing.length === 0) {
    return;
  }

  logger.error("Credential table is missing required columns.", { missing });
  throw new Error(
    `Credential store schema mismatch: user_credentials is missing ${missing.join(", ")}. ` +
      "Move the database file aside and restart to recreate it.",
  );
};
