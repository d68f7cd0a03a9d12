import { readFileSync } from "fs";
import { drizzle, type LibSQLDatabase } from "drizzle-orm/libsql";
import { createClient, type Client } from "@libsql/client";
import * as schema from "./schema.js";

export type Database = LibSQLDatabase<typeof schema>;

export interface DatabaseHandle {
  client: Client;
  db: Database;
}

// Resolves from both src/db and dist/db
const SCHEMA_FILE = new URL("../../sql/schema.sql", import.meta.url);

/**
 * Open a database and apply the schema. Safe to call on an existing file.
 * Use ":memory:" for an isolated throwaway database.
 */
export async function openDatabase(url: string): Promise<DatabaseHandle> {
  const client = createClient({ url });
  if (url !== ":memory:") {
    await client.execute("PRAGMA journal_mode = WAL");
    await client.execute("PRAGMA busy_timeout = 5000");
  }
  await client.execute("PRAGMA foreign_keys = ON");
  await client.executeMultiple(readFileSync(SCHEMA_FILE, "utf-8"));

  return { client, db: drizzle(client, { schema }) };
}

export * from "./schema.js";
