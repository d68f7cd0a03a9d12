import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { getTableConfig } from "drizzle-orm/sqlite-core";
import {
  auditLog,
  bridgeConfig,
  bridgeConversations,
  bridgeMessages,
  openDatabase,
  tenants,
  type DatabaseHandle,
} from "./index.js";

const TABLES = [tenants, bridgeConfig, bridgeConversations, bridgeMessages, auditLog];

interface ColumnShape {
  name: string;
  notNull: boolean;
  primary: boolean;
}

interface IndexShape {
  name: string;
  unique: boolean;
}

describe("openDatabase", () => {
  let handle: DatabaseHandle;

  beforeEach(async () => {
    handle = await openDatabase(":memory:");
  });

  afterEach(() => {
    handle.client.close();
  });

  async function columnsOf(table: string): Promise<ColumnShape[]> {
    const { rows } = await handle.client.execute(`PRAGMA table_info(${table})`);
    return rows.map((row) => ({
      name: String(row.name),
      notNull: Number(row.notnull) === 1,
      primary: Number(row.pk) > 0,
    }));
  }

  async function indexesOf(table: string): Promise<{ created: IndexShape[]; uniqueColumns: string[] }> {
    const { rows } = await handle.client.execute(`PRAGMA index_list(${table})`);
    const created: IndexShape[] = [];
    const uniqueColumns: string[] = [];
    for (const row of rows) {
      const name = String(row.name);
      if (row.origin === "c") {
        created.push({ name, unique: Number(row.unique) === 1 });
      } else if (row.origin === "u") {
        const info = await handle.client.execute(`PRAGMA index_info(${name})`);
        uniqueColumns.push(...info.rows.map((column) => String(column.name)));
      }
    }
    return { created, uniqueColumns };
  }

  for (const table of TABLES) {
    const { name, columns, indexes } = getTableConfig(table);

    it(`creates ${name} with the columns of its drizzle table`, async () => {
      const expected = columns.map((column) => ({
        name: column.name,
        notNull: column.notNull,
        primary: column.primary,
      }));

      expect(await columnsOf(name)).toEqual(expected);
    });

    it(`creates the indexes declared on ${name}`, async () => {
      const { created, uniqueColumns } = await indexesOf(name);
      const expectedIndexes = indexes.map((index) => ({ name: index.config.name, unique: index.config.unique }));
      const expectedUnique = columns.filter((column) => column.isUnique).map((column) => column.name);

      const byName = (a: IndexShape, b: IndexShape) => a.name.localeCompare(b.name);
      expect(created.sort(byName)).toEqual(expectedIndexes.sort(byName));
      expect(uniqueColumns.sort()).toEqual(expectedUnique.sort());
    });
  }

  it("cascades tenant deletion to bridge rows", async () => {
    const now = new Date().toISOString();
    await handle.db.insert(tenants).values({
      id: "tenant-1",
      name: "Support line",
      bridgeToken: "token-tenant-1",
      createdAt: now,
      updatedAt: now,
    });
    await handle.db.insert(bridgeConversations).values({
      tenantId: "tenant-1",
      chatAddress: "5511999999999@s.whatsapp.net",
      conversationId: 10,
      contactId: 20,
      inboxId: 30,
      createdAt: now,
      updatedAt: now,
    });

    await handle.client.execute("DELETE FROM tenants WHERE id = 'tenant-1'");
    expect(await handle.db.select().from(bridgeConversations)).toEqual([]);
  });
});
