import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it, vi } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { testConfig } from "../test/config.js";
import { DataMigrator, type MigrationRunner } from "./data-migrator.js";

const FIXTURES = fileURLToPath(new URL("../../tests/fixtures/migrations", import.meta.url));

describe("DataMigrator", () => {
  it("hands the connection and migrations folder to the runner", async () => {
    const runner = vi.fn<MigrationRunner>().mockResolvedValue(undefined);
    const result = await new DataMigrator(runner).migrate(testConfig({ MIGRATIONS_DIR: FIXTURES }));

    expect(result).toEqual({ migrations: ["0000_create_users", "0001_add_orders"] });
    expect(runner).toHaveBeenCalledWith(
      { host: "db.test.internal", port: 3306, user: "shop_user", password: "test-password", database: "shop" },
      FIXTURES,
    );
  });

  it("resolves a relative migrations directory", async () => {
    const runner = vi.fn<MigrationRunner>().mockResolvedValue(undefined);
    const relative = path.relative(process.cwd(), FIXTURES);
    await new DataMigrator(runner).migrate(testConfig({ MIGRATIONS_DIR: relative }));

    expect(runner.mock.calls[0]?.[1]).toBe(path.resolve(relative));
  });

  it("skips the database when no migrations are listed", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "migrator-test-"));
    try {
      await mkdir(path.join(dir, "meta"));
      await writeFile(
        path.join(dir, "meta", "_journal.json"),
        JSON.stringify({ version: "7", dialect: "mysql", entries: [] }),
      );
      const runner = vi.fn<MigrationRunner>();

      expect(await new DataMigrator(runner).migrate(testConfig({ MIGRATIONS_DIR: dir }))).toEqual({ migrations: [] });
      expect(runner).not.toHaveBeenCalled();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("does not connect when the journal is unreadable", async () => {
    const runner = vi.fn<MigrationRunner>();
    const missing = path.join(tmpdir(), "no-such-migrations-dir");

    await expect(new DataMigrator(runner).migrate(testConfig({ MIGRATIONS_DIR: missing }))).rejects.toThrow(
      "meta/_journal.json not found",
    );
    expect(runner).not.toHaveBeenCalled();
  });

  it("does not connect when the journal is out of order", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "migrator-test-"));
    try {
      await mkdir(path.join(dir, "meta"));
      await writeFile(
        path.join(dir, "meta", "_journal.json"),
        JSON.stringify({
          version: "7",
          dialect: "mysql",
          entries: [
            { idx: 1, version: "5", when: 1735776000000, tag: "0001_add_orders", breakpoints: true },
            { idx: 0, version: "5", when: 1735689600000, tag: "0000_create_users", breakpoints: true },
          ],
        }),
      );
      const runner = vi.fn<MigrationRunner>();

      await expect(new DataMigrator(runner).migrate(testConfig({ MIGRATIONS_DIR: dir }))).rejects.toThrow(
        "0000_create_users (idx 0) is listed after 0001_add_orders (idx 1)",
      );
      expect(runner).not.toHaveBeenCalled();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("propagates runner failures", async () => {
    const runner = vi.fn<MigrationRunner>().mockRejectedValue(new Error("connect ECONNREFUSED 10.0.0.5:3306"));

    await expect(new DataMigrator(runner).migrate(testConfig({ MIGRATIONS_DIR: FIXTURES }))).rejects.toThrow(
      "connect ECONNREFUSED 10.0.0.5:3306",
    );
  });
});
