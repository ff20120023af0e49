import path from "node:path";
import { drizzle } from "drizzle-orm/mysql2";
import { migrate } from "drizzle-orm/mysql2/migrator";
import { createPool } from "mysql2/promise";
import type { DeployConfig } from "../config/index.js";
import { logger } from "../config/logger.js";
import { readMigrationJournal } from "./migration-journal.js";

export interface DatabaseConnection {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

/** Applies every pending migration in `migrationsFolder`; bookkeeping is the runner's. */
export type MigrationRunner = (connection: DatabaseConnection, migrationsFolder: string) => Promise<void>;

/**
 * drizzle-orm's migrator over a mysql2 pool. Applied migrations are recorded
 * in `__drizzle_migrations`, so re-running applies only what is new.
 */
export const drizzleMigrationRunner: MigrationRunner = async (connection, migrationsFolder) => {
  const pool = createPool({ ...connection, multipleStatements: true, connectionLimit: 1 });
  try {
    await migrate(drizzle(pool), { migrationsFolder });
  } finally {
    await pool.end();
  }
};

export interface MigrateResult {
  migrations: string[];
}

export class DataMigrator {
  constructor(private readonly runner: MigrationRunner = drizzleMigrationRunner) {}

  async migrate(config: DeployConfig): Promise<MigrateResult> {
    const dir = path.resolve(config.migrate.dir);
    const entries = await readMigrationJournal(dir);
    const migrations = entries.map((e) => e.tag);

    if (entries.length === 0) {
      logger.info(`No migrations listed in ${dir}`);
      return { migrations };
    }

    logger.info(`Applying migrations from ${dir} to ${config.db.host}/${config.db.name}`, { migrations });
    await this.runner(
      {
        host: config.db.host,
        port: config.db.port,
        user: config.db.username,
        password: config.db.password,
        database: config.db.name,
      },
      dir,
    );
    logger.info(`Database ${config.db.name} is at ${migrations[migrations.length - 1]}`);
    return { migrations };
  }
}
