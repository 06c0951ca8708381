import Database from "better-sqlite3";
import {
  type BetterSQLite3Database,
  drizzle,
} from "drizzle-orm/better-sqlite3";
import { POLL_JOURNAL_TABLE, schema } from "./schema";

export type JournalDatabase = BetterSQLite3Database<typeof schema>;

let sqlite: Database.Database | null = null;
let database: JournalDatabase | null = null;

const createDatabase = (databasePath: string): JournalDatabase => {
  sqlite = new Database(databasePath);
  if (databasePath !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite
    .prepare(
      `
        CREATE TABLE IF NOT EXISTS ${POLL_JOURNAL_TABLE} (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          started_at INTEGER NOT NULL,
          finished_at INTEGER NOT NULL,
          outcome TEXT NOT NULL,
          label TEXT,
          frame_path TEXT,
          error_code TEXT,
          error_message TEXT
        )
      `,
    )
    .run();
  sqlite
    .prepare(
      `
        CREATE INDEX IF NOT EXISTS poll_journal_outcome_idx
        ON ${POLL_JOURNAL_TABLE}(outcome)
      `,
    )
    .run();

  return drizzle(sqlite, {
    schema,
  });
};

export const initializeDatabase = (databasePath: string): JournalDatabase => {
  if (database) {
    return database;
  }
  database = createDatabase(databasePath);
  return database;
};

export const getDatabase = (): JournalDatabase => {
  if (!database) {
    throw new Error("Journal database has not been initialized");
  }
  return database;
};

export const closeDatabase = (): void => {
  if (!sqlite) {
    return;
  }
  sqlite.close();
  sqlite = null;
  database = null;
};
