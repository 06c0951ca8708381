import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const POLL_JOURNAL_TABLE = "poll_journal" as const;

export const pollJournal = sqliteTable(POLL_JOURNAL_TABLE, {
  id: integer("id").primaryKey({ autoIncrement: true }),
  startedAt: integer("started_at").notNull(),
  finishedAt: integer("finished_at").notNull(),
  outcome: text("outcome", { enum: ["SUCCESS", "SKIPPED", "FAILED"] }).notNull(),
  label: text("label", { enum: ["OPEN", "CLOSED"] }),
  framePath: text("frame_path"),
  errorCode: text("error_code", {
    enum: [
      "SOURCE_UNAVAILABLE",
      "FRAME_UNREADABLE",
      "MODEL_NOT_LOADED",
      "INVALID_FRAME",
      "UNEXPECTED",
    ],
  }),
  errorMessage: text("error_message"),
});

export type PollJournalRow = typeof pollJournal.$inferSelect;
export type NewPollJournalRow = typeof pollJournal.$inferInsert;

export const schema = {
  pollJournal,
};
