import { and, count, desc, eq, gt, lt, ne } from "drizzle-orm";
import type {
  PollJournal,
  PollRecord,
  PollRecordInput,
} from "../../shared/types/journal";
import { getDatabase } from "./client";
import { type PollJournalRow, pollJournal } from "./schema";

export const DEFAULT_RECENT_POLL_LIMIT = 50;
export const MAX_RECENT_POLL_LIMIT = 1000;
export const DEFAULT_JOURNAL_RETENTION = 10_000;
export const DEFAULT_PRUNE_EVERY = 100;

const mapRowToPollRecord = (row: PollJournalRow): PollRecord => ({
  id: row.id,
  startedAt: row.startedAt,
  finishedAt: row.finishedAt,
  outcome: row.outcome,
  label: row.label,
  framePath: row.framePath,
  errorCode: row.errorCode,
  errorMessage: row.errorMessage,
});

/**
 * Record the outcome of one monitor poll
 */
export const recordPoll = (record: PollRecordInput): number => {
  const db = getDatabase();
  const result = db.insert(pollJournal).values(record).run();
  return Number(result.lastInsertRowid);
};

/**
 * Most recent polls, newest first
 */
export const listRecentPolls = (
  limit = DEFAULT_RECENT_POLL_LIMIT,
): PollRecord[] => {
  const db = getDatabase();
  const boundedLimit = Math.min(Math.max(Math.trunc(limit), 1), MAX_RECENT_POLL_LIMIT);
  return db
    .select()
    .from(pollJournal)
    .orderBy(desc(pollJournal.id))
    .limit(boundedLimit)
    .all()
    .map(mapRowToPollRecord);
};

/**
 * Number of FAILED polls recorded since the last poll that did not fail
 */
export const countConsecutiveFailures = (): number => {
  const db = getDatabase();
  const lastHealthy = db
    .select({ id: pollJournal.id })
    .from(pollJournal)
    .where(ne(pollJournal.outcome, "FAILED"))
    .orderBy(desc(pollJournal.id))
    .limit(1)
    .get();

  const row = db
    .select({ failures: count() })
    .from(pollJournal)
    .where(
      and(
        eq(pollJournal.outcome, "FAILED"),
        gt(pollJournal.id, lastHealthy?.id ?? 0),
      ),
    )
    .get();

  return row?.failures ?? 0;
};

/**
 * Delete all but the newest `keep` polls. Returns the number removed.
 */
export const prunePolls = (keep: number): number => {
  const db = getDatabase();
  const oldestKept = db
    .select({ id: pollJournal.id })
    .from(pollJournal)
    .orderBy(desc(pollJournal.id))
    .limit(1)
    .offset(Math.max(Math.trunc(keep), 1) - 1)
    .get();

  if (!oldestKept) {
    return 0;
  }

  const result = db
    .delete(pollJournal)
    .where(lt(pollJournal.id, oldestKept.id))
    .run();
  return result.changes;
};

export type SqlitePollJournalOptions = {
  retention?: number;
  pruneEvery?: number;
  onPruned?: (removed: number) => void;
};

/**
 * Journal backed by the poll_journal table. Every `pruneEvery` recorded polls
 * it trims the table back to the newest `retention` rows.
 */
export const createSqlitePollJournal = ({
  retention = DEFAULT_JOURNAL_RETENTION,
  pruneEvery = DEFAULT_PRUNE_EVERY,
  onPruned,
}: SqlitePollJournalOptions = {}): PollJournal => {
  let sincePrune = 0;
  return {
    recordPoll: (record) => {
      recordPoll(record);
      sincePrune += 1;
      if (sincePrune < pruneEvery) {
        return;
      }
      sincePrune = 0;
      const removed = prunePolls(retention);
      if (removed > 0) {
        onPruned?.(removed);
      }
    },
  };
};
