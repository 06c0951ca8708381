import type { MonitorErrorCode } from "../errors";
import type { PollOutcome, RoofLabel } from "./status";

export type PollRecordInput = {
  startedAt: number;
  finishedAt: number;
  outcome: PollOutcome;
  label: RoofLabel | null;
  framePath: string | null;
  errorCode: MonitorErrorCode | "UNEXPECTED" | null;
  errorMessage: string | null;
};

export type PollRecord = PollRecordInput & {
  id: number;
};

export interface PollJournal {
  recordPoll(record: PollRecordInput): void;
}
