import { open } from "node:fs/promises";
import { formatStatusTimestamp } from "../../shared/time";
import type { LogEntry } from "../../shared/types/status";

export const formatStatusLine = (entry: LogEntry): string =>
  `${formatStatusTimestamp(entry.timestamp)} Roof Status: ${entry.label}`;

export const STATUS_LINE_PATTERN =
  /^\d{4}-\d{2}-\d{2} (0[1-9]|1[0-2]):[0-5]\d:[0-5]\d(AM|PM) Roof Status: (OPEN|CLOSED)$/;

/**
 * Append-only writer for the roof status file. Each entry opens the file,
 * writes one line, syncs it to disk and closes the handle before the next
 * entry starts.
 */
export class StatusLogger {
  readonly filePath: string;

  private queue: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  append(entry: LogEntry): Promise<void> {
    const line = `${formatStatusLine(entry)}\n`;
    const write = this.queue.then(() => this.write(line));
    // A failed write must not block the entries queued after it.
    this.queue = write.catch(() => undefined);
    return write;
  }

  private async write(line: string): Promise<void> {
    const handle = await open(this.filePath, "a");
    try {
      await handle.appendFile(line, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
  }
}
