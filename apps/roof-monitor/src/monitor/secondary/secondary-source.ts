import { readFile, stat } from "node:fs/promises";
import { isMissingPathError } from "../../shared/errors";
import type { RoofLabel } from "../../shared/types/status";

export type SecondaryStatus = {
  label: RoofLabel;
  modifiedAt: number;
  line: string;
};

export const parseStatusLabel = (line: string): RoofLabel | null => {
  const upper = line.toUpperCase();
  if (upper.includes("CLOSED")) {
    return "CLOSED";
  }
  if (upper.includes("OPEN")) {
    return "OPEN";
  }
  return null;
};

/**
 * Reads the last status line written by another roof-status producer, so
 * the two can be compared in diagnostics. Returns null when the file is
 * missing, empty, or its last line names no status.
 */
export const readSecondaryStatus = async (
  filePath: string,
): Promise<SecondaryStatus | null> => {
  let contents: string;
  let modifiedAt: number;
  try {
    const [fileContents, stats] = await Promise.all([
      readFile(filePath, "utf8"),
      stat(filePath),
    ]);
    contents = fileContents;
    modifiedAt = stats.mtimeMs;
  } catch (error) {
    if (isMissingPathError(error)) {
      return null;
    }
    throw error;
  }

  const lines = contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const line = lines.at(-1);
  if (line === undefined) {
    return null;
  }

  const label = parseStatusLabel(line);
  if (label === null) {
    return null;
  }

  return { label, modifiedAt, line };
};
