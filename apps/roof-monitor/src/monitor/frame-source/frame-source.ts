import { readFile, readdir, stat } from "node:fs/promises";
import path from "node:path";
import {
  frameUnreadable,
  isMissingPathError,
  sourceUnavailable,
} from "../../shared/errors";
import type { Frame } from "../../shared/types/frame";

export type FrameSourceOptions = {
  directory: string;
  extensions?: readonly string[];
};

type Candidate = {
  name: string;
  path: string;
  modifiedAt: number;
  size: number;
};

const DEFAULT_EXTENSIONS = [".png"];

/**
 * Newest-first ordering: modification time decides, the file name only
 * breaks ties so clock-skewed camera names cannot win over a newer write.
 */
export const compareCandidates = (
  left: Pick<Candidate, "name" | "modifiedAt">,
  right: Pick<Candidate, "name" | "modifiedAt">,
): number => {
  if (left.modifiedAt !== right.modifiedAt) {
    return right.modifiedAt - left.modifiedAt;
  }
  if (left.name === right.name) {
    return 0;
  }
  return left.name < right.name ? 1 : -1;
};

export class FrameSource {
  readonly directory: string;

  private readonly extensions: readonly string[];

  constructor({ directory, extensions = DEFAULT_EXTENSIONS }: FrameSourceOptions) {
    this.directory = directory;
    this.extensions = extensions.map((extension) => extension.toLowerCase());
  }

  async latest(): Promise<Frame | null> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      throw sourceUnavailable(this.directory, error);
    }

    const candidates: Candidate[] = [];
    for (const name of entries) {
      if (!this.matchesExtension(name)) {
        continue;
      }
      const candidate = await this.describe(name);
      if (candidate) {
        candidates.push(candidate);
      }
    }

    if (candidates.length === 0) {
      return null;
    }

    const [newest] = candidates.sort(compareCandidates);
    return this.toFrame(newest);
  }

  private matchesExtension(name: string): boolean {
    const extension = path.extname(name).toLowerCase();
    return this.extensions.includes(extension);
  }

  private async describe(name: string): Promise<Candidate | null> {
    const filePath = path.join(this.directory, name);
    try {
      const stats = await stat(filePath);
      if (!stats.isFile()) {
        return null;
      }
      return {
        name,
        path: filePath,
        modifiedAt: stats.mtimeMs,
        size: stats.size,
      };
    } catch (error) {
      // The camera may rotate files between readdir and stat.
      if (isMissingPathError(error)) {
        return null;
      }
      throw error;
    }
  }

  private toFrame(candidate: Candidate): Frame {
    return {
      ...candidate,
      load: async () => {
        try {
          return await readFile(candidate.path);
        } catch (error) {
          throw frameUnreadable(candidate.path, error);
        }
      },
    };
  }
}
