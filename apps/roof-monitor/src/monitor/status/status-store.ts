import {
  type ClassificationResult,
  type StatusRecord,
  type StatusTrend,
  UNKNOWN_STATUS,
} from "../../shared/types/status";

export const DEFAULT_HISTORY_CAPACITY = 32;

/**
 * Process-wide holder of the roof status. Every update swaps in a new frozen
 * record, so a reader holds either the previous record or the next one,
 * never a mix of both.
 */
export class StatusStore {
  private current: StatusRecord = UNKNOWN_STATUS;

  private readonly ring: (ClassificationResult | undefined)[];

  private ringStart = 0;

  private ringLength = 0;

  constructor(capacity = DEFAULT_HISTORY_CAPACITY) {
    const size = Number.isInteger(capacity) && capacity > 0 ? capacity : 1;
    this.ring = new Array<ClassificationResult | undefined>(size);
  }

  update(result: ClassificationResult): StatusRecord {
    const previous = this.current;
    const consecutiveCount =
      previous.label === result.label ? previous.consecutiveCount + 1 : 1;

    this.remember(result);

    const next: StatusRecord = Object.freeze({
      label: result.label,
      confidence: result.confidence,
      updatedAt: result.evaluatedAt,
      framePath: result.framePath,
      consecutiveCount,
      override: result.override,
    });
    this.current = next;
    return next;
  }

  snapshot(): StatusRecord {
    return this.current;
  }

  /** Oldest first. */
  history(): ClassificationResult[] {
    const items: ClassificationResult[] = [];
    for (let offset = 0; offset < this.ringLength; offset += 1) {
      const item = this.ring[(this.ringStart + offset) % this.ring.length];
      if (item) {
        items.push(item);
      }
    }
    return items;
  }

  trend(): StatusTrend {
    let open = 0;
    let closed = 0;
    for (const item of this.history()) {
      if (item.label === "OPEN") {
        open += 1;
      } else {
        closed += 1;
      }
    }
    return { open, closed, samples: open + closed };
  }

  private remember(result: ClassificationResult): void {
    const capacity = this.ring.length;
    if (this.ringLength < capacity) {
      this.ring[(this.ringStart + this.ringLength) % capacity] = result;
      this.ringLength += 1;
      return;
    }
    this.ring[this.ringStart] = result;
    this.ringStart = (this.ringStart + 1) % capacity;
  }
}
