import { GestureHistory } from "./GestureHistory";
import type { GestureSettings, StabilityState } from "./types";

/**
 * Majority vote over the last `historyLength` raw counts. The stable value
 * only moves when the most frequent count fills at least
 * `stabilityThreshold` of the window; ties go to the smaller count.
 */
export class StabilityFilter {
  private readonly history: GestureHistory;
  private readonly threshold: number;
  private stable = 0;
  private ratio: number | null = null;

  constructor(settings: GestureSettings) {
    this.history = new GestureHistory(settings.historyLength);
    this.threshold = settings.stabilityThreshold;
  }

  feed(raw: number): number {
    this.history.push(raw);
    if (!this.history.isFull()) {
      return this.stable;
    }

    const counts = new Map<number, number>();
    for (const value of this.history.values()) {
      counts.set(value, (counts.get(value) ?? 0) + 1);
    }

    let mode = raw;
    let best = 0;
    for (const [value, count] of counts) {
      if (count > best || (count === best && value < mode)) {
        mode = value;
        best = count;
      }
    }

    this.ratio = best / this.history.capacity;
    if (this.ratio >= this.threshold) {
      this.stable = mode;
    }
    return this.stable;
  }

  getStable(): number {
    return this.stable;
  }

  getState(): StabilityState {
    return { history: this.history.values(), stable: this.stable, ratio: this.ratio };
  }

  reset(): void {
    this.history.clear();
    this.stable = 0;
    this.ratio = null;
  }
}
