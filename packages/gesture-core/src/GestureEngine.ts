import { selectHand, isRightHand } from "./handSelector";
import { isWellFormedHand } from "./landmarks";
import { classifyFingers } from "./palmCircle";
import { resolveGestureSettings } from "./settings";
import { StabilityFilter } from "./StabilityFilter";
import type {
  GestureEngineOptions,
  GestureEngineStats,
  GestureFrameResult,
  GestureSettings,
  HandFrame,
  StabilityState,
} from "./types";

/**
 * Per-frame pipeline: pick one hand, count its extended fingers and debounce
 * the count. Holds the history window and stable gesture for one session.
 */
export class GestureEngine {
  readonly settings: Readonly<GestureSettings>;
  private readonly filter: StabilityFilter;
  private readonly stats: GestureEngineStats = {
    framesSeen: 0,
    framesSkipped: 0,
    framesWithoutHand: 0,
    malformedHands: 0,
  };

  constructor(opts?: GestureEngineOptions) {
    this.settings = resolveGestureSettings(opts);
    this.filter = new StabilityFilter(this.settings);
  }

  update(frame: HandFrame): GestureFrameResult {
    this.stats.framesSeen += 1;

    if (!frame.frameAvailable) {
      this.stats.framesSkipped += 1;
      return { status: "skipped", rawCount: null, stableGesture: this.filter.getStable() };
    }

    const hand = selectHand(frame.hands);
    if (!hand) {
      this.stats.framesWithoutHand += 1;
      return { status: "no-hand", rawCount: 0, stableGesture: this.filter.feed(0) };
    }

    if (!isWellFormedHand(hand)) {
      this.stats.malformedHands += 1;
      console.warn(
        `gesture-core: ignoring hand with ${hand.landmarks.length} landmarks (frame ${frame.timestamp})`
      );
      return { status: "malformed", rawCount: 0, stableGesture: this.filter.feed(0) };
    }

    const classification = classifyFingers(hand.landmarks);
    const stableGesture = this.filter.feed(classification.extendedCount);
    return {
      status: "classified",
      rawCount: classification.extendedCount,
      stableGesture,
      selected: { hand, isRight: isRightHand(hand), classification },
    };
  }

  getStableGesture(): number {
    return this.filter.getStable();
  }

  getStats(): GestureEngineStats {
    return { ...this.stats };
  }

  getDebugState(): StabilityState {
    return this.filter.getState();
  }

  /** Clears the history window and stable gesture. Counters keep accumulating. */
  reset(): void {
    this.filter.reset();
  }
}
