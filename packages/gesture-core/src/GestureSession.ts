import { ChordDispatcher, isSinkConnected } from "@air-chords/chord-core";
import type { ChordSink, DispatchResult } from "@air-chords/chord-core";
import { createEventChannel } from "./events";
import type { SessionEvent, SessionEventListener, SessionStatus } from "./events";
import { GestureEngine } from "./GestureEngine";
import type { GestureEngineOptions, GestureEngineStats, HandFrame, LandmarkSource } from "./types";

export interface GestureSessionOptions<TImage = unknown> {
  source: LandmarkSource<TImage>;
  sink: ChordSink;
  settings?: GestureEngineOptions;
  onEvent?: SessionEventListener;
}

export interface GestureSessionStats extends GestureEngineStats {
  sourceErrors: number;
  sinkErrors: number;
}

/**
 * Runs the pull-frame, classify, filter, dispatch cycle until stopped. The
 * engine and dispatcher are created per run and only touched from the loop.
 */
export class GestureSession<TImage = unknown> {
  private readonly post: (event: SessionEvent) => void;
  private loopDone: Promise<void> | null = null;
  private stopRequested = false;
  private engine: GestureEngine | null = null;
  private lastStable = 0;
  private sourceErrors = 0;
  private sinkErrors = 0;
  private status: SessionStatus = { running: false, sinkConnected: false, lastError: null };

  constructor(private readonly options: GestureSessionOptions<TImage>) {
    this.post = createEventChannel(options.onEvent);
  }

  /**
   * Starts a session and resolves once it has stopped and released its chord.
   * Rejects with GestureConfigError before pulling any frame when the
   * settings are out of range.
   */
  async run(): Promise<void> {
    if (this.loopDone) {
      throw new Error("Gesture session is already running");
    }
    const engine = new GestureEngine(this.options.settings);
    const dispatcher = new ChordDispatcher(this.options.sink);

    this.engine = engine;
    this.stopRequested = false;
    this.lastStable = 0;
    this.sourceErrors = 0;
    this.sinkErrors = 0;

    this.loopDone = this.loop(engine, dispatcher);
    try {
      await this.loopDone;
    } finally {
      this.loopDone = null;
    }
  }

  /** Asks the loop to exit after the frame currently in flight. */
  requestStop(): void {
    this.stopRequested = true;
  }

  async stop(): Promise<void> {
    this.requestStop();
    if (this.loopDone) await this.loopDone;
  }

  isRunning(): boolean {
    return this.loopDone !== null;
  }

  getStatus(): SessionStatus {
    return { ...this.status };
  }

  getStats(): GestureSessionStats {
    const engineStats = this.engine?.getStats() ?? {
      framesSeen: 0,
      framesSkipped: 0,
      framesWithoutHand: 0,
      malformedHands: 0,
    };
    return { ...engineStats, sourceErrors: this.sourceErrors, sinkErrors: this.sinkErrors };
  }

  private async loop(engine: GestureEngine, dispatcher: ChordDispatcher): Promise<void> {
    this.setStatus({ running: true, sinkConnected: isSinkConnected(this.options.sink), lastError: null });
    try {
      while (!this.stopRequested) {
        const frame = await this.pullFrame();
        if (frame) this.processFrame(frame, engine, dispatcher);
      }
    } finally {
      this.finish(engine, dispatcher);
    }
  }

  private async pullFrame(): Promise<HandFrame<TImage> | null> {
    try {
      return await this.options.source.nextFrame();
    } catch (err) {
      this.sourceErrors += 1;
      console.error("landmark source failed, skipping frame", err);
      this.setStatus({ ...this.status, lastError: `Landmark source failed: ${describeError(err)}` });
      return null;
    }
  }

  private processFrame(frame: HandFrame<TImage>, engine: GestureEngine, dispatcher: ChordDispatcher): void {
    const result = engine.update(frame);
    if (result.status === "skipped" || result.rawCount === null) return;

    if (result.stableGesture !== this.lastStable) {
      this.lastStable = result.stableGesture;
      this.post({ type: "GESTURE_COUNT_CHANGED", value: result.stableGesture });
    }

    const dispatch = dispatcher.handle(result.stableGesture);
    if (dispatch.changed) {
      this.post({
        type: "HIGHLIGHT_CHANGED",
        chordId: dispatch.activeChord === 0 ? null : dispatch.activeChord,
      });
    }
    this.trackSink(dispatch);

    this.post({
      type: "FRAME_RENDERED",
      image: frame.image,
      landmarks: result.selected?.hand.landmarks ?? null,
      palm: result.selected?.classification.palm ?? null,
      rawCount: result.rawCount,
      stableGesture: result.stableGesture,
    });
  }

  private finish(engine: GestureEngine, dispatcher: ChordDispatcher): void {
    const released = dispatcher.endSession();
    if (released.changed) {
      this.post({ type: "HIGHLIGHT_CHANGED", chordId: null });
    }
    this.trackSink(released);

    engine.reset();
    if (this.lastStable !== 0) {
      this.lastStable = 0;
      this.post({ type: "GESTURE_COUNT_CHANGED", value: 0 });
    }
    this.setStatus({ ...this.status, running: false });
  }

  private trackSink(dispatch: DispatchResult): void {
    let lastError = this.status.lastError;
    if (dispatch.failed.length > 0) {
      this.sinkErrors += dispatch.failed.length;
      const failed = dispatch.failed[dispatch.failed.length - 1];
      lastError = `Chord sink failed on ${failed.type} ${failed.chordId}`;
    }
    this.setStatus({ ...this.status, sinkConnected: dispatch.sinkConnected, lastError });
  }

  private setStatus(next: SessionStatus): void {
    const prev = this.status;
    if (
      prev.running === next.running &&
      prev.sinkConnected === next.sinkConnected &&
      prev.lastError === next.lastError
    ) {
      return;
    }
    this.status = next;
    this.post({ type: "STATUS_CHANGED", status: { ...next } });
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
