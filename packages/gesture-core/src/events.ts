import type { ChordId } from "@air-chords/chord-core";
import type { Landmark, PalmCircle } from "./types";

export interface SessionStatus {
  running: boolean;
  sinkConnected: boolean;
  lastError: string | null;
}

export type SessionEvent =
  | { type: "GESTURE_COUNT_CHANGED"; value: number }
  | { type: "HIGHLIGHT_CHANGED"; chordId: ChordId | null }
  | {
      type: "FRAME_RENDERED";
      image: unknown;
      landmarks: Landmark[] | null;
      palm: PalmCircle | null;
      rawCount: number;
      stableGesture: number;
    }
  | { type: "STATUS_CHANGED"; status: SessionStatus };

export type SessionEventListener = (event: SessionEvent) => void;

/**
 * Fire-and-forget delivery to the presentation side. Each event is handed
 * over in its own microtask, so the frame loop never runs listener code.
 */
export function createEventChannel(listener?: SessionEventListener): (event: SessionEvent) => void {
  if (!listener) return () => {};
  return (event) => {
    queueMicrotask(() => {
      try {
        listener(event);
      } catch (err) {
        console.error(`session event listener failed on ${event.type}`, err);
      }
    });
  };
}
