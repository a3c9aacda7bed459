import type { ChordId } from "@air-chords/chord-core";
import type { Landmark, PalmCircle, SessionEvent, SessionStatus } from "@air-chords/gesture-core";

export interface SessionView {
  stableGesture: number;
  highlight: ChordId | null;
  status: SessionStatus;
  rawCount: number | null;
  landmarks: Landmark[] | null;
  palm: PalmCircle | null;
}

export const initialSessionView: SessionView = {
  stableGesture: 0,
  highlight: null,
  status: { running: false, sinkConnected: false, lastError: null },
  rawCount: null,
  landmarks: null,
  palm: null,
};

/** Session events plus RESET, which the hook dispatches when it drops a session. */
export type SessionViewAction = SessionEvent | { type: "RESET" };

export function reduceSessionEvent(view: SessionView, event: SessionViewAction): SessionView {
  switch (event.type) {
    case "RESET":
      return initialSessionView;
    case "GESTURE_COUNT_CHANGED":
      return { ...view, stableGesture: event.value };
    case "HIGHLIGHT_CHANGED":
      return { ...view, highlight: event.chordId };
    case "STATUS_CHANGED":
      if (!event.status.running) {
        return { ...view, status: event.status, rawCount: null, landmarks: null, palm: null };
      }
      return { ...view, status: event.status };
    case "FRAME_RENDERED":
      return { ...view, rawCount: event.rawCount, landmarks: event.landmarks, palm: event.palm };
    default:
      return view;
  }
}

export function describeStatus(view: SessionView): string {
  if (!view.status.running) return "Gesture mode stopped";
  if (view.status.lastError) return view.status.lastError;
  if (!view.status.sinkConnected) return "MIDI not connected";
  return view.highlight === null ? "No gesture detected" : `Playing chord ${view.highlight}`;
}
