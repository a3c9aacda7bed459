import type { Landmark, Point2D, TrackedHand } from "./types";

export const HAND_LANDMARK_COUNT = 21;

export const WRIST = 0;
export const THUMB_TIP = 4;
export const INDEX_TIP = 8;
export const MIDDLE_TIP = 12;
export const RING_TIP = 16;
export const PINKY_TIP = 20;

// Wrist, thumb CMC and the index/middle/ring/pinky MCP joints.
export const PALM_LANDMARKS = [WRIST, 1, 5, 9, 13, 17] as const;

export const FINGER_TIPS = [
  { finger: "thumb", index: THUMB_TIP },
  { finger: "index", index: INDEX_TIP },
  { finger: "middle", index: MIDDLE_TIP },
  { finger: "ring", index: RING_TIP },
  { finger: "pinky", index: PINKY_TIP },
] as const;

export function distance2D(a: Point2D, b: Point2D): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function centroid(points: readonly Point2D[]): Point2D {
  if (!points.length) return { x: 0.5, y: 0.5 };
  const sum = points.reduce(
    (acc, p) => {
      acc.x += p.x;
      acc.y += p.y;
      return acc;
    },
    { x: 0, y: 0 }
  );
  return { x: sum.x / points.length, y: sum.y / points.length };
}

function isFiniteLandmark(landmark: Landmark | undefined): boolean {
  return !!landmark && Number.isFinite(landmark.x) && Number.isFinite(landmark.y);
}

/** A hand the classifier can run on: exactly 21 landmarks, all with finite coordinates. */
export function isWellFormedHand(hand: TrackedHand): boolean {
  if (hand.landmarks.length !== HAND_LANDMARK_COUNT) return false;
  for (let i = 0; i < HAND_LANDMARK_COUNT; i++) {
    if (!isFiniteLandmark(hand.landmarks[i])) return false;
  }
  return true;
}
