import { centroid, distance2D, FINGER_TIPS, PALM_LANDMARKS } from "./landmarks";
import type { FingerClassification, FingerState, Landmark, PalmCircle } from "./types";

export const PALM_RADIUS_MULTIPLIER = 1.3;
export const THUMB_THRESHOLD = 0.85;
export const FINGER_THRESHOLD = 1.0;

/**
 * Circle around the palm centroid, enlarged so that a folded thumb still
 * lands inside it. Landmarks must already be validated with isWellFormedHand.
 */
export function computePalmCircle(landmarks: readonly Landmark[]): PalmCircle {
  const palmPoints = PALM_LANDMARKS.map((idx) => landmarks[idx]);
  const center = centroid(palmPoints);
  const farthest = Math.max(...palmPoints.map((p) => distance2D(p, center)));
  return { center, radius: farthest * PALM_RADIUS_MULTIPLIER };
}

export function classifyFingers(landmarks: readonly Landmark[]): FingerClassification {
  const palm = computePalmCircle(landmarks);
  const fingers: FingerState[] = FINGER_TIPS.map(({ finger, index }) => {
    const distance = distance2D(landmarks[index], palm.center);
    const threshold = palm.radius * (finger === "thumb" ? THUMB_THRESHOLD : FINGER_THRESHOLD);
    return { finger, distance, threshold, extended: distance > threshold };
  });
  return {
    palm,
    fingers,
    extendedCount: fingers.filter((f) => f.extended).length,
  };
}

export function countExtendedFingers(landmarks: readonly Landmark[]): number {
  return classifyFingers(landmarks).extendedCount;
}
