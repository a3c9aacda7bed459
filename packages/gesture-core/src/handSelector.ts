import { PINKY_TIP, THUMB_TIP } from "./landmarks";
import type { TrackedHand } from "./types";

/**
 * Expects a horizontally mirrored (selfie) frame: a right hand then has its
 * thumb tip to the right of its pinky tip.
 */
export function isRightHand(hand: TrackedHand): boolean {
  const thumbTip = hand.landmarks[THUMB_TIP];
  const pinkyTip = hand.landmarks[PINKY_TIP];
  if (!thumbTip || !pinkyTip) return false;
  return thumbTip.x > pinkyTip.x;
}

export function selectHand(hands: readonly TrackedHand[]): TrackedHand | null {
  return hands.find(isRightHand) ?? hands[0] ?? null;
}
