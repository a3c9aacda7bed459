export type Handedness = "Left" | "Right";

export interface Landmark {
  x: number;
  y: number;
  z?: number;
}

export interface TrackedHand {
  landmarks: Landmark[];
  /** Label reported by the detector. Hand selection uses landmark geometry instead. */
  handedness?: Handedness;
  score?: number;
}

export interface HandFrame<TImage = unknown> {
  /** False when the source could not deliver a frame this tick. */
  frameAvailable: boolean;
  hands: TrackedHand[];
  timestamp: number;
  image?: TImage;
}

export interface LandmarkSource<TImage = unknown> {
  nextFrame(): Promise<HandFrame<TImage>>;
}

export type Point2D = { x: number; y: number };

export interface PalmCircle {
  center: Point2D;
  radius: number;
}

export type FingerName = "thumb" | "index" | "middle" | "ring" | "pinky";

export interface FingerState {
  finger: FingerName;
  distance: number;
  threshold: number;
  extended: boolean;
}

export interface FingerClassification {
  palm: PalmCircle;
  fingers: FingerState[];
  extendedCount: number;
}

export interface GestureSettings {
  historyLength: number;
  stabilityThreshold: number;
}

export type GestureEngineOptions = Partial<GestureSettings>;

export type FrameStatus = "skipped" | "no-hand" | "malformed" | "classified";

export interface SelectedHand {
  hand: TrackedHand;
  isRight: boolean;
  classification: FingerClassification;
}

export interface GestureFrameResult {
  status: FrameStatus;
  /** Undebounced count fed to the filter, null when the frame was skipped. */
  rawCount: number | null;
  stableGesture: number;
  selected?: SelectedHand;
}

export interface GestureEngineStats {
  framesSeen: number;
  framesSkipped: number;
  framesWithoutHand: number;
  malformedHands: number;
}

export interface StabilityState {
  history: number[];
  stable: number;
  /** Share of the window held by the winning value, null until the window is full. */
  ratio: number | null;
}
