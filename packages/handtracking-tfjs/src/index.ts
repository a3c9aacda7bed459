import type { HandDetector } from "@tensorflow-models/hand-pose-detection";
import type { HandFrame, Handedness, Landmark, LandmarkSource, TrackedHand } from "@air-chords/gesture-core";

export interface VideoFrameSize {
  videoWidth: number;
  videoHeight: number;
}

export interface HandModel<TVideo extends VideoFrameSize = HTMLVideoElement> {
  /** Resolves to null when no frame could be analysed (video not ready, detector failure). */
  estimateHands(video: TVideo): Promise<TrackedHand[] | null>;
}

export interface TFJSHandModelOptions {
  modelType?: "lite" | "full";
  maxHands?: number;
  solutionPath?: string;
  flipHorizontal?: boolean;
  runtime?: "mediapipe" | "tfjs";
}

export interface RawKeypoint {
  x: number;
  y: number;
  z?: number;
}

export interface RawHandDetection {
  handedness?: string | { label?: string };
  keypoints?: RawKeypoint[];
  keypoints3D?: RawKeypoint[];
  score?: number;
}

type Runtime = "mediapipe" | "tfjs";
const detectorPromises: Record<Runtime, Promise<HandDetector> | null> = {
  mediapipe: null,
  tfjs: null,
};
let tfBackendReady: Promise<void> | null = null;

function loadDetector(runtime: Runtime, options: TFJSHandModelOptions): Promise<HandDetector> {
  const existing = detectorPromises[runtime];
  if (existing) return existing;
  const created = (async () => {
    if (runtime === "tfjs") {
      await ensureTfjsBackend();
    }
    const { createDetector, SupportedModels } = await import("@tensorflow-models/hand-pose-detection");
    if (runtime === "mediapipe") {
      return createDetector(SupportedModels.MediaPipeHands, {
        runtime: "mediapipe",
        modelType: options.modelType ?? "lite",
        maxHands: options.maxHands ?? 1,
        solutionPath: options.solutionPath ?? "https://cdn.jsdelivr.net/npm/@mediapipe/hands@0.4.1675469240",
      });
    }
    return createDetector(SupportedModels.MediaPipeHands, {
      runtime: "tfjs",
      modelType: options.modelType ?? "full",
      maxHands: options.maxHands ?? 1,
    });
  })();
  detectorPromises[runtime] = created;
  return created;
}

class TFJSHandModel implements HandModel {
  private currentRuntime: Runtime;
  private readonly allowFallback: boolean;

  constructor(private readonly options: TFJSHandModelOptions = {}) {
    this.currentRuntime = options.runtime ?? "mediapipe";
    this.allowFallback = !options.runtime;
  }

  async estimateHands(video: HTMLVideoElement): Promise<TrackedHand[] | null> {
    if (!video.videoWidth || !video.videoHeight) {
      return null;
    }
    try {
      const detector = await loadDetector(this.currentRuntime, this.options);
      const predictions = await detector.estimateHands(video, { flipHorizontal: !!this.options.flipHorizontal });
      return mapDetectionsToTrackedHands(predictions, video);
    } catch (err) {
      // AbortError happens when play() is interrupted; skip frame.
      if (!(err instanceof Error && err.name === "AbortError")) {
        console.error("handtracking-tfjs estimateHands failed", err);
        // Reset this runtime so next frame re-creates it; optionally fall back.
        detectorPromises[this.currentRuntime] = null;
        if (this.allowFallback && this.currentRuntime === "mediapipe") {
          this.currentRuntime = "tfjs";
        }
      }
      return null;
    }
  }
}

export function mapDetectionsToTrackedHands(
  detections: readonly RawHandDetection[],
  video: VideoFrameSize
): TrackedHand[] {
  const width = video.videoWidth || 1;
  const height = video.videoHeight || 1;

  return detections.map((detection) => {
    const keypoints = detection.keypoints ?? detection.keypoints3D ?? [];
    const landmarks = keypoints.map((kp): Landmark => {
      const isNormalized = kp.x >= 0 && kp.x <= 1 && kp.y >= 0 && kp.y <= 1;
      const x = isNormalized ? kp.x : kp.x / width;
      const y = isNormalized ? kp.y : kp.y / height;
      return { x: clamp01(x), y: clamp01(y), z: kp.z };
    });
    return { landmarks, handedness: readHandedness(detection.handedness), score: detection.score };
  });
}

function readHandedness(raw: RawHandDetection["handedness"]): Handedness | undefined {
  const label = typeof raw === "string" ? raw : raw?.label;
  return label === "Left" || label === "Right" ? label : undefined;
}

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

async function ensureTfjsBackend(): Promise<void> {
  if (tfBackendReady) return tfBackendReady;
  tfBackendReady = (async () => {
    const tf = await import("@tensorflow/tfjs-core");
    await import("@tensorflow/tfjs-backend-cpu");
    await import("@tensorflow/tfjs-backend-webgl");
    try {
      if (tf.getBackend() !== "webgl") {
        await tf.setBackend("webgl");
      }
      await tf.ready();
    } catch (err) {
      console.error("WebGL backend unavailable, using CPU", err);
      await tf.setBackend("cpu");
      await tf.ready();
    }
  })();
  return tfBackendReady;
}

export async function createTFJSHandModel(options?: TFJSHandModelOptions): Promise<HandModel> {
  return new TFJSHandModel(options);
}

export class StubHandModel implements HandModel<VideoFrameSize> {
  async estimateHands(_video: VideoFrameSize): Promise<TrackedHand[] | null> {
    return [];
  }
}

export interface VideoLandmarkSourceOptions {
  /** Upper bound on frames pulled per second. Unset means one per animation frame. */
  fps?: number;
  waitForFrame?: () => Promise<void>;
  now?: () => number;
}

function nextAnimationFrame(): Promise<void> {
  return new Promise((resolve) => {
    if (typeof requestAnimationFrame === "function") {
      requestAnimationFrame(() => resolve());
    } else {
      setTimeout(resolve, 16);
    }
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createVideoLandmarkSource<TVideo extends VideoFrameSize>(
  model: HandModel<TVideo>,
  video: TVideo,
  options: VideoLandmarkSourceOptions = {}
): LandmarkSource<TVideo> {
  const waitForFrame = options.waitForFrame ?? nextAnimationFrame;
  const now = options.now ?? (() => performance.now());
  const minIntervalMs = options.fps ? 1000 / options.fps : 0;
  let lastFrameTs: number | null = null;

  return {
    async nextFrame(): Promise<HandFrame<TVideo>> {
      await waitForFrame();
      if (minIntervalMs > 0 && lastFrameTs !== null) {
        const remaining = minIntervalMs - (now() - lastFrameTs);
        if (remaining > 0) await sleep(remaining);
      }
      const timestamp = now();
      lastFrameTs = timestamp;

      const hands = await model.estimateHands(video);
      if (hands === null) {
        return { frameAvailable: false, hands: [], timestamp };
      }
      return { frameAvailable: true, hands, timestamp, image: video };
    },
  };
}
