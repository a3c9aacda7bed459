import { useEffect, useReducer, useRef } from "react";
import type { ChordSink } from "@air-chords/chord-core";
import { GestureSession } from "@air-chords/gesture-core";
import type { GestureEngineOptions, Landmark, PalmCircle, SessionEvent } from "@air-chords/gesture-core";
import { createVideoLandmarkSource } from "@air-chords/handtracking-tfjs";
import type { HandModel } from "@air-chords/handtracking-tfjs";
import { initialSessionView, reduceSessionEvent } from "./sessionView";

export type GestureError =
  | { type: "webcam-permission-denied" }
  | { type: "no-webcam" }
  | { type: "model-init-failed"; error: unknown }
  | { type: "session-failed"; error: unknown };

export type UseChordGesturesOptions = {
  model: HandModel | null;
  sink: ChordSink;
  settings?: GestureEngineOptions;
  /** Index into the video inputs reported by enumerateDevices. */
  cameraIndex?: number;
  fps?: number;
  debug?: boolean;
  onError?: (err: GestureError) => void;
  onEvent?: (event: SessionEvent) => void;
};

export function useChordGestures(options: UseChordGesturesOptions) {
  const { model, sink, settings, cameraIndex, fps, debug } = options;
  const videoRef = useRef<HTMLVideoElement>(null);
  const overlayRef = useRef<HTMLCanvasElement>(null);
  const [view, dispatch] = useReducer(reduceSessionEvent, initialSessionView);

  const onErrorRef = useRef(options.onError);
  useEffect(() => {
    onErrorRef.current = options.onError;
  }, [options.onError]);

  // Resolves once the previous session has released its chord.
  const previousStopRef = useRef<Promise<void>>(Promise.resolve());

  const onEventRef = useRef(options.onEvent);
  useEffect(() => {
    onEventRef.current = options.onEvent;
  }, [options.onEvent]);

  useEffect(() => {
    if (!model) return;
    let cancelled = false;
    let stream: MediaStream | null = null;
    let session: GestureSession<HTMLVideoElement> | null = null;

    const handleEvent = (event: SessionEvent) => {
      if (cancelled) return;
      dispatch(event);
      if (event.type === "FRAME_RENDERED") {
        drawOverlay(overlayRef.current, event.landmarks, event.palm, debug ? event.rawCount : null);
      }
      onEventRef.current?.(event);
    };

    async function start(activeModel: HandModel) {
      if (typeof navigator === "undefined" || !navigator.mediaDevices?.getUserMedia) {
        handleError({ type: "no-webcam" });
        return;
      }
      const video = videoRef.current;
      if (!video) {
        handleError({ type: "no-webcam" });
        return;
      }
      try {
        stream = await navigator.mediaDevices.getUserMedia({ video: await videoConstraints(cameraIndex) });
        if (cancelled) {
          stopTracks(stream);
          return;
        }
        video.srcObject = stream;
        try {
          await video.play();
        } catch (err) {
          if (errorName(err) !== "AbortError") {
            throw err;
          }
        }
      } catch (err) {
        const name = errorName(err);
        if (name === "NotAllowedError" || name === "SecurityError") {
          handleError({ type: "webcam-permission-denied" });
          return;
        }
        if (name === "NotFoundError" || name === "OverconstrainedError") {
          handleError({ type: "no-webcam" });
          return;
        }
        handleError({ type: "model-init-failed", error: err });
        return;
      }
      if (cancelled) return;
      await previousStopRef.current;
      if (cancelled) return;

      const source = createVideoLandmarkSource(activeModel, video, { fps });
      session = new GestureSession({ source, sink, settings, onEvent: handleEvent });
      await session.run();
    }

    start(model).catch((err: unknown) => handleError({ type: "session-failed", error: err }));

    return () => {
      cancelled = true;
      if (session) {
        previousStopRef.current = session
          .stop()
          .catch((err: unknown) => console.error("gesture session did not stop cleanly", err));
        session = null;
      }
      dispatch({ type: "RESET" });
      if (stream) {
        stopTracks(stream);
        stream = null;
      }
      clearOverlay(overlayRef.current);
    };
  }, [model, sink, settings, cameraIndex, fps, debug]);

  return { videoRef, overlayRef, view } as const;

  function handleError(err: GestureError) {
    onErrorRef.current?.(err);
    console.error(err);
  }
}

async function videoConstraints(cameraIndex: number | undefined): Promise<MediaTrackConstraints | boolean> {
  if (cameraIndex === undefined || typeof navigator.mediaDevices.enumerateDevices !== "function") return true;
  const devices = await navigator.mediaDevices.enumerateDevices();
  const camera = devices.filter((device) => device.kind === "videoinput")[cameraIndex];
  return camera ? { deviceId: { exact: camera.deviceId } } : true;
}

function stopTracks(stream: MediaStream) {
  stream.getTracks().forEach((t) => t.stop());
}

function errorName(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "name" in err && typeof err.name === "string") {
    return err.name;
  }
  return undefined;
}

function clearOverlay(canvas: HTMLCanvasElement | null) {
  const ctx = canvas?.getContext("2d");
  if (ctx && canvas) {
    ctx.clearRect(0, 0, canvas.width, canvas.height);
  }
}

const FINGER_CHAINS = [
  [0, 1, 2, 3, 4],
  [0, 5, 6, 7, 8],
  [9, 10, 11, 12],
  [13, 14, 15, 16],
  [0, 17, 18, 19, 20],
  [5, 9, 13, 17],
];

function drawOverlay(
  canvas: HTMLCanvasElement | null,
  landmarks: Landmark[] | null,
  palm: PalmCircle | null,
  rawCount: number | null
) {
  if (!canvas) return;
  const ctx = canvas.getContext("2d");
  if (!ctx) return;

  if (canvas.width !== canvas.clientWidth || canvas.height !== canvas.clientHeight) {
    canvas.width = canvas.clientWidth;
    canvas.height = canvas.clientHeight;
  }
  ctx.clearRect(0, 0, canvas.width, canvas.height);
  if (!landmarks) return;

  ctx.strokeStyle = "#46e6a5";
  ctx.fillStyle = "#46e6a5";
  ctx.lineWidth = 2;
  for (const chain of FINGER_CHAINS) {
    ctx.beginPath();
    chain.forEach((idx, i) => {
      const lm = landmarks[idx];
      if (!lm) return;
      const lx = lm.x * canvas.width;
      const ly = lm.y * canvas.height;
      if (i === 0) ctx.moveTo(lx, ly);
      else ctx.lineTo(lx, ly);
    });
    ctx.stroke();
  }
  landmarks.forEach((lm) => {
    ctx.beginPath();
    ctx.arc(lm.x * canvas.width, lm.y * canvas.height, 3, 0, Math.PI * 2);
    ctx.fill();
  });

  if (palm) {
    ctx.beginPath();
    ctx.arc(palm.center.x * canvas.width, palm.center.y * canvas.height, palm.radius * canvas.width, 0, Math.PI * 2);
    ctx.strokeStyle = "#00c2ff";
    ctx.globalAlpha = 0.8;
    ctx.stroke();
    ctx.globalAlpha = 1;
  }

  if (rawCount !== null) {
    ctx.fillStyle = "#ffffff";
    ctx.font = "12px sans-serif";
    ctx.fillText(`fingers: ${rawCount}`, 10, 20);
  }
}
