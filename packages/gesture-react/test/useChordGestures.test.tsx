// @vitest-environment jsdom
import { act } from "react";
import { createRoot } from "react-dom/client";
import type { Root } from "react-dom/client";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ChordId, ChordSink } from "@air-chords/chord-core";
import { StubHandModel } from "@air-chords/handtracking-tfjs";
import type { HandModel } from "@air-chords/handtracking-tfjs";
import { openHand } from "../../gesture-core/test/handFixtures";
import { useChordGestures } from "../src";
import type { GestureError, SessionView } from "../src";

Reflect.set(globalThis, "IS_REACT_ACT_ENVIRONMENT", true);

class RecordingSink implements ChordSink {
  readonly received: string[] = [];

  isConnected(): boolean {
    return true;
  }

  startChord(chordId: ChordId): void {
    this.received.push(`start ${chordId}`);
  }

  stopChord(chordId: ChordId): void {
    this.received.push(`stop ${chordId}`);
  }
}

let container: HTMLDivElement;
let root: Root;
let lastView: SessionView | null = null;

type HarnessProps = {
  model: HandModel | null;
  sink?: ChordSink;
  fps?: number;
  onError: (err: GestureError) => void;
};

const defaultSink = new RecordingSink();

function Harness(props: HarnessProps) {
  const { videoRef, view } = useChordGestures({
    model: props.model,
    sink: props.sink ?? defaultSink,
    fps: props.fps,
    onError: props.onError,
  });
  lastView = view;
  return <video ref={videoRef} />;
}

/** A camera that always grants access, and a hand showing `fingers.count` fingers. */
function fakeCamera(fingers: { count: number }): HandModel {
  Object.defineProperty(navigator, "mediaDevices", {
    configurable: true,
    value: { getUserMedia: vi.fn().mockResolvedValue({ getTracks: () => [] }) },
  });
  vi.spyOn(HTMLMediaElement.prototype, "play").mockResolvedValue(undefined);
  return { estimateHands: async () => [openHand(fingers.count)] };
}

beforeEach(() => {
  container = document.createElement("div");
  document.body.appendChild(container);
  root = createRoot(container);
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  act(() => root.unmount());
  container.remove();
  Reflect.deleteProperty(navigator, "mediaDevices");
  lastView = null;
  vi.restoreAllMocks();
});

describe("useChordGestures", () => {
  it("stays idle without a model", () => {
    const onError = vi.fn();
    act(() => root.render(<Harness model={null} onError={onError} />));

    expect(onError).not.toHaveBeenCalled();
    expect(lastView?.status.running).toBe(false);
    expect(lastView?.highlight).toBeNull();
  });

  it("reports a missing webcam when media devices are unavailable", () => {
    const onError = vi.fn();
    act(() => root.render(<Harness model={new StubHandModel()} onError={onError} />));

    expect(onError).toHaveBeenCalledWith({ type: "no-webcam" });
  });

  it("reports a denied camera permission", async () => {
    const denied = Object.assign(new Error("Permission denied"), { name: "NotAllowedError" });
    Object.defineProperty(navigator, "mediaDevices", {
      configurable: true,
      value: { getUserMedia: vi.fn().mockRejectedValue(denied) },
    });
    const onError = vi.fn();

    await act(async () => root.render(<Harness model={new StubHandModel()} onError={onError} />));

    await vi.waitFor(() => expect(onError).toHaveBeenCalledWith({ type: "webcam-permission-denied" }));
  });
});

describe("useChordGestures with a running session", () => {
  it("highlights the chord for a held gesture", async () => {
    const sink = new RecordingSink();
    const model = fakeCamera({ count: 3 });
    const onError = vi.fn();

    await act(async () => root.render(<Harness model={model} sink={sink} onError={onError} />));

    await vi.waitFor(() => expect(lastView?.highlight).toBe(3));
    expect(lastView?.stableGesture).toBe(3);
    expect(lastView?.status.running).toBe(true);
    expect(sink.received).toEqual(["start 3"]);
    expect(onError).not.toHaveBeenCalled();
  });

  it("releases the active chord exactly once on unmount", async () => {
    const sink = new RecordingSink();
    const model = fakeCamera({ count: 4 });

    await act(async () => root.render(<Harness model={model} sink={sink} onError={vi.fn()} />));
    await vi.waitFor(() => expect(sink.received).toEqual(["start 4"]));

    act(() => root.unmount());

    await vi.waitFor(() => expect(sink.received).toEqual(["start 4", "stop 4"]));
    await new Promise((resolve) => setTimeout(resolve, 100));
    expect(sink.received).toEqual(["start 4", "stop 4"]);
  });

  it("clears the view and releases the chord before restarting with new options", async () => {
    const sink = new RecordingSink();
    const fingers = { count: 3 };
    const model = fakeCamera(fingers);

    await act(async () => root.render(<Harness model={model} sink={sink} onError={vi.fn()} />));
    await vi.waitFor(() => expect(lastView?.highlight).toBe(3));

    fingers.count = 0;
    await act(async () => root.render(<Harness model={model} sink={sink} fps={30} onError={vi.fn()} />));

    expect(lastView?.highlight).toBeNull();
    expect(lastView?.stableGesture).toBe(0);

    await vi.waitFor(() => expect(lastView?.status.running).toBe(true));
    expect(sink.received).toEqual(["start 3", "stop 3"]);
    expect(lastView?.highlight).toBeNull();
    expect(lastView?.stableGesture).toBe(0);
  });
});
