import { isChordId } from "./ChordBank";
import type { ActiveChord, ChordCommand, ChordSink, DispatchResult } from "./types";

/**
 * Edge-triggered chord state machine. Only a change in the stable gesture
 * between consecutive frames produces commands, and the outgoing chord is
 * always stopped before the incoming one starts.
 */
export class ChordDispatcher {
  private activeChord: ActiveChord = 0;
  private lastGesture = 0;

  constructor(private readonly sink: ChordSink) {}

  handle(stableGesture: number): DispatchResult {
    if (stableGesture === this.lastGesture) {
      return this.result(false, [], []);
    }
    this.lastGesture = stableGesture;

    const commands: ChordCommand[] = [];
    const failed: ChordCommand[] = [];

    if (this.activeChord !== 0) {
      this.issue({ type: "STOP", chordId: this.activeChord }, commands, failed);
      this.activeChord = 0;
    }

    if (isChordId(stableGesture)) {
      this.issue({ type: "START", chordId: stableGesture }, commands, failed);
      this.activeChord = stableGesture;
    }

    return this.result(true, commands, failed);
  }

  endSession(): DispatchResult {
    const commands: ChordCommand[] = [];
    const failed: ChordCommand[] = [];
    const hadChord = this.activeChord !== 0;
    if (this.activeChord !== 0) {
      this.issue({ type: "STOP", chordId: this.activeChord }, commands, failed);
      this.activeChord = 0;
    }
    this.lastGesture = 0;
    return this.result(hadChord, commands, failed);
  }

  getActiveChord(): ActiveChord {
    return this.activeChord;
  }

  private issue(command: ChordCommand, commands: ChordCommand[], failed: ChordCommand[]): void {
    commands.push(command);
    try {
      switch (command.type) {
        case "START":
          this.sink.startChord(command.chordId);
          break;
        case "STOP":
          this.sink.stopChord(command.chordId);
          break;
        default:
          break;
      }
    } catch (err) {
      console.error("chord sink rejected command", command, err);
      failed.push(command);
    }
  }

  private result(changed: boolean, commands: ChordCommand[], failed: ChordCommand[]): DispatchResult {
    return {
      changed,
      commands,
      failed,
      activeChord: this.activeChord,
      sinkConnected: isSinkConnected(this.sink),
    };
  }
}

/** Reads the sink's connection flag, treating a sink that throws as disconnected. */
export function isSinkConnected(sink: ChordSink): boolean {
  try {
    return sink.isConnected();
  } catch (err) {
    console.error("chord sink failed to report its connection", err);
    return false;
  }
}
