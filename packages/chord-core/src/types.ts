export type ChordId = 1 | 2 | 3 | 4 | 5;

/** 0 means no chord is sounding. */
export type ActiveChord = 0 | ChordId;

export type ChordCommand =
  | { type: "START"; chordId: ChordId }
  | { type: "STOP"; chordId: ChordId };

export interface ChordSink {
  isConnected(): boolean;
  startChord(chordId: ChordId): void;
  stopChord(chordId: ChordId): void;
}

export interface DispatchResult {
  /** True when the stable gesture differed from the previous frame's value. */
  changed: boolean;
  commands: ChordCommand[];
  /** Commands the sink threw on. They still count as issued. */
  failed: ChordCommand[];
  activeChord: ActiveChord;
  sinkConnected: boolean;
}

export type ChordDefinitions = Record<ChordId, number[]>;

export interface MidiOutputPort {
  readonly name?: string;
  send(data: number[]): void;
  close?(): void;
}

export interface MidiChordSinkOptions {
  velocity?: number;
  channel?: number;
}
