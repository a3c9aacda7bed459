import { CHORD_IDS } from "./ChordBank";
import type { ChordBank } from "./ChordBank";
import type { ChordId, ChordSink, MidiChordSinkOptions, MidiOutputPort } from "./types";

const NOTE_ON = 0x90;
const NOTE_OFF = 0x80;

const DEFAULTS: Required<MidiChordSinkOptions> = {
  velocity: 100,
  channel: 0,
};

function clampInt(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, Math.round(value)));
}

export class MidiChordSink implements ChordSink {
  private port: MidiOutputPort | null = null;
  private velocity: number;
  private channel: number;
  private readonly soundingNotes = new Set<number>();
  /** Notes each chord was started with, so edits to the bank while it plays still release them. */
  private readonly playingChords = new Map<ChordId, number[]>();
  private readonly previewTimers = new Set<ReturnType<typeof setTimeout>>();

  constructor(
    private readonly chords: ChordBank,
    opts?: MidiChordSinkOptions
  ) {
    const options = { ...DEFAULTS, ...(opts ?? {}) };
    this.velocity = clampInt(options.velocity, 0, 127);
    this.channel = clampInt(options.channel, 0, 15);
  }

  connect(port: MidiOutputPort): void {
    if (this.port && this.port !== port) {
      this.disconnect();
    }
    this.port = port;
  }

  disconnect(): void {
    for (const timer of this.previewTimers) clearTimeout(timer);
    this.previewTimers.clear();
    if (!this.port) return;
    this.stopAllNotes();
    this.playingChords.clear();
    this.port.close?.();
    this.port = null;
  }

  isConnected(): boolean {
    return this.port !== null;
  }

  getPortName(): string | undefined {
    return this.port?.name;
  }

  setVelocity(velocity: number): void {
    this.velocity = clampInt(velocity, 0, 127);
  }

  getVelocity(): number {
    return this.velocity;
  }

  setChannel(channel: number): void {
    this.channel = clampInt(channel, 0, 15);
  }

  getChannel(): number {
    return this.channel;
  }

  getSoundingNotes(): number[] {
    return [...this.soundingNotes].sort((a, b) => a - b);
  }

  noteOn(note: number, velocity = this.velocity): void {
    const port = this.port;
    if (!port) {
      console.warn("MIDI not connected, cannot send note on", note);
      return;
    }
    // Retrigger rather than stack a second note-on for the same key.
    if (this.soundingNotes.has(note)) {
      port.send([NOTE_OFF | this.channel, note, 0]);
    }
    port.send([NOTE_ON | this.channel, note, clampInt(velocity, 0, 127)]);
    this.soundingNotes.add(note);
  }

  noteOff(note: number): void {
    const port = this.port;
    if (!port) {
      console.warn("MIDI not connected, cannot send note off", note);
      return;
    }
    port.send([NOTE_OFF | this.channel, note, 0]);
    this.soundingNotes.delete(note);
  }

  startChord(chordId: ChordId): void {
    if (!this.port) {
      console.warn(`MIDI not connected, cannot play chord ${chordId}`);
      return;
    }
    const notes = this.chords.get(chordId);
    for (const note of notes) {
      this.noteOn(note);
    }
    this.playingChords.set(chordId, notes);
  }

  stopChord(chordId: ChordId): void {
    if (!this.port) {
      console.warn(`MIDI not connected, cannot stop chord ${chordId}`);
      return;
    }
    const notes = this.playingChords.get(chordId) ?? this.chords.get(chordId);
    this.playingChords.delete(chordId);
    for (const note of notes) {
      this.noteOff(note);
    }
  }

  /** Plays a chord and releases it after `durationMs`, outside any gesture session. */
  previewChord(chordId: ChordId, durationMs: number): void {
    if (!this.port) {
      console.warn(`MIDI not connected, cannot preview chord ${chordId}`);
      return;
    }
    const notes = this.chords.get(chordId);
    for (const note of notes) {
      this.noteOn(note);
    }
    const timer = setTimeout(() => {
      this.previewTimers.delete(timer);
      if (!this.port) return;
      for (const note of notes) {
        this.noteOff(note);
      }
    }, Math.max(0, durationMs));
    this.previewTimers.add(timer);
  }

  /** Previews chords 1-5 in order, one every `intervalMs`, each held for `durationMs`. */
  previewAllChords(durationMs: number, intervalMs: number): void {
    if (!this.port) {
      console.warn("MIDI not connected, cannot preview chords");
      return;
    }
    CHORD_IDS.forEach((chordId, i) => {
      if (i === 0) {
        this.previewChord(chordId, durationMs);
        return;
      }
      const timer = setTimeout(() => {
        this.previewTimers.delete(timer);
        if (this.port) this.previewChord(chordId, durationMs);
      }, Math.max(0, intervalMs) * i);
      this.previewTimers.add(timer);
    });
  }

  stopAllNotes(): void {
    if (!this.port) return;
    for (const note of [...this.soundingNotes]) {
      this.noteOff(note);
    }
  }
}

/** Picks the output named `preferredName`, falling back to the first available one. */
export function selectMidiOutput<T extends MidiOutputPort>(
  outputs: readonly T[],
  preferredName?: string | null
): T | null {
  if (preferredName) {
    const preferred = outputs.find((output) => output.name === preferredName);
    if (preferred) return preferred;
  }
  return outputs[0] ?? null;
}

export { DEFAULTS as defaultMidiChordSinkOptions };
