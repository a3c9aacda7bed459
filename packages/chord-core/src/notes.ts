const NOTE_NAMES = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"];

const PITCH_CLASSES: Record<string, number> = {
  C: 0,
  "C#": 1,
  DB: 1,
  D: 2,
  "D#": 3,
  EB: 3,
  E: 4,
  F: 5,
  "F#": 6,
  GB: 6,
  G: 7,
  "G#": 8,
  AB: 8,
  A: 9,
  "A#": 10,
  BB: 10,
  B: 11,
};

export const MIN_MIDI_NOTE = 0;
export const MAX_MIDI_NOTE = 127;

export function isMidiNote(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= MIN_MIDI_NOTE &&
    value <= MAX_MIDI_NOTE
  );
}

/** MIDI note number to scientific pitch name, with middle C (60) as "C4". */
export function noteToName(note: number): string | null {
  if (!isMidiNote(note)) return null;
  const octave = Math.floor(note / 12) - 1;
  return `${NOTE_NAMES[note % 12]}${octave}`;
}

/** Parses names such as "C4", "F#3" or "Bb2". Returns null when the name is not a valid MIDI note. */
export function nameToNote(name: string): number | null {
  const match = /^([A-G](?:#|B)?)(-?\d)$/.exec(name.trim().toUpperCase());
  if (!match) return null;
  const pitchClass = PITCH_CLASSES[match[1]];
  if (pitchClass === undefined) return null;
  const note = (Number(match[2]) + 1) * 12 + pitchClass;
  return isMidiNote(note) ? note : null;
}
