import { isMidiNote } from "./notes";
import type { ChordDefinitions, ChordId } from "./types";

export const CHORD_IDS: readonly ChordId[] = [1, 2, 3, 4, 5];

const DEFAULT_CHORDS: ChordDefinitions = {
  1: [60, 64, 67], // C major
  2: [62, 66, 69],
  3: [64, 68, 71],
  4: [65, 69, 72], // F major
  5: [67, 71, 74],
};

export function isChordId(value: number): value is ChordId {
  return value === 1 || value === 2 || value === 3 || value === 4 || value === 5;
}

function copyDefinitions(source: ChordDefinitions): ChordDefinitions {
  return {
    1: [...source[1]],
    2: [...source[2]],
    3: [...source[3]],
    4: [...source[4]],
    5: [...source[5]],
  };
}

export class ChordBank {
  private chords: ChordDefinitions;

  constructor(initial?: Partial<ChordDefinitions>) {
    this.chords = copyDefinitions(DEFAULT_CHORDS);
    if (initial) {
      for (const id of CHORD_IDS) {
        const notes = initial[id];
        if (notes) this.set(id, notes);
      }
    }
  }

  get(chordId: ChordId): number[] {
    return [...this.chords[chordId]];
  }

  set(chordId: number, notes: readonly number[]): void {
    if (!isChordId(chordId)) {
      throw new RangeError(`Chord id must be between 1 and 5, got ${chordId}`);
    }
    const invalid = notes.filter((note) => !isMidiNote(note));
    if (invalid.length > 0) {
      throw new RangeError(`Chord ${chordId} has notes outside 0-127: ${invalid.join(", ")}`);
    }
    this.chords[chordId] = [...notes];
  }

  clear(chordId: ChordId): void {
    this.chords[chordId] = [];
  }

  entries(): Array<[ChordId, number[]]> {
    return CHORD_IDS.map((id) => [id, this.get(id)]);
  }

  toDefinitions(): ChordDefinitions {
    return copyDefinitions(this.chords);
  }

  reset(): void {
    this.chords = copyDefinitions(DEFAULT_CHORDS);
  }
}

export { DEFAULT_CHORDS as defaultChords };
