export * from "./types";
export * from "./notes";
export * from "./ChordBank";
export * from "./ChordDispatcher";
export * from "./MidiChordSink";
