export * from "./sessionView";
export * from "./useChordGestures";
