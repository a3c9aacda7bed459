export * from "./types";
export * from "./landmarks";
export * from "./handSelector";
export * from "./palmCircle";
export * from "./GestureHistory";
export * from "./StabilityFilter";
export * from "./settings";
export * from "./GestureEngine";
export * from "./events";
export * from "./GestureSession";
