export * from "./schema";
export * from "./ConfigStore";
