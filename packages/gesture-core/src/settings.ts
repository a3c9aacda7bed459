import { z } from "zod";
import type { GestureEngineOptions, GestureSettings } from "./types";

const DEFAULTS: GestureSettings = {
  historyLength: 4,
  stabilityThreshold: 0.75,
};

export const GestureSettingsSchema = z.object({
  historyLength: z
    .number({ invalid_type_error: "historyLength must be a number" })
    .int("historyLength must be an integer")
    .positive("historyLength must be greater than 0"),
  stabilityThreshold: z
    .number({ invalid_type_error: "stabilityThreshold must be a number" })
    .min(0, "stabilityThreshold must be between 0 and 1")
    .max(1, "stabilityThreshold must be between 0 and 1"),
});

export class GestureConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid gesture settings: ${issues.join("; ")}`);
    this.name = "GestureConfigError";
  }
}

/** Applies defaults and validates. The result is frozen for the lifetime of a session. */
export function resolveGestureSettings(opts?: GestureEngineOptions): Readonly<GestureSettings> {
  const parsed = GestureSettingsSchema.safeParse({ ...DEFAULTS, ...stripUndefined(opts ?? {}) });
  if (!parsed.success) {
    throw new GestureConfigError(parsed.error.issues.map((issue) => issue.message));
  }
  return Object.freeze(parsed.data);
}

function stripUndefined(opts: GestureEngineOptions): GestureEngineOptions {
  const out: GestureEngineOptions = {};
  if (opts.historyLength !== undefined) out.historyLength = opts.historyLength;
  if (opts.stabilityThreshold !== undefined) out.stabilityThreshold = opts.stabilityThreshold;
  return out;
}

export { DEFAULTS as defaultGestureSettings };
