import { z } from "zod";
import { GestureSettingsSchema } from "@air-chords/gesture-core";

export const CHORD_KEYS = ["1", "2", "3", "4", "5"] as const;
export type ChordKey = (typeof CHORD_KEYS)[number];

const NoteSchema = z
  .number({ invalid_type_error: "notes must be numbers" })
  .int("notes must be integers")
  .min(0, "notes must be between 0 and 127")
  .max(127, "notes must be between 0 and 127");

export const ChordsConfigSchema = z.object({
  "1": z.array(NoteSchema),
  "2": z.array(NoteSchema),
  "3": z.array(NoteSchema),
  "4": z.array(NoteSchema),
  "5": z.array(NoteSchema),
});

export const MidiConfigSchema = z.object({
  deviceName: z.string().nullable(),
  velocity: z.number().int().min(0, "velocity must be between 0 and 127").max(127, "velocity must be between 0 and 127"),
  channel: z.number().int().min(0, "channel must be between 0 and 15").max(15, "channel must be between 0 and 15"),
});

export const GestureConfigSchema = GestureSettingsSchema.extend({
  cameraIndex: z.number().int().min(0, "cameraIndex must not be negative"),
});

export const AppConfigSchema = z.object({
  chords: ChordsConfigSchema,
  midi: MidiConfigSchema,
  gesture: GestureConfigSchema,
});

export type ChordsConfig = z.infer<typeof ChordsConfigSchema>;
export type MidiConfig = z.infer<typeof MidiConfigSchema>;
export type GestureConfig = z.infer<typeof GestureConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
