import { readFile, writeFile } from "node:fs/promises";
import { ChordBank, defaultChords, defaultMidiChordSinkOptions, isMidiNote, noteToName } from "@air-chords/chord-core";
import type { MidiChordSinkOptions } from "@air-chords/chord-core";
import { defaultGestureSettings } from "@air-chords/gesture-core";
import type { GestureEngineOptions } from "@air-chords/gesture-core";
import { AppConfigSchema, CHORD_KEYS } from "./schema";
import type { AppConfig, ChordsConfig } from "./schema";

export const EXPORTED_FROM = "air-chords";

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

export function defaultConfig(): AppConfig {
  return {
    chords: {
      "1": [...defaultChords[1]],
      "2": [...defaultChords[2]],
      "3": [...defaultChords[3]],
      "4": [...defaultChords[4]],
      "5": [...defaultChords[5]],
    },
    midi: {
      deviceName: null,
      velocity: defaultMidiChordSinkOptions.velocity,
      channel: defaultMidiChordSinkOptions.channel,
    },
    gesture: { ...defaultGestureSettings, cameraIndex: 0 },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(defaults: object, raw: unknown): object {
  return isRecord(raw) ? { ...defaults, ...raw } : defaults;
}

/** Fills missing sections and keys from the defaults, then validates. */
export function parseConfig(raw: unknown): AppConfig {
  if (!isRecord(raw)) {
    throw new ConfigError("Config must be a JSON object");
  }
  const defaults = defaultConfig();
  const parsed = AppConfigSchema.safeParse({
    chords: section(defaults.chords, raw.chords),
    midi: section(defaults.midi, raw.midi),
    gesture: section(defaults.gesture, raw.gesture),
  });
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid config",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return parsed.data;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function loadConfig(path: string): Promise<AppConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (!isMissingFile(err)) {
      console.error(`Error loading config from ${path}`, err);
    }
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    console.error(`Error loading config from ${path}`, err);
    return defaultConfig();
  }
  return parseConfig(raw);
}

export async function saveConfig(path: string, config: AppConfig): Promise<void> {
  await writeFile(path, `${JSON.stringify(config, null, 2)}\n`, "utf8");
}

export async function exportChords(path: string, chords: ChordsConfig): Promise<void> {
  const data = { chords, exportedFrom: EXPORTED_FROM };
  await writeFile(path, `${JSON.stringify(data, null, 2)}\n`, "utf8");
}

/**
 * Reads chords written by exportChords and merges them over `current`.
 * Ids outside 1-5 are ignored and notes outside 0-127 are dropped.
 */
export async function importChords(path: string, current: ChordsConfig): Promise<ChordsConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    throw new ConfigError(`Cannot import chords from ${path}`, [describeError(err)]);
  }
  if (!isRecord(raw) || !isRecord(raw.chords)) {
    throw new ConfigError(`Cannot import chords from ${path}`, ["no chords found"]);
  }

  const merged: ChordsConfig = { ...current };
  for (const key of CHORD_KEYS) {
    const notes = raw.chords[key];
    if (Array.isArray(notes)) {
      merged[key] = notes.filter(isMidiNote);
    }
  }
  return merged;
}

export function summarizeConfig(config: AppConfig): string {
  const lines = ["Air chords configuration:", "", "Chords:"];
  for (const key of CHORD_KEYS) {
    const notes = config.chords[key];
    if (notes.length === 0) {
      lines.push(`  Chord ${key}: Not set`);
    } else {
      const names = notes.map((note) => noteToName(note) ?? String(note));
      lines.push(`  Chord ${key}: ${names.join(" ")} (MIDI: ${notes.join(", ")})`);
    }
  }
  lines.push(
    "",
    "MIDI settings:",
    `  Device: ${config.midi.deviceName ?? "first available"}`,
    `  Velocity: ${config.midi.velocity}`,
    `  Channel: ${config.midi.channel}`,
    "",
    "Gesture settings:",
    `  Stability threshold: ${config.gesture.stabilityThreshold}`,
    `  History length: ${config.gesture.historyLength}`,
    `  Camera index: ${config.gesture.cameraIndex}`
  );
  return lines.join("\n");
}

export function chordBankFromConfig(config: AppConfig): ChordBank {
  const { chords } = config;
  return new ChordBank({ 1: chords["1"], 2: chords["2"], 3: chords["3"], 4: chords["4"], 5: chords["5"] });
}

export function sinkOptionsFromConfig(config: AppConfig): MidiChordSinkOptions {
  return { velocity: config.midi.velocity, channel: config.midi.channel };
}

export function gestureOptionsFromConfig(config: AppConfig): GestureEngineOptions {
  return {
    historyLength: config.gesture.historyLength,
    stabilityThreshold: config.gesture.stabilityThreshold,
  };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
