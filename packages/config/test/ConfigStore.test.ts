import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  chordBankFromConfig,
  ConfigError,
  defaultConfig,
  exportChords,
  gestureOptionsFromConfig,
  importChords,
  loadConfig,
  parseConfig,
  saveConfig,
  sinkOptionsFromConfig,
  summarizeConfig,
} from "../src";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "air-chords-config-"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

describe("parseConfig", () => {
  it("fills missing sections and keys from the defaults", () => {
    const config = parseConfig({ chords: { "1": [48, 52, 55] }, midi: { velocity: 80 } });

    expect(config.chords["1"]).toEqual([48, 52, 55]);
    expect(config.chords["2"]).toEqual([62, 66, 69]);
    expect(config.midi).toEqual({ deviceName: null, velocity: 80, channel: 0 });
    expect(config.gesture).toEqual({ historyLength: 4, stabilityThreshold: 0.75, cameraIndex: 0 });
  });

  it("rejects values out of range with the offending path", () => {
    expect(() => parseConfig({ midi: { channel: 16 } })).toThrow(
      "Invalid config: midi.channel: channel must be between 0 and 15"
    );
    expect(() => parseConfig({ gesture: { stabilityThreshold: 1.5 } })).toThrow(ConfigError);
    expect(() => parseConfig({ chords: { "3": [200] } })).toThrow("chords.3.0: notes must be between 0 and 127");
  });

  it("rejects non-object input", () => {
    expect(() => parseConfig([1, 2])).toThrow("Config must be a JSON object");
  });
});

describe("loadConfig / saveConfig", () => {
  it("returns defaults when the file does not exist", async () => {
    expect(await loadConfig(join(dir, "missing.json"))).toEqual(defaultConfig());
  });

  it("logs and returns defaults when the file is not JSON", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});
    const path = join(dir, "broken.json");
    await writeFile(path, "{ not json", "utf8");

    expect(await loadConfig(path)).toEqual(defaultConfig());
    expect(errors).toHaveBeenCalledTimes(1);
  });

  it("throws on invalid values", async () => {
    const path = join(dir, "invalid.json");
    await writeFile(path, JSON.stringify({ gesture: { historyLength: 0 } }), "utf8");

    await expect(loadConfig(path)).rejects.toThrow("gesture.historyLength: historyLength must be greater than 0");
  });

  it("round-trips a modified config", async () => {
    const path = join(dir, "config.json");
    const config = defaultConfig();
    config.chords["1"] = [48, 52, 55];
    config.midi = { deviceName: "IAC Bus 1", velocity: 80, channel: 1 };
    config.gesture.stabilityThreshold = 0.8;

    await saveConfig(path, config);

    expect(await loadConfig(path)).toEqual(config);
  });
});

describe("exportChords / importChords", () => {
  it("writes chords with their origin", async () => {
    const path = join(dir, "chords.json");
    await exportChords(path, defaultConfig().chords);

    const written: unknown = JSON.parse(await readFile(path, "utf8"));
    expect(written).toEqual({ chords: defaultConfig().chords, exportedFrom: "air-chords" });
  });

  it("keeps valid notes and ignores unknown chord ids", async () => {
    const path = join(dir, "import.json");
    await writeFile(
      path,
      JSON.stringify({ chords: { "2": [50, 128, 54.5, "x", 57], "7": [1, 2, 3], "4": "not a list" } }),
      "utf8"
    );

    const merged = await importChords(path, defaultConfig().chords);

    expect(merged["2"]).toEqual([50, 57]);
    expect(merged["4"]).toEqual([65, 69, 72]);
    expect(Object.keys(merged)).toEqual(["1", "2", "3", "4", "5"]);
  });

  it("rejects files without chords", async () => {
    const path = join(dir, "empty.json");
    await writeFile(path, JSON.stringify({ exportedFrom: "elsewhere" }), "utf8");

    await expect(importChords(path, defaultConfig().chords)).rejects.toThrow(
      `Cannot import chords from ${path}: no chords found`
    );
  });
});

describe("summarizeConfig", () => {
  it("lists chords with note names", () => {
    const config = defaultConfig();
    config.chords["5"] = [];

    const lines = summarizeConfig(config).split("\n");

    expect(lines).toContain("  Chord 1: C4 E4 G4 (MIDI: 60, 64, 67)");
    expect(lines).toContain("  Chord 5: Not set");
    expect(lines).toContain("  Device: first available");
    expect(lines).toContain("  Stability threshold: 0.75");
  });
});

describe("config adapters", () => {
  it("builds the chord bank and session options", () => {
    const config = parseConfig({
      chords: { "3": [40, 44, 47] },
      midi: { velocity: 90, channel: 2 },
      gesture: { historyLength: 6 },
    });

    expect(chordBankFromConfig(config).get(3)).toEqual([40, 44, 47]);
    expect(chordBankFromConfig(config).get(1)).toEqual([60, 64, 67]);
    expect(sinkOptionsFromConfig(config)).toEqual({ velocity: 90, channel: 2 });
    expect(gestureOptionsFromConfig(config)).toEqual({ historyLength: 6, stabilityThreshold: 0.75 });
  });
});
