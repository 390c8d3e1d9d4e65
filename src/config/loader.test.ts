import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ValidationError } from "../errors.js";
import { envOverrides, loadBridgeConfig } from "./loader.js";
import { defaultConfig, parseBridgeConfig } from "./schema.js";

describe("loadBridgeConfig", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "fl-bridge-config-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content, "utf8");
    return path;
  }

  it("falls back to defaults", () => {
    expect(loadBridgeConfig({ env: {} })).toEqual({
      max_chunk_bytes: 192,
      max_chunks_per_command: 64,
      reassembly_timeout_seconds: 5,
      response_timeout_seconds: 7,
      midi_port_name: "IAC Driver MCP Bridge",
      feedback_port_name: "IAC Driver Bus 1",
      midi_channel: 0,
      log_level: "info",
    });
    expect(loadBridgeConfig({ env: {} })).toEqual(defaultConfig());
  });

  it("reads a config file", () => {
    const path = writeConfig("file.json", JSON.stringify({ max_chunk_bytes: 32, midi_port_name: "loopMIDI Port" }));
    const config = loadBridgeConfig({ path, env: {} });
    expect(config.max_chunk_bytes).toBe(32);
    expect(config.midi_port_name).toBe("loopMIDI Port");
  });

  it("lets environment variables override the file", () => {
    const path = writeConfig("override.json", JSON.stringify({ max_chunk_bytes: 32, midi_channel: 1 }));
    const config = loadBridgeConfig({
      path,
      env: { FL_BRIDGE_MAX_CHUNK_BYTES: "64", FL_BRIDGE_LOG_LEVEL: "debug" },
    });
    expect(config.max_chunk_bytes).toBe(64);
    expect(config.midi_channel).toBe(1);
    expect(config.log_level).toBe("debug");
  });

  it("finds the file through FL_BRIDGE_CONFIG", () => {
    const path = writeConfig("env-path.json", JSON.stringify({ response_timeout_seconds: 2 }));
    expect(loadBridgeConfig({ env: { FL_BRIDGE_CONFIG: path } }).response_timeout_seconds).toBe(2);
  });

  it("lists every offending field", () => {
    try {
      loadBridgeConfig({ env: { FL_BRIDGE_MIDI_CHANNEL: "16", FL_BRIDGE_MAX_CHUNK_BYTES: "lots" } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.issues).toHaveLength(2);
        expect(err.issues.some((i) => i.startsWith("midi_channel:"))).toBe(true);
        expect(err.issues.some((i) => i.startsWith("max_chunk_bytes:"))).toBe(true);
      }
    }
  });

  it("rejects unknown keys", () => {
    const path = writeConfig("unknown.json", JSON.stringify({ max_chunk_size: 10 }));
    expect(() => loadBridgeConfig({ path, env: {} })).toThrow(ValidationError);
  });

  it("rejects a missing file", () => {
    expect(() => loadBridgeConfig({ path: join(dir, "absent.json"), env: {} })).toThrow("Config not found");
  });

  it("rejects malformed JSON and non-objects", () => {
    expect(() => loadBridgeConfig({ path: writeConfig("bad.json", "{"), env: {} })).toThrow("is not valid JSON");
    expect(() => loadBridgeConfig({ path: writeConfig("list.json", "[]"), env: {} })).toThrow(
      "must contain a JSON object"
    );
  });
});

describe("envOverrides", () => {
  it("ignores unrelated and empty variables", () => {
    expect(envOverrides({ FL_BRIDGE_MIDI_CHANNEL: "", FL_BRIDGE_UNKNOWN: "1", PATH: "/bin" })).toEqual({});
  });
});

describe("parseBridgeConfig", () => {
  it("reports field-level errors", () => {
    expect(() => parseBridgeConfig({ max_chunks_per_command: 200 })).toThrow(
      "Invalid bridge config:\n  max_chunks_per_command: Number must be less than or equal to 127"
    );
  });

  it("rejects a chunk budget too small for a status reply", () => {
    try {
      parseBridgeConfig({ max_chunk_bytes: 8, max_chunks_per_command: 3 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.issues).toEqual([
          "max_chunks_per_command: max_chunk_bytes * max_chunks_per_command must be at least 30 bytes to carry a status reply (got 24)",
        ]);
      }
    }
  });

  it("accepts a budget that exactly fits the bare reply", () => {
    const config = parseBridgeConfig({ max_chunk_bytes: 10, max_chunks_per_command: 3 });
    expect(config.max_chunk_bytes * config.max_chunks_per_command).toBe(30);
  });
});
