import { describe, it, expect, vi } from "vitest";
import { openBridge } from "./bridge.js";
import { defaultConfig, parseBridgeConfig } from "./config/schema.js";
import { VirtualDaw } from "./daw/virtual-daw.js";
import { silentLogger } from "./logger.js";

describe("openBridge (loopback)", () => {
  it("runs structured commands against the virtual DAW", async () => {
    const daw = new VirtualDaw();
    const config = { ...defaultConfig(), max_chunk_bytes: 32 };
    const bridge = await openBridge(config, { mode: "loopback", logger: silentLogger(), daw });
    try {
      const result = await bridge.client.execute("set_arrangement", {
        sections: [
          { pattern: 1, start_bar: 1, length_bars: 8 },
          { pattern: 2, start_bar: 9, length_bars: 8 },
        ],
      });
      expect(result).toEqual({
        command: "set_arrangement",
        success: true,
        data: { sections: 2, bars: 16 },
      });
      expect(daw.arrangement).toHaveLength(2);

      const status = await bridge.client.execute("get_status");
      expect(status.data).toEqual({
        playing: false,
        recording: false,
        tempo: 140,
        pattern: 1,
        selectedChannel: 0,
        channelCount: 4,
      });
    } finally {
      await bridge.close();
    }
    expect(bridge.mode).toBe("loopback");
  });

  it("still answers under the smallest accepted chunk budget", async () => {
    const daw = new VirtualDaw();
    const config = parseBridgeConfig({ max_chunk_bytes: 10, max_chunks_per_command: 3 });
    const bridge = await openBridge(config, { mode: "loopback", logger: silentLogger(), daw });
    try {
      const result = await bridge.client.execute("set_tempo", { bpm: 120 });
      expect(result).toEqual({
        command: "set_tempo",
        success: false,
        error: "Device reported a failure without details",
      });
      expect(daw.tempo).toBe(120);
    } finally {
      await bridge.close();
    }
  });

  it("forwards tempo changes from the device to update listeners", async () => {
    const daw = new VirtualDaw();
    const bridge = await openBridge(defaultConfig(), { mode: "loopback", logger: silentLogger(), daw });
    const updates: unknown[] = [];
    bridge.client.onUpdate((update) => updates.push(update));
    try {
      expect(bridge.device).toBeDefined();
      await bridge.device?.pollTempo();
      daw.tempo = 128;
      await bridge.device?.pollTempo();
      await vi.waitFor(() => expect(updates).toEqual([{ tempo: 128 }]));
    } finally {
      await bridge.close();
    }
  });
});
