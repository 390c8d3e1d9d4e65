import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { VirtualDaw } from "./daw/virtual-daw.js";
import { DeviceSession } from "./device.js";
import { Dispatcher } from "./dispatcher/dispatcher.js";
import { createCommand } from "./commands/model.js";
import { silentLogger } from "./logger.js";
import { frameCommand, framePayload, parseEnvelope } from "./midi/sysex.js";
import { createMockTransport, type MockTransport } from "./midi/transport.js";

const framing = { maxChunkBytes: 32, maxChunksPerCommand: 64 };

/** Decode the single-chunk replies a device has sent. */
function replies(port: MockTransport): { commandId: number; tag: number; body: unknown }[] {
  return port.sent.map((message) => {
    const envelope = parseEnvelope(message);
    if (!envelope || envelope.total !== 1) throw new Error("expected a single-chunk reply");
    return {
      commandId: envelope.commandId,
      tag: envelope.tag,
      body: JSON.parse(new TextDecoder().decode(envelope.payload)),
    };
  });
}

describe("DeviceSession", () => {
  let daw: VirtualDaw;
  let port: MockTransport;
  let device: DeviceSession;

  beforeEach(() => {
    daw = new VirtualDaw();
    port = createMockTransport("device");
    device = new DeviceSession({
      ...framing,
      maxChunkBytes: 1024,
      transport: port,
      dispatcher: new Dispatcher({ daw, logger: silentLogger() }),
      logger: silentLogger(),
      midiChannel: 0,
      reassemblyTimeoutMs: 5000,
    });
  });

  afterEach(async () => {
    await device.close();
  });

  it("executes CC commands without replying", async () => {
    port.receive([0xb0, 118, 0]);
    await device.idle();
    expect(daw.playing).toBe(true);
    expect(port.sent).toHaveLength(0);
  });

  it("reassembles out-of-order and duplicated chunks, then replies under the same tag", async () => {
    const command = createCommand("create_chord_progression", { chords: ["C", "G", "Am", "F"] });
    const [a, b, c] = frameCommand(command, 9, framing);
    for (const message of [c, a, a, b]) port.receive(message);
    await device.idle();

    expect(daw.notesIn(0)).toHaveLength(12);
    const [reply] = replies(port);
    expect(reply.commandId).toBe(0x70);
    expect(reply.tag).toBe(9);
    expect(reply.body).toMatchObject({ command: "create_chord_progression", success: true });
  });

  it("replies with a failure for invalid arguments", async () => {
    for (const message of framePayload(0x30, 4, { bpm: 5 }, framing)) port.receive(message);
    await device.idle();

    const [reply] = replies(port);
    expect(reply.commandId).toBe(0x71);
    expect(reply.tag).toBe(4);
    expect(reply.body).toMatchObject({ command: "set_tempo", success: false });
    expect(daw.tempo).toBe(140);
  });

  it("replies with a failure for unknown command ids", async () => {
    for (const message of framePayload(0x6e, 2, {}, framing)) port.receive(message);
    await device.idle();

    expect(replies(port)).toEqual([
      {
        commandId: 0x71,
        tag: 2,
        body: { command: "0x6e", success: false, error: "unknown command id 0x6e" },
      },
    ]);
  });

  it("ignores foreign SysEx and its own status traffic", async () => {
    port.receive([0xf0, 0x41, 0x10, 0x42, 0x12, 0x00, 0x01, 0xf7]);
    for (const message of framePayload(0x70, 1, { command: "x", success: true }, framing)) {
      port.receive(message);
    }
    for (const message of framePayload(0x7f, 0, { tempo: 90 }, framing)) port.receive(message);
    await device.idle();
    expect(port.sent).toHaveLength(0);
    expect(device.pendingSequences).toBe(0);
  });

  it("pushes tempo changes made in the DAW as async updates", async () => {
    await device.pollTempo();
    expect(port.sent).toHaveLength(0);

    daw.tempo = 132.5;
    await device.pollTempo();
    await device.pollTempo();

    expect(replies(port)).toEqual([{ commandId: 0x7f, tag: 0, body: { tempo: 132.5 } }]);
  });

  it("publishes arbitrary updates under tag 0", () => {
    device.publish({ playing: true });
    expect(replies(port)).toEqual([{ commandId: 0x7f, tag: 0, body: { playing: true } }]);
  });

  it("handles commands in arrival order", async () => {
    for (const message of framePayload(0x30, 1, { bpm: 100 }, framing)) port.receive(message);
    for (const message of framePayload(0x30, 2, { bpm: 110 }, framing)) port.receive(message);
    await device.idle();
    expect(daw.tempo).toBe(110);
    expect(replies(port).map((r) => r.tag)).toEqual([1, 2]);
  });
});
