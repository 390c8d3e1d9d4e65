import { describe, it, expect, vi, beforeEach } from "vitest";
import { TransportError } from "../errors.js";
import { silentLogger } from "../logger.js";
import {
  createLoopbackPair,
  createNodeMidiTransport,
  listMidiPorts,
  type NodeMidiModule,
} from "./transport.js";

const INPUTS = ["IAC Driver Bus 1"];
const OUTPUTS = ["Network Session", "IAC Driver MCP Bridge"];

/** Port operations in the order the fake saw them. */
let events: string[] = [];
let failInputOpen = false;

class FakePort {
  constructor(
    private readonly kind: "in" | "out",
    private readonly names: readonly string[]
  ) {}

  getPortCount(): number {
    return this.names.length;
  }

  getPortName(index: number): string {
    return this.names[index] ?? "";
  }

  openPort(index: number): void {
    if (this.kind === "in" && failInputOpen) throw new Error("port busy");
    events.push(`${this.kind}:open:${index}`);
  }

  closePort(): void {
    events.push(`${this.kind}:close`);
  }
}

class FakeInput extends FakePort {
  constructor() {
    super("in", INPUTS);
  }

  ignoreTypes(): void {}

  on(): void {}
}

class FakeOutput extends FakePort {
  constructor() {
    super("out", OUTPUTS);
  }

  sendMessage(message: number[]): void {
    events.push(`out:send:${message.join(",")}`);
  }
}

const fakeMidi: NodeMidiModule = { Input: FakeInput, Output: FakeOutput };

describe("node-midi transport", () => {
  beforeEach(() => {
    events = [];
    failInputOpen = false;
  });

  it("opens both ports, sends, and closes them", async () => {
    const transport = await createNodeMidiTransport({
      outputPort: "mcp bridge",
      inputPort: "IAC Driver Bus 1",
      logger: silentLogger(),
      midi: fakeMidi,
    });
    expect(transport.name).toBe("out:IAC Driver MCP Bridge in:IAC Driver Bus 1");
    expect(transport.status()).toBe("connected");

    transport.send([0xb0, 118, 0]);
    await transport.close();

    expect(events).toEqual(["out:open:1", "in:open:0", "out:send:176,118,0", "out:close", "in:close"]);
    expect(() => transport.send([0xb0, 118, 0])).toThrow(TransportError);
  });

  it("closes the output port when the input port fails to open", async () => {
    failInputOpen = true;
    await expect(
      createNodeMidiTransport({
        outputPort: "IAC Driver MCP Bridge",
        inputPort: "IAC Driver Bus 1",
        logger: silentLogger(),
        midi: fakeMidi,
      })
    ).rejects.toThrow("Could not open MIDI ports: port busy");
    expect(events).toEqual(["out:open:1", "out:close", "in:close"]);
  });

  it("names the available ports when one is missing", async () => {
    await expect(
      createNodeMidiTransport({ outputPort: "loopMIDI", logger: silentLogger(), midi: fakeMidi })
    ).rejects.toThrow('MIDI output "loopMIDI" not found. Available: Network Session, IAC Driver MCP Bridge');
  });

  it("lists ports and releases the handles it created", async () => {
    expect(await listMidiPorts(fakeMidi)).toEqual({
      inputs: ["IAC Driver Bus 1"],
      outputs: ["Network Session", "IAC Driver MCP Bridge"],
    });
    expect(events).toEqual(["in:close", "out:close"]);
  });
});

describe("createLoopbackPair", () => {
  it("delivers each side's messages to the other after send returns", async () => {
    const [a, b] = createLoopbackPair();
    const received = vi.fn();
    b.onMessage(received);

    a.send([0xb0, 116, 2]);
    expect(received).not.toHaveBeenCalled();

    await Promise.resolve();
    expect(received).toHaveBeenCalledWith(Uint8Array.from([0xb0, 116, 2]));
  });
});
