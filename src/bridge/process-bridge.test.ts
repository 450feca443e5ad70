import { EventEmitter } from "node:events";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { PassThrough } from "node:stream";
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import type { AppEvent } from "../core/events.js";
import { createMemoryLogger } from "../log.js";
import { buildInvocationArgs, ConversationBusyError, ProcessBridge, type SpawnProcess } from "./process-bridge.js";

class FakeChild extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: Array<NodeJS.Signals | undefined> = [];

  kill(signal?: NodeJS.Signals): boolean {
    this.signals.push(signal);
    return true;
  }
}

function setup(options: { timeoutMs?: number; spawnProcess?: SpawnProcess } = {}) {
  const events: AppEvent[] = [];
  const children: FakeChild[] = [];
  const calls: Array<{ command: string; args: string[] }> = [];
  const logger = createMemoryLogger();
  const spawnProcess: SpawnProcess =
    options.spawnProcess ??
    ((command, args) => {
      calls.push({ command, args });
      const child = new FakeChild();
      children.push(child);
      return child;
    });
  const bridge = new ProcessBridge({
    command: "llm",
    sink: {
      push: (event) => {
        events.push(event);
      },
    },
    logger,
    timeoutMs: options.timeoutMs,
    spawnProcess,
    now: () => 500,
  });
  return { bridge, events, children, calls, logger };
}

function childAt(children: FakeChild[], index: number): FakeChild {
  const child = children[index];
  if (!child) {
    throw new Error(`no child at ${index}`);
  }
  return child;
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const request = { conversationId: 1, messageId: 2, modelId: "4o", prompt: "2+2?" };

describe("buildInvocationArgs", () => {
  it("passes the prompt as a single argument after the option terminator", () => {
    expect(buildInvocationArgs("4o", "--verbose please")).toEqual(["-m", "4o", "--", "--verbose please"]);
  });
});

describe("ProcessBridge", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("streams stdout as chunks and reports a clean exit", async () => {
    const { bridge, events, children, calls } = setup();
    const handle = bridge.submit(request);

    expect(handle).toEqual({ requestId: 1, conversationId: 1, messageId: 2 });
    expect(calls).toEqual([{ command: "llm", args: ["-m", "4o", "--", "2+2?"] }]);
    expect(bridge.inFlight().map((entry) => entry.conversationId)).toEqual([1]);

    const child = childAt(children, 0);
    child.stdout.write("4");
    child.stdout.write(" exactly");
    await flush();
    child.emit("close", 0, null);

    const text = events
      .map((event) => (event.type === "reply.chunk" ? event.text : ""))
      .join("");
    expect(text).toBe("4 exactly");
    expect(events.at(-1)).toEqual({ type: "reply.done", messageId: 2 });
    expect(bridge.inFlight()).toEqual([]);
  });

  it("reports a non-zero exit with the tail of stderr", async () => {
    const { bridge, events, children, logger } = setup();
    bridge.submit(request);
    const child = childAt(children, 0);
    child.stderr.write("Error: Unknown model: nope\n");
    await flush();
    child.emit("close", 1, null);

    expect(events).toEqual([
      {
        type: "reply.failed",
        messageId: 2,
        kind: "stream_failure",
        reason: "llm exited with code 1: Error: Unknown model: nope",
      },
    ]);
    expect(logger.records.map((record) => record.stage)).toEqual(["bridge.spawn", "bridge.stream_failure"]);
  });

  it("reports termination by a signal", () => {
    const { bridge, events, children } = setup();
    bridge.submit(request);
    childAt(children, 0).emit("close", null, "SIGKILL");

    expect(events).toEqual([
      { type: "reply.failed", messageId: 2, kind: "stream_failure", reason: "llm was terminated by SIGKILL" },
    ]);
  });

  it("turns a synchronous spawn error into a spawn failure", () => {
    const { bridge, events } = setup({
      spawnProcess: () => {
        throw new Error("spawn llm ENOENT");
      },
    });
    bridge.submit(request);

    expect(events).toEqual([
      { type: "reply.failed", messageId: 2, kind: "spawn_failure", reason: "failed to start llm: spawn llm ENOENT" },
    ]);
    expect(bridge.inFlight()).toEqual([]);
  });

  it("reports a child error once even when close follows", () => {
    const { bridge, events, children } = setup();
    bridge.submit(request);
    const child = childAt(children, 0);
    child.emit("error", new Error("spawn llm ENOENT"));
    child.emit("close", -2, null);

    expect(events).toEqual([
      { type: "reply.failed", messageId: 2, kind: "spawn_failure", reason: "failed to start llm: spawn llm ENOENT" },
    ]);
  });

  it("fails the reply on timeout and terminates the child", () => {
    vi.useFakeTimers();
    const { bridge, events, children } = setup({ timeoutMs: 1_000 });
    bridge.submit(request);
    const child = childAt(children, 0);

    vi.advanceTimersByTime(999);
    expect(child.signals).toEqual([]);
    vi.advanceTimersByTime(1);
    expect(child.signals).toEqual(["SIGTERM"]);
    expect(events).toEqual([
      { type: "reply.failed", messageId: 2, kind: "timeout", reason: "timed out after 1000ms" },
    ]);
    expect(bridge.inFlight()).toEqual([]);

    child.emit("close", null, "SIGTERM");
    vi.advanceTimersByTime(5_000);
    expect(child.signals).toEqual(["SIGTERM"]);
    expect(events).toHaveLength(1);
  });

  it("escalates to SIGKILL when a timed-out child ignores SIGTERM", () => {
    vi.useFakeTimers();
    const { bridge, children } = setup({ timeoutMs: 1_000 });
    bridge.submit(request);
    const child = childAt(children, 0);

    vi.advanceTimersByTime(1_000);
    vi.advanceTimersByTime(1_999);
    expect(child.signals).toEqual(["SIGTERM"]);
    vi.advanceTimersByTime(1);
    expect(child.signals).toEqual(["SIGTERM", "SIGKILL"]);

    expect(bridge.submit({ ...request, messageId: 4 }).requestId).toBe(2);
  });

  it("rejects a second request for a conversation that is in flight", () => {
    const { bridge, children } = setup();
    bridge.submit(request);

    expect(() => bridge.submit({ ...request, messageId: 4 })).toThrow(ConversationBusyError);
    expect(bridge.submit({ ...request, conversationId: 2, messageId: 4 }).requestId).toBe(2);

    childAt(children, 0).emit("close", 0, null);
    expect(bridge.submit({ ...request, messageId: 6 }).requestId).toBe(3);
  });

  it("drops output that arrives after the request settled", async () => {
    const { bridge, events, children } = setup();
    bridge.submit(request);
    const child = childAt(children, 0);
    child.emit("close", 1, null);
    child.stdout.write("late");
    await flush();

    expect(events.map((event) => event.type)).toEqual(["reply.failed"]);
  });

  it("lists in-flight requests", () => {
    const { bridge } = setup();
    bridge.submit(request);
    expect(bridge.inFlight()).toEqual([
      { requestId: 1, conversationId: 1, messageId: 2, modelId: "4o", prompt: "2+2?", startedAt: 500 },
    ]);
  });

  it("kills every child on shutdown and ignores their exits", () => {
    const { bridge, events, children } = setup();
    bridge.submit(request);
    bridge.submit({ ...request, conversationId: 3, messageId: 8 });
    bridge.shutdown();

    expect(children.map((child) => child.signals)).toEqual([["SIGTERM"], ["SIGTERM"]]);
    expect(bridge.inFlight()).toEqual([]);

    childAt(children, 0).emit("close", null, "SIGTERM");
    expect(events).toEqual([]);
  });
});

describe.skipIf(process.platform === "win32")("ProcessBridge with real child processes", () => {
  let dir = "";
  let echoArgsPath = "";

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "llm-tui-bridge-"));
    echoArgsPath = path.join(dir, "echo-args.cjs");
    fs.writeFileSync(
      echoArgsPath,
      `#!${process.execPath}\nprocess.stdout.write(JSON.stringify(process.argv.slice(2)));\n`,
      { mode: 0o755 },
    );
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function realBridge(command: string) {
    const events: AppEvent[] = [];
    const bridge = new ProcessBridge({
      command,
      sink: {
        push: (event) => {
          events.push(event);
        },
      },
      logger: createMemoryLogger(),
    });
    return { bridge, events };
  }

  it("hands shell syntax in the prompt to the tool as one literal argument", async () => {
    const { bridge, events } = realBridge(echoArgsPath);
    const prompt = '$(touch x); echo "hi" -- -m é';
    bridge.submit({ ...request, prompt });

    await vi.waitFor(() => expect(events.at(-1)?.type).toBe("reply.done"), { timeout: 5_000 });
    const output = events.map((event) => (event.type === "reply.chunk" ? event.text : "")).join("");
    const argv: unknown = JSON.parse(output);
    expect(argv).toEqual(["-m", "4o", "--", prompt]);
  });

  it("reports a missing executable as a single spawn failure", async () => {
    const missing = path.join(dir, "missing-llm");
    const { bridge, events } = realBridge(missing);
    bridge.submit(request);

    await vi.waitFor(() => expect(bridge.inFlight()).toEqual([]), { timeout: 5_000 });
    await new Promise<void>((resolve) => setTimeout(resolve, 50));
    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event?.type === "reply.failed" ? [event.kind, event.reason] : []).toEqual([
      "spawn_failure",
      `failed to start ${missing}: spawn ${missing} ENOENT`,
    ]);
  });
});
