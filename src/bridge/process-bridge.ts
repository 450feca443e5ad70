import { spawn } from "node:child_process";
import type { Readable } from "node:stream";
import type { ConversationId, MessageId } from "../chat-types.js";
import type { EventSink, FailureKind } from "../core/events.js";
import { describeError, type Logger } from "../log.js";

export type BridgeChild = {
  stdout: Readable;
  stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "error", listener: (error: Error) => void): unknown;
  once(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
};

export type SpawnProcess = (command: string, args: string[]) => BridgeChild;

export type ReplyRequest = {
  conversationId: ConversationId;
  messageId: MessageId;
  modelId: string;
  prompt: string;
};

export type RequestHandle = {
  requestId: number;
  conversationId: ConversationId;
  messageId: MessageId;
};

export type PendingRequest = RequestHandle & {
  modelId: string;
  prompt: string;
  startedAt: number;
};

export type ReplySubmitter = {
  submit(request: ReplyRequest): RequestHandle;
};

export type ProcessBridgeOptions = {
  command: string;
  sink: EventSink;
  logger: Logger;
  timeoutMs?: number;
  spawnProcess?: SpawnProcess;
  now?: () => number;
};

type InFlight = PendingRequest & {
  child: BridgeChild | null;
  settled: boolean;
  timer: ReturnType<typeof setTimeout> | null;
  stderrTail: string;
};

const STDERR_TAIL_LIMIT = 4 * 1024;
const KILL_GRACE_MS = 2_000;

export class ConversationBusyError extends Error {
  readonly conversationId: ConversationId;

  constructor(conversationId: ConversationId) {
    super(`conversation ${conversationId} already has a reply in flight`);
    this.name = "ConversationBusyError";
    this.conversationId = conversationId;
  }
}

export function buildInvocationArgs(modelId: string, prompt: string): string[] {
  // argv is handed to the tool without a shell; "--" ends option parsing so a
  // prompt starting with "-" stays a prompt.
  return ["-m", modelId, "--", prompt];
}

export const spawnWithoutShell: SpawnProcess = (command, args) =>
  spawn(command, args, {
    shell: false,
    stdio: ["ignore", "pipe", "pipe"],
    windowsHide: true,
  });

/**
 * Runs one external process per outgoing message. Each request owns its child
 * exclusively and reports back only through events on the sink.
 */
export class ProcessBridge implements ReplySubmitter {
  private readonly command: string;
  private readonly sink: EventSink;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly spawnProcess: SpawnProcess;
  private readonly now: () => number;
  private readonly requests = new Map<ConversationId, InFlight>();
  private nextRequestId = 1;

  constructor(options: ProcessBridgeOptions) {
    this.command = options.command;
    this.sink = options.sink;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.spawnProcess = options.spawnProcess ?? spawnWithoutShell;
    this.now = options.now ?? Date.now;
  }

  inFlight(): PendingRequest[] {
    return [...this.requests.values()].map((request) => ({
      requestId: request.requestId,
      conversationId: request.conversationId,
      messageId: request.messageId,
      modelId: request.modelId,
      prompt: request.prompt,
      startedAt: request.startedAt,
    }));
  }

  submit(request: ReplyRequest): RequestHandle {
    if (this.requests.has(request.conversationId)) {
      throw new ConversationBusyError(request.conversationId);
    }

    const entry: InFlight = {
      requestId: this.nextRequestId,
      conversationId: request.conversationId,
      messageId: request.messageId,
      modelId: request.modelId,
      prompt: request.prompt,
      startedAt: this.now(),
      child: null,
      settled: false,
      timer: null,
      stderrTail: "",
    };
    this.nextRequestId += 1;
    this.requests.set(entry.conversationId, entry);

    const args = buildInvocationArgs(request.modelId, request.prompt);
    this.logger.debug("bridge.spawn", {
      request: entry.requestId,
      conversation: entry.conversationId,
      message: entry.messageId,
      command: this.command,
      model: request.modelId,
    });

    let child: BridgeChild;
    try {
      child = this.spawnProcess(this.command, args);
    } catch (error) {
      this.fail(entry, "spawn_failure", `failed to start ${this.command}: ${describeError(error)}`);
      return toHandle(entry);
    }
    entry.child = child;
    this.attach(entry, child);

    if (this.timeoutMs > 0) {
      entry.timer = setTimeout(() => {
        if (entry.settled) {
          return;
        }
        this.fail(entry, "timeout", `timed out after ${this.timeoutMs}ms`);
        terminate(child);
      }, this.timeoutMs);
    }

    return toHandle(entry);
  }

  shutdown(): void {
    for (const entry of this.requests.values()) {
      if (entry.timer) {
        clearTimeout(entry.timer);
        entry.timer = null;
      }
      entry.settled = true;
      entry.child?.kill("SIGTERM");
    }
    this.requests.clear();
  }

  private attach(entry: InFlight, child: BridgeChild): void {
    child.stdout.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      if (entry.settled || !chunk) {
        return;
      }
      this.sink.push({ type: "reply.chunk", messageId: entry.messageId, text: chunk });
    });
    child.stdout.on("error", (error: Error) => {
      this.fail(entry, "stream_failure", `output stream failed: ${error.message}`);
      child.kill("SIGTERM");
    });

    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk: string) => {
      entry.stderrTail = `${entry.stderrTail}${chunk}`.slice(-STDERR_TAIL_LIMIT);
    });

    child.once("error", (error) => {
      this.fail(entry, "spawn_failure", `failed to start ${this.command}: ${error.message}`);
    });

    child.once("close", (code, signal) => {
      if (code === 0) {
        if (!this.settle(entry)) {
          return;
        }
        this.logger.debug("bridge.done", { request: entry.requestId, elapsedMs: this.now() - entry.startedAt });
        this.sink.push({ type: "reply.done", messageId: entry.messageId });
        return;
      }
      const stderr = entry.stderrTail.trim();
      const cause =
        code === null
          ? `${this.command} was terminated by ${signal ?? "a signal"}`
          : `${this.command} exited with code ${code}`;
      this.fail(entry, "stream_failure", stderr ? `${cause}: ${stderr}` : cause);
    });
  }

  private fail(entry: InFlight, kind: FailureKind, reason: string): void {
    if (!this.settle(entry)) {
      return;
    }
    this.logger.warn(`bridge.${kind}`, { request: entry.requestId, message: entry.messageId, reason });
    this.sink.push({ type: "reply.failed", messageId: entry.messageId, kind, reason });
  }

  private settle(entry: InFlight): boolean {
    if (entry.settled) {
      return false;
    }
    entry.settled = true;
    if (entry.timer) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
    if (this.requests.get(entry.conversationId) === entry) {
      this.requests.delete(entry.conversationId);
    }
    return true;
  }
}

// SIGTERM first; a child still running after the grace period gets SIGKILL
function terminate(child: BridgeChild): void {
  child.kill("SIGTERM");
  const escalation = setTimeout(() => {
    child.kill("SIGKILL");
  }, KILL_GRACE_MS);
  escalation.unref();
  child.once("close", () => {
    clearTimeout(escalation);
  });
}

function toHandle(entry: InFlight): RequestHandle {
  return {
    requestId: entry.requestId,
    conversationId: entry.conversationId,
    messageId: entry.messageId,
  };
}
