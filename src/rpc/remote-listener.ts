import { createServer, type AddressInfo, type Server, type Socket } from "node:net";
import type { EventSink, RemoteListenerStatus } from "../core/events.js";
import { describeError, type Logger } from "../log.js";
import { formatRemoteCommand, parseRemoteCommand } from "./remote-command.js";

export type RemoteListenerOptions = {
  host: string;
  port: number;
  sink: EventSink;
  logger: Logger;
  maxLineLength?: number;
};

type ConnectionState = {
  id: number;
  socket: Socket;
  remainder: string;
  // set after an over-long line was dropped; input is skipped up to the next newline
  discarding: boolean;
  unanswered: number;
  peerEnded: boolean;
};

const DEFAULT_MAX_LINE_LENGTH = 16 * 1024;

export class RemoteControlListener {
  private readonly host: string;
  private readonly port: number;
  private readonly sink: EventSink;
  private readonly logger: Logger;
  private readonly maxLineLength: number;
  private readonly server: Server;
  private readonly connections = new Map<number, ConnectionState>();
  private nextConnectionId = 1;
  private listening = false;

  constructor(options: RemoteListenerOptions) {
    this.host = options.host;
    this.port = options.port;
    this.sink = options.sink;
    this.logger = options.logger;
    this.maxLineLength = options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
    // half-open so a client that ends its side after a command still gets the reply
    this.server = createServer({ allowHalfOpen: true }, (socket) => {
      this.handleConnection(socket);
    });
    this.server.on("error", (error) => {
      this.logger.error("remote.server_error", { message: error.message });
    });
  }

  async start(): Promise<RemoteListenerStatus> {
    if (this.listening) {
      return { state: "listening", address: this.describeAddress() };
    }

    const status = await new Promise<Extract<RemoteListenerStatus, { state: "listening" | "unavailable" }>>((resolve) => {
      const onError = (error: Error): void => {
        this.server.off("listening", onListening);
        resolve({ state: "unavailable", error: describeError(error) });
      };
      const onListening = (): void => {
        this.server.off("error", onError);
        this.listening = true;
        resolve({ state: "listening", address: this.describeAddress() });
      };

      this.server.once("error", onError);
      this.server.once("listening", onListening);
      this.server.listen(this.port, this.host);
    });

    if (status.state === "unavailable") {
      this.logger.warn("remote.listener_bind_failure", {
        host: this.host,
        port: this.port,
        error: status.error,
      });
    } else {
      this.logger.info("remote.listening", { address: status.address });
    }
    this.sink.push({ type: "remote.listener", status });
    return status;
  }

  address(): AddressInfo {
    const value = this.server.address();
    if (value === null || typeof value === "string") {
      throw new Error("remote control listener is not bound to a tcp port");
    }
    return value;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  async close(): Promise<void> {
    for (const connection of this.connections.values()) {
      connection.socket.destroy();
    }
    this.connections.clear();

    if (!this.listening) {
      return;
    }

    await new Promise<void>((resolve) => {
      this.server.close(() => {
        this.listening = false;
        resolve();
      });
    });
  }

  private describeAddress(): string {
    const { address, port } = this.address();
    return address.includes(":") ? `[${address}]:${port}` : `${address}:${port}`;
  }

  private handleConnection(socket: Socket): void {
    const state: ConnectionState = {
      id: this.nextConnectionId,
      socket,
      remainder: "",
      discarding: false,
      unanswered: 0,
      peerEnded: false,
    };
    this.nextConnectionId += 1;
    this.connections.set(state.id, state);
    this.logger.debug("remote.connection_open", { connection: state.id });

    socket.setEncoding("utf8");
    socket.on("data", (chunk: string) => {
      this.handleSocketData(state, chunk);
    });
    socket.on("end", () => {
      state.peerEnded = true;
      this.endIfAnswered(state);
    });
    socket.on("error", (error) => {
      this.logger.warn("remote.connection_error", { connection: state.id, message: error.message });
      this.connections.delete(state.id);
    });
    socket.on("close", () => {
      this.connections.delete(state.id);
      this.logger.debug("remote.connection_closed", { connection: state.id });
    });
  }

  private handleSocketData(connection: ConnectionState, chunk: string): void {
    let data = chunk;
    if (connection.discarding) {
      const newline = data.indexOf("\n");
      if (newline < 0) {
        return;
      }
      data = data.slice(newline + 1);
      connection.discarding = false;
    }

    const lines = `${connection.remainder}${data}`.split("\n");
    connection.remainder = lines.pop() ?? "";

    if (connection.remainder.length > this.maxLineLength) {
      this.logger.warn("remote.malformed_remote_command", {
        connection: connection.id,
        reason: `line exceeds ${this.maxLineLength} characters`,
      });
      connection.remainder = "";
      connection.discarding = true;
    }

    for (const line of lines) {
      this.handleLine(connection, line);
    }
  }

  private handleLine(connection: ConnectionState, line: string): void {
    const parsed = parseRemoteCommand(line);
    if (parsed.kind === "ignored") {
      if (parsed.line.trim()) {
        this.logger.warn("remote.malformed_remote_command", {
          connection: connection.id,
          line: parsed.line,
          reason: parsed.reason,
        });
      }
      return;
    }

    this.logger.debug("remote.command", {
      connection: connection.id,
      command: formatRemoteCommand(parsed),
    });
    const socket = connection.socket;
    let answered = false;
    connection.unanswered += 1;
    this.sink.push({
      type: "remote.command",
      command: parsed,
      respond: (reply) => {
        if (answered) {
          return;
        }
        answered = true;
        connection.unanswered -= 1;
        if (!socket.destroyed && socket.writable) {
          socket.write(`${reply}\n`);
        }
        this.endIfAnswered(connection);
      },
    });
  }

  private endIfAnswered(connection: ConnectionState): void {
    if (connection.peerEnded && connection.unanswered === 0 && !connection.socket.destroyed) {
      connection.socket.end();
    }
  }
}
