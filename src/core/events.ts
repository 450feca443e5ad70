import type { MessageId, Model } from "../chat-types.js";
import type { RemoteCommand } from "../rpc/remote-command.js";

export type KeyInput = {
  upArrow: boolean;
  downArrow: boolean;
  return: boolean;
  escape: boolean;
  tab: boolean;
  backspace: boolean;
  delete: boolean;
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
};

export type FailureKind = "spawn_failure" | "stream_failure" | "timeout";

export type RemoteListenerStatus =
  | { state: "disabled" }
  | { state: "starting" }
  | { state: "listening"; address: string }
  | { state: "unavailable"; error: string };

export type AppEvent =
  | { type: "key"; input: string; key: KeyInput }
  | { type: "reply.chunk"; messageId: MessageId; text: string }
  | { type: "reply.done"; messageId: MessageId }
  | { type: "reply.failed"; messageId: MessageId; kind: FailureKind; reason: string }
  | { type: "remote.command"; command: RemoteCommand; respond: (line: string) => void }
  | { type: "remote.listener"; status: RemoteListenerStatus }
  | { type: "models.loaded"; models: Model[] }
  | { type: "models.failed"; reason: string }
  | { type: "clipboard.done"; ok: true; chars: number }
  | { type: "clipboard.done"; ok: false; reason: string };

export type EventSink = {
  push(event: AppEvent): void;
};

export function emptyKey(overrides: Partial<KeyInput> = {}): KeyInput {
  return {
    upArrow: false,
    downArrow: false,
    return: false,
    escape: false,
    tab: false,
    backspace: false,
    delete: false,
    ctrl: false,
    meta: false,
    shift: false,
    ...overrides,
  };
}
