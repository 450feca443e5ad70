#!/usr/bin/env node
import React, { useEffect, useState } from "react";
import path from "node:path";
import { Box, render, Text, useApp, useInput, useStdout, type Key } from "ink";
import { ProcessBridge } from "./bridge/process-bridge.js";
import { writeClipboardText } from "./clipboard.js";
import { loadConfig, type LlmTuiConfig } from "./config.js";
import { EventBus } from "./core/event-bus.js";
import type { AppEvent, KeyInput } from "./core/events.js";
import { Orchestrator, type AppSnapshot } from "./core/orchestrator.js";
import { createLogger, describeError } from "./log.js";
import { fetchModelAliases, modelIdToLabel } from "./models.js";
import { RemoteControlListener } from "./rpc/remote-listener.js";
import {
  activeConversation,
  conversationLabel,
  formatMessage,
  remoteIndicator,
  statusHint,
  visibleWindow,
} from "./ui/format.js";

const FOCUSED_BORDER = "yellow";
const IDLE_BORDER = "gray";
// status bar + input box, each three rows with borders
const FIXED_ROWS = 6;

type AppProps = {
  orchestrator: Orchestrator;
  bus: EventBus<AppEvent>;
};

function toKeyInput(key: Key): KeyInput {
  return {
    upArrow: key.upArrow,
    downArrow: key.downArrow,
    return: key.return,
    escape: key.escape,
    tab: key.tab,
    backspace: key.backspace,
    delete: key.delete,
    ctrl: key.ctrl,
    meta: key.meta,
    shift: key.shift,
  };
}

function App({ orchestrator, bus }: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [snapshot, setSnapshot] = useState<AppSnapshot>(() => orchestrator.getSnapshot());
  const rows = Math.max(12, stdout.rows ?? 24);

  useEffect(() => orchestrator.subscribe(setSnapshot), [orchestrator]);

  useEffect(() => {
    if (snapshot.quitting) {
      exit();
    }
  }, [snapshot.quitting, exit]);

  useInput((input, key) => {
    bus.push({ type: "key", input, key: toKeyInput(key) });
  });

  const mainRows = rows - FIXED_ROWS;

  return (
    <Box flexDirection="column" height={rows}>
      <Box flexDirection="row" height={mainRows}>
        {snapshot.listVisible && <SidePane snapshot={snapshot} rows={mainRows} />}
        <Box flexDirection="column" flexGrow={1}>
          <ChatPane snapshot={snapshot} rows={mainRows} />
        </Box>
      </Box>
      <InputPane snapshot={snapshot} />
      <StatusBar snapshot={snapshot} />
    </Box>
  );
}

function SidePane({ snapshot, rows }: { snapshot: AppSnapshot; rows: number }) {
  const listFocused = snapshot.focus.region === "conversationList";
  const modelFocused = snapshot.focus.region === "modelSelect";
  const modelRows = Math.max(3, Math.min(snapshot.models.length + 2, Math.floor(rows / 3)));
  const listRows = rows - modelRows;
  const activeIndex = snapshot.conversations.findIndex(
    (conversation) => conversation.id === snapshot.activeConversationId,
  );
  const listWindow = visibleWindow(snapshot.conversations.length, listRows - 2, activeIndex < 0 ? null : activeIndex);
  const modelWindow = visibleWindow(snapshot.models.length, modelRows - 2, snapshot.modelCursor);

  return (
    <Box flexDirection="column" width="30%">
      <Box
        flexDirection="column"
        height={listRows}
        borderStyle="single"
        borderColor={listFocused ? FOCUSED_BORDER : IDLE_BORDER}
      >
        <Text bold>Conversations</Text>
        {snapshot.conversations.length === 0 && <Text color="gray">n: new conversation</Text>}
        {snapshot.conversations.slice(listWindow.start, listWindow.end).map((conversation) => {
          const selected = conversation.id === snapshot.activeConversationId;
          return (
            <Text key={conversation.id} bold={selected} color={selected ? "cyan" : undefined} wrap="truncate-end">
              {selected ? "> " : "  "}
              {conversationLabel(conversation)}
            </Text>
          );
        })}
      </Box>
      <Box
        flexDirection="column"
        height={modelRows}
        borderStyle="single"
        borderColor={modelFocused ? FOCUSED_BORDER : IDLE_BORDER}
      >
        {snapshot.models.length === 0 && (
          <Text color="gray">{snapshot.modelsStatus === "loading" ? "loading models..." : "no models"}</Text>
        )}
        {snapshot.models.slice(modelWindow.start, modelWindow.end).map((model, offset) => {
          const selected = modelWindow.start + offset === snapshot.modelCursor;
          return (
            <Text key={model.id} bold={selected} wrap="truncate-end">
              {selected ? "> " : "  "}
              {modelIdToLabel(model)}
            </Text>
          );
        })}
      </Box>
    </Box>
  );
}

function ChatPane({ snapshot, rows }: { snapshot: AppSnapshot; rows: number }) {
  const focused = snapshot.focus.region === "chat";
  const conversation = activeConversation(snapshot);
  const messages = conversation?.messages ?? [];
  const window = visibleWindow(messages.length, rows - 3, snapshot.messageCursor);
  const title = conversation
    ? `${conversation.title}${conversation.modelId ? ` | ${conversation.modelId}` : ""}`
    : "Chat";

  return (
    <Box
      flexDirection="column"
      height={rows}
      borderStyle="single"
      borderColor={focused ? FOCUSED_BORDER : IDLE_BORDER}
    >
      <Text bold>{title}</Text>
      {messages.slice(window.start, window.end).map((message, offset) => {
        const index = window.start + offset;
        const selected = focused && index === snapshot.messageCursor;
        const color = message.status.kind === "failed" ? "red" : message.role === "user" ? "green" : "blue";
        return (
          <Text key={message.id} color={color} inverse={selected} wrap="wrap">
            {formatMessage(message)}
          </Text>
        );
      })}
    </Box>
  );
}

function InputPane({ snapshot }: { snapshot: AppSnapshot }) {
  const focused = snapshot.focus.region === "input";
  const editing = snapshot.focus.region === "input" && snapshot.focus.mode === "editing";
  return (
    <Box borderStyle="single" borderColor={focused ? FOCUSED_BORDER : IDLE_BORDER} height={3}>
      <Text color={editing ? "yellow" : undefined} wrap="truncate-start">
        {snapshot.input}
        {editing ? "█" : ""}
      </Text>
    </Box>
  );
}

function StatusBar({ snapshot }: { snapshot: AppSnapshot }) {
  const conversation = activeConversation(snapshot);
  const thinking = conversation?.pending === true;
  const remote = remoteIndicator(snapshot.remote);

  let status: React.ReactNode;
  if (snapshot.feedback) {
    status = (
      <Text color={snapshot.feedback.tone === "positive" ? "green" : "red"} wrap="truncate-end">
        {snapshot.feedback.text}
      </Text>
    );
  } else if (thinking) {
    status = <Text color="yellow">Thinking...</Text>;
  } else {
    status = (
      <Text color="cyan" wrap="truncate-end">
        {statusHint(snapshot.focus)}
      </Text>
    );
  }

  return (
    <Box flexDirection="row" height={3}>
      <Box borderStyle="single" flexGrow={1}>
        {status}
      </Box>
      <Box borderStyle="single" width={28}>
        <Text color={snapshot.remote.state === "listening" ? "green" : "gray"} wrap="truncate-end">
          {remote}
        </Text>
      </Box>
    </Box>
  );
}

function createRuntime(config: LlmTuiConfig) {
  const logger = createLogger({
    level: config.logLevel,
    filePath: config.debugLogPath ?? path.join(config.dataDir, "llm-tui.log"),
  });
  const bus = new EventBus<AppEvent>();
  const bridge = new ProcessBridge({
    command: config.command,
    sink: bus,
    logger,
    timeoutMs: config.replyTimeoutMs,
  });
  const orchestrator = new Orchestrator({
    bus,
    bridge,
    logger,
    clipboard: writeClipboardText,
    loadModels: () => fetchModelAliases({ command: config.command }),
    defaultModel: config.defaultModel,
    remote: config.remoteEnabled ? { state: "starting" } : { state: "disabled" },
    batchSize: config.batchSize,
    pollIntervalMs: config.pollIntervalMs,
    feedbackTtlMs: config.feedbackTtlMs,
  });
  const listener = config.remoteEnabled
    ? new RemoteControlListener({
      host: config.remoteHost,
      port: config.remotePort,
      sink: bus,
      logger,
    })
    : null;

  return { logger, bus, bridge, orchestrator, listener };
}

export async function startTuiApp(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let config: LlmTuiConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    process.stderr.write(`llm-tui: ${describeError(error)}\n`);
    return 1;
  }

  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    process.stderr.write("llm-tui: an interactive terminal is required\n");
    return 1;
  }

  const { logger, bus, bridge, orchestrator, listener } = createRuntime(config);

  let instance: ReturnType<typeof render>;
  try {
    instance = render(<App orchestrator={orchestrator} bus={bus} />, { exitOnCtrlC: false });
  } catch (error) {
    logger.error("startup.render_failed", { message: describeError(error) });
    process.stderr.write(`llm-tui: could not initialise the terminal: ${describeError(error)}\n`);
    return 1;
  }

  orchestrator.reloadModels();
  const loop = orchestrator.run();
  if (listener) {
    await listener.start();
  }

  await instance.waitUntilExit();
  orchestrator.stop();
  await loop;
  bridge.shutdown();
  await listener?.close();
  logger.info("shutdown.complete");
  return 0;
}

startTuiApp().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`llm-tui: ${describeError(error)}\n`);
    process.exitCode = 1;
  },
);
