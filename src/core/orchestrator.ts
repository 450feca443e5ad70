import type { ChatMessage, ConversationId, MessageId, Model } from "../chat-types.js";
import type { ReplySubmitter } from "../bridge/process-bridge.js";
import type { ClipboardWriter } from "../clipboard.js";
import { describeError, type Logger } from "../log.js";
import { ModelRegistry } from "../models.js";
import type { RemoteCommand } from "../rpc/remote-command.js";
import type { EventBus } from "./event-bus.js";
import type { AppEvent, KeyInput, RemoteListenerStatus } from "./events.js";
import { describeFocus, FocusMachine, type Focus } from "./focus.js";
import { resolveKeyAction, type KeyAction } from "./keymap.js";
import { SessionStore } from "./session-store.js";

export type FeedbackTone = "positive" | "negative";

export type Feedback = {
  text: string;
  tone: FeedbackTone;
};

export type ModelsStatus = "idle" | "loading" | "ready" | "failed";

export type ConversationView = {
  id: ConversationId;
  title: string;
  modelId: string | null;
  pending: boolean;
  messages: ChatMessage[];
};

export type AppSnapshot = {
  revision: number;
  conversations: ConversationView[];
  activeConversationId: ConversationId | null;
  models: readonly Model[];
  modelsStatus: ModelsStatus;
  modelCursor: number | null;
  messageCursor: number | null;
  focus: Focus;
  listVisible: boolean;
  input: string;
  feedback: Feedback | null;
  remote: RemoteListenerStatus;
  quitting: boolean;
};

export type SubmitResult =
  | { ok: true; conversationId: ConversationId; messageId: MessageId }
  | { ok: false; code: "empty" | "busy" | "no_model"; reason: string };

export type OrchestratorOptions = {
  bus: EventBus<AppEvent>;
  bridge: ReplySubmitter;
  logger: Logger;
  clipboard?: ClipboardWriter;
  loadModels?: () => Promise<Model[]>;
  defaultModel?: string | null;
  remote?: RemoteListenerStatus;
  batchSize?: number;
  pollIntervalMs?: number;
  feedbackTtlMs?: number;
  now?: () => number;
};

type SnapshotListener = (snapshot: AppSnapshot) => void;

const DEFAULT_BATCH_SIZE = 64;
const DEFAULT_POLL_INTERVAL_MS = 100;
const DEFAULT_FEEDBACK_TTL_MS = 5_000;

/**
 * Single owner of application state. Keyboard input, subprocess output and
 * remote commands all arrive as events on one bus; nothing else mutates the
 * session store, focus or model snapshot.
 */
export class Orchestrator {
  private readonly bus: EventBus<AppEvent>;
  private readonly bridge: ReplySubmitter;
  private readonly logger: Logger;
  private readonly clipboard: ClipboardWriter | null;
  private readonly loadModels: (() => Promise<Model[]>) | null;
  private readonly defaultModel: string | null;
  private readonly batchSize: number;
  private readonly pollIntervalMs: number;
  private readonly feedbackTtlMs: number;
  private readonly now: () => number;

  private readonly store: SessionStore;
  private readonly focusMachine = new FocusMachine();
  private readonly registry = new ModelRegistry();
  private readonly listeners = new Set<SnapshotListener>();

  private modelsStatus: ModelsStatus = "idle";
  private modelCursor: number | null = null;
  private messageCursor: number | null = null;
  private input = "";
  private feedback: (Feedback & { expiresAt: number }) | null = null;
  private remote: RemoteListenerStatus;
  private quitting = false;
  private uiDirty = true;
  private revision = 0;
  private snapshot: AppSnapshot | null = null;
  private running = false;

  constructor(options: OrchestratorOptions) {
    this.bus = options.bus;
    this.bridge = options.bridge;
    this.logger = options.logger;
    this.clipboard = options.clipboard ?? null;
    this.loadModels = options.loadModels ?? null;
    this.defaultModel = options.defaultModel ?? null;
    this.remote = options.remote ?? { state: "disabled" };
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.feedbackTtlMs = options.feedbackTtlMs ?? DEFAULT_FEEDBACK_TTL_MS;
    this.now = options.now ?? Date.now;
    this.store = new SessionStore(this.logger);
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getSnapshot(): AppSnapshot {
    if (!this.snapshot) {
      this.snapshot = this.buildSnapshot();
    }
    return this.snapshot;
  }

  async run(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    this.render();

    while (this.running) {
      const ready = await this.bus.wait(this.pollIntervalMs);
      if (!this.running) {
        break;
      }
      this.expireFeedback();
      if (ready) {
        this.processBatch();
      }
      this.render();
      if (this.bus.size > 0) {
        // let socket and subprocess callbacks run before the next batch
        await new Promise<void>((resolve) => setImmediate(resolve));
      }
    }
  }

  stop(): void {
    this.running = false;
    this.bus.close();
  }

  /**
   * Drains every queued event in batches and renders once. Used by tests and
   * during shutdown; the run loop renders after each batch instead.
   */
  processPending(): number {
    let processed = 0;
    while (this.bus.size > 0) {
      processed += this.processBatch();
    }
    this.expireFeedback();
    this.render();
    return processed;
  }

  reloadModels(): void {
    const loadModels = this.loadModels;
    if (!loadModels) {
      return;
    }
    this.modelsStatus = "loading";
    this.uiDirty = true;
    void loadModels().then(
      (models) => {
        this.bus.push({ type: "models.loaded", models });
      },
      (error: unknown) => {
        this.bus.push({ type: "models.failed", reason: describeError(error) });
      },
    );
  }

  private processBatch(): number {
    const events = this.bus.drain(this.batchSize);
    for (const event of events) {
      try {
        this.dispatch(event);
      } catch (error) {
        this.logger.error("orchestrator.dispatch_failed", {
          event: event.type,
          message: describeError(error),
        });
      }
    }
    return events.length;
  }

  private dispatch(event: AppEvent): void {
    switch (event.type) {
      case "key":
        this.handleKey(event.input, event.key);
        return;
      case "reply.chunk":
        this.store.appendToReply(event.messageId, event.text);
        return;
      case "reply.done":
        this.handleReplyFinished(event.messageId, { kind: "complete" });
        return;
      case "reply.failed":
        this.handleReplyFinished(event.messageId, { kind: "failed", reason: event.reason });
        return;
      case "remote.command":
        this.handleRemoteCommand(event.command, event.respond);
        return;
      case "remote.listener":
        this.remote = event.status;
        this.uiDirty = true;
        if (event.status.state === "unavailable") {
          this.setFeedback(`Remote control unavailable: ${event.status.error}`, "negative");
        }
        return;
      case "models.loaded":
        this.applyModels(event.models);
        return;
      case "models.failed":
        this.modelsStatus = "failed";
        this.uiDirty = true;
        this.logger.warn("models.load_failed", { reason: event.reason });
        this.setFeedback(`Could not load models: ${event.reason}`, "negative");
        return;
      case "clipboard.done":
        if (event.ok) {
          this.setFeedback("Message copied successfully!", "positive");
        } else {
          this.logger.warn("clipboard.clipboard_failure", { reason: event.reason });
          this.setFeedback(`Failed to copy: ${event.reason}`, "negative");
        }
        return;
    }
  }

  private handleKey(input: string, key: KeyInput): void {
    const action = resolveKeyAction(this.focusMachine.focus, input, key);
    if (action.kind !== "none") {
      this.applyKeyAction(action);
    }
  }

  private applyKeyAction(action: KeyAction): void {
    this.uiDirty = true;
    switch (action.kind) {
      case "quit":
        this.quitting = true;
        return;
      case "cycleFocus":
        this.focusMachine.cycle();
        return;
      case "toggleList":
        this.focusMachine.toggleList();
        return;
      case "startEditing":
        this.focusMachine.focusInput("editing");
        return;
      case "stopEditing":
        this.focusMachine.exitEdit();
        return;
      case "stopEditingAndCycle":
        this.focusMachine.exitEdit();
        this.focusMachine.cycle();
        return;
      case "conversationNext":
        this.stepConversation(1);
        return;
      case "conversationPrevious":
        this.stepConversation(-1);
        return;
      case "conversationOpen":
        if (this.store.activeId === null) {
          const first = this.store.list()[0];
          if (!first) {
            return;
          }
          this.activateConversation(first.id);
        }
        this.focusMachine.focusRegion("chat");
        return;
      case "conversationNew":
        this.activateConversation(this.store.createConversation(this.currentModelId()));
        this.focusMachine.focusInput("editing");
        return;
      case "modelNext":
        this.stepModel(1);
        return;
      case "modelPrevious":
        this.stepModel(-1);
        return;
      case "modelReload":
        this.reloadModels();
        return;
      case "messageNext":
        this.stepMessage(1);
        return;
      case "messagePrevious":
        this.stepMessage(-1);
        return;
      case "messageCopy":
        this.copySelectedMessage();
        return;
      case "submit": {
        const result = this.submitPrompt(this.input);
        if (result.ok) {
          this.input = "";
        } else {
          this.setFeedback(result.reason, "negative");
        }
        this.focusMachine.exitEdit();
        return;
      }
      case "insertText":
        this.input += action.text;
        return;
      case "deleteBackward":
        this.input = Array.from(this.input).slice(0, -1).join("");
        return;
      case "none":
        return;
    }
  }

  private handleRemoteCommand(command: RemoteCommand, respond: (line: string) => void): void {
    switch (command.kind) {
      case "new": {
        const id = this.store.createConversation(this.currentModelId());
        this.activateConversation(id);
        this.setFeedback(`Remote: created ${this.store.get(id)?.title ?? `conversation ${id}`}`, "positive");
        respond("OK");
        return;
      }
      case "send": {
        const result = this.submitPrompt(command.text);
        if (result.ok) {
          this.setFeedback("Remote message received and sent!", "positive");
          respond("OK");
        } else {
          this.setFeedback(`Remote message rejected: ${result.reason}`, "negative");
          respond(`ERR ${result.code}`);
        }
        return;
      }
      case "model": {
        const index = this.registry.indexOf(command.modelId);
        if (index < 0) {
          this.setFeedback(`Remote: unknown model ${command.modelId}`, "negative");
          respond("ERR unknown model");
          return;
        }
        this.modelCursor = index;
        this.uiDirty = true;
        const activeId = this.store.activeId;
        if (activeId !== null) {
          this.store.setModel(activeId, command.modelId);
        }
        this.setFeedback(`Remote: model set to ${command.modelId}`, "positive");
        respond("OK");
        return;
      }
      case "status":
        respond(this.statusLine());
        return;
    }
  }

  /**
   * Sends a prompt to the active conversation, creating one when none is
   * selected. A conversation waiting on a reply rejects further prompts.
   */
  private submitPrompt(rawText: string): SubmitResult {
    const text = rawText.trim();
    if (!text) {
      return { ok: false, code: "empty", reason: "Nothing to send" };
    }

    let conversation = this.store.activeConversation();
    if (conversation && this.store.pendingReply(conversation.id)) {
      return {
        ok: false,
        code: "busy",
        reason: `${conversation.title} is still waiting for a reply`,
      };
    }

    const modelId = conversation?.modelId ?? this.currentModelId();
    if (!modelId) {
      return { ok: false, code: "no_model", reason: "No model available; check the llm aliases output" };
    }

    if (!conversation) {
      const id = this.store.createConversation(modelId);
      this.activateConversation(id);
      conversation = this.store.activeConversation();
      if (!conversation) {
        throw new Error(`conversation ${id} vanished after creation`);
      }
    } else if (!conversation.modelId) {
      this.store.setModel(conversation.id, modelId);
    }

    this.store.appendUserMessage(conversation.id, text);
    const messageId = this.store.beginModelReply(conversation.id);
    if (messageId === null) {
      throw new Error(`${conversation.title} already has a pending reply`);
    }
    this.messageCursor = conversation.messages.length - 1;
    this.uiDirty = true;

    try {
      this.bridge.submit({ conversationId: conversation.id, messageId, modelId, prompt: text });
    } catch (error) {
      this.store.completeReply(messageId, { kind: "failed", reason: describeError(error) });
    }
    this.logger.info("orchestrator.prompt_submitted", {
      conversation: conversation.id,
      message: messageId,
      model: modelId,
    });
    return { ok: true, conversationId: conversation.id, messageId };
  }

  private handleReplyFinished(
    messageId: MessageId,
    status: { kind: "complete" } | { kind: "failed"; reason: string },
  ): void {
    if (!this.store.completeReply(messageId, status)) {
      return;
    }
    const location = this.store.findMessage(messageId);
    if (!location) {
      return;
    }
    const { conversation } = location;
    if (status.kind === "failed") {
      this.setFeedback(`${conversation.title}: ${status.reason}`, "negative");
      return;
    }
    if (conversation.id !== this.store.activeId) {
      this.setFeedback(`${conversation.title} received a reply`, "positive");
    }
  }

  private applyModels(models: Model[]): void {
    const selected = this.modelCursor === null ? null : this.registry.at(this.modelCursor)?.id ?? null;
    this.registry.replace(models);
    this.modelsStatus = "ready";
    this.uiDirty = true;

    const active = this.store.activeConversation();
    const preferred = active?.modelId ?? selected ?? this.defaultModel;
    const pick = preferred && this.registry.has(preferred) ? preferred : this.registry.pickDefault(this.defaultModel);
    this.modelCursor = pick === null ? null : this.registry.indexOf(pick);
    this.logger.info("models.loaded", { count: models.length });
  }

  private currentModelId(): string | null {
    if (this.modelCursor !== null) {
      const model = this.registry.at(this.modelCursor);
      if (model) {
        return model.id;
      }
    }
    return this.registry.pickDefault(this.defaultModel);
  }

  private activateConversation(id: ConversationId): void {
    if (!this.store.selectConversation(id)) {
      return;
    }
    const conversation = this.store.get(id);
    if (!conversation) {
      return;
    }
    this.messageCursor = conversation.messages.length > 0 ? conversation.messages.length - 1 : null;
    if (conversation.modelId) {
      const index = this.registry.indexOf(conversation.modelId);
      if (index >= 0) {
        this.modelCursor = index;
      }
    }
    this.uiDirty = true;
  }

  private stepConversation(direction: 1 | -1): void {
    const conversations = this.store.list();
    if (conversations.length === 0) {
      return;
    }
    const activeIndex = conversations.findIndex((conversation) => conversation.id === this.store.activeId);
    const nextIndex =
      activeIndex < 0 ? 0 : (activeIndex + direction + conversations.length) % conversations.length;
    const next = conversations[nextIndex];
    if (next) {
      this.activateConversation(next.id);
    }
  }

  private stepModel(direction: 1 | -1): void {
    const count = this.registry.size;
    if (count === 0) {
      this.setFeedback(
        this.modelsStatus === "loading" ? "Models are still loading" : "No models available",
        "negative",
      );
      return;
    }
    const current = this.modelCursor;
    const nextIndex = current === null ? 0 : (current + direction + count) % count;
    const model = this.registry.at(nextIndex);
    if (!model) {
      return;
    }
    this.modelCursor = nextIndex;
    const activeId = this.store.activeId;
    if (activeId !== null) {
      this.store.setModel(activeId, model.id);
    }
  }

  private stepMessage(direction: 1 | -1): void {
    const messages = this.store.activeConversation()?.messages ?? [];
    if (messages.length === 0) {
      this.messageCursor = null;
      return;
    }
    const current = this.messageCursor;
    this.messageCursor =
      current === null ? 0 : (Math.min(current, messages.length - 1) + direction + messages.length) % messages.length;
  }

  private copySelectedMessage(): void {
    const messages = this.store.activeConversation()?.messages ?? [];
    const message = this.messageCursor === null ? undefined : messages[this.messageCursor];
    if (!message) {
      this.setFeedback("Failed to copy: No message selected", "negative");
      return;
    }
    const clipboard = this.clipboard;
    if (!clipboard) {
      this.setFeedback("Failed to copy: clipboard is not available", "negative");
      return;
    }
    const text = message.text;
    void clipboard(text).then(
      () => {
        this.bus.push({ type: "clipboard.done", ok: true, chars: text.length });
      },
      (error: unknown) => {
        this.bus.push({ type: "clipboard.done", ok: false, reason: describeError(error) });
      },
    );
  }

  private statusLine(): string {
    const active = this.store.activeConversation();
    const counts = this.store.counts();
    return [
      "STATUS",
      `conversations=${counts.conversations}`,
      `active=${active?.id ?? "none"}`,
      `model=${active?.modelId ?? this.currentModelId() ?? "none"}`,
      `pending=${counts.pending}`,
      `focus=${describeFocus(this.focusMachine.focus)}`,
    ].join(" ");
  }

  private setFeedback(text: string, tone: FeedbackTone): void {
    this.feedback = { text, tone, expiresAt: this.now() + this.feedbackTtlMs };
    this.uiDirty = true;
  }

  private expireFeedback(): void {
    if (this.feedback && this.now() >= this.feedback.expiresAt) {
      this.feedback = null;
      this.uiDirty = true;
    }
  }

  private render(): void {
    const storeChanged = this.store.consumeDirty();
    if (!storeChanged && !this.uiDirty && this.snapshot) {
      return;
    }
    this.uiDirty = false;
    this.revision += 1;
    this.snapshot = this.buildSnapshot();
    for (const listener of this.listeners) {
      listener(this.snapshot);
    }
  }

  private buildSnapshot(): AppSnapshot {
    return {
      revision: this.revision,
      conversations: this.store.list().map((conversation) => ({
        id: conversation.id,
        title: conversation.title,
        modelId: conversation.modelId,
        pending: conversation.messages.some((message) => message.status.kind === "pending"),
        messages: conversation.messages.map((message) => ({ ...message })),
      })),
      activeConversationId: this.store.activeId,
      models: this.registry.list(),
      modelsStatus: this.modelsStatus,
      modelCursor: this.modelCursor,
      messageCursor: this.messageCursor,
      focus: this.focusMachine.focus,
      listVisible: this.focusMachine.listVisible,
      input: this.input,
      feedback: this.feedback ? { text: this.feedback.text, tone: this.feedback.tone } : null,
      remote: this.remote,
      quitting: this.quitting,
    };
  }
}
