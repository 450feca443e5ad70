import type {
  ChatMessage,
  Conversation,
  ConversationId,
  MessageId,
  MessageStatus,
} from "../chat-types.js";
import type { Logger } from "../log.js";

type MessageLocation = {
  conversation: Conversation;
  message: ChatMessage;
};

/**
 * All conversations and messages. Only the orchestrator holds a reference, so
 * mutations are plain synchronous calls; every one of them marks the store
 * dirty for the next render pass.
 */
export class SessionStore {
  private readonly conversations = new Map<ConversationId, Conversation>();
  private readonly messages = new Map<MessageId, MessageLocation>();
  private readonly logger: Logger;
  private nextConversationId = 1;
  private nextMessageId = 1;
  private active: ConversationId | null = null;
  private dirtyFlag = false;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  get activeId(): ConversationId | null {
    return this.active;
  }

  get dirty(): boolean {
    return this.dirtyFlag;
  }

  consumeDirty(): boolean {
    const wasDirty = this.dirtyFlag;
    this.dirtyFlag = false;
    return wasDirty;
  }

  createConversation(modelId: string | null = null): ConversationId {
    const id = this.nextConversationId;
    this.nextConversationId += 1;
    this.conversations.set(id, {
      id,
      title: `Conversation ${id}`,
      modelId,
      createdOrder: this.conversations.size,
      messages: [],
    });
    this.markDirty();
    return id;
  }

  selectConversation(id: ConversationId): boolean {
    if (!this.conversations.has(id)) {
      this.logger.warn("store.unknown_conversation", { conversation: id });
      return false;
    }
    if (this.active !== id) {
      this.active = id;
      this.markDirty();
    }
    return true;
  }

  appendUserMessage(id: ConversationId, text: string): MessageId {
    return this.appendMessage(this.requireConversation(id), {
      role: "user",
      text,
      status: { kind: "complete" },
    });
  }

  /**
   * Opens the Pending model message that subprocess output streams into.
   * Returns null when the conversation already has one.
   */
  beginModelReply(id: ConversationId): MessageId | null {
    const conversation = this.requireConversation(id);
    if (this.pendingReply(id)) {
      return null;
    }
    return this.appendMessage(conversation, {
      role: "model",
      text: "",
      status: { kind: "pending" },
    });
  }

  appendToReply(messageId: MessageId, chunk: string): boolean {
    const message = this.pendingMessage(messageId, "append");
    if (!message) {
      return false;
    }
    if (chunk) {
      message.text += chunk;
      this.markDirty();
    }
    return true;
  }

  completeReply(messageId: MessageId, status: Exclude<MessageStatus, { kind: "pending" }>): boolean {
    const message = this.pendingMessage(messageId, "complete");
    if (!message) {
      return false;
    }
    message.status = status;
    this.markDirty();
    return true;
  }

  setModel(id: ConversationId, modelId: string): void {
    const conversation = this.requireConversation(id);
    if (conversation.modelId !== modelId) {
      conversation.modelId = modelId;
      this.markDirty();
    }
  }

  list(): Conversation[] {
    return [...this.conversations.values()].sort((a, b) => a.createdOrder - b.createdOrder);
  }

  get(id: ConversationId): Conversation | undefined {
    return this.conversations.get(id);
  }

  activeConversation(): Conversation | undefined {
    return this.active === null ? undefined : this.conversations.get(this.active);
  }

  pendingReply(id: ConversationId): ChatMessage | undefined {
    const conversation = this.conversations.get(id);
    return conversation?.messages.find((message) => message.status.kind === "pending");
  }

  findMessage(messageId: MessageId): MessageLocation | undefined {
    return this.messages.get(messageId);
  }

  counts(): { conversations: number; messages: number; pending: number } {
    let pending = 0;
    for (const { message } of this.messages.values()) {
      if (message.status.kind === "pending") {
        pending += 1;
      }
    }
    return {
      conversations: this.conversations.size,
      messages: this.messages.size,
      pending,
    };
  }

  private appendMessage(conversation: Conversation, body: Omit<ChatMessage, "id">): MessageId {
    const message: ChatMessage = { id: this.nextMessageId, ...body };
    this.nextMessageId += 1;
    conversation.messages.push(message);
    this.messages.set(message.id, { conversation, message });
    this.markDirty();
    return message.id;
  }

  private pendingMessage(messageId: MessageId, operation: string): ChatMessage | null {
    const location = this.messages.get(messageId);
    if (!location) {
      this.logger.warn("store.unknown_message_target", { message: messageId, operation });
      return null;
    }
    if (location.message.status.kind !== "pending") {
      this.logger.warn("store.unknown_message_target", {
        message: messageId,
        operation,
        reason: `message is ${location.message.status.kind}`,
      });
      return null;
    }
    return location.message;
  }

  private requireConversation(id: ConversationId): Conversation {
    const conversation = this.conversations.get(id);
    if (!conversation) {
      throw new Error(`conversation not found: ${id}`);
    }
    return conversation;
  }

  private markDirty(): void {
    this.dirtyFlag = true;
  }
}
