import type { ChatMessage } from "../chat-types.js";
import type { RemoteListenerStatus } from "../core/events.js";
import type { Focus } from "../core/focus.js";
import type { AppSnapshot, ConversationView } from "../core/orchestrator.js";

export const USER_PREFIX = "You: ";
export const MODEL_PREFIX = "AI: ";

export function statusHint(focus: Focus): string {
  switch (focus.region) {
    case "conversationList":
      return "Conversation List | j/k or ↑↓: Navigate | Enter: Select | n: New Conversation | i: Edit Input | Tab: Next Focus | h: Toggle List | q: Quit";
    case "modelSelect":
      return "Model Select | j/k or ↑↓: Change Model | r: Reload Models | i: Edit Input | Tab: Next Focus | h: Toggle List | q: Quit";
    case "chat":
      return "Chat | j/k or ↑↓: Scroll | y: Copy Message | i: Edit Input | Tab: Next Focus | h: Toggle List | q: Quit";
    case "input":
      return focus.mode === "editing"
        ? "Input (Editing) | Enter: Send | Esc: Stop Editing | Tab: Next Focus"
        : "Input | i: Start Editing | Tab: Next Focus | h: Toggle List | q: Quit";
  }
}

export function formatMessage(message: ChatMessage): string {
  const prefix = message.role === "user" ? USER_PREFIX : MODEL_PREFIX;
  switch (message.status.kind) {
    case "pending":
      return `${prefix}${message.text || "..."}`;
    case "complete":
      return `${prefix}${message.text}`;
    case "failed": {
      const body = message.text.trimEnd();
      return `${prefix}${body ? `${body}\n` : ""}Error: ${message.status.reason}`;
    }
  }
}

/**
 * Which slice of `total` rows fits in `height`, keeping `selected` roughly
 * centred and otherwise pinned to the bottom.
 */
export function visibleWindow(total: number, height: number, selected: number | null): { start: number; end: number } {
  const rows = Math.max(1, height);
  const maxStart = Math.max(0, total - rows);
  const start =
    selected === null ? maxStart : Math.min(maxStart, Math.max(0, selected - Math.floor(rows / 2)));
  return { start, end: Math.min(total, start + rows) };
}

export function remoteIndicator(status: RemoteListenerStatus): string {
  switch (status.state) {
    case "disabled":
      return "Remote off";
    case "starting":
      return "Remote starting";
    case "listening":
      return `Remote ${status.address}`;
    case "unavailable":
      return "Remote unavailable";
  }
}

export function activeConversation(snapshot: AppSnapshot): ConversationView | undefined {
  return snapshot.conversations.find((conversation) => conversation.id === snapshot.activeConversationId);
}

export function conversationLabel(conversation: ConversationView): string {
  return conversation.pending ? `${conversation.title} *` : conversation.title;
}
