export type ConversationId = number;
export type MessageId = number;

export type MessageRole = "user" | "model";

export type MessageStatus =
  | { kind: "pending" }
  | { kind: "complete" }
  | { kind: "failed"; reason: string };

export type ChatMessage = {
  id: MessageId;
  role: MessageRole;
  text: string;
  status: MessageStatus;
};

export type Conversation = {
  id: ConversationId;
  title: string;
  modelId: string | null;
  createdOrder: number;
  messages: ChatMessage[];
};

export type Model = {
  id: string;
  name: string;
};

export type DebugEvent = {
  stage: string;
  data: unknown;
};
